import { beforeEach, describe, expect, it, vi } from 'vitest';
import metrics from '../src/metrics/index.js';
import { SleepMonitor, type SleepMonitorOptions } from '../src/pipeline/monitor.js';
import type { SleepSessionRecord } from '../src/sleep/sessionManager.js';
import type { StateTransition } from '../src/sleep/stateMachine.js';
import type { EventPayload } from '../src/types.js';
import { createManualClock } from '../src/utils/clock.js';
import { createTexture, texturedFrame, type Block } from './helpers/frames.js';
import { createLogger, messagesOf } from './helpers/logger.js';

const WIDTH = 32;
const HEIGHT = 24;
const texture = createTexture(WIDTH, HEIGHT, 11);
const subject: Block = { x: 12, y: 8, width: 8, height: 8 };

function still() {
  return texturedFrame(texture, WIDTH, HEIGHT);
}

function moving(index: number) {
  return texturedFrame(texture, WIDTH, HEIGHT, index % 2 === 0 ? [subject] : []);
}

function createMonitor(overrides: SleepMonitorOptions = {}) {
  const emitEvent = vi.fn<(payload: EventPayload) => boolean>(() => true);
  const saveSession = vi.fn<(record: SleepSessionRecord) => void>();
  const log = createLogger();
  const clock = createManualClock(0);
  let ids = 0;
  const monitor = new SleepMonitor({
    source: 'nursery',
    motion: { blurKernelSize: 3, calibrationFrames: 3, gridRows: 3, gridCols: 4 },
    stateMachine: { warmupSeconds: 2 },
    clock: clock.now,
    store: { saveSession },
    bus: { emitEvent },
    logger: log,
    idFactory: () => {
      ids += 1;
      return `night-${ids}`;
    },
    ...overrides
  });
  return { monitor, emitEvent, saveSession, log, clock };
}

describe('SleepMonitor', () => {
  beforeEach(() => {
    metrics.reset();
  });

  it('MonitorAlarmLifecycle raises and clears the no-breathing alarm', () => {
    const { monitor, emitEvent } = createMonitor();
    const states: string[] = [];
    const calibrated = vi.fn();
    const alarm = vi.fn<(transition: StateTransition) => void>();
    const cleared = vi.fn<(transition: StateTransition) => void>();
    monitor.on('state', (transition: StateTransition) => states.push(transition.to));
    monitor.on('calibrated', calibrated);
    monitor.on('alarm', alarm);
    monitor.on('alarm-cleared', cleared);

    expect(monitor.start(0)).toBe('night-1');
    for (let index = 0; index <= 10; index += 1) {
      monitor.processFrame(still(), index * 200);
    }

    expect(calibrated).toHaveBeenCalledTimes(1);
    expect(calibrated).toHaveBeenCalledWith({ ts: 600, excludedCells: 0 });
    expect(states).toEqual(['calibrating', 'no_breathing']);
    expect(alarm).toHaveBeenCalledTimes(1);
    expect(emitEvent).toHaveBeenCalledWith({
      ts: 2_000,
      source: 'nursery',
      detector: 'sleep-alarm',
      severity: 'critical',
      message: 'No breathing motion detected',
      meta: { from: 'calibrating' }
    });

    for (let index = 11; index <= 20; index += 1) {
      monitor.processFrame(moving(index), index * 200);
    }

    expect(cleared).toHaveBeenCalledTimes(1);
    expect(cleared.mock.calls[0][0]).toMatchObject({ from: 'no_breathing', to: 'spasm' });
    expect(monitor.getStats(4_000)).toMatchObject({
      currentState: 'spasm',
      spasmCount: 1,
      calibrated: true,
      framesProcessed: 21
    });
    const alarmEvents = emitEvent.mock.calls
      .map(([payload]) => payload)
      .filter(payload => payload.detector === 'sleep-alarm');
    expect(alarmEvents.map(payload => payload.message)).toEqual([
      'No breathing motion detected',
      'Breathing motion resumed'
    ]);
  });

  it('MonitorPublishesTransitions sends each state change to the bus', () => {
    const { monitor, emitEvent } = createMonitor();
    monitor.start(0);
    for (let index = 0; index <= 10; index += 1) {
      monitor.processFrame(still(), index * 200);
    }

    const stateEvents = emitEvent.mock.calls
      .map(([payload]) => payload)
      .filter(payload => payload.detector === 'sleep-state');
    expect(stateEvents.map(payload => payload.message)).toEqual([
      'Sleep state unknown -> calibrating',
      'Sleep state calibrating -> no_breathing'
    ]);
    expect(emitEvent.mock.calls.map(([payload]) => payload.detector)).toContain('motion');
  });

  it('MonitorStop finalizes and publishes the session', () => {
    const { monitor, emitEvent, saveSession } = createMonitor();
    monitor.start(0);
    monitor.processFrame(still(), 0);

    const record = monitor.stop(60_000);

    expect(record).toMatchObject({ id: 'night-1', startTime: 0, endTime: 60_000 });
    expect(saveSession).toHaveBeenCalledWith(record);
    expect(emitEvent).toHaveBeenLastCalledWith({
      ts: 60_000,
      source: 'nursery',
      detector: 'sleep-session',
      severity: 'info',
      message: 'Sleep session finalized',
      meta: { sessionId: 'night-1', totalSleepSeconds: 0, wakeUpCount: 0, qualityScore: 0 }
    });
    expect(monitor.isRunning()).toBe(false);
    expect(monitor.getStats(60_000)).toMatchObject({ active: false, currentState: 'unknown', running: false });
    expect(monitor.stop(61_000)).toBeNull();
  });

  it('MonitorQueue drains queued frames on the next turn', async () => {
    const { monitor, clock } = createMonitor({ queueSize: 2 });
    monitor.start();
    for (let index = 0; index < 4; index += 1) {
      monitor.enqueue(still(), clock.advance(200));
    }

    expect(monitor.getStats().queue).toEqual({ size: 2, capacity: 2, dropped: 2 });
    await new Promise(resolve => setImmediate(resolve));

    expect(monitor.getStats()).toMatchObject({
      framesProcessed: 2,
      queue: { size: 0, capacity: 2, dropped: 2 }
    });
    expect(metrics.snapshot().detectors.pipeline.counters.framesDropped).toBe(2);
  });

  it('MonitorFrameErrors keeps the worker running', async () => {
    const { monitor, log } = createMonitor();
    const errors: Error[] = [];
    monitor.on('error', (error: Error) => errors.push(error));
    monitor.start(0);

    monitor.enqueue({ width: 4, height: 4, data: new Uint8Array(3), channels: 1 }, 0);
    monitor.enqueue(still(), 200);
    await new Promise(resolve => setImmediate(resolve));

    expect(errors.map(error => error.message)).toEqual([
      'Frame buffer too small: expected 16 bytes for 4x4x1'
    ]);
    expect(messagesOf(log.error)).toEqual(['Frame processing failed']);
    expect(monitor.getStats(200)).toMatchObject({ framesProcessed: 1, framesFailed: 1, running: true });
  });

  it('MonitorStoppedEnqueue rejects frames while stopped', () => {
    const { monitor, log } = createMonitor();

    expect(monitor.enqueue(still(), 0)).toBe(false);
    expect(messagesOf(log.warn)).toEqual(['Frame received while monitor is stopped']);
  });

  it('MonitorStopDiscardsQueue clears pending frames', () => {
    const { monitor, log } = createMonitor();
    monitor.start(0);
    monitor.enqueue(still(), 0);
    monitor.enqueue(still(), 200);

    monitor.stop(400);

    expect(monitor.getStats(400).queue.size).toBe(0);
    expect(messagesOf(log.info)).toContain('Discarded queued frames on stop');
    expect(monitor.getStats(400).framesProcessed).toBe(0);
  });
});
