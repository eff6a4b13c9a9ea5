import { EventEmitter } from 'node:events';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import eventBus from '../eventBus.js';
import { sessionStore } from '../db.js';
import type { Clock, EventPayload, LoggerLike } from '../types.js';
import { MotionDetector, type MotionDetectorOptions, type MotionResult } from '../video/motionDetector.js';
import type { FrameInput } from '../video/utils.js';
import type { BreathingAnalyzerOptions } from '../sleep/breathingAnalyzer.js';
import type { QualityScorer } from '../sleep/quality.js';
import {
  SleepSessionManager,
  type SessionStore,
  type SleepSessionRecord,
  type SleepStats
} from '../sleep/sessionManager.js';
import type { SleepState, SleepStateMachineOptions, StateTransition } from '../sleep/stateMachine.js';
import { FrameGate, type FrameGateOptions, type GateDecision } from './frameGate.js';
import { DEFAULT_QUEUE_SIZE, FrameQueue } from './frameQueue.js';

export interface EventPublisher {
  emitEvent(payload: EventPayload): boolean;
}

export interface SleepMonitorOptions {
  source?: string;
  motion?: MotionDetectorOptions;
  frameGate?: FrameGateOptions;
  breathing?: BreathingAnalyzerOptions;
  stateMachine?: SleepStateMachineOptions;
  queueSize?: number;
  clock?: Clock;
  store?: SessionStore | null;
  qualityScorer?: QualityScorer;
  idFactory?: () => string;
  bus?: EventPublisher;
  logger?: LoggerLike;
}

export type MonitorFrameResult = {
  motion: MotionResult;
  gate: GateDecision;
  state: SleepState;
};

export type MonitorStats = SleepStats & {
  running: boolean;
  calibrated: boolean;
  calibrationProgress: number;
  framesProcessed: number;
  framesFailed: number;
  queue: {
    size: number;
    capacity: number;
    dropped: number;
  };
};

const DETECTOR = 'pipeline';
const DEFAULT_SOURCE = 'camera';

/**
 * The single worker that drives detector, gate and session in arrival order.
 * Frames either go through `processFrame` directly or through the bounded
 * queue, which is drained on the next event-loop turn.
 */
export class SleepMonitor extends EventEmitter {
  private readonly detector: MotionDetector;
  private readonly gate: FrameGate;
  private readonly queue: FrameQueue;
  private readonly session: SleepSessionManager;
  private readonly clock: Clock;
  private readonly bus: EventPublisher;
  private readonly log: LoggerLike;
  private readonly source: string;
  private running = false;
  private drainHandle: NodeJS.Immediate | null = null;
  private framesProcessed = 0;
  private framesFailed = 0;

  constructor(private readonly options: SleepMonitorOptions = {}) {
    super();
    this.log = options.logger ?? logger;
    this.clock = options.clock ?? Date.now;
    this.bus = options.bus ?? eventBus;
    this.source = options.source ?? DEFAULT_SOURCE;
    this.detector = new MotionDetector({ logger: this.log, ...options.motion });
    this.gate = new FrameGate(options.frameGate);
    this.queue = new FrameQueue(options.queueSize ?? DEFAULT_QUEUE_SIZE);

    const userTransition = options.stateMachine?.onTransition;
    this.session = new SleepSessionManager({
      stateMachine: {
        ...options.stateMachine,
        onTransition: transition => {
          this.handleTransition(transition);
          userTransition?.(transition);
        }
      },
      breathing: options.breathing,
      clock: this.clock,
      store: options.store === undefined ? sessionStore : options.store ?? undefined,
      qualityScorer: options.qualityScorer,
      idFactory: options.idFactory,
      logger: this.log
    });
  }

  start(now = this.clock()): string {
    if (this.running) {
      this.log.warn({ detector: DETECTOR, source: this.source }, 'Monitor already running; restarting');
    }
    this.cancelDrain();
    this.queue.clear();
    this.detector.reset();
    this.gate.reset();
    this.framesProcessed = 0;
    this.framesFailed = 0;
    this.running = true;
    return this.session.startSession(now);
  }

  isRunning() {
    return this.running;
  }

  enqueue(frame: FrameInput, ts = this.clock()): boolean {
    if (!this.running) {
      this.log.warn({ detector: DETECTOR, source: this.source }, 'Frame received while monitor is stopped');
      return false;
    }
    const droppedBefore = this.queue.framesDropped;
    this.queue.enqueue(frame, ts);
    if (this.queue.framesDropped > droppedBefore) {
      metrics.incrementDetectorCounter(DETECTOR, 'framesDropped', 1);
    }
    this.scheduleDrain();
    return true;
  }

  /** Processes every queued frame synchronously. Returns the number handled. */
  drain(): number {
    let handled = 0;
    let entry = this.queue.dequeue();
    while (entry && this.running) {
      handled += 1;
      try {
        this.processFrame(entry.frame, entry.ts);
      } catch (error) {
        this.handleFrameError(error, entry.ts);
      }
      entry = this.queue.dequeue();
    }
    return handled;
  }

  processFrame(frame: FrameInput, ts = this.clock()): MonitorFrameResult {
    const wasCalibrated = this.detector.isCalibrated();
    const motion = this.detector.processFrame(frame);
    this.framesProcessed += 1;

    if (!wasCalibrated && this.detector.isCalibrated()) {
      this.handleCalibrated(ts);
    }

    const gate = this.gate.evaluate(motion.score, motion.width, motion.height, ts);
    const state =
      gate.accepted && this.running ? this.session.update(gate.score, ts) : this.session.getState();
    return { motion, gate, state };
  }

  stop(now = this.clock()): SleepSessionRecord | null {
    this.cancelDrain();
    const discarded = this.queue.size;
    this.queue.clear();
    if (discarded > 0) {
      this.log.info({ detector: DETECTOR, source: this.source, discarded }, 'Discarded queued frames on stop');
    }
    this.running = false;

    const record = this.session.stopSession(now);
    if (record) {
      this.publish({
        ts: record.endTime,
        detector: 'sleep-session',
        severity: 'info',
        message: 'Sleep session finalized',
        meta: {
          sessionId: record.id,
          totalSleepSeconds: record.totalSleepSeconds,
          wakeUpCount: record.wakeUpCount,
          qualityScore: record.qualityScore
        }
      });
    }
    return record;
  }

  getStats(now = this.clock()): MonitorStats {
    return {
      ...this.session.getStats(now),
      running: this.running,
      calibrated: this.detector.isCalibrated(),
      calibrationProgress: this.detector.getCalibrationProgress(),
      framesProcessed: this.framesProcessed,
      framesFailed: this.framesFailed,
      queue: {
        size: this.queue.size,
        capacity: this.queue.capacity,
        dropped: this.queue.framesDropped
      }
    };
  }

  private scheduleDrain() {
    if (this.drainHandle) {
      return;
    }
    this.drainHandle = setImmediate(() => {
      this.drainHandle = null;
      this.drain();
    });
  }

  private cancelDrain() {
    if (this.drainHandle) {
      clearImmediate(this.drainHandle);
      this.drainHandle = null;
    }
  }

  private handleFrameError(error: unknown, ts: number) {
    this.framesFailed += 1;
    metrics.incrementDetectorCounter(DETECTOR, 'frameErrors', 1);
    this.log.error({ detector: DETECTOR, source: this.source, ts, err: error }, 'Frame processing failed');
    if (this.listenerCount('error') > 0) {
      this.emit('error', error instanceof Error ? error : new Error(String(error)));
    }
  }

  private handleCalibrated(ts: number) {
    const mask = this.detector.getExclusionMask();
    const excludedCells = mask?.excludedCells ?? 0;
    this.emit('calibrated', { ts, excludedCells });
    this.publish({
      ts,
      detector: 'motion',
      severity: 'info',
      message: 'Motion calibration complete',
      meta: { excludedCells }
    });
  }

  private handleTransition(transition: StateTransition) {
    const ts = Math.round(transition.at * 1000);
    metrics.incrementDetectorCounter(DETECTOR, 'stateTransitions', 1);
    this.emit('state', transition);
    this.publish({
      ts,
      detector: 'sleep-state',
      severity: 'info',
      message: `Sleep state ${transition.from} -> ${transition.to}`,
      meta: { from: transition.from, to: transition.to, stats: transition.stats }
    });

    if (transition.to === 'no_breathing') {
      this.emit('alarm', transition);
      this.publish({
        ts,
        detector: 'sleep-alarm',
        severity: 'critical',
        message: 'No breathing motion detected',
        meta: { from: transition.from }
      });
    } else if (transition.from === 'no_breathing') {
      this.emit('alarm-cleared', transition);
      this.publish({
        ts,
        detector: 'sleep-alarm',
        severity: 'info',
        message: 'Breathing motion resumed',
        meta: { to: transition.to }
      });
    }
  }

  private publish(event: Omit<EventPayload, 'source'>) {
    this.bus.emitEvent({ ...event, source: this.source });
  }
}

export default SleepMonitor;
