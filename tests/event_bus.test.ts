import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { EventPayload, EventRecord } from '../src/types.js';
import { createLogger, messagesOf, type LoggerMock } from './helpers/logger.js';

describe('EventSuppression', () => {
  let store: Mock<(event: EventRecord) => void>;
  let log: LoggerMock;
  let registry: MetricsRegistry;
  let bus: EventBus;

  const alarm: EventPayload = {
    source: 'nursery',
    detector: 'sleep-alarm',
    severity: 'critical',
    message: 'No breathing motion detected'
  };

  beforeEach(() => {
    store = vi.fn<(event: EventRecord) => void>();
    log = createLogger();
    registry = new MetricsRegistry();
    bus = new EventBus({ store: event => store(event), log, metrics: registry });
  });

  it('SuppressionWindow mutes repeats until the window closes', () => {
    bus.configureSuppression([
      { detector: 'sleep-alarm', severity: 'critical', suppressForMs: 1_000, reason: 'repeat alarm' }
    ]);

    expect(bus.emitEvent({ ...alarm, ts: 0 })).toBe(true);
    expect(bus.emitEvent({ ...alarm, ts: 500 })).toBe(false);
    expect(bus.emitEvent({ ...alarm, ts: 1_000 })).toBe(true);
    expect(bus.emitEvent({ ...alarm, ts: 1_200, severity: 'info', message: 'Breathing motion resumed' })).toBe(
      true
    );

    expect(store).toHaveBeenCalledTimes(3);
    const suppressed = log.info.mock.calls.filter(([, message]) => message === 'Event suppressed');
    expect(suppressed).toHaveLength(1);
    expect(suppressed[0][0]).toMatchObject({
      detector: 'sleep-alarm',
      meta: {
        suppressed: true,
        suppressionRuleId: 'rule-1',
        suppressionReason: 'repeat alarm',
        suppressionType: 'window'
      }
    });

    const snapshot = registry.snapshot();
    expect(snapshot.events.total).toBe(3);
    expect(snapshot.events.suppressed).toEqual({
      total: 1,
      byRule: { 'rule-1': 1 },
      byReason: { 'repeat alarm': 1 }
    });
  });

  it('SuppressionRateLimit allows a burst per period', () => {
    bus.configureSuppression([
      { id: 'state-burst', detector: 'sleep-state', rateLimit: { count: 2, perMs: 1_000 }, reason: 'state flapping' }
    ]);
    const state: EventPayload = { ...alarm, detector: 'sleep-state', severity: 'info', message: 'state' };

    const delivered = [0, 100, 200, 1_000, 1_050].map(ts => bus.emitEvent({ ...state, ts }));

    expect(delivered).toEqual([true, true, false, true, false]);
    expect(registry.snapshot().events.suppressed.byRule).toEqual({ 'state-burst': 2 });
    const suppressed = log.info.mock.calls
      .filter(([, message]) => message === 'Event suppressed')
      .map(([payload]) => payload);
    expect(suppressed).toEqual([
      expect.objectContaining({ meta: expect.objectContaining({ suppressionType: 'rate-limit' }) }),
      expect.objectContaining({ meta: expect.objectContaining({ suppressionType: 'rate-limit' }) })
    ]);
  });

  it('SuppressionRateLimitCooldown extends a rate-limit hit into a window', () => {
    bus.configureSuppression([
      { detector: 'sleep-state', rateLimit: { count: 1, perMs: 100 }, suppressForMs: 1_000, reason: 'cooldown' }
    ]);
    const state: EventPayload = { ...alarm, detector: 'sleep-state', severity: 'info', message: 'state' };

    expect(bus.emitEvent({ ...state, ts: 0 })).toBe(true);
    expect(bus.emitEvent({ ...state, ts: 50 })).toBe(false);
    expect(bus.emitEvent({ ...state, ts: 500 })).toBe(false);
    expect(bus.emitEvent({ ...state, ts: 1_050 })).toBe(true);
  });

  it('SuppressionReset forgets windows and history', () => {
    bus.configureSuppression([{ detector: 'sleep-alarm', suppressForMs: 10_000, reason: 'repeat alarm' }]);
    bus.emitEvent({ ...alarm, ts: 0 });
    bus.resetSuppressionState();

    expect(bus.emitEvent({ ...alarm, ts: 10 })).toBe(true);
  });

  it('SuppressionSourceFilter only matches listed sources', () => {
    bus.configureSuppression([{ source: ['hallway'], suppressForMs: 10_000, reason: 'hallway quiet' }]);

    expect(bus.emitEvent({ ...alarm, ts: 0 })).toBe(true);
    expect(bus.emitEvent({ ...alarm, ts: 1 })).toBe(true);
    expect(bus.emitEvent({ ...alarm, source: 'hallway', ts: 2 })).toBe(true);
    expect(bus.emitEvent({ ...alarm, source: 'hallway', ts: 3 })).toBe(false);
  });
});

describe('EventDelivery', () => {
  it('EventStoreFailure logs and still records the event', () => {
    const log = createLogger();
    const registry = new MetricsRegistry();
    const bus = new EventBus({
      store: () => {
        throw new Error('database locked');
      },
      log,
      metrics: registry
    });

    expect(bus.emitEvent({ source: 'nursery', detector: 'motion', severity: 'info', message: 'calibrated', ts: 5 })).toBe(
      true
    );
    expect(messagesOf(log.error)).toEqual(['Failed to store event']);
    expect(messagesOf(log.info)).toEqual(['calibrated']);
    expect(registry.snapshot().events.byDetector).toEqual({ motion: 1 });
  });

  it('EventTimestamps normalizes dates and fills in missing times', () => {
    const store = vi.fn<(event: EventRecord) => void>();
    const bus = new EventBus({ store, log: createLogger(), metrics: new MetricsRegistry() });
    const now = vi.spyOn(Date, 'now').mockReturnValue(42_000);

    bus.emitEvent({ source: 'nursery', detector: 'motion', severity: 'info', message: 'a', ts: new Date(7_000) });
    bus.emitEvent({ source: 'nursery', detector: 'motion', severity: 'info', message: 'b' });
    now.mockRestore();

    expect(store.mock.calls.map(([event]) => event.ts)).toEqual([7_000, 42_000]);
    expect(store.mock.calls[0][0]).toEqual({
      ts: 7_000,
      source: 'nursery',
      detector: 'motion',
      severity: 'info',
      message: 'a',
      meta: undefined
    });
  });
});
