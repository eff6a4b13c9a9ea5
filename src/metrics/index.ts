import pino from 'pino';
import type { EventRecord } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type HistogramSnapshot = Record<string, number>;

type HistogramConfig = {
  buckets: number[];
  format: (upper: number, lower?: number) => string;
};

type DetectorLatencyState = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type DetectorMetricState = {
  counters: Map<string, number>;
  gauges: Map<string, number>;
  lastRunAt: number | null;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
  latency: DetectorLatencyState | null;
  latencyHistogram: Map<string, number> | null;
};

type DetectorSnapshot = {
  counters: CounterMap;
  gauges: CounterMap;
  lastRunAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
  latency: LatencyStats | null;
  latencyHistogram: HistogramSnapshot;
};

type SuppressedEventMetric = {
  ruleId: string;
  reason: string;
  type: 'window' | 'rate-limit';
};

type MetricsSnapshot = {
  createdAt: string;
  events: {
    total: number;
    lastEventAt: string | null;
    byDetector: CounterMap;
    bySeverity: CounterMap;
    suppressed: {
      total: number;
      byRule: CounterMap;
      byReason: CounterMap;
    };
  };
  logs: {
    byLevel: CounterMap;
    byDetector: Record<string, CounterMap>;
    currentLevel: string;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  latencies: Record<string, LatencyStats>;
  detectors: Record<string, DetectorSnapshot>;
};

const DEFAULT_HISTOGRAM: HistogramConfig = {
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000],
  format: (upper, lower) => (lower === undefined ? `<${upper}` : `${lower}-${upper}`)
};

const LOG_LEVEL_ORDER = Object.entries(pino.levels.values)
  .sort(([, a], [, b]) => a - b)
  .map(([level]) => level);

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByDetector = new Map<string, Map<string, number>>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly eventsByDetector = new Map<string, number>();
  private readonly eventsBySeverity = new Map<string, number>();
  private totalEvents = 0;
  private lastEventTimestamp: number | null = null;
  private suppressionTotal = 0;
  private readonly suppressionByRule = new Map<string, number>();
  private readonly suppressionByReason = new Map<string, number>();
  private readonly latencyStats = new Map<string, DetectorLatencyState>();
  private readonly detectorMetrics = new Map<string, DetectorMetricState>();
  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByDetector.clear();
    this.currentLogLevel = 'info';
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.eventsByDetector.clear();
    this.eventsBySeverity.clear();
    this.totalEvents = 0;
    this.lastEventTimestamp = null;
    this.suppressionTotal = 0;
    this.suppressionByRule.clear();
    this.suppressionByReason.clear();
    this.latencyStats.clear();
    this.detectorMetrics.clear();
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string; detector?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.detector) {
      const detectorMap = this.logLevelByDetector.get(context.detector) ?? new Map<string, number>();
      detectorMap.set(normalized, (detectorMap.get(normalized) ?? 0) + 1);
      this.logLevelByDetector.set(context.detector, detectorMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string) {
    this.currentLogLevel = level.toLowerCase();
  }

  recordEvent(event: EventRecord) {
    this.totalEvents += 1;
    this.lastEventTimestamp = event.ts;
    this.eventsByDetector.set(event.detector, (this.eventsByDetector.get(event.detector) ?? 0) + 1);
    this.eventsBySeverity.set(event.severity, (this.eventsBySeverity.get(event.severity) ?? 0) + 1);
  }

  recordSuppressedEvent(detail: SuppressedEventMetric) {
    this.suppressionTotal += 1;
    this.suppressionByRule.set(detail.ruleId, (this.suppressionByRule.get(detail.ruleId) ?? 0) + 1);
    this.suppressionByReason.set(
      detail.reason,
      (this.suppressionByReason.get(detail.reason) ?? 0) + 1
    );
  }

  incrementDetectorCounter(detector: string, counter: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.counters.set(counter, (state.counters.get(counter) ?? 0) + amount);
    state.lastRunAt = Date.now();
  }

  setDetectorGauge(detector: string, gauge: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.lastRunAt = Date.now();
    state.gauges.set(gauge, value);
  }

  recordDetectorError(detector: string, message: string) {
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.lastRunAt = Date.now();
    state.lastErrorAt = Date.now();
    state.lastErrorMessage = message;
    state.counters.set('errors', (state.counters.get('errors') ?? 0) + 1);
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  observeDetectorLatency(detector: string, durationMs: number) {
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.lastRunAt = Date.now();
    const latency: DetectorLatencyState = state.latency ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    latency.count += 1;
    latency.totalMs += durationMs;
    latency.minMs = Math.min(latency.minMs, durationMs);
    latency.maxMs = Math.max(latency.maxMs, durationMs);
    state.latency = latency;
    const histogram = state.latencyHistogram ?? new Map<string, number>();
    const bucketLabel = resolveHistogramBucket(durationMs, DEFAULT_HISTOGRAM);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
    state.latencyHistogram = histogram;
    this.observeLatency(`detector.${detector}.latency`, durationMs);
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      byDetector: mapFromNested(this.logLevelByDetector),
      currentLevel: this.currentLogLevel,
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage
    };
  }

  snapshot(): MetricsSnapshot {
    const logs = this.exportLogLevelMetrics();
    return {
      createdAt: new Date().toISOString(),
      events: {
        total: this.totalEvents,
        lastEventAt: this.lastEventTimestamp ? new Date(this.lastEventTimestamp).toISOString() : null,
        byDetector: mapFrom(this.eventsByDetector),
        bySeverity: mapFrom(this.eventsBySeverity),
        suppressed: {
          total: this.suppressionTotal,
          byRule: mapFrom(this.suppressionByRule),
          byReason: mapFrom(this.suppressionByReason)
        }
      },
      logs: {
        byLevel: logs.byLevel,
        byDetector: logs.byDetector,
        currentLevel: logs.currentLevel,
        lastErrorAt: logs.lastErrorAt,
        lastErrorMessage: logs.lastErrorMessage
      },
      latencies: mapFromLatencies(this.latencyStats),
      detectors: mapFromDetectors(this.detectorMetrics)
    };
  }
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => {
    const aIndex = LOG_LEVEL_ORDER.indexOf(a);
    const bIndex = LOG_LEVEL_ORDER.indexOf(b);
    if (aIndex === -1 || bIndex === -1) {
      return a.localeCompare(b);
    }
    return aIndex - bIndex;
  });
  for (const [level, value] of ordered) {
    result[level] = value;
  }
  return result;
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromNested(source: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  for (const [key, value] of source.entries()) {
    result[key] = mapFrom(value);
  }
  return result;
}

function toLatencyStats(state: DetectorLatencyState): LatencyStats {
  return {
    count: state.count,
    totalMs: state.totalMs,
    minMs: state.minMs === Number.POSITIVE_INFINITY ? 0 : state.minMs,
    maxMs: state.maxMs,
    averageMs: state.count === 0 ? 0 : state.totalMs / state.count
  };
}

function mapFromLatencies(source: Map<string, DetectorLatencyState>): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [metric, state] of source.entries()) {
    result[metric] = toLatencyStats(state);
  }
  return result;
}

function mapFromDetectors(source: Map<string, DetectorMetricState>): Record<string, DetectorSnapshot> {
  const result: Record<string, DetectorSnapshot> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [detector, state] of ordered) {
    result[detector] = {
      counters: mapFrom(state.counters),
      gauges: mapFrom(state.gauges),
      lastRunAt: state.lastRunAt ? new Date(state.lastRunAt).toISOString() : null,
      lastErrorAt: state.lastErrorAt ? new Date(state.lastErrorAt).toISOString() : null,
      lastErrorMessage: state.lastErrorMessage,
      latency: state.latency ? toLatencyStats(state.latency) : null,
      latencyHistogram: state.latencyHistogram ? Object.fromEntries(state.latencyHistogram) : {}
    };
  }
  return result;
}

function getDetectorMetricState(map: Map<string, DetectorMetricState>, detector: string): DetectorMetricState {
  const existing = map.get(detector);
  if (existing) {
    return existing;
  }
  const created: DetectorMetricState = {
    counters: new Map<string, number>(),
    gauges: new Map<string, number>(),
    lastRunAt: null,
    lastErrorAt: null,
    lastErrorMessage: null,
    latency: null,
    latencyHistogram: null
  };
  map.set(detector, created);
  return created;
}

function resolveHistogramBucket(duration: number, config: HistogramConfig) {
  const { buckets, format } = config;
  let previous = 0;
  for (const bucket of buckets) {
    if (duration < bucket) {
      return format(bucket, previous === 0 ? undefined : previous);
    }
    previous = bucket;
  }
  return `${buckets[buckets.length - 1]}+`;
}

const defaultRegistry = new MetricsRegistry();

export type { HistogramSnapshot, MetricsSnapshot, DetectorSnapshot, SuppressedEventMetric, LatencyStats };
export { MetricsRegistry };
export default defaultRegistry;
