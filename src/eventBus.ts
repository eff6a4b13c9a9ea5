import { EventEmitter } from 'node:events';
import logger from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { storeEvent } from './db.js';
import type {
  EventPayload,
  EventRecord,
  EventSeverity,
  EventSuppressionRule,
  LoggerLike,
  RateLimitConfig
} from './types.js';

const EVENT_CHANNEL = 'event';

interface EventBusDependencies {
  store: (event: EventRecord) => void;
  log: LoggerLike;
  metrics?: MetricsRegistry;
}

interface InternalSuppressionRule {
  id: string;
  detectors?: string[];
  sources?: string[];
  severities?: EventSeverity[];
  suppressForMs?: number;
  rateLimit?: RateLimitConfig;
  reason: string;
  suppressedUntil: number;
  history: number[];
}

type SuppressionHit = {
  rule: InternalSuppressionRule;
  type: 'window' | 'rate-limit';
};

class EventBus extends EventEmitter {
  private suppressionRules: InternalSuppressionRule[] = [];
  private readonly store: (event: EventRecord) => void;
  private readonly log: LoggerLike;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: EventBusDependencies = { store: storeEvent, log: logger }) {
    super();
    this.store = dependencies.store;
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;

    this.on(EVENT_CHANNEL, (event: EventRecord) => {
      try {
        this.store(event);
      } catch (error) {
        this.log.error({ err: error, detector: event.detector }, 'Failed to store event');
      }
      this.metrics.recordEvent(event);
      this.log.info(
        {
          detector: event.detector,
          source: event.source,
          severity: event.severity,
          meta: event.meta
        },
        event.message
      );
    });
  }

  configureSuppression(rules: EventSuppressionRule[]) {
    this.suppressionRules = rules.map((rule, index) => normalizeSuppressionRule(rule, index));
  }

  resetSuppressionState() {
    for (const rule of this.suppressionRules) {
      rule.suppressedUntil = 0;
      rule.history.length = 0;
    }
  }

  emitEvent(payload: EventPayload): boolean {
    const normalized: EventRecord = {
      ts: normalizeTimestamp(payload.ts),
      source: payload.source,
      detector: payload.detector,
      severity: payload.severity,
      message: payload.message,
      meta: payload.meta
    };

    const hit = this.evaluateSuppression(normalized);
    if (hit) {
      this.metrics.recordSuppressedEvent({
        ruleId: hit.rule.id,
        reason: hit.rule.reason,
        type: hit.type
      });
      this.log.info(
        {
          detector: normalized.detector,
          source: normalized.source,
          severity: normalized.severity,
          meta: {
            ...normalized.meta,
            suppressed: true,
            suppressionRuleId: hit.rule.id,
            suppressionReason: hit.rule.reason,
            suppressionType: hit.type
          }
        },
        'Event suppressed'
      );
      return false;
    }

    this.emit(EVENT_CHANNEL, normalized);
    return true;
  }

  private evaluateSuppression(event: EventRecord): SuppressionHit | null {
    let hit: SuppressionHit | null = null;

    for (const rule of this.suppressionRules) {
      if (!ruleMatchesEvent(rule, event)) {
        continue;
      }

      if (event.ts < rule.suppressedUntil) {
        hit = hit ?? { rule, type: 'window' };
        continue;
      }

      const rateLimit = rule.rateLimit;
      if (rateLimit) {
        const cutoff = event.ts - rateLimit.perMs;
        while (rule.history.length > 0 && rule.history[0] <= cutoff) {
          rule.history.shift();
        }
        if (rule.history.length >= rateLimit.count) {
          if (rule.suppressForMs) {
            rule.suppressedUntil = event.ts + rule.suppressForMs;
          }
          hit = hit ?? { rule, type: 'rate-limit' };
          continue;
        }
      }
    }

    if (hit) {
      return hit;
    }

    for (const rule of this.suppressionRules) {
      if (!ruleMatchesEvent(rule, event)) {
        continue;
      }
      if (rule.rateLimit) {
        rule.history.push(event.ts);
      } else if (rule.suppressForMs) {
        rule.suppressedUntil = Math.max(rule.suppressedUntil, event.ts + rule.suppressForMs);
      }
    }

    return null;
  }
}

function normalizeTimestamp(ts?: number | Date): number {
  if (typeof ts === 'undefined') {
    return Date.now();
  }

  if (ts instanceof Date) {
    return ts.getTime();
  }

  return ts;
}

function normalizeSuppressionRule(rule: EventSuppressionRule, index: number): InternalSuppressionRule {
  const windowMs = normalizeWindowMs(rule.suppressForMs);
  return {
    id: rule.id ?? `rule-${index + 1}`,
    detectors: asArray(rule.detector),
    sources: asArray(rule.source),
    severities: asArray(rule.severity),
    suppressForMs: windowMs > 0 ? windowMs : undefined,
    rateLimit: normalizeRateLimit(rule.rateLimit),
    reason: rule.reason,
    suppressedUntil: 0,
    history: []
  };
}

function asArray<T>(value: T | T[] | undefined): T[] | undefined {
  if (typeof value === 'undefined') {
    return undefined;
  }
  return Array.isArray(value) ? value : [value];
}

function ruleMatchesEvent(rule: InternalSuppressionRule, event: EventRecord): boolean {
  if (rule.detectors && !rule.detectors.includes(event.detector)) {
    return false;
  }

  if (rule.sources && !rule.sources.includes(event.source)) {
    return false;
  }

  if (rule.severities && !rule.severities.includes(event.severity)) {
    return false;
  }

  return true;
}

function normalizeRateLimit(rateLimit?: RateLimitConfig): RateLimitConfig | undefined {
  if (!rateLimit) {
    return undefined;
  }
  return {
    count: Math.max(1, Math.floor(rateLimit.count)),
    perMs: Math.max(1, Math.floor(rateLimit.perMs))
  };
}

function normalizeWindowMs(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.max(1, Math.floor(value));
}

const eventBus = new EventBus();

export default eventBus;
export { EventBus };
export type { EventRecord };
