import { randomUUID } from 'node:crypto';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import type { Clock, LoggerLike } from '../types.js';
import { BreathingAnalyzer, type BreathingAnalyzerOptions, type SleepPhase } from './breathingAnalyzer.js';
import { defaultQualityScorer, type QualityScorer } from './quality.js';
import {
  SleepStateMachine,
  type SleepState,
  type SleepStateMachineOptions,
  type TimelineEntry
} from './stateMachine.js';

export type SleepSessionRecord = Readonly<{
  id: string;
  /** Epoch milliseconds. */
  startTime: number;
  endTime: number;
  totalSleepSeconds: number;
  wakeUpCount: number;
  qualityScore: number;
  deepSleepSeconds: number;
  lightSleepSeconds: number;
  spasmCount: number;
  avgBreathingBpm: number;
  stateTimeline: readonly TimelineEntry[];
}>;

export interface SessionStore {
  saveSession(record: SleepSessionRecord): void | Promise<void>;
}

export type SleepStats = Readonly<{
  sessionId: string | null;
  active: boolean;
  currentState: SleepState;
  breathingDetected: boolean;
  breathingRateBpm: number;
  sleepQualityScore: number;
  totalSleepSeconds: number;
  deepSleepSeconds: number;
  lightSleepSeconds: number;
  wakeUps: number;
  spasmCount: number;
  avgBreathingBpm: number;
  sleepPhase: SleepPhase;
  sessionDurationSeconds: number;
}>;

export interface SleepSessionManagerOptions {
  stateMachine?: SleepStateMachineOptions;
  breathing?: BreathingAnalyzerOptions;
  clock?: Clock;
  store?: SessionStore;
  qualityScorer?: QualityScorer;
  idFactory?: () => string;
  logger?: LoggerLike;
}

type ActiveSession = {
  id: string;
  startTime: number;
  lastUpdate: number | null;
  totalSleepSeconds: number;
  deepSleepSeconds: number;
  lightSleepSeconds: number;
  breathingRateSum: number;
  breathingRateSamples: number;
};

const DETECTOR = 'session';

/**
 * Owns the session lifecycle and the accumulators fed by the state machine.
 * Times are epoch milliseconds.
 */
export class SleepSessionManager {
  private readonly machine: SleepStateMachine;
  private readonly clock: Clock;
  private readonly log: LoggerLike;
  private readonly qualityScorer: QualityScorer;
  private readonly idFactory: () => string;
  private session: ActiveSession | null = null;
  private lastRecord: SleepSessionRecord | null = null;

  constructor(private readonly options: SleepSessionManagerOptions = {}) {
    this.log = options.logger ?? logger;
    const breathing = new BreathingAnalyzer({
      lowVariability: options.stateMachine?.lowVariability,
      highVariability: options.stateMachine?.highVariability,
      ...options.breathing
    });
    this.machine = new SleepStateMachine(
      { logger: this.log, ...options.stateMachine },
      breathing
    );
    this.clock = options.clock ?? Date.now;
    this.qualityScorer = options.qualityScorer ?? defaultQualityScorer;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  startSession(now = this.clock()): string {
    if (this.session) {
      this.log.warn(
        { detector: DETECTOR, sessionId: this.session.id },
        'Session already active; finalizing it before starting a new one'
      );
      this.stopSession(now);
    }

    this.session = {
      id: this.idFactory(),
      startTime: now,
      lastUpdate: null,
      totalSleepSeconds: 0,
      deepSleepSeconds: 0,
      lightSleepSeconds: 0,
      breathingRateSum: 0,
      breathingRateSamples: 0
    };
    this.machine.start(now / 1000);
    metrics.incrementDetectorCounter(DETECTOR, 'started', 1);
    this.log.info({ detector: DETECTOR, sessionId: this.session.id }, 'Sleep session started');
    return this.session.id;
  }

  update(score: number, now = this.clock()): SleepState {
    const session = this.session;
    if (!session) {
      return this.machine.getState();
    }

    const seconds = now / 1000;
    const state = this.machine.update(score, seconds);

    if (session.lastUpdate !== null) {
      const delta = Math.max(0, (now - session.lastUpdate) / 1000);
      if (state === 'deep_sleep') {
        session.totalSleepSeconds += delta;
        session.deepSleepSeconds += delta;
      } else if (state === 'light_sleep' || state === 'rem_sleep') {
        session.totalSleepSeconds += delta;
        session.lightSleepSeconds += delta;
      }
    }
    session.lastUpdate = now;

    const rate = this.machine.breathing.getBreathingRate(seconds);
    if (rate > 0) {
      session.breathingRateSum += rate;
      session.breathingRateSamples += 1;
    }

    return state;
  }

  stopSession(now = this.clock()): SleepSessionRecord | null {
    const session = this.session;
    if (!session) {
      this.log.warn({ detector: DETECTOR }, 'stopSession called without an active session');
      return null;
    }

    const durationSeconds = Math.max(0, (now - session.startTime) / 1000);
    const record: SleepSessionRecord = Object.freeze({
      id: session.id,
      startTime: session.startTime,
      endTime: now,
      totalSleepSeconds: Math.trunc(session.totalSleepSeconds),
      wakeUpCount: this.machine.getWakeUps(),
      qualityScore: this.scoreQuality(session, durationSeconds),
      deepSleepSeconds: Math.trunc(session.deepSleepSeconds),
      lightSleepSeconds: Math.trunc(session.lightSleepSeconds),
      spasmCount: this.machine.getSpasmCount(),
      avgBreathingBpm: averageRate(session),
      stateTimeline: Object.freeze(this.machine.getTimeline().map(entry => Object.freeze(entry)))
    });

    this.session = null;
    this.lastRecord = record;
    this.machine.reset();
    metrics.incrementDetectorCounter(DETECTOR, 'finalized', 1);
    this.log.info(
      {
        detector: DETECTOR,
        sessionId: record.id,
        totalSleepSeconds: record.totalSleepSeconds,
        wakeUpCount: record.wakeUpCount,
        qualityScore: record.qualityScore
      },
      'Sleep session finalized'
    );
    this.persist(record);
    return record;
  }

  getStats(now = this.clock()): SleepStats {
    const session = this.session;
    const seconds = now / 1000;
    const state = this.machine.getState();
    const durationSeconds = session ? Math.max(0, (now - session.startTime) / 1000) : 0;

    return Object.freeze({
      sessionId: session?.id ?? null,
      active: session !== null,
      currentState: state,
      breathingDetected: state === 'deep_sleep' || state === 'light_sleep',
      breathingRateBpm: this.machine.breathing.getBreathingRate(seconds),
      sleepQualityScore: session ? this.scoreQuality(session, durationSeconds) : 0,
      totalSleepSeconds: Math.trunc(session?.totalSleepSeconds ?? 0),
      deepSleepSeconds: Math.trunc(session?.deepSleepSeconds ?? 0),
      lightSleepSeconds: Math.trunc(session?.lightSleepSeconds ?? 0),
      wakeUps: this.machine.getWakeUps(),
      spasmCount: this.machine.getSpasmCount(),
      avgBreathingBpm: session ? averageRate(session) : 0,
      sleepPhase: this.machine.breathing.getSleepPhase(seconds),
      sessionDurationSeconds: Math.trunc(durationSeconds)
    });
  }

  isActive() {
    return this.session !== null;
  }

  getSessionId() {
    return this.session?.id ?? null;
  }

  getState(): SleepState {
    return this.machine.getState();
  }

  getLastRecord() {
    return this.lastRecord;
  }

  getStateMachine() {
    return this.machine;
  }

  private scoreQuality(session: ActiveSession, durationSeconds: number) {
    return this.qualityScorer({
      totalSleepSeconds: session.totalSleepSeconds,
      deepSleepSeconds: session.deepSleepSeconds,
      sessionDurationSeconds: durationSeconds,
      wakeUps: this.machine.getWakeUps(),
      spasmCount: this.machine.getSpasmCount()
    });
  }

  private persist(record: SleepSessionRecord) {
    const store = this.options.store;
    if (!store) {
      return;
    }
    try {
      const pending = store.saveSession(record);
      if (pending instanceof Promise) {
        void pending.catch(error => this.handlePersistError(record, error));
      }
    } catch (error) {
      this.handlePersistError(record, error);
    }
  }

  private handlePersistError(record: SleepSessionRecord, error: unknown) {
    metrics.recordDetectorError(DETECTOR, error instanceof Error ? error.message : String(error));
    this.log.error({ detector: DETECTOR, sessionId: record.id, err: error }, 'Failed to persist sleep session');
  }
}

function averageRate(session: ActiveSession) {
  return session.breathingRateSamples === 0
    ? 0
    : session.breathingRateSum / session.breathingRateSamples;
}
