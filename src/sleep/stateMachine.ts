import logger from '../logger.js';
import metrics from '../metrics/index.js';
import type { LoggerLike } from '../types.js';
import {
  BreathingAnalyzer,
  DEFAULT_HIGH_VARIABILITY,
  DEFAULT_LOW_VARIABILITY
} from './breathingAnalyzer.js';

export type SleepState =
  | 'unknown'
  | 'calibrating'
  | 'no_breathing'
  | 'deep_sleep'
  | 'light_sleep'
  | 'rem_sleep'
  | 'spasm'
  | 'awake';

export const SLEEP_STATES: readonly SleepState[] = [
  'unknown',
  'calibrating',
  'no_breathing',
  'deep_sleep',
  'light_sleep',
  'rem_sleep',
  'spasm',
  'awake'
];

export function isSleepState(value: unknown): value is SleepState {
  return typeof value === 'string' && SLEEP_STATES.some(state => state === value);
}

export const SLEEP_LIKE_STATES: ReadonlySet<SleepState> = new Set<SleepState>([
  'deep_sleep',
  'light_sleep',
  'rem_sleep'
]);

export function isSleepLike(state: SleepState) {
  return SLEEP_LIKE_STATES.has(state);
}

export type Range = readonly [number, number];

export interface ConfirmationOptions {
  noBreathingSeconds?: number;
  awakeSeconds?: number;
  spasmSeconds?: number;
  defaultSeconds?: number;
}

export type MotionWindowStats = {
  mean: number;
  recentMax: number;
  max30: number;
  breathingRate: number;
  variability: number;
};

export type StateTransition = {
  from: SleepState;
  to: SleepState;
  /** Seconds, on the clock fed to `update`. */
  at: number;
  stats: MotionWindowStats | null;
};

export type TimelineEntry = {
  /** Epoch milliseconds. */
  ts: number;
  state: SleepState;
};

export interface SleepStateMachineOptions {
  noMotionThreshold?: number;
  highMotionThreshold?: number;
  deepMotionRange?: Range;
  remMotionRange?: Range;
  deepBpmRange?: Range;
  remBpmRange?: Range;
  quietCeiling?: number;
  lowVariability?: number;
  highVariability?: number;
  bufferSeconds?: number;
  analysisWindowSeconds?: number;
  spikeWindowSeconds?: number;
  quietWindowSeconds?: number;
  warmupSeconds?: number;
  confirmation?: ConfirmationOptions;
  onTransition?: (transition: StateTransition) => void;
  logger?: LoggerLike;
}

export const DEFAULT_NO_MOTION_THRESHOLD = 10_000;
export const DEFAULT_HIGH_MOTION_THRESHOLD = 3_000_000;
export const DEFAULT_DEEP_MOTION_RANGE: Range = [100_000, 800_000];
export const DEFAULT_REM_MOTION_RANGE: Range = [800_000, 2_000_000];
export const DEFAULT_DEEP_BPM_RANGE: Range = [25, 35];
export const DEFAULT_REM_BPM_RANGE: Range = [35, 50];
export const DEFAULT_QUIET_CEILING = 800_000;
export const DEFAULT_BUFFER_SECONDS = 60;
export const DEFAULT_ANALYSIS_WINDOW_SECONDS = 10;
export const DEFAULT_SPIKE_WINDOW_SECONDS = 2;
export const DEFAULT_QUIET_WINDOW_SECONDS = 30;
export const DEFAULT_WARMUP_SECONDS = 10;
export const DEFAULT_CONFIRMATION: Required<ConfirmationOptions> = {
  noBreathingSeconds: 20,
  awakeSeconds: 5,
  spasmSeconds: 0.5,
  defaultSeconds: 3
};

const DETECTOR = 'sleep';

type MotionSample = {
  ts: number;
  score: number;
};

/**
 * Classifies the subject from a rolling motion-score buffer and the breathing
 * estimate. A new target state must hold for its confirmation time before it
 * becomes current.
 */
export class SleepStateMachine {
  private state: SleepState = 'unknown';
  private stateSince: number | null = null;
  private startedAt: number | null = null;
  private pendingState: SleepState | null = null;
  private pendingSince: number | null = null;
  private wasSleeping = false;
  private wakeUps = 0;
  private spasms = 0;
  private lastStats: MotionWindowStats | null = null;
  private readonly samples: MotionSample[] = [];
  private readonly timeline: TimelineEntry[] = [];
  private readonly log: LoggerLike;
  private readonly confirmation: Required<ConfirmationOptions>;

  constructor(
    private readonly options: SleepStateMachineOptions = {},
    readonly breathing: BreathingAnalyzer = new BreathingAnalyzer({
      lowVariability: options.lowVariability,
      highVariability: options.highVariability
    })
  ) {
    this.log = options.logger ?? logger;
    const confirmation = options.confirmation ?? {};
    this.confirmation = {
      noBreathingSeconds: confirmation.noBreathingSeconds ?? DEFAULT_CONFIRMATION.noBreathingSeconds,
      awakeSeconds: confirmation.awakeSeconds ?? DEFAULT_CONFIRMATION.awakeSeconds,
      spasmSeconds: confirmation.spasmSeconds ?? DEFAULT_CONFIRMATION.spasmSeconds,
      defaultSeconds: confirmation.defaultSeconds ?? DEFAULT_CONFIRMATION.defaultSeconds
    };
  }

  /** Enters the warm-up phase. `now` is in seconds. */
  start(now: number) {
    this.reset();
    this.startedAt = now;
    this.executeTransition('calibrating', now, null);
  }

  update(score: number, now: number): SleepState {
    if (this.startedAt === null || !Number.isFinite(score) || !Number.isFinite(now)) {
      return this.state;
    }

    const warmup = this.options.warmupSeconds ?? DEFAULT_WARMUP_SECONDS;
    if (now - this.startedAt < warmup) {
      return this.state;
    }

    const value = Math.max(0, score);
    this.samples.push({ ts: now, score: value });
    this.pruneSamples(now);
    this.breathing.processMotion(value, now);

    if (this.samples.length === 0) {
      return this.state;
    }

    const stats = this.analyze(now);
    this.lastStats = stats;
    const target = this.determineTarget(stats);
    this.applyTarget(target, now, stats);
    return this.state;
  }

  getState(): SleepState {
    return this.state;
  }

  getPendingState(): SleepState | null {
    return this.pendingState;
  }

  getWakeUps() {
    return this.wakeUps;
  }

  getSpasmCount() {
    return this.spasms;
  }

  getLastStats(): MotionWindowStats | null {
    return this.lastStats ? { ...this.lastStats } : null;
  }

  getTimeline(): TimelineEntry[] {
    return this.timeline.map(entry => ({ ...entry }));
  }

  getBufferSize() {
    return this.samples.length;
  }

  reset() {
    this.state = 'unknown';
    this.stateSince = null;
    this.startedAt = null;
    this.pendingState = null;
    this.pendingSince = null;
    this.wasSleeping = false;
    this.wakeUps = 0;
    this.spasms = 0;
    this.lastStats = null;
    this.samples.length = 0;
    this.timeline.length = 0;
    this.breathing.reset();
  }

  private pruneSamples(now: number) {
    const cutoff = now - (this.options.bufferSeconds ?? DEFAULT_BUFFER_SECONDS);
    let removeCount = 0;
    for (const sample of this.samples) {
      if (sample.ts >= cutoff) {
        break;
      }
      removeCount += 1;
    }
    if (removeCount > 0) {
      this.samples.splice(0, removeCount);
    }
  }

  private analyze(now: number): MotionWindowStats {
    const analysisStart = now - (this.options.analysisWindowSeconds ?? DEFAULT_ANALYSIS_WINDOW_SECONDS);
    const spikeStart = now - (this.options.spikeWindowSeconds ?? DEFAULT_SPIKE_WINDOW_SECONDS);
    const quietStart = now - (this.options.quietWindowSeconds ?? DEFAULT_QUIET_WINDOW_SECONDS);
    let total = 0;
    let count = 0;
    let recentMax = 0;
    let max30 = 0;

    for (const sample of this.samples) {
      if (sample.ts >= analysisStart) {
        total += sample.score;
        count += 1;
      }
      if (sample.ts >= spikeStart && sample.score > recentMax) {
        recentMax = sample.score;
      }
      if (sample.ts >= quietStart && sample.score > max30) {
        max30 = sample.score;
      }
    }

    return {
      mean: count === 0 ? 0 : total / count,
      recentMax,
      max30,
      breathingRate: this.breathing.getBreathingRate(now),
      variability: this.breathing.getVariability(now)
    };
  }

  private determineTarget(stats: MotionWindowStats): SleepState {
    const { mean, recentMax, max30, breathingRate, variability } = stats;
    const lowVariability = this.options.lowVariability ?? DEFAULT_LOW_VARIABILITY;
    const highVariability = this.options.highVariability ?? DEFAULT_HIGH_VARIABILITY;

    if (recentMax > (this.options.highMotionThreshold ?? DEFAULT_HIGH_MOTION_THRESHOLD)) {
      return this.state === 'awake' ? 'awake' : 'spasm';
    }

    if (mean < (this.options.noMotionThreshold ?? DEFAULT_NO_MOTION_THRESHOLD) && breathingRate === 0) {
      return 'no_breathing';
    }

    const remMotion = inRange(mean, this.options.remMotionRange ?? DEFAULT_REM_MOTION_RANGE);
    const remBreathing =
      inRange(breathingRate, this.options.remBpmRange ?? DEFAULT_REM_BPM_RANGE) &&
      variability > highVariability;
    if (remMotion || remBreathing) {
      return 'rem_sleep';
    }

    const deepMotion = inRange(mean, this.options.deepMotionRange ?? DEFAULT_DEEP_MOTION_RANGE);
    const deepBreathing =
      inRange(breathingRate, this.options.deepBpmRange ?? DEFAULT_DEEP_BPM_RANGE) &&
      variability < lowVariability;
    if ((deepMotion || deepBreathing) && max30 < (this.options.quietCeiling ?? DEFAULT_QUIET_CEILING)) {
      return 'deep_sleep';
    }

    return isSleepLike(this.state) ? this.state : 'light_sleep';
  }

  private applyTarget(target: SleepState, now: number, stats: MotionWindowStats) {
    if (target === this.state) {
      if (
        this.state === 'spasm' &&
        this.stateSince !== null &&
        now - this.stateSince > this.confirmation.awakeSeconds
      ) {
        this.executeTransition('awake', now, stats);
      }
      this.pendingState = null;
      this.pendingSince = null;
      return;
    }

    if (this.pendingState !== target || this.pendingSince === null) {
      this.pendingState = target;
      this.pendingSince = now;
    }

    if (now - this.pendingSince >= this.confirmationTime(target)) {
      this.executeTransition(target, now, stats);
      this.pendingState = null;
      this.pendingSince = null;
    }
  }

  private confirmationTime(target: SleepState) {
    if (this.state === 'calibrating') {
      return 0;
    }
    switch (target) {
      case 'no_breathing':
        return this.confirmation.noBreathingSeconds;
      case 'awake':
        return this.confirmation.awakeSeconds;
      case 'spasm':
        return this.confirmation.spasmSeconds;
      default:
        return this.confirmation.defaultSeconds;
    }
  }

  private executeTransition(next: SleepState, now: number, stats: MotionWindowStats | null) {
    const previous = this.state;
    this.state = next;
    this.stateSince = now;
    this.timeline.push({ ts: Math.round(now * 1000), state: next });

    if (next === 'spasm') {
      this.spasms += 1;
    }
    if (next === 'awake') {
      if (this.wasSleeping) {
        this.wakeUps += 1;
      }
      this.wasSleeping = false;
    }
    if (isSleepLike(next)) {
      this.wasSleeping = true;
    }

    metrics.incrementDetectorCounter(DETECTOR, 'transitions', 1);
    metrics.setDetectorGauge(DETECTOR, 'wakeUps', this.wakeUps);
    this.log.info(
      { detector: DETECTOR, from: previous, to: next, at: now, stats },
      'Sleep state changed'
    );
    this.options.onTransition?.({ from: previous, to: next, at: now, stats });
  }
}

function inRange(value: number, [min, max]: Range) {
  return value >= min && value <= max;
}
