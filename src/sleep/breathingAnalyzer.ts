export type SleepPhase = 'unknown' | 'deep' | 'light' | 'transitional';

export interface BreathingAnalyzerOptions {
  peakThreshold?: number;
  minIntervalSeconds?: number;
  maxIntervalSeconds?: number;
  decayTimeoutSeconds?: number;
  historySize?: number;
  rateWindow?: number;
  minRateIntervals?: number;
  variabilityWindow?: number;
  minVariabilityIntervals?: number;
  lowVariability?: number;
  highVariability?: number;
}

export const DEFAULT_PEAK_THRESHOLD = 50_000;
export const DEFAULT_MIN_INTERVAL_SECONDS = 1;
export const DEFAULT_MAX_INTERVAL_SECONDS = 5;
export const DEFAULT_DECAY_TIMEOUT_SECONDS = 15;
export const DEFAULT_HISTORY_SIZE = 50;
export const DEFAULT_RATE_WINDOW = 10;
export const DEFAULT_MIN_RATE_INTERVALS = 3;
export const DEFAULT_VARIABILITY_WINDOW = 20;
export const DEFAULT_MIN_VARIABILITY_INTERVALS = 5;
export const DEFAULT_LOW_VARIABILITY = 0.1;
export const DEFAULT_HIGH_VARIABILITY = 0.2;

/**
 * Estimates respiration from threshold crossings of the motion score.
 * Timestamps are in seconds.
 */
export class BreathingAnalyzer {
  private readonly intervals: number[] = [];
  private lastPeakTs: number | null = null;
  private lastBreathTs: number | null = null;
  private inPeak = false;

  constructor(private readonly options: BreathingAnalyzerOptions = {}) {}

  /** Returns the accepted interval in seconds when this sample starts a new breath. */
  processMotion(score: number, timestamp: number): number | null {
    const threshold = this.options.peakThreshold ?? DEFAULT_PEAK_THRESHOLD;

    if (score <= threshold) {
      this.inPeak = false;
      return null;
    }

    if (this.inPeak) {
      return null;
    }
    this.inPeak = true;

    if (this.lastPeakTs === null) {
      this.lastPeakTs = timestamp;
      this.lastBreathTs = timestamp;
      return null;
    }

    const interval = timestamp - this.lastPeakTs;
    this.lastPeakTs = timestamp;

    const minInterval = this.options.minIntervalSeconds ?? DEFAULT_MIN_INTERVAL_SECONDS;
    const maxInterval = this.options.maxIntervalSeconds ?? DEFAULT_MAX_INTERVAL_SECONDS;
    if (interval < minInterval || interval > maxInterval) {
      return null;
    }

    this.intervals.push(interval);
    const historySize = this.options.historySize ?? DEFAULT_HISTORY_SIZE;
    if (this.intervals.length > historySize) {
      this.intervals.splice(0, this.intervals.length - historySize);
    }
    this.lastBreathTs = timestamp;
    return interval;
  }

  getBreathingRate(now: number): number {
    const minimum = this.options.minRateIntervals ?? DEFAULT_MIN_RATE_INTERVALS;
    if (this.intervals.length < minimum || this.isStale(now)) {
      return 0;
    }
    const recent = this.intervals.slice(-(this.options.rateWindow ?? DEFAULT_RATE_WINDOW));
    const average = mean(recent);
    return average > 0 ? 60 / average : 0;
  }

  /** Coefficient of variation of recent intervals. */
  getVariability(now: number): number {
    const minimum = this.options.minVariabilityIntervals ?? DEFAULT_MIN_VARIABILITY_INTERVALS;
    if (this.intervals.length < minimum || this.isStale(now)) {
      return 0;
    }
    const recent = this.intervals.slice(
      -(this.options.variabilityWindow ?? DEFAULT_VARIABILITY_WINDOW)
    );
    const average = mean(recent);
    if (average <= 0) {
      return 0;
    }
    return sampleStandardDeviation(recent, average) / average;
  }

  getSleepPhase(now: number): SleepPhase {
    const variability = this.getVariability(now);
    if (variability === 0) {
      return 'unknown';
    }
    if (variability < (this.options.lowVariability ?? DEFAULT_LOW_VARIABILITY)) {
      return 'deep';
    }
    if (variability > (this.options.highVariability ?? DEFAULT_HIGH_VARIABILITY)) {
      return 'light';
    }
    return 'transitional';
  }

  getIntervals(): number[] {
    return [...this.intervals];
  }

  reset() {
    this.intervals.length = 0;
    this.lastPeakTs = null;
    this.lastBreathTs = null;
    this.inPeak = false;
  }

  private isStale(now: number) {
    if (this.lastBreathTs === null) {
      return true;
    }
    const timeout = this.options.decayTimeoutSeconds ?? DEFAULT_DECAY_TIMEOUT_SECONDS;
    return now - this.lastBreathTs > timeout;
  }
}

function mean(values: number[]) {
  if (values.length === 0) {
    return 0;
  }
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total / values.length;
}

function sampleStandardDeviation(values: number[], average: number) {
  if (values.length < 2) {
    return 0;
  }
  let sum = 0;
  for (const value of values) {
    sum += (value - average) ** 2;
  }
  return Math.sqrt(sum / (values.length - 1));
}
