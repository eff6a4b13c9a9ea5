import metrics from '../metrics/index.js';

export interface FrameGateOptions {
  enabled?: boolean;
  duplicateWindowMs?: number;
  minZeroStreak?: number;
  referenceWidth?: number;
  referenceHeight?: number;
}

export type GateDecision =
  | { accepted: true; score: number; rawScore: number }
  | { accepted: false; reason: 'duplicate'; rawScore: number };

export const DEFAULT_REFERENCE_WIDTH = 1920;
export const DEFAULT_REFERENCE_HEIGHT = 1080;
export const DEFAULT_DUPLICATE_WINDOW_MS = 1000;
export const DEFAULT_MIN_ZERO_STREAK = 5;

const DETECTOR = 'frame-gate';

export function rescaleScore(
  score: number,
  width: number,
  height: number,
  referenceArea = DEFAULT_REFERENCE_WIDTH * DEFAULT_REFERENCE_HEIGHT
) {
  const area = width * height;
  if (!Number.isFinite(area) || area <= 0) {
    return score;
  }
  return (score * referenceArea) / area;
}

/**
 * Drops the zero score of a repeated frame (a decoder handing back the frame it
 * already delivered) and normalizes accepted scores to the reference area.
 */
export class FrameGate {
  private lastNonZeroAt: number | null = null;
  private zeroStreak = 0;

  constructor(private readonly options: FrameGateOptions = {}) {}

  evaluate(rawScore: number, width: number, height: number, ts: number): GateDecision {
    if (rawScore === 0) {
      this.zeroStreak += 1;
      const windowMs = this.options.duplicateWindowMs ?? DEFAULT_DUPLICATE_WINDOW_MS;
      const minZeroStreak = this.options.minZeroStreak ?? DEFAULT_MIN_ZERO_STREAK;
      const recentMotion = this.lastNonZeroAt !== null && ts - this.lastNonZeroAt < windowMs;
      if ((this.options.enabled ?? true) && recentMotion && this.zeroStreak < minZeroStreak) {
        metrics.incrementDetectorCounter(DETECTOR, 'duplicates', 1);
        return { accepted: false, reason: 'duplicate', rawScore };
      }
    } else {
      this.zeroStreak = 0;
      this.lastNonZeroAt = ts;
    }

    const referenceArea =
      (this.options.referenceWidth ?? DEFAULT_REFERENCE_WIDTH) *
      (this.options.referenceHeight ?? DEFAULT_REFERENCE_HEIGHT);
    metrics.incrementDetectorCounter(DETECTOR, 'accepted', 1);
    return { accepted: true, score: rescaleScore(rawScore, width, height, referenceArea), rawScore };
  }

  reset() {
    this.lastNonZeroAt = null;
    this.zeroStreak = 0;
  }
}
