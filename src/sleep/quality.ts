export type QualityInput = {
  totalSleepSeconds: number;
  deepSleepSeconds: number;
  sessionDurationSeconds: number;
  wakeUps: number;
  spasmCount: number;
};

export type QualityScorer = (input: QualityInput) => number;

/**
 * 0-100. Deep-sleep share is worth up to 40 points, wake-ups 30, spasms 15 and
 * sleep efficiency 15.
 */
export const defaultQualityScorer: QualityScorer = input => {
  const { totalSleepSeconds, deepSleepSeconds, sessionDurationSeconds, wakeUps, spasmCount } = input;
  if (totalSleepSeconds <= 0 || sessionDurationSeconds <= 0) {
    return 0;
  }

  const deepRatio = deepSleepSeconds / totalSleepSeconds;
  const efficiency = totalSleepSeconds / sessionDurationSeconds;

  const score =
    deepRatioPoints(deepRatio) +
    Math.max(0, 30 - wakeUps * 8) +
    Math.max(0, 15 - spasmCount * 3) +
    Math.min(15, efficiency * 15);

  return Math.min(100, Math.max(0, Math.trunc(score)));
};

function deepRatioPoints(ratio: number) {
  if (ratio >= 0.3 && ratio <= 0.5) {
    return 40;
  }
  if (ratio >= 0.2 && ratio < 0.3) {
    return 30;
  }
  if (ratio > 0.5 && ratio <= 0.6) {
    return 35;
  }
  if (ratio >= 0.1 && ratio < 0.2) {
    return 20;
  }
  if (ratio > 0.6) {
    return 25;
  }
  return 10;
}
