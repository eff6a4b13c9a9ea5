import { performance } from 'node:perf_hooks';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import type { LoggerLike } from '../types.js';
import {
  FOREGROUND,
  type FrameInput,
  type GrayscaleFrame,
  absoluteDifference,
  andMask,
  dilateMask,
  equalizeLocalContrast,
  findConnectedComponents,
  gaussianBlur,
  thresholdMask,
  toGrayscale,
  type ConnectedComponent
} from './utils.js';
import {
  DEFAULT_GRID_COLS,
  DEFAULT_GRID_ROWS,
  type ExclusionMask,
  type HeatMapSnapshot,
  MotionHeatMap,
  buildExclusionMask
} from './exclusionMask.js';

export interface MotionDetectorOptions {
  diffThreshold?: number;
  blurKernelSize?: number;
  dilateIterations?: number;
  contrastClipLimit?: number;
  contrastTiles?: number;
  calibrationFrames?: number;
  persistentRatio?: number;
  gridRows?: number;
  gridCols?: number;
  minComponentAreaRatio?: number;
  maxAspectRatio?: number;
  edgeBandRatio?: number;
  smallComponentAreaRatio?: number;
  logger?: LoggerLike;
}

export type MotionResult = {
  score: number;
  width: number;
  height: number;
  calibrating: boolean;
};

const DETECTOR = 'motion';

export const DEFAULT_DIFF_THRESHOLD = 5;
export const DEFAULT_BLUR_KERNEL_SIZE = 21;
export const DEFAULT_DILATE_ITERATIONS = 2;
export const DEFAULT_CONTRAST_CLIP_LIMIT = 2;
export const DEFAULT_CONTRAST_TILES = 8;
export const DEFAULT_CALIBRATION_FRAMES = 25;
export const DEFAULT_PERSISTENT_RATIO = 0.7;
export const DEFAULT_MIN_COMPONENT_AREA_RATIO = 0.0005;
export const DEFAULT_MAX_ASPECT_RATIO = 4;
export const DEFAULT_EDGE_BAND_RATIO = 0.15;
export const DEFAULT_SMALL_COMPONENT_AREA_RATIO = 0.01;

/**
 * Turns consecutive frames into a scalar motion score. The first
 * `calibrationFrames` diffs feed a heat map; cells that moved in most of them
 * (burned-in clocks, overlays) are masked out for the rest of the run.
 */
export class MotionDetector {
  private previousFrame: GrayscaleFrame | null = null;
  private readonly heatMap: MotionHeatMap;
  private exclusionMask: ExclusionMask | null = null;
  private readonly log: LoggerLike;

  constructor(private readonly options: MotionDetectorOptions = {}) {
    this.heatMap = new MotionHeatMap(
      options.gridRows ?? DEFAULT_GRID_ROWS,
      options.gridCols ?? DEFAULT_GRID_COLS
    );
    this.log = options.logger ?? logger;
    this.updateCalibrationGauges();
  }

  processFrame(frame: FrameInput): MotionResult {
    const start = performance.now();
    try {
      const prepared = this.prepare(frame);
      const { width, height } = prepared;

      if (!this.previousFrame) {
        this.previousFrame = prepared;
        return this.result(0, width, height);
      }

      if (this.previousFrame.width !== width || this.previousFrame.height !== height) {
        this.handleFrameResize(prepared);
        return this.result(0, width, height);
      }

      const deltas = absoluteDifference(this.previousFrame, prepared);
      this.previousFrame = prepared;

      const foreground = dilateMask(
        thresholdMask(deltas, this.options.diffThreshold ?? DEFAULT_DIFF_THRESHOLD),
        width,
        height,
        this.options.dilateIterations ?? DEFAULT_DILATE_ITERATIONS
      );

      if (!this.exclusionMask) {
        this.heatMap.record(foreground, width, height);
        if (this.heatMap.frameCount >= this.calibrationFrames) {
          this.completeCalibration(width, height);
        }
      }
      const allowed = this.exclusionMask ? andMask(foreground, this.exclusionMask.data) : foreground;
      const score = this.scoreComponents(allowed, width, height);

      metrics.incrementDetectorCounter(DETECTOR, 'frames', 1);
      metrics.setDetectorGauge(DETECTOR, 'score', score);
      this.updateCalibrationGauges();
      return this.result(score, width, height);
    } catch (error) {
      this.handleFrameProcessingError(error);
      throw error;
    } finally {
      metrics.observeDetectorLatency(DETECTOR, performance.now() - start);
    }
  }

  reset() {
    this.previousFrame = null;
    this.heatMap.reset();
    this.exclusionMask = null;
    this.updateCalibrationGauges();
  }

  isCalibrated() {
    return this.exclusionMask !== null;
  }

  getCalibrationProgress() {
    if (this.exclusionMask) {
      return 1;
    }
    return Math.min(1, this.heatMap.frameCount / this.calibrationFrames);
  }

  getExclusionMask(): ExclusionMask | null {
    if (!this.exclusionMask) {
      return null;
    }
    return { ...this.exclusionMask, data: this.exclusionMask.data.slice() };
  }

  getHeatMapSnapshot(): HeatMapSnapshot {
    return this.heatMap.snapshot();
  }

  private get calibrationFrames() {
    return Math.max(1, Math.floor(this.options.calibrationFrames ?? DEFAULT_CALIBRATION_FRAMES));
  }

  private prepare(frame: FrameInput): GrayscaleFrame {
    const grayscale = toGrayscale(frame);
    const equalized = equalizeLocalContrast(
      grayscale,
      this.options.contrastClipLimit ?? DEFAULT_CONTRAST_CLIP_LIMIT,
      this.options.contrastTiles ?? DEFAULT_CONTRAST_TILES
    );
    return gaussianBlur(equalized, this.options.blurKernelSize ?? DEFAULT_BLUR_KERNEL_SIZE);
  }

  private completeCalibration(width: number, height: number) {
    const ratio = this.options.persistentRatio ?? DEFAULT_PERSISTENT_RATIO;
    const mask = buildExclusionMask(this.heatMap, width, height, ratio);
    this.exclusionMask = mask;
    metrics.incrementDetectorCounter(DETECTOR, 'calibrations', 1);

    if (mask.excludedCells === 0) {
      this.log.info(
        { detector: DETECTOR, frames: this.heatMap.frameCount },
        'Calibration found no persistent motion; mask left open'
      );
      return;
    }

    this.log.info(
      { detector: DETECTOR, frames: this.heatMap.frameCount, excludedCells: mask.excludedCells },
      'Calibration complete; persistent motion masked'
    );
  }

  private scoreComponents(mask: Uint8Array, width: number, height: number) {
    let pixels = 0;
    for (const component of findConnectedComponents(mask, width, height)) {
      if (this.keepComponent(component, width, height)) {
        pixels += component.area;
      }
    }
    return pixels * FOREGROUND;
  }

  private keepComponent(component: ConnectedComponent, width: number, height: number) {
    const frameArea = width * height;
    const minArea = frameArea * (this.options.minComponentAreaRatio ?? DEFAULT_MIN_COMPONENT_AREA_RATIO);
    if (component.area <= minArea) {
      return false;
    }

    const maxAspect = this.options.maxAspectRatio ?? DEFAULT_MAX_ASPECT_RATIO;
    const aspect = component.width / Math.max(component.height, 1);
    if (aspect > maxAspect || aspect < 1 / maxAspect) {
      return false;
    }

    const band = this.options.edgeBandRatio ?? DEFAULT_EDGE_BAND_RATIO;
    const smallArea = frameArea * (this.options.smallComponentAreaRatio ?? DEFAULT_SMALL_COMPONENT_AREA_RATIO);
    const inEdgeBand =
      component.y < height * band || component.y + component.height > height * (1 - band);
    if (inEdgeBand && component.area < smallArea) {
      return false;
    }

    return true;
  }

  private handleFrameResize(frame: GrayscaleFrame) {
    this.reset();
    this.previousFrame = frame;
    metrics.incrementDetectorCounter(DETECTOR, 'resolutionResets', 1);
    this.log.warn(
      { detector: DETECTOR, width: frame.width, height: frame.height },
      'Frame size changed; restarting calibration'
    );
  }

  private handleFrameProcessingError(error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    metrics.recordDetectorError(DETECTOR, message);
    this.reset();
  }

  private updateCalibrationGauges() {
    metrics.setDetectorGauge(DETECTOR, 'calibrated', this.exclusionMask ? 1 : 0);
    metrics.setDetectorGauge(DETECTOR, 'calibrationProgress', this.getCalibrationProgress());
    metrics.setDetectorGauge(DETECTOR, 'excludedCells', this.exclusionMask?.excludedCells ?? 0);
  }

  private result(score: number, width: number, height: number): MotionResult {
    return { score, width, height, calibrating: this.exclusionMask === null };
  }
}

export default MotionDetector;
