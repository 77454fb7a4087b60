import type { MotionEvaluation, MotionSignal } from '../types.js';
import {
  type BackgroundModel,
  accumulateWeighted,
  countChangedPixels,
  gaussianBlur,
  readFrameAsGrayscale,
  seedBackground
} from './utils.js';

export interface MotionDetectorOptions {
  diffThreshold?: number;
  minArea?: number;
  learningRate?: number;
}

export const DEFAULT_DIFF_THRESHOLD = 25;
export const DEFAULT_MIN_AREA = 0.01;
export const DEFAULT_LEARNING_RATE = 0.1;

/**
 * Per-frame motion signal against a running-average background. The first
 * frame, and any frame whose dimensions differ from the background, reseeds
 * the model and reports no motion.
 */
export class MotionDetector implements MotionSignal {
  private background: BackgroundModel | null = null;
  private readonly diffThreshold: number;
  private readonly minArea: number;
  private readonly learningRate: number;

  constructor(options: MotionDetectorOptions = {}) {
    this.diffThreshold = options.diffThreshold ?? DEFAULT_DIFF_THRESHOLD;
    this.minArea = options.minArea ?? DEFAULT_MIN_AREA;
    this.learningRate = options.learningRate ?? DEFAULT_LEARNING_RATE;
  }

  evaluate(frame: Buffer): MotionEvaluation {
    const blurred = gaussianBlur(readFrameAsGrayscale(frame));
    const totalPixels = blurred.width * blurred.height;
    const minAreaPixels = this.minArea * totalPixels;

    const background = this.background;
    if (!background || background.width !== blurred.width || background.height !== blurred.height) {
      this.background = seedBackground(blurred);
      return { isMotion: false, areaPct: 0, changedPixels: 0, totalPixels, minAreaPixels };
    }

    const stats = countChangedPixels(background, blurred, this.diffThreshold);
    accumulateWeighted(background, blurred, this.learningRate);

    const areaPct = totalPixels === 0 ? 0 : stats.changedPixels / totalPixels;
    return {
      isMotion: stats.changedPixels > 0 && stats.changedPixels >= minAreaPixels,
      areaPct,
      changedPixels: stats.changedPixels,
      totalPixels,
      minAreaPixels
    };
  }

  reset() {
    this.background = null;
  }
}

export default MotionDetector;
