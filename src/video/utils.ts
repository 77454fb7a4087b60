import { PNG } from 'pngjs';

export type GrayscaleFrame = {
  width: number;
  height: number;
  data: Uint8Array;
};

export function readFrameAsGrayscale(pngBuffer: Buffer): GrayscaleFrame {
  const image = PNG.sync.read(pngBuffer);
  const { width, height, data } = image;
  const grayscale = new Uint8Array(width * height);

  for (let i = 0; i < width * height; i += 1) {
    const offset = i * 4;
    const r = data[offset];
    const g = data[offset + 1];
    const b = data[offset + 2];
    // Rec. 709 luma coefficients
    grayscale[i] = Math.round(0.2126 * r + 0.7152 * g + 0.0722 * b);
  }

  return { width, height, data: grayscale };
}

const GAUSSIAN_KERNEL = [
  [1, 2, 1],
  [2, 4, 2],
  [1, 2, 1]
];
const GAUSSIAN_KERNEL_SUM = 16;

export function gaussianBlur(frame: GrayscaleFrame): GrayscaleFrame {
  const { width, height, data } = frame;
  const output = new Uint8Array(width * height);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let total = 0;

      for (let ky = -1; ky <= 1; ky += 1) {
        for (let kx = -1; kx <= 1; kx += 1) {
          const sampleX = clamp(x + kx, 0, width - 1);
          const sampleY = clamp(y + ky, 0, height - 1);
          total += data[sampleY * width + sampleX] * GAUSSIAN_KERNEL[ky + 1][kx + 1];
        }
      }

      output[y * width + x] = Math.round(total / GAUSSIAN_KERNEL_SUM);
    }
  }

  return { width, height, data: output };
}

export type BackgroundModel = {
  width: number;
  height: number;
  data: Float32Array;
};

export function seedBackground(frame: GrayscaleFrame): BackgroundModel {
  return { width: frame.width, height: frame.height, data: Float32Array.from(frame.data) };
}

/** Running average: `bg = (1 - rate) * bg + rate * frame`. */
export function accumulateWeighted(background: BackgroundModel, frame: GrayscaleFrame, rate: number) {
  const { data } = background;
  for (let i = 0; i < data.length; i += 1) {
    data[i] = (1 - rate) * data[i] + rate * frame.data[i];
  }
}

export type ChangedPixelStats = {
  changedPixels: number;
  totalPixels: number;
  meanDelta: number;
  maxDelta: number;
};

export function countChangedPixels(
  background: BackgroundModel,
  current: GrayscaleFrame,
  threshold: number
): ChangedPixelStats {
  if (background.width !== current.width || background.height !== current.height) {
    throw new Error('Frame dimensions must match for diff comparison');
  }

  const totalPixels = current.data.length;
  let changedPixels = 0;
  let sum = 0;
  let maxDelta = 0;

  for (let i = 0; i < totalPixels; i += 1) {
    const delta = Math.abs(current.data[i] - Math.round(background.data[i]));
    sum += delta;
    if (delta > maxDelta) {
      maxDelta = delta;
    }
    if (delta >= threshold) {
      changedPixels += 1;
    }
  }

  return {
    changedPixels,
    totalPixels,
    meanDelta: totalPixels === 0 ? 0 : sum / totalPixels,
    maxDelta
  };
}

function clamp(value: number, min: number, max: number) {
  return Math.min(Math.max(value, min), max);
}
