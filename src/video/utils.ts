import { PNG } from 'pngjs';

export type GrayscaleFrame = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type RawFrame = {
  width: number;
  height: number;
  data: Uint8Array | Uint8ClampedArray;
  channels?: 1 | 3 | 4;
};

export type FrameInput = Buffer | RawFrame;

export type ConnectedComponent = {
  area: number;
  x: number;
  y: number;
  width: number;
  height: number;
};

export const FOREGROUND = 255;

export function readFrameAsGrayscale(pngBuffer: Buffer): GrayscaleFrame {
  const image = PNG.sync.read(pngBuffer);
  return toGrayscale({ width: image.width, height: image.height, data: image.data, channels: 4 });
}

export function toGrayscale(frame: FrameInput): GrayscaleFrame {
  if (Buffer.isBuffer(frame)) {
    return readFrameAsGrayscale(frame);
  }

  const { width, height, data } = frame;
  const pixelCount = width * height;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid frame dimensions ${width}x${height}`);
  }

  const channels = frame.channels ?? inferChannels(data.length, pixelCount);
  if (data.length < pixelCount * channels) {
    throw new Error(
      `Frame buffer too small: expected ${pixelCount * channels} bytes for ${width}x${height}x${channels}`
    );
  }

  const grayscale = new Uint8Array(pixelCount);
  if (channels === 1) {
    grayscale.set(data.subarray(0, pixelCount));
    return { width, height, data: grayscale };
  }

  for (let i = 0; i < pixelCount; i += 1) {
    const offset = i * channels;
    const r = data[offset];
    const g = data[offset + 1];
    const b = data[offset + 2];
    // Rec. 709 luma coefficients
    grayscale[i] = Math.round(0.2126 * r + 0.7152 * g + 0.0722 * b);
  }

  return { width, height, data: grayscale };
}

function inferChannels(length: number, pixelCount: number): 1 | 3 | 4 {
  if (length === pixelCount * 4) {
    return 4;
  }
  if (length === pixelCount * 3) {
    return 3;
  }
  return 1;
}

/**
 * Contrast-limited adaptive histogram equalization. Each tile gets its own
 * clipped lookup table; pixels blend the four nearest tables bilinearly.
 */
export function equalizeLocalContrast(
  frame: GrayscaleFrame,
  clipLimit = 2,
  tiles = 8
): GrayscaleFrame {
  const { width, height, data } = frame;
  const tileWidth = Math.max(1, Math.ceil(width / tiles));
  const tileHeight = Math.max(1, Math.ceil(height / tiles));
  const tilesX = Math.ceil(width / tileWidth);
  const tilesY = Math.ceil(height / tileHeight);
  const luts: Uint8Array[] = [];

  for (let ty = 0; ty < tilesY; ty += 1) {
    for (let tx = 0; tx < tilesX; tx += 1) {
      const x0 = tx * tileWidth;
      const y0 = ty * tileHeight;
      const x1 = Math.min(width, x0 + tileWidth);
      const y1 = Math.min(height, y0 + tileHeight);
      const histogram = new Uint32Array(256);
      for (let y = y0; y < y1; y += 1) {
        const row = y * width;
        for (let x = x0; x < x1; x += 1) {
          histogram[data[row + x]] += 1;
        }
      }
      const area = (x1 - x0) * (y1 - y0);
      luts.push(buildClippedLut(histogram, area, clipLimit));
    }
  }

  const output = new Uint8Array(width * height);
  for (let y = 0; y < height; y += 1) {
    const tyf = (y + 0.5) / tileHeight - 0.5;
    const ty0 = clamp(Math.floor(tyf), 0, tilesY - 1);
    const ty1 = clamp(Math.floor(tyf) + 1, 0, tilesY - 1);
    const wy = clamp(tyf - Math.floor(tyf), 0, 1);

    for (let x = 0; x < width; x += 1) {
      const txf = (x + 0.5) / tileWidth - 0.5;
      const tx0 = clamp(Math.floor(txf), 0, tilesX - 1);
      const tx1 = clamp(Math.floor(txf) + 1, 0, tilesX - 1);
      const wx = clamp(txf - Math.floor(txf), 0, 1);
      const value = data[y * width + x];

      const topLeft = luts[ty0 * tilesX + tx0][value];
      const topRight = luts[ty0 * tilesX + tx1][value];
      const bottomLeft = luts[ty1 * tilesX + tx0][value];
      const bottomRight = luts[ty1 * tilesX + tx1][value];
      const top = topLeft * (1 - wx) + topRight * wx;
      const bottom = bottomLeft * (1 - wx) + bottomRight * wx;
      output[y * width + x] = Math.round(top * (1 - wy) + bottom * wy);
    }
  }

  return { width, height, data: output };
}

function buildClippedLut(histogram: Uint32Array, area: number, clipLimit: number): Uint8Array {
  const limit = Math.max(1, Math.floor((clipLimit * area) / 256));
  let excess = 0;
  for (let i = 0; i < 256; i += 1) {
    if (histogram[i] > limit) {
      excess += histogram[i] - limit;
      histogram[i] = limit;
    }
  }

  const share = Math.floor(excess / 256);
  const remainder = excess % 256;
  for (let i = 0; i < 256; i += 1) {
    histogram[i] += share + (i < remainder ? 1 : 0);
  }

  const lut = new Uint8Array(256);
  let cumulative = 0;
  for (let i = 0; i < 256; i += 1) {
    cumulative += histogram[i];
    lut[i] = clamp(Math.round((cumulative * 255) / area), 0, 255);
  }
  return lut;
}

export function gaussianKernel(kernelSize: number): Float64Array {
  const size = kernelSize % 2 === 1 ? kernelSize : kernelSize + 1;
  const sigma = 0.3 * ((size - 1) * 0.5 - 1) + 0.8;
  const radius = (size - 1) / 2;
  const kernel = new Float64Array(size);
  let sum = 0;
  for (let i = 0; i < size; i += 1) {
    const offset = i - radius;
    const weight = Math.exp(-(offset * offset) / (2 * sigma * sigma));
    kernel[i] = weight;
    sum += weight;
  }
  for (let i = 0; i < size; i += 1) {
    kernel[i] /= sum;
  }
  return kernel;
}

export function gaussianBlur(frame: GrayscaleFrame, kernelSize = 3): GrayscaleFrame {
  const { width, height, data } = frame;
  const kernel = gaussianKernel(kernelSize);
  const radius = (kernel.length - 1) / 2;
  const horizontal = new Float64Array(width * height);

  for (let y = 0; y < height; y += 1) {
    const row = y * width;
    for (let x = 0; x < width; x += 1) {
      let total = 0;
      for (let k = 0; k < kernel.length; k += 1) {
        const sampleX = clamp(x + k - radius, 0, width - 1);
        total += data[row + sampleX] * kernel[k];
      }
      horizontal[row + x] = total;
    }
  }

  const output = new Uint8Array(width * height);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let total = 0;
      for (let k = 0; k < kernel.length; k += 1) {
        const sampleY = clamp(y + k - radius, 0, height - 1);
        total += horizontal[sampleY * width + x] * kernel[k];
      }
      output[y * width + x] = clamp(Math.round(total), 0, 255);
    }
  }

  return {
    width,
    height,
    data: output
  };
}

export function absoluteDifference(previous: GrayscaleFrame, current: GrayscaleFrame): Uint8Array {
  if (previous.width !== current.width || previous.height !== current.height) {
    throw new Error('Frame dimensions must match for diff comparison');
  }

  const totalPixels = current.data.length;
  const deltas = new Uint8Array(totalPixels);
  for (let i = 0; i < totalPixels; i += 1) {
    deltas[i] = Math.abs(current.data[i] - previous.data[i]);
  }
  return deltas;
}

export function thresholdMask(deltas: Uint8Array, threshold: number): Uint8Array {
  const mask = new Uint8Array(deltas.length);
  for (let i = 0; i < deltas.length; i += 1) {
    mask[i] = deltas[i] > threshold ? FOREGROUND : 0;
  }
  return mask;
}

export function dilateMask(mask: Uint8Array, width: number, height: number, iterations = 1): Uint8Array {
  let current = mask;
  for (let iteration = 0; iteration < iterations; iteration += 1) {
    const horizontal = new Uint8Array(current.length);
    for (let y = 0; y < height; y += 1) {
      const row = y * width;
      for (let x = 0; x < width; x += 1) {
        let value = current[row + x];
        if (x > 0 && current[row + x - 1] > value) {
          value = current[row + x - 1];
        }
        if (x < width - 1 && current[row + x + 1] > value) {
          value = current[row + x + 1];
        }
        horizontal[row + x] = value;
      }
    }

    const next = new Uint8Array(current.length);
    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        const index = y * width + x;
        let value = horizontal[index];
        if (y > 0 && horizontal[index - width] > value) {
          value = horizontal[index - width];
        }
        if (y < height - 1 && horizontal[index + width] > value) {
          value = horizontal[index + width];
        }
        next[index] = value;
      }
    }
    current = next;
  }
  return current === mask ? mask.slice() : current;
}

/** Keeps foreground pixels where `allowed` is non-zero. */
export function andMask(mask: Uint8Array, allowed: Uint8Array): Uint8Array {
  if (mask.length !== allowed.length) {
    throw new Error('Mask sizes must match');
  }
  const output = new Uint8Array(mask.length);
  for (let i = 0; i < mask.length; i += 1) {
    output[i] = allowed[i] !== 0 ? mask[i] : 0;
  }
  return output;
}

export function findConnectedComponents(
  mask: Uint8Array,
  width: number,
  height: number
): ConnectedComponent[] {
  const visited = new Uint8Array(mask.length);
  const stack = new Int32Array(mask.length);
  const components: ConnectedComponent[] = [];

  for (let start = 0; start < mask.length; start += 1) {
    if (mask[start] === 0 || visited[start] !== 0) {
      continue;
    }

    let top = 0;
    stack[top] = start;
    top += 1;
    visited[start] = 1;
    let area = 0;
    let minX = width;
    let minY = height;
    let maxX = -1;
    let maxY = -1;

    while (top > 0) {
      top -= 1;
      const index = stack[top];
      const x = index % width;
      const y = (index - x) / width;
      area += 1;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;

      for (let dy = -1; dy <= 1; dy += 1) {
        const ny = y + dy;
        if (ny < 0 || ny >= height) {
          continue;
        }
        for (let dx = -1; dx <= 1; dx += 1) {
          const nx = x + dx;
          if ((dx === 0 && dy === 0) || nx < 0 || nx >= width) {
            continue;
          }
          const neighbor = ny * width + nx;
          if (mask[neighbor] !== 0 && visited[neighbor] === 0) {
            visited[neighbor] = 1;
            stack[top] = neighbor;
            top += 1;
          }
        }
      }
    }

    components.push({
      area,
      x: minX,
      y: minY,
      width: maxX - minX + 1,
      height: maxY - minY + 1
    });
  }

  return components;
}

export function clamp(value: number, min: number, max: number) {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}
