import { PNG } from 'pngjs';
import type { RawFrame } from '../../src/video/utils.js';

export type Block = {
  x: number;
  y: number;
  width: number;
  height: number;
  value?: number;
};

function createRandom(seed: number) {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Deterministic noise in [60, 140) so local contrast equalization has texture to work with. */
export function createTexture(width: number, height: number, seed = 7): Uint8Array {
  const random = createRandom(seed);
  const data = new Uint8Array(width * height);
  for (let i = 0; i < data.length; i += 1) {
    data[i] = 60 + Math.floor(random() * 80);
  }
  return data;
}

export function texturedFrame(
  texture: Uint8Array,
  width: number,
  height: number,
  blocks: Block[] = []
): RawFrame {
  const data = texture.slice();
  for (const block of blocks) {
    const value = block.value ?? 250;
    for (let y = block.y; y < Math.min(height, block.y + block.height); y += 1) {
      data.fill(value, y * width + block.x, y * width + Math.min(width, block.x + block.width));
    }
  }
  return { width, height, data, channels: 1 };
}

export function encodePng(frame: RawFrame): Buffer {
  const png = new PNG({ width: frame.width, height: frame.height });
  for (let i = 0; i < frame.width * frame.height; i += 1) {
    const value = frame.data[i];
    png.data[i * 4] = value;
    png.data[i * 4 + 1] = value;
    png.data[i * 4 + 2] = value;
    png.data[i * 4 + 3] = 255;
  }
  return PNG.sync.write(png);
}
