import { describe, expect, it } from 'vitest';
import { MotionHeatMap, buildExclusionMask, cellBounds } from '../src/video/exclusionMask.js';

function maskWith(width: number, height: number, points: Array<[number, number]>) {
  const mask = new Uint8Array(width * height);
  for (const [x, y] of points) {
    mask[y * width + x] = 255;
  }
  return mask;
}

describe('MotionHeatMap', () => {
  it('HeatMapCells maps pixels onto the grid', () => {
    const heatMap = new MotionHeatMap(2, 4);
    heatMap.record(maskWith(8, 4, [[5, 3]]), 8, 4);

    expect(heatMap.frameCount).toBe(1);
    expect(heatMap.hitsAt(1, 2)).toBe(1);
    expect(heatMap.hitsAt(0, 2)).toBe(0);
    expect(heatMap.hitsAt(9, 9)).toBe(0);
  });

  it('HeatMapCounting counts a cell once per frame', () => {
    const heatMap = new MotionHeatMap(2, 4);
    heatMap.record(maskWith(8, 4, [[0, 0], [1, 1], [1, 0]]), 8, 4);

    expect(heatMap.hitsAt(0, 0)).toBe(1);
  });

  it('HeatMapPersistence requires strictly more hits than the ratio', () => {
    const heatMap = new MotionHeatMap(2, 4);
    for (let frame = 0; frame < 10; frame += 1) {
      const points: Array<[number, number]> = frame < 7 ? [[0, 0]] : [];
      if (frame < 8) {
        points.push([7, 3]);
      }
      heatMap.record(maskWith(8, 4, points), 8, 4);
    }

    expect(heatMap.persistentCells(0.7)).toEqual([{ row: 1, col: 3, hits: 8 }]);
  });

  it('HeatMapUnevenGrid covers every pixel', () => {
    expect([0, 1, 2].map(index => cellBounds(index, 10, 3))).toEqual([
      { start: 0, end: 3 },
      { start: 3, end: 6 },
      { start: 6, end: 10 }
    ]);

    const heatMap = new MotionHeatMap(1, 3);
    heatMap.record(new Uint8Array(10).fill(255), 10, 1);
    expect(heatMap.snapshot()).toEqual({ rows: 1, cols: 3, frameCount: 1, hits: [1, 1, 1] });
  });

  it('HeatMapReset clears hits', () => {
    const heatMap = new MotionHeatMap(2, 4);
    heatMap.record(maskWith(8, 4, [[0, 0]]), 8, 4);
    heatMap.reset();

    expect(heatMap.snapshot()).toEqual({ rows: 2, cols: 4, frameCount: 0, hits: new Array(8).fill(0) });
  });

  it('HeatMapGrid rejects an empty grid', () => {
    expect(() => new MotionHeatMap(0, 4)).toThrow('Invalid heat map grid 4x0');
  });
});

describe('buildExclusionMask', () => {
  it('ExclusionMargin blanks persistent cells plus a half-cell margin', () => {
    const heatMap = new MotionHeatMap(2, 4);
    heatMap.record(maskWith(8, 4, [[0, 0]]), 8, 4);

    const mask = buildExclusionMask(heatMap, 8, 4, 0.7);

    expect(mask.excludedCells).toBe(1);
    expect(Array.from(mask.data)).toEqual([
      0, 0, 0, 1, 1, 1, 1, 1,
      0, 0, 0, 1, 1, 1, 1, 1,
      0, 0, 0, 1, 1, 1, 1, 1,
      1, 1, 1, 1, 1, 1, 1, 1
    ]);
  });

  it('ExclusionOpen leaves the frame open without persistent motion', () => {
    const heatMap = new MotionHeatMap(2, 4);
    heatMap.record(new Uint8Array(32), 8, 4);

    const mask = buildExclusionMask(heatMap, 8, 4, 0.7);
    expect(mask.excludedCells).toBe(0);
    expect(mask.data.every(value => value === 1)).toBe(true);
  });
});
