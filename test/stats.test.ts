import { beforeEach, describe, expect, it } from 'vitest';
import { StatsCollector, formatOverlay } from '../src/core/stats.js';
import { referenceTriangle } from '../src/core/math/triangle.js';
import { SCREEN_VIEWPORT } from '../src/core/types.js';

describe('StatsCollector', () => {
  let stats: StatsCollector;

  beforeEach(() => {
    stats = new StatsCollector();
    stats.beginFrame();
  });

  it('splits visible triangles into full and partial', () => {
    stats.recordVisible(true);
    stats.recordVisible(false);
    stats.recordVisible(true);

    expect(stats.snapshot()).toMatchObject({ visible: 3, fullyVisible: 2, partiallyVisible: 1 });
  });

  it('computes the area once per frame', () => {
    stats.recordArea(referenceTriangle(10, SCREEN_VIEWPORT));
    stats.recordArea(referenceTriangle(5, SCREEN_VIEWPORT));
    expect(stats.snapshot().triangleArea).toBe(40);
  });

  it('averages mirrored pixels over centred triangles with truncation', () => {
    stats.recordMirrored(4);
    stats.recordMirrored(3);
    stats.recordCenter();
    stats.recordCenter();

    expect(stats.snapshot()).toMatchObject({ mirroredPixels: 7, centersDrawn: 2, averageMirrored: 3 });
  });

  it('reports a zero average without centres', () => {
    stats.recordMirrored(12);
    expect(stats.snapshot().averageMirrored).toBe(0);
  });

  it('starts every frame from zero', () => {
    stats.recordVisible(true);
    stats.recordLines(5);
    stats.recordArea(referenceTriangle(5, SCREEN_VIEWPORT));
    stats.beginFrame();

    expect(stats.snapshot()).toEqual({
      visible: 0,
      fullyVisible: 0,
      partiallyVisible: 0,
      linesDrawn: 0,
      triangleArea: 0,
      mirroredPixels: 0,
      centersDrawn: 0,
      averageMirrored: 0,
    });

    stats.recordArea(referenceTriangle(5, SCREEN_VIEWPORT));
    expect(stats.snapshot().triangleArea).toBe(8);
  });
});

describe('formatOverlay', () => {
  const frame = {
    visible: 40,
    fullyVisible: 22,
    partiallyVisible: 18,
    linesDrawn: 57,
    triangleArea: 8,
    mirroredPixels: 90,
    centersDrawn: 30,
    averageMirrored: 3,
  };

  it('formats the mirror readout on one line', () => {
    expect(formatOverlay(frame, 'mirror')).toEqual(['A:8 #3 T:30']);
  });

  it('formats the outline readout on two lines', () => {
    expect(formatOverlay(frame, 'outline')).toEqual(['V:40 F:22 P:18', 'L:57 A:8']);
  });
});
