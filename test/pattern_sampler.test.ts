import { describe, expect, it } from 'vitest';
import { BitmapCanvas } from '../src/core/bitmap_canvas.js';
import { PatternSampler } from '../src/core/pattern_sampler.js';
import { SeededRNG } from '../src/core/rng.js';
import { SampleBuffer } from '../src/core/sample_buffer.js';
import { pointInTriangle } from '../src/core/selection/point_in_triangle.js';
import { triangleCentroid, triangleVertices } from '../src/core/math/triangle.js';
import { ResourceAcquisitionError } from '../src/errors.js';
import { MAX_PIXELS, SCREEN_VIEWPORT } from '../src/core/types.js';
import { ScriptedRandom } from './support/fakes.js';

describe('SampleBuffer', () => {
  it('stores points up to its capacity', () => {
    const buf = new SampleBuffer(3);
    expect(buf.push(1, 2)).toBe(true);
    expect(buf.push(3, 4)).toBe(true);
    expect(buf.push(5, 6)).toBe(true);
    expect(buf.push(7, 8)).toBe(false);

    expect(buf.length).toBe(3);
    expect(buf.isFull).toBe(true);
    expect([...buf]).toEqual([
      { x: 1, y: 2 },
      { x: 3, y: 4 },
      { x: 5, y: 6 },
    ]);
  });

  it('resets the logical length and refills in place', () => {
    const buf = new SampleBuffer(2);
    buf.push(1, 1);
    buf.push(2, 2);
    buf.reset();

    expect(buf.length).toBe(0);
    expect(buf.at(0)).toBeUndefined();

    buf.push(9, -3);
    expect(buf.at(0)).toEqual({ x: 9, y: -3 });
    expect(buf.capacity).toBe(2);
  });

  it('refuses a capacity it cannot allocate', () => {
    expect(() => new SampleBuffer(0)).toThrow(ResourceAcquisitionError);
    expect(() => new SampleBuffer(2.5)).toThrow(ResourceAcquisitionError);
  });
});

describe('PatternSampler.regenerate', () => {
  const makeSampler = (rng: ScriptedRandom | SeededRNG, capacity = MAX_PIXELS): PatternSampler =>
    new PatternSampler(new SampleBuffer(capacity), rng, SCREEN_VIEWPORT, 5);

  it('keeps inside points, skips outside points and the centroid, never retries', () => {
    // Side 5: reference (0,29) (0,33) (4,31), centroid (1,31), box 5x5 from (0,29).
    const rng = new ScriptedRandom([
      0, 0, // (0,29) vertex: kept
      4, 0, // (4,29) outside
      1, 2, // (1,31) centroid
      2, 2, // (2,31) inside
    ]);
    const sampler = makeSampler(rng);

    const result = sampler.regenerate({ sideLength: 5, numRandomPixels: 4 });

    expect(result).toEqual({ attempts: 4, accepted: 2 });
    expect([...sampler.buffer]).toEqual([
      { x: 0, y: 29 },
      { x: 2, y: 31 },
    ]);
    expect(sampler.referenceCentroid).toEqual({ x: 1, y: 31 });
  });

  it('is empty when no pixels are requested', () => {
    const rng = new ScriptedRandom([0]);
    const sampler = makeSampler(rng);

    expect(sampler.regenerate({ sideLength: 5, numRandomPixels: 0 })).toEqual({ attempts: 0, accepted: 0 });
    expect(sampler.buffer.length).toBe(0);
    expect(rng.calls).toBe(0);
  });

  it('overwrites the previous sample instead of appending', () => {
    const sampler = makeSampler(new SeededRNG(3));
    sampler.regenerate({ sideLength: 21, numRandomPixels: 60 });
    const first = sampler.buffer.length;
    expect(first).toBeGreaterThan(0);

    sampler.regenerate({ sideLength: 21, numRandomPixels: 1 });
    expect(sampler.buffer.length).toBeLessThanOrEqual(1);
  });

  it('stops once the buffer is full', () => {
    // Every attempt lands on the vertex (0,29), which is always accepted.
    const rng = new ScriptedRandom([0]);
    const sampler = makeSampler(rng, 3);

    const result = sampler.regenerate({ sideLength: 5, numRandomPixels: 50 });
    expect(result).toEqual({ attempts: 3, accepted: 3 });
  });

  it('keeps 0 <= length <= min(requested, capacity) with accepted points inside', () => {
    const rng = new SeededRNG(1234);
    const sampler = makeSampler(rng);

    for (const sideLength of [5, 9, 21, 41, 63]) {
      for (const numRandomPixels of [0, 1, 7, 150, 200, 450]) {
        sampler.regenerate({ sideLength, numRandomPixels });
        const ref = sampler.referenceVertices;
        const c0 = sampler.referenceCentroid;

        expect(sampler.buffer.length).toBeGreaterThanOrEqual(0);
        expect(sampler.buffer.length).toBeLessThanOrEqual(Math.min(numRandomPixels, MAX_PIXELS));
        for (const p of sampler.buffer) {
          expect(pointInTriangle(p, ref)).toBe(true);
          expect(p.x === c0.x && p.y === c0.y).toBe(false);
        }
      }
    }
  });

  it('is reproducible from a seed', () => {
    const a = makeSampler(new SeededRNG(99));
    const b = makeSampler(new SeededRNG(99));
    a.regenerate({ sideLength: 33, numRandomPixels: 80 });
    b.regenerate({ sideLength: 33, numRandomPixels: 80 });
    expect([...a.buffer]).toEqual([...b.buffer]);
  });
});

describe('PatternSampler mirroring', () => {
  const sampler = new PatternSampler(
    new SampleBuffer(MAX_PIXELS),
    new ScriptedRandom([0, 0, 2, 2]),
    SCREEN_VIEWPORT,
    5
  );
  sampler.regenerate({ sideLength: 5, numRandomPixels: 2 });

  it('translates by the centroid offset', () => {
    const target = triangleCentroid(triangleVertices(1, 0, 5, false, 31));
    expect(target).toEqual({ x: 6, y: 31 });
    expect(sampler.mirrorPoint(0, target)).toEqual({ x: 5, y: 29 });
    expect(sampler.mirrorPoint(1, target)).toEqual({ x: 7, y: 31 });
  });

  it('maps every point to cT + (p - c0)', () => {
    const c0 = sampler.referenceCentroid;
    for (const target of [{ x: 40, y: 12 }, { x: 0, y: 0 }, { x: 127, y: 63 }]) {
      for (let i = 0; i < sampler.buffer.length; i++) {
        const p = sampler.buffer.at(i);
        expect(sampler.mirrorPoint(i, target)).toEqual({
          x: target.x + ((p?.x ?? 0) - c0.x),
          y: target.y + ((p?.y ?? 0) - c0.y),
        });
      }
    }
  });

  it('draws only the points that land in the viewport', () => {
    const canvas = new BitmapCanvas(128, 64);
    // (0,29) -> (-1,-2) is clipped, (2,31) -> (1,0) is drawn.
    expect(sampler.drawMirrored(canvas, { x: 0, y: 0 })).toBe(1);
    expect(canvas.getPixel(1, 0)).toBe(true);
    expect(canvas.litCount()).toBe(1);
  });
});
