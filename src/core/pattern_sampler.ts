/**
 * Mirror-mode pattern: random points sampled once inside the reference
 * triangle, then translated into every visible triangle by the offset between
 * the two centroids.
 *
 * This is a rigid translation, not an axis flip: every triangle shows the
 * same relative pattern regardless of its orientation.
 */

import { Canvas, Point, RenderConfig, TriangleVertices, Viewport } from './types.js';
import { RandomSource } from './rng.js';
import { SampleBuffer } from './sample_buffer.js';
import { referenceTriangle, triangleCentroid } from './math/triangle.js';
import { pointInTriangle } from './selection/point_in_triangle.js';

export interface SampleResult {
  attempts: number;
  accepted: number;
}

export class PatternSampler {
  private reference: TriangleVertices;
  private refCentroid: Point;

  constructor(
    readonly buffer: SampleBuffer,
    private readonly rng: RandomSource,
    private readonly viewport: Viewport,
    sideLength: number
  ) {
    this.reference = referenceTriangle(sideLength, viewport);
    this.refCentroid = triangleCentroid(this.reference);
  }

  get referenceVertices(): TriangleVertices {
    return this.reference;
  }

  get referenceCentroid(): Point {
    return this.refCentroid;
  }

  /**
   * Refill the buffer for the current side length and sample count.
   *
   * Each attempt draws one integer point from the reference triangle's
   * bounding box and keeps it only when it falls inside the triangle and is
   * not the centroid (reserved for the centre marker). Rejected attempts are
   * not retried, so fewer points than requested is a normal outcome.
   */
  regenerate(config: Pick<RenderConfig, 'sideLength' | 'numRandomPixels'>): SampleResult {
    this.reference = referenceTriangle(config.sideLength, this.viewport);
    this.refCentroid = triangleCentroid(this.reference);
    this.buffer.reset();

    const [top, bottom, apex] = this.reference;
    const spanX = apex.x - top.x + 1;
    const spanY = bottom.y - top.y + 1;

    let attempts = 0;
    for (let i = 0; i < config.numRandomPixels && !this.buffer.isFull; i++) {
      attempts++;
      const p = {
        x: top.x + this.rng.int(spanX),
        y: top.y + this.rng.int(spanY),
      };

      if (!pointInTriangle(p, this.reference)) continue;
      if (p.x === this.refCentroid.x && p.y === this.refCentroid.y) continue;

      this.buffer.push(p.x, p.y);
    }

    return { attempts, accepted: this.buffer.length };
  }

  /** Translate stored point `index` into the triangle centred on `target`. */
  mirrorPoint(index: number, target: Point): Point {
    return {
      x: target.x + (this.buffer.xAt(index) - this.refCentroid.x),
      y: target.y + (this.buffer.yAt(index) - this.refCentroid.y),
    };
  }

  /**
   * Draw the whole pattern into the triangle centred on `target`.
   * Returns the number of points that landed inside the viewport.
   */
  drawMirrored(canvas: Canvas, target: Point): number {
    const { width, height } = this.viewport;
    let drawn = 0;

    for (let i = 0; i < this.buffer.length; i++) {
      const m = this.mirrorPoint(i, target);
      if (m.x >= 0 && m.x < width && m.y >= 0 && m.y < height) {
        canvas.drawPoint(m.x, m.y);
        drawn++;
      }
    }

    return drawn;
  }
}
