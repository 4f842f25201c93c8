/**
 * Triangle grid geometry.
 *
 * All positions are truncated to integers exactly where the display firmware
 * truncates them: vertex offsets, row pitch, centroid and area. Rounding
 * instead of truncating shifts the vertical seams and breaks the tiling.
 */

import { Point, TriangleVertices, Viewport } from '../types.js';

/** sqrt(3)/2 at single precision. */
const SQRT3_OVER_2 = Math.fround(0.866025404);

/**
 * Height of an equilateral triangle with the given side length.
 * This is the horizontal pitch of the grid columns.
 */
export function triangleHeight(sideLength: number): number {
  return Math.fround(sideLength * SQRT3_OVER_2);
}

/** Orientation of the triangle at a grid cell; alternates like a checkerboard. */
export function isPointingRight(col: number, row: number): boolean {
  return ((col + row) & 1) === 0;
}

/**
 * Vertices of the triangle at (col, row).
 *
 * Pointing right `|>`: top-left, bottom-left, apex on the right.
 * Pointing left `<|`: apex on the left, top-right, bottom-right.
 */
export function triangleVertices(
  col: number,
  row: number,
  sideLength: number,
  pointingRight: boolean,
  centerY: number
): TriangleVertices {
  const h = triangleHeight(sideLength);
  const baseX = Math.trunc(Math.fround(col * h));
  const baseY = centerY + Math.trunc((row * sideLength) / 2);
  const half = Math.trunc(sideLength / 2);
  const hi = Math.trunc(h);

  if (pointingRight) {
    return [
      { x: baseX, y: baseY - half },
      { x: baseX, y: baseY + half },
      { x: baseX + hi, y: baseY },
    ];
  }

  return [
    { x: baseX, y: baseY },
    { x: baseX + hi, y: baseY - half },
    { x: baseX + hi, y: baseY + half },
  ];
}

/** The (col=0, row=0, pointing-right) triangle every pattern is sampled from. */
export function referenceTriangle(sideLength: number, viewport: Viewport): TriangleVertices {
  return triangleVertices(0, 0, sideLength, true, viewport.centerY);
}

/** Integer-truncated mean of the three vertices. */
export function triangleCentroid(v: TriangleVertices): Point {
  return {
    x: Math.trunc((v[0].x + v[1].x + v[2].x) / 3),
    y: Math.trunc((v[0].y + v[1].y + v[2].y) / 3),
  };
}

/**
 * Shoelace area, halved with truncation. All grid triangles are congruent, so
 * one value describes the whole frame.
 */
export function triangleArea(v: TriangleVertices): number {
  const twice =
    v[0].x * (v[1].y - v[2].y) +
    v[1].x * (v[2].y - v[0].y) +
    v[2].x * (v[0].y - v[1].y);
  return Math.trunc(Math.abs(twice) / 2);
}
