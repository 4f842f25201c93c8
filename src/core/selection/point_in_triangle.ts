/**
 * Point-in-triangle test using barycentric coordinates.
 */

import { Point, TriangleVertices } from '../types.js';

/**
 * Test if a point lies inside a triangle.
 *
 * Boundary rule: points exactly on an edge or vertex are considered INSIDE.
 * A degenerate (zero-area) triangle contains nothing.
 */
export function pointInTriangle(p: Point, v: TriangleVertices): boolean {
  const { x: x0, y: y0 } = v[0];
  const { x: x1, y: y1 } = v[1];
  const { x: x2, y: y2 } = v[2];

  const denom = (y1 - y2) * (x0 - x2) + (x2 - x1) * (y0 - y2);
  if (denom === 0) return false;

  const a = ((y1 - y2) * (p.x - x2) + (x2 - x1) * (p.y - y2)) / denom;
  const b = ((y2 - y0) * (p.x - x2) + (x0 - x2) * (p.y - y2)) / denom;
  const c = 1 - a - b;

  return a >= 0 && a <= 1 && b >= 0 && b <= 1 && c >= 0 && c <= 1;
}

