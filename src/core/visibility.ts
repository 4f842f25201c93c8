/**
 * Viewport culling and grid enumeration.
 */

import { TriangleVertices, Viewport } from './types.js';
import { isPointingRight, triangleHeight, triangleVertices } from './math/triangle.js';

export type Visibility = 'hidden' | 'partial' | 'full';

export interface GridExtent {
  /** Columns are enumerated as 0..columns-1. */
  columns: number;
  /** Rows are enumerated as -rows..rows-1, symmetric around the center line. */
  rows: number;
}

export interface GridCell {
  col: number;
  row: number;
  pointingRight: boolean;
  vertices: TriangleVertices;
}

/**
 * Conservative visibility test: a triangle is hidden only when all three
 * vertices lie beyond the same viewport side. A triangle whose vertices are
 * all outside on different sides still counts as visible.
 */
export function isTriangleVisible(v: TriangleVertices, viewport: Viewport): boolean {
  const { width, height } = viewport;
  if (v[0].x < 0 && v[1].x < 0 && v[2].x < 0) return false;
  if (v[0].x >= width && v[1].x >= width && v[2].x >= width) return false;
  if (v[0].y < 0 && v[1].y < 0 && v[2].y < 0) return false;
  if (v[0].y >= height && v[1].y >= height && v[2].y >= height) return false;
  return true;
}

/** True when every vertex lies inside [0,width) x [0,height). */
export function isTriangleFullyVisible(v: TriangleVertices, viewport: Viewport): boolean {
  for (const p of v) {
    if (p.x < 0 || p.x >= viewport.width || p.y < 0 || p.y >= viewport.height) {
      return false;
    }
  }
  return true;
}

export function classifyVisibility(v: TriangleVertices, viewport: Viewport): Visibility {
  if (!isTriangleVisible(v, viewport)) return 'hidden';
  return isTriangleFullyVisible(v, viewport) ? 'full' : 'partial';
}

/**
 * Number of columns and rows to enumerate. The +2 overscan keeps triangles
 * clipped by truncation at the edges in the enumeration.
 */
export function gridExtent(sideLength: number, viewport: Viewport): GridExtent {
  const h = triangleHeight(sideLength);
  return {
    columns: Math.floor(viewport.width / h) + 2,
    rows: Math.floor(viewport.height / (sideLength / 2)) + 2,
  };
}

/**
 * Enumerate every grid cell in column-major order, visible or not.
 * Callers cull with `isTriangleVisible`.
 */
export function* enumerateCells(sideLength: number, viewport: Viewport): Generator<GridCell> {
  const { columns, rows } = gridExtent(sideLength, viewport);
  for (let col = 0; col < columns; col++) {
    for (let row = -rows; row < rows; row++) {
      const pointingRight = isPointingRight(col, row);
      yield {
        col,
        row,
        pointingRight,
        vertices: triangleVertices(col, row, sideLength, pointingRight, viewport.centerY),
      };
    }
  }
}
