/**
 * Edge drawing for the grid.
 *
 * Two styles share one edge set and are never mixed within a frame:
 * - dashed: each triangle strokes its own three edges with a dash-dot stipple;
 * - solid: every shared edge is emitted exactly once by ownership.
 */

import { Canvas, Point, TriangleVertices, Viewport } from './types.js';
import { triangleHeight } from './math/triangle.js';

/** ". .. " : draw, skip, draw, draw, skip. */
export const DASH_DOT_PATTERN: readonly number[] = [1, 0, 1, 1, 0];

export type Edge = readonly [Point, Point];

/**
 * Walk the pixels of a digital line from (x0, y0) to (x1, y1), both ends
 * included. `visit` receives each pixel and its position along the path.
 */
export function walkLine(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  visit: (x: number, y: number, step: number) => void
): number {
  const dx = Math.abs(x1 - x0);
  const dy = Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  let err = dx - dy;

  let x = x0;
  let y = y0;
  let step = 0;

  for (;;) {
    visit(x, y, step);
    step++;

    if (x === x1 && y === y1) break;

    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      x += sx;
    }
    if (e2 < dx) {
      err += dx;
      y += sy;
    }
  }

  return step;
}

/**
 * Stroke a line with a cyclic stipple. The phase follows the position along
 * the path, not the absolute coordinate, and restarts at every call.
 * Returns the number of pixels drawn.
 */
export function drawPatternedLine(
  canvas: Canvas,
  a: Point,
  b: Point,
  pattern: readonly number[] = DASH_DOT_PATTERN
): number {
  let drawn = 0;
  walkLine(a.x, a.y, b.x, b.y, (x, y, step) => {
    if (pattern[step % pattern.length]) {
      canvas.drawPoint(x, y);
      drawn++;
    }
  });
  return drawn;
}

/** The three edges of a triangle in winding order. */
export function triangleEdges(v: TriangleVertices): [Edge, Edge, Edge] {
  return [
    [v[0], v[1]],
    [v[1], v[2]],
    [v[2], v[0]],
  ];
}

/** Stroke all three edges dashed. Returns the number of edges drawn. */
export function drawDashedOutline(canvas: Canvas, v: TriangleVertices): number {
  const edges = triangleEdges(v);
  for (const [a, b] of edges) {
    drawPatternedLine(canvas, a, b);
  }
  return edges.length;
}

/**
 * Diagonal edges owned by a triangle under the solid-grid convention: a
 * pointing-right triangle owns top-to-apex and bottom-to-apex, a pointing-left
 * triangle owns nothing (its diagonals belong to its pointing-right
 * neighbours, its vertical side to a seam).
 */
export function ownedDiagonals(v: TriangleVertices, pointingRight: boolean): Edge[] {
  if (!pointingRight) return [];
  return [
    [v[0], v[2]],
    [v[1], v[2]],
  ];
}

/**
 * One full-height vertical line per seam position, `columns + 1` in total,
 * independent of triangle orientation.
 */
export function seamEdges(columns: number, sideLength: number, viewport: Viewport): Edge[] {
  const h = triangleHeight(sideLength);
  const edges: Edge[] = [];
  for (let col = 0; col <= columns; col++) {
    const x = Math.trunc(Math.fround(col * h));
    edges.push([
      { x, y: 0 },
      { x, y: viewport.height - 1 },
    ]);
  }
  return edges;
}

/** Stroke edges solid. Returns the number of lines drawn. */
export function drawSolidEdges(canvas: Canvas, edges: readonly Edge[]): number {
  for (const [a, b] of edges) {
    canvas.drawLine(a.x, a.y, b.x, b.y);
  }
  return edges.length;
}
