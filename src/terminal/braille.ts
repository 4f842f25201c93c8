// Braille rendering of a 1-bit framebuffer: every terminal cell shows a
// 2x4 block of pixels, so 128x64 becomes 64 columns by 16 rows.

import { BitmapCanvas } from '../core/bitmap_canvas.js';

const BRAILLE_BASE = 0x2800;
const CELL_W = 2;
const CELL_H = 4;

// Dot bit for pixel (dx, dy) inside a cell, indexed [dy][dx].
const DOT_BITS: readonly (readonly [number, number])[] = [
  [0x01, 0x08],
  [0x02, 0x10],
  [0x04, 0x20],
  [0x40, 0x80],
];

export function brailleCell(canvas: BitmapCanvas, cellX: number, cellY: number): string {
  let bits = 0;
  for (let dy = 0; dy < CELL_H; dy++) {
    for (let dx = 0; dx < CELL_W; dx++) {
      if (canvas.getPixel(cellX * CELL_W + dx, cellY * CELL_H + dy)) {
        bits |= DOT_BITS[dy][dx];
      }
    }
  }
  return String.fromCharCode(BRAILLE_BASE + bits);
}

/**
 * Render the framebuffer as lines of braille characters. Recorded text runs
 * are written over the cells they start in, clipped at the right edge.
 */
export function renderBraille(canvas: BitmapCanvas): string[] {
  const cols = Math.ceil(canvas.width / CELL_W);
  const rows = Math.ceil(canvas.height / CELL_H);

  const grid: string[][] = [];
  for (let cy = 0; cy < rows; cy++) {
    const line: string[] = [];
    for (let cx = 0; cx < cols; cx++) {
      line.push(brailleCell(canvas, cx, cy));
    }
    grid.push(line);
  }

  for (const run of canvas.textRuns) {
    const row = Math.max(0, Math.floor((run.y - 1) / CELL_H));
    if (row >= rows) continue;
    const col = Math.floor(run.x / CELL_W);
    for (let i = 0; i < run.text.length && col + i < cols; i++) {
      if (col + i >= 0) grid[row][col + i] = run.text[i];
    }
  }

  return grid.map((line) => line.join(''));
}
