/**
 * In-memory 1-bit framebuffer implementing the Canvas contract.
 *
 * Both front ends draw into one of these and then blit it; tests inspect it
 * directly. Text is recorded as runs rather than rasterised, leaving glyph
 * rendering to whatever presents the frame.
 */

import { Canvas, Color } from './types.js';
import { walkLine } from './lines.js';

export interface TextRun {
  x: number;
  y: number;
  text: string;
}

export class BitmapCanvas implements Canvas {
  private readonly pixels: Uint8Array;
  private readonly runs: TextRun[] = [];
  private ink = 1;

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    this.pixels = new Uint8Array(width * height);
  }

  clear(): void {
    this.pixels.fill(0);
    this.runs.length = 0;
    this.ink = 1;
  }

  setForeground(color: Color): void {
    this.ink = color === 'black' ? 1 : 0;
  }

  drawPoint(x: number, y: number): void {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return;
    this.pixels[y * this.width + x] = this.ink;
  }

  drawLine(x0: number, y0: number, x1: number, y1: number): void {
    walkLine(x0, y0, x1, y1, (x, y) => this.drawPoint(x, y));
  }

  drawFilledDisc(cx: number, cy: number, radius: number): void {
    const r2 = radius * radius;
    for (let dy = -radius; dy <= radius; dy++) {
      for (let dx = -radius; dx <= radius; dx++) {
        if (dx * dx + dy * dy <= r2) this.drawPoint(cx + dx, cy + dy);
      }
    }
  }

  drawFilledRect(x: number, y: number, width: number, height: number): void {
    for (let py = y; py < y + height; py++) {
      for (let px = x; px < x + width; px++) {
        this.drawPoint(px, py);
      }
    }
  }

  drawText(x: number, y: number, text: string): void {
    this.runs.push({ x, y, text });
  }

  /** True when the pixel is lit (foreground). Out-of-range reads are unlit. */
  getPixel(x: number, y: number): boolean {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return false;
    return this.pixels[y * this.width + x] === 1;
  }

  litCount(): number {
    let n = 0;
    for (let i = 0; i < this.pixels.length; i++) n += this.pixels[i];
    return n;
  }

  get textRuns(): readonly TextRun[] {
    return this.runs;
  }
}
