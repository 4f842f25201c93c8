/**
 * ViewHost that blits the 1-bit framebuffer onto an HTML canvas.
 * Each device pixel becomes a `scale` x `scale` block.
 */

import { BitmapCanvas } from '../core/bitmap_canvas.js';
import { ViewHost } from '../core/types.js';

const LIT = '#1b1b1b';
const UNLIT = '#f0a830';

export class HtmlCanvasHost implements ViewHost {
  private framebuffer: BitmapCanvas | null = null;
  private ctx: CanvasRenderingContext2D | null = null;

  constructor(
    private readonly canvas: HTMLCanvasElement,
    private readonly width: number,
    private readonly height: number,
    private readonly scale = 6
  ) {}

  open(): BitmapCanvas | null {
    const ctx = this.canvas.getContext('2d');
    if (!ctx) return null;

    this.canvas.width = this.width * this.scale;
    this.canvas.height = this.height * this.scale;
    this.ctx = ctx;
    this.framebuffer = new BitmapCanvas(this.width, this.height);
    return this.framebuffer;
  }

  present(): void {
    const ctx = this.ctx;
    const fb = this.framebuffer;
    if (!ctx || !fb) return;

    const s = this.scale;
    ctx.fillStyle = UNLIT;
    ctx.fillRect(0, 0, this.canvas.width, this.canvas.height);

    ctx.fillStyle = LIT;
    for (let y = 0; y < fb.height; y++) {
      for (let x = 0; x < fb.width; x++) {
        if (fb.getPixel(x, y)) ctx.fillRect(x * s, y * s, s, s);
      }
    }

    // Text runs are recorded, not rasterised; draw them with a canvas font.
    ctx.font = `${6 * s}px monospace`;
    ctx.textBaseline = 'alphabetic';
    for (const run of fb.textRuns) {
      ctx.fillText(run.text, run.x * s, run.y * s);
    }
  }

  close(): void {
    this.ctx = null;
    this.framebuffer = null;
  }
}
