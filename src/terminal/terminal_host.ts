/**
 * ViewHost that draws the framebuffer into an ANSI terminal.
 */

import { BitmapCanvas } from '../core/bitmap_canvas.js';
import { ViewHost } from '../core/types.js';
import { renderBraille } from './braille.js';

const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CLEAR_SCREEN = '\x1b[2J';
const HOME = '\x1b[H';

export interface TextSink {
  write(chunk: string): unknown;
}

export class TerminalHost implements ViewHost {
  private canvas: BitmapCanvas | null = null;
  private _frames = 0;

  constructor(
    private readonly out: TextSink,
    private readonly width: number,
    private readonly height: number
  ) {}

  get frames(): number {
    return this._frames;
  }

  open(): BitmapCanvas | null {
    if (this.width <= 0 || this.height <= 0) return null;
    this.canvas = new BitmapCanvas(this.width, this.height);
    this.out.write(HIDE_CURSOR + CLEAR_SCREEN);
    return this.canvas;
  }

  present(): void {
    if (!this.canvas) return;
    this.out.write(HOME + renderBraille(this.canvas).join('\n') + '\n');
    this._frames++;
  }

  close(): void {
    if (!this.canvas) return;
    this.canvas = null;
    this.out.write(SHOW_CURSOR);
  }
}
