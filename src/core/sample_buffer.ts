/**
 * Fixed-capacity point buffer backing the mirror pattern.
 *
 * Points are stored interleaved in one Int32Array: [x0, y0, x1, y1, ...].
 * The array is allocated once for the whole session; regeneration resets the
 * logical length and refills it, the storage never grows.
 */

import { ResourceAcquisitionError } from '../errors.js';
import { Point } from './types.js';

export class SampleBuffer implements Iterable<Point> {
  private readonly coords: Int32Array;
  private _length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ResourceAcquisitionError(`sample buffer capacity must be a positive integer (got ${capacity})`);
    }
    this.coords = new Int32Array(capacity * 2);
  }

  get length(): number {
    return this._length;
  }

  get isFull(): boolean {
    return this._length >= this.capacity;
  }

  /** Drop all points; the storage is kept. */
  reset(): void {
    this._length = 0;
  }

  /** Append a point. Returns false (and stores nothing) when full. */
  push(x: number, y: number): boolean {
    if (this.isFull) return false;
    const i = this._length * 2;
    this.coords[i] = x;
    this.coords[i + 1] = y;
    this._length++;
    return true;
  }

  xAt(index: number): number {
    return this.coords[index * 2];
  }

  yAt(index: number): number {
    return this.coords[index * 2 + 1];
  }

  at(index: number): Point | undefined {
    if (index < 0 || index >= this._length) return undefined;
    return { x: this.xAt(index), y: this.yAt(index) };
  }

  *[Symbol.iterator](): IterableIterator<Point> {
    for (let i = 0; i < this._length; i++) {
      yield { x: this.xAt(i), y: this.yAt(i) };
    }
  }
}
