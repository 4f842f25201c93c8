/**
 * Bounded FIFO of input events with a timed poll.
 *
 * Front ends push raw key events from their own callbacks; the session pulls
 * them one at a time. When the queue is full the oldest event is dropped.
 * Once closed and drained, every poll yields Back so the session ends.
 */

import type { InputEvent, InputSource } from '../core/types.js';

const END_OF_INPUT: InputEvent = { key: 'back', kind: 'press' };

interface PendingPoll {
  resolve: (event: InputEvent | null) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class QueuedInputSource implements InputSource {
  private readonly queue: InputEvent[] = [];
  private pending: PendingPoll | null = null;
  private closed = false;
  private _dropped = 0;

  constructor(readonly capacity = 8) {}

  /** Events discarded because the queue was full. */
  get dropped(): number {
    return this._dropped;
  }

  get size(): number {
    return this.queue.length;
  }

  /** Enqueue an event. Returns false once the source is closed. */
  push(event: InputEvent): boolean {
    if (this.closed) return false;

    if (this.pending) {
      const { resolve, timer } = this.pending;
      this.pending = null;
      clearTimeout(timer);
      resolve(event);
      return true;
    }

    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this._dropped++;
    }
    this.queue.push(event);
    return true;
  }

  poll(timeoutMs: number): Promise<InputEvent | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve({ ...END_OF_INPUT });
    if (this.pending) {
      return Promise.reject(new Error('QueuedInputSource.poll: another poll is already waiting'));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(null);
      }, timeoutMs);
      this.pending = { resolve, timer };
    });
  }

  /** Stop accepting events; a waiting poll resolves with Back. */
  close(): void {
    this.closed = true;
    if (this.pending) {
      const { resolve, timer } = this.pending;
      this.pending = null;
      clearTimeout(timer);
      resolve({ ...END_OF_INPUT });
    }
  }
}
