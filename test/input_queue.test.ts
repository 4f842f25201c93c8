import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { QueuedInputSource } from '../src/controller/input_queue.js';
import { KeyClassifier } from '../src/controller/key_classifier.js';
import { press } from './support/fakes.js';

describe('QueuedInputSource', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('delivers queued events in order', async () => {
    const queue = new QueuedInputSource();
    queue.push(press('up'));
    queue.push(press('ok'));

    expect(queue.size).toBe(2);
    await expect(queue.poll(100)).resolves.toEqual(press('up'));
    await expect(queue.poll(100)).resolves.toEqual(press('ok'));
    expect(queue.size).toBe(0);
  });

  it('resolves null when the timeout passes', async () => {
    const queue = new QueuedInputSource();
    const pending = queue.poll(100);

    await vi.advanceTimersByTimeAsync(100);
    await expect(pending).resolves.toBeNull();
  });

  it('hands an event straight to a waiting poll', async () => {
    const queue = new QueuedInputSource();
    const pending = queue.poll(100);

    await vi.advanceTimersByTimeAsync(50);
    queue.push(press('left'));

    await expect(pending).resolves.toEqual(press('left'));
    expect(queue.size).toBe(0);
  });

  it('drops the oldest event when full', async () => {
    const queue = new QueuedInputSource(2);
    queue.push(press('up'));
    queue.push(press('down'));
    queue.push(press('right'));

    expect(queue.dropped).toBe(1);
    await expect(queue.poll(100)).resolves.toEqual(press('down'));
    await expect(queue.poll(100)).resolves.toEqual(press('right'));
  });

  it('rejects a second concurrent poll', async () => {
    const queue = new QueuedInputSource();
    const first = queue.poll(100);

    await expect(queue.poll(100)).rejects.toThrow('another poll is already waiting');
    queue.close();
    await expect(first).resolves.toEqual(press('back'));
  });

  it('refuses events after close but drains what it holds', async () => {
    const queue = new QueuedInputSource();
    queue.push(press('up'));
    queue.close();

    expect(queue.push(press('down'))).toBe(false);
    await expect(queue.poll(100)).resolves.toEqual(press('up'));
    await expect(queue.poll(100)).resolves.toEqual(press('back'));
  });

  it('answers every poll after close with Back instead of a timeout', async () => {
    const queue = new QueuedInputSource();
    queue.close();

    await expect(queue.poll(100)).resolves.toEqual(press('back'));
    await expect(queue.poll(100)).resolves.toEqual(press('back'));
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('KeyClassifier', () => {
  it('turns a held Ok into press, long, then repeats', () => {
    const keys = new KeyClassifier();
    expect(keys.keyDown('ok', false)).toEqual({ key: 'ok', kind: 'press' });
    expect(keys.keyDown('ok', true)).toEqual({ key: 'ok', kind: 'long' });
    expect(keys.keyDown('ok', true)).toEqual({ key: 'ok', kind: 'repeat' });
  });

  it('reports directional holds as repeats', () => {
    const keys = new KeyClassifier();
    keys.keyDown('up', false);
    expect(keys.keyDown('up', true)).toEqual({ key: 'up', kind: 'repeat' });
  });

  it('allows another long press after release', () => {
    const keys = new KeyClassifier();
    keys.keyDown('ok', false);
    keys.keyDown('ok', true);
    keys.keyUp();

    expect(keys.keyDown('ok', true)).toEqual({ key: 'ok', kind: 'long' });
  });
});
