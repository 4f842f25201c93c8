/**
 * stdin keypress source for the terminal front end.
 *
 * Terminals report neither key releases nor auto-repeat, so every key is a
 * press; `l` stands in for holding Ok.
 */

import { emitKeypressEvents } from 'readline';
import type { InputEvent } from '../core/types.js';
import { QueuedInputSource } from '../controller/input_queue.js';

export interface KeypressInfo {
  name?: string;
  ctrl?: boolean;
}

export function inputEventFromKeypress(key: KeypressInfo): InputEvent | null {
  if (key.ctrl && key.name === 'c') return { key: 'back', kind: 'press' };

  switch (key.name) {
    case 'up':
    case 'down':
    case 'left':
    case 'right':
      return { key: key.name, kind: 'press' };
    case 'return':
    case 'enter':
    case 'space':
      return { key: 'ok', kind: 'press' };
    case 'l':
      return { key: 'ok', kind: 'long' };
    case 'escape':
    case 'backspace':
    case 'q':
      return { key: 'back', kind: 'press' };
    default:
      return null;
  }
}

/**
 * Feed keypresses from a TTY stream into the queue. Returns a function that
 * restores the stream.
 */
export function attachKeypressInput(stream: NodeJS.ReadStream, queue: QueuedInputSource): () => void {
  emitKeypressEvents(stream);
  if (stream.isTTY) stream.setRawMode(true);

  const onKeypress = (_str: string | undefined, key: KeypressInfo | undefined): void => {
    if (!key) return;
    const event = inputEventFromKeypress(key);
    if (event) queue.push(event);
  };

  stream.on('keypress', onKeypress);
  stream.resume();

  return () => {
    stream.off('keypress', onKeypress);
    if (stream.isTTY) stream.setRawMode(false);
    stream.pause();
  };
}
