import type { InputEvent, InputKey } from '../core/types.js';

/**
 * Turns key-down notifications into press / repeat / long events.
 *
 * The first key-down of a hold is a press. Auto-repeated key-downs of Ok
 * become a single long press followed by repeats; for every other key they
 * are plain repeats.
 */
export class KeyClassifier {
  private longSent = false;

  keyDown(key: InputKey, autoRepeat: boolean): InputEvent {
    if (!autoRepeat) {
      this.longSent = false;
      return { key, kind: 'press' };
    }

    if (key === 'ok' && !this.longSent) {
      this.longSent = true;
      return { key, kind: 'long' };
    }

    return { key, kind: 'repeat' };
  }

  /** Key released: the next auto-repeat of Ok may produce a long press again. */
  keyUp(): void {
    this.longSent = false;
  }
}
