import type { InputKey } from '../core/types.js';

/** Map a KeyboardEvent.key value to a device key; null for keys we ignore. */
export function inputKeyFromKeyboard(key: string): InputKey | null {
  switch (key) {
    case 'ArrowUp':
      return 'up';
    case 'ArrowDown':
      return 'down';
    case 'ArrowLeft':
      return 'left';
    case 'ArrowRight':
      return 'right';
    case 'Enter':
    case ' ':
      return 'ok';
    case 'Escape':
    case 'Backspace':
      return 'back';
    default:
      return null;
  }
}
