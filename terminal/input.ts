/**
 * Raw terminal input decoding.
 *
 * Input is a latin1 string, one code unit per byte. Escape sequences that
 * are cut short or unknown decode to a single Escape key.
 */

import { charKey, namedKey, type KeyEvent, type NamedKey } from '../core/input/keys';

const ESC_CODE = 27;

// Sequences following ESC
const ESCAPE_SEQUENCES: Partial<Record<string, NamedKey>> = {
  '[A': 'MoveUp',
  '[B': 'MoveDown',
  '[C': 'MoveRight',
  '[D': 'MoveLeft',
  '[H': 'Home',
  '[F': 'End',
  'OH': 'Home',
  'OF': 'End',
  '[1~': 'Home',
  '[3~': 'Delete',
  '[4~': 'End',
  '[5~': 'PageUp',
  '[6~': 'PageDown',
  '[7~': 'Home',
  '[8~': 'End',
};

const CONTROL_KEYS: Partial<Record<number, NamedKey>> = {
  6: 'Find',       // Ctrl-F
  8: 'Backspace',  // Ctrl-H
  12: 'Redraw',    // Ctrl-L
  13: 'Enter',
  17: 'Quit',      // Ctrl-Q
  19: 'Save',      // Ctrl-S
  127: 'Backspace',
};

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Length of the escape sequence at `at` (ESC included) and its key.
 * Unknown sequences consume ESC plus the bytes a sequence of that shape
 * would have used.
 */
function decodeEscape(input: string, at: number): { length: number; key: NamedKey } {
  const first = input.charAt(at + 1);
  const second = input.charAt(at + 2);
  if (first === '' || second === '') {
    return { length: input.length - at, key: 'Escape' };
  }

  if (first === '[' && isDigit(second)) {
    const third = input.charAt(at + 3);
    if (third === '') return { length: input.length - at, key: 'Escape' };
    return { length: 4, key: ESCAPE_SEQUENCES[first + second + third] ?? 'Escape' };
  }

  return { length: 3, key: ESCAPE_SEQUENCES[first + second] ?? 'Escape' };
}

export function decodeKeys(input: string): KeyEvent[] {
  const events: KeyEvent[] = [];
  let i = 0;

  while (i < input.length) {
    const code = input.charCodeAt(i);

    if (code === ESC_CODE) {
      const { length, key } = decodeEscape(input, i);
      events.push(namedKey(key));
      i += length;
      continue;
    }

    const named = CONTROL_KEYS[code];
    events.push(named === undefined ? charKey(input[i]) : namedKey(named));
    i++;
  }

  return events;
}
