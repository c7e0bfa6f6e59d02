/**
 * Logical key events delivered to the editor after decoding.
 */

export type NamedKey =
  | 'MoveUp'
  | 'MoveDown'
  | 'MoveLeft'
  | 'MoveRight'
  | 'Home'
  | 'End'
  | 'PageUp'
  | 'PageDown'
  | 'Delete'
  | 'Backspace'
  | 'Enter'
  | 'Escape'
  | 'Quit'
  | 'Save'
  | 'Find'
  | 'Redraw';

export type KeyEvent =
  | { kind: 'char'; code: number }
  | { kind: 'named'; key: NamedKey };

export function charKey(ch: string): KeyEvent {
  return { kind: 'char', code: ch.charCodeAt(0) };
}

export function namedKey(key: NamedKey): KeyEvent {
  return { kind: 'named', key };
}

export function isNamed(event: KeyEvent, ...keys: NamedKey[]): boolean {
  return event.kind === 'named' && keys.includes(event.key);
}

/** Printable for prompt input: not a control byte and below 128. */
export function isPromptPrintable(event: KeyEvent): boolean {
  return event.kind === 'char' && event.code >= 32 && event.code < 127;
}
