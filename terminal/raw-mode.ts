/**
 * Raw mode on the terminal input stream.
 */

import { TerminalError } from '../core/errors';

/** The part of a TTY read stream raw mode needs. */
export interface RawModeInput {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Switch `input` to raw mode. Returns a function that restores it; calling
 * it more than once is harmless.
 */
export function enableRawMode(input: RawModeInput): () => void {
  if (input.isTTY !== true || input.setRawMode === undefined) {
    throw new TerminalError('standard input is not a terminal');
  }
  input.setRawMode(true);

  let restored = false;
  return () => {
    if (restored) return;
    restored = true;
    input.setRawMode?.(false);
  };
}
