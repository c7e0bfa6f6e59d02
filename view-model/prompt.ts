/**
 * Single-line prompt shown in the message bar (file name, search query).
 */

import { isNamed, isPromptPrintable, type KeyEvent } from '../core/input/keys';

export type PromptOutcome =
  | { status: 'pending' }
  | { status: 'accepted'; value: string }
  | { status: 'cancelled' };

/** Called after every key, with the input as it stands after that key. */
export type PromptListener = (input: string, key: KeyEvent) => void;

export class LinePrompt {
  readonly template: string;
  private _input: string = '';
  private readonly listener: PromptListener | null;

  /** `template` contains `%s` where the input is shown. */
  constructor(template: string, listener?: PromptListener) {
    this.template = template;
    this.listener = listener ?? null;
  }

  get input(): string {
    return this._input;
  }

  handleKey(key: KeyEvent): PromptOutcome {
    if (isNamed(key, 'Backspace', 'Delete')) {
      this._input = this._input.slice(0, -1);
    } else if (isNamed(key, 'Escape')) {
      this.notify(key);
      return { status: 'cancelled' };
    } else if (isNamed(key, 'Enter')) {
      if (this._input.length > 0) {
        this.notify(key);
        return { status: 'accepted', value: this._input };
      }
    } else if (key.kind === 'char' && isPromptPrintable(key)) {
      this._input += String.fromCharCode(key.code);
    }

    this.notify(key);
    return { status: 'pending' };
  }

  private notify(key: KeyEvent): void {
    if (this.listener !== null) this.listener(this._input, key);
  }
}
