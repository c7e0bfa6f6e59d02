/**
 * One line of the document: raw bytes, their display form, and one
 * classification tag per display byte.
 */

import type { ClassificationTag } from '../tokenizer/classification';
import type { HighlightTarget } from '../tokenizer/highlighter';
import { expandTabs, type RowContent } from './coordinates';

export class Row implements RowContent, HighlightTarget {
  /** Position in the document; renumbered on insert/delete. */
  index: number;
  private _raw: string = '';
  private _display: string = '';
  tokens: ClassificationTag[] = [];
  continuesBlockComment: boolean = false;

  constructor(index: number, raw: string, tabStop: number) {
    this.index = index;
    this.setRaw(raw, tabStop);
  }

  get raw(): string {
    return this._raw;
  }

  get display(): string {
    return this._display;
  }

  get length(): number {
    return this._raw.length;
  }

  /**
   * Replace the raw content and rebuild the display form. Tokens are stale
   * until the document re-highlights this row.
   */
  setRaw(raw: string, tabStop: number): void {
    this._raw = raw;
    this._display = expandTabs(raw, tabStop);
  }
}
