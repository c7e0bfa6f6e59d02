/**
 * Incremental search session.
 *
 * Each query update scans rows' display text from the last match in the
 * current direction, wrapping at both ends. The matched span is painted
 * SearchMatch as an overlay; the row's original tokens are kept and put
 * back before the next update, so at most one row carries an overlay.
 */

import { Classification, type ClassificationTag } from '../tokenizer/classification';
import { displayToRaw } from '../document/coordinates';
import type { EditorDocument } from '../document/document';
import type { Cursor } from '../cursor/cursor';
import { isNamed, type KeyEvent } from '../input/keys';

export const SearchDirection = {
  Forward: 1,
  Backward: -1,
} as const;

export type SearchDirection = (typeof SearchDirection)[keyof typeof SearchDirection];

export interface SearchMatch {
  row: number;
  /** Byte offset of the match in the row's display text. */
  displayColumn: number;
  /** Raw column the cursor was moved to. */
  column: number;
  length: number;
}

interface Overlay {
  rowIndex: number;
  savedTokens: ClassificationTag[];
}

export class SearchSession {
  private readonly document: EditorDocument;
  private readonly cursor: Cursor;
  private _query: string = '';
  private _lastMatchRow: number | null = null;
  private _direction: SearchDirection = SearchDirection.Forward;
  private _overlay: Overlay | null = null;
  private _active: boolean = false;

  constructor(document: EditorDocument, cursor: Cursor) {
    this.document = document;
    this.cursor = cursor;
  }

  get query(): string { return this._query; }
  get lastMatchRow(): number | null { return this._lastMatchRow; }
  get direction(): SearchDirection { return this._direction; }
  get isActive(): boolean { return this._active; }

  /** Row currently carrying the match overlay, if any. */
  get overlayRow(): number | null {
    return this._overlay?.rowIndex ?? null;
  }

  begin(): void {
    this.restoreOverlay();
    this._query = '';
    this._lastMatchRow = null;
    this._direction = SearchDirection.Forward;
    this._active = true;
  }

  /**
   * React to one prompt update. Arrow keys step between matches, Enter and
   * Escape clear the anchor, anything else restarts from the top.
   */
  onQueryChanged(query: string, key: KeyEvent): SearchMatch | null {
    this.restoreOverlay();
    this._query = query;

    if (isNamed(key, 'Enter', 'Escape')) {
      this._lastMatchRow = null;
      this._direction = SearchDirection.Forward;
      return null;
    } else if (isNamed(key, 'MoveRight', 'MoveDown')) {
      this._direction = SearchDirection.Forward;
    } else if (isNamed(key, 'MoveLeft', 'MoveUp')) {
      this._direction = SearchDirection.Backward;
    } else {
      this._lastMatchRow = null;
      this._direction = SearchDirection.Forward;
    }

    if (this._lastMatchRow === null) this._direction = SearchDirection.Forward;
    if (query.length === 0) return null;

    return this.scan(query);
  }

  /**
   * Leave search mode. A committed query stays readable through `query`;
   * the caller restores cursor/scroll on cancel.
   */
  end(commit: boolean): void {
    this.restoreOverlay();
    if (!commit) this._query = '';
    this._lastMatchRow = null;
    this._direction = SearchDirection.Forward;
    this._active = false;
  }

  private scan(query: string): SearchMatch | null {
    const rowCount = this.document.rowCount;
    let current = this._lastMatchRow ?? -1;

    for (let i = 0; i < rowCount; i++) {
      current += this._direction;
      if (current === -1) current = rowCount - 1;
      else if (current === rowCount) current = 0;

      const row = this.document.row(current);
      if (row === undefined) continue;

      const at = row.display.indexOf(query);
      if (at === -1) continue;

      const column = displayToRaw(row, at, this.document.tabStop);
      this._lastMatchRow = current;
      this.cursor.moveTo(current, column);

      this._overlay = { rowIndex: current, savedTokens: row.tokens.slice() };
      const end = Math.min(row.tokens.length, at + query.length);
      for (let j = at; j < end; j++) row.tokens[j] = Classification.SearchMatch;

      return { row: current, displayColumn: at, column, length: query.length };
    }
    return null;
  }

  private restoreOverlay(): void {
    if (this._overlay === null) return;
    const row = this.document.row(this._overlay.rowIndex);
    if (row !== undefined && row.tokens.length === this._overlay.savedTokens.length) {
      row.tokens = this._overlay.savedTokens;
    }
    this._overlay = null;
  }
}
