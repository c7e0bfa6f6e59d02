/**
 * Viewport: scroll offsets over the display grid.
 *
 * recompute() only moves an offset as far as needed to keep the cursor
 * inside the window; it never centers.
 */

import { rawToDisplay } from '../document/coordinates';
import type { EditorDocument } from '../document/document';
import type { CursorPosition } from '../cursor/cursor';

export interface VisibleRange {
  /** First document row shown (inclusive). */
  startRow: number;
  /** Row after the last screen row (exclusive); may exceed the row count. */
  endRow: number;
}

export interface ScrollPosition {
  rowOffset: number;
  colOffset: number;
}

export class Viewport {
  rowOffset: number = 0;
  colOffset: number = 0;
  private _visibleRows: number;
  private _visibleCols: number;

  constructor(visibleRows: number, visibleCols: number) {
    this._visibleRows = Math.max(1, visibleRows);
    this._visibleCols = Math.max(1, visibleCols);
  }

  get visibleRows(): number { return this._visibleRows; }
  get visibleCols(): number { return this._visibleCols; }

  /** Update the text-area dimensions (call on resize). */
  resize(visibleRows: number, visibleCols: number): void {
    this._visibleRows = Math.max(1, visibleRows);
    this._visibleCols = Math.max(1, visibleCols);
  }

  get position(): ScrollPosition {
    return { rowOffset: this.rowOffset, colOffset: this.colOffset };
  }

  restore(position: ScrollPosition): void {
    this.rowOffset = position.rowOffset;
    this.colOffset = position.colOffset;
  }

  /**
   * Bring the cursor into view. Returns the cursor's display column
   * (0 on the line past the end of the document).
   */
  recompute(cursor: CursorPosition, doc: EditorDocument): number {
    const row = doc.row(cursor.row);
    const displayColumn = row === undefined ? 0 : rawToDisplay(row, cursor.column, doc.tabStop);

    if (cursor.row < this.rowOffset) {
      this.rowOffset = cursor.row;
    }
    if (cursor.row >= this.rowOffset + this._visibleRows) {
      this.rowOffset = cursor.row - this._visibleRows + 1;
    }
    if (displayColumn < this.colOffset) {
      this.colOffset = displayColumn;
    }
    if (displayColumn >= this.colOffset + this._visibleCols) {
      this.colOffset = displayColumn - this._visibleCols + 1;
    }
    return displayColumn;
  }

  getVisibleRange(): VisibleRange {
    return { startRow: this.rowOffset, endRow: this.rowOffset + this._visibleRows };
  }
}
