/**
 * Cursor position in raw coordinates, and single-step movement.
 *
 * `row` may equal the document's row count: the line just past the end,
 * where typing appends a new row.
 */

import type { EditorDocument } from '../document/document';

export type CursorDirection = 'left' | 'right' | 'up' | 'down';

export interface CursorPosition {
  row: number;
  /** Raw (byte) column within the row. */
  column: number;
}

export class Cursor implements CursorPosition {
  row: number;
  column: number;

  constructor(row: number = 0, column: number = 0) {
    this.row = row;
    this.column = column;
  }

  get position(): CursorPosition {
    return { row: this.row, column: this.column };
  }

  moveTo(row: number, column: number): void {
    this.row = row;
    this.column = column;
  }

  restore(position: CursorPosition): void {
    this.moveTo(position.row, position.column);
  }

  /**
   * Move one step. Left at column 0 wraps to the end of the previous row,
   * right at the end wraps to the start of the next; afterwards the column
   * is clamped to the new row's length.
   */
  move(direction: CursorDirection, doc: EditorDocument): void {
    const current = doc.row(this.row);

    switch (direction) {
      case 'left':
        if (this.column > 0) {
          this.column--;
        } else if (this.row > 0) {
          this.row--;
          this.column = doc.row(this.row)?.length ?? 0;
        }
        break;
      case 'right':
        if (current !== undefined && this.column < current.length) {
          this.column++;
        } else if (current !== undefined && this.column === current.length) {
          this.row++;
          this.column = 0;
        }
        break;
      case 'up':
        if (this.row > 0) this.row--;
        break;
      case 'down':
        if (this.row < doc.rowCount) this.row++;
        break;
    }

    this.clampColumn(doc);
  }

  /** Keep the column inside the current row (0 past the last row). */
  clampColumn(doc: EditorDocument): void {
    const length = doc.row(this.row)?.length ?? 0;
    if (this.column > length) this.column = length;
  }
}
