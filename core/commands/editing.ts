/**
 * Editing commands at the cursor: type, backspace, delete, line break.
 */

import { CommandRegistry, type CommandContext } from './registry';

/** Insert one byte at the cursor, appending a row when past the end. */
export function typeCharacter(ctx: CommandContext, ch: string): void {
  const { document, cursor } = ctx;
  if (cursor.row === document.rowCount) {
    document.insertRow(document.rowCount, '');
  }
  if (document.insertChar(cursor.row, cursor.column, ch)) {
    cursor.column++;
  }
}

/** Delete the byte left of the cursor, or join with the row above at column 0. */
export function deleteLeft(ctx: CommandContext): void {
  const { document, cursor } = ctx;
  if (cursor.row === document.rowCount) return;
  if (cursor.column === 0 && cursor.row === 0) return;

  if (cursor.column > 0) {
    document.deleteChar(cursor.row, cursor.column - 1);
    cursor.column--;
    return;
  }

  const above = document.row(cursor.row - 1);
  const joinColumn = above?.length ?? 0;
  document.joinRowIntoPrevious(cursor.row);
  cursor.moveTo(cursor.row - 1, joinColumn);
}

/**
 * Break the line at the cursor. At column 0 an empty row is inserted
 * above instead of splitting.
 */
export function insertLineBreak(ctx: CommandContext): void {
  const { document, cursor } = ctx;
  if (cursor.column === 0) {
    document.insertRow(cursor.row, '');
  } else {
    document.splitRowAt(cursor.row, cursor.column);
  }
  cursor.moveTo(cursor.row + 1, 0);
}

export function registerEditingCommands(registry: CommandRegistry): void {
  registry.register('editor.action.deleteLeft', deleteLeft);

  registry.register('editor.action.deleteRight', (ctx) => {
    ctx.cursor.move('right', ctx.document);
    deleteLeft(ctx);
  });

  registry.register('editor.action.insertLineBreak', insertLineBreak);
}
