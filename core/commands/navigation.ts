/**
 * Navigation commands: move by char/line, line start/end, page up/down.
 */

import { CommandRegistry } from './registry';

export function registerNavigationCommands(registry: CommandRegistry): void {
  registry.register('editor.action.moveCursorLeft', (ctx) => {
    ctx.cursor.move('left', ctx.document);
  });

  registry.register('editor.action.moveCursorRight', (ctx) => {
    ctx.cursor.move('right', ctx.document);
  });

  registry.register('editor.action.moveCursorUp', (ctx) => {
    ctx.cursor.move('up', ctx.document);
  });

  registry.register('editor.action.moveCursorDown', (ctx) => {
    ctx.cursor.move('down', ctx.document);
  });

  registry.register('editor.action.moveCursorToLineStart', (ctx) => {
    ctx.cursor.column = 0;
  });

  registry.register('editor.action.moveCursorToLineEnd', (ctx) => {
    const row = ctx.document.row(ctx.cursor.row);
    if (row !== undefined) ctx.cursor.column = row.length;
  });

  // Page moves jump to the screen edge first, then scroll a full screen.
  registry.register('editor.action.pageUp', (ctx) => {
    const { cursor, viewport, document } = ctx;
    cursor.row = viewport.rowOffset;
    for (let i = 0; i < viewport.visibleRows; i++) cursor.move('up', document);
  });

  registry.register('editor.action.pageDown', (ctx) => {
    const { cursor, viewport, document } = ctx;
    cursor.row = Math.min(viewport.rowOffset + viewport.visibleRows - 1, document.rowCount);
    for (let i = 0; i < viewport.visibleRows; i++) cursor.move('down', document);
  });
}
