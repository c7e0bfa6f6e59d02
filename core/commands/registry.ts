/**
 * Command registry: maps string command IDs to handler functions.
 *
 * Command IDs follow a namespaced convention:
 * editor.action.deleteLeft, editor.action.pageDown, etc.
 */

import type { Cursor } from '../cursor/cursor';
import type { EditorDocument } from '../document/document';
import type { Viewport } from '../viewport/viewport-manager';

/**
 * Context passed to command handlers: the pieces of the session a command
 * may read or mutate.
 */
export interface CommandContext {
  document: EditorDocument;
  cursor: Cursor;
  viewport: Viewport;
}

export type CommandHandler = (ctx: CommandContext) => void;

export class CommandRegistry {
  private commands: Map<string, CommandHandler> = new Map();

  register(id: string, handler: CommandHandler): void {
    this.commands.set(id, handler);
  }

  execute(id: string, ctx: CommandContext): boolean {
    const handler = this.commands.get(id);
    if (!handler) return false;
    handler(ctx);
    return true;
  }
}
