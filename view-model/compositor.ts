/**
 * Frame compositor: turns document, viewport and status state into an
 * ordered list of drawing primitives. It never writes to the terminal;
 * the ANSI writer consumes the primitives.
 */

import type { EditorDocument } from '../core/document/document';
import type { CursorPosition } from '../core/cursor/cursor';
import type { Viewport } from '../core/viewport/viewport-manager';
import { Classification, type ClassificationTag } from '../core/tokenizer/classification';
import { EDITOR_NAME, VERSION } from '../core/version';
import { composeStatusBar, visibleMessage, type TimedMessage } from './status-bar';

export type FramePrimitive =
  /** A run of visible bytes sharing one classification. */
  | { kind: 'span'; text: string; tag: ClassificationTag }
  /** A control byte drawn as a single inverse glyph. */
  | { kind: 'control'; glyph: string }
  /** Screen row past the end of the document. */
  | { kind: 'empty-row'; banner: string | null }
  /** Clear to end of line and move to the next screen row. */
  | { kind: 'line-end' }
  | { kind: 'status'; text: string }
  | { kind: 'message'; text: string }
  /** Final cursor placement, 1-based screen coordinates. */
  | { kind: 'cursor'; row: number; column: number };

export interface Frame {
  primitives: FramePrimitive[];
}

export interface FrameInput {
  document: EditorDocument;
  /** Already recomputed for this cursor. */
  viewport: Viewport;
  cursor: CursorPosition;
  /** Cursor column in display coordinates. */
  displayColumn: number;
  fileName: string | null;
  message: TimedMessage | null;
  now: number;
  messageTimeoutMs: number;
}

export const WELCOME_BANNER = `${EDITOR_NAME} editor -- version ${VERSION}`;

/** Bytes below 32 and DEL are drawn as control glyphs. */
export function isControlByte(code: number): boolean {
  return code < 32 || code === 127;
}

/** '@'+code for bytes 0..26, '?' otherwise. */
export function controlGlyph(code: number): string {
  return code <= 26 ? String.fromCharCode(64 + code) : '?';
}

/** Welcome line centered in `width` columns, with the leading '~'. */
export function welcomeLine(width: number): string {
  const text = WELCOME_BANNER.slice(0, width);
  let padding = Math.floor((width - text.length) / 2);
  let line = '';
  if (padding > 0) {
    line += '~';
    padding--;
  }
  return line + ' '.repeat(padding) + text;
}

export function composeFrame(input: FrameInput): Frame {
  const { document, viewport, cursor } = input;
  const primitives: FramePrimitive[] = [];
  const width = viewport.visibleCols;

  const { startRow, endRow } = viewport.getVisibleRange();
  const bannerRow = startRow + Math.floor(viewport.visibleRows / 3);

  for (let fileRow = startRow; fileRow < endRow; fileRow++) {
    const row = document.row(fileRow);

    if (row === undefined) {
      const showBanner = document.rowCount === 0 && fileRow === bannerRow;
      primitives.push({ kind: 'empty-row', banner: showBanner ? welcomeLine(width) : null });
    } else {
      const start = Math.min(viewport.colOffset, row.display.length);
      const end = Math.min(row.display.length, start + width);
      pushRowSpans(primitives, row.display, row.tokens, start, end);
    }
    primitives.push({ kind: 'line-end' });
  }

  const syntax = document.syntax;
  primitives.push({
    kind: 'status',
    text: composeStatusBar(
      {
        fileName: input.fileName,
        rowCount: document.rowCount,
        dirty: document.isDirty,
        fileType: syntax === null ? null : syntax.name,
        cursorRow: cursor.row,
      },
      width,
    ),
  });
  primitives.push({
    kind: 'message',
    text: visibleMessage(input.message, input.now, input.messageTimeoutMs, width),
  });
  primitives.push({
    kind: 'cursor',
    row: cursor.row - viewport.rowOffset + 1,
    column: input.displayColumn - viewport.colOffset + 1,
  });

  return { primitives };
}

function pushRowSpans(
  out: FramePrimitive[],
  display: string,
  tokens: readonly ClassificationTag[],
  start: number,
  end: number,
): void {
  let text = '';
  let tag: ClassificationTag = Classification.Plain;

  const flush = (): void => {
    if (text.length > 0) out.push({ kind: 'span', text, tag });
    text = '';
  };

  for (let i = start; i < end; i++) {
    const code = display.charCodeAt(i);
    if (isControlByte(code)) {
      flush();
      out.push({ kind: 'control', glyph: controlGlyph(code) });
      continue;
    }
    const current = tokens[i] ?? Classification.Plain;
    if (current !== tag) {
      flush();
      tag = current;
    }
    text += display[i];
  }
  flush();
}
