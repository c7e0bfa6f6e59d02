/**
 * ANSI escape sequences and the frame writer.
 */

import type { Frame } from '../view-model/compositor';
import type { EditorTheme } from '../view-model/theme';
import { classificationColor } from '../core/tokenizer/token-theme';

export const ESC = '\x1b';
export const CSI = `${ESC}[`;

export const CURSOR = {
  hide: `${CSI}?25l`,
  show: `${CSI}?25h`,
  home: `${CSI}H`,
  // 1-indexed
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
};

export const SCREEN = {
  clear: `${CSI}2J`,
  clearToEnd: `${CSI}0K`,
};

export const STYLE = {
  reset: `${CSI}0m`,
  inverse: `${CSI}7m`,
};

export const FG = {
  default: `${CSI}39m`,
  rgb: (r: number, g: number, b: number) => `${CSI}38;2;${r};${g};${b}m`,
};

/** Truecolor foreground for a '#rrggbb' color. */
export function fgHex(hex: string): string {
  const value = parseInt(hex.slice(1), 16);
  return FG.rgb((value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff);
}

const LINE_END = `${FG.default}${SCREEN.clearToEnd}\r\n`;

/** Serialize one frame into the byte string written to the terminal. */
export function serializeFrame(frame: Frame, theme: EditorTheme): string {
  let out = CURSOR.hide + CURSOR.home;
  let color: string | null = null;

  for (const primitive of frame.primitives) {
    switch (primitive.kind) {
      case 'span': {
        const next = classificationColor(primitive.tag, theme.tokens);
        if (next !== color) {
          out += next === null ? FG.default : fgHex(next);
          color = next;
        }
        out += primitive.text;
        break;
      }
      case 'control':
        out += STYLE.inverse + primitive.glyph + STYLE.reset;
        if (color !== null) out += fgHex(color);
        break;
      case 'empty-row':
        out += primitive.banner ?? '~';
        break;
      case 'line-end':
        out += LINE_END;
        color = null;
        break;
      case 'status':
        out += STYLE.inverse + primitive.text + STYLE.reset + '\r\n';
        break;
      case 'message':
        out += SCREEN.clearToEnd + primitive.text;
        break;
      case 'cursor':
        out += CURSOR.moveTo(primitive.row, primitive.column);
        break;
    }
  }

  return out + CURSOR.show;
}
