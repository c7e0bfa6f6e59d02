/**
 * Document: ordered rows, structural edits, dirty tracking.
 *
 * Every mutation rebuilds the touched row's display form and re-highlights
 * it through the block-comment cascade, so `tokens` always matches
 * `display` and each row's entering state matches the row above it.
 * Out-of-range requests are no-ops and return false.
 */

import { cascadeHighlight } from '../tokenizer/highlighter';
import type { SyntaxProfile } from '../tokenizer/syntax-profile';
import { DEFAULT_TAB_STOP } from './coordinates';
import { Row } from './row';

export interface DocumentOptions {
  tabStop?: number;
  syntax?: SyntaxProfile | null;
}

/**
 * Split file text into rows. Trailing CR/LF bytes are stripped from each
 * line; a final newline does not produce an extra empty row.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => line.replace(/[\r\n]+$/, ''));
}

export class EditorDocument {
  readonly tabStop: number;
  private _rows: Row[] = [];
  private _dirty: number = 0;
  private _syntax: SyntaxProfile | null;

  constructor(options: DocumentOptions = {}) {
    this.tabStop = options.tabStop ?? DEFAULT_TAB_STOP;
    this._syntax = options.syntax ?? null;
  }

  /** Build a clean (not dirty) document from file text. */
  static fromText(text: string, options: DocumentOptions = {}): EditorDocument {
    const doc = new EditorDocument(options);
    doc.loadLines(splitLines(text));
    return doc;
  }

  get rowCount(): number {
    return this._rows.length;
  }

  get rows(): readonly Row[] {
    return this._rows;
  }

  get dirtyCount(): number {
    return this._dirty;
  }

  get isDirty(): boolean {
    return this._dirty > 0;
  }

  get syntax(): SyntaxProfile | null {
    return this._syntax;
  }

  row(index: number): Row | undefined {
    return this._rows[index];
  }

  /** Switch profile and re-highlight every row. */
  setSyntax(profile: SyntaxProfile | null): void {
    this._syntax = profile;
    this.rehighlight(0, this._rows.length - 1);
  }

  /** Replace all content with `lines`; the result is not dirty. */
  loadLines(lines: readonly string[]): void {
    this._rows = lines.map((line, i) => new Row(i, line, this.tabStop));
    this.rehighlight(0, this._rows.length - 1);
    this._dirty = 0;
  }

  /** Mark the current content as persisted. */
  markSaved(): void {
    this._dirty = 0;
  }

  insertRow(at: number, content: string): boolean {
    if (at < 0 || at > this._rows.length) return false;

    this._rows.splice(at, 0, new Row(at, content, this.tabStop));
    this.renumberFrom(at + 1);
    // The row below now enters from the new row, so it is re-derived too.
    this.rehighlight(at, at + 1);
    this._dirty++;
    return true;
  }

  deleteRow(at: number): boolean {
    if (at < 0 || at >= this._rows.length) return false;

    this._rows.splice(at, 1);
    this.renumberFrom(at);
    this.rehighlight(at);
    this._dirty++;
    return true;
  }

  insertChar(rowIndex: number, column: number, ch: string): boolean {
    const row = this._rows[rowIndex];
    if (row === undefined || ch.length !== 1) return false;

    const at = clamp(column, 0, row.length);
    this.replaceRaw(row, row.raw.slice(0, at) + ch + row.raw.slice(at));
    return true;
  }

  deleteChar(rowIndex: number, column: number): boolean {
    const row = this._rows[rowIndex];
    if (row === undefined || column < 0 || column >= row.length) return false;

    this.replaceRaw(row, row.raw.slice(0, column) + row.raw.slice(column + 1));
    return true;
  }

  appendToRow(rowIndex: number, text: string): boolean {
    const row = this._rows[rowIndex];
    if (row === undefined) return false;

    this.replaceRaw(row, row.raw + text);
    return true;
  }

  /** Move everything right of `column` onto a new row below. */
  splitRowAt(rowIndex: number, column: number): boolean {
    const row = this._rows[rowIndex];
    if (row === undefined) return false;

    const at = clamp(column, 0, row.length);
    const head = row.raw.slice(0, at);
    const tail = row.raw.slice(at);
    this.insertRow(rowIndex + 1, tail);
    this.replaceRaw(row, head);
    return true;
  }

  /** Append row `rowIndex` to the row above it and remove it. */
  joinRowIntoPrevious(rowIndex: number): boolean {
    if (rowIndex <= 0 || rowIndex >= this._rows.length) return false;

    const text = this._rows[rowIndex].raw;
    this.deleteRow(rowIndex);
    this.appendToRow(rowIndex - 1, text);
    return true;
  }

  /** Every row followed by a single '\n'. */
  contentsAsFlatText(): string {
    let out = '';
    for (const row of this._rows) out += row.raw + '\n';
    return out;
  }

  private replaceRaw(row: Row, raw: string): void {
    row.setRaw(raw, this.tabStop);
    this.rehighlight(row.index);
    this._dirty++;
  }

  private rehighlight(from: number, forceThrough: number = from): void {
    cascadeHighlight(this._rows, from, this._syntax, forceThrough);
  }

  private renumberFrom(from: number): void {
    for (let i = from; i < this._rows.length; i++) this._rows[i].index = i;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}
