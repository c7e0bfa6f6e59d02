/**
 * Raw column <-> display column mapping.
 *
 * Both directions walk the raw bytes with the same tab rule used by
 * expandTabs(): a tab advances to the next multiple of the tab stop,
 * always by at least one column.
 */

export const DEFAULT_TAB_STOP = 8;

export interface RowContent {
  readonly raw: string;
}

function advance(displayColumn: number, code: number, tabStop: number): number {
  if (code === 9) {
    return displayColumn + (tabStop - (displayColumn % tabStop));
  }
  return displayColumn + 1;
}

/** Expand tabs to spaces, producing a row's display form. */
export function expandTabs(raw: string, tabStop: number = DEFAULT_TAB_STOP): string {
  if (raw.indexOf('\t') === -1) return raw;

  let out = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (ch === '\t') {
      out += ' ';
      while (out.length % tabStop !== 0) out += ' ';
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Display column at which the byte at `rawColumn` starts.
 * Columns past the end of the row are clamped to the row length.
 */
export function rawToDisplay(row: RowContent, rawColumn: number, tabStop: number = DEFAULT_TAB_STOP): number {
  const end = Math.max(0, Math.min(rawColumn, row.raw.length));
  let displayColumn = 0;
  for (let i = 0; i < end; i++) {
    displayColumn = advance(displayColumn, row.raw.charCodeAt(i), tabStop);
  }
  return displayColumn;
}

/**
 * Raw column whose expansion covers `displayColumn`. A column inside a
 * tab's expansion resolves to the tab itself; columns past the end
 * resolve to the row length.
 */
export function displayToRaw(row: RowContent, displayColumn: number, tabStop: number = DEFAULT_TAB_STOP): number {
  let current = 0;
  let rawColumn = 0;
  for (; rawColumn < row.raw.length; rawColumn++) {
    current = advance(current, row.raw.charCodeAt(rawColumn), tabStop);
    if (current > displayColumn) return rawColumn;
  }
  return rawColumn;
}
