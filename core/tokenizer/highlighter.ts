/**
 * Line classifier and block-comment cascade.
 *
 * highlightLine() classifies one row's display bytes in a single
 * left-to-right pass. Priority at each position:
 *   line comment > block comment > string > number > keyword > plain.
 *
 * The only state carried between rows is whether a block comment is still
 * open at the end of the row. cascadeHighlight() re-derives rows downward
 * until that state stops changing.
 */

import { Classification, type ClassificationTag } from './classification';
import type { SyntaxProfile } from './syntax-profile';

const SEPARATORS = ',.()+-/*=~%<>[];';

export interface HighlightResult {
  tokens: ClassificationTag[];
  /** A block comment is still open at the end of the row. */
  inBlockComment: boolean;
}

/** Whitespace, NUL, or one of `,.()+-/*=~%<>[];`. */
export function isSeparator(ch: string): boolean {
  if (ch === '' || ch === '\0') return true;
  if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\v' || ch === '\f' || ch === '\r') return true;
  return SEPARATORS.includes(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function fill(tokens: ClassificationTag[], from: number, length: number, tag: ClassificationTag): void {
  const end = Math.min(tokens.length, from + length);
  for (let i = from; i < end; i++) tokens[i] = tag;
}

/**
 * Longest keyword starting at `at` that is followed by a separator (or
 * the end of the row). Primary wins a tie.
 */
function matchKeyword(
  text: string,
  at: number,
  profile: SyntaxProfile,
): { length: number; tag: ClassificationTag } | null {
  const maxLength = Math.min(profile.longestKeyword, text.length - at);
  for (let length = maxLength; length > 0; length--) {
    if (!isSeparator(text.charAt(at + length))) continue;
    const candidate = text.slice(at, at + length);
    if (profile.primaryKeywords.has(candidate)) {
      return { length, tag: Classification.KeywordPrimary };
    }
    if (profile.secondaryKeywords.has(candidate)) {
      return { length, tag: Classification.KeywordSecondary };
    }
  }
  return null;
}

/**
 * Classify one row. Without a profile every byte is Plain and no comment
 * is left open.
 */
export function highlightLine(
  text: string,
  profile: SyntaxProfile | null,
  startsInBlockComment: boolean,
): HighlightResult {
  const tokens: ClassificationTag[] = new Array<ClassificationTag>(text.length).fill(Classification.Plain);
  if (profile === null) {
    return { tokens, inBlockComment: false };
  }

  const lineComment = profile.lineComment;
  const blockStart = profile.blockComment?.start ?? null;
  const blockEnd = profile.blockComment?.end ?? null;

  let prevSeparator = true;
  let stringQuote: string | null = null;
  let inComment = startsInBlockComment;

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const prevTag = i > 0 ? tokens[i - 1] : Classification.Plain;

    if (lineComment !== null && stringQuote === null && !inComment) {
      if (text.startsWith(lineComment, i)) {
        fill(tokens, i, text.length - i, Classification.LineComment);
        break;
      }
    }

    if (blockStart !== null && blockEnd !== null && stringQuote === null) {
      if (inComment) {
        tokens[i] = Classification.BlockComment;
        if (text.startsWith(blockEnd, i)) {
          fill(tokens, i, blockEnd.length, Classification.BlockComment);
          i += blockEnd.length;
          inComment = false;
          prevSeparator = true;
        } else {
          i++;
        }
        continue;
      }
      if (text.startsWith(blockStart, i)) {
        fill(tokens, i, blockStart.length, Classification.BlockComment);
        i += blockStart.length;
        inComment = true;
        continue;
      }
    }

    if (profile.highlightStrings) {
      if (stringQuote !== null) {
        tokens[i] = Classification.StringLiteral;
        if (ch === '\\' && i + 1 < text.length) {
          tokens[i + 1] = Classification.StringLiteral;
          i += 2;
          continue;
        }
        if (ch === stringQuote) stringQuote = null;
        i++;
        prevSeparator = true;
        continue;
      }
      if (ch === '"' || ch === "'") {
        stringQuote = ch;
        tokens[i] = Classification.StringLiteral;
        i++;
        continue;
      }
    }

    if (profile.highlightNumbers) {
      if ((isDigit(ch) && (prevSeparator || prevTag === Classification.Number)) ||
          (ch === '.' && prevTag === Classification.Number)) {
        tokens[i] = Classification.Number;
        i++;
        prevSeparator = false;
        continue;
      }
    }

    if (prevSeparator) {
      const keyword = matchKeyword(text, i, profile);
      if (keyword !== null) {
        fill(tokens, i, keyword.length, keyword.tag);
        i += keyword.length;
        prevSeparator = false;
        continue;
      }
    }

    prevSeparator = isSeparator(ch);
    i++;
  }

  return { tokens, inBlockComment: inComment };
}

/** The slice of a row the cascade reads and writes. */
export interface HighlightTarget {
  readonly display: string;
  tokens: ClassificationTag[];
  continuesBlockComment: boolean;
}

/**
 * Re-highlight rows[start..] in order. Rows up to `forceThrough` (inclusive)
 * are always processed; after that the walk stops at the first row whose
 * exit state did not change. Returns the number of rows processed.
 */
export function cascadeHighlight(
  rows: readonly HighlightTarget[],
  start: number,
  profile: SyntaxProfile | null,
  forceThrough: number = start,
): number {
  let processed = 0;
  for (let i = Math.max(0, start); i < rows.length; i++) {
    const row = rows[i];
    const entering = i > 0 && rows[i - 1].continuesBlockComment;
    const result = highlightLine(row.display, profile, entering);
    const changed = row.continuesBlockComment !== result.inBlockComment;
    row.tokens = result.tokens;
    row.continuesBlockComment = result.inBlockComment;
    processed++;
    if (!changed && i >= forceThrough) break;
  }
  return processed;
}
