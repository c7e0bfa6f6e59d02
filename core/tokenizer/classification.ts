/**
 * Per-byte classification tags. A tag only selects a display color.
 */
export const Classification = {
  Plain: 0,
  LineComment: 1,
  BlockComment: 2,
  KeywordPrimary: 3,
  KeywordSecondary: 4,
  StringLiteral: 5,
  Number: 6,
  SearchMatch: 7,
} as const;

export type ClassificationTag = (typeof Classification)[keyof typeof Classification];
