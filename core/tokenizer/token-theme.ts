/**
 * Classification-to-theme-color mapping.
 *
 * Each classification maps to a Lezer highlight tag; the tag resolves to a
 * color from the theme's token mapping. Plain text has no tag.
 */

import { Tag, tags } from '@lezer/highlight';
import type { TokenThemeMapping } from '../../view-model/theme';
import { Classification, type ClassificationTag } from './classification';

/** Tag for the active search match; not part of Lezer's standard set. */
export const searchMatchTag: Tag = Tag.define();

/** Lezer tag for a classification, or null for Plain. */
export function classificationToTag(tag: ClassificationTag): Tag | null {
  switch (tag) {
    case Classification.LineComment: return tags.lineComment;
    case Classification.BlockComment: return tags.blockComment;
    case Classification.KeywordPrimary: return tags.keyword;
    case Classification.KeywordSecondary: return tags.typeName;
    case Classification.StringLiteral: return tags.string;
    case Classification.Number: return tags.number;
    case Classification.SearchMatch: return searchMatchTag;
    default: return null;
  }
}

/** Resolve a Lezer highlight tag to a theme color. */
export function resolveTagColor(tag: Tag, tokens: TokenThemeMapping): string | null {
  if (tag === tags.keyword || tag === tags.controlKeyword || tag === tags.definitionKeyword) {
    return tokens.keyword;
  }
  if (tag === tags.typeName || tag === tags.standard(tags.typeName)) {
    return tokens.typeName;
  }
  if (tag === tags.string || tag === tags.character) {
    return tokens.string;
  }
  if (tag === tags.number || tag === tags.integer || tag === tags.float) {
    return tokens.number;
  }
  if (tag === tags.comment || tag === tags.lineComment || tag === tags.blockComment) {
    return tokens.comment;
  }
  if (tag === searchMatchTag) {
    return tokens.searchMatch;
  }
  return null;
}

/** Color for a classification; null means the default foreground. */
export function classificationColor(tag: ClassificationTag, tokens: TokenThemeMapping): string | null {
  const lezerTag = classificationToTag(tag);
  return lezerTag === null ? null : resolveTagColor(lezerTag, tokens);
}
