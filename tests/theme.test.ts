import { describe, expect, test } from 'vitest';
import { tags } from '@lezer/highlight';
import { Classification } from '../core/tokenizer/classification';
import {
  classificationColor,
  classificationToTag,
  resolveTagColor,
  searchMatchTag,
} from '../core/tokenizer/token-theme';
import { DARK_THEME, LIGHT_THEME, themeByName } from '../view-model/theme';

describe('classification tags', () => {
  test('map onto Lezer highlight tags', () => {
    expect(classificationToTag(Classification.Plain)).toBeNull();
    expect(classificationToTag(Classification.LineComment)).toBe(tags.lineComment);
    expect(classificationToTag(Classification.BlockComment)).toBe(tags.blockComment);
    expect(classificationToTag(Classification.KeywordPrimary)).toBe(tags.keyword);
    expect(classificationToTag(Classification.KeywordSecondary)).toBe(tags.typeName);
    expect(classificationToTag(Classification.StringLiteral)).toBe(tags.string);
    expect(classificationToTag(Classification.Number)).toBe(tags.number);
    expect(classificationToTag(Classification.SearchMatch)).toBe(searchMatchTag);
  });

  test('resolve to theme colors', () => {
    const tokens = DARK_THEME.tokens;
    expect(classificationColor(Classification.Plain, tokens)).toBeNull();
    expect(classificationColor(Classification.KeywordPrimary, tokens)).toBe(tokens.keyword);
    expect(classificationColor(Classification.BlockComment, tokens)).toBe(tokens.comment);
    expect(classificationColor(Classification.SearchMatch, tokens)).toBe(tokens.searchMatch);
  });

  test('related Lezer tags share a color', () => {
    const tokens = LIGHT_THEME.tokens;
    expect(resolveTagColor(tags.controlKeyword, tokens)).toBe(tokens.keyword);
    expect(resolveTagColor(tags.float, tokens)).toBe(tokens.number);
    expect(resolveTagColor(tags.heading, tokens)).toBeNull();
  });
});

describe('themeByName', () => {
  test('selects the named theme', () => {
    expect(themeByName('light')).toBe(LIGHT_THEME);
    expect(themeByName('dark')).toBe(DARK_THEME);
  });
});
