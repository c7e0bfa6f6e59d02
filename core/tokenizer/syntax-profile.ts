/**
 * Syntax profiles: declarative per-language highlighting rules, and
 * selection of a profile from a file name.
 */

import { readFileSync } from 'node:fs';
import { Type } from '@sinclair/typebox';
import type { Static } from '@sinclair/typebox';
import { StrictObject, parseWithSchema } from '../config/typebox-helpers';

const BlockCommentSchema = StrictObject({
  start: Type.String({ minLength: 1 }),
  end: Type.String({ minLength: 1 }),
});

export const SyntaxProfileSchema = StrictObject(
  {
    name: Type.String({ minLength: 1 }),
    fileMatch: Type.Array(Type.String({ minLength: 1 })),
    primaryKeywords: Type.Array(Type.String({ minLength: 1 })),
    secondaryKeywords: Type.Array(Type.String({ minLength: 1 }), { default: [] }),
    lineComment: Type.Optional(Type.String({ minLength: 1 })),
    blockComment: Type.Optional(BlockCommentSchema),
    highlightNumbers: Type.Boolean({ default: false }),
    highlightStrings: Type.Boolean({ default: false }),
  },
  { $id: 'SyntaxProfile' },
);

const SyntaxProfileListSchema = Type.Array(SyntaxProfileSchema);

export type SyntaxProfileDefinition = Static<typeof SyntaxProfileSchema>;

export interface SyntaxProfile {
  readonly name: string;
  readonly fileMatch: readonly string[];
  readonly primaryKeywords: ReadonlySet<string>;
  readonly secondaryKeywords: ReadonlySet<string>;
  readonly lineComment: string | null;
  readonly blockComment: { readonly start: string; readonly end: string } | null;
  readonly highlightNumbers: boolean;
  readonly highlightStrings: boolean;
  /** Longest keyword length across both sets; bounds the keyword scan. */
  readonly longestKeyword: number;
}

/** Build an immutable profile from a validated definition. */
export function createSyntaxProfile(def: SyntaxProfileDefinition): SyntaxProfile {
  const primary = new Set(def.primaryKeywords);
  const secondary = new Set(def.secondaryKeywords);
  let longest = 0;
  for (const word of [...primary, ...secondary]) longest = Math.max(longest, word.length);

  return Object.freeze({
    name: def.name,
    fileMatch: Object.freeze([...def.fileMatch]),
    primaryKeywords: primary,
    secondaryKeywords: secondary,
    lineComment: def.lineComment ?? null,
    blockComment: def.blockComment ? Object.freeze({ ...def.blockComment }) : null,
    highlightNumbers: def.highlightNumbers,
    highlightStrings: def.highlightStrings,
    longestKeyword: longest,
  });
}

/** Parse and validate a JSON array of profile definitions. */
export function parseSyntaxProfiles(data: unknown, source: string = 'profiles'): SyntaxProfile[] {
  return parseWithSchema(SyntaxProfileListSchema, data, source).map(createSyntaxProfile);
}

let builtins: SyntaxProfile[] | null = null;

/** Profiles shipped with the editor (profiles.json beside this module). */
export function builtinSyntaxProfiles(): readonly SyntaxProfile[] {
  if (builtins === null) {
    const url = new URL('./profiles.json', import.meta.url);
    builtins = parseSyntaxProfiles(JSON.parse(readFileSync(url, 'utf8')), url.pathname);
  }
  return builtins;
}

/**
 * Pick the first profile matching a file name. Patterns starting with '.'
 * must equal the extension (from the last '.'); other patterns match
 * anywhere in the name.
 */
export function selectSyntaxProfile(
  fileName: string | null,
  profiles: readonly SyntaxProfile[] = builtinSyntaxProfiles(),
): SyntaxProfile | null {
  if (fileName === null) return null;

  const dot = fileName.lastIndexOf('.');
  const ext = dot === -1 ? null : fileName.slice(dot);

  for (const profile of profiles) {
    for (const pattern of profile.fileMatch) {
      const isExt = pattern.startsWith('.');
      if ((isExt && ext === pattern) || (!isExt && fileName.includes(pattern))) {
        return profile;
      }
    }
  }
  return null;
}
