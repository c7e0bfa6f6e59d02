/**
 * Editor configuration: schema, defaults, and loading from disk.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { Type } from '@sinclair/typebox';
import type { Static } from '@sinclair/typebox';
import { ConfigValidationError, StrictObject, parseWithSchema } from './typebox-helpers';

export const EditorConfigSchema = StrictObject(
  {
    tabStop: Type.Integer({ minimum: 1, maximum: 16, default: 8 }),
    quitTimes: Type.Integer({ minimum: 0, default: 3 }),
    messageTimeoutMs: Type.Integer({ minimum: 0, default: 5000 }),
    theme: Type.Union([Type.Literal('dark'), Type.Literal('light')], { default: 'dark' }),
    logFile: Type.Optional(Type.String({ minLength: 1 })),
    logLevel: Type.Union(
      [Type.Literal('debug'), Type.Literal('info'), Type.Literal('warn'), Type.Literal('error')],
      { default: 'info' },
    ),
  },
  { $id: 'EditorConfig' },
);

export type EditorConfig = Static<typeof EditorConfigSchema>;

export const DEFAULT_CONFIG: EditorConfig = {
  tabStop: 8,
  quitTimes: 3,
  messageTimeoutMs: 5000,
  theme: 'dark',
  logLevel: 'info',
};

/** Validate a parsed config object, filling in defaults. */
export function parseEditorConfig(data: unknown, source: string = 'config'): EditorConfig {
  return parseWithSchema(EditorConfigSchema, data ?? {}, source);
}

/** Default location of the user config file. */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME ?? join(homedir(), '.config');
  return join(base, 'gridpad', 'config.json');
}

/**
 * Load the config named by GRIDPAD_CONFIG, or the default path when it
 * exists, or the defaults. GRIDPAD_LOG_FILE overrides `logFile`.
 */
export function loadEditorConfig(env: NodeJS.ProcessEnv = process.env): EditorConfig {
  const explicit = env.GRIDPAD_CONFIG;
  const path = explicit ?? defaultConfigPath(env);

  let config: EditorConfig = { ...DEFAULT_CONFIG };
  if (explicit !== undefined || existsSync(path)) {
    config = parseEditorConfig(readJson(path), path);
  }

  if (env.GRIDPAD_LOG_FILE) {
    config = { ...config, logFile: env.GRIDPAD_LOG_FILE };
  }
  return config;
}

function readJson(path: string): unknown {
  const text = readFileSync(path, 'utf8');
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError(path, [
      { path: '', message: `not valid JSON (${message})` },
    ]);
  }
}
