import { Type } from '@sinclair/typebox';
import type { ObjectOptions, Static, TObject, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { GridpadError } from '../errors';

type StrictObjectOptions = Omit<ObjectOptions, 'additionalProperties'>;

type SchemaRecord = Record<string, TSchema>;

/**
 * Closed object type: unknown keys in a config file are errors, not
 * silently ignored.
 */
export const StrictObject = <TProps extends SchemaRecord>(
  properties: TProps,
  options?: StrictObjectOptions,
): TObject<TProps> =>
  Type.Object(properties, {
    additionalProperties: false,
    ...options,
  });

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends GridpadError {
  readonly source: string;
  readonly issues: ConfigIssue[];

  constructor(source: string, issues: Iterable<ConfigIssue>) {
    const normalized = Array.from(issues, ({ path, message }) => ({ path, message }));
    const summary = normalized.map((issue) => `${issue.path || '/'}: ${issue.message}`).join('\n');
    super(summary ? `Invalid configuration in ${source}\n${summary}` : `Invalid configuration in ${source}`);
    this.source = source;
    this.issues = normalized;
  }
}

/**
 * Fill defaults, then check. Returns the typed value or throws with every
 * issue listed.
 */
export function parseWithSchema<T extends TSchema>(schema: T, data: unknown, source: string): Static<T> {
  const withDefaults = Value.Default(schema, Value.Clone(data));
  if (Value.Check(schema, withDefaults)) {
    return withDefaults;
  }
  throw new ConfigValidationError(source, Value.Errors(schema, withDefaults));
}
