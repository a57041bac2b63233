/**
 * Typed option schema shared by the config file and the search command.
 *
 * Each option declares its kind (how a raw string converts) and a zod schema
 * (what a converted value must satisfy). parseOptionValue is the only place a
 * raw string becomes an option value.
 */
import { z } from 'zod';
import { ConfigError } from '../errors.js';

const BranchCount = z.number().int().min(1).max(50);

export const SearchOptionsSchema = z.object({
  /** Videos fetched per level; a list is a per-depth schedule. */
  number: z.union([BranchCount, z.array(BranchCount).min(1)]),
  max_depth: z.number().int().min(0).max(100),
  api_key: z.string(),
  output_dir: z.string(),
  output_format: z.enum(['csv']),
  region_code: z.string(),
  lang_code: z.string(),
  safe_search: z.enum(['none', 'moderate', 'strict']),
  encoding: z.enum(['ascii', 'utf-8', 'smart']),
});

export type SearchOptions = z.infer<typeof SearchOptionsSchema>;
export type OptionName = keyof SearchOptions;
export type TextEncoding = SearchOptions['encoding'];

/** What a config file may hold: any subset of the options. */
export const StoredConfigSchema = SearchOptionsSchema.partial();
export type StoredConfig = z.infer<typeof StoredConfigSchema>;

/** Values supplied for a single run; `undefined` means "not given". */
export type OptionOverrides = { [K in OptionName]?: SearchOptions[K] | undefined };

export const OPTION_NAMES: readonly OptionName[] = SearchOptionsSchema.keyof().options;

type OptionKind = 'integer' | 'integer-list' | 'string' | 'choice';

const OPTION_KINDS: Record<OptionName, OptionKind> = {
  number: 'integer-list',
  max_depth: 'integer',
  api_key: 'string',
  output_dir: 'string',
  output_format: 'choice',
  region_code: 'string',
  lang_code: 'string',
  safe_search: 'choice',
  encoding: 'choice',
};

export const DEFAULT_OPTIONS: SearchOptions = {
  number: 5,
  max_depth: 1,
  api_key: '',
  output_dir: '',
  output_format: 'csv',
  region_code: '',
  lang_code: '',
  safe_search: 'none',
  encoding: 'utf-8',
};

export function isOptionName(value: string): value is OptionName {
  return (OPTION_NAMES as readonly string[]).includes(value);
}

function parseInteger(name: OptionName, raw: string): number {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ConfigError(
      `Given value '${raw}' is not a valid type for ${name}. Please provide an integer.`
    );
  }
  const value = parseInt(trimmed, 10);
  if (value < 0) {
    throw new ConfigError(
      `Given integer ${value} is negative! Please provide a non-negative value for ${name}.`
    );
  }
  return value;
}

function convert(name: OptionName, raw: string): unknown {
  switch (OPTION_KINDS[name]) {
    case 'integer':
      return parseInteger(name, raw);
    case 'integer-list': {
      const values = raw.split(',').map((part) => parseInteger(name, part));
      return values.length === 1 ? values[0] : values;
    }
    case 'string':
    case 'choice':
      return raw.trim();
  }
}

function describeIssue(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

/**
 * Convert a raw command-line string into a validated value for `name`.
 * Returns a one-entry config so callers can merge it directly.
 */
export function parseOptionValue(name: OptionName, raw: string): StoredConfig {
  const result = StoredConfigSchema.safeParse({ [name]: convert(name, raw) });
  if (!result.success) {
    throw new ConfigError(`Invalid value '${raw}' for ${name}: ${describeIssue(result.error)}`);
  }
  return result.data;
}

/**
 * Validate a mapping read from disk. Unknown keys are dropped.
 */
export function parseStoredConfig(data: unknown, source: string): StoredConfig {
  const result = StoredConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${describeIssue(result.error)}`);
  }
  return result.data;
}

/**
 * Defaults, then stored values, then overrides that were actually provided.
 */
export function mergeOptions(
  stored: StoredConfig,
  overrides: OptionOverrides = {}
): SearchOptions {
  const provided: StoredConfig = {};
  for (const name of OPTION_NAMES) {
    const value = overrides[name];
    if (value !== undefined) Object.assign(provided, { [name]: value });
  }
  return { ...DEFAULT_OPTIONS, ...stored, ...provided };
}
