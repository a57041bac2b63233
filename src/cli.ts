#!/usr/bin/env node
/**
 * CLI entry point for tube-trail
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { createInterface } from 'node:readline/promises';
import { runSearch, parseSearchMode, SEARCH_MODES } from './crawl/crawler.js';
import type { SearchMode } from './crawl/crawler.js';
import { closeAllSessions, validateProxyUrl } from './youtube/http-client.js';
import type { ClientOptions } from './youtube/types.js';
import { loadConfig, resolveConfigPath, writeConfig } from './config/config-file.js';
import {
  OPTION_NAMES,
  isOptionName,
  mergeOptions,
  parseOptionValue,
} from './config/options.js';
import type { OptionName, OptionOverrides, StoredConfig } from './config/options.js';
import { TubeTrailError } from './errors.js';
import { createRunContext } from './logger.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

/** Flags accepted before and after any subcommand. */
interface GlobalFlags {
  verbose: boolean;
  configPath?: string;
}

type GlobalFlagResult = { handled: true; index: number } | { handled: false } | { error: string };

/**
 * Try to parse a global flag at position i.
 * Returns { handled: true, index } with updated index if consumed,
 * { handled: false } if unrecognized, or { error } on validation failure.
 */
function parseGlobalFlag(args: string[], i: number, flags: GlobalFlags): GlobalFlagResult {
  switch (args[i]) {
    case '--verbose':
      flags.verbose = true;
      return { handled: true, index: i };
    case '--config':
      if (i + 1 >= args.length) return { error: '--config requires a value' };
      flags.configPath = args[++i];
      return { handled: true, index: i };
    default:
      return { handled: false };
  }
}

/** Search flags that set an option directly. */
const OPTION_FLAGS = new Map<string, OptionName>([
  ['-d', 'max_depth'],
  ['--max-depth', 'max_depth'],
  ['-k', 'api_key'],
  ['--api-key', 'api_key'],
  ['-o', 'output_dir'],
  ['--output-dir', 'output_dir'],
  ['-f', 'output_format'],
  ['--output-format', 'output_format'],
  ['-r', 'region_code'],
  ['--region-code', 'region_code'],
  ['-l', 'lang_code'],
  ['--lang-code', 'lang_code'],
  ['-s', 'safe_search'],
  ['--safe-search', 'safe_search'],
  ['-e', 'encoding'],
  ['--encoding', 'encoding'],
]);

interface SearchCliOptions extends GlobalFlags {
  mode: SearchMode;
  query: string;
  overrides: OptionOverrides;
  client: ClientOptions;
}

type SearchParseResult =
  | { kind: 'ok'; opts: SearchCliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

/** Dash-prefixed tokens other than negative numbers, which are values. */
function isFlagLike(arg: string): boolean {
  return arg.startsWith('-') && arg.length > 1 && !/^-\d/.test(arg);
}

/** Run a parse step that reports bad values as TubeTrailError. */
function attempt<T>(fn: () => T): { value: T } | { message: string } {
  try {
    return { value: fn() };
  } catch (err) {
    if (err instanceof TubeTrailError) return { message: err.message };
    throw err;
  }
}

export function parseSearchArgs(
  args: string[],
  base: GlobalFlags = { verbose: false }
): SearchParseResult {
  const flags: GlobalFlags = { ...base };
  const positional: string[] = [];
  const warnings: string[] = [];
  const numbers: string[] = [];
  const overrides: OptionOverrides = {};
  const client: ClientOptions = {};
  let optionsEnded = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // Everything after `--` is positional, so ids starting with `-` can be passed
    if (optionsEnded) {
      positional.push(arg);
      continue;
    }
    if (arg === '--') {
      optionsEnded = true;
      continue;
    }

    const global = parseGlobalFlag(args, i, flags);
    if ('error' in global) return { kind: 'error', message: global.error };
    if (global.handled) {
      i = global.index;
      continue;
    }

    const option = OPTION_FLAGS.get(arg);
    if (option) {
      if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
      const raw = args[++i];
      const parsed = attempt(() => parseOptionValue(option, raw));
      if ('message' in parsed) return { kind: 'error', message: parsed.message };
      Object.assign(overrides, parsed.value);
      continue;
    }

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-n':
      case '--number':
        if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
        numbers.push(args[++i]);
        break;
      case '--proxy': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--proxy requires a value' };
        const proxy = args[++i];
        const valid = attempt(() => validateProxyUrl(proxy));
        if ('message' in valid) return { kind: 'error', message: valid.message };
        client.proxy = proxy;
        break;
      }
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--timeout requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--timeout must be a positive integer (milliseconds)' };
        client.timeoutMs = v;
        break;
      }
      default:
        if (isFlagLike(arg)) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (numbers.length > 0) {
    const parsed = attempt(() => parseOptionValue('number', numbers.join(',')));
    if ('message' in parsed) return { kind: 'error', message: parsed.message };
    Object.assign(overrides, parsed.value);
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <query> argument for search' };
  }
  if (positional.length > 2) {
    return { kind: 'error', message: `Unexpected argument: ${positional[2]}` };
  }
  // A lone mode name means the query was left out (or taken for a flag)
  if (positional.length === 1 && SEARCH_MODES.some((m) => m === positional[0])) {
    return { kind: 'error', message: 'Missing required <query> argument for search' };
  }

  const [modeArg, query] = positional.length === 2 ? positional : ['term', positional[0]];
  const mode = attempt(() => parseSearchMode(modeArg));
  if ('message' in mode) return { kind: 'error', message: mode.message };

  return {
    kind: 'ok',
    opts: { ...flags, mode: mode.value, query, overrides, client },
    warnings,
  };
}

export type ConfigAction =
  | { action: 'get'; key: OptionName }
  | { action: 'set'; key: OptionName; value: string }
  | { action: 'unset'; key: OptionName }
  | { action: 'clear'; yes: boolean };

interface ConfigCliOptions extends GlobalFlags {
  command: ConfigAction;
}

type ConfigParseResult =
  | { kind: 'ok'; opts: ConfigCliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export function parseConfigArgs(
  args: string[],
  base: GlobalFlags = { verbose: false }
): ConfigParseResult {
  const flags: GlobalFlags = { ...base };
  const positional: string[] = [];
  const warnings: string[] = [];
  let yes = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    const global = parseGlobalFlag(args, i, flags);
    if ('error' in global) return { kind: 'error', message: global.error };
    if (global.handled) {
      i = global.index;
      continue;
    }

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-y':
      case '--yes':
        yes = true;
        break;
      default:
        if (isFlagLike(arg)) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  const [action, key, value] = positional;
  if (!action) {
    return { kind: 'error', message: 'Missing config action (get, set, unset or clear)' };
  }

  if (action === 'clear') {
    return { kind: 'ok', opts: { ...flags, command: { action, yes } }, warnings };
  }
  if (action !== 'get' && action !== 'set' && action !== 'unset') {
    return { kind: 'error', message: `Unknown config action: ${action}` };
  }

  if (!key) return { kind: 'error', message: `Missing KEY for config ${action}` };
  if (!isOptionName(key)) {
    return {
      kind: 'error',
      message: `Unknown option '${key}'. Expected one of: ${OPTION_NAMES.join(', ')}`,
    };
  }

  if (action === 'set') {
    if (value === undefined) return { kind: 'error', message: 'Missing VALUE for config set' };
    return { kind: 'ok', opts: { ...flags, command: { action, key, value } }, warnings };
  }
  return { kind: 'ok', opts: { ...flags, command: { action, key } }, warnings };
}

function printUsage(): void {
  console.log(`Usage: tube-trail search [term|url|id] <query> [search-options]
       tube-trail config get|unset <key>
       tube-trail config set <key> <value>
       tube-trail config clear [--yes]

Crawls YouTube's related-videos graph breadth-first from the seed videos
found by a search term, a watch URL or a video id.

Search options:
  -n, --number <n>          Videos fetched per level, repeatable or comma-separated
                            (the last value applies to deeper levels)
  -d, --max-depth <n>       Maximal number of expansion steps (0-100)
  -k, --api-key <key>       API key for the YouTube Data API v3
  -o, --output-dir <dir>    Directory where output files are saved
  -f, --output-format csv   File format of output files
  -r, --region-code <code>  Only videos unrestricted in a region
  -l, --lang-code <code>    Videos most relevant to a language
  -s, --safe-search <v>     none, moderate or strict
  -e, --encoding <v>        Transform text to ascii, utf-8 or smart
  --proxy <url>             HTTP/SOCKS proxy URL
  --timeout <ms>            Request timeout in milliseconds (default: 20000)
  --                        Treat the remaining arguments as mode and query

Global options:
  --verbose                 Log every step and always print the result tree
  --config <path>           Config file (env: TUBE_TRAIL_CONFIG,
                            default: ~/.config/tube-trail/config.json)
  -v, --version             Show version number
  -h, --help                Show this help message

Config keys: ${OPTION_NAMES.join(', ')}`);
}

function formatValue(value: unknown): string {
  return Array.isArray(value) ? value.join(',') : String(value);
}

/** Stored config with the API key masked, for verbose output. */
function redactConfig(config: StoredConfig): StoredConfig {
  return config.api_key ? { ...config, api_key: '***' } : config;
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

async function runSearchCommand(opts: SearchCliOptions): Promise<void> {
  const ctx = createRunContext(opts.verbose);
  const configPath = resolveConfigPath(opts.configPath);
  const stored = loadConfig(configPath);
  const options = mergeOptions(stored, opts.overrides);
  ctx.logger.debug(
    { configPath, options: { ...options, api_key: options.api_key ? '***' : '' } },
    'Working with configuration'
  );

  const outcome = await runSearch(
    { mode: opts.mode, query: opts.query, options, client: opts.client },
    ctx
  );

  if (outcome.exportedFiles.length > 0) {
    console.error(`Exported results to: ${options.output_dir}`);
  }
  if (outcome.report !== null) {
    console.log('Result:');
    if (outcome.report) console.log(outcome.report);
  }
}

async function runConfigCommand(opts: ConfigCliOptions): Promise<void> {
  const ctx = createRunContext(opts.verbose);
  const configPath = resolveConfigPath(opts.configPath);
  const { command } = opts;

  if (command.action === 'clear') {
    const proceed =
      command.yes || (await confirm('Do you really want to clear the configuration file?'));
    if (!proceed) {
      console.error('Aborted! Nothing changed.');
      return;
    }
    writeConfig({}, configPath);
    console.error('Configuration file cleared!');
    return;
  }

  const stored = loadConfig(configPath);
  ctx.logger.debug({ configPath, config: redactConfig(stored) }, 'Read configuration');

  switch (command.action) {
    case 'get': {
      const value = stored[command.key];
      if (value === undefined) {
        console.error(`Warning: The value of '${command.key}' is not set!`);
      } else {
        console.log(`The value of '${command.key}' is set to ${formatValue(value)}.`);
      }
      return;
    }
    case 'set': {
      const next: StoredConfig = { ...stored, ...parseOptionValue(command.key, command.value) };
      writeConfig(next, configPath);
      ctx.logger.debug({ config: redactConfig(next) }, 'Wrote configuration');
      console.error('Successfully changed!');
      return;
    }
    case 'unset': {
      const next: StoredConfig = { ...stored };
      delete next[command.key];
      writeConfig(next, configPath);
      ctx.logger.debug({ config: redactConfig(next) }, 'Wrote configuration');
      console.error('Successfully written!');
      return;
    }
  }
}

function reportParseError(message: string): number {
  console.error(`Error: ${message}`);
  printUsage();
  return 1;
}

/**
 * Run the CLI with the given arguments and return the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const flags: GlobalFlags = { verbose: false };
  let i = 0;
  for (; i < argv.length; i++) {
    const global = parseGlobalFlag(argv, i, flags);
    if ('error' in global) return reportParseError(global.error);
    if (!global.handled) break;
    i = global.index;
  }

  const command = argv[i];
  const rest = argv.slice(i + 1);

  try {
    switch (command) {
      case '-v':
      case '--version':
        console.log(`tube-trail ${getVersion()}`);
        return 0;
      case undefined:
      case '-h':
      case '--help':
        printUsage();
        return 0;
      case 'search': {
        const result = parseSearchArgs(rest, flags);
        if (result.kind === 'help') {
          printUsage();
          return 0;
        }
        if (result.kind === 'error') return reportParseError(result.message);
        for (const warning of result.warnings) console.error(`Warning: ${warning}`);
        await runSearchCommand(result.opts);
        return 0;
      }
      case 'config': {
        const result = parseConfigArgs(rest, flags);
        if (result.kind === 'help') {
          printUsage();
          return 0;
        }
        if (result.kind === 'error') return reportParseError(result.message);
        for (const warning of result.warnings) console.error(`Warning: ${warning}`);
        await runConfigCommand(result.opts);
        return 0;
      }
      default:
        return reportParseError(`Unknown command '${command}'. Expected search or config`);
    }
  } catch (err) {
    if (err instanceof TubeTrailError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  } finally {
    await closeAllSessions();
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      // httpcloak's native library keeps libuv handles open; exit explicitly
      // once sessions are closed.
      process.exit(code);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
