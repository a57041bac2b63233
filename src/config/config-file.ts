/**
 * Persisted option mapping: resolve, load, write.
 */
import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { ConfigError } from '../errors.js';
import { parseStoredConfig } from './options.js';
import type { StoredConfig } from './options.js';

/**
 * Resolve the config file path.
 * Priority: explicit > TUBE_TRAIL_CONFIG > ~/.config/tube-trail/config.json
 */
export function resolveConfigPath(explicit?: string): string {
  return (
    explicit ||
    process.env.TUBE_TRAIL_CONFIG ||
    join(homedir(), '.config', 'tube-trail', 'config.json')
  );
}

/**
 * Load the stored options. A missing file is an empty mapping.
 */
export function loadConfig(configPath: string): StoredConfig {
  if (!existsSync(configPath)) return {};

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to read config from ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined
    );
  }
  return parseStoredConfig(data, configPath);
}

/**
 * Replace the config file. Writes a sibling temp file and renames it over the
 * target, so readers never see a half-written mapping.
 */
export function writeConfig(config: StoredConfig, configPath: string): void {
  const dir = dirname(configPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const tempPath = `${configPath}.${process.pid}.tmp`;
  writeFileSync(tempPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  renameSync(tempPath, configPath);
}
