/**
 * Normalization of raw traversal settings into a TraversalConfig
 */
import { ConfigError } from '../errors.js';
import type { RawTraversalConfig, TraversalConfig } from './types.js';

type RawBranchCounts = RawTraversalConfig['branchCounts'];

function isSchedule(value: RawBranchCounts): value is readonly (number | string)[] {
  return Array.isArray(value);
}

function toInteger(value: number | string, label: string): number {
  if (typeof value === 'string' && value.trim() === '') {
    throw new ConfigError(`${label} must be an integer, got an empty value`);
  }
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${label} must be an integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Build a fresh TraversalConfig from raw settings. A scalar branch count becomes
 * a one-entry schedule. Normalizing an already-normalized config returns an
 * equal structure. The input is never mutated.
 */
export function normalizeTraversalConfig(raw: RawTraversalConfig): TraversalConfig {
  const maxDepth = toInteger(raw.maxDepth, 'max_depth');
  if (maxDepth < 0) {
    throw new ConfigError(`max_depth must be non-negative, got ${maxDepth}`);
  }

  const schedule: readonly (number | string)[] = isSchedule(raw.branchCounts)
    ? raw.branchCounts
    : [raw.branchCounts];
  if (schedule.length === 0) {
    throw new ConfigError('number must list at least one branch count');
  }

  const branchCounts = schedule.map((entry, level) => {
    const count = toInteger(entry, `number[${level}]`);
    if (count <= 0) {
      throw new ConfigError(`number[${level}] must be a positive integer, got ${count}`);
    }
    return count;
  });

  return { maxDepth, branchCounts };
}
