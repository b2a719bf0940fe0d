/**
 * Dishmatch Settings
 *
 * Environment Variables:
 * - DISHMATCH_MIN_NEIGHBORS: Floor of the neighbor pool (default 5)
 * - DISHMATCH_MAX_NEIGHBORS: Ceiling of the neighbor pool (default 100)
 * - DISHMATCH_NEIGHBOR_PERCENTILE: Distance cutoff percentile (default 10)
 * - DISHMATCH_GRAPH_PRUNING: 'component' | 'isolated' (default 'component')
 * - DISHMATCH_DATA_DIR: Directory holding the interaction CSVs (default 'data')
 * - DATABASE_URL: When set, tables load from Postgres instead of CSV
 *
 * Invalid values throw at read time.
 */

import type { GraphPruning, NeighborBounds } from '../../../types/dishmatch';
import { DishmatchError } from '../errors';
import { DEFAULT_BOUNDS } from '../neighbors/selector';

export interface DishmatchSettings extends NeighborBounds {
  pruning: GraphPruning;
  dataDir: string;
  databaseUrl: string | null;
}

export type SettingsEnv = Record<string, string | undefined>;

export const DEFAULT_SETTINGS: DishmatchSettings = {
  ...DEFAULT_BOUNDS,
  pruning: 'component',
  dataDir: 'data',
  databaseUrl: null,
};

export class SettingsError extends DishmatchError {
  constructor(message: string) {
    super('invalid_settings', message);
    this.name = 'SettingsError';
  }
}

/**
 * Parse a non-negative integer env value.
 * Returns defaultValue if undefined or empty.
 */
function parseCount(name: string, value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new SettingsError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parseInt(trimmed, 10);
}

function parsePercentile(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_SETTINGS.percentile;
  }

  const parsed = Number(value.trim());
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new SettingsError(`DISHMATCH_NEIGHBOR_PERCENTILE must be within 0..100, got "${value}"`);
  }
  return parsed;
}

export function parsePruning(value: string | undefined): GraphPruning {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_SETTINGS.pruning;
  }

  const normalized = value.toLowerCase().trim();
  if (normalized === 'component' || normalized === 'isolated') {
    return normalized;
  }
  throw new SettingsError(`DISHMATCH_GRAPH_PRUNING must be "component" or "isolated", got "${value}"`);
}

/**
 * Check the neighbor bounds are usable together
 */
export function assertBounds(bounds: NeighborBounds): void {
  if (!Number.isInteger(bounds.minRows) || bounds.minRows < 0) {
    throw new SettingsError(`minRows must be a non-negative integer, got ${bounds.minRows}`);
  }
  if (!Number.isInteger(bounds.maxRows) || bounds.maxRows < 0) {
    throw new SettingsError(`maxRows must be a non-negative integer, got ${bounds.maxRows}`);
  }
  if (bounds.minRows > bounds.maxRows) {
    throw new SettingsError(`minRows (${bounds.minRows}) cannot exceed maxRows (${bounds.maxRows})`);
  }
  if (!Number.isFinite(bounds.percentile) || bounds.percentile < 0 || bounds.percentile > 100) {
    throw new SettingsError(`percentile must be within 0..100, got ${bounds.percentile}`);
  }
}

/**
 * Get current settings from the environment.
 */
export function getSettings(env: SettingsEnv = process.env): DishmatchSettings {
  const settings: DishmatchSettings = {
    minRows: parseCount('DISHMATCH_MIN_NEIGHBORS', env.DISHMATCH_MIN_NEIGHBORS, DEFAULT_SETTINGS.minRows),
    maxRows: parseCount('DISHMATCH_MAX_NEIGHBORS', env.DISHMATCH_MAX_NEIGHBORS, DEFAULT_SETTINGS.maxRows),
    percentile: parsePercentile(env.DISHMATCH_NEIGHBOR_PERCENTILE),
    pruning: parsePruning(env.DISHMATCH_GRAPH_PRUNING),
    dataDir: env.DISHMATCH_DATA_DIR?.trim() || DEFAULT_SETTINGS.dataDir,
    databaseUrl: env.DATABASE_URL?.trim() || null,
  };

  assertBounds(settings);
  return settings;
}

/**
 * Get settings for testing purposes (allows override)
 */
export function getSettingsForTest(overrides?: Partial<DishmatchSettings>): DishmatchSettings {
  return {
    ...getSettings({}),
    ...overrides,
  };
}
