/**
 * Neighbor Selector
 *
 * Sizes the neighbor pool adaptively from the distance distribution, then
 * keeps the closest users who still have something to recommend.
 *
 * POOL SIZING (percentile rule):
 * - count = rows with dist <= p-th percentile of all distances
 * - count < minRows: target = minRows, rows kept as-is
 * - count > maxRows: target = maxRows, rows kept as-is
 * - otherwise:      target = count, rows filtered to the cutoff
 * - no rows:        target = minRows
 * Only the middle branch filters. Callers truncate by rank afterwards.
 */

import type { NeighborBounds, NeighborDistance } from '../../../types/dishmatch';
import type { InteractionTable } from '../data/table';
import type { PreferenceLedger } from '../ledger';
import { buildMatrix, distance, RatingMatrix } from '../similarity/matrix';

export const DEFAULT_MIN_ROWS = 5;
export const DEFAULT_MAX_ROWS = 100;
export const DEFAULT_PERCENTILE = 10;

export const DEFAULT_BOUNDS: NeighborBounds = {
  minRows: DEFAULT_MIN_ROWS,
  maxRows: DEFAULT_MAX_ROWS,
  percentile: DEFAULT_PERCENTILE,
};

// =============================================================================
// PERCENTILE FILTER
// =============================================================================

/**
 * p-th percentile with linear interpolation between closest ranks.
 *
 * @param p - Percentile in 0..100
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) {
    throw new RangeError('Cannot take a percentile of no values');
  }

  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

export interface PercentileFilterResult<T> {
  rows: T[];
  targetCount: number;
  /** Distance cutoff, null when there were no rows */
  threshold: number | null;
}

export function percentileFilter<T extends { dist: number }>(
  rows: readonly T[],
  minRows: number,
  maxRows: number,
  pct: number = DEFAULT_PERCENTILE
): PercentileFilterResult<T> {
  if (rows.length === 0) {
    return { rows: [...rows], targetCount: minRows, threshold: null };
  }

  const threshold = percentile(rows.map(r => r.dist), pct);
  const qualifying = rows.filter(r => r.dist <= threshold);

  if (qualifying.length < minRows) {
    return { rows: [...rows], targetCount: minRows, threshold };
  }
  if (qualifying.length > maxRows) {
    return { rows: [...rows], targetCount: maxRows, threshold };
  }
  return { rows: qualifying, targetCount: qualifying.length, threshold };
}

/**
 * Stable ascending sort by distance
 */
export function rankByDistance<T extends { dist: number }>(rows: readonly T[]): T[] {
  return [...rows].sort((a, b) => a.dist - b.dist);
}

// =============================================================================
// SELECTION
// =============================================================================

export interface NeighborSelection {
  /** Every user who rated at least one ledger recipe, in matrix row order */
  distances: NeighborDistance[];
  /** Closest users, truncated to the target count */
  pool: number[];
  /** Pool users with at least one recipe the active user has not rated */
  neighbors: number[];
  /** neighbors x recipes not in the ledger */
  matrix: RatingMatrix;
}

export function selectNeighbors(
  table: InteractionTable,
  ledger: PreferenceLedger,
  bounds: NeighborBounds = DEFAULT_BOUNDS
): NeighborSelection {
  const ratedRecipeIds = ledger.recipeIds();

  const ratedMatrix = buildMatrix(table.forRecipes(ratedRecipeIds));
  const distances: NeighborDistance[] = Array.from(
    distance(ledger.toReference(), ratedMatrix),
    ([userId, dist]) => ({ userId, dist })
  );

  const { rows, targetCount } = percentileFilter(
    distances,
    bounds.minRows,
    bounds.maxRows,
    bounds.percentile
  );
  const pool = rankByDistance(rows)
    .slice(0, targetCount)
    .map(row => row.userId);

  const ratedSet = new Set(ratedRecipeIds);
  const remaining = table.forUsers(pool).filter(r => !ratedSet.has(r.recipe_id));
  const usersWithRemaining = new Set(remaining.map(r => r.user_id));
  const neighbors = pool.filter(userId => usersWithRemaining.has(userId));

  return {
    distances,
    pool,
    neighbors,
    matrix: buildMatrix(remaining).withRows(neighbors),
  };
}

/**
 * Full rating matrix of the neighbors, padded with the given columns.
 * Used by the graph builder and the neighbor report.
 */
export function neighborMatrix(
  table: InteractionTable,
  neighbors: readonly number[],
  extraRecipeIds: readonly number[] = []
): RatingMatrix {
  const matrix = buildMatrix(table.forUsers(neighbors));
  const columns = Array.from(new Set([...matrix.recipeIds, ...extraRecipeIds])).sort((a, b) => a - b);
  return matrix.withRows(neighbors).withColumns(columns);
}
