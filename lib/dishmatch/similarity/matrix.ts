/**
 * Similarity Engine
 *
 * Pivots interaction records into a dense user x recipe view and measures
 * how far each user's row sits from a reference rating vector (L1).
 *
 * INVARIANTS:
 * - Rows are the users present in the records, ascending
 * - Columns are the recipes present in the records, ascending
 * - A missing (user, recipe) cell reads as 0 ("no opinion")
 * - Distances are non-negative integers; 0 means full agreement
 */

import type { CellValue, InteractionRecord, Rating } from '../../../types/dishmatch';
import { DataShapeError } from '../errors';

// =============================================================================
// RATING MATRIX
// =============================================================================

export class RatingMatrix {
  readonly userIds: readonly number[];
  readonly recipeIds: readonly number[];
  private readonly cells: ReadonlyMap<number, ReadonlyMap<number, Rating>>;

  constructor(
    userIds: readonly number[],
    recipeIds: readonly number[],
    cells: ReadonlyMap<number, ReadonlyMap<number, Rating>>
  ) {
    this.userIds = userIds;
    this.recipeIds = recipeIds;
    this.cells = cells;
  }

  get isEmpty(): boolean {
    return this.userIds.length === 0;
  }

  /**
   * Cell value, 0 for any user or recipe outside the matrix
   */
  get(userId: number, recipeId: number): CellValue {
    return this.cells.get(userId)?.get(recipeId) ?? 0;
  }

  /**
   * Row values in column order
   */
  row(userId: number): CellValue[] {
    return this.recipeIds.map(recipeId => this.get(userId, recipeId));
  }

  /**
   * Sum of each column across all rows, in column order
   */
  columnSums(): Array<{ recipeId: number; sum: number }> {
    return this.recipeIds.map(recipeId => ({
      recipeId,
      sum: this.userIds.reduce<number>((total, userId) => total + this.get(userId, recipeId), 0),
    }));
  }

  /**
   * Same rows, exactly the given columns. Columns the matrix lacks read as 0.
   */
  withColumns(recipeIds: readonly number[]): RatingMatrix {
    return new RatingMatrix(this.userIds, [...recipeIds], this.cells);
  }

  /**
   * Reindex rows to the given users. Users the matrix lacks get all-zero rows.
   */
  withRows(userIds: readonly number[]): RatingMatrix {
    return new RatingMatrix([...userIds], this.recipeIds, this.cells);
  }
}

// =============================================================================
// PIVOT
// =============================================================================

function ascending(a: number, b: number): number {
  return a - b;
}

/**
 * Pivot records into a RatingMatrix.
 *
 * @throws DataShapeError if a (user_id, recipe_id) pair appears twice
 */
export function buildMatrix(records: readonly InteractionRecord[]): RatingMatrix {
  const cells = new Map<number, Map<number, Rating>>();
  const recipeIds = new Set<number>();

  for (const record of records) {
    let row = cells.get(record.user_id);
    if (!row) {
      row = new Map();
      cells.set(record.user_id, row);
    }
    if (row.has(record.recipe_id)) {
      throw new DataShapeError(
        `Cannot pivot: duplicate rating for user ${record.user_id} and recipe ${record.recipe_id}`
      );
    }
    row.set(record.recipe_id, record.rating);
    recipeIds.add(record.recipe_id);
  }

  return new RatingMatrix(
    Array.from(cells.keys()).sort(ascending),
    Array.from(recipeIds).sort(ascending),
    cells
  );
}

// =============================================================================
// DISTANCE
// =============================================================================

export function cellDistance(a: CellValue, b: CellValue): number {
  return Math.abs(a - b);
}

/**
 * L1 distance between two equally long vectors
 */
export function l1Distance(a: readonly CellValue[], b: readonly CellValue[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector lengths differ: ${a.length} vs ${b.length}`);
  }
  let total = 0;
  for (let i = 0; i < a.length; i++) {
    total += cellDistance(a[i], b[i]);
  }
  return total;
}

/**
 * Distance of every matrix row to the reference ratings.
 *
 * Compared over the reference recipe ids, aligned by id. A reference recipe
 * the matrix lacks compares against 0.
 *
 * @returns user_id -> distance, in matrix row order
 */
export function distance(
  reference: ReadonlyMap<number, CellValue>,
  matrix: RatingMatrix
): Map<number, number> {
  const recipeIds = Array.from(reference.keys());
  const referenceVector = recipeIds.map((recipeId): CellValue => reference.get(recipeId) ?? 0);

  const distances = new Map<number, number>();
  for (const userId of matrix.userIds) {
    const userVector = recipeIds.map(recipeId => matrix.get(userId, recipeId));
    distances.set(userId, l1Distance(userVector, referenceVector));
  }
  return distances;
}
