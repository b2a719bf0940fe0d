/**
 * Interaction Table Provider
 *
 * The only way the core reaches interaction data. Tables are loaded once,
 * outside the suggestion path, and shared read-only by every session.
 */

import type { DishType, InteractionRecord } from '../../../types/dishmatch';
import { DataShapeError } from '../errors';
import { isRating, type InteractionTable } from './table';

export interface InteractionTableProvider {
  getTable(dishType: DishType): InteractionTable;
}

export type InteractionTables = Readonly<Record<DishType, InteractionTable>>;

/**
 * In-memory provider over already-built tables
 */
export function createStaticTableProvider(tables: InteractionTables): InteractionTableProvider {
  const frozen: InteractionTables = Object.freeze({ ...tables });

  for (const [dishType, table] of Object.entries(frozen)) {
    if (table.dishType !== dishType) {
      throw new DataShapeError(`Table registered as "${dishType}" holds "${table.dishType}" interactions`);
    }
  }

  return {
    getTable(dishType: DishType): InteractionTable {
      return frozen[dishType];
    },
  };
}

// =============================================================================
// RAW ROW COERCION
// =============================================================================

/**
 * Raw interaction row as read from a CSV file or a database.
 * Column names follow the source datasets.
 */
export interface RawInteractionRow {
  user_id: unknown;
  recipe_id: unknown;
  rate: unknown;
}

/**
 * Narrow an untyped database row to the three interaction columns
 */
export function toRawInteractionRow(value: unknown, location: string): RawInteractionRow {
  if (
    typeof value !== 'object' ||
    value === null ||
    !('user_id' in value) ||
    !('recipe_id' in value) ||
    !('rate' in value)
  ) {
    throw new DataShapeError(`${location}: expected user_id, recipe_id and rate columns`);
  }
  return { user_id: value.user_id, recipe_id: value.recipe_id, rate: value.rate };
}

function toInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isInteger(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Coerce one raw row.
 *
 * @param location - Where the row came from, for error messages
 * @throws DataShapeError on a non-integer id or a rating outside {1, -1}
 */
export function toInteractionRecord(raw: RawInteractionRow, location: string): InteractionRecord {
  const userId = toInteger(raw.user_id);
  const recipeId = toInteger(raw.recipe_id);
  const rating = toInteger(raw.rate);

  if (userId === null || recipeId === null) {
    throw new DataShapeError(
      `${location}: ids must be integers (user_id=${String(raw.user_id)}, recipe_id=${String(raw.recipe_id)})`
    );
  }
  if (!isRating(rating)) {
    throw new DataShapeError(`${location}: rate must be 1 or -1, got ${String(raw.rate)}`);
  }

  return { user_id: userId, recipe_id: recipeId, rating };
}
