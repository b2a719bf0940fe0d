/**
 * Interaction Table
 *
 * Immutable (user_id, recipe_id, rating) records for one dish type.
 * Validated once at construction; every later read trusts the shape.
 *
 * INVARIANTS:
 * - ids are integers
 * - rating is LIKE (+1) or DISLIKE (-1)
 * - one record per (user_id, recipe_id)
 */

import type { DishType, InteractionRecord, Rating } from '../../../types/dishmatch';
import { DISLIKE, LIKE } from '../../../types/dishmatch';
import { DataShapeError } from '../errors';

export interface InteractionTable {
  readonly dishType: DishType;
  readonly records: readonly InteractionRecord[];
  readonly size: number;
  /** Distinct recipe ids, ascending */
  recipeIds(): readonly number[];
  forRecipes(recipeIds: Iterable<number>): InteractionRecord[];
  forUsers(userIds: Iterable<number>): InteractionRecord[];
  withoutRecipes(recipeIds: Iterable<number>): InteractionRecord[];
}

export function isRating(value: unknown): value is Rating {
  return value === LIKE || value === DISLIKE;
}

/**
 * Key for duplicate detection of a (user, recipe) pair
 */
export function pairKey(userId: number, recipeId: number): string {
  return `${userId}:${recipeId}`;
}

/**
 * Validate records, throwing DataShapeError at the first bad one.
 *
 * @param source - Label used in error messages (file name, table name)
 */
export function assertValidRecords(records: readonly InteractionRecord[], source: string): void {
  const seen = new Set<string>();

  records.forEach((record, index) => {
    if (!Number.isInteger(record.user_id) || !Number.isInteger(record.recipe_id)) {
      throw new DataShapeError(
        `${source}: record ${index} has a non-integer id (user_id=${record.user_id}, recipe_id=${record.recipe_id})`
      );
    }
    if (!isRating(record.rating)) {
      throw new DataShapeError(`${source}: record ${index} has rating ${String(record.rating)}, expected 1 or -1`);
    }

    const key = pairKey(record.user_id, record.recipe_id);
    if (seen.has(key)) {
      throw new DataShapeError(
        `${source}: duplicate interaction for user ${record.user_id} and recipe ${record.recipe_id}`
      );
    }
    seen.add(key);
  });
}

class FrozenInteractionTable implements InteractionTable {
  readonly dishType: DishType;
  readonly records: readonly InteractionRecord[];
  private readonly distinctRecipeIds: readonly number[];

  constructor(dishType: DishType, records: readonly InteractionRecord[]) {
    this.dishType = dishType;
    this.records = Object.freeze(records.map(record => Object.freeze({ ...record })));
    this.distinctRecipeIds = Object.freeze(
      Array.from(new Set(records.map(r => r.recipe_id))).sort((a, b) => a - b)
    );
  }

  get size(): number {
    return this.records.length;
  }

  recipeIds(): readonly number[] {
    return this.distinctRecipeIds;
  }

  forRecipes(recipeIds: Iterable<number>): InteractionRecord[] {
    const wanted = new Set(recipeIds);
    return this.records.filter(r => wanted.has(r.recipe_id));
  }

  forUsers(userIds: Iterable<number>): InteractionRecord[] {
    const wanted = new Set(userIds);
    return this.records.filter(r => wanted.has(r.user_id));
  }

  withoutRecipes(recipeIds: Iterable<number>): InteractionRecord[] {
    const excluded = new Set(recipeIds);
    return this.records.filter(r => !excluded.has(r.recipe_id));
  }
}

/**
 * Build an immutable table. Throws DataShapeError on malformed records.
 */
export function createInteractionTable(
  dishType: DishType,
  records: readonly InteractionRecord[],
  source: string = `${dishType} interactions`
): InteractionTable {
  assertValidRecords(records, source);
  return new FrozenInteractionTable(dishType, records);
}
