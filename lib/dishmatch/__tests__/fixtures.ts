/**
 * Shared test fixtures
 */

import type { DishType, InteractionRecord, Rating } from '../../../types/dishmatch';
import { createStaticTableProvider, type InteractionTableProvider } from '../data/provider';
import { createInteractionTable, type InteractionTable } from '../data/table';

/**
 * Build records from user_id -> { recipe_id: rating }
 */
export const recordsFrom = (ratings: Record<number, Record<number, Rating>>): InteractionRecord[] =>
  Object.entries(ratings).flatMap(([userId, byRecipe]) =>
    Object.entries(byRecipe).map(([recipeId, rating]) => ({
      user_id: Number(userId),
      recipe_id: Number(recipeId),
      rating,
    }))
  );

export const tableFrom = (
  dishType: DishType,
  ratings: Record<number, Record<number, Rating>>
): InteractionTable => createInteractionTable(dishType, recordsFrom(ratings));

/**
 * Main dishes: four users, three recipes.
 * Record order: (1,101) (2,102) (3,103) (4,102) (4,103)
 */
export const createMainTable = (): InteractionTable =>
  tableFrom('main', {
    1: { 101: 1 },
    2: { 102: 1 },
    3: { 103: -1 },
    4: { 102: 1, 103: 1 },
  });

/**
 * Desserts: two users, two recipes.
 */
export const createDessertTable = (): InteractionTable =>
  tableFrom('dessert', {
    1: { 201: 1 },
    2: { 202: -1 },
  });

export const createProvider = (): InteractionTableProvider =>
  createStaticTableProvider({ main: createMainTable(), dessert: createDessertTable() });

/**
 * Rng that always returns the same value
 */
export const fixedRng = (value: number) => (): number => value;
