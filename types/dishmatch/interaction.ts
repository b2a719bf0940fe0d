/**
 * DISHMATCH: Interaction Types
 *
 * INVARIANTS:
 * - Tables are per dish type and never mixed
 * - One record per (user_id, recipe_id) pair
 * - A stored rating is never 0; 0 only exists as an empty matrix cell
 */

// =============================================================================
// DISH TYPES
// =============================================================================

export const DISH_TYPES = ['main', 'dessert'] as const;

/**
 * Catalog partition. Selects which interaction table and ledger a session uses.
 */
export type DishType = (typeof DISH_TYPES)[number];

// =============================================================================
// RATINGS
// =============================================================================

export const LIKE = 1;
export const DISLIKE = -1;

export type Rating = typeof LIKE | typeof DISLIKE;

/**
 * Matrix cell value: a rating, or 0 for "no opinion"
 */
export type CellValue = Rating | 0;

// =============================================================================
// RECORDS
// =============================================================================

/**
 * One row of an interaction table (column names follow the source datasets)
 */
export interface InteractionRecord {
  user_id: number;
  recipe_id: number;
  rating: Rating;
}
