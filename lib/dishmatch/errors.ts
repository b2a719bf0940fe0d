/**
 * Dishmatch Errors
 *
 * All core failures are synchronous and never retried internally.
 * Each carries a stable `code` for the presentation layer to branch on.
 */

export type DishmatchErrorCode =
  | 'invalid_dish_type'
  | 'preference_not_found'
  | 'no_more_recipes'
  | 'no_neighbor'
  | 'data_shape'
  | 'recipe_not_found'
  | 'invalid_settings';

// =============================================================================
// BASE CLASS
// =============================================================================

export class DishmatchError extends Error {
  readonly code: DishmatchErrorCode;

  constructor(code: DishmatchErrorCode, message: string) {
    super(message);
    this.name = 'DishmatchError';
    this.code = code;

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

// =============================================================================
// CORE ERRORS
// =============================================================================

/**
 * Dish type outside "main" / "dessert". User-correctable, not retryable.
 */
export class InvalidDishTypeError extends DishmatchError {
  readonly dishType: string;

  constructor(dishType: string) {
    super('invalid_dish_type', `The type of dish must be "main" or "dessert", not "${dishType}".`);
    this.name = 'InvalidDishTypeError';
    this.dishType = dishType;
  }
}

/**
 * Removal of a recipe the ledger does not hold (stale UI state or caller bug).
 */
export class PreferenceNotFoundError extends DishmatchError {
  readonly recipeId: number;

  constructor(recipeId: number) {
    super('preference_not_found', `The recipe ID ${recipeId} is not in the user preferences.`);
    this.name = 'PreferenceNotFoundError';
    this.recipeId = recipeId;
  }
}

/**
 * Every recipe of the table is already in the ledger. Terminal for the dish type.
 */
export class NoMoreRecipesError extends DishmatchError {
  constructor() {
    super('no_more_recipes', 'No more recipes to suggest.');
    this.name = 'NoMoreRecipesError';
  }
}

/**
 * Graph or report requested before any neighbor-driven suggestion.
 */
export class NoNeighborError extends DishmatchError {
  constructor() {
    super('no_neighbor', 'No neighbor found');
    this.name = 'NoNeighborError';
  }
}

/**
 * Malformed interaction or catalog data. Fatal at load time.
 */
export class DataShapeError extends DishmatchError {
  constructor(message: string) {
    super('data_shape', message);
    this.name = 'DataShapeError';
  }
}

export class RecipeNotFoundError extends DishmatchError {
  readonly recipeId: number;

  constructor(recipeId: number) {
    super('recipe_not_found', `Recipe ${recipeId} is not in the catalog.`);
    this.name = 'RecipeNotFoundError';
    this.recipeId = recipeId;
  }
}

// =============================================================================
// GUARDS
// =============================================================================

/**
 * Check if error is a dishmatch error, optionally with a specific code
 */
export function isDishmatchError(error: unknown, code?: DishmatchErrorCode): error is DishmatchError {
  if (!(error instanceof DishmatchError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
