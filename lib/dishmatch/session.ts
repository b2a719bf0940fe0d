/**
 * User Session
 *
 * One active user, one dish type. Owns its Preference Ledger and NeighborSet;
 * the interaction table comes from the injected provider and is only read.
 *
 * Changing dish type means creating a new session: ledgers never mix tables.
 */

import type {
  AdjacencyGraph,
  DishType,
  GraphPruning,
  NeighborBounds,
  NeighborReportRow,
  NeighborSet,
  Rating,
  SuggestionResult,
} from '../../types/dishmatch';
import { DISH_TYPES, DISLIKE, LIKE } from '../../types/dishmatch';
import { buildNeighborReport } from './analytics/neighbors';
import { assertBounds, getSettings, type DishmatchSettings } from './config/settings';
import type { InteractionTableProvider } from './data/provider';
import type { InteractionTable } from './data/table';
import { InvalidDishTypeError } from './errors';
import { buildAdjacencyGraph } from './graph/adjacency';
import { PreferenceLedger } from './ledger';
import { record } from './monitoring/metrics';
import { defaultRng, type Rng } from './random';
import { suggestRecipe } from './suggest/policy';

export interface CreateUserOptions {
  rng?: Rng;
  minNeighbors?: number;
  maxNeighbors?: number;
  percentile?: number;
  pruning?: GraphPruning;
  /** Defaults to getSettings() (environment) */
  settings?: DishmatchSettings;
}

export function isDishType(value: string): value is DishType {
  return DISH_TYPES.some(dishType => dishType === value);
}

/**
 * @throws InvalidDishTypeError unless value is "main" or "dessert"
 */
export function parseDishType(value: string): DishType {
  if (!isDishType(value)) {
    console.log(`[Recs] Invalid type of dish: ${value}`);
    throw new InvalidDishTypeError(value);
  }
  return value;
}

export class UserSession {
  readonly dishType: DishType;
  private readonly table: InteractionTable;
  private readonly ledger = new PreferenceLedger();
  private readonly rng: Rng;
  private readonly bounds: NeighborBounds;
  private readonly pruning: GraphPruning;
  private neighborSet: NeighborSet = [];

  constructor(dishType: DishType, table: InteractionTable, options: CreateUserOptions = {}) {
    const settings = options.settings ?? getSettings();

    this.dishType = dishType;
    this.table = table;
    this.rng = options.rng ?? defaultRng;
    this.bounds = {
      minRows: options.minNeighbors ?? settings.minRows,
      maxRows: options.maxNeighbors ?? settings.maxRows,
      percentile: options.percentile ?? settings.percentile,
    };
    this.pruning = options.pruning ?? settings.pruning;

    assertBounds(this.bounds);
  }

  /**
   * Neighbors from the latest suggestion that ran neighbor selection
   */
  get neighbors(): NeighborSet {
    return this.neighborSet;
  }

  /**
   * Next recipe. Stores the NeighborSet the result carries, if any.
   *
   * @throws NoMoreRecipesError when every recipe of the dish type is rated
   */
  suggest(): SuggestionResult {
    const result = suggestRecipe({
      table: this.table,
      ledger: this.ledger,
      rng: this.rng,
      bounds: this.bounds,
    });
    if (result.mode !== 'cold_start') {
      this.neighborSet = result.neighbors;
    }
    return result;
  }

  addPreference(recipeId: number, rating: Rating): void {
    this.ledger.add(recipeId, rating);
    record('preference_added');
  }

  like(recipeId: number): void {
    this.addPreference(recipeId, LIKE);
  }

  dislike(recipeId: number): void {
    this.addPreference(recipeId, DISLIKE);
  }

  /**
   * @throws PreferenceNotFoundError if the recipe was never rated
   */
  undo(recipeId: number): void {
    this.ledger.remove(recipeId);
    record('preference_removed');
  }

  /**
   * Ratings in history order (copy)
   */
  preferences(): ReadonlyMap<number, Rating> {
    return this.ledger.toMap();
  }

  /**
   * @throws NoNeighborError before any neighbor-driven suggestion
   */
  adjacencyGraph(polarity: Rating): AdjacencyGraph {
    return buildAdjacencyGraph({
      table: this.table,
      ledger: this.ledger,
      neighbors: this.neighborSet,
      polarity,
      pruning: this.pruning,
    });
  }

  /**
   * @throws NoNeighborError before any neighbor-driven suggestion
   */
  neighborReport(polarity: Rating): NeighborReportRow[] {
    return buildNeighborReport({
      table: this.table,
      ledger: this.ledger,
      neighbors: this.neighborSet,
      polarity,
    });
  }
}

/**
 * Start a session for a dish type.
 *
 * @throws InvalidDishTypeError unless dishType is "main" or "dessert"
 */
export function createUser(
  dishType: string,
  provider: InteractionTableProvider,
  options: CreateUserOptions = {}
): UserSession {
  const parsed = parseDishType(dishType);
  return new UserSession(parsed, provider.getTable(parsed), options);
}
