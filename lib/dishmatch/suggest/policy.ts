/**
 * SUGGESTION POLICY
 *
 * Returns EXACTLY ONE recipe id per call, never one already in the ledger.
 *
 * MODES:
 * 1. cold_start: ledger empty. Random record from the whole table.
 *    No neighbor work, NeighborSet untouched.
 * 2. neighbors: ledger non-empty, neighbors found. Recipe with the highest
 *    column sum across neighbors; ties go to the lowest recipe id.
 * 3. fallback: ledger non-empty, no neighbors left. Random record among
 *    recipes not yet rated; NoMoreRecipesError when none remain.
 *
 * Modes 2 and 3 return the NeighborSet they computed; the caller owns it.
 */

import type { NeighborBounds, SuggestionResult } from '../../../types/dishmatch';
import type { InteractionTable } from '../data/table';
import { NoMoreRecipesError } from '../errors';
import type { PreferenceLedger } from '../ledger';
import { record, timed } from '../monitoring/metrics';
import { DEFAULT_BOUNDS, selectNeighbors } from '../neighbors/selector';
import { pickOne, type Rng } from '../random';
import type { RatingMatrix } from '../similarity/matrix';

export interface SuggestInput {
  table: InteractionTable;
  ledger: PreferenceLedger;
  rng: Rng;
  bounds?: NeighborBounds;
}

/**
 * Column with the highest sum. Columns are ascending, so the first maximum
 * is the lowest recipe id.
 *
 * @returns null when the matrix has no columns
 */
export function pickTopRecipe(matrix: RatingMatrix): { recipeId: number; score: number } | null {
  let best: { recipeId: number; score: number } | null = null;
  for (const { recipeId, sum } of matrix.columnSums()) {
    if (best === null || sum > best.score) {
      best = { recipeId, score: sum };
    }
  }
  return best;
}

function suggestColdStart(table: InteractionTable, rng: Rng): SuggestionResult {
  if (table.size === 0) {
    record('catalog_exhausted');
    throw new NoMoreRecipesError();
  }

  const recipeId = pickOne(table.records, rng).recipe_id;
  record('suggestion_cold_start');
  console.log(`[Recs] Empty history, suggesting random recipe ${recipeId}`);
  return { mode: 'cold_start', recipeId };
}

function suggestFallback(table: InteractionTable, ledger: PreferenceLedger, rng: Rng): SuggestionResult {
  const remaining = table.withoutRecipes(ledger.recipeIds());
  if (remaining.length === 0) {
    record('catalog_exhausted');
    console.log('[Recs] No more recipes to suggest from the dataset');
    throw new NoMoreRecipesError();
  }

  const recipeId = pickOne(remaining, rng).recipe_id;
  record('suggestion_fallback');
  console.log(`[Recs] No neighbor left to follow, suggesting random recipe ${recipeId}`);
  return { mode: 'fallback', recipeId, neighbors: [] };
}

export function suggestRecipe(input: SuggestInput): SuggestionResult {
  const { table, ledger, rng } = input;
  const bounds = input.bounds ?? DEFAULT_BOUNDS;

  return timed('suggestion_ms', () => {
    if (ledger.isEmpty) {
      return suggestColdStart(table, rng);
    }

    const selection = selectNeighbors(table, ledger, bounds);
    const top = selection.neighbors.length > 0 ? pickTopRecipe(selection.matrix) : null;

    if (top === null) {
      return suggestFallback(table, ledger, rng);
    }

    record('suggestion_neighbors');
    return {
      mode: 'neighbors',
      recipeId: top.recipeId,
      neighbors: selection.neighbors,
      score: top.score,
    };
  });
}
