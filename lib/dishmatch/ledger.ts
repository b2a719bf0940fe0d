/**
 * Preference Ledger
 *
 * The active user's ratings, in the order they were first recorded
 * (most recent last). One entry per recipe.
 */

import type { CellValue, Rating } from '../../types/dishmatch';
import { PreferenceNotFoundError } from './errors';

export class PreferenceLedger {
  private readonly entriesByRecipe = new Map<number, Rating>();

  constructor(initial?: Iterable<readonly [number, Rating]>) {
    if (initial) {
      for (const [recipeId, rating] of initial) {
        this.add(recipeId, rating);
      }
    }
  }

  get size(): number {
    return this.entriesByRecipe.size;
  }

  get isEmpty(): boolean {
    return this.entriesByRecipe.size === 0;
  }

  has(recipeId: number): boolean {
    return this.entriesByRecipe.has(recipeId);
  }

  get(recipeId: number): Rating | undefined {
    return this.entriesByRecipe.get(recipeId);
  }

  /**
   * Upsert. Re-rating a recipe overwrites the value and keeps its position.
   */
  add(recipeId: number, rating: Rating): void {
    this.entriesByRecipe.set(recipeId, rating);
  }

  /**
   * @throws PreferenceNotFoundError if the recipe is not in the ledger
   */
  remove(recipeId: number): void {
    if (!this.entriesByRecipe.has(recipeId)) {
      throw new PreferenceNotFoundError(recipeId);
    }
    this.entriesByRecipe.delete(recipeId);
  }

  entries(): Array<[number, Rating]> {
    return Array.from(this.entriesByRecipe.entries());
  }

  recipeIds(): number[] {
    return Array.from(this.entriesByRecipe.keys());
  }

  /**
   * Recipe ids holding the given rating, in history order
   */
  withRating(rating: Rating): number[] {
    return this.entries()
      .filter(([, value]) => value === rating)
      .map(([recipeId]) => recipeId);
  }

  /**
   * Copy as a reference vector for distance computations
   */
  toReference(): Map<number, CellValue> {
    return new Map<number, CellValue>(this.entriesByRecipe);
  }

  toMap(): ReadonlyMap<number, Rating> {
    return new Map(this.entriesByRecipe);
  }
}
