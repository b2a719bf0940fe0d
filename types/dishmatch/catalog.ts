/**
 * DISHMATCH: Recipe Catalog Types
 *
 * Metadata for display only. The recommendation core never reads it.
 */

export interface RecipeDetails {
  id: number;
  name: string;
  description: string;
  steps: string[];
  ingredients: string[];
}
