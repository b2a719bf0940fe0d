/**
 * Recipe Catalog
 *
 * Recipe metadata (name, steps, ingredients) for the presentation layer.
 * The recommendation core works on ids only and never imports this module.
 *
 * Source columns: id, name, steps, description, ingredients.
 * `steps` and `ingredients` hold bracketed lists of quoted strings:
 *   ['preheat oven', 'mix flour and "sugar"']
 */

import type { RecipeDetails } from '../../../types/dishmatch';
import { readCsvFile, requireColumns } from '../data/csv';
import { DataShapeError, RecipeNotFoundError } from '../errors';

export const RECIPE_COLUMNS = ['id', 'name', 'steps', 'description', 'ingredients'] as const;

export interface RecipeCatalog {
  readonly size: number;
  get(recipeId: number): RecipeDetails | null;
}

// =============================================================================
// LIST FIELDS
// =============================================================================

/**
 * Parse a bracketed list of quoted strings.
 * Accepts single or double quotes and backslash escapes.
 *
 * @throws DataShapeError on anything else
 */
const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '\\': '\\' };

export function parseListField(raw: string): string[] {
  const text = raw.trim();
  if (!text.startsWith('[') || !text.endsWith(']')) {
    throw new DataShapeError(`Expected a bracketed list, got: ${raw.slice(0, 40)}`);
  }

  const items: string[] = [];
  let i = 1;
  const end = text.length - 1;

  const skipSpaces = (): void => {
    while (i < end && /\s/.test(text[i])) i++;
  };

  skipSpaces();
  while (i < end) {
    const quote = text[i];
    if (quote !== "'" && quote !== '"') {
      throw new DataShapeError(`Expected a quoted item at position ${i} in: ${raw.slice(0, 40)}`);
    }
    i++;

    let item = '';
    while (i < end && text[i] !== quote) {
      if (text[i] === '\\' && i + 1 < end) {
        const next = text[i + 1];
        item += ESCAPES[next] ?? next;
        i += 2;
      } else {
        item += text[i];
        i++;
      }
    }
    if (i >= end) {
      throw new DataShapeError(`Unterminated item in: ${raw.slice(0, 40)}`);
    }
    i++; // closing quote
    items.push(item);

    skipSpaces();
    if (i < end) {
      if (text[i] !== ',') {
        throw new DataShapeError(`Expected "," at position ${i} in: ${raw.slice(0, 40)}`);
      }
      i++;
      skipSpaces();
    }
  }

  return items;
}

// =============================================================================
// CATALOG
// =============================================================================

export interface RawRecipeRow {
  id: string;
  name: string;
  steps: string;
  description: string;
  ingredients: string;
}

export function toRecipeDetails(row: RawRecipeRow, location: string): RecipeDetails {
  const id = Number(row.id.trim());
  if (!Number.isInteger(id)) {
    throw new DataShapeError(`${location}: recipe id must be an integer, got "${row.id}"`);
  }

  try {
    return {
      id,
      name: row.name.trim(),
      description: row.description.trim(),
      steps: parseListField(row.steps),
      ingredients: parseListField(row.ingredients),
    };
  } catch (error) {
    if (error instanceof DataShapeError) {
      throw new DataShapeError(`${location}: ${error.message}`);
    }
    throw error;
  }
}

export function createRecipeCatalog(recipes: readonly RecipeDetails[]): RecipeCatalog {
  const byId = new Map<number, RecipeDetails>();
  for (const recipe of recipes) {
    if (byId.has(recipe.id)) {
      throw new DataShapeError(`Duplicate recipe id ${recipe.id}`);
    }
    byId.set(recipe.id, recipe);
  }

  return {
    size: byId.size,
    get(recipeId: number): RecipeDetails | null {
      return byId.get(recipeId) ?? null;
    },
  };
}

/**
 * Steps and ingredients of one recipe.
 *
 * @throws RecipeNotFoundError for an unknown id
 */
export function fetchRecipeDetails(
  catalog: RecipeCatalog,
  recipeId: number
): { steps: string[]; ingredients: string[] } {
  const recipe = catalog.get(recipeId);
  if (!recipe) {
    throw new RecipeNotFoundError(recipeId);
  }
  return { steps: [...recipe.steps], ingredients: [...recipe.ingredients] };
}

export async function loadRecipeCatalogCsv(filePath: string): Promise<RecipeCatalog> {
  const doc = await readCsvFile(filePath);
  requireColumns(doc, RECIPE_COLUMNS, filePath);

  const recipes = doc.rows.map((row, index) =>
    toRecipeDetails(
      {
        id: row.id,
        name: row.name,
        steps: row.steps,
        description: row.description,
        ingredients: row.ingredients,
      },
      `${filePath}: line ${doc.lines[index]}`
    )
  );

  console.log(`[Data] Loaded ${recipes.length} recipes from ${filePath}`);
  return createRecipeCatalog(recipes);
}
