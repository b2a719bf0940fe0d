/**
 * Dishmatch public API
 *
 * Usage:
 *   const provider = await loadTables(getSettings());
 *   const session = createUser('main', provider);
 *   const { recipeId } = session.suggest();
 *   session.like(recipeId);
 */

export * from '../../types/dishmatch';

export * from './errors';
export { getSettings, getSettingsForTest, DEFAULT_SETTINGS, SettingsError } from './config/settings';
export type { DishmatchSettings, SettingsEnv } from './config/settings';
export { getSnapshot, getDurationSnapshot, getMetric, logSnapshot, resetMetrics } from './monitoring/metrics';
export type { MetricName, MetricsSnapshot, DurationSnapshot } from './monitoring/metrics';
export { createSeededRng, defaultRng } from './random';
export type { Rng } from './random';

export { createInteractionTable } from './data/table';
export type { InteractionTable } from './data/table';
export { createStaticTableProvider } from './data/provider';
export type { InteractionTableProvider, InteractionTables } from './data/provider';
export { loadTables, loadTablesFromCsv, loadTableFromCsv } from './data/load';
export { createPgPool, fromPool, loadTablesFromPostgres, loadTableFromPostgres } from './data/postgres';
export type { InteractionDbClient } from './data/postgres';
export { parseCsv, readCsvFile } from './data/csv';

export { PreferenceLedger } from './ledger';
export { buildMatrix, distance, l1Distance, RatingMatrix } from './similarity/matrix';
export { percentileFilter, selectNeighbors, DEFAULT_BOUNDS } from './neighbors/selector';
export { suggestRecipe, pickTopRecipe } from './suggest/policy';
export { buildAdjacencyGraph, degreeOf, toNetworkData } from './graph/adjacency';
export type { NetworkData } from './graph/adjacency';
export { buildNeighborReport } from './analytics/neighbors';
export { createUser, UserSession, parseDishType } from './session';
export type { CreateUserOptions } from './session';

export {
  createRecipeCatalog,
  fetchRecipeDetails,
  loadRecipeCatalogCsv,
  parseListField,
} from './catalog/recipes';
export type { RecipeCatalog } from './catalog/recipes';
