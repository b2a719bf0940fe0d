/**
 * Table loading
 *
 * Selection logic:
 * - DATABASE_URL set: Postgres
 * - Otherwise: CSV files under DISHMATCH_DATA_DIR
 */

import * as path from 'path';
import type { DishType } from '../../../types/dishmatch';
import { DISH_TYPES } from '../../../types/dishmatch';
import type { DishmatchSettings } from '../config/settings';
import { record } from '../monitoring/metrics';
import { readCsvFile, requireColumns } from './csv';
import { createPgPool, fromPool, loadTablesFromPostgres } from './postgres';
import { createStaticTableProvider, toInteractionRecord, type InteractionTableProvider } from './provider';
import { createInteractionTable, type InteractionTable } from './table';

export const INTERACTION_FILES: Readonly<Record<DishType, string>> = {
  main: 'PP_user_main_dishes.csv',
  dessert: 'PP_user_desserts.csv',
};

export const INTERACTION_COLUMNS = ['user_id', 'recipe_id', 'rate'] as const;

export async function loadTableFromCsv(filePath: string, dishType: DishType): Promise<InteractionTable> {
  const doc = await readCsvFile(filePath);
  requireColumns(doc, INTERACTION_COLUMNS, filePath);

  const records = doc.rows.map((row, index) =>
    toInteractionRecord(
      { user_id: row.user_id, recipe_id: row.recipe_id, rate: row.rate },
      `${filePath}: line ${doc.lines[index]}`
    )
  );
  const table = createInteractionTable(dishType, records, filePath);

  record('table_loaded');
  console.log(`[Data] Loaded ${table.size} ${dishType} interactions from ${path.basename(filePath)}`);
  return table;
}

export async function loadTablesFromCsv(options: { dataDir: string }): Promise<InteractionTableProvider> {
  const [main, dessert] = await Promise.all(
    DISH_TYPES.map(dishType =>
      loadTableFromCsv(path.join(options.dataDir, INTERACTION_FILES[dishType]), dishType)
    )
  );
  return createStaticTableProvider({ main, dessert });
}

/**
 * Load both tables from the configured backend.
 * The Postgres pool is closed once the tables are in memory.
 */
export async function loadTables(
  settings: Pick<DishmatchSettings, 'dataDir' | 'databaseUrl'>
): Promise<InteractionTableProvider> {
  if (settings.databaseUrl) {
    console.log('[Data] Using Postgres interactions');
    const pool = createPgPool(settings.databaseUrl);
    try {
      return await loadTablesFromPostgres(fromPool(pool));
    } finally {
      await pool.end();
    }
  }

  console.log(`[Data] Using CSV interactions from ${settings.dataDir}`);
  return loadTablesFromCsv({ dataDir: settings.dataDir });
}
