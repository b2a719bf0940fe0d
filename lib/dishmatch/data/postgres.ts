/**
 * Postgres interaction source
 *
 * Reads both dish-type tables from a single `user_interactions` table.
 * Any client with a pg-style `query` works; production wraps a pg.Pool with fromPool,
 * tests pass an in-process fake.
 */

import { Pool } from 'pg';
import type { DishType } from '../../../types/dishmatch';
import { DISH_TYPES } from '../../../types/dishmatch';
import { DataShapeError } from '../errors';
import { record } from '../monitoring/metrics';
import {
  createStaticTableProvider,
  toInteractionRecord,
  toRawInteractionRow,
  type InteractionTableProvider,
} from './provider';
import { createInteractionTable, type InteractionTable } from './table';

/**
 * DB client interface for interaction queries
 */
export interface InteractionDbClient {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export const INTERACTIONS_SQL =
  'SELECT user_id, recipe_id, rate FROM user_interactions WHERE dish_type = $1 ORDER BY user_id, recipe_id';

export function createPgPool(connectionString: string): Pool {
  if (!connectionString.startsWith('postgres')) {
    throw new DataShapeError('DATABASE_URL must be a PostgreSQL connection string');
  }
  return new Pool({
    connectionString,
    max: 2,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });
}

/**
 * Wrap a pool as an interaction client
 */
export function fromPool(pool: Pool): InteractionDbClient {
  return {
    async query(sql: string, params: unknown[] = []): Promise<{ rows: unknown[] }> {
      const result = await pool.query(sql, params);
      return { rows: result.rows };
    },
  };
}

export async function loadTableFromPostgres(
  client: InteractionDbClient,
  dishType: DishType
): Promise<InteractionTable> {
  let rows: unknown[];
  try {
    const result = await client.query(INTERACTIONS_SQL, [dishType]);
    rows = result.rows;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error('[Data] Query failed:', message);
    throw new Error(`Database query failed: ${message}`);
  }

  const source = `user_interactions[${dishType}]`;
  const records = rows.map((row, index) => {
    const location = `${source} row ${index}`;
    return toInteractionRecord(toRawInteractionRow(row, location), location);
  });
  const table = createInteractionTable(dishType, records, source);

  record('table_loaded');
  console.log(`[Data] Loaded ${table.size} ${dishType} interactions from Postgres`);
  return table;
}

export async function loadTablesFromPostgres(client: InteractionDbClient): Promise<InteractionTableProvider> {
  const [main, dessert] = await Promise.all(
    DISH_TYPES.map(dishType => loadTableFromPostgres(client, dishType))
  );
  return createStaticTableProvider({ main, dessert });
}
