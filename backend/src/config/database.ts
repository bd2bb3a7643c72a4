/**
 * PostgreSQL Configuration
 *
 * pg connection pool plus the narrow query interfaces the repositories
 * depend on. Tests substitute an in-process DatabasePool.
 */

import { Pool } from 'pg';
import { logger } from '../utils/logger';

// ============================================================================
// Interfaces
// ============================================================================

export interface QueryOutcome {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryOutcome>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface DatabasePool extends Queryable {
  connect(): Promise<TransactionClient>;
  end(): Promise<void>;
}

// ============================================================================
// pg adapter
// ============================================================================

export function createPool(connectionString: string, max: number): Pool {
  const pool = new Pool({
    connectionString,
    max,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on('error', (error) => {
    logger.error('Idle PostgreSQL client error', { error: error.message });
  });

  return pool;
}

export function createDatabase(pool: Pool): DatabasePool {
  return {
    async query(text, values) {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    async connect() {
      const client = await pool.connect();
      return {
        async query(text, values) {
          const result = await client.query(text, values);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release(err) {
          client.release(err);
        },
      };
    },
    end() {
      return pool.end();
    },
  };
}

// ============================================================================
// Transactions
// ============================================================================

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
 * transaction back and is re-thrown; the client is always released.
 */
export async function withTransaction<T>(
  db: DatabasePool,
  fn: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await db.connect();
  let broken: Error | undefined;

  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      logger.error('Transaction rollback failed', { error: broken.message });
    }
    throw error;
  } finally {
    client.release(broken);
  }
}
