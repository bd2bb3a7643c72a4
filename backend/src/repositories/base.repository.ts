/**
 * Base Repository
 *
 * Abstract base class for the PostgreSQL repositories. Rows are validated
 * and mapped to domain objects through a zod row schema; driver errors are
 * logged and rethrown as DatabaseError (unique violations as ConflictError).
 */

import { z } from 'zod';
import type { DatabasePool, QueryOutcome, Queryable } from '../config/database';
import { ApiError, ConflictError, DatabaseError, ValidationError } from '../models/errors/api-error';
import { logger } from '../utils/logger';

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

/**
 * Rejects a status value outside its closed enumeration before it is written.
 */
export function assertStatus<T extends string>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  entity: string
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${entity} status: ${String(value)}`);
  }
  return parsed.data;
}

export abstract class BaseRepository<T> {
  protected db: DatabasePool;
  protected tableName: string;
  private rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>;

  constructor(db: DatabasePool, tableName: string, rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    this.db = db;
    this.tableName = tableName;
    this.rowSchema = rowSchema;
  }

  /**
   * Find a single record by ID
   */
  async findById(id: number, executor: Queryable = this.db): Promise<T | null> {
    const result = await this.run('find', `SELECT * FROM ${this.tableName} WHERE id = $1`, [id], executor);
    return this.firstOrNull(result);
  }

  /**
   * Executes a statement, translating driver failures.
   */
  protected async run(
    operation: string,
    text: string,
    values: unknown[],
    executor: Queryable = this.db
  ): Promise<QueryOutcome> {
    try {
      return await executor.query(text, values);
    } catch (error) {
      if (error instanceof ApiError) throw error;

      if (isUniqueViolation(error)) {
        logger.debug(`Unique violation on ${this.tableName}`, { operation });
        throw new ConflictError(`Duplicate ${this.tableName} record`);
      }

      logger.error(`Failed to ${operation} ${this.tableName}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new DatabaseError(`Failed to ${operation} ${this.tableName}`);
    }
  }

  protected mapRow(row: Record<string, unknown>): T {
    const parsed = this.rowSchema.safeParse(row);
    if (!parsed.success) {
      logger.error(`Unexpected ${this.tableName} row shape`, { issues: parsed.error.errors });
      throw new DatabaseError(`Unexpected ${this.tableName} row shape`);
    }
    return parsed.data;
  }

  protected mapRows(rows: Record<string, unknown>[]): T[] {
    return rows.map((row) => this.mapRow(row));
  }

  protected firstOrNull(result: QueryOutcome): T | null {
    return result.rows.length > 0 ? this.mapRow(result.rows[0]) : null;
  }
}
