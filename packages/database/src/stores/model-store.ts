/**
 * Model Store
 * Shared lookup handling of the object stores
 */

import { and, eq, inArray, isNull, max, type SQL } from 'drizzle-orm';
import type { AnySQLiteColumn, SQLiteTable } from 'drizzle-orm/sqlite-core';
import {
  ConfigurationError,
  DataError,
  MultipleObjectsError,
  ObjectNotFoundError,
  ValidationError,
} from '@kendb/shared';
import type { Model, ObjectStore, Query } from '@kendb/api-fields';
import { getDatabase } from '../connection.js';

export type Lookups = Readonly<Record<string, AnySQLiteColumn>>;

const IN_SUFFIX = '__in';

/**
 * Translate a lookup query into a WHERE clause.
 *
 * Returns undefined for an empty query and null when the query cannot match
 * anything (an empty `__in` list).
 */
export function buildWhere(lookups: Lookups, query: Query, modelName: string): SQL | undefined | null {
  const conditions: SQL[] = [];

  for (const [key, value] of Object.entries(query)) {
    const inLookup = key.endsWith(IN_SUFFIX);
    const name = inLookup ? key.slice(0, -IN_SUFFIX.length) : key;
    if (!Object.hasOwn(lookups, name)) {
      throw new ConfigurationError(`Cannot look up ${modelName} by '${key}'`, { model: modelName });
    }
    const column = lookups[name];

    if (inLookup) {
      if (!Array.isArray(value)) {
        throw new DataError(`Lookup '${key}' expects a list`, { model: modelName });
      }
      if (value.length === 0) {
        return null;
      }
      conditions.push(inArray(column, value));
    } else {
      conditions.push(value === null ? isNull(column) : eq(column, value));
    }
  }

  return conditions.length === 0 ? undefined : and(...conditions);
}

export function required<T>(value: T | null | undefined, field: string, modelName: string): T {
  if (value === null || value === undefined) {
    throw new ValidationError(`${modelName}.${field} is required`, { model: modelName, field });
  }
  return value;
}

export abstract class ModelStore<M extends Model> implements ObjectStore<M> {
  protected abstract readonly modelName: string;
  protected abstract readonly lookups: Lookups;

  /**
   * Load and hydrate the instances matching the clause (all when undefined)
   */
  protected abstract select(where: SQL | undefined): Promise<M[]>;

  abstract save(instance: M): Promise<M>;

  async all(): Promise<M[]> {
    return this.select(undefined);
  }

  async filter(query: Query): Promise<M[]> {
    const where = buildWhere(this.lookups, query, this.modelName);
    if (where === null) {
      return [];
    }
    return this.select(where);
  }

  async get(query: Query): Promise<M> {
    const found = await this.filter(query);
    if (found.length === 0) {
      throw new ObjectNotFoundError(`${this.modelName} matching query does not exist`, {
        model: this.modelName,
        query,
      });
    }
    if (found.length > 1) {
      throw new MultipleObjectsError(`get() returned more than one ${this.modelName} (${found.length})`, {
        model: this.modelName,
        query,
      });
    }
    return found[0];
  }

  /**
   * Latest value of a last-modified column, null for an empty table
   */
  protected async latestOf(table: SQLiteTable, column: AnySQLiteColumn): Promise<Date | null> {
    const db = getDatabase();
    const rows = await db.select({ value: max(column) }).from(table);
    const value: unknown = rows.length > 0 ? rows[0].value : null;

    if (value instanceof Date) {
      return value;
    }
    if (typeof value === 'number') {
      return new Date(value);
    }
    return null;
  }
}
