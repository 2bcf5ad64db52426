/**
 * Relational flavor of the RowStore. Speaks to PostgreSQL through `pg`, or to
 * an in-process pg-mem database when the descriptor is `pg-mem://<name>`.
 * One client per store; the caller closes it when the operation is done.
 */

import pg from 'pg';
import { newDb, IMemoryDb } from 'pg-mem';
import { TableName } from './schema';
import { errorMessage, logger } from '../../utils/logger';
import {
  Condition,
  Row,
  RowStore,
  SelectOptions,
  StorageError,
  assertColumns,
  canonicalRow,
  classifyStorageError,
} from './rowStore';

export interface PgClientLike {
  connect(): Promise<unknown>;
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
  end(): Promise<unknown>;
}

const memoryDatabases = new Map<string, IMemoryDb>();

/** The pg-mem database behind `pg-mem://<name>`, created on first use. */
export function getMemoryDatabase(name: string): IMemoryDb {
  const existing = memoryDatabases.get(name);
  if (existing) {
    return existing;
  }
  const db = newDb({ autoCreateForeignKeyIndices: true });
  memoryDatabases.set(name, db);
  return db;
}

export function dropMemoryDatabase(name: string): void {
  memoryDatabases.delete(name);
}

export function isPgDescriptor(descriptor: string): boolean {
  return /^(postgres|postgresql|pg-mem):\/\//.test(descriptor);
}

function createClient(descriptor: string): PgClientLike {
  if (descriptor.startsWith('pg-mem://')) {
    const name = descriptor.slice('pg-mem://'.length) || 'default';
    const { Client } = getMemoryDatabase(name).adapters.createPg();
    const client: PgClientLike = new Client();
    return client;
  }
  return new pg.Client({ connectionString: descriptor, connectionTimeoutMillis: 10_000 });
}

export async function openPgRowStore(descriptor: string): Promise<PgRowStore> {
  const client = createClient(descriptor);
  try {
    await client.connect();
  } catch (err) {
    throw new StorageError('unavailable', errorMessage(err));
  }
  return new PgRowStore(client, descriptor.startsWith('pg-mem://') ? 'pg-mem' : 'postgres');
}

/** Quotes a whitelisted identifier; several column names are SQL keywords. */
function ident(name: string): string {
  return `"${name}"`;
}

export class PgRowStore implements RowStore {
  readonly flavor: string;
  private readonly client: PgClientLike;

  constructor(client: PgClientLike, flavor = 'postgres') {
    this.client = client;
    this.flavor = flavor;
  }

  async select(table: TableName, where: Condition[] = [], options: SelectOptions = {}): Promise<Row[]> {
    assertColumns(table, where.map((c) => c.column));
    if (options.orderBy) {
      assertColumns(table, [options.orderBy]);
    }

    const params: unknown[] = [];
    const clauses = where.map((condition) => {
      if (condition.op === 'icontains') {
        params.push(`%${String(condition.value).trim().toLowerCase()}%`);
        return `LOWER(${ident(condition.column)}) LIKE $${params.length}`;
      }
      params.push(condition.value);
      return `${ident(condition.column)} = $${params.length}`;
    });

    let sql = `SELECT * FROM ${ident(table)}`;
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(' AND ')}`;
    }
    if (options.orderBy) {
      sql += ` ORDER BY ${ident(options.orderBy)} ASC`;
    }
    if (options.limit !== undefined) {
      sql += ` LIMIT ${Math.max(0, Math.floor(options.limit))}`;
    }

    const result = await this.run(sql, params);
    return result.rows.map((row) => canonicalRow(table, row));
  }

  async insert(table: TableName, values: Row): Promise<Row> {
    const columns = Object.keys(values);
    assertColumns(table, columns);

    const placeholders = columns.map((_, i) => `$${i + 1}`);
    const sql = `INSERT INTO ${ident(table)} (${columns.map(ident).join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`;
    const result = await this.run(sql, columns.map((c) => values[c]));
    const inserted = result.rows[0];
    return inserted ? canonicalRow(table, inserted) : canonicalRow(table, values);
  }

  async update(table: TableName, key: { column: string; value: unknown }, values: Row): Promise<number> {
    const columns = Object.keys(values);
    if (columns.length === 0) {
      return 0;
    }
    assertColumns(table, [...columns, key.column]);

    const assignments = columns.map((c, i) => `${ident(c)} = $${i + 1}`);
    const sql = `UPDATE ${ident(table)} SET ${assignments.join(', ')} WHERE ${ident(key.column)} = $${columns.length + 1}`;
    const result = await this.run(sql, [...columns.map((c) => values[c]), key.value]);
    return result.rowCount ?? 0;
  }

  async minValue(table: TableName, column: string): Promise<number | null> {
    assertColumns(table, [column]);
    const result = await this.run(`SELECT MIN(${ident(column)}) AS min_value FROM ${ident(table)}`, []);
    const value = result.rows[0]?.min_value;
    if (value === null || value === undefined) {
      return null;
    }
    const numeric = Number(value);
    return Number.isFinite(numeric) ? numeric : null;
  }

  async close(): Promise<void> {
    try {
      await this.client.end();
    } catch (err) {
      logger.debug('pg client close failed', {}, { flavor: this.flavor, error: errorMessage(err) });
    }
  }

  private async run(sql: string, params: unknown[]) {
    try {
      return await this.client.query(sql, params);
    } catch (err) {
      throw classifyStorageError(err);
    }
  }
}
