/**
 * Storage boundary. Whatever flavor sits behind it, rows come back as plain
 * field → value mappings in table column order, and failures come back as a
 * StorageError with one of a few categories.
 */

import { TableName, TABLES, isColumn } from './schema';

export type Row = Record<string, unknown>;

export interface Condition {
  column: string;
  /** `eq` is exact; `icontains` is a case-insensitive substring match. */
  op: 'eq' | 'icontains';
  value: unknown;
}

export interface SelectOptions {
  orderBy?: string;
  limit?: number;
}

export interface RowStore {
  readonly flavor: string;
  select(table: TableName, where?: Condition[], options?: SelectOptions): Promise<Row[]>;
  insert(table: TableName, values: Row): Promise<Row>;
  /** Returns the number of rows the update touched. */
  update(table: TableName, key: { column: string; value: unknown }, values: Row): Promise<number>;
  minValue(table: TableName, column: string): Promise<number | null>;
  close(): Promise<void>;
}

export type StorageErrorCategory = 'unavailable' | 'integrity' | 'conflict' | 'not_null' | 'txn_failed';

export class StorageError extends Error {
  readonly category: StorageErrorCategory;

  constructor(category: StorageErrorCategory, message: string) {
    super(message);
    this.name = 'StorageError';
    this.category = category;
  }
}

export function assertColumns(table: TableName, columns: Iterable<string>): void {
  for (const column of columns) {
    if (!isColumn(table, column)) {
      throw new StorageError('txn_failed', `column "${column}" is not allowed on ${table}`);
    }
  }
}

/** Reorders a raw row into the table's column order and drops unknown fields. */
export function canonicalRow(table: TableName, raw: Record<string, unknown>): Row {
  const row: Row = {};
  for (const column of TABLES[table].columns) {
    if (column in raw) {
      row[column] = raw[column];
    }
  }
  return row;
}

/**
 * Maps a driver error onto a category. Drivers disagree on error shapes, so
 * the SQLSTATE code wins when present and the message text decides otherwise.
 */
export function classifyStorageError(err: unknown): StorageError {
  if (err instanceof StorageError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  const code = typeof err === 'object' && err !== null && 'code' in err ? String(err.code) : '';
  const lower = message.toLowerCase();

  if (code === '23505' || lower.includes('unique') || lower.includes('duplicate')) {
    return new StorageError('conflict', message);
  }
  if (code === '23503' || lower.includes('foreign key')) {
    return new StorageError('integrity', message);
  }
  if (code === '23502' || lower.includes('not null') || lower.includes('not-null')) {
    return new StorageError('not_null', message);
  }
  if (code.startsWith('23') || lower.includes('integrity')) {
    return new StorageError('integrity', message);
  }
  if (code.startsWith('08') || lower.includes('econnrefused') || lower.includes('connect')) {
    return new StorageError('unavailable', message);
  }
  return new StorageError('txn_failed', message);
}
