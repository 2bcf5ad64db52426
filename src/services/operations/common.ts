import { ToolResult, failure } from '../../models/toolResult';
import { RowStore, StorageError, classifyStorageError } from '../storage/rowStore';
import { RowStoreOpener } from '../storage';
import { LogContext, errorMessage, logger } from '../../utils/logger';

/**
 * Opens a store for one operation, always closes it, and turns any storage
 * failure into a ToolResult. Nothing thrown inside escapes as a fault.
 */
export async function withStore(
  openStore: RowStoreOpener,
  descriptor: string,
  action: string,
  ctx: LogContext,
  fn: (store: RowStore) => Promise<ToolResult>,
): Promise<ToolResult> {
  let store: RowStore;
  try {
    store = await openStore(descriptor);
  } catch (err) {
    logger.error('Could not open storage', ctx, { action, error: errorMessage(err) });
    return failure('DB_UNAVAILABLE', "I couldn't reach our records right now. Please try again shortly.", {
      error: errorMessage(err),
    });
  }

  try {
    return await fn(store);
  } catch (err) {
    const storageError = classifyStorageError(err);
    logger.error('Storage operation failed', ctx, {
      action,
      category: storageError.category,
      error: storageError.message,
    });
    return storageFailure(storageError, action);
  } finally {
    await store.close();
  }
}

export function storageFailure(err: StorageError, action: string): ToolResult {
  const data = { error: err.message };
  switch (err.category) {
    case 'unavailable':
      return failure('DB_UNAVAILABLE', "I couldn't reach our records right now. Please try again shortly.", data);
    case 'conflict':
      return failure('CONFLICT', 'That conflicts with an existing record.', data);
    case 'integrity':
      return failure('PRECONDITION_FAILED', 'That refers to a record that does not exist.', data);
    case 'not_null':
      return failure('INVALID_INPUT', 'A required field is missing.', data);
    case 'txn_failed':
      return failure('TXN_FAILED', `${action} failed. Please try again.`, data);
  }
}

/** Integer coercion: integral numbers and digit strings; anything else is null. */
export function toInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return null;
}

export function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined && String(value).trim() !== '';
}

/** Keeps whitelisted keys and drops null/undefined values. */
export function pickFields(patch: Record<string, unknown>, allowed: readonly string[]): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(patch)) {
    if (allowed.includes(key) && value !== null && value !== undefined) {
      picked[key] = value;
    }
  }
  return picked;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/** Next temporary id for rows created by the assistant: -1, -2, -3, … */
export async function nextTemporaryId(store: RowStore, table: 'cars' | 'pickup', column: string): Promise<number> {
  const min = await store.minValue(table, column);
  return min === null || min > 0 ? -1 : min - 1;
}
