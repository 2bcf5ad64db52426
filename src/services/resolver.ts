/**
 * Entity Resolver: turns whatever identifying fields the model supplied into
 * exactly one canonical record id, or an explicit failure.
 *
 * Resolution never guesses: zero matches is NOT_FOUND, several matches is
 * AMBIGUOUS with a short candidate preview, and only a unique match lets the
 * caller go on to mutate anything. Entities addressed through a parent (a
 * pickup is found through its car) resolve the parent with the same
 * algorithm first, then apply the same cardinality rule to the children.
 */

import { ToolResult, ambiguous, failure } from '../models/toolResult';
import { Condition, Row, RowStore } from './storage/rowStore';
import { TableName } from './storage/schema';
import { isPresent, toInteger } from './operations/common';

export const CANDIDATE_PREVIEW = 5;

export interface LookupField {
  key: string;
  column: string;
  match: Condition['op'];
  integer?: boolean;
}

export interface EntitySpec {
  label: string;
  table: TableName;
  idColumn: string;
  /** Argument carrying the canonical id; when present, lookup fields are skipped. */
  directKey: string;
  /** Lookup fields in priority order. Only the first one supplied is used. */
  fields: LookupField[];
  summaryColumns: string[];
  parent?: { spec: EntitySpec; foreignKey: string };
  ambiguousMessage: string;
}

export interface Resolved {
  ok: true;
  id: number;
  row: Row;
  selectedKey: string;
  selectedValue: unknown;
  ignoredKeys: string[];
  /**
   * Argument keys that were read as lookup fields, used or ignored. A canonical
   * id consumes only itself, so other fields next to it stay in the patch.
   */
  consumedKeys: string[];
}

export type Resolution = Resolved | { ok: false; result: ToolResult };

// ─── Entity definitions ─────────────────────────────────────────────────────

export const VEHICLE: EntitySpec = {
  label: 'car',
  table: 'cars',
  idColumn: 'id',
  directKey: 'car_id',
  fields: [
    { key: 'vin', column: 'vin', match: 'eq' },
    { key: 'model', column: 'model', match: 'icontains' },
    { key: 'make', column: 'make', match: 'icontains' },
    { key: 'year', column: 'year', match: 'eq', integer: true },
  ],
  summaryColumns: ['id', 'year', 'make', 'model', 'vin'],
  ambiguousMessage: 'Multiple cars match. Refine with the VIN or car id.',
};

export const PICKUP: EntitySpec = {
  label: 'pickup',
  table: 'pickup',
  idColumn: 'pick_up_id',
  directKey: 'pick_up_id',
  fields: [],
  summaryColumns: ['pick_up_id', 'car_id', 'address', 'dropoff_time'],
  parent: { spec: VEHICLE, foreignKey: 'car_id' },
  ambiguousMessage: 'That car has more than one pickup. Refine with the pickup id.',
};

/** Every argument key that can take part in resolving the given entity. */
export function identifyingKeys(spec: EntitySpec): string[] {
  const own = [spec.directKey, ...spec.fields.map((f) => f.key)];
  return spec.parent ? [...own, ...identifyingKeys(spec.parent.spec)] : own;
}

// ─── Algorithm ──────────────────────────────────────────────────────────────

export async function resolveEntity(
  store: RowStore,
  spec: EntitySpec,
  args: Record<string, unknown>,
): Promise<Resolution> {
  const direct = args[spec.directKey];
  if (isPresent(direct)) {
    const id = toInteger(direct);
    if (id === null) {
      return invalid(`${spec.directKey} must be an integer.`, { received: direct });
    }
    const rows = await store.select(spec.table, [{ column: spec.idColumn, op: 'eq', value: id }]);
    return decide(spec, rows, {
      selectedKey: spec.directKey,
      selectedValue: id,
      ignoredKeys: presentKeys(args, identifyingKeys(spec).filter((k) => k !== spec.directKey)),
      consumedKeys: [spec.directKey],
    });
  }

  if (spec.parent) {
    const parent = await resolveEntity(store, spec.parent.spec, args);
    if (!parent.ok) {
      return parent;
    }
    const rows = await store.select(spec.table, [{ column: spec.parent.foreignKey, op: 'eq', value: parent.id }]);
    return decide(spec, rows, {
      selectedKey: parent.selectedKey,
      selectedValue: parent.selectedValue,
      ignoredKeys: parent.ignoredKeys,
      consumedKeys: parent.consumedKeys,
    });
  }

  const supplied = spec.fields.filter((f) => isPresent(args[f.key]));
  const chosen = supplied[0];
  if (!chosen) {
    const accepted = [spec.directKey, ...spec.fields.map((f) => f.key)];
    return invalid(`Provide ${listWords(accepted)}.`, { accepted_fields: accepted });
  }

  let value: unknown = args[chosen.key];
  if (chosen.integer) {
    const numeric = toInteger(value);
    if (numeric === null) {
      return invalid(`${chosen.key} must be an integer.`, { received: value });
    }
    value = numeric;
  } else {
    value = String(value).trim();
  }

  const rows = await store.select(spec.table, [{ column: chosen.column, op: chosen.match, value }]);
  return decide(spec, rows, {
    selectedKey: chosen.key,
    selectedValue: value,
    ignoredKeys: supplied.slice(1).map((f) => f.key),
    consumedKeys: supplied.map((f) => f.key),
  });
}

function decide(
  spec: EntitySpec,
  rows: Row[],
  meta: Omit<Resolved, 'ok' | 'id' | 'row'>,
): Resolution {
  const lookup = {
    selected_key: meta.selectedKey,
    selected_value: meta.selectedValue,
    ignored_keys: meta.ignoredKeys,
  };

  const [first] = rows;
  if (!first) {
    return { ok: false, result: failure('NOT_FOUND', `No matching ${spec.label} found.`, lookup) };
  }

  if (rows.length > 1) {
    return {
      ok: false,
      result: ambiguous(spec.ambiguousMessage, {
        ...lookup,
        entity: spec.label,
        match_count: rows.length,
        candidates: rows.slice(0, CANDIDATE_PREVIEW).map((row) => summarize(row, spec.summaryColumns)),
      }),
    };
  }

  const id = toInteger(first[spec.idColumn]);
  if (id === null) {
    return { ok: false, result: failure('TXN_FAILED', `The ${spec.label} record has no usable id.`, lookup) };
  }
  return { ok: true, id, row: first, ...meta };
}

function summarize(row: Row, columns: string[]): Row {
  const summary: Row = {};
  for (const column of columns) {
    summary[column] = row[column] ?? null;
  }
  return summary;
}

function presentKeys(args: Record<string, unknown>, keys: string[]): string[] {
  return keys.filter((k) => isPresent(args[k]));
}

function invalid(message: string, data: Record<string, unknown>): Resolution {
  return { ok: false, result: failure('INVALID_INPUT', message, data) };
}

function listWords(words: string[]): string {
  if (words.length <= 1) {
    return words.join('');
  }
  return `${words.slice(0, -1).join(', ')}, or ${words[words.length - 1]}`;
}
