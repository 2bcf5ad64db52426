/**
 * DynamoDB flavor of the RowStore. Each table maps to `<prefix><table>`.
 * Exact-match conditions become a scan filter; case-insensitive substring
 * matches, ordering and limits are applied to the scanned items.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  PutCommand,
  ScanCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { TableName, TABLES, uniqueColumns } from './schema';
import {
  Condition,
  Row,
  RowStore,
  SelectOptions,
  StorageError,
  assertColumns,
  canonicalRow,
} from './rowStore';
import { errorMessage } from '../../utils/logger';

export type DocumentSender = Pick<DynamoDBDocumentClient, 'send'>;

// ─── Client per region (reused across stores) ──────────────────────────────

const docClients = new Map<string, DynamoDBDocumentClient>();

function getDocClient(region: string): DynamoDBDocumentClient {
  const existing = docClients.get(region);
  if (existing) {
    return existing;
  }
  const client = DynamoDBDocumentClient.from(new DynamoDBClient({ region }), {
    marshallOptions: { removeUndefinedValues: true },
  });
  docClients.set(region, client);
  return client;
}

export function isDynamoDescriptor(descriptor: string): boolean {
  return descriptor.startsWith('dynamodb://');
}

/** `dynamodb://us-east-1/CarDesk-` → region us-east-1, table prefix `CarDesk-`. */
export function parseDynamoDescriptor(descriptor: string): { region: string; tablePrefix: string } {
  const rest = descriptor.slice('dynamodb://'.length);
  const slash = rest.indexOf('/');
  const region = slash === -1 ? rest : rest.slice(0, slash);
  const tablePrefix = slash === -1 ? '' : rest.slice(slash + 1);
  if (!region) {
    throw new StorageError('unavailable', 'DynamoDB descriptor must name a region');
  }
  return { region, tablePrefix };
}

export function openDynamoRowStore(descriptor: string): DynamoRowStore {
  const { region, tablePrefix } = parseDynamoDescriptor(descriptor);
  return new DynamoRowStore(getDocClient(region), tablePrefix);
}

// ─── Store ──────────────────────────────────────────────────────────────────

export class DynamoRowStore implements RowStore {
  readonly flavor = 'dynamodb';
  private readonly docClient: DocumentSender;
  private readonly tablePrefix: string;

  constructor(docClient: DocumentSender, tablePrefix = '') {
    this.docClient = docClient;
    this.tablePrefix = tablePrefix;
  }

  async select(table: TableName, where: Condition[] = [], options: SelectOptions = {}): Promise<Row[]> {
    assertColumns(table, where.map((c) => c.column));
    if (options.orderBy) {
      assertColumns(table, [options.orderBy]);
    }

    const exact = where.filter((c) => c.op === 'eq');
    const fuzzy = where.filter((c) => c.op === 'icontains');

    const names: Record<string, string> = {};
    const values: Record<string, unknown> = {};
    const filters = exact.map((condition, i) => {
      names[`#f${i}`] = condition.column;
      values[`:v${i}`] = condition.value;
      return `#f${i} = :v${i}`;
    });

    const items: Record<string, unknown>[] = [];
    let startKey: Record<string, unknown> | undefined;
    do {
      const page = await this.scan(new ScanCommand({
        TableName: this.tableName(table),
        FilterExpression: filters.length > 0 ? filters.join(' AND ') : undefined,
        ExpressionAttributeNames: filters.length > 0 ? names : undefined,
        ExpressionAttributeValues: filters.length > 0 ? values : undefined,
        ExclusiveStartKey: startKey,
      }));
      items.push(...(page.Items ?? []));
      startKey = page.LastEvaluatedKey;
    } while (startKey);

    let rows = items
      .filter((item) => fuzzy.every((c) => matchesSubstring(item[c.column], c.value)))
      .map((item) => canonicalRow(table, item));

    const orderBy = options.orderBy;
    if (orderBy) {
      rows = [...rows].sort((a, b) => compareValues(a[orderBy], b[orderBy]));
    }
    if (options.limit !== undefined) {
      rows = rows.slice(0, Math.max(0, Math.floor(options.limit)));
    }
    return rows;
  }

  async insert(table: TableName, values: Row): Promise<Row> {
    assertColumns(table, Object.keys(values));
    const primaryKey = TABLES[table].primaryKey;
    // DynamoDB has no sequences; a missing key takes the next integer after the current maximum.
    const item: Row = values[primaryKey] === undefined
      ? { ...values, [primaryKey]: (await this.maxValue(table, primaryKey)) + 1 }
      : values;
    await this.assertUnique(table, item, item[primaryKey]);

    try {
      await this.docClient.send(new PutCommand({
        TableName: this.tableName(table),
        Item: item,
        ConditionExpression: 'attribute_not_exists(#pk)',
        ExpressionAttributeNames: { '#pk': primaryKey },
      }));
    } catch (err) {
      throw classifyDynamoError(err);
    }
    return canonicalRow(table, item);
  }

  async update(table: TableName, key: { column: string; value: unknown }, values: Row): Promise<number> {
    const columns = Object.keys(values);
    if (columns.length === 0) {
      return 0;
    }
    assertColumns(table, [...columns, key.column]);

    const primaryKey = TABLES[table].primaryKey;
    if (key.column !== primaryKey) {
      throw new StorageError('txn_failed', `DynamoDB updates must address ${table}.${primaryKey}`);
    }
    await this.assertUnique(table, values, key.value);

    const names: Record<string, string> = { '#pk': primaryKey };
    const attributeValues: Record<string, unknown> = {};
    const assignments = columns.map((column, i) => {
      names[`#c${i}`] = column;
      attributeValues[`:c${i}`] = values[column];
      return `#c${i} = :c${i}`;
    });

    try {
      await this.docClient.send(new UpdateCommand({
        TableName: this.tableName(table),
        Key: { [primaryKey]: key.value },
        UpdateExpression: `SET ${assignments.join(', ')}`,
        ConditionExpression: 'attribute_exists(#pk)',
        ExpressionAttributeNames: names,
        ExpressionAttributeValues: attributeValues,
      }));
      return 1;
    } catch (err) {
      if (err instanceof Error && err.name === 'ConditionalCheckFailedException') {
        return 0;
      }
      throw classifyDynamoError(err);
    }
  }

  async minValue(table: TableName, column: string): Promise<number | null> {
    const values = await this.numericColumn(table, column);
    return values.length > 0 ? Math.min(...values) : null;
  }

  private async maxValue(table: TableName, column: string): Promise<number> {
    const values = await this.numericColumn(table, column);
    return values.length > 0 ? Math.max(0, ...values) : 0;
  }

  private async numericColumn(table: TableName, column: string): Promise<number[]> {
    assertColumns(table, [column]);
    const rows = await this.select(table);
    return rows
      .map((row) => row[column])
      .filter((value): value is number | string => typeof value === 'number' || typeof value === 'string')
      .map(Number)
      .filter(Number.isFinite);
  }

  async close(): Promise<void> {
    // the document client is shared per region and outlives the store
  }

  /** DynamoDB has no unique indexes beyond the key, so unique columns are checked by scan. */
  private async assertUnique(table: TableName, values: Row, ownKey: unknown): Promise<void> {
    const primaryKey = TABLES[table].primaryKey;
    for (const column of uniqueColumns(table)) {
      const value = values[column];
      if (value === null || value === undefined) continue;
      const holders = await this.select(table, [{ column, op: 'eq', value }]);
      if (holders.some((row) => String(row[primaryKey]) !== String(ownKey))) {
        throw new StorageError('conflict', `${table}.${column} ${String(value)} already exists`);
      }
    }
  }

  private tableName(table: TableName): string {
    return `${this.tablePrefix}${table}`;
  }

  private async scan(command: ScanCommand) {
    try {
      return await this.docClient.send(command);
    } catch (err) {
      throw classifyDynamoError(err);
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

export function classifyDynamoError(err: unknown): StorageError {
  if (err instanceof StorageError) {
    return err;
  }
  const name = err instanceof Error ? err.name : '';
  switch (name) {
    case 'ConditionalCheckFailedException':
      return new StorageError('conflict', errorMessage(err));
    case 'ResourceNotFoundException':
    case 'UnrecognizedClientException':
    case 'CredentialsProviderError':
      return new StorageError('unavailable', errorMessage(err));
    default:
      return new StorageError('txn_failed', errorMessage(err));
  }
}

function matchesSubstring(actual: unknown, wanted: unknown): boolean {
  if (actual === null || actual === undefined) {
    return false;
  }
  return String(actual).toLowerCase().includes(String(wanted).trim().toLowerCase());
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  return String(a ?? '').localeCompare(String(b ?? ''));
}
