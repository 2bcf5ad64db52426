import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, PutCommand, ScanCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import {
  DynamoRowStore,
  classifyDynamoError,
  isDynamoDescriptor,
  parseDynamoDescriptor,
} from '../src/services/storage/dynamoRowStore';
import { StorageError } from '../src/services/storage/rowStore';

type Item = Record<string, unknown>;

function conditionFailed(): Error {
  const err = new Error('The conditional request failed');
  err.name = 'ConditionalCheckFailedException';
  return err;
}

/** Evaluates `#f0 = :v0 AND #f1 = :v1` style filters. */
function matchesFilter(item: Item, expression: string | undefined, names: Record<string, string> = {}, values: Item = {}): boolean {
  if (!expression) {
    return true;
  }
  return expression.split(' AND ').every((clause) => {
    const [name = '', value = ''] = clause.split(' = ');
    const column = names[name];
    return column !== undefined && item[column] === values[value];
  });
}

/**
 * A document client whose `send` is answered from in-memory tables. Scans
 * return at most `pageSize` items per page.
 */
function fakeDocumentClient(tables: Record<string, Item[]>, primaryKeys: Record<string, string>, pageSize = 2) {
  const docClient = DynamoDBDocumentClient.from(
    new DynamoDBClient({ region: 'us-east-1', credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' } }),
  );
  const commands: unknown[] = [];

  jest.spyOn(docClient, 'send').mockImplementation(async (command: unknown) => {
    commands.push(command);

    if (command instanceof ScanCommand) {
      const { TableName = '', FilterExpression, ExpressionAttributeNames, ExpressionAttributeValues, ExclusiveStartKey } = command.input;
      const table = tables[TableName];
      if (!table) {
        const err = new Error('Requested resource not found');
        err.name = 'ResourceNotFoundException';
        throw err;
      }
      const start = typeof ExclusiveStartKey?.offset === 'number' ? ExclusiveStartKey.offset : 0;
      const page = table.slice(start, start + pageSize);
      const next = start + pageSize;
      return {
        Items: page.filter((item) => matchesFilter(item, FilterExpression, ExpressionAttributeNames, ExpressionAttributeValues)),
        LastEvaluatedKey: next < table.length ? { offset: next } : undefined,
      };
    }

    if (command instanceof PutCommand) {
      const { TableName = '', Item: item = {} } = command.input;
      const table = tables[TableName] ?? [];
      const pk = primaryKeys[TableName] ?? 'id';
      if (table.some((row) => row[pk] === item[pk])) {
        throw conditionFailed();
      }
      table.push({ ...item });
      tables[TableName] = table;
      return {};
    }

    if (command instanceof UpdateCommand) {
      const { TableName = '', Key = {}, ExpressionAttributeNames = {}, ExpressionAttributeValues = {} } = command.input;
      const pk = primaryKeys[TableName] ?? 'id';
      const row = (tables[TableName] ?? []).find((candidate) => candidate[pk] === Key[pk]);
      if (!row) {
        throw conditionFailed();
      }
      for (const [placeholder, column] of Object.entries(ExpressionAttributeNames)) {
        if (placeholder.startsWith('#c')) {
          row[column] = ExpressionAttributeValues[`:c${placeholder.slice(2)}`];
        }
      }
      return {};
    }

    throw new Error('unexpected command');
  });

  return { docClient, commands };
}

function seedTables(): Record<string, Item[]> {
  return {
    'CarDesk-cars': [
      { lead_id: 8, model: 'Camry', make: 'Toyota', id: 3, vin: 'V3', year: 2019 },
      { id: 1, vin: 'V1', make: 'Honda', model: 'Accord', year: 2003, color: 'blue' },
      { id: 2, vin: 'V2', make: 'Toyota', model: 'Corolla', year: 2018 },
    ],
    'CarDesk-buyer_schedule': [
      { id: 1, buyer_id: 5, description: 'Inspect', schedule_time: '2025-03-10 14:00:00', priority: 'High' },
    ],
  };
}

const PRIMARY_KEYS = { 'CarDesk-cars': 'id', 'CarDesk-buyer_schedule': 'id' };

describe('DynamoRowStore', () => {
  test('follows scan pages and returns rows in column order', async () => {
    const { docClient, commands } = fakeDocumentClient(seedTables(), PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');

    const rows = await store.select('cars', [], { orderBy: 'id' });

    expect(commands).toHaveLength(2);
    expect(rows.map((r) => r.id)).toEqual([1, 2, 3]);
    expect(rows[0]).toEqual({ id: 1, vin: 'V1', year: 2003, make: 'Honda', model: 'Accord' });
    expect(Object.keys(rows[2] ?? {})).toEqual(['id', 'vin', 'year', 'make', 'model', 'lead_id']);
  });

  test('sends exact matches as a filter and applies substring matches locally', async () => {
    const { docClient, commands } = fakeDocumentClient(seedTables(), PRIMARY_KEYS, 10);
    const store = new DynamoRowStore(docClient, 'CarDesk-');

    const rows = await store.select('cars', [
      { column: 'make', op: 'eq', value: 'Toyota' },
      { column: 'model', op: 'icontains', value: ' COR ' },
    ]);

    expect(rows.map((r) => r.id)).toEqual([2]);
    const [scan] = commands;
    expect(scan).toBeInstanceOf(ScanCommand);
    if (scan instanceof ScanCommand) {
      expect(scan.input).toMatchObject({
        TableName: 'CarDesk-cars',
        FilterExpression: '#f0 = :v0',
        ExpressionAttributeNames: { '#f0': 'make' },
        ExpressionAttributeValues: { ':v0': 'Toyota' },
      });
    }
  });

  test('applies the limit after ordering', async () => {
    const { docClient } = fakeDocumentClient(seedTables(), PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');
    const rows = await store.select('cars', [], { orderBy: 'year', limit: 1 });
    expect(rows.map((r) => r.id)).toEqual([1]);
  });

  test('rejects columns outside the whitelist', async () => {
    const { docClient } = fakeDocumentClient(seedTables(), PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');
    await expect(store.select('cars', [{ column: 'color', op: 'eq', value: 'blue' }])).rejects.toBeInstanceOf(StorageError);
  });

  test('assigns the next integer key when none is given', async () => {
    const tables = seedTables();
    const { docClient } = fakeDocumentClient(tables, PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');

    const row = await store.insert('buyer_schedule', {
      buyer_id: 5,
      description: 'Call back',
      schedule_time: '2025-03-11 09:00:00',
      priority: 'Low',
    });

    expect(row).toEqual({ id: 2, buyer_id: 5, description: 'Call back', schedule_time: '2025-03-11 09:00:00', priority: 'Low' });
    expect(tables['CarDesk-buyer_schedule']).toHaveLength(2);
  });

  test('reports a duplicate key as a conflict', async () => {
    const { docClient } = fakeDocumentClient(seedTables(), PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');
    await expect(store.insert('cars', { id: 1, vin: 'DUP' })).rejects.toMatchObject({ category: 'conflict' });
  });

  test('refuses a new car whose VIN is already on file', async () => {
    const tables = seedTables();
    const { docClient, commands } = fakeDocumentClient(tables, PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');

    await expect(store.insert('cars', { vin: 'V1', make: 'Kia' })).rejects.toMatchObject({ category: 'conflict' });
    expect(tables['CarDesk-cars']).toHaveLength(3);
    expect(commands.some((command) => command instanceof PutCommand)).toBe(false);
  });

  test('refuses to move a car onto a VIN another car holds', async () => {
    const tables = seedTables();
    const { docClient } = fakeDocumentClient(tables, PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');

    await expect(store.update('cars', { column: 'id', value: 2 }, { vin: 'V1' })).rejects.toMatchObject({
      category: 'conflict',
    });
    expect(tables['CarDesk-cars']?.find((c) => c.id === 2)).toMatchObject({ vin: 'V2' });
  });

  test('a car may keep its own VIN in an update', async () => {
    const tables = seedTables();
    const { docClient } = fakeDocumentClient(tables, PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');

    await expect(store.update('cars', { column: 'id', value: 1 }, { vin: 'V1', mileage: 5 })).resolves.toBe(1);
    expect(tables['CarDesk-cars']?.find((c) => c.id === 1)).toMatchObject({ vin: 'V1', mileage: 5 });
  });

  test('updates by primary key and counts the row', async () => {
    const tables = seedTables();
    const { docClient } = fakeDocumentClient(tables, PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');

    await expect(store.update('cars', { column: 'id', value: 2 }, { mileage: 41000 })).resolves.toBe(1);
    expect(tables['CarDesk-cars']?.find((c) => c.id === 2)).toMatchObject({ mileage: 41000 });
  });

  test('an update of a missing row touches nothing', async () => {
    const { docClient } = fakeDocumentClient(seedTables(), PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');
    await expect(store.update('cars', { column: 'id', value: 99 }, { mileage: 1 })).resolves.toBe(0);
  });

  test('refuses to update by anything but the primary key', async () => {
    const { docClient } = fakeDocumentClient(seedTables(), PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');
    await expect(store.update('cars', { column: 'vin', value: 'V1' }, { mileage: 1 })).rejects.toMatchObject({
      category: 'txn_failed',
    });
  });

  test('computes the minimum of a numeric column', async () => {
    const { docClient } = fakeDocumentClient(seedTables(), PRIMARY_KEYS);
    const store = new DynamoRowStore(docClient, 'CarDesk-');
    await expect(store.minValue('cars', 'id')).resolves.toBe(1);
    await expect(store.minValue('pickup', 'pick_up_id')).rejects.toMatchObject({ category: 'unavailable' });
  });
});

describe('DynamoDB helpers', () => {
  test('parses region and table prefix from the descriptor', () => {
    expect(isDynamoDescriptor('dynamodb://us-east-1/CarDesk-')).toBe(true);
    expect(parseDynamoDescriptor('dynamodb://us-east-1/CarDesk-')).toEqual({ region: 'us-east-1', tablePrefix: 'CarDesk-' });
    expect(parseDynamoDescriptor('dynamodb://eu-west-1')).toEqual({ region: 'eu-west-1', tablePrefix: '' });
    expect(() => parseDynamoDescriptor('dynamodb:///x')).toThrow(StorageError);
  });

  test('maps service errors onto storage categories', () => {
    const missing = new Error('no table');
    missing.name = 'ResourceNotFoundException';
    expect(classifyDynamoError(missing).category).toBe('unavailable');
    expect(classifyDynamoError(conditionFailed()).category).toBe('conflict');
    expect(classifyDynamoError(new Error('boom')).category).toBe('txn_failed');
  });
});
