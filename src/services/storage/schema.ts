/**
 * Tables the assistant may touch, with the only columns it may read or write.
 * Column names reach SQL text only after passing through this whitelist.
 * `unique` lists the columns no two rows may share; SQL enforces them with
 * constraints, stores without constraints check them before writing.
 */

export const TABLES = {
  cars: {
    primaryKey: 'id',
    columns: [
      'id', 'vin', 'year', 'make', 'model', 'trim', 'mileage',
      'interior_condition', 'exterior_condition',
      'seller_ask_cents', 'buyer_offer_cents',
      'created_at', 'lead_id',
    ],
    unique: ['vin'],
  },
  pickup: {
    primaryKey: 'pick_up_id',
    columns: ['pick_up_id', 'car_id', 'address', 'contact_phone', 'pick_up_info', 'created_at', 'dropoff_time'],
    unique: [],
  },
  buyers: {
    primaryKey: 'id',
    columns: ['id', 'name'],
    unique: [],
  },
  buyer_schedule: {
    primaryKey: 'id',
    columns: ['id', 'buyer_id', 'description', 'schedule_time', 'priority'],
    unique: [],
  },
} as const;

export type TableName = keyof typeof TABLES;

export function isColumn(table: TableName, column: string): boolean {
  const columns: readonly string[] = TABLES[table].columns;
  return columns.includes(column);
}

export function uniqueColumns(table: TableName): readonly string[] {
  const unique: readonly string[] = TABLES[table].unique;
  return unique;
}
