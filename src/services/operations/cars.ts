/**
 * Car operations. Every function works on an open RowStore and returns a
 * ToolResult; opening and closing the store is the caller's job.
 */

import { ToolResult, failure, success } from '../../models/toolResult';
import { Row, RowStore } from '../storage/rowStore';
import { resolveEntity, VEHICLE } from '../resolver';
import { nextTemporaryId, pickFields, plural } from './common';

/** Columns a conversation may write on a car. */
export const CAR_FIELDS = [
  'vin', 'year', 'make', 'model', 'trim', 'mileage',
  'interior_condition', 'exterior_condition',
  'seller_ask_cents', 'buyer_offer_cents',
  'created_at', 'lead_id',
] as const;

export async function retrieveCar(store: RowStore, query: Record<string, unknown>): Promise<ToolResult> {
  const resolution = await resolveEntity(store, VEHICLE, query);
  if (!resolution.ok) {
    return resolution.result;
  }
  return success('Car retrieved.', {
    car: resolution.row,
    selected_key: resolution.selectedKey,
    selected_value: resolution.selectedValue,
    ignored_keys: resolution.ignoredKeys,
  });
}

export async function listCars(store: RowStore): Promise<ToolResult> {
  const cars = await store.select('cars', [], { orderBy: 'id' });
  return success(`Retrieved ${plural(cars.length, 'car')}.`, { cars, count: cars.length });
}

export async function updateCar(store: RowStore, carId: number, patch: Record<string, unknown>): Promise<ToolResult> {
  const sanitized = pickFields(patch, CAR_FIELDS);
  if (Object.keys(sanitized).length === 0) {
    return failure('INVALID_INPUT', 'Tell me which details of the car to change.', {
      allowed_fields: [...CAR_FIELDS].sort(),
    });
  }

  const existing = await store.select('cars', [{ column: 'id', op: 'eq', value: carId }], { limit: 1 });
  if (existing.length === 0) {
    return failure('NOT_FOUND', `Car id ${carId} not found.`, { car_id: carId });
  }

  const touched = await store.update('cars', { column: 'id', value: carId }, sanitized);
  const updatedFields = touched > 0 ? Object.keys(sanitized).length : 0;
  return success(
    updatedFields ? `Car updated (${plural(updatedFields, 'field')}).` : 'No fields changed.',
    { car_id: carId, updated_fields: updatedFields },
  );
}

/**
 * Adds a car, or updates the existing row when the VIN is already on file.
 * New rows get a temporary negative id until the back office assigns one.
 */
export async function addCar(store: RowStore, patch: Record<string, unknown>): Promise<ToolResult> {
  const vin = typeof patch.vin === 'string' ? patch.vin.trim() || null : patch.vin ?? null;
  const sanitized = pickFields(patch, CAR_FIELDS);
  if (vin !== null) {
    sanitized.vin = vin;
  } else {
    delete sanitized.vin;
  }

  if (vin !== null) {
    const [existing] = await store.select('cars', [{ column: 'vin', op: 'eq', value: vin }], { limit: 1 });
    if (existing) {
      const carId = Number(existing.id);
      const touched = await store.update('cars', { column: 'id', value: carId }, sanitized);
      const updatedFields = touched > 0 ? Object.keys(sanitized).length : 0;
      const car = await fetchCar(store, carId);
      return success(
        updatedFields ? 'Car upserted (existing VIN updated).' : 'No fields changed.',
        { car: car ?? { id: carId }, updated_fields: updatedFields },
      );
    }
  }

  const tempId = await nextTemporaryId(store, 'cars', 'id');
  const inserted = await store.insert('cars', { id: tempId, ...sanitized });
  return success('Car added.', { car: inserted });
}

async function fetchCar(store: RowStore, carId: number): Promise<Row | undefined> {
  const [row] = await store.select('cars', [{ column: 'id', op: 'eq', value: carId }], { limit: 1 });
  return row;
}
