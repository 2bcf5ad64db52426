import { ToolResult, failure, success } from '../../models/toolResult';
import { RowStore } from '../storage/rowStore';
import { PICKUP, resolveEntity } from '../resolver';
import { nextTemporaryId, pickFields, plural, toInteger } from './common';

export const PICKUP_FIELDS = ['car_id', 'address', 'contact_phone', 'pick_up_info', 'created_at', 'dropoff_time'] as const;

export async function retrievePickup(store: RowStore, query: Record<string, unknown>): Promise<ToolResult> {
  const resolution = await resolveEntity(store, PICKUP, query);
  if (!resolution.ok) {
    return resolution.result;
  }
  return success('Pickup retrieved.', {
    pickup: resolution.row,
    selected_key: resolution.selectedKey,
    selected_value: resolution.selectedValue,
  });
}

export async function listPickups(store: RowStore): Promise<ToolResult> {
  const pickups = await store.select('pickup', [], { orderBy: 'pick_up_id' });
  return success(`Retrieved ${plural(pickups.length, 'pickup')}.`, { pickups, count: pickups.length });
}

export async function updatePickup(store: RowStore, pickUpId: number, patch: Record<string, unknown>): Promise<ToolResult> {
  const sanitized = pickFields(patch, PICKUP_FIELDS);
  if (Object.keys(sanitized).length === 0) {
    return failure('INVALID_INPUT', 'Tell me which details of the pickup to change.', {
      allowed_fields: [...PICKUP_FIELDS].sort(),
    });
  }

  if ('car_id' in sanitized) {
    const carId = toInteger(sanitized.car_id);
    if (carId === null) {
      return failure('INVALID_INPUT', 'car_id must be an integer.', { received: sanitized.car_id });
    }
    const cars = await store.select('cars', [{ column: 'id', op: 'eq', value: carId }], { limit: 1 });
    if (cars.length === 0) {
      return failure('PRECONDITION_FAILED', 'That car is not on file.', { car_id: carId });
    }
    sanitized.car_id = carId;
  }

  const touched = await store.update('pickup', { column: 'pick_up_id', value: pickUpId }, sanitized);
  if (touched === 0) {
    return failure('NOT_FOUND', `Pickup id ${pickUpId} not found.`, { pick_up_id: pickUpId });
  }
  const updatedFields = Object.keys(sanitized).length;
  return success(`Pickup updated (${plural(updatedFields, 'field')}).`, {
    pick_up_id: pickUpId,
    updated_fields: updatedFields,
  });
}

/** Creates a pickup with a temporary negative id. A supplied car_id must exist. */
export async function addPickup(store: RowStore, patch: Record<string, unknown>): Promise<ToolResult> {
  const values = pickFields(patch, PICKUP_FIELDS);

  if ('car_id' in values) {
    const carId = toInteger(values.car_id);
    if (carId === null) {
      return failure('INVALID_INPUT', 'car_id must be an integer.', { received: values.car_id });
    }
    const cars = await store.select('cars', [{ column: 'id', op: 'eq', value: carId }], { limit: 1 });
    if (cars.length === 0) {
      return failure('PRECONDITION_FAILED', 'That car is not on file.', { car_id: carId });
    }
    values.car_id = carId;
  }

  const tempId = await nextTemporaryId(store, 'pickup', 'pick_up_id');
  const pickup = await store.insert('pickup', { pick_up_id: tempId, ...values });
  return success('Pickup added.', { pickup });
}
