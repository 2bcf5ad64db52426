import { ToolResult, failure, success } from '../../models/toolResult';
import { RowStore } from '../storage/rowStore';
import { toInteger } from './common';

export const PRIORITIES = ['Low', 'Medium', 'High'] as const;
export type Priority = (typeof PRIORITIES)[number];

function isPriority(value: string): value is Priority {
  return (PRIORITIES as readonly string[]).includes(value);
}

function titleCase(value: string): string {
  return value.toLowerCase().replace(/\b\w/g, (c) => c.toUpperCase());
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Normalizes a schedule time to `YYYY-MM-DD HH:MM:SS`. ISO strings lose their
 * `T`, trailing `Z` and fractional seconds; text that does not read as a date
 * is returned trimmed.
 */
export function normalizeScheduleTime(value: unknown): string {
  if (value instanceof Date) {
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())} ` +
      `${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`;
  }

  const text = String(value ?? '').trim().replace('T', ' ').replace(/Z$/, '');
  const match = /^(\d{4})-(\d{2})-(\d{2})(?: (\d{2}):(\d{2})(?::(\d{2}))?)?/.exec(text.split('.')[0] ?? '');
  if (!match) {
    return text;
  }
  const [, year, month, day, hour = '00', minute = '00', second = '00'] = match;
  return `${year}-${month}-${day} ${hour}:${minute}:${second}`;
}

async function requireBuyer(store: RowStore, buyerId: number): Promise<ToolResult | null> {
  const buyers = await store.select('buyers', [{ column: 'id', op: 'eq', value: buyerId }], { limit: 1 });
  return buyers.length === 0 ? failure('NOT_FOUND', `Buyer id ${buyerId} not found.`, { buyer_id: buyerId }) : null;
}

export async function getBuyerAvailability(store: RowStore, buyerIdRaw: unknown): Promise<ToolResult> {
  const buyerId = toInteger(buyerIdRaw);
  if (buyerId === null) {
    return failure('INVALID_INPUT', 'buyer_id must be an integer.', { received: buyerIdRaw });
  }

  const missing = await requireBuyer(store, buyerId);
  if (missing) {
    return missing;
  }

  const schedules = await store.select('buyer_schedule', [{ column: 'buyer_id', op: 'eq', value: buyerId }], {
    orderBy: 'schedule_time',
  });
  return success(schedules.length ? 'Availability retrieved.' : 'No schedules found.', {
    buyer_id: buyerId,
    schedules,
  });
}

/** Books a slot for the buyer; an occupied slot comes back as TIME_ALREADY_BOOKED. */
export async function addBuyerSchedule(
  store: RowStore,
  buyerIdRaw: unknown,
  patch: Record<string, unknown>,
): Promise<ToolResult> {
  const buyerId = toInteger(buyerIdRaw);
  if (buyerId === null) {
    return failure('INVALID_INPUT', 'buyer_id must be an integer.', { received: buyerIdRaw });
  }

  const description = String(patch.description ?? '').trim();
  if (!description) {
    return failure('INVALID_INPUT', 'Please tell me what the appointment is for.', { missing: 'description' });
  }

  const priority = titleCase(String(patch.priority ?? 'Medium').trim() || 'Medium');
  if (!isPriority(priority)) {
    return failure('INVALID_INPUT', `Priority must be one of ${PRIORITIES.join(', ')}.`, {
      received: patch.priority,
    });
  }

  const scheduleTime = normalizeScheduleTime(patch.schedule_time);
  if (!scheduleTime) {
    return failure('INVALID_INPUT', 'Please tell me when the appointment should be.', { missing: 'schedule_time' });
  }

  const missing = await requireBuyer(store, buyerId);
  if (missing) {
    return missing;
  }

  const [existing] = await store.select('buyer_schedule', [
    { column: 'buyer_id', op: 'eq', value: buyerId },
    { column: 'schedule_time', op: 'eq', value: scheduleTime },
  ], { limit: 1 });
  if (existing) {
    return failure('TIME_ALREADY_BOOKED', `The buyer is already booked at ${scheduleTime}. Please choose another time.`, {
      existing_schedule: existing,
      requested_time: scheduleTime,
    });
  }

  const schedule = await store.insert('buyer_schedule', {
    buyer_id: buyerId,
    description,
    schedule_time: scheduleTime,
    priority,
  });
  return success('Schedule added.', { schedule });
}
