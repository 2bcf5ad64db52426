import { openRowStore, RowStore } from '../src/services/storage';
import { addBuyerSchedule, getBuyerAvailability, normalizeScheduleTime } from '../src/services/operations/schedules';
import { MemoryFixture, createMemoryFixture, seedStandardData } from './helpers';

describe('normalizeScheduleTime', () => {
  test.each([
    ['2025-03-10T14:00:00.000Z', '2025-03-10 14:00:00'],
    ['2025-03-10T14:00:00Z', '2025-03-10 14:00:00'],
    ['2025-03-10 14:30', '2025-03-10 14:30:00'],
    ['2025-03-10', '2025-03-10 00:00:00'],
    ['  next tuesday ', 'next tuesday'],
  ])('%s -> %s', (input, expected) => {
    expect(normalizeScheduleTime(input)).toBe(expected);
  });

  test('formats a Date in local time', () => {
    expect(normalizeScheduleTime(new Date(2025, 2, 10, 9, 5, 7))).toBe('2025-03-10 09:05:07');
  });
});

describe('buyer schedules', () => {
  let fixture: MemoryFixture;
  let store: RowStore;

  beforeEach(async () => {
    fixture = createMemoryFixture();
    seedStandardData(fixture.db);
    store = await openRowStore(fixture.descriptor);
  });

  afterEach(async () => {
    await store.close();
    fixture.drop();
  });

  test('lists the buyer schedule', async () => {
    const result = await getBuyerAvailability(store, 5);
    expect(result.message).toBe('Availability retrieved.');
    expect(result.data).toEqual({
      buyer_id: 5,
      schedules: [
        { id: 1, buyer_id: 5, description: 'Inspect Accord', schedule_time: '2025-03-10 14:00:00', priority: 'High' },
      ],
    });
  });

  test('says so when the buyer has nothing booked', async () => {
    fixture.db.public.none("INSERT INTO buyers (id, name) VALUES (6, 'Lee')");
    const result = await getBuyerAvailability(store, '6');
    expect(result).toEqual({ status: 'success', message: 'No schedules found.', data: { buyer_id: 6, schedules: [] } });
  });

  test('reports an unknown buyer', async () => {
    const result = await getBuyerAvailability(store, 99);
    expect(result.code).toBe('NOT_FOUND');
    expect(result.message).toBe('Buyer id 99 not found.');
  });

  test('rejects a booked slot', async () => {
    const result = await addBuyerSchedule(store, 5, { description: 'Second look', schedule_time: '2025-03-10T14:00:00' });
    expect(result.status).toBe('error');
    expect(result.code).toBe('TIME_ALREADY_BOOKED');
    expect(result.data.requested_time).toBe('2025-03-10 14:00:00');
    expect(result.data.existing_schedule).toMatchObject({ description: 'Inspect Accord' });
  });

  test('books a free slot and title-cases the priority', async () => {
    const result = await addBuyerSchedule(store, 5, {
      description: 'Call back',
      schedule_time: '2025-03-11 09:30',
      priority: 'high',
    });
    expect(result.message).toBe('Schedule added.');
    expect(result.data.schedule).toMatchObject({
      buyer_id: 5,
      description: 'Call back',
      schedule_time: '2025-03-11 09:30:00',
      priority: 'High',
    });
  });

  test('defaults the priority to Medium', async () => {
    const result = await addBuyerSchedule(store, 5, { description: 'Walkaround', schedule_time: '2025-04-01 10:00:00' });
    expect(result.data.schedule).toMatchObject({ priority: 'Medium' });
  });

  test('rejects an unknown priority', async () => {
    const result = await addBuyerSchedule(store, 5, { description: 'x', schedule_time: '2025-04-01', priority: 'urgent' });
    expect(result.code).toBe('INVALID_INPUT');
    expect(result.message).toBe('Priority must be one of Low, Medium, High.');
  });

  test('requires a description', async () => {
    const result = await addBuyerSchedule(store, 5, { schedule_time: '2025-04-01' });
    expect(result.message).toBe('Please tell me what the appointment is for.');
  });
});
