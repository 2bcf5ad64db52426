import { loadConfig, parseInteger } from '../src/config';

describe('parseInteger', () => {
  test('falls back on missing, invalid and non-positive values', () => {
    expect(parseInteger(undefined, 5)).toBe(5);
    expect(parseInteger('', 5)).toBe(5);
    expect(parseInteger('abc', 5)).toBe(5);
    expect(parseInteger('0', 5)).toBe(5);
    expect(parseInteger('-3', 5)).toBe(5);
    expect(parseInteger('42', 5)).toBe(42);
  });
});

describe('loadConfig', () => {
  test('applies defaults to an empty environment', () => {
    const config = loadConfig({});
    expect(config.port).toBe(8080);
    expect(config.maxBodyBytes).toBe(16384);
    expect(config.databaseUrl).toBeUndefined();
    expect(config.planAttempts).toBe(2);
    expect(config.logWindow).toBe(10);
    expect(config.dropoffDir).toBe('data/dropoffs');
    expect(config.dropoffMaxMiles).toBe(100);
    expect(config.chat.httpTimeoutMs).toBe(15000);
    expect(config.chat.streamTimeoutMs).toBe(60000);
    expect(config.chat.username).toBeUndefined();
    expect(config.twilio).toEqual({ accountSid: undefined, authToken: undefined, fromNumber: undefined });
  });

  test('reads overrides and ignores blank optional values', () => {
    const config = loadConfig({
      PORT: '9090',
      DATABASE_URL: 'pg-mem://config',
      CHAT_PASSWORD: 'test-secret',
      CHAT_USERNAME: '   ',
      PLAN_ATTEMPTS: '3',
      DROPOFF_MAX_MILES: '250',
      TWILIO_PHONE_NUMBER: '+15550000',
    });
    expect(config.port).toBe(9090);
    expect(config.databaseUrl).toBe('pg-mem://config');
    expect(config.chat.password).toBe('test-secret');
    expect(config.chat.username).toBeUndefined();
    expect(config.planAttempts).toBe(3);
    expect(config.dropoffMaxMiles).toBe(250);
    expect(config.twilio.fromNumber).toBe('+15550000');
  });
});
