export interface AppConfig {
  port: number;
  maxBodyBytes: number;
  databaseUrl: string | undefined;
  chat: {
    apiBase: string;
    sessionBase: string;
    origin: string;
    agent: string;
    username: string | undefined;
    password: string | undefined;
    httpTimeoutMs: number;
    streamTimeoutMs: number;
  };
  planAttempts: number;
  logWindow: number;
  distanceApiKey: string | undefined;
  dropoffDir: string;
  dropoffMaxMiles: number;
  twilio: {
    accountSid: string | undefined;
    authToken: string | undefined;
    fromNumber: string | undefined;
  };
}

export function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function optional(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInteger(env.PORT, 8080),
    maxBodyBytes: parseInteger(env.MAX_BODY_BYTES, 16_384),
    databaseUrl: optional(env.DATABASE_URL),
    chat: {
      apiBase: env.CHAT_API_BASE ?? 'https://ava.andrew-chat.com/api/v1',
      sessionBase: env.CHAT_SESSION_BASE ?? 'https://prism.andrew-chat.com/api/v1/prism',
      origin: env.CHAT_ORIGIN ?? 'https://ava.andrew-chat.com',
      agent: env.CHAT_AGENT ?? 'ava',
      username: optional(env.CHAT_USERNAME),
      password: optional(env.CHAT_PASSWORD),
      httpTimeoutMs: parseInteger(env.CHAT_HTTP_TIMEOUT_MS, 15_000),
      streamTimeoutMs: parseInteger(env.CHAT_STREAM_TIMEOUT_MS, 60_000),
    },
    planAttempts: parseInteger(env.PLAN_ATTEMPTS, 2),
    logWindow: parseInteger(env.LOG_WINDOW, 10),
    distanceApiKey: optional(env.DISTANCE_API_KEY),
    dropoffDir: env.DROPOFF_DIR ?? 'data/dropoffs',
    dropoffMaxMiles: parseInteger(env.DROPOFF_MAX_MILES, 100),
    twilio: {
      accountSid: optional(env.TWILIO_ACCOUNT_SID),
      authToken: optional(env.TWILIO_AUTH_TOKEN),
      fromNumber: optional(env.TWILIO_PHONE_NUMBER),
    },
  };
}
