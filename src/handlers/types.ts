import { SessionStore } from '../services/sessionStore';
import { TurnController } from '../services/controller';

export interface HandlerEvent {
  body: unknown;
  query: Record<string, string | undefined>;
  requestId: string;
}

export interface HandlerResult {
  statusCode: number;
  body: string;
}

export interface AppServices {
  databaseUrl: string | undefined;
  logWindow: number;
  sessions: SessionStore;
  controller: TurnController;
}

export function json(statusCode: number, payload: unknown): HandlerResult {
  return { statusCode, body: JSON.stringify(payload) };
}
