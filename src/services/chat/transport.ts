/**
 * Wire access to the conversational backend: HTTP for authentication and
 * session management, a WebSocket per streamed reply.
 */

import WebSocket, { RawData } from 'ws';
import { isRecord } from '../../models/plan';

export const END_OF_RESPONSE = '<<END_OF_RESPONSE>>';

export type ChatErrorKind = 'unauthorized' | 'rejected' | 'http' | 'network' | 'timeout';

export class ChatBackendError extends Error {
  readonly kind: ChatErrorKind;
  readonly status?: number;

  constructor(kind: ChatErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ChatBackendError';
    this.kind = kind;
    this.status = status;
  }
}

export interface StreamReply {
  text: string;
  rejected: boolean;
}

export interface ChatTransport {
  authenticate(username: string, password: string): Promise<string>;
  getSession(token: string, userId: string, forceNew: boolean): Promise<string>;
  stream(token: string, payload: Record<string, unknown>): Promise<StreamReply>;
  closeSession(token: string, userId: string, sessionId: string): Promise<void>;
}

export interface ChatTransportSettings {
  apiBase: string;
  sessionBase: string;
  origin: string;
  agent: string;
  httpTimeoutMs: number;
  streamTimeoutMs: number;
}

// ─── Stream frames ──────────────────────────────────────────────────────────

export type StreamFrame =
  | { kind: 'text'; text: string }
  | { kind: 'end' }
  | { kind: 'rejected' }
  | { kind: 'skip' };

export function readFrame(frame: string): StreamFrame {
  if (frame.trim().toLowerCase().startsWith('bad request')) {
    return { kind: 'rejected' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(frame);
  } catch {
    return { kind: 'text', text: frame };
  }

  if (!isRecord(parsed)) {
    return { kind: 'skip' };
  }
  if (parsed.response === END_OF_RESPONSE) {
    return { kind: 'end' };
  }
  if ('text' in parsed) {
    return { kind: 'text', text: String(parsed.text) };
  }
  return { kind: 'skip' };
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.isBuffer(data) ? data.toString('utf8') : Buffer.from(data).toString('utf8');
}

function streamUrl(apiBase: string, token: string): string {
  const url = new URL(`${apiBase}/stream`);
  url.protocol = url.protocol === 'http:' ? 'ws:' : 'wss:';
  url.searchParams.set('token', token);
  return url.toString();
}

// ─── HTTP + WebSocket transport ─────────────────────────────────────────────

export class HttpChatTransport implements ChatTransport {
  constructor(private readonly settings: ChatTransportSettings) {}

  async authenticate(username: string, password: string): Promise<string> {
    const body = await this.request(`${this.settings.apiBase}/user`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ username, password }),
    });
    if (!isRecord(body) || typeof body.authorization !== 'string') {
      throw new ChatBackendError('http', 'authentication response had no authorization token');
    }
    return body.authorization;
  }

  async getSession(token: string, userId: string, forceNew: boolean): Promise<string> {
    const { sessionBase, agent } = this.settings;
    const query = forceNew ? '?new=true' : '';
    const body = await this.request(
      `${sessionBase}/get_session/${encodeURIComponent(userId)}/${encodeURIComponent(agent)}${query}`,
      { headers: { authorization: token } },
    );
    if (!isRecord(body) || (typeof body.id !== 'string' && typeof body.id !== 'number')) {
      throw new ChatBackendError('http', 'session response had no id');
    }
    return String(body.id);
  }

  async closeSession(token: string, userId: string, sessionId: string): Promise<void> {
    const { sessionBase } = this.settings;
    await this.request(
      `${sessionBase}/close_session/${encodeURIComponent(userId)}/${encodeURIComponent(sessionId)}`,
      { method: 'POST', headers: { authorization: token } },
    );
  }

  stream(token: string, payload: Record<string, unknown>): Promise<StreamReply> {
    return new Promise<StreamReply>((resolve, reject) => {
      const socket = new WebSocket(streamUrl(this.settings.apiBase, token), {
        headers: { Origin: this.settings.origin },
      });
      const chunks: string[] = [];
      let settled = false;

      const settle = (outcome: { reply: StreamReply } | { error: ChatBackendError }): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.terminate();
        if ('reply' in outcome) resolve(outcome.reply);
        else reject(outcome.error);
      };
      const collected = (rejected: boolean): { reply: StreamReply } => ({
        reply: { text: chunks.join('').trim(), rejected },
      });

      const timer = setTimeout(() => {
        settle({ error: new ChatBackendError('timeout', `stream timed out after ${this.settings.streamTimeoutMs}ms`) });
      }, this.settings.streamTimeoutMs);

      socket.on('open', () => {
        socket.send(JSON.stringify(payload));
      });

      socket.on('message', (data) => {
        const frame = readFrame(rawToString(data));
        switch (frame.kind) {
          case 'text':
            chunks.push(frame.text);
            return;
          case 'end':
            settle(collected(false));
            return;
          case 'rejected':
            settle(collected(true));
            return;
          case 'skip':
            return;
        }
      });

      socket.on('unexpected-response', (_request, response) => {
        const status = response.statusCode ?? 0;
        const kind: ChatErrorKind = status === 401 ? 'unauthorized' : 'http';
        settle({ error: new ChatBackendError(kind, `stream upgrade failed with ${status}`, status) });
      });

      socket.on('error', (err) => {
        settle({ error: new ChatBackendError('network', err.message) });
      });

      socket.on('close', () => {
        settle(collected(false));
      });
    });
  }

  private async request(url: string, init: RequestInit): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: AbortSignal.timeout(this.settings.httpTimeoutMs) });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new ChatBackendError('timeout', `request to ${new URL(url).pathname} timed out`);
      }
      throw new ChatBackendError('network', err instanceof Error ? err.message : String(err));
    }

    if (!response.ok) {
      const bodyText = await response.text();
      const kind: ChatErrorKind = response.status === 401 ? 'unauthorized' : 'http';
      throw new ChatBackendError(kind, `chat_http_${response.status}:${bodyText.slice(0, 120)}`, response.status);
    }

    const text = await response.text();
    if (!text) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new ChatBackendError('http', 'backend returned a non-JSON body');
    }
  }
}
