/**
 * Shared test fixtures: an in-process pg-mem database per suite, a
 * programmable chat transport, and fakes for the SMS and distance services.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { IMemoryDb } from 'pg-mem';
import { getMemoryDatabase, dropMemoryDatabase } from '../src/services/storage/pgRowStore';
import { openRowStore, RowStoreOpener } from '../src/services/storage';
import { ChatTransport, StreamReply } from '../src/services/chat/transport';
import { Notifier } from '../src/services/sms';
import { DistanceService, NearestMatch } from '../src/services/distance';

// ─── Storage ────────────────────────────────────────────────────────────────

const SCHEMA_SQL = readFileSync(path.join(__dirname, '..', 'data', 'schema.sql'), 'utf-8');

let databaseCounter = 0;

export interface MemoryFixture {
  descriptor: string;
  db: IMemoryDb;
  drop(): void;
}

export function createMemoryFixture(): MemoryFixture {
  databaseCounter += 1;
  const name = `test-${databaseCounter}`;
  const db = getMemoryDatabase(name);
  db.public.none(SCHEMA_SQL);
  return { descriptor: `pg-mem://${name}`, db, drop: () => dropMemoryDatabase(name) };
}

export function seedStandardData(db: IMemoryDb): void {
  db.public.none(`
    INSERT INTO cars (id, vin, "year", make, model, mileage, seller_ask_cents, lead_id) VALUES
      (1, '1HGCM82633A004352', 2003, 'Honda', 'Accord', 120000, 450000, 7),
      (2, '2T1BURHE0JC000001', 2018, 'Toyota', 'Corolla', 40000, 1500000, 7),
      (3, '2T1BURHE0JC000002', 2019, 'Toyota', 'Camry', 30000, 2100000, 8);
    INSERT INTO pickup (pick_up_id, car_id, address, contact_phone, dropoff_time) VALUES
      (10, 1, '12 Oak St, Dallas, TX', '555-0100', '2025-03-01 09:00:00'),
      (11, 2, '400 Elm St, Austin, TX', '555-0101', '2025-03-02 10:00:00'),
      (12, 2, '401 Elm St, Austin, TX', '555-0102', '2025-03-03 11:00:00');
    INSERT INTO buyers (id, name) VALUES (5, 'Dana');
    INSERT INTO buyer_schedule (buyer_id, description, schedule_time, priority) VALUES
      (5, 'Inspect Accord', '2025-03-10 14:00:00', 'High');
  `);
}

/** Wraps the real opener and counts how often storage was opened. */
export function countingOpener(): { open: RowStoreOpener; opens: () => number } {
  let count = 0;
  return {
    open: (descriptor) => {
      count += 1;
      return openRowStore(descriptor);
    },
    opens: () => count,
  };
}

// ─── Chat backend ───────────────────────────────────────────────────────────

export type ScriptedReply = string | StreamReply | Error;

/**
 * Chat transport that answers stream calls from a queue. An exhausted queue
 * answers with empty text, like a backend that stalls.
 */
export class FakeChatTransport implements ChatTransport {
  readonly payloads: Array<Record<string, unknown>> = [];
  readonly sessionRequests: boolean[] = [];
  readonly closedSessions: string[] = [];
  authCalls = 0;
  private replies: ScriptedReply[] = [];
  private sessionCounter = 0;

  queue(...replies: ScriptedReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  async authenticate(): Promise<string> {
    this.authCalls += 1;
    return `token-${this.authCalls}`;
  }

  async getSession(_token: string, _userId: string, forceNew: boolean): Promise<string> {
    this.sessionRequests.push(forceNew);
    this.sessionCounter += 1;
    return `backend-${this.sessionCounter}`;
  }

  async stream(_token: string, payload: Record<string, unknown>): Promise<StreamReply> {
    this.payloads.push(payload);
    const next = this.replies.shift();
    if (next === undefined) {
      return { text: '', rejected: false };
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'string' ? { text: next, rejected: false } : next;
  }

  async closeSession(_token: string, _userId: string, sessionId: string): Promise<void> {
    this.closedSessions.push(sessionId);
  }
}

export function planReply(plan: Record<string, unknown>): string {
  return '```json\n' + JSON.stringify(plan) + '\n```';
}

// ─── Collaborators ──────────────────────────────────────────────────────────

export class FakeNotifier implements Notifier {
  readonly sent: Array<{ to: string; body: string }> = [];
  failWith: Error | null = null;

  async send(to: string, body: string): Promise<{ sid: string }> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push({ to, body });
    return { sid: `SM${this.sent.length}` };
  }
}

/** Distances in meters keyed by destination address; unknown addresses are unreachable. */
export class FakeDistance implements DistanceService {
  readonly calls: Array<{ origin: string; destinations: string[] }> = [];

  constructor(private readonly meters: Record<string, number>) {}

  async nearest(origin: string, destinations: string[]): Promise<NearestMatch | null> {
    this.calls.push({ origin, destinations });
    let best: NearestMatch | null = null;
    for (const address of destinations) {
      const distance = this.meters[address];
      if (distance !== undefined && (best === null || distance < best.distanceMeters)) {
        best = { address, distanceMeters: distance, durationText: `${Math.round(distance / 1000)} km drive` };
      }
    }
    return best;
  }
}
