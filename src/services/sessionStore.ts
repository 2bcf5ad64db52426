import { randomUUID } from 'crypto';
import { Session, SessionIdentity, TurnEventKind, TurnLogEntry } from '../models/session';
import { ChatBackendClient } from './chat/chatBackend';
import { KeyedMutex } from '../utils/mutex';
import { logger } from '../utils/logger';

export type BackendFactory = (userId: string) => ChatBackendClient;

/**
 * In-memory sessions keyed by session id. Turns for one session run one at a
 * time; different sessions never share state.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly turns = new KeyedMutex();
  private readonly opening = new KeyedMutex();
  private readonly createBackend: BackendFactory;

  constructor(createBackend: BackendFactory) {
    this.createBackend = createBackend;
  }

  /**
   * Creates a session, or returns the existing one for the same lead. A new
   * session binds a fresh backend session before it is stored. Opens for one
   * lead run one at a time, so a lead never holds two sessions.
   */
  open(identity: SessionIdentity): Promise<{ session: Session; reused: boolean }> {
    return this.opening.run(`lead:${identity.leadId}`, () => this.openUnlocked(identity));
  }

  private async openUnlocked(identity: SessionIdentity): Promise<{ session: Session; reused: boolean }> {
    const existing = this.findByLead(identity.leadId);
    if (existing) {
      logger.info('Reusing session for lead', { sessionId: existing.sessionId }, { leadId: identity.leadId });
      return { session: existing, reused: true };
    }

    const backend = this.createBackend(String(identity.leadId));
    await backend.bindSession(true);

    const session: Session = {
      ...identity,
      sessionId: randomUUID(),
      createdAt: new Date().toISOString(),
      log: [],
      backend,
    };
    this.sessions.set(session.sessionId, session);
    logger.info('Session created', { sessionId: session.sessionId }, { leadId: identity.leadId });
    return { session, reused: false };
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /** Runs `fn` with the session's turn lock held. */
  runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.turns.run(sessionId, fn);
  }

  append(session: Session, event: TurnEventKind, detail: string): TurnLogEntry {
    const entry: TurnLogEntry = { event, detail, timestamp: new Date().toISOString() };
    session.log.push(entry);
    return entry;
  }

  recent(session: Session, count: number): TurnLogEntry[] {
    return count > 0 ? session.log.slice(-count) : [];
  }

  get size(): number {
    return this.sessions.size;
  }

  private findByLead(leadId: string | number): Session | undefined {
    for (const session of this.sessions.values()) {
      if (String(session.leadId) === String(leadId)) {
        return session;
      }
    }
    return undefined;
  }
}
