/**
 * Per-user session state. Lives in process memory for the life of the
 * process and is never shared between sessions.
 */

import type { ChatBackendClient } from '../services/chat/chatBackend';

export interface SessionIdentity {
  leadId: string | number;
  buyerId: string | number;
  escalationPhone: string;
  storageDescriptor: string;
}

export type TurnEventKind =
  | 'user_input'
  | 'planner_fail'
  | 'plan_invalid'
  | 'chat'
  | 'tool_call'
  | 'tool_result'
  | 'tool_response_generated'
  | 'phrase_fail';

export interface TurnLogEntry {
  event: TurnEventKind;
  detail: string;
  timestamp: string;  // ISO-8601
}

export interface Session extends SessionIdentity {
  sessionId: string;
  createdAt: string;  // ISO-8601
  log: TurnLogEntry[];
  backend: ChatBackendClient;
}

/** Entries shown to the planner as recent context. */
export const RECENT_CONTEXT_ENTRIES = 3;
