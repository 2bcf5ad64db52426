/**
 * Result of one backend operation. Produced once, consumed once by the
 * turn controller, never mutated after it is returned.
 */

export type ToolStatus = 'success' | 'error' | 'unsure';

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'AMBIGUOUS'
  | 'FORBIDDEN'
  | 'PRECONDITION_FAILED'
  | 'CONFLICT'
  | 'TIME_ALREADY_BOOKED'
  | 'TXN_FAILED'
  | 'DB_UNAVAILABLE'
  | 'SEND_FAILED'
  | 'UNKNOWN_TOOL';

export interface ToolResult {
  status: ToolStatus;
  code?: ErrorCode;
  message: string;
  data: Record<string, unknown>;
}

export function success(message: string, data: Record<string, unknown> = {}): ToolResult {
  return { status: 'success', message, data };
}

export function failure(code: ErrorCode, message: string, data: Record<string, unknown> = {}): ToolResult {
  return { status: 'error', code, message, data };
}

export function ambiguous(message: string, data: Record<string, unknown>): ToolResult {
  return { status: 'unsure', code: 'AMBIGUOUS', message, data };
}
