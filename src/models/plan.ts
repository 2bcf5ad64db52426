/**
 * Plan: the single decision taken for a turn: answer directly, or call
 * exactly one operation from the closed catalog.
 */

export const TOOL_NAMES = [
  'get_buyer_availability',
  'add_buyer_schedule',
  'car_retrieve',
  'car_add',
  'car_update',
  'get_all_cars',
  'pickup_retrieve',
  'pickup_add',
  'pickup_update',
  'get_all_pickups',
  'get_closest',
  'send_escalate_message',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

const TOOL_NAME_SET: ReadonlySet<string> = new Set(TOOL_NAMES);

export function isToolName(value: unknown): value is ToolName {
  return typeof value === 'string' && TOOL_NAME_SET.has(value);
}

export type ToolArgs = Record<string, unknown>;

export type Plan =
  | { action: 'chat'; answer: string }
  | { action: 'tool'; name: ToolName; args: ToolArgs };

/** Keys the runtime injects from the session; the model may never supply them. */
export const SESSION_OWNED_KEYS: readonly string[] = [
  'storage_descriptor',
  'sqlite_path',
  'database_url',
  'lead_id',
  'buyer_id',
  'escalation_phone',
  'receiver_number',
];

/** Only an internal operator may set the company's offer. */
export const RESTRICTED_KEY = 'buyer_offer_cents';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
