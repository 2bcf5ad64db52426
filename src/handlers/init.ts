/**
 * Session initialization. Takes the lead, buyer and escalation phone for a
 * conversation and returns the session id every later call uses.
 */

import { HandlerEvent, HandlerResult, AppServices, json } from './types';
import { isRecord } from '../models/plan';
import { errorMessage, logger } from '../utils/logger';

function field(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  return typeof value === 'string' || typeof value === 'number' ? String(value).trim() : '';
}

function identifier(value: string): string | number {
  return /^\d+$/.test(value) ? Number.parseInt(value, 10) : value;
}

export async function initHandler(event: HandlerEvent, app: AppServices): Promise<HandlerResult> {
  const ctx = { requestId: event.requestId };
  const body = isRecord(event.body) ? event.body : {};

  const leadId = field(body, 'lead_id');
  const buyerId = field(body, 'buyer_id');
  const escalationPhone = field(body, 'escalation_phone');
  if (!leadId || !buyerId || !escalationPhone) {
    return json(400, {
      error: 'invalid_request',
      message: 'lead_id, buyer_id, and escalation_phone are required',
    });
  }

  if (!app.databaseUrl) {
    logger.error('DATABASE_URL is not set', ctx);
    return json(500, { error: 'not_configured', message: 'DATABASE_URL environment variable is required.' });
  }

  try {
    const { session, reused } = await app.sessions.open({
      leadId: identifier(leadId),
      buyerId: identifier(buyerId),
      escalationPhone,
      storageDescriptor: app.databaseUrl,
    });
    logger.info('Session initialized', { ...ctx, sessionId: session.sessionId }, { reused });
    return json(200, {
      success: true,
      session_id: session.sessionId,
      message: 'Session initialized successfully',
    });
  } catch (err) {
    logger.error('Session init failed', ctx, { error: errorMessage(err) });
    return json(500, { error: 'init_failed', message: `Failed to initialize: ${errorMessage(err)}` });
  }
}
