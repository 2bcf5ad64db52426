import { HandlerEvent, HandlerResult, AppServices, json } from './types';
import { isRecord } from '../models/plan';
import { errorMessage, logger } from '../utils/logger';

export async function turnHandler(event: HandlerEvent, app: AppServices): Promise<HandlerResult> {
  const body = isRecord(event.body) ? event.body : {};
  const sessionId = typeof body.session_id === 'string' ? body.session_id : '';
  const session = sessionId ? app.sessions.get(sessionId) : undefined;
  const ctx = { requestId: event.requestId, sessionId: sessionId || undefined };

  if (!session) {
    return json(400, {
      error: 'invalid_session',
      message: 'Invalid or missing session_id. Please initialize session first.',
    });
  }

  const message = typeof body.message === 'string' ? body.message.trim() : '';
  if (!message) {
    return json(400, { error: 'invalid_request', message: 'Message is required' });
  }

  logger.info('User message', ctx, { length: message.length });
  try {
    const reply = await app.controller.handleTurn(session, message, event.requestId);
    logger.info('Reply sent', ctx, { preview: reply.slice(0, 200) });
    return json(200, { reply });
  } catch (err) {
    logger.error('Turn failed', ctx, { error: errorMessage(err) });
    return json(500, { error: 'turn_failed', message: 'Something went wrong handling that message.' });
  }
}
