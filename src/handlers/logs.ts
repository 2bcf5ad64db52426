import { HandlerEvent, HandlerResult, AppServices, json } from './types';

/** Most recent Turn Log entries for a session. */
export async function logsHandler(event: HandlerEvent, app: AppServices): Promise<HandlerResult> {
  const sessionId = event.query.session_id;
  const session = sessionId ? app.sessions.get(sessionId) : undefined;
  if (!session) {
    return json(400, { error: 'invalid_session', message: 'Invalid or missing session_id' });
  }
  return json(200, { logs: app.sessions.recent(session, app.logWindow) });
}
