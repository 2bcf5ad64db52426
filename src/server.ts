import 'dotenv/config';

import http from 'http';
import { randomUUID } from 'crypto';
import { buildServices } from './app';
import { loadConfig } from './config';
import { initHandler } from './handlers/init';
import { logsHandler } from './handlers/logs';
import { turnHandler } from './handlers/turn';
import { AppServices, HandlerEvent, HandlerResult, json } from './handlers/types';
import { errorMessage, logger } from './utils/logger';

type Route = (event: HandlerEvent, app: AppServices) => Promise<HandlerResult>;

const ROUTES: Record<string, Route> = {
  'POST /api/init': initHandler,
  'POST /api/chat': turnHandler,
  'GET /api/logs': logsHandler,
};

class PayloadTooLargeError extends Error {}

async function readBody(req: http.IncomingMessage, maxBytes: number): Promise<string> {
  let body = '';
  for await (const chunk of req) {
    body += chunk;
    if (Buffer.byteLength(body) > maxBytes) {
      throw new PayloadTooLargeError('payload_too_large');
    }
  }
  return body;
}

function send(res: http.ServerResponse, result: HandlerResult): void {
  res.writeHead(result.statusCode, { 'Content-Type': 'application/json' });
  res.end(result.body);
}

export function createHttpServer(app: AppServices, maxBodyBytes: number): http.Server {
  return http.createServer(async (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const route = ROUTES[`${req.method ?? 'GET'} ${url.pathname}`];
    if (!route) {
      send(res, json(404, { error: 'not_found' }));
      return;
    }

    const requestId = randomUUID();
    try {
      const raw = req.method === 'POST' ? await readBody(req, maxBodyBytes) : '';
      let body: unknown = {};
      if (raw) {
        try {
          body = JSON.parse(raw);
        } catch {
          send(res, json(400, { error: 'invalid_request', message: 'Body must be JSON.' }));
          return;
        }
      }

      const query = Object.fromEntries(url.searchParams.entries());
      send(res, await route({ body, query, requestId }, app));
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        send(res, json(413, { error: 'payload_too_large' }));
        return;
      }
      logger.error('Unhandled request error', { requestId }, { path: url.pathname, error: errorMessage(err) });
      send(res, json(500, { error: 'internal_error', message: 'Internal server error' }));
    }
  });
}

if (require.main === module) {
  const config = loadConfig();
  const server = createHttpServer(buildServices(config), config.maxBodyBytes);
  server.listen(config.port, () => {
    logger.info(`Car desk assistant listening on port ${config.port}`);
  });
}
