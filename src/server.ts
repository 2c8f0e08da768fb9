/**
 * Node HTTP bootstrap for the search API.
 *
 * Express only carries requests to and from the fetch-style SearchHandler;
 * routing and response bodies live in the handler.
 */

import express from 'express';
import type { IncomingHttpHeaders, Server } from 'node:http';
import type { ServerConfig } from './config.js';
import { logError, toError } from './errors/index.js';

export interface FetchHandler {
  handleRequest(request: Request): Promise<Response>;
}

// Connection-level headers that do not belong on a fetch Request
const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'transfer-encoding',
  'upgrade',
  'proxy-connection',
]);

export interface IncomingLike {
  method: string;
  originalUrl: string;
  headers: IncomingHttpHeaders;
}

export type OutgoingLike = Pick<express.Response, 'status' | 'setHeader' | 'end'>;

export function toFetchRequest(req: IncomingLike): Request {
  const headers = new Headers();

  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined || HOP_BY_HOP.has(name)) continue;

    if (Array.isArray(value)) {
      value.forEach(item => headers.append(name, item));
    } else {
      headers.set(name, value);
    }
  }

  const host = req.headers.host ?? 'localhost';
  return new Request(new URL(req.originalUrl, `http://${host}`), {
    method: req.method,
    headers,
  });
}

export async function writeFetchResponse(response: Response, res: OutgoingLike): Promise<void> {
  res.status(response.status);
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  res.end(Buffer.from(await response.arrayBuffer()));
}

export function createApp(handler: FetchHandler): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(async (req: express.Request, res: express.Response) => {
    try {
      const response = await handler.handleRequest(toFetchRequest(req));
      await writeFetchResponse(response, res);
    } catch (error) {
      logError(toError(error), { path: req.originalUrl });
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  });

  return app;
}

/**
 * Start listening; resolves once the port is bound
 */
export function startServer(handler: FetchHandler, config: ServerConfig): Promise<Server> {
  const app = createApp(handler);

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => {
      console.log(`Search API listening on http://${config.host}:${config.port}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
