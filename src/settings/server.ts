import { createServer } from 'http';
import type { IncomingMessage, ServerResponse } from 'http';
import { readFileSync } from 'fs';
import { ConfigError, errorMessage } from '../errors.js';
import { parseActionRecord } from '../actions/action.js';
import { listPorts } from '../serial/discovery.js';
import { EventServer } from '../websocket/server.js';
import type { BridgeHandle } from '../bridge.js';

export interface SettingsServerOptions {
  host: string;
  /** 0 lets the OS pick a free port. */
  port: number;
  /** Page served at `/`; defaults to static/settings.html. */
  html?: string;
}

export interface SettingsServerHandle {
  port: number;
  url: string;
  stop(): Promise<void>;
}

const MAX_BODY_BYTES = 64 * 1024;

const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, PUT, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
};

class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

function loadSettingsHtml(): string {
  return readFileSync(new URL('../../static/settings.html', import.meta.url), 'utf8');
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { ...corsHeaders, 'Content-Type': 'application/json; charset=utf-8' });
  res.end(JSON.stringify(body));
}

async function readJson(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new HttpError(413, 'request body too large');
    chunks.push(buf);
  }
  try {
    const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString('utf8'));
    return parsed;
  } catch {
    throw new HttpError(400, 'request body must be JSON');
  }
}

const BUTTON_ROUTE = /^\/api\/buttons\/([^/]+)(\/test)?$/;

/**
 * Request handler for the settings page and its JSON API:
 *
 *   GET    /api/status
 *   GET    /api/buttons
 *   PUT    /api/buttons/:key        body {type, value}
 *   DELETE /api/buttons/:key
 *   POST   /api/buttons/:key/test
 *   GET    /api/ports
 *   GET    /api/logs?since=<seq>
 */
export function createSettingsHandler(bridge: BridgeHandle, html: string) {
  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';

    if (method === 'OPTIONS') {
      res.writeHead(204, corsHeaders);
      res.end();
      return;
    }

    if (url.pathname === '/' && method === 'GET') {
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(html);
      return;
    }

    if (url.pathname === '/api/status' && method === 'GET') {
      sendJson(res, 200, bridge.getStatus());
      return;
    }

    if (url.pathname === '/api/buttons' && method === 'GET') {
      sendJson(res, 200, bridge.getButtons());
      return;
    }

    if (url.pathname === '/api/ports' && method === 'GET') {
      sendJson(res, 200, await listPorts());
      return;
    }

    if (url.pathname === '/api/logs' && method === 'GET') {
      const sinceParam = url.searchParams.get('since');
      const since = sinceParam === null ? undefined : Number(sinceParam);
      if (since !== undefined && !Number.isInteger(since)) {
        throw new HttpError(400, '"since" must be an integer');
      }
      sendJson(res, 200, bridge.getLogs(since));
      return;
    }

    const match = BUTTON_ROUTE.exec(url.pathname);
    if (match) {
      const key = decodeURIComponent(match[1]);
      const isTest = match[2] !== undefined;

      if (isTest && method === 'POST') {
        const result = await bridge.testButton(key);
        if (!result) throw new HttpError(404, `no action configured for ${key}`);
        sendJson(res, 200, result);
        return;
      }

      if (!isTest && method === 'PUT') {
        const record = parseActionRecord(await readJson(req));
        if (typeof record === 'string') throw new HttpError(400, record);
        bridge.setButton(key, record);
        sendJson(res, 200, { ok: true, buttons: bridge.getButtons() });
        return;
      }

      if (!isTest && method === 'DELETE') {
        if (!bridge.removeButton(key)) throw new HttpError(404, `no button ${key}`);
        sendJson(res, 200, { ok: true, buttons: bridge.getButtons() });
        return;
      }
    }

    throw new HttpError(404, 'Not found');
  }

  return (req: IncomingMessage, res: ServerResponse): void => {
    route(req, res).catch((err: unknown) => {
      if (err instanceof HttpError) {
        sendJson(res, err.status, { ok: false, error: err.message });
      } else if (err instanceof ConfigError) {
        sendJson(res, 400, { ok: false, error: err.problems.join('; ') });
      } else {
        console.error('Settings request failed:', err);
        sendJson(res, 500, { ok: false, error: errorMessage(err) });
      }
    });
  };
}

/**
 * Starts the settings UI: the HTTP API above plus a WebSocket at `/events`
 * streaming bridge events.
 */
export function startSettingsServer(
  bridge: BridgeHandle,
  options: SettingsServerOptions,
): Promise<SettingsServerHandle> {
  const html = options.html ?? loadSettingsHtml();
  const server = createServer(createSettingsHandler(bridge, html));

  const events = new EventServer(() => [
    { type: 'status', status: bridge.getStatus() },
    { type: 'buttons', buttons: bridge.getButtons() },
  ]);
  events.attach(server);
  bridge.onEvent(event => events.broadcast(event));

  return new Promise<SettingsServerHandle>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      server.on('error', (err) => console.error('Settings server error:', err));

      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : options.port;
      const url = `http://${options.host}:${port}`;
      console.log('Settings server:', url);

      resolve({
        port,
        url,
        stop(): Promise<void> {
          events.stop();
          return new Promise<void>((done) => {
            server.close(() => done());
            server.closeAllConnections();
          });
        },
      });
    });
  });
}
