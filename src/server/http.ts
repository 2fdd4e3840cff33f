import http from 'node:http';
import type { AddressInfo } from 'node:net';
import WebSocket, { WebSocketServer } from 'ws';
import { createLogger, describeError } from '../lib/logging';
import type { DispatchOutcome } from '../lib/proxy/dispatch-scheduler';
import { ProxyError } from '../lib/proxy/errors';
import { ConnectionSession } from './connection';
import {
  abortBodySchema,
  dispatchBodySchema,
  planMessageBodySchema,
  settingsBodySchema,
} from './messages';
import type { ProxyService } from './proxy-service';

const logger = createLogger('server:http');

const MAX_BODY_BYTES = 1024 * 1024;

class BodyTooLargeError extends Error {
  constructor() {
    super('request body too large');
    this.name = 'BodyTooLargeError';
  }
}

const readBody = (req: http.IncomingMessage): Promise<string> => {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      size += buffer.length;
      if (size > MAX_BODY_BYTES) {
        reject(new BodyTooLargeError());
        req.destroy();
        return;
      }
      chunks.push(buffer);
    });
    req.on('end', () => {
      resolve(Buffer.concat(chunks).toString('utf8'));
    });
    req.on('error', reject);
  });
};

const sendJson = (res: http.ServerResponse, statusCode: number, payload: Record<string, unknown>) => {
  if (!res.headersSent) {
    res.statusCode = statusCode;
    res.setHeader('Content-Type', 'application/json');
    res.setHeader('Cache-Control', 'no-store');
  }
  res.end(JSON.stringify(payload));
};

type JsonBody = { ok: true; value: unknown } | { ok: false; status: number; error: string };

const readJsonBody = async (req: http.IncomingMessage): Promise<JsonBody> => {
  let raw: string;
  try {
    raw = await readBody(req);
  } catch (error) {
    if (error instanceof BodyTooLargeError) return { ok: false, status: 413, error: error.message };
    throw error;
  }
  if (!raw.trim()) return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false, status: 400, error: 'invalid JSON body' };
  }
};

const rawDataToString = (data: WebSocket.RawData): string => {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
};

const statusForError = (error: unknown): number => {
  if (!(error instanceof ProxyError)) return 500;
  switch (error.code) {
    case 'gateway_unavailable':
      return 503;
    case 'no_session':
      return 409;
    default:
      return 502;
  }
};

const sendError = (res: http.ServerResponse, context: string, error: unknown) => {
  const status = statusForError(error);
  if (status === 500) {
    logger.error(context, describeError(error));
  } else {
    logger.warn(context, describeError(error));
  }
  sendJson(res, status, { error: describeError(error) });
};

/** Session keys may contain `/` and `:`, so everything after the prefix is the key. */
const sessionKeyAfter = (pathname: string, prefix: string): string | null => {
  if (!pathname.startsWith(prefix)) return null;
  const key = decodeURIComponent(pathname.slice(prefix.length));
  return key || null;
};

const handlePlanMessage = async (
  service: ProxyService,
  req: http.IncomingMessage,
  res: http.ServerResponse,
) => {
  const body = await readJsonBody(req);
  if (!body.ok) {
    sendJson(res, body.status, { error: body.error });
    return;
  }
  const parsed = planMessageBodySchema.safeParse(body.value);
  if (!parsed.success) {
    sendJson(res, 400, { error: 'message required' });
    return;
  }
  try {
    const result = await service.processMessage(parsed.data.message);
    sendJson(res, 200, { ok: true, ...result });
  } catch (error) {
    sendError(res, 'plan message failed', error);
  }
};

const handlePlanDispatch = async (
  service: ProxyService,
  req: http.IncomingMessage,
  res: http.ServerResponse,
) => {
  const body = await readJsonBody(req);
  if (!body.ok) {
    sendJson(res, body.status, { error: body.error });
    return;
  }
  const parsed = dispatchBodySchema.safeParse(body.value);
  if (!parsed.success) {
    sendJson(res, 400, { error: 'invalid dispatch request' });
    return;
  }
  let outcome: DispatchOutcome;
  try {
    outcome = await service.dispatchNow({
      ...(parsed.data.sessionKey ? { sessionKey: parsed.data.sessionKey } : {}),
      ...(parsed.data.task !== undefined ? { task: parsed.data.task } : {}),
    });
  } catch (error) {
    sendError(res, 'manual dispatch failed', error);
    return;
  }
  switch (outcome.status) {
    case 'dispatched':
      sendJson(res, 200, { ok: true, dispatched: outcome.task.slice(0, 200), sessionKey: outcome.sessionKey });
      return;
    case 'failed':
      sendError(res, 'manual dispatch failed', outcome.error);
      return;
    default:
      sendJson(res, 400, { error: 'nothing to dispatch' });
  }
};

const handleAbort = async (
  service: ProxyService,
  req: http.IncomingMessage,
  res: http.ServerResponse,
) => {
  const body = await readJsonBody(req);
  if (!body.ok) {
    sendJson(res, body.status, { error: body.error });
    return;
  }
  const parsed = abortBodySchema.safeParse(body.value);
  if (!parsed.success) {
    sendJson(res, 400, { error: 'invalid abort request' });
    return;
  }
  try {
    const sessionKey = await service.abortMainAgent(parsed.data.sessionKey || undefined);
    sendJson(res, 200, { ok: true, sessionKey });
  } catch (error) {
    sendError(res, 'abort failed', error);
  }
};

const handleSessions = async (service: ProxyService, res: http.ServerResponse) => {
  try {
    sendJson(res, 200, { sessions: await service.listSessions() });
  } catch (error) {
    sendError(res, 'listing sessions failed', error);
  }
};

const handleSettings = async (
  service: ProxyService,
  req: http.IncomingMessage,
  res: http.ServerResponse,
) => {
  const body = await readJsonBody(req);
  if (!body.ok) {
    sendJson(res, body.status, { error: body.error });
    return;
  }
  const parsed = settingsBodySchema.safeParse(body.value);
  if (!parsed.success) {
    sendJson(res, 400, { error: 'invalid settings', issues: parsed.error.flatten().fieldErrors });
    return;
  }
  await service.applySettings(parsed.data);
  sendJson(res, 200, { ok: true, changed: Object.keys(parsed.data).length > 0 });
};

export const createRequestHandler =
  (service: ProxyService) => async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');
    try {
      if (req.method === 'GET' && pathname === '/healthz') {
        sendJson(res, 200, { ok: true, uptime: process.uptime() });
        return;
      }
      if (req.method === 'GET' && pathname === '/api/status') {
        sendJson(res, 200, service.getStatus());
        return;
      }
      if (req.method === 'GET' && pathname === '/api/plan/scratchpad') {
        sendJson(res, 200, service.bufferView());
        return;
      }
      if (req.method === 'POST' && pathname === '/api/plan/message') {
        await handlePlanMessage(service, req, res);
        return;
      }
      if (req.method === 'POST' && pathname === '/api/plan/dispatch') {
        await handlePlanDispatch(service, req, res);
        return;
      }
      if (req.method === 'POST' && pathname === '/api/plan/reset') {
        sendJson(res, 200, { ok: true, ...(await service.resetPlan()) });
        return;
      }
      if (req.method === 'POST' && pathname === '/api/settings') {
        await handleSettings(service, req, res);
        return;
      }
      if (req.method === 'POST' && pathname === '/api/abort') {
        await handleAbort(service, req, res);
        return;
      }
      if (req.method === 'GET' && pathname === '/api/sessions') {
        await handleSessions(service, res);
        return;
      }
      if (req.method === 'GET') {
        const cotKey = sessionKeyAfter(pathname, '/api/cot/');
        if (cotKey) {
          sendJson(res, 200, service.agentReasoning(cotKey));
          return;
        }
        const stateKey = sessionKeyAfter(pathname, '/api/session-state/');
        if (stateKey) {
          sendJson(res, 200, service.agentSessionState(stateKey));
          return;
        }
      }
      sendJson(res, 404, { error: 'not found' });
    } catch (error) {
      logger.error('request failed', { path: pathname, error: describeError(error) });
      sendJson(res, 500, { error: 'internal error' });
    }
  };

export type ProxyServer = {
  server: http.Server;
  sockets: WebSocketServer;
  listen(port: number, host: string): Promise<AddressInfo>;
  close(): Promise<void>;
};

/** HTTP API plus the `/ws` socket endpoint, both backed by one service. */
export const createProxyServer = (service: ProxyService): ProxyServer => {
  const handle = createRequestHandler(service);
  const server = http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      logger.error('unhandled request failure', describeError(error));
    });
  });
  const sockets = new WebSocketServer({ server, path: '/ws' });

  sockets.on('connection', (socket) => {
    const session = new ConnectionSession({
      service,
      transport: (message) => {
        if (socket.readyState === WebSocket.OPEN) socket.send(JSON.stringify(message));
      },
    });
    session.open();
    socket.on('message', (data, isBinary) => {
      if (isBinary) return;
      session.handleRaw(rawDataToString(data));
    });
    socket.on('close', () => session.close());
    socket.on('error', (error) => {
      logger.warn('socket error', { connection: session.id, error: describeError(error) });
    });
  });

  return {
    server,
    sockets,
    listen: (port, host) =>
      new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
          server.off('error', reject);
          const address = server.address();
          if (address && typeof address === 'object') {
            resolve(address);
          } else {
            reject(new Error('server is not listening on a TCP port'));
          }
        });
      }),
    close: () =>
      new Promise((resolve, reject) => {
        for (const client of sockets.clients) client.terminate();
        sockets.close();
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      }),
  };
};
