/**
 * Panel server
 * HTTP control routes plus a WebSocket that mirrors the status channel.
 */

import { createNodeWebSocket } from '@hono/node-ws';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { randomUUID } from 'node:crypto';
import type { StatusChannel } from '../core/notifications.js';
import type { Orchestrator } from '../core/orchestrator.js';
import { logger } from '../shared/logger.js';
import type { MicToggle } from '../triggers/mic-toggle.js';
import type { TypedSource } from '../triggers/typed-source.js';
import { createMessage, WebSocketManager } from './websocket.js';

export interface PanelDeps {
  orchestrator: Pick<Orchestrator, 'status' | 'stop' | 'reset'>;
  typed: TypedSource;
  mic: Pick<MicToggle, 'state' | 'toggle'>;
  channel: StatusChannel;
  version?: string;
}

export type PanelRequest =
  | { type: 'command'; text: string }
  | { type: 'mic' }
  | { type: 'stop' }
  | { type: 'reset' }
  | { type: 'ping' };

/** Validate an incoming WebSocket payload. */
export function parsePanelRequest(raw: string): PanelRequest | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof data !== 'object' || data === null || !('type' in data)) return null;

  const type = data.type;
  switch (type) {
    case 'command': {
      const text = readText(data);
      return text ? { type: 'command', text } : null;
    }
    case 'mic':
    case 'stop':
    case 'reset':
    case 'ping':
      return { type };
    default:
      return null;
  }
}

function readText(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('text' in body)) return null;
  const text = body.text;
  return typeof text === 'string' && text.trim() ? text : null;
}

export function createPanelApp(deps: PanelDeps) {
  const { orchestrator, typed, mic, channel } = deps;
  const app = new Hono();
  const clients = new WebSocketManager();

  const snapshot = () => ({
    triggerState: mic.state,
    ...orchestrator.status(),
    last: channel.last,
    clients: clients.getClientCount(),
  });

  const enqueue = (text: string): boolean => {
    const accepted = typed.push(text);
    if (!accepted) logger.warn('HTTP', 'Command rejected; intake is closed');
    return accepted;
  };

  // Middleware
  app.use('*', cors());
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    logger.http(c.req.method, c.req.path, c.res.status, Date.now() - start);
  });

  // HTTP Routes
  app.get('/', (c) => c.text('palmtalk panel'));

  app.get('/health', (c) => c.json({
    status: 'healthy',
    version: deps.version ?? 'dev',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  }));

  app.get('/status', (c) => c.json(snapshot()));

  app.post('/command', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Invalid JSON body' }, 400);
    }
    const text = readText(body);
    if (!text) {
      return c.json({ error: 'text is required' }, 400);
    }
    if (!enqueue(text)) {
      return c.json({ error: 'Not accepting commands' }, 503);
    }
    return c.json({ queued: true }, 202);
  });

  app.post('/mic', (c) => c.json({ state: mic.toggle() }));

  app.post('/stop', (c) => {
    orchestrator.stop();
    return c.json({ ok: true });
  });

  app.post('/reset', (c) => {
    orchestrator.reset();
    return c.json({ ok: true });
  });

  // Create Node WebSocket adapter
  const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app });

  const handleRequest = (request: PanelRequest, clientId: string): void => {
    switch (request.type) {
      case 'command':
        enqueue(request.text);
        break;
      case 'mic':
        mic.toggle();
        break;
      case 'stop':
        orchestrator.stop();
        break;
      case 'reset':
        orchestrator.reset();
        break;
      case 'ping':
        clients.send(clientId, createMessage('pong', null));
        break;
    }
  };

  app.get(
    '/ws',
    upgradeWebSocket(() => {
      const clientId = randomUUID();
      return {
        onOpen(_evt, ws) {
          clients.addClient(ws, clientId);
          clients.send(clientId, createMessage('connected', { clientId, status: snapshot() }));
        },

        onMessage(evt) {
          if (typeof evt.data !== 'string') return;
          const request = parsePanelRequest(evt.data);
          if (!request) {
            logger.debug('WebSocket', 'Ignoring malformed message', { clientId });
            return;
          }
          logger.websocket('message_received', clientId, { type: request.type });
          handleRequest(request, clientId);
        },

        onClose() {
          clients.removeClient(clientId);
        },
      };
    }),
  );

  const unsubscribe = channel.subscribe((message) => {
    clients.broadcast(createMessage('status', message));
  });

  return { app, injectWebSocket, clients, close: unsubscribe };
}

export type PanelApp = ReturnType<typeof createPanelApp>;
