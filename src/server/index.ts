import { serve, type ServerType } from '@hono/node-server';
import { status } from '../shared/terminal-ui.js';
import { createPanelApp, type PanelDeps } from './app.js';

export interface PanelServer {
  server: ServerType;
  close(): Promise<void>;
}

/**
 * Serve the panel on localhost. WebSocket support is injected once the HTTP
 * server exists.
 */
export function startPanelServer(deps: PanelDeps, port: number): PanelServer {
  const panel = createPanelApp(deps);

  const server = serve({
    fetch: panel.app.fetch,
    port,
    hostname: '127.0.0.1',
  }, () => {
    console.log(status.panelReady(port));
  });

  panel.injectWebSocket(server);

  return {
    server,
    close: () => new Promise<void>((resolve, reject) => {
      panel.close();
      server.close((error) => (error ? reject(error) : resolve()));
    }),
  };
}
