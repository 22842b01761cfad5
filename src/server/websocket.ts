/**
 * WebSocket client registry
 * Tracks panel connections and fans status messages out to them.
 */

import { randomUUID } from 'node:crypto';
import type { WebSocketMessage } from '../shared/types/api.js';
import { logger } from '../shared/logger.js';

const OPEN = 1;

/** The part of a socket the manager uses; hono's WSContext fits. */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
}

export function createMessage<T>(type: string, payload: T): WebSocketMessage<T> {
  return {
    v: 1,
    id: randomUUID(),
    ts: new Date().toISOString(),
    type,
    payload,
  };
}

export class WebSocketManager {
  private clients: Map<string, ClientSocket> = new Map();

  /**
   * Register a new WebSocket client
   */
  addClient(socket: ClientSocket, clientId: string = randomUUID()): string {
    this.clients.set(clientId, socket);
    logger.websocket('client_connected', clientId, { clientCount: this.clients.size });
    return clientId;
  }

  removeClient(id: string): void {
    if (this.clients.delete(id)) {
      logger.websocket('client_disconnected', id, { clientCount: this.clients.size });
    }
  }

  send(clientId: string, message: WebSocketMessage): boolean {
    const socket = this.clients.get(clientId);
    if (socket?.readyState !== OPEN) return false;
    socket.send(JSON.stringify(message));
    return true;
  }

  /**
   * Broadcast message to all connected clients
   */
  broadcast(message: WebSocketMessage): number {
    const payload = JSON.stringify(message);
    let sentCount = 0;
    for (const socket of this.clients.values()) {
      if (socket.readyState === OPEN) {
        socket.send(payload);
        sentCount++;
      }
    }
    logger.debug('WebSocket', 'broadcast', {
      type: message.type,
      sentCount,
      totalClients: this.clients.size,
    });
    return sentCount;
  }

  getClientCount(): number {
    return this.clients.size;
  }
}
