import { WebSocketServer, type WebSocket } from 'ws';
import type { Server as HttpServer } from 'node:http';
import { nanoid } from 'nanoid';
import type { GovernanceEngine } from '../engine/governance-engine.js';
import type { WsEvent } from '../shared/events.js';

export interface WsSetupResult {
  wss: WebSocketServer;
  /** Stop forwarding engine events. */
  detach: () => void;
}

/**
 * Set up the WebSocket server for live governance events.
 * Only committed events reach clients; a rolled-back call broadcasts nothing.
 */
export function setupWebSocket(httpServer: HttpServer, engine: GovernanceEngine, name: string): WsSetupResult {
  const wss = new WebSocketServer({ server: httpServer, path: '/ws' });
  const clients = new Map<WebSocket, string>();

  wss.on('connection', (ws) => {
    const clientId = nanoid(8);
    clients.set(ws, clientId);
    console.log(`[WS] Client ${clientId} connected (${clients.size} total)`);
    send(ws, { type: 'hello', name });

    ws.on('close', () => {
      clients.delete(ws);
      console.log(`[WS] Client ${clientId} disconnected (${clients.size} total)`);
    });

    ws.on('error', (err) => {
      console.error(`[WS] Client ${clientId} error:`, err.message);
      clients.delete(ws);
    });
  });

  function send(client: WebSocket, wsEvent: WsEvent): void {
    if (client.readyState === client.OPEN) {
      client.send(JSON.stringify(wsEvent));
    }
  }

  const detach = engine.onEvent((event) => {
    for (const client of clients.keys()) {
      send(client, { type: 'governance:event', event });
    }
  });

  return { wss, detach };
}
