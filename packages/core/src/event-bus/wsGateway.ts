/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import http from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer, WebSocket } from 'ws';
import { createLogger } from '../utils/logger.js';
import type { ConnectionRegistry, LiveConnection } from './connectionRegistry.js';

const logger = createLogger('ws-gateway');

export interface GatewayOptions {
  port?: number;
  host?: string;
  /** Ping interval; a client that misses one pong is terminated. */
  heartbeatMs?: number;
}

export interface GatewayHandle {
  server: http.Server;
  wss: WebSocketServer;
  /** Resolves with the bound port once the server is listening. */
  ready: Promise<number>;
  close(): Promise<void>;
}

/** Adapts a `ws` socket to the registry's connection contract. */
export class WebSocketConnection implements LiveConnection {
  constructor(private readonly ws: WebSocket) {}

  send(payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new Error(`socket is not open (state ${this.ws.readyState})`));
        return;
      }
      this.ws.send(payload, (error) => (error ? reject(error) : resolve()));
    });
  }

  close(code?: number, reason?: string): void {
    this.ws.close(code, reason);
  }
}

/** `/ws/<clientId>` → clientId; anything else → undefined. */
export function parseClientPath(url: string | undefined): string | undefined {
  if (!url) return undefined;
  const match = /^\/ws\/([^/?#]+)\/?(?:[?#].*)?$/.exec(url);
  if (!match) return undefined;
  try {
    const clientId = decodeURIComponent(match[1]);
    return clientId.trim() ? clientId : undefined;
  } catch {
    return undefined;
  }
}

function reject404(socket: Duplex): void {
  socket.once('finish', () => socket.destroy());
  socket.end('HTTP/1.1 404 Not Found\r\nConnection: close\r\nContent-Length: 0\r\n\r\n');
}

/**
 * Starts the WebSocket gateway. Each client connects at `/ws/<clientId>` and
 * is registered with the registry; the server only pushes, client frames are
 * ignored.
 */
export function startConnectionGateway(
  registry: ConnectionRegistry,
  options: GatewayOptions = {},
): GatewayHandle {
  const { port = 0, host, heartbeatMs = 30_000 } = options;

  // Plain HTTP requests have nothing to talk to.
  const server = http.createServer((_req, res) => {
    res.writeHead(404).end();
  });
  const wss = new WebSocketServer({ noServer: true });
  const alive = new WeakMap<WebSocket, boolean>();

  const attach = (ws: WebSocket, clientId: string) => {
    const connection = new WebSocketConnection(ws);
    registry.connect(clientId, connection);
    alive.set(ws, true);

    ws.on('pong', () => alive.set(ws, true));
    ws.on('close', () => {
      registry.disconnect(clientId, connection);
    });
    ws.on('error', (error) => {
      logger.warn(`WebSocket error for ${clientId}: ${error.message}`);
      registry.disconnect(clientId, connection);
    });
  };

  server.on('upgrade', (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    const clientId = parseClientPath(req.url);
    if (!clientId) {
      logger.warn(`Rejected WebSocket upgrade for ${req.url ?? '(no url)'}`);
      reject404(socket);
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => attach(ws, clientId));
  });

  const heartbeat = setInterval(() => {
    for (const ws of wss.clients) {
      if (alive.get(ws) === false) {
        ws.terminate();
        continue;
      }
      alive.set(ws, false);
      ws.ping();
    }
  }, heartbeatMs);
  heartbeat.unref();

  const ready = new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    const onListening = () => {
      const address = server.address();
      const bound = typeof address === 'object' && address ? address.port : port;
      logger.info(`WebSocket gateway listening on port ${bound}`);
      resolve(bound);
    };
    if (host) server.listen(port, host, onListening);
    else server.listen(port, onListening);
  });

  const close = async () => {
    clearInterval(heartbeat);
    for (const ws of wss.clients) {
      ws.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
    if (!server.listening) return;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
  };

  return { server, wss, ready, close };
}
