/**
 * WebSocket Server for Vigil
 * Pushes pipeline, security and timeline events to control clients and forwards
 * its control messages to the orchestrator.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import type { Server as HttpServer } from 'http';
import { logger } from '../utils/logger.js';
import type { Orchestrator } from '../orchestrator/index.js';
import type { ServerMessage } from '../types/index.js';

interface Client {
  id: string;
  ws: WebSocket;
  connectedAt: number;
}

export class VigilWebSocketServer {
  private wss: WebSocketServer | null = null;
  private clients: Map<string, Client> = new Map();
  private clientIdCounter = 0;
  private readonly onBroadcast = (message: ServerMessage): void => {
    this.broadcast(message);
  };

  constructor(private readonly orchestrator: Orchestrator) {}

  /**
   * Start WebSocket server
   * @param serverOrPort - Either an HTTP server instance or a port number
   */
  start(serverOrPort: HttpServer | number): void {
    if (typeof serverOrPort === 'number') {
      // Standalone mode with port
      this.wss = new WebSocketServer({ port: serverOrPort });
      logger.info('WebSocket', `Server started on ws://localhost:${serverOrPort}`);
    } else {
      // Attached to HTTP server
      this.wss = new WebSocketServer({ server: serverOrPort });
      logger.info('WebSocket', 'Server attached to HTTP server');
    }

    this.wss.on('connection', (ws: WebSocket) => {
      const clientId = `client_${++this.clientIdCounter}`;
      this.clients.set(clientId, { id: clientId, ws, connectedAt: Date.now() });
      logger.info('WebSocket', `Client connected: ${clientId}`);

      // Send initial status
      this.send(ws, {
        type: 'status',
        payload: this.orchestrator.getStatus(),
        ts: Date.now(),
      });

      ws.on('message', (data: RawData) => {
        this.handleMessage(clientId, data).catch((err: unknown) => {
          logger.error('WebSocket', `Failed to handle message from ${clientId}`, err);
        });
      });

      ws.on('close', () => {
        this.clients.delete(clientId);
        logger.info('WebSocket', `Client disconnected: ${clientId}`);
      });

      ws.on('error', (err) => {
        logger.error('WebSocket', `Client error: ${clientId}`, err);
      });
    });

    // Subscribe to orchestrator broadcasts
    this.orchestrator.on('broadcast', this.onBroadcast);
  }

  stop(): void {
    this.orchestrator.off('broadcast', this.onBroadcast);
    for (const client of this.clients.values()) {
      client.ws.close();
    }
    this.clients.clear();
    this.wss?.close();
    this.wss = null;
    logger.info('WebSocket', 'Server stopped');
  }

  private async handleMessage(clientId: string, data: RawData): Promise<void> {
    let message: unknown;
    try {
      message = JSON.parse(data.toString());
    } catch (err) {
      logger.warn('WebSocket', `Malformed JSON from ${clientId}`, err);
      return;
    }
    await this.orchestrator.handleClientMessage(message);
  }

  private send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  private broadcast(message: ServerMessage): void {
    const data = JSON.stringify(message);
    for (const client of this.clients.values()) {
      if (client.ws.readyState === WebSocket.OPEN) {
        client.ws.send(data);
      }
    }
  }

  getClientCount(): number {
    return this.clients.size;
  }
}
