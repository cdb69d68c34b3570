import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type { BridgeEvent } from '../bridge.js';

/**
 * Pushes bridge events (received lines, status changes, action errors) to
 * the settings page over a WebSocket. New clients first get `initial()`.
 */
export class EventServer {
  private wss: WebSocketServer | null = null;
  private initial: () => BridgeEvent[];

  constructor(initial: () => BridgeEvent[]) {
    this.initial = initial;
  }

  attach(server: Server, path = '/events'): void {
    if (this.wss) return;

    this.wss = new WebSocketServer({ server, path });
    this.wss.on('connection', (ws) => this.handleConnection(ws));
    this.wss.on('error', (err) => {
      console.error('WebSocket server error:', err);
    });
  }

  private handleConnection(ws: WebSocket): void {
    console.log('Settings client connected');

    for (const event of this.initial()) {
      ws.send(JSON.stringify(event));
    }

    ws.on('close', () => {
      console.log('Settings client disconnected');
    });

    ws.on('error', (err) => {
      console.error('WebSocket client error:', err);
    });
  }

  broadcast(event: BridgeEvent): void {
    if (!this.wss) return;
    const data = JSON.stringify(event);
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    }
  }

  stop(): void {
    if (!this.wss) return;
    for (const client of this.wss.clients) {
      client.terminate();
    }
    this.wss.close();
    this.wss = null;
  }
}
