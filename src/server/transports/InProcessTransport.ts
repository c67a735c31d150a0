/**
 * InProcessTransport - Local transport for a host and its peers in one process.
 *
 * Message flow:
 * Client → Transport.connect() → receives Connection
 *   → Transport calls handler.handleConnect(clientId); host messages sent
 *     before the client's onMessage are held and flushed on registration
 * Client sends: connection.send(ClientMessage)
 *   → Transport routes to handler.handleMessage(clientId, message)
 * Host sends: transport.send(clientId, ServerMessage) or broadcast()
 *   → Transport calls registered onMessage handler for that client
 */

import type { ClientMessage, ServerMessage } from '../../shared/multiplayer/protocol';
import type { ClientMessageHandler, Connection, Transport, TransportServer } from './Transport';

export class InProcessTransport implements Transport, TransportServer {
  private handler?: ClientMessageHandler | undefined;
  private clients: Map<string, (message: ServerMessage) => void> = new Map();
  private connectedClients: Set<string> = new Set();
  private pending: Map<string, ServerMessage[]> = new Map();

  /**
   * Set the receiver for client messages (the session room).
   */
  setHandler(handler: ClientMessageHandler): void {
    this.handler = handler;
  }

  connect(clientId: string): Connection {
    // A reconnect replaces whatever the previous connection registered
    this.forget(clientId);
    this.connectedClients.add(clientId);

    const connection: Connection = {
      /**
       * Client → host goes through a microtask, like a real socket would:
       * the host never runs inside the client's call stack.
       */
      send: (message: ClientMessage) => {
        queueMicrotask(() => {
          if (!this.connectedClients.has(clientId)) {
            return;
          }
          if (!this.handler) {
            console.error('InProcessTransport: handler not set');
            return;
          }
          this.handler.handleMessage(clientId, message);
        });
      },

      onMessage: (handler: (message: ServerMessage) => void) => {
        this.clients.set(clientId, handler);
        const held = this.pending.get(clientId) ?? [];
        this.pending.delete(clientId);
        for (const message of held) {
          handler(message);
        }
      },

      disconnect: () => {
        this.forget(clientId);
        if (this.handler) {
          this.handler.handleDisconnect(clientId);
        }
      }
    };

    this.handler?.handleConnect(clientId);
    return connection;
  }

  /**
   * Host → client delivery is synchronous, so per-client order is emission order.
   */
  send(clientId: string, message: ServerMessage): void {
    const handler = this.clients.get(clientId);
    if (handler) {
      handler(message);
      return;
    }
    if (this.connectedClients.has(clientId)) {
      const held = this.pending.get(clientId) ?? [];
      held.push(message);
      this.pending.set(clientId, held);
    }
  }

  broadcast(message: ServerMessage): void {
    for (const clientId of this.connectedClients) {
      this.send(clientId, message);
    }
  }

  getConnectedClients(): string[] {
    return Array.from(this.connectedClients);
  }

  isConnected(clientId: string): boolean {
    return this.connectedClients.has(clientId);
  }

  disconnectClient(clientId: string): void {
    this.forget(clientId);
  }

  async stop(): Promise<void> {
    this.clients.clear();
    this.connectedClients.clear();
    this.pending.clear();
    this.handler = undefined;
  }

  private forget(clientId: string): void {
    this.clients.delete(clientId);
    this.connectedClients.delete(clientId);
    this.pending.delete(clientId);
  }
}
