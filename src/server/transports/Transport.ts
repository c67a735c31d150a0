/**
 * Transport Abstraction Layer
 *
 * Defines the interface for different transport mechanisms:
 * - InProcessTransport: same process, local play and tests
 * - WebSocket or Worker transports plug in behind the same interface
 *
 * Transport is responsible for:
 * - Client connections and disconnections
 * - Message routing between clients and the session room
 * - Delivering host messages to clients, in order, per client
 *
 * Transport is NOT responsible for:
 * - Session state or authority
 * - Persistence
 * - Protocol message validation
 */

import type { ClientMessage, ServerMessage } from '../../shared/multiplayer/protocol';

/**
 * Connection object returned when a client connects to transport.
 * Represents the bidirectional communication channel for one client.
 */
export interface Connection {
  /**
   * Send a message from client to host.
   */
  send: (message: ClientMessage) => void;

  /**
   * Register the handler for messages from host to this client.
   */
  onMessage: (handler: (message: ServerMessage) => void) => void;

  /**
   * Disconnect this client from the transport.
   */
  disconnect: () => void;
}

/**
 * Host-side receiver of client traffic (the session room).
 */
export interface ClientMessageHandler {
  /**
   * A client connected (or reconnected). Anything sent to it from here is
   * held until the client registers its onMessage handler.
   */
  handleConnect(clientId: string): void;
  handleMessage(clientId: string, message: ClientMessage): void;
  handleDisconnect(clientId: string): void;
}

/**
 * Transport interface the host uses.
 */
export interface Transport {
  /**
   * Send a message to a specific client.
   */
  send(clientId: string, message: ServerMessage): void;

  /**
   * Create a client connection and return a Connection object.
   */
  connect(clientId: string): Connection;

  /**
   * Lifecycle: Stop the transport (cleanup, close ports, etc).
   */
  stop(): Promise<void>;
}

/**
 * Server-side interface for transport implementations.
 */
export interface TransportServer {
  getConnectedClients(): string[];

  isConnected(clientId: string): boolean;

  /**
   * Disconnect a specific client (from server side).
   */
  disconnectClient(clientId: string): void;

  /**
   * Deliver to every connected client.
   */
  broadcast(message: ServerMessage): void;
}
