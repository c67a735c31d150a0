/**
 * ReplicationChannel - host → peers routing of session events.
 *
 * Every broadcast goes to all connected peers through the transport and to
 * the host's own listeners (its UI replica), in the order it was emitted.
 * The channel holds no session state: receivers are responsible for
 * treating repeated events as no-ops.
 */

import type { ReplicationEvent, ServerMessage } from '../shared/multiplayer/protocol';
import type { Transport, TransportServer } from './transports/Transport';

export type SelfListener = (event: ReplicationEvent) => void;

export class ReplicationChannel {
  private readonly transport: Transport & TransportServer;
  private readonly selfListeners = new Set<SelfListener>();

  constructor(transport: Transport & TransportServer) {
    this.transport = transport;
  }

  broadcast(event: ReplicationEvent): void {
    this.transport.broadcast(event);
    for (const listener of this.selfListeners) {
      listener(event);
    }
  }

  /**
   * Point-to-point delivery, used for catch-up and error replies.
   */
  sendTo(clientId: string, message: ServerMessage): void {
    this.transport.send(clientId, message);
  }

  /**
   * Host-local delivery. Returns unsubscribe function.
   */
  onSelfDelivery(listener: SelfListener): () => void {
    this.selfListeners.add(listener);
    return () => {
      this.selfListeners.delete(listener);
    };
  }

  getPeers(): string[] {
    return this.transport.getConnectedClients();
  }
}
