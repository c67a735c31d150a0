/**
 * SessionRoom - transport-facing front of a hosted session.
 *
 * Responsibilities:
 * 1. Routes client requests to the coordinator/scheduler, tagged with the
 *    sender's clientId (authority is decided there, not here)
 * 2. Answers rejections to the requesting client only
 * 3. Catches up a connecting (or reconnecting) client with the current id
 *    and position
 *
 * The room keeps no session state of its own.
 */

import { formatSnapshotWire } from '../game/core/snapshot-codec';
import type { Result } from '../multiplayer/types';
import type { ClientMessage } from '../shared/multiplayer/protocol';
import type { ReplicationChannel } from './ReplicationChannel';
import type { AutoSaveScheduler } from './session/AutoSaveScheduler';
import type { SessionCoordinator } from './session/SessionCoordinator';
import type { ClientMessageHandler } from './transports/Transport';

export class SessionRoom implements ClientMessageHandler {
  private readonly coordinator: SessionCoordinator;
  private readonly scheduler: AutoSaveScheduler;
  private readonly channel: ReplicationChannel;
  private readonly connectedClients: Set<string> = new Set();

  constructor(coordinator: SessionCoordinator, scheduler: AutoSaveScheduler, channel: ReplicationChannel) {
    this.coordinator = coordinator;
    this.scheduler = scheduler;
    this.channel = channel;
  }

  // === PUBLIC API ===

  /**
   * Register a client and send it the current session, if there is one.
   */
  handleConnect(clientId: string): void {
    this.connectedClients.add(clientId);

    const sessionId = this.coordinator.getSessionId();
    if (sessionId === null || this.coordinator.getPhase() === 'ended') {
      return;
    }

    const { snapshot } = this.coordinator.getState();
    this.channel.sendTo(clientId, { type: 'SESSION_ID_ASSIGNED', sessionId });
    this.channel.sendTo(clientId, {
      type: 'STATE_LOADED',
      sessionId,
      snapshot: formatSnapshotWire(snapshot)
    });
  }

  handleMessage(clientId: string, message: ClientMessage): void {
    switch (message.type) {
      case 'START_SESSION':
        this.reply(clientId, message, this.coordinator.startSession(clientId));
        break;
      case 'END_SESSION':
        this.reply(clientId, message, this.coordinator.endSession(clientId));
        break;
      case 'SET_AUTO_SAVE':
        this.reply(clientId, message, this.scheduler.setEnabled(clientId, message.enabled));
        break;
      case 'SAVE':
        void this.coordinator.save(clientId).then(result => this.reply(clientId, message, result));
        break;
      case 'LOAD':
        void this.coordinator
          .load(clientId, message.sessionId)
          .then(result => this.reply(clientId, message, result));
        break;
    }
  }

  handleDisconnect(clientId: string): void {
    this.connectedClients.delete(clientId);
  }

  getConnectedClients(): string[] {
    return Array.from(this.connectedClients);
  }

  // === PRIVATE HELPERS ===

  private reply<T>(clientId: string, request: ClientMessage, result: Result<T>): void {
    if (result.success || result.error.code === 'StaleCompletion') {
      return;
    }
    this.channel.sendTo(clientId, {
      type: 'ERROR',
      code: result.error.code,
      message: result.error.message,
      requestType: request.type
    });
  }
}
