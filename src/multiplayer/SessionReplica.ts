/**
 * SessionReplica - read-only view of a hosted session.
 *
 * Peers build one over their transport connection; the host builds one
 * without a connection and feeds it from ReplicationChannel self-delivery.
 * Every event may arrive more than once (broadcast plus reconnect
 * catch-up). A repeated STATE_LOADED is applied to the board again, which
 * replaces the whole position, but leaves the replica state untouched.
 */

import { writable, type Readable, type Writable } from 'svelte/store';
import type { BoardModel, Snapshot } from '../game/types';
import { parseSnapshotWire, snapshotsEqual } from '../game/core/snapshot-codec';
import type {
  ClientMessage,
  ErrorMessage,
  SaveCompletedMessage,
  ServerMessage,
  StateLoadedMessage
} from '../shared/multiplayer/protocol';
import type { Connection } from '../server/transports/Transport';
import type { ReplicaState, SessionId } from './types';

export interface SessionReplicaOptions {
  /** Host-to-client connection; absent for the host's own view */
  connection?: Connection;
  /** Board that mirrors loaded positions */
  board?: BoardModel;
}

const EMPTY_REPLICA: ReplicaState = {
  sessionId: null,
  snapshot: null,
  lastSaved: null
};

export class SessionReplica {
  private readonly connection: Connection | null;
  private readonly board: BoardModel | null;

  private current: ReplicaState = EMPTY_REPLICA;
  private lastError: ErrorMessage | null = null;

  private readonly store: Writable<ReplicaState>;
  public readonly state: Readable<ReplicaState>;

  constructor(options: SessionReplicaOptions = {}) {
    this.connection = options.connection ?? null;
    this.board = options.board ?? null;

    this.store = writable(this.current);
    this.state = { subscribe: this.store.subscribe };

    this.connection?.onMessage(message => this.receive(message));
  }

  getState(): ReplicaState {
    return this.current;
  }

  /**
   * Most recent rejection of one of this replica's requests.
   */
  getLastError(): ErrorMessage | null {
    return this.lastError;
  }

  /**
   * Forward a request to the host. Fire-and-forget: the outcome arrives as
   * a broadcast or an ERROR reply.
   */
  request(message: ClientMessage): boolean {
    if (!this.connection) {
      console.error(`[SessionReplica] no connection; ${message.type} not sent`);
      return false;
    }
    this.connection.send(message);
    return true;
  }

  disconnect(): void {
    this.connection?.disconnect();
  }

  /**
   * Apply one host message.
   */
  receive(message: ServerMessage): void {
    switch (message.type) {
      case 'SESSION_ID_ASSIGNED':
        this.adoptSessionId(message.sessionId);
        break;
      case 'STATE_LOADED':
        this.applyLoadedState(message);
        break;
      case 'SAVE_COMPLETED':
        this.recordSave(message);
        break;
      case 'ERROR':
        this.lastError = message;
        console.warn(`[SessionReplica] ${message.requestType} rejected: ${message.code}`);
        break;
    }
  }

  // === PRIVATE HELPERS ===

  private adoptSessionId(sessionId: SessionId): void {
    if (this.current.sessionId === sessionId) {
      return;
    }
    this.update({ ...this.current, sessionId });
  }

  private applyLoadedState(message: StateLoadedMessage): void {
    let snapshot: Snapshot;
    try {
      snapshot = parseSnapshotWire(message.snapshot);
    } catch (error) {
      console.warn('[SessionReplica] ignoring malformed STATE_LOADED:', error);
      return;
    }

    // The board may have moved on since the last load; a repeat still restores it.
    if (this.board) {
      try {
        this.board.applySnapshot(snapshot);
      } catch (error) {
        console.warn('[SessionReplica] board rejected STATE_LOADED:', error);
        return;
      }
    }

    const sameId = this.current.sessionId === message.sessionId;
    const sameSnapshot = this.current.snapshot !== null && snapshotsEqual(this.current.snapshot, snapshot);
    if (sameId && sameSnapshot) {
      return;
    }

    this.update({ ...this.current, sessionId: message.sessionId, snapshot });
  }

  private recordSave(message: SaveCompletedMessage): void {
    const previous = this.current.lastSaved;
    if (previous && previous.sessionId === message.sessionId && previous.moveIndex === message.moveIndex) {
      return;
    }
    this.update({
      ...this.current,
      lastSaved: { sessionId: message.sessionId, moveIndex: message.moveIndex }
    });
  }

  private update(next: ReplicaState): void {
    this.current = next;
    this.store.set(next);
  }
}
