/**
 * Protocol definitions for host-peer session communication.
 *
 * NO coordinator or gateway imports allowed - this is shared between host and peers.
 *
 * Design principles:
 * - Messages are serializable (JSON-compatible)
 * - Peers never mutate session state; they only request and receive
 * - Every host message is idempotent on receipt
 * - Protocol is transport-agnostic (works over WebSocket, Worker, or direct calls)
 */

import type { SessionErrorCode, SessionId } from '../../multiplayer/types';

// ============================================================================
// Client -> Host Messages
// ============================================================================

/**
 * Begin a new session (new game) under a fresh id
 */
export interface StartSessionMessage {
  type: 'START_SESSION';
}

/**
 * Save the current position under the current id
 */
export interface SaveMessage {
  type: 'SAVE';
}

/**
 * Restore a saved position and adopt its id
 */
export interface LoadMessage {
  type: 'LOAD';
  sessionId: SessionId;
}

export interface EndSessionMessage {
  type: 'END_SESSION';
}

export interface SetAutoSaveMessage {
  type: 'SET_AUTO_SAVE';
  enabled: boolean;
}

/**
 * All messages a client can send to the host
 */
export type ClientMessage =
  | StartSessionMessage
  | SaveMessage
  | LoadMessage
  | EndSessionMessage
  | SetAutoSaveMessage;

// ============================================================================
// Host -> Client Messages
// ============================================================================

export interface SessionIdAssignedMessage {
  type: 'SESSION_ID_ASSIGNED';
  sessionId: SessionId;
}

export interface SaveCompletedMessage {
  type: 'SAVE_COMPLETED';
  sessionId: SessionId;
  moveIndex: number;
}

/**
 * Full position, in snapshot wire form (see snapshot-codec)
 */
export interface StateLoadedMessage {
  type: 'STATE_LOADED';
  sessionId: SessionId;
  snapshot: string;
}

/**
 * Request from this client was rejected
 */
export interface ErrorMessage {
  type: 'ERROR';
  code: SessionErrorCode;
  message: string;
  requestType: ClientMessage['type'];
}

/**
 * Events the replication channel carries to every peer
 */
export type ReplicationEvent =
  | SessionIdAssignedMessage
  | SaveCompletedMessage
  | StateLoadedMessage;

/**
 * All messages the host can send to a client
 */
export type ServerMessage = ReplicationEvent | ErrorMessage;
