/**
 * Multiplayer Module - Peer-side API
 *
 * Architecture:
 * - Connection: transport handle a peer sends requests through
 * - SessionReplica: read-only session view built from host events
 * - Protocol: Wire format (ClientMessage, ServerMessage)
 * - Types: Shared types (SessionState, ReplicaState, Result, error codes)
 */

// Types
export type {
  SessionId,
  SessionPhase,
  SessionState,
  SessionView,
  SavedMarker,
  ReplicaState,
  SessionErrorCode,
  SessionError,
  Result
} from './types';

export { ok, err } from './types';

// Protocol
export type { ClientMessage, ServerMessage, ReplicationEvent } from '../shared/multiplayer/protocol';

// Transport
export type { Connection } from '../server/transports/Transport';

// Replica
export { SessionReplica, type SessionReplicaOptions } from './SessionReplica';
