/**
 * Session Types - shared by host, replicas and protocol.
 *
 * - Session identity and authoritative state
 * - Read-only replica projection
 * - Error codes and Result helpers
 */

import type { Snapshot } from '../game/types';

// ============================================================================
// Session State
// ============================================================================

/**
 * Opaque 8-character session identifier, issued by the host.
 */
export type SessionId = string;

export type SessionPhase = 'uninitialized' | 'active' | 'saving' | 'loading' | 'ended';

/**
 * Authoritative state. Exactly one copy exists, owned by the host's
 * SessionCoordinator; everything else sees a clone.
 */
export interface SessionState {
  sessionId: SessionId | null;
  snapshot: Snapshot;
  moveIndex: number;               // Half-moves since the session started
  lastSavedMoveIndex: number;      // -1 until the first successful save
}

/**
 * What the coordinator publishes on every change.
 */
export interface SessionView {
  phase: SessionPhase;
  state: SessionState;
}

export interface SavedMarker {
  sessionId: SessionId;
  moveIndex: number;
}

/**
 * Peer-side projection. Built only from received events; deliberately a
 * different type from SessionState so it cannot be handed to the host.
 */
export interface ReplicaState {
  readonly sessionId: SessionId | null;
  readonly snapshot: Snapshot | null;
  readonly lastSaved: SavedMarker | null;
}

// ============================================================================
// Errors
// ============================================================================

export type SessionErrorCode =
  | 'NotAuthorized'
  | 'OperationInProgress'
  | 'PersistenceUnavailable'
  | 'PersistenceFailure'
  | 'MalformedSnapshot'
  | 'StaleCompletion'
  | 'SessionNotActive';

export interface SessionError {
  code: SessionErrorCode;
  message: string;
}

// ============================================================================
// Result Type
// ============================================================================

/**
 * Result type for operations that can fail
 */
export type Result<T> =
  | { success: true; value: T }
  | { success: false; error: SessionError };

/**
 * Helper to create success result
 */
export function ok<T>(value: T): Result<T> {
  return { success: true, value };
}

/**
 * Helper to create error result
 */
export function err<T>(code: SessionErrorCode, message: string): Result<T> {
  return { success: false, error: { code, message } };
}
