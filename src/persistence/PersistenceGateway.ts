/**
 * PersistenceGateway - async save/load of one record per session id.
 *
 * Contract:
 * - Never rejects. Every I/O problem becomes a reported failure.
 * - No retry, queue or buffer; the caller decides what to do next.
 * - isReady() must be checked before each call. A gateway that is not
 *   ready reports failure without touching the network.
 */

import type { SessionId } from '../multiplayer/types';

export type LoadFailureReason = 'missing' | 'unavailable' | 'failed' | 'malformed';

export type LoadResult =
  | { found: true; payload: string }
  | { found: false; reason: LoadFailureReason };

export interface PersistenceGateway {
  isReady(): boolean;
  save(id: SessionId, payload: string): Promise<boolean>;
  load(id: SessionId): Promise<LoadResult>;
}

/**
 * Stored record shape: the payload plus the time the store accepted it.
 */
export interface StoredGameRecord {
  state: string;
  timestamp: number;
}
