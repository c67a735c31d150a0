/**
 * SessionCoordinator - the single writer of session identity and state.
 *
 * This is the ONLY place where SessionState mutations happen.
 *
 * Design principles:
 * - Authority is checked here, on every mutating call, against hostId
 * - At most one persistence operation outstanding; later requests are rejected
 * - Phase changes to saving/loading happen before the first await, so
 *   back-to-back calls in one tick serialize
 * - Completions are checked against {sessionId, epoch} before they apply
 * - Failures come back as Result values; nothing throws across this boundary
 */

import { writable, type Readable, type Writable } from 'svelte/store';
import type { BoardModel, Snapshot } from '../../game/types';
import { encodeBoard, formatSnapshotWire } from '../../game/core/snapshot-codec';
import { parseSnapshotDocument, serializeSnapshotDocument } from '../../game/core/snapshot-document';
import type { LoadResult, PersistenceGateway } from '../../persistence/PersistenceGateway';
import type {
  Result,
  SavedMarker,
  SessionId,
  SessionPhase,
  SessionState,
  SessionView
} from '../../multiplayer/types';
import { err, ok } from '../../multiplayer/types';
import type { ReplicationChannel } from '../ReplicationChannel';
import { generateSessionId } from './sessionId';

export interface SessionCoordinatorOptions {
  hostId: string;
  board: BoardModel;
  gateway: PersistenceGateway;
  channel: ReplicationChannel;
  generateSessionId?: () => SessionId;
}

interface OperationToken {
  sessionId: SessionId;
  epoch: number;
}

export type MoveListener = (view: SessionView) => void;

const BUSY_PHASES: readonly SessionPhase[] = ['saving', 'loading'];

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SessionCoordinator {
  private readonly hostId: string;
  private readonly board: BoardModel;
  private readonly gateway: PersistenceGateway;
  private readonly channel: ReplicationChannel;
  private readonly nextSessionId: () => SessionId;

  private phase: SessionPhase = 'uninitialized';
  private current: SessionState = {
    sessionId: null,
    snapshot: [],
    moveIndex: 0,
    lastSavedMoveIndex: -1
  };
  // Bumped by startSession/endSession; in-flight completions from an older epoch are stale
  private epoch = 0;

  private readonly store: Writable<SessionView>;
  public readonly state: Readable<SessionView>;
  private readonly moveListeners = new Set<MoveListener>();

  constructor(options: SessionCoordinatorOptions) {
    this.hostId = options.hostId;
    this.board = options.board;
    this.gateway = options.gateway;
    this.channel = options.channel;
    this.nextSessionId = options.generateSessionId ?? generateSessionId;

    this.store = writable(this.view());
    this.state = { subscribe: this.store.subscribe };
  }

  // === ACCESSORS ===

  isHost(callerId: string): boolean {
    return callerId === this.hostId;
  }

  getSessionId(): SessionId | null {
    return this.current.sessionId;
  }

  getPhase(): SessionPhase {
    return this.phase;
  }

  /**
   * Copy of the authoritative state.
   */
  getState(): SessionState {
    return { ...this.current, snapshot: [...this.current.snapshot] };
  }

  /**
   * Move notifications (after moveIndex has advanced). Returns unsubscribe function.
   */
  onMove(listener: MoveListener): () => void {
    this.moveListeners.add(listener);
    return () => {
      this.moveListeners.delete(listener);
    };
  }

  // === LIFECYCLE ===

  /**
   * Start a session, or a new game under a fresh id. Anything in flight
   * for the previous id becomes stale.
   */
  startSession(callerId: string): Result<SessionId> {
    const denied = this.rejectUnlessHost(callerId, 'startSession');
    if (denied) return denied;

    if (this.phase === 'ended') {
      return err('SessionNotActive', 'Session has ended');
    }

    const captured = this.captureBoard();
    if (!captured.success) return captured;

    const sessionId = this.nextSessionId();
    this.epoch++;
    this.phase = 'active';
    this.current = {
      sessionId,
      snapshot: captured.value,
      moveIndex: 0,
      lastSavedMoveIndex: -1
    };
    this.publish();

    console.info(`[SessionCoordinator] session ${sessionId} started`);
    this.channel.broadcast({ type: 'SESSION_ID_ASSIGNED', sessionId });
    return ok(sessionId);
  }

  endSession(callerId: string): Result<void> {
    const denied = this.rejectUnlessHost(callerId, 'endSession');
    if (denied) return denied;

    if (this.phase === 'ended') {
      return err('SessionNotActive', 'Session has already ended');
    }

    this.epoch++;
    this.phase = 'ended';
    this.publish();

    console.info(`[SessionCoordinator] session ${this.current.sessionId ?? '(none)'} ended`);
    return ok(undefined);
  }

  /**
   * One half-move was executed on the host board.
   */
  recordMove(callerId: string): Result<number> {
    const denied = this.rejectUnlessHost(callerId, 'recordMove');
    if (denied) return denied;

    if (this.phase === 'uninitialized' || this.phase === 'ended') {
      return err('SessionNotActive', `Cannot record a move while ${this.phase}`);
    }

    const captured = this.captureBoard();
    if (!captured.success) return captured;

    this.current = {
      ...this.current,
      snapshot: captured.value,
      moveIndex: this.current.moveIndex + 1
    };
    this.publish();

    const view = this.view();
    for (const listener of this.moveListeners) {
      listener(view);
    }
    return ok(this.current.moveIndex);
  }

  // === PERSISTENCE ===

  async save(callerId: string): Promise<Result<SavedMarker>> {
    const denied = this.rejectUnlessHost(callerId, 'save') ?? this.rejectUnlessIdle('save');
    if (denied) return denied;

    const sessionId = this.current.sessionId;
    if (sessionId === null) {
      return err('SessionNotActive', 'No session id assigned');
    }

    if (!this.gateway.isReady()) {
      console.error('[SessionCoordinator] persistence not ready; save aborted');
      return err('PersistenceUnavailable', 'Persistence store is not ready');
    }

    const captured = this.captureBoard();
    if (!captured.success) return captured;

    let payload: string;
    try {
      payload = serializeSnapshotDocument(captured.value);
    } catch (error) {
      return err('MalformedSnapshot', messageOf(error));
    }

    const moveIndex = this.current.moveIndex;
    const token = this.beginOperation('saving', sessionId);

    let saved: boolean;
    try {
      saved = await this.gateway.save(sessionId, payload);
    } catch (error) {
      console.error(`[SessionCoordinator] gateway threw while saving ${sessionId}:`, error);
      saved = false;
    }

    if (!this.isCurrent(token)) {
      console.debug(`[SessionCoordinator] discarding stale save completion for ${sessionId}`);
      return err('StaleCompletion', `Save for ${sessionId} completed after the session moved on`);
    }

    this.phase = 'active';

    if (!saved) {
      this.publish();
      console.error(`[SessionCoordinator] failed to save ${sessionId}`);
      return err('PersistenceFailure', `Failed to save session ${sessionId}`);
    }

    this.current = {
      ...this.current,
      lastSavedMoveIndex: Math.max(this.current.lastSavedMoveIndex, moveIndex)
    };
    this.publish();

    console.info(`[SessionCoordinator] saved ${sessionId} at move ${moveIndex}`);
    this.channel.broadcast({ type: 'SAVE_COMPLETED', sessionId, moveIndex });
    return ok({ sessionId, moveIndex });
  }

  /**
   * Restore a saved position and adopt its id. On any failure the board
   * and state are left exactly as they were.
   */
  async load(callerId: string, id: SessionId): Promise<Result<Snapshot>> {
    const denied = this.rejectUnlessHost(callerId, 'load') ?? this.rejectUnlessIdle('load');
    if (denied) return denied;

    const sessionId = this.current.sessionId;
    if (sessionId === null) {
      return err('SessionNotActive', 'No session id assigned');
    }

    if (id.trim() === '') {
      return err('PersistenceFailure', 'Session id is empty');
    }

    if (!this.gateway.isReady()) {
      console.error('[SessionCoordinator] persistence not ready; load aborted');
      return err('PersistenceUnavailable', 'Persistence store is not ready');
    }

    const token = this.beginOperation('loading', sessionId);

    let result: LoadResult;
    try {
      result = await this.gateway.load(id);
    } catch (error) {
      console.error(`[SessionCoordinator] gateway threw while loading ${id}:`, error);
      result = { found: false, reason: 'failed' };
    }

    if (!this.isCurrent(token)) {
      console.debug(`[SessionCoordinator] discarding stale load completion for ${id}`);
      return err('StaleCompletion', `Load of ${id} completed after the session moved on`);
    }

    this.phase = 'active';

    if (!result.found) {
      this.publish();
      console.error(`[SessionCoordinator] failed to load ${id}: ${result.reason}`);
      return result.reason === 'malformed'
        ? err('MalformedSnapshot', `Stored state for ${id} is malformed`)
        : err('PersistenceFailure', `No state loaded for ${id} (${result.reason})`);
    }

    let snapshot: Snapshot;
    try {
      snapshot = parseSnapshotDocument(result.payload);
      this.board.applySnapshot(snapshot);
    } catch (error) {
      this.publish();
      console.error(`[SessionCoordinator] rejected stored state for ${id}:`, messageOf(error));
      return err('MalformedSnapshot', messageOf(error));
    }

    this.current = { ...this.current, sessionId: id, snapshot };
    this.publish();

    console.info(`[SessionCoordinator] loaded ${id}`);
    this.channel.broadcast({ type: 'SESSION_ID_ASSIGNED', sessionId: id });
    this.channel.broadcast({ type: 'STATE_LOADED', sessionId: id, snapshot: formatSnapshotWire(snapshot) });
    return ok(snapshot);
  }

  // === PRIVATE HELPERS ===

  private rejectUnlessHost(callerId: string, operation: string): Result<never> | null {
    if (this.isHost(callerId)) {
      return null;
    }
    console.warn(`[SessionCoordinator] ${operation} rejected: ${callerId} is not the host`);
    return err('NotAuthorized', `Only the host can ${operation}`);
  }

  private rejectUnlessIdle(operation: string): Result<never> | null {
    if (BUSY_PHASES.includes(this.phase)) {
      return err('OperationInProgress', `Cannot ${operation} while ${this.phase}`);
    }
    if (this.phase !== 'active') {
      return err('SessionNotActive', `Cannot ${operation} while ${this.phase}`);
    }
    return null;
  }

  private beginOperation(phase: 'saving' | 'loading', sessionId: SessionId): OperationToken {
    this.phase = phase;
    this.publish();
    return { sessionId, epoch: this.epoch };
  }

  private isCurrent(token: OperationToken): boolean {
    return token.epoch === this.epoch &&
      token.sessionId === this.current.sessionId &&
      this.phase !== 'ended';
  }

  private captureBoard(): Result<Snapshot> {
    try {
      return ok(encodeBoard(this.board));
    } catch (error) {
      console.error('[SessionCoordinator] board capture failed:', error);
      return err('MalformedSnapshot', messageOf(error));
    }
  }

  private view(): SessionView {
    return { phase: this.phase, state: this.getState() };
  }

  private publish(): void {
    this.store.set(this.view());
  }
}
