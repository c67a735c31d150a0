import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SessionReplica, type ReplicaState } from '../../multiplayer';
import { InProcessTransport } from '../../server/transports/InProcessTransport';
import type { ClientMessage } from '../../shared/multiplayer/protocol';
import { MemoryBoard, flushMicrotasks, quietSessionLogs } from '../helpers';

describe('SessionReplica', () => {
  let board: MemoryBoard;
  let replica: SessionReplica;
  let logs: ReturnType<typeof quietSessionLogs>;

  beforeEach(() => {
    logs = quietSessionLogs();
    board = new MemoryBoard().place('King', 'White', 'e1').place('King', 'Black', 'e8');
    replica = new SessionReplica({ board });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts empty', () => {
    expect(replica.getState()).toEqual({ sessionId: null, snapshot: null, lastSaved: null });
    expect(replica.getLastError()).toBeNull();
  });

  describe('SESSION_ID_ASSIGNED', () => {
    it('adopts the id once', () => {
      const updates: ReplicaState[] = [];
      replica.state.subscribe(state => updates.push(state));

      replica.receive({ type: 'SESSION_ID_ASSIGNED', sessionId: 'a1b2c3d4' });
      replica.receive({ type: 'SESSION_ID_ASSIGNED', sessionId: 'a1b2c3d4' });

      expect(updates.map(u => u.sessionId)).toEqual([null, 'a1b2c3d4']);
    });
  });

  describe('STATE_LOADED', () => {
    const loaded = { type: 'STATE_LOADED', sessionId: 'a1b2c3d4', snapshot: 'Kw@g1,Kb@g8' } as const;

    it('applies the position to the board and stores it', () => {
      replica.receive(loaded);

      expect(board.pieceAt('g1')).toEqual({ kind: 'King', owner: 'White' });
      expect(board.pieceAt('e1')).toBeUndefined();
      expect(replica.getState()).toEqual({
        sessionId: 'a1b2c3d4',
        snapshot: [
          { kind: 'King', owner: 'White', square: { file: 7, rank: 1 } },
          { kind: 'King', owner: 'Black', square: { file: 7, rank: 8 } }
        ],
        lastSaved: null
      });
    });

    it('applying the same event twice equals applying it once', () => {
      replica.receive(loaded);
      const once = replica.getState();

      replica.receive(loaded);

      expect(replica.getState()).toBe(once);
      expect(board.pieceAt('g1')).toEqual({ kind: 'King', owner: 'White' });
      expect(board.pieceAt('g8')).toEqual({ kind: 'King', owner: 'Black' });
      expect(board.pieceAt('e1')).toBeUndefined();
    });

    it('restores a board that moved on when the same position is loaded again', () => {
      replica.receive(loaded);
      board.move('g1', 'f2');
      const before = replica.getState();

      replica.receive(loaded);

      expect(board.pieceAt('g1')).toEqual({ kind: 'King', owner: 'White' });
      expect(board.pieceAt('f2')).toBeUndefined();
      expect(replica.getState()).toBe(before);
    });

    it('adopts a new id for an identical position', () => {
      replica.receive(loaded);
      replica.receive({ ...loaded, sessionId: 'e5f6a7b8' });

      expect(replica.getState().sessionId).toBe('e5f6a7b8');
      expect(board.pieceAt('g1')).toEqual({ kind: 'King', owner: 'White' });
    });

    it('ignores a malformed payload and keeps its prior state', () => {
      replica.receive(loaded);
      const before = replica.getState();

      replica.receive({ type: 'STATE_LOADED', sessionId: 'e5f6a7b8', snapshot: 'Kw@g1,Zz@z9' });

      expect(replica.getState()).toBe(before);
      expect(board.applyCount).toBe(1);
      expect(logs.warn).toHaveBeenCalledTimes(1);
    });

    it('keeps its prior state when the board refuses the position', () => {
      board.rejectApply = true;

      replica.receive(loaded);

      expect(replica.getState().snapshot).toBeNull();
      expect(board.pieceAt('e1')).toEqual({ kind: 'King', owner: 'White' });
    });

    it('stores the position when there is no board', () => {
      const headless = new SessionReplica();
      headless.receive(loaded);
      expect(headless.getState().snapshot?.length).toBe(2);
    });
  });

  describe('SAVE_COMPLETED', () => {
    it('records the latest saved marker, ignoring repeats', () => {
      const updates: ReplicaState[] = [];
      replica.state.subscribe(state => updates.push(state));

      replica.receive({ type: 'SAVE_COMPLETED', sessionId: 'a1b2c3d4', moveIndex: 5 });
      replica.receive({ type: 'SAVE_COMPLETED', sessionId: 'a1b2c3d4', moveIndex: 5 });
      replica.receive({ type: 'SAVE_COMPLETED', sessionId: 'a1b2c3d4', moveIndex: 10 });

      expect(updates.map(u => u.lastSaved)).toEqual([
        null,
        { sessionId: 'a1b2c3d4', moveIndex: 5 },
        { sessionId: 'a1b2c3d4', moveIndex: 10 }
      ]);
    });
  });

  describe('ERROR', () => {
    it('keeps the rejection as lastError without touching state', () => {
      const error = {
        type: 'ERROR',
        code: 'NotAuthorized',
        message: 'Only the host can load',
        requestType: 'LOAD'
      } as const;

      replica.receive(error);

      expect(replica.getLastError()).toEqual(error);
      expect(replica.getState()).toEqual({ sessionId: null, snapshot: null, lastSaved: null });
    });
  });

  describe('requests', () => {
    it('cannot send without a connection', () => {
      expect(replica.request({ type: 'SAVE' })).toBe(false);
      expect(logs.error).toHaveBeenCalledWith('[SessionReplica] no connection; SAVE not sent');
    });

    it('forwards requests over its connection on a microtask', async () => {
      const transport = new InProcessTransport();
      const received: Array<[string, ClientMessage]> = [];
      const disconnected: string[] = [];
      transport.setHandler({
        handleConnect: () => {},
        handleMessage: (clientId, message) => received.push([clientId, message]),
        handleDisconnect: clientId => disconnected.push(clientId)
      });

      const peer = new SessionReplica({ connection: transport.connect('peer-1') });

      expect(peer.request({ type: 'LOAD', sessionId: 'a1b2c3d4' })).toBe(true);
      expect(received).toEqual([]);

      await flushMicrotasks();
      expect(received).toEqual([['peer-1', { type: 'LOAD', sessionId: 'a1b2c3d4' }]]);

      transport.send('peer-1', { type: 'SESSION_ID_ASSIGNED', sessionId: 'a1b2c3d4' });
      expect(peer.getState().sessionId).toBe('a1b2c3d4');

      peer.disconnect();
      expect(disconnected).toEqual(['peer-1']);
      expect(transport.isConnected('peer-1')).toBe(false);
    });
  });
});
