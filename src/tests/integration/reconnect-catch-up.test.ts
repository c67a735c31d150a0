import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ChessJsBoard } from '../../game/board/ChessJsBoard';
import { encodeBoard, formatSnapshotWire } from '../../game/core/snapshot-codec';
import { createSessionHost, type SessionHost } from '../../server/createSessionHost';
import type { ServerMessage } from '../../shared/multiplayer/protocol';
import { FakeGateway, HOST_ID, flushMicrotasks, quietSessionLogs, sequentialIds } from '../helpers';

describe('Reconnect catch-up', () => {
  let board: ChessJsBoard;
  let host: SessionHost;

  beforeEach(() => {
    quietSessionLogs();
    board = new ChessJsBoard();
    host = createSessionHost({
      hostId: HOST_ID,
      board,
      gateway: new FakeGateway(),
      generateSessionId: sequentialIds()
    });
  });

  afterEach(async () => {
    await host.shutdown();
    vi.restoreAllMocks();
  });

  it('sends nothing to a client that joins before any session exists', () => {
    const inbox: ServerMessage[] = [];
    host.transport.connect('early').onMessage(message => inbox.push(message));

    expect(inbox).toEqual([]);
    expect(host.room.getConnectedClients()).toEqual(['early']);
  });

  it('sends the current id and position to a late joiner', () => {
    host.coordinator.startSession(HOST_ID);
    board.move('e4');
    board.move('c5');

    const inbox: ServerMessage[] = [];
    host.transport.connect('late').onMessage(message => inbox.push(message));

    expect(inbox).toEqual([
      { type: 'SESSION_ID_ASSIGNED', sessionId: 'a1b2c3d4' },
      { type: 'STATE_LOADED', sessionId: 'a1b2c3d4', snapshot: formatSnapshotWire(encodeBoard(board)) }
    ]);
  });

  it('brings a reconnecting peer up to date', async () => {
    host.coordinator.startSession(HOST_ID);
    const peerBoard = new ChessJsBoard();
    const peer = host.connectPeer('peer-1', peerBoard);
    expect(peer.getState().sessionId).toBe('a1b2c3d4');

    peer.disconnect();
    expect(host.room.getConnectedClients()).toEqual([]);

    board.move('Nf3');
    board.move('d5');
    await host.coordinator.save(HOST_ID);

    const rejoined = host.connectPeer('peer-1', peerBoard);

    expect(rejoined.getState()).toEqual({
      sessionId: 'a1b2c3d4',
      snapshot: encodeBoard(board),
      lastSaved: null
    });
    expect(encodeBoard(peerBoard)).toEqual(encodeBoard(board));
    expect(host.room.getConnectedClients()).toEqual(['peer-1']);
  });

  it('repeated catch-up leaves an up-to-date replica and its board unchanged', () => {
    host.coordinator.startSession(HOST_ID);
    const peerBoard = new ChessJsBoard();
    const peer = host.connectPeer('peer-1', peerBoard);
    const settled = peer.getState();
    const fen = peerBoard.fen();

    host.room.handleConnect('peer-1');

    expect(peer.getState()).toBe(settled);
    expect(peerBoard.fen()).toBe(fen);
  });

  it('sends no catch-up after the session ended', async () => {
    host.coordinator.startSession(HOST_ID);
    host.coordinator.endSession(HOST_ID);

    const peer = host.connectPeer('peer-1');
    await flushMicrotasks();

    expect(peer.getState()).toEqual({ sessionId: null, snapshot: null, lastSaved: null });
  });
});
