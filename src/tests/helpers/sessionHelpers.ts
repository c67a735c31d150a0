import type { SessionId } from '../../multiplayer/types';
import { ReplicationChannel } from '../../server/ReplicationChannel';
import { SessionCoordinator } from '../../server/session/SessionCoordinator';
import { InProcessTransport } from '../../server/transports/InProcessTransport';
import type { ReplicationEvent } from '../../shared/multiplayer/protocol';
import { FakeGateway } from './FakeGateway';
import { MemoryBoard } from './MemoryBoard';

export const HOST_ID = 'host';

export const TEST_SESSION_IDS: readonly SessionId[] = ['a1b2c3d4', 'e5f6a7b8', 'c9d0e1f2', '0badf00d'];

export interface TestHost {
  board: MemoryBoard;
  gateway: FakeGateway;
  transport: InProcessTransport;
  channel: ReplicationChannel;
  coordinator: SessionCoordinator;
  /** Everything the channel delivered to the host, in order */
  broadcasts: ReplicationEvent[];
}

/**
 * White king e1 + pawn e2, black king e8.
 */
export function createStartingBoard(): MemoryBoard {
  return new MemoryBoard()
    .place('King', 'White', 'e1')
    .place('Pawn', 'White', 'e2')
    .place('King', 'Black', 'e8');
}

/**
 * Returns a generator that hands out the given ids in order.
 */
export function sequentialIds(ids: readonly SessionId[] = TEST_SESSION_IDS): () => SessionId {
  const queue = [...ids];
  return () => {
    const next = queue.shift();
    if (next === undefined) {
      throw new Error('Out of test session ids');
    }
    return next;
  };
}

/**
 * Coordinator over a MemoryBoard and FakeGateway, ids from TEST_SESSION_IDS.
 */
export function createTestHost(options: { board?: MemoryBoard; gateway?: FakeGateway } = {}): TestHost {
  const board = options.board ?? createStartingBoard();
  const gateway = options.gateway ?? new FakeGateway();
  const transport = new InProcessTransport();
  const channel = new ReplicationChannel(transport);
  const broadcasts: ReplicationEvent[] = [];
  channel.onSelfDelivery(event => broadcasts.push(event));

  const coordinator = new SessionCoordinator({
    hostId: HOST_ID,
    board,
    gateway,
    channel,
    generateSessionId: sequentialIds()
  });

  return { board, gateway, transport, channel, coordinator, broadcasts };
}

/**
 * Let chained promise continuations run.
 */
export async function flushMicrotasks(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
