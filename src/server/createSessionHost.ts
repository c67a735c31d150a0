import type { MoveReportingBoard, BoardModel } from '../game/types';
import { SessionReplica } from '../multiplayer/SessionReplica';
import type { SessionId } from '../multiplayer/types';
import { MemoryPersistenceGateway } from '../persistence/MemoryPersistenceGateway';
import type { PersistenceGateway } from '../persistence/PersistenceGateway';
import { RealtimeDatabaseGateway, type FetchLike } from '../persistence/RealtimeDatabaseGateway';
import { resolveSessionConfig, type SessionConfig } from './config';
import { ReplicationChannel } from './ReplicationChannel';
import { AutoSaveScheduler } from './session/AutoSaveScheduler';
import { SessionCoordinator } from './session/SessionCoordinator';
import { SessionRoom } from './SessionRoom';
import { InProcessTransport } from './transports/InProcessTransport';

/**
 * Options for createSessionHost.
 */
export interface SessionHostOptions {
  /** Identity the coordinator accepts mutations from */
  hostId: string;
  board: MoveReportingBoard;
  gateway: PersistenceGateway;
  /** Overrides on top of defaults and environment */
  config?: Partial<SessionConfig>;
  generateSessionId?: () => SessionId;
}

/**
 * Everything one hosted game needs, wired together.
 */
export interface SessionHost {
  coordinator: SessionCoordinator;
  channel: ReplicationChannel;
  room: SessionRoom;
  scheduler: AutoSaveScheduler;
  transport: InProcessTransport;
  /** The host's own replica, fed by self-delivery */
  hostView: SessionReplica;
  config: SessionConfig;
  /** Connect (or reconnect) a peer over the in-process transport */
  connectPeer: (clientId: string, board?: BoardModel) => SessionReplica;
  shutdown: () => Promise<void>;
}

/**
 * Create a session host for local play or tests.
 * Order matters: the room must be the transport handler before any peer connects.
 */
export function createSessionHost(options: SessionHostOptions): SessionHost {
  const { hostId, board, gateway } = options;
  const config = resolveSessionConfig(options.config);

  const transport = new InProcessTransport();
  const channel = new ReplicationChannel(transport);
  const coordinator = new SessionCoordinator({
    hostId,
    board,
    gateway,
    channel,
    ...(options.generateSessionId !== undefined ? { generateSessionId: options.generateSessionId } : {})
  });
  const scheduler = new AutoSaveScheduler({
    coordinator,
    hostId,
    intervalMs: config.autoSaveIntervalMs,
    moveCadence: config.moveSaveCadence
  });
  const room = new SessionRoom(coordinator, scheduler, channel);
  transport.setHandler(room);

  const hostView = new SessionReplica();
  const unsubscribers = [
    channel.onSelfDelivery(event => hostView.receive(event)),
    board.onMoveExecuted(halfMoveIndex => {
      const result = coordinator.recordMove(hostId);
      if (!result.success) {
        console.debug(`[SessionHost] move ${halfMoveIndex} not recorded: ${result.error.code}`);
      }
    })
  ];

  if (config.autoSaveEnabled) {
    scheduler.setEnabled(hostId, true);
  }

  /**
   * The room's catch-up is held by the transport until the replica
   * registers, so the replica is current when this returns.
   */
  function connectPeer(clientId: string, peerBoard?: BoardModel): SessionReplica {
    return new SessionReplica({
      connection: transport.connect(clientId),
      ...(peerBoard !== undefined ? { board: peerBoard } : {})
    });
  }

  async function shutdown(): Promise<void> {
    scheduler.dispose();
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
    await transport.stop();
  }

  return { coordinator, channel, room, scheduler, transport, hostView, config, connectPeer, shutdown };
}

/**
 * Gateway for a resolved config: the realtime database when a store is
 * configured, otherwise in-memory. A remote gateway that fails its probe
 * is still returned; it reports not-ready and every operation fails fast.
 */
export async function createPersistenceGateway(
  config: SessionConfig,
  fetchFn?: FetchLike
): Promise<PersistenceGateway> {
  if (!config.store) {
    return new MemoryPersistenceGateway();
  }

  const gateway = new RealtimeDatabaseGateway({
    baseUrl: config.store.baseUrl,
    ...(config.store.auth !== undefined ? { auth: config.store.auth } : {}),
    ...(fetchFn !== undefined ? { fetch: fetchFn } : {})
  });
  await gateway.initialize();
  return gateway;
}
