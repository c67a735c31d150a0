// Session sync public API

export * from './game/types';
export {
  MalformedSnapshotError,
  encodeBoard,
  decodeSnapshot,
  formatSnapshotWire,
  parseSnapshotWire,
  snapshotsEqual
} from './game/core/snapshot-codec';
export { serializeSnapshotDocument, parseSnapshotDocument } from './game/core/snapshot-document';
export { parseSquare, formatSquare, isSquare } from './game/core/squares';
export { ChessJsBoard } from './game/board/ChessJsBoard';

export * from './multiplayer/types';
export { SessionReplica, type SessionReplicaOptions } from './multiplayer/SessionReplica';
export type * from './shared/multiplayer/protocol';

export type { PersistenceGateway, LoadResult, LoadFailureReason, StoredGameRecord } from './persistence/PersistenceGateway';
export { MemoryPersistenceGateway } from './persistence/MemoryPersistenceGateway';
export { RealtimeDatabaseGateway, type RealtimeDatabaseOptions, type FetchLike } from './persistence/RealtimeDatabaseGateway';

export {
  resolveSessionConfig,
  DEFAULT_SESSION_CONFIG,
  InvalidSessionConfigError,
  type SessionConfig,
  type StoreConfig
} from './server/config';
export { SessionCoordinator, type SessionCoordinatorOptions } from './server/session/SessionCoordinator';
export { AutoSaveScheduler, type AutoSaveSchedulerOptions } from './server/session/AutoSaveScheduler';
export { generateSessionId, isSessionId } from './server/session/sessionId';
export { ReplicationChannel } from './server/ReplicationChannel';
export { SessionRoom } from './server/SessionRoom';
export { InProcessTransport } from './server/transports/InProcessTransport';
export type { Connection, Transport, TransportServer, ClientMessageHandler } from './server/transports/Transport';
export {
  createSessionHost,
  createPersistenceGateway,
  type SessionHost,
  type SessionHostOptions
} from './server/createSessionHost';
