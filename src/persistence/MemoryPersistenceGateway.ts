import type { SessionId } from '../multiplayer/types';
import type { LoadResult, PersistenceGateway, StoredGameRecord } from './PersistenceGateway';

/**
 * In-memory gateway. Records live only in the process.
 * Useful for local play and transient sessions.
 */
export class MemoryPersistenceGateway implements PersistenceGateway {
  private readonly records = new Map<SessionId, StoredGameRecord>();
  private ready: boolean;
  private readonly now: () => number;

  constructor(options?: { ready?: boolean; now?: () => number }) {
    this.ready = options?.ready ?? true;
    this.now = options?.now ?? Date.now;
  }

  setReady(ready: boolean): void {
    this.ready = ready;
  }

  isReady(): boolean {
    return this.ready;
  }

  async save(id: SessionId, payload: string): Promise<boolean> {
    if (!this.ready) {
      return false;
    }
    this.records.set(id, { state: payload, timestamp: this.now() });
    return true;
  }

  async load(id: SessionId): Promise<LoadResult> {
    if (!this.ready) {
      return { found: false, reason: 'unavailable' };
    }
    const record = this.records.get(id);
    if (!record) {
      return { found: false, reason: 'missing' };
    }
    return { found: true, payload: record.state };
  }

  getRecord(id: SessionId): StoredGameRecord | undefined {
    return this.records.get(id);
  }
}
