/**
 * RealtimeDatabaseGateway - REST client for a Firebase-style realtime database.
 *
 * Layout:
 *   games/{sessionId} = { state: <snapshot document JSON>, timestamp: <server time> }
 *
 * Save PATCHes the record so sibling children (move logs etc.) survive.
 * Load reads games/{sessionId}/state only.
 */

import type { SessionId } from '../multiplayer/types';
import type { LoadResult, PersistenceGateway } from './PersistenceGateway';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RealtimeDatabaseOptions {
  /** Database root, e.g. https://example-db.europe-west1.firebasedatabase.app */
  baseUrl: string;
  /** Database secret or ID token, sent as ?auth= */
  auth?: string;
  fetch?: FetchLike;
}

const SERVER_TIMESTAMP = { '.sv': 'timestamp' } as const;

export class RealtimeDatabaseGateway implements PersistenceGateway {
  private readonly baseUrl: string;
  private readonly auth: string | undefined;
  private readonly fetchFn: FetchLike;
  private ready = false;

  constructor(options: RealtimeDatabaseOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.auth = options.auth;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Probe the database root. The gateway reports not-ready until this succeeds.
   */
  async initialize(): Promise<boolean> {
    try {
      const response = await this.fetchFn(this.url('/', { shallow: 'true' }));
      if (!response.ok) {
        console.error(`[RealtimeDatabaseGateway] initialization failed with status ${response.status}`);
        return false;
      }
      this.ready = true;
      console.info('[RealtimeDatabaseGateway] initialized');
      return true;
    } catch (error) {
      console.error('[RealtimeDatabaseGateway] initialization error:', error);
      return false;
    }
  }

  isReady(): boolean {
    return this.ready;
  }

  async save(id: SessionId, payload: string): Promise<boolean> {
    if (!this.ready) {
      console.error('[RealtimeDatabaseGateway] save skipped: database not initialized');
      return false;
    }

    try {
      const response = await this.fetchFn(this.url(`/games/${encodeURIComponent(id)}`), {
        method: 'PATCH',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ state: payload, timestamp: SERVER_TIMESTAMP })
      });
      if (!response.ok) {
        console.error(`[RealtimeDatabaseGateway] save of ${id} failed with status ${response.status}`);
        return false;
      }
      return true;
    } catch (error) {
      console.error(`[RealtimeDatabaseGateway] save of ${id} failed:`, error);
      return false;
    }
  }

  async load(id: SessionId): Promise<LoadResult> {
    if (!this.ready) {
      console.error('[RealtimeDatabaseGateway] load skipped: database not initialized');
      return { found: false, reason: 'unavailable' };
    }

    let response: Response;
    try {
      response = await this.fetchFn(this.url(`/games/${encodeURIComponent(id)}/state`));
    } catch (error) {
      console.error(`[RealtimeDatabaseGateway] load of ${id} failed:`, error);
      return { found: false, reason: 'failed' };
    }

    if (!response.ok) {
      console.error(`[RealtimeDatabaseGateway] load of ${id} failed with status ${response.status}`);
      return { found: false, reason: 'failed' };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      console.error(`[RealtimeDatabaseGateway] load of ${id} returned invalid JSON:`, error);
      return { found: false, reason: 'malformed' };
    }

    if (body === null) {
      return { found: false, reason: 'missing' };
    }
    if (typeof body !== 'string') {
      console.error(`[RealtimeDatabaseGateway] load of ${id} returned a non-string state`);
      return { found: false, reason: 'malformed' };
    }
    return { found: true, payload: body };
  }

  private url(path: string, query: Record<string, string> = {}): string {
    const params = new URLSearchParams(query);
    if (this.auth !== undefined) {
      params.set('auth', this.auth);
    }
    const search = params.toString();
    return `${this.baseUrl}${path}.json${search ? `?${search}` : ''}`;
  }
}
