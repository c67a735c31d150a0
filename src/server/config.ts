/**
 * Session configuration shared by the host factory, scheduler and gateways.
 */

import { z } from 'zod';

export interface StoreConfig {
  /** Realtime database root URL */
  baseUrl: string;
  /** Optional auth token appended to every request */
  auth?: string;
}

/**
 * Configuration for one hosted session
 */
export interface SessionConfig {
  /** Start the interval and move-count auto-save triggers immediately */
  autoSaveEnabled: boolean;

  /** Interval trigger period (ms) */
  autoSaveIntervalMs: number;

  /** Move-count trigger: save after every Nth half-move */
  moveSaveCadence: number;

  /** Remote store; absent means in-memory persistence */
  store?: StoreConfig;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  autoSaveEnabled: false,
  autoSaveIntervalMs: 60_000,
  moveSaveCadence: 5
};

/**
 * Error thrown when environment or override values are unusable.
 */
export class InvalidSessionConfigError extends Error {
  details?: unknown;

  constructor(reason: string, details?: unknown) {
    super(`Invalid session config: ${reason}`);
    this.name = 'InvalidSessionConfigError';
    this.details = details;
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  SESSION_AUTOSAVE: booleanFlag.optional(),
  SESSION_AUTOSAVE_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  SESSION_STORE_URL: z.string().url().optional(),
  SESSION_STORE_AUTH: z.string().min(1).optional()
});

const configSchema = z.object({
  autoSaveEnabled: z.boolean(),
  autoSaveIntervalMs: z.number().int().positive(),
  moveSaveCadence: z.number().int().positive()
});

type Env = Record<string, string | undefined>;

function configFromEnv(env: Env): Partial<SessionConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidSessionConfigError('bad environment', parsed.error.issues);
  }

  const values = parsed.data;
  const fromEnv: Partial<SessionConfig> = {};
  if (values.SESSION_AUTOSAVE !== undefined) {
    fromEnv.autoSaveEnabled = values.SESSION_AUTOSAVE;
  }
  if (values.SESSION_AUTOSAVE_INTERVAL_MS !== undefined) {
    fromEnv.autoSaveIntervalMs = values.SESSION_AUTOSAVE_INTERVAL_MS;
  }
  if (values.SESSION_STORE_URL !== undefined) {
    fromEnv.store = {
      baseUrl: values.SESSION_STORE_URL,
      ...(values.SESSION_STORE_AUTH !== undefined ? { auth: values.SESSION_STORE_AUTH } : {})
    };
  }
  return fromEnv;
}

/**
 * Defaults < environment < explicit overrides.
 */
export function resolveSessionConfig(
  overrides: Partial<SessionConfig> = {},
  env: Env = globalThis.process?.env ?? {}
): SessionConfig {
  const merged: SessionConfig = {
    ...DEFAULT_SESSION_CONFIG,
    ...configFromEnv(env),
    ...overrides
  };

  const checked = configSchema.safeParse(merged);
  if (!checked.success) {
    throw new InvalidSessionConfigError('bad values', checked.error.issues);
  }

  return merged;
}
