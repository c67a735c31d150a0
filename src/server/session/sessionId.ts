import { randomUUID } from 'node:crypto';
import type { SessionId } from '../../multiplayer/types';

export const SESSION_ID_LENGTH = 8;

const SESSION_ID_PATTERN = /^[0-9a-f]{8}$/;

/**
 * Fresh 8-character hex id (the leading block of a v4 UUID).
 */
export function generateSessionId(): SessionId {
  return randomUUID().slice(0, SESSION_ID_LENGTH);
}

export function isSessionId(value: string): boolean {
  return SESSION_ID_PATTERN.test(value);
}
