import * as crypto from 'node:crypto';

export const SHARE_TOKEN_LENGTH = 8;

export function newPostId(): string {
  return crypto.randomUUID();
}

/** Short public token: the first 8 chars of a fresh UUID. */
export function newShareToken(): string {
  return crypto.randomUUID().slice(0, SHARE_TOKEN_LENGTH);
}

/** Unsalted SHA-256 hex of the PIN. */
export function hashPin(pin: string): string {
  return crypto.createHash('sha256').update(pin, 'utf8').digest('hex');
}

/**
 * A stored hash demands an exact digest match; no stored hash means anyone holding the token may delete.
 */
export function pinAllowsDelete(storedHash: string | null, pin: string | null | undefined): boolean {
  if (!storedHash) return true;
  if (!pin) return false;
  const given = Buffer.from(hashPin(pin), 'utf8');
  const expected = Buffer.from(storedHash, 'utf8');
  return given.length === expected.length && crypto.timingSafeEqual(given, expected);
}
