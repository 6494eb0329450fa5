/**
 * Secure random helpers for peer ids and challenge nonces.
 *
 * Peer ids are the only capability a peer holds over its session, so they must
 * never come from Math.random().
 */

import { randomBytes, randomUUID } from 'node:crypto';

export function secureRandomBytes(length: number): Uint8Array {
  return new Uint8Array(randomBytes(length));
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Random lowercase hex string of exactly `length` characters
 * (uses ceil(length / 2) bytes).
 */
export function secureRandomHex(length: number): string {
  return bytesToHex(secureRandomBytes(Math.ceil(length / 2))).slice(0, length);
}

/** RFC 4122 version 4 UUID */
export function secureRandomUUID(): string {
  return randomUUID();
}
