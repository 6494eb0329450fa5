import nacl from 'tweetnacl';
import { bytesToHex, secureRandomHex } from '../crypto/secure-random.js';
import type { PeerId } from '../types/messages.js';

/** Server side of the auth handshake: issues challenges, checks responses */
export interface ChallengeVerifier {
  readonly name: string;
  issue(peerId: PeerId, now: number): string;
  verify(challenge: string, response: string): boolean;
}

/** Client side of the auth handshake */
export interface ChallengeResponder {
  respond(challenge: string): string;
}

export interface AuthKeypair {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
}

function baseChallenge(peerId: PeerId, now: number): string {
  return `challenge-${Math.floor(now / 1000)}-${peerId.slice(0, 8)}`;
}

/**
 * Publicly computable transform. Anyone who reads the protocol can answer, so
 * it only filters out clients that do not speak it; it proves no identity.
 */
export const publicChallengeScheme: ChallengeVerifier & ChallengeResponder = {
  name: 'public',
  issue: baseChallenge,
  respond(challenge) {
    return `rendezvous-${challenge}-verified`;
  },
  verify(challenge, response) {
    return response === `rendezvous-${challenge}-verified`;
  },
};

const encoder = new TextEncoder();

export function hexToBytes(hex: string): Uint8Array | null {
  if (hex.length % 2 !== 0 || !/^[0-9a-f]*$/i.test(hex)) return null;
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function generateAuthKeypair(): AuthKeypair {
  const pair = nacl.sign.keyPair();
  return { publicKey: pair.publicKey, secretKey: pair.secretKey };
}

/**
 * Signed-challenge verifier. Responses are `<publicKeyHex>.<signatureHex>`: an
 * Ed25519 detached signature over the challenge, by a key on the allow list.
 * Challenges carry a random nonce so a signature cannot be replayed.
 */
export function createSignedChallengeVerifier(allowedPublicKeys: Iterable<string>): ChallengeVerifier {
  const allowed = new Set<string>();
  for (const key of allowedPublicKeys) {
    const bytes = hexToBytes(key);
    if (!bytes || bytes.length !== nacl.sign.publicKeyLength) {
      throw new RangeError(`invalid Ed25519 public key: ${key}`);
    }
    allowed.add(key.toLowerCase());
  }
  if (allowed.size === 0) {
    throw new RangeError('signed challenge verifier needs at least one public key');
  }

  return {
    name: 'signed',
    issue(peerId, now) {
      return `${baseChallenge(peerId, now)}-${secureRandomHex(16)}`;
    },
    verify(challenge, response) {
      const [keyHex, signatureHex, ...rest] = response.split('.');
      if (!keyHex || !signatureHex || rest.length > 0) return false;
      if (!allowed.has(keyHex.toLowerCase())) return false;

      const publicKey = hexToBytes(keyHex);
      const signature = hexToBytes(signatureHex);
      if (!publicKey || !signature || signature.length !== nacl.sign.signatureLength) return false;
      return nacl.sign.detached.verify(encoder.encode(challenge), signature, publicKey);
    },
  };
}

export function createSignedChallengeResponder(keypair: AuthKeypair): ChallengeResponder {
  const publicKeyHex = bytesToHex(keypair.publicKey);
  return {
    respond(challenge) {
      const signature = nacl.sign.detached(encoder.encode(challenge), keypair.secretKey);
      return `${publicKeyHex}.${bytesToHex(signature)}`;
    },
  };
}
