import type { Peer, PeerRegistry } from '../registry/peer-registry.js';
import type { PeerId } from '../types/messages.js';

/** Reputation a peer needs, together with authentication, to be trusted */
export const TRUST_THRESHOLD = 60;

/** Reputation changes applied by the protocol handler */
export const REPUTATION_DELTAS = {
  rateLimited: -10,
  invalidMessage: -5,
  malformedFrame: -2,
  handlingFailed: -1,
  authenticated: 10,
} as const;

export type ReputationEvent = keyof typeof REPUTATION_DELTAS;

/** `authenticated AND reputation >= TRUST_THRESHOLD`; never stored */
export function isTrusted(peer: Pick<Peer, 'authenticated' | 'reputation'>): boolean {
  return peer.authenticated && peer.reputation >= TRUST_THRESHOLD;
}

/**
 * Per-peer reputation bookkeeping on top of the registry.
 *
 * Holds no state of its own: scores live on the registry's peer records and
 * every call re-resolves the peer, so a peer that disconnected in the meantime
 * is simply skipped.
 */
export class TrustLedger {
  private registry: PeerRegistry;

  constructor(registry: PeerRegistry) {
    this.registry = registry;
  }

  /** Add `delta` and clamp into [0, 100]. Undefined when the peer is gone. */
  adjust(peerId: PeerId, delta: number): number | undefined {
    return this.registry.updateReputation(peerId, (current) => current + delta);
  }

  apply(peerId: PeerId, event: ReputationEvent): number | undefined {
    return this.adjust(peerId, REPUTATION_DELTAS[event]);
  }

  isTrusted(peerId: PeerId): boolean {
    const peer = this.registry.get(peerId);
    return peer !== undefined && isTrusted(peer);
  }

  reputationOf(peerId: PeerId): number | undefined {
    return this.registry.get(peerId)?.reputation;
  }
}
