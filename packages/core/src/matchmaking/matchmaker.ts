import type { Peer, PeerRegistry } from '../registry/peer-registry.js';
import { isTrusted } from '../trust/trust-ledger.js';
import type { PeerId } from '../types/messages.js';

export interface MatchResult {
  helper: Peer | undefined;
  reason: 'foreign-locale' | 'same-locale-fallback' | 'no-helpers' | 'no-trusted-helpers' | 'unknown-client';
}

/**
 * Ranking: reputation desc, then bandwidth desc, then connection age
 * (older connections first).
 */
export function compareHelpers(a: Peer, b: Peer): number {
  if (a.reputation !== b.reputation) return b.reputation - a.reputation;
  if (a.bandwidth !== b.bandwidth) return b.bandwidth - a.bandwidth;
  return a.connectedAt - b.connectedAt;
}

/**
 * Picks a helper for a client.
 *
 * Selection is advisory: nothing is reserved, so concurrent clients may be
 * handed the same helper. Collisions are left to the peer-to-peer negotiation.
 */
export class Matchmaker {
  private registry: PeerRegistry;

  constructor(registry: PeerRegistry) {
    this.registry = registry;
  }

  /**
   * Select the best helper for a client.
   * Selection criteria (in order of priority):
   * 1. Must be in the helper set and trusted
   * 2. Prefer a locale different from the client's (same-locale helpers share
   *    the client's network exposure); fall back to any trusted helper
   * 3. Rank with {@link compareHelpers}
   */
  selectHelper(clientId: PeerId): MatchResult {
    const client = this.registry.get(clientId);
    if (!client) {
      return { helper: undefined, reason: 'unknown-client' };
    }

    const helpers: Peer[] = [];
    for (const helperId of this.registry.helperIds()) {
      if (helperId === clientId) continue;
      const helper = this.registry.get(helperId);
      if (helper) helpers.push(helper);
    }
    if (helpers.length === 0) {
      return { helper: undefined, reason: 'no-helpers' };
    }

    const trusted = helpers.filter((helper) => isTrusted(helper));
    if (trusted.length === 0) {
      return { helper: undefined, reason: 'no-trusted-helpers' };
    }

    const foreign = trusted.filter((helper) => helper.locale !== client.locale);
    if (foreign.length > 0) {
      return { helper: foreign.sort(compareHelpers)[0], reason: 'foreign-locale' };
    }
    return { helper: trusted.sort(compareHelpers)[0], reason: 'same-locale-fallback' };
  }

  findBestHelper(clientId: PeerId): Peer | undefined {
    return this.selectHelper(clientId).helper;
  }
}
