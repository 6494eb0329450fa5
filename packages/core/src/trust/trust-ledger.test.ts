import { beforeEach, describe, expect, it } from 'vitest';
import { PeerRegistry } from '../registry/peer-registry.js';
import { FakeConnection } from '../testing/fake-connection.js';
import { TRUST_THRESHOLD, TrustLedger, isTrusted } from './trust-ledger.js';
import type { ReputationEvent } from './trust-ledger.js';

describe('isTrusted', () => {
  it('should require authentication and the threshold', () => {
    expect(isTrusted({ authenticated: true, reputation: TRUST_THRESHOLD })).toBe(true);
    expect(isTrusted({ authenticated: true, reputation: TRUST_THRESHOLD - 1 })).toBe(false);
    expect(isTrusted({ authenticated: false, reputation: 100 })).toBe(false);
  });

  it('should imply authentication for every score', () => {
    for (let reputation = 0; reputation <= 100; reputation++) {
      for (const authenticated of [true, false]) {
        if (isTrusted({ authenticated, reputation })) {
          expect(authenticated).toBe(true);
        }
      }
    }
  });
});

describe('TrustLedger', () => {
  let registry: PeerRegistry;
  let ledger: TrustLedger;
  let peerId: string;

  beforeEach(() => {
    registry = new PeerRegistry();
    ledger = new TrustLedger(registry);
    peerId = registry.register(new FakeConnection(), '198.51.100.4').id;
  });

  it('should apply the penalty schedule', () => {
    expect(ledger.apply(peerId, 'rateLimited')).toBe(40);
    expect(ledger.apply(peerId, 'invalidMessage')).toBe(35);
    expect(ledger.apply(peerId, 'malformedFrame')).toBe(33);
    expect(ledger.apply(peerId, 'handlingFailed')).toBe(32);
    expect(ledger.apply(peerId, 'authenticated')).toBe(42);
  });

  it('should keep reputation inside [0, 100] under any sequence', () => {
    const events: ReputationEvent[] = [
      'rateLimited',
      'invalidMessage',
      'malformedFrame',
      'handlingFailed',
      'authenticated',
    ];
    for (let i = 0; i < 500; i++) {
      const score = ledger.apply(peerId, events[(i * 7) % events.length]);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(100);
    }
    expect(ledger.adjust(peerId, 1_000)).toBe(100);
    expect(ledger.adjust(peerId, -1_000)).toBe(0);
  });

  it('should report trust from the registry record', () => {
    expect(ledger.isTrusted(peerId)).toBe(false);

    registry.setAuthenticated(peerId, true);
    expect(ledger.isTrusted(peerId)).toBe(false);

    ledger.apply(peerId, 'authenticated');
    expect(ledger.isTrusted(peerId)).toBe(true);

    ledger.apply(peerId, 'malformedFrame');
    expect(ledger.reputationOf(peerId)).toBe(58);
    expect(ledger.isTrusted(peerId)).toBe(false);
  });

  it('should skip peers that are gone', () => {
    registry.remove(peerId);
    expect(ledger.adjust(peerId, 5)).toBeUndefined();
    expect(ledger.isTrusted(peerId)).toBe(false);
    expect(ledger.reputationOf(peerId)).toBeUndefined();
  });
});
