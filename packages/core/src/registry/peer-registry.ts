import { secureRandomUUID } from '../crypto/secure-random.js';
import { isRendezvousError } from '../errors/index.js';
import { type Logger, silentLogger } from '../logging/logger.js';
import { OPAQUE_PAYLOAD_FIELDS, type OutboundMessage, type PeerId } from '../types/messages.js';
import { MAX_FIELD_LENGTH, sanitizeLocale, sanitizeString } from '../validation/input-validator.js';
import type { PeerConnection } from './peer-connection.js';

/** Reputation every new peer starts with */
export const INITIAL_REPUTATION = 50;

export const MIN_REPUTATION = 0;
export const MAX_REPUTATION = 100;

/** Upper bound for advertised helper bandwidth */
export const MAX_BANDWIDTH = 10_000;

export type PeerRole = 'helper' | 'client';

export interface Peer {
  readonly id: PeerId;
  readonly connection: PeerConnection;
  readonly remoteAddress: string;
  readonly isHelper: boolean;
  readonly isClient: boolean;
  /** Two-letter locale tag, upper-cased; empty when never announced */
  readonly locale: string;
  /** Advertised bandwidth, clamped to [0, MAX_BANDWIDTH] */
  readonly bandwidth: number;
  readonly connectedAt: number;
  readonly lastActivity: number;
  readonly messageCount: number;
  readonly authenticated: boolean;
  /** Integer in [MIN_REPUTATION, MAX_REPUTATION] */
  readonly reputation: number;
}

type PeerRecord = { -readonly [K in keyof Peer]: Peer[K] };

export interface RoleAttributes {
  locale: unknown;
  /** Only meaningful for helpers */
  bandwidth?: unknown;
}

export interface PeerRegistryEvents {
  onPeerRemoved?: (peer: Peer) => void;
}

export interface PeerRegistryOptions {
  events?: PeerRegistryEvents;
  logger?: Logger;
  /** Override peer id generation (tests) */
  generateId?: () => PeerId;
}

export function clampReputation(score: number): number {
  if (Number.isNaN(score)) return MIN_REPUTATION;
  return Math.max(MIN_REPUTATION, Math.min(MAX_REPUTATION, Math.round(score)));
}

export function clampBandwidth(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(MAX_BANDWIDTH, value));
}

/**
 * Authoritative table of connected peers plus the derived `helpers` / `clients`
 * role sets.
 *
 * Every mutating method runs to completion without awaiting, so on the event
 * loop no two mutations of the same peer can interleave and the role sets
 * always agree with the role flags. Callers hold peer ids, never records, and
 * re-resolve through {@link get} after any await.
 */
export class PeerRegistry {
  private peers = new Map<PeerId, PeerRecord>();
  private helpers = new Set<PeerId>();
  private clients = new Set<PeerId>();
  private events: PeerRegistryEvents;
  private logger: Logger;
  private generateId: () => PeerId;

  constructor(options: PeerRegistryOptions = {}) {
    this.events = options.events ?? {};
    this.logger = options.logger ?? silentLogger;
    this.generateId = options.generateId ?? secureRandomUUID;
  }

  /** Allocate a fresh id and insert a peer for a newly accepted connection */
  register(connection: PeerConnection, remoteAddress: string): Peer {
    let id = this.generateId();
    while (this.peers.has(id)) {
      id = this.generateId();
    }

    const now = Date.now();
    const record: PeerRecord = {
      id,
      connection,
      remoteAddress,
      isHelper: false,
      isClient: false,
      locale: '',
      bandwidth: 0,
      connectedAt: now,
      lastActivity: now,
      messageCount: 0,
      authenticated: false,
      reputation: INITIAL_REPUTATION,
    };
    this.peers.set(id, record);
    return record;
  }

  get(peerId: PeerId): Peer | undefined {
    return this.peers.get(peerId);
  }

  has(peerId: PeerId): boolean {
    return this.peers.has(peerId);
  }

  /**
   * Switch a peer's role and move it between the role sets in one step.
   * Returns the updated peer, or undefined if it is gone.
   */
  setRole(peerId: PeerId, role: PeerRole, attrs: RoleAttributes): Peer | undefined {
    const record = this.peers.get(peerId);
    if (!record) return undefined;

    record.locale = sanitizeLocale(attrs.locale);
    if (role === 'helper') {
      record.isHelper = true;
      record.isClient = false;
      record.bandwidth = clampBandwidth(attrs.bandwidth);
      this.clients.delete(peerId);
      this.helpers.add(peerId);
    } else {
      record.isHelper = false;
      record.isClient = true;
      this.helpers.delete(peerId);
      this.clients.add(peerId);
    }
    return record;
  }

  setAuthenticated(peerId: PeerId, authenticated: boolean): Peer | undefined {
    const record = this.peers.get(peerId);
    if (!record) return undefined;
    record.authenticated = authenticated;
    return record;
  }

  /** Apply `update` to the current score and store the clamped result */
  updateReputation(peerId: PeerId, update: (current: number) => number): number | undefined {
    const record = this.peers.get(peerId);
    if (!record) return undefined;
    record.reputation = clampReputation(update(record.reputation));
    return record.reputation;
  }

  /** Bump last-activity and the message counter after a processed message */
  recordActivity(peerId: PeerId): void {
    const record = this.peers.get(peerId);
    if (!record) return;
    record.lastActivity = Date.now();
    record.messageCount += 1;
  }

  /** Delete a peer from the table and both role sets. Idempotent. */
  remove(peerId: PeerId): boolean {
    const record = this.peers.get(peerId);
    if (!record) return false;

    this.peers.delete(peerId);
    this.helpers.delete(peerId);
    this.clients.delete(peerId);
    this.logger.info(`Removed peer ${peerId}`);
    this.events.onPeerRemoved?.(record);
    return true;
  }

  /**
   * Write a sanitized copy of `message` to the peer's transport.
   * A closed transport removes the peer instead of surfacing an error.
   */
  async send(peerId: PeerId, message: OutboundMessage): Promise<boolean> {
    const record = this.peers.get(peerId);
    if (!record) return false;

    if (!record.connection.isOpen) {
      this.remove(peerId);
      return false;
    }

    const connection = record.connection;
    try {
      await connection.send(serializeOutbound(message));
      return true;
    } catch (error) {
      if (isRendezvousError(error) && error.code === 'TRANSPORT_CLOSED') {
        this.remove(peerId);
      } else {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to send ${message.type} to ${peerId}: ${reason}`);
      }
      return false;
    }
  }

  helperIds(): PeerId[] {
    return Array.from(this.helpers);
  }

  clientIds(): PeerId[] {
    return Array.from(this.clients);
  }

  peerList(): Peer[] {
    return Array.from(this.peers.values());
  }

  get size(): number {
    return this.peers.size;
  }

  get helperCount(): number {
    return this.helpers.size;
  }

  get clientCount(): number {
    return this.clients.size;
  }
}

/**
 * Serialize an outbound message, sanitizing every top-level string except the
 * opaque negotiation payloads, which are forwarded byte-for-byte.
 */
export function serializeOutbound(message: OutboundMessage): string {
  const opaque: readonly string[] = OPAQUE_PAYLOAD_FIELDS;
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(message)) {
    sanitized[key] =
      typeof value === 'string' && !opaque.includes(key) ? sanitizeString(value, MAX_FIELD_LENGTH) : value;
  }
  return JSON.stringify(sanitized);
}
