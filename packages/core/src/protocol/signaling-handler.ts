import { type Logger, silentLogger } from '../logging/logger.js';
import { Matchmaker } from '../matchmaking/matchmaker.js';
import { CLOSE_CODES, type PeerConnection } from '../registry/peer-connection.js';
import { type Peer, PeerRegistry } from '../registry/peer-registry.js';
import {
  CONNECTION_RATE_LIMIT,
  MESSAGE_RATE_LIMIT,
  RateLimiter,
  type RateLimiterOptions,
} from '../security/rate-limiter.js';
import { type ChallengeVerifier, publicChallengeScheme } from '../trust/challenge.js';
import { TrustLedger } from '../trust/trust-ledger.js';
import {
  type AuthResponseMessage,
  type HelperAvailableMessage,
  type InboundMessage,
  type OutboundMessage,
  type PeerId,
  type RelayMessage,
  type RequestHelpMessage,
  UNAUTHENTICATED_MESSAGE_TYPES,
  toUnixSeconds,
} from '../types/messages.js';
import { isAnnounceableCountry, isPeerId, validateMessage } from '../validation/input-validator.js';
import { KeyedSerializer } from './keyed-serializer.js';

/** Largest frame a peer may send, announced in `welcome` */
export const DEFAULT_MAX_MESSAGE_SIZE = 8192;

export const AUTH_REQUIRED_TEXT = 'Authentication required for this operation';
export const NO_HELPERS_TEXT = 'No helpers currently available';
export const NO_TRUSTED_HELPERS_TEXT = 'No trusted helpers currently available';

export type SessionState = 'connecting' | 'unauthenticated' | 'authenticated' | 'closed';

export interface SignalingStats {
  totalPeers: number;
  helpers: number;
  clients: number;
  uptimeMs: number;
  /** Connections admitted since start */
  totalConnections: number;
  activeConnections: number;
  /** Connections refused by the admission limiter */
  rejectedConnections: number;
  /** Frames rejected by the validator */
  securityViolations: number;
}

export interface SignalingProtocolHandlerOptions {
  /** Scheme used to issue and check auth challenges (default: public transform) */
  verifier?: ChallengeVerifier;
  /** Admission limit per remote address */
  connectionLimit?: RateLimiterOptions;
  /** Throughput limit per peer */
  messageLimit?: RateLimiterOptions;
  maxMessageSize?: number;
  logger?: Logger;
  /** Override peer id generation (tests) */
  generateId?: () => PeerId;
}

interface Session {
  state: SessionState;
  /** Last challenge issued and not yet answered */
  pendingChallenge?: string;
  /** Set once the throughput limit trips; later frames are ignored */
  silenced: boolean;
}

/**
 * Per-connection state machine of the rendezvous service.
 *
 * Frames of one peer are processed strictly in receipt order through a
 * per-peer serial queue; frames of different peers interleave freely. Nothing
 * a peer sends can make {@link handleFrame} reject: decoding, validation and
 * policy failures turn into reputation penalties or dropped messages.
 */
export class SignalingProtocolHandler {
  readonly registry: PeerRegistry;
  readonly ledger: TrustLedger;
  readonly matchmaker: Matchmaker;
  readonly maxMessageSize: number;

  private verifier: ChallengeVerifier;
  private connectionLimiter: RateLimiter;
  private messageLimiter: RateLimiter;
  private logger: Logger;
  private sessions = new Map<PeerId, Session>();
  private queue = new KeyedSerializer();
  private startedAt = Date.now();
  private shuttingDown = false;
  private counters = {
    totalConnections: 0,
    rejectedConnections: 0,
    securityViolations: 0,
  };

  constructor(options: SignalingProtocolHandlerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.verifier = options.verifier ?? publicChallengeScheme;
    this.connectionLimiter = new RateLimiter(options.connectionLimit ?? CONNECTION_RATE_LIMIT);
    this.messageLimiter = new RateLimiter(options.messageLimit ?? MESSAGE_RATE_LIMIT);
    this.maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE;
    this.registry = new PeerRegistry({
      events: { onPeerRemoved: (peer) => this.forget(peer.id) },
      logger: this.logger,
      generateId: options.generateId,
    });
    this.ledger = new TrustLedger(this.registry);
    this.matchmaker = new Matchmaker(this.registry);
  }

  /**
   * Admit a new connection. Over the per-address limit the connection is
   * closed with 1008 and nothing is registered.
   *
   * The peer is registered synchronously so frames can be routed right away;
   * `welcome` is the first entry of its serial queue, so it reaches the peer
   * before any reply.
   */
  accept(connection: PeerConnection, remoteAddress: string): Peer | undefined {
    if (this.shuttingDown) {
      connection.close(CLOSE_CODES.GOING_AWAY, 'Server shutting down');
      return undefined;
    }

    if (!this.connectionLimiter.isAllowed(remoteAddress)) {
      this.logger.warn(`Connection rate limit exceeded for ${remoteAddress}`);
      this.counters.rejectedConnections += 1;
      connection.close(CLOSE_CODES.POLICY_VIOLATION, 'Rate limit exceeded');
      return undefined;
    }

    const peer = this.registry.register(connection, remoteAddress);
    this.sessions.set(peer.id, { state: 'connecting', silenced: false });
    this.counters.totalConnections += 1;
    this.logger.info(`New peer connected: ${peer.id} from ${remoteAddress}`);

    this.queue
      .run(peer.id, () => this.sendWelcome(peer.id))
      .catch((error: unknown) => this.logger.error(`Failed to welcome ${peer.id}: ${errorMessage(error)}`));
    return peer;
  }

  /** Process one inbound frame; resolves once it and every earlier frame of the peer are done */
  handleFrame(peerId: PeerId, raw: string): Promise<void> {
    return this.queue.run(peerId, () => this.processFrame(peerId, raw));
  }

  /** Resolves once the peer's queue, welcome included, has drained */
  flush(peerId: PeerId): Promise<void> {
    return this.queue.whenIdle(peerId);
  }

  /** Frames accepted for `peerId` that have not finished processing */
  pendingFrames(peerId: PeerId): number {
    return this.queue.depth(peerId);
  }

  /** Tear a peer down after its transport closed. Idempotent. */
  disconnect(peerId: PeerId): void {
    if (this.registry.remove(peerId)) {
      this.logger.info(`Peer ${peerId} disconnected`);
    } else {
      this.forget(peerId);
    }
  }

  /** Close every connection with 1001 and refuse new ones */
  shutdown(): void {
    this.shuttingDown = true;
    for (const peer of this.registry.peerList()) {
      peer.connection.close(CLOSE_CODES.GOING_AWAY, 'Server shutting down');
      this.registry.remove(peer.id);
    }
  }

  /** Drop rate windows that have emptied */
  sweep(): void {
    this.connectionLimiter.cleanup();
    this.messageLimiter.cleanup();
  }

  getSessionState(peerId: PeerId): SessionState {
    return this.sessions.get(peerId)?.state ?? 'closed';
  }

  getStats(): SignalingStats {
    return {
      totalPeers: this.registry.size,
      helpers: this.registry.helperCount,
      clients: this.registry.clientCount,
      uptimeMs: Date.now() - this.startedAt,
      totalConnections: this.counters.totalConnections,
      activeConnections: this.registry.size,
      rejectedConnections: this.counters.rejectedConnections,
      securityViolations: this.counters.securityViolations,
    };
  }

  // ============================================
  // Frame pipeline
  // ============================================

  private async sendWelcome(peerId: PeerId): Promise<void> {
    await this.send(peerId, {
      type: 'welcome',
      peer_id: peerId,
      server_time: toUnixSeconds(Date.now()),
      max_message_size: this.maxMessageSize,
    });
    const session = this.sessions.get(peerId);
    if (session?.state === 'connecting') {
      session.state = 'unauthenticated';
    }
  }

  private async processFrame(peerId: PeerId, raw: string): Promise<void> {
    const session = this.sessions.get(peerId);
    if (!session || session.silenced) return;

    if (!this.messageLimiter.isAllowed(peerId)) {
      this.logger.warn(`Message rate limit exceeded for peer ${peerId}`);
      this.ledger.apply(peerId, 'rateLimited');
      session.silenced = true;
      return;
    }

    if (raw.length > this.maxMessageSize) {
      this.logger.warn(`Oversized frame from ${peerId}`);
      this.ledger.apply(peerId, 'malformedFrame');
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      this.logger.warn(`Invalid JSON from ${peerId}`);
      this.ledger.apply(peerId, 'malformedFrame');
      return;
    }

    const result = validateMessage(data);
    if (!result.valid) {
      const field = result.field ? ` (${result.field})` : '';
      this.logger.warn(`Invalid message from peer ${peerId}: ${result.reason}${field}`);
      this.ledger.apply(peerId, 'invalidMessage');
      this.counters.securityViolations += 1;
      return;
    }

    try {
      await this.dispatch(peerId, session, result.message);
    } catch (error) {
      this.logger.error(`Error handling message from ${peerId}: ${errorMessage(error)}`);
      this.ledger.apply(peerId, 'handlingFailed');
      return;
    }
    this.registry.recordActivity(peerId);
  }

  private async dispatch(peerId: PeerId, session: Session, message: InboundMessage): Promise<void> {
    const peer = this.registry.get(peerId);
    if (!peer) return;

    if (!peer.authenticated && !UNAUTHENTICATED_MESSAGE_TYPES.includes(message.type)) {
      this.logger.debug(`Dropped ${message.type} from unauthenticated peer ${peerId}`);
      await this.send(peerId, { type: 'auth_required', message: AUTH_REQUIRED_TEXT });
      return;
    }

    switch (message.type) {
      case 'auth_request':
        return this.handleAuthRequest(peerId, session);
      case 'auth_response':
        return this.handleAuthResponse(peerId, session, message);
      case 'helper_available':
        return this.handleHelperAvailable(peerId, message);
      case 'request_help':
        return this.handleRequestHelp(peerId, message);
      case 'offer':
      case 'answer':
      case 'ice_candidate':
        return this.relay(peerId, message);
      case 'ping':
        await this.send(peerId, { type: 'pong', timestamp: toUnixSeconds(Date.now()) });
        return;
    }
  }

  // ============================================
  // Handlers
  // ============================================

  private async handleAuthRequest(peerId: PeerId, session: Session): Promise<void> {
    const challenge = this.verifier.issue(peerId, Date.now());
    session.pendingChallenge = challenge;
    await this.send(peerId, { type: 'auth_challenge', challenge });
  }

  private async handleAuthResponse(peerId: PeerId, session: Session, message: AuthResponseMessage): Promise<void> {
    if (this.registry.get(peerId)?.authenticated) {
      await this.send(peerId, { type: 'auth_result', success: true });
      return;
    }

    // One answer per challenge: a failed attempt needs a fresh auth_request
    const expected = session.pendingChallenge;
    session.pendingChallenge = undefined;

    const success =
      expected !== undefined &&
      message.challenge === expected &&
      this.verifier.verify(message.challenge, message.response);

    if (success) {
      this.registry.setAuthenticated(peerId, true);
      this.ledger.apply(peerId, 'authenticated');
      session.state = 'authenticated';
      this.logger.info(`Peer ${peerId} authenticated (${this.verifier.name})`);
    } else {
      this.logger.warn(`Authentication failed for peer ${peerId}`);
    }
    await this.send(peerId, { type: 'auth_result', success });
  }

  private async handleHelperAvailable(peerId: PeerId, message: HelperAvailableMessage): Promise<void> {
    if (!isAnnounceableCountry(message.country)) {
      this.logger.warn(`Invalid country from peer ${peerId}`);
      return;
    }

    const peer = this.registry.setRole(peerId, 'helper', {
      locale: message.country,
      bandwidth: message.bandwidth,
    });
    if (!peer) return;
    this.logger.info(`Helper ${peerId} available from ${peer.locale}`);

    await this.send(peerId, { type: 'helper_registered', helper_count: this.registry.helperCount });
  }

  private async handleRequestHelp(peerId: PeerId, message: RequestHelpMessage): Promise<void> {
    const client = this.registry.setRole(peerId, 'client', { locale: message.country });
    if (!client) return;
    this.logger.info(`Client ${peerId} requesting help from ${client.locale}`);

    // A helper whose transport turns out to be closed is removed by the failed
    // send, so the next round picks someone else.
    for (;;) {
      const { helper, reason } = this.matchmaker.selectHelper(peerId);
      if (!helper) {
        const text = reason === 'no-trusted-helpers' ? NO_TRUSTED_HELPERS_TEXT : NO_HELPERS_TEXT;
        await this.send(peerId, { type: 'no_helper_available', message: text });
        return;
      }

      this.logger.debug(`Matched client ${peerId} with helper ${helper.id} (${reason})`);
      const notified = await this.send(helper.id, {
        type: 'helper_request',
        from: peerId,
        client_country: client.locale,
      });
      if (notified) {
        await this.send(peerId, { type: 'helper_found', helper_id: helper.id, helper_country: helper.locale });
        return;
      }
      if (this.registry.has(helper.id)) {
        this.logger.warn(`Could not notify helper ${helper.id}; dropping request from ${peerId}`);
        return;
      }
    }
  }

  /**
   * Forward negotiation data between two trusted peers. Anything else is
   * dropped without a reply so senders cannot probe which peers exist.
   */
  private async relay(peerId: PeerId, message: RelayMessage): Promise<void> {
    const target = message.to;
    if (!isPeerId(target) || !this.registry.has(target)) {
      this.logger.debug(`Dropped ${message.type} from ${peerId}: unknown target`);
      return;
    }
    if (!this.ledger.isTrusted(peerId) || !this.ledger.isTrusted(target)) {
      this.logger.warn(`Untrusted peers attempting connection: ${peerId} -> ${target}`);
      return;
    }

    switch (message.type) {
      case 'offer':
        await this.send(target, { type: 'offer', from: peerId, offer: message.offer });
        return;
      case 'answer':
        await this.send(target, { type: 'answer', from: peerId, answer: message.answer });
        return;
      case 'ice_candidate':
        await this.send(target, { type: 'ice_candidate', from: peerId, candidate: message.candidate });
        return;
    }
  }

  private async send(peerId: PeerId, message: OutboundMessage): Promise<boolean> {
    const delivered = await this.registry.send(peerId, message);
    if (!delivered) {
      this.logger.debug(`Undelivered ${message.type} to ${peerId}`);
    }
    return delivered;
  }

  private forget(peerId: PeerId): void {
    this.sessions.delete(peerId);
    this.messageLimiter.reset(peerId);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
