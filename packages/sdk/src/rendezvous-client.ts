import {
  type ChallengeResponder,
  type InboundMessage,
  type Logger,
  type PeerId,
  RendezvousError,
  isAnnounceableCountry,
  publicChallengeScheme,
  silentLogger,
} from 'rendezvous-core';
import WebSocket from 'ws';

export interface RendezvousClientOptions {
  url: string;
  /** Answers auth challenges (default: the public transform) */
  responder?: ChallengeResponder;
  /** How long to wait for a reply (default: 10000 ms) */
  requestTimeoutMs?: number;
  logger?: Logger;
}

export type HelpResult =
  | { found: true; helperId: PeerId; helperCountry: string }
  | { found: false; message: string };

export interface HelperRequest {
  from: PeerId;
  clientCountry: string;
}

export type HelperRequestHandler = (request: HelperRequest) => void;
export type NegotiationHandler = (from: PeerId, payload: unknown) => void;
export type AuthRequiredHandler = (message: string) => void;
export type CloseHandler = (code: number, reason: string) => void;

type ServerMessage = Record<string, unknown>;

interface Waiter {
  types: readonly string[];
  resolve: (message: ServerMessage) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

function isServerMessage(value: unknown): value is ServerMessage {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'type' in value;
}

function decodeFrame(raw: string): ServerMessage | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isServerMessage(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function readString(message: ServerMessage, field: string): string {
  const value = message[field];
  if (typeof value !== 'string') {
    throw new RendezvousError('INVALID_MESSAGE', `${String(message.type)} is missing ${field}`, { field });
  }
  return value;
}

function readNumber(message: ServerMessage, field: string): number {
  const value = message[field];
  if (typeof value !== 'number') {
    throw new RendezvousError('INVALID_MESSAGE', `${String(message.type)} is missing ${field}`, { field });
  }
  return value;
}

/**
 * Node client for the rendezvous signaling service.
 *
 * Replies carry no correlation id; the server answers each peer in order, so a
 * request waits for the next message of the reply types it expects.
 */
export class RendezvousClient {
  private ws: WebSocket | null = null;
  private connecting: Promise<PeerId> | null = null;
  private peerId: PeerId | null = null;
  private authenticated = false;
  private url: string;
  private responder: ChallengeResponder;
  private requestTimeoutMs: number;
  private logger: Logger;
  private waiters: Waiter[] = [];

  private helperRequestHandlers: HelperRequestHandler[] = [];
  private offerHandlers: NegotiationHandler[] = [];
  private answerHandlers: NegotiationHandler[] = [];
  private iceCandidateHandlers: NegotiationHandler[] = [];
  private authRequiredHandlers: AuthRequiredHandler[] = [];
  private closeHandlers: CloseHandler[] = [];

  constructor(options: RendezvousClientOptions) {
    this.url = options.url;
    this.responder = options.responder ?? publicChallengeScheme;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  get id(): PeerId | null {
    return this.peerId;
  }

  get isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === this.ws.OPEN && this.peerId !== null;
  }

  get isAuthenticated(): boolean {
    return this.authenticated;
  }

  /**
   * Open the socket and resolve with the id assigned in `welcome`.
   * Repeated calls share the connection attempt in flight.
   */
  connect(): Promise<PeerId> {
    if (!this.connecting) {
      this.connecting = this.open();
    }
    return this.connecting;
  }

  private async open(): Promise<PeerId> {
    const ws = new WebSocket(this.url);
    this.ws = ws;
    const welcome = this.expect(['welcome']);

    ws.on('message', (data) => this.handleFrame(data.toString()));
    ws.on('error', (error) => this.logger.warn(`Socket error: ${error.message}`));
    ws.on('close', (code, reason) => this.handleClose(ws, code, reason.toString()));

    let peerId: PeerId;
    try {
      peerId = readString(await welcome, 'peer_id');
    } catch (error) {
      ws.terminate();
      throw error;
    }
    this.peerId = peerId;
    this.logger.info(`Connected as ${peerId}`);
    return peerId;
  }

  /** Run the challenge handshake; resolves with the server's verdict */
  async authenticate(): Promise<boolean> {
    const challengeReply = this.request({ type: 'auth_request' }, ['auth_challenge']);
    const challenge = readString(await challengeReply, 'challenge');

    const result = await this.request(
      { type: 'auth_response', challenge, response: this.responder.respond(challenge) },
      ['auth_result'],
    );
    this.authenticated = result.success === true;
    return this.authenticated;
  }

  /**
   * Offer relay capacity; resolves with the number of registered helpers.
   * The server drops announcements whose country is not alphabetic without a
   * reply, so those are refused here with `INVALID_MESSAGE`.
   */
  async announceHelper(country: string, bandwidth: number): Promise<number> {
    if (!isAnnounceableCountry(country)) {
      throw new RendezvousError('INVALID_MESSAGE', `country must be letters only, got "${country}"`, { country });
    }
    const reply = await this.request({ type: 'helper_available', country, bandwidth }, [
      'helper_registered',
      'auth_required',
    ]);
    this.throwIfAuthRequired(reply);
    return readNumber(reply, 'helper_count');
  }

  async requestHelp(country: string): Promise<HelpResult> {
    const reply = await this.request({ type: 'request_help', country }, [
      'helper_found',
      'no_helper_available',
      'auth_required',
    ]);
    this.throwIfAuthRequired(reply);

    if (reply.type === 'no_helper_available') {
      return { found: false, message: readString(reply, 'message') };
    }
    return {
      found: true,
      helperId: readString(reply, 'helper_id'),
      helperCountry: readString(reply, 'helper_country'),
    };
  }

  /** Resolves with the server clock (Unix seconds) */
  async ping(): Promise<number> {
    const reply = await this.request({ type: 'ping' }, ['pong']);
    return readNumber(reply, 'timestamp');
  }

  sendOffer(to: PeerId, offer: unknown): void {
    this.send({ type: 'offer', to, offer });
  }

  sendAnswer(to: PeerId, answer: unknown): void {
    this.send({ type: 'answer', to, answer });
  }

  sendIceCandidate(to: PeerId, candidate: unknown): void {
    this.send({ type: 'ice_candidate', to, candidate });
  }

  onHelperRequest(handler: HelperRequestHandler): void {
    this.helperRequestHandlers.push(handler);
  }

  onOffer(handler: NegotiationHandler): void {
    this.offerHandlers.push(handler);
  }

  onAnswer(handler: NegotiationHandler): void {
    this.answerHandlers.push(handler);
  }

  onIceCandidate(handler: NegotiationHandler): void {
    this.iceCandidateHandlers.push(handler);
  }

  onAuthRequired(handler: AuthRequiredHandler): void {
    this.authRequiredHandlers.push(handler);
  }

  onClose(handler: CloseHandler): void {
    this.closeHandlers.push(handler);
  }

  /** Close the socket; resolves once it has closed */
  close(): Promise<void> {
    const ws = this.ws;
    if (!ws) return Promise.resolve();
    return new Promise((resolve) => {
      ws.once('close', () => resolve());
      ws.close();
    });
  }

  private send(message: InboundMessage): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== ws.OPEN) {
      throw new RendezvousError('NOT_CONNECTED', `cannot send ${message.type} before connect()`);
    }
    ws.send(JSON.stringify(message));
  }

  private request(message: InboundMessage, replyTypes: readonly string[]): Promise<ServerMessage> {
    try {
      this.send(message);
    } catch (error) {
      return Promise.reject(error);
    }
    return this.expect(replyTypes);
  }

  private expect(types: readonly string[]): Promise<ServerMessage> {
    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        types,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((entry) => entry !== waiter);
          reject(
            new RendezvousError('SIGNALING_TIMEOUT', `no ${types.join(' or ')} within ${this.requestTimeoutMs}ms`, {
              types,
            }),
          );
        }, this.requestTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private throwIfAuthRequired(reply: ServerMessage): void {
    if (reply.type === 'auth_required') {
      throw new RendezvousError('AUTH_FAILED', readString(reply, 'message'));
    }
  }

  private handleFrame(raw: string): void {
    const message = decodeFrame(raw);
    if (!message) {
      this.logger.warn('Ignoring undecodable frame from server');
      return;
    }

    try {
      this.dispatch(message);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Ignoring ${String(message.type)}: ${reason}`);
    }

    const type = String(message.type);
    const index = this.waiters.findIndex((waiter) => waiter.types.includes(type));
    const [waiter] = index >= 0 ? this.waiters.splice(index, 1) : [];
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(message);
    }
  }

  /** Fan unsolicited messages out to the registered handlers */
  private dispatch(message: ServerMessage): void {
    switch (message.type) {
      case 'helper_request': {
        const request = { from: readString(message, 'from'), clientCountry: readString(message, 'client_country') };
        for (const handler of this.helperRequestHandlers) handler(request);
        break;
      }
      case 'offer': {
        const from = readString(message, 'from');
        for (const handler of this.offerHandlers) handler(from, message.offer);
        break;
      }
      case 'answer': {
        const from = readString(message, 'from');
        for (const handler of this.answerHandlers) handler(from, message.answer);
        break;
      }
      case 'ice_candidate': {
        const from = readString(message, 'from');
        for (const handler of this.iceCandidateHandlers) handler(from, message.candidate);
        break;
      }
      case 'auth_required': {
        const text = readString(message, 'message');
        for (const handler of this.authRequiredHandlers) handler(text);
        break;
      }
    }
  }

  private handleClose(ws: WebSocket, code: number, reason: string): void {
    if (this.ws !== ws) return;
    this.ws = null;
    this.connecting = null;
    this.peerId = null;
    this.authenticated = false;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(new RendezvousError('TRANSPORT_CLOSED', `connection closed (${code})`, { code, reason }));
    }

    this.logger.info(`Disconnected (${code})`);
    for (const handler of this.closeHandlers) handler(code, reason);
  }
}
