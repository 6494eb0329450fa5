import {
  bytesToHex,
  createSignedChallengeResponder,
  generateAuthKeypair,
  publicChallengeScheme,
  silentLogger,
} from 'rendezvous-core';
import { afterEach, describe, expect, it, vi } from 'vitest';
import WebSocket from 'ws';
import { type SignalingServer, type SignalingServerOptions, createSignalingServer } from './server.js';

type Message = Record<string, unknown>;

/** WebSocket client that buffers every message so none is missed between awaits */
class TestPeer {
  readonly ws: WebSocket;
  readonly closed: Promise<{ code: number; reason: string }>;
  readonly errors: Error[] = [];
  private inbox: Message[] = [];
  private waiters: Array<{ type: string; resolve: (message: Message) => void }> = [];

  private constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on('message', (data) => {
      const message: Message = JSON.parse(data.toString());
      const index = this.waiters.findIndex((waiter) => waiter.type === message.type);
      const [waiter] = index >= 0 ? this.waiters.splice(index, 1) : [];
      if (waiter) {
        waiter.resolve(message);
      } else {
        this.inbox.push(message);
      }
    });
    this.ws.on('error', (error) => this.errors.push(error));
    this.closed = new Promise((resolve) => {
      this.ws.once('close', (code, reason) => resolve({ code, reason: reason.toString() }));
    });
  }

  static connect(port: number): Promise<TestPeer> {
    const peer = new TestPeer(`ws://127.0.0.1:${port}`);
    return new Promise((resolve, reject) => {
      peer.ws.once('open', () => resolve(peer));
      peer.ws.once('error', reject);
    });
  }

  next(type: string): Promise<Message> {
    const index = this.inbox.findIndex((message) => message.type === type);
    const [buffered] = index >= 0 ? this.inbox.splice(index, 1) : [];
    if (buffered) return Promise.resolve(buffered);
    return new Promise((resolve) => this.waiters.push({ type, resolve }));
  }

  send(message: Message): void {
    this.ws.send(JSON.stringify(message));
  }

  async welcome(): Promise<string> {
    const welcome = await this.next('welcome');
    if (typeof welcome.peer_id !== 'string') throw new Error('welcome without peer_id');
    return welcome.peer_id;
  }

  async authenticate(respond: (challenge: string) => string = publicChallengeScheme.respond): Promise<Message> {
    this.send({ type: 'auth_request' });
    const { challenge } = await this.next('auth_challenge');
    if (typeof challenge !== 'string') throw new Error('challenge missing');
    this.send({ type: 'auth_response', challenge, response: respond(challenge) });
    return this.next('auth_result');
  }
}

describe('signaling server', () => {
  let server: SignalingServer | undefined;
  const peers: TestPeer[] = [];

  async function start(options: SignalingServerOptions = {}): Promise<number> {
    server = createSignalingServer({ host: '127.0.0.1', port: 0, logger: silentLogger, ...options });
    return server.listening;
  }

  async function join(port: number): Promise<{ peer: TestPeer; id: string }> {
    const peer = await TestPeer.connect(port);
    peers.push(peer);
    return { peer, id: await peer.welcome() };
  }

  afterEach(async () => {
    for (const peer of peers) {
      peer.ws.terminate();
    }
    peers.length = 0;
    await server?.close();
    server = undefined;
  });

  it('welcomes a new peer with its id and limits', async () => {
    const port = await start();
    const peer = await TestPeer.connect(port);
    peers.push(peer);

    const welcome = await peer.next('welcome');
    expect(welcome.peer_id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(welcome.max_message_size).toBe(8192);
    expect(typeof welcome.server_time).toBe('number');
    expect(server?.handler.getStats()).toMatchObject({ totalConnections: 1, activeConnections: 1 });
  });

  it('matches a client with a helper across sockets', async () => {
    const port = await start();
    const helper = await join(port);
    expect(await helper.peer.authenticate()).toEqual({ type: 'auth_result', success: true });
    helper.peer.send({ type: 'helper_available', country: 'US', bandwidth: 500 });
    expect(await helper.peer.next('helper_registered')).toEqual({ type: 'helper_registered', helper_count: 1 });

    const client = await join(port);
    await client.peer.authenticate();
    client.peer.send({ type: 'request_help', country: 'DE' });

    expect(await client.peer.next('helper_found')).toEqual({
      type: 'helper_found',
      helper_id: helper.id,
      helper_country: 'US',
    });
    expect(await helper.peer.next('helper_request')).toEqual({
      type: 'helper_request',
      from: client.id,
      client_country: 'DE',
    });
  });

  it('relays negotiation data between trusted peers', async () => {
    const port = await start();
    const a = await join(port);
    const b = await join(port);
    await a.peer.authenticate();
    await b.peer.authenticate();

    const offer = { type: 'offer', sdp: 'v=0\r\ns=-\r\n' };
    a.peer.send({ type: 'offer', to: b.id, offer });
    expect(await b.peer.next('offer')).toEqual({ type: 'offer', from: a.id, offer });

    b.peer.send({ type: 'answer', to: a.id, answer: { type: 'answer', sdp: 'v=0' } });
    expect(await a.peer.next('answer')).toEqual({ type: 'answer', from: b.id, answer: { type: 'answer', sdp: 'v=0' } });

    a.peer.send({ type: 'ice_candidate', to: b.id, candidate: { candidate: 'candidate:0 1 udp 1 192.0.2.1 9 typ host' } });
    expect(await b.peer.next('ice_candidate')).toEqual({
      type: 'ice_candidate',
      from: a.id,
      candidate: { candidate: 'candidate:0 1 udp 1 192.0.2.1 9 typ host' },
    });
  });

  it('authenticates against configured public keys', async () => {
    const keypair = generateAuthKeypair();
    const port = await start({ authKeys: [bytesToHex(keypair.publicKey)] });
    const member = await join(port);
    const guest = await join(port);

    const responder = createSignedChallengeResponder(keypair);
    expect(await member.peer.authenticate((challenge) => responder.respond(challenge))).toEqual({
      type: 'auth_result',
      success: true,
    });
    expect(await guest.peer.authenticate()).toEqual({ type: 'auth_result', success: false });
  });

  it('closes connections over the admission limit with 1008', async () => {
    const port = await start({ connectionRateLimit: 2 });
    await join(port);
    await join(port);

    const rejected = await TestPeer.connect(port);
    peers.push(rejected);
    expect(await rejected.closed).toEqual({ code: 1008, reason: 'Rate limit exceeded' });
    expect(server?.handler.getStats()).toMatchObject({ activeConnections: 2, rejectedConnections: 1 });
  });

  it('closes oversized frames with 1009 and removes the peer', async () => {
    const port = await start({ maxMessageSize: 256 });
    const { peer } = await join(port);

    peer.send({ type: 'ping', padding: 'x'.repeat(1000) });

    expect((await peer.closed).code).toBe(1009);
    await vi.waitFor(() => expect(server?.handler.registry.size).toBe(0));
  });

  it('removes a peer when its socket closes', async () => {
    const port = await start();
    const { peer, id } = await join(port);

    peer.ws.close();

    await vi.waitFor(() => expect(server?.handler.registry.has(id)).toBe(false));
    expect(server?.handler.getSessionState(id)).toBe('closed');
  });

  it('answers every frame when backpressure pauses the socket', async () => {
    const port = await start({ maxQueuedFrames: 1 });
    const { peer } = await join(port);

    for (let i = 0; i < 10; i++) {
      peer.send({ type: 'ping' });
    }
    for (let i = 0; i < 10; i++) {
      expect((await peer.next('pong')).type).toBe('pong');
    }
  });

  it('terminates sockets that stop answering keep-alive pings', async () => {
    const port = await start({ pingIntervalMs: 40, pingTimeoutMs: 40 });
    const silent = await join(port);
    const live = await join(port);

    // A paused client stops reading, so server pings go unanswered
    silent.peer.ws.pause();

    await vi.waitFor(() => expect(server?.handler.registry.has(silent.id)).toBe(false), { timeout: 2000 });
    expect(server?.handler.registry.has(live.id)).toBe(true);
  });

  it('closes every peer with 1001 on shutdown', async () => {
    const port = await start();
    const { peer } = await join(port);

    await server?.close();
    server = undefined;

    expect((await peer.closed).code).toBe(1001);
  });
});
