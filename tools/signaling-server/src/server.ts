import type { IncomingMessage } from 'node:http';
import {
  type ChallengeVerifier,
  type Logger,
  type PeerConnection,
  RendezvousError,
  SignalingProtocolHandler,
  createLogger,
  createSignedChallengeVerifier,
  publicChallengeScheme,
} from 'rendezvous-core';
import { WebSocketServer } from 'ws';
import type WebSocket from 'ws';
import { DEFAULT_CONFIG, type SignalingServerConfig } from './config.js';

export interface SignalingServerOptions extends Partial<SignalingServerConfig> {
  logger?: Logger;
}

export interface SignalingServer {
  wss: WebSocketServer;
  handler: SignalingProtocolHandler;
  /** Resolves with the bound port */
  listening: Promise<number>;
  close: () => Promise<void>;
}

/** `ws` socket seen through the transport interface the protocol handler expects */
class SocketConnection implements PeerConnection {
  private socket: WebSocket;

  constructor(socket: WebSocket) {
    this.socket = socket;
  }

  get isOpen(): boolean {
    return this.socket.readyState === this.socket.OPEN;
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isOpen) {
        reject(new RendezvousError('TRANSPORT_CLOSED', 'socket is not open'));
        return;
      }
      this.socket.send(data, (error) => {
        if (error) {
          reject(new RendezvousError('TRANSPORT_CLOSED', error.message));
        } else {
          resolve();
        }
      });
    });
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }
}

function frameToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function selectVerifier(authKeys: readonly string[]): ChallengeVerifier {
  return authKeys.length > 0 ? createSignedChallengeVerifier(authKeys) : publicChallengeScheme;
}

export function createSignalingServer(options: SignalingServerOptions = {}): SignalingServer {
  const config: SignalingServerConfig = { ...DEFAULT_CONFIG, ...options };
  const logger = options.logger ?? createLogger('Signaling', { level: config.logLevel });

  const verifier = selectVerifier(config.authKeys);
  const handler = new SignalingProtocolHandler({
    verifier,
    connectionLimit: { maxRequests: config.connectionRateLimit, windowMs: config.rateLimitWindowMs },
    messageLimit: { maxRequests: config.messageRateLimit, windowMs: config.rateLimitWindowMs },
    maxMessageSize: config.maxMessageSize,
    logger,
  });

  const wss = new WebSocketServer({ host: config.host, port: config.port, maxPayload: config.maxMessageSize });

  /** Sockets with an unanswered keep-alive ping map to their termination timer */
  const liveness = new Map<WebSocket, ReturnType<typeof setTimeout> | undefined>();

  const listening = new Promise<number>((resolve, reject) => {
    wss.once('listening', () => {
      const address = wss.address();
      const port = typeof address === 'string' ? config.port : address.port;
      logger.info(`Listening on ws://${config.host}:${port} (auth: ${verifier.name})`);
      resolve(port);
    });
    wss.on('error', (error) => {
      logger.error(`Server error: ${error.message}`);
      reject(error);
    });
  });

  wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
    const remoteAddress = request.socket.remoteAddress ?? 'unknown';
    const peer = handler.accept(new SocketConnection(ws), remoteAddress);
    if (!peer) return;

    const peerId = peer.id;
    let paused = false;
    liveness.set(ws, undefined);

    ws.on('message', (data: WebSocket.RawData) => {
      handler
        .handleFrame(peerId, frameToString(data))
        .catch((error: unknown) => {
          const reason = error instanceof Error ? error.message : String(error);
          logger.error(`Frame from ${peerId} failed: ${reason}`);
        })
        .finally(() => {
          if (paused && handler.pendingFrames(peerId) === 0) {
            paused = false;
            ws.resume();
          }
        });

      if (!paused && handler.pendingFrames(peerId) >= config.maxQueuedFrames) {
        logger.debug(`Pausing ${peerId}: ${config.maxQueuedFrames} frames queued`);
        paused = true;
        ws.pause();
      }
    });

    ws.on('pong', () => {
      const timer = liveness.get(ws);
      if (timer) clearTimeout(timer);
      if (liveness.has(ws)) liveness.set(ws, undefined);
    });

    ws.on('error', (error) => {
      logger.warn(`Socket error from ${peerId}: ${error.message}`);
    });

    ws.on('close', () => {
      const timer = liveness.get(ws);
      if (timer) clearTimeout(timer);
      liveness.delete(ws);
      handler.disconnect(peerId);
    });
  });

  const keepAlive = setInterval(() => {
    handler.sweep();
    for (const [socket, pending] of liveness) {
      if (pending) continue;
      const timer = setTimeout(() => {
        logger.warn('Keep-alive timeout, terminating socket');
        socket.terminate();
      }, config.pingTimeoutMs);
      liveness.set(socket, timer);
      socket.ping();
    }
  }, config.pingIntervalMs);

  return {
    wss,
    handler,
    listening,
    close: () =>
      new Promise<void>((resolve, reject) => {
        clearInterval(keepAlive);
        for (const timer of liveness.values()) {
          if (timer) clearTimeout(timer);
        }
        liveness.clear();
        handler.shutdown();
        wss.close((error) => {
          if (error) {
            reject(error);
          } else {
            logger.info('Signaling server stopped');
            resolve();
          }
        });
      }),
  };
}
