import { type LogLevel, RendezvousError, hexToBytes, isLogLevel } from 'rendezvous-core';

export interface SignalingServerConfig {
  host: string;
  /** 0 binds an ephemeral port */
  port: number;
  /** Hex Ed25519 public keys; non-empty selects signed challenges */
  authKeys: string[];
  /** Largest inbound frame in bytes; bigger frames close the socket with 1009 */
  maxMessageSize: number;
  /** Frames awaiting processing before the socket is paused */
  maxQueuedFrames: number;
  pingIntervalMs: number;
  pingTimeoutMs: number;
  /** Connections per remote address per window */
  connectionRateLimit: number;
  /** Frames per peer per window */
  messageRateLimit: number;
  rateLimitWindowMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: SignalingServerConfig = {
  host: '0.0.0.0',
  port: 8765,
  authKeys: [],
  maxMessageSize: 8192,
  maxQueuedFrames: 32,
  pingIntervalMs: 30_000,
  pingTimeoutMs: 10_000,
  connectionRateLimit: 10,
  messageRateLimit: 50,
  rateLimitWindowMs: 60_000,
  logLevel: 'info',
};

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return fallback;

  const value = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new RendezvousError('INVALID_CONFIG', `${name} must be an integer between ${min} and ${max}`, {
      name,
      value: raw,
    });
  }
  return value;
}

function readAuthKeys(env: Env): string[] {
  const raw = env.RENDEZVOUS_AUTH_KEYS ?? '';
  const keys = raw
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key !== '');

  for (const key of keys) {
    if (hexToBytes(key)?.length !== 32) {
      throw new RendezvousError('INVALID_CONFIG', 'RENDEZVOUS_AUTH_KEYS must list 32-byte hex public keys', {
        name: 'RENDEZVOUS_AUTH_KEYS',
        value: key,
      });
    }
  }
  return keys;
}

/** Build the server configuration from environment variables, falling back to defaults */
export function loadConfig(env: Env = process.env): SignalingServerConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new RendezvousError('INVALID_CONFIG', 'LOG_LEVEL must be one of debug, info, warn, error', {
      name: 'LOG_LEVEL',
      value: logLevel,
    });
  }

  return {
    host: env.SIGNALING_HOST?.trim() || DEFAULT_CONFIG.host,
    port: readInteger(env, 'SIGNALING_PORT', DEFAULT_CONFIG.port, 0, 65_535),
    authKeys: readAuthKeys(env),
    maxMessageSize: readInteger(env, 'MAX_MESSAGE_SIZE', DEFAULT_CONFIG.maxMessageSize, 64),
    maxQueuedFrames: readInteger(env, 'MAX_QUEUED_FRAMES', DEFAULT_CONFIG.maxQueuedFrames, 1),
    pingIntervalMs: readInteger(env, 'PING_INTERVAL_MS', DEFAULT_CONFIG.pingIntervalMs, 1),
    pingTimeoutMs: readInteger(env, 'PING_TIMEOUT_MS', DEFAULT_CONFIG.pingTimeoutMs, 1),
    connectionRateLimit: readInteger(env, 'CONNECTION_RATE_LIMIT', DEFAULT_CONFIG.connectionRateLimit, 1),
    messageRateLimit: readInteger(env, 'MESSAGE_RATE_LIMIT', DEFAULT_CONFIG.messageRateLimit, 1),
    rateLimitWindowMs: readInteger(env, 'RATE_LIMIT_WINDOW_MS', DEFAULT_CONFIG.rateLimitWindowMs, 1),
    logLevel,
  };
}
