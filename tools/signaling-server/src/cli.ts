#!/usr/bin/env node
/**
 * Rendezvous signaling server CLI
 *
 * Usage:
 *   npm run signaling -- --host 127.0.0.1 --port 8765
 *
 * Everything else comes from the environment (see loadConfig).
 */

import { RendezvousError, isRendezvousError } from 'rendezvous-core';
import { type SignalingServerConfig, loadConfig } from './config.js';
import { createSignalingServer } from './server.js';

const USAGE = `
Rendezvous signaling server

Usage: npm run signaling -- [options]

Options:
  --host <address>  Listen address (default: 0.0.0.0)
  --port <port>     Listen port (default: 8765)
  -h, --help        Show this help message

Environment variables:
  SIGNALING_HOST, SIGNALING_PORT    Listen address and port
  RENDEZVOUS_AUTH_KEYS              Comma-separated hex Ed25519 public keys;
                                    enables signed challenges
  MAX_MESSAGE_SIZE                  Largest frame in bytes (default: 8192)
  MAX_QUEUED_FRAMES                 Frames queued before a socket is paused (default: 32)
  PING_INTERVAL_MS, PING_TIMEOUT_MS Keep-alive timing (default: 30000, 10000)
  CONNECTION_RATE_LIMIT             Connections per address per window (default: 10)
  MESSAGE_RATE_LIMIT                Messages per peer per window (default: 50)
  RATE_LIMIT_WINDOW_MS              Rate window (default: 60000)
  LOG_LEVEL                         debug, info, warn or error (default: info)
`;

function parseArgs(args: string[], config: SignalingServerConfig): SignalingServerConfig | null {
  const result = { ...config };
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--host' && value) {
      result.host = value;
      i++;
    } else if (args[i] === '--port' && value) {
      const port = Number(value);
      if (!Number.isInteger(port) || port < 0 || port > 65_535) {
        throw new RendezvousError('INVALID_CONFIG', '--port must be an integer between 0 and 65535', { value });
      }
      result.port = port;
      i++;
    } else if (args[i] === '--help' || args[i] === '-h') {
      return null;
    }
  }
  return result;
}

function main(): void {
  let config: SignalingServerConfig | null;
  try {
    config = parseArgs(process.argv.slice(2), loadConfig());
  } catch (error) {
    if (isRendezvousError(error)) {
      console.error(`Invalid configuration: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  if (!config) {
    console.error(USAGE);
    process.exit(0);
  }

  const server = createSignalingServer(config);
  server.listening.catch((err: unknown) => {
    console.error('Failed to start signaling server:', err);
    process.exit(1);
  });

  const stop = (): void => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('Failed to stop signaling server:', err);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
}

main();
