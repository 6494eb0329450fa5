import { RendezvousError } from 'rendezvous-core';
import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './config.js';

const KEY_A = 'a'.repeat(64);
const KEY_B = '0123456789abcdef'.repeat(4);

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should read every variable', () => {
    const config = loadConfig({
      SIGNALING_HOST: '127.0.0.1',
      SIGNALING_PORT: '9000',
      RENDEZVOUS_AUTH_KEYS: ` ${KEY_A}, ${KEY_B},`,
      MAX_MESSAGE_SIZE: '4096',
      MAX_QUEUED_FRAMES: '8',
      PING_INTERVAL_MS: '1000',
      PING_TIMEOUT_MS: '500',
      CONNECTION_RATE_LIMIT: '3',
      MESSAGE_RATE_LIMIT: '20',
      RATE_LIMIT_WINDOW_MS: '10000',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config).toEqual({
      host: '127.0.0.1',
      port: 9000,
      authKeys: [KEY_A, KEY_B],
      maxMessageSize: 4096,
      maxQueuedFrames: 8,
      pingIntervalMs: 1000,
      pingTimeoutMs: 500,
      connectionRateLimit: 3,
      messageRateLimit: 20,
      rateLimitWindowMs: 10_000,
      logLevel: 'debug',
    });
  });

  it('should treat empty values as unset', () => {
    expect(loadConfig({ SIGNALING_PORT: '', SIGNALING_HOST: ' ', LOG_LEVEL: '' })).toEqual(DEFAULT_CONFIG);
  });

  it.each([
    ['SIGNALING_PORT', '70000'],
    ['SIGNALING_PORT', '-1'],
    ['MAX_QUEUED_FRAMES', '0'],
    ['MESSAGE_RATE_LIMIT', '2.5'],
    ['PING_INTERVAL_MS', 'soon'],
  ])('should reject %s=%s', (name, value) => {
    expect(() => loadConfig({ [name]: value })).toThrow(RendezvousError);
  });

  it('should report the offending variable', () => {
    try {
      loadConfig({ MAX_MESSAGE_SIZE: '12' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(RendezvousError);
      if (error instanceof RendezvousError) {
        expect(error.code).toBe('INVALID_CONFIG');
        expect(error.context).toEqual({ name: 'MAX_MESSAGE_SIZE', value: '12' });
      }
    }
  });

  it('should reject malformed auth keys and log levels', () => {
    expect(() => loadConfig({ RENDEZVOUS_AUTH_KEYS: 'abcd' })).toThrow(/RENDEZVOUS_AUTH_KEYS/);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
