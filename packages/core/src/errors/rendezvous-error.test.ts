import { describe, expect, it } from 'vitest';
import { RendezvousError, isRendezvousError } from './rendezvous-error.js';
import type { RendezvousErrorCode } from './rendezvous-error.js';

describe('RendezvousError', () => {
  it('extends Error', () => {
    const error = new RendezvousError('TRANSPORT_CLOSED', 'socket closed');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(RendezvousError);
  });

  it('has correct name, code, and message', () => {
    const error = new RendezvousError('PEER_NOT_FOUND', 'no such peer');
    expect(error.name).toBe('RendezvousError');
    expect(error.code).toBe('PEER_NOT_FOUND');
    expect(error.message).toBe('no such peer');
  });

  it('supports optional context', () => {
    const error = new RendezvousError('INVALID_CONFIG', 'bad port', { key: 'SIGNALING_PORT' });
    expect(error.context).toEqual({ key: 'SIGNALING_PORT' });
  });

  it('context is undefined when not provided', () => {
    const error = new RendezvousError('AUTH_FAILED', 'wrong response');
    expect(error.context).toBeUndefined();
  });

  it('supports all error codes', () => {
    const codes: RendezvousErrorCode[] = [
      'TRANSPORT_CLOSED',
      'INVALID_MESSAGE',
      'PEER_NOT_FOUND',
      'AUTH_FAILED',
      'SIGNALING_TIMEOUT',
      'NOT_CONNECTED',
      'INVALID_CONFIG',
    ];
    for (const code of codes) {
      const error = new RendezvousError(code, 'test');
      expect(error.code).toBe(code);
    }
  });

  it('narrows unknown values', () => {
    expect(isRendezvousError(new RendezvousError('NOT_CONNECTED', 'x'))).toBe(true);
    expect(isRendezvousError(new Error('x'))).toBe(false);
    expect(isRendezvousError('x')).toBe(false);
  });
});
