export type RendezvousErrorCode =
  | 'TRANSPORT_CLOSED'
  | 'INVALID_MESSAGE'
  | 'PEER_NOT_FOUND'
  | 'AUTH_FAILED'
  | 'SIGNALING_TIMEOUT'
  | 'NOT_CONNECTED'
  | 'INVALID_CONFIG';

export class RendezvousError extends Error {
  readonly code: RendezvousErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: RendezvousErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'RendezvousError';
    this.code = code;
    this.context = context;
  }
}

export function isRendezvousError(error: unknown): error is RendezvousError {
  return error instanceof RendezvousError;
}
