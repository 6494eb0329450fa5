/**
 * Transport handle for one peer: a persistent, message-framed, bidirectional
 * connection. The signaling server wraps a `ws` socket in this shape; tests use
 * an in-memory fake.
 */
export interface PeerConnection {
  /** False once the transport has closed or is closing */
  readonly isOpen: boolean;
  /**
   * Write one text frame. Rejects with a `TRANSPORT_CLOSED` error when the
   * transport is no longer open.
   */
  send(data: string): Promise<void>;
  close(code?: number, reason?: string): void;
}

/** WebSocket close codes used by the service */
export const CLOSE_CODES = {
  /** Server shutting down */
  GOING_AWAY: 1001,
  /** Admission rate limit exceeded */
  POLICY_VIOLATION: 1008,
  /** Frame larger than the transport limit */
  MESSAGE_TOO_BIG: 1009,
} as const;
