/** Server-generated peer identifier (UUID v4) */
export type PeerId = string;

/** Message types a peer may send */
export const INBOUND_MESSAGE_TYPES = [
  'helper_available',
  'request_help',
  'offer',
  'answer',
  'ice_candidate',
  'ping',
  'auth_request',
  'auth_response',
] as const;

export type InboundMessageType = (typeof INBOUND_MESSAGE_TYPES)[number];

/** Types an unauthenticated peer may send without getting `auth_required` */
export const UNAUTHENTICATED_MESSAGE_TYPES: readonly InboundMessageType[] = ['ping', 'auth_request', 'auth_response'];

/** Fields carrying opaque negotiation payloads, forwarded untouched */
export const OPAQUE_PAYLOAD_FIELDS = ['offer', 'answer', 'candidate'] as const;

// ============================================
// Peer -> server
// ============================================

export interface HelperAvailableMessage {
  type: 'helper_available';
  country: string;
  /** As sent; the registry clamps it and maps non-numbers to 0 */
  bandwidth: unknown;
}

export interface RequestHelpMessage {
  type: 'request_help';
  country: string;
}

export interface OfferMessage {
  type: 'offer';
  to: PeerId;
  offer: unknown;
}

export interface AnswerMessage {
  type: 'answer';
  to: PeerId;
  answer: unknown;
}

export interface IceCandidateMessage {
  type: 'ice_candidate';
  /** Not shape-checked by the validator; the relay drops bad targets silently */
  to: string;
  candidate: unknown;
}

export interface PingMessage {
  type: 'ping';
}

export interface AuthRequestMessage {
  type: 'auth_request';
}

export interface AuthResponseMessage {
  type: 'auth_response';
  challenge: string;
  response: string;
}

export type InboundMessage =
  | HelperAvailableMessage
  | RequestHelpMessage
  | OfferMessage
  | AnswerMessage
  | IceCandidateMessage
  | PingMessage
  | AuthRequestMessage
  | AuthResponseMessage;

export type RelayMessage = OfferMessage | AnswerMessage | IceCandidateMessage;

// ============================================
// Server -> peer
// ============================================

export interface WelcomeMessage {
  type: 'welcome';
  peer_id: PeerId;
  /** Unix seconds */
  server_time: number;
  max_message_size: number;
}

export interface AuthChallengeMessage {
  type: 'auth_challenge';
  challenge: string;
}

export interface AuthResultMessage {
  type: 'auth_result';
  success: boolean;
}

export interface AuthRequiredMessage {
  type: 'auth_required';
  message: string;
}

export interface HelperRegisteredMessage {
  type: 'helper_registered';
  helper_count: number;
}

export interface HelperFoundMessage {
  type: 'helper_found';
  helper_id: PeerId;
  helper_country: string;
}

export interface HelperRequestMessage {
  type: 'helper_request';
  from: PeerId;
  client_country: string;
}

export interface NoHelperAvailableMessage {
  type: 'no_helper_available';
  message: string;
}

export interface RelayedOfferMessage {
  type: 'offer';
  from: PeerId;
  offer: unknown;
}

export interface RelayedAnswerMessage {
  type: 'answer';
  from: PeerId;
  answer: unknown;
}

export interface RelayedIceCandidateMessage {
  type: 'ice_candidate';
  from: PeerId;
  candidate: unknown;
}

export interface PongMessage {
  type: 'pong';
  /** Unix seconds */
  timestamp: number;
}

export type OutboundMessage =
  | WelcomeMessage
  | AuthChallengeMessage
  | AuthResultMessage
  | AuthRequiredMessage
  | HelperRegisteredMessage
  | HelperFoundMessage
  | HelperRequestMessage
  | NoHelperAvailableMessage
  | RelayedOfferMessage
  | RelayedAnswerMessage
  | RelayedIceCandidateMessage
  | PongMessage;

export type OutboundMessageType = OutboundMessage['type'];

export function isInboundMessageType(value: unknown): value is InboundMessageType {
  const known: readonly string[] = INBOUND_MESSAGE_TYPES;
  return typeof value === 'string' && known.includes(value);
}

/** Convert epoch milliseconds to the wire's Unix seconds */
export function toUnixSeconds(epochMs: number): number {
  return epochMs / 1000;
}
