export type {
  PeerId,
  InboundMessageType,
  InboundMessage,
  RelayMessage,
  HelperAvailableMessage,
  RequestHelpMessage,
  OfferMessage,
  AnswerMessage,
  IceCandidateMessage,
  PingMessage,
  AuthRequestMessage,
  AuthResponseMessage,
  OutboundMessage,
  OutboundMessageType,
  WelcomeMessage,
  AuthChallengeMessage,
  AuthResultMessage,
  AuthRequiredMessage,
  HelperRegisteredMessage,
  HelperFoundMessage,
  HelperRequestMessage,
  NoHelperAvailableMessage,
  RelayedOfferMessage,
  RelayedAnswerMessage,
  RelayedIceCandidateMessage,
  PongMessage,
} from './messages.js';
export {
  INBOUND_MESSAGE_TYPES,
  UNAUTHENTICATED_MESSAGE_TYPES,
  OPAQUE_PAYLOAD_FIELDS,
  isInboundMessageType,
  toUnixSeconds,
} from './messages.js';
