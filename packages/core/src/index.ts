export const RENDEZVOUS_PROTOCOL_VERSION = '0.1.0';

export * from './types/index.js';

export { RendezvousError, isRendezvousError } from './errors/index.js';
export type { RendezvousErrorCode } from './errors/index.js';

export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from './logging/index.js';
export type { Logger, LogLevel, LoggerOptions } from './logging/index.js';

export { bytesToHex, secureRandomBytes, secureRandomHex, secureRandomUUID } from './crypto/index.js';

export {
  MAX_FIELD_LENGTH,
  MAX_LOG_MESSAGE_LENGTH,
  isAnnounceableCountry,
  isPeerId,
  validate,
  validateMessage,
  sanitizeString,
  sanitizeLocale,
  sanitizeLogMessage,
} from './validation/index.js';
export type { ValidationFailure, ValidationResult } from './validation/index.js';

export { RateLimiter, CONNECTION_RATE_LIMIT, MESSAGE_RATE_LIMIT } from './security/index.js';
export type { RateLimiterOptions } from './security/index.js';

export {
  TrustLedger,
  TRUST_THRESHOLD,
  REPUTATION_DELTAS,
  isTrusted,
  publicChallengeScheme,
  createSignedChallengeVerifier,
  createSignedChallengeResponder,
  generateAuthKeypair,
  hexToBytes,
} from './trust/index.js';
export type {
  ReputationEvent,
  ChallengeVerifier,
  ChallengeResponder,
  AuthKeypair,
} from './trust/index.js';

export {
  PeerRegistry,
  INITIAL_REPUTATION,
  MIN_REPUTATION,
  MAX_REPUTATION,
  MAX_BANDWIDTH,
  CLOSE_CODES,
  clampReputation,
  clampBandwidth,
  serializeOutbound,
} from './registry/index.js';
export type {
  Peer,
  PeerRole,
  PeerConnection,
  RoleAttributes,
  PeerRegistryEvents,
  PeerRegistryOptions,
} from './registry/index.js';

export { Matchmaker, compareHelpers } from './matchmaking/index.js';
export type { MatchResult } from './matchmaking/index.js';

export {
  SignalingProtocolHandler,
  KeyedSerializer,
  DEFAULT_MAX_MESSAGE_SIZE,
  AUTH_REQUIRED_TEXT,
  NO_HELPERS_TEXT,
  NO_TRUSTED_HELPERS_TEXT,
} from './protocol/index.js';
export type { SessionState, SignalingStats, SignalingProtocolHandlerOptions } from './protocol/index.js';
