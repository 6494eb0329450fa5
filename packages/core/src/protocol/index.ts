export {
  SignalingProtocolHandler,
  DEFAULT_MAX_MESSAGE_SIZE,
  AUTH_REQUIRED_TEXT,
  NO_HELPERS_TEXT,
  NO_TRUSTED_HELPERS_TEXT,
} from './signaling-handler.js';
export type { SessionState, SignalingStats, SignalingProtocolHandlerOptions } from './signaling-handler.js';
export { KeyedSerializer } from './keyed-serializer.js';
