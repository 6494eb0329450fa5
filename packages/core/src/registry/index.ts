export {
  PeerRegistry,
  INITIAL_REPUTATION,
  MIN_REPUTATION,
  MAX_REPUTATION,
  MAX_BANDWIDTH,
  clampReputation,
  clampBandwidth,
  serializeOutbound,
} from './peer-registry.js';
export type { Peer, PeerRole, RoleAttributes, PeerRegistryEvents, PeerRegistryOptions } from './peer-registry.js';
export { CLOSE_CODES } from './peer-connection.js';
export type { PeerConnection } from './peer-connection.js';
