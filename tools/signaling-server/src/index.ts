export const SIGNALING_SERVER_VERSION = '0.1.0';

export { createSignalingServer } from './server.js';
export type { SignalingServer, SignalingServerOptions } from './server.js';
export { DEFAULT_CONFIG, loadConfig } from './config.js';
export type { SignalingServerConfig } from './config.js';
