export { RENDEZVOUS_PROTOCOL_VERSION } from 'rendezvous-core';
export { RendezvousClient } from './rendezvous-client.js';
export type {
  RendezvousClientOptions,
  HelpResult,
  HelperRequest,
  HelperRequestHandler,
  NegotiationHandler,
  AuthRequiredHandler,
  CloseHandler,
} from './rendezvous-client.js';
export { createSignedChallengeResponder, generateAuthKeypair, publicChallengeScheme } from 'rendezvous-core';
export type { ChallengeResponder, AuthKeypair } from 'rendezvous-core';
