export { TrustLedger, TRUST_THRESHOLD, REPUTATION_DELTAS, isTrusted } from './trust-ledger.js';
export type { ReputationEvent } from './trust-ledger.js';
export {
  publicChallengeScheme,
  createSignedChallengeVerifier,
  createSignedChallengeResponder,
  generateAuthKeypair,
  hexToBytes,
} from './challenge.js';
export type { ChallengeVerifier, ChallengeResponder, AuthKeypair } from './challenge.js';
