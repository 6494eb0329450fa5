export { RendezvousError, isRendezvousError } from './rendezvous-error.js';
export type { RendezvousErrorCode } from './rendezvous-error.js';
