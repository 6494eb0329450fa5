export { bytesToHex, secureRandomBytes, secureRandomHex, secureRandomUUID } from './secure-random.js';
