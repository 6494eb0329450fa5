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
} from './input-validator.js';
export type { ValidationFailure, ValidationResult } from './input-validator.js';
