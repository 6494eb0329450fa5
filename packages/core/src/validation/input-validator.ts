import {
  type InboundMessage,
  type PeerId,
  isInboundMessageType,
} from '../types/messages.js';

/** Max length of any top-level string field in an inbound message */
export const MAX_FIELD_LENGTH = 1024;

/** Max length of a log line built from peer-controlled text */
export const MAX_LOG_MESSAGE_LENGTH = 1000;

const PEER_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** NUL and SUB: never accepted inside a string field */
const FORBIDDEN_FIELD_CHARS = ['\0', '\x1a'];

/** Removed from every outbound string */
const DANGEROUS_CHARS = ['<', '>', '"', "'", '`', '\n', '\r', '\0', '\x1a'];

export type ValidationFailure =
  | 'not-an-object'
  | 'missing-type'
  | 'unknown-type'
  | 'field-too-long'
  | 'forbidden-character'
  | 'invalid-target';

export type ValidationResult =
  | { valid: true; message: InboundMessage }
  | { valid: false; reason: ValidationFailure; field?: string };

export function isPeerId(value: unknown): value is PeerId {
  return typeof value === 'string' && PEER_ID_PATTERN.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Missing or non-string fields read as '' */
function stringField(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  return typeof value === 'string' ? value : '';
}

/** Length in code points, so astral characters count once */
function characterCount(value: string): number {
  return value.length > MAX_FIELD_LENGTH ? [...value].length : value.length;
}

/**
 * Country tags a helper may announce: empty or letters only. Anything else is
 * ignored by the server without a reply.
 */
export function isAnnounceableCountry(value: string): boolean {
  return value === '' || /^[a-z]+$/i.test(value);
}

/**
 * Validate a decoded frame and turn it into a typed inbound message.
 *
 * Fails closed: anything that is not a plain object with a known `type`, or that
 * carries an oversized or control-character string, is rejected. Authentication
 * gating is not done here; it needs peer state.
 */
export function validateMessage(data: unknown): ValidationResult {
  if (!isRecord(data)) return { valid: false, reason: 'not-an-object' };
  if (!('type' in data)) return { valid: false, reason: 'missing-type' };

  const type = data.type;
  if (!isInboundMessageType(type)) return { valid: false, reason: 'unknown-type' };

  for (const [field, value] of Object.entries(data)) {
    if (typeof value !== 'string') continue;
    if (characterCount(value) > MAX_FIELD_LENGTH) return { valid: false, reason: 'field-too-long', field };
    if (FORBIDDEN_FIELD_CHARS.some((char) => value.includes(char))) {
      return { valid: false, reason: 'forbidden-character', field };
    }
  }

  switch (type) {
    case 'helper_available': {
      // Bandwidth stays raw; the registry clamps it and maps non-numbers to 0
      return { valid: true, message: { type, country: stringField(data, 'country'), bandwidth: data.bandwidth ?? 0 } };
    }
    case 'request_help': {
      return { valid: true, message: { type, country: stringField(data, 'country') } };
    }
    case 'offer': {
      const to = data.to;
      if (!isPeerId(to)) return { valid: false, reason: 'invalid-target', field: 'to' };
      return { valid: true, message: { type, to, offer: data.offer } };
    }
    case 'answer': {
      const to = data.to;
      if (!isPeerId(to)) return { valid: false, reason: 'invalid-target', field: 'to' };
      return { valid: true, message: { type, to, answer: data.answer } };
    }
    case 'ice_candidate': {
      const to = data.to;
      return { valid: true, message: { type, to: typeof to === 'string' ? to : '', candidate: data.candidate } };
    }
    case 'auth_response': {
      return {
        valid: true,
        message: { type, challenge: stringField(data, 'challenge'), response: stringField(data, 'response') },
      };
    }
    case 'ping':
    case 'auth_request':
      return { valid: true, message: { type } };
  }
}

/** Boolean form of {@link validateMessage} */
export function validate(data: unknown): boolean {
  return validateMessage(data).valid;
}

/**
 * Strip control, markup and non-ASCII characters, then truncate.
 * Applied to every server-generated string before it goes on the wire.
 */
export function sanitizeString(value: string, maxLength = 256): string {
  let result = '';
  for (const char of value) {
    const code = char.codePointAt(0) ?? 0;
    if (code < 32 && char !== '\n' && char !== '\r' && char !== '\t') continue;
    if (code > 127) continue;
    if (DANGEROUS_CHARS.includes(char)) continue;
    result += char;
  }
  return result.slice(0, maxLength).trim();
}

/** Two-letter locale tag; non-strings collapse to an empty tag */
export function sanitizeLocale(value: unknown): string {
  if (typeof value !== 'string') return '';
  return sanitizeString(value, 2).toUpperCase();
}

/** Escape line breaks and NULs so peer-controlled text cannot forge log lines */
export function sanitizeLogMessage(message: string): string {
  const escaped = message.replace(/\n/g, '\\n').replace(/\r/g, '\\r').replace(/\0/g, '\\0');
  if (escaped.length > MAX_LOG_MESSAGE_LENGTH) {
    return `${escaped.slice(0, MAX_LOG_MESSAGE_LENGTH - 3)}...`;
  }
  return escaped;
}
