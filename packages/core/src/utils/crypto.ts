/**
 * Crypto helpers: time-ordered identifiers and secret redaction for log output.
 */

import { randomBytes } from 'node:crypto';

/**
 * Generate a UUIDv7 (48-bit millisecond timestamp + random bits), so session
 * ids sort by creation time.
 */
export function uuidv7(now: number = Date.now()): string {
  const bytes = randomBytes(16);
  bytes.writeUIntBE(now, 0, 6);
  bytes[6] = 0x70 | ((bytes[6] ?? 0) & 0x0f); // version 7
  bytes[8] = 0x80 | ((bytes[8] ?? 0) & 0x3f); // variant 10

  const hex = bytes.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

const SECRET_PATTERNS: { regex: RegExp; replacement: string }[] = [
  { regex: /sk-[a-zA-Z0-9-_]{20,}/g, replacement: '[REDACTED_API_KEY]' },
  { regex: /bearer\s+[a-zA-Z0-9-_.]+/gi, replacement: 'Bearer [REDACTED_TOKEN]' },
  { regex: /(password|passwd|pwd)(["\s:=]+)["']?[^"'\s]+["']?/gi, replacement: '$1$2[REDACTED]' },
  {
    regex: /-----BEGIN[^-]+PRIVATE KEY-----[\s\S]*?-----END[^-]+PRIVATE KEY-----/g,
    replacement: '[REDACTED_PRIVATE_KEY]',
  },
];

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization'];

/**
 * Redact secrets from a value before it reaches a log line. Sandboxed targets
 * routinely carry credentials on their command lines, so strings are scrubbed
 * as well as object keys.
 */
export function sanitizeForLogging(input: unknown): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (typeof input === 'string') {
    return SECRET_PATTERNS.reduce((s, { regex, replacement }) => s.replace(regex, replacement), input);
  }

  if (input instanceof Error) {
    return { name: input.name, message: sanitizeForLogging(input.message) };
  }

  if (Array.isArray(input)) {
    return input.map(sanitizeForLogging);
  }

  if (typeof input === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const lowerKey = key.toLowerCase();
      sanitized[key] = SENSITIVE_KEYS.some((s) => lowerKey.includes(s))
        ? '[REDACTED]'
        : sanitizeForLogging(value);
    }
    return sanitized;
  }

  return input;
}
