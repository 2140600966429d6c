/**
 * Credential masking for logger redaction and printed request details.
 *
 * The GitHub token travels in an Authorization header; it must never reach a
 * log line or an error message.
 */

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Pino redaction paths for token-bearing fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  '*.token',
  'authorization',
  'headers.authorization',
  'headers.Authorization',
  '*.headers.authorization',
  '*.headers.Authorization',
]

/**
 * Return a copy of a header map with the Authorization value masked.
 */
export function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {}
  for (const [key, value] of Object.entries(headers)) {
    masked[key] = key.toLowerCase() === 'authorization' ? MASKED_VALUE : value
  }
  return masked
}
