/**
 * @fileoverview Redaction helpers for safe logging.
 * @module utils/redact
 * @version 1.0.0
 */

/**
 * Redact credentials commonly embedded in media URLs (bearer tokens, signed-URL signatures).
 *
 * Intended for logging only. This does not guarantee complete sanitization for all cases.
 */
export function redactSensitiveTokens(value: string): string {
    return value
        .replace(/access_token=[^&\s#]*/gi, 'access_token=REDACTED')
        .replace(/\btoken=[^&\s#]*/gi, 'token=REDACTED')
        .replace(/X-Amz-Signature=[^&\s#]*/gi, 'X-Amz-Signature=REDACTED')
        .replace(/X-Amz-Credential=[^&\s#]*/gi, 'X-Amz-Credential=REDACTED')
        .replace(/\b(sig|signature)=[^&\s#]*/gi, '$1=REDACTED');
}
