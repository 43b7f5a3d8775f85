/**
 * Redaction Utilities
 *
 * Keeps credentials out of logs and debug output. Two mechanisms:
 * - Header maps: values of auth-style headers are replaced with a sentinel
 * - Free text: known secret values are scrubbed wherever they appear
 *   (error messages from the HTTP client can echo request details)
 */

/** Sentinel that replaces redacted values */
export const REDACTED_SENTINEL = '***';

/** Header names whose values are always redacted (compared lower-case) */
const SENSITIVE_HEADERS = new Set([
    'authorization',
    'proxy-authorization',
    'x-api-key',
    'cookie',
    'set-cookie',
]);

/**
 * Return a copy of `headers` with sensitive values replaced.
 * `extraSensitive` adds header names (e.g. a custom auth header) to the set.
 */
export function redactHeaders(
    headers: Record<string, string>,
    extraSensitive: readonly string[] = []
): Record<string, string> {
    const extra = new Set(extraSensitive.map(h => h.toLowerCase()));
    const redacted: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
        const lower = key.toLowerCase();
        redacted[key] = SENSITIVE_HEADERS.has(lower) || extra.has(lower) ? REDACTED_SENTINEL : value;
    }
    return redacted;
}

/**
 * Replace every occurrence of each secret in `text` with the sentinel.
 * Longer secrets are scrubbed first so a rendered header ("Bearer abc")
 * disappears as a whole before its credential part is considered.
 */
export function scrubSecrets(text: string, secrets: readonly (string | null | undefined)[]): string {
    const ordered = secrets
        .filter((s): s is string => typeof s === 'string' && s.length > 0)
        .sort((a, b) => b.length - a.length);

    let result = text;
    for (const secret of ordered) {
        result = result.split(secret).join(REDACTED_SENTINEL);
    }
    return result;
}
