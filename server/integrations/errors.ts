/**
 * Monitor Error Types
 *
 * Structured error classification for the polling workflow.
 *
 * Two families:
 * - MonitorError: thrown faults. Config, secret and preprocessing problems,
 *   plus store infrastructure failures. The orchestrator decides which of
 *   these end an execution and which become a failed poll.
 * - PollErrorKind: the `errorKind` carried on a failed PollResult. The
 *   poller never throws these; they describe why `ok` is false.
 *
 * @module server/integrations/errors
 */

// ============================================================================
// ERROR CODES
// ============================================================================

export type MonitorErrorCode =
    | 'ConfigNotFound'          // No config item for the app
    | 'ConfigInvalid'           // Config item exists but does not parse
    | 'SecretNotFound'          // Unknown secret name
    | 'SecretFieldMissing'      // jsonKey absent from a JSON secret
    | 'SecretFormatError'       // jsonKey requested but secret is not a JSON object
    | 'StoreUnavailable'        // Config/secret/metric store could not be read
    | 'PreprocessParseError'    // Vendor body does not match the expected schema
    | 'PreprocessTargetUnknown' // No normalizer registered for preprocessTarget
    | 'InternalError';          // Anything unclassified

export type SecretErrorCode = Extract<MonitorErrorCode, 'SecretNotFound' | 'SecretFieldMissing' | 'SecretFormatError'>;

export type PollErrorKind =
    | SecretErrorCode
    | 'TransientHttpError'      // Retryable status, attempt budget exhausted
    | 'PermanentHttpError'      // Non-retryable, non-2xx status
    | 'Timeout'                 // Attempt exceeded its timeout
    | 'ConnectionError'         // Refused, reset, DNS failure
    | 'RequestError'            // Any other transport failure (not retried)
    | 'Cancelled';              // Execution was aborted

// ============================================================================
// MONITOR ERROR CLASS
// ============================================================================

/**
 * Typed error thrown by stores, resolvers and preprocessors.
 *
 * Consumers switch on `error.code`:
 * - Secret codes → failed poll (ok=false, errorKind set)
 * - Everything else → execution fault
 */
export class MonitorError extends Error {
    public readonly name = 'MonitorError';

    constructor(
        public readonly code: MonitorErrorCode,
        message: string,
        public readonly context?: Record<string, unknown>
    ) {
        super(message);
    }
}

const SECRET_CODES: ReadonlySet<MonitorErrorCode> = new Set<MonitorErrorCode>([
    'SecretNotFound',
    'SecretFieldMissing',
    'SecretFormatError',
]);

/**
 * True for the secret-resolution failures that become a failed poll
 * rather than an execution fault.
 */
export function isSecretError(error: unknown): error is MonitorError & { code: SecretErrorCode } {
    return error instanceof MonitorError && SECRET_CODES.has(error.code);
}

// ============================================================================
// TRANSPORT ERROR CLASSIFICATION
// ============================================================================

interface TransportLikeError {
    code?: string;
    name?: string;
    message?: string;
}

function isTransportLike(error: unknown): error is TransportLikeError {
    return typeof error === 'object' && error !== null;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

const CONNECTION_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'EPIPE',
    'ERR_NETWORK',
]);

/**
 * Classify an error raised by the HTTP client (no response received).
 * HTTP status handling happens in the poller, since every status resolves.
 */
export function classifyTransportError(error: unknown): Extract<PollErrorKind, 'Timeout' | 'ConnectionError' | 'RequestError' | 'Cancelled'> {
    if (!isTransportLike(error)) {
        return 'RequestError';
    }
    if (error.code === 'ERR_CANCELED' || error.name === 'CanceledError') {
        return 'Cancelled';
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
        return 'Timeout';
    }
    if (error.code && CONNECTION_CODES.has(error.code)) {
        return 'ConnectionError';
    }
    return 'RequestError';
}

/**
 * Timeouts and connection failures share the HTTP retry budget.
 */
export function isRetryableTransportError(kind: PollErrorKind): boolean {
    return kind === 'Timeout' || kind === 'ConnectionError';
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Extract a human-readable error message from any error type.
 */
export function extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Coerce any thrown value into a MonitorError, keeping typed errors as-is.
 */
export function toMonitorError(error: unknown): MonitorError {
    if (error instanceof MonitorError) {
        return error;
    }
    return new MonitorError('InternalError', extractErrorMessage(error));
}
