/**
 * Error Telemetry Normalization
 *
 * Maps handler error codes to normalized event properties and a classification kind
 * so error-rate queries do not depend on free-text messages.
 *
 * - Classification table: validation, not-found, conflict, unauthorized, unavailable, internal
 * - recordError() attaches game.error.code, game.error.message, game.error.kind
 * - First error per request wins
 * - Messages over 256 chars are truncated
 */

import {
    enrichErrorAttributes,
    ERROR_MESSAGE_MAX_LENGTH,
    type ErrorEventAttributes,
    type ErrorKind,
    TELEMETRY_ATTRIBUTE_KEYS
} from '@quiplash/shared'

/**
 * Error classification table mapping error codes to kinds.
 */
export const ERROR_CLASSIFICATION_TABLE: Record<string, ErrorKind> = {
    // Validation errors (400)
    ValidationError: 'validation',
    InvalidJson: 'validation',
    InvalidType: 'validation',

    // Not found errors (404)
    NotFound: 'not-found',
    PlayerNotFound: 'not-found',
    PromptNotFound: 'not-found',

    // Conflict errors (409)
    UsernameExists: 'conflict',
    ConcurrencyError: 'conflict',

    // Credential mismatch (401)
    IncorrectPassword: 'unauthorized',

    // Dependency down (503)
    ModerationUnavailable: 'unavailable',

    // Internal errors (500)
    InternalError: 'internal'
}

/**
 * Infer error kind from HTTP status code when error code is unknown.
 */
export function inferErrorKindFromStatus(statusCode: number): ErrorKind {
    if (statusCode === 401 || statusCode === 403) return 'unauthorized'
    if (statusCode === 404) return 'not-found'
    if (statusCode === 409) return 'conflict'
    if (statusCode === 503) return 'unavailable'
    if (statusCode >= 400 && statusCode < 500) return 'validation'
    return 'internal'
}

/**
 * Classify an error code to its kind.
 * Falls back to the HTTP status, then to internal.
 */
export function classifyError(errorCode: string, httpStatus?: number): ErrorKind {
    const classified = ERROR_CLASSIFICATION_TABLE[errorCode]
    if (classified) return classified

    if (httpStatus !== undefined) {
        return inferErrorKindFromStatus(httpStatus)
    }

    return 'internal'
}

export interface ErrorRecordingContext {
    correlationId: string
    /** Set once the first error has been recorded */
    errorRecorded?: boolean
    httpStatus?: number
}

export interface ErrorDetails {
    code: string
    /** Truncated if longer than ERROR_MESSAGE_MAX_LENGTH */
    message: string
    properties?: Record<string, unknown>
}

export type RecordErrorResult = { recorded: true; attributes: ErrorEventAttributes } | { recorded: false }

export function buildErrorAttributes(error: ErrorDetails, httpStatus?: number): ErrorEventAttributes {
    return {
        errorCode: error.code,
        errorMessage: error.message,
        errorKind: classifyError(error.code, httpStatus)
    }
}

/**
 * Record an error with normalized attributes. Later calls on the same context are ignored.
 *
 * @param properties - mutated with the game.error.* attributes
 *
 * @example
 * ```typescript
 * const ctx = createErrorRecordingContext('abc-123', 404)
 * const props: Record<string, unknown> = {}
 * recordError(ctx, { code: 'PromptNotFound', message: 'Prompt not found' }, props)
 * // props['game.error.kind'] === 'not-found'
 * ```
 */
export function recordError(context: ErrorRecordingContext, error: ErrorDetails, properties: Record<string, unknown>): RecordErrorResult {
    if (context.errorRecorded) {
        return { recorded: false }
    }

    const attrs = buildErrorAttributes(error, context.httpStatus)
    enrichErrorAttributes(properties, attrs)
    context.errorRecorded = true

    if (error.properties) {
        Object.assign(properties, error.properties)
    }

    return { recorded: true, attributes: attrs }
}

export function createErrorRecordingContext(correlationId: string, httpStatus?: number): ErrorRecordingContext {
    return {
        correlationId,
        httpStatus,
        errorRecorded: false
    }
}

export { ERROR_MESSAGE_MAX_LENGTH, TELEMETRY_ATTRIBUTE_KEYS }
