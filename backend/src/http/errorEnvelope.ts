/**
 * HTTP Error Envelope Utility
 *
 * Standardized error response structure for all HTTP handlers:
 * { result: false, msg: string, code: string }
 */
import { fail, type ApiFailureEnvelope } from '@quiplash/shared'

/**
 * Error codes used across the API.
 */
export type StandardErrorCode =
    // Validation errors (400)
    | 'ValidationError'
    | 'InvalidJson'
    | 'InvalidType'
    // Credential mismatch (401)
    | 'IncorrectPassword'
    // Not found errors (404)
    | 'PlayerNotFound'
    | 'PromptNotFound'
    // Conflict errors (409)
    | 'UsernameExists'
    // Dependency unavailable (503)
    | 'ModerationUnavailable'
    // Internal errors (500)
    | 'InternalError'

export type ErrorEnvelope = ApiFailureEnvelope

export function formatError(code: StandardErrorCode, message: string): ErrorEnvelope {
    return fail(code, message)
}

/** Render an unknown thrown value for logs. Masked in production. */
export function describeError(error: unknown): string {
    if (process.env.NODE_ENV === 'production') {
        return 'An internal error occurred'
    }
    if (error instanceof Error) {
        return error.message
    }
    if (typeof error === 'string' && error.length > 0) {
        return error
    }
    return 'Unknown error'
}
