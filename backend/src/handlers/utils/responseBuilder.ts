/**
 * HTTP response builder utilities for Azure Functions handlers.
 * Centralizes response construction to eliminate duplication across handlers.
 *
 * Error responses use the envelope from http/errorEnvelope.ts.
 */
import type { HttpResponseInit } from '@azure/functions'
import { API_MESSAGES, CORRELATION_HEADER, ok } from '@quiplash/shared'
import { formatError, type StandardErrorCode } from '../../http/errorEnvelope.js'

export type { StandardErrorCode }

export interface ResponseOptions {
    correlationId: string
    additionalHeaders?: Record<string, string>
}

/**
 * Build a JSON response with standard headers.
 */
export function jsonResponse(status: number, body: unknown, options: ResponseOptions): HttpResponseInit {
    const headers: Record<string, string> = {
        [CORRELATION_HEADER]: options.correlationId,
        'Content-Type': 'application/json; charset=utf-8',
        'Cache-Control': 'no-store',
        ...options.additionalHeaders
    }

    return { status, headers, jsonBody: body }
}

/**
 * Build a successful response: `{ result: true, msg, ...extra }`.
 * @param status - 200 unless the call created a document
 */
export function okResponse(msg: string | undefined, options: ResponseOptions, extra: object = {}, status = 200): HttpResponseInit {
    return jsonResponse(status, ok(msg, extra), options)
}

/**
 * Build an error response: `{ result: false, msg, code }`.
 */
export function errorResponse(status: number, code: StandardErrorCode, message: string, options: ResponseOptions): HttpResponseInit {
    return jsonResponse(status, formatError(code, message), options)
}

/**
 * Build the 500 response for unhandled exceptions.
 * The message is always the generic one; detail belongs in logs.
 */
export function internalErrorResponse(options: ResponseOptions): HttpResponseInit {
    return errorResponse(500, 'InternalError', API_MESSAGES.internalError, options)
}
