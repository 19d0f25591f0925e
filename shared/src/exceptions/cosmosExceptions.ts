/**
 * Domain exceptions for Cosmos DB operations.
 * Repositories translate SDK errors into these so handlers never inspect raw status codes.
 */

/**
 * Base class for all Cosmos-related domain exceptions.
 */
export abstract class CosmosException extends Error {
    constructor(
        message: string,
        public readonly statusCode?: number
    ) {
        super(message)
        this.name = this.constructor.name
        Error.captureStackTrace(this, this.constructor)
    }
}

/** Resource not found (404). Point reads map this to null instead of throwing. */
export class NotFoundException extends CosmosException {
    constructor(
        message: string,
        public readonly resourceId?: string
    ) {
        super(message, 404)
    }
}

/** Conflict (409): an item with the same id already exists in the partition. */
export class ConcurrencyException extends CosmosException {
    constructor(
        message: string,
        public readonly resourceId?: string
    ) {
        super(message, 409)
    }
}

/** Throttled (429). Retryable after the server-provided delay. */
export class RetryableException extends CosmosException {
    constructor(
        message: string,
        public readonly retryAfterMs?: number
    ) {
        super(message, 429)
    }
}

/** Precondition failed (412), typically an etag mismatch on replace. */
export class PreconditionFailedException extends CosmosException {
    constructor(
        message: string,
        public readonly resourceId?: string
    ) {
        super(message, 412)
    }
}

/** Bad request (400): malformed query or document. Not retryable. */
export class ValidationException extends CosmosException {
    constructor(
        message: string,
        public readonly details?: string
    ) {
        super(message, 400)
    }
}

/** Any other status code (5xx, auth failures, transport errors). */
export class UnexpectedCosmosException extends CosmosException {}

/** Shape of errors thrown by @azure/cosmos (ErrorResponse) that we rely on. */
export interface CosmosErrorLike {
    code?: number | string
    message?: string
    headers?: Record<string, string | undefined>
}

export function isCosmosErrorLike(error: unknown): error is CosmosErrorLike {
    return typeof error === 'object' && error !== null && ('code' in error || 'message' in error)
}

/** Extract the numeric HTTP status from an SDK error, if it carries one. */
export function cosmosStatusCode(error: unknown): number | undefined {
    if (!isCosmosErrorLike(error)) return undefined
    const code = typeof error.code === 'string' ? parseInt(error.code, 10) : error.code
    return typeof code === 'number' && !Number.isNaN(code) ? code : undefined
}

/**
 * Translate raw Cosmos error to domain exception.
 * @param error - Error from Cosmos SDK
 * @param context - Operation name prefixed to the message
 */
export function translateCosmosError(error: unknown, context?: string): CosmosException {
    if (error instanceof CosmosException) return error

    const statusCode = cosmosStatusCode(error)
    const rawMessage = isCosmosErrorLike(error) ? error.message : undefined
    const message = `${context ? `${context}: ` : ''}${rawMessage || 'Unknown Cosmos error'}`

    switch (statusCode) {
        case 404:
            return new NotFoundException(message)
        case 409:
            return new ConcurrencyException(message)
        case 429: {
            const retryAfter = isCosmosErrorLike(error) ? error.headers?.['x-ms-retry-after-ms'] : undefined
            return new RetryableException(message, retryAfter ? parseInt(retryAfter, 10) : undefined)
        }
        case 412:
            return new PreconditionFailedException(message)
        case 400:
            return new ValidationException(message)
        default:
            return new UnexpectedCosmosException(message, statusCode)
    }
}
