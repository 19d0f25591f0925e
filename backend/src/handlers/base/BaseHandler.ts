/**
 * Abstract base handler class for Azure Functions HTTP handlers.
 * Provides common functionality: timing, correlation, input parsing, telemetry.
 *
 * Error Telemetry Normalization:
 * - Includes error recording context with duplicate prevention (first-wins)
 * - Use reject() / recordNormalizedError() to attach game.error.* attributes to telemetry
 * - Errors are classified by kind (validation, not-found, conflict, unauthorized, unavailable, internal)
 *
 * Anything execute() throws is logged through the invocation context, tracked as an exception
 * and answered with the generic 500 envelope.
 */
import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { API_MESSAGES, type GameEventName } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import type { ZodType, ZodTypeDef } from 'zod'
import { TOKENS } from '../../di/tokens.js'
import { describeError } from '../../http/errorEnvelope.js'
import { createErrorRecordingContext, recordError, type ErrorRecordingContext } from '../../telemetry/errorTelemetry.js'
import type { ITelemetryClient } from '../../telemetry/ITelemetryClient.js'
import { extractCorrelationId, inferService } from '../../telemetry/TelemetryService.js'
import { readRequestInput } from '../utils/requestBody.js'
import { errorResponse, internalErrorResponse, type StandardErrorCode } from '../utils/responseBuilder.js'

export type ParsedInput<T> = { ok: true; data: T } | { ok: false; response: HttpResponseInit }

@injectable()
export abstract class BaseHandler {
    protected correlationId = ''
    private started = 0
    /** Error recording context for duplicate prevention (first-wins) */
    private errorContext: ErrorRecordingContext = createErrorRecordingContext('')

    constructor(@inject(TOKENS.TelemetryClient) protected telemetry: ITelemetryClient) {}

    /**
     * Main entry point for the handler. Sets up context and calls execute().
     */
    async handle(req: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
        this.started = Date.now()
        this.correlationId = extractCorrelationId(req.headers)
        this.errorContext = createErrorRecordingContext(this.correlationId)

        try {
            return await this.execute(req, context)
        } catch (error) {
            return this.handleUnexpectedError(error, context)
        }
    }

    /**
     * Subclass implementation of handler logic.
     */
    protected abstract execute(req: HttpRequest, context: InvocationContext): Promise<HttpResponseInit>

    /**
     * Elapsed time since handle() started (in milliseconds).
     */
    protected get latencyMs(): number {
        return Date.now() - this.started
    }

    /**
     * Read the request input (body, `json` query parameter or query string) and validate it.
     * On failure the 400 response is already built and the rejection tracked under `rejectedEvent`.
     */
    protected async parseInput<T>(
        req: HttpRequest,
        schema: ZodType<T, ZodTypeDef, unknown>,
        rejectedEvent: GameEventName
    ): Promise<ParsedInput<T>> {
        const raw = await readRequestInput(req)
        if (!raw.ok) {
            return { ok: false, response: this.reject(rejectedEvent, 400, 'InvalidJson', API_MESSAGES.invalidJson) }
        }

        const parsed = schema.safeParse(raw.input)
        if (!parsed.success) {
            const issue = parsed.error.issues[0]
            const message = issue?.message ?? 'Invalid request'
            return {
                ok: false,
                response: this.reject(rejectedEvent, 400, 'ValidationError', message, { field: issue?.path.join('.') })
            }
        }
        return { ok: true, data: parsed.data }
    }

    /**
     * Emit a telemetry event with automatic correlation and timing.
     */
    protected track(eventName: GameEventName, properties: Record<string, unknown>): void {
        this.telemetry.trackEvent({
            name: eventName,
            properties: {
                ...properties,
                latencyMs: this.latencyMs,
                correlationId: this.correlationId,
                service: inferService()
            }
        })
    }

    /**
     * Record a normalized error with game.error.* attributes and emit telemetry.
     * Subsequent errors on the same request are ignored.
     *
     * @returns Whether the error was recorded (false if duplicate)
     */
    protected recordNormalizedError(
        eventName: GameEventName,
        errorCode: string,
        errorMessage: string,
        httpStatus: number,
        additionalProps: Record<string, unknown> = {}
    ): boolean {
        this.errorContext.httpStatus = httpStatus

        const props: Record<string, unknown> = {
            ...additionalProps,
            status: httpStatus
        }

        const result = recordError(this.errorContext, { code: errorCode, message: errorMessage }, props)
        if (result.recorded) {
            this.track(eventName, props)
        }
        return result.recorded
    }

    /**
     * Record the rejection and build the matching error response in one step.
     */
    protected reject(
        eventName: GameEventName,
        status: number,
        code: StandardErrorCode,
        message: string,
        additionalProps: Record<string, unknown> = {}
    ): HttpResponseInit {
        this.recordNormalizedError(eventName, code, message, status, additionalProps)
        return errorResponse(status, code, message, { correlationId: this.correlationId })
    }

    private handleUnexpectedError(error: unknown, context: InvocationContext): HttpResponseInit {
        const handlerName = this.constructor.name
        context.error(`[${handlerName}] unhandled error (correlationId=${this.correlationId})`, error)
        this.telemetry.trackException({
            exception: error instanceof Error ? error : new Error(String(error)),
            properties: { handler: handlerName, correlationId: this.correlationId }
        })
        this.recordNormalizedError('Http.Handler.Failed', 'InternalError', describeError(error), 500, { handler: handlerName })
        return internalErrorResponse({ correlationId: this.correlationId })
    }
}
