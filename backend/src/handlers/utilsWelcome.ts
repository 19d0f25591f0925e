import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { API_MESSAGES } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { ITelemetryClient } from '../telemetry/ITelemetryClient.js'
import { BaseHandler } from './base/BaseHandler.js'
import { runHandler } from './utils/contextHelpers.js'
import { okResponse } from './utils/responseBuilder.js'

/** Health check. */
@injectable()
export class UtilsWelcomeHandler extends BaseHandler {
    constructor(@inject(TOKENS.TelemetryClient) telemetry: ITelemetryClient) {
        super(telemetry)
    }

    protected async execute(): Promise<HttpResponseInit> {
        this.track('Utils.Welcome.Invoked', { status: 200 })
        return okResponse(API_MESSAGES.welcome, { correlationId: this.correlationId })
    }
}

export async function utilsWelcome(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    return runHandler(UtilsWelcomeHandler, request, context)
}
