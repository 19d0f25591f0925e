import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { API_MESSAGES, DeletePromptRequestSchema, enrichPromptAttributes } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { IPromptRepository } from '../repos/promptRepository.js'
import type { ITelemetryClient } from '../telemetry/ITelemetryClient.js'
import { BaseHandler } from './base/BaseHandler.js'
import { runHandler } from './utils/contextHelpers.js'
import { okResponse } from './utils/responseBuilder.js'

@injectable()
export class PromptDeleteHandler extends BaseHandler {
    constructor(
        @inject(TOKENS.TelemetryClient) telemetry: ITelemetryClient,
        @inject(TOKENS.PromptRepository) private promptRepo: IPromptRepository
    ) {
        super(telemetry)
    }

    protected async execute(req: HttpRequest): Promise<HttpResponseInit> {
        const parsed = await this.parseInput(req, DeletePromptRequestSchema, 'Prompt.Delete.Rejected')
        if (!parsed.ok) return parsed.response

        const { prompt_id, username } = parsed.data
        const attrs = enrichPromptAttributes({}, { promptId: prompt_id, username })

        const deleted = await this.promptRepo.delete(prompt_id, username)
        if (!deleted) {
            return this.reject('Prompt.Delete.Rejected', 404, 'PromptNotFound', API_MESSAGES.promptNotFound, attrs)
        }

        this.track('Prompt.Deleted', { ...attrs, status: 200 })
        return okResponse(API_MESSAGES.deleted, { correlationId: this.correlationId })
    }
}

export async function promptDelete(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    return runHandler(PromptDeleteHandler, request, context)
}
