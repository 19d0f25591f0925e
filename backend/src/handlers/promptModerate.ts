import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import {
    API_MESSAGES,
    enrichPromptAttributes,
    ModeratePromptRequestSchema,
    type ModeratePromptResponse,
    type ModerationRecord
} from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { IPromptRepository } from '../repos/promptRepository.js'
import { PromptModerationService } from '../services/PromptModerationService.js'
import type { ITelemetryClient } from '../telemetry/ITelemetryClient.js'
import { BaseHandler } from './base/BaseHandler.js'
import { runHandler } from './utils/contextHelpers.js'
import { okResponse } from './utils/responseBuilder.js'

/**
 * Approve or reject a prompt.
 * An explicit `approved` flag is a manual decision; without it the content-safety
 * service decides and a 503 is returned when it cannot.
 */
@injectable()
export class PromptModerateHandler extends BaseHandler {
    constructor(
        @inject(TOKENS.TelemetryClient) telemetry: ITelemetryClient,
        @inject(TOKENS.PromptRepository) private promptRepo: IPromptRepository,
        @inject(PromptModerationService) private moderation: PromptModerationService
    ) {
        super(telemetry)
    }

    protected async execute(req: HttpRequest): Promise<HttpResponseInit> {
        const parsed = await this.parseInput(req, ModeratePromptRequestSchema, 'Prompt.Moderate.Rejected')
        if (!parsed.ok) return parsed.response

        const { prompt_id, username, approved } = parsed.data
        const attrs = enrichPromptAttributes({}, { promptId: prompt_id, username })

        const prompt = await this.promptRepo.get(prompt_id, username)
        if (!prompt) {
            return this.reject('Prompt.Moderate.Rejected', 404, 'PromptNotFound', API_MESSAGES.promptNotFound, attrs)
        }

        const now = new Date().toISOString()
        let decision: boolean
        let record: ModerationRecord
        if (approved !== undefined) {
            decision = approved
            record = { source: 'manual', moderated_utc: now }
        } else {
            const automatic = await this.moderation.decide(prompt)
            if (!automatic) {
                return this.reject('Prompt.Moderate.Rejected', 503, 'ModerationUnavailable', API_MESSAGES.moderationUnavailable, attrs)
            }
            decision = automatic.approved
            record = { source: 'content-safety', averageSeverity: automatic.averageSeverity, moderated_utc: now }
        }

        await this.promptRepo.update({ ...prompt, approved: decision, moderation: record })

        this.track(
            'Prompt.Moderated',
            enrichPromptAttributes(
                { approved: decision, averageSeverity: record.averageSeverity, status: 200 },
                { promptId: prompt_id, username, moderationSource: record.source }
            )
        )
        const body: ModeratePromptResponse = { approved: decision }
        return okResponse(decision ? API_MESSAGES.promptApproved : API_MESSAGES.promptRejected, { correlationId: this.correlationId }, body)
    }
}

export async function promptModerate(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    return runHandler(PromptModerateHandler, request, context)
}
