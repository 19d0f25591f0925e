import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { API_MESSAGES, CreatePromptRequestSchema, enrichPromptAttributes, type CreatePromptResponse, type PromptDoc } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { TOKENS } from '../di/tokens.js'
import type { IPlayerRepository } from '../repos/playerRepository.js'
import type { IPromptRepository } from '../repos/promptRepository.js'
import { PromptTranslationService } from '../services/PromptTranslationService.js'
import type { ITelemetryClient } from '../telemetry/ITelemetryClient.js'
import { BaseHandler } from './base/BaseHandler.js'
import { runHandler } from './utils/contextHelpers.js'
import { okResponse } from './utils/responseBuilder.js'

/**
 * Store a new prompt for an existing player. The text is translated into every
 * supported language before the document is written; it starts unapproved.
 */
@injectable()
export class PromptCreateHandler extends BaseHandler {
    constructor(
        @inject(TOKENS.TelemetryClient) telemetry: ITelemetryClient,
        @inject(TOKENS.PlayerRepository) private playerRepo: IPlayerRepository,
        @inject(TOKENS.PromptRepository) private promptRepo: IPromptRepository,
        @inject(PromptTranslationService) private translation: PromptTranslationService
    ) {
        super(telemetry)
    }

    protected async execute(req: HttpRequest): Promise<HttpResponseInit> {
        const parsed = await this.parseInput(req, CreatePromptRequestSchema, 'Prompt.Create.Rejected')
        if (!parsed.ok) return parsed.response

        const { username, prompt_text } = parsed.data
        const author = await this.playerRepo.findByUsername(username)
        if (!author) {
            return this.reject(
                'Prompt.Create.Rejected',
                404,
                'PlayerNotFound',
                API_MESSAGES.usernameNotFound,
                enrichPromptAttributes({}, { username })
            )
        }

        const prompt: PromptDoc = {
            id: randomUUID(),
            username,
            prompt_text,
            texts: await this.translation.translateToAll(prompt_text),
            approved: false,
            created_utc: new Date().toISOString()
        }
        const created = await this.promptRepo.create(prompt)

        this.track(
            'Prompt.Created',
            enrichPromptAttributes({ languages: created.texts.length, status: 201 }, { promptId: created.id, username })
        )
        const body: CreatePromptResponse = { prompt_id: created.id }
        return okResponse(API_MESSAGES.ok, { correlationId: this.correlationId }, body, 201)
    }
}

export async function promptCreate(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    return runHandler(PromptCreateHandler, request, context)
}
