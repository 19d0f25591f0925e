import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { GetDocumentsRequestSchema, toPublicPlayer, type GetDocumentsResponse } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { IPlayerRepository } from '../repos/playerRepository.js'
import type { IPromptRepository } from '../repos/promptRepository.js'
import type { ITelemetryClient } from '../telemetry/ITelemetryClient.js'
import { BaseHandler } from './base/BaseHandler.js'
import { runHandler } from './utils/contextHelpers.js'
import { okResponse } from './utils/responseBuilder.js'

/**
 * Dump every document of one container (testing aid). Player credentials are stripped.
 */
@injectable()
export class UtilsGetHandler extends BaseHandler {
    constructor(
        @inject(TOKENS.TelemetryClient) telemetry: ITelemetryClient,
        @inject(TOKENS.PlayerRepository) private playerRepo: IPlayerRepository,
        @inject(TOKENS.PromptRepository) private promptRepo: IPromptRepository
    ) {
        super(telemetry)
    }

    protected async execute(req: HttpRequest): Promise<HttpResponseInit> {
        const parsed = await this.parseInput(req, GetDocumentsRequestSchema, 'Utils.Get.Rejected')
        if (!parsed.ok) return parsed.response

        const { type } = parsed.data
        const data: GetDocumentsResponse['data'] =
            type === 'player' ? (await this.playerRepo.listAll()).map(toPublicPlayer) : await this.promptRepo.listAll()

        this.track('Utils.Get.Invoked', { type, count: data.length, status: 200 })
        return okResponse(undefined, { correlationId: this.correlationId }, { data })
    }
}

export async function utilsGet(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    return runHandler(UtilsGetHandler, request, context)
}
