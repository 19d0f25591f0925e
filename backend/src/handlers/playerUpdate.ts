import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { API_MESSAGES, enrichPlayerAttributes, UpdatePlayerRequestSchema } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { IPlayerRepository } from '../repos/playerRepository.js'
import type { ITelemetryClient } from '../telemetry/ITelemetryClient.js'
import { BaseHandler } from './base/BaseHandler.js'
import { runHandler } from './utils/contextHelpers.js'
import { okResponse } from './utils/responseBuilder.js'

/** Record one finished game: games_played += 1, total_score += score. */
@injectable()
export class PlayerUpdateHandler extends BaseHandler {
    constructor(
        @inject(TOKENS.TelemetryClient) telemetry: ITelemetryClient,
        @inject(TOKENS.PlayerRepository) private playerRepo: IPlayerRepository
    ) {
        super(telemetry)
    }

    protected async execute(req: HttpRequest): Promise<HttpResponseInit> {
        const parsed = await this.parseInput(req, UpdatePlayerRequestSchema, 'Player.Update.Rejected')
        if (!parsed.ok) return parsed.response

        const { username, score } = parsed.data
        const player = await this.playerRepo.findByUsername(username)
        if (!player) {
            return this.reject(
                'Player.Update.Rejected',
                404,
                'PlayerNotFound',
                API_MESSAGES.usernameNotFound,
                enrichPlayerAttributes({}, { username })
            )
        }

        const totalScore = player.total_score + score
        if (!Number.isSafeInteger(totalScore)) {
            return this.reject(
                'Player.Update.Rejected',
                400,
                'ValidationError',
                API_MESSAGES.scoreOutOfRange,
                enrichPlayerAttributes({ field: 'score' }, { username })
            )
        }

        await this.playerRepo.update({
            ...player,
            games_played: player.games_played + 1,
            total_score: totalScore,
            updated_utc: new Date().toISOString()
        })

        this.track('Player.Updated', enrichPlayerAttributes({ score, status: 200 }, { username }))
        return okResponse(API_MESSAGES.ok, { correlationId: this.correlationId })
    }
}

export async function playerUpdate(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    return runHandler(PlayerUpdateHandler, request, context)
}
