import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { API_MESSAGES, enrichPlayerAttributes, RegisterPlayerRequestSchema, type PlayerDoc } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { TOKENS } from '../di/tokens.js'
import type { IPlayerRepository } from '../repos/playerRepository.js'
import type { IPasswordHasher } from '../services/passwordHasher.js'
import type { ITelemetryClient } from '../telemetry/ITelemetryClient.js'
import { BaseHandler } from './base/BaseHandler.js'
import { runHandler } from './utils/contextHelpers.js'
import { okResponse } from './utils/responseBuilder.js'

@injectable()
export class PlayerRegisterHandler extends BaseHandler {
    constructor(
        @inject(TOKENS.TelemetryClient) telemetry: ITelemetryClient,
        @inject(TOKENS.PlayerRepository) private playerRepo: IPlayerRepository,
        @inject(TOKENS.PasswordHasher) private passwordHasher: IPasswordHasher
    ) {
        super(telemetry)
    }

    protected async execute(req: HttpRequest): Promise<HttpResponseInit> {
        const parsed = await this.parseInput(req, RegisterPlayerRequestSchema, 'Player.Register.Rejected')
        if (!parsed.ok) return parsed.response

        const { username, password } = parsed.data

        // Query-then-create: two racing registrations can both pass this check
        const existing = await this.playerRepo.findByUsername(username)
        if (existing) {
            return this.reject(
                'Player.Register.Rejected',
                409,
                'UsernameExists',
                API_MESSAGES.usernameExists,
                enrichPlayerAttributes({}, { username })
            )
        }

        const now = new Date().toISOString()
        const player: PlayerDoc = {
            id: randomUUID(),
            username,
            password: await this.passwordHasher.hash(password),
            games_played: 0,
            total_score: 0,
            created_utc: now,
            updated_utc: now
        }
        await this.playerRepo.create(player)

        this.track('Player.Registered', enrichPlayerAttributes({ status: 201 }, { username }))
        return okResponse(API_MESSAGES.ok, { correlationId: this.correlationId }, {}, 201)
    }
}

export async function playerRegister(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    return runHandler(PlayerRegisterHandler, request, context)
}
