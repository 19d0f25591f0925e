import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { API_MESSAGES, enrichPlayerAttributes, LoginPlayerRequestSchema } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { IPlayerRepository } from '../repos/playerRepository.js'
import type { IPasswordHasher } from '../services/passwordHasher.js'
import type { ITelemetryClient } from '../telemetry/ITelemetryClient.js'
import { BaseHandler } from './base/BaseHandler.js'
import { runHandler } from './utils/contextHelpers.js'
import { okResponse } from './utils/responseBuilder.js'

@injectable()
export class PlayerLoginHandler extends BaseHandler {
    constructor(
        @inject(TOKENS.TelemetryClient) telemetry: ITelemetryClient,
        @inject(TOKENS.PlayerRepository) private playerRepo: IPlayerRepository,
        @inject(TOKENS.PasswordHasher) private passwordHasher: IPasswordHasher
    ) {
        super(telemetry)
    }

    protected async execute(req: HttpRequest): Promise<HttpResponseInit> {
        const parsed = await this.parseInput(req, LoginPlayerRequestSchema, 'Player.Login.Failed')
        if (!parsed.ok) return parsed.response

        const { username, password } = parsed.data
        const attrs = enrichPlayerAttributes({}, { username })

        const player = await this.playerRepo.findByUsername(username)
        if (!player) {
            return this.reject('Player.Login.Failed', 404, 'PlayerNotFound', API_MESSAGES.usernameNotFound, attrs)
        }
        if (!(await this.passwordHasher.verify(password, player.password))) {
            return this.reject('Player.Login.Failed', 401, 'IncorrectPassword', API_MESSAGES.incorrectPassword, attrs)
        }

        this.track('Player.Login.Succeeded', { ...attrs, status: 200 })
        return okResponse(API_MESSAGES.ok, { correlationId: this.correlationId })
    }
}

export async function playerLogin(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    return runHandler(PlayerLoginHandler, request, context)
}
