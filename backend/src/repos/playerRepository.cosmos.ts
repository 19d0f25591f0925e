/**
 * Cosmos SQL API implementation of IPlayerRepository.
 */

import type { PlayerDoc } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { CosmosDbSqlRepository } from './base/CosmosDbSqlRepository.js'
import type { ICosmosDbSqlClient } from './base/cosmosDbSqlClient.js'
import type { IPlayerRepository } from './playerRepository.js'

@injectable()
export class CosmosPlayerRepository extends CosmosDbSqlRepository<PlayerDoc> implements IPlayerRepository {
    constructor(
        @inject(TOKENS.CosmosDbSqlClient) sqlClient: ICosmosDbSqlClient,
        @inject(TOKENS.CosmosContainerPlayers) containerName: string,
        @inject(TelemetryService) telemetryService: TelemetryService
    ) {
        super(sqlClient, containerName, telemetryService)
    }

    async findByUsername(username: string): Promise<PlayerDoc | null> {
        const { items } = await this.query('SELECT * FROM c WHERE c.username = @username', [{ name: '@username', value: username }], 1)
        return items[0] ?? null
    }

    async create(player: PlayerDoc): Promise<PlayerDoc> {
        const { resource } = await this.createItem(player, player.id)
        return resource
    }

    async update(player: PlayerDoc): Promise<PlayerDoc> {
        const { resource } = await this.replaceItem(player.id, player, player.id)
        return resource
    }

    async listAll(): Promise<PlayerDoc[]> {
        return this.readAll()
    }
}
