/**
 * Cosmos SQL API implementation of IPromptRepository.
 */

import type { PromptDoc } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { CosmosDbSqlRepository } from './base/CosmosDbSqlRepository.js'
import type { ICosmosDbSqlClient } from './base/cosmosDbSqlClient.js'
import type { IPromptRepository } from './promptRepository.js'

@injectable()
export class CosmosPromptRepository extends CosmosDbSqlRepository<PromptDoc> implements IPromptRepository {
    constructor(
        @inject(TOKENS.CosmosDbSqlClient) sqlClient: ICosmosDbSqlClient,
        @inject(TOKENS.CosmosContainerPrompts) containerName: string,
        @inject(TelemetryService) telemetryService: TelemetryService
    ) {
        super(sqlClient, containerName, telemetryService)
    }

    async get(id: string, username: string): Promise<PromptDoc | null> {
        return this.getById(id, username)
    }

    async create(prompt: PromptDoc): Promise<PromptDoc> {
        const { resource } = await this.createItem(prompt, prompt.username)
        return resource
    }

    async update(prompt: PromptDoc): Promise<PromptDoc> {
        const { resource } = await this.replaceItem(prompt.id, prompt, prompt.username)
        return resource
    }

    async delete(id: string, username: string): Promise<boolean> {
        return this.deleteItem(id, username)
    }

    async listAll(): Promise<PromptDoc[]> {
        return this.readAll()
    }
}
