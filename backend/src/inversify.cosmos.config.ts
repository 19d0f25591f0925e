import { Container } from 'inversify'
import { TOKENS } from './di/tokens.js'
import type { IPersistenceConfig } from './persistenceConfig.js'
import { CosmosDbSqlClient, type CosmosDbSqlClientConfig, type ICosmosDbSqlClient } from './repos/base/cosmosDbSqlClient.js'
import { CosmosPlayerRepository } from './repos/playerRepository.cosmos.js'
import type { IPlayerRepository } from './repos/playerRepository.js'
import { CosmosPromptRepository } from './repos/promptRepository.cosmos.js'
import type { IPromptRepository } from './repos/promptRepository.js'

/**
 * Cosmos persistence bindings.
 *
 * Note: common bindings (telemetry, handlers, services) are registered by the runtime selector.
 */
export function bindCosmosPersistence(container: Container, config: IPersistenceConfig): void {
    if (config.mode !== 'cosmos') {
        throw new Error('bindCosmosPersistence called when persistence mode is not cosmos')
    }

    const sql = config.cosmosSql
    if (!sql || (!sql.endpoint && !sql.connectionString) || !sql.database) {
        throw new Error('Cosmos SQL API configuration incomplete. Required: COSMOS_SQL_ENDPOINT (or COSMOS_CONNECTION_STRING), COSMOS_SQL_DATABASE')
    }

    container.bind<CosmosDbSqlClientConfig>(TOKENS.CosmosDbSqlConfig).toConstantValue({
        endpoint: sql.endpoint,
        connectionString: sql.connectionString,
        key: sql.key,
        database: sql.database
    })
    container.bind<ICosmosDbSqlClient>(TOKENS.CosmosDbSqlClient).to(CosmosDbSqlClient).inSingletonScope()

    container.bind<string>(TOKENS.CosmosContainerPlayers).toConstantValue(sql.containers.players)
    container.bind<string>(TOKENS.CosmosContainerPrompts).toConstantValue(sql.containers.prompts)

    container.bind<IPlayerRepository>(TOKENS.PlayerRepository).to(CosmosPlayerRepository).inSingletonScope()
    container.bind<IPromptRepository>(TOKENS.PromptRepository).to(CosmosPromptRepository).inSingletonScope()
}
