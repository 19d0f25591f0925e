/**
 * Cosmos DB SQL API client interface and implementation.
 *
 * Wraps the @azure/cosmos SDK and hands out containers to repositories so that
 * no other layer touches the SDK directly.
 */

import { Container, CosmosClient, Database } from '@azure/cosmos'
import { DefaultAzureCredential } from '@azure/identity'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../../di/tokens.js'

/**
 * Configuration for Cosmos SQL client.
 * Either a connection string or an endpoint (with optional key) must be supplied.
 */
export interface CosmosDbSqlClientConfig {
    endpoint?: string
    connectionString?: string
    key?: string
    database: string
}

/**
 * Interface for Cosmos DB SQL API client operations.
 */
export interface ICosmosDbSqlClient {
    /**
     * @param containerName - e.g. 'player', 'prompt'
     */
    getContainer(containerName: string): Container
}

export function createCosmosClient(config: CosmosDbSqlClientConfig): CosmosClient {
    if (config.connectionString) {
        return new CosmosClient(config.connectionString)
    }
    if (!config.endpoint) {
        throw new Error('Cosmos SQL configuration requires an endpoint or a connection string')
    }
    if (config.key) {
        return new CosmosClient({ endpoint: config.endpoint, key: config.key })
    }
    // Managed Identity / developer credentials
    return new CosmosClient({ endpoint: config.endpoint, aadCredentials: new DefaultAzureCredential() })
}

@injectable()
export class CosmosDbSqlClient implements ICosmosDbSqlClient {
    private client: CosmosClient
    private database: Database

    constructor(@inject(TOKENS.CosmosDbSqlConfig) config: CosmosDbSqlClientConfig) {
        this.client = createCosmosClient(config)
        this.database = this.client.database(config.database)
    }

    getContainer(containerName: string): Container {
        return this.database.container(containerName)
    }
}
