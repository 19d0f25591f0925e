/**
 * Abstract base class for Cosmos DB SQL API repositories.
 * Provides common CRUD operations with error handling and telemetry.
 *
 * Zero direct @azure/cosmos SDK calls outside the repository layer: every SQL API
 * operation goes through this class. Concrete repositories pass their container name
 * and receive the client and TelemetryService from DI.
 */

import type { Container, FeedResponse, ItemResponse, SqlParameter } from '@azure/cosmos'
import { cosmosStatusCode, translateCosmosError, UnexpectedCosmosException } from '@quiplash/shared'
import { injectable } from 'inversify'
import type { TelemetryService } from '../../telemetry/TelemetryService.js'
import type { ICosmosDbSqlClient } from './cosmosDbSqlClient.js'

interface OperationTelemetry {
    operationName: string
    startTime: number
    partitionKey?: string
    crossPartitionQuery?: boolean
}

/**
 * Base repository for SQL API operations
 */
@injectable()
export abstract class CosmosDbSqlRepository<T extends { id: string }> {
    protected container: Container
    protected containerName: string

    /**
     * @param client - Injected Cosmos SQL client
     * @param containerName - Container name for this repository
     * @param telemetryService - Receives SQL.Query.* events
     */
    constructor(
        protected client: ICosmosDbSqlClient,
        containerName: string,
        protected telemetryService: TelemetryService
    ) {
        this.containerName = containerName
        this.container = client.getContainer(containerName)
    }

    /**
     * Get entity by ID and partition key
     * @returns Entity or null if not found
     */
    protected async getById(id: string, partitionKey: string): Promise<T | null> {
        const op: OperationTelemetry = { operationName: `${this.containerName}.GetById`, startTime: Date.now(), partitionKey }

        try {
            const response: ItemResponse<T> = await this.container.item(id, partitionKey).read<T>()
            if (response.resource) {
                this.trackExecuted(op, response.requestCharge, 1)
                return response.resource
            }
            this.trackExecuted(op, response.requestCharge, 0)
            return null
        } catch (error) {
            // 404 is expected for not found, don't throw
            if (cosmosStatusCode(error) === 404) {
                this.trackExecuted(op, 0, 0)
                return null
            }
            throw this.trackFailed(op, error)
        }
    }

    /**
     * Create a new entity (insert only, fails if exists)
     */
    protected async createItem(entity: T, partitionKey: string): Promise<{ resource: T; ruCharge: number }> {
        const op: OperationTelemetry = { operationName: `${this.containerName}.Create`, startTime: Date.now(), partitionKey }

        let response: ItemResponse<T>
        try {
            response = await this.container.items.create<T>(entity)
        } catch (error) {
            throw this.trackFailed(op, error)
        }
        this.trackExecuted(op, response.requestCharge, 1)
        return { resource: response.resource ?? entity, ruCharge: response.requestCharge }
    }

    /** Replace an entity (update only if exists) */
    protected async replaceItem(id: string, entity: T, partitionKey: string): Promise<{ resource: T; ruCharge: number }> {
        const op: OperationTelemetry = { operationName: `${this.containerName}.Replace`, startTime: Date.now(), partitionKey }

        let response: ItemResponse<T>
        try {
            response = await this.container.item(id, partitionKey).replace<T>(entity)
        } catch (error) {
            throw this.trackFailed(op, error)
        }
        if (!response.resource) {
            throw new UnexpectedCosmosException(`${op.operationName}: replace returned no resource`, response.statusCode)
        }
        this.trackExecuted(op, response.requestCharge, 1)
        return { resource: response.resource, ruCharge: response.requestCharge }
    }

    /**
     * Delete an entity
     * @returns false when the entity did not exist
     */
    protected async deleteItem(id: string, partitionKey: string): Promise<boolean> {
        const op: OperationTelemetry = { operationName: `${this.containerName}.Delete`, startTime: Date.now(), partitionKey }

        try {
            const response = await this.container.item(id, partitionKey).delete()
            this.trackExecuted(op, response.requestCharge, 1)
            return true
        } catch (error) {
            // 404 means already deleted
            if (cosmosStatusCode(error) === 404) {
                this.trackExecuted(op, 0, 0)
                return false
            }
            throw this.trackFailed(op, error)
        }
    }

    /**
     * Query entities using SQL query (cross-partition unless the query pins one)
     * @returns Matching entities with total RU charge
     */
    protected async query(query: string, parameters?: SqlParameter[], maxResults?: number): Promise<{ items: T[]; ruCharge: number }> {
        const op: OperationTelemetry = { operationName: `${this.containerName}.Query`, startTime: Date.now(), crossPartitionQuery: true }
        let totalRU = 0

        try {
            const querySpec = { query, parameters: parameters || [] }
            const options = maxResults ? { maxItemCount: maxResults } : undefined
            const iterator = this.container.items.query<T>(querySpec, options)

            const results: T[] = []
            while (iterator.hasMoreResults()) {
                const response: FeedResponse<T> = await iterator.fetchNext()
                totalRU += response.requestCharge
                if (response.resources) {
                    results.push(...response.resources)
                }
                if (maxResults && results.length >= maxResults) break
            }

            this.trackExecuted(op, totalRU, results.length)
            return { items: results, ruCharge: totalRU }
        } catch (error) {
            throw this.trackFailed(op, error)
        }
    }

    /**
     * Read every document in the container.
     */
    protected async readAll(): Promise<T[]> {
        const { items } = await this.query('SELECT * FROM c')
        return items
    }

    private trackExecuted(op: OperationTelemetry, ruCharge: number, resultCount: number): void {
        this.telemetryService.trackGameEventStrict('SQL.Query.Executed', {
            operationName: op.operationName,
            latencyMs: Date.now() - op.startTime,
            ruCharge,
            resultCount,
            partitionKey: op.partitionKey,
            crossPartitionQuery: op.crossPartitionQuery,
            containerName: this.containerName
        })
    }

    private trackFailed(op: OperationTelemetry, error: unknown): Error {
        this.telemetryService.trackGameEventStrict('SQL.Query.Failed', {
            operationName: op.operationName,
            latencyMs: Date.now() - op.startTime,
            httpStatusCode: cosmosStatusCode(error),
            partitionKey: op.partitionKey,
            crossPartitionQuery: op.crossPartitionQuery,
            containerName: this.containerName
        })
        return translateCosmosError(error, op.operationName)
    }
}
