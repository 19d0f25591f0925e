/** Persistence configuration & mode resolution */

export type PersistenceMode = 'memory' | 'cosmos'

export const DEFAULT_DATABASE_NAME = 'quiplash'
export const DEFAULT_PLAYER_CONTAINER = 'player'
export const DEFAULT_PROMPT_CONTAINER = 'prompt'

export interface IPersistenceConfig {
    mode: PersistenceMode
    cosmosSql?: {
        /** Account endpoint; absent when only a connection string is supplied */
        endpoint?: string
        /** Full connection string (AccountEndpoint=...;AccountKey=...) */
        connectionString?: string
        /** Account key; managed identity is used when neither key nor connection string is set */
        key?: string
        database: string
        containers: {
            players: string
            prompts: string
        }
    }
}

export function resolvePersistenceMode(env: NodeJS.ProcessEnv = process.env): PersistenceMode {
    const m = (env.PERSISTENCE_MODE || 'memory').toLowerCase()
    return m === 'cosmos' ? 'cosmos' : 'memory'
}

function isTruthyFlag(value: string | undefined): boolean {
    return value === '1' || value === 'true'
}

/**
 * Load persistence configuration from the environment.
 * In non-strict mode an incomplete cosmos configuration degrades to memory mode with a warning.
 */
export async function loadPersistenceConfigAsync(env: NodeJS.ProcessEnv = process.env): Promise<IPersistenceConfig> {
    const mode = resolvePersistenceMode(env)
    if (mode !== 'cosmos') {
        return { mode: 'memory' }
    }

    // COSMOS_CONNECTION_STRING kept for deployments configured through the portal connection-string blade
    const connectionString = env.COSMOS_CONNECTION_STRING?.trim() || undefined
    const endpoint = env.COSMOS_SQL_ENDPOINT?.trim() || undefined
    const strict = isTruthyFlag(env.PERSISTENCE_STRICT)

    if (!connectionString && !endpoint) {
        if (strict) {
            throw new Error(
                'PERSISTENCE_STRICT enabled but Cosmos SQL configuration incomplete. Missing: COSMOS_SQL_ENDPOINT or COSMOS_CONNECTION_STRING'
            )
        }
        console.warn('[persistenceConfig] PERSISTENCE_MODE=cosmos without COSMOS_SQL_ENDPOINT / COSMOS_CONNECTION_STRING; using memory mode.')
        return { mode: 'memory' }
    }

    return {
        mode,
        cosmosSql: {
            endpoint,
            connectionString,
            key: env.COSMOS_SQL_KEY?.trim() || undefined,
            database: env.COSMOS_SQL_DATABASE || DEFAULT_DATABASE_NAME,
            containers: {
                players: env.COSMOS_SQL_CONTAINER_PLAYERS || DEFAULT_PLAYER_CONTAINER,
                prompts: env.COSMOS_SQL_CONTAINER_PROMPTS || DEFAULT_PROMPT_CONTAINER
            }
        }
    }
}
