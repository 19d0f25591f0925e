import assert from 'node:assert'
import { describe, test } from 'node:test'
import { loadPersistenceConfigAsync, resolvePersistenceMode } from '../../src/persistenceConfig.js'

describe('Persistence Config', () => {
    test('defaults to memory mode', () => {
        assert.strictEqual(resolvePersistenceMode({}), 'memory')
    })

    test('resolves cosmos case-insensitively', () => {
        assert.strictEqual(resolvePersistenceMode({ PERSISTENCE_MODE: 'Cosmos' }), 'cosmos')
        assert.strictEqual(resolvePersistenceMode({ PERSISTENCE_MODE: 'sqlite' }), 'memory')
    })

    test('memory mode carries no cosmos block', async () => {
        assert.deepStrictEqual(await loadPersistenceConfigAsync({}), { mode: 'memory' })
    })

    test('cosmos mode with an endpoint applies container defaults', async () => {
        const config = await loadPersistenceConfigAsync({ PERSISTENCE_MODE: 'cosmos', COSMOS_SQL_ENDPOINT: 'https://cosmos.test:443/' })

        assert.deepStrictEqual(config, {
            mode: 'cosmos',
            cosmosSql: {
                endpoint: 'https://cosmos.test:443/',
                connectionString: undefined,
                key: undefined,
                database: 'quiplash',
                containers: { players: 'player', prompts: 'prompt' }
            }
        })
    })

    test('cosmos mode accepts a connection string and overrides', async () => {
        const config = await loadPersistenceConfigAsync({
            PERSISTENCE_MODE: 'cosmos',
            COSMOS_CONNECTION_STRING: 'AccountEndpoint=https://cosmos.test:443/;AccountKey=test-secret;',
            COSMOS_SQL_DATABASE: 'game',
            COSMOS_SQL_CONTAINER_PLAYERS: 'players-v2',
            COSMOS_SQL_CONTAINER_PROMPTS: 'prompts-v2'
        })

        assert.strictEqual(config.cosmosSql?.connectionString, 'AccountEndpoint=https://cosmos.test:443/;AccountKey=test-secret;')
        assert.strictEqual(config.cosmosSql?.database, 'game')
        assert.deepStrictEqual(config.cosmosSql?.containers, { players: 'players-v2', prompts: 'prompts-v2' })
    })

    test('incomplete cosmos configuration falls back to memory', async () => {
        assert.deepStrictEqual(await loadPersistenceConfigAsync({ PERSISTENCE_MODE: 'cosmos' }), { mode: 'memory' })
    })

    test('PERSISTENCE_STRICT turns the fallback into an error', async () => {
        await assert.rejects(
            () => loadPersistenceConfigAsync({ PERSISTENCE_MODE: 'cosmos', PERSISTENCE_STRICT: '1' }),
            /PERSISTENCE_STRICT enabled/
        )
    })
})
