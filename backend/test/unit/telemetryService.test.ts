import assert from 'node:assert'
import { afterEach, beforeEach, describe, test } from 'node:test'
import { extractCorrelationId, inferService, TelemetryService } from '../../src/telemetry/TelemetryService.js'
import { snapshotEnv } from '../helpers/envSnapshot.js'
import { MockTelemetryClient } from '../mocks/MockTelemetryClient.js'

describe('TelemetryService', () => {
    let telemetry: MockTelemetryClient
    let service: TelemetryService
    let restoreEnv: () => void

    beforeEach(() => {
        restoreEnv = snapshotEnv(['QUIPLASH_SERVICE_NAME', 'WEBSITE_SITE_NAME', 'AZURE_FUNCTIONS_ENVIRONMENT', 'PERSISTENCE_MODE'])
        delete process.env.QUIPLASH_SERVICE_NAME
        delete process.env.WEBSITE_SITE_NAME
        delete process.env.AZURE_FUNCTIONS_ENVIRONMENT
        delete process.env.PERSISTENCE_MODE
        telemetry = new MockTelemetryClient()
        service = new TelemetryService(telemetry)
    })

    afterEach(() => {
        restoreEnv()
    })

    test('enriches events with service and persistence mode', () => {
        process.env.PERSISTENCE_MODE = 'memory'

        service.trackGameEvent('Player.Registered', { status: 201, correlationId: 'corr-1' })

        assert.deepStrictEqual(telemetry.events, [
            {
                name: 'Player.Registered',
                properties: { status: 201, correlationId: 'corr-1', service: 'local-functions', persistenceMode: 'memory' }
            }
        ])
    })

    test('keeps caller-supplied service and correlation id', () => {
        service.trackGameEvent('Player.Registered', { service: 'custom', correlationId: 'given' })

        const props = telemetry.findEvent('Player.Registered')
        assert.strictEqual(props?.service, 'custom')
        assert.strictEqual(props?.correlationId, 'given')
    })

    test('generates a correlation id when none is given', () => {
        service.trackGameEvent('Player.Registered', {})
        assert.match(String(telemetry.findEvent('Player.Registered')?.correlationId), /^[0-9a-f-]{36}$/)
    })

    test('replaces unknown names with Telemetry.EventName.Invalid', () => {
        const name: string = 'Player.Teleported'
        // Runtime guard for names that bypass the compile-time union
        service.trackGameEventStrict(name as 'Player.Registered', {})

        assert.deepStrictEqual(telemetry.eventNames(), ['Telemetry.EventName.Invalid'])
        assert.strictEqual(telemetry.findEvent('Telemetry.EventName.Invalid')?.requested, 'Player.Teleported')
    })

    test('records dependencies as HTTP calls', () => {
        service.trackDependency({ target: 'https://translator.test/', name: 'POST translate', durationMs: 12, success: false })

        assert.deepStrictEqual(telemetry.dependencies, [
            {
                dependencyTypeName: 'HTTP',
                target: 'https://translator.test/',
                name: 'POST translate',
                data: 'POST translate',
                duration: 12,
                success: false,
                resultCode: 0
            }
        ])
    })

    describe('inferService', () => {
        test('prefers QUIPLASH_SERVICE_NAME', () => {
            process.env.QUIPLASH_SERVICE_NAME = 'quiplash-staging'
            assert.strictEqual(inferService(), 'quiplash-staging')
        })

        test('detects the hosted Functions environment', () => {
            process.env.WEBSITE_SITE_NAME = 'quiplash-app'
            process.env.AZURE_FUNCTIONS_ENVIRONMENT = 'Production'
            assert.strictEqual(inferService(), 'backend-functions')
        })

        test('defaults to the local host label', () => {
            assert.strictEqual(inferService(), 'local-functions')
        })
    })

    describe('extractCorrelationId', () => {
        test('reads the x-correlation-id header', () => {
            const headers = new Map([['x-correlation-id', 'corr-9']])
            assert.strictEqual(extractCorrelationId(headers), 'corr-9')
        })

        test('generates an id when the header is absent', () => {
            assert.match(extractCorrelationId(new Map<string, string>()), /^[0-9a-f-]{36}$/)
            assert.match(extractCorrelationId(undefined), /^[0-9a-f-]{36}$/)
        })
    })
})
