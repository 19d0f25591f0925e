import assert from 'node:assert'
import { beforeEach, describe, test } from 'node:test'
import type { ContentSafetyConfig } from '../../src/config/servicesConfig.js'
import { AzureContentSafetyClient, NullContentSafetyClient, summarizeSeverities } from '../../src/services/contentSafetyClient.js'
import { TelemetryService } from '../../src/telemetry/TelemetryService.js'
import { createAxiosStub, requestBody } from '../mocks/axiosStub.js'
import { MockTelemetryClient } from '../mocks/MockTelemetryClient.js'

const config: ContentSafetyConfig = { endpoint: 'https://safety.test/', key: 'test-secret', timeoutMs: 5000 }

describe('summarizeSeverities', () => {
    test('averages the four categories', () => {
        const analysis = summarizeSeverities([
            { category: 'Hate', severity: 2 },
            { category: 'SelfHarm', severity: 0 },
            { category: 'Sexual', severity: 4 },
            { category: 'Violence', severity: 6 }
        ])

        assert.deepStrictEqual(analysis.severities, { Hate: 2, SelfHarm: 0, Sexual: 4, Violence: 6 })
        assert.strictEqual(analysis.averageSeverity, 3)
    })

    test('counts missing categories and severities as zero', () => {
        const analysis = summarizeSeverities([{ category: 'Hate', severity: 2 }, { category: 'Violence' }])

        assert.deepStrictEqual(analysis.severities, { Hate: 2, SelfHarm: 0, Sexual: 0, Violence: 0 })
        assert.strictEqual(analysis.averageSeverity, 0.5)
    })

    test('ignores categories outside the four', () => {
        assert.strictEqual(summarizeSeverities([{ category: 'Profanity', severity: 6 }]).averageSeverity, 0)
    })
})

describe('AzureContentSafetyClient', () => {
    let telemetry: MockTelemetryClient
    let telemetryService: TelemetryService

    beforeEach(() => {
        telemetry = new MockTelemetryClient()
        telemetryService = new TelemetryService(telemetry)
    })

    test('posts the text for analysis and summarizes the reply', async () => {
        const stub = createAxiosStub(() => ({
            status: 200,
            data: {
                blocklistsMatch: [],
                categoriesAnalysis: [
                    { category: 'Hate', severity: 2 },
                    { category: 'SelfHarm', severity: 0 },
                    { category: 'Sexual', severity: 0 },
                    { category: 'Violence', severity: 2 }
                ]
            }
        }))
        const client = new AzureContentSafetyClient(config, telemetryService, stub.http)

        const analysis = await client.analyze('Hello world')

        assert.strictEqual(analysis?.averageSeverity, 1)
        const [request] = stub.requests
        assert.strictEqual(request.url, 'https://safety.test/contentsafety/text:analyze')
        assert.deepStrictEqual(request.params, { 'api-version': '2023-10-01' })
        assert.deepStrictEqual(requestBody(request), {
            text: 'Hello world',
            categories: ['Hate', 'SelfHarm', 'Sexual', 'Violence'],
            haltOnBlocklistHit: false
        })
        assert.strictEqual(request.headers.get('Ocp-Apim-Subscription-Key'), 'test-secret')
        assert.strictEqual(telemetry.findEvent('ContentSafety.Analysis.Completed')?.averageSeverity, 1)
    })

    test('returns null and tracks the failure on an HTTP error', async () => {
        const stub = createAxiosStub(() => ({ status: 401, data: { error: { code: 'Unauthorized' } } }))
        const client = new AzureContentSafetyClient(config, telemetryService, stub.http)

        assert.strictEqual(await client.analyze('Hello world'), null)
        assert.strictEqual(telemetry.findEvent('ContentSafety.Request.Failed')?.httpStatus, 401)
        assert.strictEqual(telemetry.dependencies[0].success, false)
    })

    test('returns null for an unexpected response shape', async () => {
        const stub = createAxiosStub(() => ({ status: 200, data: 'not an object' }))
        const client = new AzureContentSafetyClient(config, telemetryService, stub.http)

        assert.strictEqual(await client.analyze('Hello world'), null)
        assert.strictEqual(telemetry.findEvent('ContentSafety.Request.Failed')?.reason, 'invalid-response')
    })
})

describe('NullContentSafetyClient', () => {
    test('always returns null', async () => {
        assert.strictEqual(await new NullContentSafetyClient().analyze(), null)
    })
})
