import assert from 'node:assert'
import { describe, test } from 'node:test'
import {
    classifyError,
    createErrorRecordingContext,
    ERROR_MESSAGE_MAX_LENGTH,
    inferErrorKindFromStatus,
    recordError
} from '../../src/telemetry/errorTelemetry.js'

describe('Error Telemetry Normalization', () => {
    describe('classifyError', () => {
        test('uses the classification table for known codes', () => {
            assert.strictEqual(classifyError('InvalidJson'), 'validation')
            assert.strictEqual(classifyError('PromptNotFound'), 'not-found')
            assert.strictEqual(classifyError('UsernameExists'), 'conflict')
            assert.strictEqual(classifyError('IncorrectPassword'), 'unauthorized')
            assert.strictEqual(classifyError('ModerationUnavailable'), 'unavailable')
            assert.strictEqual(classifyError('InternalError'), 'internal')
        })

        test('falls back to the HTTP status for unknown codes', () => {
            assert.strictEqual(classifyError('Teapot', 418), 'validation')
            assert.strictEqual(classifyError('Gone', 404), 'not-found')
        })

        test('defaults to internal without a status', () => {
            assert.strictEqual(classifyError('Mystery'), 'internal')
        })
    })

    test('inferErrorKindFromStatus maps status ranges', () => {
        assert.strictEqual(inferErrorKindFromStatus(401), 'unauthorized')
        assert.strictEqual(inferErrorKindFromStatus(403), 'unauthorized')
        assert.strictEqual(inferErrorKindFromStatus(409), 'conflict')
        assert.strictEqual(inferErrorKindFromStatus(503), 'unavailable')
        assert.strictEqual(inferErrorKindFromStatus(422), 'validation')
        assert.strictEqual(inferErrorKindFromStatus(502), 'internal')
    })

    describe('recordError', () => {
        test('attaches game.error.* attributes', () => {
            const ctx = createErrorRecordingContext('corr-1', 404)
            const props: Record<string, unknown> = {}

            const result = recordError(ctx, { code: 'PromptNotFound', message: 'Prompt not found' }, props)

            assert.deepStrictEqual(result, {
                recorded: true,
                attributes: { errorCode: 'PromptNotFound', errorMessage: 'Prompt not found', errorKind: 'not-found' }
            })
            assert.deepStrictEqual(props, {
                'game.error.code': 'PromptNotFound',
                'game.error.message': 'Prompt not found',
                'game.error.kind': 'not-found'
            })
            assert.strictEqual(ctx.errorRecorded, true)
        })

        test('keeps the first error per request', () => {
            const ctx = createErrorRecordingContext('corr-1')
            recordError(ctx, { code: 'InvalidJson', message: 'Invalid JSON' }, {})

            const props: Record<string, unknown> = {}
            const second = recordError(ctx, { code: 'InternalError', message: 'boom' }, props)

            assert.deepStrictEqual(second, { recorded: false })
            assert.deepStrictEqual(props, {})
        })

        test('truncates long messages', () => {
            const props: Record<string, unknown> = {}
            recordError(createErrorRecordingContext('corr-1'), { code: 'InternalError', message: 'x'.repeat(300) }, props)

            const message = String(props['game.error.message'])
            assert.strictEqual(message.length, ERROR_MESSAGE_MAX_LENGTH)
            assert.ok(message.endsWith('...'))
        })

        test('merges extra properties', () => {
            const props: Record<string, unknown> = {}
            recordError(createErrorRecordingContext('corr-1'), { code: 'InvalidJson', message: 'Invalid JSON', properties: { field: 'username' } }, props)
            assert.strictEqual(props.field, 'username')
        })
    })
})
