import { API_MESSAGES } from '@quiplash/shared'
import assert from 'node:assert'
import { beforeEach, describe, test } from 'node:test'
import { playerLogin } from '../../src/handlers/playerLogin.js'
import { playerRegister } from '../../src/handlers/playerRegister.js'
import { playerUpdate } from '../../src/handlers/playerUpdate.js'
import { HandlerTestFixture } from '../helpers/TestFixture.js'

describe('Player handlers', () => {
    let fixture: HandlerTestFixture

    beforeEach(() => {
        fixture = new HandlerTestFixture()
    })

    describe('POST /player/register', () => {
        test('creates a player with zeroed counters and a hashed password', async () => {
            const res = await fixture.invoke(playerRegister, { body: { username: 'alice01', password: 'password1' } })

            assert.strictEqual(res.status, 201)
            assert.deepStrictEqual(res.jsonBody, { result: true, msg: 'OK' })

            const stored = await fixture.players.findByUsername('alice01')
            assert.ok(stored)
            assert.strictEqual(stored.games_played, 0)
            assert.strictEqual(stored.total_score, 0)
            assert.notStrictEqual(stored.password, 'password1')
            assert.ok(stored.password.startsWith('scrypt$'))
            assert.strictEqual(stored.created_utc, stored.updated_utc)
        })

        test('rejects a duplicate username with 409', async () => {
            await fixture.seedPlayer('alice01', 'password1')

            const res = await fixture.invoke(playerRegister, { body: { username: 'alice01', password: 'password2' } })

            assert.strictEqual(res.status, 409)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: 'Username already exists', code: 'UsernameExists' })
            assert.strictEqual((await fixture.players.listAll()).length, 1)
        })

        test('rejects usernames outside 5..12 characters', async () => {
            for (const username of ['abcd', 'abcdefghijklm']) {
                const res = await fixture.invoke(playerRegister, { body: { username, password: 'password1' } })
                assert.strictEqual(res.status, 400)
                assert.deepStrictEqual(res.jsonBody, { result: false, msg: API_MESSAGES.usernameLength, code: 'ValidationError' })
            }
        })

        test('accepts usernames at both length bounds', async () => {
            const short = await fixture.invoke(playerRegister, { body: { username: 'abcde', password: 'password1' } })
            const long = await fixture.invoke(playerRegister, { body: { username: 'abcdefghijkl', password: 'password1' } })
            assert.strictEqual(short.status, 201)
            assert.strictEqual(long.status, 201)
        })

        test('measures username length in characters rather than code units', async () => {
            const tooShort = await fixture.invoke(playerRegister, { body: { username: '😀😀😀', password: 'password1' } })
            const atLimit = await fixture.invoke(playerRegister, { body: { username: 'abcdefghij😀😀', password: 'password1' } })

            assert.strictEqual(tooShort.status, 400)
            assert.deepStrictEqual(tooShort.jsonBody, { result: false, msg: API_MESSAGES.usernameLength, code: 'ValidationError' })
            assert.strictEqual(atLimit.status, 201)
        })

        test('rejects passwords outside 8..12 characters', async () => {
            const res = await fixture.invoke(playerRegister, { body: { username: 'alice01', password: 'short' } })

            assert.strictEqual(res.status, 400)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: API_MESSAGES.passwordLength, code: 'ValidationError' })
        })

        test('checks the username before the password', async () => {
            const res = await fixture.invoke(playerRegister, { body: { username: 'abc', password: 'x' } })
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: API_MESSAGES.usernameLength, code: 'ValidationError' })
        })

        test('rejects a body that is not JSON', async () => {
            const res = await fixture.invoke(playerRegister, { body: 'not json' })

            assert.strictEqual(res.status, 400)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: 'Invalid JSON', code: 'InvalidJson' })
        })

        test('emits Player.Registered with the username attribute', async () => {
            await fixture.invoke(playerRegister, { body: { username: 'alice01', password: 'password1' } })

            const props = fixture.telemetry.findEvent('Player.Registered')
            assert.ok(props)
            assert.strictEqual(props['game.player.username'], 'alice01')
            assert.strictEqual(props.status, 201)
        })

        test('emits Player.Register.Rejected with normalized error attributes', async () => {
            await fixture.seedPlayer('alice01', 'password1')
            await fixture.invoke(playerRegister, { body: { username: 'alice01', password: 'password1' } })

            const props = fixture.telemetry.findEvent('Player.Register.Rejected')
            assert.ok(props)
            assert.strictEqual(props['game.error.code'], 'UsernameExists')
            assert.strictEqual(props['game.error.kind'], 'conflict')
            assert.strictEqual(props.status, 409)
        })
    })

    describe('GET|POST /player/login', () => {
        beforeEach(async () => {
            await fixture.seedPlayer('alice01', 'password1')
        })

        test('accepts correct credentials in the body', async () => {
            const res = await fixture.invoke(playerLogin, { body: { username: 'alice01', password: 'password1' } })

            assert.strictEqual(res.status, 200)
            assert.deepStrictEqual(res.jsonBody, { result: true, msg: 'OK' })
        })

        test('accepts credentials as query parameters on GET', async () => {
            const res = await fixture.invoke(playerLogin, { method: 'GET', query: { username: 'alice01', password: 'password1' } })

            assert.strictEqual(res.status, 200)
            assert.deepStrictEqual(res.jsonBody, { result: true, msg: 'OK' })
        })

        test('accepts credentials in a json query parameter', async () => {
            const res = await fixture.invoke(playerLogin, {
                method: 'GET',
                query: { json: JSON.stringify({ username: 'alice01', password: 'password1' }) }
            })

            assert.strictEqual(res.status, 200)
        })

        test('returns 401 for a wrong password', async () => {
            const res = await fixture.invoke(playerLogin, { body: { username: 'alice01', password: 'password2' } })

            assert.strictEqual(res.status, 401)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: 'Incorrect password', code: 'IncorrectPassword' })
        })

        test('returns 404 for an unknown username', async () => {
            const res = await fixture.invoke(playerLogin, { body: { username: 'nobody', password: 'password1' } })

            assert.strictEqual(res.status, 404)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: 'Username not found', code: 'PlayerNotFound' })
        })

        test('returns 400 when a credential is missing', async () => {
            const res = await fixture.invoke(playerLogin, { body: { username: 'alice01' } })

            assert.strictEqual(res.status, 400)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: 'Missing username or password', code: 'ValidationError' })
        })

        test('tracks failed and successful logins separately', async () => {
            await fixture.invoke(playerLogin, { body: { username: 'alice01', password: 'password2' } })
            await fixture.invoke(playerLogin, { body: { username: 'alice01', password: 'password1' } })

            assert.deepStrictEqual(fixture.telemetry.eventNames(), ['Player.Login.Failed', 'Player.Login.Succeeded'])
            assert.strictEqual(fixture.telemetry.findEvent('Player.Login.Failed')?.['game.error.kind'], 'unauthorized')
        })
    })

    describe('PUT|POST /player/update', () => {
        beforeEach(async () => {
            await fixture.seedPlayer('alice01', 'password1', { games_played: 2, total_score: 30 })
        })

        test('increments games played and adds the score', async () => {
            const res = await fixture.invoke(playerUpdate, { method: 'PUT', body: { username: 'alice01', score: 12 } })

            assert.strictEqual(res.status, 200)
            assert.deepStrictEqual(res.jsonBody, { result: true, msg: 'OK' })

            const stored = await fixture.players.findByUsername('alice01')
            assert.strictEqual(stored?.games_played, 3)
            assert.strictEqual(stored?.total_score, 42)
            assert.notStrictEqual(stored?.updated_utc, '2024-01-01T00:00:00.000Z')
        })

        test('accepts a negative score', async () => {
            await fixture.invoke(playerUpdate, { body: { username: 'alice01', score: -5 } })

            const stored = await fixture.players.findByUsername('alice01')
            assert.strictEqual(stored?.total_score, 25)
        })

        test('converts a numeric query-string score', async () => {
            const res = await fixture.invoke(playerUpdate, { method: 'PUT', query: { username: 'alice01', score: '5' } })

            assert.strictEqual(res.status, 200)
            const stored = await fixture.players.findByUsername('alice01')
            assert.strictEqual(stored?.total_score, 35)
        })

        test('rejects a fractional score', async () => {
            const res = await fixture.invoke(playerUpdate, { body: { username: 'alice01', score: 1.5 } })

            assert.strictEqual(res.status, 400)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: 'Score must be an integer', code: 'ValidationError' })
        })

        test('reports a null score as a missing field', async () => {
            const res = await fixture.invoke(playerUpdate, { body: { username: 'alice01', score: null } })

            assert.strictEqual(res.status, 400)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: 'Missing fields', code: 'ValidationError' })
        })

        test('rejects an update that would push the total past the safe integer range', async () => {
            await fixture.seedPlayer('bigscore', 'password1', { total_score: Number.MAX_SAFE_INTEGER })

            const res = await fixture.invoke(playerUpdate, { body: { username: 'bigscore', score: 1 } })

            assert.strictEqual(res.status, 400)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: 'Score out of range', code: 'ValidationError' })
            const stored = await fixture.players.findByUsername('bigscore')
            assert.strictEqual(stored?.total_score, Number.MAX_SAFE_INTEGER)
            assert.strictEqual(stored?.games_played, 0)
        })

        test('rejects a missing username', async () => {
            const res = await fixture.invoke(playerUpdate, { body: { score: 3 } })

            assert.strictEqual(res.status, 400)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: 'Missing fields', code: 'ValidationError' })
        })

        test('returns 404 for an unknown username', async () => {
            const res = await fixture.invoke(playerUpdate, { body: { username: 'nobody', score: 3 } })

            assert.strictEqual(res.status, 404)
            assert.deepStrictEqual(res.jsonBody, { result: false, msg: 'Username not found', code: 'PlayerNotFound' })
        })
    })
})
