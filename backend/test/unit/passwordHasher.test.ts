import assert from 'node:assert'
import { describe, test } from 'node:test'
import { ScryptPasswordHasher } from '../../src/services/passwordHasher.js'

describe('ScryptPasswordHasher', () => {
    const hasher = new ScryptPasswordHasher()

    test('produces scheme$salt$hash with a 16-byte salt and 64-byte key', async () => {
        const stored = await hasher.hash('password1')
        const [scheme, salt, hash] = stored.split('$')

        assert.strictEqual(scheme, 'scrypt')
        assert.strictEqual(salt.length, 32)
        assert.strictEqual(hash.length, 128)
    })

    test('salts every hash', async () => {
        assert.notStrictEqual(await hasher.hash('password1'), await hasher.hash('password1'))
    })

    test('verifies the right password only', async () => {
        const stored = await hasher.hash('password1')

        assert.strictEqual(await hasher.verify('password1', stored), true)
        assert.strictEqual(await hasher.verify('password2', stored), false)
    })

    test('rejects malformed stored values', async () => {
        assert.strictEqual(await hasher.verify('password1', 'password1'), false)
        assert.strictEqual(await hasher.verify('password1', 'bcrypt$00$00'), false)
        assert.strictEqual(await hasher.verify('password1', 'scrypt$$'), false)
    })
})
