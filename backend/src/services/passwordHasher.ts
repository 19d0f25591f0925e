/**
 * Password hashing for player credentials.
 * Stored form: `scrypt$<saltHex>$<hashHex>`.
 */
import { injectable } from 'inversify'
import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto'

function scryptAsync(password: string, salt: Buffer, keylen: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        scrypt(password, salt, keylen, (err, derived) => (err ? reject(err) : resolve(derived)))
    })
}

const SALT_BYTES = 16
const KEY_LENGTH = 64
const SCHEME = 'scrypt'

export interface IPasswordHasher {
    hash(password: string): Promise<string>
    verify(password: string, stored: string): Promise<boolean>
}

@injectable()
export class ScryptPasswordHasher implements IPasswordHasher {
    async hash(password: string): Promise<string> {
        const salt = randomBytes(SALT_BYTES)
        const derived = await scryptAsync(password, salt, KEY_LENGTH)
        return `${SCHEME}$${salt.toString('hex')}$${derived.toString('hex')}`
    }

    async verify(password: string, stored: string): Promise<boolean> {
        const parts = stored.split('$')
        if (parts.length !== 3 || parts[0] !== SCHEME) return false
        const salt = Buffer.from(parts[1], 'hex')
        const expected = Buffer.from(parts[2], 'hex')
        if (salt.length === 0 || expected.length === 0) return false
        const derived = await scryptAsync(password, salt, expected.length)
        return timingSafeEqual(derived, expected)
    }
}
