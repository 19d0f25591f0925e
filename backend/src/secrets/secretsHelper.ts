/** Secret retrieval helper with lazy caching, retry logic, and telemetry */

import { DefaultAzureCredential } from '@azure/identity'
import { SecretClient } from '@azure/keyvault-secrets'
import type { TelemetryService } from '../telemetry/TelemetryService.js'

/** Allowlisted secret keys that can be retrieved */
export const ALLOWED_SECRET_KEYS = ['translator-key', 'content-safety-key'] as const

export type AllowedSecretKey = (typeof ALLOWED_SECRET_KEYS)[number]

/**
 * Environment variables consulted when Key Vault is not configured.
 * The first non-empty variable wins; legacy names come last.
 */
export const SECRET_ENV_FALLBACKS: Record<AllowedSecretKey, readonly string[]> = {
    'translator-key': ['TRANSLATOR_KEY', 'TranslationKey'],
    'content-safety-key': ['CONTENT_SAFETY_KEY']
}

interface CachedSecret {
    value: string
    fetchedAt: number
}

export interface SecretFetchOptions {
    /** Maximum retry attempts (default: 3) */
    maxRetries?: number
    /** Initial retry delay in ms, doubled per attempt (default: 1000) */
    initialRetryDelayMs?: number
    /** Cache TTL in ms (default: 5 minutes) */
    cacheTtlMs?: number
    /** Optional telemetry service for emitting secret fetch events */
    telemetryService?: TelemetryService
    /** Environment holding KEYVAULT_NAME, NODE_ENV and the local fallbacks (default: process.env) */
    env?: NodeJS.ProcessEnv
}

type RetryOptions = Required<Omit<SecretFetchOptions, 'telemetryService' | 'env'>>
type ResolvedOptions = RetryOptions & Pick<SecretFetchOptions, 'telemetryService'>

const DEFAULT_OPTIONS: RetryOptions = {
    maxRetries: 3,
    initialRetryDelayMs: 1000,
    cacheTtlMs: 5 * 60 * 1000
}

/** In-memory cache for Key Vault secrets (env fallbacks are never cached) */
const secretCache = new Map<AllowedSecretKey, CachedSecret>()

/** Lazy-initialized Secret Client, one per vault */
let secretClient: { vaultName: string; client: SecretClient } | null = null

/**
 * Get or create the Secret Client using Managed Identity (DefaultAzureCredential).
 * Returns null when KEYVAULT_NAME is unset (local development).
 */
function getSecretClient(env: NodeJS.ProcessEnv): SecretClient | null {
    const keyVaultName = env.KEYVAULT_NAME
    if (!keyVaultName) {
        return null
    }

    if (secretClient?.vaultName !== keyVaultName) {
        secretClient = {
            vaultName: keyVaultName,
            client: new SecretClient(`https://${keyVaultName}.vault.azure.net`, new DefaultAzureCredential())
        }
    }

    return secretClient.client
}

export function isAllowedSecretKey(key: string): key is AllowedSecretKey {
    return (ALLOWED_SECRET_KEYS as readonly string[]).includes(key)
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Read the environment fallback for a secret.
 * Throws in production: there the value must come from Key Vault.
 */
function getLocalFallback(secretKey: AllowedSecretKey, env: NodeJS.ProcessEnv): string | undefined {
    for (const envVarName of SECRET_ENV_FALLBACKS[secretKey]) {
        const value = env[envVarName]?.trim()
        if (!value) continue

        if ((env.NODE_ENV || 'development') === 'production') {
            throw new Error(`Refusing to use local environment variable ${envVarName} in production. Configure Key Vault properly.`)
        }
        return value
    }
    return undefined
}

async function fetchSecretWithRetry(client: SecretClient, secretKey: AllowedSecretKey, options: ResolvedOptions): Promise<string> {
    let lastError: Error | undefined

    for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
        try {
            const secret = await client.getSecret(secretKey)
            if (!secret.value) {
                throw new Error(`Secret ${secretKey} exists but has no value`)
            }
            return secret.value
        } catch (err) {
            lastError = err instanceof Error ? err : new Error(String(err))

            if (attempt < options.maxRetries) {
                const delayMs = options.initialRetryDelayMs * Math.pow(2, attempt)
                options.telemetryService?.trackGameEventStrict('Secret.Fetch.Retry', {
                    secretKey,
                    attempt,
                    delayMs,
                    error: lastError.message
                })
                await sleep(delayMs)
            }
        }
    }

    throw new Error(`Failed to fetch secret ${secretKey} after ${options.maxRetries + 1} attempts: ${lastError?.message || 'unknown error'}`)
}

/**
 * Get a secret value with caching, retry, and telemetry.
 *
 * In production: fetches from Azure Key Vault using Managed Identity.
 * In development: falls back to environment variables (see SECRET_ENV_FALLBACKS).
 *
 * @throws Error if the key is not allowlisted or no source yields a value
 */
export async function getSecret(secretKey: string, options: SecretFetchOptions = {}): Promise<string> {
    const value = await getOptionalSecret(secretKey, options)
    if (value === undefined) {
        throw new Error(`Secret ${secretKey} not found. Configure KEYVAULT_NAME for production or set environment variable for local dev.`)
    }
    return value
}

/**
 * Like getSecret but resolves undefined when neither Key Vault nor the environment has the secret.
 * Used for optional integrations (translation, content safety) that degrade to null clients.
 */
export async function getOptionalSecret(secretKey: string, options: SecretFetchOptions = {}): Promise<string | undefined> {
    if (!isAllowedSecretKey(secretKey)) {
        throw new Error(`Secret key "${secretKey}" is not in allowlist. Allowed keys: ${ALLOWED_SECRET_KEYS.join(', ')}`)
    }

    const { env = process.env, ...fetchOptions } = options
    const opts: ResolvedOptions = { ...DEFAULT_OPTIONS, ...fetchOptions }
    const telemetry = opts.telemetryService
    const now = Date.now()

    const cached = secretCache.get(secretKey)
    if (cached && now - cached.fetchedAt < opts.cacheTtlMs) {
        telemetry?.trackGameEventStrict('Secret.Cache.Hit', { secretKey })
        return cached.value
    }
    telemetry?.trackGameEventStrict('Secret.Cache.Miss', { secretKey })

    const client = getSecretClient(env)
    if (client) {
        try {
            const value = await fetchSecretWithRetry(client, secretKey, opts)
            secretCache.set(secretKey, { value, fetchedAt: now })
            telemetry?.trackGameEventStrict('Secret.Fetch.Success', { secretKey, source: 'keyvault' })
            return value
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err)
            telemetry?.trackGameEventStrict('Secret.Fetch.Failure', { secretKey, source: 'keyvault', error: message })

            const fallback = getLocalFallback(secretKey, env)
            if (fallback) {
                telemetry?.trackGameEventStrict('Secret.Fetch.Fallback', { secretKey, source: 'env' })
                return fallback
            }
            throw err
        }
    }

    const localValue = getLocalFallback(secretKey, env)
    if (localValue) {
        telemetry?.trackGameEventStrict('Secret.Fetch.Success', { secretKey, source: 'local-env' })
        return localValue
    }

    telemetry?.trackGameEventStrict('Secret.Fetch.Failure', {
        secretKey,
        source: 'none',
        error: 'No Key Vault configured and no local fallback found'
    })
    return undefined
}

/**
 * Clear the secret cache (useful for testing or forcing refresh)
 */
export function clearSecretCache(telemetryService?: TelemetryService): void {
    secretCache.clear()
    telemetryService?.trackGameEventStrict('Secret.Cache.Clear', {})
}
