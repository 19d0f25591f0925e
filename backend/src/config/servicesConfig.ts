/**
 * External cognitive-service configuration (Azure Translator, Azure AI Content Safety).
 *
 * Both integrations are optional: a missing endpoint or key yields `undefined` for that block
 * and the container binds a null client instead.
 */
import { parseLanguageList } from '@quiplash/shared'
import { getOptionalSecret } from '../secrets/secretsHelper.js'
import type { TelemetryService } from '../telemetry/TelemetryService.js'

export const DEFAULT_TRANSLATOR_REGION = 'francecentral'
export const TRANSLATOR_API_VERSION = '3.0'
export const CONTENT_SAFETY_API_VERSION = '2023-10-01'
/** Prompts whose mean category severity reaches this value are rejected */
export const DEFAULT_SEVERITY_THRESHOLD = 1
export const DEFAULT_EXTERNAL_TIMEOUT_MS = 10_000

export interface TranslatorConfig {
    endpoint: string
    key: string
    region: string
    timeoutMs: number
}

export interface ContentSafetyConfig {
    endpoint: string
    key: string
    timeoutMs: number
}

export interface ServicesConfig {
    translator?: TranslatorConfig
    contentSafety?: ContentSafetyConfig
    supportedLanguages: string[]
    severityThreshold: number
}

/**
 * Normalize a cognitive-services endpoint: add https:// when no scheme is present and ensure a trailing slash.
 * Returns an empty string for blank input.
 */
export function normalizeEndpoint(raw: string | undefined): string {
    let base = (raw || '').trim()
    if (!base) return ''
    if (!base.startsWith('http')) {
        base = `https://${base}`
    }
    if (!base.endsWith('/')) {
        base += '/'
    }
    return base
}

/**
 * Read a positive number from the environment.
 * A set but unusable value is discarded with a warning and Config.Value.Ignored.
 */
function readPositiveNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, telemetryService?: TelemetryService): number {
    const raw = env[name]?.trim()
    if (!raw) return fallback
    const value = parseFloat(raw)
    if (Number.isFinite(value) && value > 0) return value

    console.warn(`[servicesConfig] ${name}=${raw} is not a positive number; using ${fallback}.`)
    telemetryService?.trackGameEventStrict('Config.Value.Ignored', { setting: name, value: raw, applied: fallback })
    return fallback
}

export async function loadServicesConfigAsync(env: NodeJS.ProcessEnv = process.env, telemetryService?: TelemetryService): Promise<ServicesConfig> {
    const timeoutMs = readPositiveNumber(env, 'EXTERNAL_SERVICE_TIMEOUT_MS', DEFAULT_EXTERNAL_TIMEOUT_MS, telemetryService)

    const translatorEndpoint = normalizeEndpoint(env.TRANSLATOR_ENDPOINT || env.TranslationEndpoint)
    const translatorKey = translatorEndpoint ? await getOptionalSecret('translator-key', { telemetryService, env }) : undefined

    const contentSafetyEndpoint = normalizeEndpoint(env.CONTENT_SAFETY_ENDPOINT)
    const contentSafetyKey = contentSafetyEndpoint ? await getOptionalSecret('content-safety-key', { telemetryService, env }) : undefined

    return {
        translator:
            translatorEndpoint && translatorKey
                ? {
                      endpoint: translatorEndpoint,
                      key: translatorKey,
                      region: env.TRANSLATOR_REGION?.trim() || DEFAULT_TRANSLATOR_REGION,
                      timeoutMs
                  }
                : undefined,
        contentSafety:
            contentSafetyEndpoint && contentSafetyKey ? { endpoint: contentSafetyEndpoint, key: contentSafetyKey, timeoutMs } : undefined,
        supportedLanguages: parseLanguageList(env.SUPPORTED_LANGUAGES),
        severityThreshold: readPositiveNumber(env, 'CONTENT_SAFETY_SEVERITY_THRESHOLD', DEFAULT_SEVERITY_THRESHOLD, telemetryService)
    }
}
