/**
 * Application Insights sampling and probe filtering, applied in the appStart hook (cosmos mode only).
 */
import type { Contracts } from 'applicationinsights'

/** Request paths typical of vulnerability scanners; dropped before export */
const PROBE_PATTERNS = ['.env', '.php', '/.git/', 'phpinfo', '/config/', '/_profiler', 'wp-login']

export interface SamplingDecision {
    percentage: number
    adjusted: boolean
    reason?: string
    defaultSampling: number
}

/**
 * Resolve the sampling percentage from APPINSIGHTS_SAMPLING_PERCENTAGE.
 * Accepts a whole number (15) or a ratio (0.15); out-of-range values are clamped.
 * Default: 100 for development/test, 15 otherwise.
 */
export function resolveSamplingPercentage(raw: string | undefined, nodeEnv: string | undefined): SamplingDecision {
    const env = (nodeEnv || 'production').toLowerCase()
    const defaultSampling = env === 'development' || env === 'test' ? 100 : 15
    if (!raw) {
        return { percentage: defaultSampling, adjusted: false, defaultSampling }
    }

    const value = parseFloat(raw)
    if (Number.isNaN(value)) {
        return { percentage: defaultSampling, adjusted: true, reason: 'non-numeric value', defaultSampling }
    }

    const normalized = value > 0 && value <= 1 ? value * 100 : value
    const clamped = Math.min(100, Math.max(0, normalized))
    if (clamped !== normalized) {
        return { percentage: clamped, adjusted: true, reason: 'out-of-range value clamped', defaultSampling }
    }
    return { percentage: clamped, adjusted: false, defaultSampling }
}

export function isProbeRequest(envelope: Contracts.EnvelopeTelemetry): boolean {
    const data: unknown = envelope.data
    if (typeof data !== 'object' || data === null || !('baseData' in data)) return false
    const baseData = data.baseData
    if (typeof baseData !== 'object' || baseData === null) return false
    const target = 'url' in baseData && typeof baseData.url === 'string' ? baseData.url : 'name' in baseData ? baseData.name : ''
    const url = typeof target === 'string' ? target.toLowerCase() : ''
    return PROBE_PATTERNS.some((p) => url.includes(p))
}
