/**
 * Telemetry Service - Central service for emitting game telemetry events
 *
 * Provides enriched telemetry methods that wrap ITelemetryClient.
 * Repositories and services inject this; handlers go through BaseHandler.track().
 */
import { CORRELATION_HEADER, isGameEventName, type GameEventName, SERVICE_BACKEND, SERVICE_LOCAL } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { TOKENS } from '../di/tokens.js'
import type { ITelemetryClient } from './ITelemetryClient.js'

/** Minimal header accessor shared by HttpRequest.headers and test doubles */
export interface HeaderSource {
    get(name: string): string | null | undefined
}

@injectable()
export class TelemetryService {
    constructor(@inject(TOKENS.TelemetryClient) private client: ITelemetryClient) {}

    /**
     * Track a game event with automatic enrichment
     * @param name - Event name (should be from GAME_EVENT_NAMES)
     * @param properties - Event properties
     */
    trackGameEvent(name: string, properties?: Record<string, unknown>): void {
        const finalProps: Record<string, unknown> = { ...properties }

        if (finalProps.service === undefined) {
            finalProps.service = inferService()
        }

        const pm = process.env.PERSISTENCE_MODE
        if (pm && finalProps.persistenceMode === undefined) {
            finalProps.persistenceMode = pm
        }

        // Always attach correlationId; generate if not supplied
        if (finalProps.correlationId === undefined) {
            finalProps.correlationId = randomUUID()
        }

        this.client.trackEvent({ name, properties: finalProps })
    }

    /**
     * Track a game event with strict name validation.
     * Unknown names are replaced by Telemetry.EventName.Invalid.
     */
    trackGameEventStrict(name: GameEventName, properties: Record<string, unknown>): void {
        if (!isGameEventName(name)) {
            this.trackGameEvent('Telemetry.EventName.Invalid', { requested: name })
            return
        }
        this.trackGameEvent(name, properties)
    }

    /** Record an outbound HTTP / database call */
    trackDependency(dependency: { target: string; name: string; durationMs: number; success: boolean; resultCode?: number | string }): void {
        this.client.trackDependency({
            dependencyTypeName: 'HTTP',
            target: dependency.target,
            name: dependency.name,
            data: dependency.name,
            duration: dependency.durationMs,
            success: dependency.success,
            resultCode: dependency.resultCode ?? (dependency.success ? 200 : 0)
        })
    }
}

export function inferService(): string {
    const svc = process.env.QUIPLASH_SERVICE_NAME
    if (svc) return svc
    if (process.env.WEBSITE_SITE_NAME && process.env.AZURE_FUNCTIONS_ENVIRONMENT) {
        return SERVICE_BACKEND
    }
    return SERVICE_LOCAL
}

export function extractCorrelationId(headers: HeaderSource | undefined): string {
    try {
        return headers?.get(CORRELATION_HEADER) || randomUUID()
    } catch {
        return randomUUID()
    }
}
