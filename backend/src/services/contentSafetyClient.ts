/**
 * Azure AI Content Safety client (text:analyze).
 *
 * Configuration comes from ServicesConfig.contentSafety (CONTENT_SAFETY_ENDPOINT, CONTENT_SAFETY_KEY).
 * Returns null on any failure or when not configured; never throws.
 */

import axios, { type AxiosInstance } from 'axios'
import { injectable } from 'inversify'
import { z } from 'zod'
import { CONTENT_SAFETY_API_VERSION, type ContentSafetyConfig } from '../config/servicesConfig.js'
import type { TelemetryService } from '../telemetry/TelemetryService.js'

export const CONTENT_SAFETY_CATEGORIES = ['Hate', 'SelfHarm', 'Sexual', 'Violence'] as const
export type ContentSafetyCategory = (typeof CONTENT_SAFETY_CATEGORIES)[number]

export interface ContentSafetyAnalysis {
    severities: Record<ContentSafetyCategory, number>
    /** Sum of the four category severities divided by four */
    averageSeverity: number
}

export interface IContentSafetyClient {
    /**
     * @returns null on failure or when the service is not configured
     * @throws Never
     */
    analyze(text: string): Promise<ContentSafetyAnalysis | null>
}

const AnalyzeResponseSchema = z.object({
    categoriesAnalysis: z.array(z.object({ category: z.string(), severity: z.number().optional() })).default([])
})

/**
 * Compute per-category severities and their mean. Categories the service did not report count as 0.
 */
export function summarizeSeverities(categoriesAnalysis: ReadonlyArray<{ category: string; severity?: number }>): ContentSafetyAnalysis {
    const severities: Record<ContentSafetyCategory, number> = { Hate: 0, SelfHarm: 0, Sexual: 0, Violence: 0 }
    for (const category of CONTENT_SAFETY_CATEGORIES) {
        const item = categoriesAnalysis.find((c) => c.category === category)
        severities[category] = item?.severity ?? 0
    }
    const total = CONTENT_SAFETY_CATEGORIES.reduce((sum, c) => sum + severities[c], 0)
    return { severities, averageSeverity: total / CONTENT_SAFETY_CATEGORIES.length }
}

/**
 * No-op client (used when Content Safety isn't configured).
 */
@injectable()
export class NullContentSafetyClient implements IContentSafetyClient {
    async analyze(): Promise<ContentSafetyAnalysis | null> {
        return null
    }
}

@injectable()
export class AzureContentSafetyClient implements IContentSafetyClient {
    private http: AxiosInstance

    constructor(
        private config: ContentSafetyConfig,
        private telemetryService?: TelemetryService,
        http?: AxiosInstance
    ) {
        this.http = http ?? axios.create()
    }

    async analyze(text: string): Promise<ContentSafetyAnalysis | null> {
        const started = Date.now()
        try {
            const response = await this.http.post(
                `${this.config.endpoint}contentsafety/text:analyze`,
                { text, categories: [...CONTENT_SAFETY_CATEGORIES], haltOnBlocklistHit: false },
                {
                    params: { 'api-version': CONTENT_SAFETY_API_VERSION },
                    headers: {
                        'Ocp-Apim-Subscription-Key': this.config.key,
                        'Content-Type': 'application/json'
                    },
                    timeout: this.config.timeoutMs
                }
            )
            this.trackDependency(Date.now() - started, true, response.status)

            const parsed = AnalyzeResponseSchema.safeParse(response.data)
            if (!parsed.success) {
                this.trackFailure('invalid-response', response.status)
                return null
            }

            const analysis = summarizeSeverities(parsed.data.categoriesAnalysis)
            this.telemetryService?.trackGameEventStrict('ContentSafety.Analysis.Completed', {
                averageSeverity: analysis.averageSeverity,
                ...analysis.severities
            })
            return analysis
        } catch (error) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined
            this.trackDependency(Date.now() - started, false, status)
            this.trackFailure(error instanceof Error ? error.message : String(error), status)
            return null
        }
    }

    private trackDependency(durationMs: number, success: boolean, status: number | undefined): void {
        this.telemetryService?.trackDependency({
            target: this.config.endpoint,
            name: 'POST contentsafety/text:analyze',
            durationMs,
            success,
            resultCode: status
        })
    }

    private trackFailure(reason: string, status: number | undefined): void {
        this.telemetryService?.trackGameEventStrict('ContentSafety.Request.Failed', { httpStatus: status, reason })
    }
}
