/**
 * Azure Translator (REST v3) client.
 *
 * Configuration comes from ServicesConfig.translator (TRANSLATOR_ENDPOINT, TRANSLATOR_KEY, TRANSLATOR_REGION).
 * When it is absent the container binds NullTranslatorClient instead.
 *
 * Neither implementation throws: failures are tracked and surface as `null`.
 */

import type { PromptText } from '@quiplash/shared'
import axios, { type AxiosInstance } from 'axios'
import { injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import { TRANSLATOR_API_VERSION, type TranslatorConfig } from '../config/servicesConfig.js'
import type { TelemetryService } from '../telemetry/TelemetryService.js'

export interface TranslationResult {
    /** Source language reported by the service (absent when it could not tell) */
    detectedLanguage?: string
    translations: PromptText[]
}

export interface ITranslatorClient {
    /**
     * Translate one text into each of `to`.
     * @returns null on any failure
     * @throws Never
     */
    translate(text: string, to: string[]): Promise<TranslationResult | null>
}

const TranslateResponseSchema = z
    .array(
        z.object({
            detectedLanguage: z.object({ language: z.string(), score: z.number().optional() }).optional(),
            translations: z.array(z.object({ text: z.string(), to: z.string() }))
        })
    )
    .min(1)

/**
 * No-op translator (used when Azure Translator isn't configured).
 */
@injectable()
export class NullTranslatorClient implements ITranslatorClient {
    async translate(): Promise<TranslationResult | null> {
        return null
    }
}

@injectable()
export class AzureTranslatorClient implements ITranslatorClient {
    private http: AxiosInstance

    /**
     * @param http - Pre-built axios instance (tests pass one with a custom adapter)
     */
    constructor(
        private config: TranslatorConfig,
        private telemetryService?: TelemetryService,
        http?: AxiosInstance
    ) {
        this.http = http ?? axios.create()
    }

    async translate(text: string, to: string[]): Promise<TranslationResult | null> {
        const started = Date.now()
        try {
            const response = await this.http.post(`${this.config.endpoint}translate`, [{ Text: text }], {
                params: { 'api-version': TRANSLATOR_API_VERSION, to },
                paramsSerializer: { indexes: null },
                headers: {
                    'Ocp-Apim-Subscription-Key': this.config.key,
                    'Ocp-Apim-Subscription-Region': this.config.region,
                    'Content-Type': 'application/json',
                    'X-ClientTraceId': randomUUID()
                },
                timeout: this.config.timeoutMs
            })
            this.trackDependency(to, Date.now() - started, true, response.status)

            const parsed = TranslateResponseSchema.safeParse(response.data)
            if (!parsed.success) {
                this.trackFailure(to, 'invalid-response', response.status)
                return null
            }

            const [first] = parsed.data
            return {
                detectedLanguage: first.detectedLanguage?.language || undefined,
                translations: first.translations.map((t) => ({ language: t.to, text: t.text }))
            }
        } catch (error) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined
            this.trackDependency(to, Date.now() - started, false, status)
            this.trackFailure(to, error instanceof Error ? error.message : String(error), status)
            return null
        }
    }

    private trackDependency(to: string[], durationMs: number, success: boolean, status: number | undefined): void {
        this.telemetryService?.trackDependency({
            target: this.config.endpoint,
            name: `POST translate?to=${to.join(',')}`,
            durationMs,
            success,
            resultCode: status
        })
    }

    private trackFailure(to: string[], reason: string, status: number | undefined): void {
        this.telemetryService?.trackGameEventStrict('Translation.Request.Failed', {
            targets: to.join(','),
            httpStatus: status,
            reason
        })
    }
}
