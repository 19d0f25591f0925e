/**
 * Builds the multi-language `texts` array for a new prompt.
 *
 * 1. detect the source language (translate to `en`, read detectedLanguage; empty → en)
 * 2. batch-translate into every other supported language
 * 3. retry one language per request for anything the batch did not return
 *
 * The original text is always the first entry, so the result is never empty.
 */
import { DEFAULT_LANGUAGE, type PromptText } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import type { ServicesConfig } from '../config/servicesConfig.js'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import type { ITranslatorClient } from './translatorClient.js'

@injectable()
export class PromptTranslationService {
    constructor(
        @inject(TOKENS.TranslatorClient) private translator: ITranslatorClient,
        @inject(TOKENS.ServicesConfig) private config: ServicesConfig,
        @inject(TelemetryService) private telemetryService: TelemetryService
    ) {}

    async detectLanguage(text: string): Promise<string> {
        const detection = await this.translator.translate(text, [DEFAULT_LANGUAGE])
        return detection?.detectedLanguage || DEFAULT_LANGUAGE
    }

    async translateToAll(text: string): Promise<PromptText[]> {
        const detected = await this.detectLanguage(text)
        const targets = this.config.supportedLanguages.filter((code) => code !== detected)
        const translated = new Map<string, string>()

        if (targets.length > 0) {
            const batch = await this.translator.translate(text, targets)
            for (const t of batch?.translations ?? []) {
                if (targets.includes(t.language) && !translated.has(t.language)) {
                    translated.set(t.language, t.text)
                }
            }
        }

        for (const code of targets) {
            if (translated.has(code)) continue
            const single = await this.translator.translate(text, [code])
            const match = single?.translations.find((t) => t.language === code)
            if (match) {
                translated.set(code, match.text)
            } else {
                this.telemetryService.trackGameEventStrict('Translation.Language.Missing', { language: code, detected })
            }
        }

        const texts: PromptText[] = [{ language: detected, text }]
        for (const code of targets) {
            const value = translated.get(code)
            if (value !== undefined) texts.push({ language: code, text: value })
        }
        return texts
    }
}
