/**
 * Automatic prompt moderation through the content-safety service.
 */
import type { PromptDoc } from '@quiplash/shared'
import { inject, injectable } from 'inversify'
import type { ServicesConfig } from '../config/servicesConfig.js'
import { TOKENS } from '../di/tokens.js'
import type { IContentSafetyClient } from './contentSafetyClient.js'

export interface AutomaticModerationDecision {
    approved: boolean
    averageSeverity: number
}

/** English rendition of a prompt, falling back to the text as submitted. */
export function englishText(prompt: Pick<PromptDoc, 'texts' | 'prompt_text'>): string {
    return prompt.texts.find((t) => t.language === 'en')?.text ?? prompt.prompt_text
}

@injectable()
export class PromptModerationService {
    constructor(
        @inject(TOKENS.ContentSafetyClient) private contentSafety: IContentSafetyClient,
        @inject(TOKENS.ServicesConfig) private config: ServicesConfig
    ) {}

    /**
     * Approve iff the mean severity is below the configured threshold.
     * @returns null when the service is unavailable
     */
    async decide(prompt: PromptDoc): Promise<AutomaticModerationDecision | null> {
        const analysis = await this.contentSafety.analyze(englishText(prompt))
        if (!analysis) return null
        return {
            approved: analysis.averageSeverity < this.config.severityThreshold,
            averageSeverity: analysis.averageSeverity
        }
    }
}
