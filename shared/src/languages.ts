/**
 * Language codes prompts are translated into.
 * Codes follow the Azure Translator language identifiers (BCP-47 with script subtags where needed).
 */

export const DEFAULT_SUPPORTED_LANGUAGES = ['en', 'es', 'it', 'sv', 'ru', 'id', 'bg', 'zh-Hans'] as const

/** Fallback when language detection yields nothing. */
export const DEFAULT_LANGUAGE = 'en'

/**
 * Parse a comma-separated language list (e.g. from SUPPORTED_LANGUAGES).
 * Blank entries and duplicates are dropped; an empty result falls back to the defaults.
 */
export function parseLanguageList(raw: string | undefined | null): string[] {
    if (!raw) return [...DEFAULT_SUPPORTED_LANGUAGES]
    const seen = new Set<string>()
    for (const part of raw.split(',')) {
        const code = part.trim()
        if (code) seen.add(code)
    }
    return seen.size > 0 ? [...seen] : [...DEFAULT_SUPPORTED_LANGUAGES]
}
