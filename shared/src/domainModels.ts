/**
 * Core document shapes persisted in Cosmos DB (SQL API) and the HTTP envelope every endpoint returns.
 * Field names are snake_case because they are the stored / wire format.
 */

/** Player document. Container `player`, partition key `/id`. */
export interface PlayerDoc {
    id: string
    username: string
    /** scrypt hash in the form `scrypt$<saltHex>$<hashHex>` */
    password: string
    games_played: number
    total_score: number
    created_utc: string
    updated_utc: string
}

/** Player document as exposed over HTTP (credential stripped). */
export type PublicPlayer = Omit<PlayerDoc, 'password'>

/** One language rendition of a prompt. */
export interface PromptText {
    language: string
    text: string
}

export type ModerationSource = 'manual' | 'content-safety'

export interface ModerationRecord {
    source: ModerationSource
    /** Mean of the four content-safety category severities (content-safety source only) */
    averageSeverity?: number
    moderated_utc: string
}

/** Prompt document. Container `prompt`, partition key `/username`. */
export interface PromptDoc {
    id: string
    username: string
    prompt_text: string
    texts: PromptText[]
    approved: boolean
    moderation?: ModerationRecord
    created_utc: string
}

/** Document kinds retrievable through the utilities endpoint. */
export const DOCUMENT_TYPES = ['player', 'prompt'] as const

export function toPublicPlayer(doc: PlayerDoc): PublicPlayer {
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    const { password, ...rest } = doc
    return rest
}

/** Canonical envelope shape for HTTP responses. */
export type ApiResultEnvelope<T extends object = object> = { result: true; msg?: string } & T
export interface ApiFailureEnvelope {
    result: false
    msg: string
    code: string
}

/** Convenience constructors (no runtime dependency needed elsewhere). */
export function ok(msg: string): ApiResultEnvelope
export function ok<T extends object>(msg: string | undefined, extra: T): ApiResultEnvelope<T>
export function ok<T extends object>(msg: string | undefined, extra?: T): ApiResultEnvelope {
    return msg === undefined ? { result: true, ...(extra ?? {}) } : { result: true, msg, ...(extra ?? {}) }
}

export const fail = (code: string, msg: string): ApiFailureEnvelope => ({ result: false, msg, code })
