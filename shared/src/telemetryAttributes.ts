/**
 * Domain-Specific Telemetry Attribute Helpers
 *
 * Provides centralized utilities for attaching structured game.* attributes to telemetry events.
 * Naming convention: game.<domain>.<attribute> (lowercase with dots).
 */

/**
 * Approved domain attribute keys for telemetry events.
 * Use these constants to ensure consistent key naming across the codebase.
 */
export const TELEMETRY_ATTRIBUTE_KEYS = {
    /** Player username (the public identity in this game) */
    PLAYER_USERNAME: 'game.player.username',
    /** Prompt document id */
    PROMPT_ID: 'game.prompt.id',
    /** Moderation outcome source (manual | content-safety) */
    MODERATION_SOURCE: 'game.moderation.source',
    /** Normalized error code */
    ERROR_CODE: 'game.error.code',
    /** Error message (truncated) */
    ERROR_MESSAGE: 'game.error.message',
    /** Error classification */
    ERROR_KIND: 'game.error.kind'
} as const

export type TelemetryAttributeKey = (typeof TELEMETRY_ATTRIBUTE_KEYS)[keyof typeof TELEMETRY_ATTRIBUTE_KEYS]

/** Messages longer than this are truncated before being attached to telemetry */
export const ERROR_MESSAGE_MAX_LENGTH = 256

export type ErrorKind = 'validation' | 'not-found' | 'conflict' | 'unauthorized' | 'unavailable' | 'internal'

export interface ErrorEventAttributes {
    errorCode: string
    errorMessage: string
    errorKind: ErrorKind
}

export interface PlayerEventAttributes {
    username?: string | null
}

export interface PromptEventAttributes {
    promptId?: string | null
    username?: string | null
    moderationSource?: string | null
}

/**
 * Enrich telemetry properties with player attributes.
 * Omits attributes if values are null/undefined (conditional presence).
 */
export function enrichPlayerAttributes(properties: Record<string, unknown>, attrs: PlayerEventAttributes): Record<string, unknown> {
    if (attrs.username) {
        properties[TELEMETRY_ATTRIBUTE_KEYS.PLAYER_USERNAME] = attrs.username
    }
    return properties
}

export function enrichPromptAttributes(properties: Record<string, unknown>, attrs: PromptEventAttributes): Record<string, unknown> {
    if (attrs.promptId) {
        properties[TELEMETRY_ATTRIBUTE_KEYS.PROMPT_ID] = attrs.promptId
    }
    if (attrs.username) {
        properties[TELEMETRY_ATTRIBUTE_KEYS.PLAYER_USERNAME] = attrs.username
    }
    if (attrs.moderationSource) {
        properties[TELEMETRY_ATTRIBUTE_KEYS.MODERATION_SOURCE] = attrs.moderationSource
    }
    return properties
}

/**
 * Enrich telemetry properties with normalized error attributes.
 * Messages beyond ERROR_MESSAGE_MAX_LENGTH are cut and suffixed with an ellipsis.
 */
export function enrichErrorAttributes(properties: Record<string, unknown>, attrs: ErrorEventAttributes): Record<string, unknown> {
    properties[TELEMETRY_ATTRIBUTE_KEYS.ERROR_CODE] = attrs.errorCode
    properties[TELEMETRY_ATTRIBUTE_KEYS.ERROR_MESSAGE] =
        attrs.errorMessage.length > ERROR_MESSAGE_MAX_LENGTH
            ? `${attrs.errorMessage.slice(0, ERROR_MESSAGE_MAX_LENGTH - 3)}...`
            : attrs.errorMessage
    properties[TELEMETRY_ATTRIBUTE_KEYS.ERROR_KIND] = attrs.errorKind
    return properties
}
