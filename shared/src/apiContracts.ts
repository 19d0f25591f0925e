/**
 * API request schemas (Zod) and response payload types for every HTTP endpoint.
 * Handlers validate the parsed body against these; the first issue's message becomes the response `msg`.
 */
import { z } from 'zod'
import { DOCUMENT_TYPES, type PublicPlayer, type PromptDoc } from './domainModels.js'

/** User-facing messages shared by handlers and tests. */
export const API_MESSAGES = {
    welcome: 'Welcome to Quiplash API',
    ok: 'OK',
    deleted: 'Deleted',
    invalidJson: 'Invalid JSON',
    invalidType: 'Invalid type',
    usernameLength: 'Username less than 5 characters or more than 12 characters',
    passwordLength: 'Password less than 8 characters or more than 12 characters',
    usernameExists: 'Username already exists',
    usernameNotFound: 'Username not found',
    incorrectPassword: 'Incorrect password',
    missingCredentials: 'Missing username or password',
    missingFields: 'Missing fields',
    scoreNotInteger: 'Score must be an integer',
    scoreOutOfRange: 'Score out of range',
    missingPromptFields: 'Missing username or prompt_text',
    missingPromptKey: 'Missing prompt_id or username',
    approvedNotBoolean: 'approved must be a boolean',
    promptNotFound: 'Prompt not found',
    promptApproved: 'Prompt approved',
    promptRejected: 'Prompt rejected',
    moderationUnavailable: 'Moderation service unavailable',
    internalError: 'Internal error'
} as const

export const USERNAME_MIN_LENGTH = 5
export const USERNAME_MAX_LENGTH = 12
export const PASSWORD_MIN_LENGTH = 8
export const PASSWORD_MAX_LENGTH = 12

/**
 * Query-string values arrive as strings; convert numeric text before number validation.
 * null and blank text count as missing.
 */
const numericText = (value: unknown): unknown => {
    if (value === null) return undefined
    if (typeof value !== 'string') return value
    return value.trim() === '' ? undefined : Number(value)
}

/** Accept real booleans plus the literal strings "true" / "false". */
const booleanText = (value: unknown): unknown => {
    if (value === 'true') return true
    if (value === 'false') return false
    return value
}

/** A required, non-empty string whose missing / empty / wrong-type message is the same. */
const requiredText = (message: string) => z.string({ required_error: message, invalid_type_error: message }).min(1, message)

/** Length in code points, so an emoji counts once. */
const characterCount = (value: string): number => [...value].length

const textOfLength = (min: number, max: number, message: string) =>
    z.string({ required_error: message, invalid_type_error: message }).refine((value) => {
        const length = characterCount(value)
        return length >= min && length <= max
    }, message)

// Requests

/** POST /api/player/register */
export const RegisterPlayerRequestSchema = z.object({
    username: textOfLength(USERNAME_MIN_LENGTH, USERNAME_MAX_LENGTH, API_MESSAGES.usernameLength),
    password: textOfLength(PASSWORD_MIN_LENGTH, PASSWORD_MAX_LENGTH, API_MESSAGES.passwordLength)
})

/** GET|POST /api/player/login */
export const LoginPlayerRequestSchema = z.object({
    username: requiredText(API_MESSAGES.missingCredentials),
    password: requiredText(API_MESSAGES.missingCredentials)
})

/** PUT|POST /api/player/update */
export const UpdatePlayerRequestSchema = z.object({
    username: requiredText(API_MESSAGES.missingFields),
    score: z.preprocess(
        numericText,
        z
            .number({ required_error: API_MESSAGES.missingFields, invalid_type_error: API_MESSAGES.scoreNotInteger })
            .int(API_MESSAGES.scoreNotInteger)
            .safe(API_MESSAGES.scoreOutOfRange)
    )
})

/** POST /api/prompt/create */
export const CreatePromptRequestSchema = z.object({
    username: requiredText(API_MESSAGES.missingPromptFields),
    prompt_text: requiredText(API_MESSAGES.missingPromptFields)
})

/** POST /api/prompt/moderate. Omitting `approved` means "ask the content-safety service" */
export const ModeratePromptRequestSchema = z.object({
    prompt_id: requiredText(API_MESSAGES.missingPromptKey),
    username: requiredText(API_MESSAGES.missingPromptKey),
    approved: z.preprocess(booleanText, z.boolean({ invalid_type_error: API_MESSAGES.approvedNotBoolean }).optional())
})

/** POST /api/prompt/delete */
export const DeletePromptRequestSchema = z.object({
    prompt_id: requiredText(API_MESSAGES.missingPromptKey),
    username: requiredText(API_MESSAGES.missingPromptKey)
})

/** GET|POST /api/utils/get */
export const GetDocumentsRequestSchema = z.object({
    type: z.enum(DOCUMENT_TYPES, { errorMap: () => ({ message: API_MESSAGES.invalidType }) })
})

// Responses (fields merged into the { result, msg } envelope)

/** POST /api/prompt/create */
export interface CreatePromptResponse {
    prompt_id: string
}

/** POST /api/prompt/moderate */
export interface ModeratePromptResponse {
    approved: boolean
}

/** GET|POST /api/utils/get */
export interface GetDocumentsResponse {
    data: PublicPlayer[] | PromptDoc[]
}

// ============================================================================
// Header Contract Definitions
// ============================================================================

/** Header carrying the correlation id in both directions. */
export const CORRELATION_HEADER = 'x-correlation-id'
