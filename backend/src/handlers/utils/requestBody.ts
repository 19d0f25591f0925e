/**
 * Request input extraction.
 *
 * Handlers accept a JSON object body. Bodyless requests (GET) fall back to query parameters,
 * where a `json` parameter holding a JSON object wins over individual parameters.
 */
import type { HttpRequest } from '@azure/functions'

export type RequestInput = Record<string, unknown>

export type RequestInputResult = { ok: true; input: RequestInput } | { ok: false }

function isPlainObject(value: unknown): value is RequestInput {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseObject(text: string): RequestInputResult {
    try {
        const parsed: unknown = JSON.parse(text)
        return isPlainObject(parsed) ? { ok: true, input: parsed } : { ok: false }
    } catch {
        return { ok: false }
    }
}

async function safeReadBodyText(request: HttpRequest): Promise<string> {
    try {
        return (await request.text()).trim()
    } catch {
        return ''
    }
}

export async function readRequestInput(request: HttpRequest): Promise<RequestInputResult> {
    const text = await safeReadBodyText(request)
    if (text) {
        return parseObject(text)
    }

    const json = request.query.get('json')
    if (json !== null && json.trim() !== '') {
        return parseObject(json)
    }

    const input: RequestInput = {}
    request.query.forEach((value, key) => {
        input[key] = value
    })
    return { ok: true, input }
}
