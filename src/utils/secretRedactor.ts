/**
 * Redacts CoinGecko API keys from strings, URLs, and objects before they reach the logs.
 */

// CoinGecko keys are issued as CG- followed by an alphanumeric token
const CG_API_KEY_REGEX = /\bCG-[A-Za-z0-9]{16,}/g
// ?api_key=SECRET or &x_cg_pro_api_key=SECRET
const QUERY_PARAM_KEY_REGEX = /([?&](?:api_key|apikey|x_cg_pro_api_key|x_cg_demo_api_key)=)[^&\s]+/gi

const SENSITIVE_KEYS = new Set(['x-cg-pro-api-key', 'x-cg-demo-api-key', 'authorization', 'apikey', 'api_key', 'coingeckoapikey'])

export const REDACTED_HINT = '[REDACTED]'

export function redactString(str: string): string {
    return str
        .replace(CG_API_KEY_REGEX, REDACTED_HINT)
        .replace(QUERY_PARAM_KEY_REGEX, `$1${REDACTED_HINT}`)
}

/**
 * Deeply traverses an object or array and redacts sensitive string values.
 * Error instances are flattened to plain objects so their message is redacted too.
 */
export function redactObject(value: unknown): unknown {
    if (value === null || value === undefined) return value

    if (typeof value === 'string') {
        return redactString(value)
    }

    if (Array.isArray(value)) {
        return value.map(item => redactObject(item))
    }

    if (value instanceof Error) {
        return {
            name: value.name,
            message: redactString(value.message),
            stack: value.stack ? redactString(value.stack) : undefined
        }
    }

    if (typeof value === 'object') {
        const redacted: Record<string, unknown> = {}
        for (const [key, entry] of Object.entries(value)) {
            redacted[key] = SENSITIVE_KEYS.has(key.toLowerCase()) && entry
                ? REDACTED_HINT
                : redactObject(entry)
        }
        return redacted
    }

    return value
}
