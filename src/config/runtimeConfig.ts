import { resolve } from 'node:path'
import { ConfigError } from '../utils/errors.js'
import { LOG_LEVELS, checkLogFile, isLogLevel, logger } from '../utils/logger.js'

export interface RuntimeConfig {
    nodeEnv: 'development' | 'test' | 'production'
    configPath: string
    coinGeckoApiKey: string
    coinGeckoBaseUrl: string
    useFreeApi: boolean
    color: boolean
}

export const DEFAULT_CONFIG_PATH = 'config.yaml'
export const COINGECKO_PRO_URL = 'https://pro-api.coingecko.com/api/v3'
export const COINGECKO_FREE_URL = 'https://api.coingecko.com/api/v3'

const NODE_ENVS = new Set(['development', 'test', 'production'])

const parseBoolean = (value: string | undefined, fallback: boolean): boolean | undefined => {
    if (value === undefined || value.trim() === '') return fallback
    const normalized = value.trim().toLowerCase()
    if (normalized === 'true' || normalized === '1') return true
    if (normalized === 'false' || normalized === '0') return false
    return undefined
}

const isNodeEnv = (value: string): value is RuntimeConfig['nodeEnv'] => NODE_ENVS.has(value)

export function validateRuntimeConfigOrThrow(
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
): RuntimeConfig {
    const errors: Array<{ field: string, message: string }> = []

    const nodeEnvRaw = (env.NODE_ENV || 'development').trim().toLowerCase()
    if (!isNodeEnv(nodeEnvRaw)) {
        errors.push({
            field: 'NODE_ENV',
            message: `NODE_ENV '${env.NODE_ENV}' is invalid. Allowed values: development, test, production.`
        })
    }

    const configPathRaw = (env.DCA_CONFIG_PATH || DEFAULT_CONFIG_PATH).trim()
    if (!configPathRaw) {
        errors.push({ field: 'DCA_CONFIG_PATH', message: 'DCA_CONFIG_PATH must not be blank.' })
    }

    const useFreeApi = parseBoolean(env.USE_FREE_API, false)
    if (useFreeApi === undefined) {
        errors.push({ field: 'USE_FREE_API', message: `USE_FREE_API '${env.USE_FREE_API}' is invalid. Use true or false.` })
    }

    const apiKey = (env.COINGECKO_API_KEY || '').trim()

    const baseUrlRaw = (env.COINGECKO_BASE_URL || '').trim()
    let baseUrl = apiKey && !useFreeApi ? COINGECKO_PRO_URL : COINGECKO_FREE_URL
    if (baseUrlRaw) {
        try {
            const parsed = new URL(baseUrlRaw)
            if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
                errors.push({ field: 'COINGECKO_BASE_URL', message: `COINGECKO_BASE_URL '${baseUrlRaw}' must use http or https.` })
            }
            baseUrl = baseUrlRaw.replace(/\/+$/, '')
        } catch {
            errors.push({ field: 'COINGECKO_BASE_URL', message: `COINGECKO_BASE_URL '${baseUrlRaw}' is not a valid URL.` })
        }
    }

    const logLevelRaw = (env.LOG_LEVEL || '').trim().toLowerCase()
    if (logLevelRaw && !isLogLevel(logLevelRaw)) {
        errors.push({
            field: 'LOG_LEVEL',
            message: `LOG_LEVEL '${env.LOG_LEVEL}' is invalid. Allowed values: ${[...LOG_LEVELS].join(', ')}.`
        })
    }

    const logFileRaw = (env.LOG_FILE || '').trim()
    if (logFileRaw) {
        const problem = checkLogFile(resolve(cwd, logFileRaw))
        if (problem) {
            errors.push({ field: 'LOG_FILE', message: `LOG_FILE '${logFileRaw}' cannot be opened for writing: ${problem}` })
        }
    }

    if (errors.length > 0) {
        const message = errors.length === 1
            ? errors[0].message
            : errors.map((e, idx) => `(${idx + 1}) ${e.message}`).join(' ')
        throw new ConfigError(errors[0].field, message, { errors })
    }

    const config: RuntimeConfig = {
        nodeEnv: isNodeEnv(nodeEnvRaw) ? nodeEnvRaw : 'development',
        configPath: resolve(cwd, configPathRaw),
        coinGeckoApiKey: apiKey,
        coinGeckoBaseUrl: baseUrl,
        useFreeApi: useFreeApi === true,
        // https://no-color.org: any non-empty value disables colour
        color: !env.NO_COLOR
    }

    logger.debug('Runtime configuration loaded', buildRuntimeSummary(config))

    return config
}

export function buildRuntimeSummary(config: RuntimeConfig): Record<string, unknown> {
    return {
        nodeEnv: config.nodeEnv,
        configPath: config.configPath,
        priceApiHost: safeUrlHost(config.coinGeckoBaseUrl),
        apiKey: maskValue(config.coinGeckoApiKey, 3, 2),
        useFreeApi: config.useFreeApi,
        color: config.color
    }
}

function safeUrlHost(url: string): string {
    try {
        return new URL(url).host
    } catch {
        return '<invalid-url>'
    }
}

function maskValue(value: string, head: number, tail: number): string {
    if (!value) return '<unset>'
    if (value.length <= head + tail) return '<hidden>'
    return `${value.slice(0, head)}...${value.slice(-tail)}`
}
