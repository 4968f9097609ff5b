import { closeSync, mkdirSync, openSync } from 'node:fs'
import { dirname } from 'node:path'
import pino, { type DestinationStream } from 'pino'
import { getErrorMessage } from './errors.js'
import { redactObject, redactString } from './secretRedactor.js'
import { getRunId } from './runContext.js'

export const DEFAULT_LOG_LEVEL = 'info'

export const LOG_LEVELS: ReadonlySet<string> = new Set([...Object.keys(pino.levels.values), 'silent'])

export const isLogLevel = (value: string): boolean => LOG_LEVELS.has(value)

/** Unknown levels fall back to the default; runtime config validation reports them. */
export const resolveLogLevel = (value: string | undefined): string => {
    const normalized = (value || '').trim().toLowerCase()
    return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL
}

/** Returns why `path` cannot be appended to, or undefined when it can. */
export function checkLogFile(path: string): string | undefined {
    try {
        mkdirSync(dirname(path), { recursive: true })
        closeSync(openSync(path, 'a'))
        return undefined
    } catch (error) {
        return getErrorMessage(error)
    }
}

// stdout carries the report, so logs go to stderr (and optionally a file)
const buildDestination = (logFile: string | undefined): DestinationStream => {
    const stderr = pino.destination({ dest: 2, sync: true })
    if (!logFile || checkLogFile(logFile) !== undefined) return stderr

    return pino.multistream([
        { level: 'trace', stream: stderr },
        { level: 'trace', stream: pino.destination({ dest: logFile, sync: true }) }
    ])
}

const baseLogger = pino({
    level: resolveLogLevel(process.env.LOG_LEVEL),
    base: {
        service: 'crypto-dca-advisor',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin() {
        const runId = getRunId()
        return runId ? { runId } : {}
    },
}, buildDestination(process.env.LOG_FILE?.trim() || undefined))

type LogFields = Record<string, unknown>

type LogMethod = (message: string, fields?: LogFields) => void

export interface AppLogger {
    error: LogMethod
    info: LogMethod
    debug: LogMethod
}

// message first, structured fields second; both pass through the secret redactor
const bind = (level: keyof AppLogger): LogMethod => (message, fields = {}) => {
    baseLogger[level](redactObject(fields), redactString(message))
}

export const logger: AppLogger = {
    error: bind('error'),
    info: bind('info'),
    debug: bind('debug'),
}
