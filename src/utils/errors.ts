export type ErrorCategory = 'ConfigError' | 'NetworkError' | 'DataError'

const EXIT_CODES: Record<ErrorCategory, number> = {
    ConfigError: 2,
    NetworkError: 3,
    DataError: 4
}

export const UNEXPECTED_EXIT_CODE = 1

export class AdvisorError extends Error {
    category: ErrorCategory
    exitCode: number
    details?: unknown

    constructor(category: ErrorCategory, message: string, details?: unknown) {
        super(message)
        this.name = category
        this.category = category
        this.exitCode = EXIT_CODES[category]
        this.details = details
    }
}

/** Missing, malformed or invalid configuration. `field` names the offending key. */
export class ConfigError extends AdvisorError {
    field: string

    constructor(field: string, message: string, details?: unknown) {
        super('ConfigError', message, details)
        this.field = field
    }
}

export class NetworkError extends AdvisorError {
    status?: number

    constructor(message: string, status?: number, details?: unknown) {
        super('NetworkError', message, details)
        this.status = status
    }
}

/** Price data inconsistent with the config, or degenerate portfolio math. */
export class DataError extends AdvisorError {
    constructor(message: string, details?: unknown) {
        super('DataError', message, details)
    }
}

export const isAdvisorError = (error: unknown): error is AdvisorError =>
    error instanceof AdvisorError

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function getErrorObject(error: unknown): Record<string, unknown> {
    if (error instanceof Error) return { message: error.message, stack: error.stack, name: error.name }
    return { error: String(error) }
}

/** One-line, human-readable form printed by the CLI. */
export const formatErrorLine = (error: unknown): string => {
    if (isAdvisorError(error)) return `${error.category}: ${error.message}`
    return `Error: ${getErrorMessage(error) || 'Unexpected failure'}`
}

export const exitCodeFor = (error: unknown): number =>
    isAdvisorError(error) ? error.exitCode : UNEXPECTED_EXIT_CODE
