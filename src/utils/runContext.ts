import { AsyncLocalStorage } from 'node:async_hooks'
import { randomUUID } from 'node:crypto'

export interface RunContext {
    runId?: string
}

const runContextStorage = new AsyncLocalStorage<RunContext>()

export const createRunId = (): string => randomUUID().slice(0, 8)

export const runWithRunContext = <T>(context: RunContext, fn: () => T): T =>
    runContextStorage.run(context, fn)

export const getRunContext = (): RunContext | undefined =>
    runContextStorage.getStore()

export const getRunId = (): string | undefined =>
    runContextStorage.getStore()?.runId
