import { validateRuntimeConfigOrThrow } from './config/runtimeConfig.js'
import { runAdvisor, type AdvisorDeps } from './services/advisor.js'
import { exitCodeFor, formatErrorLine, getErrorObject } from './utils/errors.js'
import { logger } from './utils/logger.js'
import { createRunId, runWithRunContext } from './utils/runContext.js'

export interface CliIo {
    stdout: (text: string) => void
    stderr: (text: string) => void
}

const processIo: CliIo = {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
}

/** Runs the advisor once; resolves to the process exit code. */
export async function main(
    env: NodeJS.ProcessEnv = process.env,
    io: CliIo = processIo,
    deps: AdvisorDeps = {}
): Promise<number> {
    return runWithRunContext({ runId: createRunId() }, async () => {
        try {
            const runtime = validateRuntimeConfigOrThrow(env)
            logger.info('Starting DCA analysis', { configPath: runtime.configPath })

            const { report } = await runAdvisor(runtime, deps)
            io.stdout(report)
            return 0
        } catch (error) {
            logger.error('DCA analysis failed', getErrorObject(error))
            io.stderr(`${formatErrorLine(error)}\n`)
            return exitCodeFor(error)
        }
    })
}
