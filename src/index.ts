#!/usr/bin/env node
import { main } from './cli.js'
import { formatErrorLine } from './utils/errors.js'

main().then(code => {
    process.exitCode = code
}).catch((error: unknown) => {
    process.stderr.write(`${formatErrorLine(error)}\n`)
    process.exitCode = 1
})
