import { afterEach, vi } from 'vitest'
import { removeTempDirs } from './fixtures.js'

// logger reads LOG_LEVEL when first imported
process.env.LOG_LEVEL = process.env.DEBUG === 'true' ? 'debug' : 'silent'

afterEach(() => {
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
    removeTempDirs()
})
