import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { PortfolioConfig, PortfolioLine, QuotesMap } from '../types/index.js'

/** Two-asset portfolio: 1 BTC @ 50,000 and 10 ETH @ 2,000, 50/50 target. */
export const exampleConfig = (overrides: Partial<PortfolioConfig['settings']> = {}): PortfolioConfig => ({
    assets: [
        { id: 'bitcoin', tradingQuantity: 1, coldQuantity: 0, targetAllocation: 0.5 },
        { id: 'ethereum', tradingQuantity: 0, coldQuantity: 10, targetAllocation: 0.5 },
    ],
    settings: { dailyBudget: 100, minTradeSize: 20, ...overrides },
})

export const exampleQuotes = (): QuotesMap => ({
    bitcoin: { assetId: 'bitcoin', price: 50_000, change24h: 1.5, change7d: -3 },
    ethereum: { assetId: 'ethereum', price: 2_000, change24h: -0.5, change7d: 4 },
})

export const marketEntries = () => [
    {
        id: 'bitcoin',
        symbol: 'btc',
        current_price: 50_000,
        price_change_percentage_24h_in_currency: 1.5,
        price_change_percentage_7d_in_currency: -3,
    },
    {
        id: 'ethereum',
        symbol: 'eth',
        current_price: 2_000,
        price_change_percentage_24h_in_currency: -0.5,
        price_change_percentage_7d_in_currency: 4,
    },
]

export const EXAMPLE_YAML = [
    'trading_portfolio:',
    '  bitcoin: 1',
    'long_term_portfolio:',
    '  ethereum: 10',
    'allocations:',
    '  bitcoin: 0.5',
    '  ethereum: 0.5',
    'settings:',
    '  daily_budget: 100',
    '  min_trade_size: 20',
    '',
].join('\n')

const tempDirs: string[] = []

/** Fresh directory under the OS temp dir, removed after each test by the setup file. */
export const makeTempDir = (): string => {
    const dir = mkdtempSync(join(tmpdir(), 'dca-advisor-'))
    tempDirs.push(dir)
    return dir
}

export const removeTempDirs = (): void => {
    for (const dir of tempDirs.splice(0)) {
        rmSync(dir, { recursive: true, force: true })
    }
}

export const writeTempConfig = (contents: string, name = 'config.yaml'): string => {
    const dir = makeTempDir()
    const path = join(dir, name)
    writeFileSync(path, contents, 'utf8')
    return path
}

/** Minimal analyzed line; only `assetId` and `deviation` matter to the engine. */
export const makeLine = (assetId: string, deviation: number): PortfolioLine => ({
    assetId,
    tradingQuantity: 1,
    coldQuantity: 0,
    quantity: 1,
    price: 1,
    change24h: 0,
    change7d: 0,
    momentum: 0,
    value: 1,
    currentAllocation: 0.5 + deviation,
    targetAllocation: 0.5,
    deviation,
})

export const jsonResponse = (status: number, body: unknown) => ({
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
})

export function captureError(fn: () => unknown): unknown {
    try {
        fn()
    } catch (error) {
        return error
    }
    throw new Error('expected function to throw')
}
