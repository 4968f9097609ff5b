import { describe, it, expect } from 'vitest'
import { analyzePortfolio } from '../services/portfolioAnalyzer.js'
import { recommendPurchases } from '../services/recommendationEngine.js'
import { renderRecommendation, renderReport, renderTable } from '../services/reportRenderer.js'
import type { Recommendation } from '../types/index.js'
import { exampleConfig, exampleQuotes } from './fixtures.js'

const buildExample = () => {
    const config = exampleConfig()
    const analysis = analyzePortfolio(config, exampleQuotes())
    return { analysis, recommendation: recommendPurchases(analysis.lines, config.settings) }
}

const cellsOf = (lines: string[], prefix: string): string[] => {
    const row = lines.find(line => line.startsWith(prefix))
    return row ? row.trim().split(/\s+/) : []
}

describe('renderTable', () => {
    it('prints one aligned row per asset', () => {
        const { analysis } = buildExample()
        const lines = renderTable(analysis.lines, { color: false })

        expect(lines[0].split(/\s+/)).toEqual([
            'ASSET', 'PRICE', '24H', '7D', 'MOMENTUM', 'HOLDINGS', 'VALUE', 'CURRENT', 'TARGET', 'DIFF',
        ])
        expect(cellsOf(lines, 'BITCOIN')).toEqual([
            'BITCOIN', '$50,000.00', '+1.50%', '-3.00%', '-1.65%', '1.0000', '$50,000.00', '71.4%', '50.0%', '+21.4%',
        ])
        expect(cellsOf(lines, 'ETHEREUM')).toEqual([
            'ETHEREUM', '$2,000.00', '-0.50%', '+4.00%', '+2.65%', '10.0000', '$20,000.00', '28.6%', '50.0%', '-21.4%',
        ])
        expect(new Set(lines.slice(2).map(line => line.length)).size).toBe(1)
    })

    it('colours under-target green and over-target red', () => {
        const { analysis } = buildExample()
        const lines = renderTable(analysis.lines, { color: true })

        expect(lines.find(line => line.startsWith('BITCOIN'))?.endsWith('\x1b[31m+21.4%\x1b[0m')).toBe(true)
        expect(lines.find(line => line.startsWith('ETHEREUM'))?.endsWith('\x1b[32m-21.4%\x1b[0m')).toBe(true)
    })
})

describe('renderRecommendation', () => {
    it('lists purchases and the total', () => {
        const { recommendation } = buildExample()

        expect(renderRecommendation(recommendation, { color: false })).toEqual([
            'Recommendation (daily budget $100.00, minimum trade $20.00)',
            '  BUY ETHEREUM  $100.00  (-21.4% vs target)',
            '  Total: $100.00 of $100.00',
        ])
    })

    it('lists shares that fell below the minimum', () => {
        const recommendation: Recommendation = {
            kind: 'trade',
            lines: [{ assetId: 'beta', amount: 100, deviation: -0.3 }],
            totalSpend: 100,
            unallocated: 0,
            dropped: [{ assetId: 'alpha', amount: 40 }],
            budget: 100,
            minTradeSize: 60,
        }

        expect(renderRecommendation(recommendation, { color: false })).toEqual([
            'Recommendation (daily budget $100.00, minimum trade $60.00)',
            '  BUY BETA  $100.00  (-30.0% vs target)',
            '  Total: $100.00 of $100.00',
            '  Below minimum, not funded this period: ALPHA ($40.00)',
        ])
    })

    it('explains why there is no trade', () => {
        const recommendation: Recommendation = {
            kind: 'no_action',
            reason: 'all_at_or_above_target',
            budget: 100,
            minTradeSize: 20,
            dropped: [],
            unallocated: 100,
        }

        expect(renderRecommendation(recommendation, { color: false })).toEqual([
            'Recommendation (daily budget $100.00, minimum trade $20.00)',
            '  No actionable trade this period: every asset is at or above its target allocation.',
        ])
    })
})

describe('renderReport', () => {
    it('starts with the portfolio total', () => {
        const { analysis, recommendation } = buildExample()
        const report = renderReport(analysis, recommendation, { color: false })

        expect(report.split('\n').slice(0, 3)).toEqual([
            'Portfolio and Market Overview',
            'Total Portfolio Value: $70,000.00',
            '',
        ])
        expect(report.endsWith('  Total: $100.00 of $100.00\n')).toBe(true)
    })

    it('emits no escape codes without colour', () => {
        const { analysis, recommendation } = buildExample()
        expect(renderReport(analysis, recommendation, { color: false }).includes('\x1b[')).toBe(false)
    })
})
