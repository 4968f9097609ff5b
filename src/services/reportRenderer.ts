import type { NoActionReason, PortfolioAnalysis, PortfolioLine, Recommendation } from '../types/index.js'
import { Dec } from '../utils/decimal.js'

export interface RenderOptions {
    color: boolean
}

const ANSI = {
    bold: '\x1b[1m',
    green: '\x1b[32m',
    red: '\x1b[31m',
    reset: '\x1b[0m',
} as const

interface Cell {
    text: string
    color?: string
}

interface Column {
    header: string
    align: 'left' | 'right'
    cell: (line: PortfolioLine) => Cell
}

const COLUMN_GAP = '  '

const NO_ACTION_MESSAGES: Record<NoActionReason, string> = {
    all_at_or_above_target: 'every asset is at or above its target allocation.',
    below_min_trade_size: 'no under-allocated asset can receive the minimum trade size.',
}

// green: below target (buy candidate), red: above target
const deviationColor = (deviation: number): string | undefined => {
    if (deviation < 0) return ANSI.green
    if (deviation > 0) return ANSI.red
    return undefined
}

const COLUMNS: Column[] = [
    { header: 'ASSET', align: 'left', cell: line => ({ text: line.assetId.toUpperCase() }) },
    { header: 'PRICE', align: 'right', cell: line => ({ text: Dec.formatUsd(line.price) }) },
    { header: '24H', align: 'right', cell: line => ({ text: Dec.formatChange(line.change24h) }) },
    { header: '7D', align: 'right', cell: line => ({ text: Dec.formatChange(line.change7d) }) },
    { header: 'MOMENTUM', align: 'right', cell: line => ({ text: Dec.formatChange(line.momentum) }) },
    { header: 'HOLDINGS', align: 'right', cell: line => ({ text: Dec.formatQty(line.quantity) }) },
    { header: 'VALUE', align: 'right', cell: line => ({ text: Dec.formatUsd(line.value) }) },
    { header: 'CURRENT', align: 'right', cell: line => ({ text: Dec.formatPct(line.currentAllocation) }) },
    { header: 'TARGET', align: 'right', cell: line => ({ text: Dec.formatPct(line.targetAllocation) }) },
    {
        header: 'DIFF',
        align: 'right',
        cell: line => ({ text: Dec.formatSignedPct(line.deviation), color: deviationColor(line.deviation) }),
    },
]

const pad = (text: string, width: number, align: Column['align']): string =>
    align === 'left' ? text.padEnd(width) : text.padStart(width)

const paint = (text: string, color: string | undefined, options: RenderOptions): string =>
    options.color && color ? `${color}${text}${ANSI.reset}` : text

export function renderTable(lines: readonly PortfolioLine[], options: RenderOptions): string[] {
    const rows = lines.map(line => COLUMNS.map(column => column.cell(line)))
    const widths = COLUMNS.map((column, index) =>
        Math.max(column.header.length, ...rows.map(row => row[index].text.length))
    )

    const header = COLUMNS.map((column, index) => pad(column.header, widths[index], column.align))
        .join(COLUMN_GAP)
        .trimEnd()
    const rule = '-'.repeat(widths.reduce((sum, w) => sum + w, 0) + COLUMN_GAP.length * (widths.length - 1))
    const body = rows.map(row =>
        row
            .map((cell, index) => paint(pad(cell.text, widths[index], COLUMNS[index].align), cell.color, options))
            .join(COLUMN_GAP)
    )

    return [paint(header, ANSI.bold, options), rule, ...body]
}

export function renderRecommendation(recommendation: Recommendation, options: RenderOptions): string[] {
    const heading = paint(
        `Recommendation (daily budget ${Dec.formatUsd(recommendation.budget)}, minimum trade ${Dec.formatUsd(recommendation.minTradeSize)})`,
        ANSI.bold,
        options
    )

    const droppedLines = recommendation.dropped.map(entry =>
        `  Below minimum, not funded this period: ${entry.assetId.toUpperCase()} (${Dec.formatUsd(entry.amount)})`
    )

    if (recommendation.kind === 'no_action') {
        return [
            heading,
            `  No actionable trade this period: ${NO_ACTION_MESSAGES[recommendation.reason]}`,
            ...droppedLines,
        ]
    }

    const names = recommendation.lines.map(line => line.assetId.toUpperCase())
    const amounts = recommendation.lines.map(line => Dec.formatUsd(line.amount))
    const nameWidth = Math.max(...names.map(n => n.length))
    const amountWidth = Math.max(...amounts.map(a => a.length))

    const buyLines = recommendation.lines.map((line, index) =>
        `  BUY ${names[index].padEnd(nameWidth)}  ${paint(amounts[index].padStart(amountWidth), ANSI.green, options)}` +
        `  (${Dec.formatSignedPct(line.deviation)} vs target)`
    )

    const footer = [`  Total: ${Dec.formatUsd(recommendation.totalSpend)} of ${Dec.formatUsd(recommendation.budget)}`]
    if (recommendation.unallocated > 0) {
        footer.push(`  Unallocated: ${Dec.formatUsd(recommendation.unallocated)}`)
    }

    return [heading, ...buyLines, ...footer, ...droppedLines]
}

/** Console report: market overview table followed by the purchase recommendation. */
export function renderReport(
    analysis: PortfolioAnalysis,
    recommendation: Recommendation,
    options: RenderOptions
): string {
    return [
        paint('Portfolio and Market Overview', ANSI.bold, options),
        `Total Portfolio Value: ${Dec.formatUsd(analysis.totalValue)}`,
        '',
        ...renderTable(analysis.lines, options),
        '',
        ...renderRecommendation(recommendation, options),
        '',
    ].join('\n')
}
