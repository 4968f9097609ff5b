import type { PortfolioAnalysis, PortfolioConfig, PortfolioLine, QuotesMap } from '../types/index.js'
import { DataError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

// Weighting of the informational momentum column
const MOMENTUM_WEIGHT_7D = 0.7
const MOMENTUM_WEIGHT_24H = 0.3

export const momentumOf = (change24h: number, change7d: number): number =>
    MOMENTUM_WEIGHT_7D * change7d + MOMENTUM_WEIGHT_24H * change24h

/** Descending |deviation|, ties by ascending asset id. */
export const compareByDeviation = (a: PortfolioLine, b: PortfolioLine): number => {
    const diff = Math.abs(b.deviation) - Math.abs(a.deviation)
    if (diff !== 0) return diff
    return a.assetId < b.assetId ? -1 : a.assetId > b.assetId ? 1 : 0
}

export function analyzePortfolio(config: PortfolioConfig, quotes: QuotesMap): PortfolioAnalysis {
    const valued = config.assets.map(asset => {
        const quote = quotes[asset.id]
        if (!quote) {
            throw new DataError(`No price quote for '${asset.id}'`)
        }
        const quantity = asset.tradingQuantity + asset.coldQuantity
        return { asset, quote, quantity, value: quantity * quote.price }
    })

    const totalValue = valued.reduce((sum, v) => sum + v.value, 0)
    if (!(totalValue > 0)) {
        throw new DataError('Portfolio total value is zero; current allocation cannot be computed')
    }

    const lines = valued.map(({ asset, quote, quantity, value }): PortfolioLine => {
        const currentAllocation = value / totalValue
        return {
            assetId: asset.id,
            tradingQuantity: asset.tradingQuantity,
            coldQuantity: asset.coldQuantity,
            quantity,
            price: quote.price,
            change24h: quote.change24h,
            change7d: quote.change7d,
            momentum: momentumOf(quote.change24h, quote.change7d),
            value,
            currentAllocation,
            targetAllocation: asset.targetAllocation,
            deviation: currentAllocation - asset.targetAllocation,
        }
    })

    lines.sort(compareByDeviation)

    logger.info('Portfolio analyzed', { totalValue, assets: lines.length })

    return { totalValue, lines }
}
