import type {
    DroppedAllocation,
    NoActionReason,
    NoActionRecommendation,
    PortfolioLine,
    PortfolioSettings,
    Recommendation,
    RecommendationLine,
} from '../types/index.js'
import { Dec } from '../utils/decimal.js'
import { logger } from '../utils/logger.js'

/** Most under-allocated first, ties by ascending asset id. */
const compareUnderAllocation = (a: PortfolioLine, b: PortfolioLine): number => {
    if (a.deviation !== b.deviation) return a.deviation - b.deviation
    return a.assetId < b.assetId ? -1 : a.assetId > b.assetId ? 1 : 0
}

/**
 * Splits `totalCents` proportionally to `weights` using largest-remainder
 * rounding. The result always sums to `totalCents`; remainder ties go to the
 * earlier index.
 */
export function splitProportionally(totalCents: number, weights: readonly number[]): number[] {
    const weightTotal = weights.reduce((sum, w) => sum + w, 0)
    if (weights.length === 0 || weightTotal <= 0) return weights.map(() => 0)

    const raw = weights.map(w => (totalCents * w) / weightTotal)
    const shares = raw.map(Math.floor)
    const remainder = totalCents - shares.reduce((sum, s) => sum + s, 0)

    const order = raw
        .map((value, index) => ({ index, fraction: value - Math.floor(value) }))
        .sort((a, b) => b.fraction - a.fraction || a.index - b.index)
        .map(entry => entry.index)

    for (let k = 0; k < remainder; k++) {
        shares[order[k % order.length]] += 1
    }

    return shares
}

const noAction = (
    reason: NoActionReason,
    settings: PortfolioSettings,
    dropped: DroppedAllocation[]
): NoActionRecommendation => {
    logger.info('No actionable trade this period', { reason, dropped: dropped.length })
    return {
        kind: 'no_action',
        reason,
        budget: settings.dailyBudget,
        minTradeSize: settings.minTradeSize,
        dropped,
        unallocated: settings.dailyBudget,
    }
}

/**
 * Splits the daily budget across under-allocated assets in proportion to how far
 * each sits below its target. Every share under the minimum trade size is dropped
 * and the whole budget is re-split among the rest, until no share falls short.
 */
export function recommendPurchases(lines: readonly PortfolioLine[], settings: PortfolioSettings): Recommendation {
    // spend never exceeds the budget; every funded line meets the minimum
    const budgetCents = Dec.floorCents(settings.dailyBudget)
    const minCents = Math.max(Dec.ceilCents(settings.minTradeSize), 1)

    let candidates = lines.filter(line => line.deviation < 0).sort(compareUnderAllocation)
    if (candidates.length === 0) {
        return noAction('all_at_or_above_target', settings, [])
    }

    const dropped: DroppedAllocation[] = []

    while (candidates.length > 0) {
        const shares = splitProportionally(budgetCents, candidates.map(line => -line.deviation))
        const shortfalls = candidates
            .map((line, index) => ({ assetId: line.assetId, amount: Dec.fromCents(shares[index]), cents: shares[index] }))
            .filter(share => share.cents < minCents)

        if (shortfalls.length === 0) {
            const spentCents = shares.reduce((sum, s) => sum + s, 0)
            const tradeLines: RecommendationLine[] = candidates.map((line, index) => ({
                assetId: line.assetId,
                amount: Dec.fromCents(shares[index]),
                deviation: line.deviation,
            }))

            logger.info('Purchase split computed', {
                budget: settings.dailyBudget,
                trades: tradeLines.length,
                dropped: dropped.length,
            })

            return {
                kind: 'trade',
                lines: tradeLines,
                totalSpend: Dec.fromCents(spentCents),
                unallocated: Dec.round(settings.dailyBudget - Dec.fromCents(spentCents), 8),
                dropped,
                budget: settings.dailyBudget,
                minTradeSize: settings.minTradeSize,
            }
        }

        logger.debug('Shares below minimum trade size dropped', {
            assets: shortfalls.map(share => share.assetId),
            minTradeSize: settings.minTradeSize,
        })
        for (const { assetId, amount } of shortfalls) {
            dropped.push({ assetId, amount })
        }
        const droppedIds = new Set(shortfalls.map(share => share.assetId))
        candidates = candidates.filter(line => !droppedIds.has(line.assetId))
    }

    return noAction('below_min_trade_size', settings, dropped)
}
