export interface AssetConfig {
    id: string
    tradingQuantity: number
    coldQuantity: number
    /** Fraction of the portfolio, 0..1 */
    targetAllocation: number
}

export interface PortfolioSettings {
    dailyBudget: number
    minTradeSize: number
}

export interface PortfolioConfig {
    readonly assets: ReadonlyArray<Readonly<AssetConfig>>
    readonly settings: Readonly<PortfolioSettings>
}

export interface PriceQuote {
    assetId: string
    price: number
    change24h: number
    change7d: number
}

export interface QuotesMap {
    [assetId: string]: PriceQuote
}

export interface PortfolioLine {
    assetId: string
    tradingQuantity: number
    coldQuantity: number
    quantity: number
    price: number
    change24h: number
    change7d: number
    /** 0.7 × 7d change + 0.3 × 24h change, in percent */
    momentum: number
    value: number
    currentAllocation: number
    targetAllocation: number
    deviation: number
}

export interface PortfolioAnalysis {
    totalValue: number
    lines: PortfolioLine[]
}

export interface RecommendationLine {
    assetId: string
    amount: number
    deviation: number
}

export interface DroppedAllocation {
    assetId: string
    amount: number
}

export type NoActionReason = 'all_at_or_above_target' | 'below_min_trade_size'

interface RecommendationBase {
    budget: number
    minTradeSize: number
    dropped: DroppedAllocation[]
    unallocated: number
}

export interface TradeRecommendation extends RecommendationBase {
    kind: 'trade'
    lines: RecommendationLine[]
    totalSpend: number
}

export interface NoActionRecommendation extends RecommendationBase {
    kind: 'no_action'
    reason: NoActionReason
}

export type Recommendation = TradeRecommendation | NoActionRecommendation
