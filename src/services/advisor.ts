import type { RuntimeConfig } from '../config/runtimeConfig.js'
import { loadPortfolioConfig } from '../config/portfolioConfig.js'
import type { PortfolioAnalysis, Recommendation } from '../types/index.js'
import { logger } from '../utils/logger.js'
import { CoinGeckoClient, type PriceClient } from './coinGecko.js'
import { analyzePortfolio } from './portfolioAnalyzer.js'
import { recommendPurchases } from './recommendationEngine.js'
import { renderReport } from './reportRenderer.js'

export interface AdvisorDeps {
    priceClient?: PriceClient
}

export interface AdvisorResult {
    analysis: PortfolioAnalysis
    recommendation: Recommendation
    report: string
}

/**
 * One advisory run: config → quotes → analysis → recommendation → report.
 * Any stage failure propagates unchanged; nothing is rendered on error.
 */
export async function runAdvisor(runtime: RuntimeConfig, deps: AdvisorDeps = {}): Promise<AdvisorResult> {
    const config = await loadPortfolioConfig(runtime.configPath)

    const priceClient = deps.priceClient ?? new CoinGeckoClient({
        baseUrl: runtime.coinGeckoBaseUrl,
        apiKey: runtime.coinGeckoApiKey,
        useFreeApi: runtime.useFreeApi,
    })

    const quotes = await priceClient.getQuotes(config.assets.map(asset => asset.id))
    const analysis = analyzePortfolio(config, quotes)
    const recommendation = recommendPurchases(analysis.lines, config.settings)

    if (recommendation.kind === 'trade') {
        logger.info('Trade recommendation ready', {
            buys: Object.fromEntries(recommendation.lines.map(line => [line.assetId, line.amount])),
            totalSpend: recommendation.totalSpend,
        })
    }

    return {
        analysis,
        recommendation,
        report: renderReport(analysis, recommendation, { color: runtime.color }),
    }
}
