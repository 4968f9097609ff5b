import { z } from 'zod'
import type { PriceQuote, QuotesMap } from '../types/index.js'
import { DataError, NetworkError, getErrorMessage } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

export interface PriceClient {
    getQuotes(assetIds: readonly string[]): Promise<QuotesMap>
}

export interface CoinGeckoClientOptions {
    baseUrl: string
    apiKey?: string
    useFreeApi?: boolean
}

export const REQUEST_TIMEOUT_MS = 15_000

const marketEntrySchema = z.object({
    id: z.string(),
    symbol: z.string().optional(),
    current_price: z.number().nullable(),
    price_change_percentage_24h_in_currency: z.number().nullable().optional(),
    price_change_percentage_7d_in_currency: z.number().nullable().optional(),
})

const marketsResponseSchema = z.array(marketEntrySchema)

type MarketEntry = z.infer<typeof marketEntrySchema>

/**
 * CoinGecko market-data client. One batched `/coins/markets` request per call;
 * no caching and no retries.
 */
export class CoinGeckoClient implements PriceClient {
    private readonly baseUrl: string
    private readonly apiKey: string
    private readonly useFreeApi: boolean

    constructor(options: CoinGeckoClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '')
        this.apiKey = (options.apiKey || '').trim()
        this.useFreeApi = options.useFreeApi ?? false
    }

    async getQuotes(assetIds: readonly string[]): Promise<QuotesMap> {
        if (assetIds.length === 0) return {}

        const params = new URLSearchParams({
            vs_currency: 'usd',
            ids: assetIds.join(','),
            price_change_percentage: '24h,7d',
            per_page: String(assetIds.length),
            page: '1',
            sparkline: 'false',
        })
        const url = `${this.baseUrl}/coins/markets?${params.toString()}`

        logger.debug('Requesting CoinGecko market data', { url, assets: assetIds.length })

        const entries = await this.request(url)
        const byId = new Map(entries.map(entry => [entry.id, entry]))

        const quotes: QuotesMap = {}
        for (const assetId of assetIds) {
            const entry = byId.get(assetId)
            if (!entry) {
                throw new DataError(`CoinGecko returned no market data for '${assetId}'. Check the asset id in allocations.`)
            }
            quotes[assetId] = toQuote(entry)
        }

        logger.info('Fetched market quotes', {
            assets: assetIds.length,
            source: this.apiKey && !this.useFreeApi ? 'coingecko_pro' : 'coingecko_free',
        })

        return quotes
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            'Accept': 'application/json',
            'User-Agent': 'crypto-dca-advisor/1.0',
        }
        if (this.apiKey) {
            headers[this.useFreeApi ? 'x-cg-demo-api-key' : 'x-cg-pro-api-key'] = this.apiKey
        }
        return headers
    }

    private async request(url: string): Promise<MarketEntry[]> {
        const controller = new AbortController()
        const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS)

        let response: Response
        try {
            response = await fetch(url, {
                method: 'GET',
                headers: this.buildHeaders(),
                signal: controller.signal,
            })
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new NetworkError(`CoinGecko request timed out after ${REQUEST_TIMEOUT_MS}ms`)
            }
            throw new NetworkError(`Could not reach CoinGecko: ${getErrorMessage(error)}`, undefined, { cause: getErrorMessage(error) })
        } finally {
            clearTimeout(timeoutId)
        }

        if (!response.ok) {
            const body = await readBody(response)
            logger.error('CoinGecko API error response', { status: response.status, body })

            if (response.status === 429) {
                throw new NetworkError('CoinGecko rate limit exceeded (HTTP 429)', 429)
            }
            if (response.status === 401 || response.status === 403) {
                throw new NetworkError(`CoinGecko rejected the API key (HTTP ${response.status})`, response.status)
            }
            throw new NetworkError(`CoinGecko API error (HTTP ${response.status})`, response.status)
        }

        let payload: unknown
        try {
            payload = await response.json()
        } catch (error) {
            throw new DataError(`CoinGecko returned a body that is not valid JSON: ${getErrorMessage(error)}`)
        }

        const parsed = marketsResponseSchema.safeParse(payload)
        if (!parsed.success) {
            const [issue] = parsed.error.issues
            const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
            throw new DataError(`Unexpected CoinGecko response${where}: ${issue.message}`, { issues: parsed.error.issues })
        }

        return parsed.data
    }
}

function toQuote(entry: MarketEntry): PriceQuote {
    const price = entry.current_price
    if (price === null || !(price > 0)) {
        throw new DataError(`CoinGecko returned no usable price for '${entry.id}' (got ${price})`)
    }

    const change24h = entry.price_change_percentage_24h_in_currency
    const change7d = entry.price_change_percentage_7d_in_currency
    if (change24h === null || change24h === undefined) {
        throw new DataError(`CoinGecko returned no 24h change for '${entry.id}'`)
    }
    if (change7d === null || change7d === undefined) {
        throw new DataError(`CoinGecko returned no 7d change for '${entry.id}'`)
    }

    return { assetId: entry.id, price, change24h, change7d }
}

async function readBody(response: Response): Promise<string> {
    try {
        return await response.text()
    } catch (error) {
        return `<unreadable body: ${getErrorMessage(error)}>`
    }
}
