import { readFile } from 'node:fs/promises'
import { parse, YAMLParseError } from 'yaml'
import { z } from 'zod'
import type { AssetConfig, PortfolioConfig } from '../types/index.js'
import { ALLOCATION_EPSILON, Dec } from '../utils/decimal.js'
import { ConfigError, getErrorMessage } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

// CoinGecko coin ids: bitcoin, usd-coin, matic-network, ...
const ASSET_ID_REGEX = /^[a-z0-9][a-z0-9._-]*$/

const assetIdSchema = z.string().regex(ASSET_ID_REGEX, 'must be a lowercase CoinGecko coin id')

const quantitySchema = z.number({ required_error: 'is required', invalid_type_error: 'must be a number' })
    .finite('must be a finite number')
    .nonnegative('must not be negative')

const fractionSchema = z.number({ required_error: 'is required', invalid_type_error: 'must be a number' })
    .finite('must be a finite number')
    .min(0, 'must be between 0 and 1')
    .max(1, 'must be between 0 and 1')

const usdSchema = z.number({ required_error: 'is required', invalid_type_error: 'must be a number' })
    .finite('must be a finite number')
    .positive('must be greater than 0')

const sectionParams = (name: string) => ({
    required_error: `section '${name}' is required`,
    invalid_type_error: `section '${name}' must be a mapping of asset id to number`
})

// An empty YAML section (`trading_portfolio:`) parses as null and means no holdings
const holdingsSchema = (name: string) => z.record(assetIdSchema, quantitySchema, sectionParams(name))
    .nullable()
    .transform(holdings => holdings ?? {})

const allocationsSchema = z.record(assetIdSchema, fractionSchema, sectionParams('allocations'))
    .superRefine((allocations, ctx) => {
        if (Object.keys(allocations).length === 0) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must list at least one asset' })
            return
        }
        if (!Dec.fractionsSumValid(allocations)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `fractions must sum to 1.0 (±${ALLOCATION_EPSILON}), got ${Dec.fractionsSum(allocations)}`
            })
        }
    })

const settingsSchema = z.object({
    daily_budget: usdSchema,
    min_trade_size: usdSchema,
}, { required_error: "section 'settings' is required", invalid_type_error: "section 'settings' must be a mapping" })
    .strict()
    .refine(settings => settings.min_trade_size <= settings.daily_budget, {
        path: ['min_trade_size'],
        message: 'must not exceed settings.daily_budget',
    })

export const portfolioConfigSchema = z.object({
    trading_portfolio: holdingsSchema('trading_portfolio'),
    long_term_portfolio: holdingsSchema('long_term_portfolio'),
    allocations: allocationsSchema,
    settings: settingsSchema,
}, { invalid_type_error: 'configuration must be a YAML mapping' })
    .strict()
    .superRefine((config, ctx) => {
        for (const section of ['trading_portfolio', 'long_term_portfolio'] as const) {
            for (const assetId of Object.keys(config[section])) {
                if (!Object.hasOwn(config.allocations, assetId)) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: [section, assetId],
                        message: 'has no target in allocations',
                    })
                }
            }
        }
    })

// own keys only: ids such as `constructor` must not resolve to Object.prototype members
const ownQuantity = (holdings: Record<string, number>, id: string): number =>
    Object.hasOwn(holdings, id) ? holdings[id] : 0

const issueField = (issue: z.ZodIssue): string => {
    const path = issue.code === z.ZodIssueCode.unrecognized_keys
        ? [...issue.path, issue.keys[0]]
        : issue.path
    return path.length > 0 ? path.join('.') : '(root)'
}

const issueMessage = (issue: z.ZodIssue, field: string): string => {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
        return `Unknown config field '${field}'`
    }
    return `Invalid config field '${field}': ${issue.message}`
}

/**
 * Validates an already-parsed config document and builds the immutable
 * configuration value passed to every stage of the run.
 */
export function parsePortfolioConfig(raw: unknown): PortfolioConfig {
    const result = portfolioConfigSchema.safeParse(raw)
    if (!result.success) {
        const [issue] = result.error.issues
        const field = issueField(issue)
        throw new ConfigError(field, issueMessage(issue, field), { issues: result.error.issues })
    }

    const { trading_portfolio, long_term_portfolio, allocations, settings } = result.data

    const assets = Object.entries(allocations).map(([id, targetAllocation]) =>
        Object.freeze<AssetConfig>({
            id,
            tradingQuantity: ownQuantity(trading_portfolio, id),
            coldQuantity: ownQuantity(long_term_portfolio, id),
            targetAllocation,
        })
    )

    return Object.freeze({
        assets: Object.freeze(assets),
        settings: Object.freeze({
            dailyBudget: settings.daily_budget,
            minTradeSize: settings.min_trade_size,
        }),
    })
}

export async function loadPortfolioConfig(path: string): Promise<PortfolioConfig> {
    let text: string
    try {
        text = await readFile(path, 'utf8')
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new ConfigError(
                'DCA_CONFIG_PATH',
                `Configuration file not found at ${path}. Copy config.example.yaml to ${path} and update values.`
            )
        }
        throw new ConfigError('DCA_CONFIG_PATH', `Could not read configuration file ${path}: ${getErrorMessage(error)}`)
    }

    let raw: unknown
    try {
        raw = parse(text)
    } catch (error) {
        if (error instanceof YAMLParseError) {
            // first line already carries "at line X, column Y"
            const [summary] = error.message.split('\n')
            throw new ConfigError('(root)', `Malformed YAML in ${path}: ${summary}`, { code: error.code, linePos: error.linePos })
        }
        throw new ConfigError('(root)', `Malformed YAML in ${path}: ${getErrorMessage(error)}`)
    }

    const config = parsePortfolioConfig(raw)

    logger.info('Portfolio configuration loaded', {
        path,
        assets: config.assets.length,
        dailyBudget: config.settings.dailyBudget,
        minTradeSize: config.settings.minTradeSize,
    })
    logger.debug('Target allocations', {
        allocations: Object.fromEntries(config.assets.map(asset => [asset.id, asset.targetAllocation])),
    })

    return config
}
