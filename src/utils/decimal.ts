/**
 * Decimal-safe helpers for allocation and money math.
 *
 * Allocations are fractions (0..1). Money is USD; purchase splits are computed
 * in integer cents so amounts always add up to the budget exactly.
 *
 * Usage:
 *   import { Dec } from '../utils/decimal.js'
 *
 *   Dec.fractionsSum(allocations)       // → sum of allocation fractions
 *   Dec.fractionsSumValid(allocations)  // → true if sum is within ε of 1
 *   Dec.floorCents(100.005)             // → 10000
 *   Dec.fromCents(1235)                 // → 12.35
 *   Dec.formatUsd(70000)                // → '$70,000.00'
 *   Dec.formatPct(0.7142857)            // → '71.4%'
 *   Dec.formatSignedPct(-0.2142857)     // → '-21.4%'
 *   Dec.formatChange(1.234)             // → '+1.23%'
 *   Dec.formatQty(1)                    // → '1.0000'
 */

// ─────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────

/** Fraction scale: 8 decimal places */
const FRACTION_SCALE = 100_000_000 // 1 × 10^8

const CENTS_PER_USD = 100

/** Maximum absolute difference from 1 for a valid allocation sum */
export const ALLOCATION_EPSILON = 0.001

// ─────────────────────────────────────────────
// Internal helpers
// ─────────────────────────────────────────────

/**
 * Round to `dp` decimal places using "round half away from zero".
 */
function roundHalfUp(value: number, dp: number): number {
    const factor = Math.pow(10, dp)
    return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor
}

const usdFormatter = new Intl.NumberFormat('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2
})

const sign = (value: number): string => (value < 0 ? '-' : '+')

// ─────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────

export const Dec = {
    round(value: number, dp: number): number {
        return roundHalfUp(value, dp)
    },

    // ── Allocation helpers ────────────────────

    /**
     * Sum allocation fractions by integer accumulation at 8 dp, so
     * 0.1 + 0.2 + 0.7 is exactly 1.
     */
    fractionsSum(allocations: Record<string, number>): number {
        const sumScaled = Object.values(allocations)
            .reduce((acc, v) => acc + Math.round(v * FRACTION_SCALE), 0)
        return sumScaled / FRACTION_SCALE
    },

    fractionsSumValid(allocations: Record<string, number>, epsilon: number = ALLOCATION_EPSILON): boolean {
        const sum = Dec.fractionsSum(allocations)
        return Math.abs(sum - 1) <= epsilon
    },

    // ── Money ─────────────────────────────────

    /** Whole cents not exceeding `usd` (0.29 → 29, not 28) */
    floorCents(usd: number): number {
        return Math.floor(roundHalfUp(usd * CENTS_PER_USD, 6))
    },

    /** Whole cents not below `usd` */
    ceilCents(usd: number): number {
        return Math.ceil(roundHalfUp(usd * CENTS_PER_USD, 6))
    },

    fromCents(cents: number): number {
        return cents / CENTS_PER_USD
    },

    // ── Formatting (string output) ────────────

    formatUsd(value: number): string {
        const rounded = roundHalfUp(value, 2)
        return rounded < 0 ? `-$${usdFormatter.format(-rounded)}` : `$${usdFormatter.format(rounded)}`
    },

    /** Fraction → percentage string, default 1 dp */
    formatPct(fraction: number, dp: number = 1): string {
        return `${roundHalfUp(fraction * 100, dp).toFixed(dp)}%`
    },

    /** Fraction → signed percentage string, default 1 dp */
    formatSignedPct(fraction: number, dp: number = 1): string {
        const rounded = roundHalfUp(fraction * 100, dp)
        return `${sign(rounded)}${Math.abs(rounded).toFixed(dp)}%`
    },

    /** Value already in percent (API change fields) → signed string, default 2 dp */
    formatChange(percent: number, dp: number = 2): string {
        const rounded = roundHalfUp(percent, dp)
        return `${sign(rounded)}${Math.abs(rounded).toFixed(dp)}%`
    },

    formatQty(quantity: number, dp: number = 4): string {
        return roundHalfUp(quantity, dp).toFixed(dp)
    },
}
