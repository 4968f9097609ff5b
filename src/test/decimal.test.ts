import { describe, it, expect } from 'vitest'
import { Dec } from '../utils/decimal.js'

describe('Dec.fractionsSum', () => {
    it('avoids float drift when summing fractions', () => {
        // 0.1 + 0.2 + 0.7 is 0.9999999999999999 in naive JS
        expect(Dec.fractionsSum({ a: 0.1, b: 0.2, c: 0.7 })).toBe(1)
    })

    it('returns 0 for empty allocations', () => {
        expect(Dec.fractionsSum({})).toBe(0)
    })
})

describe('Dec.fractionsSumValid', () => {
    it('accepts sums within 0.001 of 1', () => {
        expect(Dec.fractionsSumValid({ a: 0.5, b: 0.4995 })).toBe(true)
        expect(Dec.fractionsSumValid({ a: 0.5, b: 0.501 })).toBe(true)
    })

    it('rejects sums further than 0.001 from 1', () => {
        expect(Dec.fractionsSumValid({ a: 0.5, b: 0.498 })).toBe(false)
        expect(Dec.fractionsSumValid({ a: 0.8, b: 0.15 })).toBe(false)
    })
})

describe('Dec cents', () => {
    it('floors to whole cents without float undershoot', () => {
        expect(Dec.floorCents(0.29)).toBe(29)
        expect(Dec.floorCents(100)).toBe(10000)
        expect(Dec.floorCents(100.005)).toBe(10000)
    })

    it('ceils to whole cents', () => {
        expect(Dec.ceilCents(20)).toBe(2000)
        expect(Dec.ceilCents(20.001)).toBe(2001)
    })

    it('converts cents back to dollars', () => {
        expect(Dec.fromCents(1235)).toBe(12.35)
    })
})

describe('Dec formatting', () => {
    it('formats USD with grouping and two decimals', () => {
        expect(Dec.formatUsd(70000)).toBe('$70,000.00')
        expect(Dec.formatUsd(-1234.5)).toBe('-$1,234.50')
        expect(Dec.formatUsd(0.004)).toBe('$0.00')
    })

    it('formats fractions as percentages', () => {
        expect(Dec.formatPct(50000 / 70000)).toBe('71.4%')
        expect(Dec.formatPct(0.5)).toBe('50.0%')
    })

    it('always signs deviations', () => {
        expect(Dec.formatSignedPct(50000 / 70000 - 0.5)).toBe('+21.4%')
        expect(Dec.formatSignedPct(20000 / 70000 - 0.5)).toBe('-21.4%')
        expect(Dec.formatSignedPct(0)).toBe('+0.0%')
    })

    it('formats percent changes with two decimals', () => {
        expect(Dec.formatChange(1.234)).toBe('+1.23%')
        expect(Dec.formatChange(-3)).toBe('-3.00%')
    })

    it('formats quantities with four decimals', () => {
        expect(Dec.formatQty(10)).toBe('10.0000')
        expect(Dec.formatQty(0.123456)).toBe('0.1235')
    })
})
