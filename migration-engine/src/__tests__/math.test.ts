import { describe, it, expect } from 'vitest';
import {
    computeInitialSqrtPrice,
    computeMarketCap,
    computeRatio,
    formatRatio,
    invertSqrtPrice,
    isqrt,
    scaleByRatio,
    sqrtPriceToPrice,
} from '../math.js';
import { ArithmeticError, ArithmeticOverflowError, InvalidSupplyError } from '../errors.js';
import { Q64, U128_MAX, U64_MAX } from '../types.js';

describe('computeRatio', () => {
    it('scales NEW per OLD by 1e9', () => {
        expect(computeRatio(1_000_000n, 500_000n)).toBe(500_000_000n);
        expect(computeRatio(1_000n, 1_000n)).toBe(1_000_000_000n);
    });

    it('floors fractional ratios', () => {
        expect(computeRatio(3n, 1n)).toBe(333_333_333n);
    });

    it('rejects a zero old supply', () => {
        expect(() => computeRatio(0n, 100n)).toThrow(ArithmeticError);
    });

    it('rejects a ratio that does not fit u64', () => {
        expect(() => computeRatio(1n, U64_MAX)).toThrow(ArithmeticOverflowError);
    });
});

describe('scaleByRatio', () => {
    it('floors the scaled amount', () => {
        expect(scaleByRatio(60n, 500_000_000n)).toBe(30n);
        expect(scaleByRatio(1n, 500_000_000n)).toBe(0n);
        expect(scaleByRatio(7n, 333_333_333n)).toBe(2n);
    });

    it('fails when the result exceeds u64', () => {
        expect(() => scaleByRatio(U64_MAX, U64_MAX)).toThrow(ArithmeticOverflowError);
    });
});

describe('computeMarketCap', () => {
    it('prices the whole old supply at the pool ratio', () => {
        expect(computeMarketCap(200_000n, 100_000n, 1_000_000n)).toBe(500_000n);
    });

    it('is zero for an empty old reserve', () => {
        expect(computeMarketCap(0n, 100_000n, 1_000_000n)).toBe(0n);
    });

    it('detects u128 overflow of reserve_base * supply', () => {
        expect(() => computeMarketCap(1n, U128_MAX, 2n)).toThrow(ArithmeticOverflowError);
    });
});

describe('computeInitialSqrtPrice', () => {
    it('returns Q64 for price 1', () => {
        expect(computeInitialSqrtPrice(500_000n, 500_000n)).toBe(Q64);
    });

    it('returns 2 * Q64 for price 4', () => {
        expect(computeInitialSqrtPrice(4n, 1n)).toBe(2n * Q64);
    });

    it('rejects a zero new supply', () => {
        expect(() => computeInitialSqrtPrice(100n, 0n)).toThrow(InvalidSupplyError);
    });
});

describe('invertSqrtPrice', () => {
    it('maps 1 to 1 and 4 to 1/4', () => {
        expect(invertSqrtPrice(Q64)).toBe(Q64);
        expect(invertSqrtPrice(2n * Q64)).toBe(Q64 / 2n);
    });

    it('rejects zero', () => {
        expect(() => invertSqrtPrice(0n)).toThrow(ArithmeticError);
    });
});

describe('isqrt', () => {
    it('handles the small cases', () => {
        expect([0n, 1n, 2n, 3n, 4n, 15n, 16n].map(isqrt)).toEqual([0n, 1n, 1n, 1n, 2n, 3n, 4n]);
    });

    it('floors non-squares', () => {
        expect(isqrt(499_849n)).toBe(707n);
        expect(isqrt(500_000n)).toBe(707n);
    });

    it('covers the full u128 domain', () => {
        expect(isqrt(U128_MAX)).toBe(U64_MAX);
    });

    it('brackets large inputs between consecutive squares', () => {
        const square = U64_MAX * U64_MAX;
        const root = 3_037_000_499n;
        const inputs = [
            square - 1n,
            square,
            square + 1n,
            U128_MAX,
            1n << 127n,
            (1n << 127n) - 1n,
            (1n << 127n) + 1n,
            root * root - 1n,
            root * root,
            root * root + 1n,
            (U64_MAX - 12_345n) ** 2n - 1n,
            (U64_MAX - 12_345n) ** 2n,
            (U64_MAX - 12_345n) ** 2n + 1n,
            (Q64 >> 1n) ** 2n + 1n,
        ];

        for (const n of inputs) {
            const r = isqrt(n);
            expect(r * r <= n).toBe(true);
            expect((r + 1n) * (r + 1n) > n).toBe(true);
        }
        expect(isqrt(square)).toBe(U64_MAX);
        expect(isqrt(square - 1n)).toBe(U64_MAX - 1n);
    });

    it('rejects inputs outside u128', () => {
        expect(() => isqrt(U128_MAX + 1n)).toThrow(ArithmeticOverflowError);
        expect(() => isqrt(-1n)).toThrow(ArithmeticOverflowError);
    });
});

describe('formatting', () => {
    it('formats ratios and prices', () => {
        expect(formatRatio(500_000_000n)).toBe('0.5000');
        expect(sqrtPriceToPrice(2n * Q64)).toBe('4.000000');
    });
});
