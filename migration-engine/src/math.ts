/**
 * Coin Migration Engine — Math Module
 *
 * Bit-identical TypeScript mirrors of the on-chain migration pricing
 * functions. Every intermediate is range-checked as the Move integer
 * type it lives in (u64 or u128) so off-chain previews abort exactly
 * where on-chain execution would.
 *
 * Ratio representation: NEW per 1 OLD, scaled by 1e9.
 * Price representation: sqrt(BASE per NEW) in Q64.64.
 * Rounding: FLOOR everywhere (participants never over-receive).
 */

import { ArithmeticError, ArithmeticOverflowError, InvalidSupplyError } from './errors.js';
import { Q64, RATIO_SCALING, U128_MAX, U64_MAX } from './types.js';

// ============================================================
// Range Guards
// ============================================================

export function assertU64(value: bigint, what: string): bigint {
    if (value < 0n || value > U64_MAX) {
        throw new ArithmeticOverflowError(`${what} does not fit u64: ${value}`);
    }
    return value;
}

export function assertU128(value: bigint, what: string): bigint {
    if (value < 0n || value > U128_MAX) {
        throw new ArithmeticOverflowError(`${what} does not fit u128: ${value}`);
    }
    return value;
}

// ============================================================
// Migration Ratio
// ============================================================

/**
 * Fixed exchange ratio recorded at initialization.
 * Mirrors: migration::initialize ratio computation
 *
 * Formula: ratio = floor(new_supply * 1e9 / old_supply)
 */
export function computeRatio(oldSupply: bigint, newSupply: bigint): bigint {
    assertU64(oldSupply, 'old supply');
    assertU64(newSupply, 'new supply');
    if (oldSupply === 0n) {
        throw new ArithmeticError('Old asset supply is zero');
    }
    const ratio = (newSupply * RATIO_SCALING) / oldSupply;
    return assertU64(ratio, 'migration ratio');
}

/**
 * Amount of NEW (or receipt) owed for an OLD amount.
 *
 * Formula: floor(amount * ratio / 1e9)
 */
export function scaleByRatio(amount: bigint, ratio: bigint): bigint {
    const product = assertU128(amount * ratio, 'scaled amount product');
    return assertU64(product / RATIO_SCALING, 'scaled amount');
}

// ============================================================
// Market Cap & Initial Price
// ============================================================

/**
 * Implied market cap of the OLD asset, denominated in BASE.
 * Mirrors: pricing::compute_market_cap(reserve_old, reserve_base, total_old_supply)
 *
 * Formula: cap = floor(reserve_base * total_old_supply / reserve_old)
 * Returns 0 when the OLD reserve is empty.
 */
export function computeMarketCap(
    reserveOld: bigint,
    reserveBase: bigint,
    totalOldSupply: bigint,
): bigint {
    if (reserveOld === 0n) return 0n;

    // on-chain this is a reverse-division check on the wrapped u128 product
    const product = reserveBase * totalOldSupply;
    if (product > U128_MAX) {
        throw new ArithmeticOverflowError(
            `reserve_base * total_old_supply overflows u128 (${reserveBase} * ${totalOldSupply})`,
        );
    }
    return product / reserveOld;
}

/**
 * Initial sqrt price for the NEW/BASE pool.
 * Mirrors: pricing::compute_initial_sqrt_price(market_cap, new_supply)
 *
 * Formula: floor(isqrt(market_cap) * 2^64 / isqrt(new_supply))
 *
 * Both roots are taken before scaling to keep the product inside u128;
 * this drops a few low bits versus isqrt((cap << 128) / supply).
 */
export function computeInitialSqrtPrice(marketCap: bigint, newSupply: bigint): bigint {
    if (newSupply === 0n) {
        throw new InvalidSupplyError('New asset supply is zero');
    }
    const rootCap = isqrt(marketCap);
    const rootSupply = isqrt(newSupply);
    const scaled = assertU128(rootCap * Q64, 'scaled market cap root');
    return scaled / rootSupply;
}

/**
 * Flip a Q64.64 sqrt price to the opposite pair orientation.
 *
 * Formula: 2^128 / sqrt_price
 */
export function invertSqrtPrice(sqrtPrice: bigint): bigint {
    if (sqrtPrice === 0n) {
        throw new ArithmeticError('Cannot invert a zero sqrt price');
    }
    return (Q64 * Q64) / sqrtPrice;
}

// ============================================================
// Integer Square Root
// ============================================================

/**
 * floor(sqrt(n)) by Newton/Heron iteration over the u128 domain.
 * The iterate decreases strictly until it reaches the floor root.
 */
export function isqrt(n: bigint): bigint {
    assertU128(n, 'isqrt input');
    if (n < 2n) return n;

    let x = n;
    let y = (x + 1n) >> 1n;
    while (y < x) {
        x = y;
        y = (x + n / x) >> 1n;
    }
    return x;
}

// ============================================================
// Utilities
// ============================================================

/** Convert a Q64.64 sqrt price to a human-readable price (Y per X). */
export function sqrtPriceToPrice(sqrtPrice: bigint, decimals: number = 6): string {
    const num = Number(sqrtPrice) / Number(Q64);
    return (num * num).toFixed(decimals);
}

/** Format a 1e9-scaled ratio as a human-readable string */
export function formatRatio(ratio: bigint, decimals: number = 4): string {
    const num = Number(ratio) / Number(RATIO_SCALING);
    return num.toFixed(decimals);
}
