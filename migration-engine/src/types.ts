/**
 * Coin Migration Engine — Shared Types
 *
 * Core interfaces used across the migration controller,
 * escrow vault, snapshot verifier, AMM adapter and PTB builder.
 */

import type { Balance, TreasuryCap } from './balance.js';

// ============================================================
// Scaling & Numeric Bounds
// ============================================================

/** Canonical ratio scaling factor: 1e9 */
export const RATIO_SCALING = 1_000_000_000n;

/** Q64.64 fixed-point one */
export const Q64 = 1n << 64n;

export const U64_MAX = (1n << 64n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;

/** Concentrated-liquidity sqrt price bounds (Q64.64) */
export const MIN_SQRT_PRICE = 4_295_048_016n;
export const MAX_SQRT_PRICE = 79_226_673_515_401_279_992_447_579_055n;

/** Concentrated-liquidity tick bounds */
export const MIN_TICK = -443_636;
export const MAX_TICK = 443_636;

/** Fee tier (fee rate in 1e6 units) → tick spacing */
export const FEE_TIER_TICK_SPACING: Readonly<Record<number, number>> = {
    100: 2,
    500: 10,
    2500: 60,
    10000: 200,
};

// ============================================================
// Identity & Time
// ============================================================

/** Normalized 0x-prefixed, 64 hex digit Sui address */
export type SuiAddress = string;

/** 32-byte hash (snapshot root, leaf, proof node) */
export type Hash32 = Uint8Array;

/** Source of the single timestamp read per call (milliseconds). */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Date.now(),
};

/** The four coin type tags a controller is instantiated with. */
export interface MigrationCoinTypes<
    Old extends string = string,
    New extends string = string,
    Base extends string = string,
    Receipt extends string = string,
> {
    old: Old;
    new: New;
    base: Base;
    receipt: Receipt;
}

// ============================================================
// AMM Venue (external collaborator contract)
// ============================================================

/**
 * Pool state as the venue stores it. `coinTypeA`/`coinTypeB` are in the
 * venue's canonical storage order; `sqrtPrice` is sqrt(B per A) in Q64.64.
 */
export interface ClmmPoolInfo {
    poolId: string;
    coinTypeA: string;
    coinTypeB: string;
    feeTier: number;
    tickSpacing: number;
    reserveA: bigint;
    reserveB: bigint;
    sqrtPrice: bigint;
}

/** Liquidity position handle, owned by whoever receives it. */
export interface ClmmPosition {
    positionId: string;
    poolId: string;
    tickLower: number;
    tickUpper: number;
    amountA: bigint;
    amountB: bigint;
}

/**
 * A concentrated-liquidity venue (Cetus-style). Pairs are keyed by
 * (coinTypeA, coinTypeB, feeTier) in the venue's canonical order.
 *
 * A call that fails must leave the balances it was handed untouched.
 */
export interface ClmmVenue {
    /** Human-readable venue name */
    name: string;

    /** True when (coinTypeA, coinTypeB) is the venue's storage order. */
    isCanonicalPair(coinTypeA: string, coinTypeB: string): boolean;

    /** Pool stored under exactly this order, or null. */
    getPool(coinTypeA: string, coinTypeB: string, feeTier: number): Promise<ClmmPoolInfo | null>;

    /** Create a pool; fails if the pair + fee tier already exists. Returns the pool id. */
    createPool(params: {
        coinTypeA: string;
        coinTypeB: string;
        feeTier: number;
        initialSqrtPrice: bigint;
    }): Promise<string>;

    addLiquidity<A extends string, B extends string>(params: {
        poolId: string;
        balanceA: Balance<A>;
        balanceB: Balance<B>;
        tickLower: number;
        tickUpper: number;
        deadlineMs: number;
    }): Promise<ClmmPosition>;

    swapExactInput<In extends string, Out extends string>(params: {
        poolId: string;
        input: Balance<In>;
        outputCoinType: Out;
        minAmountOut: bigint;
        deadlineMs: number;
    }): Promise<Balance<Out>>;
}

/** A pair in the caller's orientation: prices are quoted as Y per X. */
export interface PairKey<X extends string = string, Y extends string = string> {
    coinTypeX: X;
    coinTypeY: Y;
}

export interface PairReserves {
    poolId: string;
    reserveX: bigint;
    reserveY: bigint;
    /** sqrt(Y per X), Q64.64 */
    sqrtPrice: bigint;
    /** Whether the venue stores the pair as (Y, X) */
    reversed: boolean;
}

// ============================================================
// Migration Operations
// ============================================================

export interface InitializeParams<New extends string, Receipt extends string> {
    oldSupply: bigint;
    newSupply: bigint;
    snapshotRoot: Hash32;
    newTreasury: TreasuryCap<New>;
    receiptTreasury: TreasuryCap<Receipt>;
}

/** How the escrowed OLD balance is sold for BASE at finalization. */
export interface LiquidationParams {
    /** Fee tier of the OLD/BASE pool used for the swap (and for pricing) */
    feeTier: number;
    /** Slippage floor: the swap fails below this BASE output */
    minBaseOut: bigint;
}

/** Where and how the NEW/BASE pool is seeded. */
export interface NewPoolParams {
    feeTier: number;
    /** Range in NEW/BASE orientation (price of BASE per NEW) */
    tickLower: number;
    tickUpper: number;
    /** sqrt(BASE per NEW) Q64.64; derived from the OLD market cap when omitted */
    initialSqrtPrice?: bigint;
}

export interface FinalizeResult {
    migrationId: string;
    /** Totals across attempts: a retry after a failed bootstrap does not sell again */
    liquidatedOld: bigint;
    baseProceeds: bigint;
    baseSeeded: bigint;
    newMinted: bigint;
    sqrtPrice: bigint;
    position: ClmmPosition;
}

export interface VaultBalances {
    base: bigint;
    old: bigint;
}

/** Read-only view over an instance's escrow vault. */
export interface VaultReader {
    isLocked(): boolean;
    balances(): VaultBalances;
}

/** Point-in-time view of one migration instance. */
export interface MigrationSnapshot {
    migrationId: string;
    admin: SuiAddress;
    ratio: bigint;
    oldSupply: bigint;
    newSupply: bigint;
    snapshotRoot: string;
    finalized: boolean;
    locked: boolean;
    startTimeMs: number;
    vault: VaultBalances;
    participants: number;
    totalMigrated: bigint;
    receiptsOutstanding: bigint;
    newMinted: bigint;
    totalClaimed: bigint;
}

// ============================================================
// On-chain Package Constants
// ============================================================

export const MIGRATION_MODULES = {
    MIGRATION: 'migration',
} as const;

export const MIGRATION_FUNCTIONS = {
    LOCK_LIQUIDITY: 'lock_liquidity',
    MIGRATE: 'migrate',
    FINALIZE_AND_CREATE_POOL: 'finalize_and_create_pool',
    CLAIM: 'claim',
} as const;

/** Sui shared clock object */
export const CLOCK_OBJECT_ID = '0x6';
