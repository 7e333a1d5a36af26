/**
 * Coin Migration Engine — AMM Adapter
 *
 * Thin boundary over a concentrated-liquidity venue (Cetus-style CLMM).
 * Callers always speak in their own pair orientation (X, Y) with prices
 * quoted as Y per X; the venue stores each pair in its canonical order.
 * The adapter detects reversed storage and translates:
 * - reserves are swapped back into (X, Y)
 * - sqrt prices are inverted (2^128 / sqrtPrice)
 * - tick ranges are mirrored ([lower, upper] → [-upper, -lower])
 * - liquidity amounts are passed in venue order
 *
 * Every time-bounded call uses deadline = now + deadlineBufferMs, where
 * `now` is the caller's single clock reading for the operation.
 */

import type { Balance } from './balance.js';
import { InvalidParamsError, StateError } from './errors.js';
import type { Logger } from './logger.js';
import { invertSqrtPrice } from './math.js';
import {
    Clock,
    ClmmPoolInfo,
    ClmmPosition,
    ClmmVenue,
    FEE_TIER_TICK_SPACING,
    MAX_SQRT_PRICE,
    MAX_TICK,
    MIN_SQRT_PRICE,
    MIN_TICK,
    PairKey,
    PairReserves,
} from './types.js';

// ============================================================
// Types
// ============================================================

interface LocatedPool {
    pool: ClmmPoolInfo;
    reversed: boolean;
}

export interface AmmAdapterConfig {
    venue: ClmmVenue;
    clock: Clock;
    deadlineBufferMs: number;
    logger: Logger;
}

// ============================================================
// Adapter
// ============================================================

export class AmmAdapter {
    private venue: ClmmVenue;
    private clock: Clock;
    private deadlineBufferMs: number;
    private log: Logger;

    constructor(config: AmmAdapterConfig) {
        this.venue = config.venue;
        this.clock = config.clock;
        this.deadlineBufferMs = config.deadlineBufferMs;
        this.log = config.logger.child(`amm:${config.venue.name}`);
    }

    /** Deadline for a call whose clock reading is `nowMs` (read now if omitted). */
    deadline(nowMs: number = this.clock.now()): number {
        return nowMs + this.deadlineBufferMs;
    }

    // --------------------------------------------------------
    // Validation
    // --------------------------------------------------------

    tickSpacing(feeTier: number): number {
        const spacing = FEE_TIER_TICK_SPACING[feeTier];
        if (spacing === undefined) {
            throw new InvalidParamsError(`Unsupported fee tier ${feeTier}`);
        }
        return spacing;
    }

    validateTickRange(feeTier: number, tickLower: number, tickUpper: number): void {
        const spacing = this.tickSpacing(feeTier);
        if (!Number.isInteger(tickLower) || !Number.isInteger(tickUpper)) {
            throw new InvalidParamsError(`Ticks must be integers: [${tickLower}, ${tickUpper}]`);
        }
        if (tickLower >= tickUpper) {
            throw new InvalidParamsError(`tickLower ${tickLower} must be below tickUpper ${tickUpper}`);
        }
        if (tickLower < MIN_TICK || tickUpper > MAX_TICK) {
            throw new InvalidParamsError(`Tick range [${tickLower}, ${tickUpper}] outside [${MIN_TICK}, ${MAX_TICK}]`);
        }
        if (tickLower % spacing !== 0 || tickUpper % spacing !== 0) {
            throw new InvalidParamsError(`Ticks must be multiples of spacing ${spacing} for fee tier ${feeTier}`);
        }
    }

    validateSqrtPrice(sqrtPrice: bigint): void {
        if (sqrtPrice < MIN_SQRT_PRICE || sqrtPrice > MAX_SQRT_PRICE) {
            throw new InvalidParamsError(`sqrt price ${sqrtPrice} outside [${MIN_SQRT_PRICE}, ${MAX_SQRT_PRICE}]`);
        }
    }

    // --------------------------------------------------------
    // Pool Discovery
    // --------------------------------------------------------

    private async locate(coinTypeX: string, coinTypeY: string, feeTier: number): Promise<LocatedPool | null> {
        const direct = await this.venue.getPool(coinTypeX, coinTypeY, feeTier);
        if (direct) return { pool: direct, reversed: false };

        const flipped = await this.venue.getPool(coinTypeY, coinTypeX, feeTier);
        if (flipped) return { pool: flipped, reversed: true };

        return null;
    }

    private async require(coinTypeX: string, coinTypeY: string, feeTier: number): Promise<LocatedPool> {
        const located = await this.locate(coinTypeX, coinTypeY, feeTier);
        if (!located) {
            throw new StateError('PoolNotFound', `${coinTypeX}/${coinTypeY} fee ${feeTier} on ${this.venue.name}`);
        }
        return located;
    }

    async poolExists(pair: PairKey, feeTier: number): Promise<boolean> {
        return (await this.locate(pair.coinTypeX, pair.coinTypeY, feeTier)) !== null;
    }

    // --------------------------------------------------------
    // Reads
    // --------------------------------------------------------

    /** Reserves and sqrt(Y per X) in the caller's orientation. */
    async readReserves(pair: PairKey, feeTier: number): Promise<PairReserves> {
        const { pool, reversed } = await this.require(pair.coinTypeX, pair.coinTypeY, feeTier);

        if (!reversed) {
            return {
                poolId: pool.poolId,
                reserveX: pool.reserveA,
                reserveY: pool.reserveB,
                sqrtPrice: pool.sqrtPrice,
                reversed,
            };
        }
        return {
            poolId: pool.poolId,
            reserveX: pool.reserveB,
            reserveY: pool.reserveA,
            sqrtPrice: pool.sqrtPrice === 0n ? 0n : invertSqrtPrice(pool.sqrtPrice),
            reversed,
        };
    }

    // --------------------------------------------------------
    // Writes
    // --------------------------------------------------------

    /**
     * Create the (X, Y) pool at sqrt(Y per X). The venue decides storage
     * order; the price is flipped when it stores (Y, X).
     */
    async createPool(pair: PairKey, feeTier: number, sqrtPrice: bigint): Promise<string> {
        this.tickSpacing(feeTier);
        this.validateSqrtPrice(sqrtPrice);

        const canonical = this.venue.isCanonicalPair(pair.coinTypeX, pair.coinTypeY);
        const venuePrice = canonical ? sqrtPrice : invertSqrtPrice(sqrtPrice);
        this.validateSqrtPrice(venuePrice);

        const poolId = await this.venue.createPool({
            coinTypeA: canonical ? pair.coinTypeX : pair.coinTypeY,
            coinTypeB: canonical ? pair.coinTypeY : pair.coinTypeX,
            feeTier,
            initialSqrtPrice: venuePrice,
        });

        this.log.info(`Created pool ${poolId} (${canonical ? 'direct' : 'reversed'} order, fee ${feeTier})`);
        return poolId;
    }

    /** Range given in (X, Y) orientation; mirrored for reversed storage. */
    async addLiquidity<X extends string, Y extends string>(
        pair: PairKey<X, Y>,
        feeTier: number,
        amountX: Balance<X>,
        amountY: Balance<Y>,
        tickLower: number,
        tickUpper: number,
        deadlineMs: number = this.deadline(),
    ): Promise<ClmmPosition> {
        this.validateTickRange(feeTier, tickLower, tickUpper);
        const { pool, reversed } = await this.require(pair.coinTypeX, pair.coinTypeY, feeTier);

        const position = reversed
            ? await this.venue.addLiquidity({
                poolId: pool.poolId,
                balanceA: amountY,
                balanceB: amountX,
                tickLower: -tickUpper,
                tickUpper: -tickLower,
                deadlineMs,
            })
            : await this.venue.addLiquidity({
                poolId: pool.poolId,
                balanceA: amountX,
                balanceB: amountY,
                tickLower,
                tickUpper,
                deadlineMs,
            });

        this.log.debug(`Added liquidity to ${pool.poolId}: position ${position.positionId}`);
        return position;
    }

    /** Sell all of `input` for `outputCoinType`; fails below `minAmountOut`. */
    async swapExactInput<In extends string, Out extends string>(
        input: Balance<In>,
        outputCoinType: Out,
        feeTier: number,
        minAmountOut: bigint,
        deadlineMs: number = this.deadline(),
    ): Promise<Balance<Out>> {
        if (input.value === 0n) {
            throw new InvalidParamsError(`Swap input of ${input.coinType} is zero`);
        }
        if (minAmountOut < 0n) {
            throw new InvalidParamsError(`Negative minimum output: ${minAmountOut}`);
        }

        const { pool } = await this.require(input.coinType, outputCoinType, feeTier);
        const amountIn = input.value;
        const output = await this.venue.swapExactInput({
            poolId: pool.poolId,
            input,
            outputCoinType,
            minAmountOut,
            deadlineMs,
        });

        this.log.debug(`Swapped ${amountIn} ${input.coinType} → ${output.value} ${outputCoinType} on ${pool.poolId}`);
        return output;
    }
}
