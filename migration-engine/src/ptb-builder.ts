/**
 * Coin Migration Engine — PTB Builder
 *
 * Assembles Sui Programmable Transaction Blocks against the deployed
 * migration package, for wallets and scripts that drive the on-chain
 * version of the protocol:
 *
 *   lock_liquidity            admin seeds BASE + OLD
 *   migrate                   participant deposits OLD, receives receipts
 *   finalize_and_create_pool  admin liquidates and seeds the NEW/BASE pool
 *   claim                     holder burns receipts for NEW
 *
 * Every call is a single moveCall; returned coins are transferred to the
 * recipient in the same transaction.
 */

import { bcs } from '@mysten/sui/bcs';
import { Transaction } from '@mysten/sui/transactions';
import { isValidSuiAddress, normalizeSuiAddress } from '@mysten/sui/utils';
import { InvalidParamsError } from './errors.js';
import {
    CLOCK_OBJECT_ID,
    Hash32,
    LiquidationParams,
    MIGRATION_FUNCTIONS,
    MIGRATION_MODULES,
    MigrationCoinTypes,
    NewPoolParams,
} from './types.js';

// ============================================================
// Config
// ============================================================

export interface MigrationPackageConfig {
    packageId: string;
    /** Shared MigrationConfig object */
    configObjectId: string;
    /** Shared Vault object */
    vaultObjectId: string;
    /** Owned AdminCap; required for admin transactions */
    adminCapId?: string;
    /** CLMM venue shared objects passed to finalize */
    clmmGlobalConfigId?: string;
    clmmPoolsId?: string;
    maxGasBudget?: number;
}

const DEFAULT_GAS_BUDGET = 50_000_000;
const U32_RANGE = 2 ** 32;

/** Move has no signed ints; ticks travel as their u32 two's complement. */
export function encodeTick(tick: number): number {
    return tick < 0 ? tick + U32_RANGE : tick;
}

// ============================================================
// Builder
// ============================================================

export class MigrationTxBuilder {
    private config: MigrationPackageConfig;
    private coinTypes: MigrationCoinTypes;

    constructor(config: MigrationPackageConfig, coinTypes: MigrationCoinTypes) {
        for (const [field, id] of [
            ['packageId', config.packageId],
            ['configObjectId', config.configObjectId],
            ['vaultObjectId', config.vaultObjectId],
        ] as const) {
            if (!isValidSuiAddress(normalizeSuiAddress(id))) {
                throw new InvalidParamsError(`${field} is not a valid object id: ${id}`);
            }
        }
        this.config = config;
        this.coinTypes = coinTypes;
    }

    private target(fn: string): `${string}::${string}::${string}` {
        return `${this.config.packageId}::${MIGRATION_MODULES.MIGRATION}::${fn}`;
    }

    private requireAdminCap(): string {
        if (!this.config.adminCapId) {
            throw new InvalidParamsError('adminCapId is required for admin transactions');
        }
        return this.config.adminCapId;
    }

    private finish(tx: Transaction): Transaction {
        tx.setGasBudget(this.config.maxGasBudget ?? DEFAULT_GAS_BUDGET);
        return tx;
    }

    // --------------------------------------------------------
    // Admin
    // --------------------------------------------------------

    buildLockLiquidity(baseCoinId: string, oldCoinId: string): Transaction {
        const tx = new Transaction();

        tx.moveCall({
            target: this.target(MIGRATION_FUNCTIONS.LOCK_LIQUIDITY),
            arguments: [
                tx.object(this.config.configObjectId),
                tx.object(this.config.vaultObjectId),
                tx.object(this.requireAdminCap()),
                tx.object(baseCoinId),
                tx.object(oldCoinId),
            ],
            typeArguments: [this.coinTypes.old, this.coinTypes.base],
        });

        return this.finish(tx);
    }

    /**
     * Finalize on chain. The liquidation pool is the OLD/BASE pool the
     * escrowed OLD is sold into; `initialSqrtPrice` travels as an Option.
     */
    buildFinalizeAndCreatePool(params: {
        liquidationPoolId: string;
        liquidation: LiquidationParams;
        newPool: NewPoolParams;
    }): Transaction {
        const { clmmGlobalConfigId, clmmPoolsId } = this.config;
        if (!clmmGlobalConfigId || !clmmPoolsId) {
            throw new InvalidParamsError('clmmGlobalConfigId and clmmPoolsId are required to finalize');
        }
        const tx = new Transaction();

        tx.moveCall({
            target: this.target(MIGRATION_FUNCTIONS.FINALIZE_AND_CREATE_POOL),
            arguments: [
                tx.object(this.config.configObjectId),
                tx.object(this.config.vaultObjectId),
                tx.object(this.requireAdminCap()),
                tx.object(clmmGlobalConfigId),
                tx.object(clmmPoolsId),
                tx.object(params.liquidationPoolId),
                tx.pure.u64(params.liquidation.minBaseOut),
                tx.pure.u32(params.newPool.feeTier),
                tx.pure.u32(encodeTick(params.newPool.tickLower)),
                tx.pure.u32(encodeTick(params.newPool.tickUpper)),
                tx.pure.option('u128', params.newPool.initialSqrtPrice ?? null),
                tx.object(CLOCK_OBJECT_ID),
            ],
            typeArguments: [
                this.coinTypes.old,
                this.coinTypes.new,
                this.coinTypes.base,
                this.coinTypes.receipt,
            ],
        });

        return this.finish(tx);
    }

    // --------------------------------------------------------
    // Participants
    // --------------------------------------------------------

    /**
     * Deposit OLD and send the receipts to `recipient`. With `amount`, that
     * much is split off `oldCoinId` first; otherwise the whole coin goes in.
     */
    buildMigrate(params: {
        oldCoinId: string;
        amount?: bigint;
        declaredQuota: bigint;
        proof: readonly Hash32[];
        recipient: string;
    }): Transaction {
        const tx = new Transaction();

        const deposit = params.amount === undefined
            ? tx.object(params.oldCoinId)
            : tx.splitCoins(tx.object(params.oldCoinId), [tx.pure.u64(params.amount)])[0];

        const [receipt] = tx.moveCall({
            target: this.target(MIGRATION_FUNCTIONS.MIGRATE),
            arguments: [
                tx.object(this.config.configObjectId),
                tx.object(this.config.vaultObjectId),
                deposit,
                tx.pure.u64(params.declaredQuota),
                tx.pure(bcs.vector(bcs.vector(bcs.u8())).serialize(params.proof)),
                tx.object(CLOCK_OBJECT_ID),
            ],
            typeArguments: [this.coinTypes.old, this.coinTypes.receipt],
        });

        tx.transferObjects([receipt], tx.pure.address(params.recipient));
        return this.finish(tx);
    }

    buildClaim(receiptCoinId: string, recipient: string): Transaction {
        const tx = new Transaction();

        const [claimed] = tx.moveCall({
            target: this.target(MIGRATION_FUNCTIONS.CLAIM),
            arguments: [
                tx.object(this.config.configObjectId),
                tx.object(receiptCoinId),
            ],
            typeArguments: [this.coinTypes.new, this.coinTypes.receipt],
        });

        tx.transferObjects([claimed], tx.pure.address(recipient));
        return this.finish(tx);
    }
}
