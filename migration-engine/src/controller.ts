/**
 * Coin Migration Engine — Migration Controller
 *
 * Drives one or more migration instances for a fixed set of coin types:
 *
 *   Initialized → (LiquidityLocked)? → {migrate}* → Finalized → {claim}*
 *
 * Every operation on an instance runs inside that instance's exclusive
 * section, and every check that can fail runs before the first mutation,
 * so a rejected call leaves no trace. Finalization is the exception that
 * talks to the venue mid-flight; it restores local state itself when a
 * venue call fails, and readers see only the state committed before it
 * (see finalizeAndCreatePool).
 *
 * Admin rights are carried by the AdminCap object issued at
 * initialization: whoever holds it can administer the instance, and
 * handing it over transfers administration.
 */

import { AmmAdapter } from './amm-adapter.js';
import { Balance, TreasuryCap } from './balance.js';
import { MigrationEngineConfig, resolveEngineConfig } from './config.js';
import {
    AuthorizationError,
    InsufficientBalanceError,
    InvalidParamsError,
    QuotaExceededError,
    StateError,
} from './errors.js';
import { EventSink, MIGRATION_EVENT_TYPES, MigrationEvent, emitSafely } from './events.js';
import { ParticipantLedger } from './ledger.js';
import { Logger, createLogger } from './logger.js';
import {
    assertU64,
    computeInitialSqrtPrice,
    computeMarketCap,
    computeRatio,
    formatRatio,
    scaleByRatio,
} from './math.js';
import { KeyedMutex } from './mutex.js';
import { HASH_LENGTH, formatHash, normalizeParticipant, verifyProof } from './snapshot.js';
import {
    ClmmPosition,
    ClmmVenue,
    Clock,
    FinalizeResult,
    Hash32,
    InitializeParams,
    LiquidationParams,
    MigrationCoinTypes,
    MigrationSnapshot,
    NewPoolParams,
    PairKey,
    SuiAddress,
    VaultReader,
    systemClock,
} from './types.js';
import { EscrowVault } from './vault.js';

// ============================================================
// Admin Capability
// ============================================================

/** Possession authorizes admin operations on `migrationId`. */
export class AdminCap {
    readonly migrationId: string;

    constructor(migrationId: string) {
        this.migrationId = migrationId;
    }
}

// ============================================================
// Instance State
// ============================================================

interface UnseededPool {
    poolId: string;
    feeTier: number;
    sqrtPrice: bigint;
}

interface FinalizePlan<New extends string, Base extends string> {
    liquidation: LiquidationParams;
    newPool: NewPoolParams;
    newPair: PairKey<New, Base>;
    resumed: UnseededPool | null;
    sqrtPrice: bigint;
    newMinted: bigint;
    nowMs: number;
    deadlineMs: number;
}

interface MigrationInstance<Old extends string, New extends string, Base extends string, Receipt extends string> {
    id: string;
    admin: SuiAddress;
    adminCap: AdminCap;
    ratio: bigint;
    oldSupply: bigint;
    newSupply: bigint;
    snapshotRoot: Hash32;
    finalized: boolean;
    startTimeMs: number;
    newTreasury: TreasuryCap<New>;
    receiptTreasury: TreasuryCap<Receipt>;
    ledger: ParticipantLedger;
    vault: EscrowVault<Old, Base>;
    /** OLD sold through the venue so far (survives a failed pool bootstrap) */
    liquidatedOld: bigint;
    /** BASE received for `liquidatedOld` */
    liquidationProceeds: bigint;
    /** NEW/BASE pool created by an attempt that failed before seeding it */
    unseededPool: UnseededPool | null;
    /** Committed view served to readers while finalization is in flight */
    pinnedView: MigrationSnapshot | null;
    newMinted: bigint;
    totalClaimed: bigint;
    log: Logger;
}

export interface MigrationControllerOptions<
    Old extends string,
    New extends string,
    Base extends string,
    Receipt extends string,
> {
    coinTypes: MigrationCoinTypes<Old, New, Base, Receipt>;
    venue: ClmmVenue;
    clock?: Clock;
    events?: EventSink | EventSink[];
    logger?: Logger;
    config?: Partial<MigrationEngineConfig>;
}

// ============================================================
// Controller
// ============================================================

export class MigrationController<
    Old extends string,
    New extends string,
    Base extends string,
    Receipt extends string,
> {
    readonly coinTypes: MigrationCoinTypes<Old, New, Base, Receipt>;

    private config: MigrationEngineConfig;
    private clock: Clock;
    private adapter: AmmAdapter;
    private sinks: EventSink[];
    private log: Logger;
    private mutex = new KeyedMutex();
    private instances: Map<string, MigrationInstance<Old, New, Base, Receipt>> = new Map();
    private boundTreasuries: WeakSet<TreasuryCap<string>> = new WeakSet();
    private nextId = 1;

    constructor(options: MigrationControllerOptions<Old, New, Base, Receipt>) {
        const { old, base, receipt } = options.coinTypes;
        const distinct = new Set([old, options.coinTypes.new, base, receipt]);
        if (distinct.size !== 4) {
            throw new InvalidParamsError('OLD, NEW, BASE and RECEIPT coin types must be distinct');
        }

        this.coinTypes = options.coinTypes;
        this.config = resolveEngineConfig(options.config);
        this.clock = options.clock ?? systemClock;
        this.log = options.logger ?? createLogger('Migration', this.config.logLevel);
        this.sinks = options.events === undefined
            ? []
            : Array.isArray(options.events) ? options.events : [options.events];
        this.adapter = new AmmAdapter({
            venue: options.venue,
            clock: this.clock,
            deadlineBufferMs: this.config.deadlineBufferMs,
            logger: this.log,
        });
    }

    // --------------------------------------------------------
    // Initialize
    // --------------------------------------------------------

    /**
     * Create a migration instance and its vault. `sender` is recorded as
     * the admin; the returned AdminCap is what authorizes admin calls.
     */
    async initialize(
        sender: string,
        params: InitializeParams<New, Receipt>,
    ): Promise<{ migrationId: string; adminCap: AdminCap }> {
        const admin = normalizeParticipant(sender);
        const ratio = computeRatio(params.oldSupply, params.newSupply);

        if (params.snapshotRoot.length !== HASH_LENGTH) {
            throw new InvalidParamsError(`Snapshot root must be ${HASH_LENGTH} bytes, got ${params.snapshotRoot.length}`);
        }
        this.checkTreasury(params.newTreasury, this.coinTypes.new);
        this.checkTreasury(params.receiptTreasury, this.coinTypes.receipt);
        if (params.receiptTreasury.totalSupply !== 0n) {
            throw new InvalidParamsError('Receipt treasury must start with zero supply');
        }

        const nowMs = this.clock.now();
        const id = `mig-${this.nextId++}`;
        const adminCap = new AdminCap(id);

        this.boundTreasuries.add(params.newTreasury);
        this.boundTreasuries.add(params.receiptTreasury);
        const instance: MigrationInstance<Old, New, Base, Receipt> = {
            id,
            admin,
            adminCap,
            ratio,
            oldSupply: params.oldSupply,
            newSupply: params.newSupply,
            snapshotRoot: Uint8Array.from(params.snapshotRoot),
            finalized: false,
            startTimeMs: nowMs,
            newTreasury: params.newTreasury,
            receiptTreasury: params.receiptTreasury,
            ledger: new ParticipantLedger(),
            vault: EscrowVault.create(this.coinTypes.base, this.coinTypes.old),
            liquidatedOld: 0n,
            liquidationProceeds: 0n,
            unseededPool: null,
            pinnedView: null,
            newMinted: 0n,
            totalClaimed: 0n,
            log: this.log.child(id),
        };
        this.instances.set(id, instance);

        instance.log.info(
            `Initialized: ratio ${formatRatio(ratio)} (${params.oldSupply} OLD → ${params.newSupply} NEW), admin ${admin}`,
        );
        this.emit({
            type: MIGRATION_EVENT_TYPES.INITIALIZED,
            migrationId: id,
            timestampMs: nowMs,
            admin,
            oldCoinType: this.coinTypes.old,
            newCoinType: this.coinTypes.new,
            receiptCoinType: this.coinTypes.receipt,
            oldSupply: params.oldSupply,
            newSupply: params.newSupply,
            ratio,
        });

        return { migrationId: id, adminCap };
    }

    // --------------------------------------------------------
    // Lock Liquidity
    // --------------------------------------------------------

    /** One-time admin seed of BASE and OLD into the vault. */
    async lockLiquidity(
        migrationId: string,
        adminCap: AdminCap,
        base: Balance<Base>,
        old: Balance<Old>,
    ): Promise<void> {
        return this.mutex.runExclusive(migrationId, async () => {
            const instance = this.require(migrationId);
            this.requireAdmin(instance, adminCap);
            this.requireOpen(instance);

            const baseAmount = base.value;
            const oldAmount = old.value;
            const current = instance.vault.balances();
            assertU64(current.base + baseAmount, 'vault base balance');
            assertU64(current.old + oldAmount, 'vault old balance');

            instance.vault.lockLiquidity(base, old);

            instance.log.info(`Liquidity locked: ${baseAmount} BASE + ${oldAmount} OLD`);
            this.emit({
                type: MIGRATION_EVENT_TYPES.LIQUIDITY_LOCKED,
                migrationId,
                timestampMs: this.clock.now(),
                baseCoinType: this.coinTypes.base,
                oldCoinType: this.coinTypes.old,
                baseAmount,
                oldAmount,
            });
        });
    }

    // --------------------------------------------------------
    // Migrate
    // --------------------------------------------------------

    /**
     * Deposit OLD against the participant's snapshot quota and receive
     * receipts worth floor(deposit * ratio / 1e9). Accepted regardless of
     * the vault's lock state.
     */
    async migrate(
        migrationId: string,
        participant: string,
        deposit: Balance<Old>,
        declaredQuota: bigint,
        proof: readonly Hash32[],
    ): Promise<Balance<Receipt>> {
        return this.mutex.runExclusive(migrationId, async () => {
            const instance = this.require(migrationId);
            this.requireOpen(instance);

            const address = normalizeParticipant(participant);
            if (proof.length > this.config.maxProofLength) {
                throw new InvalidParamsError(`Proof has ${proof.length} elements, limit is ${this.config.maxProofLength}`);
            }
            verifyProof(instance.snapshotRoot, address, declaredQuota, proof);

            const amount = deposit.value;
            const prior = instance.ledger.get(address);
            const total = prior + amount;
            if (total > declaredQuota) {
                throw new QuotaExceededError(address, declaredQuota, total);
            }

            const receiptAmount = scaleByRatio(amount, instance.ratio);
            assertU64(instance.receiptTreasury.totalSupply + receiptAmount, 'receipt supply');
            assertU64(instance.vault.balances().old + amount, 'vault old balance');

            instance.vault.depositOld(deposit);
            instance.ledger.upsert(address, total);
            const receipt = instance.receiptTreasury.mint(receiptAmount);

            instance.log.info(`${address} migrated ${amount} OLD → ${receiptAmount} receipts (${total}/${declaredQuota})`);
            this.emit({
                type: MIGRATION_EVENT_TYPES.USER_MIGRATED,
                migrationId,
                timestampMs: this.clock.now(),
                participant: address,
                oldCoinType: this.coinTypes.old,
                receiptCoinType: this.coinTypes.receipt,
                oldAmount: amount,
                receiptAmount,
                totalMigrated: total,
            });

            return receipt;
        });
    }

    // --------------------------------------------------------
    // Finalize & Create Pool
    // --------------------------------------------------------

    /**
     * Liquidate the escrowed OLD for BASE, mint NEW for the liquidated
     * amount, create the NEW/BASE pool and seed it with everything.
     *
     * Order: validate → set finalized → drain OLD → swap (slippage floor)
     * → drain BASE → mint NEW → create pool → add liquidity.
     *
     * A failed swap hands OLD back to the vault and clears `finalized`.
     * A failure after the swap burns the minted NEW, returns the BASE to
     * the vault and clears `finalized`; the liquidated OLD is remembered so
     * a retry mints against it. A pool created by an attempt that failed
     * before seeding it is remembered as well, and the retry seeds that
     * pool at its original price instead of creating another.
     *
     * Readers keep seeing the state committed before the call until it
     * settles.
     */
    async finalizeAndCreatePool(
        migrationId: string,
        adminCap: AdminCap,
        liquidation: LiquidationParams,
        newPool: NewPoolParams,
    ): Promise<FinalizeResult> {
        return this.mutex.runExclusive(migrationId, async () => {
            const instance = this.require(migrationId);
            this.requireAdmin(instance, adminCap);
            this.requireOpen(instance);
            if (!instance.vault.isLocked()) {
                throw new StateError('NotLocked', 'Vault liquidity must be locked before finalization');
            }

            const nowMs = this.clock.now();
            const deadlineMs = this.adapter.deadline(nowMs);
            const oldPair: PairKey<Old, Base> = { coinTypeX: this.coinTypes.old, coinTypeY: this.coinTypes.base };
            const newPair: PairKey<New, Base> = { coinTypeX: this.coinTypes.new, coinTypeY: this.coinTypes.base };

            // -- validation: nothing below may throw once state changes start
            this.adapter.tickSpacing(liquidation.feeTier);
            this.adapter.validateTickRange(newPool.feeTier, newPool.tickLower, newPool.tickUpper);
            if (liquidation.minBaseOut < 0n) {
                throw new InvalidParamsError(`Negative minBaseOut: ${liquidation.minBaseOut}`);
            }
            const resumed = await this.resumablePool(instance, newPair, newPool.feeTier);

            const sqrtPrice = resumed?.sqrtPrice
                ?? newPool.initialSqrtPrice
                ?? await this.deriveSqrtPrice(instance, oldPair, liquidation.feeTier);
            this.adapter.validateSqrtPrice(sqrtPrice);

            const pending = instance.vault.balances();
            if (pending.base === 0n) {
                throw new InsufficientBalanceError('Vault base balance is empty');
            }
            const newMinted = scaleByRatio(instance.liquidatedOld + pending.old, instance.ratio);
            assertU64(instance.newTreasury.totalSupply + newMinted, 'new asset supply');

            instance.pinnedView = this.view(instance);
            try {
                return await this.bootstrap(instance, {
                    liquidation,
                    newPool,
                    newPair,
                    resumed,
                    sqrtPrice,
                    newMinted,
                    nowMs,
                    deadlineMs,
                });
            } finally {
                instance.pinnedView = null;
            }
        });
    }

    /**
     * The NEW/BASE pool a retry may seed, or null when none exists yet.
     * Any other existing pool at this fee tier blocks finalization.
     */
    private async resumablePool(
        instance: MigrationInstance<Old, New, Base, Receipt>,
        newPair: PairKey<New, Base>,
        feeTier: number,
    ): Promise<UnseededPool | null> {
        if (!(await this.adapter.poolExists(newPair, feeTier))) {
            return null;
        }

        const reserves = await this.adapter.readReserves(newPair, feeTier);
        const unseeded = instance.unseededPool;
        if (
            unseeded === null
            || unseeded.poolId !== reserves.poolId
            || unseeded.feeTier !== feeTier
            || reserves.reserveX !== 0n
            || reserves.reserveY !== 0n
        ) {
            throw new StateError('PoolAlreadyExists', `${this.coinTypes.new}/${this.coinTypes.base} fee ${feeTier}`);
        }
        return unseeded;
    }

    /** Liquidation and pool bootstrap, once every check has passed. */
    private async bootstrap(
        instance: MigrationInstance<Old, New, Base, Receipt>,
        plan: FinalizePlan<New, Base>,
    ): Promise<FinalizeResult> {
        const { liquidation, newPool, newPair, resumed, sqrtPrice, newMinted, nowMs, deadlineMs } = plan;
        const migrationId = instance.id;

        // -- liquidation
        instance.finalized = true;
        const oldIn = instance.vault.withdrawOld();
        const sold = oldIn.value;

        let proceeds: Balance<Base>;
        if (sold === 0n) {
            oldIn.destroyZero();
            proceeds = Balance.zero(this.coinTypes.base);
            instance.log.warn('No escrowed OLD left to liquidate');
        } else {
            try {
                proceeds = await this.adapter.swapExactInput(
                    oldIn,
                    this.coinTypes.base,
                    liquidation.feeTier,
                    liquidation.minBaseOut,
                    deadlineMs,
                );
            } catch (err) {
                instance.vault.depositOld(oldIn);
                instance.finalized = false;
                throw err;
            }
            instance.liquidatedOld += sold;
            instance.liquidationProceeds += proceeds.value;
        }

        // -- pool bootstrap
        const seedBase = instance.vault.withdrawBase();
        seedBase.join(proceeds);
        const baseSeeded = seedBase.value;
        const seedNew = instance.newTreasury.mint(newMinted);

        let poolId: string;
        let position: ClmmPosition;
        try {
            if (resumed) {
                poolId = resumed.poolId;
                instance.log.warn(`Seeding pool ${poolId} left empty by an earlier attempt`);
            } else {
                poolId = await this.adapter.createPool(newPair, newPool.feeTier, sqrtPrice);
                instance.unseededPool = { poolId, feeTier: newPool.feeTier, sqrtPrice };
            }
            position = await this.adapter.addLiquidity(
                newPair,
                newPool.feeTier,
                seedNew,
                seedBase,
                newPool.tickLower,
                newPool.tickUpper,
                deadlineMs,
            );
        } catch (err) {
            if (!seedNew.isConsumed) instance.newTreasury.burn(seedNew);
            if (!seedBase.isConsumed) instance.vault.restoreBase(seedBase);
            instance.finalized = false;
            instance.log.error(
                `Pool bootstrap failed after liquidating ${instance.liquidatedOld} OLD; BASE returned to vault`,
                err,
            );
            throw err;
        }

        instance.unseededPool = null;
        instance.newMinted += newMinted;
        const baseProceeds = instance.liquidationProceeds;
        instance.log.info(
            `Finalized: sold ${sold} OLD (${baseProceeds} BASE in total), seeded pool ${poolId} with ${newMinted} NEW + ${baseSeeded} BASE`,
        );

        this.emit({
            type: MIGRATION_EVENT_TYPES.FINALIZED,
            migrationId,
            timestampMs: nowMs,
            oldCoinType: this.coinTypes.old,
            baseCoinType: this.coinTypes.base,
            newCoinType: this.coinTypes.new,
            liquidatedOld: instance.liquidatedOld,
            baseProceeds,
            newMinted,
        });
        this.emit({
            type: MIGRATION_EVENT_TYPES.POOL_CREATED,
            migrationId,
            timestampMs: nowMs,
            poolId,
            positionId: position.positionId,
            newCoinType: this.coinTypes.new,
            baseCoinType: this.coinTypes.base,
            feeTier: newPool.feeTier,
            sqrtPrice,
            newAmount: newMinted,
            baseAmount: baseSeeded,
        });

        return {
            migrationId,
            liquidatedOld: instance.liquidatedOld,
            baseProceeds,
            baseSeeded,
            newMinted,
            sqrtPrice,
            position,
        };
    }

    /** sqrt(BASE per NEW) implied by the OLD/BASE pool and the OLD supply. */
    private async deriveSqrtPrice(
        instance: MigrationInstance<Old, New, Base, Receipt>,
        oldPair: PairKey<Old, Base>,
        feeTier: number,
    ): Promise<bigint> {
        const reserves = await this.adapter.readReserves(oldPair, feeTier);
        const marketCap = computeMarketCap(reserves.reserveX, reserves.reserveY, instance.oldSupply);
        const sqrtPrice = computeInitialSqrtPrice(marketCap, instance.newSupply);
        instance.log.debug(
            `Derived price from ${reserves.poolId}: reserves ${reserves.reserveX}/${reserves.reserveY}, cap ${marketCap}, sqrt ${sqrtPrice}`,
        );
        return sqrtPrice;
    }

    // --------------------------------------------------------
    // Claim
    // --------------------------------------------------------

    /** Burn a receipt for the same amount of NEW. Only after finalization. */
    async claim(migrationId: string, receipt: Balance<Receipt>): Promise<Balance<New>> {
        return this.mutex.runExclusive(migrationId, async () => {
            const instance = this.require(migrationId);
            if (!instance.finalized) {
                throw new StateError('ClaimsNotOpen', 'Receipts can be claimed only after finalization');
            }
            if (receipt.coinType !== this.coinTypes.receipt) {
                throw new InvalidParamsError(`Expected ${this.coinTypes.receipt} receipt, got ${receipt.coinType}`);
            }

            const amount = receipt.value;
            if (amount > instance.receiptTreasury.totalSupply) {
                throw new InsufficientBalanceError(`Receipt of ${amount} exceeds outstanding receipts for ${migrationId}`);
            }
            assertU64(instance.newTreasury.totalSupply + amount, 'new asset supply');

            instance.receiptTreasury.burn(receipt);
            const claimed = instance.newTreasury.mint(amount);
            instance.totalClaimed += amount;

            instance.log.info(`Claimed ${amount} NEW`);
            this.emit({
                type: MIGRATION_EVENT_TYPES.RECEIPT_CLAIMED,
                migrationId,
                timestampMs: this.clock.now(),
                receiptCoinType: this.coinTypes.receipt,
                newCoinType: this.coinTypes.new,
                amount,
            });

            return claimed;
        });
    }

    // --------------------------------------------------------
    // Reads
    // --------------------------------------------------------

    migrationIds(): string[] {
        return [...this.instances.keys()];
    }

    getMigration(migrationId: string): MigrationSnapshot {
        const instance = this.require(migrationId);
        const pinned = instance.pinnedView;
        return pinned ? { ...pinned, vault: { ...pinned.vault } } : this.view(instance);
    }

    getVault(migrationId: string): VaultReader {
        const instance = this.require(migrationId);
        return {
            isLocked: () => instance.pinnedView?.locked ?? instance.vault.isLocked(),
            balances: () => {
                const pinned = instance.pinnedView;
                return pinned ? { ...pinned.vault } : instance.vault.balances();
            },
        };
    }

    private view(instance: MigrationInstance<Old, New, Base, Receipt>): MigrationSnapshot {
        return {
            migrationId: instance.id,
            admin: instance.admin,
            ratio: instance.ratio,
            oldSupply: instance.oldSupply,
            newSupply: instance.newSupply,
            snapshotRoot: formatHash(instance.snapshotRoot),
            finalized: instance.finalized,
            locked: instance.vault.isLocked(),
            startTimeMs: instance.startTimeMs,
            vault: instance.vault.balances(),
            participants: instance.ledger.size,
            totalMigrated: instance.ledger.total(),
            receiptsOutstanding: instance.receiptTreasury.totalSupply,
            newMinted: instance.newMinted,
            totalClaimed: instance.totalClaimed,
        };
    }

    /** Cumulative OLD migrated by `participant` (0 if none). */
    migratedOf(migrationId: string, participant: string): bigint {
        return this.require(migrationId).ledger.get(normalizeParticipant(participant));
    }

    /** Receipts a deposit of `oldAmount` would mint right now. */
    quoteReceipt(migrationId: string, oldAmount: bigint): bigint {
        return scaleByRatio(oldAmount, this.require(migrationId).ratio);
    }

    // --------------------------------------------------------
    // Guards
    // --------------------------------------------------------

    private require(migrationId: string): MigrationInstance<Old, New, Base, Receipt> {
        const instance = this.instances.get(migrationId);
        if (!instance) {
            throw new StateError('UnknownMigration', migrationId);
        }
        return instance;
    }

    private requireAdmin(instance: MigrationInstance<Old, New, Base, Receipt>, cap: AdminCap): void {
        if (cap !== instance.adminCap) {
            throw new AuthorizationError(`AdminCap does not authorize ${instance.id}`);
        }
    }

    private requireOpen(instance: MigrationInstance<Old, New, Base, Receipt>): void {
        if (instance.finalized) {
            throw new StateError('AlreadyFinalized', instance.id);
        }
    }

    private checkTreasury(treasury: TreasuryCap<string>, coinType: string): void {
        if (treasury.coinType !== coinType) {
            throw new InvalidParamsError(`Treasury for ${treasury.coinType} where ${coinType} was expected`);
        }
        if (this.boundTreasuries.has(treasury)) {
            throw new InvalidParamsError(`Treasury for ${coinType} is already bound to a migration`);
        }
    }

    private emit(event: MigrationEvent): void {
        emitSafely(this.sinks, event, this.log);
    }
}
