/**
 * Coin Migration Engine — Escrow Vault
 *
 * Holds the BASE seed and the escrowed OLD balance for one migration
 * instance until finalization. Only the controller holds a reference;
 * the outside world sees it through `VaultReader`.
 */

import { Balance } from './balance.js';
import { InsufficientBalanceError, InvalidParamsError, StateError } from './errors.js';
import { assertU64 } from './math.js';
import type { VaultBalances, VaultReader } from './types.js';

export class EscrowVault<Old extends string, Base extends string> implements VaultReader {
    private base: Balance<Base>;
    private old: Balance<Old>;
    private locked = false;

    private constructor(baseCoinType: Base, oldCoinType: Old) {
        this.base = Balance.zero(baseCoinType);
        this.old = Balance.zero(oldCoinType);
    }

    static create<Old extends string, Base extends string>(
        baseCoinType: Base,
        oldCoinType: Old,
    ): EscrowVault<Old, Base> {
        return new EscrowVault(baseCoinType, oldCoinType);
    }

    /** One-time admin seed. Both balances move in together or neither does. */
    lockLiquidity(base: Balance<Base>, old: Balance<Old>): void {
        if (this.locked) {
            throw new StateError('AlreadyLocked', 'Vault liquidity is already locked');
        }
        if (base.isConsumed || old.isConsumed) {
            throw new StateError('BalanceConsumed', 'Seed balance was already consumed');
        }
        if (base.coinType !== this.base.coinType || old.coinType !== this.old.coinType) {
            throw new InvalidParamsError(
                `Seed must be ${this.base.coinType} + ${this.old.coinType}, got ${base.coinType} + ${old.coinType}`,
            );
        }
        assertU64(this.base.value + base.value, 'vault base balance');
        assertU64(this.old.value + old.value, 'vault old balance');
        this.base.join(base);
        this.old.join(old);
        this.locked = true;
    }

    /** No lock-state precondition: deposits are accepted before the seed too. */
    depositOld(old: Balance<Old>): void {
        this.old.join(old);
    }

    /** Drains the BASE balance; an empty balance is an error. */
    withdrawBase(): Balance<Base> {
        if (this.base.value === 0n) {
            throw new InsufficientBalanceError('Vault base balance is empty');
        }
        return this.base.withdrawAll();
    }

    /** Drains the OLD balance; an empty balance yields a zero balance. */
    withdrawOld(): Balance<Old> {
        return this.old.withdrawAll();
    }

    /** @internal rollback path: put a drained BASE balance back. */
    restoreBase(base: Balance<Base>): void {
        this.base.join(base);
    }

    isLocked(): boolean {
        return this.locked;
    }

    balances(): VaultBalances {
        return { base: this.base.value, old: this.old.value };
    }
}
