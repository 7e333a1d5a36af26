/**
 * Coin Migration Engine — Balances & Treasury Caps
 *
 * In-process counterparts of Sui's `Balance<T>` and `TreasuryCap<T>`.
 * The coin type parameter is a string literal tag, so balances of
 * different assets cannot be mixed at compile time; the same tag is
 * carried at runtime for venue routing and for the consumed-balance
 * checks below.
 *
 * Value is only created by `TreasuryCap.mint` and only destroyed by
 * `TreasuryCap.burn`; everything else moves it between balances.
 */

import { assertU64 } from './math.js';
import { InsufficientBalanceError, InvalidParamsError, StateError } from './errors.js';

// ============================================================
// Balance
// ============================================================

export class Balance<T extends string> {
    readonly coinType: T;
    private amount: bigint;
    private consumed = false;

    private constructor(coinType: T, amount: bigint) {
        this.coinType = coinType;
        this.amount = amount;
    }

    static zero<T extends string>(coinType: T): Balance<T> {
        return new Balance(coinType, 0n);
    }

    /** @internal minted value; use TreasuryCap.mint */
    static fromSupply<T extends string>(coinType: T, amount: bigint): Balance<T> {
        return new Balance(coinType, assertU64(amount, 'balance'));
    }

    get value(): bigint {
        this.ensureLive();
        return this.amount;
    }

    get isConsumed(): boolean {
        return this.consumed;
    }

    /** Move all of `other` into this balance; `other` is consumed. */
    join(other: Balance<T>): this {
        this.ensureLive();
        other.ensureLive();
        if (other === this) {
            throw new InvalidParamsError('Cannot join a balance into itself');
        }
        if (other.coinType !== this.coinType) {
            throw new InvalidParamsError(`Coin type mismatch: ${other.coinType} into ${this.coinType}`);
        }
        this.amount = assertU64(this.amount + other.amount, 'joined balance');
        other.amount = 0n;
        other.consumed = true;
        return this;
    }

    split(amount: bigint): Balance<T> {
        this.ensureLive();
        if (amount < 0n) {
            throw new InvalidParamsError(`Negative split amount: ${amount}`);
        }
        if (amount > this.amount) {
            throw new InsufficientBalanceError(`Cannot split ${amount} from ${this.amount} ${this.coinType}`);
        }
        this.amount -= amount;
        return new Balance(this.coinType, amount);
    }

    /** Take everything out, leaving this balance at zero (still live). */
    withdrawAll(): Balance<T> {
        return this.split(this.value);
    }

    destroyZero(): void {
        this.ensureLive();
        if (this.amount !== 0n) {
            throw new InvalidParamsError(`Balance of ${this.amount} ${this.coinType} is not zero`);
        }
        this.consumed = true;
    }

    /** @internal */
    markBurned(): bigint {
        this.ensureLive();
        const amount = this.amount;
        this.amount = 0n;
        this.consumed = true;
        return amount;
    }

    private ensureLive(): void {
        if (this.consumed) {
            throw new StateError('BalanceConsumed', `${this.coinType} balance was already consumed`);
        }
    }
}

/** Narrow a loosely typed balance to a known coin type tag. */
export function isBalanceOf<T extends string>(balance: Balance<string>, coinType: T): balance is Balance<T> {
    return balance.coinType === coinType;
}

// ============================================================
// Treasury Cap
// ============================================================

export class TreasuryCap<T extends string> {
    readonly coinType: T;
    private supply = 0n;

    constructor(coinType: T) {
        this.coinType = coinType;
    }

    get totalSupply(): bigint {
        return this.supply;
    }

    mint(amount: bigint): Balance<T> {
        if (amount < 0n) {
            throw new InvalidParamsError(`Negative mint amount: ${amount}`);
        }
        this.supply = assertU64(this.supply + amount, `${this.coinType} total supply`);
        return Balance.fromSupply(this.coinType, amount);
    }

    burn(balance: Balance<T>): bigint {
        if (balance.coinType !== this.coinType) {
            throw new InvalidParamsError(`Cannot burn ${balance.coinType} with ${this.coinType} cap`);
        }
        if (balance.value > this.supply) {
            throw new InsufficientBalanceError(`Cannot burn ${balance.value} ${this.coinType}; supply is ${this.supply}`);
        }
        const amount = balance.markBurned();
        this.supply -= amount;
        return amount;
    }
}
