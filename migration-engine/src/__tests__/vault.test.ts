import { describe, it, expect } from 'vitest';
import { EscrowVault } from '../vault.js';
import { TreasuryCap } from '../balance.js';
import { ArithmeticOverflowError, InsufficientBalanceError, InvalidParamsError, StateError } from '../errors.js';
import { U64_MAX } from '../types.js';

const OLD = '0xa::old::OLD';
const BASE = '0xa::usdc::USDC';

function setup() {
    const oldCap = new TreasuryCap(OLD);
    const baseCap = new TreasuryCap(BASE);
    const vault = EscrowVault.create(BASE, OLD);
    return { oldCap, baseCap, vault };
}

describe('EscrowVault', () => {
    it('starts empty and unlocked', () => {
        const { vault } = setup();
        expect(vault.isLocked()).toBe(false);
        expect(vault.balances()).toEqual({ base: 0n, old: 0n });
    });

    it('locks both seed balances once', () => {
        const { vault, oldCap, baseCap } = setup();
        vault.lockLiquidity(baseCap.mint(1_000n), oldCap.mint(900n));

        expect(vault.isLocked()).toBe(true);
        expect(vault.balances()).toEqual({ base: 1_000n, old: 900n });

        const base = baseCap.mint(1n);
        const old = oldCap.mint(1n);
        expect(() => vault.lockLiquidity(base, old)).toThrow(StateError);
        expect(base.isConsumed).toBe(false);
        expect(old.isConsumed).toBe(false);
    });

    it('moves neither balance when one seed is already consumed', () => {
        const { vault, oldCap, baseCap } = setup();
        const base = baseCap.mint(10n);
        const spent = oldCap.mint(5n);
        oldCap.burn(spent);

        expect(() => vault.lockLiquidity(base, spent)).toThrow(StateError);
        expect(base.value).toBe(10n);
        expect(vault.isLocked()).toBe(false);
    });

    it('moves neither balance when a seed has the wrong coin type', () => {
        const vault = EscrowVault.create<string, string>(BASE, OLD);
        const base = new TreasuryCap(BASE).mint(1_000n);
        const stray = new TreasuryCap('0xa::receipt::RECEIPT').mint(5n);

        expect(() => vault.lockLiquidity(base, stray)).toThrow(InvalidParamsError);
        expect(base.isConsumed).toBe(false);
        expect(base.value).toBe(1_000n);
        expect(stray.value).toBe(5n);
        expect(vault.balances()).toEqual({ base: 0n, old: 0n });
        expect(vault.isLocked()).toBe(false);
    });

    it('moves neither balance when the OLD side would overflow', () => {
        const { vault, oldCap, baseCap } = setup();
        vault.depositOld(oldCap.mint(U64_MAX));
        const base = baseCap.mint(10n);

        expect(() => vault.lockLiquidity(base, new TreasuryCap(OLD).mint(1n))).toThrow(ArithmeticOverflowError);
        expect(base.value).toBe(10n);
        expect(vault.balances()).toEqual({ base: 0n, old: U64_MAX });
        expect(vault.isLocked()).toBe(false);
    });

    it('accepts OLD deposits before and after the lock', () => {
        const { vault, oldCap, baseCap } = setup();
        vault.depositOld(oldCap.mint(60n));
        vault.lockLiquidity(baseCap.mint(10n), oldCap.mint(0n));
        vault.depositOld(oldCap.mint(40n));
        expect(vault.balances().old).toBe(100n);
    });

    it('drains OLD, yielding zero when empty', () => {
        const { vault, oldCap } = setup();
        expect(vault.withdrawOld().value).toBe(0n);

        vault.depositOld(oldCap.mint(25n));
        expect(vault.withdrawOld().value).toBe(25n);
        expect(vault.balances().old).toBe(0n);
    });

    it('drains BASE and refuses an empty one', () => {
        const { vault, baseCap, oldCap } = setup();
        expect(() => vault.withdrawBase()).toThrow(InsufficientBalanceError);

        vault.lockLiquidity(baseCap.mint(500n), oldCap.mint(1n));
        const base = vault.withdrawBase();
        expect(base.value).toBe(500n);
        expect(vault.balances().base).toBe(0n);

        vault.restoreBase(base);
        expect(vault.balances().base).toBe(500n);
    });
});
