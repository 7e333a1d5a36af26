import { describe, it, expect } from 'vitest';
import type { Transaction } from '@mysten/sui/transactions';
import { MigrationTxBuilder, encodeTick } from '../ptb-builder.js';
import { InvalidParamsError } from '../errors.js';
import { Q64 } from '../types.js';

const PACKAGE_ID = '0x' + '1'.repeat(64);
const CONFIG_ID = '0x' + '2'.repeat(64);
const VAULT_ID = '0x' + '3'.repeat(64);
const ADMIN_CAP_ID = '0x' + '4'.repeat(64);
const RECIPIENT = '0x' + '5'.repeat(64);

const COIN_TYPES = {
    old: `0x${'a'.repeat(64)}::old::OLD`,
    new: `0x${'a'.repeat(64)}::new::NEW`,
    base: `0x${'b'.repeat(64)}::usdc::USDC`,
    receipt: `0x${'a'.repeat(64)}::receipt::RECEIPT`,
};

function builder(extra: { adminCapId?: string; clmmGlobalConfigId?: string; clmmPoolsId?: string } = {}) {
    return new MigrationTxBuilder(
        { packageId: PACKAGE_ID, configObjectId: CONFIG_ID, vaultObjectId: VAULT_ID, ...extra },
        COIN_TYPES,
    );
}

function kinds(tx: Transaction): string[] {
    return tx.getData().commands.map((command) => command.$kind);
}

function onlyMoveCall(tx: Transaction) {
    const calls = tx.getData().commands.flatMap((command) => command.$kind === 'MoveCall' ? [command.MoveCall] : []);
    expect(calls).toHaveLength(1);
    return calls[0];
}

describe('encodeTick', () => {
    it('keeps non-negative ticks and wraps negative ones', () => {
        expect(encodeTick(600)).toBe(600);
        expect(encodeTick(0)).toBe(0);
        expect(encodeTick(-600)).toBe(4_294_966_696);
    });
});

describe('MigrationTxBuilder', () => {
    it('rejects malformed object ids', () => {
        expect(() => new MigrationTxBuilder(
            { packageId: 'xyz', configObjectId: CONFIG_ID, vaultObjectId: VAULT_ID },
            COIN_TYPES,
        )).toThrow(InvalidParamsError);
    });

    it('builds lock_liquidity with the admin cap', () => {
        const call = onlyMoveCall(builder({ adminCapId: ADMIN_CAP_ID }).buildLockLiquidity('0x7', '0x8'));

        expect(call.module).toBe('migration');
        expect(call.function).toBe('lock_liquidity');
        expect(call.arguments).toHaveLength(5);
        expect(call.typeArguments).toHaveLength(2);
    });

    it('requires an admin cap for admin calls', () => {
        expect(() => builder().buildLockLiquidity('0x7', '0x8')).toThrow(InvalidParamsError);
    });

    it('deposits a whole coin and forwards the receipt', () => {
        const tx = builder().buildMigrate({
            oldCoinId: '0x9',
            declaredQuota: 100n,
            proof: [new Uint8Array(32).fill(1)],
            recipient: RECIPIENT,
        });

        expect(kinds(tx)).toEqual(['MoveCall', 'TransferObjects']);
        const call = onlyMoveCall(tx);
        expect(call.function).toBe('migrate');
        expect(call.arguments).toHaveLength(6);
    });

    it('splits the deposit when an amount is given', () => {
        const tx = builder().buildMigrate({
            oldCoinId: '0x9',
            amount: 60n,
            declaredQuota: 100n,
            proof: [],
            recipient: RECIPIENT,
        });

        expect(kinds(tx)).toEqual(['SplitCoins', 'MoveCall', 'TransferObjects']);
    });

    it('builds finalize_and_create_pool with all four coin types', () => {
        const tx = builder({
            adminCapId: ADMIN_CAP_ID,
            clmmGlobalConfigId: '0xc1',
            clmmPoolsId: '0xc2',
        }).buildFinalizeAndCreatePool({
            liquidationPoolId: '0xc3',
            liquidation: { feeTier: 2500, minBaseOut: 900n },
            newPool: { feeTier: 2500, tickLower: -600, tickUpper: 600, initialSqrtPrice: Q64 },
        });

        const call = onlyMoveCall(tx);
        expect(call.function).toBe('finalize_and_create_pool');
        expect(call.arguments).toHaveLength(12);
        expect(call.typeArguments).toHaveLength(4);
    });

    it('needs the venue objects to finalize', () => {
        expect(() => builder({ adminCapId: ADMIN_CAP_ID }).buildFinalizeAndCreatePool({
            liquidationPoolId: '0xc3',
            liquidation: { feeTier: 2500, minBaseOut: 0n },
            newPool: { feeTier: 2500, tickLower: -600, tickUpper: 600 },
        })).toThrow(InvalidParamsError);
    });

    it('builds claim and forwards the NEW coin', () => {
        const tx = builder().buildClaim('0xd1', RECIPIENT);

        expect(kinds(tx)).toEqual(['MoveCall', 'TransferObjects']);
        const call = onlyMoveCall(tx);
        expect(call.function).toBe('claim');
        expect(call.arguments).toHaveLength(2);
    });
});
