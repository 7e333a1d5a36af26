import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    LoggingEventSink,
    MIGRATION_EVENT_TYPES,
    MigrationEvent,
    MigrationEventLog,
    emitSafely,
} from '../events.js';
import { ConsoleLogger, Logger } from '../logger.js';

function claimed(migrationId: string, amount: bigint): MigrationEvent {
    return {
        type: MIGRATION_EVENT_TYPES.RECEIPT_CLAIMED,
        migrationId,
        timestampMs: 1_000,
        receiptCoinType: '0xa::receipt::RECEIPT',
        newCoinType: '0xa::new::NEW',
        amount,
    };
}

function recordingLogger(): Logger & { warnings: string[]; debugs: unknown[][] } {
    const warnings: string[] = [];
    const debugs: unknown[][] = [];
    const logger = {
        warnings,
        debugs,
        debug: (message: string, ...args: unknown[]) => { debugs.push([message, ...args]); },
        info: () => undefined,
        warn: (message: string) => { warnings.push(message); },
        error: () => undefined,
        child: (): Logger => logger,
    };
    return logger;
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('MigrationEventLog', () => {
    it('filters by instance and type', () => {
        const log = new MigrationEventLog();
        log.emit(claimed('mig-1', 5n));
        log.emit(claimed('mig-2', 7n));

        expect(log.size).toBe(2);
        expect(log.forMigration('mig-2')).toEqual([claimed('mig-2', 7n)]);
        expect(log.ofType('ReceiptClaimed').map((e) => e.amount)).toEqual([5n, 7n]);
        expect(log.ofType('UserMigrated')).toEqual([]);

        log.clear();
        expect(log.all()).toEqual([]);
    });
});

describe('emitSafely', () => {
    it('keeps delivering after a sink throws', () => {
        const logger = recordingLogger();
        const log = new MigrationEventLog();
        const broken = { emit: () => { throw new Error('sink down'); } };

        emitSafely([broken, log], claimed('mig-1', 1n), logger);

        expect(log.size).toBe(1);
        expect(logger.warnings).toEqual(['Event sink failed for ReceiptClaimed:']);
    });
});

describe('LoggingEventSink', () => {
    it('writes events as JSON with bigints as strings', () => {
        const logger = recordingLogger();
        new LoggingEventSink(logger).emit(claimed('mig-3', 12n));

        expect(logger.debugs).toEqual([[
            'ReceiptClaimed mig-3',
            '{"type":"ReceiptClaimed","migrationId":"mig-3","timestampMs":1000,'
                + '"receiptCoinType":"0xa::receipt::RECEIPT","newCoinType":"0xa::new::NEW","amount":"12"}',
        ]]);
    });
});

describe('ConsoleLogger', () => {
    it('prefixes level and context, and honours the level', () => {
        const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        const logger = new ConsoleLogger('Migration', 'info').child('mig-1');
        logger.debug('hidden');
        logger.info('shown', 3);
        logger.warn('careful');

        expect(out).toHaveBeenCalledTimes(1);
        expect(out.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z \[INFO\] \[Migration:mig-1\] shown$/);
        expect(out.mock.calls[0][1]).toBe(3);
        expect(warn.mock.calls[0][0]).toMatch(/\[WARN\] \[Migration:mig-1\] careful$/);
    });

    it('prints nothing when silent', () => {
        const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        new ConsoleLogger('Migration', 'silent').error('nope');
        expect(err).not.toHaveBeenCalled();
    });
});
