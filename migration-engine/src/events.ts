/**
 * Coin Migration Engine — Events
 *
 * Structured notifications for off-chain indexing. Emission is
 * fire-and-forget: the controller never reads events back, and a sink
 * that throws is logged without failing the operation that emitted.
 *
 * Event types:
 *   MigrationInitialized, LiquidityLocked, UserMigrated,
 *   MigrationFinalized, PoolCreated, ReceiptClaimed
 */

import type { Logger } from './logger.js';
import type { SuiAddress } from './types.js';

// ============================================================
// Event Types
// ============================================================

export const MIGRATION_EVENT_TYPES = {
    INITIALIZED: 'MigrationInitialized',
    LIQUIDITY_LOCKED: 'LiquidityLocked',
    USER_MIGRATED: 'UserMigrated',
    FINALIZED: 'MigrationFinalized',
    POOL_CREATED: 'PoolCreated',
    RECEIPT_CLAIMED: 'ReceiptClaimed',
} as const;

interface EventBase {
    migrationId: string;
    timestampMs: number;
}

export interface MigrationInitializedEvent extends EventBase {
    type: typeof MIGRATION_EVENT_TYPES.INITIALIZED;
    admin: SuiAddress;
    oldCoinType: string;
    newCoinType: string;
    receiptCoinType: string;
    oldSupply: bigint;
    newSupply: bigint;
    ratio: bigint;
}

export interface LiquidityLockedEvent extends EventBase {
    type: typeof MIGRATION_EVENT_TYPES.LIQUIDITY_LOCKED;
    baseCoinType: string;
    oldCoinType: string;
    baseAmount: bigint;
    oldAmount: bigint;
}

export interface UserMigratedEvent extends EventBase {
    type: typeof MIGRATION_EVENT_TYPES.USER_MIGRATED;
    participant: SuiAddress;
    oldCoinType: string;
    receiptCoinType: string;
    oldAmount: bigint;
    receiptAmount: bigint;
    totalMigrated: bigint;
}

export interface MigrationFinalizedEvent extends EventBase {
    type: typeof MIGRATION_EVENT_TYPES.FINALIZED;
    oldCoinType: string;
    baseCoinType: string;
    newCoinType: string;
    /** OLD sold across every attempt, including ones rolled back after the swap */
    liquidatedOld: bigint;
    /** BASE received for `liquidatedOld` */
    baseProceeds: bigint;
    newMinted: bigint;
}

export interface PoolCreatedEvent extends EventBase {
    type: typeof MIGRATION_EVENT_TYPES.POOL_CREATED;
    poolId: string;
    positionId: string;
    newCoinType: string;
    baseCoinType: string;
    feeTier: number;
    sqrtPrice: bigint;
    newAmount: bigint;
    baseAmount: bigint;
}

export interface ReceiptClaimedEvent extends EventBase {
    type: typeof MIGRATION_EVENT_TYPES.RECEIPT_CLAIMED;
    receiptCoinType: string;
    newCoinType: string;
    amount: bigint;
}

export type MigrationEvent =
    | MigrationInitializedEvent
    | LiquidityLockedEvent
    | UserMigratedEvent
    | MigrationFinalizedEvent
    | PoolCreatedEvent
    | ReceiptClaimedEvent;

export type MigrationEventType = MigrationEvent['type'];

// ============================================================
// Sinks
// ============================================================

export interface EventSink {
    emit(event: MigrationEvent): void;
}

/**
 * In-memory event log, queryable by instance and type.
 * Useful as an indexer stand-in and in tests.
 */
export class MigrationEventLog implements EventSink {
    private events: MigrationEvent[] = [];

    emit(event: MigrationEvent): void {
        this.events.push(event);
    }

    all(): readonly MigrationEvent[] {
        return this.events;
    }

    forMigration(migrationId: string): MigrationEvent[] {
        return this.events.filter((e) => e.migrationId === migrationId);
    }

    ofType<K extends MigrationEventType>(type: K): Extract<MigrationEvent, { type: K }>[] {
        return this.events.filter((e): e is Extract<MigrationEvent, { type: K }> => e.type === type);
    }

    clear(): void {
        this.events = [];
    }

    get size(): number {
        return this.events.length;
    }
}

/** Writes each event through the logger at debug level. */
export class LoggingEventSink implements EventSink {
    private log: Logger;

    constructor(logger: Logger) {
        this.log = logger.child('events');
    }

    emit(event: MigrationEvent): void {
        this.log.debug(
            `${event.type} ${event.migrationId}`,
            JSON.stringify(event, (_, v) => typeof v === 'bigint' ? v.toString() : v),
        );
    }
}

/** Fan out to several sinks; one failing sink does not starve the rest. */
export function emitSafely(sinks: readonly EventSink[], event: MigrationEvent, logger: Logger): void {
    for (const sink of sinks) {
        try {
            sink.emit(event);
        } catch (err) {
            logger.warn(`Event sink failed for ${event.type}:`, err);
        }
    }
}
