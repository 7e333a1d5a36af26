/**
 * Coin Migration Engine — Participant Ledger
 *
 * Cumulative OLD amount each participant has migrated. Entries are
 * created on first deposit, overwritten afterwards, and never removed.
 */

import type { SuiAddress } from './types.js';

export class ParticipantLedger {
    private entries: Map<SuiAddress, bigint> = new Map();

    /** Amount already migrated; 0 for unknown participants. */
    get(participant: SuiAddress): bigint {
        return this.entries.get(participant) ?? 0n;
    }

    has(participant: SuiAddress): boolean {
        return this.entries.has(participant);
    }

    /** Insert if absent, otherwise replace the running total. */
    upsert(participant: SuiAddress, total: bigint): void {
        this.entries.set(participant, total);
    }

    get size(): number {
        return this.entries.size;
    }

    total(): bigint {
        let sum = 0n;
        for (const amount of this.entries.values()) sum += amount;
        return sum;
    }

    toJSON(): Record<SuiAddress, string> {
        const out: Record<SuiAddress, string> = {};
        for (const [participant, amount] of this.entries) {
            out[participant] = amount.toString();
        }
        return out;
    }
}
