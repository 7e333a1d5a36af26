/**
 * Coin Migration Engine — Snapshot Verifier
 *
 * Merkle allow-list of (participant, quota) pairs.
 *
 *   leaf = keccak256(0x00 ‖ bcs(address) ‖ bcs(u64 quota))
 *   node = keccak256(min(a, b) ‖ max(a, b))
 *
 * Sorted-pair hashing makes proofs position-agnostic: a proof is just the
 * ordered list of sibling hashes from the leaf toward the root. The
 * verifier does not bound proof length; the controller does.
 */

import { bcs } from '@mysten/sui/bcs';
import { isValidSuiAddress, normalizeSuiAddress } from '@mysten/sui/utils';
import { keccak_256 } from '@noble/hashes/sha3';
import { bytesToHex, concatBytes, hexToBytes } from '@noble/hashes/utils';
import { InvalidParamsError, ProofInvalidError } from './errors.js';
import { assertU64 } from './math.js';
import type { Hash32, SuiAddress } from './types.js';

/** Domain tag prepended to leaves so a leaf can never collide with a node. */
export const LEAF_DOMAIN = 0x00;

export const HASH_LENGTH = 32;

// ============================================================
// Hashing
// ============================================================

export function normalizeParticipant(address: string): SuiAddress {
    const normalized = normalizeSuiAddress(address);
    if (!isValidSuiAddress(normalized)) {
        throw new InvalidParamsError(`Invalid participant address: ${address}`);
    }
    return normalized;
}

export function leafHash(participant: string, quota: bigint): Hash32 {
    const address = normalizeParticipant(participant);
    assertU64(quota, 'quota');
    return keccak_256(
        concatBytes(
            Uint8Array.of(LEAF_DOMAIN),
            bcs.Address.serialize(address).toBytes(),
            bcs.u64().serialize(quota).toBytes(),
        ),
    );
}

/** Lexicographic byte comparison. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
    const len = Math.min(a.length, b.length);
    for (let i = 0; i < len; i++) {
        if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
    }
    return a.length - b.length;
}

export function hashPair(a: Hash32, b: Hash32): Hash32 {
    return compareBytes(a, b) <= 0
        ? keccak_256(concatBytes(a, b))
        : keccak_256(concatBytes(b, a));
}

// ============================================================
// Verification
// ============================================================

export function computeRoot(leaf: Hash32, proof: readonly Hash32[]): Hash32 {
    let acc = leaf;
    for (const sibling of proof) {
        if (sibling.length !== HASH_LENGTH) {
            throw new ProofInvalidError(`Proof element has ${sibling.length} bytes, expected ${HASH_LENGTH}`);
        }
        acc = hashPair(acc, sibling);
    }
    return acc;
}

export function isValidProof(
    root: Hash32,
    participant: string,
    quota: bigint,
    proof: readonly Hash32[],
): boolean {
    try {
        return compareBytes(computeRoot(leafHash(participant, quota), proof), root) === 0;
    } catch (err) {
        if (err instanceof ProofInvalidError || err instanceof InvalidParamsError) return false;
        throw err;
    }
}

/**
 * Verify (participant, quota) against a committed root.
 * Mirrors: snapshot::verify(root, participant, quota, proof)
 */
export function verifyProof(
    root: Hash32,
    participant: string,
    quota: bigint,
    proof: readonly Hash32[],
): void {
    const computed = computeRoot(leafHash(participant, quota), proof);
    if (compareBytes(computed, root) !== 0) {
        throw new ProofInvalidError(
            `Recomputed root 0x${bytesToHex(computed)} does not match 0x${bytesToHex(root)}`,
        );
    }
}

/** Parse a 0x-prefixed (or bare) 32-byte hex hash. */
export function parseHash(hex: string): Hash32 {
    const body = hex.startsWith('0x') ? hex.slice(2) : hex;
    if (!/^[0-9a-fA-F]{64}$/.test(body)) {
        throw new InvalidParamsError(`Not a 32-byte hex hash: ${hex}`);
    }
    return hexToBytes(body);
}

export function formatHash(hash: Hash32): string {
    return `0x${bytesToHex(hash)}`;
}

// ============================================================
// Tree Builder
// ============================================================

export interface SnapshotEntry {
    address: string;
    quota: bigint;
}

/** Serializable allow-list distribution handed to participants. */
export interface SnapshotDistribution {
    root: string;
    entries: Array<{ address: SuiAddress; quota: string; proof: string[] }>;
}

/**
 * Builds a snapshot root and per-participant proofs. Leaves are paired in
 * input order; an unpaired node at the end of a level is promoted as is.
 */
export class SnapshotTree {
    private readonly levels: Hash32[][];
    private readonly index: Map<SuiAddress, { position: number; quota: bigint }> = new Map();

    private constructor(entries: readonly SnapshotEntry[]) {
        const leaves: Hash32[] = [];
        entries.forEach((entry, position) => {
            const address = normalizeParticipant(entry.address);
            if (this.index.has(address)) {
                throw new InvalidParamsError(`Duplicate snapshot entry for ${address}`);
            }
            this.index.set(address, { position, quota: entry.quota });
            leaves.push(leafHash(address, entry.quota));
        });

        this.levels = [leaves];
        let level = leaves;
        while (level.length > 1) {
            const next: Hash32[] = [];
            for (let i = 0; i < level.length; i += 2) {
                next.push(i + 1 < level.length ? hashPair(level[i], level[i + 1]) : level[i]);
            }
            this.levels.push(next);
            level = next;
        }
    }

    static fromEntries(entries: readonly SnapshotEntry[]): SnapshotTree {
        if (entries.length === 0) {
            throw new InvalidParamsError('Snapshot must contain at least one entry');
        }
        return new SnapshotTree(entries);
    }

    get root(): Hash32 {
        return this.levels[this.levels.length - 1][0];
    }

    get size(): number {
        return this.index.size;
    }

    quotaOf(address: string): bigint | null {
        return this.index.get(normalizeParticipant(address))?.quota ?? null;
    }

    proofFor(address: string): Hash32[] {
        const entry = this.index.get(normalizeParticipant(address));
        if (!entry) {
            throw new InvalidParamsError(`${address} is not in the snapshot`);
        }

        const proof: Hash32[] = [];
        let position = entry.position;
        for (let depth = 0; depth < this.levels.length - 1; depth++) {
            const level = this.levels[depth];
            const sibling = position ^ 1;
            if (sibling < level.length) {
                proof.push(level[sibling]);
            }
            position >>= 1;
        }
        return proof;
    }

    toDistribution(): SnapshotDistribution {
        return {
            root: formatHash(this.root),
            entries: [...this.index.entries()].map(([address, { quota }]) => ({
                address,
                quota: quota.toString(),
                proof: this.proofFor(address).map(formatHash),
            })),
        };
    }
}
