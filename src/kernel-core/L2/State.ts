import { produce, freeze } from 'immer';
import type { Draft } from 'immer';
import type { LockupRecord, LockupOperation, Timestamp } from '../L0/Ontology.js';
import { hash, canonicalize, GENESIS_HASH } from '../L0/Crypto.js';
import { ErrorCode, LockupError } from '../Errors.js';

export interface StateSnapshot {
    record: LockupRecord | null;
    version: number;
    hash: string;
    previousHash: string;
    operation: LockupOperation | 'genesis';
    timestamp: Timestamp;
}

export interface StateCheckpoint {
    record: LockupRecord | null;
    version: number;
    depth: number;
}

/**
 * Owns the single lockup slot. The slot is empty (`null`) until created;
 * every transition produces a new frozen record and a chained snapshot.
 */
export class LockupStateModel {
    private current: LockupRecord | null = null;
    private currentVersion = 0;
    private snapshots: StateSnapshot[] = [];

    constructor() {
        this.snapshots.push({
            record: null,
            version: 0,
            hash: hash('GENESIS'),
            previousHash: GENESIS_HASH,
            operation: 'genesis',
            timestamp: 0n
        });
    }

    public get record(): LockupRecord | null { return this.current; }
    public get exists(): boolean { return this.current !== null; }
    public get version(): number { return this.currentVersion; }

    public getSnapshotChain(): readonly StateSnapshot[] { return this.snapshots; }

    public initialize(record: LockupRecord, timestamp: Timestamp): LockupRecord {
        if (this.current) throw new LockupError(ErrorCode.LOCKUP_ALREADY_EXISTS, 'State slot already populated');
        const next = freeze({ ...record });
        this.commit(next, 'createLockup', timestamp);
        return next;
    }

    /**
     * Applies `recipe` to a draft of the existing record as one atomic transition.
     */
    public apply(operation: LockupOperation, timestamp: Timestamp, recipe: (draft: Draft<LockupRecord>) => void): LockupRecord {
        const base = this.current;
        if (!base) throw new LockupError(ErrorCode.NO_LOCKUP, `Cannot ${operation}: no lockup`);
        const next = produce(base, recipe);
        this.commit(next, operation, timestamp);
        return next;
    }

    /**
     * Marks an operation that leaves the record untouched (ownership changes).
     */
    public touch(operation: LockupOperation, timestamp: Timestamp): void {
        this.commit(this.current, operation, timestamp);
    }

    public checkpoint(): StateCheckpoint {
        return { record: this.current, version: this.currentVersion, depth: this.snapshots.length };
    }

    public restore(checkpoint: StateCheckpoint): void {
        this.current = checkpoint.record;
        this.currentVersion = checkpoint.version;
        this.snapshots.length = checkpoint.depth;
    }

    public verifyIntegrity(): boolean {
        for (let i = 1; i < this.snapshots.length; i++) {
            const prev = this.snapshots[i - 1];
            const curr = this.snapshots[i];
            if (!prev || !curr) return false;
            if (curr.previousHash !== prev.hash) return false;
            if (this.snapshotHash(curr.version, curr.operation, curr.timestamp, curr.record, curr.previousHash) !== curr.hash) return false;
        }
        return true;
    }

    private commit(record: LockupRecord | null, operation: LockupOperation, timestamp: Timestamp): void {
        const previous = this.snapshots[this.snapshots.length - 1];
        if (!previous) throw new LockupError(ErrorCode.INTEGRITY_BREACH, 'Genesis snapshot missing');

        const version = this.currentVersion + 1;
        this.snapshots.push({
            record,
            version,
            hash: this.snapshotHash(version, operation, timestamp, record, previous.hash),
            previousHash: previous.hash,
            operation,
            timestamp
        });
        this.current = record;
        this.currentVersion = version;
    }

    private snapshotHash(version: number, operation: string, timestamp: Timestamp, record: LockupRecord | null, previousHash: string): string {
        return hash(canonicalize([version, operation, timestamp, record, previousHash]));
    }
}
