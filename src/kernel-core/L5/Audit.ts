// src/kernel-core/L5/Audit.ts
import { hash, canonicalize, GENESIS_HASH } from '../L0/Crypto.js';
import type { Address, EventPayload, LockupEventType, LockupOperation } from '../L0/Ontology.js';
import type { IEventStore } from '../../Platform/Ports.js';

export type EvidenceStatus = 'SUCCESS' | 'REJECT';

// --- Evidence (hash-chained lifecycle record) ---
export interface Evidence {
    evidenceId: string; // entry hash
    previousEvidenceId: string; // chain linkage
    event: LockupEventType | LockupOperation; // operation name on REJECT
    actor: Address;
    status: EvidenceStatus;
    payload: EventPayload;
    reason?: string;
    metadata?: Record<string, unknown>;
    timestamp: string; // seconds, decimal
}

export interface EvidenceInput {
    event: LockupEventType | LockupOperation;
    actor: Address;
    status?: EvidenceStatus;
    payload?: EventPayload;
    reason?: string;
    metadata?: Record<string, unknown>;
    timestamp: bigint;
}

export class AuditLog {
    private localChain: Evidence[] = [];

    constructor(private readonly store?: IEventStore) { }

    public append(input: EvidenceInput): Evidence {
        const latest = this.getTip();
        const previousHash = latest ? latest.evidenceId : GENESIS_HASH;

        const status = input.status ?? 'SUCCESS';
        const payload = input.payload ?? {};
        const timestamp = input.timestamp.toString();

        const evidence: Evidence = Object.freeze({
            evidenceId: this.calculateHash(previousHash, input.event, input.actor, status, payload, timestamp, input.reason, input.metadata),
            previousEvidenceId: previousHash,
            event: input.event,
            actor: input.actor,
            status,
            payload,
            timestamp,
            ...(input.reason ? { reason: input.reason } : {}),
            ...(input.metadata ? { metadata: input.metadata } : {})
        });

        this.store?.append(evidence);
        this.localChain.push(evidence);
        return evidence;
    }

    public getHistory(): Evidence[] {
        if (this.store) return this.store.getHistory();
        return [...this.localChain];
    }

    /**
     * Successful lifecycle events only, oldest first.
     */
    public events(type?: LockupEventType): Evidence[] {
        return this.getHistory().filter(e => e.status === 'SUCCESS' && (type === undefined || e.event === type));
    }

    public verifyChain(): boolean {
        let prev = GENESIS_HASH;

        for (const entry of this.getHistory()) {
            if (entry.previousEvidenceId !== prev) return false;

            const h = this.calculateHash(prev, entry.event, entry.actor, entry.status, entry.payload, entry.timestamp, entry.reason, entry.metadata);
            if (h !== entry.evidenceId) return false;

            prev = entry.evidenceId;
        }
        return true;
    }

    public getTip(): Evidence | null {
        const local = this.localChain[this.localChain.length - 1];
        if (local) return local;
        return this.store?.getLatest() ?? null;
    }

    private calculateHash(
        prevHash: string,
        event: string,
        actor: Address,
        status: EvidenceStatus,
        payload: EventPayload,
        timestamp: string,
        reason?: string,
        metadata?: Record<string, unknown>
    ): string {
        // [PreviousHash, Event, Actor, Status, Timestamp, PayloadHash, ReasonHash, MetadataHash]
        const reasonHash = hash(reason ?? '');
        const metaHash = metadata ? hash(canonicalize(metadata)) : hash('{}');

        return hash(canonicalize([
            prevHash,
            event,
            actor,
            status,
            timestamp,
            hash(canonicalize(payload)),
            reasonHash,
            metaHash
        ]));
    }
}
