// src/kernel-core/L0/Invariants.ts
import type { Amount, LockupRecord } from './Ontology.js';
import { MAX_VESTING_DURATION, UINT256_MAX } from './Primitives.js';
import { ErrorCode } from '../Errors.js';

export interface Invariant {
    id: string;
    boundary: string;
    description: string;
    predicate: (context: InvariantContext) => boolean;
    violation: ErrorCode;
}

export interface InvariantContext {
    record: LockupRecord;
    vested: Amount;
    custody?: Amount; // token balance held by the kernel, when known
}

export interface Rejection {
    code: ErrorCode;
    invariantId: string;
    boundary: string;
    message: string;
}

// I. Schedule Shape
export const INV_LCK_01: Invariant = {
    id: 'INV-LCK-01',
    boundary: 'Schedule Shape',
    description: 'Total amount is positive and within uint256',
    predicate: ({ record }) => record.totalAmount > 0n && record.totalAmount <= UINT256_MAX,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_LCK_02: Invariant = {
    id: 'INV-LCK-02',
    boundary: 'Schedule Shape',
    description: 'Cliff is shorter than vesting, vesting within 10 years',
    predicate: ({ record }) =>
        record.cliffDuration >= 0n &&
        record.cliffDuration < record.vestingDuration &&
        record.vestingDuration <= MAX_VESTING_DURATION,
    violation: ErrorCode.INTEGRITY_BREACH
};

// II. Vesting Bounds
export const INV_LCK_03: Invariant = {
    id: 'INV-LCK-03',
    boundary: 'Vesting Bounds',
    description: 'Released amount never exceeds vested amount',
    predicate: ({ record, vested }) => record.releasedAmount >= 0n && record.releasedAmount <= vested,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_LCK_04: Invariant = {
    id: 'INV-LCK-04',
    boundary: 'Vesting Bounds',
    description: 'Vested amount never exceeds total amount',
    predicate: ({ record, vested }) => vested <= record.totalAmount,
    violation: ErrorCode.INTEGRITY_BREACH
};

// III. Revocation
export const INV_LCK_05: Invariant = {
    id: 'INV-LCK-05',
    boundary: 'Revocation',
    description: 'Revocation snapshot is set only when revoked and is below total',
    predicate: ({ record }) => record.revoked
        ? record.vestedAtRevoke < record.totalAmount
        : record.vestedAtRevoke === 0n,
    violation: ErrorCode.INTEGRITY_BREACH
};

// IV. Custody
export const INV_LCK_06: Invariant = {
    id: 'INV-LCK-06',
    boundary: 'Custody',
    description: 'Kernel holds at least the unreleased entitlement',
    predicate: ({ record, custody }) => {
        if (custody === undefined) return true;
        const ceiling = record.revoked ? record.vestedAtRevoke : record.totalAmount;
        return custody >= ceiling - record.releasedAmount;
    },
    violation: ErrorCode.INTEGRITY_BREACH
};

export const LOCKUP_INVARIANTS: Invariant[] = [
    INV_LCK_01, INV_LCK_02, INV_LCK_03,
    INV_LCK_04, INV_LCK_05, INV_LCK_06
];

export function checkInvariants(context: InvariantContext): { ok: true } | { ok: false; rejection: Rejection } {
    for (const inv of LOCKUP_INVARIANTS) {
        if (!inv.predicate(context)) {
            return {
                ok: false,
                rejection: {
                    code: inv.violation,
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    message: `Invariant Violation: ${inv.description}`
                }
            };
        }
    }
    return { ok: true };
}
