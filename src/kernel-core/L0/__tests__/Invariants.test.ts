import { describe, test, expect } from '@jest/globals';
import { checkInvariants, LOCKUP_INVARIANTS } from '../Invariants.js';
import type { LockupRecord } from '../Ontology.js';
import { ErrorCode } from '../../Errors.js';

const base: LockupRecord = {
    beneficiary: '0x2222222222222222222222222222222222222222',
    totalAmount: 1_000n,
    releasedAmount: 200n,
    startTime: 0n,
    cliffDuration: 10n,
    vestingDuration: 100n,
    revocable: true,
    revoked: false,
    vestedAtRevoke: 0n
};

const rejectedBy = (record: LockupRecord, vested: bigint, custody?: bigint): string | null => {
    const result = checkInvariants(custody === undefined ? { record, vested } : { record, vested, custody });
    return result.ok ? null : result.rejection.invariantId;
};

describe('Lockup invariants', () => {
    test('a consistent record passes every invariant', () => {
        expect(checkInvariants({ record: base, vested: 500n, custody: 800n })).toEqual({ ok: true });
        expect(LOCKUP_INVARIANTS.map(i => i.id)).toEqual([
            'INV-LCK-01', 'INV-LCK-02', 'INV-LCK-03', 'INV-LCK-04', 'INV-LCK-05', 'INV-LCK-06'
        ]);
    });

    test('each breach is reported by the invariant that owns it', () => {
        expect(rejectedBy({ ...base, totalAmount: 0n, releasedAmount: 0n }, 0n)).toBe('INV-LCK-01');
        expect(rejectedBy({ ...base, cliffDuration: 100n }, 500n)).toBe('INV-LCK-02');
        expect(rejectedBy(base, 199n)).toBe('INV-LCK-03');
        expect(rejectedBy(base, 1_001n)).toBe('INV-LCK-04');
        expect(rejectedBy({ ...base, vestedAtRevoke: 5n }, 500n)).toBe('INV-LCK-05');
        expect(rejectedBy({ ...base, revoked: true, vestedAtRevoke: 1_000n }, 500n)).toBe('INV-LCK-05');
        expect(rejectedBy(base, 500n, 799n)).toBe('INV-LCK-06');
    });

    test('custody after revocation only has to cover the frozen entitlement', () => {
        const revoked = { ...base, revoked: true, vestedAtRevoke: 500n };
        expect(rejectedBy(revoked, 500n, 300n)).toBeNull();
        expect(rejectedBy(revoked, 500n, 299n)).toBe('INV-LCK-06');
        expect(rejectedBy(revoked, 500n)).toBeNull();
    });

    test('rejections carry the integrity code and description', () => {
        const result = checkInvariants({ record: base, vested: 100n });
        expect(result).toEqual({
            ok: false,
            rejection: {
                code: ErrorCode.INTEGRITY_BREACH,
                invariantId: 'INV-LCK-03',
                boundary: 'Vesting Bounds',
                message: 'Invariant Violation: Released amount never exceeds vested amount'
            }
        });
    });
});
