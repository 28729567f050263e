import { describe, test, expect } from '@jest/globals';
import { LockupKernel } from '../Kernel.js';
import { ErrorCode, LockupError } from '../Errors.js';
import { ZERO_ADDRESS, MAX_VESTING_DURATION } from '../L0/Primitives.js';
import type { CreateLockupParams } from '../L0/Ontology.js';
import { InMemoryLedger } from '../../infrastructure/ledger/InMemoryLedger.js';
import { ManualClock } from '../../infrastructure/clock/Clocks.js';
import { setup, schedule, unwrap, codeOf, OWNER, BENEFICIARY, STRANGER, TOKEN, KERNEL, START } from './fixtures.js';

describe('LockupKernel: deployment', () => {
    const deploy = (ledger: InMemoryLedger, token: string) =>
        new LockupKernel({ token, address: KERNEL, deployer: OWNER, ledger, clock: new ManualClock(START) });

    test('binds the token and makes the deployer owner', () => {
        const { kernel } = setup();
        expect(kernel.token()).toBe(TOKEN);
        expect(kernel.owner()).toBe(OWNER);
        expect(kernel.hasLockup()).toBe(false);
        expect(kernel.phase()).toBe('UNINITIALIZED');
    });

    test('rejects a zero, malformed or codeless token address', () => {
        const ledger = new InMemoryLedger();
        for (const token of [ZERO_ADDRESS, '0x1234', TOKEN]) {
            expect(() => deploy(ledger, token)).toThrow(LockupError);
        }
        expect(() => deploy(ledger, TOKEN)).toThrow(`[Lockup:INVALID_TOKEN_ADDRESS] No code deployed at ${TOKEN}`);
    });

    test('rejects code that is not a token', () => {
        const ledger = new InMemoryLedger();
        ledger.deployContract(TOKEN);
        expect(() => deploy(ledger, TOKEN)).toThrow(`[Lockup:INVALID_TOKEN_ADDRESS] Code at ${TOKEN} is not a token`);
    });

    test('queries return zero before a lockup exists', () => {
        const { kernel } = setup();
        expect(kernel.lockupInfo()).toBeNull();
        expect(kernel.beneficiary()).toBeNull();
        expect(kernel.vestedAmount()).toBe(0n);
        expect(kernel.releasableAmount()).toBe(0n);
        expect(kernel.vestingProgress()).toBe(0);
        expect(kernel.remainingVestingTime()).toBe(0n);
        expect(kernel.timeline()).toEqual([]);
    });
});

describe('LockupKernel: createLockup', () => {
    test('pulls the tokens and stores the schedule', () => {
        const { kernel, token } = setup();
        const record = unwrap(kernel.createLockup(OWNER, schedule()));

        expect(record).toEqual({
            beneficiary: BENEFICIARY,
            totalAmount: 12_000n,
            releasedAmount: 0n,
            startTime: START,
            cliffDuration: 0n,
            vestingDuration: 1_200n,
            revocable: true,
            revoked: false,
            vestedAtRevoke: 0n
        });
        expect(token.balanceOf(OWNER)).toBe(988_000n);
        expect(token.balanceOf(KERNEL)).toBe(12_000n);
        expect(token.allowance(OWNER, KERNEL)).toBe(988_000n);
        expect(kernel.beneficiary()).toBe(BENEFICIARY);
        expect(kernel.phase()).toBe('VESTING');
        expect(kernel.remainingVestingTime()).toBe(1_200n);
    });

    test('normalizes a mixed-case beneficiary', () => {
        const { kernel } = setup();
        unwrap(kernel.createLockup(OWNER, schedule({ beneficiary: '0xABCDEFabcdefABCDEFabcdefABCDEFabcdefABCD' })));
        expect(kernel.beneficiary()).toBe('0xabcdefabcdefabcdefabcdefabcdefabcdefabcd');
    });

    test('only the owner may create', () => {
        const { kernel, token } = setup();
        expect(codeOf(kernel.createLockup(STRANGER, schedule()))).toBe(ErrorCode.UNAUTHORIZED);
        expect(kernel.hasLockup()).toBe(false);
        expect(token.balanceOf(KERNEL)).toBe(0n);
    });

    test('succeeds at most once, whatever the second parameters', () => {
        const { kernel } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));
        expect(codeOf(kernel.createLockup(OWNER, schedule()))).toBe(ErrorCode.LOCKUP_ALREADY_EXISTS);
        expect(codeOf(kernel.createLockup(OWNER, schedule({ beneficiary: ZERO_ADDRESS, totalAmount: 0n })))).toBe(ErrorCode.LOCKUP_ALREADY_EXISTS);
    });

    const invalid: [string, Partial<CreateLockupParams>, ErrorCode][] = [
        ['zero beneficiary', { beneficiary: ZERO_ADDRESS }, ErrorCode.INVALID_BENEFICIARY],
        ['malformed beneficiary', { beneficiary: 'alice' }, ErrorCode.INVALID_BENEFICIARY],
        ['zero amount', { totalAmount: 0n }, ErrorCode.INVALID_AMOUNT],
        ['cliff equal to vesting', { cliffDuration: 1_200n }, ErrorCode.INVALID_DURATION],
        ['cliff beyond vesting', { cliffDuration: 1_201n }, ErrorCode.INVALID_DURATION],
        ['zero vesting', { cliffDuration: 0n, vestingDuration: 0n }, ErrorCode.INVALID_DURATION],
        ['vesting over ten years', { vestingDuration: MAX_VESTING_DURATION + 1n }, ErrorCode.INVALID_DURATION],
        ['amount above balance', { totalAmount: 1_000_001n }, ErrorCode.INSUFFICIENT_BALANCE]
    ];

    test.each(invalid)('rejects %s', (_label, overrides, code) => {
        const { kernel, token } = setup();
        const result = kernel.createLockup(OWNER, schedule(overrides));
        expect(codeOf(result)).toBe(code);
        expect(kernel.hasLockup()).toBe(false);
        expect(token.balanceOf(OWNER)).toBe(1_000_000n);
    });

    test('accepts a cliff one second short of vesting and exactly ten years of vesting', () => {
        const a = setup();
        expect(a.kernel.createLockup(OWNER, schedule({ cliffDuration: 1_199n })).ok).toBe(true);
        const b = setup();
        expect(b.kernel.createLockup(OWNER, schedule({ vestingDuration: MAX_VESTING_DURATION })).ok).toBe(true);
    });

    test('distinguishes a missing allowance from a missing balance', () => {
        const { kernel } = setup({ allowance: 100n });
        const result = kernel.createLockup(OWNER, schedule());
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.code).toBe(ErrorCode.INSUFFICIENT_ALLOWANCE);
            expect(result.error.metadata).toEqual({ allowance: '100', required: '12000' });
        }
    });
});

describe('LockupKernel: release', () => {
    test('releases the vested share to the beneficiary', () => {
        const { kernel, token, clock } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));

        clock.advance(600n);
        expect(kernel.vestedAmount()).toBe(6_000n);
        expect(kernel.vestingProgress()).toBe(50);
        expect(kernel.remainingVestingTime()).toBe(600n);

        expect(unwrap(kernel.release(BENEFICIARY))).toBe(6_000n);
        expect(token.balanceOf(BENEFICIARY)).toBe(6_000n);
        expect(token.balanceOf(KERNEL)).toBe(6_000n);
        expect(kernel.lockupInfo()?.releasedAmount).toBe(6_000n);
        expect(kernel.releasableAmount()).toBe(0n);
    });

    test('fails with nothing releasable and moves no tokens', () => {
        const { kernel, token, clock } = setup();
        unwrap(kernel.createLockup(OWNER, schedule({ cliffDuration: 600n })));
        clock.advance(599n);

        expect(codeOf(kernel.release(BENEFICIARY))).toBe(ErrorCode.NO_TOKENS_AVAILABLE);
        expect(token.balanceOf(BENEFICIARY)).toBe(0n);
        expect(token.balanceOf(KERNEL)).toBe(12_000n);
    });

    test('unlocks the accrued amount at once when the cliff passes', () => {
        const { kernel, clock } = setup();
        unwrap(kernel.createLockup(OWNER, schedule({ cliffDuration: 600n })));
        clock.advance(599n);
        expect(kernel.phase()).toBe('CLIFF');
        expect(kernel.vestedAmount()).toBe(0n);
        clock.advance(1n);
        expect(kernel.vestedAmount()).toBe(6_000n);
    });

    test('only the beneficiary may release', () => {
        const { kernel, clock } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));
        clock.advance(600n);
        expect(codeOf(kernel.release(OWNER))).toBe(ErrorCode.UNAUTHORIZED);
        expect(codeOf(kernel.release(STRANGER))).toBe(ErrorCode.UNAUTHORIZED);
    });

    test('fails without a lockup', () => {
        const { kernel } = setup();
        expect(codeOf(kernel.release(BENEFICIARY))).toBe(ErrorCode.NO_LOCKUP);
    });

    test('releases exactly the total at the end of vesting', () => {
        const { kernel, token, clock } = setup();
        unwrap(kernel.createLockup(OWNER, schedule({ totalAmount: 1_000n, vestingDuration: 3n })));
        clock.advance(1n);
        expect(unwrap(kernel.release(BENEFICIARY))).toBe(333n);
        clock.advance(2n);
        expect(unwrap(kernel.release(BENEFICIARY))).toBe(667n);
        expect(token.balanceOf(BENEFICIARY)).toBe(1_000n);
        expect(token.balanceOf(KERNEL)).toBe(0n);
        expect(kernel.phase()).toBe('FULLY_RELEASED');
    });

    test('rolls back the record when the ledger refuses the transfer', () => {
        const { kernel, token, clock } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));
        clock.advance(600n);
        const depth = kernel.getStateSnapshotChain().length;

        token.failTransfers(true);
        expect(codeOf(kernel.release(BENEFICIARY))).toBe(ErrorCode.TRANSFER_FAILED);
        expect(kernel.lockupInfo()?.releasedAmount).toBe(0n);
        expect(kernel.getStateSnapshotChain()).toHaveLength(depth);
        expect(token.balanceOf(KERNEL)).toBe(12_000n);

        token.failTransfers(false);
        expect(unwrap(kernel.release(BENEFICIARY))).toBe(6_000n);
    });
});

describe('LockupKernel: revoke', () => {
    test('returns the unvested remainder and freezes vesting', () => {
        const { kernel, token, clock } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));
        clock.advance(600n);

        expect(unwrap(kernel.revoke(OWNER))).toBe(6_000n);
        expect(token.balanceOf(OWNER)).toBe(994_000n);
        expect(kernel.lockupInfo()).toMatchObject({ revoked: true, vestedAtRevoke: 6_000n });
        expect(kernel.phase()).toBe('REVOKED');

        clock.advance(10_000n);
        expect(kernel.vestedAmount()).toBe(6_000n);
        expect(unwrap(kernel.release(BENEFICIARY))).toBe(6_000n);
        expect(kernel.phase()).toBe('FULLY_RELEASED');
        expect(token.balanceOf(KERNEL)).toBe(0n);
    });

    test('checks authorization before presence', () => {
        const { kernel } = setup();
        expect(codeOf(kernel.revoke(STRANGER))).toBe(ErrorCode.UNAUTHORIZED);
        expect(codeOf(kernel.revoke(OWNER))).toBe(ErrorCode.NO_LOCKUP);
    });

    test('refuses a non-revocable lockup', () => {
        const { kernel } = setup();
        unwrap(kernel.createLockup(OWNER, schedule({ revocable: false })));
        expect(codeOf(kernel.revoke(OWNER))).toBe(ErrorCode.NOT_REVOCABLE);
    });

    test('refuses a second revocation', () => {
        const { kernel } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));
        unwrap(kernel.revoke(OWNER));
        expect(codeOf(kernel.revoke(OWNER))).toBe(ErrorCode.ALREADY_REVOKED);
    });

    test('refuses once fully vested', () => {
        const { kernel, clock } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));
        clock.advance(1_200n);
        expect(codeOf(kernel.revoke(OWNER))).toBe(ErrorCode.NOTHING_TO_REVOKE);
    });
});

describe('LockupKernel: ownership', () => {
    test('hands the owner role over', () => {
        const { kernel, token } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));

        expect(unwrap(kernel.transferOwnership(OWNER, STRANGER))).toBe(STRANGER);
        expect(kernel.owner()).toBe(STRANGER);
        expect(codeOf(kernel.revoke(OWNER))).toBe(ErrorCode.UNAUTHORIZED);

        expect(unwrap(kernel.revoke(STRANGER))).toBe(12_000n);
        expect(token.balanceOf(STRANGER)).toBe(12_000n);
    });

    test('works before any lockup exists', () => {
        const { kernel } = setup();
        expect(kernel.transferOwnership(OWNER, STRANGER).ok).toBe(true);
        expect(kernel.isOwner(STRANGER)).toBe(true);
    });

    test('rejects a zero new owner and non-owner callers', () => {
        const { kernel } = setup();
        expect(codeOf(kernel.transferOwnership(OWNER, ZERO_ADDRESS))).toBe(ErrorCode.INVALID_OWNER);
        expect(codeOf(kernel.transferOwnership(STRANGER, STRANGER))).toBe(ErrorCode.UNAUTHORIZED);
        expect(kernel.owner()).toBe(OWNER);
    });

    test('keeps the previous owner when the invariant check fails', () => {
        const { kernel, token } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));
        const versions = kernel.getStateSnapshotChain().length;

        // custody drifts below the outstanding entitlement outside the kernel
        token.transfer(KERNEL, STRANGER, 1n);

        expect(codeOf(kernel.transferOwnership(OWNER, BENEFICIARY))).toBe(ErrorCode.INTEGRITY_BREACH);
        expect(kernel.owner()).toBe(OWNER);
        expect(kernel.isOwner(BENEFICIARY)).toBe(false);
        expect(kernel.getStateSnapshotChain()).toHaveLength(versions);
    });
});

describe('LockupKernel: audit trail', () => {
    test('records lifecycle events in order', () => {
        const { kernel, audit, clock } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));
        clock.advance(300n);
        unwrap(kernel.release(BENEFICIARY));

        expect(audit.events().map(e => e.event)).toEqual(['KernelDeployed', 'LockupCreated', 'TokensReleased']);
        expect(audit.events('TokensReleased')[0]?.payload).toEqual({ beneficiary: BENEFICIARY, amount: '3000' });
        expect(audit.events('LockupCreated')[0]?.payload).toEqual({
            beneficiary: BENEFICIARY,
            totalAmount: '12000',
            cliffDuration: '0',
            vestingDuration: '1200',
            revocable: true,
            startTime: START.toString()
        });
        expect(kernel.verifyAudit()).toBe(true);
    });

    test('records rejections with their code', () => {
        const { kernel, audit } = setup();
        kernel.release(BENEFICIARY);

        const tip = audit.getTip();
        expect(tip?.status).toBe('REJECT');
        expect(tip?.event).toBe('release');
        expect(tip?.metadata).toEqual({ code: ErrorCode.NO_LOCKUP });
        expect(tip?.reason).toBe('No lockup has been created');
    });

    test('chains one state snapshot per committed operation', () => {
        const { kernel, clock } = setup();
        unwrap(kernel.createLockup(OWNER, schedule()));
        clock.advance(600n);
        unwrap(kernel.release(BENEFICIARY));
        kernel.release(BENEFICIARY);

        const chain = kernel.getStateSnapshotChain();
        expect(chain.map(s => s.operation)).toEqual(['genesis', 'createLockup', 'release']);
        expect(chain[2]?.previousHash).toBe(chain[1]?.hash);
    });
});
