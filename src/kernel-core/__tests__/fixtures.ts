import { LockupKernel } from '../Kernel.js';
import { AuditLog } from '../L5/Audit.js';
import type { Address, CreateLockupParams } from '../L0/Ontology.js';
import type { ErrorCode, OperationResult } from '../Errors.js';
import { InMemoryLedger } from '../../infrastructure/ledger/InMemoryLedger.js';
import type { InMemoryToken } from '../../infrastructure/ledger/InMemoryLedger.js';
import { ManualClock } from '../../infrastructure/clock/Clocks.js';

export const OWNER: Address = '0x1111111111111111111111111111111111111111';
export const BENEFICIARY: Address = '0x2222222222222222222222222222222222222222';
export const STRANGER: Address = '0x3333333333333333333333333333333333333333';
export const TOKEN: Address = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
export const KERNEL: Address = '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';

export const START = 1_700_000_000n;
export const DAY = 86_400n;

export interface Harness {
    ledger: InMemoryLedger;
    token: InMemoryToken;
    clock: ManualClock;
    audit: AuditLog;
    kernel: LockupKernel;
}

export interface HarnessOptions {
    supply?: bigint;
    feeBps?: number;
    allowance?: bigint; // defaults to the full supply
}

export function setup(options: HarnessOptions = {}): Harness {
    const supply = options.supply ?? 1_000_000n;
    const ledger = new InMemoryLedger();
    const token = ledger.deployToken(TOKEN, { feeBps: options.feeBps ?? 0 });
    token.mint(OWNER, supply);
    token.approve(OWNER, KERNEL, options.allowance ?? supply);

    const clock = new ManualClock(START);
    const audit = new AuditLog();
    const kernel = new LockupKernel({ token: TOKEN, address: KERNEL, deployer: OWNER, ledger, clock, audit });
    return { ledger, token, clock, audit, kernel };
}

export function schedule(overrides: Partial<CreateLockupParams> = {}): CreateLockupParams {
    return {
        beneficiary: BENEFICIARY,
        totalAmount: 12_000n,
        cliffDuration: 0n,
        vestingDuration: 1_200n,
        revocable: true,
        ...overrides
    };
}

export function unwrap<T>(result: OperationResult<T>): T {
    if (!result.ok) throw result.error;
    return result.value;
}

export function codeOf<T>(result: OperationResult<T>): ErrorCode | null {
    return result.ok ? null : result.error.code;
}
