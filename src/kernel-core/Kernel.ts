import { LockupStateModel } from './L2/State.js';
import type { StateSnapshot } from './L2/State.js';
import { Ownership, normalizeAddress, sameAddress } from './L1/Identity.js';
import { TokenGateway } from './L4/Gateway.js';
import { AuditLog } from './L5/Audit.js';
import type { Evidence } from './L5/Audit.js';
import {
    TokenAddressGuard, RoleGuard, DuplicateGuard, BeneficiaryGuard, AmountGuard,
    DurationGuard, BalanceGuard, AllowanceGuard, TransferIntegrityGuard, ReleasableGuard,
    RevocableGuard, NotRevokedGuard, UnvestedGuard, NewOwnerGuard
} from './L0/Guards.js';
import type { GuardResult } from './L0/Guards.js';
import { GuardRegistry } from './L0/GuardRegistry.js';
import { checkInvariants } from './L0/Invariants.js';
import { ReentrancyLock } from './L0/ReentrancyLock.js';
import * as Vesting from './L3/Vesting.js';
import type { TimelinePoint } from './L3/Vesting.js';
import type {
    Address, Amount, CreateLockupParams, Duration, EventPayload, LockupEventType,
    LockupOperation, LockupPhase, LockupRecord, Timestamp
} from './L0/Ontology.js';
import type { ILedgerHost, ISystemClock, ITokenLedger } from '../Platform/Ports.js';
import { ErrorCode, LockupError, success, failure } from './Errors.js';
import type { OperationResult } from './Errors.js';

export interface LockupKernelOptions {
    token: Address;
    address: Address; // the kernel's own account on the ledger
    deployer: Address;
    ledger: ILedgerHost;
    clock: ISystemClock;
    audit?: AuditLog;
}

/**
 * Guard phases and the context each one reads.
 */
interface LockupGuardPhases {
    DEPLOYMENT: { token: string; host: ILedgerHost };
    CREATE: { record: LockupRecord | null; beneficiary: string; amount: Amount; cliffDuration: Duration; vestingDuration: Duration };
    FUNDING: { ledger: ITokenLedger; holder: Address; spender: Address; amount: Amount };
    SETTLEMENT: { before: Amount; after: Amount; expected: Amount };
    RELEASE: { releasable: Amount };
    REVOKE: { record: LockupRecord; vested: Amount };
}

interface Outcome<T> {
    value: T;
    event: LockupEventType;
    payload: EventPayload;
}

/**
 * Lockup Kernel
 * Lifecycle state machine for a single-beneficiary vesting schedule.
 *
 * Every mutating operation runs under the reentrancy lock and inside the ledger
 * host's atomic scope; a failure at any step restores the record and the
 * ledger and comes back as a tagged `failure`.
 */
export class LockupKernel {
    private readonly state = new LockupStateModel();
    private readonly lock = new ReentrancyLock();
    private readonly guards = new GuardRegistry<LockupGuardPhases>();
    private readonly ownership: Ownership;
    private readonly gateway: TokenGateway;
    private readonly ledger: ITokenLedger;
    private readonly host: ILedgerHost;
    private readonly clock: ISystemClock;
    private readonly audit: AuditLog;
    private readonly self: Address;

    public constructor(options: LockupKernelOptions) {
        this.guards
            .register('DEPLOYMENT', 'TokenAddress', TokenAddressGuard)
            .register('CREATE', 'Duplicate', DuplicateGuard)
            .register('CREATE', 'Beneficiary', BeneficiaryGuard)
            .register('CREATE', 'Amount', AmountGuard)
            .register('CREATE', 'Duration', DurationGuard)
            .register('FUNDING', 'Balance', BalanceGuard)
            .register('FUNDING', 'Allowance', AllowanceGuard)
            .register('SETTLEMENT', 'TransferIntegrity', TransferIntegrityGuard)
            .register('RELEASE', 'Releasable', ReleasableGuard)
            .register('REVOKE', 'Revocable', RevocableGuard)
            .register('REVOKE', 'NotRevoked', NotRevokedGuard)
            .register('REVOKE', 'Unvested', UnvestedGuard);

        this.enforce(this.guards.evaluate('DEPLOYMENT', { token: options.token, host: options.ledger }));
        const ledger = options.ledger.tokenAt(options.token);
        if (!ledger) {
            throw new LockupError(ErrorCode.INVALID_TOKEN_ADDRESS, `Code at ${options.token} is not a token`);
        }

        this.host = options.ledger;
        this.ledger = ledger;
        this.clock = options.clock;
        this.audit = options.audit ?? new AuditLog();
        this.self = normalizeAddress(options.address);
        this.ownership = new Ownership(options.deployer);
        this.gateway = new TokenGateway(ledger, this.self, this.lock);

        this.audit.append({
            event: 'KernelDeployed',
            actor: this.ownership.owner,
            payload: { token: this.token(), kernel: this.self, owner: this.ownership.owner },
            timestamp: this.clock.now()
        });
        console.log(`[LockupKernel] Deployed at ${this.self} for token ${this.token()}, owner ${this.ownership.owner}`);
    }

    // --- Lifecycle ---

    public createLockup(caller: Address, params: CreateLockupParams): OperationResult<LockupRecord> {
        return this.execute('createLockup', caller, now => {
            this.authorize(caller, this.ownership.owner, 'owner');

            this.enforce(this.guards.evaluate('CREATE', {
                record: this.state.record,
                beneficiary: params.beneficiary,
                amount: params.totalAmount,
                cliffDuration: params.cliffDuration,
                vestingDuration: params.vestingDuration
            }));
            this.enforce(this.guards.evaluate('FUNDING', {
                ledger: this.ledger,
                holder: caller,
                spender: this.self,
                amount: params.totalAmount
            }));

            const { before, after } = this.gateway.pullFromOwner(caller, params.totalAmount);
            this.enforce(this.guards.evaluate('SETTLEMENT', { before, after, expected: params.totalAmount }));

            const record = this.state.initialize({
                beneficiary: normalizeAddress(params.beneficiary),
                totalAmount: params.totalAmount,
                releasedAmount: 0n,
                startTime: now,
                cliffDuration: params.cliffDuration,
                vestingDuration: params.vestingDuration,
                revocable: params.revocable,
                revoked: false,
                vestedAtRevoke: 0n
            }, now);

            return {
                value: record,
                event: 'LockupCreated',
                payload: {
                    beneficiary: record.beneficiary,
                    totalAmount: record.totalAmount.toString(),
                    cliffDuration: record.cliffDuration.toString(),
                    vestingDuration: record.vestingDuration.toString(),
                    revocable: record.revocable,
                    startTime: record.startTime.toString()
                }
            };
        });
    }

    public release(caller: Address): OperationResult<Amount> {
        return this.execute('release', caller, now => {
            const record = this.requireRecord();
            this.authorize(caller, record.beneficiary, 'beneficiary');

            const releasable = Vesting.releasableAmount(record, now);
            this.enforce(this.guards.evaluate('RELEASE', { releasable }));

            // effects before interaction
            this.state.apply('release', now, draft => {
                draft.releasedAmount += releasable;
            });
            this.gateway.pushToBeneficiary(record.beneficiary, releasable);

            return {
                value: releasable,
                event: 'TokensReleased',
                payload: { beneficiary: record.beneficiary, amount: releasable.toString() }
            };
        });
    }

    public revoke(caller: Address): OperationResult<Amount> {
        return this.execute('revoke', caller, now => {
            this.authorize(caller, this.ownership.owner, 'owner');
            const record = this.requireRecord();

            const vested = Vesting.vestedAmount(record, now);
            this.enforce(this.guards.evaluate('REVOKE', { record, vested }));

            const returned = record.totalAmount - vested;
            this.state.apply('revoke', now, draft => {
                draft.revoked = true;
                draft.vestedAtRevoke = vested;
            });
            this.gateway.pushToOwner(this.ownership.owner, returned);

            return {
                value: returned,
                event: 'LockupRevoked',
                payload: { returnedAmount: returned.toString(), vestedAtRevoke: vested.toString() }
            };
        });
    }

    public transferOwnership(caller: Address, newOwner: Address): OperationResult<Address> {
        return this.execute('transferOwnership', caller, now => {
            this.authorize(caller, this.ownership.owner, 'owner');
            this.enforce(NewOwnerGuard({ newOwner }));

            const previousOwner = this.ownership.transfer(caller, newOwner);
            this.state.touch('transferOwnership', now);

            return {
                value: this.ownership.owner,
                event: 'OwnershipTransferred',
                payload: { previousOwner, newOwner: this.ownership.owner }
            };
        });
    }

    // --- Queries ---

    public lockupInfo(): LockupRecord | null { return this.state.record; }
    public hasLockup(): boolean { return this.state.exists; }
    public vestedAmount(): Amount { return Vesting.vestedAmount(this.state.record, this.clock.now()); }
    public releasableAmount(): Amount { return Vesting.releasableAmount(this.state.record, this.clock.now()); }
    public vestingProgress(): number { return Vesting.vestingProgress(this.state.record, this.clock.now()); }
    public remainingVestingTime(): Duration { return Vesting.remainingVestingTime(this.state.record, this.clock.now()); }
    public phase(): LockupPhase { return Vesting.lockupPhase(this.state.record, this.clock.now()); }
    public timeline(): TimelinePoint[] { return Vesting.projectTimeline(this.state.record); }
    public beneficiary(): Address | null { return this.state.record?.beneficiary ?? null; }
    public token(): Address { return this.ledger.address; }
    public owner(): Address { return this.ownership.owner; }
    public address(): Address { return this.self; }
    public isOwner(account: Address): boolean { return sameAddress(account, this.ownership.owner); }

    public history(): Evidence[] { return this.audit.getHistory(); }
    public verifyAudit(): boolean { return this.audit.verifyChain(); }
    public getStateSnapshotChain(): readonly StateSnapshot[] { return this.state.getSnapshotChain(); }

    // --- Execution ---

    private execute<T>(operation: LockupOperation, caller: Address, body: (now: Timestamp) => Outcome<T>): OperationResult<T> {
        const now = this.clock.now();
        const checkpoint = this.state.checkpoint();
        const owner = this.ownership.checkpoint();

        let outcome: Outcome<T>;
        try {
            outcome = this.lock.run(operation, () => this.host.atomically(() => {
                const result = body(now);
                this.assertInvariants(now);
                return result;
            }));
        } catch (e: unknown) {
            this.state.restore(checkpoint);
            this.ownership.restore(owner);
            if (!(e instanceof LockupError)) {
                console.error(`[LockupKernel] ${operation} aborted:`, e);
                throw e;
            }

            console.warn(`[LockupKernel] ${operation} rejected for ${caller}: ${e.message}`);
            this.audit.append({
                event: operation,
                actor: caller,
                status: 'REJECT',
                reason: e.reason,
                metadata: { code: e.code, ...e.metadata },
                timestamp: now
            });
            return failure(e);
        }

        this.audit.append({ event: outcome.event, actor: caller, payload: outcome.payload, timestamp: now });
        return success(outcome.value);
    }

    private authorize(caller: Address, holder: Address, role: 'owner' | 'beneficiary'): void {
        this.enforce(RoleGuard({ caller, holder, role }));
    }

    private requireRecord(): LockupRecord {
        const record = this.state.record;
        if (!record) throw new LockupError(ErrorCode.NO_LOCKUP, 'No lockup has been created');
        return record;
    }

    private enforce(result: GuardResult): void {
        if (!result.ok) throw new LockupError(result.code, result.violation, result.details);
    }

    private assertInvariants(now: Timestamp): void {
        const record = this.state.record;
        if (!record) return;

        const check = checkInvariants({
            record,
            vested: Vesting.vestedAmount(record, now),
            custody: this.gateway.custody()
        });
        if (!check.ok) {
            const { rejection } = check;
            throw new LockupError(rejection.code, rejection.message, {
                invariantId: rejection.invariantId,
                boundary: rejection.boundary
            });
        }
    }
}
