import { z } from 'zod';
import { LockupKernel } from '../kernel-core/Kernel.js';
import type { Address, LockupPhase, LockupRecord } from '../kernel-core/L0/Ontology.js';
import type { TimelinePoint } from '../kernel-core/L3/Vesting.js';
import type { Evidence } from '../kernel-core/L5/Audit.js';
import { PrincipalRegistry, isAddress } from '../kernel-core/L1/Identity.js';
import { ReplayGuard } from '../kernel-core/L0/Guards.js';
import { canonicalize, verifySignature } from '../kernel-core/L0/Crypto.js';
import { ErrorCode } from '../kernel-core/Errors.js';
import type { OperationResult } from '../kernel-core/Errors.js';
import type { ITokenLedger } from './Ports.js';
import { SecurityViolationError, ValidationError, translateLockupError } from './Errors.js';

// --- Wire Schemas (bigints travel as decimal strings) ---

const Uint = z.string().regex(/^\d+$/, 'must be a decimal integer string').transform(v => BigInt(v));

export const CreateLockupSchema = z.object({
    beneficiary: z.string(),
    totalAmount: Uint,
    cliffDuration: Uint,
    vestingDuration: Uint,
    revocable: z.boolean()
});

export const TransferOwnershipSchema = z.object({ newOwner: z.string() });

export const ApproveSchema = z.object({
    amount: Uint,
    spender: z.string().optional()
});

const EmptySchema = z.object({}).strict();

export const AuthHeadersSchema = z.object({
    'x-lockup-caller': z.string().refine(isAddress, 'must be a 0x address'),
    'x-lockup-nonce': z.string().min(8).max(128),
    'x-lockup-signature': z.string().regex(/^[0-9a-fA-F]{128}$/, 'must be 64 hex bytes')
});

/**
 * A mutating request as received by the server.
 */
export interface SignedRequest {
    method: string;
    path: string;
    body: unknown;
    headers: Record<string, string | string[] | undefined>;
}

export interface LockupRecordView {
    beneficiary: Address;
    totalAmount: string;
    releasedAmount: string;
    startTime: string;
    cliffDuration: string;
    vestingDuration: string;
    revocable: boolean;
    revoked: boolean;
    vestedAtRevoke: string;
}

export interface LockupStatusView {
    token: Address;
    owner: Address;
    kernel: Address;
    phase: LockupPhase;
    lockup: LockupRecordView | null;
    vested: string;
    releasable: string;
    progress: number;
    remaining: string;
}

export interface TimelinePointView {
    label: string;
    time: string;
    vested: string;
    percent: number;
}

/**
 * The message a principal signs for a mutating request.
 */
export function signingPayload(method: string, path: string, body: unknown, nonce: string): string {
    return `${method.toUpperCase()}:${path}:${canonicalize(body ?? {})}:${nonce}`;
}

export function toRecordView(record: LockupRecord): LockupRecordView {
    return {
        beneficiary: record.beneficiary,
        totalAmount: record.totalAmount.toString(),
        releasedAmount: record.releasedAmount.toString(),
        startTime: record.startTime.toString(),
        cliffDuration: record.cliffDuration.toString(),
        vestingDuration: record.vestingDuration.toString(),
        revocable: record.revocable,
        revoked: record.revoked,
        vestedAtRevoke: record.vestedAtRevoke.toString()
    };
}

function parse<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ValidationError(`Invalid ${what}`, issues);
    }
    return result.data;
}

/**
 * LockupPlatform: the request-level interface over one kernel.
 * Authenticates signed requests, validates bodies, and raises PlatformErrors
 * for kernel rejections.
 */
export class LockupPlatform {
    private seenNonces: Set<string> = new Set();
    private pendingNonces: Set<string> = new Set(); // reserved while a signature verifies

    constructor(
        private readonly kernel: LockupKernel,
        private readonly principals: PrincipalRegistry,
        private readonly ledger: ITokenLedger
    ) { }

    // --- Commands ---

    public async createLockup(request: SignedRequest): Promise<LockupRecordView> {
        const caller = await this.authenticate(request);
        const params = parse(CreateLockupSchema, request.body, 'lockup parameters');
        const record = this.unwrap(this.kernel.createLockup(caller, params), 'createLockup', caller);
        return toRecordView(record);
    }

    public async release(request: SignedRequest): Promise<{ released: string }> {
        const caller = await this.authenticate(request);
        parse(EmptySchema, request.body ?? {}, 'release request');
        const amount = this.unwrap(this.kernel.release(caller), 'release', caller);
        return { released: amount.toString() };
    }

    public async revoke(request: SignedRequest): Promise<{ returned: string }> {
        const caller = await this.authenticate(request);
        parse(EmptySchema, request.body ?? {}, 'revoke request');
        const amount = this.unwrap(this.kernel.revoke(caller), 'revoke', caller);
        return { returned: amount.toString() };
    }

    public async transferOwnership(request: SignedRequest): Promise<{ owner: Address }> {
        const caller = await this.authenticate(request);
        const { newOwner } = parse(TransferOwnershipSchema, request.body, 'ownership transfer');
        const owner = this.unwrap(this.kernel.transferOwnership(caller, newOwner), 'transferOwnership', caller);
        return { owner };
    }

    /**
     * Approves the kernel (or `spender`) to pull the caller's tokens.
     */
    public async approve(request: SignedRequest): Promise<{ owner: Address; spender: Address; allowance: string }> {
        const caller = await this.authenticate(request);
        const { amount, spender } = parse(ApproveSchema, request.body, 'approval');
        const target = spender ?? this.kernel.address();
        if (!isAddress(target)) throw new ValidationError('Invalid approval', [`spender: malformed address ${target}`]);

        this.ledger.approve(caller, target, amount);
        console.log(`[LockupPlatform] ${caller} approved ${target} for ${amount}`);
        return { owner: caller.toLowerCase(), spender: target.toLowerCase(), allowance: this.ledger.allowance(caller, target).toString() };
    }

    // --- Queries ---

    public status(): LockupStatusView {
        const record = this.kernel.lockupInfo();
        return {
            token: this.kernel.token(),
            owner: this.kernel.owner(),
            kernel: this.kernel.address(),
            phase: this.kernel.phase(),
            lockup: record ? toRecordView(record) : null,
            vested: this.kernel.vestedAmount().toString(),
            releasable: this.kernel.releasableAmount().toString(),
            progress: this.kernel.vestingProgress(),
            remaining: this.kernel.remainingVestingTime().toString()
        };
    }

    public timeline(): TimelinePointView[] {
        return this.kernel.timeline().map((p: TimelinePoint) => ({
            label: p.label,
            time: p.time.toString(),
            vested: p.vested.toString(),
            percent: p.percent
        }));
    }

    public audit(): Evidence[] {
        return this.kernel.history();
    }

    public balanceOf(address: string): { address: Address; balance: string } {
        if (!isAddress(address)) throw new ValidationError('Invalid address', [`address: malformed ${address}`]);
        return { address: address.toLowerCase(), balance: this.ledger.balanceOf(address).toString() };
    }

    // --- Authentication ---

    /**
     * Resolves the signing principal. A nonce is consumed only by a request
     * whose signature verifies, and is held against concurrent reuse while
     * that check is in flight. Consumed nonces are kept for the life of the
     * platform.
     */
    public async authenticate(request: SignedRequest): Promise<Address> {
        const headers = parse(AuthHeadersSchema, request.headers, 'authentication headers');
        const caller = headers['x-lockup-caller'];
        const nonce = headers['x-lockup-nonce'];

        const principal = this.principals.get(caller);
        if (!principal) {
            throw new SecurityViolationError(`Unknown principal ${caller}`, ErrorCode.SIGNATURE_INVALID, caller);
        }

        for (const seen of [this.seenNonces, this.pendingNonces]) {
            const replay = ReplayGuard({ nonce, seen });
            if (!replay.ok) throw new SecurityViolationError(replay.violation, replay.code, caller);
        }

        this.pendingNonces.add(nonce);
        let valid: boolean;
        try {
            const message = signingPayload(request.method, request.path, request.body, nonce);
            valid = await verifySignature(message, headers['x-lockup-signature'], principal.publicKey);
        } finally {
            this.pendingNonces.delete(nonce);
        }
        if (!valid) {
            throw new SecurityViolationError(`Signature does not verify for ${caller}`, ErrorCode.SIGNATURE_INVALID, caller);
        }

        this.seenNonces.add(nonce);
        return principal.address;
    }

    private unwrap<T>(result: OperationResult<T>, operation: string, actor: Address): T {
        if (!result.ok) throw translateLockupError(result.error, operation, actor);
        return result.value;
    }
}
