// src/kernel-core/L0/Guards.ts
import type { Address, Amount, Duration, LockupRecord } from './Ontology.js';
import type { ILedgerHost, ITokenLedger } from '../../Platform/Ports.js';
import { MAX_VESTING_DURATION, UINT256_MAX } from './Primitives.js';
import { isAddress, isZeroAddress, sameAddress } from '../L1/Identity.js';
import { ErrorCode } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string; details?: Record<string, unknown> };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, violation: string, details?: Record<string, unknown>): GuardResult =>
    details ? { ok: false, code, violation, details } : { ok: false, code, violation };

// --- Concrete Guards ---

// 0. Deployment (token reference sanity, not an interface proof)
export const TokenAddressGuard: Guard<{ token: string, host: ILedgerHost }> = ({ token, host }) => {
    if (!isAddress(token)) return FAIL(ErrorCode.INVALID_TOKEN_ADDRESS, `Malformed token address: ${token}`);
    if (isZeroAddress(token)) return FAIL(ErrorCode.INVALID_TOKEN_ADDRESS, 'Token address is zero');
    if (!host.hasCode(token)) return FAIL(ErrorCode.INVALID_TOKEN_ADDRESS, `No code deployed at ${token}`);
    return OK;
};

// 1. Authority (explicit caller comparison)
export const RoleGuard: Guard<{ caller: Address, holder: Address, role: 'owner' | 'beneficiary' }> = ({ caller, holder, role }) => {
    if (!sameAddress(caller, holder)) return FAIL(ErrorCode.UNAUTHORIZED, `Caller ${caller} is not the ${role}`, { role });
    return OK;
};

// 2. Presence (cheapest check first: no external calls)
export const DuplicateGuard: Guard<{ record: LockupRecord | null }> = ({ record }) => {
    if (record) return FAIL(ErrorCode.LOCKUP_ALREADY_EXISTS, `Lockup already exists for ${record.beneficiary}`);
    return OK;
};

// 3. Schedule Parameters
export const BeneficiaryGuard: Guard<{ beneficiary: string }> = ({ beneficiary }) => {
    if (!isAddress(beneficiary)) return FAIL(ErrorCode.INVALID_BENEFICIARY, `Malformed beneficiary: ${beneficiary}`);
    if (isZeroAddress(beneficiary)) return FAIL(ErrorCode.INVALID_BENEFICIARY, 'Beneficiary is the zero address');
    return OK;
};

export const AmountGuard: Guard<{ amount: Amount }> = ({ amount }) => {
    if (amount <= 0n) return FAIL(ErrorCode.INVALID_AMOUNT, 'Amount must be greater than zero');
    if (amount > UINT256_MAX) return FAIL(ErrorCode.INVALID_AMOUNT, 'Amount exceeds uint256 range');
    return OK;
};

// cliff == vesting is rejected so that a gradual window always exists
export const DurationGuard: Guard<{ cliffDuration: Duration, vestingDuration: Duration }> = ({ cliffDuration, vestingDuration }) => {
    const details = { cliffDuration: cliffDuration.toString(), vestingDuration: vestingDuration.toString() };
    if (cliffDuration < 0n) return FAIL(ErrorCode.INVALID_DURATION, 'Cliff duration must not be negative', details);
    if (vestingDuration <= 0n) return FAIL(ErrorCode.INVALID_DURATION, 'Vesting duration must be positive', details);
    if (cliffDuration >= vestingDuration) return FAIL(ErrorCode.INVALID_DURATION, 'Cliff must be shorter than vesting duration', details);
    if (vestingDuration > MAX_VESTING_DURATION) return FAIL(ErrorCode.INVALID_DURATION, 'Vesting duration exceeds 10 years', details);
    return OK;
};

// 4. Funding (two distinct kinds so callers know what to fix)
export const BalanceGuard: Guard<{ ledger: ITokenLedger, holder: Address, amount: Amount }> = ({ ledger, holder, amount }) => {
    const balance = ledger.balanceOf(holder);
    if (balance < amount) {
        return FAIL(ErrorCode.INSUFFICIENT_BALANCE, `Balance ${balance} is below ${amount}`, { balance: balance.toString(), required: amount.toString() });
    }
    return OK;
};

export const AllowanceGuard: Guard<{ ledger: ITokenLedger, holder: Address, spender: Address, amount: Amount }> = ({ ledger, holder, spender, amount }) => {
    const allowance = ledger.allowance(holder, spender);
    if (allowance < amount) {
        return FAIL(ErrorCode.INSUFFICIENT_ALLOWANCE, `Allowance ${allowance} is below ${amount}`, { allowance: allowance.toString(), required: amount.toString() });
    }
    return OK;
};

// 5. Settlement (balance delta must match exactly)
export const TransferIntegrityGuard: Guard<{ before: Amount, after: Amount, expected: Amount }> = ({ before, after, expected }) => {
    const received = after - before;
    if (received !== expected) {
        return FAIL(ErrorCode.TRANSFER_AMOUNT_MISMATCH, `Received ${received}, expected ${expected}`, { received: received.toString(), expected: expected.toString() });
    }
    return OK;
};

// 6. Release
export const ReleasableGuard: Guard<{ releasable: Amount }> = ({ releasable }) => {
    if (releasable <= 0n) return FAIL(ErrorCode.NO_TOKENS_AVAILABLE, 'No tokens available for release');
    return OK;
};

// 7. Revocation
export const RevocableGuard: Guard<{ record: LockupRecord }> = ({ record }) => {
    if (!record.revocable) return FAIL(ErrorCode.NOT_REVOCABLE, 'Lockup is not revocable');
    return OK;
};

export const NotRevokedGuard: Guard<{ record: LockupRecord }> = ({ record }) => {
    if (record.revoked) return FAIL(ErrorCode.ALREADY_REVOKED, 'Lockup already revoked');
    return OK;
};

export const UnvestedGuard: Guard<{ record: LockupRecord, vested: Amount }> = ({ record, vested }) => {
    if (vested >= record.totalAmount) return FAIL(ErrorCode.NOTHING_TO_REVOKE, 'Lockup is fully vested');
    return OK;
};

// 8. Ownership
export const NewOwnerGuard: Guard<{ newOwner: string }> = ({ newOwner }) => {
    if (!isAddress(newOwner) || isZeroAddress(newOwner)) return FAIL(ErrorCode.INVALID_OWNER, `Invalid new owner: ${newOwner}`);
    return OK;
};

// 9. Replay Guard (request nonces)
export const ReplayGuard: Guard<{ nonce: string, seen: Set<string> }> = ({ nonce, seen }) => {
    if (seen.has(nonce)) return FAIL(ErrorCode.REPLAY_DETECTED, `Nonce ${nonce} already used`);
    return OK;
};
