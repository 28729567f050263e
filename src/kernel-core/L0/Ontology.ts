/**
 * LOCKUP ONTOLOGY
 * The single source of truth for kernel primitives.
 */

// --- 1. Identity ---
export type Address = string; // 0x-prefixed, 20 bytes, lowercase once normalized

// --- 2. Quantities ---
export type Amount = bigint; // token base units
export type Timestamp = bigint; // seconds
export type Duration = bigint; // seconds

// --- 3. Lockup Record ---
export interface LockupRecord {
    beneficiary: Address;
    totalAmount: Amount;
    releasedAmount: Amount;
    startTime: Timestamp;
    cliffDuration: Duration;
    vestingDuration: Duration;
    revocable: boolean;
    revoked: boolean;
    vestedAtRevoke: Amount;
}

export interface CreateLockupParams {
    beneficiary: Address;
    totalAmount: Amount;
    cliffDuration: Duration;
    vestingDuration: Duration;
    revocable: boolean;
}

// --- 4. Lifecycle ---
export type LockupOperation = 'createLockup' | 'release' | 'revoke' | 'transferOwnership';

export type LockupPhase =
    | 'UNINITIALIZED'
    | 'CLIFF'
    | 'VESTING'
    | 'FULLY_VESTED'
    | 'REVOKED'
    | 'FULLY_RELEASED';

// --- 5. Events ---
export type LockupEventType =
    | 'KernelDeployed'
    | 'LockupCreated'
    | 'TokensReleased'
    | 'LockupRevoked'
    | 'OwnershipTransferred';

export type EventPayload = Record<string, string | boolean>;
