/**
 * Lockup Kernel Error Taxonomy
 * Centralized error codes for formal rejections and terminal failures.
 */

export enum ErrorCode {
    // I. Deployment
    INVALID_TOKEN_ADDRESS = 'INVALID_TOKEN_ADDRESS',

    // II. Authority
    UNAUTHORIZED = 'UNAUTHORIZED',
    INVALID_OWNER = 'INVALID_OWNER',
    SIGNATURE_INVALID = 'SIGNATURE_INVALID',
    REPLAY_DETECTED = 'REPLAY_DETECTED',

    // III. Schedule Parameters
    LOCKUP_ALREADY_EXISTS = 'LOCKUP_ALREADY_EXISTS',
    INVALID_BENEFICIARY = 'INVALID_BENEFICIARY',
    INVALID_AMOUNT = 'INVALID_AMOUNT',
    INVALID_DURATION = 'INVALID_DURATION',

    // IV. Funding & Settlement
    INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
    INSUFFICIENT_ALLOWANCE = 'INSUFFICIENT_ALLOWANCE',
    TRANSFER_AMOUNT_MISMATCH = 'TRANSFER_AMOUNT_MISMATCH',
    TRANSFER_FAILED = 'TRANSFER_FAILED',

    // V. Lifecycle
    NO_LOCKUP = 'NO_LOCKUP',
    NO_TOKENS_AVAILABLE = 'NO_TOKENS_AVAILABLE',
    NOT_REVOCABLE = 'NOT_REVOCABLE',
    ALREADY_REVOKED = 'ALREADY_REVOKED',
    NOTHING_TO_REVOKE = 'NOTHING_TO_REVOKE',

    // VI. Kernel Internal
    REENTRANT_CALL = 'REENTRANT_CALL',
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
}

export class LockupError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly reason: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Lockup:${code}] ${reason}`);
        this.name = 'LockupError';
    }
}

export type OperationResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: LockupError };

export const success = <T>(value: T): OperationResult<T> => ({ ok: true, value });
export const failure = <T>(error: LockupError): OperationResult<T> => ({ ok: false, error });
