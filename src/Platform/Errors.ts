/**
 * Lockup Platform: Domain Error Taxonomy
 * Translates kernel rejections into request-level exceptions.
 */

import { ErrorCode, LockupError } from '../kernel-core/Errors.js';

export abstract class PlatformError extends Error {
    public abstract readonly status: number;

    constructor(message: string, public readonly code: string, public readonly metadata?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * A lifecycle rule prevents the operation (e.g. nothing to release yet).
 */
export class PolicyViolationError extends PlatformError {
    public readonly status = 409;

    constructor(message: string, code: string, operation: string, details?: Record<string, unknown>) {
        super(message, code, { operation, ...details });
    }
}

/**
 * Authorization, signature, or replay checks failed.
 */
export class SecurityViolationError extends PlatformError {
    public readonly status: number;

    constructor(message: string, code: string, actor: string) {
        super(message, code, { actor });
        this.status = code === ErrorCode.UNAUTHORIZED ? 403 : 401;
    }
}

/**
 * Invariant or transfer-integrity breach.
 */
export class DataIntegrityError extends PlatformError {
    public readonly status = 422;

    constructor(message: string, code: string, trace?: Record<string, unknown>) {
        super(message, code, trace);
    }
}

/**
 * The ledger or storage underneath failed.
 */
export class InfrastructureError extends PlatformError {
    public readonly status = 502;

    constructor(message: string, code: string = 'INFRASTRUCTURE_FAILURE', underlying?: string) {
        super(message, code, underlying ? { underlying } : undefined);
    }
}

/**
 * Malformed input: request body or configuration.
 */
export class ValidationError extends PlatformError {
    public readonly status = 400;

    constructor(message: string, issues: string[] = [], code: string = 'VALIDATION_FAILED') {
        super(message, code, { issues });
    }
}

const POLICY: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.LOCKUP_ALREADY_EXISTS,
    ErrorCode.INSUFFICIENT_BALANCE,
    ErrorCode.INSUFFICIENT_ALLOWANCE,
    ErrorCode.NO_LOCKUP,
    ErrorCode.NO_TOKENS_AVAILABLE,
    ErrorCode.NOT_REVOCABLE,
    ErrorCode.ALREADY_REVOKED,
    ErrorCode.NOTHING_TO_REVOKE,
    ErrorCode.REENTRANT_CALL
]);

const SECURITY: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.UNAUTHORIZED,
    ErrorCode.SIGNATURE_INVALID,
    ErrorCode.REPLAY_DETECTED
]);

const INTEGRITY: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.TRANSFER_AMOUNT_MISMATCH,
    ErrorCode.INTEGRITY_BREACH
]);

const INPUT: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.INVALID_TOKEN_ADDRESS,
    ErrorCode.INVALID_OWNER,
    ErrorCode.INVALID_BENEFICIARY,
    ErrorCode.INVALID_AMOUNT,
    ErrorCode.INVALID_DURATION
]);

/**
 * Maps a kernel rejection to its platform error by code.
 */
export function translateLockupError(error: LockupError, operation: string, actor: string): PlatformError {
    const { code, message } = error;
    if (POLICY.has(code)) return new PolicyViolationError(message, code, operation, error.metadata);
    if (SECURITY.has(code)) return new SecurityViolationError(message, code, actor);
    if (INTEGRITY.has(code)) return new DataIntegrityError(message, code, error.metadata);
    if (INPUT.has(code)) return new ValidationError(message, [error.reason], code);
    return new InfrastructureError(message, code);
}

export function toPlatformError(e: unknown, operation: string, actor: string): PlatformError {
    if (e instanceof PlatformError) return e;
    if (e instanceof LockupError) return translateLockupError(e, operation, actor);
    return new InfrastructureError(e instanceof Error ? e.message : String(e));
}
