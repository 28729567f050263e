import { ErrorCode, LockupError } from '../Errors.js';

/**
 * Per-instance busy flag. Held for the whole of a lifecycle operation,
 * released on every exit path.
 */
export class ReentrancyLock {
    private holder: string | null = null;

    public get locked(): boolean { return this.holder !== null; }

    public run<T>(operation: string, work: () => T): T {
        if (this.holder !== null) {
            throw new LockupError(
                ErrorCode.REENTRANT_CALL,
                `Reentrant call into ${operation} while ${this.holder} is in flight`,
                { operation, inFlight: this.holder }
            );
        }

        this.holder = operation;
        try {
            return work();
        } finally {
            this.holder = null;
        }
    }

    public assertHeld(site: string): void {
        if (this.holder === null) {
            throw new LockupError(ErrorCode.INTEGRITY_BREACH, `${site} invoked outside a guarded operation`);
        }
    }
}
