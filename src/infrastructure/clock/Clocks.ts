import type { ISystemClock } from '../../Platform/Ports.js';
import type { Duration, Timestamp } from '../../kernel-core/L0/Ontology.js';

/**
 * Wall clock in whole seconds. Never reports a value lower than one it has
 * already returned.
 */
export class SystemClock implements ISystemClock {
    private last: Timestamp = 0n;

    now(): Timestamp {
        const current = BigInt(Math.floor(Date.now() / 1000));
        if (current > this.last) this.last = current;
        return this.last;
    }
}

export class ManualClock implements ISystemClock {
    constructor(private current: Timestamp = 0n) { }

    now(): Timestamp {
        return this.current;
    }

    advance(seconds: Duration): Timestamp {
        if (seconds < 0n) throw new RangeError('Clock cannot move backwards');
        this.current += seconds;
        return this.current;
    }

    set(time: Timestamp): void {
        if (time < this.current) throw new RangeError(`Clock cannot move backwards: ${time} < ${this.current}`);
        this.current = time;
    }
}
