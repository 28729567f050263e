import type { Amount, Duration, LockupPhase, LockupRecord, Timestamp } from '../L0/Ontology.js';
import { SECONDS_PER_DAY, maxOf, minOf, mulDiv } from '../L0/Primitives.js';

/**
 * Vesting Calculator
 *
 * Pure functions of the stored schedule and a caller-supplied "now".
 *
 *   startTime ──── cliffEnd ──────────── vestingEnd
 *   |  nothing   |  total * elapsed / duration  |  total
 *
 * Elapsed time is measured from startTime, not from the cliff end, so the
 * amount accrued during the cliff unlocks at once when the cliff passes.
 */

export const cliffEnd = (record: LockupRecord): Timestamp => record.startTime + record.cliffDuration;
export const vestingEnd = (record: LockupRecord): Timestamp => record.startTime + record.vestingDuration;

export function vestedAmount(record: LockupRecord | null, now: Timestamp): Amount {
    if (!record) return 0n;

    let vested: Amount;
    if (now < cliffEnd(record)) {
        vested = 0n;
    } else if (now >= vestingEnd(record)) {
        // exact total: no rounding dust at the end
        vested = record.totalAmount;
    } else {
        vested = mulDiv(record.totalAmount, now - record.startTime, record.vestingDuration);
    }

    return record.revoked ? minOf(vested, record.vestedAtRevoke) : vested;
}

export function releasableAmount(record: LockupRecord | null, now: Timestamp): Amount {
    if (!record) return 0n;
    return maxOf(vestedAmount(record, now) - record.releasedAmount, 0n);
}

/**
 * Floor percentage of the vesting window elapsed, 0..100. Ignores the cliff.
 */
export function vestingProgress(record: LockupRecord | null, now: Timestamp): number {
    if (!record || now <= record.startTime) return 0;
    const elapsed = minOf(now, vestingEnd(record)) - record.startTime;
    return Number(mulDiv(elapsed, 100n, record.vestingDuration));
}

export function remainingVestingTime(record: LockupRecord | null, now: Timestamp): Duration {
    if (!record) return 0n;
    return maxOf(vestingEnd(record) - now, 0n);
}

export function lockupPhase(record: LockupRecord | null, now: Timestamp): LockupPhase {
    if (!record) return 'UNINITIALIZED';

    const ceiling = record.revoked ? record.vestedAtRevoke : record.totalAmount;
    if (record.releasedAmount >= ceiling) return 'FULLY_RELEASED';
    if (record.revoked) return 'REVOKED';
    if (now < cliffEnd(record)) return 'CLIFF';
    if (now < vestingEnd(record)) return 'VESTING';
    return 'FULLY_VESTED';
}

// --- Timeline Projection ---

export interface TimelinePoint {
    label: string;
    time: Timestamp;
    vested: Amount;
    percent: number; // of totalAmount, floored to one decimal
}

const PERIOD = 30n * SECONDS_PER_DAY;
const MAX_PERIODS = 12n;

function point(record: LockupRecord, label: string, time: Timestamp): TimelinePoint {
    // projections describe the schedule as written, so revocation is ignored
    const schedule: LockupRecord = { ...record, revoked: false, vestedAtRevoke: 0n };
    const vested = vestedAmount(schedule, time);
    return { label, time, vested, percent: Number(mulDiv(vested, 1000n, record.totalAmount)) / 10 };
}

/**
 * Milestones (start, cliff end, quarters, end) followed by one entry per
 * 30-day period when the schedule runs longer than 90 days.
 */
export function projectTimeline(record: LockupRecord | null): TimelinePoint[] {
    if (!record) return [];

    const { startTime, vestingDuration } = record;
    const points: TimelinePoint[] = [
        point(record, 'Start', startTime),
        point(record, 'Cliff End', cliffEnd(record)),
        point(record, '25% Duration', startTime + vestingDuration / 4n),
        point(record, '50% Duration', startTime + vestingDuration / 2n),
        point(record, '75% Duration', startTime + (vestingDuration * 3n) / 4n),
        point(record, 'Vesting End', vestingEnd(record)),
    ];

    if (vestingDuration > 3n * PERIOD) {
        const periods = minOf(MAX_PERIODS, vestingDuration / PERIOD);
        for (let month = 1n; month <= periods; month++) {
            points.push(point(record, `M${month}`, startTime + month * PERIOD));
        }
    }

    return points;
}
