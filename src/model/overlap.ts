import { Exposure } from '../types.js';
import { PublishError } from './errors.js';

type Interval = Pick<Exposure, 'intervalNumber' | 'intervalCount'>;

/** Sorted copy by start interval, then interval count. The input is left as is. */
export function sortByInterval<T extends Interval>(records: readonly T[]): T[] {
    return [...records].sort(
        (a, b) => a.intervalNumber - b.intervalNumber || a.intervalCount - b.intervalCount
    );
}

/**
 * Checks that keys in one batch only overlap when they share a start interval.
 * Devices may emit several keys starting at the same rolling period boundary
 * (a key replaced mid-day); two keys with different, overlapping starts are
 * rejected. `sorted` must be ordered as by `sortByInterval`.
 *
 * @throws {PublishError} `MisalignedOverlap` or `TooManySameStartKeys`
 */
export function checkAlignedOverlap(sorted: readonly Interval[], maxSameStartIntervalKeys?: number): void {
    const first = sorted[0];
    if (!first) return;

    const startCounts = new Map<number, number>();
    let lastInterval = first.intervalNumber;
    let nextInterval = first.intervalNumber + first.intervalCount;

    for (const ex of sorted) {
        const count = (startCounts.get(ex.intervalNumber) ?? 0) + 1;
        startCounts.set(ex.intervalNumber, count);
        if (maxSameStartIntervalKeys !== undefined && count > maxSameStartIntervalKeys) {
            throw new PublishError(
                'TooManySameStartKeys',
                { intervalNumber: ex.intervalNumber, count, max: maxSameStartIntervalKeys },
                `too many keys starting at interval ${ex.intervalNumber}: ${count}, max of ${maxSameStartIntervalKeys} is allowed`
            );
        }

        if (ex.intervalNumber === lastInterval) {
            // Same start: allowed, but the coverage now ends with this key.
            nextInterval = ex.intervalNumber + ex.intervalCount;
            continue;
        }

        if (ex.intervalNumber < nextInterval) {
            throw new PublishError(
                'MisalignedOverlap',
                { intervalNumber: ex.intervalNumber, previousStart: lastInterval, previousEnd: nextInterval },
                `exposure keys have non aligned overlapping intervals: ${ex.intervalNumber} overlaps with previous key that is good from ${lastInterval} to ${nextInterval}`
            );
        }

        lastInterval = ex.intervalNumber;
        nextInterval = ex.intervalNumber + ex.intervalCount;
    }
}
