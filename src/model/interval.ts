// Intervals are 10 minute periods; there are 144 of them in a day.
export const INTERVAL_LENGTH_MS = 10 * 60 * 1000;
export const INTERVALS_PER_DAY = 144;

/**
 * Exposure notification interval number for a point in time: the count of
 * 10 minute periods since the Unix epoch, as a signed 32-bit integer.
 */
export function intervalNumber(t: Date): number {
    const unixSeconds = Math.floor(t.getTime() / 1000);
    return Math.floor(unixSeconds / (INTERVAL_LENGTH_MS / 1000)) | 0;
}

/**
 * Truncates `t` down to a multiple of `windowMs` since the Unix epoch.
 * A non-positive window leaves the time unchanged.
 */
export function truncateWindow(t: Date, windowMs: number): Date {
    if (windowMs <= 0) return new Date(t.getTime());
    const ms = t.getTime();
    return new Date(ms - mod(ms, windowMs));
}

function mod(n: number, m: number): number {
    return ((n % m) + m) % m;
}
