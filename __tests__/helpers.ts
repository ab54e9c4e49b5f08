import { ExposureKey } from '../src/types.js';

export const KEY_A = 'AAECAwQFBgcICQoLDA0ODw==';
export const KEY_B = 'EBESExQVFhcYGRobHB0eHw==';
export const KEY_C = '+/v7+/v7+/v7+/v7+/v7+w==';

export const FIFTEEN_DAYS_MS = 15 * 24 * 60 * 60 * 1000;
export const ONE_HOUR_MS = 60 * 60 * 1000;

export function key(intervalNumber: number, intervalCount: number, overrides: Partial<ExposureKey> = {}): ExposureKey {
    return { key: KEY_A, intervalNumber, intervalCount, transmissionRisk: 3, ...overrides };
}

/** Runs `fn` and returns what it threw; fails the test if nothing was thrown. */
export function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected function to throw');
}
