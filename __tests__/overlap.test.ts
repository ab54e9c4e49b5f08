import { describe, it, expect } from 'vitest';
import { isPublishError } from '../src/model/errors.js';
import { checkAlignedOverlap, sortByInterval } from '../src/model/overlap.js';
import { thrown } from './helpers.js';

const iv = (intervalNumber: number, intervalCount: number) => ({ intervalNumber, intervalCount });

describe('sortByInterval', () => {
    it('should order by start interval then interval count', () => {
        const input = [iv(200, 10), iv(100, 144), iv(100, 50)];
        expect(sortByInterval(input)).toEqual([iv(100, 50), iv(100, 144), iv(200, 10)]);
    });

    it('should leave the input untouched', () => {
        const input = [iv(200, 10), iv(100, 144)];
        sortByInterval(input);
        expect(input).toEqual([iv(200, 10), iv(100, 144)]);
    });
});

describe('checkAlignedOverlap', () => {
    it('should accept an empty or single key batch', () => {
        expect(() => checkAlignedOverlap([])).not.toThrow();
        expect(() => checkAlignedOverlap([iv(100, 144)])).not.toThrow();
    });

    it('should accept disjoint and adjacent keys', () => {
        expect(() => checkAlignedOverlap([iv(100, 20), iv(120, 20), iv(300, 144)])).not.toThrow();
    });

    it('should accept keys sharing a start interval', () => {
        expect(() => checkAlignedOverlap(sortByInterval([iv(100, 144), iv(100, 50), iv(244, 144)]))).not.toThrow();
    });

    it('should reject a key starting inside the previous one', () => {
        const err = thrown(() => checkAlignedOverlap([iv(100, 50), iv(120, 10)]));
        expect(isPublishError(err, 'MisalignedOverlap')).toBe(true);
        if (isPublishError(err, 'MisalignedOverlap')) {
            expect(err.details).toEqual({ intervalNumber: 120, previousStart: 100, previousEnd: 150 });
            expect(err.message).toBe(
                'exposure keys have non aligned overlapping intervals: 120 overlaps with previous key that is good from 100 to 150'
            );
        }
    });

    it('should measure overlap against the longest key of a shared start', () => {
        const err = thrown(() => checkAlignedOverlap(sortByInterval([iv(100, 144), iv(100, 50), iv(200, 10)])));
        expect(isPublishError(err, 'MisalignedOverlap')).toBe(true);
        if (isPublishError(err, 'MisalignedOverlap')) {
            expect(err.details).toEqual({ intervalNumber: 200, previousStart: 100, previousEnd: 244 });
        }
    });

    it('should cap keys per start interval only when a limit is given', () => {
        const sorted = sortByInterval([iv(100, 144), iv(100, 72), iv(100, 10)]);
        expect(() => checkAlignedOverlap(sorted)).not.toThrow();
        expect(() => checkAlignedOverlap(sorted, 3)).not.toThrow();
        const err = thrown(() => checkAlignedOverlap(sorted, 2));
        expect(isPublishError(err, 'TooManySameStartKeys')).toBe(true);
        if (isPublishError(err, 'TooManySameStartKeys')) {
            expect(err.details).toEqual({ intervalNumber: 100, count: 3, max: 2 });
            expect(err.code).toBe('TOO_MANY_SAME_START_KEYS');
        }
    });
});
