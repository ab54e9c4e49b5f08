import { LogEntry, Logger } from '../src/middleware/logger.js';
import { ExposureStore } from '../src/store/exposureStore.js';
import { Exposure } from '../src/types.js';

/** In-process stand-in for the exposure store. */
export class MemoryExposureStore implements ExposureStore {
    readonly exposures: Exposure[] = [];
    failWith: Error | null = null;

    insertExposures(exposures: readonly Exposure[]): number {
        if (this.failWith) throw this.failWith;
        this.exposures.push(...exposures);
        return exposures.length;
    }
}

export function captureLog(): { log: Logger; entries: LogEntry[] } {
    const entries: LogEntry[] = [];
    return { log: (entry) => entries.push(entry), entries };
}
