import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { Exposure, StoredExposure } from '../types.js';

const STORE_FILE = 'exposures.json';

const storedExposureSchema = z.object({
    exposureKey: z.string().min(1),
    transmissionRisk: z.number().int(),
    appPackageName: z.string(),
    regions: z.array(z.string()),
    intervalNumber: z.number().int(),
    intervalCount: z.number().int(),
    createdAt: z.string().datetime(),
    localProvenance: z.boolean(),
    federationSyncId: z.number().int().optional(),
});

const storeFileSchema = z.array(storedExposureSchema);

export interface ExposureStore {
    /** Inserts records, skipping keys already stored. Returns the number inserted. */
    insertExposures(exposures: readonly Exposure[]): number;
}

export function toStoredExposure(ex: Exposure): StoredExposure {
    const stored: StoredExposure = {
        exposureKey: ex.exposureKey.toString('base64'),
        transmissionRisk: ex.transmissionRisk,
        appPackageName: ex.appPackageName,
        regions: [...ex.regions],
        intervalNumber: ex.intervalNumber,
        intervalCount: ex.intervalCount,
        createdAt: ex.createdAt.toISOString(),
        localProvenance: ex.localProvenance,
    };
    if (ex.federationSyncId !== undefined) stored.federationSyncId = ex.federationSyncId;
    return stored;
}

/**
 * Exposure records kept in a single JSON file, rewritten atomically on
 * every insert. The exposure key is unique across the store.
 */
export class FileExposureStore implements ExposureStore {
    private filePath: string;
    private cache: Map<string, StoredExposure> = new Map();

    constructor(baseDir: string) {
        this.filePath = path.join(baseDir, STORE_FILE);
        this.load();
    }

    private load() {
        if (!fs.existsSync(this.filePath)) {
            this.persist([]);
            return;
        }
        const arr = storeFileSchema.parse(JSON.parse(fs.readFileSync(this.filePath, 'utf8')));
        for (const rec of arr) this.cache.set(rec.exposureKey, rec);
    }

    private persist(arr: StoredExposure[]) {
        const tmp = `${this.filePath}.tmp-${process.pid}-${Date.now()}`;
        fs.writeFileSync(tmp, JSON.stringify(arr, null, 2));
        fs.renameSync(tmp, this.filePath);
    }

    insertExposures(exposures: readonly Exposure[]): number {
        const added = new Map<string, StoredExposure>();
        for (const ex of exposures) {
            const rec = toStoredExposure(ex);
            if (this.cache.has(rec.exposureKey) || added.has(rec.exposureKey)) continue;
            added.set(rec.exposureKey, rec);
        }
        if (added.size === 0) return 0;

        // The cache only takes rows that reached disk.
        this.persist([...this.cache.values(), ...added.values()]);
        for (const [key, rec] of added) this.cache.set(key, rec);
        return added.size;
    }

    list(): StoredExposure[] {
        return Array.from(this.cache.values(), (rec) => ({ ...rec, regions: [...rec.regions] }));
    }
}
