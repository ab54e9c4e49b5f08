import fs from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../model/errors.js';
import { AuthorizedApp, MAX_KEYS_PER_PUBLISH } from '../types.js';

const authorizedAppSchema = z.object({
    appPackageName: z.string().min(1),
    platform: z.enum(['ios', 'android']),
    allowedRegions: z.array(z.string().min(1)).default([]),
    attestationDisabled: z.boolean().default(false),
    maxExposureKeys: z.number().int().nonnegative().max(MAX_KEYS_PER_PUBLISH).optional(),
    maxIntervalStartAgeMs: z.number().nonnegative().optional(),
});

const registryFileSchema = z.array(authorizedAppSchema);

/**
 * Applications allowed to publish keys, with the regions each may write to.
 * Lookups are by exact app package name (Android package / iOS bundle id).
 */
export class AuthorizedAppRegistry {
    private apps = new Map<string, AuthorizedApp>();

    constructor(apps: readonly AuthorizedApp[]) {
        for (const app of apps) {
            if (this.apps.has(app.appPackageName)) {
                throw new ConfigError('CONFIG_AUTHORIZED_APPS', `duplicate authorized app: ${app.appPackageName}`);
            }
            this.apps.set(
                app.appPackageName,
                Object.freeze({ ...app, allowedRegions: app.allowedRegions.map((r) => r.toUpperCase()) })
            );
        }
    }

    static fromFile(filePath: string): AuthorizedAppRegistry {
        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        } catch (err) {
            throw new ConfigError('CONFIG_AUTHORIZED_APPS', `unable to read authorized apps from ${filePath}`, { cause: err });
        }
        const parsed = registryFileSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ConfigError(
                'CONFIG_AUTHORIZED_APPS',
                `invalid authorized apps file ${filePath}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
            );
        }
        return new AuthorizedAppRegistry(parsed.data);
    }

    get(appPackageName: string): AuthorizedApp | undefined {
        return this.apps.get(appPackageName);
    }

    get size(): number {
        return this.apps.size;
    }
}

/** An app with no configured regions may publish to any region. */
export function isRegionAllowed(app: AuthorizedApp, region: string): boolean {
    if (app.allowedRegions.length === 0) return true;
    return app.allowedRegions.includes(region.toUpperCase());
}
