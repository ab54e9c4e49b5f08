import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from './model/errors.js';
import { MAX_KEYS_PER_PUBLISH } from './types.js';

const DEFAULT_PORT = 8080;
const DEFAULT_MAX_INTERVAL_AGE_MS = 15 * 24 * 60 * 60 * 1000; // 15 days
const DEFAULT_TRUNCATE_WINDOW_MS = 60 * 60 * 1000; // 1h
const DEFAULT_AUTHORIZED_APPS = './data/authorized-apps.json';
const DEFAULT_EXPOSURE_STORE = './data/exposures';

type Env = Record<string, string | undefined>;

export type AppConfig = {
    port: number;
    nodeEnv: string | undefined;
    maxExposureKeys: number;
    maxIntervalStartAgeMs: number;
    truncateWindowMs: number;
    maxSameStartIntervalKeys?: number;
    skipKeyStillValidCheck: boolean;
    authorizedAppsPath: string;
    exposureStorePath: string;
    publishRateLimitWindowMs: number;
    publishRateLimitMax: number;
    bodyLimit: string;
};

function readNumber(env: Env, name: string, fallback: number): number {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigError('CONFIG_INVALID_NUMBER', `${name} must be a non-negative number, got "${raw}"`);
    }
    return value;
}

function readBool(env: Env, name: string): boolean {
    return String(env[name] ?? 'false').trim().toLowerCase() === 'true';
}

export function loadConfig(env: Env = process.env): AppConfig {
    const nodeEnv = env.NODE_ENV;
    const port = readNumber(env, 'PORT', DEFAULT_PORT);

    const maxExposureKeys = readNumber(env, 'MAX_KEYS_ON_PUBLISH', MAX_KEYS_PER_PUBLISH);
    if (!Number.isInteger(maxExposureKeys) || maxExposureKeys > MAX_KEYS_PER_PUBLISH) {
        throw new ConfigError(
            'CONFIG_MAX_KEYS',
            `MAX_KEYS_ON_PUBLISH must be an integer <= ${MAX_KEYS_PER_PUBLISH}, got ${maxExposureKeys}`
        );
    }
    const maxIntervalStartAgeMs = readNumber(env, 'MAX_INTERVAL_AGE_ON_PUBLISH_MS', DEFAULT_MAX_INTERVAL_AGE_MS);
    const truncateWindowMs = readNumber(env, 'TRUNCATE_WINDOW_MS', DEFAULT_TRUNCATE_WINDOW_MS);
    const maxSameStartIntervalKeys = env.MAX_SAME_START_INTERVAL_KEYS?.trim()
        ? readNumber(env, 'MAX_SAME_START_INTERVAL_KEYS', 0)
        : undefined;

    const skipKeyStillValidCheck = readBool(env, 'SKIP_KEY_DATE_VALIDATION');
    if (skipKeyStillValidCheck && nodeEnv === 'production') {
        throw new ConfigError(
            'CONFIG_SKIP_KEY_DATE_VALIDATION',
            'SKIP_KEY_DATE_VALIDATION must not be enabled in production'
        );
    }

    const authorizedAppsPath = env.AUTHORIZED_APPS_PATH?.trim() || DEFAULT_AUTHORIZED_APPS;
    const exposureStorePath = env.EXPOSURE_STORE_PATH?.trim() || DEFAULT_EXPOSURE_STORE;
    const publishRateLimitWindowMs = readNumber(env, 'PUBLISH_WINDOW_MS', 60_000);
    const publishRateLimitMax = readNumber(env, 'PUBLISH_MAX', 30);
    const bodyLimit = env.PUBLISH_BODY_LIMIT?.trim() || '256kb';

    return {
        port,
        nodeEnv,
        maxExposureKeys,
        maxIntervalStartAgeMs,
        truncateWindowMs,
        maxSameStartIntervalKeys,
        skipKeyStillValidCheck,
        authorizedAppsPath,
        exposureStorePath,
        publishRateLimitWindowMs,
        publishRateLimitMax,
        bodyLimit,
    };
}

/** Creates the store directory if needed and checks it is writable. */
export function ensureStorePath(dir: string): void {
    try {
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        // test write permissions via temp file
        const testFile = path.join(dir, `.write-test-${Date.now()}`);
        fs.writeFileSync(testFile, 'ok');
        fs.rmSync(testFile);
    } catch (err) {
        throw new ConfigError('CONFIG_STORE_PATH', `EXPOSURE_STORE_PATH not writeable: ${dir}`, { cause: err });
    }
}
