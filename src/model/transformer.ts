import {
    Exposure,
    ExposureKey,
    KEY_LENGTH,
    MAX_INTERVAL_COUNT,
    MAX_KEYS_PER_PUBLISH,
    MAX_TRANSMISSION_RISK,
    MIN_INTERVAL_COUNT,
    MIN_TRANSMISSION_RISK,
    Publish,
} from '../types.js';
import { decodeBase64 } from '../utils/validation.js';
import { ConfigError, PublishError, isPublishError } from './errors.js';
import { intervalNumber, truncateWindow } from './interval.js';
import { checkAlignedOverlap, sortByInterval } from './overlap.js';

export type TransformKeyOptions = {
    // Accept keys whose validity window has not ended yet. Non-production only.
    skipKeyStillValidCheck?: boolean;
};

export type TransformerConfig = {
    maxExposureKeys: number;
    maxIntervalStartAgeMs: number;
    truncateWindowMs: number;
    maxSameStartIntervalKeys?: number;
    skipKeyStillValidCheck?: boolean;
};

/**
 * Converts one submitted key into an exposure record, validating:
 *
 * - the key decodes from base64 to exactly 16 bytes
 * - MIN_INTERVAL_COUNT <= interval count <= MAX_INTERVAL_COUNT
 * - minIntervalNumber <= interval number < maxIntervalNumber
 * - the key is no longer valid (interval number + count <= maxIntervalNumber)
 * - MIN_TRANSMISSION_RISK <= transmission risk <= MAX_TRANSMISSION_RISK
 *
 * @throws {PublishError} for the first failed check
 */
export function transformExposureKey(
    exposureKey: ExposureKey,
    appPackageName: string,
    upcasedRegions: readonly string[],
    createdAt: Date,
    minIntervalNumber: number,
    maxIntervalNumber: number,
    options: TransformKeyOptions = {}
): Exposure {
    const binKey = decodeBase64(exposureKey.key);
    if (!binKey) {
        throw new PublishError('InvalidKeyEncoding', { key: exposureKey.key }, 'exposure key is not valid base64');
    }
    if (binKey.length !== KEY_LENGTH) {
        throw new PublishError(
            'InvalidKeyLength',
            { length: binKey.length, expected: KEY_LENGTH },
            `invalid key length, ${binKey.length}, must be ${KEY_LENGTH}`
        );
    }

    const { intervalNumber: start, intervalCount: count, transmissionRisk: risk } = exposureKey;
    if (!Number.isInteger(count) || count < MIN_INTERVAL_COUNT || count > MAX_INTERVAL_COUNT) {
        throw new PublishError(
            'InvalidIntervalCount',
            { intervalCount: count, min: MIN_INTERVAL_COUNT, max: MAX_INTERVAL_COUNT },
            `invalid interval count, ${count}, must be >= ${MIN_INTERVAL_COUNT} && <= ${MAX_INTERVAL_COUNT}`
        );
    }

    if (!Number.isInteger(start) || start < minIntervalNumber) {
        throw new PublishError(
            'IntervalTooOld',
            { intervalNumber: start, minIntervalNumber },
            `interval number ${start} is too old, must be >= ${minIntervalNumber}`
        );
    }
    if (start >= maxIntervalNumber) {
        throw new PublishError(
            'IntervalInFuture',
            { intervalNumber: start, maxIntervalNumber },
            `interval number ${start} is in the future, must be < ${maxIntervalNumber}`
        );
    }
    if (!options.skipKeyStillValidCheck && start + count > maxIntervalNumber) {
        throw new PublishError(
            'KeyStillValid',
            { intervalNumber: start, intervalCount: count, maxIntervalNumber },
            `interval number ${start} + interval count ${count} represents a key that is still valid, must end <= ${maxIntervalNumber}`
        );
    }

    if (!Number.isInteger(risk) || risk < MIN_TRANSMISSION_RISK || risk > MAX_TRANSMISSION_RISK) {
        throw new PublishError(
            'InvalidTransmissionRisk',
            { transmissionRisk: risk, min: MIN_TRANSMISSION_RISK, max: MAX_TRANSMISSION_RISK },
            `invalid transmission risk: ${risk}, must be >= ${MIN_TRANSMISSION_RISK} && <= ${MAX_TRANSMISSION_RISK}`
        );
    }

    return Object.freeze({
        exposureKey: binKey,
        transmissionRisk: risk,
        appPackageName,
        regions: upcasedRegions,
        intervalNumber: start,
        intervalCount: count,
        createdAt,
        localProvenance: true,
    });
}

function validateConfig(config: TransformerConfig): Readonly<TransformerConfig> {
    const { maxExposureKeys, maxIntervalStartAgeMs, truncateWindowMs, maxSameStartIntervalKeys } = config;
    if (!Number.isInteger(maxExposureKeys) || maxExposureKeys < 0 || maxExposureKeys > MAX_KEYS_PER_PUBLISH) {
        throw new ConfigError(
            'CONFIG_MAX_KEYS',
            `maxExposureKeys must be >= 0 and <= ${MAX_KEYS_PER_PUBLISH}, got ${maxExposureKeys}`
        );
    }
    if (!Number.isFinite(maxIntervalStartAgeMs) || maxIntervalStartAgeMs < 0) {
        throw new ConfigError('CONFIG_MAX_INTERVAL_AGE', `maxIntervalStartAgeMs must be >= 0, got ${maxIntervalStartAgeMs}`);
    }
    if (!Number.isFinite(truncateWindowMs) || truncateWindowMs < 0) {
        throw new ConfigError('CONFIG_TRUNCATE_WINDOW', `truncateWindowMs must be >= 0, got ${truncateWindowMs}`);
    }
    if (maxSameStartIntervalKeys !== undefined && (!Number.isInteger(maxSameStartIntervalKeys) || maxSameStartIntervalKeys < 1)) {
        throw new ConfigError(
            'CONFIG_MAX_SAME_START_KEYS',
            `maxSameStartIntervalKeys must be >= 1, got ${maxSameStartIntervalKeys}`
        );
    }
    return Object.freeze({ ...config, skipKeyStillValidCheck: config.skipKeyStillValidCheck ?? false });
}

/**
 * A configured Publish -> Exposure[] transformer. The configuration is fixed
 * for the lifetime of the instance; build a new one to change it.
 */
export class Transformer {
    readonly config: Readonly<TransformerConfig>;

    constructor(config: TransformerConfig) {
        this.config = validateConfig(config);
    }

    /**
     * Validates a whole publish request and returns one record per key, in
     * submission order. All or nothing: any failure rejects the batch.
     *
     * @param batchTime - reference "now" for the batch; all keys share its acceptance window
     * @throws {PublishError}
     */
    transformPublish(publish: Publish, batchTime: Date): readonly Exposure[] {
        const { maxExposureKeys, maxIntervalStartAgeMs, truncateWindowMs } = this.config;
        if (publish.keys.length === 0) {
            throw new PublishError('EmptyKeySet', {}, 'no exposure keys in publish request');
        }
        if (publish.keys.length > maxExposureKeys) {
            throw new PublishError(
                'TooManyKeys',
                { count: publish.keys.length, max: maxExposureKeys },
                `too many exposure keys in publish: ${publish.keys.length}, max of ${maxExposureKeys} is allowed`
            );
        }

        const createdAt = truncateWindow(batchTime, truncateWindowMs);
        // Oldest accepted start interval (configured max age) and the current
        // interval, which no key may start at or after.
        const minIntervalNumber = intervalNumber(new Date(batchTime.getTime() - maxIntervalStartAgeMs));
        const maxIntervalNumber = intervalNumber(batchTime);

        // Which regions an app may write to is decided by the authorized app
        // registry; here they are only normalized for storage.
        const upcasedRegions = Object.freeze(publish.regions.map((r) => r.toUpperCase()));

        const records = publish.keys.map((key, index) => {
            try {
                return transformExposureKey(
                    key,
                    publish.appPackageName,
                    upcasedRegions,
                    createdAt,
                    minIntervalNumber,
                    maxIntervalNumber,
                    { skipKeyStillValidCheck: this.config.skipKeyStillValidCheck }
                );
            } catch (err) {
                if (!isPublishError(err)) throw err;
                throw new PublishError(
                    'InvalidPublishData',
                    { index, reason: err.kind },
                    `invalid publish data: ${err.message}`,
                    { cause: err }
                );
            }
        });

        checkAlignedOverlap(sortByInterval(records), this.config.maxSameStartIntervalKeys);

        return Object.freeze(records);
    }
}
