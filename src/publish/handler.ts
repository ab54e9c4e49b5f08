import { AppConfig } from '../config.js';
import { attestationNonce } from '../crypto/nonce.js';
import { logJson, Logger } from '../middleware/logger.js';
import { parseBody } from '../middleware/validate.js';
import { isPublishError, PublishError } from '../model/errors.js';
import { Transformer } from '../model/transformer.js';
import { publishRequestSchema } from '../model/wire.js';
import { isRegionAllowed } from '../store/authorizedApps.js';
import { ExposureStore } from '../store/exposureStore.js';
import { AuthorizedApp, ErrorResponse, Exposure, Publish, Success } from '../types.js';
import { AttestationVerifier, verifierFor } from './attestation.js';

export type PublishPolicy = Pick<
    AppConfig,
    'maxExposureKeys' | 'maxIntervalStartAgeMs' | 'truncateWindowMs' | 'maxSameStartIntervalKeys' | 'skipKeyStillValidCheck'
>;

export type PublishDeps = {
    policy: PublishPolicy;
    registry: { get(appPackageName: string): AuthorizedApp | undefined };
    store: ExposureStore;
    verifiers?: readonly AttestationVerifier[];
    log?: Logger;
};

export type PublishResponse = {
    status: number;
    body: Success<{ insertedExposures: number }> | ErrorResponse;
};

export type PublishHandler = (body: unknown, now?: Date) => Promise<PublishResponse>;

function failure(status: number, code: string, message: string, details?: unknown): PublishResponse {
    const error: ErrorResponse['error'] = { code, message };
    if (details !== undefined) error.details = details;
    return { status, body: { error } };
}

function publishErrorResponse(err: PublishError): PublishResponse {
    const details =
        err.kind === 'InvalidPublishData' && isPublishError(err.cause)
            ? { ...err.details, cause: { code: err.cause.code, ...err.cause.details } }
            : err.details;
    return failure(400, err.code, err.message, details);
}

/**
 * Builds the publish pipeline: wire parsing, app and region authorization,
 * device attestation against the request nonce, key validation and storage.
 * Each authorized app gets its own Transformer, its overrides merged over
 * the server policy.
 */
export function createPublishHandler(deps: PublishDeps): PublishHandler {
    const log = deps.log ?? logJson;
    const verifiers = deps.verifiers ?? [];
    const transformers = new Map<string, Transformer>();

    function transformerFor(app: AuthorizedApp): Transformer {
        let t = transformers.get(app.appPackageName);
        if (!t) {
            t = new Transformer({
                maxExposureKeys: app.maxExposureKeys ?? deps.policy.maxExposureKeys,
                maxIntervalStartAgeMs: app.maxIntervalStartAgeMs ?? deps.policy.maxIntervalStartAgeMs,
                truncateWindowMs: deps.policy.truncateWindowMs,
                maxSameStartIntervalKeys: deps.policy.maxSameStartIntervalKeys,
                skipKeyStillValidCheck: deps.policy.skipKeyStillValidCheck,
            });
            transformers.set(app.appPackageName, t);
        }
        return t;
    }

    async function attest(app: AuthorizedApp, publish: Publish): Promise<PublishResponse | null> {
        if (app.attestationDisabled) return null;
        const verifier = verifierFor(verifiers, app.platform);
        if (!verifier) {
            return failure(401, 'ATTESTATION_FAILED', `No attestation verifier for platform ${app.platform}`);
        }
        const nonce = attestationNonce(publish);
        try {
            if (await verifier.verify({ app, publish, nonce })) return null;
            return failure(401, 'ATTESTATION_FAILED', 'Device attestation rejected');
        } catch (err) {
            log({ level: 'warn', event: 'attestation_error', app: app.appPackageName, details: String(err) });
            return failure(401, 'ATTESTATION_FAILED', 'Device attestation could not be verified', String(err));
        }
    }

    return async (body, now = new Date()) => {
        const parsed = parseBody(publishRequestSchema, body);
        if (!parsed.ok) return { status: 400, body: parsed.error };
        const publish = parsed.data;

        const app = deps.registry.get(publish.appPackageName);
        if (!app || app.platform !== publish.platform) {
            log({ level: 'warn', event: 'publish_rejected', app: publish.appPackageName, code: 'APP_NOT_AUTHORIZED' });
            return failure(401, 'APP_NOT_AUTHORIZED', 'Application is not authorized to publish');
        }

        const disallowed = publish.regions.filter((r) => !isRegionAllowed(app, r));
        if (disallowed.length > 0) {
            log({ level: 'warn', event: 'publish_rejected', app: app.appPackageName, code: 'REGION_NOT_AUTHORIZED' });
            return failure(401, 'REGION_NOT_AUTHORIZED', 'Application may not publish to these regions', {
                regions: disallowed,
            });
        }

        const attestationFailure = await attest(app, publish);
        if (attestationFailure) {
            log({ level: 'warn', event: 'publish_rejected', app: app.appPackageName, code: 'ATTESTATION_FAILED' });
            return attestationFailure;
        }

        let exposures: readonly Exposure[];
        try {
            exposures = transformerFor(app).transformPublish(publish, now);
        } catch (err) {
            if (!isPublishError(err)) throw err;
            log({ level: 'warn', event: 'publish_rejected', app: app.appPackageName, code: err.code });
            return publishErrorResponse(err);
        }

        let insertedExposures: number;
        try {
            insertedExposures = deps.store.insertExposures(exposures);
        } catch (err) {
            log({ level: 'error', event: 'store_failed', app: app.appPackageName, details: String(err) });
            return failure(500, 'STORE_FAILED', 'Unable to store exposures', String(err));
        }

        log({
            level: 'info',
            event: 'publish_accepted',
            app: app.appPackageName,
            platform: app.platform,
            keys: exposures.length,
            insertedExposures,
        });
        return { status: 200, body: { data: { insertedExposures } } };
    };
}
