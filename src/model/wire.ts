import { z } from 'zod';
import { ExposureKey, Publish } from '../types.js';

/**
 * Version 1 of the publish API field names, mapped from the in-memory model.
 * The JSON names are a contract with deployed mobile clients; add a new
 * version rather than editing this one.
 */
export const PUBLISH_WIRE_V1 = {
    version: 1,
    publish: {
        keys: 'temporaryExposureKeys',
        regions: 'regions',
        appPackageName: 'appPackageName',
        platform: 'platform',
        deviceVerificationPayload: 'deviceVerificationPayload',
        verificationPayload: 'verificationPayload',
        padding: 'padding',
    },
    exposureKey: {
        key: 'key',
        intervalNumber: 'rollingStartNumber',
        intervalCount: 'rollingPeriod',
        transmissionRisk: 'transmissionRisk',
    },
} as const;

const P = PUBLISH_WIRE_V1.publish;
const K = PUBLISH_WIRE_V1.exposureKey;

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

const int32 = z.number().int().min(INT32_MIN).max(INT32_MAX);

// Structure and types only; value ranges are the transformer's job so that
// clients get its specific error codes.
const exposureKeyWireSchema = z.object({
    [K.key]: z.string(),
    [K.intervalNumber]: int32,
    [K.intervalCount]: int32,
    [K.transmissionRisk]: int32,
});

const platformSchema = z
    .string()
    .transform((s) => s.toLowerCase())
    .pipe(z.enum(['ios', 'android']));

export const publishWireSchema = z.object({
    [P.keys]: z.array(exposureKeyWireSchema),
    [P.regions]: z.array(z.string()).default([]),
    [P.appPackageName]: z.string().min(1),
    [P.platform]: platformSchema,
    [P.deviceVerificationPayload]: z.string().optional(),
    [P.verificationPayload]: z.string().optional(),
    [P.padding]: z.string().optional(),
});

export type PublishWire = z.input<typeof publishWireSchema>;

export const publishRequestSchema = publishWireSchema.transform(
    (w): Publish => ({
        keys: w[P.keys].map(
            (k): ExposureKey => ({
                key: k[K.key],
                intervalNumber: k[K.intervalNumber],
                intervalCount: k[K.intervalCount],
                transmissionRisk: k[K.transmissionRisk],
            })
        ),
        regions: w[P.regions],
        appPackageName: w[P.appPackageName],
        platform: w[P.platform],
        deviceVerificationPayload: w[P.deviceVerificationPayload],
        verificationPayload: w[P.verificationPayload],
        padding: w[P.padding],
    })
);

/** Renders a publish request in the v1 wire format. */
export function toWirePublish(publish: Publish): PublishWire {
    return {
        [P.keys]: publish.keys.map((k) => ({
            [K.key]: k.key,
            [K.intervalNumber]: k.intervalNumber,
            [K.intervalCount]: k.intervalCount,
            [K.transmissionRisk]: k.transmissionRisk,
        })),
        [P.regions]: [...publish.regions],
        [P.appPackageName]: publish.appPackageName,
        [P.platform]: publish.platform,
        [P.deviceVerificationPayload]: publish.deviceVerificationPayload,
        [P.verificationPayload]: publish.verificationPayload,
        [P.padding]: publish.padding,
    };
}
