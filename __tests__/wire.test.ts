import { describe, it, expect } from 'vitest';
import { parseBody } from '../src/middleware/validate.js';
import { PUBLISH_WIRE_V1, publishRequestSchema, toWirePublish } from '../src/model/wire.js';
import { Publish } from '../src/types.js';
import { KEY_A, KEY_B } from './helpers.js';

function wireBody(overrides: Record<string, unknown> = {}) {
    return {
        temporaryExposureKeys: [
            { key: KEY_A, rollingStartNumber: 2704166, rollingPeriod: 10, transmissionRisk: 3 },
            { key: KEY_B, rollingStartNumber: 2704000, rollingPeriod: 144, transmissionRisk: 0 },
        ],
        regions: ['us'],
        appPackageName: 'com.example.exposure',
        platform: 'android',
        verificationPayload: 'cert-123',
        ...overrides,
    };
}

describe('publish wire format v1', () => {
    it('should map wire field names onto the model', () => {
        const parsed = publishRequestSchema.parse(wireBody());
        expect(parsed).toEqual({
            keys: [
                { key: KEY_A, intervalNumber: 2704166, intervalCount: 10, transmissionRisk: 3 },
                { key: KEY_B, intervalNumber: 2704000, intervalCount: 144, transmissionRisk: 0 },
            ],
            regions: ['us'],
            appPackageName: 'com.example.exposure',
            platform: 'android',
            verificationPayload: 'cert-123',
        });
        expect(parsed.deviceVerificationPayload).toBeUndefined();
        expect(PUBLISH_WIRE_V1.version).toBe(1);
    });

    it('should accept the platform in any case', () => {
        expect(publishRequestSchema.parse(wireBody({ platform: 'iOS' })).platform).toBe('ios');
    });

    it('should default regions to none', () => {
        const { regions: _regions, ...body } = wireBody();
        expect(publishRequestSchema.parse(body).regions).toEqual([]);
    });

    it('should leave range checks to the transformer', () => {
        const body = wireBody({
            temporaryExposureKeys: [{ key: 'short', rollingStartNumber: -5, rollingPeriod: 0, transmissionRisk: 99 }],
        });
        expect(publishRequestSchema.safeParse(body).success).toBe(true);
        expect(publishRequestSchema.safeParse(wireBody({ temporaryExposureKeys: [] })).success).toBe(true);
    });

    it('should reject values that are not 32 bit integers', () => {
        const fractional = wireBody({
            temporaryExposureKeys: [{ key: KEY_A, rollingStartNumber: 1, rollingPeriod: 1.5, transmissionRisk: 0 }],
        });
        const tooLarge = wireBody({
            temporaryExposureKeys: [{ key: KEY_A, rollingStartNumber: 2 ** 31, rollingPeriod: 1, transmissionRisk: 0 }],
        });
        expect(publishRequestSchema.safeParse(fractional).success).toBe(false);
        expect(publishRequestSchema.safeParse(tooLarge).success).toBe(false);
    });

    it('should reject unknown platforms and a missing app', () => {
        expect(publishRequestSchema.safeParse(wireBody({ platform: 'windows' })).success).toBe(false);
        expect(publishRequestSchema.safeParse(wireBody({ appPackageName: '' })).success).toBe(false);
    });

    it('should report failures as a validation error response', () => {
        const result = parseBody(publishRequestSchema, { platform: 'android' });
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.error.code).toBe('VALIDATION_ERROR');
            expect(result.error.error.message).toBe('Invalid request body');
            expect(result.error.error.details).toMatchObject({
                fieldErrors: { temporaryExposureKeys: ['Required'], appPackageName: ['Required'] },
            });
        }
    });

    it('should render a publish back to the wire format', () => {
        const publish: Publish = {
            keys: [{ key: KEY_A, intervalNumber: 100, intervalCount: 144, transmissionRisk: 2 }],
            regions: ['CA'],
            appPackageName: 'com.example.exposure.ios',
            platform: 'ios',
            deviceVerificationPayload: 'device-token',
        };
        const wire = toWirePublish(publish);
        expect(wire).toEqual({
            temporaryExposureKeys: [{ key: KEY_A, rollingStartNumber: 100, rollingPeriod: 144, transmissionRisk: 2 }],
            regions: ['CA'],
            appPackageName: 'com.example.exposure.ios',
            platform: 'ios',
            deviceVerificationPayload: 'device-token',
        });
        expect(publishRequestSchema.parse(wire)).toEqual(publish);
    });
});
