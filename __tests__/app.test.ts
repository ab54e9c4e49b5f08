import request from 'supertest';
import { describe, it, expect } from 'vitest';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { intervalNumber } from '../src/model/interval.js';
import { AuthorizedAppRegistry } from '../src/store/authorizedApps.js';
import { KEY_A } from './helpers.js';
import { captureLog, MemoryExposureStore } from './support.js';

const registry = new AuthorizedAppRegistry([
    { appPackageName: 'com.example.exposure', platform: 'android', allowedRegions: ['US'], attestationDisabled: true },
]);

function publishBody() {
    // The route uses the wall clock, so keys are placed relative to it.
    const current = intervalNumber(new Date());
    return {
        temporaryExposureKeys: [{ key: KEY_A, rollingStartNumber: current - 20, rollingPeriod: 10, transmissionRisk: 4 }],
        regions: ['US'],
        appPackageName: 'com.example.exposure',
        platform: 'android',
    };
}

describe('app', () => {
    let store: MemoryExposureStore;

    function build(env: Record<string, string> = {}) {
        store = new MemoryExposureStore();
        return createApp(loadConfig(env), { registry, store, log: captureLog().log });
    }

    it('should answer health checks with security headers', async () => {
        const res = await request(build()).get('/health');
        expect(res.status).toBe(200);
        expect(res.body).toEqual({ data: { ok: true } });
        expect(res.headers['cache-control']).toBe('no-store');
        expect(res.headers['x-content-type-options']).toBe('nosniff');
        expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should echo a well formed request id', async () => {
        const res = await request(build()).get('/health').set('X-Request-Id', 'abcDEF123_-x');
        expect(res.headers['x-request-id']).toBe('abcDEF123_-x');
    });

    it('should publish keys', async () => {
        const res = await request(build()).post('/v1/publish').send(publishBody());
        expect(res.status).toBe(200);
        expect(res.body).toEqual({ data: { insertedExposures: 1 } });
        expect(store.exposures[0]?.transmissionRisk).toBe(4);
    });

    it('should return validation failures as JSON errors', async () => {
        const res = await request(build())
            .post('/v1/publish')
            .send({ ...publishBody(), temporaryExposureKeys: [] });
        expect(res.status).toBe(400);
        expect(res.body.error.code).toBe('EMPTY_KEY_SET');
    });

    it('should reject malformed JSON', async () => {
        const res = await request(build())
            .post('/v1/publish')
            .set('Content-Type', 'application/json')
            .send('{"temporaryExposureKeys": [');
        expect(res.status).toBe(400);
        expect(res.body.error.code).toBe('BAD_REQUEST');
    });

    it('should rate limit publishing per client', async () => {
        const app = build({ PUBLISH_MAX: '1' });
        const first = await request(app).post('/v1/publish').send(publishBody());
        const second = await request(app).post('/v1/publish').send(publishBody());
        expect(first.status).toBe(200);
        expect(second.status).toBe(429);
        expect(second.body.error.code).toBe('RATE_LIMITED');
        expect(second.headers['retry-after']).toBe('60');
    });

    it('should not let clients escape the rate limit with forged forwarding headers', async () => {
        const app = build({ PUBLISH_MAX: '1' });
        const statuses: number[] = [];
        for (const forged of ['198.51.100.1', '198.51.100.2', '198.51.100.3']) {
            // the loopback proxy appends the real client after whatever the client sent
            const res = await request(app)
                .post('/v1/publish')
                .set('X-Forwarded-For', `${forged}, 203.0.113.7`)
                .send(publishBody());
            statuses.push(res.status);
        }
        expect(statuses).toEqual([200, 429, 429]);
    });

    it('should return 500 when storage fails', async () => {
        const app = build();
        store.failWith = new Error('disk full');
        const res = await request(app).post('/v1/publish').send(publishBody());
        expect(res.status).toBe(500);
        expect(res.body.error.code).toBe('STORE_FAILED');
    });
});
