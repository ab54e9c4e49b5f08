import express from 'express';
import swaggerUi from 'swagger-ui-express';
import { AppConfig } from './config.js';
import { openapiSpec } from './docs/openapi.js';
import { logJson, Logger, requestLogger } from './middleware/logger.js';
import { secureHeaders } from './middleware/secureHeaders.js';
import { AttestationVerifier } from './publish/attestation.js';
import { createPublishHandler } from './publish/handler.js';
import { publishRouter } from './routes/publish.js';
import { AuthorizedAppRegistry } from './store/authorizedApps.js';
import { ExposureStore } from './store/exposureStore.js';

export type AppDeps = {
    registry: AuthorizedAppRegistry;
    store: ExposureStore;
    verifiers?: readonly AttestationVerifier[];
    log?: Logger;
};

export function createApp(cfg: AppConfig, deps: AppDeps): express.Express {
    const log = deps.log ?? logJson;
    const app = express();
    app.set('trust proxy', 'loopback, linklocal, uniquelocal');
    app.use(express.json({ limit: cfg.bodyLimit }));
    app.use(requestLogger(log));
    app.use(secureHeaders(cfg.nodeEnv));

    // Health
    app.get('/health', (_req, res) => res.json({ data: { ok: true } }));

    // Docs
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(openapiSpec));

    // Routes
    const handlePublish = createPublishHandler({
        policy: cfg,
        registry: deps.registry,
        store: deps.store,
        verifiers: deps.verifiers,
        log,
    });
    app.use(
        '/v1',
        publishRouter(handlePublish, {
            rateLimitWindowMs: cfg.publishRateLimitWindowMs,
            rateLimitMax: cfg.publishRateLimitMax,
        })
    );

    // Error fallback
    app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        // body-parser errors carry an http status (400 malformed JSON, 413 too large)
        const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
        if (status >= 500) {
            log({ level: 'error', event: 'unhandled_error', details: String(err) });
            res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Unexpected error' } });
            return;
        }
        res.status(status).json({ error: { code: 'BAD_REQUEST', message: err instanceof Error ? err.message : 'Bad request' } });
    });

    return app;
}
