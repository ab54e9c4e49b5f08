import { Router } from 'express';
import { rateLimit } from '../middleware/rateLimit.js';
import { PublishHandler } from '../publish/handler.js';

type PublishRouterOpts = {
    rateLimitWindowMs: number;
    rateLimitMax: number;
};

export function publishRouter(handle: PublishHandler, opts: PublishRouterOpts): Router {
    const router = Router();

    router.use(
        rateLimit({
            windowMs: opts.rateLimitWindowMs,
            max: opts.rateLimitMax,
            errorMessage: 'Too many publish requests',
        })
    );

    router.post('/publish', (req, res, next) => {
        handle(req.body, new Date())
            .then((out) => {
                res.status(out.status).json(out.body);
            })
            .catch(next);
    });

    return router;
}
