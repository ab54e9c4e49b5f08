import { NextFunction, Request, Response } from 'express';

export function secureHeaders(nodeEnv: string | undefined) {
    return (req: Request, res: Response, next: NextFunction) => {
        res.setHeader('X-Content-Type-Options', 'nosniff');
        res.setHeader('X-Frame-Options', 'DENY');
        res.setHeader('Referrer-Policy', 'no-referrer');
        res.setHeader('Cache-Control', 'no-store');
        const xfproto = req.header('x-forwarded-proto') || '';
        if (nodeEnv === 'production' && xfproto === 'https') {
            res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains; preload');
        }
        next();
    };
}
