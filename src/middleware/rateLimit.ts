import { NextFunction, Request, Response } from 'express';

type Bucket = { count: number; resetAt: number };

type RateLimitOpts = {
  windowMs: number;
  max: number;
  keyFn?: (req: Request) => string;
  errorMessage?: string;
  now?: () => number;
};

const MAX_BUCKETS = 10_000;

function sweep(buckets: Map<string, Bucket>, t: number) {
  for (const [key, bucket] of buckets) {
    if (bucket.resetAt <= t) buckets.delete(key);
  }
}

// Create an isolated rate limiter instance (no global cross-route sharing)
export function rateLimit(opts: RateLimitOpts) {
  const buckets = new Map<string, Bucket>();
  // req.ip honours 'trust proxy': only hops appended by trusted proxies count
  const keyFn = opts.keyFn ?? ((req: Request) => req.ip ?? 'unknown');
  const errorMessage = opts.errorMessage ?? 'Too many requests';
  const now = opts.now ?? Date.now;
  return (req: Request, res: Response, next: NextFunction) => {
    const key = keyFn(req);
    const t = now();
    if (buckets.size > MAX_BUCKETS) sweep(buckets, t);
    let bucket = buckets.get(key);
    if (!bucket || bucket.resetAt <= t) {
      bucket = { count: 0, resetAt: t + opts.windowMs };
      buckets.set(key, bucket);
    }
    if (bucket.count >= opts.max) {
      const retryAfterSec = Math.max(1, Math.ceil((bucket.resetAt - t) / 1000));
      res.setHeader('Retry-After', String(retryAfterSec));
      res.status(429).json({ error: { code: 'RATE_LIMITED', message: errorMessage, details: { retryAfterSec } } });
      return;
    }
    bucket.count += 1;
    next();
  };
}
