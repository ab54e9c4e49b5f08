import { NextFunction, Request, Response } from 'express';
import crypto from 'node:crypto';
import { getSafeRequestId } from './headers.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogEntry = { level: LogLevel; event: string } & Record<string, unknown>;

export type Logger = (entry: LogEntry) => void;

export const logJson: Logger = (entry) => {
    const line = JSON.stringify({ time: new Date().toISOString(), ...entry });
    // eslint-disable-next-line no-console
    if (entry.level === 'error') console.error(line);
    // eslint-disable-next-line no-console
    else console.log(line);
};

export function requestLogger(log: Logger = logJson) {
    return (req: Request, res: Response, next: NextFunction) => {
        const start = Date.now();
        const method = req.method;
        const url = req.originalUrl || req.url;
        const ip = req.ip;
        const requestId = getSafeRequestId(req.headers['x-request-id']) || crypto.randomUUID();
        res.locals.requestId = requestId;
        res.setHeader('X-Request-Id', requestId);
        res.on('finish', () => {
            const ms = Date.now() - start;
            log({ level: 'info', event: 'request', requestId, method, url, status: res.statusCode, ms, ip });
        });
        next();
    };
}
