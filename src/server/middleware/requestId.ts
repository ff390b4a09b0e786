import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext } from '../utils/logger.js';

/**
 * Attach a request ID to each request and run the rest of the chain in a
 * logging context carrying it.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' && header.length > 0 ? header : randomUUID();
    res.setHeader('X-Request-ID', requestId);

    requestContext.run({ requestId, method: req.method, path: req.path }, () => next());
}
