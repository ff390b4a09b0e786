import { Request, Response, NextFunction } from 'express';
import { httpRequestDuration } from '../utils/metrics.js';

/**
 * Middleware to collect HTTP request metrics
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
    const startTime = Date.now();

    res.on('finish', () => {
        const duration = (Date.now() - startTime) / 1000;
        // route pattern once the router matched, so job ids do not become labels
        const route = typeof req.route?.path === 'string' ? `${req.baseUrl}${req.route.path}` : 'unmatched';
        httpRequestDuration.observe(
            { method: req.method, route, status_code: res.statusCode.toString() },
            duration
        );
    });

    next();
}
