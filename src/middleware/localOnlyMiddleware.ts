// src/middleware/localOnlyMiddleware.ts

import { Request, Response, NextFunction, RequestHandler } from 'express';

const LOOPBACK_IPS = ['127.0.0.1', '::1'];

/**
 * Only lets requests from the local machine through when `enabled`; anything
 * else gets a 403. Disabled, it is a pass-through.
 */
export function localOnlyMiddleware(enabled: boolean): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!enabled) {
            next();
            return;
        }
        // Strip the "::ffff:" prefix of IPv4-mapped addresses.
        const clientIp: string = (req.ip || '').replace(/^::ffff:/, '');
        if (LOOPBACK_IPS.includes(clientIp)) {
            next();
        } else {
            res.status(403).json({ status: 'error', statusCode: 403, message: 'Access denied: Only local requests are allowed' });
        }
    };
}
