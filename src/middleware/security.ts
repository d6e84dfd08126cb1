import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AppConfig } from '../config';

export type SecuritySettings = Pick<AppConfig, 'security' | 'rateLimit' | 'cors' | 'isProduction'>;

// Helper to check if request is from a bypass IP
function isRequestFromBypassIP(req: Request, bypassIPs: readonly string[]): boolean {
	const clientIp = req.ip || req.socket.remoteAddress || '';
	const normalizedIp = clientIp.replace(/^::ffff:/, ''); // Remove IPv6 prefix for IPv4

	return bypassIPs.some(bypassIp => {
		if (normalizedIp === bypassIp) return true;
		if (bypassIp === 'localhost') {
			return normalizedIp === '127.0.0.1' || normalizedIp === '::1';
		}
		return false;
	});
}

/**
 * Helmet, CORS and rate limiting, in that order. Each one is skipped when the
 * security middleware is disabled or the caller is on the bypass list.
 */
export function securityMiddleware(settings: SecuritySettings): RequestHandler[] {
	const { security, rateLimit: limits, cors: corsSettings } = settings;

	const conditional = (middleware: RequestHandler): RequestHandler => {
		return (req: Request, res: Response, next: NextFunction) => {
			if (!security.enableMiddleware || isRequestFromBypassIP(req, security.bypassIPs)) {
				return next();
			}
			return middleware(req, res, next);
		};
	};

	const corsOptions: cors.CorsOptions = {
		origin: (origin, callback) => {
			// Requests without an origin (curl, the CLI) are always allowed
			if (!origin || corsSettings.allowedOrigins.includes('*') || corsSettings.allowedOrigins.includes(origin)) {
				return callback(null, true);
			}
			callback(new Error('Not allowed by CORS'));
		},
		credentials: true,
		optionsSuccessStatus: 200,
	};

	return [
		conditional(helmet({ contentSecurityPolicy: settings.isProduction ? undefined : false })),
		conditional(cors(corsOptions)),
		conditional(
			rateLimit({
				windowMs: limits.windowMs,
				max: limits.maxRequests,
				standardHeaders: true,
				legacyHeaders: false,
				message: 'Too many requests from this IP, please try again later.',
			})
		),
	];
}
