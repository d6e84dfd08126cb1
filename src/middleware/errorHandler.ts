import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { config } from '../config';

export const errorHandler = (
	err: Error | AppError,
	req: Request,
	res: Response,
	_next: NextFunction
): void => {
	let statusCode = 500;
	let message = 'Internal Server Error';
	let isOperational = false;
	let details: string[] = [];

	// Handle known errors
	if (err instanceof AppError) {
		statusCode = err.statusCode;
		message = err.message;
		isOperational = err.isOperational;
		if (err instanceof ValidationError) details = err.details;
	} else if (err instanceof SyntaxError && 'body' in err) {
		// express.json() rejects a malformed body with a SyntaxError
		statusCode = 400;
		message = 'Malformed JSON body';
		isOperational = true;
	}

	if (isOperational) {
		logger.warn(message, { path: req.path, statusCode, details });
	} else {
		logger.error(err.stack || err.message, { path: req.path });
	}

	res.status(statusCode).json({
		status: 'error',
		statusCode,
		message: isOperational ? message : 'Something went wrong',
		...(details.length > 0 && { details }),
		...(config.isDevelopment && { stack: err.stack }),
	});
};
