/**
 * Error handling middleware
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ConfigError, DeviceNotFoundError, ObjectNotFoundError, RegistrationError } from '../../errors';
import { LogComponents } from '../../logging/components';
import type { Logger } from '../../logging/types';

/**
 * Raised by a route for a malformed path parameter or query
 */
export class BadRequestError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'BadRequestError';
	}
}

function clientErrorStatus(err: Error): number | undefined {
	if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
		return err.status;
	}
	return undefined;
}

function classify(err: Error): { status: number; error: string; message: string } {
	if (err instanceof DeviceNotFoundError || err instanceof ObjectNotFoundError) {
		return { status: 404, error: 'Not found', message: err.message };
	}
	if (err instanceof ZodError) {
		const message = err.issues
			.map(issue => `${issue.path.join('.') || '<body>'}: ${issue.message}`)
			.join('; ');
		return { status: 400, error: 'Bad request', message };
	}
	if (err instanceof BadRequestError || err instanceof ConfigError) {
		return { status: 400, error: 'Bad request', message: err.message };
	}
	// body-parser and other http-errors style failures (malformed JSON, oversized body)
	const status = clientErrorStatus(err);
	if (status !== undefined) {
		return { status, error: status === 400 ? 'Bad request' : 'Request rejected', message: err.message };
	}
	if (err instanceof RegistrationError) {
		return { status: 502, error: 'Registration failed', message: err.message };
	}
	return { status: 500, error: 'Internal server error', message: err.message };
}

export default function errors(logger: Logger) {
	return (err: Error, req: Request, res: Response, next: NextFunction) => {
		if (res.headersSent) {
			return next(err);
		}

		const { status, error, message } = classify(err);
		const meta = {
			component: LogComponents.API,
			method: req.method,
			path: req.path,
			status,
			error: err.message
		};
		if (status >= 500) {
			logger.error('API Error', meta);
		} else {
			logger.debug('API request rejected', meta);
		}

		return res.status(status).json({ error, message });
	};
}
