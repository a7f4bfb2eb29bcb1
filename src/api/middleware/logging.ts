/**
 * Request logging middleware
 */

import type { Request, Response, NextFunction } from 'express';
import { LogComponents } from '../../logging/components';
import type { Logger } from '../../logging/types';

export default function logging(logger: Logger) {
	return (req: Request, res: Response, next: NextFunction) => {
		const start = Date.now();

		res.on('finish', () => {
			const duration = Date.now() - start;
			const logMessage = `${req.method} ${req.path}`;
			const context = {
				component: LogComponents.API,
				statusCode: res.statusCode,
				duration: `${duration}ms`
			};

			if (res.statusCode >= 500) {
				logger.error(logMessage, context);
			} else if (res.statusCode >= 400) {
				logger.warn(logMessage, context);
			} else {
				logger.debug(logMessage, context);
			}
		});

		next();
	};
}
