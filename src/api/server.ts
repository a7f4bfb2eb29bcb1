/**
 * Control API server
 */

import express from 'express';
import type { Server } from 'http';
import type { BridgeControl } from '../bridge';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';
import { errors, logging } from './middleware';
import { createRouter } from './routes';

export function createApp(bridge: BridgeControl, logger: Logger): express.Express {
	const app = express();

	app.use(express.json());
	app.use(logging(logger));
	app.use(createRouter(bridge, logger));
	app.use(errors(logger));

	return app;
}

/**
 * Start listening; resolves once the socket is bound
 */
export function listen(app: express.Express, host: string, port: number, logger: Logger): Promise<Server> {
	return new Promise((resolve, reject) => {
		const server = app.listen(port, host);
		server.once('listening', () => {
			logger.info('Control API listening', { component: LogComponents.API, host, port });
			resolve(server);
		});
		server.once('error', reject);
	});
}

export function closeServer(server: Server): Promise<void> {
	return new Promise((resolve, reject) => {
		server.close(error => (error ? reject(error) : resolve()));
	});
}
