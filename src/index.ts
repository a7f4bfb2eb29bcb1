#!/usr/bin/env node
/**
 * BACnet/MQTT bridge entry point
 */

import 'dotenv/config';
import type { Server } from 'http';
import { loadConfig } from './config';
import { BridgeEngine } from './bridge';
import { ConfigError, describeError } from './errors';
import { createLogger } from './logging/logger';
import { LogComponents } from './logging/components';
import { closeServer } from './api/server';
import { startService } from './service';

async function main(): Promise<void> {
	let config;
	try {
		config = loadConfig();
	} catch (error) {
		if (error instanceof ConfigError) {
			console.error(error.message);
			process.exit(1);
		}
		throw error;
	}

	const logger = createLogger(config.logging);
	const bridge = new BridgeEngine(config, logger);

	let server: Server | null;
	try {
		server = await startService(bridge, config, logger);
	} catch (error) {
		logger.error('Failed to start bridge', {
			component: LogComponents.GATEWAY,
			error: describeError(error)
		});
		process.exit(1);
	}

	let shuttingDown = false;
	const shutdown = async (signal: string): Promise<void> => {
		if (shuttingDown) {
			return;
		}
		shuttingDown = true;
		logger.info(`${signal} received, shutting down`, { component: LogComponents.GATEWAY });

		try {
			if (server) {
				await closeServer(server);
			}
			await bridge.stop();
			process.exit(0);
		} catch (error) {
			logger.error('Error during shutdown', {
				component: LogComponents.GATEWAY,
				error: describeError(error)
			});
			process.exit(1);
		}
	};

	process.on('SIGTERM', () => void shutdown('SIGTERM'));
	process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
	console.error('Fatal error:', describeError(error));
	process.exit(1);
});
