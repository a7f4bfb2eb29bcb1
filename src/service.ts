/**
 * Bridge startup sequence shared by the CLI entry point
 */

import type { Server } from 'http';
import type { BridgeEngine } from './bridge';
import type { BridgeConfig } from './config';
import type { Logger } from './logging/types';
import { createApp, listen } from './api/server';

export type ListenFn = typeof listen;

/**
 * Open the transport, start the bridge loops, then the control API.
 * If any step fails the bridge is stopped again (deregistering from the
 * BBMD and saving the registry) before the error is rethrown.
 */
export async function startService(
	bridge: BridgeEngine,
	config: BridgeConfig,
	logger: Logger,
	listenFn: ListenFn = listen
): Promise<Server | null> {
	try {
		await bridge.init();
		await bridge.start();
		if (!config.api.enabled) {
			return null;
		}
		return await listenFn(createApp(bridge, logger), config.api.host, config.api.port, logger);
	} catch (error) {
		await bridge.stop();
		throw error;
	}
}
