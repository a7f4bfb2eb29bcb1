/**
 * Cancellable timing helpers for the bridge's long-running loops
 */

import { AbortError, OperationTimeoutError, describeError, isAbortError } from '../errors';
import type { Logger } from '../logging/types';

/**
 * Sleep for `ms`, rejecting with AbortError as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new AbortError());
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			reject(new AbortError());
		};

		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);

		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

/**
 * Race a promise against a timeout (and an optional abort signal).
 * The underlying operation is not cancelled; its late result is ignored.
 */
export function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	operation: string,
	signal?: AbortSignal
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		if (signal?.aborted) {
			reject(new AbortError());
			return;
		}

		const cleanup = () => {
			clearTimeout(timer);
			signal?.removeEventListener('abort', onAbort);
		};

		const onAbort = () => {
			cleanup();
			reject(new AbortError());
		};

		const timer = setTimeout(() => {
			cleanup();
			reject(new OperationTimeoutError(operation, timeoutMs));
		}, timeoutMs);

		signal?.addEventListener('abort', onAbort, { once: true });

		promise.then(
			(value) => {
				cleanup();
				resolve(value);
			},
			(error: unknown) => {
				cleanup();
				reject(error);
			}
		);
	});
}

/**
 * Abort controller that also aborts when `parent` does
 */
export function linkedAbortController(parent?: AbortSignal): { controller: AbortController; release: () => void } {
	const controller = new AbortController();
	if (!parent) {
		return { controller, release: () => undefined };
	}
	if (parent.aborted) {
		controller.abort();
		return { controller, release: () => undefined };
	}
	const onAbort = () => controller.abort();
	parent.addEventListener('abort', onAbort, { once: true });
	return { controller, release: () => parent.removeEventListener('abort', onAbort) };
}

export interface PeriodicTaskOptions {
	name: string;
	intervalMs: number;
	/** Run the first iteration immediately (default) or after one interval */
	runImmediately?: boolean;
	logger: Logger;
	component: string;
}

/**
 * An owned loop: run `iteration`, sleep, repeat until stopped.
 *
 * Errors thrown by an iteration are logged and never end the loop.
 * start() is a no-op while running; stop() aborts the sleep or the
 * in-flight iteration and waits for the loop to exit.
 */
export class PeriodicTask {
	private controller: AbortController | null = null;
	private loop: Promise<void> | null = null;

	constructor(
		private readonly options: PeriodicTaskOptions,
		private readonly iteration: (signal: AbortSignal) => Promise<void>
	) {}

	get running(): boolean {
		return this.loop !== null;
	}

	start(): void {
		if (this.loop) {
			return;
		}
		const controller = new AbortController();
		this.controller = controller;
		this.loop = this.run(controller.signal);
	}

	async stop(): Promise<void> {
		const loop = this.loop;
		if (!loop || !this.controller) {
			return;
		}
		this.controller.abort();
		try {
			await loop;
		} catch (error) {
			if (!isAbortError(error)) {
				throw error;
			}
		} finally {
			this.loop = null;
			this.controller = null;
		}
	}

	private async run(signal: AbortSignal): Promise<void> {
		const { name, intervalMs, logger, component } = this.options;

		if (this.options.runImmediately === false) {
			await this.pause(intervalMs, signal);
		}

		while (!signal.aborted) {
			try {
				await this.iteration(signal);
			} catch (error) {
				if (signal.aborted && isAbortError(error)) {
					break;
				}
				logger.error(`${name} iteration failed`, {
					component,
					error: describeError(error)
				});
			}

			await this.pause(intervalMs, signal);
		}
	}

	private async pause(ms: number, signal: AbortSignal): Promise<void> {
		try {
			await sleep(ms, signal);
		} catch (error) {
			if (!isAbortError(error)) {
				throw error;
			}
		}
	}
}
