import { PeriodicTask, linkedAbortController, sleep, withTimeout } from '../../../src/utils/task';
import { AbortError, OperationTimeoutError } from '../../../src/errors';
import { createMockLogger, MockLogger } from '../../helpers/mock-logger';
import { waitFor } from '../../helpers/wait';

describe('task utilities', () => {
	describe('sleep', () => {
		it('should reject with AbortError when aborted', async () => {
			const controller = new AbortController();
			const pending = sleep(60000, controller.signal);

			controller.abort();

			await expect(pending).rejects.toBeInstanceOf(AbortError);
		});

		it('should reject at once for an aborted signal', async () => {
			const controller = new AbortController();
			controller.abort();

			await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(AbortError);
		});
	});

	describe('withTimeout', () => {
		it('should resolve with the value of a fast operation', async () => {
			await expect(withTimeout(Promise.resolve(42), 100, 'fast')).resolves.toBe(42);
		});

		it('should reject a slow operation with OperationTimeoutError', async () => {
			const error = await withTimeout(sleep(1000), 10, 'slow read').catch((e: unknown) => e);

			expect(error).toBeInstanceOf(OperationTimeoutError);
			expect(error).toMatchObject({ operation: 'slow read', timeout: 10 });
		});

		it('should pass through the operation error', async () => {
			await expect(withTimeout(Promise.reject(new Error('refused')), 100, 'read')).rejects.toThrow('refused');
		});

		it('should reject when the signal aborts first', async () => {
			const controller = new AbortController();
			const pending = withTimeout(sleep(1000), 500, 'read', controller.signal);

			controller.abort();

			await expect(pending).rejects.toBeInstanceOf(AbortError);
		});

		it('should not time out an operation that already finished', async () => {
			const result = await withTimeout(Promise.resolve('done'), 5, 'read');
			await sleep(15);

			expect(result).toBe('done');
		});
	});

	describe('linkedAbortController', () => {
		it('should abort the child when the parent aborts', () => {
			const parent = new AbortController();
			const { controller } = linkedAbortController(parent.signal);

			parent.abort();

			expect(controller.signal.aborted).toBe(true);
		});

		it('should leave the parent alone when the child aborts', () => {
			const parent = new AbortController();
			const { controller, release } = linkedAbortController(parent.signal);

			controller.abort();
			release();

			expect(parent.signal.aborted).toBe(false);
		});
	});

	describe('PeriodicTask', () => {
		let mockLogger: MockLogger;

		beforeEach(() => {
			mockLogger = createMockLogger();
		});

		it('should keep looping after an iteration fails', async () => {
			const iteration = jest.fn<Promise<void>, [AbortSignal]>()
				.mockRejectedValueOnce(new Error('boom'))
				.mockResolvedValue(undefined);
			const task = new PeriodicTask({ name: 'Test loop', intervalMs: 5, logger: mockLogger, component: 'Test' }, iteration);

			task.start();
			await waitFor(() => iteration.mock.calls.length >= 3);
			await task.stop();

			expect(mockLogger.error).toHaveBeenCalledTimes(1);
			expect(mockLogger.error).toHaveBeenCalledWith('Test loop iteration failed', { component: 'Test', error: 'boom' });
			expect(task.running).toBe(false);
		});

		it('should wait one interval first when asked to', async () => {
			const iteration = jest.fn<Promise<void>, [AbortSignal]>().mockResolvedValue(undefined);
			const task = new PeriodicTask(
				{ name: 'Delayed', intervalMs: 60000, runImmediately: false, logger: mockLogger, component: 'Test' },
				iteration
			);

			task.start();
			await sleep(10);
			await task.stop();

			expect(iteration).not.toHaveBeenCalled();
		});

		it('should abort the in-flight iteration on stop', async () => {
			let seen: AbortSignal | undefined;
			const task = new PeriodicTask(
				{ name: 'Long', intervalMs: 60000, logger: mockLogger, component: 'Test' },
				async (signal) => {
					seen = signal;
					await sleep(60000, signal);
				}
			);

			task.start();
			await waitFor(() => seen !== undefined);
			await task.stop();

			expect(seen?.aborted).toBe(true);
			expect(mockLogger.error).not.toHaveBeenCalled();
		});
	});
});
