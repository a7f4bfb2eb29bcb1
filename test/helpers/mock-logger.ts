import type { Logger } from '../../src/logging/types';

export type MockLogger = { [K in keyof Logger]: jest.Mock };

export function createMockLogger(): MockLogger {
	return {
		debug: jest.fn(),
		info: jest.fn(),
		warn: jest.fn(),
		error: jest.fn()
	};
}
