/**
 * Bridge Error Classes
 * Specific error types for the registry, control operations and startup
 */

/**
 * Error thrown when a device id is not present in the registry
 */
export class DeviceNotFoundError extends Error {
	public deviceId: number;

	constructor(deviceId: number) {
		super(`Device ${deviceId} not found`);
		this.name = 'DeviceNotFoundError';
		this.deviceId = deviceId;
	}
}

/**
 * Error thrown when an object key is not present on a device
 */
export class ObjectNotFoundError extends Error {
	public deviceId: number;
	public objectKey: string;

	constructor(deviceId: number, objectKey: string) {
		super(`Object ${objectKey} not found on device ${deviceId}`);
		this.name = 'ObjectNotFoundError';
		this.deviceId = deviceId;
		this.objectKey = objectKey;
	}
}

/**
 * Error thrown when an operation exceeds its time budget
 */
export class OperationTimeoutError extends Error {
	public operation: string;
	public timeout: number;

	constructor(operation: string, timeout: number) {
		super(`Operation "${operation}" timed out after ${timeout}ms`);
		this.name = 'OperationTimeoutError';
		this.operation = operation;
		this.timeout = timeout;
	}
}

/**
 * Error thrown when a transport does not implement a primitive
 */
export class UnsupportedOperationError extends Error {
	public operation: string;

	constructor(operation: string) {
		super(`Operation "${operation}" is not supported by this transport`);
		this.name = 'UnsupportedOperationError';
		this.operation = operation;
	}
}

/**
 * Error thrown when every foreign-device registration strategy failed
 */
export class RegistrationError extends Error {
	public relay: string;
	public attempts: Array<{ strategy: string; error: string }>;

	constructor(relay: string, attempts: Array<{ strategy: string; error: string }>) {
		super(
			`All foreign device registration strategies failed for ${relay}: ` +
			attempts.map(a => `${a.strategy} (${a.error})`).join(', ')
		);
		this.name = 'RegistrationError';
		this.relay = relay;
		this.attempts = attempts;
	}
}

/**
 * Error thrown when the configuration cannot be used
 */
export class ConfigError extends Error {
	public issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(message);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

/**
 * Raised inside a cancelled loop or sleep
 */
export class AbortError extends Error {
	constructor(message = 'Operation aborted') {
		super(message);
		this.name = 'AbortError';
	}
}

export function isAbortError(error: unknown): boolean {
	return error instanceof Error && error.name === 'AbortError';
}

/**
 * Human-readable message for any thrown value
 */
export function describeError(error: unknown): string {
	if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
		return error.message;
	}
	return String(error);
}

/**
 * Node.js system error code (ENOENT, ECONNREFUSED, ...) if present.
 * Errors raised by Node's core modules are not always `instanceof Error`
 * from the caller's realm, so this checks the shape only.
 */
export function errnoCode(error: unknown): string | undefined {
	if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
		return error.code;
	}
	return undefined;
}
