/**
 * BACnet error types and classification utilities
 * Used by the poller and discovery to decide between "never retry",
 * "fall back" and "try again next cycle"
 */

import { OperationTimeoutError, describeError, errnoCode } from '../errors';

export type BacnetErrorReason =
	| 'unknown-property'
	| 'invalid-array-index'
	| 'unknown-object'
	| 'buffer-overflow'
	| 'segmentation-not-supported'
	| 'write-access-denied'
	| 'other';

/**
 * Error, reject or abort returned by a remote device
 */
export class BacnetProtocolError extends Error {
	public reason: BacnetErrorReason;

	constructor(reason: BacnetErrorReason, message?: string) {
		super(message ?? `BACnet error: ${reason}`);
		this.name = 'BacnetProtocolError';
		this.reason = reason;
	}
}

function hasReason(error: unknown, ...reasons: BacnetErrorReason[]): boolean {
	return error instanceof BacnetProtocolError && reasons.includes(error.reason);
}

/**
 * Property does not exist on the object (sticky: never worth retrying)
 */
export function isPropertyNotSupported(error: unknown): boolean {
	return hasReason(error, 'unknown-property');
}

/**
 * Response did not fit in one APDU
 */
export function isOversizedResponse(error: unknown): boolean {
	return hasReason(error, 'buffer-overflow', 'segmentation-not-supported');
}

/**
 * Array index past the end of a list property
 */
export function isInvalidArrayIndex(error: unknown): boolean {
	return hasReason(error, 'invalid-array-index');
}

/**
 * Timeout errors
 */
export function isTimeout(error: unknown): boolean {
	if (error instanceof OperationTimeoutError) {
		return true;
	}
	const code = errnoCode(error);
	if (code === 'ETIMEDOUT' || code === 'ERR_TIMEOUT') {
		return true;
	}

	return describeError(error).toLowerCase().includes('timeout');
}

/**
 * Get short error type for log metadata
 */
export function getBacnetErrorType(error: unknown): string {
	if (error instanceof BacnetProtocolError) return error.reason.toUpperCase().replace(/-/g, '_');
	if (isTimeout(error)) return 'TIMEOUT';
	return 'UNKNOWN';
}
