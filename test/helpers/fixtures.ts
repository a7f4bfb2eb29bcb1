/**
 * Test Fixtures
 */

import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { BacnetDevice, BacnetObject } from '../../src/models/device.model';
import type { ReaderWriterSettings } from '../../src/bacnet/reader-writer';
import { PRESENT_VALUE_OBJECT_TYPES, UNIT_OBJECT_TYPES } from '../../src/bacnet/constants';

export const AHU_ADDRESS = '10.0.0.5:47808';

export const readerSettings: ReaderWriterSettings = {
	readTimeout: 1000,
	presentValueObjectTypes: PRESENT_VALUE_OBJECT_TYPES,
	unitObjectTypes: UNIT_OBJECT_TYPES
};

export function createDevice(
	deviceId = 150,
	address = AHU_ADDRESS,
	objects: Array<[string, number]> = []
): BacnetDevice {
	const device = new BacnetDevice({ deviceId, address, vendorId: 15 });
	for (const [type, instance] of objects) {
		device.addObject(new BacnetObject(type, instance));
	}
	return device;
}

/**
 * Fresh directory under the OS temp dir
 */
export function createTempDir(prefix = 'bridge-test-'): string {
	return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Object on a device; throws if the device does not have it
 */
export function objectOf(device: BacnetDevice, type: string, instance: number): BacnetObject {
	const obj = device.getObject(type, instance);
	if (!obj) {
		throw new Error(`Device ${device.deviceId} has no ${type}:${instance}`);
	}
	return obj;
}
