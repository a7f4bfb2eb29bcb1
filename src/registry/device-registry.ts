/**
 * Device Registry
 *
 * In-memory map of every known device, persisted as one JSON document
 * keyed by device id. The registry is the single owner of device,
 * object and property state; other components hold references only for
 * the duration of one operation.
 */

import { JsonFileStore } from '../db/json-store';
import {
  BacnetDevice,
  RegistryDocument,
  RegistryDocumentSchema
} from '../models/device.model';
import { describeError } from '../errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';

export class DeviceRegistry {
  private readonly devices = new Map<number, BacnetDevice>();
  private readonly store: JsonFileStore<RegistryDocument>;

  constructor(path: string, private readonly logger: Logger) {
    this.store = new JsonFileStore(path, RegistryDocumentSchema);
  }

  get size(): number {
    return this.devices.size;
  }

  /**
   * Insert a new device, or merge a re-discovered one into the existing
   * entry. Address, capability and identification fields are taken from
   * `device`; the existing object map, enabled flag and discovery time
   * are kept.
   */
  addOrMerge(device: BacnetDevice): BacnetDevice {
    const existing = this.devices.get(device.deviceId);
    if (!existing) {
      this.devices.set(device.deviceId, device);
      return device;
    }
    if (existing === device) {
      return existing;
    }

    existing.address = device.address;
    existing.maxApduLength = device.maxApduLength;
    existing.segmentationSupported = device.segmentationSupported;
    existing.vendorId = device.vendorId;
    existing.deviceName = device.deviceName || existing.deviceName;
    existing.vendorName = device.vendorName || existing.vendorName;
    existing.modelName = device.modelName || existing.modelName;
    existing.firmwareRevision = device.firmwareRevision || existing.firmwareRevision;
    existing.applicationSoftwareVersion = device.applicationSoftwareVersion || existing.applicationSoftwareVersion;
    existing.protocolVersion = device.protocolVersion;
    existing.protocolRevision = device.protocolRevision;
    for (const [key, obj] of device.objects) {
      if (!existing.objects.has(key)) {
        existing.objects.set(key, obj);
      }
    }
    existing.touch();
    return existing;
  }

  get(deviceId: number): BacnetDevice | undefined {
    return this.devices.get(deviceId);
  }

  all(): BacnetDevice[] {
    return Array.from(this.devices.values());
  }

  enabled(): BacnetDevice[] {
    return this.all().filter(device => device.enabled);
  }

  remove(deviceId: number): boolean {
    return this.devices.delete(deviceId);
  }

  /**
   * Write every device to the store. Failures are logged, not thrown.
   */
  async persist(): Promise<void> {
    const doc: RegistryDocument = {};
    for (const device of this.devices.values()) {
      doc[String(device.deviceId)] = device.toRecord();
    }

    try {
      await this.store.write(doc);
      this.logger.debug('Registry saved', {
        component: LogComponents.REGISTRY,
        devices: this.devices.size,
        path: this.store.path
      });
    } catch (error) {
      this.logger.error('Failed to save registry', {
        component: LogComponents.REGISTRY,
        path: this.store.path,
        error: describeError(error)
      });
    }
  }

  /**
   * Replace the in-memory state with the store's contents. A missing or
   * undecodable store leaves the registry empty.
   */
  async load(): Promise<void> {
    this.devices.clear();
    const result = await this.store.read();

    if (result.status === 'missing') {
      this.logger.info('No saved registry, starting empty', {
        component: LogComponents.REGISTRY,
        path: this.store.path
      });
      return;
    }

    if (result.status === 'invalid') {
      this.logger.error('Could not decode saved registry, starting empty', {
        component: LogComponents.REGISTRY,
        path: this.store.path,
        error: result.error
      });
      return;
    }

    for (const record of Object.values(result.value)) {
      const device = BacnetDevice.fromRecord(record);
      this.devices.set(device.deviceId, device);
    }

    this.logger.info(`Loaded ${this.devices.size} devices from registry`, {
      component: LogComponents.REGISTRY,
      path: this.store.path
    });
  }
}
