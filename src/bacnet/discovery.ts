/**
 * BACnet Discovery Engine
 *
 * Who-Is / I-Am discovery and object enumeration.
 *
 * One discovery runs at a time:
 *   idle -> broadcasting -> listening -> processing -> idle
 *
 * The I-Am subscription only exists for the broadcast and listen window
 * of a single call and is always released before processing starts.
 */

import { sleep } from '../utils/task';
import { AbortError, describeError } from '../errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';
import type { DeviceRegistry } from '../registry/device-registry';
import { BacnetDevice, BacnetObject } from '../models/device.model';
import type { BacnetReaderWriter } from './reader-writer';
import {
  IDENTIFICATION_PROPERTIES,
  MAX_INDEXED_OBJECTS,
  OBJECT_LIST_PROPERTY,
  OBJECT_NAME_PROPERTY
} from './constants';
import { getBacnetErrorType, isInvalidArrayIndex, isOversizedResponse, isPropertyNotSupported } from './errors';
import {
  BacnetTransport,
  IAmEvent,
  ObjectIdentifier,
  WhoIsRange,
  isObjectIdentifier,
  toPropertyValue
} from './types';

export type DiscoveryState = 'idle' | 'broadcasting' | 'listening' | 'processing';

export type DeviceDiscoveredCallback = (device: BacnetDevice, signal?: AbortSignal) => Promise<void> | void;

export class DiscoveryEngine {
  private _state: DiscoveryState = 'idle';
  private queue: Promise<void> = Promise.resolve();
  private onDeviceDiscovered?: DeviceDiscoveredCallback;

  constructor(
    private readonly transport: BacnetTransport,
    private readonly readerWriter: BacnetReaderWriter,
    private readonly registry: DeviceRegistry,
    private readonly logger: Logger
  ) {}

  get state(): DiscoveryState {
    return this._state;
  }

  /**
   * Called once per discovered device, after it is merged into the registry
   */
  setDiscoveryCallback(callback: DeviceDiscoveredCallback | undefined): void {
    this.onDeviceDiscovered = callback;
  }

  /**
   * Broadcast a Who-Is and collect I-Am answers for `timeoutSeconds`.
   * Returns the devices that answered this call (deduplicated by id,
   * last answer wins). No answers is not an error.
   */
  discover(
    lowLimit?: number,
    highLimit?: number,
    timeoutSeconds = 5,
    signal?: AbortSignal
  ): Promise<BacnetDevice[]> {
    return this.exclusive(() => this.runDiscovery({ lowLimit, highLimit }, timeoutSeconds, signal));
  }

  private async runDiscovery(
    range: WhoIsRange,
    timeoutSeconds: number,
    signal?: AbortSignal
  ): Promise<BacnetDevice[]> {
    const captured = new Map<number, IAmEvent>();
    const onIAm = (event: IAmEvent) => {
      captured.set(event.deviceId, event);
    };

    try {
      this.transport.on('iAm', onIAm);
      try {
        this._state = 'broadcasting';
        this.logger.info('Sending Who-Is', {
          component: LogComponents.DISCOVERY,
          lowLimit: range.lowLimit,
          highLimit: range.highLimit,
          timeout: timeoutSeconds
        });
        await this.transport.whoIs(range);

        this._state = 'listening';
        await sleep(timeoutSeconds * 1000, signal);
      } finally {
        this.transport.off('iAm', onIAm);
      }

      this._state = 'processing';
      const discovered: BacnetDevice[] = [];
      for (const event of captured.values()) {
        if (signal?.aborted) {
          throw new AbortError();
        }
        discovered.push(await this.processIAm(event, signal));
      }

      this.logger.info(`Discovery complete: ${discovered.length} devices`, {
        component: LogComponents.DISCOVERY,
        deviceIds: discovered.map(device => device.deviceId)
      });
      return discovered;
    } finally {
      this._state = 'idle';
    }
  }

  private async processIAm(event: IAmEvent, signal?: AbortSignal): Promise<BacnetDevice> {
    let device = this.registry.get(event.deviceId);
    if (device) {
      device.address = event.address;
      device.maxApduLength = event.maxApdu;
      device.segmentationSupported = event.segmentation;
      device.vendorId = event.vendorId;
      device.touch();
    } else {
      device = new BacnetDevice({
        deviceId: event.deviceId,
        address: event.address,
        maxApduLength: event.maxApdu,
        segmentationSupported: event.segmentation,
        vendorId: event.vendorId
      });
    }

    await this.readIdentification(device, signal);
    const merged = this.registry.addOrMerge(device);

    if (this.onDeviceDiscovered) {
      try {
        await this.onDeviceDiscovered(merged, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        this.logger.error('Device discovered callback failed', {
          component: LogComponents.DISCOVERY,
          deviceId: merged.deviceId,
          error: describeError(error)
        });
      }
    }
    return merged;
  }

  private async readIdentification(device: BacnetDevice, signal?: AbortSignal): Promise<void> {
    for (const [propertyId, field] of IDENTIFICATION_PROPERTIES) {
      if (signal?.aborted) {
        throw new AbortError();
      }
      try {
        const raw = await this.readerWriter.readProperty(device, 'device', device.deviceId, propertyId, undefined, signal);
        if (raw === null) {
          continue;
        }
        const value = toPropertyValue(raw);
        if (field === 'protocolVersion' || field === 'protocolRevision') {
          if (typeof value === 'number') {
            device[field] = value;
          }
        } else {
          device[field] = String(value);
        }
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        this.logger.debug('Identification property not read', {
          component: LogComponents.DISCOVERY,
          deviceId: device.deviceId,
          property: propertyId,
          errorType: getBacnetErrorType(error)
        });
      }
    }
  }

  /**
   * Enumerate a device's objects from its object-list and add them to
   * the device. Falls back to indexed reads when the list does not fit
   * in one response. Objects already on the device are kept.
   */
  async discoverDeviceObjects(device: BacnetDevice, signal?: AbortSignal): Promise<BacnetObject[]> {
    const ids = await this.readObjectList(device, signal);
    const objects: BacnetObject[] = [];

    for (const id of ids) {
      if (signal?.aborted) {
        throw new AbortError();
      }
      if (id.type === 'device') {
        continue;
      }
      const obj = device.getObject(id.type, id.instance) ?? new BacnetObject(id.type, id.instance);
      try {
        const name = await this.readerWriter.readProperty(
          device, id.type, id.instance, OBJECT_NAME_PROPERTY, undefined, signal
        );
        if (name !== null) {
          obj.objectName = String(toPropertyValue(name));
        }
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        this.logger.debug('Object name not read', {
          component: LogComponents.DISCOVERY,
          deviceId: device.deviceId,
          object: obj.key,
          errorType: getBacnetErrorType(error)
        });
      }
      device.addObject(obj);
      objects.push(obj);
    }

    this.logger.info(`Enumerated ${objects.length} objects`, {
      component: LogComponents.DISCOVERY,
      deviceId: device.deviceId
    });
    return objects;
  }

  private async readObjectList(device: BacnetDevice, signal?: AbortSignal): Promise<ObjectIdentifier[]> {
    try {
      const value = await this.readerWriter.readProperty(
        device, 'device', device.deviceId, OBJECT_LIST_PROPERTY, undefined, signal
      );
      if (value === null) {
        return [];
      }
      const list = Array.isArray(value) ? value : [value];
      return list.filter(isObjectIdentifier);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (isOversizedResponse(error)) {
        this.logger.info('Object list too large for one read, reading by index', {
          component: LogComponents.DISCOVERY,
          deviceId: device.deviceId
        });
        return this.readObjectListByIndex(device, signal);
      }
      this.logger.warn('Failed to read object list', {
        component: LogComponents.DISCOVERY,
        deviceId: device.deviceId,
        errorType: getBacnetErrorType(error),
        error: describeError(error)
      });
      return [];
    }
  }

  private async readObjectListByIndex(device: BacnetDevice, signal?: AbortSignal): Promise<ObjectIdentifier[]> {
    let limit = MAX_INDEXED_OBJECTS;
    try {
      const length = await this.readerWriter.readProperty(
        device, 'device', device.deviceId, OBJECT_LIST_PROPERTY, 0, signal
      );
      if (typeof length === 'number') {
        limit = Math.min(length, MAX_INDEXED_OBJECTS);
      }
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.debug('Object list length not read, assuming maximum', {
        component: LogComponents.DISCOVERY,
        deviceId: device.deviceId,
        limit,
        errorType: getBacnetErrorType(error)
      });
    }

    const ids: ObjectIdentifier[] = [];
    for (let index = 1; index <= limit; index++) {
      if (signal?.aborted) {
        throw new AbortError();
      }
      try {
        const value = await this.readerWriter.readProperty(
          device, 'device', device.deviceId, OBJECT_LIST_PROPERTY, index, signal
        );
        if (isObjectIdentifier(value)) {
          ids.push(value);
        }
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        if (!isInvalidArrayIndex(error) && !isPropertyNotSupported(error)) {
          this.logger.warn('Indexed object list read stopped', {
            component: LogComponents.DISCOVERY,
            deviceId: device.deviceId,
            index,
            error: describeError(error)
          });
        }
        break;
      }
    }
    return ids;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }
}
