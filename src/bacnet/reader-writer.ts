/**
 * BACnet property reader/writer and capability-learning poller
 *
 * Every read is bounded by a timeout. Properties an object proves not to
 * support (an unknown-property error, or an answer without a value) go
 * into the object's unsupported set and are never read again for that
 * object while the process runs. Any other failure is treated as
 * transient and retried on the next poll.
 */

import { withTimeout } from '../utils/task';
import { AbortError, describeError } from '../errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';
import type { BacnetDevice, BacnetObject } from '../models/device.model';
import { PRESENT_VALUE_PROPERTY, UNITS_PROPERTY } from './constants';
import { getBacnetErrorType, isPropertyNotSupported } from './errors';
import {
  BacnetTransport,
  BacnetValue,
  PropertyValue,
  WritableValue,
  WriteOptions,
  toPropertyValue
} from './types';

export interface ReaderWriterSettings {
  readTimeout: number; // milliseconds
  presentValueObjectTypes: readonly string[];
  unitObjectTypes: readonly string[];
}

type ReadOutcome =
  | { kind: 'value'; value: PropertyValue }
  | { kind: 'unsupported' }
  | { kind: 'failed' };

export class BacnetReaderWriter {
  private readonly presentValueTypes: Set<string>;
  private readonly unitTypes: Set<string>;

  constructor(
    private readonly transport: BacnetTransport,
    private readonly logger: Logger,
    private readonly settings: ReaderWriterSettings
  ) {
    this.presentValueTypes = new Set(settings.presentValueObjectTypes);
    this.unitTypes = new Set(settings.unitObjectTypes);
  }

  /**
   * Read one property from a device. Resolves null when the device
   * answered without a value; rejects on any error or timeout.
   * A successful read refreshes the device's last_seen.
   */
  async readProperty(
    device: BacnetDevice,
    objectType: string,
    objectInstance: number,
    propertyId: string,
    arrayIndex?: number,
    signal?: AbortSignal
  ): Promise<BacnetValue | null> {
    if (signal?.aborted) {
      throw new AbortError();
    }
    const value = await withTimeout(
      this.transport.readProperty(
        device.address,
        { type: objectType, instance: objectInstance },
        propertyId,
        arrayIndex
      ),
      this.settings.readTimeout,
      `read ${objectType}:${objectInstance} ${propertyId} from device ${device.deviceId}`,
      signal
    );
    device.touch();
    return value;
  }

  async writeProperty(
    device: BacnetDevice,
    objectType: string,
    objectInstance: number,
    propertyId: string,
    value: WritableValue,
    options: WriteOptions = {}
  ): Promise<void> {
    await withTimeout(
      this.transport.writeProperty(
        device.address,
        { type: objectType, instance: objectInstance },
        propertyId,
        value,
        options
      ),
      this.settings.readTimeout,
      `write ${objectType}:${objectInstance} ${propertyId} to device ${device.deviceId}`
    );
    device.touch();

    this.logger.info('Property written', {
      component: LogComponents.READER_WRITER,
      deviceId: device.deviceId,
      object: `${objectType}:${objectInstance}`,
      property: propertyId,
      priority: options.priority
    });
  }

  /**
   * Read the requested properties of one object, skipping those already
   * known to be unsupported. Returns the values read in this call.
   */
  async pollObject(
    device: BacnetDevice,
    obj: BacnetObject,
    propertyIds: readonly string[],
    signal?: AbortSignal
  ): Promise<Map<string, PropertyValue>> {
    const results = new Map<string, PropertyValue>();

    for (const propertyId of propertyIds) {
      if (signal?.aborted) {
        throw new AbortError();
      }
      if (obj.isUnsupported(propertyId)) {
        continue;
      }

      const outcome = await this.learn(device, obj, propertyId, signal);
      if (outcome.kind !== 'value') {
        continue;
      }

      let unit: string | undefined;
      if (propertyId === PRESENT_VALUE_PROPERTY && this.unitTypes.has(obj.objectType)) {
        unit = await this.resolveUnit(device, obj, signal);
      }

      obj.updateProperty(propertyId, outcome.value, unit);
      results.set(propertyId, outcome.value);
    }

    return results;
  }

  /**
   * Poll every object on a device. A failing object never stops the
   * rest; `last_seen` is touched once at the end.
   */
  async pollDeviceObjects(
    device: BacnetDevice,
    propertyIds: readonly string[],
    signal?: AbortSignal
  ): Promise<number> {
    const pruneByType = propertyIds.includes(PRESENT_VALUE_PROPERTY);
    let valuesRead = 0;

    for (const obj of Array.from(device.objects.values())) {
      if (signal?.aborted) {
        throw new AbortError();
      }
      if (pruneByType && !this.presentValueTypes.has(obj.objectType)) {
        continue;
      }

      try {
        const values = await this.pollObject(device, obj, propertyIds, signal);
        valuesRead += values.size;
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        this.logger.warn('Failed to poll object', {
          component: LogComponents.POLLER,
          deviceId: device.deviceId,
          object: obj.key,
          error: describeError(error)
        });
      }
    }

    device.touch();
    return valuesRead;
  }

  /**
   * Engineering unit for an object's present-value: the last known unit,
   * otherwise one sub-read of 'units' (learned the same way as any
   * other property)
   */
  private async resolveUnit(
    device: BacnetDevice,
    obj: BacnetObject,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    const known = obj.properties.get(PRESENT_VALUE_PROPERTY)?.unit;
    if (known) {
      return known;
    }
    if (obj.isUnsupported(UNITS_PROPERTY)) {
      return undefined;
    }

    const outcome = await this.learn(device, obj, UNITS_PROPERTY, signal);
    return outcome.kind === 'value' ? String(outcome.value) : undefined;
  }

  private async learn(
    device: BacnetDevice,
    obj: BacnetObject,
    propertyId: string,
    signal?: AbortSignal
  ): Promise<ReadOutcome> {
    let value: BacnetValue | null;
    try {
      value = await this.readProperty(device, obj.objectType, obj.objectInstance, propertyId, undefined, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      if (isPropertyNotSupported(error)) {
        obj.markUnsupported(propertyId);
        return { kind: 'unsupported' };
      }
      this.logger.warn('Property read failed', {
        component: LogComponents.READER_WRITER,
        deviceId: device.deviceId,
        object: obj.key,
        property: propertyId,
        errorType: getBacnetErrorType(error),
        error: describeError(error)
      });
      return { kind: 'failed' };
    }

    if (value === null) {
      this.logger.debug('Property returned no value, marking unsupported', {
        component: LogComponents.READER_WRITER,
        deviceId: device.deviceId,
        object: obj.key,
        property: propertyId
      });
      obj.markUnsupported(propertyId);
      return { kind: 'unsupported' };
    }

    return { kind: 'value', value: toPropertyValue(value) };
  }
}
