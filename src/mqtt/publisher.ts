/**
 * MQTT Publish Bridge
 *
 * Turns registry state into MQTT messages. Topic per property:
 *   mapping override (enabled, keyed device:type:instance), else
 *   {prefix}/{device_id}/{object_type}/{instance}/{property}
 * with spaces and hyphens in the object type replaced by underscores.
 */

import type { IClientPublishOptions } from 'mqtt';
import { PeriodicTask } from '../utils/task';
import { describeError } from '../errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';
import type { BacnetDevice, BacnetObject, BacnetProperty } from '../models/device.model';
import { MqttMappingStore, mappingTopic } from '../models/mqtt-mapping.model';
import type { DeviceRegistry } from '../registry/device-registry';
import type { PropertyValue } from '../bacnet/types';
import type { MessagePublisher } from './manager';

export interface PublisherSettings {
  topicPrefix: string;
  qos: 0 | 1 | 2;
  retain: boolean;
}

export interface PropertyPayload {
  value: PropertyValue;
  timestamp: string;
  device: { id: number; name: string; address: string };
  object: { type: string; instance: number; name: string };
  property: string;
  unit?: string;
}

export interface DeviceStatusPayload {
  device_id: number;
  device_name: string;
  address: string;
  online: boolean;
  last_seen: string;
  object_count: number;
}

export function buildDefaultTopic(
  prefix: string,
  deviceId: number,
  objectType: string,
  objectInstance: number,
  propertyId: string
): string {
  const type = objectType.replace(/[ -]/g, '_');
  return `${prefix}/${deviceId}/${type}/${objectInstance}/${propertyId}`;
}

export function buildPayload(device: BacnetDevice, obj: BacnetObject, property: BacnetProperty): PropertyPayload {
  const payload: PropertyPayload = {
    value: property.value,
    timestamp: property.timestamp,
    device: { id: device.deviceId, name: device.deviceName, address: device.address },
    object: { type: obj.objectType, instance: obj.objectInstance, name: obj.objectName },
    property: property.propertyId
  };
  if (property.unit) {
    payload.unit = property.unit;
  }
  return payload;
}

export function buildStatusPayload(device: BacnetDevice): DeviceStatusPayload {
  return {
    device_id: device.deviceId,
    device_name: device.deviceName,
    address: device.address,
    online: device.enabled,
    last_seen: device.lastSeen,
    object_count: device.objects.size
  };
}

export class MqttPublisher {
  constructor(
    private readonly bus: MessagePublisher,
    private readonly mappings: MqttMappingStore,
    private readonly logger: Logger,
    private readonly settings: PublisherSettings
  ) {}

  isConnected(): boolean {
    return this.bus.isConnected();
  }

  resolveTopic(deviceId: number, obj: BacnetObject, propertyId: string): string {
    const mapping = this.mappings.get(deviceId, obj.objectType, obj.objectInstance);
    const override = mapping && mapping.enabled ? mappingTopic(mapping) : '';
    if (override) {
      return override;
    }
    return buildDefaultTopic(this.settings.topicPrefix, deviceId, obj.objectType, obj.objectInstance, propertyId);
  }

  /**
   * Publish one property. Failures are logged; resolves false.
   */
  async publishProperty(device: BacnetDevice, obj: BacnetObject, property: BacnetProperty): Promise<boolean> {
    const topic = this.resolveTopic(device.deviceId, obj, property.propertyId);
    try {
      await this.bus.publish(topic, JSON.stringify(buildPayload(device, obj, property)), this.publishOptions());
      return true;
    } catch (error) {
      this.logger.error(`Failed to publish to ${topic}`, {
        component: LogComponents.PUBLISHER,
        deviceId: device.deviceId,
        error: describeError(error)
      });
      return false;
    }
  }

  /**
   * Publish every stored property of every object on a device.
   * Returns the number of messages accepted by the broker.
   */
  async publishDevice(device: BacnetDevice): Promise<number> {
    const sends: Array<Promise<boolean>> = [];
    for (const obj of device.objects.values()) {
      for (const property of obj.properties.values()) {
        sends.push(this.publishProperty(device, obj, property));
      }
    }
    const results = await Promise.all(sends);
    return results.filter(Boolean).length;
  }

  async publishDeviceStatus(device: BacnetDevice): Promise<void> {
    const topic = `${this.settings.topicPrefix}/${device.deviceId}/status`;
    try {
      await this.bus.publish(topic, JSON.stringify(buildStatusPayload(device)), {
        qos: this.settings.qos,
        retain: true
      });
    } catch (error) {
      this.logger.error(`Failed to publish status to ${topic}`, {
        component: LogComponents.PUBLISHER,
        deviceId: device.deviceId,
        error: describeError(error)
      });
    }
  }

  private publishOptions(): IClientPublishOptions {
    return { qos: this.settings.qos, retain: this.settings.retain };
  }
}

/**
 * Periodic publish loop over the enabled devices
 */
export class PublishBridge {
  private readonly task: PeriodicTask;

  constructor(
    private readonly publisher: MqttPublisher,
    private readonly registry: DeviceRegistry,
    private readonly logger: Logger,
    intervalSeconds: number
  ) {
    this.task = new PeriodicTask(
      {
        name: 'Publish cycle',
        intervalMs: intervalSeconds * 1000,
        logger,
        component: LogComponents.PUBLISHER
      },
      async () => {
        await this.runCycle();
      }
    );
  }

  get running(): boolean {
    return this.task.running;
  }

  start(): void {
    if (this.task.running) {
      return;
    }
    this.task.start();
    this.logger.info('MQTT publishing started', { component: LogComponents.PUBLISHER });
  }

  async stop(): Promise<void> {
    if (!this.task.running) {
      return;
    }
    await this.task.stop();
    this.logger.info('MQTT publishing stopped', { component: LogComponents.PUBLISHER });
  }

  /**
   * Publish status and values of every enabled device once.
   * Skipped while the broker connection is down.
   */
  async runCycle(): Promise<number> {
    if (!this.publisher.isConnected()) {
      this.logger.warn('MQTT not connected, skipping publish cycle', {
        component: LogComponents.PUBLISHER
      });
      return 0;
    }

    let published = 0;
    for (const device of this.registry.enabled()) {
      await this.publisher.publishDeviceStatus(device);
      published += await this.publisher.publishDevice(device);
    }

    if (published > 0) {
      this.logger.debug(`Published ${published} properties to MQTT`, {
        component: LogComponents.PUBLISHER
      });
    }
    return published;
  }
}
