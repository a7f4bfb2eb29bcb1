/**
 * Device Model
 * BACnet devices, their objects and the last observed property values
 *
 * Persisted records use the snake_case field names of the registry
 * document; the in-memory classes use camelCase.
 */

import { z } from 'zod';
import type { PropertyValue } from '../bacnet/types';

const ScalarValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const PropertyRecordSchema = z.object({
  value: z.union([ScalarValueSchema, z.array(ScalarValueSchema)]),
  timestamp: z.string(),
  unit: z.string().nullable().optional()
});

export type PropertyRecord = z.infer<typeof PropertyRecordSchema>;

export const ObjectRecordSchema = z.object({
  object_type: z.string().min(1),
  object_instance: z.number().int().min(0),
  object_name: z.string().default(''),
  description: z.string().default(''),
  properties: z.record(PropertyRecordSchema).default({}),
  last_poll: z.string().nullable().default(null)
});

export type ObjectRecord = z.infer<typeof ObjectRecordSchema>;

export const DeviceRecordSchema = z.object({
  device_id: z.number().int().min(0),
  address: z.string().min(1),
  device_name: z.string().default(''),
  vendor_name: z.string().default(''),
  model_name: z.string().default(''),
  firmware_revision: z.string().default(''),
  application_software_version: z.string().default(''),
  protocol_version: z.number().int().default(1),
  protocol_revision: z.number().int().default(0),
  max_apdu_length: z.number().int().default(1476),
  segmentation_supported: z.string().default('segmented-both'),
  vendor_id: z.number().int().nullable().default(null),
  objects: z.record(ObjectRecordSchema).default({}),
  discovered_at: z.string(),
  last_seen: z.string(),
  enabled: z.boolean().default(true)
});

export type DeviceRecord = z.infer<typeof DeviceRecordSchema>;

/**
 * Registry document: device records keyed by device id (as a string)
 */
export const RegistryDocumentSchema = z.record(DeviceRecordSchema);

export type RegistryDocument = z.infer<typeof RegistryDocumentSchema>;

export interface BacnetProperty {
  propertyId: string;
  value: PropertyValue;
  timestamp: string;
  unit?: string;
}

export function objectKey(objectType: string, objectInstance: number): string {
  return `${objectType}:${objectInstance}`;
}

/**
 * A data point on a device
 */
export class BacnetObject {
  readonly objectType: string;
  readonly objectInstance: number;
  objectName = '';
  description = '';
  lastPoll: string | null = null;
  readonly properties = new Map<string, BacnetProperty>();

  /**
   * Property ids this object has proven not to support. In-memory only:
   * the set starts empty on every process start.
   */
  readonly unsupportedProperties = new Set<string>();

  constructor(objectType: string, objectInstance: number, objectName = '') {
    this.objectType = objectType;
    this.objectInstance = objectInstance;
    this.objectName = objectName;
  }

  get key(): string {
    return objectKey(this.objectType, this.objectInstance);
  }

  updateProperty(propertyId: string, value: PropertyValue, unit?: string): BacnetProperty {
    const timestamp = new Date().toISOString();
    const property: BacnetProperty = { propertyId, value, timestamp };
    if (unit) {
      property.unit = unit;
    }
    this.properties.set(propertyId, property);
    this.lastPoll = timestamp;
    return property;
  }

  isUnsupported(propertyId: string): boolean {
    return this.unsupportedProperties.has(propertyId);
  }

  markUnsupported(propertyId: string): void {
    this.unsupportedProperties.add(propertyId);
  }

  toRecord(): ObjectRecord {
    const properties: Record<string, PropertyRecord> = {};
    for (const [id, property] of this.properties) {
      properties[id] = {
        value: property.value,
        timestamp: property.timestamp,
        unit: property.unit ?? null
      };
    }
    return {
      object_type: this.objectType,
      object_instance: this.objectInstance,
      object_name: this.objectName,
      description: this.description,
      properties,
      last_poll: this.lastPoll
    };
  }

  static fromRecord(record: ObjectRecord): BacnetObject {
    const obj = new BacnetObject(record.object_type, record.object_instance, record.object_name);
    obj.description = record.description;
    obj.lastPoll = record.last_poll;
    for (const [id, property] of Object.entries(record.properties)) {
      obj.properties.set(id, {
        propertyId: id,
        value: property.value,
        timestamp: property.timestamp,
        ...(property.unit ? { unit: property.unit } : {})
      });
    }
    return obj;
  }
}

export interface DeviceInit {
  deviceId: number;
  address: string;
  maxApduLength?: number;
  segmentationSupported?: string;
  vendorId?: number;
}

/**
 * A BACnet device known to the bridge
 */
export class BacnetDevice {
  readonly deviceId: number;
  address: string;
  deviceName = '';
  vendorName = '';
  modelName = '';
  firmwareRevision = '';
  applicationSoftwareVersion = '';
  protocolVersion = 1;
  protocolRevision = 0;
  maxApduLength: number;
  segmentationSupported: string;
  vendorId: number | null;
  enabled = true;
  discoveredAt: string;
  lastSeen: string;
  readonly objects = new Map<string, BacnetObject>();

  constructor(init: DeviceInit) {
    const now = new Date().toISOString();
    this.deviceId = init.deviceId;
    this.address = init.address;
    this.maxApduLength = init.maxApduLength ?? 1476;
    this.segmentationSupported = init.segmentationSupported ?? 'segmented-both';
    this.vendorId = init.vendorId ?? null;
    this.discoveredAt = now;
    this.lastSeen = now;
  }

  addObject(obj: BacnetObject): void {
    this.objects.set(obj.key, obj);
    this.touch();
  }

  getObject(objectType: string, objectInstance: number): BacnetObject | undefined {
    return this.objects.get(objectKey(objectType, objectInstance));
  }

  touch(): void {
    this.lastSeen = new Date().toISOString();
  }

  toRecord(): DeviceRecord {
    const objects: Record<string, ObjectRecord> = {};
    for (const [key, obj] of this.objects) {
      objects[key] = obj.toRecord();
    }
    return {
      device_id: this.deviceId,
      address: this.address,
      device_name: this.deviceName,
      vendor_name: this.vendorName,
      model_name: this.modelName,
      firmware_revision: this.firmwareRevision,
      application_software_version: this.applicationSoftwareVersion,
      protocol_version: this.protocolVersion,
      protocol_revision: this.protocolRevision,
      max_apdu_length: this.maxApduLength,
      segmentation_supported: this.segmentationSupported,
      vendor_id: this.vendorId,
      objects,
      discovered_at: this.discoveredAt,
      last_seen: this.lastSeen,
      enabled: this.enabled
    };
  }

  static fromRecord(record: DeviceRecord): BacnetDevice {
    const device = new BacnetDevice({
      deviceId: record.device_id,
      address: record.address,
      maxApduLength: record.max_apdu_length,
      segmentationSupported: record.segmentation_supported,
      vendorId: record.vendor_id ?? undefined
    });
    device.deviceName = record.device_name;
    device.vendorName = record.vendor_name;
    device.modelName = record.model_name;
    device.firmwareRevision = record.firmware_revision;
    device.applicationSoftwareVersion = record.application_software_version;
    device.protocolVersion = record.protocol_version;
    device.protocolRevision = record.protocol_revision;
    device.enabled = record.enabled;
    device.discoveredAt = record.discovered_at;
    device.lastSeen = record.last_seen;
    for (const objRecord of Object.values(record.objects)) {
      const obj = BacnetObject.fromRecord(objRecord);
      device.objects.set(obj.key, obj);
    }
    return device;
  }
}
