/**
 * BACnet value and transport types shared by the bridge
 */

export type ScalarValue = string | number | boolean;

/**
 * Value stored on a Property (and published to MQTT)
 */
export type PropertyValue = ScalarValue | ScalarValue[];

/**
 * Object identifier with the hyphenated type name, e.g. { type: 'analog-input', instance: 1 }
 */
export interface ObjectIdentifier {
  type: string;
  instance: number;
}

/**
 * Decoded value as returned by a transport read
 */
export type BacnetValue = ScalarValue | ObjectIdentifier | BacnetValue[];

/**
 * Value accepted by a property write (null relinquishes a commanded priority)
 */
export type WritableValue = ScalarValue | null;

/**
 * I-Am announcement received in answer to a Who-Is broadcast
 */
export interface IAmEvent {
  deviceId: number;
  address: string; // "host:port"
  maxApdu: number;
  segmentation: string;
  vendorId: number;
}

export interface WhoIsRange {
  lowLimit?: number;
  highLimit?: number;
}

export interface WriteOptions {
  priority?: number; // 1-16
  arrayIndex?: number;
}

/**
 * BBMD address for foreign-device registration
 */
export interface RelayAddress {
  host: string;
  port: number;
}

/**
 * Transport primitives the bridge is built on.
 *
 * Implemented once per protocol library; the bridge never probes an
 * implementation for optional capabilities. A primitive an implementation
 * cannot provide rejects with UnsupportedOperationError.
 *
 * Events:
 * - 'iAm': IAmEvent - an I-Am announcement arrived
 */
export interface BacnetTransport {
  open(): Promise<void>;
  close(): Promise<void>;

  /** Broadcast a Who-Is, optionally bounded to a device instance range */
  whoIs(range?: WhoIsRange): Promise<void>;

  /** Read one property; resolves null when the device answered without a value */
  readProperty(
    address: string,
    objectId: ObjectIdentifier,
    propertyId: string,
    arrayIndex?: number
  ): Promise<BacnetValue | null>;

  writeProperty(
    address: string,
    objectId: ObjectIdentifier,
    propertyId: string,
    value: WritableValue,
    options?: WriteOptions
  ): Promise<void>;

  /** High-level Register-Foreign-Device service */
  registerForeignDevice(relay: RelayAddress, ttl: number): Promise<void>;

  /** Send a raw BVLC frame through the transport's own datalink */
  sendBvlc(relay: RelayAddress, frame: Buffer): Promise<void>;

  on(event: 'iAm', listener: (event: IAmEvent) => void): this;
  off(event: 'iAm', listener: (event: IAmEvent) => void): this;
}

export function isObjectIdentifier(value: unknown): value is ObjectIdentifier {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && 'type' in value
    && 'instance' in value
    && typeof value.type === 'string'
    && typeof value.instance === 'number';
}

export function formatObjectId(objectId: ObjectIdentifier): string {
  return `${objectId.type}:${objectId.instance}`;
}

function toScalar(value: BacnetValue): ScalarValue {
  if (Array.isArray(value)) {
    return value.map(v => String(toScalar(v))).join(',');
  }
  if (isObjectIdentifier(value)) {
    return formatObjectId(value);
  }
  return value;
}

/**
 * Flatten a decoded transport value into something a Property can hold
 */
export function toPropertyValue(value: BacnetValue): PropertyValue {
  if (Array.isArray(value)) {
    return value.map(toScalar);
  }
  return toScalar(value);
}
