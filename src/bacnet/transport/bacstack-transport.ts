/// <reference path="../../types/bacstack.d.ts" />
/**
 * BacnetTransport over the bacstack client
 *
 * Owns a UdpLink that bacstack sends and receives through, translates
 * numeric identifiers to hyphenated names in both directions, and turns
 * bacstack's error strings into typed errors.
 */

import Bacnet from 'bacstack';
import { EventEmitter } from 'events';
import { OperationTimeoutError, UnsupportedOperationError, describeError } from '../../errors';
import { LogComponents } from '../../logging/components';
import type { Logger } from '../../logging/types';
import { BacnetErrorReason, BacnetProtocolError } from '../errors';
import type {
  BacnetTransport,
  BacnetValue,
  IAmEvent,
  ObjectIdentifier,
  RelayAddress,
  WhoIsRange,
  WritableValue,
  WriteOptions
} from '../types';
import {
  objectTypeId,
  objectTypeName,
  propertyId as toPropertyId,
  segmentationName,
  unitName
} from './identifiers';
import { UdpLink } from './udp-link';

// BACnet application tags (ASHRAE 135 clause 20.2.1.4)
export const ApplicationTag = {
  NULL: 0,
  BOOLEAN: 1,
  UNSIGNED_INTEGER: 2,
  SIGNED_INTEGER: 3,
  REAL: 4,
  DOUBLE: 5,
  CHARACTER_STRING: 7,
  BIT_STRING: 8,
  ENUMERATED: 9,
  DATE: 10,
  TIME: 11,
  OBJECTIDENTIFIER: 12
} as const;

const MAX_DEVICE_INSTANCE = 4194303;

// Properties whose whole-value read is always a list, even with one element
const LIST_PROPERTIES = new Set(['object-list', 'priority-array', 'state-text', 'property-list', 'event-time-stamps']);

const ERROR_CODE_REASONS: Record<number, BacnetErrorReason> = {
  31: 'unknown-object',
  32: 'unknown-property',
  40: 'write-access-denied',
  42: 'invalid-array-index'
};

const ABORT_REASONS: Record<number, BacnetErrorReason> = {
  1: 'buffer-overflow',
  4: 'segmentation-not-supported'
};

export interface BacstackTransportOptions {
  interface: string;
  port: number;
  broadcastAddress: string;
  apduTimeout: number; // milliseconds
  // identity announced in answer to Who-Is
  deviceId: number;
  vendorId: number;
}

const NO_SEGMENTATION = 3;

export type BacstackClientFactory = (options: Bacnet.ClientOptions) => Bacnet;

/**
 * Map a bacstack error onto the bridge's error types
 */
export function translateBacstackError(error: Error, operation: string, timeoutMs: number): Error {
  const message = error.message;

  if (message.includes('ERR_TIMEOUT')) {
    return new OperationTimeoutError(operation, timeoutMs);
  }

  const bacnetError = /BacnetError - Class:(\d+) - Code:(\d+)/.exec(message);
  if (bacnetError) {
    const reason = ERROR_CODE_REASONS[Number(bacnetError[2])] ?? 'other';
    return new BacnetProtocolError(reason, `${operation}: ${message}`);
  }

  const abort = /BacnetAbort - Reason:(\d+)/.exec(message);
  if (abort) {
    const reason = ABORT_REASONS[Number(abort[1])] ?? 'other';
    return new BacnetProtocolError(reason, `${operation}: ${message}`);
  }

  if (message.includes('BacnetReject')) {
    return new BacnetProtocolError('other', `${operation}: ${message}`);
  }

  return error;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function decodeBitString(value: unknown): boolean[] | null {
  if (!isRecord(value) || typeof value.bitsUsed !== 'number' || !Array.isArray(value.value)) {
    return null;
  }
  const bytes = value.value;
  const bits: boolean[] = [];
  for (let i = 0; i < value.bitsUsed; i++) {
    const byte = bytes[i >> 3];
    bits.push(typeof byte === 'number' && ((byte >> (i & 7)) & 1) === 1);
  }
  return bits;
}

/**
 * Convert one tagged value from bacstack into a bridge value
 */
export function decodeTaggedValue(tagged: Bacnet.TaggedValue, property: string): BacnetValue | null {
  const { type, value } = tagged;

  switch (type) {
    case ApplicationTag.NULL:
      return null;
    case ApplicationTag.OBJECTIDENTIFIER:
      if (isRecord(value) && typeof value.type === 'number' && typeof value.instance === 'number') {
        return { type: objectTypeName(value.type), instance: value.instance };
      }
      return null;
    case ApplicationTag.BIT_STRING:
      return decodeBitString(value);
    case ApplicationTag.ENUMERATED:
      if (typeof value !== 'number') {
        return null;
      }
      if (property === 'units') return unitName(value);
      if (property === 'segmentation-supported') return segmentationName(value);
      if (property === 'object-type') return objectTypeName(value);
      return value;
    default:
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
      }
      if (value instanceof Date) {
        return value.toISOString();
      }
      return null;
  }
}

/**
 * Encode a write value with the application tag a field device expects
 */
export function encodeWriteValue(value: WritableValue): Bacnet.TaggedValue {
  if (value === null) {
    return { type: ApplicationTag.NULL, value: null };
  }
  if (typeof value === 'boolean') {
    return { type: ApplicationTag.ENUMERATED, value: value ? 1 : 0 };
  }
  if (typeof value === 'number') {
    return { type: ApplicationTag.REAL, value };
  }
  return { type: ApplicationTag.CHARACTER_STRING, value };
}

/**
 * Complete a Who-Is range: the service takes both limits or neither
 */
export function whoIsLimits(range: WhoIsRange = {}): Bacnet.WhoIsOptions {
  const { lowLimit, highLimit } = range;
  if (lowLimit === undefined && highLimit === undefined) {
    return {};
  }
  return { lowLimit: lowLimit ?? 0, highLimit: highLimit ?? MAX_DEVICE_INSTANCE };
}

export class BacstackTransport extends EventEmitter implements BacnetTransport {
  private client: Bacnet | null = null;
  private readonly link: UdpLink;
  private readonly createClient: BacstackClientFactory;

  constructor(
    private readonly options: BacstackTransportOptions,
    private readonly logger: Logger,
    deps: { link?: UdpLink; createClient?: BacstackClientFactory } = {}
  ) {
    super();
    this.link = deps.link ?? new UdpLink({
      interface: options.interface,
      port: options.port,
      broadcastAddress: options.broadcastAddress
    });
    this.createClient = deps.createClient ?? ((clientOptions) => new Bacnet(clientOptions));
  }

  async open(): Promise<void> {
    if (this.client) {
      return;
    }
    await this.link.bind();

    const client = this.createClient({
      transport: this.link,
      apduTimeout: this.options.apduTimeout
    });
    client.on('iAm', (message) => {
      const event: IAmEvent = {
        deviceId: message.deviceId,
        address: message.address,
        maxApdu: message.maxApdu,
        segmentation: segmentationName(message.segmentation),
        vendorId: message.vendorId
      };
      this.emit('iAm', event);
    });
    client.on('whoIs', (request) => this.answerWhoIs(client, request));
    client.on('error', (error) => {
      this.logger.error('BACnet client error', {
        component: LogComponents.TRANSPORT,
        error: describeError(error)
      });
    });
    this.client = client;

    this.logger.info('BACnet/IP transport open', {
      component: LogComponents.TRANSPORT,
      interface: this.options.interface,
      port: this.options.port
    });
  }

  async close(): Promise<void> {
    if (this.client) {
      // closes the link too
      this.client.close();
      this.client = null;
    } else {
      this.link.close();
    }
  }

  async whoIs(range?: WhoIsRange): Promise<void> {
    this.requireClient().whoIs(whoIsLimits(range));
  }

  async readProperty(
    address: string,
    objectId: ObjectIdentifier,
    propertyId: string,
    arrayIndex?: number
  ): Promise<BacnetValue | null> {
    // bacstack encodes index 0 as "whole array", so the element count cannot be requested
    if (arrayIndex === 0) {
      throw new UnsupportedOperationError('readProperty at array index 0');
    }
    const client = this.requireClient();
    const operation = `readProperty ${objectId.type}:${objectId.instance} ${propertyId}`;
    const options: Bacnet.ReadPropertyOptions = arrayIndex === undefined ? {} : { arrayIndex };

    return new Promise((resolve, reject) => {
      client.readProperty(
        address,
        { type: objectTypeId(objectId.type), instance: objectId.instance },
        toPropertyId(propertyId),
        options,
        (error, result) => {
          if (error) {
            reject(translateBacstackError(error, operation, this.options.apduTimeout));
            return;
          }
          const decoded = (result?.values ?? [])
            .map(tagged => decodeTaggedValue(tagged, propertyId))
            .filter((value): value is BacnetValue => value !== null);

          if (decoded.length === 0) {
            resolve(null);
          } else if (arrayIndex === undefined && LIST_PROPERTIES.has(propertyId)) {
            resolve(decoded);
          } else {
            resolve(decoded.length === 1 ? decoded[0] : decoded);
          }
        }
      );
    });
  }

  async writeProperty(
    address: string,
    objectId: ObjectIdentifier,
    propertyId: string,
    value: WritableValue,
    options: WriteOptions = {}
  ): Promise<void> {
    if (options.arrayIndex === 0) {
      throw new UnsupportedOperationError('writeProperty at array index 0');
    }
    const client = this.requireClient();
    const operation = `writeProperty ${objectId.type}:${objectId.instance} ${propertyId}`;
    const writeOptions: Bacnet.WritePropertyOptions = {};
    if (options.priority !== undefined) writeOptions.priority = options.priority;
    if (options.arrayIndex !== undefined) writeOptions.arrayIndex = options.arrayIndex;

    return new Promise((resolve, reject) => {
      client.writeProperty(
        address,
        { type: objectTypeId(objectId.type), instance: objectId.instance },
        toPropertyId(propertyId),
        [encodeWriteValue(value)],
        writeOptions,
        (error) => {
          if (error) {
            reject(translateBacstackError(error, operation, this.options.apduTimeout));
          } else {
            resolve();
          }
        }
      );
    });
  }

  async registerForeignDevice(_relay: RelayAddress, _ttl: number): Promise<void> {
    throw new UnsupportedOperationError('registerForeignDevice');
  }

  async sendBvlc(relay: RelayAddress, frame: Buffer): Promise<void> {
    return this.link.sendTo(frame, relay.host, relay.port);
  }

  private answerWhoIs(client: Bacnet, request: Bacnet.WhoIsRequest): void {
    const { deviceId, vendorId } = this.options;
    if (request.lowLimit !== undefined && deviceId < request.lowLimit) {
      return;
    }
    if (request.highLimit !== undefined && deviceId > request.highLimit) {
      return;
    }
    client.iAmResponse(deviceId, NO_SEGMENTATION, vendorId);
    this.logger.debug('Answered Who-Is', {
      component: LogComponents.TRANSPORT,
      from: request.address,
      deviceId
    });
  }

  private requireClient(): Bacnet {
    if (!this.client) {
      throw new Error('BACnet transport is not open');
    }
    return this.client;
  }
}
