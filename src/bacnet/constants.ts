/**
 * BACnet Constants
 * Centralized definitions for protocol values and polling tables
 */

export const DEFAULT_BACNET_PORT = 47808;      // 0xBAC0

// Object enumeration
export const MAX_INDEXED_OBJECTS = 500;        // Hard cap for element-by-element object-list reads

// Foreign device registration
export const MIN_RENEWAL_INTERVAL = 5;         // seconds

// Capability cache key for the engineering unit sub-read
export const UNITS_PROPERTY = 'units';
export const PRESENT_VALUE_PROPERTY = 'present-value';
export const OBJECT_NAME_PROPERTY = 'object-name';
export const OBJECT_LIST_PROPERTY = 'object-list';

export type IdentificationField =
  | 'deviceName'
  | 'vendorName'
  | 'modelName'
  | 'firmwareRevision'
  | 'applicationSoftwareVersion'
  | 'protocolVersion'
  | 'protocolRevision';

/**
 * Device object properties read during discovery, with the device field each fills
 */
export const IDENTIFICATION_PROPERTIES: ReadonlyArray<readonly [string, IdentificationField]> = [
  ['object-name', 'deviceName'],
  ['vendor-name', 'vendorName'],
  ['model-name', 'modelName'],
  ['firmware-revision', 'firmwareRevision'],
  ['application-software-version', 'applicationSoftwareVersion'],
  ['protocol-version', 'protocolVersion'],
  ['protocol-revision', 'protocolRevision']
];

/**
 * Object types that carry a present-value
 */
export const PRESENT_VALUE_OBJECT_TYPES = [
  'analog-input', 'analog-output', 'analog-value',
  'binary-input', 'binary-output', 'binary-value',
  'multi-state-input', 'multi-state-output', 'multi-state-value',
  'accumulator', 'pulse-converter', 'loop',
  'integer-value', 'positive-integer-value',
  'large-analog-value', 'octetstring-value',
  'characterstring-value', 'time-value', 'datetime-value',
  'datepattern-value', 'timepattern-value', 'datetimepattern-value'
] as const;

/**
 * Object types whose present-value has engineering units
 */
export const UNIT_OBJECT_TYPES = [
  'analog-input', 'analog-output', 'analog-value',
  'accumulator', 'pulse-converter', 'loop',
  'large-analog-value'
] as const;
