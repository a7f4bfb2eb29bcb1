/**
 * Logging Component Names
 *
 * Standardized component names for structured logging.
 * Use these constants instead of hardcoded strings to ensure consistency.
 *
 * Usage:
 *   logger.info('Registry saved', { component: LogComponents.REGISTRY });
 */

export const LogComponents = {
  // Core
  GATEWAY: 'Gateway',
  CONFIG: 'Config',

  // State
  REGISTRY: 'Registry',
  MAPPINGS: 'Mappings',

  // BACnet
  TRANSPORT: 'Transport',
  DISCOVERY: 'Discovery',
  READER_WRITER: 'ReaderWriter',
  POLLER: 'Poller',
  FOREIGN_DEVICE: 'ForeignDevice',

  // Messaging
  MQTT: 'Mqtt',
  PUBLISHER: 'Publisher',

  // Control surface
  API: 'Api',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
