import { z } from 'zod';
import { PRESENT_VALUE_OBJECT_TYPES, UNIT_OBJECT_TYPES } from '../bacnet/constants';

/**
 * BBMD / Foreign Device registration settings
 */
export const ForeignDeviceSchema = z.object({
  enabled: z.boolean().default(false),
  address: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).default(47808),
  ttl: z.number().int().min(1).max(65535).default(30) // seconds
}).refine((data) => !data.enabled || !!data.address, {
  message: 'Foreign device registration requires a BBMD address',
  path: ['address']
});

export type ForeignDeviceConfig = z.infer<typeof ForeignDeviceSchema>;

/**
 * Local BACnet/IP stack settings
 */
export const BacnetSchema = z.object({
  deviceId: z.number().int().min(0).max(4194302).default(999999), // answered to Who-Is
  vendorId: z.number().int().min(0).max(65535).default(15),
  interface: z.string().default('0.0.0.0'),
  port: z.number().int().min(1).max(65535).default(47808),
  broadcastAddress: z.string().default('255.255.255.255'),
  apduTimeout: z.number().int().min(100).max(60000).default(6000), // milliseconds
  readTimeout: z.number().int().min(100).max(60000).default(5000), // milliseconds
  foreignDevice: ForeignDeviceSchema.default({})
});

export type BacnetConfig = z.infer<typeof BacnetSchema>;

export const DiscoverySchema = z.object({
  autoDiscover: z.boolean().default(true),
  interval: z.number().int().min(10).default(300), // seconds
  whoIsTimeout: z.number().min(1).max(120).default(5), // seconds
  lowLimit: z.number().int().min(0).max(4194303).optional(),
  highLimit: z.number().int().min(0).max(4194303).optional(),
  discoverObjects: z.boolean().default(true)
});

export type DiscoveryConfig = z.infer<typeof DiscoverySchema>;

export const PollingSchema = z.object({
  enabled: z.boolean().default(true),
  interval: z.number().min(1).default(60), // seconds
  deviceTimeout: z.number().min(1).default(60), // seconds
  properties: z.array(z.string().min(1)).min(1).default(['present-value', 'status-flags']),
  presentValueObjectTypes: z.array(z.string().min(1)).default([...PRESENT_VALUE_OBJECT_TYPES]),
  unitObjectTypes: z.array(z.string().min(1)).default([...UNIT_OBJECT_TYPES])
});

export type PollingConfig = z.infer<typeof PollingSchema>;

export const MqttSchema = z.object({
  enabled: z.boolean().default(true),
  brokerUrl: z.string().min(1).default('mqtt://localhost:1883'),
  username: z.string().optional(),
  password: z.string().optional(),
  clientId: z.string().min(1).default('bacnet-mqtt-bridge'),
  topicPrefix: z.string().min(1).default('bacnet'),
  qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(1),
  retain: z.boolean().default(true),
  publishInterval: z.number().min(1).default(5), // seconds
  keepalive: z.number().int().min(0).default(60) // seconds
});

export type MqttConfig = z.infer<typeof MqttSchema>;

export const StorageSchema = z.object({
  devicesFile: z.string().min(1).default('devices.json'),
  mappingsFile: z.string().min(1).default('mqtt_mappings.json')
});

export type StorageConfig = z.infer<typeof StorageSchema>;

export const ApiSchema = z.object({
  enabled: z.boolean().default(true),
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(1).max(65535).default(8080)
});

export type ApiConfig = z.infer<typeof ApiSchema>;

export const LoggingSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  format: z.enum(['pretty', 'json']).default('pretty'),
  file: z.string().min(1).optional()
});

export type LoggingConfig = z.infer<typeof LoggingSchema>;

/**
 * Bridge Configuration Schema
 */
export const BridgeConfigSchema = z.object({
  bacnet: BacnetSchema.default({}),
  discovery: DiscoverySchema.default({}),
  polling: PollingSchema.default({}),
  mqtt: MqttSchema.default({}),
  storage: StorageSchema.default({}),
  api: ApiSchema.default({}),
  logging: LoggingSchema.default({})
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
