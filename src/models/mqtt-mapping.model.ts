/**
 * MQTT Topic Mapping Model
 * Per-object topic overrides, persisted separately from the registry
 */

import { z } from 'zod';
import { JsonFileStore } from '../db/json-store';
import { describeError } from '../errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';

export const MqttMappingSchema = z.object({
  device_id: z.number().int().min(0),
  object_type: z.string().min(1),
  object_instance: z.number().int().min(0),
  mqtt_topic: z.string().default(''),
  custom_topic: z.string().nullable().default(null),
  enabled: z.boolean().default(true)
});

export type MqttMapping = z.infer<typeof MqttMappingSchema>;

/**
 * Mapping as accepted from a caller (defaults not yet applied)
 */
export type MqttMappingInput = z.input<typeof MqttMappingSchema>;

export const MappingDocumentSchema = z.record(MqttMappingSchema);

export type MappingDocument = z.infer<typeof MappingDocumentSchema>;

export function mappingKey(deviceId: number, objectType: string, objectInstance: number): string {
  return `${deviceId}:${objectType}:${objectInstance}`;
}

/**
 * Topic a mapping publishes to: the custom topic when set, else the mqtt topic
 */
export function mappingTopic(mapping: MqttMapping): string {
  return mapping.custom_topic ? mapping.custom_topic : mapping.mqtt_topic;
}

export class MqttMappingStore {
  private readonly mappings = new Map<string, MqttMapping>();
  private readonly store: JsonFileStore<MappingDocument>;

  constructor(path: string, private readonly logger: Logger) {
    this.store = new JsonFileStore(path, MappingDocumentSchema);
  }

  get(deviceId: number, objectType: string, objectInstance: number): MqttMapping | undefined {
    return this.mappings.get(mappingKey(deviceId, objectType, objectInstance));
  }

  all(): MqttMapping[] {
    return Array.from(this.mappings.values());
  }

  enabled(): MqttMapping[] {
    return this.all().filter(mapping => mapping.enabled);
  }

  /**
   * Create or replace a mapping and persist the store
   */
  async upsert(input: MqttMappingInput): Promise<MqttMapping> {
    const mapping = MqttMappingSchema.parse(input);
    this.mappings.set(mappingKey(mapping.device_id, mapping.object_type, mapping.object_instance), mapping);
    await this.persist();
    return mapping;
  }

  async remove(deviceId: number, objectType: string, objectInstance: number): Promise<boolean> {
    const removed = this.mappings.delete(mappingKey(deviceId, objectType, objectInstance));
    if (removed) {
      await this.persist();
    }
    return removed;
  }

  async persist(): Promise<void> {
    const doc: MappingDocument = Object.fromEntries(this.mappings);
    try {
      await this.store.write(doc);
    } catch (error) {
      this.logger.error('Failed to save topic mappings', {
        component: LogComponents.MAPPINGS,
        path: this.store.path,
        error: describeError(error)
      });
    }
  }

  async load(): Promise<void> {
    this.mappings.clear();
    const result = await this.store.read();

    if (result.status === 'missing') {
      return;
    }
    if (result.status === 'invalid') {
      this.logger.error('Could not decode saved topic mappings, starting empty', {
        component: LogComponents.MAPPINGS,
        path: this.store.path,
        error: result.error
      });
      return;
    }

    for (const mapping of Object.values(result.value)) {
      this.mappings.set(mappingKey(mapping.device_id, mapping.object_type, mapping.object_instance), mapping);
    }
    this.logger.info(`Loaded ${this.mappings.size} topic mappings`, {
      component: LogComponents.MAPPINGS
    });
  }
}
