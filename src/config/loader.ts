/**
 * Configuration Loader
 *
 * Reads the JSON configuration document, overlays environment variables
 * and validates the result. Any problem here is fatal: the bridge never
 * starts on a half-understood configuration.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { ZodError } from 'zod';
import { BridgeConfigSchema, BridgeConfig } from './schema';
import { ConfigError, describeError, errnoCode } from '../errors';

export const DEFAULT_CONFIG_PATH = 'config.json';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the raw configuration document. A missing file yields an empty
 * document (all defaults); unreadable or non-object JSON is an error.
 */
export function readConfigFile(path: string): JsonObject {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Cannot read configuration file ${path}: ${describeError(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in configuration file ${path}: ${describeError(error)}`);
  }

  if (!isJsonObject(parsed)) {
    throw new ConfigError(`Configuration file ${path} must contain a JSON object`);
  }
  return parsed;
}

function section(doc: JsonObject, ...path: string[]): JsonObject {
  let current = doc;
  for (const key of path) {
    const next = current[key];
    if (!isJsonObject(next)) {
      const created: JsonObject = {};
      current[key] = created;
      current = created;
    } else {
      current = next;
    }
  }
  return current;
}

function toInt(name: string, value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigError(`Environment variable ${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Overlay environment variables on the raw document
 */
export function applyEnvOverrides(doc: JsonObject, env: NodeJS.ProcessEnv): JsonObject {
  if (env.LOG_LEVEL) section(doc, 'logging').level = env.LOG_LEVEL;

  if (env.MQTT_BROKER_URL) section(doc, 'mqtt').brokerUrl = env.MQTT_BROKER_URL;
  if (env.MQTT_USERNAME) section(doc, 'mqtt').username = env.MQTT_USERNAME;
  if (env.MQTT_PASSWORD) section(doc, 'mqtt').password = env.MQTT_PASSWORD;

  if (env.BACNET_INTERFACE) section(doc, 'bacnet').interface = env.BACNET_INTERFACE;
  if (env.BACNET_PORT) section(doc, 'bacnet').port = toInt('BACNET_PORT', env.BACNET_PORT);

  if (env.BBMD_ADDRESS) {
    const foreign = section(doc, 'bacnet', 'foreignDevice');
    foreign.address = env.BBMD_ADDRESS;
    foreign.enabled = true;
  }
  if (env.BBMD_PORT) section(doc, 'bacnet', 'foreignDevice').port = toInt('BBMD_PORT', env.BBMD_PORT);
  if (env.BBMD_TTL) section(doc, 'bacnet', 'foreignDevice').ttl = toInt('BBMD_TTL', env.BBMD_TTL);

  if (env.API_PORT) section(doc, 'api').port = toInt('API_PORT', env.API_PORT);

  return doc;
}

/**
 * Validate a raw document against the schema, filling defaults
 */
export function parseConfig(doc: unknown): BridgeConfig {
  try {
    return BridgeConfigSchema.parse(doc);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }
    throw error;
  }
}

/**
 * Load configuration: file (BRIDGE_CONFIG or config.json) + environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const path = resolve(env.BRIDGE_CONFIG || DEFAULT_CONFIG_PATH);
  const doc = applyEnvOverrides(readConfigFile(path), env);
  return parseConfig(doc);
}
