import { writeFileSync } from 'fs';
import { join } from 'path';
import { applyEnvOverrides, loadConfig, parseConfig, readConfigFile } from '../../../src/config';
import { ConfigError } from '../../../src/errors';
import { createTempDir } from '../../helpers/fixtures';

describe('Configuration', () => {
	describe('parseConfig', () => {
		it('should fill every default from an empty document', () => {
			const config = parseConfig({});

			expect(config.bacnet.port).toBe(47808);
			expect(config.bacnet.foreignDevice).toEqual({ enabled: false, port: 47808, ttl: 30 });
			expect(config.discovery.whoIsTimeout).toBe(5);
			expect(config.polling.properties).toEqual(['present-value', 'status-flags']);
			expect(config.polling.presentValueObjectTypes).toContain('analog-input');
			expect(config.mqtt.topicPrefix).toBe('bacnet');
			expect(config.mqtt.qos).toBe(1);
			expect(config.storage).toEqual({ devicesFile: 'devices.json', mappingsFile: 'mqtt_mappings.json' });
			expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
		});

		it('should require a BBMD address when registration is enabled', () => {
			const error = (() => {
				try {
					parseConfig({ bacnet: { foreignDevice: { enabled: true } } });
				} catch (e) {
					return e;
				}
				return undefined;
			})();

			expect(error).toBeInstanceOf(ConfigError);
			expect(error).toMatchObject({
				issues: ['bacnet.foreignDevice.address: Foreign device registration requires a BBMD address']
			});
		});

		it('should reject values of the wrong type', () => {
			expect(() => parseConfig({ mqtt: { qos: 3 } })).toThrow(ConfigError);
			expect(() => parseConfig({ polling: { properties: [] } })).toThrow(ConfigError);
		});
	});

	describe('applyEnvOverrides', () => {
		it('should overlay broker, port and BBMD settings', () => {
			const doc = applyEnvOverrides({ mqtt: { topicPrefix: 'site' } }, {
				MQTT_BROKER_URL: 'mqtt://broker.test:1883',
				MQTT_PASSWORD: 'test-secret',
				BACNET_PORT: '47809',
				BBMD_ADDRESS: '192.168.10.1',
				BBMD_TTL: '60'
			});

			expect(doc).toEqual({
				mqtt: { topicPrefix: 'site', brokerUrl: 'mqtt://broker.test:1883', password: 'test-secret' },
				bacnet: { port: 47809, foreignDevice: { address: '192.168.10.1', enabled: true, ttl: 60 } }
			});
		});

		it('should reject a non-numeric port', () => {
			expect(() => applyEnvOverrides({}, { BACNET_PORT: 'abc' }))
				.toThrow('Environment variable BACNET_PORT must be an integer, got "abc"');
		});
	});

	describe('readConfigFile', () => {
		let dir: string;

		beforeEach(() => {
			dir = createTempDir('config-test-');
		});

		it('should treat a missing file as an empty document', () => {
			expect(readConfigFile(join(dir, 'missing.json'))).toEqual({});
		});

		it('should reject invalid JSON', () => {
			const path = join(dir, 'config.json');
			writeFileSync(path, '{ "mqtt": ', 'utf-8');

			expect(() => readConfigFile(path)).toThrow(ConfigError);
		});

		it('should reject a document that is not an object', () => {
			const path = join(dir, 'config.json');
			writeFileSync(path, '[]', 'utf-8');

			expect(() => readConfigFile(path)).toThrow(`Configuration file ${path} must contain a JSON object`);
		});

		it('should load the file named by BRIDGE_CONFIG with environment overrides', () => {
			const path = join(dir, 'bridge.json');
			writeFileSync(path, JSON.stringify({ mqtt: { topicPrefix: 'site' }, polling: { interval: 30 } }), 'utf-8');

			const config = loadConfig({ BRIDGE_CONFIG: path, MQTT_BROKER_URL: 'mqtt://broker.test:1883' });

			expect(config.mqtt.topicPrefix).toBe('site');
			expect(config.mqtt.brokerUrl).toBe('mqtt://broker.test:1883');
			expect(config.polling.interval).toBe(30);
		});
	});
});
