import request from 'supertest';
import type { Express } from 'express';
import { join } from 'path';
import { createApp } from '../../src/api/server';
import { BridgeEngine } from '../../src/bridge';
import { parseConfig } from '../../src/config';
import { FakeTransport } from '../helpers/fake-transport';
import { createMockLogger } from '../helpers/mock-logger';
import { AHU_ADDRESS, createDevice, createTempDir } from '../helpers/fixtures';

describe('Control API', () => {
	let transport: FakeTransport;
	let engine: BridgeEngine;
	let app: Express;

	beforeEach(async () => {
		const dir = createTempDir('api-test-');
		const logger = createMockLogger();
		const config = parseConfig({
			storage: { devicesFile: join(dir, 'devices.json'), mappingsFile: join(dir, 'mqtt_mappings.json') },
			mqtt: { enabled: false },
			discovery: { autoDiscover: false, discoverObjects: false }
		});
		transport = new FakeTransport();
		engine = new BridgeEngine(config, logger, { transport });
		await engine.init();
		engine.registry.addOrMerge(createDevice(150, AHU_ADDRESS, [['analog-input', 1]]));
		app = createApp(engine, logger);
	});

	describe('GET /health', () => {
		it('should report ok', async () => {
			const response = await request(app).get('/health');

			expect(response.status).toBe(200);
			expect(response.body).toEqual({ status: 'ok' });
		});
	});

	describe('GET /status', () => {
		it('should report bridge state', async () => {
			const response = await request(app).get('/status');

			expect(response.status).toBe(200);
			expect(response.body).toEqual(expect.objectContaining({ running: false, devices: 1, enabledDevices: 1 }));
		});
	});

	describe('devices', () => {
		it('should list devices', async () => {
			const response = await request(app).get('/devices');

			expect(response.status).toBe(200);
			expect(response.body).toHaveLength(1);
			expect(response.body[0]).toEqual(expect.objectContaining({ device_id: 150, address: AHU_ADDRESS }));
		});

		it('should return one device', async () => {
			const response = await request(app).get('/devices/150');

			expect(response.status).toBe(200);
			expect(response.body.device_id).toBe(150);
			expect(Object.keys(response.body.objects)).toEqual(['analog-input:1']);
		});

		it('should answer 404 for an unknown device', async () => {
			const response = await request(app).get('/devices/999');

			expect(response.status).toBe(404);
			expect(response.body).toEqual({ error: 'Not found', message: 'Device 999 not found' });
		});

		it('should answer 400 for a malformed device id', async () => {
			const response = await request(app).get('/devices/abc');

			expect(response.status).toBe(400);
			expect(response.body).toEqual({ error: 'Bad request', message: 'Invalid device id: abc' });
		});

		it('should list and fetch objects', async () => {
			const list = await request(app).get('/devices/150/objects');
			const one = await request(app).get('/devices/150/objects/analog-input/1');
			const missing = await request(app).get('/devices/150/objects/analog-input/2');

			expect(list.body.map((obj: { object_type: string }) => obj.object_type)).toEqual(['analog-input']);
			expect(one.status).toBe(200);
			expect(one.body.object_instance).toBe(1);
			expect(missing.status).toBe(404);
		});

		it('should disable and enable a device', async () => {
			const disabled = await request(app).put('/devices/150/disable');
			expect(disabled.body.enabled).toBe(false);

			const enabled = await request(app).put('/devices/150/enable');
			expect(enabled.body.enabled).toBe(true);
		});

		it('should delete a device once', async () => {
			const first = await request(app).delete('/devices/150');
			const second = await request(app).delete('/devices/150');

			expect(first.status).toBe(200);
			expect(first.body).toEqual({ removed: true, device_id: 150 });
			expect(second.status).toBe(404);
		});

		it('should run discovery', async () => {
			transport.onWhoIs = () => transport.announce(151, '10.0.0.6:47808');

			const response = await request(app).post('/devices/discover').send({ low_limit: 100, high_limit: 200, timeout: 1 });

			expect(response.status).toBe(200);
			expect(response.body.count).toBe(1);
			expect(response.body.devices[0].device_id).toBe(151);
			expect(transport.whoIsCalls).toEqual([{ lowLimit: 100, highLimit: 200 }]);
		});

		it('should accept object discovery in the background', async () => {
			const response = await request(app).post('/devices/150/discover-objects');

			expect(response.status).toBe(202);
			expect(response.body).toEqual({ status: 'started', device_id: 150 });
		});
	});

	describe('POST /read', () => {
		it('should read a property', async () => {
			transport.respond(AHU_ADDRESS, 'analog-input', 1, 'present-value', 72.5);

			const response = await request(app)
				.post('/read')
				.send({ device_id: 150, object_type: 'analog-input', object_instance: 1 });

			expect(response.status).toBe(200);
			expect(response.body).toEqual({
				device_id: 150,
				object_type: 'analog-input',
				object_instance: 1,
				property_id: 'present-value',
				value: 72.5
			});
		});

		it('should reject a body that is not JSON', async () => {
			const response = await request(app)
				.post('/read')
				.set('Content-Type', 'application/json')
				.send('{"device_id": 150,');

			expect(response.status).toBe(400);
			expect(response.body.error).toBe('Bad request');
		});

		it('should reject array index 0', async () => {
			const response = await request(app)
				.post('/read')
				.send({ device_id: 150, object_type: 'device', object_instance: 150, property_id: 'object-list', array_index: 0 });

			expect(response.status).toBe(400);
			expect(transport.reads).toEqual([]);
		});

		it('should reject a malformed body', async () => {
			const response = await request(app).post('/read').send({ device_id: 'x', object_type: 'analog-input' });

			expect(response.status).toBe(400);
			expect(response.body.error).toBe('Bad request');
		});
	});

	describe('POST /write', () => {
		it('should write with a priority', async () => {
			const response = await request(app)
				.post('/write')
				.send({ device_id: 150, object_type: 'analog-output', object_instance: 2, value: 50, priority: 8 });

			expect(response.status).toBe(200);
			expect(response.body).toEqual({ success: true });
			expect(transport.writes).toEqual([{
				address: AHU_ADDRESS,
				objectId: { type: 'analog-output', instance: 2 },
				propertyId: 'present-value',
				value: 50,
				options: { priority: 8, arrayIndex: undefined }
			}]);
		});

		it('should reject a priority outside 1..16', async () => {
			const response = await request(app)
				.post('/write')
				.send({ device_id: 150, object_type: 'analog-output', object_instance: 2, value: 50, priority: 17 });

			expect(response.status).toBe(400);
		});
	});

	describe('POST /bbmd/register', () => {
		it('should refuse when no BBMD is configured', async () => {
			const response = await request(app).post('/bbmd/register');

			expect(response.status).toBe(400);
			expect(response.body).toEqual({
				error: 'Bad request',
				message: 'Foreign device registration is not configured'
			});
		});
	});

	describe('MQTT mappings', () => {
		it('should create, list, fetch and delete a mapping', async () => {
			const created = await request(app).post('/mqtt/mapping').send({
				device_id: 150,
				object_type: 'analog-input',
				object_instance: 1,
				custom_topic: 'site/ahu1/temp'
			});
			expect(created.status).toBe(200);
			expect(created.body).toEqual({
				device_id: 150,
				object_type: 'analog-input',
				object_instance: 1,
				mqtt_topic: '',
				custom_topic: 'site/ahu1/temp',
				enabled: true
			});

			const list = await request(app).get('/mqtt/mappings');
			expect(list.body).toHaveLength(1);

			const one = await request(app).get('/mqtt/mapping/150/analog-input/1');
			expect(one.body.custom_topic).toBe('site/ahu1/temp');

			const removed = await request(app).delete('/mqtt/mapping/150/analog-input/1');
			expect(removed.body).toEqual({ removed: true });

			const gone = await request(app).get('/mqtt/mapping/150/analog-input/1');
			expect(gone.status).toBe(404);
		});

		it('should reject an invalid mapping', async () => {
			const response = await request(app).post('/mqtt/mapping').send({ device_id: 150 });

			expect(response.status).toBe(400);
		});
	});
});
