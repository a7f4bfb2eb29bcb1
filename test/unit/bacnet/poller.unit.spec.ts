import { readFileSync } from 'fs';
import { join } from 'path';
import { PollingScheduler } from '../../../src/bacnet/poller';
import { BacnetReaderWriter } from '../../../src/bacnet/reader-writer';
import { DeviceRegistry } from '../../../src/registry/device-registry';
import { FakeTransport, never } from '../../helpers/fake-transport';
import { createMockLogger, MockLogger } from '../../helpers/mock-logger';
import { createDevice, createTempDir, objectOf, readerSettings } from '../../helpers/fixtures';

const STUCK_ADDRESS = '10.0.0.7:47808';
const HEALTHY_ADDRESS = '10.0.0.8:47808';

describe('PollingScheduler', () => {
	let transport: FakeTransport;
	let mockLogger: MockLogger;
	let registryPath: string;
	let registry: DeviceRegistry;
	let poller: PollingScheduler;

	beforeEach(() => {
		transport = new FakeTransport();
		mockLogger = createMockLogger();
		registryPath = join(createTempDir(), 'devices.json');
		registry = new DeviceRegistry(registryPath, mockLogger);
		poller = new PollingScheduler(
			registry,
			new BacnetReaderWriter(transport, mockLogger, readerSettings),
			mockLogger,
			{ interval: 60, deviceTimeout: 0.05, properties: ['present-value'] }
		);
	});

	afterEach(async () => {
		await poller.stop();
		jest.clearAllMocks();
	});

	it('should keep polling other devices when one stops answering', async () => {
		registry.addOrMerge(createDevice(150, STUCK_ADDRESS, [['analog-input', 1]]));
		const healthy = createDevice(151, HEALTHY_ADDRESS, [['analog-value', 1]]);
		registry.addOrMerge(healthy);
		transport
			.respond(STUCK_ADDRESS, 'analog-input', 1, 'present-value', never)
			.respond(HEALTHY_ADDRESS, 'analog-value', 1, 'present-value', 20);

		const result = await poller.runCycle();

		expect(result).toEqual({ polled: 1, failed: 1, values: 1 });
		expect(objectOf(healthy, 'analog-value', 1).properties.get('present-value')?.value).toBe(20);
		expect(mockLogger.warn).toHaveBeenCalledWith('Device poll failed', expect.objectContaining({
			deviceId: 150,
			errorType: 'TIMEOUT'
		}));
	});

	it('should not issue further reads for a device after its time budget runs out', async () => {
		registry.addOrMerge(createDevice(150, STUCK_ADDRESS, [['analog-input', 1], ['analog-input', 2]]));
		transport.respond(STUCK_ADDRESS, 'analog-input', 1, 'present-value', never);

		await poller.runCycle();
		await new Promise(resolve => setTimeout(resolve, 20));

		expect(transport.reads.filter(call => call.objectId.instance === 2)).toHaveLength(0);
	});

	it('should skip disabled devices', async () => {
		const disabled = createDevice(152, HEALTHY_ADDRESS, [['analog-value', 1]]);
		disabled.enabled = false;
		registry.addOrMerge(disabled);

		const result = await poller.runCycle();

		expect(result).toEqual({ polled: 0, failed: 0, values: 0 });
		expect(transport.reads).toHaveLength(0);
	});

	it('should save the registry after every cycle', async () => {
		registry.addOrMerge(createDevice(151, HEALTHY_ADDRESS, [['analog-value', 1]]));
		transport.respond(HEALTHY_ADDRESS, 'analog-value', 1, 'present-value', 20);

		await poller.runCycle();

		const saved = JSON.parse(readFileSync(registryPath, 'utf-8'));
		expect(Object.keys(saved)).toEqual(['151']);
		expect(saved['151'].objects['analog-value:1'].properties['present-value'].value).toBe(20);
	});

	it('should start once and stop cleanly', async () => {
		poller.start();
		poller.start();

		expect(poller.running).toBe(true);
		const started = mockLogger.info.mock.calls.filter((call: unknown[]) => call[0] === 'Polling started');
		expect(started).toHaveLength(1);

		await poller.stop();

		expect(poller.running).toBe(false);
		expect(mockLogger.info).toHaveBeenCalledWith('Polling stopped', expect.objectContaining({ component: 'Poller' }));
	});
});
