import { EventEmitter } from 'events';
import type { IClientOptions, IClientPublishOptions } from 'mqtt';
import { MqttManager } from '../../../src/mqtt/manager';
import { createMockLogger, MockLogger } from '../../helpers/mock-logger';

const BROKER_URL = 'mqtt://broker.test:1883';

class FakeMqttClient extends EventEmitter {
	public readonly published: Array<{ topic: string; message: string | Buffer; opts: IClientPublishOptions }> = [];
	public readonly endCalls: boolean[] = [];
	public publishError: Error | undefined;

	publish(
		topic: string,
		message: string | Buffer,
		opts: IClientPublishOptions,
		callback: (error?: Error) => void
	): this {
		this.published.push({ topic, message, opts });
		callback(this.publishError);
		return this;
	}

	end(force?: boolean, _opts?: object, cb?: () => void): this {
		this.endCalls.push(force === true);
		cb?.();
		return this;
	}
}

describe('MqttManager', () => {
	let mockLogger: MockLogger;
	let clients: FakeMqttClient[];
	let connectFn: jest.Mock<FakeMqttClient, [string, IClientOptions]>;
	let manager: MqttManager;

	beforeEach(() => {
		mockLogger = createMockLogger();
		clients = [];
		connectFn = jest.fn((_url: string, _options: IClientOptions) => {
			const client = new FakeMqttClient();
			clients.push(client);
			return client;
		});
		manager = new MqttManager(mockLogger, connectFn);
	});

	afterEach(async () => {
		await manager.disconnect();
		jest.useRealTimers();
	});

	async function connect(): Promise<FakeMqttClient> {
		const pending = manager.connect(BROKER_URL, { clientId: 'bridge-test' });
		const client = clients[clients.length - 1];
		client.emit('connect');
		await pending;
		return client;
	}

	it('should connect with reconnects left to the manager', async () => {
		await connect();

		expect(manager.isConnected()).toBe(true);
		expect(connectFn).toHaveBeenCalledWith(BROKER_URL, expect.objectContaining({
			clientId: 'bridge-test',
			clean: true,
			reconnectPeriod: 0
		}));
	});

	it('should not open a second connection while connected', async () => {
		await connect();
		await manager.connect(BROKER_URL);

		expect(connectFn).toHaveBeenCalledTimes(1);
	});

	it('should reject when the first connection attempt errors', async () => {
		const pending = manager.connect(BROKER_URL);
		clients[0].emit('error', new Error('connect ECONNREFUSED'));

		await expect(pending).rejects.toThrow('connect ECONNREFUSED');
		expect(manager.isConnected()).toBe(false);
	});

	it('should reject publishes while disconnected', async () => {
		await expect(manager.publish('bacnet/150/status', '{}'))
			.rejects.toThrow('MQTT not connected - cannot publish to bacnet/150/status');
	});

	it('should publish through the client', async () => {
		const client = await connect();

		await manager.publish('bacnet/150/status', '{"online":true}', { qos: 1, retain: true });

		expect(client.published).toEqual([{
			topic: 'bacnet/150/status',
			message: '{"online":true}',
			opts: { qos: 1, retain: true }
		}]);
	});

	it('should reject when the broker refuses a publish', async () => {
		const client = await connect();
		client.publishError = new Error('not authorized');

		await expect(manager.publish('bacnet/150/status', '{}')).rejects.toThrow('not authorized');
	});

	it('should reconnect with exponential backoff after the connection drops', async () => {
		jest.useFakeTimers();
		const closed = jest.fn();
		manager.on('close', closed);
		const first = await connect();

		first.emit('close');

		expect(closed).toHaveBeenCalledTimes(1);
		expect(manager.isConnected()).toBe(false);
		expect(mockLogger.info).toHaveBeenCalledWith('Reconnecting to MQTT broker in 1000ms', expect.objectContaining({ attempt: 1 }));

		await jest.advanceTimersByTimeAsync(1000);
		expect(connectFn).toHaveBeenCalledTimes(2);

		clients[1].emit('close');
		expect(mockLogger.info).toHaveBeenCalledWith('Reconnecting to MQTT broker in 2000ms', expect.objectContaining({ attempt: 2 }));

		await jest.advanceTimersByTimeAsync(2000);
		expect(connectFn).toHaveBeenCalledTimes(3);
		expect(mockLogger.warn).toHaveBeenCalledWith('MQTT reconnect attempt failed', expect.objectContaining({ attempt: 2 }));
		clients[2].emit('connect');
		expect(manager.isConnected()).toBe(true);
	});

	it('should not reconnect after disconnect', async () => {
		jest.useFakeTimers();
		const client = await connect();

		await manager.disconnect();
		client.emit('close');
		jest.advanceTimersByTime(60000);

		expect(connectFn).toHaveBeenCalledTimes(1);
		expect(client.endCalls).toEqual([false]);
	});
});
