import {
	DatagramSocket,
	RawDatagramStrategy,
	defaultRegistrationStrategies
} from '../../../src/bacnet/registration-strategies';
import { ForeignDeviceManager } from '../../../src/bacnet/foreign-device';
import { encodeRegisterForeignDevice } from '../../../src/bacnet/bvlc';
import { UnsupportedOperationError } from '../../../src/errors';
import { FakeTransport } from '../../helpers/fake-transport';
import { createMockLogger } from '../../helpers/mock-logger';

const RELAY = { host: '192.168.10.1', port: 47808 };
const REGISTER_TTL_30 = Buffer.from([0x81, 0x05, 0x00, 0x06, 0x00, 0x1e]);

class FakeSocket implements DatagramSocket {
	public readonly sent: Array<{ msg: Buffer; port: number; address: string }> = [];
	public closed = false;

	constructor(private readonly error: Error | null = null) {}

	send(msg: Buffer, port: number, address: string, callback: (error: Error | null) => void): void {
		this.sent.push({ msg, port, address });
		callback(this.error);
	}

	close(): void {
		this.closed = true;
	}
}

describe('BVLC frames', () => {
	it('should encode Register-Foreign-Device with a big-endian TTL', () => {
		expect(encodeRegisterForeignDevice(30)).toEqual(REGISTER_TTL_30);
		expect(encodeRegisterForeignDevice(0)).toEqual(Buffer.from([0x81, 0x05, 0x00, 0x06, 0x00, 0x00]));
		expect(encodeRegisterForeignDevice(65535)).toEqual(Buffer.from([0x81, 0x05, 0x00, 0x06, 0xff, 0xff]));
	});

	it('should reject a TTL outside 0..65535', () => {
		expect(() => encodeRegisterForeignDevice(65536)).toThrow(RangeError);
		expect(() => encodeRegisterForeignDevice(-1)).toThrow(RangeError);
		expect(() => encodeRegisterForeignDevice(1.5)).toThrow(RangeError);
	});
});

describe('Registration strategies', () => {
	it('should fall back to a BVLC frame when the transport has no registration service', async () => {
		const transport = new FakeTransport();
		transport.registerForeignDeviceStub.rejects(new UnsupportedOperationError('registerForeignDevice'));
		const strategies = defaultRegistrationStrategies(transport, () => new FakeSocket());
		const manager = new ForeignDeviceManager(RELAY, 30, strategies, createMockLogger());

		expect(strategies.map(s => s.name)).toEqual(['transport-service', 'bvlc-frame', 'raw-datagram']);
		await expect(manager.register()).resolves.toBe('bvlc-frame');
		expect(transport.sendBvlcStub.callCount).toBe(1);
		expect(transport.sendBvlcStub.firstCall.args).toEqual([RELAY, REGISTER_TTL_30]);

		await manager.stop();
	});

	it('should send a raw datagram from a throwaway socket', async () => {
		const socket = new FakeSocket();
		const strategy = new RawDatagramStrategy(() => socket);

		await strategy.register(RELAY, 30);

		expect(socket.sent).toEqual([{ msg: REGISTER_TTL_30, port: 47808, address: '192.168.10.1' }]);
		expect(socket.closed).toBe(true);
	});

	it('should close the socket when the send fails', async () => {
		const socket = new FakeSocket(new Error('EHOSTUNREACH'));
		const strategy = new RawDatagramStrategy(() => socket);

		await expect(strategy.register(RELAY, 30)).rejects.toThrow('EHOSTUNREACH');
		expect(socket.closed).toBe(true);
	});
});
