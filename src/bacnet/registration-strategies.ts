/**
 * Foreign device registration strategies
 *
 * Tried in order until one succeeds:
 *   1. the transport's Register-Foreign-Device service
 *   2. a BVLC frame sent through the transport's own socket
 *   3. a raw datagram from a throwaway UDP socket
 */

import dgram from 'dgram';
import type { BacnetTransport, RelayAddress } from './types';
import { encodeRegisterForeignDevice } from './bvlc';

export interface RegistrationStrategy {
  readonly name: string;
  register(relay: RelayAddress, ttl: number): Promise<void>;
}

export class TransportServiceStrategy implements RegistrationStrategy {
  readonly name = 'transport-service';

  constructor(private readonly transport: BacnetTransport) {}

  register(relay: RelayAddress, ttl: number): Promise<void> {
    return this.transport.registerForeignDevice(relay, ttl);
  }
}

export class BvlcFrameStrategy implements RegistrationStrategy {
  readonly name = 'bvlc-frame';

  constructor(private readonly transport: BacnetTransport) {}

  register(relay: RelayAddress, ttl: number): Promise<void> {
    return this.transport.sendBvlc(relay, encodeRegisterForeignDevice(ttl));
  }
}

/**
 * Minimal datagram socket surface, so tests can supply their own
 */
export interface DatagramSocket {
  send(msg: Buffer, port: number, address: string, callback: (error: Error | null) => void): void;
  close(): void;
}

export type DatagramSocketFactory = () => DatagramSocket;

const createUdpSocket: DatagramSocketFactory = () => dgram.createSocket('udp4');

export class RawDatagramStrategy implements RegistrationStrategy {
  readonly name = 'raw-datagram';

  constructor(private readonly createSocket: DatagramSocketFactory = createUdpSocket) {}

  register(relay: RelayAddress, ttl: number): Promise<void> {
    const frame = encodeRegisterForeignDevice(ttl);
    const socket = this.createSocket();

    return new Promise<void>((resolve, reject) => {
      socket.send(frame, relay.port, relay.host, (error) => {
        socket.close();
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}

export function defaultRegistrationStrategies(
  transport: BacnetTransport,
  createSocket?: DatagramSocketFactory
): RegistrationStrategy[] {
  return [
    new TransportServiceStrategy(transport),
    new BvlcFrameStrategy(transport),
    new RawDatagramStrategy(createSocket)
  ];
}
