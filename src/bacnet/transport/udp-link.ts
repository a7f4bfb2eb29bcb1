/**
 * BACnet/IP datalink over one UDP socket.
 *
 * Plugged into the bacstack client as its transport. Peers are addressed
 * as "host:port" (a bare host means the local BACnet port), so devices
 * behind a BBMD or on non-standard ports can be reached and are
 * reported with their real source port.
 */

import dgram from 'dgram';
import { EventEmitter } from 'events';
import { DEFAULT_BACNET_PORT } from '../constants';

// BVLL header + largest NPDU for an Ethernet frame
const MAX_PAYLOAD = 1482;

export interface UdpLinkOptions {
  interface: string;
  port: number;
  broadcastAddress: string;
}

export function formatAddress(host: string, port: number): string {
  return `${host}:${port}`;
}

export function parseAddress(address: string, defaultPort = DEFAULT_BACNET_PORT): { host: string; port: number } {
  const separator = address.lastIndexOf(':');
  if (separator > 0) {
    const port = Number(address.slice(separator + 1));
    if (Number.isInteger(port) && port > 0 && port <= 65535) {
      return { host: address.slice(0, separator), port };
    }
  }
  return { host: address, port: defaultPort };
}

export class UdpLink extends EventEmitter {
  private socket: dgram.Socket | null = null;
  private bound = false;

  constructor(
    private readonly options: UdpLinkOptions,
    private readonly createSocket: () => dgram.Socket = () => dgram.createSocket({ type: 'udp4', reuseAddr: true })
  ) {
    super();
  }

  /**
   * Bind the socket. Rejects if the address cannot be bound.
   */
  bind(): Promise<void> {
    if (this.bound) {
      return Promise.resolve();
    }
    const socket = this.createSocket();
    this.socket = socket;

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        socket.close();
        this.socket = null;
        reject(error);
      };
      socket.once('error', onError);
      socket.bind(this.options.port, this.options.interface, () => {
        socket.off('error', onError);
        socket.setBroadcast(true);
        socket.on('error', (error) => this.emit('error', error));
        socket.on('message', (msg, rinfo) => {
          this.emit('message', msg, formatAddress(rinfo.address, rinfo.port));
        });
        this.bound = true;
        resolve();
      });
    });
  }

  // bacstack calls open() from its constructor; the socket is already bound by then
  open(): void {
    if (!this.bound) {
      this.emit('error', new Error('UDP link opened before it was bound'));
    }
  }

  getBroadcastAddress(): string {
    return formatAddress(this.options.broadcastAddress, this.options.port);
  }

  getMaxPayload(): number {
    return MAX_PAYLOAD;
  }

  send(buffer: Buffer, offset: number, receiver: string): void {
    const { host, port } = parseAddress(receiver, this.options.port);
    this.socket?.send(buffer, 0, offset, port, host);
  }

  /**
   * Send a complete datagram and wait for it to leave the socket
   */
  sendTo(frame: Buffer, host: string, port: number): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new Error('UDP link is not bound'));
    }
    return new Promise((resolve, reject) => {
      socket.send(frame, port, host, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    if (this.socket) {
      this.socket.removeAllListeners();
      this.socket.close();
      this.socket = null;
    }
    this.bound = false;
  }
}
