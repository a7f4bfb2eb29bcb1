import { connect as mqttConnect, IClientOptions, IClientPublishOptions } from 'mqtt';
import { EventEmitter } from 'events';
import { describeError } from '../errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';

/**
 * Outbound side of the bus as seen by the publish bridge
 */
export interface MessagePublisher {
  isConnected(): boolean;
  publish(topic: string, payload: string | Buffer, options?: IClientPublishOptions): Promise<void>;
}

/**
 * The part of the mqtt.js client the manager drives
 */
export interface MqttClientLike {
  on(event: 'connect' | 'offline' | 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  publish(
    topic: string,
    message: string | Buffer,
    opts: IClientPublishOptions,
    callback: (error?: Error) => void
  ): unknown;
  end(force?: boolean, opts?: object, cb?: () => void): unknown;
  removeAllListeners(): unknown;
}

export type MqttConnectFn = (brokerUrl: string, options: IClientOptions) => MqttClientLike;

/**
 * MQTT Manager
 *
 * Owns the bridge's single broker connection. Reconnects itself with
 * exponential backoff after the connection closes. There is no offline
 * queue: publishing while disconnected rejects, and the publish bridge
 * simply sends fresh values on its next cycle.
 *
 * Events:
 * - 'connect': connection (re-)established
 * - 'close': connection lost
 */
export class MqttManager extends EventEmitter implements MessagePublisher {
  private client: MqttClientLike | null = null;
  private connected = false;
  private connectionPromise: Promise<void> | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts = 0;
  private stopped = false;
  private readonly MAX_RECONNECT_DELAY_MS = 30000; // 30 seconds max
  private readonly BASE_RECONNECT_DELAY_MS = 1000; // 1 second base
  private readonly CONNECT_TIMEOUT_MS = 10000;
  private readonly PUBLISH_TIMEOUT_MS = 5000;

  constructor(
    private readonly logger: Logger,
    private readonly connectFn: MqttConnectFn = mqttConnect
  ) {
    super();
  }

  /**
   * Connect to MQTT broker (idempotent - can be called multiple times)
   */
  async connect(brokerUrl: string, options: IClientOptions = {}): Promise<void> {
    this.stopped = false;

    if (this.client && this.connected) {
      return;
    }
    if (this.connectionPromise) {
      return this.connectionPromise;
    }

    // Drop a previous client so its listeners cannot fire twice
    this.disposeClient();

    this.logger.info(`Connecting to MQTT broker: ${brokerUrl}`, { component: LogComponents.MQTT });

    const attempt = new Promise<void>((resolve, reject) => {
      const client = this.connectFn(brokerUrl, {
        ...options,
        clean: true,
        reconnectPeriod: 0, // reconnects are scheduled here, not by mqtt.js
        connectTimeout: this.CONNECT_TIMEOUT_MS
      });
      this.client = client;

      const connectionTimeout = setTimeout(() => {
        if (!this.connected) {
          client.end(true);
          reject(new Error(`MQTT connection timeout after ${this.CONNECT_TIMEOUT_MS / 1000}s: ${brokerUrl}`));
        }
      }, this.CONNECT_TIMEOUT_MS);

      client.on('connect', () => {
        clearTimeout(connectionTimeout);
        this.connected = true;
        this.reconnectAttempts = 0;
        this.logger.info('Connected to MQTT broker', {
          component: LogComponents.MQTT,
          brokerUrl
        });
        this.emit('connect');
        resolve();
      });

      client.on('error', (error) => {
        this.logger.error('MQTT connection error', {
          component: LogComponents.MQTT,
          brokerUrl,
          connected: this.connected,
          error: describeError(error)
        });
        if (!this.connected) {
          clearTimeout(connectionTimeout);
          reject(error);
        }
      });

      client.on('offline', () => {
        this.connected = false;
      });

      client.on('close', () => {
        const wasConnected = this.connected;
        this.connected = false;
        if (!wasConnected) {
          clearTimeout(connectionTimeout);
          reject(new Error(`MQTT connection closed before it was established: ${brokerUrl}`));
        } else {
          this.logger.warn('MQTT connection closed', {
            component: LogComponents.MQTT,
            brokerUrl
          });
          this.emit('close');
        }
        this.scheduleReconnect(brokerUrl, options);
      });
    });

    this.connectionPromise = attempt;
    try {
      await attempt;
    } finally {
      this.connectionPromise = null;
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Publish message to MQTT topic.
   * Rejects immediately when not connected.
   */
  async publish(topic: string, payload: string | Buffer, options: IClientPublishOptions = {}): Promise<void> {
    const client = this.client;
    if (!client || !this.connected) {
      throw new Error(`MQTT not connected - cannot publish to ${topic}`);
    }

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error(`MQTT publish timeout after ${this.PUBLISH_TIMEOUT_MS / 1000}s: ${topic}`));
      }, this.PUBLISH_TIMEOUT_MS);

      client.publish(topic, payload, options, (error) => {
        clearTimeout(timeout);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Disconnect and cancel any pending reconnect
   */
  async disconnect(): Promise<void> {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    const client = this.client;
    if (!client) {
      return;
    }

    await new Promise<void>((resolve) => {
      client.end(false, {}, () => resolve());
    });
    client.removeAllListeners();
    this.client = null;
    this.connected = false;
    this.logger.info('Disconnected from MQTT broker', { component: LogComponents.MQTT });
  }

  private scheduleReconnect(brokerUrl: string, options: IClientOptions): void {
    if (this.stopped || this.reconnectTimer) {
      return;
    }

    const delay = Math.min(
      this.BASE_RECONNECT_DELAY_MS * Math.pow(2, this.reconnectAttempts),
      this.MAX_RECONNECT_DELAY_MS
    );
    this.reconnectAttempts++;

    this.logger.info(`Reconnecting to MQTT broker in ${delay}ms`, {
      component: LogComponents.MQTT,
      attempt: this.reconnectAttempts
    });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect(brokerUrl, options).catch((error: unknown) => {
        // the 'close' handler of the failed attempt schedules the next one
        this.logger.warn('MQTT reconnect attempt failed', {
          component: LogComponents.MQTT,
          attempt: this.reconnectAttempts,
          error: describeError(error)
        });
      });
    }, delay);
  }

  private disposeClient(): void {
    if (!this.client) {
      return;
    }
    this.client.removeAllListeners();
    this.client.end(true);
    this.client = null;
  }
}
