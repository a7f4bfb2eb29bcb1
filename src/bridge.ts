/**
 * BACnet/MQTT Bridge Engine
 *
 * Wires the registry, discovery, poller, publish bridge and foreign
 * device registration together and exposes the control operations used
 * by the HTTP API.
 */

import type { BridgeConfig } from './config/schema';
import { ConfigError, DeviceNotFoundError, ObjectNotFoundError, describeError } from './errors';
import { LogComponents } from './logging/components';
import type { Logger } from './logging/types';
import { BacnetDevice, BacnetObject, objectKey } from './models/device.model';
import { MqttMapping, MqttMappingInput, MqttMappingStore } from './models/mqtt-mapping.model';
import { DeviceRegistry } from './registry/device-registry';
import { DiscoveryEngine, DiscoveryState } from './bacnet/discovery';
import { BacnetReaderWriter } from './bacnet/reader-writer';
import { PollingScheduler } from './bacnet/poller';
import { ForeignDeviceManager, RegistrationStatus } from './bacnet/foreign-device';
import { DatagramSocketFactory, defaultRegistrationStrategies } from './bacnet/registration-strategies';
import { BacstackTransport } from './bacnet/transport/bacstack-transport';
import type { BacnetTransport, PropertyValue, WritableValue } from './bacnet/types';
import { toPropertyValue } from './bacnet/types';
import { MqttManager } from './mqtt/manager';
import { MqttPublisher, PublishBridge } from './mqtt/publisher';
import { PeriodicTask } from './utils/task';

export interface BridgeStatus {
  running: boolean;
  devices: number;
  enabledDevices: number;
  mqttConnected: boolean;
  discovery: DiscoveryState;
  polling: boolean;
  publishing: boolean;
  foreignDevice: RegistrationStatus | null;
}

export interface ReadRequest {
  deviceId: number;
  objectType: string;
  objectInstance: number;
  propertyId: string;
  arrayIndex?: number;
}

export interface WriteRequest extends ReadRequest {
  value: WritableValue;
  priority?: number;
}

/**
 * Operations the control surface calls
 */
export interface BridgeControl {
  status(): BridgeStatus;
  listDevices(): BacnetDevice[];
  getDevice(deviceId: number): BacnetDevice;
  getObject(deviceId: number, objectType: string, objectInstance: number): BacnetObject;
  discover(lowLimit?: number, highLimit?: number, timeoutSeconds?: number): Promise<BacnetDevice[]>;
  discoverObjects(deviceId: number): Promise<BacnetObject[]>;
  read(request: ReadRequest): Promise<PropertyValue | null>;
  write(request: WriteRequest): Promise<void>;
  enable(deviceId: number): Promise<BacnetDevice>;
  disable(deviceId: number): Promise<BacnetDevice>;
  remove(deviceId: number): Promise<boolean>;
  triggerRegistration(): Promise<RegistrationStatus>;
  listMappings(): MqttMapping[];
  getMapping(deviceId: number, objectType: string, objectInstance: number): MqttMapping | undefined;
  upsertMapping(input: MqttMappingInput): Promise<MqttMapping>;
  removeMapping(deviceId: number, objectType: string, objectInstance: number): Promise<boolean>;
}

export interface BridgeDependencies {
  transport?: BacnetTransport;
  mqtt?: MqttManager;
  createSocket?: DatagramSocketFactory;
}

export class BridgeEngine implements BridgeControl {
  readonly registry: DeviceRegistry;
  readonly mappings: MqttMappingStore;
  private readonly transport: BacnetTransport;
  private readonly mqtt: MqttManager;
  private readonly readerWriter: BacnetReaderWriter;
  private readonly discovery: DiscoveryEngine;
  private readonly poller: PollingScheduler;
  private readonly publishBridge: PublishBridge;
  private readonly foreignDevice: ForeignDeviceManager | null;
  private readonly periodicDiscovery: PeriodicTask;
  private running = false;

  constructor(
    private readonly config: BridgeConfig,
    private readonly logger: Logger,
    deps: BridgeDependencies = {}
  ) {
    const { bacnet, discovery, polling, mqtt, storage } = config;

    this.registry = new DeviceRegistry(storage.devicesFile, logger);
    this.mappings = new MqttMappingStore(storage.mappingsFile, logger);
    this.transport = deps.transport ?? new BacstackTransport({
      interface: bacnet.interface,
      port: bacnet.port,
      broadcastAddress: bacnet.broadcastAddress,
      apduTimeout: bacnet.apduTimeout,
      deviceId: bacnet.deviceId,
      vendorId: bacnet.vendorId
    }, logger);
    this.mqtt = deps.mqtt ?? new MqttManager(logger);

    this.readerWriter = new BacnetReaderWriter(this.transport, logger, {
      readTimeout: bacnet.readTimeout,
      presentValueObjectTypes: polling.presentValueObjectTypes,
      unitObjectTypes: polling.unitObjectTypes
    });
    this.discovery = new DiscoveryEngine(this.transport, this.readerWriter, this.registry, logger);
    this.discovery.setDiscoveryCallback((device, signal) => this.onDeviceDiscovered(device, signal));

    this.poller = new PollingScheduler(this.registry, this.readerWriter, logger, {
      interval: polling.interval,
      deviceTimeout: polling.deviceTimeout,
      properties: polling.properties
    });

    const publisher = new MqttPublisher(this.mqtt, this.mappings, logger, {
      topicPrefix: mqtt.topicPrefix,
      qos: mqtt.qos,
      retain: mqtt.retain
    });
    this.publishBridge = new PublishBridge(publisher, this.registry, logger, mqtt.publishInterval);

    const fd = bacnet.foreignDevice;
    this.foreignDevice = fd.enabled && fd.address
      ? new ForeignDeviceManager(
        { host: fd.address, port: fd.port },
        fd.ttl,
        defaultRegistrationStrategies(this.transport, deps.createSocket),
        logger
      )
      : null;

    this.periodicDiscovery = new PeriodicTask(
      {
        name: 'Periodic discovery',
        intervalMs: discovery.interval * 1000,
        logger,
        component: LogComponents.DISCOVERY
      },
      async (signal) => {
        await this.discovery.discover(discovery.lowLimit, discovery.highLimit, discovery.whoIsTimeout, signal);
        await this.registry.persist();
      }
    );
  }

  /**
   * Load saved state and open the BACnet transport.
   * A transport that cannot be opened is fatal.
   */
  async init(): Promise<void> {
    await this.registry.load();
    await this.mappings.load();
    await this.transport.open();
    this.logger.info('Bridge initialized', {
      component: LogComponents.GATEWAY,
      devices: this.registry.size
    });
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    const { mqtt, polling, discovery } = this.config;

    if (mqtt.enabled) {
      try {
        await this.mqtt.connect(mqtt.brokerUrl, {
          clientId: mqtt.clientId,
          username: mqtt.username,
          password: mqtt.password,
          keepalive: mqtt.keepalive
        });
      } catch (error) {
        this.logger.warn('MQTT broker unavailable, will keep retrying', {
          component: LogComponents.GATEWAY,
          error: describeError(error)
        });
      }
      this.publishBridge.start();
    }

    if (polling.enabled) {
      this.poller.start();
    }

    if (this.foreignDevice) {
      await this.foreignDevice.start();
    }

    if (discovery.autoDiscover) {
      this.periodicDiscovery.start();
    }

    this.logger.info('Bridge started', {
      component: LogComponents.GATEWAY,
      mqtt: mqtt.enabled,
      polling: polling.enabled,
      foreignDevice: this.foreignDevice !== null,
      autoDiscover: discovery.autoDiscover
    });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.logger.info('Stopping bridge', { component: LogComponents.GATEWAY });

    await this.periodicDiscovery.stop();
    await this.poller.stop();
    await this.publishBridge.stop();
    if (this.foreignDevice) {
      await this.foreignDevice.stop();
    }

    try {
      await this.mqtt.disconnect();
    } catch (error) {
      this.logger.warn('MQTT disconnect failed', {
        component: LogComponents.GATEWAY,
        error: describeError(error)
      });
    }

    await this.transport.close();
    await this.registry.persist();
    this.logger.info('Bridge stopped', { component: LogComponents.GATEWAY });
  }

  status(): BridgeStatus {
    return {
      running: this.running,
      devices: this.registry.size,
      enabledDevices: this.registry.enabled().length,
      mqttConnected: this.mqtt.isConnected(),
      discovery: this.discovery.state,
      polling: this.poller.running,
      publishing: this.publishBridge.running,
      foreignDevice: this.foreignDevice ? this.foreignDevice.status() : null
    };
  }

  listDevices(): BacnetDevice[] {
    return this.registry.all();
  }

  getDevice(deviceId: number): BacnetDevice {
    const device = this.registry.get(deviceId);
    if (!device) {
      throw new DeviceNotFoundError(deviceId);
    }
    return device;
  }

  getObject(deviceId: number, objectType: string, objectInstance: number): BacnetObject {
    const obj = this.getDevice(deviceId).getObject(objectType, objectInstance);
    if (!obj) {
      throw new ObjectNotFoundError(deviceId, objectKey(objectType, objectInstance));
    }
    return obj;
  }

  async discover(lowLimit?: number, highLimit?: number, timeoutSeconds?: number): Promise<BacnetDevice[]> {
    const devices = await this.discovery.discover(
      lowLimit,
      highLimit,
      timeoutSeconds ?? this.config.discovery.whoIsTimeout
    );
    await this.registry.persist();
    return devices;
  }

  async discoverObjects(deviceId: number): Promise<BacnetObject[]> {
    const device = this.getDevice(deviceId);
    const objects = await this.discovery.discoverDeviceObjects(device);
    await this.registry.persist();
    return objects;
  }

  async read(request: ReadRequest): Promise<PropertyValue | null> {
    const device = this.getDevice(request.deviceId);
    const value = await this.readerWriter.readProperty(
      device,
      request.objectType,
      request.objectInstance,
      request.propertyId,
      request.arrayIndex
    );
    return value === null ? null : toPropertyValue(value);
  }

  async write(request: WriteRequest): Promise<void> {
    const device = this.getDevice(request.deviceId);
    await this.readerWriter.writeProperty(
      device,
      request.objectType,
      request.objectInstance,
      request.propertyId,
      request.value,
      { priority: request.priority, arrayIndex: request.arrayIndex }
    );
  }

  async enable(deviceId: number): Promise<BacnetDevice> {
    return this.setEnabled(deviceId, true);
  }

  async disable(deviceId: number): Promise<BacnetDevice> {
    return this.setEnabled(deviceId, false);
  }

  async remove(deviceId: number): Promise<boolean> {
    const removed = this.registry.remove(deviceId);
    if (removed) {
      await this.registry.persist();
      this.logger.info('Device removed', { component: LogComponents.GATEWAY, deviceId });
    }
    return removed;
  }

  /**
   * Register with the BBMD now. Rejects with RegistrationError when
   * every strategy fails.
   */
  async triggerRegistration(): Promise<RegistrationStatus> {
    if (!this.foreignDevice) {
      throw new ConfigError('Foreign device registration is not configured');
    }
    await this.foreignDevice.register();
    return this.foreignDevice.status();
  }

  listMappings(): MqttMapping[] {
    return this.mappings.all();
  }

  getMapping(deviceId: number, objectType: string, objectInstance: number): MqttMapping | undefined {
    return this.mappings.get(deviceId, objectType, objectInstance);
  }

  upsertMapping(input: MqttMappingInput): Promise<MqttMapping> {
    return this.mappings.upsert(input);
  }

  removeMapping(deviceId: number, objectType: string, objectInstance: number): Promise<boolean> {
    return this.mappings.remove(deviceId, objectType, objectInstance);
  }

  private async setEnabled(deviceId: number, enabled: boolean): Promise<BacnetDevice> {
    const device = this.getDevice(deviceId);
    device.enabled = enabled;
    await this.registry.persist();
    this.logger.info(`Device ${enabled ? 'enabled' : 'disabled'}`, {
      component: LogComponents.GATEWAY,
      deviceId
    });
    return device;
  }

  private async onDeviceDiscovered(device: BacnetDevice, signal?: AbortSignal): Promise<void> {
    if (this.config.discovery.discoverObjects && device.objects.size === 0) {
      await this.discovery.discoverDeviceObjects(device, signal);
    }
    await this.registry.persist();
  }
}
