/**
 * Polling Scheduler
 *
 * Polls every enabled device on a fixed interval. Each device gets its
 * own time budget, so a device that stops answering only costs its own
 * slot in the cycle. The registry is saved after every cycle.
 */

import { PeriodicTask, linkedAbortController, withTimeout } from '../utils/task';
import { describeError, isAbortError } from '../errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';
import type { DeviceRegistry } from '../registry/device-registry';
import type { BacnetReaderWriter } from './reader-writer';
import { getBacnetErrorType } from './errors';

export interface PollerSettings {
  interval: number; // seconds
  deviceTimeout: number; // seconds
  properties: readonly string[];
}

export interface PollCycleResult {
  polled: number;
  failed: number;
  values: number;
}

export class PollingScheduler {
  private readonly task: PeriodicTask;

  constructor(
    private readonly registry: DeviceRegistry,
    private readonly readerWriter: BacnetReaderWriter,
    private readonly logger: Logger,
    private readonly settings: PollerSettings
  ) {
    this.task = new PeriodicTask(
      {
        name: 'Poll cycle',
        intervalMs: settings.interval * 1000,
        logger,
        component: LogComponents.POLLER
      },
      async (signal) => {
        await this.runCycle(signal);
      }
    );
  }

  get running(): boolean {
    return this.task.running;
  }

  start(): void {
    if (this.task.running) {
      return;
    }
    this.task.start();
    this.logger.info('Polling started', {
      component: LogComponents.POLLER,
      interval: this.settings.interval,
      properties: this.settings.properties
    });
  }

  async stop(): Promise<void> {
    if (!this.task.running) {
      return;
    }
    await this.task.stop();
    this.logger.info('Polling stopped', { component: LogComponents.POLLER });
  }

  /**
   * One pass over the enabled devices, then persist
   */
  async runCycle(signal?: AbortSignal): Promise<PollCycleResult> {
    const devices = this.registry.enabled();
    const result: PollCycleResult = { polled: 0, failed: 0, values: 0 };
    const timeoutMs = this.settings.deviceTimeout * 1000;

    try {
      for (const device of devices) {
        if (signal?.aborted) {
          break;
        }

        const { controller, release } = linkedAbortController(signal);
        try {
          result.values += await withTimeout(
            this.readerWriter.pollDeviceObjects(device, this.settings.properties, controller.signal),
            timeoutMs,
            `poll device ${device.deviceId}`,
            signal
          );
          result.polled++;
        } catch (error) {
          if (signal?.aborted && isAbortError(error)) {
            break;
          }
          result.failed++;
          this.logger.warn('Device poll failed', {
            component: LogComponents.POLLER,
            deviceId: device.deviceId,
            errorType: getBacnetErrorType(error),
            error: describeError(error)
          });
        } finally {
          // stop a timed-out poll from issuing further reads
          controller.abort();
          release();
        }
      }
    } finally {
      await this.registry.persist();
    }

    this.logger.debug('Poll cycle complete', {
      component: LogComponents.POLLER,
      ...result
    });
    return result;
  }
}
