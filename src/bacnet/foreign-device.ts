/**
 * Foreign Device Registration Manager
 *
 * Keeps a foreign-device registration alive with a BBMD so the bridge
 * receives broadcasts from a remote BACnet/IP subnet.
 *
 *   unregistered -> registering -> registered (renew every max(ttl/2, 5)s)
 *   registered -> unregistering -> unregistered
 *
 * A failed renewal is logged and retried at the next interval; it never
 * drops the registration state or stops the renewal loop.
 */

import { PeriodicTask } from '../utils/task';
import { RegistrationError, describeError } from '../errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/types';
import { MIN_RENEWAL_INTERVAL } from './constants';
import type { RegistrationStrategy } from './registration-strategies';
import type { RelayAddress } from './types';

export type RegistrationState = 'unregistered' | 'registering' | 'registered' | 'unregistering';

export interface RegistrationStatus {
  state: RegistrationState;
  relay: string;
  ttl: number;
  renewalInterval: number;
  lastRegistered: string | null;
  lastStrategy: string | null;
}

/**
 * Seconds between renewals for a TTL: half the TTL, never below 5
 */
export function renewalInterval(ttl: number): number {
  return Math.max(Math.floor(ttl / 2), MIN_RENEWAL_INTERVAL);
}

export class ForeignDeviceManager {
  private _state: RegistrationState = 'unregistered';
  private renewal: PeriodicTask | null = null;
  private lastRegistered: string | null = null;
  private lastStrategy: string | null = null;

  constructor(
    private readonly relay: RelayAddress,
    private readonly ttl: number,
    private readonly strategies: readonly RegistrationStrategy[],
    private readonly logger: Logger
  ) {}

  get state(): RegistrationState {
    return this._state;
  }

  get relayLabel(): string {
    return `${this.relay.host}:${this.relay.port}`;
  }

  status(): RegistrationStatus {
    return {
      state: this._state,
      relay: this.relayLabel,
      ttl: this.ttl,
      renewalInterval: renewalInterval(this.ttl),
      lastRegistered: this.lastRegistered,
      lastStrategy: this.lastStrategy
    };
  }

  /**
   * Register and start renewing. Failure is logged; the bridge keeps
   * running without relay reachability.
   */
  async start(): Promise<boolean> {
    if (this.renewal) {
      return true;
    }
    try {
      await this.register();
      return true;
    } catch (error) {
      this.logger.error('Foreign device registration failed', {
        component: LogComponents.FOREIGN_DEVICE,
        relay: this.relayLabel,
        error: describeError(error)
      });
      return false;
    }
  }

  /**
   * Register now, trying each strategy in order. Starts the renewal loop
   * on first success. Rejects with RegistrationError when all fail.
   */
  async register(): Promise<string> {
    const previous = this._state;
    this._state = 'registering';
    try {
      const strategy = await this.attempt(this.ttl);
      this._state = 'registered';
      this.lastRegistered = new Date().toISOString();
      this.lastStrategy = strategy;
      this.logger.info('Registered as foreign device', {
        component: LogComponents.FOREIGN_DEVICE,
        relay: this.relayLabel,
        ttl: this.ttl,
        strategy
      });
      this.startRenewal();
      return strategy;
    } catch (error) {
      this._state = previous === 'registered' ? 'registered' : 'unregistered';
      throw error;
    }
  }

  /**
   * Stop renewing and ask the BBMD to drop the registration (TTL 0).
   * Deregistration failure is logged and otherwise ignored.
   */
  async stop(): Promise<void> {
    if (this.renewal) {
      await this.renewal.stop();
      this.renewal = null;
    }
    if (this._state !== 'registered') {
      this._state = 'unregistered';
      return;
    }

    this._state = 'unregistering';
    try {
      await this.attempt(0);
      this.logger.info('Foreign device registration released', {
        component: LogComponents.FOREIGN_DEVICE,
        relay: this.relayLabel
      });
    } catch (error) {
      this.logger.warn('Foreign device deregistration failed', {
        component: LogComponents.FOREIGN_DEVICE,
        relay: this.relayLabel,
        error: describeError(error)
      });
    } finally {
      this._state = 'unregistered';
    }
  }

  private startRenewal(): void {
    if (this.renewal) {
      return;
    }
    const interval = renewalInterval(this.ttl);
    this.renewal = new PeriodicTask(
      {
        name: 'Foreign device renewal',
        intervalMs: interval * 1000,
        runImmediately: false,
        logger: this.logger,
        component: LogComponents.FOREIGN_DEVICE
      },
      async () => {
        await this.renew();
      }
    );
    this.renewal.start();
    this.logger.debug(`Renewing registration every ${interval}s`, {
      component: LogComponents.FOREIGN_DEVICE,
      relay: this.relayLabel
    });
  }

  private async renew(): Promise<void> {
    try {
      const strategy = await this.attempt(this.ttl);
      this.lastRegistered = new Date().toISOString();
      this.lastStrategy = strategy;
      this.logger.debug('Foreign device registration renewed', {
        component: LogComponents.FOREIGN_DEVICE,
        relay: this.relayLabel,
        strategy
      });
    } catch (error) {
      this.logger.warn('Foreign device renewal failed, retrying next interval', {
        component: LogComponents.FOREIGN_DEVICE,
        relay: this.relayLabel,
        error: describeError(error)
      });
    }
  }

  private async attempt(ttl: number): Promise<string> {
    const failures: Array<{ strategy: string; error: string }> = [];

    for (const strategy of this.strategies) {
      try {
        await strategy.register(this.relay, ttl);
        return strategy.name;
      } catch (error) {
        failures.push({ strategy: strategy.name, error: describeError(error) });
        this.logger.debug(`Registration strategy ${strategy.name} failed`, {
          component: LogComponents.FOREIGN_DEVICE,
          relay: this.relayLabel,
          error: describeError(error)
        });
      }
    }

    throw new RegistrationError(this.relayLabel, failures);
  }
}
