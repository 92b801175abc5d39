/**
 * Monitor - turns an external resource into a cached, ref-counted input
 *
 * Core concepts:
 * - Every consumer shares one subscription and one cached value
 * - At most one background task per monitor, started on the first get and
 *   stopped once the last watch is released
 * - A refresh that arrives while a read is in flight triggers one more read
 */

import type { Logger } from 'pino';
import { Condition } from './condition.js';
import { invariant } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import { fromError, pending } from './output.js';
import type { Input, MonitorDriver, Output, OrError, Unwatch, Watch } from './types.js';

export class Monitor<T> {
  private readonly driver: MonitorDriver<T>;
  private readonly log: Logger;
  private current: Output<T> = pending();
  /** Number of unreleased watches */
  private refs = 0;
  /** Update detected after the current read started */
  private needRefresh = true;
  /** Background task is running */
  private running = false;
  private task: Promise<void> | null = null;
  /** Maybe time to leave the waiting state */
  private readonly cond = new Condition();
  /** New value ready for consumers */
  private readonly externalCond = new Condition();

  /** This monitor as an Input */
  readonly input: Input<T> = () => this.get();

  constructor(driver: MonitorDriver<T>) {
    this.driver = driver;
    this.log = driver.logger ?? defaultLogger;
  }

  get value(): Output<T> {
    return this.current;
  }

  get refCount(): number {
    return this.refs;
  }

  get active(): boolean {
    return this.running;
  }

  /**
   * Watches still waiting for the next published value
   */
  get waiting(): number {
    return this.externalCond.waiting;
  }

  /**
   * Resolves once the background task has exited
   */
  async whenInactive(): Promise<void> {
    while (this.task) {
      const task = this.task;
      await task;
      if (this.task === task) this.task = null;
    }
  }

  get(): [Output<T>, Watch[]] {
    this.refs++;
    if (!this.running) {
      this.running = true;
      this.task = this.lifecycle().catch((err: unknown) => {
        this.log.fatal({ err, monitor: this.driver.describe() }, 'Monitor task crashed');
        throw err;
      });
    }
    // (else the running task checks refs before it exits)
    const abandoned = new AbortController();
    const changed = this.externalCond.wait(abandoned.signal);
    let released = false;
    const watch: Watch = {
      describe: () => this.driver.describe(),
      changed: () => changed,
      release: () => {
        invariant(!released, `Watch on ${this.driver.describe()} released twice`);
        invariant(this.refs > 0, `Watch on ${this.driver.describe()} released with no references`);
        released = true;
        abandoned.abort();
        this.refs--;
        if (this.refs === 0) this.cond.broadcast();
      },
    };
    return [this.current, [watch]];
  }

  /**
   * Passed to the driver's watch; safe to call at any time
   */
  private readonly refresh = (): void => {
    this.needRefresh = true;
    this.cond.broadcast();
  };

  private async lifecycle(): Promise<void> {
    for (;;) {
      const unwatch = await this.install();
      if (unwatch) {
        if (this.refs > 0) await this.serve();
      } else {
        // Nothing will call refresh: keep serving the error until nobody uses it
        await this.waitUntilUnused();
      }

      if (unwatch) await this.uninstall(unwatch);
      if (this.refs === 0) {
        invariant(this.running, 'Monitor task exiting while inactive');
        this.running = false;
        // A reactivated monitor must not start by serving a stale value
        this.current = pending();
        this.log.debug({ monitor: this.driver.describe() }, 'Monitor stopped');
        return;
      }
      this.log.debug({ monitor: this.driver.describe() }, 'Resubscribing');
    }
  }

  private async install(): Promise<Unwatch | null> {
    this.log.debug({ monitor: this.driver.describe() }, 'Installing watch');
    try {
      return await this.driver.watch(this.refresh);
    } catch (err) {
      this.log.error({ err, monitor: this.driver.describe() }, 'Failed to install watch');
      this.publish(fromError(err));
      return null;
    }
  }

  private async uninstall(unwatch: Unwatch): Promise<void> {
    this.log.debug({ monitor: this.driver.describe() }, 'Removing watch');
    try {
      await unwatch();
    } catch (err) {
      this.log.error({ err, monitor: this.driver.describe() }, 'Failed to remove watch');
    }
  }

  /**
   * Read, then wait for a refresh, until the last watch is released
   */
  private async serve(): Promise<void> {
    for (;;) {
      this.needRefresh = false;
      this.publish(await this.read());

      while (this.refs > 0 && !this.needRefresh) {
        await this.cond.wait();
      }
      if (this.refs === 0) return;
    }
  }

  private async read(): Promise<OrError<T>> {
    this.log.debug({ monitor: this.driver.describe() }, 'Reading');
    try {
      return await this.driver.read();
    } catch (err) {
      return fromError(err);
    }
  }

  private async waitUntilUnused(): Promise<void> {
    while (this.refs > 0) {
      await this.cond.wait();
    }
  }

  private publish(value: Output<T>): void {
    this.current = value;
    this.externalCond.broadcast();
  }
}

export function createMonitor<T>(driver: MonitorDriver<T>): Input<T> {
  return new Monitor(driver).input;
}
