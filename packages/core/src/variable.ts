/**
 * Var - a mutable reactive cell usable as a leaf input
 */

import { Condition } from './condition.js';
import { equal } from './output.js';
import type { Equality, Input, Output, Watch } from './types.js';

export class Var<T> {
  readonly name: string;
  private value: Output<T>;
  private readonly equals: Equality<T>;
  private readonly cond = new Condition();

  /** This Var as an Input */
  readonly input: Input<T> = () => this.get();

  constructor(name: string, initial: Output<T>, equals: Equality<T> = Object.is) {
    this.name = name;
    this.value = initial;
    this.equals = equals;
  }

  /**
   * Current value, without creating a watch
   */
  get current(): Output<T> {
    return this.value;
  }

  get(): [Output<T>, Watch[]] {
    return [this.value, [this.watch()]];
  }

  /**
   * Replace the value and wake every waiter, even if the value is unchanged.
   * Waiters filter out broadcasts that did not change anything.
   */
  set(value: Output<T>): void {
    this.value = value;
    this.cond.broadcast();
  }

  /**
   * Single-writer: concurrent callers must serialize their updates
   */
  update(fn: (current: Output<T>) => Output<T>): void {
    this.set(fn(this.value));
  }

  /**
   * Watches still waiting for a change
   */
  get waiting(): number {
    return this.cond.waiting;
  }

  private watch(): Watch {
    const seen = this.value;
    const abandoned = new AbortController();
    let changed: Promise<void> | null = null;

    const waitForChange = async (): Promise<void> => {
      while (equal(this.equals, this.value, seen)) {
        await this.cond.wait(abandoned.signal);
      }
    };

    return {
      describe: () => this.name,
      changed: () => {
        if (!changed) changed = waitForChange();
        return changed;
      },
      // Nothing is ref-counted; only the pending wait is withdrawn
      release: () => abandoned.abort(),
    };
  }
}
