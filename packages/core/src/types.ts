/**
 * rewatch type definitions
 */

import type { Logger } from 'pino';

/**
 * Successful snapshot
 */
export interface Ok<T> {
  kind: 'ok';
  value: T;
}

/**
 * Failed snapshot (human-readable diagnostic)
 */
export interface Err {
  kind: 'error';
  message: string;
}

/**
 * Value not computed yet
 */
export interface Pending {
  kind: 'pending';
}

/**
 * Tri-state evaluation result
 */
export type Output<T> = Ok<T> | Err | Pending;

/**
 * What resource drivers return: a value or an error, never pending
 */
export type OrError<T> = Ok<T> | Err;

/**
 * Equality on payloads
 */
export type Equality<T> = (a: T, b: T) => boolean;

/**
 * One-shot change notification handle plus lifecycle hooks
 */
export interface Watch {
  /** Human-readable description */
  describe(): string;
  /** Resolves once, the first time the observed value may have changed. Always the same promise. */
  changed(): Promise<void>;
  /** Optional hook for an outer scheduler to abort a long wait */
  cancel?: () => void;
  /** Called exactly once when the consumer is done with this watch */
  release(): void;
}

/**
 * Watchable computation: a snapshot plus the watches consulted to produce it
 */
export type Input<T> = () => [Output<T>, Watch[]];

/**
 * Result of one evaluation
 */
export interface Evaluation<R> {
  result: Output<R>;
  /** Every watch touched anywhere in the evaluation */
  watches: Watch[];
}

/**
 * Term evaluator boundary
 */
export interface Executor {
  run<R>(evaluate: () => Output<R>): Evaluation<R> | Promise<Evaluation<R>>;
}

/**
 * Per-cycle trace sink
 */
export type TraceFn<R> = (result: Output<R>, watches: Watch[]) => void;

/**
 * Deregistration action returned by a driver's watch
 */
export type Unwatch = () => Promise<void>;

/**
 * External resource driver backing a Monitor
 */
export interface MonitorDriver<T> {
  /** Fetch the current value (called at most once per refresh pass) */
  read: () => Promise<OrError<T>>;
  /** Register `refresh` to be called on external change */
  watch: (refresh: () => void) => Promise<Unwatch>;
  /** Human-readable description of the resource */
  describe: () => string;
  /** Logger for state transitions, defaults to the shared logger */
  logger?: Logger;
}

/**
 * Engine run options
 */
export interface EngineOptions<R> {
  /** Called once per cycle after old watches are released */
  trace?: TraceFn<R>;
  /** Term evaluator, defaults to the tracking executor */
  executor?: Executor;
  /** Stops the loop: current watches are released and run() resolves */
  signal?: AbortSignal;
  logger?: Logger;
}
