/**
 * rewatch - reactive re-evaluation engine
 *
 * Core concepts:
 * - An evaluation reports the inputs it observed as watches
 * - The engine waits for the first watch to fire, then re-evaluates
 * - Monitors share one subscription per external resource
 */

export { runEngine, defaultTrace, Engine } from './engine.js';
export { Monitor, createMonitor } from './monitor.js';
export { Var } from './variable.js';
export { Condition } from './condition.js';
export { ofFn, get, observe, describeWatch, releaseAll, trackingExecutor } from './input.js';
export {
  ok,
  error,
  pending,
  isOk,
  isError,
  isPending,
  fromError,
  map as mapOutput,
  equal as equalOutput,
  describe as describeOutput,
} from './output.js';
export { StateDirectory, defaultStateRoot, DEFAULT_STATE_DIRNAME } from './stateDir.js';
export { loadConfig, LOG_LEVELS } from './config.js';
export type { EngineConfig } from './config.js';
export { InvariantError, StateDirError, invariant } from './errors.js';
export { logger, createLogger, resolveLogLevel } from './logger.js';
export type { LogLevel } from './logger.js';

export type {
  Output,
  Ok,
  Err,
  Pending,
  OrError,
  Equality,
  Watch,
  Input,
  Evaluation,
  Executor,
  TraceFn,
  Unwatch,
  MonitorDriver,
  EngineOptions,
} from './types.js';
