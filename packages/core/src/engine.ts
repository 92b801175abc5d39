/**
 * Engine - evaluate, wait for an input to change, re-evaluate
 */

import type { Logger } from 'pino';
import { describeWatch, releaseAll, trackingExecutor } from './input.js';
import { logger as defaultLogger } from './logger.js';
import { describe } from './output.js';
import type { EngineOptions, Executor, Output, TraceFn, Watch } from './types.js';

export function defaultTrace<R>(log: Logger = defaultLogger): TraceFn<R> {
  return (result: Output<R>, watches: Watch[]) => {
    log.info(
      {
        result: describe(result),
        watching: watches.map(describeWatch),
      },
      'Evaluation complete'
    );
  };
}

/**
 * Resolves with true when any watch fires, false when `signal` aborts first
 */
function firstChange(watches: Watch[], signal: AbortSignal | undefined): Promise<boolean> {
  const changes = watches.map((watch) => watch.changed().then(() => true));
  if (!signal) {
    return Promise.race(changes);
  }
  if (signal.aborted) {
    return Promise.resolve(false);
  }
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<boolean>((resolve) => {
    onAbort = () => resolve(false);
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return Promise.race([...changes, aborted]).finally(() => {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  });
}

/**
 * Run `evaluate` forever, re-running it whenever an input it observed changes.
 * Evaluator failures propagate; only `options.signal` ends the loop normally.
 */
export async function runEngine<R>(
  evaluate: () => Output<R>,
  options: EngineOptions<R> = {}
): Promise<void> {
  const log = options.logger ?? defaultLogger;
  const trace = options.trace ?? defaultTrace<R>(log);
  const executor: Executor = options.executor ?? trackingExecutor;
  const { signal } = options;

  let oldWatches: Watch[] = [];
  for (;;) {
    log.info('Evaluating...');
    const { result, watches } = await executor.run(evaluate);
    // Release only now, so inputs used by both cycles stay subscribed
    releaseAll(oldWatches);
    trace(result, watches);

    log.info('Waiting for inputs to change...');
    const changed = await firstChange(watches, signal);
    if (!changed) {
      releaseAll(watches);
      log.info('Engine stopped');
      return;
    }
    oldWatches = watches;
  }
}

export const Engine = {
  run: runEngine,
};
