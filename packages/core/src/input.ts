/**
 * Input helpers and the tracking executor
 */

import type { Evaluation, Executor, Input, Output, Watch } from './types.js';

export function ofFn<T>(fn: () => [Output<T>, Watch[]]): Input<T> {
  return fn;
}

export function get<T>(input: Input<T>): [Output<T>, Watch[]] {
  return input();
}

export function describeWatch(watch: Watch): string {
  return watch.describe();
}

export function releaseAll(watches: Watch[]): void {
  for (const watch of watches) {
    watch.release();
  }
}

let currentCollector: Watch[] | null = null;

function withCollector<T>(collector: Watch[], fn: () => T): T {
  const prev = currentCollector;
  currentCollector = collector;
  try {
    return fn();
  } finally {
    currentCollector = prev;
  }
}

/**
 * Read an input from inside an evaluation, recording its watches.
 * Outside an evaluation nothing can wait on the watches, so they are released at once.
 */
export function observe<T>(input: Input<T>): Output<T> {
  const [output, watches] = input();
  if (currentCollector) {
    currentCollector.push(...watches);
  } else {
    releaseAll(watches);
  }
  return output;
}

/**
 * Runs `evaluate` synchronously and collects every watch observed during it
 */
export const trackingExecutor = {
  run<R>(evaluate: () => Output<R>): Evaluation<R> {
    const watches: Watch[] = [];
    try {
      const result = withCollector(watches, evaluate);
      return { result, watches };
    } catch (err) {
      releaseAll(watches);
      throw err;
    }
  },
} satisfies Executor;
