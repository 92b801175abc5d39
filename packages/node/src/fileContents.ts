/**
 * File contents as a watchable input
 *
 * Reads the file when first observed and again after chokidar reports
 * that it was added, changed or removed. Every consumer of one path shares
 * one Monitor, hence one chokidar watcher.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import chokidar from 'chokidar';
import type { Logger } from 'pino';
import { Monitor, fromError, logger, ok } from '@rewatch/core';
import type { Input, OrError } from '@rewatch/core';

/**
 * The part of a chokidar watcher the driver uses
 */
export interface FileWatcherLike {
  on(event: 'add' | 'change' | 'unlink', handler: (filePath: string) => void): unknown;
  on(event: 'error', handler: (error: unknown) => void): unknown;
  close(): Promise<void>;
}

export interface FileContentsOptions {
  /** Replaces chokidar, e.g. in tests */
  createWatcher?: (filePath: string) => FileWatcherLike;
  logger?: Logger;
}

const monitors = new Map<string, Monitor<string>>();

function createChokidarWatcher(filePath: string): FileWatcherLike {
  return chokidar.watch(filePath, {
    persistent: true,
    ignoreInitial: true,
  });
}

export async function readFileOutput(filePath: string): Promise<OrError<string>> {
  try {
    return ok(await fs.readFile(filePath, 'utf-8'));
  } catch (err) {
    return fromError(err);
  }
}

/**
 * Input yielding the UTF-8 contents of `filePath`.
 * Inputs are memoized per resolved path: the options of the first call win
 * until clearFileInputs forgets the path.
 */
export function fileContents(filePath: string, options: FileContentsOptions = {}): Input<string> {
  const resolved = path.resolve(filePath);
  const existing = monitors.get(resolved);
  if (existing) {
    return existing.input;
  }

  const createWatcher = options.createWatcher ?? createChokidarWatcher;
  const log = options.logger ?? logger;
  const monitor = new Monitor<string>({
    describe: () => `file ${resolved}`,
    logger: log,
    read: () => readFileOutput(resolved),
    watch: async (refresh) => {
      const watcher = createWatcher(resolved);
      watcher.on('add', refresh);
      watcher.on('change', refresh);
      watcher.on('unlink', refresh);
      watcher.on('error', (error: unknown) => {
        log.warn({ err: error, file: resolved }, 'File watcher error');
        refresh();
      });
      return () => watcher.close();
    },
  });
  monitors.set(resolved, monitor);
  return monitor.input;
}

/**
 * The shared monitor behind `filePath`, if one was created
 */
export function fileMonitor(filePath: string): Monitor<string> | undefined {
  return monitors.get(path.resolve(filePath));
}

/**
 * Forget every memoized file input (inactive monitors only)
 */
export function clearFileInputs(): void {
  for (const [key, monitor] of monitors) {
    if (!monitor.active) monitors.delete(key);
  }
}
