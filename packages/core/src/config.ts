/**
 * Process configuration
 */

import * as path from 'path';
import { z } from 'zod';
import { defaultStateRoot } from './stateDir.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  REWATCH_STATE_DIR: z.string().trim().min(1).optional(),
  LOG_LEVEL: z
    .string()
    .transform((level) => level.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
});

export interface EngineConfig {
  /** Root under which state directories are created */
  stateDirRoot: string;
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Build the configuration from environment variables.
 * A relative REWATCH_STATE_DIR is resolved against `cwd`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const { REWATCH_STATE_DIR, LOG_LEVEL } = parsed.data;
  return {
    stateDirRoot: REWATCH_STATE_DIR ? path.resolve(cwd, REWATCH_STATE_DIR) : defaultStateRoot(cwd),
    logLevel: LOG_LEVEL ?? 'info',
  };
}
