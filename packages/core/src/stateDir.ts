/**
 * Per-resource state directories
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { InvariantError, StateDirError } from './errors.js';

/** Directory name under the working directory used when nothing is configured */
export const DEFAULT_STATE_DIRNAME = 'var';

export function defaultStateRoot(cwd: string = process.cwd()): string {
  return path.join(cwd, DEFAULT_STATE_DIRNAME);
}

function assertSafeRelativePath(value: string, name: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvariantError(`${name} must be a non-empty relative path`);
  }
  if (value.includes('\0')) {
    throw new InvariantError(`${name} must not contain null bytes`);
  }
  if (path.isAbsolute(value)) {
    throw new InvariantError(`${name} must be a relative path`);
  }
  const segments = value.split(/[\\/]+/);
  if (segments.some((seg) => seg === '..')) {
    throw new InvariantError(`${name} must not contain ".." segments`);
  }
  return value;
}

export class StateDirectory {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Create (if needed) and return `<root>/<name>`
   */
  async resolve(name: string): Promise<string> {
    const safeName = assertSafeRelativePath(name, 'State directory name');
    const dirPath = path.join(this.root, safeName);
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (err) {
      throw new StateDirError(dirPath, err);
    }
    return dirPath;
  }
}
