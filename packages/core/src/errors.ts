/**
 * Fatal error types
 */

/**
 * Caller bug in watch lifecycle usage (or an invalid argument that can only
 * come from one). Never caught by the engine.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

/**
 * A state directory could not be created
 */
export class StateDirError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to create state directory ${path}: ${message}`, { cause });
    this.name = 'StateDirError';
    this.path = path;
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}
