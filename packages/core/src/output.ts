/**
 * Output helpers
 */

import type { Equality, Err, Ok, Output, Pending } from './types.js';

export function ok<T>(value: T): Ok<T> {
  return { kind: 'ok', value };
}

export function error(message: string): Err {
  return { kind: 'error', message };
}

export function pending(): Pending {
  return { kind: 'pending' };
}

export function isOk<T>(output: Output<T>): output is Ok<T> {
  return output.kind === 'ok';
}

export function isError<T>(output: Output<T>): output is Err {
  return output.kind === 'error';
}

export function isPending<T>(output: Output<T>): output is Pending {
  return output.kind === 'pending';
}

/**
 * Turn a thrown value into an Error output
 */
export function fromError(err: unknown): Err {
  return error(err instanceof Error ? err.message : String(err));
}

export function map<A, B>(output: Output<A>, fn: (value: A) => B): Output<B> {
  return output.kind === 'ok' ? ok(fn(output.value)) : output;
}

/**
 * Change-detection equality.
 * Ok payloads use `eq`; errors compare by message; pending equals pending.
 */
export function equal<T>(eq: Equality<T>, a: Output<T>, b: Output<T>): boolean {
  switch (a.kind) {
    case 'ok':
      return b.kind === 'ok' && eq(a.value, b.value);
    case 'error':
      return b.kind === 'error' && a.message === b.message;
    case 'pending':
      return b.kind === 'pending';
  }
}

function defaultDescribeValue(value: unknown): string {
  if (value === undefined) return '()';
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}

export function describe<T>(
  output: Output<T>,
  describeValue: (value: T) => string = defaultDescribeValue
): string {
  switch (output.kind) {
    case 'ok':
      return `Ok: ${describeValue(output.value)}`;
    case 'error':
      return `Error: ${output.message}`;
    case 'pending':
      return 'Pending';
  }
}
