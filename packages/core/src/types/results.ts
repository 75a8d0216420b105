import type { ValidationError } from '../errors.js';

/** Two-variant result for parse functions that must not throw */
export type ParseResult<T> =
  | { readonly type: 'success'; readonly value: T }
  | { readonly type: 'error'; readonly error: ValidationError };

export function isSuccess<T>(r: ParseResult<T>): r is { readonly type: 'success'; readonly value: T } {
  return r.type === 'success';
}

/** Unwrap a result, throwing the carried ValidationError on failure */
export function unwrap<T>(r: ParseResult<T>): T {
  if (r.type === 'error') throw r.error;
  return r.value;
}
