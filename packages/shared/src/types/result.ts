/**
 * Result type for pipeline stages; nothing throws across module boundaries.
 *
 * Usage:
 *   const staged = ok(rows);
 *   const failed = err(AppError.create('PIPELINE_READ_FAILED', 'Could not read raw rows.'));
 *
 *   if (staged.ok) {
 *     use(staged.value);
 *   } else {
 *     report(staged.error);
 *   }
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
