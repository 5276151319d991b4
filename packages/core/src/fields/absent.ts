/**
 * Marker drawn in place of a value when a field of a partial record is left
 * out of the payload. Distinct from `null`, `undefined` and empty lists,
 * which are all legitimate values for some kinds.
 */
export const ABSENT: unique symbol = Symbol('recordgen.absent');

export type Absent = typeof ABSENT;

export type Maybe<T> = T | Absent;

export function isAbsent<T>(value: Maybe<T>): value is Absent {
  return value === ABSENT;
}
