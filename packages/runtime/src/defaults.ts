/**
 * Defaulting helpers used by generated `applyDefaults` bodies.
 *
 * Absent means `undefined` or `null`. `false`, `0` and `''` are values and
 * are never replaced by a declared default.
 */

export type Maybe<T> = T | null | undefined;

export function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

export function orDefault<T>(value: Maybe<T>, fallback: T): T {
  return isAbsent(value) ? fallback : value;
}

/** Apply `fn` to a present value; absent values pass through as they are. */
export function mapPresent<T, U>(
  value: T | undefined,
  fn: (present: T) => U
): U | undefined;
export function mapPresent<T, U>(
  value: Maybe<T>,
  fn: (present: T) => U
): Maybe<U>;
export function mapPresent<T, U>(
  value: Maybe<T>,
  fn: (present: T) => U
): Maybe<U> {
  if (value === undefined || value === null) {
    return value;
  }
  return fn(value);
}

export function defaultList<T>(
  items: readonly T[],
  element: (item: T) => T
): T[] {
  return items.map((item) => element(item));
}

export function defaultSet<T>(
  items: ReadonlySet<T>,
  element: (item: T) => T
): Set<T> {
  return new Set(Array.from(items, (item) => element(item)));
}

export function defaultMap<K, V>(
  entries: ReadonlyMap<K, V>,
  key: (k: K) => K,
  value: (v: V) => V
): Map<K, V> {
  return new Map(Array.from(entries, ([k, v]) => [key(k), value(v)]));
}

export function identity<T>(value: T): T {
  return value;
}
