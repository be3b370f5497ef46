/**
 * Per-type arbitraries
 *
 * Leaves of the "generator for type T" primitive. Generated test-data
 * modules and the in-process interpreter both build their generators out of
 * these, so a schema draws the same way whichever lowering produced it.
 *
 * Container and optional helpers take a thunk for their inner arbitrary: at
 * the depth limit the thunk is never called, which is what keeps generator
 * construction finite for self-referential entities.
 */

import fc from 'fast-check';
import { faker } from '@faker-js/faker';

import { atDepthLimit, type TestDataContext } from './context.js';

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

export function bool(): fc.Arbitrary<boolean> {
  return fc.boolean();
}

export function byte(): fc.Arbitrary<number> {
  return fc.integer({ min: -128, max: 127 });
}

export function i16(): fc.Arbitrary<number> {
  return fc.integer({ min: -32_768, max: 32_767 });
}

export function i32(): fc.Arbitrary<number> {
  return fc.integer({ min: -2_147_483_648, max: 2_147_483_647 });
}

export function i64(): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: I64_MIN, max: I64_MAX });
}

export function double(): fc.Arbitrary<number> {
  return fc.double({ noNaN: true, noDefaultInfinity: true });
}

export function string(context: TestDataContext): fc.Arbitrary<string> {
  if (context.strings === 'lorem') {
    // faker is reseeded from a fast-check draw so samples stay reproducible
    // under fc's own seed and shrink like integers
    const maxWords = Math.max(1, context.maxCollectionSize);
    return fc.noBias(fc.integer()).map((seed) => {
      faker.seed(seed);
      return faker.lorem.words({ min: 1, max: maxWords });
    });
  }
  return fc.string({ maxLength: context.maxCollectionSize * 4 });
}

export function binary(context: TestDataContext): fc.Arbitrary<Uint8Array> {
  return fc.uint8Array({ maxLength: context.maxCollectionSize });
}

/** Uniform choice among declared enum values. */
export function member<T>(first: T, ...rest: T[]): fc.Arbitrary<T> {
  return fc.constantFrom(first, ...rest);
}

/**
 * Generator whose every draw is a fresh, structurally identical value.
 */
export function point<T>(make: () => T): fc.Arbitrary<T> {
  return fc.constant(undefined).map(() => make());
}

export function optional<T>(
  value: () => fc.Arbitrary<T>,
  context: TestDataContext
): fc.Arbitrary<T | undefined> {
  if (atDepthLimit(context)) {
    return fc.constant(undefined);
  }
  return fc.oneof(value(), fc.constant(undefined));
}

export function listOf<T>(
  element: () => fc.Arbitrary<T>,
  context: TestDataContext
): fc.Arbitrary<T[]> {
  if (atDepthLimit(context)) {
    return point((): T[] => []);
  }
  return fc.array(element(), { maxLength: context.maxCollectionSize });
}

export function setOf<T>(
  element: () => fc.Arbitrary<T>,
  context: TestDataContext
): fc.Arbitrary<Set<T>> {
  if (atDepthLimit(context)) {
    return point(() => new Set<T>());
  }
  return fc
    .uniqueArray(element(), {
      maxLength: context.maxCollectionSize,
      comparator: 'SameValueZero',
    })
    .map((items) => new Set(items));
}

export function mapOf<K, V>(
  key: () => fc.Arbitrary<K>,
  value: () => fc.Arbitrary<V>,
  context: TestDataContext
): fc.Arbitrary<Map<K, V>> {
  if (atDepthLimit(context)) {
    return point(() => new Map<K, V>());
  }
  return fc
    .uniqueArray(fc.tuple(key(), value()), {
      maxLength: context.maxCollectionSize,
      selector: (entry) => entry[0],
      comparator: 'SameValueZero',
    })
    .map((entries) => new Map(entries));
}
