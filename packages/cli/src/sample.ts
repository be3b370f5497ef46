/**
 * In-process sampling for the `sample` command
 */

import fc from 'fast-check';
import type { TestDataRegistry } from '@idlgen/core';
import type { TestDataContext } from '@idlgen/runtime';

export interface SampleRequest {
  /** Data name (`Acme.Point`) or companion name (`Acme.Point.TestData`) */
  entity: string;
  count: number;
  seed: number;
  context: TestDataContext;
  /** Run applyDefaults over every drawn instance */
  defaults: boolean;
}

export function sampleInstances(registry: TestDataRegistry, request: SampleRequest): unknown[] {
  const companion = registry.get(request.entity);
  const drawn = fc.sample(companion.getGenerator(request.context), {
    seed: request.seed,
    numRuns: request.count,
  });
  return request.defaults
    ? drawn.map((value) => companion.applyDefaults(value, request.context))
    : drawn;
}

/**
 * JSON-safe copy of a drawn value: bigint as a decimal string; Set,
 * Uint8Array and Map (as `[key, value]` pairs) as arrays.
 */
export function toJsonValue(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return Array.from(value);
  }
  if (value instanceof Set) {
    return Array.from(value, (item: unknown) => toJsonValue(item));
  }
  if (value instanceof Map) {
    return Array.from(value, ([k, v]: [unknown, unknown]) => [toJsonValue(k), toJsonValue(v)]);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]: [string, unknown]) => [key, toJsonValue(item)])
    );
  }
  return value;
}
