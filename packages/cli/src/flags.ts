import {
  ConfigurationError,
  type CodegenOptions,
} from '@idlgen/core';
import type { StringStyle, TestDataContext } from '@idlgen/runtime';

export type OutputFormat = 'json' | 'ndjson';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  schema?: string;
  // Output layout and naming
  out?: string;
  testDataOut?: string;
  testData?: boolean; // false when --no-test-data is used
  suffix?: string;
  runtimeModule?: string;
  // Sampling
  entity?: string;
  count?: string | number;
  n?: string | number;
  seed?: string | number;
  maxDepth?: string | number;
  maxCollectionSize?: string | number;
  strings?: string;
  defaults?: boolean;
  format?: string;
  // Logging
  verbose?: boolean;
  debugConfig?: boolean;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

/**
 * Parse CLI options into CodegenOptions; unset flags stay unset so that
 * resolveOptions applies its own defaults.
 */
export function parseCodegenOptions(options: CliOptions): CodegenOptions {
  const codegen: CodegenOptions = {};

  if (typeof options.suffix === 'string') {
    codegen.testDataSuffix = options.suffix;
  }
  if (typeof options.runtimeModule === 'string') {
    codegen.runtimeModule = options.runtimeModule;
  }
  // Commander sets testData=false when --no-test-data is used
  if (typeof options.testData === 'boolean') {
    codegen.emitTestData = options.testData;
  }
  if (typeof options.out === 'string' || typeof options.testDataOut === 'string') {
    codegen.layout = {};
    if (typeof options.out === 'string') {
      codegen.layout.main = options.out;
    }
    if (typeof options.testDataOut === 'string') {
      codegen.layout.testData = options.testDataOut;
    }
  }

  return codegen;
}

/**
 * Generation context overrides from --max-depth, --max-collection-size,
 * --strings and --seed. Bounds themselves are checked by createContext.
 */
export function parseContextOptions(options: CliOptions): Partial<TestDataContext> {
  const context: { -readonly [K in keyof TestDataContext]?: TestDataContext[K] } = {};

  if (options.maxDepth !== undefined) {
    context.maxDepth = parseInteger('max-depth', options.maxDepth, 0);
  }
  if (options.maxCollectionSize !== undefined) {
    context.maxCollectionSize = parseInteger('max-collection-size', options.maxCollectionSize, 0);
  }
  if (options.strings !== undefined) {
    context.strings = resolveStringStyle(options.strings);
  }
  context.seed = resolveSeed(options.seed);

  return context;
}

export function resolveSeed(value: unknown): number {
  if (value === undefined) {
    return 424242;
  }
  return parseInteger('seed', value, Number.MIN_SAFE_INTEGER);
}

/**
 * Resolve count/n into a single positive integer.
 *
 * - If neither flag is provided, defaults to 1.
 * - If both are provided, they must agree on the same numeric value.
 */
export function resolveSampleCount(options: Pick<CliOptions, 'count' | 'n'>): number {
  const provided = [
    ['count', options.count],
    ['n', options.n],
  ].filter((entry): entry is [string, string | number] => entry[1] !== undefined);

  if (provided.length === 0) {
    return 1;
  }

  const parsed = provided.map(([name, value]): [string, number] => [name, parseInteger(name, value, 1)]);
  const [first, ...rest] = parsed;
  if (!first) {
    return 1;
  }
  for (const [, value] of rest) {
    if (value !== first[1]) {
      const names = parsed.map(([n]) => `--${n}`).join(', ');
      throw new ConfigurationError(`Conflicting sample count flags (${names}) with different values.`, {
        option: 'count',
      });
    }
  }

  return first[1];
}

export function resolveStringStyle(value: unknown): StringStyle {
  const raw = String(value).toLowerCase();
  if (raw === 'arbitrary' || raw === 'lorem') {
    return raw;
  }
  throw new ConfigurationError(
    `Invalid --strings value "${String(value)}". Expected "arbitrary" or "lorem".`,
    { option: 'strings' }
  );
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'json';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'json' || raw === 'ndjson') {
    return raw;
  }
  throw new ConfigurationError(
    `Invalid --format value "${String(value)}". Supported formats are "json" and "ndjson".`,
    { option: 'format' }
  );
}

function parseInteger(name: string, value: unknown, min: number): number {
  const num = typeof value === 'number' ? value : Number(String(value));
  if (!Number.isSafeInteger(num) || num < min) {
    const expected = min === 1 ? 'a positive integer' : min === 0 ? 'a non-negative integer' : 'an integer';
    throw new ConfigurationError(`Invalid ${name} value "${String(value)}". Expected ${expected}.`, {
      option: name,
    });
  }
  return num;
}
