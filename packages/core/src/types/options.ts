/**
 * Configuration options for code generation
 *
 * All options are optional with conservative defaults; `resolveOptions`
 * fills them in and validates the combination.
 */

import { ConfigurationError } from './errors.js';

/**
 * Root directories of the two output streams. Only their relative position
 * matters to the generator: it decides the import specifiers test-data
 * modules use to reach the data modules they describe.
 */
export interface OutputLayout {
  /** Root of the main modules (default: 'gen') */
  main?: string;
  /** Root of the test-data modules (default: 'gen-test') */
  testData?: string;
}

export interface CodegenOptions {
  /** Segment appended to a data module name to name its companion (default: 'TestData') */
  testDataSuffix?: string;
  /** Generate companion test-data modules at all (default: true) */
  emitTestData?: boolean;
  /** Module specifier generated test-data code imports runtime helpers from (default: '@idlgen/runtime') */
  runtimeModule?: string;
  layout?: OutputLayout;
}

export interface ResolvedOptions {
  testDataSuffix: string;
  emitTestData: boolean;
  runtimeModule: string;
  layout: Required<OutputLayout>;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  testDataSuffix: 'TestData',
  emitTestData: true,
  runtimeModule: '@idlgen/runtime',
  layout: {
    main: 'gen',
    testData: 'gen-test',
  },
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Merge user options onto the defaults and validate the result
 */
export function resolveOptions(
  userOptions: CodegenOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    testDataSuffix: userOptions.testDataSuffix ?? DEFAULT_OPTIONS.testDataSuffix,
    emitTestData: userOptions.emitTestData ?? DEFAULT_OPTIONS.emitTestData,
    runtimeModule: userOptions.runtimeModule ?? DEFAULT_OPTIONS.runtimeModule,
    // Deep merge nested objects
    layout: {
      main: userOptions.layout?.main ?? DEFAULT_OPTIONS.layout.main,
      testData: userOptions.layout?.testData ?? DEFAULT_OPTIONS.layout.testData,
    },
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedOptions): void {
  if (!IDENTIFIER.test(options.testDataSuffix)) {
    throw new ConfigurationError(
      `testDataSuffix must be an identifier, got "${options.testDataSuffix}"`,
      { option: 'testDataSuffix' }
    );
  }
  if (options.runtimeModule.trim() === '') {
    throw new ConfigurationError('runtimeModule must not be empty', {
      option: 'runtimeModule',
    });
  }
  if (options.layout.main.trim() === '' || options.layout.testData.trim() === '') {
    throw new ConfigurationError('layout roots must not be empty', {
      option: 'layout',
    });
  }
}
