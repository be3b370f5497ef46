/**
 * Diagnostics reported alongside a successful generation pass.
 * None of these are errors; the CLI prints them under --verbose.
 */

export const DIAGNOSTIC_CODES = {
  /** A constant module was folded into a type module of the same name */
  CONSTANTS_MERGED: 'CONSTANTS_MERGED',
  /** A schema declares constants, but all of them belong to another schema */
  CONSTANTS_ELIDED: 'CONSTANTS_ELIDED',
  /** Test-data modules were not generated (emitTestData: false) */
  TEST_DATA_DISABLED: 'TEST_DATA_DISABLED',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

export type OutputStream = 'main' | 'testData';

export interface GenerationDiagnostic {
  code: DiagnosticCode;
  phase: 'generate' | 'resolve';
  schema?: string;
  name?: string;
  stream?: OutputStream;
  details?: Record<string, unknown>;
}
