// @idlgen/core entry point
//
// Public API:
// - generateSchema / generateFileGroup / listTargets / renderFileGroup turn a loaded FileGroup into
//   named, collision-resolved units; renderUnit and targetPath turn a unit into a file.
// - createTestDataRegistry runs the test-data companions in process (the CLI `sample` command and
//   property tests use it); the emitted companions are the same IR lowered to source.
// - Errors carry stable codes and exit codes; ErrorPresenter formats them for the CLI.

// Dispatcher
export {
  generateSchema,
  generateFileGroup,
  listTargets,
  renderFileGroup,
  type SchemaOutput,
  type GeneratedFileGroup,
} from './generator.js';

// Schema model and loader
export * from './ast/types.js';
export {
  loadSchemaDocument,
  parseSchemaDocument,
  type FieldJson,
  type SchemaDocument,
  type SchemaJson,
  type StructJson,
  type TypeJson,
  type ValueJson,
} from './ast/loader.js';

// Naming
export {
  FileGroup,
  SchemaScope,
  type LocatedEntity,
  type ResolvedValue,
} from './naming/file-group.js';
export {
  camelize,
  capitalize,
  importAlias,
  importSpecifier,
  targetPath,
  testDataModuleName,
  underscore,
} from './naming/names.js';

// Units
export {
  typeUnit,
  constantUnit,
  mergeImports,
  type GeneratedUnit,
  type GeneratorKind,
  type ImportDecl,
  type NamedUnit,
  type TypeGeneratorKind,
  type UnitDeclaration,
} from './units/generated-unit.js';
export {
  mergeUnits,
  resolveNameCollisions,
  type ResolvedStream,
} from './units/collision-resolver.js';
export { renderUnit, renderModules, GENERATED_HEADER } from './units/render.js';

// Test data
export {
  createTestDataRegistry,
  evaluateConst,
  type CompanionRuntime,
  type Instance,
  type TestDataRegistry,
} from './testdata/interpreter.js';
export { buildCompanions, typedefDataName } from './testdata/synthesizer.js';
export type { Companion, DrawExpr, DefaultsExpr, DefaultPlan, ValueExpr } from './testdata/ir.js';

// Options and diagnostics
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  type CodegenOptions,
  type OutputLayout,
  type ResolvedOptions,
} from './types/options.js';
export {
  DIAGNOSTIC_CODES,
  type DiagnosticCode,
  type GenerationDiagnostic,
  type OutputStream,
} from './diag/codes.js';

// Errors
export { ErrorCode, EXIT_CODES, type Severity, getExitCode } from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView, type PresenterOptions } from './errors/presenter.js';
export {
  IdlGenError,
  SchemaDocumentError,
  UnresolvedReferenceError,
  NameCollisionError,
  RecursionLimitExceededError,
  ConfigurationError,
  WriteError,
  InternalError,
  isIdlGenError,
  type DocumentIssue,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export { Ok, Err, ok, err, all, type Result } from './types/result.js';
