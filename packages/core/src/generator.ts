/**
 * Entity Generator Dispatcher
 *
 * Turns each schema of a file group into named units, one per entity, then
 * resolves every output stream independently. Nothing here reads or writes
 * files; the CLI's writer persists what `generateFileGroup` returns.
 */

import path from 'node:path';

import type { Schema } from './ast/types.js';
import { DIAGNOSTIC_CODES, type GenerationDiagnostic } from './diag/codes.js';
import { emitConstants } from './emit/constant-emitter.js';
import { emitEnum } from './emit/enum-emitter.js';
import { emitBehaviour, emitService } from './emit/service-emitter.js';
import { emitDataEntity } from './emit/struct-emitter.js';
import type { FileGroup } from './naming/file-group.js';
import { targetPath } from './naming/names.js';
import { synthesizeTestData } from './testdata/synthesizer.js';
import type { NameCollisionError } from './types/errors.js';
import { type CodegenOptions, type ResolvedOptions, resolveOptions } from './types/options.js';
import { type Result, ok } from './types/result.js';
import { resolveNameCollisions } from './units/collision-resolver.js';
import type { NamedUnit } from './units/generated-unit.js';
import { renderModules } from './units/render.js';

export interface SchemaOutput {
  /** Enums, constants, structs, unions, exceptions, services, behaviours */
  modules: NamedUnit[];
  testDataModules: NamedUnit[];
  diagnostics: GenerationDiagnostic[];
}

export interface GeneratedFileGroup {
  /** Resolved main stream: one unit per output name */
  modules: readonly NamedUnit[];
  /** Resolved test-data stream */
  testDataModules: readonly NamedUnit[];
  diagnostics: readonly GenerationDiagnostic[];
}

export function generateSchema(
  schema: Schema | string,
  fileGroup: FileGroup,
  options: CodegenOptions = {}
): SchemaOutput {
  const resolved = resolveOptions(options);
  return generateInScope(schema, fileGroup, resolved);
}

function generateInScope(
  schema: Schema | string,
  fileGroup: FileGroup,
  options: ResolvedOptions
): SchemaOutput {
  // Every name below resolves relative to this schema
  const scope = fileGroup.scope(schema);
  const current = scope.schema;
  const diagnostics: GenerationDiagnostic[] = [];

  const owned = current.constants.filter((constant) => scope.ownsConstant(constant));
  if (owned.length === 0 && current.constants.length > 0) {
    diagnostics.push({
      code: DIAGNOSTIC_CODES.CONSTANTS_ELIDED,
      phase: 'generate',
      schema: current.name,
      details: { inherited: current.constants.length },
    });
  }

  const modules: NamedUnit[] = [
    ...current.enums.map((enumeration) => emitEnum(enumeration, scope)),
    ...(owned.length > 0 ? [emitConstants(owned, scope, options)] : []),
    ...current.structs.map((struct) => emitDataEntity('struct', struct, scope, options)),
    ...current.unions.map((union) => emitDataEntity('union', union, scope, options)),
    ...current.exceptions.map((exception) =>
      emitDataEntity('exception', exception, scope, options)
    ),
    ...current.services.map((service) => emitService(service, scope, options)),
    ...current.services.map((service) => emitBehaviour(service, scope, options)),
  ];

  let testDataModules: NamedUnit[] = [];
  if (options.emitTestData) {
    testDataModules = synthesizeTestData(scope, options);
  } else {
    diagnostics.push({
      code: DIAGNOSTIC_CODES.TEST_DATA_DISABLED,
      phase: 'generate',
      schema: current.name,
    });
  }

  return { modules, testDataModules, diagnostics };
}

/**
 * Generate every schema of the group and resolve each stream on its own.
 * Fails with the first collision that cannot be merged.
 */
export function generateFileGroup(
  fileGroup: FileGroup,
  options: CodegenOptions = {}
): Result<GeneratedFileGroup, NameCollisionError> {
  const resolved = resolveOptions(options);
  const outputs = fileGroup.schemas.map((schema) => generateInScope(schema, fileGroup, resolved));

  const main = resolveNameCollisions(
    outputs.flatMap((output) => output.modules),
    'main'
  );
  if (main.isErr()) {
    return main;
  }
  const testData = resolveNameCollisions(
    outputs.flatMap((output) => output.testDataModules),
    'testData'
  );
  if (testData.isErr()) {
    return testData;
  }

  return ok({
    modules: main.value.modules,
    testDataModules: testData.value.modules,
    diagnostics: [
      ...outputs.flatMap((output) => output.diagnostics),
      ...main.value.diagnostics,
      ...testData.value.diagnostics,
    ],
  });
}

/**
 * Paths, relative to the working directory, that `generate` would write:
 * main modules under `layout.main`, then test-data modules under
 * `layout.testData`.
 */
export function listTargets(
  fileGroup: FileGroup,
  options: CodegenOptions = {}
): Result<string[], NameCollisionError> {
  const resolved = resolveOptions(options);
  const generated = generateFileGroup(fileGroup, resolved);
  if (generated.isErr()) {
    return generated;
  }
  const { modules, testDataModules } = generated.value;
  return ok([
    ...modules.map(({ name }) => path.posix.join(resolved.layout.main, targetPath(name))),
    ...testDataModules.map(({ name }) =>
      path.posix.join(resolved.layout.testData, targetPath(name))
    ),
  ]);
}

/** Every resolved main module of the group rendered into one string */
export function renderFileGroup(
  fileGroup: FileGroup,
  options: CodegenOptions = {}
): Result<string, NameCollisionError> {
  const generated = generateFileGroup(fileGroup, options);
  if (generated.isErr()) {
    return generated;
  }
  return ok(renderModules(generated.value.modules));
}
