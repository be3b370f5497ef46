/**
 * Test-Data Module Synthesizer
 *
 * Names and builds the companion of every typedef, struct, exception, union
 * and enum of one schema, in that order. The IR built here is shared by the
 * source emitter and the in-process interpreter.
 */

import type { DataKind, Struct } from '../ast/types.js';
import type { SchemaScope } from '../naming/file-group.js';
import { capitalize, localName, testDataModuleName } from '../naming/names.js';
import type { ResolvedOptions } from '../types/options.js';
import type { NamedUnit } from '../units/generated-unit.js';
import { emitCompanion } from './emitter.js';
import {
  compileDataEntity,
  compileEnum,
  compileTypedef,
  type CompiledEntity,
} from './field-compiler.js';
import type { Companion, CompanionSubject } from './ir.js';

/**
 * Data name of a typedef's companion: the alias, capitalized, as an entity
 * of its own schema. Resolution goes through the file group so a typedef
 * lands where a struct of that name would.
 */
export function typedefDataName(scope: SchemaScope, typedefName: string): string {
  return scope.fileGroup.destModuleForName(`${scope.schema.name}.${capitalize(typedefName)}`);
}

export function buildCompanions(
  scope: SchemaScope,
  options: Pick<ResolvedOptions, 'testDataSuffix'>
): Companion[] {
  const suffix = options.testDataSuffix;
  const { schema } = scope;

  const companion = (
    dataName: string,
    subject: CompanionSubject,
    compiled: CompiledEntity
  ): Companion => ({
    name: testDataModuleName(dataName, suffix),
    dataName,
    scope,
    subject,
    ...compiled,
  });

  const data = (kind: DataKind, entity: Struct): Companion => {
    const outputName = scope.destModule(entity.name);
    const compiled = compileDataEntity(kind, entity, outputName, scope, suffix);
    return companion(
      outputName,
      { kind, target: { kind, outputName, entityName: localName(outputName) } },
      compiled
    );
  };

  return [
    ...schema.typedefs.map((typedef) =>
      companion(
        typedefDataName(scope, typedef.name),
        { kind: 'typedef', type: typedef.type },
        compileTypedef(typedef.type, scope, suffix)
      )
    ),
    ...schema.structs.map((struct) => data('struct', struct)),
    ...schema.exceptions.map((exception) => data('exception', exception)),
    ...schema.unions.map((union) => data('union', union)),
    ...schema.enums.map((enumeration) => {
      const outputName = scope.destModule(enumeration.name);
      return companion(
        outputName,
        { kind: 'enum', outputName, entityName: localName(outputName) },
        compileEnum(enumeration, scope)
      );
    }),
  ];
}

export function synthesizeTestData(
  scope: SchemaScope,
  options: ResolvedOptions
): NamedUnit[] {
  return buildCompanions(scope, options).map((companion) => emitCompanion(companion, options));
}
