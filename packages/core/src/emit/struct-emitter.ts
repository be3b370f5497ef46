/**
 * Structs, unions and exceptions share one emitter: a `<Name>Fields`
 * interface listing the fields and a class built from one such object.
 * Defaults are not applied by the constructor; that is what the test-data
 * companion's applyDefaults does.
 */

import { type DataKind, type Struct, isOptionalField } from '../ast/types.js';
import type { SchemaScope } from '../naming/file-group.js';
import { localName } from '../naming/names.js';
import type { ResolvedOptions } from '../types/options.js';
import { type NamedUnit, type UnitDeclaration, typeUnit } from '../units/generated-unit.js';
import { createEmitContext, typeText } from './type-script.js';

export function fieldsInterfaceName(exported: string): string {
  return `${exported}Fields`;
}

export function emitDataEntity(
  kind: DataKind,
  entity: Struct,
  scope: SchemaScope,
  options: ResolvedOptions
): NamedUnit {
  const name = scope.destModule(entity.name);
  const exported = localName(name);
  const ctx = createEmitContext(scope, { root: options.layout.main, name }, options.layout);
  const doc = `${kind} ${scope.schema.name}.${entity.name}`;

  if (entity.fields.length === 0) {
    return {
      name,
      unit: typeUnit(kind, [], [{ name: exported, source: `export class ${exported} {}` }], doc),
    };
  }

  const members = entity.fields.map(
    (field) =>
      `  readonly ${field.name}${isOptionalField(field) ? '?' : ''}: ${typeText(field.type, ctx)};`
  );
  const fieldsName = fieldsInterfaceName(exported);

  const body: UnitDeclaration[] = [
    {
      name: fieldsName,
      source: `export interface ${fieldsName} {\n${members.join('\n')}\n}`,
      typeOnly: true,
    },
    {
      name: exported,
      source: [
        `export class ${exported} implements ${fieldsName} {`,
        ...members,
        '',
        `  constructor(fields: ${fieldsName}) {`,
        ...entity.fields.map((field) => `    this.${field.name} = fields.${field.name};`),
        '  }',
        '}',
      ].join('\n'),
    },
  ];

  return { name, unit: typeUnit(kind, ctx.imports.list(), body, doc) };
}
