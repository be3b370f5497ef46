import type { Enum } from '../ast/types.js';
import type { SchemaScope } from '../naming/file-group.js';
import { localName } from '../naming/names.js';
import { type NamedUnit, typeUnit } from '../units/generated-unit.js';

export function emitEnum(enumeration: Enum, scope: SchemaScope): NamedUnit {
  const name = scope.destModule(enumeration.name);
  const exported = localName(name);
  const members = enumeration.members.map((member) => `  ${member.name} = ${member.value},`);
  const source =
    members.length === 0
      ? `export enum ${exported} {}`
      : `export enum ${exported} {\n${members.join('\n')}\n}`;

  return {
    name,
    unit: typeUnit(
      'enum',
      [],
      [{ name: exported, source }],
      `enum ${scope.schema.name}.${enumeration.name}`
    ),
  };
}
