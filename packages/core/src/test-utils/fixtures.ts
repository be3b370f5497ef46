import {
  type ConstValue,
  type Field,
  type FieldType,
  type Schema,
  type Struct,
  primitive,
  ref,
} from '../ast/types.js';
import { FileGroup } from '../naming/file-group.js';

export { primitive, ref };

export function schema(name: string, parts: Partial<Omit<Schema, 'name'>> = {}): Schema {
  return {
    name,
    includes: [],
    typedefs: [],
    structs: [],
    unions: [],
    exceptions: [],
    enums: [],
    constants: [],
    services: [],
    ...parts,
  };
}

export function field(
  id: number,
  name: string,
  type: FieldType,
  options: { required?: boolean; default?: ConstValue } = {}
): Field {
  return { id, name, type, required: options.required ?? false, default: options.default };
}

export function int(value: number | bigint): ConstValue {
  return { kind: 'int', value: BigInt(value) };
}

export function struct(name: string, fields: Field[] = []): Struct {
  return { name, fields };
}

/** `struct Point { 1: required i32 x, 2: optional i32 y = 5 }` */
export const POINT = struct('Point', [
  field(1, 'x', primitive('i32'), { required: true }),
  field(2, 'y', primitive('i32'), { default: int(5) }),
]);

export function pointGroup(): FileGroup {
  return new FileGroup([schema('geometry', { structs: [POINT] })]);
}

/**
 * `tree` schema: a self-referential node with an optional parent, a list
 * of children, an enum and a typedef'd map.
 */
export function treeGroup(): FileGroup {
  return new FileGroup([
    schema('tree', {
      namespace: 'Acme.Tree',
      enums: [
        {
          name: 'Color',
          members: [
            { name: 'RED', value: 1 },
            { name: 'GREEN', value: 2 },
          ],
        },
      ],
      typedefs: [{ name: 'labels', type: { kind: 'map', key: primitive('string'), value: primitive('i64') } }],
      structs: [
        struct('Node', [
          field(1, 'id', primitive('i32'), { required: true }),
          field(2, 'parent', ref('Node')),
          field(3, 'children', { kind: 'list', element: ref('Node') }, { required: true }),
          field(4, 'color', ref('Color'), { default: { kind: 'identifier', name: 'Color.GREEN' } }),
          field(5, 'labels', ref('labels')),
        ]),
      ],
    }),
  ]);
}
