/**
 * Parsed IDL schema model
 *
 * Produced by the loader (or any parser front end) and consumed read-only by
 * the generation layer. Collections are ordered; declaration order is the
 * order modules and fields are emitted in.
 */

export type PrimitiveName =
  | 'bool'
  | 'byte'
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'double'
  | 'string'
  | 'binary';

export type FieldType =
  | { readonly kind: 'primitive'; readonly name: PrimitiveName }
  | { readonly kind: 'list'; readonly element: FieldType }
  | { readonly kind: 'set'; readonly element: FieldType }
  | { readonly kind: 'map'; readonly key: FieldType; readonly value: FieldType }
  /** `Name` (same schema) or `schema.Name` (included schema) */
  | { readonly kind: 'ref'; readonly name: string };

export type ConstValue =
  /** Exact at any width; i64 literals exceed the safe range of a number */
  | { readonly kind: 'int'; readonly value: bigint }
  | { readonly kind: 'double'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'list'; readonly items: readonly ConstValue[] }
  | {
      readonly kind: 'map';
      readonly entries: readonly (readonly [ConstValue, ConstValue])[];
    }
  /** Enum member (`Color.RED`, `shared.Color.RED`) or another constant */
  | { readonly kind: 'identifier'; readonly name: string };

export interface Field {
  readonly id: number;
  readonly name: string;
  readonly type: FieldType;
  readonly required: boolean;
  readonly default?: ConstValue;
}

export interface Struct {
  readonly name: string;
  readonly fields: readonly Field[];
}

export type Union = Struct;
export type Exception = Struct;

export interface EnumMember {
  readonly name: string;
  readonly value: number;
}

export interface Enum {
  readonly name: string;
  readonly members: readonly EnumMember[];
}

export interface Constant {
  readonly name: string;
  readonly type: FieldType;
  readonly value: ConstValue;
  /** Schema that declares the constant when it was inherited into this one */
  readonly declaredIn?: string;
}

export interface Typedef {
  readonly name: string;
  readonly type: FieldType;
}

export interface ServiceFunction {
  readonly name: string;
  readonly params: readonly Field[];
  readonly returns: FieldType | 'void';
  readonly oneway: boolean;
  readonly throws: readonly Field[];
}

export interface Service {
  readonly name: string;
  readonly extends?: string;
  readonly functions: readonly ServiceFunction[];
}

export interface Schema {
  /** File module name, e.g. `tutorial` for tutorial.idl */
  readonly name: string;
  /** Dotted output namespace, e.g. `Acme.Tutorial` */
  readonly namespace?: string;
  readonly includes: readonly string[];
  readonly typedefs: readonly Typedef[];
  readonly structs: readonly Struct[];
  readonly unions: readonly Union[];
  readonly exceptions: readonly Exception[];
  readonly enums: readonly Enum[];
  readonly constants: readonly Constant[];
  readonly services: readonly Service[];
}

/** Struct-like entity kinds that carry fields */
export type DataKind = 'struct' | 'union' | 'exception';

/** Any entity a type reference can point at */
export type ResolvedEntity =
  | { readonly kind: DataKind; readonly entity: Struct }
  | { readonly kind: 'enum'; readonly entity: Enum }
  | { readonly kind: 'typedef'; readonly entity: Typedef };

export function primitive(name: PrimitiveName): FieldType {
  return { kind: 'primitive', name };
}

export function ref(name: string): FieldType {
  return { kind: 'ref', name };
}

/**
 * A field the emitted constructor accepts without a value: optional fields,
 * and required fields that applyDefaults can fill in.
 */
export function isOptionalField(field: Field): boolean {
  return !field.required || field.default !== undefined;
}
