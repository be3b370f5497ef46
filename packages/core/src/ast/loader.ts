/**
 * Schema document loader
 *
 * Stands in for the IDL front end: reads a JSON document of already-parsed
 * schemas, validates it against schemas/schema-document.json, checks the
 * uniqueness rules the generator relies on and builds a FileGroup.
 */

import { readFileSync } from 'node:fs';

import AjvModule, { type AnySchema, type ErrorObject, type ValidateFunction } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import { FileGroup } from '../naming/file-group.js';
import { type DocumentIssue, SchemaDocumentError } from '../types/errors.js';
import { type Result, err, ok } from '../types/result.js';
import type {
  ConstValue,
  Constant,
  Enum,
  Field,
  FieldType,
  PrimitiveName,
  Schema,
  Service,
  ServiceFunction,
  Struct,
  Typedef,
} from './types.js';

// ajv ships CommonJS; under NodeNext the class is the default export's `default`
const Ajv = AjvModule.default;

export type TypeJson =
  | string
  | { list: TypeJson }
  | { set: TypeJson }
  | { map: { key: TypeJson; value: TypeJson } };

export type ValueJson =
  | number
  | string
  | boolean
  | ValueJson[]
  /** Integer in decimal, for values a JSON number cannot carry exactly */
  | { int: string }
  | { ref: string }
  | { map: [ValueJson, ValueJson][] };

export interface FieldJson {
  id?: number;
  name: string;
  type: TypeJson;
  required?: boolean;
  default?: ValueJson;
}

export interface StructJson {
  name: string;
  fields?: FieldJson[];
}

export interface EnumJson {
  name: string;
  members?: { name: string; value: number }[];
}

export interface ConstantJson {
  name: string;
  type: TypeJson;
  value: ValueJson;
  declaredIn?: string;
}

export interface FunctionJson {
  name: string;
  params?: FieldJson[];
  returns?: TypeJson;
  oneway?: boolean;
  throws?: FieldJson[];
}

export interface ServiceJson {
  name: string;
  extends?: string;
  functions?: FunctionJson[];
}

export interface SchemaJson {
  name: string;
  namespace?: string;
  includes?: string[];
  typedefs?: { name: string; type: TypeJson }[];
  structs?: StructJson[];
  unions?: StructJson[];
  exceptions?: StructJson[];
  enums?: EnumJson[];
  constants?: ConstantJson[];
  services?: ServiceJson[];
}

export interface SchemaDocument {
  main?: string;
  schemas: SchemaJson[];
}

const PRIMITIVE_NAMES: ReadonlySet<string> = new Set<PrimitiveName>([
  'bool',
  'byte',
  'i8',
  'i16',
  'i32',
  'i64',
  'double',
  'string',
  'binary',
]);

function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVE_NAMES.has(name);
}

let validateDocument: ValidateFunction<SchemaDocument> | undefined;

function getValidator(): ValidateFunction<SchemaDocument> {
  if (!validateDocument) {
    const documentSchema: AnySchema = JSON.parse(
      readFileSync(new URL('../../schemas/schema-document.json', import.meta.url), 'utf8')
    );
    const ajv = new Ajv({ allErrors: true, strict: true });
    validateDocument = ajv.compile<SchemaDocument>(documentSchema);
  }
  return validateDocument;
}

/** Parse and load a document given as JSON text */
export function parseSchemaDocument(text: string): Result<FileGroup, SchemaDocumentError> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(
      new SchemaDocumentError(
        `Schema document is not valid JSON: ${cause.message}`,
        [{ path: '', message: cause.message }],
        ErrorCode.SCHEMA_PARSE_FAILED,
        cause
      )
    );
  }
  return loadSchemaDocument(data);
}

export function loadSchemaDocument(data: unknown): Result<FileGroup, SchemaDocumentError> {
  const validate = getValidator();
  if (!validate(data)) {
    const issues = (validate.errors ?? []).map(toIssue);
    return err(
      new SchemaDocumentError(
        `Schema document is invalid (${issues.length} issue${issues.length === 1 ? '' : 's'})`,
        issues
      )
    );
  }

  const issues = checkDeclarations(data);
  if (issues.length > 0) {
    return err(
      new SchemaDocumentError(
        `Schema document has conflicting declarations: ${issues[0]?.message ?? ''}`,
        issues,
        ErrorCode.DUPLICATE_DECLARATION
      )
    );
  }

  return ok(new FileGroup(data.schemas.map(toSchema), data.main));
}

function toIssue(error: ErrorObject): DocumentIssue {
  return { path: error.instancePath, message: error.message ?? error.keyword };
}

/**
 * Names the generator resolves must be unambiguous: schemas in the
 * document, type declarations and constants within a schema, fields within
 * an entity, members within an enum.
 */
function checkDeclarations(document: SchemaDocument): DocumentIssue[] {
  const issues: DocumentIssue[] = [];
  const duplicates = (path: string, what: string, names: readonly string[]): void => {
    const seen = new Set<string>();
    for (const name of names) {
      if (seen.has(name)) {
        issues.push({ path, message: `duplicate ${what} "${name}"` });
      }
      seen.add(name);
    }
  };

  const schemaNames = document.schemas.map((schema) => schema.name);
  duplicates('/schemas', 'schema', schemaNames);
  if (document.main !== undefined && !schemaNames.includes(document.main)) {
    issues.push({ path: '/main', message: `main schema "${document.main}" is not in the document` });
  }

  document.schemas.forEach((schema, index) => {
    const base = `/schemas/${index}`;
    const structLike = [
      ...(schema.structs ?? []),
      ...(schema.unions ?? []),
      ...(schema.exceptions ?? []),
    ];
    duplicates(base, 'type', [
      ...(schema.typedefs ?? []).map((typedef) => typedef.name),
      ...structLike.map((entity) => entity.name),
      ...(schema.enums ?? []).map((enumeration) => enumeration.name),
    ]);
    duplicates(base, 'constant', (schema.constants ?? []).map((constant) => constant.name));
    duplicates(base, 'service', (schema.services ?? []).map((service) => service.name));
    for (const entity of structLike) {
      duplicates(base, `field of ${entity.name}`, (entity.fields ?? []).map((field) => field.name));
    }
    for (const enumeration of schema.enums ?? []) {
      duplicates(
        base,
        `member of ${enumeration.name}`,
        (enumeration.members ?? []).map((member) => member.name)
      );
    }
    for (const include of schema.includes ?? []) {
      if (!schemaNames.includes(include)) {
        issues.push({ path: `${base}/includes`, message: `included schema "${include}" is not in the document` });
      }
    }
  });

  return issues;
}

function toSchema(json: SchemaJson): Schema {
  return {
    name: json.name,
    namespace: json.namespace,
    includes: json.includes ?? [],
    typedefs: (json.typedefs ?? []).map(
      (typedef): Typedef => ({ name: typedef.name, type: toType(typedef.type) })
    ),
    structs: (json.structs ?? []).map(toStruct),
    unions: (json.unions ?? []).map(toStruct),
    exceptions: (json.exceptions ?? []).map(toStruct),
    enums: (json.enums ?? []).map(
      (enumeration): Enum => ({ name: enumeration.name, members: enumeration.members ?? [] })
    ),
    constants: (json.constants ?? []).map(
      (constant): Constant => ({
        name: constant.name,
        type: toType(constant.type),
        value: toValue(constant.value),
        declaredIn: constant.declaredIn,
      })
    ),
    services: (json.services ?? []).map(toService),
  };
}

function toStruct(json: StructJson): Struct {
  return { name: json.name, fields: (json.fields ?? []).map(toField) };
}

function toField(json: FieldJson, index: number): Field {
  return {
    id: json.id ?? index + 1,
    name: json.name,
    type: toType(json.type),
    required: json.required ?? false,
    default: json.default === undefined ? undefined : toValue(json.default),
  };
}

function toService(json: ServiceJson): Service {
  return {
    name: json.name,
    extends: json.extends,
    functions: (json.functions ?? []).map(
      (fn): ServiceFunction => ({
        name: fn.name,
        params: (fn.params ?? []).map(toField),
        returns: fn.returns === undefined || fn.returns === 'void' ? 'void' : toType(fn.returns),
        oneway: fn.oneway ?? false,
        throws: (fn.throws ?? []).map(toField),
      })
    ),
  };
}

export function toType(json: TypeJson): FieldType {
  if (typeof json === 'string') {
    return isPrimitiveName(json) ? { kind: 'primitive', name: json } : { kind: 'ref', name: json };
  }
  if ('list' in json) {
    return { kind: 'list', element: toType(json.list) };
  }
  if ('set' in json) {
    return { kind: 'set', element: toType(json.set) };
  }
  return { kind: 'map', key: toType(json.map.key), value: toType(json.map.value) };
}

export function toValue(json: ValueJson): ConstValue {
  if (typeof json === 'number') {
    return Number.isInteger(json) ? { kind: 'int', value: BigInt(json) } : { kind: 'double', value: json };
  }
  if (typeof json === 'string') {
    return { kind: 'string', value: json };
  }
  if (typeof json === 'boolean') {
    return { kind: 'bool', value: json };
  }
  if (Array.isArray(json)) {
    return { kind: 'list', items: json.map(toValue) };
  }
  if ('int' in json) {
    return { kind: 'int', value: BigInt(json.int) };
  }
  if ('ref' in json) {
    return { kind: 'identifier', name: json.ref };
  }
  return {
    kind: 'map',
    entries: json.map.map(([key, value]): readonly [ConstValue, ConstValue] => [
      toValue(key),
      toValue(value),
    ]),
  };
}
