/**
 * FileGroup: name-resolution authority for a set of schemas that share
 * output naming (one IDL file plus everything it includes).
 *
 * A `SchemaScope` is the file group seen from one schema: unqualified
 * references resolve inside that schema, `other.Name` references resolve in
 * an included schema. Generation always runs against a scope, never against
 * the bare group, so "the current schema" is explicit.
 */

import type {
  Constant,
  Enum,
  EnumMember,
  FieldType,
  ResolvedEntity,
  Schema,
  Service,
} from '../ast/types.js';
import { UnresolvedReferenceError } from '../types/errors.js';
import { camelize, localName, qualify, upperFirst } from './names.js';

export interface LocatedEntity {
  /** Scope of the schema that declares the entity */
  scope: SchemaScope;
  entity: ResolvedEntity;
  outputName: string;
}

export type ResolvedValue =
  | {
      kind: 'enumMember';
      scope: SchemaScope;
      enumeration: Enum;
      member: EnumMember;
      outputName: string;
    }
  | {
      kind: 'constant';
      scope: SchemaScope;
      constant: Constant;
      outputName: string;
    };

/** A type with every typedef on its outer layer followed */
export interface DealiasedType {
  scope: SchemaScope;
  type: FieldType;
}

export class FileGroup {
  readonly #schemas: Map<string, Schema>;

  constructor(
    schemas: readonly Schema[],
    /** Schema the group was loaded for; defaults to the first one */
    readonly main: string | undefined = schemas[0]?.name
  ) {
    this.#schemas = new Map(schemas.map((schema) => [schema.name, schema]));
  }

  get schemas(): readonly Schema[] {
    return Array.from(this.#schemas.values());
  }

  has(name: string): boolean {
    return this.#schemas.has(name);
  }

  schema(name: string): Schema {
    const schema = this.#schemas.get(name);
    if (!schema) {
      throw new UnresolvedReferenceError(name, this.main ?? '<file group>');
    }
    return schema;
  }

  scope(schema: Schema | string): SchemaScope {
    return new SchemaScope(
      this,
      typeof schema === 'string' ? this.schema(schema) : schema
    );
  }

  /**
   * Whether the module `outputName` holds a struct, union, exception or enum
   * declaring a value called `name`. A constant of that name shares the
   * module inside a namespace and is read as `name.name`.
   */
  declaresTypeValue(outputName: string, name: string): boolean {
    if (name !== localName(outputName)) {
      return false;
    }
    return this.schemas.some((schema) => {
      const scope = this.scope(schema);
      return [...schema.structs, ...schema.unions, ...schema.exceptions, ...schema.enums].some(
        (entity) => scope.destModule(entity.name) === outputName
      );
    });
  }

  /**
   * Output name for a `schema.Name` logical name, resolved the same way as a
   * declared entity of that schema would be.
   */
  destModuleForName(logicalName: string): string {
    const dot = logicalName.indexOf('.');
    if (dot <= 0) {
      throw new UnresolvedReferenceError(logicalName, this.main ?? '<file group>');
    }
    return this.scope(logicalName.slice(0, dot)).destModule(
      logicalName.slice(dot + 1)
    );
  }
}

export class SchemaScope {
  constructor(
    readonly fileGroup: FileGroup,
    readonly schema: Schema
  ) {}

  destModule(entityName: string): string {
    return qualify(this.schema.namespace, upperFirst(entityName));
  }

  /** All constants a schema owns go to one module named after the schema */
  destConstantModule(): string {
    return qualify(this.schema.namespace, camelize(this.schema.name));
  }

  ownsConstant(constant: Constant): boolean {
    return (constant.declaredIn ?? this.schema.name) === this.schema.name;
  }

  resolveType(reference: string): LocatedEntity {
    const { scope, local } = this.#split(reference);
    const entity = scope.#findEntity(local);
    if (!entity) {
      throw new UnresolvedReferenceError(reference, this.schema.name);
    }
    return { scope, entity, outputName: scope.destModule(entity.entity.name) };
  }

  resolveService(reference: string): {
    scope: SchemaScope;
    service: Service;
    outputName: string;
  } {
    const { scope, local } = this.#split(reference);
    const service = scope.schema.services.find((s) => s.name === local);
    if (!service) {
      throw new UnresolvedReferenceError(reference, this.schema.name);
    }
    return { scope, service, outputName: scope.destModule(service.name) };
  }

  resolveValue(reference: string): ResolvedValue {
    const { scope, local } = this.#split(reference);
    const dot = local.indexOf('.');
    if (dot > 0) {
      const enumName = local.slice(0, dot);
      const memberName = local.slice(dot + 1);
      const enumeration = scope.schema.enums.find((e) => e.name === enumName);
      const member = enumeration?.members.find((m) => m.name === memberName);
      if (!enumeration || !member) {
        throw new UnresolvedReferenceError(reference, this.schema.name);
      }
      return {
        kind: 'enumMember',
        scope,
        enumeration,
        member,
        outputName: scope.destModule(enumeration.name),
      };
    }
    const constant = scope.schema.constants.find((c) => c.name === local);
    if (!constant) {
      throw new UnresolvedReferenceError(reference, this.schema.name);
    }
    const owner = constant.declaredIn
      ? this.fileGroup.scope(constant.declaredIn)
      : scope;
    return {
      kind: 'constant',
      scope: owner,
      constant,
      outputName: owner.destConstantModule(),
    };
  }

  /**
   * Follow typedef references until the type is a primitive, a container or
   * a reference to a struct, union, exception or enum.
   */
  dealias(type: FieldType): DealiasedType {
    const seen = new Set<string>();
    let current: DealiasedType = { scope: this, type };
    while (current.type.kind === 'ref') {
      const located = current.scope.resolveType(current.type.name);
      if (located.entity.kind !== 'typedef') {
        return current;
      }
      const key = `${located.scope.schema.name}.${located.entity.entity.name}`;
      if (seen.has(key)) {
        throw new UnresolvedReferenceError(key, this.schema.name);
      }
      seen.add(key);
      current = { scope: located.scope, type: located.entity.entity.type };
    }
    return current;
  }

  #split(reference: string): { scope: SchemaScope; local: string } {
    const dot = reference.indexOf('.');
    if (dot > 0) {
      const head = reference.slice(0, dot);
      const isSchema =
        head === this.schema.name || this.schema.includes.includes(head);
      if (isSchema && this.fileGroup.has(head)) {
        return {
          scope: this.fileGroup.scope(head),
          local: reference.slice(dot + 1),
        };
      }
    }
    return { scope: this, local: reference };
  }

  #findEntity(name: string): ResolvedEntity | undefined {
    const struct = this.schema.structs.find((s) => s.name === name);
    if (struct) return { kind: 'struct', entity: struct };
    const union = this.schema.unions.find((u) => u.name === name);
    if (union) return { kind: 'union', entity: union };
    const exception = this.schema.exceptions.find((e) => e.name === name);
    if (exception) return { kind: 'exception', entity: exception };
    const enumeration = this.schema.enums.find((e) => e.name === name);
    if (enumeration) return { kind: 'enum', entity: enumeration };
    const typedef = this.schema.typedefs.find((t) => t.name === name);
    if (typedef) return { kind: 'typedef', entity: typedef };
    return undefined;
  }
}
