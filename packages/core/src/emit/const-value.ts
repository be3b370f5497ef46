/**
 * Literal source text for constant values and field defaults
 */

import type { ConstValue, FieldType } from '../ast/types.js';
import type { SchemaScope } from '../naming/file-group.js';
import { localName } from '../naming/names.js';
import { SchemaDocumentError } from '../types/errors.js';
import { type EmitContext, dataRef, typeText, withScope } from './type-script.js';

export function constText(value: ConstValue, type: FieldType, ctx: EmitContext): string {
  if (value.kind === 'identifier') {
    return identifierText(value.name, ctx);
  }
  const { scope, type: target } = ctx.scope.dealias(type);
  const here = withScope(ctx, scope);

  switch (value.kind) {
    case 'int':
      return target.kind === 'primitive' && target.name === 'i64'
        ? `${value.value.toString()}n`
        : value.value.toString();
    case 'double':
      return String(value.value);
    case 'string':
      return JSON.stringify(value.value);
    case 'bool':
      return String(value.value);
    case 'list': {
      if (target.kind === 'list') {
        return `[${value.items.map((item) => constText(item, target.element, here)).join(', ')}]`;
      }
      if (target.kind === 'set') {
        const items = value.items.map((item) => constText(item, target.element, here));
        return `new Set<${typeText(target.element, here)}>([${items.join(', ')}])`;
      }
      throw literalMismatch(value, type, ctx.scope);
    }
    case 'map': {
      if (target.kind === 'map') {
        const entries = value.entries.map(
          ([k, v]) => `[${constText(k, target.key, here)}, ${constText(v, target.value, here)}]`
        );
        return `new Map<${typeText(target.key, here)}, ${typeText(target.value, here)}>([${entries.join(', ')}])`;
      }
      if (target.kind === 'ref') {
        const located = here.scope.resolveType(target.name);
        if (located.entity.kind === 'enum' || located.entity.kind === 'typedef') {
          throw literalMismatch(value, type, ctx.scope);
        }
        const fields = located.entity.entity.fields;
        const owner = withScope(here, located.scope);
        const assignments = value.entries.map(([k, v]) => {
          const field = k.kind === 'string' ? fields.find((f) => f.name === k.value) : undefined;
          if (!field) {
            throw literalMismatch(value, type, ctx.scope);
          }
          return `${field.name}: ${constText(v, field.type, owner)}`;
        });
        const body = assignments.length > 0 ? ` ${assignments.join(', ')} ` : '';
        return `new ${dataRef(here, located.outputName)}({${body}})`;
      }
      throw literalMismatch(value, type, ctx.scope);
    }
  }
}

function identifierText(reference: string, ctx: EmitContext): string {
  const resolved = ctx.scope.resolveValue(reference);
  switch (resolved.kind) {
    case 'enumMember':
      return dataRef(ctx, resolved.outputName, `${localName(resolved.outputName)}.${resolved.member.name}`);
    case 'constant': {
      const { name } = resolved.constant;
      const text = ctx.imports.ref({ root: ctx.layout.main, name: resolved.outputName }, name);
      return ctx.scope.fileGroup.declaresTypeValue(resolved.outputName, name) ? `${text}.${name}` : text;
    }
  }
}

export function literalMismatch(
  value: ConstValue,
  type: FieldType,
  scope: SchemaScope
): SchemaDocumentError {
  return new SchemaDocumentError(
    `A ${value.kind} literal cannot initialize a value of type ${describeType(type)}`,
    [{ path: `/schemas/${scope.schema.name}`, message: `unexpected ${value.kind} literal` }]
  );
}

export function describeType(type: FieldType): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'list':
    case 'set':
      return `${type.kind}<${describeType(type.element)}>`;
    case 'map':
      return `map<${describeType(type.key)}, ${describeType(type.value)}>`;
    case 'ref':
      return type.name;
  }
}
