/**
 * TypeScript type text for IDL field types
 */

import type { FieldType, PrimitiveName } from '../ast/types.js';
import type { SchemaScope } from '../naming/file-group.js';
import { type ModuleLocation, localName } from '../naming/names.js';
import type { OutputLayout } from '../types/options.js';
import { ImportCollector } from './imports.js';

/** What an emitter needs to turn references into imported names */
export interface EmitContext {
  readonly scope: SchemaScope;
  readonly imports: ImportCollector;
  readonly layout: Required<OutputLayout>;
}

const PRIMITIVE_TYPES: Record<PrimitiveName, string> = {
  bool: 'boolean',
  byte: 'number',
  i8: 'number',
  i16: 'number',
  i32: 'number',
  i64: 'bigint',
  double: 'number',
  string: 'string',
  binary: 'Uint8Array',
};

export function createEmitContext(
  scope: SchemaScope,
  self: ModuleLocation,
  layout: Required<OutputLayout>
): EmitContext {
  return { scope, imports: new ImportCollector(self), layout };
}

export function withScope(ctx: EmitContext, scope: SchemaScope): EmitContext {
  return scope === ctx.scope ? ctx : { ...ctx, scope };
}

/** Reference to the class or enum a data module exports */
export function dataRef(ctx: EmitContext, outputName: string, exported = localName(outputName)): string {
  return ctx.imports.ref({ root: ctx.layout.main, name: outputName }, exported);
}

/**
 * Typedefs are not emitted as modules of their own, so aliases are
 * followed down to the type they name.
 */
export function typeText(type: FieldType, ctx: EmitContext): string {
  switch (type.kind) {
    case 'primitive':
      return PRIMITIVE_TYPES[type.name];
    case 'list': {
      const element = typeText(type.element, ctx);
      return element.includes(' ') ? `Array<${element}>` : `${element}[]`;
    }
    case 'set':
      return `Set<${typeText(type.element, ctx)}>`;
    case 'map':
      return `Map<${typeText(type.key, ctx)}, ${typeText(type.value, ctx)}>`;
    case 'ref': {
      const located = ctx.scope.resolveType(type.name);
      if (located.entity.kind === 'typedef') {
        return typeText(located.entity.entity.type, withScope(ctx, located.scope));
      }
      return dataRef(ctx, located.outputName);
    }
  }
}
