import type { Constant } from '../ast/types.js';
import type { SchemaScope } from '../naming/file-group.js';
import type { ResolvedOptions } from '../types/options.js';
import { type NamedUnit, constantUnit } from '../units/generated-unit.js';
import { constText } from './const-value.js';
import { createEmitContext, typeText } from './type-script.js';

/**
 * One module holding every constant in `constants`, which the caller has
 * already narrowed to the ones the schema owns.
 */
export function emitConstants(
  constants: readonly Constant[],
  scope: SchemaScope,
  options: ResolvedOptions
): NamedUnit {
  const name = scope.destConstantModule();
  const ctx = createEmitContext(scope, { root: options.layout.main, name }, options.layout);

  const body = constants.map((constant) => ({
    name: constant.name,
    source: `export const ${constant.name}: ${typeText(constant.type, ctx)} = ${constText(
      constant.value,
      constant.type,
      ctx
    )};`,
  }));

  return {
    name,
    unit: constantUnit(ctx.imports.list(), body, `constants of ${scope.schema.name}`),
  };
}
