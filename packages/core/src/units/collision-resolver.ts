/**
 * Collision resolution
 *
 * Folds a stream of named units into one unit per output name, in
 * encounter order. A constant unit may share its name with exactly one
 * other kind of unit and is folded into it; any other pair sharing a name
 * is a naming conflict the generator cannot settle on its own.
 */

import { DIAGNOSTIC_CODES, type GenerationDiagnostic, type OutputStream } from '../diag/codes.js';
import { NameCollisionError } from '../types/errors.js';
import { type Result, err, ok } from '../types/result.js';
import {
  type ConstantUnit,
  type GeneratedUnit,
  type NamedUnit,
  type TypeUnit,
  type UnitDeclaration,
  mergeImports,
} from './generated-unit.js';

export interface ResolvedStream {
  readonly modules: readonly NamedUnit[];
  readonly diagnostics: readonly GenerationDiagnostic[];
}

/**
 * Merge two units that resolved to the same name. The merged unit keeps
 * the type unit's tag, generator and header so that a later collision is
 * judged against the type, and lists `first`'s declarations before
 * `second`'s.
 *
 * A constant named like a value the type unit declares (its class or enum)
 * moves into a namespace of that name, which merges with the class or enum.
 * A namespace must follow what it merges with, so in that case the type's
 * declarations come first whatever the encounter order.
 */
export function mergeUnits(
  name: string,
  first: GeneratedUnit,
  second: GeneratedUnit
): Result<GeneratedUnit, NameCollisionError> {
  switch (first.kind) {
    case 'type':
      switch (second.kind) {
        case 'type':
          return err(new NameCollisionError(name, first.generator, second.generator));
        case 'constant':
          return ok(combine(first, second, first, second));
      }
      break;
    case 'constant':
      switch (second.kind) {
        case 'type':
          return ok(combine(second, first, first, second));
        case 'constant':
          return err(new NameCollisionError(name, first.generator, second.generator));
      }
      break;
  }
  return assertNever(first);
}

function combine(
  type: TypeUnit,
  constants: ConstantUnit,
  first: GeneratedUnit,
  second: GeneratedUnit
): TypeUnit {
  const values = new Set(type.body.filter((d) => d.typeOnly !== true).map((d) => d.name));
  const body = constants.body.some((d) => values.has(d.name))
    ? [...type.body, ...constants.body.map((d) => (values.has(d.name) ? inNamespace(d) : d))]
    : [...first.body, ...second.body];
  return Object.freeze({
    ...type,
    imports: Object.freeze(mergeImports(first.imports, second.imports)),
    body: Object.freeze(body),
  });
}

/** `export namespace FOO { <declaration> }`, merged into the class or enum FOO */
export function inNamespace(declaration: UnitDeclaration): UnitDeclaration {
  const inner = declaration.source
    .split('\n')
    .map((line) => (line.length > 0 ? `  ${line}` : line))
    .join('\n');
  return {
    name: declaration.name,
    source: `export namespace ${declaration.name} {\n${inner}\n}`,
  };
}

function assertNever(value: never): never {
  throw new Error(`Unexpected unit: ${JSON.stringify(value)}`);
}

export function resolveNameCollisions(
  units: readonly NamedUnit[],
  stream: OutputStream = 'main'
): Result<ResolvedStream, NameCollisionError> {
  const byName = new Map<string, GeneratedUnit>();
  const diagnostics: GenerationDiagnostic[] = [];

  for (const { name, unit } of units) {
    const existing = byName.get(name);
    if (existing === undefined) {
      byName.set(name, unit);
      continue;
    }
    const merged = mergeUnits(name, existing, unit);
    if (merged.isErr()) {
      return merged;
    }
    diagnostics.push({
      code: DIAGNOSTIC_CODES.CONSTANTS_MERGED,
      phase: 'resolve',
      name,
      stream,
      details: { into: merged.value.generator },
    });
    byName.set(name, merged.value);
  }

  return ok({
    modules: Array.from(byName, ([name, unit]) => ({ name, unit })),
    diagnostics,
  });
}
