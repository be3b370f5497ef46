/**
 * Closure lowering of the test-data IR
 *
 * Runs companions in process without emitting or loading any source. Drawn
 * instances are frozen plain objects carrying every declared field (absent
 * ones as `undefined`), the same shape the emitted classes have.
 */

import fc from 'fast-check';
import * as rt from '@idlgen/runtime';

import type { ConstValue, FieldType, PrimitiveName } from '../ast/types.js';
import { literalMismatch } from '../emit/const-value.js';
import type { FileGroup, SchemaScope } from '../naming/file-group.js';
import { RecursionLimitExceededError, UnresolvedReferenceError } from '../types/errors.js';
import { type CodegenOptions, resolveOptions } from '../types/options.js';
import type { Companion, DefaultPlan, DefaultsExpr, DrawExpr, ValueExpr } from './ir.js';
import { buildCompanions } from './synthesizer.js';

export type Instance = Readonly<Record<string, unknown>>;

export interface CompanionRuntime {
  /** Output name of the companion module */
  readonly name: string;
  /** Output name of the module it describes */
  readonly dataName: string;
  getGenerator(context: rt.TestDataContext): fc.Arbitrary<unknown>;
  applyDefaults(value: unknown, context: rt.TestDataContext): unknown;
}

export interface TestDataRegistry {
  /** Data names that have a companion, in generation order */
  readonly names: readonly string[];
  has(name: string): boolean;
  /** Look up by data name (`Acme.Point`) or companion name (`Acme.Point.TestData`) */
  get(name: string): CompanionRuntime;
}

const PRIMITIVE_DRAWS: Record<PrimitiveName, (context: rt.TestDataContext) => fc.Arbitrary<unknown>> = {
  bool: () => rt.bool(),
  byte: () => rt.byte(),
  i8: () => rt.byte(),
  i16: () => rt.i16(),
  i32: () => rt.i32(),
  i64: () => rt.i64(),
  double: () => rt.double(),
  string: (context) => rt.string(context),
  binary: (context) => rt.binary(context),
};

export function createTestDataRegistry(
  fileGroup: FileGroup,
  options: CodegenOptions = {}
): TestDataRegistry {
  const resolved = resolveOptions(options);
  const byName = new Map<string, CompanionRuntime>();
  const names: string[] = [];

  const registry: TestDataRegistry = {
    names,
    has: (name) => byName.has(name),
    get: (name) => {
      const runtime = byName.get(name);
      if (!runtime) {
        throw new UnresolvedReferenceError(name, fileGroup.main ?? '<file group>');
      }
      return runtime;
    },
  };

  for (const schema of fileGroup.schemas) {
    for (const companion of buildCompanions(fileGroup.scope(schema), resolved)) {
      const runtime = new CompanionInterpreter(companion, registry);
      byName.set(companion.name, runtime);
      byName.set(companion.dataName, runtime);
      names.push(companion.dataName);
    }
  }

  return registry;
}

class CompanionInterpreter implements CompanionRuntime {
  readonly name: string;
  readonly dataName: string;

  constructor(
    private readonly companion: Companion,
    private readonly registry: TestDataRegistry
  ) {
    this.name = companion.name;
    this.dataName = companion.dataName;
  }

  getGenerator(context: rt.TestDataContext): fc.Arbitrary<unknown> {
    try {
      return this.draw(this.companion.draw, context);
    } catch (error) {
      if (error instanceof rt.RecursionLimitError) {
        throw new RecursionLimitExceededError(error.entity, error.depth, error);
      }
      throw error;
    }
  }

  applyDefaults(value: unknown, context: rt.TestDataContext): unknown {
    return this.defaults(this.companion.defaults, value, context);
  }

  private draw(expr: DrawExpr, context: rt.TestDataContext): fc.Arbitrary<unknown> {
    switch (expr.kind) {
      case 'typeGen':
        return this.typeGen(expr.type, expr.scope, context);
      case 'absent':
        return fc.constant(undefined);
      case 'oneOf': {
        const [inner, other, ...rest] = expr.options;
        if (inner && other?.kind === 'absent' && rest.length === 0) {
          return rt.optional(() => this.draw(inner, context), context);
        }
        return fc.oneof(...expr.options.map((option) => this.draw(option, context)));
      }
      case 'const':
        return rt.point(() => evaluateConst(expr.value, expr.type, expr.scope));
      case 'construct': {
        if (expr.bindings.length === 0) {
          return rt.point((): Instance => Object.freeze({}));
        }
        rt.assertWithinDepth(context, expr.target.outputName);
        const model: Record<string, fc.Arbitrary<unknown>> = {};
        for (const binding of expr.bindings) {
          model[binding.name] = this.draw(binding.draw, context);
        }
        return fc.record(model).map((fields): Instance => Object.freeze({ ...fields }));
      }
    }
  }

  private typeGen(
    type: FieldType,
    scope: SchemaScope,
    context: rt.TestDataContext
  ): fc.Arbitrary<unknown> {
    switch (type.kind) {
      case 'primitive':
        return PRIMITIVE_DRAWS[type.name](context);
      case 'list':
        return rt.listOf(() => this.typeGen(type.element, scope, context), context);
      case 'set':
        return rt.setOf(() => this.typeGen(type.element, scope, context), context);
      case 'map':
        return rt.mapOf(
          () => this.typeGen(type.key, scope, context),
          () => this.typeGen(type.value, scope, context),
          context
        );
      case 'ref': {
        const located = scope.resolveType(type.name);
        switch (located.entity.kind) {
          case 'typedef':
            return this.typeGen(located.entity.entity.type, located.scope, context);
          case 'enum': {
            const [first, ...rest] = located.entity.entity.members.map((member) => member.value);
            return first === undefined ? fc.constant(undefined) : rt.member(first, ...rest);
          }
          default:
            return this.registry.get(located.outputName).getGenerator(rt.descend(context));
        }
      }
    }
  }

  private defaults(expr: DefaultsExpr, value: unknown, context: rt.TestDataContext): unknown {
    switch (expr.kind) {
      case 'identity':
        return value;
      case 'transform':
        return this.value(expr.value, value, context);
      case 'rebuild': {
        const rebuilt: Record<string, unknown> = {};
        for (const field of expr.fields) {
          rebuilt[field.name] = this.value(field.value, value, context);
        }
        return Object.freeze(rebuilt);
      }
    }
  }

  private value(expr: ValueExpr, input: unknown, context: rt.TestDataContext): unknown {
    switch (expr.kind) {
      case 'input':
        return input;
      case 'field':
        return isInstance(input) ? input[expr.name] : undefined;
      case 'recurse':
        return this.plan(expr.plan, this.value(expr.value, input, context), context);
      case 'fallback': {
        const current = this.value(expr.value, input, context);
        return rt.isAbsent(current) ? evaluateConst(expr.literal, expr.type, expr.scope) : current;
      }
    }
  }

  private plan(plan: DefaultPlan, value: unknown, context: rt.TestDataContext): unknown {
    if (plan.kind === 'identity' || rt.isAbsent(value)) {
      return value;
    }
    switch (plan.kind) {
      case 'entity':
        return this.registry.get(plan.companionName).applyDefaults(value, context);
      case 'list':
        return Array.isArray(value)
          ? value.map((item: unknown) => this.plan(plan.element, item, context))
          : value;
      case 'set':
        return value instanceof Set
          ? new Set(Array.from(value, (item: unknown) => this.plan(plan.element, item, context)))
          : value;
      case 'map':
        return value instanceof Map
          ? new Map(
              Array.from(value, ([k, v]: [unknown, unknown]) => [
                this.plan(plan.key, k, context),
                this.plan(plan.value, v, context),
              ])
            )
          : value;
    }
  }
}

function isInstance(value: unknown): value is Instance {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    !(value instanceof Set)
  );
}

/**
 * Runtime value of a literal: numbers for enum members and i32-like ints,
 * bigint for i64, Set and Map for set and map types, a frozen instance for
 * a struct literal.
 */
export function evaluateConst(value: ConstValue, type: FieldType, scope: SchemaScope): unknown {
  if (value.kind === 'identifier') {
    const resolved = scope.resolveValue(value.name);
    return resolved.kind === 'enumMember'
      ? resolved.member.value
      : evaluateConst(resolved.constant.value, resolved.constant.type, resolved.scope);
  }
  const { scope: owner, type: target } = scope.dealias(type);

  switch (value.kind) {
    case 'int':
      return target.kind === 'primitive' && target.name === 'i64' ? value.value : Number(value.value);
    case 'double':
    case 'string':
    case 'bool':
      return value.value;
    case 'list': {
      if (target.kind === 'list') {
        return value.items.map((item) => evaluateConst(item, target.element, owner));
      }
      if (target.kind === 'set') {
        return new Set(value.items.map((item) => evaluateConst(item, target.element, owner)));
      }
      throw literalMismatch(value, type, scope);
    }
    case 'map': {
      if (target.kind === 'map') {
        return new Map(
          value.entries.map(([k, v]) => [
            evaluateConst(k, target.key, owner),
            evaluateConst(v, target.value, owner),
          ])
        );
      }
      if (target.kind === 'ref') {
        const located = owner.resolveType(target.name);
        if (located.entity.kind === 'enum' || located.entity.kind === 'typedef') {
          throw literalMismatch(value, type, scope);
        }
        const instance: Record<string, unknown> = {};
        for (const field of located.entity.entity.fields) {
          instance[field.name] = undefined;
        }
        for (const [k, v] of value.entries) {
          const field =
            k.kind === 'string'
              ? located.entity.entity.fields.find((f) => f.name === k.value)
              : undefined;
          if (!field) {
            throw literalMismatch(value, type, scope);
          }
          instance[field.name] = evaluateConst(v, field.type, located.scope);
        }
        return Object.freeze(instance);
      }
      throw literalMismatch(value, type, scope);
    }
  }
}
