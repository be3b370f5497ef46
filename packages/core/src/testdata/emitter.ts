/**
 * Source lowering of the test-data IR
 *
 * Each companion becomes a module exporting `getGenerator(context)` and
 * `applyDefaults(value, context)`, written against fast-check and the
 * runtime package so the generated code carries no helpers of its own.
 */

import type { FieldType, PrimitiveName } from '../ast/types.js';
import { constText } from '../emit/const-value.js';
import {
  type EmitContext,
  createEmitContext,
  dataRef,
  typeText,
  withScope,
} from '../emit/type-script.js';
import { localName, testDataModuleName } from '../naming/names.js';
import type { ResolvedOptions } from '../types/options.js';
import { type NamedUnit, typeUnit } from '../units/generated-unit.js';
import type { Companion, DefaultPlan, DefaultsExpr, DrawExpr, ValueExpr } from './ir.js';

const PRIMITIVE_DRAWS: Record<PrimitiveName, string> = {
  bool: 'rt.bool()',
  byte: 'rt.byte()',
  i8: 'rt.byte()',
  i16: 'rt.i16()',
  i32: 'rt.i32()',
  i64: 'rt.i64()',
  double: 'rt.double()',
  string: 'rt.string(context)',
  binary: 'rt.binary(context)',
};

export function emitCompanion(companion: Companion, options: ResolvedOptions): NamedUnit {
  const ctx = createEmitContext(
    companion.scope,
    { root: options.layout.testData, name: companion.name },
    options.layout
  );
  ctx.imports.library('fc', 'fast-check');
  ctx.imports.libraryNamespace('rt', options.runtimeModule);

  const lowering = new SourceLowering(ctx, options);
  const subject = lowering.subjectType(companion);

  const getGenerator = [
    `export function getGenerator(context: rt.TestDataContext): fc.Arbitrary<${subject}> {`,
    ...lowering.drawBody(companion.draw),
    '}',
  ].join('\n');
  const applyDefaults = [
    `export function applyDefaults(value: ${subject}, context: rt.TestDataContext): ${subject} {`,
    ...lowering.defaultsBody(companion.defaults),
    '}',
  ].join('\n');

  return {
    name: companion.name,
    unit: typeUnit(
      'testData',
      ctx.imports.list(),
      [
        { name: 'getGenerator', source: getGenerator },
        { name: 'applyDefaults', source: applyDefaults },
      ],
      `test data for ${companion.dataName}`
    ),
  };
}

class SourceLowering {
  #variables = 0;

  constructor(
    private readonly ctx: EmitContext,
    private readonly options: ResolvedOptions
  ) {}

  subjectType(companion: Companion): string {
    const { subject } = companion;
    switch (subject.kind) {
      case 'struct':
      case 'union':
      case 'exception':
        return dataRef(this.ctx, subject.target.outputName, subject.target.entityName);
      case 'enum': {
        const type = dataRef(this.ctx, subject.outputName, subject.entityName);
        return companion.draw.kind === 'absent' ? `${type} | undefined` : type;
      }
      case 'typedef':
        return typeText(subject.type, this.ctx);
    }
  }

  drawBody(expr: DrawExpr): string[] {
    if (expr.kind !== 'construct' || expr.bindings.length === 0) {
      return [`  return ${this.draw(expr, this.ctx)};`];
    }
    const target = dataRef(this.ctx, expr.target.outputName, expr.target.entityName);
    return [
      `  rt.assertWithinDepth(context, '${expr.target.outputName}');`,
      '  return fc',
      '    .record({',
      ...expr.bindings.map((binding) => `      ${binding.name}: ${this.draw(binding.draw, this.ctx)},`),
      '    })',
      `    .map((fields) => new ${target}(fields));`,
    ];
  }

  defaultsBody(expr: DefaultsExpr): string[] {
    switch (expr.kind) {
      case 'identity':
        return ['  return value;'];
      case 'transform':
        return [`  return ${this.value(expr.value)};`];
      case 'rebuild': {
        const target = dataRef(this.ctx, expr.target.outputName, expr.target.entityName);
        return [
          `  return new ${target}({`,
          ...expr.fields.map((field) => `    ${field.name}: ${this.value(field.value)},`),
          '  });',
        ];
      }
    }
  }

  draw(expr: DrawExpr, ctx: EmitContext): string {
    switch (expr.kind) {
      case 'typeGen':
        return this.typeGen(expr.type, withScope(ctx, expr.scope));
      case 'absent':
        return 'fc.constant(undefined)';
      case 'oneOf': {
        const [inner, other, ...rest] = expr.options;
        if (inner && other?.kind === 'absent' && rest.length === 0) {
          return `rt.optional(() => ${this.draw(inner, ctx)}, context)`;
        }
        return `fc.oneof(${expr.options.map((option) => this.draw(option, ctx)).join(', ')})`;
      }
      case 'const':
        return `rt.point(() => ${constText(expr.value, expr.type, withScope(ctx, expr.scope))})`;
      case 'construct': {
        const target = dataRef(ctx, expr.target.outputName, expr.target.entityName);
        if (expr.bindings.length === 0) {
          return `rt.point(() => new ${target}())`;
        }
        const fields = expr.bindings
          .map((binding) => `${binding.name}: ${this.draw(binding.draw, ctx)}`)
          .join(', ');
        return `fc.record({ ${fields} }).map((fields) => new ${target}(fields))`;
      }
    }
  }

  /** Generator for type T, written out in terms of the runtime arbitraries */
  typeGen(type: FieldType, ctx: EmitContext): string {
    switch (type.kind) {
      case 'primitive':
        return PRIMITIVE_DRAWS[type.name];
      case 'list':
        return `rt.listOf(() => ${this.typeGen(type.element, ctx)}, context)`;
      case 'set':
        return `rt.setOf(() => ${this.typeGen(type.element, ctx)}, context)`;
      case 'map':
        return `rt.mapOf(() => ${this.typeGen(type.key, ctx)}, () => ${this.typeGen(type.value, ctx)}, context)`;
      case 'ref': {
        const located = ctx.scope.resolveType(type.name);
        switch (located.entity.kind) {
          case 'typedef':
            return this.typeGen(located.entity.entity.type, withScope(ctx, located.scope));
          case 'enum': {
            const exported = localName(located.outputName);
            const members = located.entity.entity.members.map((member) =>
              dataRef(ctx, located.outputName, `${exported}.${member.name}`)
            );
            return members.length === 0 ? 'fc.constant(undefined)' : `rt.member(${members.join(', ')})`;
          }
          default:
            return `${this.companionRef(located.outputName, 'getGenerator')}(rt.descend(context))`;
        }
      }
    }
  }

  value(expr: ValueExpr): string {
    switch (expr.kind) {
      case 'input':
        return 'value';
      case 'field':
        return `value.${expr.name}`;
      case 'recurse':
        return this.plan(expr.plan, this.value(expr.value), isNullable(expr.value));
      case 'fallback':
        return `rt.orDefault(${this.value(expr.value)}, ${constText(
          expr.literal,
          expr.type,
          withScope(this.ctx, expr.scope)
        )})`;
    }
  }

  /** Static dispatch of applyDefaults over `text`, a value of the planned type */
  plan(plan: DefaultPlan, text: string, nullable: boolean): string {
    if (plan.kind === 'identity') {
      return text;
    }
    if (nullable) {
      const name = this.#variable();
      return `rt.mapPresent(${text}, (${name}) => ${this.plan(plan, name, false)})`;
    }
    switch (plan.kind) {
      case 'entity':
        return `${this.companionRef(plan.outputName, 'applyDefaults')}(${text}, context)`;
      case 'list':
        return `rt.defaultList(${text}, ${this.callback(plan.element)})`;
      case 'set':
        return `rt.defaultSet(${text}, ${this.callback(plan.element)})`;
      case 'map':
        return `rt.defaultMap(${text}, ${this.callback(plan.key)}, ${this.callback(plan.value)})`;
    }
  }

  callback(plan: DefaultPlan): string {
    if (plan.kind === 'identity') {
      return 'rt.identity';
    }
    const name = this.#variable();
    return `(${name}) => ${this.plan(plan, name, false)}`;
  }

  companionRef(dataName: string, exported: 'getGenerator' | 'applyDefaults'): string {
    return this.ctx.imports.ref(
      {
        root: this.options.layout.testData,
        name: testDataModuleName(dataName, this.options.testDataSuffix),
      },
      exported
    );
  }

  #variable(): string {
    this.#variables += 1;
    return `v${this.#variables}`;
  }
}

function isNullable(expr: ValueExpr): boolean {
  switch (expr.kind) {
    case 'input':
      return false;
    case 'field':
      return expr.optional;
    case 'recurse':
      return isNullable(expr.value);
    case 'fallback':
      return false;
  }
}
