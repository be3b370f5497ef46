/**
 * Service interfaces. The service module declares what a caller sees
 * (`<Name>Client`, every method async); the behaviour module, one level
 * below it, declares what an implementation provides (`<Name>Handler`).
 */

import type { Field, Service, ServiceFunction } from '../ast/types.js';
import type { SchemaScope } from '../naming/file-group.js';
import { localName } from '../naming/names.js';
import type { ResolvedOptions } from '../types/options.js';
import { type NamedUnit, typeUnit } from '../units/generated-unit.js';
import { describeType } from './const-value.js';
import { type EmitContext, createEmitContext, typeText } from './type-script.js';

export function behaviourModuleName(serviceOutputName: string): string {
  return `${serviceOutputName}.Handler`;
}

type Side = 'client' | 'handler';

export function emitService(
  service: Service,
  scope: SchemaScope,
  options: ResolvedOptions
): NamedUnit {
  const name = scope.destModule(service.name);
  return emitInterface('client', name, service, scope, options);
}

export function emitBehaviour(
  service: Service,
  scope: SchemaScope,
  options: ResolvedOptions
): NamedUnit {
  const name = behaviourModuleName(scope.destModule(service.name));
  return emitInterface('handler', name, service, scope, options);
}

function interfaceName(side: Side, serviceOutputName: string): string {
  return `${localName(serviceOutputName)}${side === 'client' ? 'Client' : 'Handler'}`;
}

function emitInterface(
  side: Side,
  name: string,
  service: Service,
  scope: SchemaScope,
  options: ResolvedOptions
): NamedUnit {
  const ctx = createEmitContext(scope, { root: options.layout.main, name }, options.layout);
  const serviceName = scope.destModule(service.name);
  const exported = interfaceName(side, serviceName);

  let heritage = '';
  if (service.extends !== undefined) {
    const parent = scope.resolveService(service.extends);
    const parentModule =
      side === 'client' ? parent.outputName : behaviourModuleName(parent.outputName);
    heritage = ` extends ${ctx.imports.ref(
      { root: options.layout.main, name: parentModule },
      interfaceName(side, parent.outputName)
    )}`;
  }

  const methods = service.functions.map((fn) => methodSource(side, fn, ctx));
  const source =
    methods.length === 0
      ? `export interface ${exported}${heritage} {}`
      : `export interface ${exported}${heritage} {\n${methods.join('\n')}\n}`;

  return {
    name,
    unit: typeUnit(
      side === 'client' ? 'service' : 'behaviour',
      ctx.imports.list(),
      [{ name: exported, source, typeOnly: true }],
      `${side === 'client' ? 'service' : 'behaviour'} ${scope.schema.name}.${service.name}`
    ),
  };
}

function methodSource(side: Side, fn: ServiceFunction, ctx: EmitContext): string {
  const params = fn.params.map((param) => paramSource(param, ctx)).join(', ');
  const result = fn.oneway || fn.returns === 'void' ? 'void' : typeText(fn.returns, ctx);
  const returns = side === 'client' ? `Promise<${result}>` : `${result} | Promise<${result}>`;
  const lines: string[] = [];
  if (fn.oneway) {
    lines.push('  /** oneway: the caller does not wait for a reply */');
  }
  for (const thrown of fn.throws) {
    lines.push(`  /** @throws ${describeType(thrown.type)} (${thrown.name}) */`);
  }
  lines.push(`  ${fn.name}(${params}): ${returns};`);
  return lines.join('\n');
}

function paramSource(param: Field, ctx: EmitContext): string {
  const type = typeText(param.type, ctx);
  return `${param.name}: ${param.required ? type : `${type} | undefined`}`;
}
