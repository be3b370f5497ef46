import { describe, expect, it } from 'vitest';

import { FileGroup } from '../../naming/file-group.js';
import { field, int, pointGroup, primitive, ref, schema, struct, treeGroup } from '../../test-utils/fixtures.js';
import { DEFAULT_OPTIONS, resolveOptions } from '../../types/options.js';
import { renderUnit } from '../../units/render.js';
import { synthesizeTestData } from '../synthesizer.js';

describe('synthesizeTestData', () => {
  it('writes the Point companion against fast-check and the runtime', () => {
    const [point] = synthesizeTestData(pointGroup().scope('geometry'), DEFAULT_OPTIONS);
    expect(point?.name).toBe('Point.TestData');
    expect(point && renderUnit(point.unit)).toBe(
      [
        '// Code generated by idlgen. DO NOT EDIT.',
        '// test data for Point',
        '',
        "import fc from 'fast-check';",
        "import * as rt from '@idlgen/runtime';",
        "import * as $Point from '../../gen/point.js';",
        '',
        'export function getGenerator(context: rt.TestDataContext): fc.Arbitrary<$Point.Point> {',
        "  rt.assertWithinDepth(context, 'Point');",
        '  return fc',
        '    .record({',
        '      x: rt.i32(),',
        '      y: rt.optional(() => rt.i32(), context),',
        '    })',
        '    .map((fields) => new $Point.Point(fields));',
        '}',
        '',
        'export function applyDefaults(value: $Point.Point, context: rt.TestDataContext): $Point.Point {',
        '  return new $Point.Point({',
        '    x: value.x,',
        '    y: rt.orDefault(value.y, 5),',
        '  });',
        '}',
        '',
      ].join('\n')
    );
  });

  it('orders companions typedefs, structs, then enums', () => {
    const units = synthesizeTestData(treeGroup().scope('tree'), DEFAULT_OPTIONS);
    expect(units.map((u) => u.name)).toEqual([
      'Acme.Tree.Labels.TestData',
      'Acme.Tree.Node.TestData',
      'Acme.Tree.Color.TestData',
    ]);
  });

  it('recurses into nested entities and calls itself unqualified', () => {
    const units = synthesizeTestData(treeGroup().scope('tree'), DEFAULT_OPTIONS);
    const node = units.find((u) => u.name === 'Acme.Tree.Node.TestData')?.unit;
    expect(node?.imports).toEqual([
      { style: 'default', alias: 'fc', from: 'fast-check' },
      { style: 'namespace', alias: 'rt', from: '@idlgen/runtime' },
      { style: 'namespace', alias: '$Acme_Tree_Node', from: '../../../../gen/acme/tree/node.js' },
      { style: 'namespace', alias: '$Acme_Tree_Color', from: '../../../../gen/acme/tree/color.js' },
    ]);
    expect(node?.body.map((d) => d.source)).toEqual([
      [
        'export function getGenerator(context: rt.TestDataContext): fc.Arbitrary<$Acme_Tree_Node.Node> {',
        "  rt.assertWithinDepth(context, 'Acme.Tree.Node');",
        '  return fc',
        '    .record({',
        '      id: rt.i32(),',
        '      parent: rt.optional(() => getGenerator(rt.descend(context)), context),',
        '      children: rt.listOf(() => getGenerator(rt.descend(context)), context),',
        '      color: rt.optional(() => rt.member($Acme_Tree_Color.Color.RED, $Acme_Tree_Color.Color.GREEN), context),',
        '      labels: rt.optional(() => rt.mapOf(() => rt.string(context), () => rt.i64(), context), context),',
        '    })',
        '    .map((fields) => new $Acme_Tree_Node.Node(fields));',
        '}',
      ].join('\n'),
      [
        'export function applyDefaults(value: $Acme_Tree_Node.Node, context: rt.TestDataContext): $Acme_Tree_Node.Node {',
        '  return new $Acme_Tree_Node.Node({',
        '    id: value.id,',
        '    parent: rt.mapPresent(value.parent, (v1) => applyDefaults(v1, context)),',
        '    children: rt.defaultList(value.children, (v2) => applyDefaults(v2, context)),',
        '    color: rt.orDefault(value.color, $Acme_Tree_Color.Color.GREEN),',
        '    labels: value.labels,',
        '  });',
        '}',
      ].join('\n'),
    ]);
  });

  it('defaults a struct literal it falls back to', () => {
    const group = new FileGroup([
      schema('n', {
        structs: [
          struct('Inner', [field(1, 'z', primitive('i32'), { default: int(9) })]),
          struct('Outer', [field(1, 'inner', ref('Inner'), { default: { kind: 'map', entries: [] } })]),
        ],
      }),
    ]);
    const outer = synthesizeTestData(group.scope('n'), DEFAULT_OPTIONS).find((u) => u.name === 'Outer.TestData')?.unit;
    expect(outer?.imports).toEqual([
      { style: 'default', alias: 'fc', from: 'fast-check' },
      { style: 'namespace', alias: 'rt', from: '@idlgen/runtime' },
      { style: 'namespace', alias: '$Outer', from: '../../gen/outer.js' },
      { style: 'namespace', alias: '$Inner_TestData', from: '../inner/test_data.js' },
      { style: 'namespace', alias: '$Inner', from: '../../gen/inner.js' },
    ]);
    expect(outer?.body[1]?.source).toBe(
      [
        'export function applyDefaults(value: $Outer.Outer, context: rt.TestDataContext): $Outer.Outer {',
        '  return new $Outer.Outer({',
        '    inner: $Inner_TestData.applyDefaults(rt.orDefault(value.inner, new $Inner.Inner({})), context),',
        '  });',
        '}',
      ].join('\n')
    );
  });

  it('draws the first member of an enum', () => {
    const units = synthesizeTestData(treeGroup().scope('tree'), DEFAULT_OPTIONS);
    const color = units.find((u) => u.name === 'Acme.Tree.Color.TestData')?.unit;
    expect(color?.body.map((d) => d.source)).toEqual([
      [
        'export function getGenerator(context: rt.TestDataContext): fc.Arbitrary<$Acme_Tree_Color.Color> {',
        '  return rt.point(() => $Acme_Tree_Color.Color.RED);',
        '}',
      ].join('\n'),
      [
        'export function applyDefaults(value: $Acme_Tree_Color.Color, context: rt.TestDataContext): $Acme_Tree_Color.Color {',
        '  return value;',
        '}',
      ].join('\n'),
    ]);
  });

  it('types a typedef companion as the aliased type', () => {
    const units = synthesizeTestData(treeGroup().scope('tree'), DEFAULT_OPTIONS);
    const labels = units.find((u) => u.name === 'Acme.Tree.Labels.TestData')?.unit;
    expect(labels?.doc).toBe('test data for Acme.Tree.Labels');
    expect(labels?.body[0]?.source).toBe(
      [
        'export function getGenerator(context: rt.TestDataContext): fc.Arbitrary<Map<string, bigint>> {',
        '  return rt.mapOf(() => rt.string(context), () => rt.i64(), context);',
        '}',
      ].join('\n')
    );
  });

  it('honours the configured suffix, runtime module and layout', () => {
    const options = resolveOptions({
      testDataSuffix: 'Fixtures',
      runtimeModule: '@acme/testing',
      layout: { main: 'src/gen', testData: 'test/gen' },
    });
    const [point] = synthesizeTestData(pointGroup().scope('geometry'), options);
    expect(point?.name).toBe('Point.Fixtures');
    expect(point?.unit.imports).toEqual([
      { style: 'default', alias: 'fc', from: 'fast-check' },
      { style: 'namespace', alias: 'rt', from: '@acme/testing' },
      { style: 'namespace', alias: '$Point', from: '../../../src/gen/point.js' },
    ]);
  });
});
