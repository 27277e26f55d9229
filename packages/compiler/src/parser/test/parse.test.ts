import { describe, expect, test } from 'vitest';
import { parse } from '../parse';

describe('Parser - declarations', () => {
  test('empty source', () => {
    expect(parse('')).toEqual({ path: '<input>', imports: [], types: [], values: [] });
  });

  test('records the file on the module and in locations', () => {
    const module = parse('a: 1px', { file: '/proj/main.style' });
    expect(module.path).toBe('/proj/main.style');
    expect(module.values[0].location).toEqual({ line: 1, column: 1, file: '/proj/main.style' });
  });

  test('using statements', () => {
    const module = parse(`
using "basic.style";
using "widgets/button.style"
a: 1px
`);
    expect(module.imports.map((u) => u.source)).toEqual(['basic.style', 'widgets/button.style']);
    expect(module.imports[1].location.line).toBe(3);
  });

  test('type declaration', () => {
    const module = parse(`
Button {
  height: pixels;
  text: TextStyle
}
`);
    expect(module.types).toHaveLength(1);
    expect(module.types[0]).toMatchObject({
      type: 'TypeDeclaration',
      name: 'Button',
      fields: [
        { name: 'height', typeRef: 'pixels' },
        { name: 'text', typeRef: 'TextStyle' },
      ],
    });
    expect(module.types[0].fields[1].location).toEqual({ line: 4, column: 3, file: undefined });
  });

  test('declared-type instantiation with and without base', () => {
    const module = parse(`
a: Btn { height: 30px; }
b: Btn(a) { }
c: Btn(a)
`);
    expect(module.values.map((v) => v.shape)).toMatchObject([
      { kind: 'struct', typeName: 'Btn', base: null, fields: [{ name: 'height', value: { type: 'PixelsLiteral', value: 30 } }] },
      { kind: 'struct', typeName: 'Btn', base: { name: 'a' }, fields: [] },
      { kind: 'struct', typeName: 'Btn', base: { name: 'a' }, fields: [] },
    ]);
  });

  test('anonymous group', () => {
    const module = parse(`
boxLayout {
  spacing: 8px;
  ratio: 0.5;
}
`);
    expect(module.types).toEqual([]);
    expect(module.values[0]).toMatchObject({
      name: 'boxLayout',
      shape: {
        kind: 'group',
        fields: [
          { name: 'spacing', value: { type: 'PixelsLiteral', value: 8 } },
          { name: 'ratio', value: { type: 'DoubleLiteral', value: 0.5 } },
        ],
      },
    });
  });

  test('simple values', () => {
    const module = parse(`
lineWidth: 1px;
count: 3
enabled: true
disabled: false
linkColor: windowActiveFg
accent: #FF8800
`);
    expect(module.values.map((v) => v.shape)).toMatchObject([
      { kind: 'simple', expression: { type: 'PixelsLiteral', value: 1 } },
      { kind: 'simple', expression: { type: 'IntLiteral', value: 3 } },
      { kind: 'simple', expression: { type: 'BoolLiteral', value: true } },
      { kind: 'simple', expression: { type: 'BoolLiteral', value: false } },
      { kind: 'simple', expression: { type: 'Reference', name: 'windowActiveFg' } },
      { kind: 'simple', expression: { type: 'ColorLiteral', hex: '#ff8800' } },
    ]);
  });

  test('semicolons are optional and comments are ignored', () => {
    const module = parse(`
// spacing constants
a: 1px b: 2px /* trailing */
c: 3px;
`);
    expect(module.values.map((v) => v.name)).toEqual(['a', 'b', 'c']);
  });
});

describe('Parser - constructors', () => {
  function expressionOf(source: string) {
    const shape = parse(source).values[0].shape;
    if (shape.kind !== 'simple') throw new Error('expected a simple value');
    return shape.expression;
  }

  test('geometry', () => {
    expect(expressionOf('m: margins(4px, 2px, 4px, 2px)')).toMatchObject({
      type: 'GeometryCall',
      callee: 'margins',
      args: [{ value: 4 }, { value: 2 }, { value: 4 }, { value: 2 }],
    });
    expect(expressionOf('s: size(16px 24px)')).toMatchObject({ type: 'GeometryCall', callee: 'size' });
    expect(expressionOf('p: point(-1px, 0px)')).toMatchObject({
      type: 'GeometryCall',
      callee: 'point',
      args: [{ value: -1 }, { value: 0 }],
    });
  });

  test('align', () => {
    expect(expressionOf('a: align(topleft)')).toMatchObject({ type: 'AlignExpression', value: 'topleft' });
  });

  test('font with flags and family', () => {
    expect(expressionOf('f: font(14px, bold, italic, "Open Sans")')).toMatchObject({
      type: 'FontExpression',
      size: { type: 'PixelsLiteral', value: 14 },
      flags: ['bold', 'italic'],
      family: 'Open Sans',
    });
  });

  test('font with size only', () => {
    expect(expressionOf('f: font(13px)')).toMatchObject({ type: 'FontExpression', flags: [], family: null });
  });

  test('repeated font flag is kept once', () => {
    expect(expressionOf('f: font(13px bold bold)')).toMatchObject({ flags: ['bold'] });
  });

  test('icon layers keep their order', () => {
    const expression = expressionOf('i: icon { { "icons/bg", windowBg }, { "icons/fg-16x16", #ffffff } }');
    expect(expression).toMatchObject({
      type: 'IconExpression',
      layers: [
        { path: 'icons/bg', color: { type: 'Reference', name: 'windowBg' } },
        { path: 'icons/fg-16x16', color: { type: 'ColorLiteral', hex: '#ffffff' } },
      ],
    });
  });

  test('inline structure literal as a field value', () => {
    const module = parse('b: Btn { text: TextStyle(base) { size: 12px } }');
    expect(module.values[0].shape).toMatchObject({
      kind: 'struct',
      fields: [
        {
          name: 'text',
          value: {
            type: 'StructLiteral',
            typeName: 'TextStyle',
            base: { name: 'base' },
            fields: [{ name: 'size', value: { type: 'PixelsLiteral', value: 12 } }],
          },
        },
      ],
    });
  });
});
