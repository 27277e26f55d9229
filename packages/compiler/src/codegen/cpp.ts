/**
 * C++ header generator
 *
 * One header per source module. Struct declarations come first, then one
 * `inline const` instance per value, each after the values it references.
 * Nothing here depends on time, environment or map iteration across runs,
 * so the same compilation unit always produces the same bytes.
 */
import { basename, dirname, extname, isAbsolute, relative, sep } from 'path';
import type { ColorValue } from '../colors';
import type { ResolvedAsset } from '../icons';
import type { ResolvedExpression, ResolvedIconLayer, ResolvedValue, Shape, ValueType } from '../semantic';
import { shapeKey } from '../semantic';
import { getKindDefinition } from '../type-system';

export interface UnitModule {
  path: string;
  dependencies: string[];
  /** Type names declared in this module, in source order */
  types: string[];
  /** Value names declared in this module, in source order */
  values: string[];
}

export interface CompilationUnit {
  root: string;
  /** Dependency-first module order */
  modules: UnitModule[];
  resolved: ReadonlyMap<string, ResolvedValue>;
  /** Shape of a declared structure type */
  typeShape(name: string): Shape;
}

export interface GeneratedFile {
  /** Output path relative to the output directory, '/' separated */
  path: string;
  source: string;
  /** Source module the file was generated from */
  module: string;
}

const INDENT = '\t';

/**
 * `<dir relative to the root file>/style_<basename>.h`. Modules outside the
 * root's directory (found through include dirs) are placed at the top level.
 */
export function headerPath(module: string, root: string): string {
  const name = `style_${basename(module, extname(module))}.h`;
  const rel = relative(dirname(root), dirname(module));
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return name;
  }
  return [...rel.split(sep), name].join('/');
}

export function generateUnit(unit: CompilationUnit): GeneratedFile[] {
  // Every header shares one namespace, so struct names are claimed unit-wide
  const claimed = new Set(unit.modules.flatMap((module) => module.types));
  return unit.modules.map((module) => ({
    path: headerPath(module.path, unit.root),
    source: new HeaderWriter(unit, module, claimed).write(),
    module: module.path,
  }));
}

// ============================================================================
// Literals
// ============================================================================

function formatDouble(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function formatString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function formatColor(color: ColorValue): string {
  return `style::color(${color.red}, ${color.green}, ${color.blue}, ${color.alpha})`;
}

function formatAsset(asset: ResolvedAsset, color: string): string {
  if (asset.format === 'vector') {
    const width = asset.size?.width ?? 0;
    const height = asset.size?.height ?? 0;
    return `style::icon_layer::vector(${formatString(asset.path)}, ${color}, ${width}, ${height})`;
  }
  const paths = asset.variants.map((variant) => formatString(variant.path)).join(', ');
  return `style::icon_layer::raster({ ${paths} }, ${color}, style::flip::${asset.flip ?? 'none'})`;
}

function formatIconLayer(layer: ResolvedIconLayer): string {
  return formatAsset(layer.asset, formatColor(layer.color));
}

/**
 * Initializer for a built-in kind. Structures go through the writer, which
 * knows their member order.
 */
function formatBuiltin(value: Exclude<ResolvedExpression, { kind: 'struct' }>): string {
  switch (value.kind) {
    case 'int':
    case 'pixels':
      return String(value.value);
    case 'double':
      return formatDouble(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'color':
      return formatColor(value.value);
    case 'margins':
      return `style::margins(${value.left}, ${value.top}, ${value.right}, ${value.bottom})`;
    case 'size':
      return `style::size(${value.width}, ${value.height})`;
    case 'point':
      return `style::point(${value.x}, ${value.y})`;
    case 'align':
      return `style::align::${value.value}`;
    case 'font': {
      const flags = value.flags.length > 0 ? value.flags.map((flag) => `style::font_flag_${flag}`).join(' | ') : '0';
      return `style::font(${value.size}, ${flags}, ${formatString(value.family ?? '')})`;
    }
    case 'icon':
      return `style::icon({ ${value.layers.map(formatIconLayer).join(', ')} })`;
  }
}

// ============================================================================
// Header
// ============================================================================

class HeaderWriter {
  private structs: string[] = [];
  /** Struct name per shape key, for shapes synthesized in this header */
  private synthesized = new Map<string, string>();
  private declaredKeys = new Map<string, string>();

  constructor(
    private readonly unit: CompilationUnit,
    private readonly module: UnitModule,
    private readonly claimed: Set<string>
  ) {}

  write(): string {
    for (const typeName of this.orderedTypes()) {
      this.emitStruct(typeName, this.unit.typeShape(typeName));
    }

    const instances = this.orderedValues().map((name) => this.instance(name));

    const lines = [
      `// Generated by stylec from ${this.displayName(this.module.path)}`,
      '#pragma once',
      '',
      '#include "style/style_core.h"',
      ...this.module.dependencies.map((dep) => `#include "${headerPath(dep, this.unit.root)}"`),
      '',
      'namespace style_gen {',
      '',
    ];

    for (const struct of this.structs) {
      lines.push(struct, '');
    }
    for (const instance of instances) {
      lines.push(instance, '');
    }

    lines.push('} // namespace style_gen', '');
    return lines.join('\n');
  }

  private displayName(path: string): string {
    const rel = relative(dirname(this.unit.root), path);
    return rel.startsWith('..') || isAbsolute(rel) ? basename(path) : rel.split(sep).join('/');
  }

  /**
   * This module's types, each after the same-module types its fields use.
   */
  private orderedTypes(): string[] {
    const own = new Set(this.module.types);
    const ordered: string[] = [];
    const seen = new Set<string>();

    const visit = (name: string): void => {
      if (seen.has(name)) return;
      seen.add(name);
      for (const field of this.unit.typeShape(name).fields) {
        if (field.type.kind === 'struct' && field.type.shape.typeName !== null && own.has(field.type.shape.typeName)) {
          visit(field.type.shape.typeName);
        }
      }
      ordered.push(name);
    };

    this.module.types.forEach(visit);
    return ordered;
  }

  /**
   * This module's values, each after the same-module values it references.
   * Values from other modules are already defined by the included headers.
   */
  private orderedValues(): string[] {
    const own = new Set(this.module.values);
    const ordered: string[] = [];
    const seen = new Set<string>();

    const visit = (name: string): void => {
      if (seen.has(name)) return;
      seen.add(name);
      for (const ref of this.resolved(name).references) {
        if (own.has(ref)) visit(ref);
      }
      ordered.push(name);
    };

    this.module.values.forEach(visit);
    return ordered;
  }

  private resolved(name: string): ResolvedValue {
    const value = this.unit.resolved.get(name);
    if (!value) {
      throw new Error(`Value '${name}' was not resolved`);
    }
    return value;
  }

  // ============================================================================
  // Structs
  // ============================================================================

  private emitStruct(name: string, shape: Shape): void {
    const members = shape.fields.map(
      (field) => `${INDENT}${this.memberType(field.type, `${name}_${field.name}`)} ${field.name};`
    );
    this.structs.push([`struct ${name} {`, ...members, '};'].join('\n'));
  }

  private memberType(type: ValueType, hint: string): string {
    if (type.kind === 'builtin') {
      return getKindDefinition(type.name).cppType;
    }
    return this.structName(type.shape, hint);
  }

  /**
   * Name of the struct for a shape. A shape equal to its declared type uses
   * the type's struct; any other shape gets one synthesized struct per
   * header, named after the first value that needed it. A name already taken
   * by a type or another synthesized struct gets a numeric suffix.
   */
  private structName(shape: Shape, hint: string): string {
    if (shape.typeName !== null && this.isDeclaredShape(shape.typeName, shape)) {
      return shape.typeName;
    }

    const key = `${shape.typeName ?? ''}{${shapeKey(shape)}}`;
    const existing = this.synthesized.get(key);
    if (existing) return existing;

    const name = this.claim(hint);
    this.synthesized.set(key, name);
    this.emitStruct(name, shape);
    return name;
  }

  private claim(hint: string): string {
    let name = hint;
    for (let n = 2; this.claimed.has(name); n++) {
      name = `${hint}_${n}`;
    }
    this.claimed.add(name);
    return name;
  }

  private isDeclaredShape(typeName: string, shape: Shape): boolean {
    let key = this.declaredKeys.get(typeName);
    if (key === undefined) {
      key = shapeKey(this.unit.typeShape(typeName));
      this.declaredKeys.set(typeName, key);
    }
    return key === shapeKey(shape);
  }

  // ============================================================================
  // Instances
  // ============================================================================

  private instance(name: string): string {
    const value = this.resolved(name);

    if (value.form === 'simple') {
      const expression = value.expression;
      if (expression.kind !== 'struct') {
        const type = getKindDefinition(expression.kind).cppType;
        return `inline const ${type} ${name} = ${formatBuiltin(expression)};`;
      }
      const type = this.structName(expression.shape, `${name}_Value`);
      return this.structInstance(type, name, expression.shape, expression.fields);
    }

    const hint = value.form === 'group' ? `${name}_Group` : `${value.shape.typeName ?? name}_${name}`;
    const type = this.structName(value.shape, hint);
    return this.structInstance(type, name, value.shape, value.fields);
  }

  private structInstance(
    type: string,
    name: string,
    shape: Shape,
    fields: ReadonlyMap<string, ResolvedExpression>
  ): string {
    const members = shape.fields.map(
      (field) => `${INDENT}${this.initializer(this.field(fields, field.name, name))}, // ${field.name}`
    );
    return [`inline const ${type} ${name} = {`, ...members, '};'].join('\n');
  }

  private field(fields: ReadonlyMap<string, ResolvedExpression>, field: string, owner: string): ResolvedExpression {
    const value = fields.get(field);
    if (!value) {
      throw new Error(`'${owner}' has no value for field '${field}'`);
    }
    return value;
  }

  private initializer(value: ResolvedExpression): string {
    if (value.kind !== 'struct') {
      return formatBuiltin(value);
    }
    const members = value.shape.fields.map((field) =>
      this.initializer(this.field(value.fields, field.name, value.shape.typeName ?? 'structure'))
    );
    return `{ ${members.join(', ')} }`;
  }
}
