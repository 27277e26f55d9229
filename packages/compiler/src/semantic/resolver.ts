/**
 * Resolution Engine
 *
 * Computes the final field table of every value declaration. Values are
 * resolved on demand: a reference or base triggers resolution of the named
 * value first, so declaration order across and within files doesn't matter.
 *
 * Per-name status is Unresolved (absent), InProgress or Resolved. Reaching an
 * InProgress name again means the values depend on each other in a cycle.
 *
 * Resolution is synchronous. Icon assets are probed before it starts and
 * handed in as an AssetTable.
 */
import type * as AST from '../ast';
import {
  CyclicReferenceError,
  DuplicateDeclarationError,
  MissingFieldError,
  TypeMismatchError,
  UndefinedColorError,
  UndefinedNameError,
  type SourceLocation,
} from '../errors';
import { parseHexColor, type ColorSource } from '../colors';
import { applyModifiers, parseIconPath, type AssetTable } from '../icons';
import type { CompileLogger } from '../logger';
import { isBuiltinKind, kindsCompatible, type BuiltinKind } from '../type-system';
import type { LookupSite, RegisteredValue, SymbolRegistry } from './registry';
import {
  asExpression,
  builtin,
  cloneExpression,
  describeType,
  typeOf,
  type BuiltinExpression,
  type ResolvedExpression,
  type ResolvedValue,
  type Shape,
  type ShapeField,
  type ValueType,
} from './types';

export interface ResolutionEngineOptions {
  registry: SymbolRegistry;
  colors: ColorSource;
  /** Prefetched icon probes; stems missing from the table count as not found */
  assets?: AssetTable;
  logger?: CompileLogger;
  displayName?: (module: string) => string;
}

/** Where an expression sits while it is being evaluated */
interface Scope {
  /** Declaration (or nested literal path) being built, e.g. `button.text` */
  owner: string;
  module: string;
  /** Field name reported in type errors */
  field: string;
  /** Collects the value names this declaration reads */
  references: Set<string>;
}

interface StructSpec {
  typeName: string | null;
  base: AST.BaseReference | null;
  fields: AST.FieldAssignment[];
  location: SourceLocation;
}

const PIXELS = builtin('pixels');
const COLOR = builtin('color');

function widen(value: BuiltinExpression, target: BuiltinKind): BuiltinExpression {
  if (value.kind === 'int' && target === 'double') {
    return { kind: 'double', value: value.value };
  }
  throw new Error(`No widening from ${value.kind} to ${target}`);
}

export class ResolutionEngine {
  private status = new Map<string, 'in-progress' | ResolvedValue>();
  private chain: string[] = [];
  private typeShapes = new Map<string, Shape>();
  private shaping = new Set<string>();

  private registry: SymbolRegistry;
  private colors: ColorSource;
  private assets: AssetTable;
  private logger: CompileLogger | undefined;
  private displayName: (module: string) => string;

  constructor(options: ResolutionEngineOptions) {
    this.registry = options.registry;
    this.colors = options.colors;
    this.assets = options.assets ?? new Map();
    this.logger = options.logger;
    this.displayName = options.displayName ?? ((module) => module);
  }

  /**
   * Resolve every registered value, in registration order.
   */
  resolveAll(): Map<string, ResolvedValue> {
    const table = new Map<string, ResolvedValue>();
    for (const name of this.registry.getValueNames()) {
      table.set(name, this.resolve(name));
    }
    return table;
  }

  /**
   * Resolve one value (and, first, everything it depends on).
   * `from` is the referencing site, used for visibility and error locations.
   */
  resolve(name: string, from?: LookupSite): ResolvedValue {
    const entry = this.registry.lookupValue(name, from);

    const state = this.status.get(name);
    if (state === 'in-progress') {
      const start = this.chain.indexOf(name);
      throw new CyclicReferenceError(
        [...this.chain.slice(start), name],
        from?.location ?? entry.declaration.location
      );
    }
    if (state) return state;

    this.status.set(name, 'in-progress');
    this.chain.push(name);
    try {
      const resolved = this.resolveDeclaration(entry);
      this.status.set(name, resolved);
      this.logger?.valueResolved(
        name,
        this.displayName(entry.module),
        resolved.form === 'simple' ? 0 : resolved.fields.size
      );
      return resolved;
    } finally {
      this.chain.pop();
      if (this.status.get(name) === 'in-progress') {
        this.status.delete(name);
      }
    }
  }

  /**
   * Field list of a declared structure type, with structure-typed fields
   * expanded to their own shapes.
   */
  typeShape(name: string, from?: LookupSite): Shape {
    // Visibility depends on the asking module, so it is checked before the cache
    const entry = this.registry.lookupType(name, from);
    const cached = this.typeShapes.get(name);
    if (cached) return cached;

    if (this.shaping.has(name)) {
      throw new CyclicReferenceError([...this.shaping, name], entry.declaration.location);
    }

    this.shaping.add(name);
    try {
      const shape: Shape = {
        typeName: name,
        fields: entry.declaration.fields.map((field): ShapeField => ({
          name: field.name,
          type: isBuiltinKind(field.typeRef)
            ? builtin(field.typeRef)
            : { kind: 'struct', shape: this.typeShape(field.typeRef, { module: entry.module, location: field.location }) },
        })),
      };
      this.typeShapes.set(name, shape);
      return shape;
    } finally {
      this.shaping.delete(name);
    }
  }

  // ============================================================================
  // Declarations
  // ============================================================================

  private resolveDeclaration({ declaration, module }: RegisteredValue): ResolvedValue {
    const references = new Set<string>();
    const scope: Scope = { owner: declaration.name, module, field: declaration.name, references };
    const base = { name: declaration.name, module, location: declaration.location };
    const shape = declaration.shape;

    switch (shape.kind) {
      case 'simple': {
        const expression = this.evaluate(shape.expression, undefined, scope);
        return { ...base, form: 'simple', expression, references: [...references] };
      }

      case 'group': {
        const built = this.buildStruct(
          { typeName: null, base: null, fields: shape.fields, location: declaration.location },
          scope
        );
        return { ...base, form: 'group', ...built, references: [...references] };
      }

      case 'struct': {
        const built = this.buildStruct(
          { typeName: shape.typeName, base: shape.base, fields: shape.fields, location: declaration.location },
          scope
        );
        return { ...base, form: 'struct', ...built, references: [...references] };
      }
    }
  }

  /**
   * Build a structure's shape and field table:
   * 1. seed the shape from the declared type
   * 2. copy fields from the base; fields the type lacks widen the shape
   * 3. apply local assignments in order; unknown fields widen the shape
   * 4. every field of the shape must have a value
   */
  private buildStruct(spec: StructSpec, scope: Scope): { shape: Shape; fields: Map<string, ResolvedExpression> } {
    const shapeFields = new Map<string, ValueType>();
    const values = new Map<string, ResolvedExpression>();

    let declared: Shape | null = null;
    if (spec.typeName !== null) {
      declared = this.typeShape(spec.typeName, { module: scope.module, location: spec.location });
      for (const field of declared.fields) {
        shapeFields.set(field.name, field.type);
      }
    }

    if (spec.base) {
      const baseValue = this.resolve(spec.base.name, { module: scope.module, location: spec.base.location });
      scope.references.add(spec.base.name);
      const baseExpression = asExpression(baseValue);
      const expected = declared ? describeType({ kind: 'struct', shape: declared }) : 'a structure';

      if (baseExpression.kind !== 'struct') {
        throw new TypeMismatchError(
          spec.base.name,
          expected,
          describeType(typeOf(baseExpression)),
          spec.base.location,
          'base'
        );
      }

      for (const [name, type] of shapeFields) {
        const inherited = baseExpression.fields.get(name);
        if (!inherited) {
          throw new TypeMismatchError(
            spec.base.name,
            expected,
            describeType(typeOf(baseExpression)),
            spec.base.location,
            'base'
          );
        }
        values.set(name, this.convert(inherited, type, name, spec.base.location));
      }

      // Fields the base added beyond the declared type carry over as they are
      for (const field of baseExpression.shape.fields) {
        if (shapeFields.has(field.name)) continue;
        const inherited = baseExpression.fields.get(field.name);
        if (inherited) {
          shapeFields.set(field.name, field.type);
          values.set(field.name, cloneExpression(inherited));
        }
      }
    }

    const assigned = new Map<string, AST.FieldAssignment>();
    for (const assignment of spec.fields) {
      const previous = assigned.get(assignment.name);
      if (previous) {
        throw new DuplicateDeclarationError(
          assignment.name,
          `${scope.owner} line ${previous.location.line}`,
          `${scope.owner} line ${assignment.location.line}`,
          assignment.location
        );
      }
      assigned.set(assignment.name, assignment);

      const expected = shapeFields.get(assignment.name);
      const fieldScope: Scope = { ...scope, field: assignment.name };
      const value = this.evaluate(assignment.value, expected, fieldScope);

      if (expected) {
        values.set(assignment.name, this.convert(value, expected, assignment.name, assignment.value.location));
      } else {
        shapeFields.set(assignment.name, typeOf(value));
        values.set(assignment.name, value);
      }
    }

    for (const name of shapeFields.keys()) {
      if (!values.has(name)) {
        throw new MissingFieldError(scope.owner, name, spec.location);
      }
    }

    const shape: Shape = {
      typeName: spec.typeName,
      fields: [...shapeFields].map(([name, type]) => ({ name, type })),
    };

    // Field table in shape order
    const fields = new Map<string, ResolvedExpression>();
    for (const field of shape.fields) {
      const value = values.get(field.name);
      if (value) fields.set(field.name, value);
    }

    return { shape, fields };
  }

  // ============================================================================
  // Expressions
  // ============================================================================

  /**
   * Evaluate an expression. `expected` only steers how bare names are read
   * (palette colors); checking against it is done by convert().
   */
  private evaluate(expression: AST.Expression, expected: ValueType | undefined, scope: Scope): ResolvedExpression {
    switch (expression.type) {
      case 'IntLiteral':
        return { kind: 'int', value: expression.value };

      case 'PixelsLiteral':
        return { kind: 'pixels', value: expression.value };

      case 'DoubleLiteral':
        return { kind: 'double', value: expression.value };

      case 'BoolLiteral':
        return { kind: 'bool', value: expression.value };

      case 'ColorLiteral': {
        const color = parseHexColor(expression.hex);
        if (!color) {
          throw new UndefinedColorError(expression.hex, expression.location);
        }
        return { kind: 'color', value: color, name: null };
      }

      case 'Reference':
        return this.evaluateReference(expression, expected, scope);

      case 'GeometryCall':
        return this.evaluateGeometry(expression, scope);

      case 'AlignExpression':
        return { kind: 'align', value: expression.value };

      case 'FontExpression':
        return {
          kind: 'font',
          size: this.evaluatePixels(expression.size, scope),
          flags: [...expression.flags],
          family: expression.family,
        };

      case 'IconExpression':
        return {
          kind: 'icon',
          layers: expression.layers.map((layer) => {
            const iconPath = parseIconPath(layer.path, layer.location);
            const asset = applyModifiers(iconPath, this.assets.get(iconPath.stem) ?? null, layer.location);
            const color = this.evaluate(layer.color, COLOR, scope);
            if (color.kind !== 'color') {
              throw new TypeMismatchError(scope.field, 'color', describeType(typeOf(color)), layer.color.location);
            }
            return { asset, color: color.value };
          }),
        };

      case 'StructLiteral': {
        const built = this.buildStruct(
          {
            typeName: expression.typeName,
            base: expression.base,
            fields: expression.fields,
            location: expression.location,
          },
          { ...scope, owner: `${scope.owner}.${scope.field}` }
        );
        return { kind: 'struct', ...built };
      }
    }
  }

  private evaluateGeometry(call: AST.GeometryCall, scope: Scope): ResolvedExpression {
    const args = call.args.map((arg) => this.evaluatePixels(arg, scope));
    switch (call.callee) {
      case 'margins':
        return { kind: 'margins', left: args[0], top: args[1], right: args[2], bottom: args[3] };
      case 'size':
        return { kind: 'size', width: args[0], height: args[1] };
      case 'point':
        return { kind: 'point', x: args[0], y: args[1] };
    }
  }

  private evaluatePixels(expression: AST.Expression, scope: Scope): number {
    const value = this.evaluate(expression, PIXELS, scope);
    if (value.kind !== 'pixels') {
      throw new TypeMismatchError(scope.field, 'pixels', describeType(typeOf(value)), expression.location);
    }
    return value.value;
  }

  /**
   * A bare name is a value when one is declared, otherwise a palette color
   * if a color (or anything) is acceptable here.
   */
  private evaluateReference(reference: AST.Reference, expected: ValueType | undefined, scope: Scope): ResolvedExpression {
    if (this.registry.hasValue(reference.name)) {
      const value = this.resolve(reference.name, { module: scope.module, location: reference.location });
      scope.references.add(reference.name);
      return asExpression(value);
    }

    const wantsColor = !expected || (expected.kind === 'builtin' && expected.name === 'color');
    if (wantsColor) {
      const color = this.colors.resolveColor(reference.name);
      if (color) {
        return { kind: 'color', value: color, name: reference.name };
      }
      if (expected) {
        throw new UndefinedColorError(reference.name, reference.location);
      }
    }

    throw new UndefinedNameError(`Unknown name '${reference.name}'`, reference.location);
  }

  /**
   * Check a value against the type its field expects. Built-in kinds may
   * widen (int to double); a structure value fits a structure type when it
   * has every field of that type, and is projected onto it.
   */
  private convert(
    value: ResolvedExpression,
    expected: ValueType,
    field: string,
    location: SourceLocation
  ): ResolvedExpression {
    const mismatch = () =>
      new TypeMismatchError(field, describeType(expected), describeType(typeOf(value)), location);

    if (expected.kind === 'builtin') {
      if (value.kind === 'struct') throw mismatch();
      if (value.kind === expected.name) return value;
      if (kindsCompatible(value.kind, expected.name)) return widen(value, expected.name);
      throw mismatch();
    }

    if (value.kind !== 'struct') throw mismatch();

    const fields = new Map<string, ResolvedExpression>();
    for (const expectedField of expected.shape.fields) {
      const inner = value.fields.get(expectedField.name);
      if (!inner) throw mismatch();
      fields.set(expectedField.name, this.convert(inner, expectedField.type, field, location));
    }
    return { kind: 'struct', shape: expected.shape, fields };
  }
}
