// Resolved values: what the resolution engine produces and the generator consumes.

import type * as AST from '../ast';
import type { ColorValue } from '../colors';
import type { ResolvedAsset } from '../icons';
import type { SourceLocation } from '../errors';
import type { BuiltinKind } from '../type-system';

export type ValueType =
  | { kind: 'builtin'; name: BuiltinKind }
  | { kind: 'struct'; shape: Shape };

/** Ordered field list of a structure value */
export interface Shape {
  /** Declared structure type; null for anonymous groups */
  typeName: string | null;
  fields: ShapeField[];
}

export interface ShapeField {
  name: string;
  type: ValueType;
}

export interface ResolvedIconLayer {
  asset: ResolvedAsset;
  color: ColorValue;
}

export type ResolvedExpression =
  | { kind: 'int'; value: number }
  | { kind: 'pixels'; value: number }
  | { kind: 'double'; value: number }
  | { kind: 'bool'; value: boolean }
  /** `name` is the palette name for colors taken from the color source */
  | { kind: 'color'; value: ColorValue; name: string | null }
  | { kind: 'margins'; left: number; top: number; right: number; bottom: number }
  | { kind: 'size'; width: number; height: number }
  | { kind: 'point'; x: number; y: number }
  | { kind: 'align'; value: AST.AlignValue }
  | { kind: 'font'; size: number; flags: AST.FontFlag[]; family: string | null }
  /** Layers in paint order, first painted first */
  | { kind: 'icon'; layers: ResolvedIconLayer[] }
  | { kind: 'struct'; shape: Shape; fields: Map<string, ResolvedExpression> };

export type BuiltinExpression = Exclude<ResolvedExpression, { kind: 'struct' }>;

interface ResolvedValueBase {
  name: string;
  /** Path of the declaring module */
  module: string;
  location: SourceLocation;
  /** Values this one read while resolving (base and references), first use first */
  references: string[];
}

export interface ResolvedStructValue extends ResolvedValueBase {
  form: 'struct' | 'group';
  shape: Shape;
  /** Own copy; never shared with a base or a dependent */
  fields: Map<string, ResolvedExpression>;
}

export interface ResolvedSimpleValue extends ResolvedValueBase {
  form: 'simple';
  expression: ResolvedExpression;
}

export type ResolvedValue = ResolvedStructValue | ResolvedSimpleValue;

export function builtin(name: BuiltinKind): ValueType {
  return { kind: 'builtin', name };
}

export function typeOf(expression: ResolvedExpression): ValueType {
  return expression.kind === 'struct' ? { kind: 'struct', shape: expression.shape } : builtin(expression.kind);
}

/**
 * Name of a type as shown in messages: the kind, the structure name, or
 * the field list of an anonymous shape.
 */
export function describeType(type: ValueType): string {
  if (type.kind === 'builtin') return type.name;
  return type.shape.typeName ?? `{ ${type.shape.fields.map((f) => f.name).join(', ')} }`;
}

/**
 * Canonical text of a shape's field list, equal for structurally equal shapes.
 * Nested structure fields are keyed by their type name and fields.
 */
export function shapeKey(shape: Shape): string {
  return shape.fields.map((field) => `${field.name}:${typeKey(field.type)}`).join(';');
}

function typeKey(type: ValueType): string {
  return type.kind === 'builtin' ? type.name : `${type.shape.typeName ?? ''}{${shapeKey(type.shape)}}`;
}

/**
 * Copy of an expression whose structure field tables, at any depth, are new
 * maps. Built-in values are shared.
 */
export function cloneExpression(expression: ResolvedExpression): ResolvedExpression {
  if (expression.kind !== 'struct') return expression;
  return { kind: 'struct', shape: expression.shape, fields: cloneFields(expression.fields) };
}

function cloneFields(fields: ReadonlyMap<string, ResolvedExpression>): Map<string, ResolvedExpression> {
  const copy = new Map<string, ResolvedExpression>();
  for (const [name, value] of fields) {
    copy.set(name, cloneExpression(value));
  }
  return copy;
}

/** A value as it appears when another declaration references it */
export function asExpression(value: ResolvedValue): ResolvedExpression {
  if (value.form === 'simple') return cloneExpression(value.expression);
  return { kind: 'struct', shape: value.shape, fields: cloneFields(value.fields) };
}
