// AST for .style source files.
// Produced once per file by the parser and never mutated afterwards.

import type { SourceLocation } from '../errors';

export type { SourceLocation };

// ============================================================================
// Module
// ============================================================================

export interface SourceModule {
  /** Absolute (or reader-normalized) path of the file */
  path: string;
  imports: UsingDeclaration[];
  types: TypeDeclaration[];
  values: ValueDeclaration[];
}

export interface UsingDeclaration {
  type: 'UsingDeclaration';
  /** Path as written between the quotes */
  source: string;
  location: SourceLocation;
}

// ============================================================================
// Type declarations
// ============================================================================

export interface TypeDeclaration {
  type: 'TypeDeclaration';
  name: string;
  fields: FieldDeclaration[];
  location: SourceLocation;
}

export interface FieldDeclaration {
  name: string;
  /** Built-in kind name or structure name */
  typeRef: string;
  location: SourceLocation;
}

// ============================================================================
// Value declarations
// ============================================================================

/**
 * How a value declares its shape.
 * - struct: `name: Type { ... }` or `name: Type(base) { ... }`
 * - group:  `name { ... }` (shape inferred from its own assignments)
 * - simple: `name: expr;`
 */
export type ValueShape =
  | { kind: 'struct'; typeName: string; base: BaseReference | null; fields: FieldAssignment[] }
  | { kind: 'group'; fields: FieldAssignment[] }
  | { kind: 'simple'; expression: Expression };

export interface ValueDeclaration {
  type: 'ValueDeclaration';
  name: string;
  shape: ValueShape;
  location: SourceLocation;
}

export interface BaseReference {
  name: string;
  location: SourceLocation;
}

export interface FieldAssignment {
  name: string;
  value: Expression;
  location: SourceLocation;
}

// ============================================================================
// Expressions
// ============================================================================

export type Expression =
  | IntLiteral
  | PixelsLiteral
  | DoubleLiteral
  | BoolLiteral
  | ColorLiteral
  | Reference
  | GeometryCall
  | AlignExpression
  | FontExpression
  | IconExpression
  | StructLiteral;

export interface IntLiteral {
  type: 'IntLiteral';
  value: number;
  location: SourceLocation;
}

export interface PixelsLiteral {
  type: 'PixelsLiteral';
  value: number;
  location: SourceLocation;
}

export interface DoubleLiteral {
  type: 'DoubleLiteral';
  value: number;
  location: SourceLocation;
}

export interface BoolLiteral {
  type: 'BoolLiteral';
  value: boolean;
  location: SourceLocation;
}

/** `#rrggbb` or `#rrggbbaa`, kept as written */
export interface ColorLiteral {
  type: 'ColorLiteral';
  hex: string;
  location: SourceLocation;
}

/** Bare identifier: a value or a palette color */
export interface Reference {
  type: 'Reference';
  name: string;
  location: SourceLocation;
}

export type GeometryKind = 'margins' | 'size' | 'point';

/** margins(l, t, r, b), size(w, h), point(x, y) */
export interface GeometryCall {
  type: 'GeometryCall';
  callee: GeometryKind;
  args: Expression[];
  location: SourceLocation;
}

export const ALIGN_VALUES = [
  'center',
  'left',
  'right',
  'top',
  'bottom',
  'topleft',
  'topright',
  'bottomleft',
  'bottomright',
] as const;

export type AlignValue = typeof ALIGN_VALUES[number];

export interface AlignExpression {
  type: 'AlignExpression';
  value: AlignValue;
  location: SourceLocation;
}

export const FONT_FLAGS = ['bold', 'semibold', 'italic', 'underline', 'monospace'] as const;

export type FontFlag = typeof FONT_FLAGS[number];

export interface FontExpression {
  type: 'FontExpression';
  size: Expression;
  flags: FontFlag[];
  family: string | null;
  location: SourceLocation;
}

export interface IconLayerExpression {
  /** Path string as written, modifiers included */
  path: string;
  color: Expression;
  location: SourceLocation;
}

export interface IconExpression {
  type: 'IconExpression';
  layers: IconLayerExpression[];
  location: SourceLocation;
}

/** Inline `Type { ... }` / `Type(base) { ... }` used as a field value */
export interface StructLiteral {
  type: 'StructLiteral';
  typeName: string;
  base: BaseReference | null;
  fields: FieldAssignment[];
  location: SourceLocation;
}
