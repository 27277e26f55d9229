// Compile errors. Every stage throws the first one it hits; nothing recovers.

export interface SourceLocation {
  line: number;
  column: number;
  file?: string;
}

export type StyleErrorKind =
  | 'ParseError'
  | 'CyclicImportError'
  | 'CyclicReferenceError'
  | 'DuplicateDeclarationError'
  | 'ReservedNameError'
  | 'UndefinedNameError'
  | 'UndefinedColorError'
  | 'TypeMismatchError'
  | 'MissingFieldError'
  | 'AssetNotFoundError'
  | 'ModifierIncompatibleError'
  | 'ConfigError';

/**
 * Base class for all compiler errors.
 * Carries an optional location and the source text it points into, so
 * format() can print the offending line with a caret.
 */
export abstract class StyleError extends Error {
  abstract readonly kind: StyleErrorKind;

  constructor(
    message: string,
    public readonly location?: SourceLocation,
    public source?: string
  ) {
    super(message);
  }

  /**
   * Human-readable report: "Kind: message", the location, and the source line.
   */
  format(): string {
    const lines = [`${this.kind}: ${this.message}`];
    if (this.location) {
      const file = this.location.file ?? '<input>';
      lines.push(`  at ${file}:${this.location.line}:${this.location.column}`);

      const sourceLine = this.source?.split('\n')[this.location.line - 1];
      if (sourceLine !== undefined) {
        lines.push('');
        lines.push(`  ${sourceLine}`);
        lines.push(`  ${' '.repeat(Math.max(0, this.location.column - 1))}^`);
      }
    }
    return lines.join('\n');
  }
}

export class ParseError extends StyleError {
  readonly kind = 'ParseError';

  constructor(
    message: string,
    public readonly token: string | undefined,
    location?: SourceLocation,
    source?: string
  ) {
    super(message, location, source);
    this.name = 'ParseError';
  }
}

export class CyclicImportError extends StyleError {
  readonly kind = 'CyclicImportError';

  constructor(public readonly cycle: string[], location?: SourceLocation) {
    super(`Circular import detected: ${cycle.join(' -> ')}`, location);
    this.name = 'CyclicImportError';
  }
}

export class CyclicReferenceError extends StyleError {
  readonly kind = 'CyclicReferenceError';

  constructor(public readonly cycle: string[], location?: SourceLocation) {
    super(`Circular reference detected: ${cycle.join(' -> ')}`, location);
    this.name = 'CyclicReferenceError';
  }
}

export class DuplicateDeclarationError extends StyleError {
  readonly kind = 'DuplicateDeclarationError';

  constructor(
    public readonly declName: string,
    public readonly firstOrigin: string,
    public readonly secondOrigin: string,
    location?: SourceLocation
  ) {
    super(`'${declName}' is declared in both ${firstOrigin} and ${secondOrigin}`, location);
    this.name = 'DuplicateDeclarationError';
  }
}

export class ReservedNameError extends StyleError {
  readonly kind = 'ReservedNameError';

  constructor(public readonly reservedName: string, location?: SourceLocation) {
    super(`'${reservedName}' is a reserved name and cannot be declared`, location);
    this.name = 'ReservedNameError';
  }
}

export class UndefinedNameError extends StyleError {
  readonly kind = 'UndefinedNameError';

  constructor(message: string, location?: SourceLocation) {
    super(message, location);
    this.name = 'UndefinedNameError';
  }
}

export class UndefinedColorError extends StyleError {
  readonly kind = 'UndefinedColorError';

  constructor(public readonly colorName: string, location?: SourceLocation) {
    super(`Color '${colorName}' is not defined in the palette`, location);
    this.name = 'UndefinedColorError';
  }
}

export class TypeMismatchError extends StyleError {
  readonly kind = 'TypeMismatchError';

  constructor(
    public readonly field: string,
    public readonly expected: string,
    public readonly actual: string,
    location?: SourceLocation,
    subject: 'field' | 'base' = 'field'
  ) {
    super(
      subject === 'field'
        ? `Field '${field}' expects ${expected}, got ${actual}`
        : `Base value '${field}' must be ${expected}, got ${actual}`,
      location
    );
    this.name = 'TypeMismatchError';
  }
}

export class MissingFieldError extends StyleError {
  readonly kind = 'MissingFieldError';

  constructor(
    public readonly valueName: string,
    public readonly field: string,
    location?: SourceLocation
  ) {
    super(`'${valueName}' never assigns field '${field}'`, location);
    this.name = 'MissingFieldError';
  }
}

export class AssetNotFoundError extends StyleError {
  readonly kind = 'AssetNotFoundError';

  constructor(public readonly stem: string, location?: SourceLocation) {
    super(`No icon asset found for '${stem}' (looked for .svg and .png)`, location);
    this.name = 'AssetNotFoundError';
  }
}

export class ModifierIncompatibleError extends StyleError {
  readonly kind = 'ModifierIncompatibleError';

  constructor(message: string, location?: SourceLocation) {
    super(message, location);
    this.name = 'ModifierIncompatibleError';
  }
}

export class ConfigError extends StyleError {
  readonly kind = 'ConfigError';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
