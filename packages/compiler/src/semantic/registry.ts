/**
 * Symbol Registry
 *
 * Holds every structure type and value declared across the compilation unit,
 * keyed by name. Types and values share one namespace; built-in kind names
 * are pre-registered and can't be redeclared.
 */
import type * as AST from '../ast';
import {
  CyclicReferenceError,
  DuplicateDeclarationError,
  ReservedNameError,
  UndefinedNameError,
  type SourceLocation,
} from '../errors';
import { isBuiltinKind, isReservedName } from '../type-system';

export interface RegisteredType {
  declaration: AST.TypeDeclaration;
  /** Path of the declaring module */
  module: string;
}

export interface RegisteredValue {
  declaration: AST.ValueDeclaration;
  module: string;
}

/** Where a name is looked up from, for visibility checks and error locations */
export interface LookupSite {
  module: string;
  location?: SourceLocation;
}

export interface SymbolRegistryOptions {
  /** For each module: the modules whose declarations it may reference */
  visible?: ReadonlyMap<string, ReadonlySet<string>>;
  /** How module paths appear in messages */
  displayName?: (module: string) => string;
}

export class SymbolRegistry {
  private types = new Map<string, RegisteredType>();
  private values = new Map<string, RegisteredValue>();
  private origins = new Map<string, { module: string; location: SourceLocation }>();

  private visible: ReadonlyMap<string, ReadonlySet<string>> | undefined;
  private displayName: (module: string) => string;

  constructor(options: SymbolRegistryOptions = {}) {
    this.visible = options.visible;
    this.displayName = options.displayName ?? ((module) => module);
  }

  // ============================================================================
  // Registration
  // ============================================================================

  /**
   * Register every type, then every value, of one module.
   */
  registerModule(module: { path: string; ast: AST.SourceModule }): void {
    for (const type of module.ast.types) {
      this.registerType(type, module.path);
    }
    for (const value of module.ast.values) {
      this.registerValue(value, module.path);
    }
  }

  registerType(declaration: AST.TypeDeclaration, module: string): void {
    this.claimName(declaration.name, module, declaration.location);

    const seen = new Map<string, AST.FieldDeclaration>();
    for (const field of declaration.fields) {
      const first = seen.get(field.name);
      if (first) {
        throw new DuplicateDeclarationError(
          field.name,
          `${declaration.name} line ${first.location.line}`,
          `${declaration.name} line ${field.location.line}`,
          field.location
        );
      }
      seen.set(field.name, field);
    }

    this.types.set(declaration.name, { declaration, module });
  }

  registerValue(declaration: AST.ValueDeclaration, module: string): void {
    this.claimName(declaration.name, module, declaration.location);
    this.values.set(declaration.name, { declaration, module });
  }

  private claimName(name: string, module: string, location: SourceLocation): void {
    if (isReservedName(name)) {
      throw new ReservedNameError(name, location);
    }

    const existing = this.origins.get(name);
    if (existing) {
      throw new DuplicateDeclarationError(
        name,
        `${this.displayName(existing.module)}:${existing.location.line}`,
        `${this.displayName(module)}:${location.line}`,
        location
      );
    }
    this.origins.set(name, { module, location });
  }

  // ============================================================================
  // Lookup
  // ============================================================================

  hasType(name: string): boolean {
    return this.types.has(name);
  }

  hasValue(name: string): boolean {
    return this.values.has(name);
  }

  /** Path of the module declaring `name`, if any */
  origin(name: string): string | undefined {
    return this.origins.get(name)?.module;
  }

  /**
   * Look up a type, or undefined when absent or not visible from `from`.
   */
  findType(name: string, from?: LookupSite): RegisteredType | undefined {
    const entry = this.types.get(name);
    return entry && this.isVisible(entry.module, from) ? entry : undefined;
  }

  findValue(name: string, from?: LookupSite): RegisteredValue | undefined {
    const entry = this.values.get(name);
    return entry && this.isVisible(entry.module, from) ? entry : undefined;
  }

  lookupType(name: string, from?: LookupSite): RegisteredType {
    const entry = this.types.get(name);
    if (!entry) {
      throw new UndefinedNameError(`Unknown type '${name}'`, from?.location);
    }
    this.assertVisible(name, entry.module, from);
    return entry;
  }

  lookupValue(name: string, from?: LookupSite): RegisteredValue {
    const entry = this.values.get(name);
    if (!entry) {
      throw new UndefinedNameError(`Unknown value '${name}'`, from?.location);
    }
    this.assertVisible(name, entry.module, from);
    return entry;
  }

  /** Type names in registration order */
  getTypeNames(): string[] {
    return [...this.types.keys()];
  }

  /** Value names in registration order */
  getValueNames(): string[] {
    return [...this.values.keys()];
  }

  /**
   * Whether a declaration in `module` may be referenced from `from`.
   * Without a visibility table every module sees every other.
   */
  isVisible(module: string, from?: LookupSite): boolean {
    if (!from || !this.visible) return true;
    return this.visible.get(from.module)?.has(module) ?? false;
  }

  private assertVisible(name: string, module: string, from?: LookupSite): void {
    if (from && !this.isVisible(module, from)) {
      throw new UndefinedNameError(
        `'${name}' is declared in ${this.displayName(module)}, which ${this.displayName(from.module)} does not use`,
        from.location
      );
    }
  }

  // ============================================================================
  // Type validation
  // ============================================================================

  /**
   * Check every field type reference: built-in kind or a visible structure.
   * Structures may not contain each other by value in a cycle.
   */
  validateTypes(): void {
    for (const { declaration, module } of this.types.values()) {
      for (const field of declaration.fields) {
        if (isBuiltinKind(field.typeRef)) continue;
        const target = this.types.get(field.typeRef);
        if (!target) {
          throw new UndefinedNameError(
            `Field '${field.name}' of '${declaration.name}' has unknown type '${field.typeRef}'`,
            field.location
          );
        }
        this.assertVisible(field.typeRef, target.module, { module, location: field.location });
      }
    }

    const done = new Set<string>();
    const stack: string[] = [];

    const visit = (name: string, location: SourceLocation): void => {
      if (done.has(name)) return;
      const onStack = stack.indexOf(name);
      if (onStack !== -1) {
        throw new CyclicReferenceError([...stack.slice(onStack), name], location);
      }

      const entry = this.types.get(name);
      if (!entry) return;

      stack.push(name);
      for (const field of entry.declaration.fields) {
        if (!isBuiltinKind(field.typeRef)) {
          visit(field.typeRef, field.location);
        }
      }
      stack.pop();
      done.add(name);
    };

    for (const { declaration } of this.types.values()) {
      visit(declaration.name, declaration.location);
    }
  }
}
