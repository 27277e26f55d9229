/**
 * Built-in Kinds
 *
 * Central table of the value kinds the language understands natively.
 * Each kind's generated member type and accepted literal kinds are defined
 * in one place.
 */

export const BUILTIN_KINDS = [
  'int',
  'bool',
  'pixels',
  'double',
  'color',
  'icon',
  'margins',
  'size',
  'point',
  'align',
  'font',
] as const;

export type BuiltinKind = typeof BUILTIN_KINDS[number];

export interface KindDefinition {
  /** The kind name as written in a type declaration (e.g. 'pixels') */
  name: BuiltinKind;
  /** Member type in the generated C++ struct */
  cppType: string;
  /** Constructor syntax that builds a value of this kind, if any */
  constructorName: string | null;
  /** Other kinds a field of this kind accepts without conversion syntax */
  acceptsFrom: readonly BuiltinKind[];
}

export const KIND_DEFINITIONS: ReadonlyMap<BuiltinKind, KindDefinition> = new Map<BuiltinKind, KindDefinition>([
  ['int', { name: 'int', cppType: 'int', constructorName: null, acceptsFrom: [] }],
  ['bool', { name: 'bool', cppType: 'bool', constructorName: null, acceptsFrom: [] }],
  ['pixels', { name: 'pixels', cppType: 'int', constructorName: null, acceptsFrom: [] }],
  ['double', { name: 'double', cppType: 'double', constructorName: null, acceptsFrom: ['int'] }],
  ['color', { name: 'color', cppType: 'style::color', constructorName: null, acceptsFrom: [] }],
  ['icon', { name: 'icon', cppType: 'style::icon', constructorName: 'icon', acceptsFrom: [] }],
  ['margins', { name: 'margins', cppType: 'style::margins', constructorName: 'margins', acceptsFrom: [] }],
  ['size', { name: 'size', cppType: 'style::size', constructorName: 'size', acceptsFrom: [] }],
  ['point', { name: 'point', cppType: 'style::point', constructorName: 'point', acceptsFrom: [] }],
  ['align', { name: 'align', cppType: 'style::align', constructorName: 'align', acceptsFrom: [] }],
  ['font', { name: 'font', cppType: 'style::font', constructorName: 'font', acceptsFrom: [] }],
]);

/** Keywords that can never name a declaration */
export const KEYWORDS = ['using', 'true', 'false'] as const;

export function isBuiltinKind(name: string): name is BuiltinKind {
  return BUILTIN_KINDS.some((kind) => kind === name);
}

/**
 * Whether a name collides with a built-in kind (in any letter case) or a keyword.
 */
export function isReservedName(name: string): boolean {
  const lower = name.toLowerCase();
  return isBuiltinKind(lower) || KEYWORDS.some((keyword) => keyword === lower);
}

export function getKindDefinition(kind: BuiltinKind): KindDefinition {
  const def = KIND_DEFINITIONS.get(kind);
  if (!def) {
    throw new Error(`No definition for built-in kind '${kind}'`);
  }
  return def;
}
