/**
 * Type System
 *
 * Built-in kind knowledge shared by the registry, the resolver and the
 * code generator.
 */

export {
  BUILTIN_KINDS,
  KIND_DEFINITIONS,
  KEYWORDS,
  isBuiltinKind,
  isReservedName,
  getKindDefinition,
} from './definitions';
export type { BuiltinKind, KindDefinition } from './definitions';

export { kindsCompatible } from './compatibility';
