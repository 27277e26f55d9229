// Kind compatibility rules

import { getKindDefinition, type BuiltinKind } from './definitions';

/**
 * Check if a value of kind `source` can be assigned to a field of kind `target`.
 */
export function kindsCompatible(source: BuiltinKind, target: BuiltinKind): boolean {
  if (source === target) return true;
  return getKindDefinition(target).acceptsFrom.includes(source);
}
