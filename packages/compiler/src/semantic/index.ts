export { SymbolRegistry } from './registry';
export type { LookupSite, RegisteredType, RegisteredValue, SymbolRegistryOptions } from './registry';
export { ResolutionEngine } from './resolver';
export type { ResolutionEngineOptions } from './resolver';
export { asExpression, builtin, cloneExpression, describeType, shapeKey, typeOf } from './types';
export type {
  BuiltinExpression,
  ResolvedExpression,
  ResolvedIconLayer,
  ResolvedSimpleValue,
  ResolvedStructValue,
  ResolvedValue,
  Shape,
  ShapeField,
  ValueType,
} from './types';
