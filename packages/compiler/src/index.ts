export { VERSION } from './version';

// Re-export public API
export { StyleLexer, tokenize, allTokens } from './lexer';
export { styleParser } from './parser';
export { parse } from './parser/parse';
export * as AST from './ast';
export * from './errors';

export { compile, collectIconLayers } from './compile';
export type { CompileOptions, CompileResult } from './compile';
export { parseArgs, USAGE } from './config';
export type { CliCommand, CompilerConfig } from './config';

export * from './colors';
export * from './icons';
export * from './modules';
export * from './semantic';
export * from './codegen';
export * from './type-system';
export { CompileLogger } from './logger';
export type { CompileLoggerOptions, LogEvent } from './logger';
