export { loadModuleGraph, orderModules, displayPath } from './graph';
export type { LoadedModule, ModuleGraph, LoadOptions } from './graph';
export { FileSystemSourceReader, MemorySourceReader } from './reader';
export type { SourceReader } from './reader';
