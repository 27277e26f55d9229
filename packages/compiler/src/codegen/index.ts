export { generateUnit, headerPath } from './cpp';
export type { CompilationUnit, GeneratedFile, UnitModule } from './cpp';
export { writeGeneratedFiles } from './writer';
export type { WriteOptions, WriteResult } from './writer';
