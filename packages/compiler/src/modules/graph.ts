// Module graph - loads the `using` closure of a root file, detects cycles,
// and orders modules so every module comes after everything it uses.

import * as AST from '../ast';
import { parse } from '../parser/parse';
import { CyclicImportError, StyleError, UndefinedNameError } from '../errors';
import type { CompileLogger } from '../logger';
import type { SourceReader } from './reader';
import { resolve, dirname, relative } from 'path';

export interface LoadedModule {
  /** Absolute path, the module's identity */
  path: string;
  /** Source text, kept for error reports */
  source: string;
  ast: AST.SourceModule;
  /** Resolved paths of direct `using` edges, in the order written */
  dependencies: string[];
  /** The `using` statement that introduced each dependency */
  usingSites: ReadonlyMap<string, AST.UsingDeclaration>;
}

export interface ModuleGraph {
  root: string;
  /** Dependency-first order; the root module is last */
  order: LoadedModule[];
  modules: ReadonlyMap<string, LoadedModule>;
  /** For each module: itself plus every module it reaches through `using` */
  visible: ReadonlyMap<string, ReadonlySet<string>>;
}

export interface LoadOptions {
  reader: SourceReader;
  /** Searched in order after the importing file's own directory */
  includeDirs?: string[];
  logger?: CompileLogger;
}

/**
 * Path shown in messages: relative to the root file's directory when inside it.
 */
export function displayPath(path: string, root: string): string {
  const rel = relative(dirname(root), path);
  return rel.startsWith('..') ? path : rel;
}

// Resolve a using path against the importing file's directory, then include dirs
async function resolveUsing(
  using: AST.UsingDeclaration,
  fromPath: string,
  options: LoadOptions
): Promise<string> {
  const candidates = [
    resolve(dirname(fromPath), using.source),
    ...(options.includeDirs ?? []).map((dir) => resolve(dir, using.source)),
  ];

  for (const candidate of candidates) {
    if (await options.reader.exists(candidate)) {
      return candidate;
    }
  }

  throw new UndefinedNameError(`Cannot find module '${using.source}'`, using.location);
}

async function loadOne(path: string, options: LoadOptions): Promise<LoadedModule> {
  const source = await options.reader.readFile(path);
  const ast = parse(source, { file: path });

  const dependencies: string[] = [];
  const usingSites = new Map<string, AST.UsingDeclaration>();
  for (const using of ast.imports) {
    let depPath: string;
    try {
      depPath = await resolveUsing(using, path, options);
    } catch (error) {
      if (error instanceof StyleError) {
        error.source ??= source;
      }
      throw error;
    }
    // Repeating the same using twice is harmless
    if (!usingSites.has(depPath)) {
      dependencies.push(depPath);
      usingSites.set(depPath, using);
    }
  }

  options.logger?.moduleParsed(path, {
    imports: ast.imports.length,
    types: ast.types.length,
    values: ast.values.length,
  });

  return { path, source, ast, dependencies, usingSites };
}

/**
 * Load the root file and its transitive `using` closure.
 * Each file is read and parsed once, whatever the number of paths reaching it;
 * independent files load concurrently.
 */
export async function loadModuleGraph(rootPath: string, options: LoadOptions): Promise<ModuleGraph> {
  const root = resolve(rootPath);
  if (!(await options.reader.exists(root))) {
    throw new UndefinedNameError(`Cannot find root file '${rootPath}'`);
  }

  const pending = new Map<string, Promise<LoadedModule>>();

  const schedule = (path: string): void => {
    if (pending.has(path)) return;
    pending.set(
      path,
      loadOne(path, options).then((loaded) => {
        loaded.dependencies.forEach(schedule);
        return loaded;
      })
    );
  };

  schedule(root);

  // Children are scheduled before their parent settles, so once a round adds
  // nothing new the whole closure is known.
  let results: PromiseSettledResult<LoadedModule>[] = [];
  let size: number;
  do {
    size = pending.size;
    results = await Promise.allSettled(pending.values());
  } while (pending.size !== size);

  // Report the first failure in discovery order so errors are deterministic
  const modules = new Map<string, LoadedModule>();
  for (const result of results) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
    modules.set(result.value.path, result.value);
  }

  const order = orderModules(root, modules);
  return { root, order, modules, visible: computeVisibility(order) };
}

/**
 * Depth-first topological order. A `using` edge back into a module still on
 * the stack is a cycle.
 */
export function orderModules(root: string, modules: ReadonlyMap<string, LoadedModule>): LoadedModule[] {
  const order: LoadedModule[] = [];
  const done = new Set<string>();
  const stack: string[] = [];

  const visit = (path: string, via: AST.UsingDeclaration | null): void => {
    if (done.has(path)) return;

    const onStack = stack.indexOf(path);
    if (onStack !== -1) {
      const cycle = [...stack.slice(onStack), path].map((p) => displayPath(p, root));
      const error = new CyclicImportError(cycle, via?.location);
      error.source = modules.get(stack[stack.length - 1])?.source;
      throw error;
    }

    const loaded = modules.get(path);
    if (!loaded) {
      throw new Error(`Module '${path}' was not loaded`);
    }

    stack.push(path);
    for (const dep of loaded.dependencies) {
      visit(dep, loaded.usingSites.get(dep) ?? null);
    }
    stack.pop();

    done.add(path);
    order.push(loaded);
  };

  visit(root, null);
  return order;
}

function computeVisibility(order: LoadedModule[]): Map<string, ReadonlySet<string>> {
  const visible = new Map<string, ReadonlySet<string>>();
  for (const loaded of order) {
    const set = new Set<string>([loaded.path]);
    for (const dep of loaded.dependencies) {
      for (const path of visible.get(dep) ?? []) {
        set.add(path);
      }
    }
    visible.set(loaded.path, set);
  }
  return visible;
}
