/**
 * Compile pipeline
 *
 * root file -> module graph -> registry -> icon probes -> resolution
 *           -> headers -> (optionally) files on disk
 *
 * Every stage throws the first error it finds. Nothing is written unless the
 * whole unit compiled.
 */
import { dirname, resolve } from 'path';
import type * as AST from './ast';
import { MapColorSource, type ColorSource } from './colors';
import { StyleError } from './errors';
import { FileSystemAssetProbe, IconAssetResolver, type AssetProbe, type IconLayerPath } from './icons';
import { CompileLogger } from './logger';
import { displayPath, FileSystemSourceReader, loadModuleGraph, type ModuleGraph, type SourceReader } from './modules';
import { ResolutionEngine, SymbolRegistry, type ResolvedValue } from './semantic';
import { generateUnit, writeGeneratedFiles, type GeneratedFile, type WriteResult } from './codegen';

export interface CompileOptions {
  /** Defaults to the file system */
  reader?: SourceReader;
  /** Defaults to a file system probe rooted at `assetsDir` */
  probe?: AssetProbe;
  /** Icon paths are relative to this directory (default: the root file's directory) */
  assetsDir?: string;
  /** Palette for color names; defaults to an empty palette */
  colors?: ColorSource;
  includeDirs?: string[];
  /** Where headers are written; nothing is written without it */
  outDir?: string;
  logger?: CompileLogger;
}

export interface CompileResult {
  graph: ModuleGraph;
  resolved: Map<string, ResolvedValue>;
  files: GeneratedFile[];
  /** Null when no outDir was given */
  written: WriteResult | null;
}

/**
 * Every icon layer path in a module, in source order.
 */
export function collectIconLayers(module: AST.SourceModule): IconLayerPath[] {
  const layers: IconLayerPath[] = [];

  const visit = (expression: AST.Expression): void => {
    switch (expression.type) {
      case 'IconExpression':
        for (const layer of expression.layers) {
          layers.push({ path: layer.path, location: layer.location });
          visit(layer.color);
        }
        break;
      case 'StructLiteral':
        expression.fields.forEach((field) => visit(field.value));
        break;
      case 'GeometryCall':
        expression.args.forEach(visit);
        break;
      case 'FontExpression':
        visit(expression.size);
        break;
      default:
        break;
    }
  };

  for (const value of module.values) {
    if (value.shape.kind === 'simple') {
      visit(value.shape.expression);
    } else {
      value.shape.fields.forEach((field) => visit(field.value));
    }
  }

  return layers;
}

export async function compile(rootPath: string, options: CompileOptions = {}): Promise<CompileResult> {
  const logger = options.logger ?? CompileLogger.silent();
  const root = resolve(rootPath);
  const show = (module: string) => displayPath(module, root);
  let graph: ModuleGraph | undefined;

  logger.start(rootPath);
  try {
    graph = await loadModuleGraph(root, {
      reader: options.reader ?? new FileSystemSourceReader(),
      includeDirs: options.includeDirs,
      logger,
    });

    const registry = new SymbolRegistry({ visible: graph.visible, displayName: show });
    for (const module of graph.order) {
      registry.registerModule(module);
    }
    registry.validateTypes();

    const probeStart = Date.now();
    const icons = new IconAssetResolver(
      options.probe ?? new FileSystemAssetProbe(options.assetsDir ?? dirname(root))
    );
    const assets = await icons.prefetch(graph.order.flatMap((module) => collectIconLayers(module.ast)));
    logger.iconsProbed(assets.size, Date.now() - probeStart);

    const engine = new ResolutionEngine({
      registry,
      colors: options.colors ?? new MapColorSource(),
      assets,
      logger,
      displayName: show,
    });
    const resolved = engine.resolveAll();

    const files = generateUnit({
      root,
      modules: graph.order.map((module) => ({
        path: module.path,
        dependencies: module.dependencies,
        types: module.ast.types.map((type) => type.name),
        values: module.ast.values.map((value) => value.name),
      })),
      resolved,
      typeShape: (name) => engine.typeShape(name),
    });

    const written = options.outDir ? await writeGeneratedFiles(files, { outDir: options.outDir, logger }) : null;

    logger.complete('completed');
    return { graph, resolved, files, written };
  } catch (error) {
    if (error instanceof StyleError && error.source === undefined && error.location?.file) {
      error.source = graph?.modules.get(error.location.file)?.source;
    }
    logger.complete('error', error instanceof Error ? error.message : String(error));
    throw error;
  }
}
