// Command-line flags -> CompilerConfig

import { ConfigError } from './errors';

export interface CompilerConfig {
  rootFile: string;
  outDir: string;
  /** Null means the root file's directory */
  assetsDir: string | null;
  /** JSON palette file, or null for an empty palette */
  palette: string | null;
  includeDirs: string[];
  /** Compile without writing headers */
  check: boolean;
  /** JSONL logging to stderr and logDir */
  verbose: boolean;
  logDir: string;
}

export type CliCommand =
  | { kind: 'version' }
  | { kind: 'usage' }
  | { kind: 'compile'; config: CompilerConfig };

export const DEFAULT_OUT_DIR = 'generated';
export const DEFAULT_LOG_DIR = '.stylec-logs';

export const USAGE = [
  'stylec - compiler for .style declaration files',
  'Usage: stylec [options] <root.style>',
  '',
  'Options:',
  `  --out-dir=PATH        Directory for generated headers (default: ${DEFAULT_OUT_DIR})`,
  '  --assets-dir=PATH     Directory icon paths are relative to (default: the root file\'s directory)',
  '  --palette=FILE        JSON palette mapping color names to #rrggbb[aa] or other names',
  '  --include-dir=PATH    Extra directory to search for `using` files (repeatable)',
  '  --check               Compile and report errors without writing headers',
  '  --verbose             Enable verbose JSONL logging (console + file)',
  `  --log-dir=PATH        Directory for logs (default: ${DEFAULT_LOG_DIR})`,
  '  -v, --version         Show version number',
].join('\n');

const VALUE_FLAGS = ['--out-dir', '--assets-dir', '--palette', '--include-dir', '--log-dir'] as const;
type ValueFlag = typeof VALUE_FLAGS[number];

const SWITCH_FLAGS = ['--check', '--verbose'] as const;

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

/**
 * Parse CLI arguments (without the node and script entries).
 */
export function parseArgs(args: string[]): CliCommand {
  if (args.includes('--version') || args.includes('-v')) {
    return { kind: 'version' };
  }

  const config: CompilerConfig = {
    rootFile: '',
    outDir: DEFAULT_OUT_DIR,
    assetsDir: null,
    palette: null,
    includeDirs: [],
    check: false,
    verbose: false,
    logDir: DEFAULT_LOG_DIR,
  };
  const files: string[] = [];

  for (const arg of args) {
    if (!arg.startsWith('-')) {
      files.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);

    if (isValueFlag(name)) {
      const value = eq === -1 ? '' : arg.slice(eq + 1);
      if (value === '') {
        throw new ConfigError(`Option ${name} needs a value: ${name}=PATH`);
      }
      switch (name) {
        case '--out-dir':
          config.outDir = value;
          break;
        case '--assets-dir':
          config.assetsDir = value;
          break;
        case '--palette':
          config.palette = value;
          break;
        case '--include-dir':
          config.includeDirs.push(value);
          break;
        case '--log-dir':
          config.logDir = value;
          break;
      }
      continue;
    }

    if (eq === -1 && SWITCH_FLAGS.some((flag) => flag === name)) {
      if (name === '--check') config.check = true;
      if (name === '--verbose') config.verbose = true;
      continue;
    }

    throw new ConfigError(`Unknown option '${arg}'`);
  }

  if (files.length === 0) {
    return { kind: 'usage' };
  }
  if (files.length > 1) {
    throw new ConfigError(`Expected one root file, got ${files.length}: ${files.join(', ')}`);
  }

  config.rootFile = files[0];
  return { kind: 'compile', config };
}
