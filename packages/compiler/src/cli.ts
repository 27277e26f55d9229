/**
 * stylec entry point
 *
 * `main` returns the exit status instead of exiting so it can be driven
 * from tests; the bin script and direct `tsx` runs set process.exitCode.
 */
import { pathToFileURL } from 'url';
import { loadPaletteFile, MapColorSource } from './colors';
import { compile } from './compile';
import { parseArgs, USAGE } from './config';
import { StyleError } from './errors';
import { CompileLogger } from './logger';
import { VERSION } from './version';

export async function main(args: string[]): Promise<number> {
  try {
    const command = parseArgs(args);

    if (command.kind === 'version') {
      console.log(`stylec ${VERSION}`);
      return 0;
    }
    if (command.kind === 'usage') {
      console.log(USAGE);
      return 0;
    }

    const { config } = command;
    const logger = config.verbose
      ? new CompileLogger({ logDir: config.logDir })
      : CompileLogger.silent();
    const colors = config.palette ? await loadPaletteFile(config.palette) : new MapColorSource();

    const result = await compile(config.rootFile, {
      colors,
      assetsDir: config.assetsDir ?? undefined,
      includeDirs: config.includeDirs,
      outDir: config.check ? undefined : config.outDir,
      logger,
    });

    if (config.check) {
      console.log(`No errors found in ${config.rootFile}`);
    } else if (result.written) {
      const { written, unchanged } = result.written;
      console.log(`Wrote ${written.length} header${written.length === 1 ? '' : 's'} to ${config.outDir} (${unchanged.length} unchanged)`);
    }

    const logPath = logger.getLogPath();
    if (config.verbose && logPath) {
      console.error(`[Verbose] Log written to: ${logPath}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof StyleError) {
      console.error(error.format());
    } else if (error instanceof Error) {
      console.error('Error:', error.message);
    } else {
      console.error('Error:', error);
    }
    return 1;
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  process.exitCode = await main(process.argv.slice(2));
}
