import { describe, expect, test } from 'vitest';
import { DEFAULT_LOG_DIR, DEFAULT_OUT_DIR, parseArgs } from '../config';
import { ConfigError } from '../errors';

describe('parseArgs', () => {
  test('root file with defaults', () => {
    expect(parseArgs(['main.style'])).toEqual({
      kind: 'compile',
      config: {
        rootFile: 'main.style',
        outDir: DEFAULT_OUT_DIR,
        assetsDir: null,
        palette: null,
        includeDirs: [],
        check: false,
        verbose: false,
        logDir: DEFAULT_LOG_DIR,
      },
    });
  });

  test('every option', () => {
    expect(
      parseArgs([
        '--out-dir=out',
        '--assets-dir=art',
        '--palette=colors.json',
        '--include-dir=lib',
        '--include-dir=vendor',
        '--check',
        '--verbose',
        '--log-dir=logs',
        'app.style',
      ])
    ).toEqual({
      kind: 'compile',
      config: {
        rootFile: 'app.style',
        outDir: 'out',
        assetsDir: 'art',
        palette: 'colors.json',
        includeDirs: ['lib', 'vendor'],
        check: true,
        verbose: true,
        logDir: 'logs',
      },
    });
  });

  test('version wins over everything else', () => {
    expect(parseArgs(['main.style', '-v'])).toEqual({ kind: 'version' });
    expect(parseArgs(['--bogus', '--version'])).toEqual({ kind: 'version' });
  });

  test('no root file shows usage', () => {
    expect(parseArgs([])).toEqual({ kind: 'usage' });
    expect(parseArgs(['--check'])).toEqual({ kind: 'usage' });
  });

  test('option without a value', () => {
    expect(() => parseArgs(['--out-dir', 'main.style'])).toThrow('Option --out-dir needs a value: --out-dir=PATH');
    expect(() => parseArgs(['--palette=', 'main.style'])).toThrow('Option --palette needs a value: --palette=PATH');
  });

  test('unknown option', () => {
    expect(() => parseArgs(['--watch', 'main.style'])).toThrow(ConfigError);
    expect(() => parseArgs(['--check=yes', 'main.style'])).toThrow("Unknown option '--check=yes'");
  });

  test('more than one root file', () => {
    expect(() => parseArgs(['a.style', 'b.style'])).toThrow('Expected one root file, got 2: a.style, b.style');
  });
});
