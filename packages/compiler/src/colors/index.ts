/**
 * Color Source
 *
 * The compiler only needs to turn a palette name into a concrete color.
 * Where the palette comes from is the caller's business; a JSON palette
 * loader is provided for the CLI.
 */
import { readFile } from 'fs/promises';
import { ConfigError } from '../errors';

export interface ColorValue {
  red: number;
  green: number;
  blue: number;
  alpha: number;
}

export interface ColorSource {
  resolveColor(name: string): ColorValue | undefined;
}

/**
 * Parse `#rrggbb` or `#rrggbbaa`. Returns null for anything else.
 */
export function parseHexColor(hex: string): ColorValue | null {
  const match = /^#([0-9a-fA-F]{6})([0-9a-fA-F]{2})?$/.exec(hex);
  if (!match) return null;

  const rgb = match[1];
  return {
    red: parseInt(rgb.slice(0, 2), 16),
    green: parseInt(rgb.slice(2, 4), 16),
    blue: parseInt(rgb.slice(4, 6), 16),
    alpha: match[2] === undefined ? 255 : parseInt(match[2], 16),
  };
}

export class MapColorSource implements ColorSource {
  private colors = new Map<string, ColorValue>();

  constructor(entries: Record<string, ColorValue> = {}) {
    for (const [name, value] of Object.entries(entries)) {
      this.colors.set(name, value);
    }
  }

  /**
   * Build from a name -> hex table. Invalid hex strings are a ConfigError.
   */
  static fromHex(entries: Record<string, string>): MapColorSource {
    const source = new MapColorSource();
    for (const [name, hex] of Object.entries(entries)) {
      source.setHex(name, hex);
    }
    return source;
  }

  setHex(name: string, hex: string): void {
    const value = parseHexColor(hex);
    if (!value) {
      throw new ConfigError(`Palette color '${name}' has invalid value '${hex}'`);
    }
    this.colors.set(name, value);
  }

  resolveColor(name: string): ColorValue | undefined {
    return this.colors.get(name);
  }

  names(): string[] {
    return [...this.colors.keys()];
  }
}

/**
 * Resolve a palette table whose entries are hex strings or names of other
 * entries. Aliases resolve transitively; an alias loop is a ConfigError.
 */
export function resolvePalette(entries: Record<string, string>): MapColorSource {
  return resolveAliases(new Map(Object.entries(entries)));
}

function resolveAliases(table: ReadonlyMap<string, string>): MapColorSource {
  const resolved = new Map<string, string>();

  const resolveEntry = (name: string, chain: string[]): string => {
    const known = resolved.get(name);
    if (known !== undefined) return known;

    if (chain.includes(name)) {
      throw new ConfigError(`Palette alias loop: ${[...chain, name].join(' -> ')}`);
    }

    const raw = table.get(name);
    if (raw === undefined) {
      throw new ConfigError(`Palette entry '${chain[chain.length - 1]}' refers to unknown color '${name}'`);
    }

    const hex = raw.startsWith('#') ? raw : resolveEntry(raw, [...chain, name]);
    resolved.set(name, hex);
    return hex;
  };

  for (const name of table.keys()) {
    resolveEntry(name, []);
  }

  const source = new MapColorSource();
  for (const [name, hex] of resolved) {
    source.setHex(name, hex);
  }
  return source;
}

/**
 * Load a JSON palette file: `{ "name": "#rrggbb" | "otherName", ... }`.
 */
export async function loadPaletteFile(path: string): Promise<MapColorSource> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read palette file '${path}': ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Palette file '${path}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Palette file '${path}' must contain a JSON object`);
  }

  const table = new Map<string, string>();
  for (const [name, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      throw new ConfigError(`Palette color '${name}' must be a string, got ${typeof value}`);
    }
    table.set(name, value);
  }

  return resolveAliases(table);
}
