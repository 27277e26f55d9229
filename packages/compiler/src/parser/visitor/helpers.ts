import type { CstElement, CstNode, IToken } from 'chevrotain';
import type { SourceLocation } from '../../errors';

// File and source of the parse in progress, for locations and error reports
let currentFile: string | undefined;
let currentSource: string | undefined;

export function setCurrentFile(file: string | undefined, source?: string): void {
  currentFile = file;
  currentSource = source;
}

export function getCurrentFile(): string | undefined {
  return currentFile;
}

export function getCurrentSource(): string | undefined {
  return currentSource;
}

export function tokenLocation(token: IToken): SourceLocation {
  return {
    line: token.startLine ?? 1,
    column: token.startColumn ?? 1,
    file: currentFile,
  };
}

function isToken(element: CstElement): element is IToken {
  return 'image' in element;
}

function isNode(element: CstElement): element is CstNode {
  return 'children' in element;
}

/** All tokens stored under `key` in a CST node, in source order */
export function tokensOf(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter(isToken);
}

/** All child nodes stored under `key` in a CST node, in source order */
export function nodesOf(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter(isNode);
}

export function firstToken(node: CstNode, key: string): IToken | undefined {
  return tokensOf(node, key)[0];
}

export function firstNode(node: CstNode, key: string): CstNode | undefined {
  return nodesOf(node, key)[0];
}

/** First token of a CST node, for locating errors on a whole construct */
export function leadingToken(node: CstNode): IToken | undefined {
  let first: IToken | undefined;
  for (const elements of Object.values(node.children)) {
    for (const element of elements) {
      const token = isToken(element) ? element : leadingToken(element);
      if (token && (!first || token.startOffset < first.startOffset)) {
        first = token;
      }
    }
  }
  return first;
}

/** Strip quotes and resolve \" and \\ escapes */
export function unquote(image: string): string {
  return image.slice(1, -1).replace(/\\(.)/g, '$1');
}

export function startsUpperCase(name: string): boolean {
  const first = name.charAt(0);
  return first !== first.toLowerCase();
}
