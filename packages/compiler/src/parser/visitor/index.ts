/**
 * CST to AST
 *
 * Walks the concrete syntax tree produced by the parser and builds the
 * SourceModule. Context-sensitive rules live here: using/declaration order,
 * type body vs group body, and what an identifier followed by '(' or '{' means.
 */
import type { CstNode, IToken } from 'chevrotain';
import * as AST from '../../ast';
import { ParseError } from '../../errors';
import {
  firstNode,
  firstToken,
  getCurrentFile,
  getCurrentSource,
  leadingToken,
  nodesOf,
  startsUpperCase,
  tokenLocation,
  tokensOf,
  unquote,
} from './helpers';

const GEOMETRY_ARITY: Record<AST.GeometryKind, number> = {
  margins: 4,
  size: 2,
  point: 2,
};

function fail(message: string, token: IToken | undefined): never {
  throw new ParseError(
    message,
    token?.image,
    token ? tokenLocation(token) : { line: 1, column: 1, file: getCurrentFile() },
    getCurrentSource()
  );
}

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

// Integer and pixel values become C++ `int` members
function integerValue(token: IToken): number {
  const value = parseInt(token.image, 10);
  if (value < INT_MIN || value > INT_MAX) {
    fail(`Integer '${token.image}' is out of range (${INT_MIN} to ${INT_MAX})`, token);
  }
  return value;
}

function required<T>(value: T | undefined, what: string, near: IToken | undefined): T {
  if (value === undefined) {
    fail(`Expected ${what}`, near);
  }
  return value;
}

// ============================================================================
// Program
// ============================================================================

export function buildModule(cst: CstNode, path: string): AST.SourceModule {
  const usings = nodesOf(cst, 'usingStatement');
  const declarations = nodesOf(cst, 'declaration');

  // using statements must all come before the first declaration
  const firstDecl = declarations.length > 0 ? leadingToken(declarations[0]) : undefined;
  if (firstDecl) {
    for (const usingNode of usings) {
      const usingToken = leadingToken(usingNode);
      if (usingToken && usingToken.startOffset > firstDecl.startOffset) {
        fail(`'using' must appear before any declaration`, usingToken);
      }
    }
  }

  const module: AST.SourceModule = { path, imports: [], types: [], values: [] };

  for (const usingNode of usings) {
    module.imports.push(buildUsing(usingNode));
  }

  for (const declNode of declarations) {
    const decl = buildDeclaration(declNode);
    if (decl.type === 'TypeDeclaration') {
      module.types.push(decl);
    } else {
      module.values.push(decl);
    }
  }

  return module;
}

function buildUsing(node: CstNode): AST.UsingDeclaration {
  const keyword = required(firstToken(node, 'Using'), `'using'`, undefined);
  const path = required(firstToken(node, 'StringLiteral'), 'a file path', keyword);
  return {
    type: 'UsingDeclaration',
    source: unquote(path.image),
    location: tokenLocation(keyword),
  };
}

// ============================================================================
// Declarations
// ============================================================================

function buildDeclaration(node: CstNode): AST.TypeDeclaration | AST.ValueDeclaration {
  const nameToken = required(firstToken(node, 'Identifier'), 'a declaration name', leadingToken(node));
  const name = nameToken.image;
  const location = tokenLocation(nameToken);

  const expressionNode = firstNode(node, 'expression');
  if (expressionNode) {
    const expression = buildExpression(expressionNode);
    if (expression.type === 'StructLiteral') {
      return {
        type: 'ValueDeclaration',
        name,
        shape: {
          kind: 'struct',
          typeName: expression.typeName,
          base: expression.base,
          fields: expression.fields,
        },
        location,
      };
    }
    return {
      type: 'ValueDeclaration',
      name,
      shape: { kind: 'simple', expression },
      location,
    };
  }

  const entries = nodesOf(node, 'fieldEntry');

  // Upper-case names declare structure types; lower-case names declare groups.
  if (startsUpperCase(name)) {
    return {
      type: 'TypeDeclaration',
      name,
      fields: entries.map(buildFieldDeclaration),
      location,
    };
  }

  return {
    type: 'ValueDeclaration',
    name,
    shape: { kind: 'group', fields: entries.map(buildFieldAssignment) },
    location,
  };
}

function buildFieldDeclaration(node: CstNode): AST.FieldDeclaration {
  const nameToken = required(firstToken(node, 'Identifier'), 'a field name', leadingToken(node));
  const expressionNode = required(firstNode(node, 'expression'), 'a field type', nameToken);
  const typeNode = firstNode(expressionNode, 'identifierExpression');
  const typeToken = typeNode ? firstToken(typeNode, 'Identifier') : undefined;

  const isBareName =
    typeNode !== undefined &&
    tokensOf(typeNode, 'LParen').length === 0 &&
    tokensOf(typeNode, 'LBrace').length === 0;

  if (!typeToken || !isBareName) {
    fail(`Field '${nameToken.image}' of a type declaration needs a type name`, leadingToken(expressionNode));
  }

  return {
    name: nameToken.image,
    typeRef: typeToken.image,
    location: tokenLocation(nameToken),
  };
}

function buildFieldAssignment(node: CstNode): AST.FieldAssignment {
  const nameToken = required(firstToken(node, 'Identifier'), 'a field name', leadingToken(node));
  const expressionNode = required(firstNode(node, 'expression'), 'a field value', nameToken);
  return {
    name: nameToken.image,
    value: buildExpression(expressionNode),
    location: tokenLocation(nameToken),
  };
}

// ============================================================================
// Expressions
// ============================================================================

function buildExpression(node: CstNode): AST.Expression {
  const pixels = firstToken(node, 'PixelsLiteral');
  if (pixels) {
    return { type: 'PixelsLiteral', value: integerValue(pixels), location: tokenLocation(pixels) };
  }

  const double = firstToken(node, 'DoubleLiteral');
  if (double) {
    return { type: 'DoubleLiteral', value: parseFloat(double.image), location: tokenLocation(double) };
  }

  const int = firstToken(node, 'IntLiteral');
  if (int) {
    return { type: 'IntLiteral', value: integerValue(int), location: tokenLocation(int) };
  }

  const trueToken = firstToken(node, 'True');
  if (trueToken) {
    return { type: 'BoolLiteral', value: true, location: tokenLocation(trueToken) };
  }

  const falseToken = firstToken(node, 'False');
  if (falseToken) {
    return { type: 'BoolLiteral', value: false, location: tokenLocation(falseToken) };
  }

  const hex = firstToken(node, 'HexColorLiteral');
  if (hex) {
    const digits = hex.image.length - 1;
    if (digits !== 6 && digits !== 8) {
      fail(`Invalid color literal '${hex.image}' - expected #rrggbb or #rrggbbaa`, hex);
    }
    return { type: 'ColorLiteral', hex: hex.image.toLowerCase(), location: tokenLocation(hex) };
  }

  const identifierNode = required(firstNode(node, 'identifierExpression'), 'an expression', leadingToken(node));
  return buildIdentifierExpression(identifierNode);
}

type Argument = { kind: 'string'; value: string; token: IToken } | { kind: 'expression'; value: AST.Expression; token: IToken | undefined };

function buildArguments(node: CstNode): Argument[] {
  const listNode = firstNode(node, 'argumentList');
  if (!listNode) return [];

  return nodesOf(listNode, 'argument').map((argNode): Argument => {
    const stringToken = firstToken(argNode, 'StringLiteral');
    if (stringToken) {
      return { kind: 'string', value: unquote(stringToken.image), token: stringToken };
    }
    const expressionNode = required(firstNode(argNode, 'expression'), 'an argument', leadingToken(argNode));
    return { kind: 'expression', value: buildExpression(expressionNode), token: leadingToken(argNode) };
  });
}

function buildIdentifierExpression(node: CstNode): AST.Expression {
  const nameToken = required(firstToken(node, 'Identifier'), 'an identifier', leadingToken(node));
  const name = nameToken.image;
  const location = tokenLocation(nameToken);

  const hasParens = tokensOf(node, 'LParen').length > 0;
  const hasBody = tokensOf(node, 'LBrace').length > 0;
  const layerNodes = nodesOf(node, 'iconLayer');
  const entryNodes = nodesOf(node, 'fieldEntry');

  if (!hasParens && !hasBody) {
    return { type: 'Reference', name, location };
  }

  // Type { ... }, Type(base) { ... } or Type(base)
  if (startsUpperCase(name)) {
    if (layerNodes.length > 0) {
      fail(`Structure '${name}' takes 'field: value' entries, not icon layers`, leadingToken(layerNodes[0]));
    }
    let base: AST.BaseReference | null = null;
    if (hasParens) {
      const args = buildArguments(node);
      const only = args[0];
      if (args.length !== 1 || only.kind !== 'expression' || only.value.type !== 'Reference') {
        fail(`Expected a single base value name in '${name}(...)'`, only?.token ?? nameToken);
      }
      base = { name: only.value.name, location: only.value.location };
    }
    return {
      type: 'StructLiteral',
      typeName: name,
      base,
      fields: entryNodes.map(buildFieldAssignment),
      location,
    };
  }

  if (name === 'icon') {
    if (hasParens || !hasBody) {
      fail(`icon expects '{ { "path", color }, ... }'`, nameToken);
    }
    if (entryNodes.length > 0 || layerNodes.length === 0) {
      fail(`icon needs at least one { "path", color } layer`, entryNodes.length > 0 ? leadingToken(entryNodes[0]) : nameToken);
    }
    return { type: 'IconExpression', layers: layerNodes.map(buildIconLayer), location };
  }

  if (hasBody) {
    fail(`Unexpected '{' after '${name}' - structure names start with an upper-case letter`, nameToken);
  }

  return buildConstructorCall(name, nameToken, buildArguments(node));
}

function buildIconLayer(node: CstNode): AST.IconLayerExpression {
  const open = leadingToken(node);
  const pathToken = required(firstToken(node, 'StringLiteral'), 'an icon path', open);
  const colorNode = required(firstNode(node, 'expression'), 'an icon color', pathToken);
  return {
    path: unquote(pathToken.image),
    color: buildExpression(colorNode),
    location: tokenLocation(pathToken),
  };
}

function buildConstructorCall(name: string, nameToken: IToken, args: Argument[]): AST.Expression {
  const location = tokenLocation(nameToken);

  switch (name) {
    case 'margins':
    case 'size':
    case 'point': {
      const arity = GEOMETRY_ARITY[name];
      if (args.length !== arity) {
        fail(`${name}() takes ${arity} arguments, got ${args.length}`, nameToken);
      }
      const values = args.map((arg) => {
        if (arg.kind === 'string') {
          fail(`${name}() does not take string arguments`, arg.token);
        }
        return arg.value;
      });
      return { type: 'GeometryCall', callee: name, args: values, location };
    }

    case 'align': {
      const arg = args[0];
      if (args.length !== 1 || arg.kind !== 'expression' || arg.value.type !== 'Reference') {
        fail(`align() takes one of: ${AST.ALIGN_VALUES.join(', ')}`, arg?.token ?? nameToken);
      }
      const alignName = arg.value.name;
      const value = AST.ALIGN_VALUES.find((candidate) => candidate === alignName);
      if (!value) {
        fail(`Unknown alignment '${alignName}' - expected one of: ${AST.ALIGN_VALUES.join(', ')}`, arg.token);
      }
      return { type: 'AlignExpression', value, location };
    }

    case 'font': {
      const [sizeArg, ...rest] = args;
      if (!sizeArg || sizeArg.kind !== 'expression') {
        fail(`font() takes a pixel size first`, sizeArg?.token ?? nameToken);
      }
      const flags: AST.FontFlag[] = [];
      let family: string | null = null;
      for (const arg of rest) {
        if (arg.kind === 'string') {
          if (family !== null) {
            fail(`font() takes at most one family name`, arg.token);
          }
          family = arg.value;
          continue;
        }
        const flagName = arg.value.type === 'Reference' ? arg.value.name : '';
        const flag = AST.FONT_FLAGS.find((candidate) => candidate === flagName);
        if (!flag) {
          fail(`Unknown font flag - expected one of: ${AST.FONT_FLAGS.join(', ')}`, arg.token);
        }
        if (!flags.includes(flag)) {
          flags.push(flag);
        }
      }
      return { type: 'FontExpression', size: sizeArg.value, flags, family, location };
    }

    default:
      fail(`Unknown constructor '${name}' - expected margins, size, point, align, font or icon`, nameToken);
  }
}
