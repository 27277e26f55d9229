import type { IRecognitionException, IToken } from 'chevrotain';
import { tokenize } from '../lexer';
import { styleParser } from './index';
import { buildModule } from './visitor';
import { setCurrentFile } from './visitor/helpers';
import { ParseError } from '../errors';
import type { SourceModule } from '../ast';

export interface ParseOptions {
  /** File path recorded on the module and in source locations */
  file?: string;
}

const KEYWORD_TOKENS = new Set(['Using', 'True', 'False']);

/**
 * Transform Chevrotain errors into user-friendly messages
 */
function improveErrorMessage(error: IRecognitionException, previousToken: IToken | undefined): string {
  const ruleStack = error.context?.ruleStack ?? [];
  const currentToken = error.token;
  const tokenTypeName = currentToken.tokenType?.name;
  const message = error.message;

  if (tokenTypeName === 'EOF') {
    return `Unexpected end of input`;
  }

  // Keyword used where a name was expected
  if (message.includes('Identifier') && tokenTypeName && KEYWORD_TOKENS.has(tokenTypeName)) {
    return `Invalid name '${currentToken.image}' - '${currentToken.image}' is a reserved keyword`;
  }

  // field without ':'
  if (
    ruleStack.includes('fieldEntry') &&
    message.includes('Colon') &&
    previousToken?.tokenType.name === 'Identifier'
  ) {
    return `Missing ':' after field '${previousToken.image}'`;
  }

  // declaration name followed by something other than '{' or ':'
  if (
    ruleStack[ruleStack.length - 1] === 'declaration' &&
    previousToken?.tokenType.name === 'Identifier'
  ) {
    return `Expected '{' or ':' after '${previousToken.image}', found '${currentToken.image}'`;
  }

  // icon layer without the comma between path and color
  if (ruleStack.includes('iconLayer') && message.includes('Comma')) {
    return `Icon layers are written { "path", color } - missing ',' after the path`;
  }

  if (ruleStack[ruleStack.length - 1] === 'expression') {
    return `Expected a value, found '${currentToken.image}'`;
  }

  return message;
}

type DelimiterType = 'brace' | 'paren';

interface DelimiterInfo {
  type: DelimiterType;
  token: IToken;
  line: number;
  column: number;
}

const delimiterNames: Record<DelimiterType, string> = {
  brace: 'brace',
  paren: 'parenthesis',
};

const openingChars: Record<DelimiterType, string> = {
  brace: '{',
  paren: '(',
};

const closingChars: Record<DelimiterType, string> = {
  brace: '}',
  paren: ')',
};

/**
 * Check for unclosed or mismatched delimiters before parsing.
 * Returns a ParseError if there's a delimiter issue, null otherwise.
 */
function checkDelimiters(tokens: IToken[], source: string, file?: string): ParseError | null {
  const stack: DelimiterInfo[] = [];

  for (const token of tokens) {
    const tokenName = token.tokenType.name;

    if (tokenName === 'LBrace' || tokenName === 'LParen') {
      stack.push({
        type: tokenName === 'LBrace' ? 'brace' : 'paren',
        token,
        line: token.startLine ?? 1,
        column: token.startColumn ?? 1,
      });
    } else if (tokenName === 'RBrace' || tokenName === 'RParen') {
      const expectedType: DelimiterType = tokenName === 'RBrace' ? 'brace' : 'paren';
      const top = stack.pop();

      if (!top) {
        return new ParseError(
          `Unmatched closing ${delimiterNames[expectedType]} '${closingChars[expectedType]}'`,
          token.image,
          { line: token.startLine ?? 1, column: token.startColumn ?? 1, file },
          source
        );
      }

      if (top.type !== expectedType) {
        // Report at the closing delimiter but mention the opening one
        return new ParseError(
          `Mismatched delimiters: expected closing ${delimiterNames[top.type]} '${closingChars[top.type]}' to match '${openingChars[top.type]}' at line ${top.line}, but found '${closingChars[expectedType]}'`,
          token.image,
          { line: token.startLine ?? 1, column: token.startColumn ?? 1, file },
          source
        );
      }
    }
  }

  // Innermost unclosed delimiter is the last on the stack
  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    return new ParseError(
      `Unclosed ${delimiterNames[unclosed.type]} '${openingChars[unclosed.type]}' - missing '${closingChars[unclosed.type]}'`,
      openingChars[unclosed.type],
      { line: unclosed.line, column: unclosed.column, file },
      source
    );
  }

  return null;
}

/**
 * Parse style source text into a SourceModule
 */
export function parse(source: string, options?: ParseOptions): SourceModule {
  const file = options?.file;
  setCurrentFile(file, source);

  try {
    const tokens = tokenize(source, file);

    // Delimiter problems get better messages here than from the grammar
    const delimiterError = checkDelimiters(tokens, source, file);
    if (delimiterError) {
      throw delimiterError;
    }

    styleParser.input = tokens;
    const cst = styleParser.program();

    if (styleParser.errors.length > 0) {
      const error = styleParser.errors[0];
      const index = tokens.findIndex((token) => token.startOffset === error.token.startOffset);
      // EOF is not in the token vector; its predecessor is the last real token
      const previousToken: IToken | undefined =
        index === -1 ? tokens[tokens.length - 1] : index > 0 ? tokens[index - 1] : undefined;
      const location = Number.isNaN(error.token.startOffset)
        ? { line: previousToken?.endLine ?? 1, column: previousToken?.endColumn ?? 1, file }
        : { line: error.token.startLine ?? 1, column: error.token.startColumn ?? 1, file };

      throw new ParseError(improveErrorMessage(error, previousToken), error.token.image, location, source);
    }

    return buildModule(cst, file ?? '<input>');
  } finally {
    setCurrentFile(undefined);
  }
}
