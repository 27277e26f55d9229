import { createToken, Lexer, type IToken, type TokenType } from 'chevrotain';
import { ParseError } from '../errors';

// ============================================================================
// Skipped
// ============================================================================

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED });
export const LineComment = createToken({ name: 'LineComment', pattern: /\/\/[^\n\r]*/, group: Lexer.SKIPPED });
export const BlockComment = createToken({ name: 'BlockComment', pattern: /\/\*[\s\S]*?\*\//, group: Lexer.SKIPPED });

// ============================================================================
// Identifiers and keywords
// ============================================================================

// Built-in kind names (pixels, margins, icon, ...) are plain identifiers here;
// the registry is what reserves them.
export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

export const Using = createToken({ name: 'Using', pattern: /using/, longer_alt: Identifier });
export const True = createToken({ name: 'True', pattern: /true/, longer_alt: Identifier });
export const False = createToken({ name: 'False', pattern: /false/, longer_alt: Identifier });

// ============================================================================
// Literals
// ============================================================================

export const StringLiteral = createToken({ name: 'StringLiteral', pattern: /"(?:[^"\\\n\r]|\\.)*"/ });
export const HexColorLiteral = createToken({ name: 'HexColorLiteral', pattern: /#[0-9a-fA-F]+/ });
export const PixelsLiteral = createToken({ name: 'PixelsLiteral', pattern: /-?\d+px/ });
export const DoubleLiteral = createToken({ name: 'DoubleLiteral', pattern: /-?\d+\.\d+/ });
export const IntLiteral = createToken({ name: 'IntLiteral', pattern: /-?\d+/ });

// ============================================================================
// Punctuation
// ============================================================================

export const LBrace = createToken({ name: 'LBrace', pattern: /\{/ });
export const RBrace = createToken({ name: 'RBrace', pattern: /\}/ });
export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });
export const Colon = createToken({ name: 'Colon', pattern: /:/ });
export const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });

// Order matters: keywords before Identifier, longer literals before shorter ones.
export const allTokens: TokenType[] = [
  WhiteSpace,
  LineComment,
  BlockComment,
  StringLiteral,
  HexColorLiteral,
  PixelsLiteral,
  DoubleLiteral,
  IntLiteral,
  Using,
  True,
  False,
  Identifier,
  LBrace,
  RBrace,
  LParen,
  RParen,
  Colon,
  Semicolon,
  Comma,
];

export const StyleLexer = new Lexer(allTokens, { positionTracking: 'full' });

/**
 * Tokenize style source text. The first unrecognized character is a ParseError.
 */
export function tokenize(source: string, file?: string): IToken[] {
  const result = StyleLexer.tokenize(source);

  if (result.errors.length > 0) {
    const error = result.errors[0];
    const char = source.charAt(error.offset);
    throw new ParseError(
      `Unexpected character '${char}'`,
      char,
      { line: error.line ?? 1, column: error.column ?? 1, file },
      source
    );
  }

  return result.tokens;
}
