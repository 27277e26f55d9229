import { describe, expect, test } from 'vitest';
import { tokenize } from '../index';
import { ParseError } from '../../errors';

function names(source: string): string[] {
  return tokenize(source).map((token) => token.tokenType.name);
}

describe('Lexer', () => {
  test('tokenizes a simple value', () => {
    expect(names('lineWidth: 1px;')).toEqual(['Identifier', 'Colon', 'PixelsLiteral', 'Semicolon']);
  });

  test('distinguishes numeric literals', () => {
    expect(names('30px 0.5 42 -4px -1.25 -3')).toEqual([
      'PixelsLiteral',
      'DoubleLiteral',
      'IntLiteral',
      'PixelsLiteral',
      'DoubleLiteral',
      'IntLiteral',
    ]);
  });

  test('keywords vs identifiers', () => {
    expect(names('using true false usingX trueColor')).toEqual([
      'Using',
      'True',
      'False',
      'Identifier',
      'Identifier',
    ]);
  });

  test('hex colors and strings', () => {
    const tokens = tokenize('#ff0000 "icons/close" "say \\"hi\\""');
    expect(tokens.map((t) => t.tokenType.name)).toEqual(['HexColorLiteral', 'StringLiteral', 'StringLiteral']);
    expect(tokens[0].image).toBe('#ff0000');
    expect(tokens[2].image).toBe('"say \\"hi\\""');
  });

  test('skips line and block comments', () => {
    expect(names('// header\na: 1 /* inline */ ; /* multi\nline */')).toEqual([
      'Identifier',
      'Colon',
      'IntLiteral',
      'Semicolon',
    ]);
  });

  test('tracks line and column', () => {
    const tokens = tokenize('a: 1\n  b: 2');
    expect(tokens[3].image).toBe('b');
    expect(tokens[3].startLine).toBe(2);
    expect(tokens[3].startColumn).toBe(3);
  });

  test('unexpected character is a ParseError', () => {
    expect(() => tokenize('a: @')).toThrow(ParseError);
    expect(() => tokenize('a: @')).toThrow("Unexpected character '@'");
  });

  test('lexer error carries the file and line', () => {
    try {
      tokenize('a: 1\nb: $', 'theme.style');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.location?.line).toBe(2);
        expect(error.location?.file).toBe('theme.style');
        expect(error.token).toBe('$');
      }
    }
  });
});
