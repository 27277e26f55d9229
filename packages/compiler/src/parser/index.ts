import { CstParser } from 'chevrotain';
import * as T from '../lexer';

/**
 * Grammar for .style files.
 *
 * The grammar is deliberately loose in a few places (using/declaration order,
 * what may follow an identifier in an expression, type references inside a
 * type body); the AST builder enforces those rules so it can report them
 * with specific messages.
 */
class StyleParser extends CstParser {
  constructor() {
    super(T.allTokens, { recoveryEnabled: false, maxLookahead: 3 });
    this.performSelfAnalysis();
  }

  public program = this.RULE('program', () => {
    this.MANY(() => {
      this.OR([
        { ALT: () => this.SUBRULE(this.usingStatement) },
        { ALT: () => this.SUBRULE(this.declaration) },
      ]);
    });
  });

  // using "path/to/file.style";
  private usingStatement = this.RULE('usingStatement', () => {
    this.CONSUME(T.Using);
    this.CONSUME(T.StringLiteral);
    this.OPTION(() => this.CONSUME(T.Semicolon));
  });

  // Name { field: type; }   name { field: expr; }   name: expr;
  private declaration = this.RULE('declaration', () => {
    this.CONSUME(T.Identifier);
    this.OR([
      {
        ALT: () => {
          this.CONSUME(T.LBrace);
          this.MANY(() => this.SUBRULE(this.fieldEntry));
          this.CONSUME(T.RBrace);
        },
      },
      {
        ALT: () => {
          this.CONSUME(T.Colon);
          this.SUBRULE(this.expression);
        },
      },
    ]);
    this.OPTION(() => this.CONSUME(T.Semicolon));
  });

  private fieldEntry = this.RULE('fieldEntry', () => {
    this.CONSUME(T.Identifier);
    this.CONSUME(T.Colon);
    this.SUBRULE(this.expression);
    this.OPTION(() => this.CONSUME(T.Semicolon));
  });

  private expression = this.RULE('expression', () => {
    this.OR([
      { ALT: () => this.CONSUME(T.PixelsLiteral) },
      { ALT: () => this.CONSUME(T.DoubleLiteral) },
      { ALT: () => this.CONSUME(T.IntLiteral) },
      { ALT: () => this.CONSUME(T.True) },
      { ALT: () => this.CONSUME(T.False) },
      { ALT: () => this.CONSUME(T.HexColorLiteral) },
      { ALT: () => this.SUBRULE(this.identifierExpression) },
    ]);
  });

  // ref | ctor(args) | Type(base) { ... } | Type { ... } | icon { {"path", color}, ... }
  private identifierExpression = this.RULE('identifierExpression', () => {
    this.CONSUME(T.Identifier);
    this.OPTION(() => {
      this.CONSUME(T.LParen);
      this.OPTION2(() => this.SUBRULE(this.argumentList));
      this.CONSUME(T.RParen);
    });
    this.OPTION3(() => {
      this.CONSUME(T.LBrace);
      this.MANY(() => {
        this.OR([
          { ALT: () => this.SUBRULE(this.iconLayer) },
          { ALT: () => this.SUBRULE(this.fieldEntry) },
        ]);
      });
      this.CONSUME(T.RBrace);
    });
  });

  private argumentList = this.RULE('argumentList', () => {
    this.SUBRULE(this.argument);
    this.MANY(() => {
      this.OPTION(() => this.CONSUME(T.Comma));
      this.SUBRULE2(this.argument);
    });
  });

  private argument = this.RULE('argument', () => {
    this.OR([
      { ALT: () => this.CONSUME(T.StringLiteral) },
      { ALT: () => this.SUBRULE(this.expression) },
    ]);
  });

  // { "path", color }
  private iconLayer = this.RULE('iconLayer', () => {
    this.CONSUME(T.LBrace);
    this.CONSUME(T.StringLiteral);
    this.CONSUME(T.Comma);
    this.SUBRULE(this.expression);
    this.CONSUME(T.RBrace);
    this.OPTION(() => this.CONSUME2(T.Comma));
  });
}

export const styleParser = new StyleParser();
