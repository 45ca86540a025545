import {
  TokenType,
  Token,
  TokenSource,
  ExpressionNode,
  IdentifierNode,
  PrefixExpressionNode,
  InfixExpressionNode,
  InfixOperator,
  BetweenExpressionNode,
  CallExpressionNode,
  ExpressionStatement,
  DynamoExpression,
} from './types.js';
import { Lexer } from './lexer.js';
import { Diagnostics } from './diagnostics.js';
import { Precedence, precedenceOf } from './precedence.js';

type PrefixParseFn = () => ExpressionNode | undefined;
type InfixParseFn = (left: ExpressionNode | undefined) => ExpressionNode | undefined;

/**
 * Pratt parser for condition expressions.
 *
 * Grammar:
 *   expression := expr? EOF
 *   expr       := prefix (infix)*
 *   prefix     := identifier | 'NOT' expr | '(' expr ')'
 *   infix      := op expr
 *               | 'BETWEEN' identifier 'AND' identifier
 *               | '(' (expr (',' expr)*)? ')'
 *
 * Precedence (lowest to highest):
 *   OR, AND, NOT, = <>, BETWEEN, < <= > >=, call
 *
 * Errors are recorded rather than thrown. A construct that fails to parse
 * resolves to undefined, and so does every construct enclosing it. Infix
 * operators after a failed operand are still parsed so that later errors
 * are reported too.
 */
export class Parser {
  private readonly tokens: TokenSource;
  private readonly diagnostics: Diagnostics;
  private current: Token;
  private lookahead: Token;

  constructor(input: string | TokenSource, diagnostics: Diagnostics = new Diagnostics()) {
    this.tokens = typeof input === 'string' ? new Lexer(input) : input;
    this.diagnostics = diagnostics;

    // Read two tokens, so current and lookahead are both set
    this.current = this.tokens.nextToken();
    this.lookahead = this.tokens.nextToken();
  }

  /**
   * Errors recorded so far, in the order they were found
   */
  errors(): readonly string[] {
    return this.diagnostics.list();
  }

  /**
   * Parse the whole input into a single statement.
   * Tokens left over after the statement are reported as an error.
   */
  parseDynamoExpression(): DynamoExpression {
    if (this.currentIs(TokenType.EOF)) {
      return { type: 'DynamoExpression', statement: undefined };
    }

    const errorsBefore = this.diagnostics.count;
    const statement = this.parseExpressionStatement();

    // A failed branch already explains whatever it left unconsumed
    if (!this.peekIs(TokenType.EOF) && this.diagnostics.count === errorsBefore) {
      this.diagnostics.unexpectedToken(TokenType.EOF, this.lookahead);
    }

    return { type: 'DynamoExpression', statement };
  }

  private parseExpressionStatement(): ExpressionStatement {
    return {
      type: 'ExpressionStatement',
      expression: this.parseExpression(Precedence.LOWEST),
    };
  }

  /**
   * Parse an expression, continuing through infix operators
   * that bind tighter than `precedence`.
   */
  private parseExpression(precedence: Precedence): ExpressionNode | undefined {
    const prefix = this.prefixParseFn(this.current.type);

    if (prefix === undefined) {
      this.diagnostics.noPrefixParseFn(this.current.type);
      return undefined;
    }

    let left = prefix();

    while (
      !this.peekIs(TokenType.EOF) &&
      precedence < precedenceOf(this.lookahead.type)
    ) {
      const infix = this.infixParseFn(this.lookahead.type);
      if (infix === undefined) {
        return left;
      }

      this.advance();

      left = infix(left);
    }

    return left;
  }

  /**
   * Routine for a token that starts an expression
   */
  private prefixParseFn(type: TokenType): PrefixParseFn | undefined {
    switch (type) {
      case TokenType.IDENT:
        return () => this.parseIdentifier();
      case TokenType.NOT:
        return () => this.parsePrefixExpression();
      case TokenType.LPAREN:
        return () => this.parseGroupedExpression();
      default:
        return undefined;
    }
  }

  /**
   * Routine for a token that continues an expression
   */
  private infixParseFn(type: TokenType): InfixParseFn | undefined {
    switch (type) {
      case TokenType.EQ:
      case TokenType.NOT_EQ:
      case TokenType.LT:
      case TokenType.GT:
      case TokenType.LTE:
      case TokenType.GTE:
      case TokenType.AND:
      case TokenType.OR: {
        const operator: InfixOperator = type;
        return (left) => this.parseInfixExpression(left, operator);
      }
      case TokenType.BETWEEN:
        return (left) => this.parseBetweenExpression(left);
      case TokenType.LPAREN:
        return (left) => this.parseCallExpression(left);
      default:
        return undefined;
    }
  }

  private parseIdentifier(): IdentifierNode {
    return {
      type: 'Identifier',
      name: this.current.literal,
    };
  }

  /**
   * NOT binds looser than comparisons, so `NOT a = b` negates the comparison
   */
  private parsePrefixExpression(): PrefixExpressionNode | undefined {
    this.advance();
    const operand = this.parseExpression(Precedence.NOT);

    if (operand === undefined) {
      return undefined;
    }

    return {
      type: 'PrefixExpression',
      operator: TokenType.NOT,
      operand,
    };
  }

  /**
   * Parenthesised expression; produces no node of its own
   */
  private parseGroupedExpression(): ExpressionNode | undefined {
    this.advance();
    const expression = this.parseExpression(Precedence.LOWEST);

    if (!this.expectPeek(TokenType.RPAREN)) {
      return undefined;
    }

    return expression;
  }

  private parseInfixExpression(
    left: ExpressionNode | undefined,
    operator: InfixOperator
  ): InfixExpressionNode | undefined {
    const precedence = precedenceOf(this.current.type);

    this.advance();
    const right = this.parseExpression(precedence);

    if (left === undefined || right === undefined) {
      return undefined;
    }

    return {
      type: 'InfixExpression',
      operator,
      left,
      right,
    };
  }

  /**
   * `subject BETWEEN low AND high`; both bounds must be identifiers
   */
  private parseBetweenExpression(
    subject: ExpressionNode | undefined
  ): BetweenExpressionNode | undefined {
    if (!this.expectPeek(TokenType.IDENT)) {
      return undefined;
    }
    const low = this.parseIdentifier();

    if (!this.expectPeek(TokenType.AND)) {
      return undefined;
    }

    if (!this.expectPeek(TokenType.IDENT)) {
      return undefined;
    }
    const high = this.parseIdentifier();

    if (subject === undefined) {
      return undefined;
    }

    return {
      type: 'BetweenExpression',
      subject,
      low,
      high,
    };
  }

  private parseCallExpression(
    callee: ExpressionNode | undefined
  ): CallExpressionNode | undefined {
    const args = this.parseCallArguments();

    if (callee === undefined || args === undefined) {
      return undefined;
    }

    return {
      type: 'CallExpression',
      callee,
      arguments: args,
    };
  }

  /**
   * Comma separated arguments up to and including the closing parenthesis
   */
  private parseCallArguments(): ExpressionNode[] | undefined {
    if (this.peekIs(TokenType.RPAREN)) {
      this.advance();
      return [];
    }

    this.advance();
    const args = [this.parseExpression(Precedence.LOWEST)];

    while (this.peekIs(TokenType.COMMA)) {
      this.advance();
      this.advance();
      args.push(this.parseExpression(Precedence.LOWEST));
    }

    if (!this.expectPeek(TokenType.RPAREN)) {
      return undefined;
    }

    const parsed = args.filter((arg): arg is ExpressionNode => arg !== undefined);
    return parsed.length === args.length ? parsed : undefined;
  }

  // Token cursor

  private advance(): void {
    this.current = this.lookahead;
    this.lookahead = this.tokens.nextToken();
  }

  private currentIs(type: TokenType): boolean {
    return this.current.type === type;
  }

  private peekIs(type: TokenType): boolean {
    return this.lookahead.type === type;
  }

  /**
   * Advance onto the lookahead if it has the given type, else record an error
   */
  private expectPeek(type: TokenType): boolean {
    if (!this.peekIs(type)) {
      this.diagnostics.unexpectedToken(type, this.lookahead);
      return false;
    }

    this.advance();
    return true;
  }
}
