/**
 * Token types for the expression lexer.
 * Values are the canonical spelling of each token and are used verbatim in
 * diagnostics and as AST operators.
 */
export enum TokenType {
  IDENT = 'IDENT',
  EQ = '=',
  NOT_EQ = '<>',
  LT = '<',
  GT = '>',
  LTE = '<=',
  GTE = '>=',
  AND = 'AND',
  OR = 'OR',
  NOT = 'NOT',
  BETWEEN = 'BETWEEN',
  LPAREN = '(',
  RPAREN = ')',
  COMMA = ',',
  ILLEGAL = 'ILLEGAL',
  EOF = 'EOF',
}

/**
 * A token produced by the lexer
 */
export interface Token {
  readonly type: TokenType;
  readonly literal: string;
  readonly position: number;
}

/**
 * Anything the parser can pull tokens from.
 * Once exhausted it must keep returning EOF tokens.
 */
export interface TokenSource {
  nextToken(): Token;
}

export type PrefixOperator = TokenType.NOT;

export type InfixOperator =
  | TokenType.EQ
  | TokenType.NOT_EQ
  | TokenType.LT
  | TokenType.GT
  | TokenType.LTE
  | TokenType.GTE
  | TokenType.AND
  | TokenType.OR;

/**
 * Base interface for all AST nodes
 */
export interface ASTNode {
  type: string;
}

/**
 * Attribute name, document path or value placeholder
 */
export interface IdentifierNode extends ASTNode {
  type: 'Identifier';
  name: string;
}

/**
 * Unary operator applied to an operand (only NOT)
 */
export interface PrefixExpressionNode extends ASTNode {
  type: 'PrefixExpression';
  operator: PrefixOperator;
  operand: ExpressionNode;
}

/**
 * Comparison or logical conjunction/disjunction
 */
export interface InfixExpressionNode extends ASTNode {
  type: 'InfixExpression';
  operator: InfixOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

/**
 * `subject BETWEEN low AND high`
 */
export interface BetweenExpressionNode extends ASTNode {
  type: 'BetweenExpression';
  subject: ExpressionNode;
  low: IdentifierNode;
  high: IdentifierNode;
}

/**
 * Function call such as `size(attr)` or `begins_with(attr, :prefix)`
 */
export interface CallExpressionNode extends ASTNode {
  type: 'CallExpression';
  callee: ExpressionNode;
  arguments: ExpressionNode[];
}

/**
 * Union type of all expression node types
 */
export type ExpressionNode =
  | IdentifierNode
  | PrefixExpressionNode
  | InfixExpressionNode
  | BetweenExpressionNode
  | CallExpressionNode;

/**
 * The single top-level expression of an input.
 * `expression` is undefined when parsing it failed.
 */
export interface ExpressionStatement extends ASTNode {
  type: 'ExpressionStatement';
  expression: ExpressionNode | undefined;
}

/**
 * Root of a parse. `statement` is undefined for empty input.
 */
export interface DynamoExpression extends ASTNode {
  type: 'DynamoExpression';
  statement: ExpressionStatement | undefined;
}

/**
 * A compiled, error-free expression
 */
export interface Expression {
  /**
   * The trimmed source string
   */
  readonly source: string;

  /**
   * The parse root
   */
  readonly ast: DynamoExpression;

  /**
   * The top-level expression (null for empty expressions)
   */
  readonly root: ExpressionNode | null;

  /**
   * Fully parenthesised rendering of the expression
   */
  toString(): string;
}

/**
 * Error thrown by `compile` when parsing recorded any diagnostics
 */
export class ParseError extends Error {
  constructor(
    public readonly errors: readonly string[],
    public readonly source: string
  ) {
    super(`Invalid expression "${source}": ${errors.join('; ')}`);
    this.name = 'ParseError';
  }
}
