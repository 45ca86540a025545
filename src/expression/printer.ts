import { ExpressionNode, DynamoExpression } from './types.js';

/**
 * Render an expression fully parenthesised, so precedence is explicit.
 *
 * @example
 * ```ts
 * format(parseExpression('NOT a = :v AND b < :w').ast);
 * // '((NOT (a = :v)) AND (b < :w))'
 * ```
 */
export function formatExpression(node: ExpressionNode): string {
  switch (node.type) {
    case 'Identifier':
      return node.name;

    case 'PrefixExpression':
      return `(${node.operator} ${formatExpression(node.operand)})`;

    case 'InfixExpression':
      return `(${formatExpression(node.left)} ${node.operator} ${formatExpression(node.right)})`;

    case 'BetweenExpression':
      return `(${formatExpression(node.subject)} BETWEEN ${node.low.name} AND ${node.high.name})`;

    case 'CallExpression':
      return `${formatExpression(node.callee)}(${node.arguments.map(formatExpression).join(', ')})`;

    default:
      // TypeScript exhaustiveness check
      const _exhaustive: never = node;
      throw new Error(`Unknown node type: ${(_exhaustive as ExpressionNode).type}`);
  }
}

/**
 * Render a parse root. Empty or failed parses render as ''.
 */
export function format(root: DynamoExpression): string {
  const expression = root.statement?.expression;
  return expression === undefined ? '' : formatExpression(expression);
}
