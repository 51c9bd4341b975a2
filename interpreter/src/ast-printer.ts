/**
 * Debug printer: renders the syntax tree as parenthesised prefix text,
 * e.g. `(print (+ 1 (* 2 3)))`.
 */

import { Expr, Stmt } from './ast';
import { RiteValue, valueToString } from './values';

function parenthesize(name: string, ...parts: string[]): string {
  return parts.length === 0 ? `(${name})` : `(${name} ${parts.join(' ')})`;
}

function literalText(value: RiteValue): string {
  return value.kind === 'string' ? JSON.stringify(value.value) : valueToString(value);
}

export function printExpr(expr: Expr): string {
  switch (expr.kind) {
    case 'literal': return literalText(expr.value);
    case 'grouping': return parenthesize('group', printExpr(expr.expression));
    case 'unary': return parenthesize(expr.operator.lexeme, printExpr(expr.right));
    case 'binary':
    case 'logical':
      return parenthesize(expr.operator.lexeme, printExpr(expr.left), printExpr(expr.right));
    case 'variable': return expr.name.lexeme;
    case 'assign': return parenthesize('=', expr.name.lexeme, printExpr(expr.value));
    case 'postfix': return parenthesize(`post${expr.operator.lexeme}`, printExpr(expr.target));
  }
}

export function printStmt(stmt: Stmt): string {
  switch (stmt.kind) {
    case 'expression': return printExpr(stmt.expression);
    case 'print': return parenthesize('print', printExpr(stmt.expression));
    case 'var':
      return stmt.initializer === null
        ? parenthesize('var', stmt.name.lexeme)
        : parenthesize('var', stmt.name.lexeme, printExpr(stmt.initializer));
    case 'block': return parenthesize('block', ...stmt.statements.map(printStmt));
    case 'if':
      return stmt.elseBranch === null
        ? parenthesize('if', printExpr(stmt.condition), printStmt(stmt.thenBranch))
        : parenthesize('if', printExpr(stmt.condition), printStmt(stmt.thenBranch), printStmt(stmt.elseBranch));
    case 'while': return parenthesize('while', printExpr(stmt.condition), printStmt(stmt.body));
  }
}

/**
 * One line per top-level statement.
 */
export function printProgram(statements: readonly Stmt[]): string {
  return statements.map(printStmt).join('\n');
}
