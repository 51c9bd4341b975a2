/**
 * Tests for the debug tree printer on hand-built trees.
 */

import { Expr, Stmt } from '../src/ast';
import { printExpr, printProgram, printStmt } from '../src/ast-printer';
import { TokenType, mkToken } from '../src/token';
import { mkBool, mkNone, mkNumber, mkString } from '../src/values';

const x = mkToken(TokenType.Identifier, 'x', 1);
const one: Expr = { kind: 'literal', value: mkNumber(1) };

describe('printExpr', () => {
  test('literals', () => {
    expect(printExpr({ kind: 'literal', value: mkString('a "b"') })).toBe('"a \\"b\\""');
    expect(printExpr({ kind: 'literal', value: mkNumber(2.5) })).toBe('2.5');
    expect(printExpr({ kind: 'literal', value: mkBool(true) })).toBe('true');
    expect(printExpr({ kind: 'literal', value: mkNone() })).toBe('none');
  });

  test('operators print in prefix form', () => {
    const sum: Expr = { kind: 'binary', left: one, operator: mkToken(TokenType.Plus, '+', 1), right: one };
    expect(printExpr(sum)).toBe('(+ 1 1)');
    expect(printExpr({ kind: 'unary', operator: mkToken(TokenType.Minus, '-', 1), right: sum })).toBe('(- (+ 1 1))');
    expect(printExpr({ kind: 'grouping', expression: one })).toBe('(group 1)');
    expect(printExpr({
      kind: 'logical',
      left: { kind: 'variable', name: x },
      operator: mkToken(TokenType.Or, 'or', 1),
      right: one,
    })).toBe('(or x 1)');
  });

  test('assignment and postfix', () => {
    expect(printExpr({ kind: 'assign', name: x, value: one })).toBe('(= x 1)');
    expect(printExpr({
      kind: 'postfix',
      target: { kind: 'variable', name: x },
      operator: mkToken(TokenType.MinusMinus, '--', 1),
    })).toBe('(post-- x)');
  });
});

describe('printStmt', () => {
  test('empty blocks and declarations', () => {
    expect(printStmt({ kind: 'block', statements: [] })).toBe('(block)');
    expect(printStmt({ kind: 'var', name: x, initializer: null })).toBe('(var x)');
    expect(printStmt({ kind: 'var', name: x, initializer: one })).toBe('(var x 1)');
  });

  test('programs print one statement per line', () => {
    const program: Stmt[] = [
      { kind: 'print', expression: one },
      { kind: 'while', condition: { kind: 'variable', name: x }, body: { kind: 'block', statements: [] } },
    ];
    expect(printProgram(program)).toBe('(print 1)\n(while x (block))');
    expect(printProgram([])).toBe('');
  });
});
