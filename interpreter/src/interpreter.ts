/**
 * Tree-walking interpreter for the Rite language.
 *
 * Executes parsed statements against a chain of environments. Exactly one
 * environment is current at a time; blocks push a child scope and restore
 * the previous one when they finish, whether or not they threw.
 */

import { BlockStmt, Expr, Stmt } from './ast';
import {
  ConsoleOutput,
  ConsoleReporter,
  DiagnosticReporter,
  OutputSink,
} from './diagnostics';
import { Environment } from './environment';
import {
  RiteRuntimeError,
  RiteTargetError,
  RiteTypeError,
} from './errors';
import { Token, TokenType } from './token';
import {
  RiteValue,
  mkBool,
  mkNone,
  mkNumber,
  mkString,
  isTruthy,
  typeName,
  valueToString,
  valuesEqual,
} from './values';

export interface InterpreterOptions {
  output?: OutputSink;
  reporter?: DiagnosticReporter;
}

export class Interpreter {
  private readonly globalEnv: Environment;
  private environment: Environment;
  private readonly output: OutputSink;
  private readonly reporter: DiagnosticReporter;

  constructor(options: InterpreterOptions = {}) {
    this.globalEnv = new Environment();
    this.environment = this.globalEnv;
    this.output = options.output ?? new ConsoleOutput();
    this.reporter = options.reporter ?? new ConsoleReporter();
  }

  /**
   * Run top-level statements in order. A runtime error aborts only the
   * statement that raised it.
   */
  interpret(statements: readonly Stmt[]): void {
    for (const statement of statements) {
      try {
        this.execute(statement);
      } catch (e) {
        if (!(e instanceof RiteRuntimeError)) throw e;
        this.reporter.report(e.line, e.message, 'runtime');
      }
    }
  }

  /**
   * Get the global environment (useful for testing and the REPL).
   */
  getGlobalEnv(): Environment {
    return this.globalEnv;
  }

  // ==================================================================
  // Statements
  // ==================================================================

  execute(stmt: Stmt): void {
    switch (stmt.kind) {
      case 'expression':
        this.evaluate(stmt.expression);
        return;
      case 'print':
        this.output.write(valueToString(this.evaluate(stmt.expression)));
        return;
      case 'var': {
        const value = stmt.initializer !== null ? this.evaluate(stmt.initializer) : mkNone();
        this.environment.define(stmt.name.lexeme, value);
        return;
      }
      case 'block':
        this.executeBlock(stmt, this.environment.child());
        return;
      case 'if':
        if (isTruthy(this.evaluate(stmt.condition))) {
          this.execute(stmt.thenBranch);
        } else if (stmt.elseBranch !== null) {
          this.execute(stmt.elseBranch);
        }
        return;
      case 'while':
        while (isTruthy(this.evaluate(stmt.condition))) {
          this.execute(stmt.body);
        }
        return;
    }
  }

  executeBlock(block: BlockStmt, scope: Environment): void {
    const previous = this.environment;
    try {
      this.environment = scope;
      for (const statement of block.statements) {
        this.execute(statement);
      }
    } finally {
      this.environment = previous;
    }
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  evaluate(expr: Expr): RiteValue {
    switch (expr.kind) {
      case 'literal':
        return expr.value;
      case 'grouping':
        return this.evaluate(expr.expression);
      case 'variable':
        return this.environment.get(expr.name);
      case 'assign': {
        const value = this.evaluate(expr.value);
        this.environment.assign(expr.name, value);
        return value;
      }
      case 'unary':
        return this.evalUnary(expr.operator, this.evaluate(expr.right));
      case 'binary':
        return this.evalBinary(expr.operator, this.evaluate(expr.left), this.evaluate(expr.right));
      case 'logical':
        return this.evalLogical(expr.left, expr.operator, expr.right);
      case 'postfix':
        return this.evalPostfix(expr.target, expr.operator);
    }
  }

  private evalUnary(operator: Token, right: RiteValue): RiteValue {
    switch (operator.type) {
      case TokenType.Minus:
        if (right.kind !== 'number') {
          throw new RiteTypeError(operator, `Operand of '-' must be a number, got ${typeName(right)}.`);
        }
        return mkNumber(-right.value);
      case TokenType.Not:
        return mkBool(!isTruthy(right));
      default:
        throw new RiteRuntimeError(operator, `Unknown unary operator '${operator.lexeme}'.`);
    }
  }

  private evalBinary(operator: Token, left: RiteValue, right: RiteValue): RiteValue {
    switch (operator.type) {
      case TokenType.Plus:
        return this.evalAdd(operator, left, right);
      case TokenType.Minus: {
        const [a, b] = this.numberOperands(operator, left, right);
        return mkNumber(a - b);
      }
      case TokenType.Multiply: {
        const [a, b] = this.numberOperands(operator, left, right);
        return mkNumber(a * b);
      }
      case TokenType.Divide: {
        const [a, b] = this.numberOperands(operator, left, right);
        if (b === 0) {
          throw new RiteRuntimeError(operator, 'Division by zero.');
        }
        return mkNumber(a / b);
      }
      case TokenType.Greater: {
        const [a, b] = this.numberOperands(operator, left, right);
        return mkBool(a > b);
      }
      case TokenType.GreaterEqual: {
        const [a, b] = this.numberOperands(operator, left, right);
        return mkBool(a >= b);
      }
      case TokenType.Less: {
        const [a, b] = this.numberOperands(operator, left, right);
        return mkBool(a < b);
      }
      case TokenType.LessEqual: {
        const [a, b] = this.numberOperands(operator, left, right);
        return mkBool(a <= b);
      }
      case TokenType.Is:
        return mkBool(valuesEqual(left, right));
      case TokenType.Not:
        return mkBool(!valuesEqual(left, right));
      default:
        throw new RiteRuntimeError(operator, `Unknown binary operator '${operator.lexeme}'.`);
    }
  }

  private evalAdd(operator: Token, left: RiteValue, right: RiteValue): RiteValue {
    // String on the left: the right operand is rendered and appended
    if (left.kind === 'string') {
      return mkString(left.value + valueToString(right));
    }
    if (left.kind === 'number') {
      if (right.kind !== 'number') {
        throw new RiteTypeError(operator, `Operator '+' cannot add ${typeName(right)} to Number.`);
      }
      return mkNumber(left.value + right.value);
    }
    throw new RiteTypeError(
      operator,
      `Operator '+' needs a String or Number on the left, got ${typeName(left)}.`,
    );
  }

  private numberOperands(operator: Token, left: RiteValue, right: RiteValue): [number, number] {
    if (left.kind === 'number' && right.kind === 'number') {
      return [left.value, right.value];
    }
    throw new RiteTypeError(
      operator,
      `Operands of '${operator.lexeme}' must be numbers, got ${typeName(left)} and ${typeName(right)}.`,
    );
  }

  private evalLogical(leftExpr: Expr, operator: Token, rightExpr: Expr): RiteValue {
    const left = this.evaluate(leftExpr);
    if (operator.type === TokenType.Or) {
      if (isTruthy(left)) return left;
    } else if (!isTruthy(left)) {
      return left;
    }
    return this.evaluate(rightExpr);
  }

  private evalPostfix(target: Expr, operator: Token): RiteValue {
    if (target.kind !== 'variable') {
      throw new RiteTargetError(operator);
    }

    const current = this.environment.get(target.name);
    if (current.kind !== 'number') {
      throw new RiteTypeError(operator, `Operand of '${operator.lexeme}' must be a number, got ${typeName(current)}.`);
    }

    const updated = mkNumber(operator.type === TokenType.PlusPlus ? current.value + 1 : current.value - 1);
    this.environment.assign(target.name, updated);

    // Postfix: return the new value
    return updated;
  }
}
