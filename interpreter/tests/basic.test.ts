/**
 * Basic tests for the Rite runtime building blocks.
 *
 * These tests exercise values, environments, errors and diagnostics
 * directly, without going through the lexer or parser.
 */

import { Environment } from '../src/environment';
import {
  mkNumber,
  mkString,
  mkBool,
  mkNone,
  isTruthy,
  valueToString,
  valuesEqual,
  typeName,
} from '../src/values';
import {
  RiteError,
  RiteNameError,
  RiteRuntimeError,
  RiteTargetError,
  RiteTypeError,
} from '../src/errors';
import {
  CollectingReporter,
  formatDiagnostic,
  formatDiagnostics,
} from '../src/diagnostics';
import { Token, TokenType, mkToken } from '../src/token';

function ident(name: string, line = 1): Token {
  return mkToken(TokenType.Identifier, name, line);
}

// ==================================================================
// Environment tests
// ==================================================================

describe('Environment', () => {
  test('define and get a variable', () => {
    const env = new Environment();
    env.define('x', mkNumber(42));
    expect(env.get(ident('x'))).toEqual(mkNumber(42));
  });

  test('undefined variable throws RiteNameError', () => {
    const env = new Environment();
    expect(() => env.get(ident('unknown'))).toThrow(RiteNameError);
  });

  test('define overwrites in the same scope', () => {
    const env = new Environment();
    env.define('x', mkNumber(1));
    env.define('x', mkString('two'));
    expect(env.get(ident('x'))).toEqual(mkString('two'));
  });

  test('assign to an undefined variable throws and does not declare it', () => {
    const env = new Environment();
    expect(() => env.assign(ident('x'), mkNumber(1))).toThrow(RiteNameError);
    expect(env.has('x')).toBe(false);
  });

  test('child scope inherits parent variables', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(10));
    const child = parent.child();
    expect(child.get(ident('x'))).toEqual(mkNumber(10));
  });

  test('child scope can shadow parent variables', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(10));
    const child = parent.child();
    child.define('x', mkNumber(20));
    expect(child.get(ident('x'))).toEqual(mkNumber(20));
    expect(parent.get(ident('x'))).toEqual(mkNumber(10));
  });

  test('assign traverses the parent chain', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(1));
    const child = parent.child().child();
    child.assign(ident('x'), mkNumber(2));
    expect(parent.get(ident('x'))).toEqual(mkNumber(2));
    expect(Array.from(child.bindings())).toEqual([]);
  });

  test('has looks through parents', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(1));
    const child = parent.child();
    expect(child.has('x')).toBe(true);
    expect(child.has('y')).toBe(false);
  });

  test('bindings lists only the own scope in definition order', () => {
    const parent = new Environment();
    parent.define('outer', mkNone());
    const child = parent.child();
    child.define('b', mkNumber(2));
    child.define('a', mkNumber(1));
    expect(Array.from(child.bindings())).toEqual([
      ['b', mkNumber(2)],
      ['a', mkNumber(1)],
    ]);
  });

  test('name errors carry the line of the offending token', () => {
    const env = new Environment();
    try {
      env.get(ident('missing', 7));
      throw new Error('expected a name error');
    } catch (e) {
      expect(e).toBeInstanceOf(RiteNameError);
      if (e instanceof RiteNameError) {
        expect(e.line).toBe(7);
        expect(e.message).toBe("Undefined variable 'missing'.");
      }
    }
  });
});

// ==================================================================
// Value tests
// ==================================================================

describe('Values', () => {
  test('isTruthy', () => {
    expect(isTruthy(mkBool(true))).toBe(true);
    expect(isTruthy(mkBool(false))).toBe(false);
    expect(isTruthy(mkNone())).toBe(false);
    expect(isTruthy(mkNumber(0))).toBe(true);
    expect(isTruthy(mkNumber(1))).toBe(true);
    expect(isTruthy(mkString(''))).toBe(true);
    expect(isTruthy(mkString('hello'))).toBe(true);
  });

  test('valueToString', () => {
    expect(valueToString(mkNumber(42))).toBe('42');
    expect(valueToString(mkNumber(3.14))).toBe('3.14');
    expect(valueToString(mkNumber(-0.5))).toBe('-0.5');
    expect(valueToString(mkString('hello'))).toBe('hello');
    expect(valueToString(mkBool(true))).toBe('true');
    expect(valueToString(mkBool(false))).toBe('false');
    expect(valueToString(mkNone())).toBe('none');
  });

  test('valuesEqual', () => {
    expect(valuesEqual(mkNumber(1), mkNumber(1))).toBe(true);
    expect(valuesEqual(mkNumber(1), mkNumber(2))).toBe(false);
    expect(valuesEqual(mkString('a'), mkString('a'))).toBe(true);
    expect(valuesEqual(mkString('a'), mkString('b'))).toBe(false);
    expect(valuesEqual(mkBool(true), mkBool(true))).toBe(true);
    expect(valuesEqual(mkNone(), mkNone())).toBe(true);
    // Different kinds are never equal
    expect(valuesEqual(mkNumber(1), mkString('1'))).toBe(false);
    expect(valuesEqual(mkBool(false), mkNone())).toBe(false);
    expect(valuesEqual(mkNone(), mkBool(false))).toBe(false);
  });

  test('typeName', () => {
    expect(typeName(mkNumber(1))).toBe('Number');
    expect(typeName(mkString(''))).toBe('String');
    expect(typeName(mkBool(true))).toBe('Boolean');
    expect(typeName(mkNone())).toBe('None');
  });
});

// ==================================================================
// Error tests
// ==================================================================

describe('Errors', () => {
  test('runtime error subclasses share the base classes', () => {
    const op = mkToken(TokenType.Minus, '-', 3);
    const err = new RiteTypeError(op, 'bad operands');
    expect(err).toBeInstanceOf(RiteRuntimeError);
    expect(err).toBeInstanceOf(RiteError);
    expect(err.line).toBe(3);
    expect(err.name).toBe('RiteTypeError');
  });

  test('RiteTargetError names the operator', () => {
    const err = new RiteTargetError(mkToken(TokenType.PlusPlus, '++', 2));
    expect(err.message).toBe("Operand of '++' must be a variable.");
  });
});

// ==================================================================
// Diagnostics tests
// ==================================================================

describe('Diagnostics', () => {
  test('formatDiagnostic tags the phase', () => {
    expect(formatDiagnostic({ phase: 'runtime', line: 3, message: 'boom' })).toBe('RuntimeError [line 3]: boom');
    expect(formatDiagnostic({ phase: 'parse', line: 1, message: 'oops' })).toBe('ParseError [line 1]: oops');
    expect(formatDiagnostic({ phase: 'lex', line: 9, message: 'eh' })).toBe('LexError [line 9]: eh');
  });

  test('formatDiagnostics sorts by line', () => {
    const text = formatDiagnostics([
      { phase: 'runtime', line: 4, message: 'later' },
      { phase: 'lex', line: 2, message: 'earlier' },
    ]);
    expect(text).toBe('LexError [line 2]: earlier\nRuntimeError [line 4]: later');
    expect(formatDiagnostics([])).toBe('');
  });

  test('CollectingReporter keeps reports and defaults to the runtime phase', () => {
    const reporter = new CollectingReporter();
    expect(reporter.hasErrors).toBe(false);
    reporter.report(5, 'first');
    reporter.report(6, 'second', 'parse');
    expect(reporter.diagnostics).toEqual([
      { phase: 'runtime', line: 5, message: 'first' },
      { phase: 'parse', line: 6, message: 'second' },
    ]);
    expect(reporter.messages()).toEqual(['first', 'second']);
    reporter.clear();
    expect(reporter.hasErrors).toBe(false);
  });
});
