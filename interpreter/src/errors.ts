/**
 * Error types for the Rite pipeline.
 */

import type { Token } from './token';

export class RiteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RiteError';
  }
}

/**
 * Raised inside the parser and always caught by statement-level recovery.
 */
export class RiteParseError extends RiteError {
  public readonly token: Token;

  constructor(token: Token, message: string) {
    super(message);
    this.name = 'RiteParseError';
    this.token = token;
  }

  get line(): number {
    return this.token.line;
  }
}

export class RiteRuntimeError extends RiteError {
  public readonly token: Token;

  constructor(token: Token, message: string) {
    super(message);
    this.name = 'RiteRuntimeError';
    this.token = token;
  }

  get line(): number {
    return this.token.line;
  }
}

/**
 * Operand kinds do not fit the operator.
 */
export class RiteTypeError extends RiteRuntimeError {
  constructor(operator: Token, message: string) {
    super(operator, message);
    this.name = 'RiteTypeError';
  }
}

export class RiteNameError extends RiteRuntimeError {
  constructor(name: Token) {
    super(name, `Undefined variable '${name.lexeme}'.`);
    this.name = 'RiteNameError';
  }
}

/**
 * The operand of `++`/`--` is not a plain variable.
 */
export class RiteTargetError extends RiteRuntimeError {
  constructor(operator: Token) {
    super(operator, `Operand of '${operator.lexeme}' must be a variable.`);
    this.name = 'RiteTargetError';
  }
}

export class RiteConfigError extends RiteError {
  constructor(message: string) {
    super(message);
    this.name = 'RiteConfigError';
  }
}
