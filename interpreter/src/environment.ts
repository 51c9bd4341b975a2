/**
 * Lexical scoping environment for the Rite interpreter.
 *
 * Each environment holds a map of variable bindings and a reference
 * to its parent scope. The global environment has no parent.
 */

import { RiteValue } from './values';
import { RiteNameError } from './errors';
import type { Token } from './token';

export class Environment {
  private readonly vars: Map<string, RiteValue>;
  private readonly parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.parent = parent;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  get(name: Token): RiteValue {
    const value = this.vars.get(name.lexeme);
    if (value !== undefined) {
      return value;
    }
    if (this.parent !== null) {
      return this.parent.get(name);
    }
    throw new RiteNameError(name);
  }

  /**
   * Check if a variable is defined in this environment or any parent.
   */
  has(name: string): boolean {
    if (this.vars.has(name)) return true;
    if (this.parent !== null) return this.parent.has(name);
    return false;
  }

  /**
   * Reassign a variable in the nearest scope that defines it.
   * Never creates a binding.
   */
  assign(name: Token, value: RiteValue): void {
    if (this.vars.has(name.lexeme)) {
      this.vars.set(name.lexeme, value);
      return;
    }
    if (this.parent !== null) {
      this.parent.assign(name, value);
      return;
    }
    throw new RiteNameError(name);
  }

  /**
   * Define a variable in this scope, overwriting any binding of the same
   * name here. Outer bindings are shadowed, not touched.
   */
  define(name: string, value: RiteValue): void {
    this.vars.set(name, value);
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }

  /**
   * Bindings of this scope only, in definition order.
   */
  bindings(): IterableIterator<[string, RiteValue]> {
    return this.vars.entries();
  }
}
