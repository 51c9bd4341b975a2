/**
 * Source text in, program effects out: lex, parse, then interpret.
 */

import type { Stmt } from './ast';
import { DiagnosticReporter } from './diagnostics';
import { Interpreter } from './interpreter';
import { Lexer } from './lexer';
import { Parser } from './parser';

/**
 * Lex and parse `source`. Always returns a complete statement list;
 * problems go to `reporter`.
 */
export function compileSource(source: string, reporter: DiagnosticReporter): Stmt[] {
  const tokens = new Lexer(source, reporter).scan();
  return new Parser(tokens, reporter).parse();
}

/**
 * Run `source` on `interpreter`. Declarations land in its global scope,
 * so successive calls (REPL turns) see each other's variables.
 */
export function runSource(source: string, interpreter: Interpreter, reporter: DiagnosticReporter): void {
  interpreter.interpret(compileSource(source, reporter));
}
