/**
 * Rite REPL — Interactive read-eval-print loop.
 *
 * Usage: rite repl
 *
 * Features:
 *   - Persistent interpreter state across inputs
 *   - Multi-line input (detects unclosed braces/parens/brackets)
 *   - Special commands: :help, :quit, :env, :tokens, :ast, :clear, :reset
 *   - Errors are reported and the loop keeps going
 */

import * as readline from 'readline';
import { printProgram } from './ast-printer';
import type { SettingsT } from './config';
import {
  ConsoleOutput,
  ConsoleReporter,
  DiagnosticReporter,
  OutputSink,
} from './diagnostics';
import { Interpreter } from './interpreter';
import { Lexer } from './lexer';
import { compileSource, runSource } from './pipeline';
import { tokenToString } from './token';
import { typeName, valueToString } from './values';

const VERSION = '0.1.0';
const CONTINUATION_PROMPT = '... ';

/**
 * One interactive session: buffers multi-line input and keeps the
 * interpreter (and its global scope) between inputs.
 */
export class ReplSession {
  private interpreter: Interpreter;
  private buffer = '';

  constructor(
    private readonly output: OutputSink,
    private readonly reporter: DiagnosticReporter,
  ) {
    this.interpreter = this.freshInterpreter();
  }

  /** True while a multi-line input is being collected. */
  get pending(): boolean {
    return this.buffer !== '';
  }

  /**
   * Feed one line of input. Returns false when the user asked to quit.
   */
  feed(line: string): boolean {
    const trimmed = line.trim();

    // Special commands only when not in multi-line mode
    if (!this.pending && trimmed.startsWith(':')) {
      return this.handleCommand(trimmed);
    }

    this.buffer += (this.buffer ? '\n' : '') + line;
    if (hasUnclosedDelimiters(this.buffer)) {
      return true;
    }

    const input = this.buffer;
    this.buffer = '';
    if (input.trim() !== '') {
      runSource(input, this.interpreter, this.reporter);
    }
    return true;
  }

  private handleCommand(cmd: string): boolean {
    const [command] = cmd.split(/\s+/);
    const rest = cmd.slice(command.length).trim();

    switch (command) {
      case ':help':
      case ':h':
        this.printHelp();
        return true;

      case ':quit':
      case ':q':
      case ':exit':
        return false;

      case ':env':
        this.printEnvironment();
        return true;

      case ':tokens':
        if (!rest) {
          this.output.write('Usage: :tokens <code>');
          return true;
        }
        for (const token of new Lexer(rest, this.reporter).scan()) {
          this.output.write(tokenToString(token));
        }
        return true;

      case ':ast':
        if (!rest) {
          this.output.write('Usage: :ast <code>');
          return true;
        }
        this.output.write(printProgram(compileSource(rest, this.reporter)));
        return true;

      case ':clear':
        console.clear();
        return true;

      case ':reset':
        this.interpreter = this.freshInterpreter();
        this.output.write('Interpreter state reset.');
        return true;

      default:
        this.output.write(`Unknown command: ${command}. Type :help for available commands.`);
        return true;
    }
  }

  private freshInterpreter(): Interpreter {
    return new Interpreter({ output: this.output, reporter: this.reporter });
  }

  private printHelp(): void {
    const lines = [
      'REPL Commands:',
      '  :help, :h        Show this help message',
      '  :quit, :q        Exit the REPL',
      '  :env             Show all global variables',
      '  :tokens <code>   Show the tokens of a piece of code',
      '  :ast <code>      Show the parsed tree of a piece of code',
      '  :clear           Clear the screen',
      '  :reset           Forget all variables',
      '',
      'Tips:',
      '  - Multi-line input: leave braces/parens unclosed',
      '  - Print with $< expression',
      '  - Variables persist between inputs',
    ];
    for (const line of lines) this.output.write(line);
  }

  private printEnvironment(): void {
    let count = 0;
    for (const [name, value] of this.interpreter.getGlobalEnv().bindings()) {
      const preview = valueToString(value);
      const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
      this.output.write(`  ${name}: ${typeName(value)} = ${truncated}`);
      count++;
    }
    if (count === 0) {
      this.output.write('  (no variables defined)');
    }
  }
}

/**
 * Start the Rite REPL on stdin/stdout.
 */
export function startRepl(settings: SettingsT): void {
  const session = new ReplSession(new ConsoleOutput(), new ConsoleReporter());

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: settings.prompt,
    terminal: true,
  });

  console.log(`Rite REPL v${VERSION}`);
  console.log('Type :help for commands, :quit to exit.\n');
  rl.prompt();

  rl.on('line', (line: string) => {
    if (!session.feed(line)) {
      rl.close();
      return;
    }
    rl.setPrompt(session.pending ? CONTINUATION_PROMPT : settings.prompt);
    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
  });
}

/**
 * Check whether the input has unclosed delimiters. String contents and
 * `?` comments are skipped.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let depth = 0;
  let inString = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inString) {
      if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    if (ch === '?') {
      while (i < input.length && input[i] !== '\n') i++;
      continue;
    }

    switch (ch) {
      case '{':
      case '(':
      case '[':
        depth++;
        break;
      case '}':
      case ')':
      case ']':
        depth--;
        break;
    }
  }

  return depth > 0;
}
