#!/usr/bin/env node
/**
 * Rite CLI entry point.
 *
 * Usage: rite <file.rite>
 *        rite run <file.rite>
 *        rite repl
 *        rite tokens <file.rite>
 *        rite ast <file.rite>
 *        rite --eval "<code>"
 */

import * as fs from 'fs';
import * as path from 'path';
import { printProgram } from './ast-printer';
import { CliConfigT, loadConfig } from './config';
import { ConsoleOutput, ConsoleReporter } from './diagnostics';
import { RiteConfigError } from './errors';
import { Interpreter } from './interpreter';
import { Lexer } from './lexer';
import { compileSource, runSource } from './pipeline';
import { startRepl } from './repl';
import { tokenToString } from './token';

function main(): void {
  let config: CliConfigT;
  try {
    config = loadConfig(process.argv.slice(2));
  } catch (e) {
    if (e instanceof RiteConfigError) {
      console.error(`Error: ${e.message}`);
      console.error('Run `rite --help` for usage.');
      process.exit(2);
    }
    throw e;
  }

  const { command, settings } = config;
  const reporter = new ConsoleReporter();

  switch (command.mode) {
    case 'help':
      printUsage();
      return;

    case 'repl':
      startRepl(settings);
      return; // REPL runs its own event loop

    case 'eval':
      execute(command.code, reporter);
      break;

    case 'run':
      execute(readFile(command.file), reporter);
      break;

    case 'tokens':
      for (const token of new Lexer(readFile(command.file), reporter).scan()) {
        console.log(tokenToString(token));
      }
      break;

    case 'ast':
      console.log(printProgram(compileSource(readFile(command.file), reporter)));
      break;
  }

  process.exitCode = reporter.count > 0 ? 1 : 0;
}

function execute(source: string, reporter: ConsoleReporter): void {
  const interpreter = new Interpreter({ output: new ConsoleOutput(), reporter });
  runSource(source, interpreter, reporter);
}

function readFile(filepath: string): string {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    console.error(`Error: File not found: ${resolved}`);
    process.exit(1);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

function printUsage(): void {
  console.log('Rite v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  rite <file.rite>              Run a Rite file');
  console.log('  rite run <file.rite>          Run a Rite file');
  console.log('  rite repl                     Start interactive REPL (default)');
  console.log('  rite tokens <file.rite>       Print the token stream of a file');
  console.log('  rite ast <file.rite>          Print the parsed tree of a file');
  console.log('  rite --eval "<code>"          Evaluate inline code');
  console.log('  rite --help                   Show this help');
  console.log('');
  console.log('Environment:');
  console.log('  RITE_PROMPT                   REPL prompt (default "> ")');
}

main();
