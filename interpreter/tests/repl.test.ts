/**
 * Tests for the REPL session logic, driven line by line without a terminal.
 */

import { BufferedOutput, CollectingReporter } from '../src/diagnostics';
import { ReplSession, hasUnclosedDelimiters } from '../src/repl';

function session() {
  const output = new BufferedOutput();
  const reporter = new CollectingReporter();
  return { repl: new ReplSession(output, reporter), output, reporter };
}

describe('ReplSession', () => {
  test('variables persist between inputs', () => {
    const { repl, output } = session();
    expect(repl.feed('offering x = 1')).toBe(true);
    repl.feed('$< x + 1');
    expect(output.lines).toEqual(['2']);
  });

  test('collects multi-line input until delimiters close', () => {
    const { repl, output } = session();
    repl.feed('if true {');
    expect(repl.pending).toBe(true);
    repl.feed('  $< "yes"');
    expect(output.lines).toEqual([]);
    repl.feed('}');
    expect(repl.pending).toBe(false);
    expect(output.lines).toEqual(['yes']);
  });

  test('errors are reported and the session continues', () => {
    const { repl, output, reporter } = session();
    repl.feed('$< missing');
    repl.feed('$< "still here"');
    expect(reporter.diagnostics).toEqual([{ phase: 'runtime', line: 1, message: "Undefined variable 'missing'." }]);
    expect(output.lines).toEqual(['still here']);
  });

  test(':env lists global bindings', () => {
    const { repl, output } = session();
    repl.feed(':env');
    repl.feed('offering n = 4');
    repl.feed('offering s = "hi"');
    repl.feed(':env');
    expect(output.lines).toEqual([
      '  (no variables defined)',
      '  n: Number = 4',
      '  s: String = hi',
    ]);
  });

  test(':env truncates long values', () => {
    const { repl, output } = session();
    repl.feed(`offering s = "${'a'.repeat(70)}"`);
    repl.feed(':env');
    expect(output.lines).toEqual([`  s: String = ${'a'.repeat(57)}...`]);
  });

  test(':tokens prints the token stream', () => {
    const { repl, output } = session();
    repl.feed(':tokens x');
    expect(output.lines).toEqual(['1\tIdentifier\t"x"', '1\tStatementEnd\t""', '1\tEOF\t""']);
  });

  test(':ast prints the parsed tree', () => {
    const { repl, output } = session();
    repl.feed(':ast $< 1 + 2');
    expect(output.lines).toEqual(['(print (+ 1 2))']);
  });

  test('commands that need code print their usage', () => {
    const { repl, output } = session();
    repl.feed(':tokens');
    repl.feed(':ast');
    expect(output.lines).toEqual(['Usage: :tokens <code>', 'Usage: :ast <code>']);
  });

  test(':reset forgets variables', () => {
    const { repl, output, reporter } = session();
    repl.feed('offering x = 1');
    repl.feed(':reset');
    repl.feed('$< x');
    expect(output.lines).toEqual(['Interpreter state reset.']);
    expect(reporter.messages()).toEqual(["Undefined variable 'x'."]);
  });

  test(':help starts with the command list', () => {
    const { repl, output } = session();
    repl.feed(':help');
    expect(output.lines[0]).toBe('REPL Commands:');
  });

  test('quit commands end the session', () => {
    expect(session().repl.feed(':quit')).toBe(false);
    expect(session().repl.feed(':q')).toBe(false);
    expect(session().repl.feed(':exit')).toBe(false);
  });

  test('unknown commands are reported', () => {
    const { repl, output } = session();
    expect(repl.feed(':bogus')).toBe(true);
    expect(output.lines).toEqual(['Unknown command: :bogus. Type :help for available commands.']);
  });

  test('blank input does nothing', () => {
    const { repl, output, reporter } = session();
    repl.feed('   ');
    expect(output.lines).toEqual([]);
    expect(reporter.hasErrors).toBe(false);
  });
});

describe('hasUnclosedDelimiters', () => {
  test('counts braces, parentheses and brackets', () => {
    expect(hasUnclosedDelimiters('{')).toBe(true);
    expect(hasUnclosedDelimiters('(1 + [2')).toBe(true);
    expect(hasUnclosedDelimiters('{ }')).toBe(false);
    expect(hasUnclosedDelimiters('(1))')).toBe(false);
  });

  test('ignores delimiters in strings and comments', () => {
    expect(hasUnclosedDelimiters('$< "{"')).toBe(false);
    expect(hasUnclosedDelimiters('{ "}"')).toBe(true);
    expect(hasUnclosedDelimiters('x ? (')).toBe(false);
  });
});
