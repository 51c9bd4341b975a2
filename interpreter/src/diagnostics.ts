/**
 * Diagnostic and output sinks shared by the lexer, parser and interpreter.
 */

export type DiagnosticPhase = 'lex' | 'parse' | 'runtime';

export interface Diagnostic {
  phase: DiagnosticPhase;
  /** 1-based line number */
  line: number;
  message: string;
}

/**
 * Receives every recoverable problem. Implementations must not throw.
 */
export interface DiagnosticReporter {
  report(line: number, message: string, phase?: DiagnosticPhase): void;
}

/**
 * Text sink written by print statements, one call per printed value.
 */
export interface OutputSink {
  write(text: string): void;
}

const PHASE_TAGS: Record<DiagnosticPhase, string> = {
  lex: 'LexError',
  parse: 'ParseError',
  runtime: 'RuntimeError',
};

export function formatDiagnostic(d: Diagnostic): string {
  return `${PHASE_TAGS[d.phase]} [line ${d.line}]: ${d.message}`;
}

/**
 * Format an array of diagnostics, sorted by line (stable for equal lines).
 */
export function formatDiagnostics(ds: Diagnostic[]): string {
  if (ds.length === 0) return '';
  const sorted = [...ds].sort((a, b) => a.line - b.line);
  return sorted.map(formatDiagnostic).join('\n');
}

export class ConsoleReporter implements DiagnosticReporter {
  private reported = 0;

  report(line: number, message: string, phase: DiagnosticPhase = 'runtime'): void {
    this.reported++;
    console.error(formatDiagnostic({ phase, line, message }));
  }

  get count(): number {
    return this.reported;
  }
}

export class CollectingReporter implements DiagnosticReporter {
  readonly diagnostics: Diagnostic[] = [];

  report(line: number, message: string, phase: DiagnosticPhase = 'runtime'): void {
    this.diagnostics.push({ phase, line, message });
  }

  get hasErrors(): boolean {
    return this.diagnostics.length > 0;
  }

  messages(): string[] {
    return this.diagnostics.map(d => d.message);
  }

  clear(): void {
    this.diagnostics.length = 0;
  }
}

export class ConsoleOutput implements OutputSink {
  write(text: string): void {
    console.log(text);
  }
}

export class BufferedOutput implements OutputSink {
  readonly lines: string[] = [];

  write(text: string): void {
    this.lines.push(text);
  }
}
