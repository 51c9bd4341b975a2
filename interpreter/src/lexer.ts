/**
 * Single-pass scanner from source text to tokens.
 *
 * The scanner never throws: malformed lexemes are reported to the
 * diagnostic sink and dropped. Statement boundaries are inferred from
 * newlines: outside of `(...)` and `[...]`, a newline that follows a token
 * able to end a statement becomes a StatementEnd token.
 */

import { DiagnosticReporter } from './diagnostics';
import { TokenType, Token, KEYWORDS, canEndStatement, mkToken, isDigit, isIdStart, isIdPart } from './token';
import { RiteValue, mkNumber, mkString } from './values';

export class Lexer {
  private tokens: Token[] = [];
  private start = 0;
  private current = 0;
  private line = 1;
  /** Open `(`/`[` count; newlines are whitespace while it is above zero. */
  private bracketDepth = 0;

  constructor(
    private readonly source: string,
    private readonly reporter: DiagnosticReporter,
  ) {}

  scan(): Token[] {
    this.tokens = [];
    this.start = 0;
    this.current = 0;
    this.line = 1;
    this.bracketDepth = 0;

    while (!this.isAtEnd()) {
      this.start = this.current;
      this.scanToken();
    }

    if (this.lastType() !== TokenType.StatementEnd) {
      this.tokens.push(mkToken(TokenType.StatementEnd, '', this.line));
    }
    this.tokens.push(mkToken(TokenType.EOF, '', this.line));
    return this.tokens;
  }

  private scanToken(): void {
    const c = this.advance();

    switch (c) {
      case '?': this.skipLineComment(); break;
      case ' ':
      case '\r':
      case '\t':
        break;
      case '\n': this.newline(); break;

      case '(': this.add(TokenType.ParenOpen); this.bracketDepth++; break;
      case ')': this.add(TokenType.ParenClose); this.closeBracket(); break;
      case '[': this.add(TokenType.SquareOpen); this.bracketDepth++; break;
      case ']': this.add(TokenType.SquareClose); this.closeBracket(); break;
      case '{': this.add(TokenType.BraceOpen); break;
      case '}': this.add(TokenType.BraceClose); break;
      case ',': this.add(TokenType.Comma); break;
      case '.': this.add(TokenType.Dot); break;

      case '+': {
        if (this.match('+')) { this.add(TokenType.PlusPlus); break; }
        if (this.match('=')) { this.add(TokenType.PlusEqual); break; }
        this.add(TokenType.Plus); break;
      }
      case '-': {
        if (this.match('-')) { this.add(TokenType.MinusMinus); break; }
        if (this.match('=')) { this.add(TokenType.MinusEqual); break; }
        this.add(TokenType.Minus); break;
      }
      case '*': this.add(TokenType.Multiply); break;
      case '/': this.add(TokenType.Divide); break;
      case '=': this.add(TokenType.Equal); break;
      case '<': this.add(this.match('=') ? TokenType.LessEqual : TokenType.Less); break;
      case '>': this.add(this.match('=') ? TokenType.GreaterEqual : TokenType.Greater); break;

      case '$': {
        if (this.match('<')) { this.add(TokenType.DollarLess); break; }
        if (this.match('>')) { this.add(TokenType.DollarGreater); break; }
        this.unexpected(); break;
      }

      case '"': this.string(); break;

      default:
        if (isDigit(c)) { this.number(); break; }
        if (isIdStart(c)) { this.identifier(); break; }
        this.unexpected();
    }
  }

  private isAtEnd(): boolean { return this.current >= this.source.length; }
  private peek(): string { return this.isAtEnd() ? '\0' : this.source.charAt(this.current); }
  private peekNext(): string {
    return this.current + 1 >= this.source.length ? '\0' : this.source.charAt(this.current + 1);
  }
  private advance(): string { return this.source.charAt(this.current++); }

  private match(expected: string): boolean {
    if (this.peek() !== expected) return false;
    this.current++;
    return true;
  }

  private lastType(): TokenType | undefined {
    return this.tokens.length > 0 ? this.tokens[this.tokens.length - 1].type : undefined;
  }

  private add(type: TokenType, literal: RiteValue | null = null): void {
    const text = this.source.slice(this.start, this.current);
    this.tokens.push(mkToken(type, text, this.line, literal));
  }

  private newline(): void {
    const last = this.lastType();
    if (this.bracketDepth === 0 && last !== undefined && canEndStatement(last)) {
      this.add(TokenType.StatementEnd);
    }
    this.line++;
  }

  private closeBracket(): void {
    if (this.bracketDepth > 0) this.bracketDepth--;
  }

  private skipLineComment(): void {
    while (this.peek() !== '\n' && !this.isAtEnd()) this.current++;
  }

  private string(): void {
    const openedOn = this.line;
    while (this.peek() !== '"' && !this.isAtEnd()) {
      if (this.peek() === '\n') this.line++;
      this.current++;
    }

    if (this.isAtEnd()) {
      this.reporter.report(openedOn, 'Unterminated string.', 'lex');
      return;
    }

    this.current++; // closing "
    const text = this.source.slice(this.start + 1, this.current - 1);
    this.add(TokenType.String, mkString(text));
  }

  private number(): void {
    while (isDigit(this.peek())) this.current++;
    if (this.peek() === '.' && isDigit(this.peekNext())) {
      this.current++;
      while (isDigit(this.peek())) this.current++;
    }

    const value = Number(this.source.slice(this.start, this.current));
    if (Number.isNaN(value)) {
      this.reporter.report(this.line, 'Could not parse number.', 'lex');
      return;
    }
    this.add(TokenType.Number, mkNumber(value));
  }

  private identifier(): void {
    while (isIdPart(this.peek())) this.current++;
    const text = this.source.slice(this.start, this.current);
    this.add(KEYWORDS.get(text) ?? TokenType.Identifier);
  }

  private unexpected(): void {
    const ch = String.fromCodePoint(this.source.codePointAt(this.start) ?? 0);
    this.current = this.start + ch.length;
    this.reporter.report(this.line, `Unexpected character '${ch}'.`, 'lex');
  }
}

/**
 * Convenience wrapper: scan `source` in one call.
 */
export function scan(source: string, reporter: DiagnosticReporter): Token[] {
  return new Lexer(source, reporter).scan();
}
