/**
 * Recursive-descent parser from tokens to statements.
 *
 * Grammar, lowest precedence first:
 *
 *   assignment -> IDENT ( "=" | "+=" | "-=" ) assignment | logical
 *   logical    -> equality ( ( "and" | "or" ) equality )*
 *   equality   -> comparison ( ( "is" | "not" ) comparison )*
 *   comparison -> term ( ( "<" | "<=" | ">" | ">=" ) term )*
 *   term       -> factor ( ( "+" | "-" ) factor )*
 *   factor     -> unary ( ( "*" | "/" ) unary )*
 *   unary      -> ( "not" | "-" ) unary | postfix
 *   postfix    -> primary ( "++" | "--" )*
 *   primary    -> NUMBER | STRING | "true" | "false" | "none" | IDENT | "(" assignment ")"
 *
 * A failed declaration is reported, the cursor skips past the next
 * StatementEnd (or up to the `}` closing the enclosing block), and a no-op
 * statement takes its place, so `parse()` returns a statement for every
 * declaration it started.
 */

import { BlockStmt, Expr, Stmt } from './ast';
import { DiagnosticReporter } from './diagnostics';
import { RiteParseError } from './errors';
import { Token, TokenType, mkToken } from './token';
import { mkBool, mkNone } from './values';

/** Deepest nesting of blocks and sub-expressions the parser accepts. */
const MAX_NESTING = 256;

export class Parser {
  private current = 0;
  private nesting = 0;
  private blockDepth = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly reporter: DiagnosticReporter,
  ) {
    if (tokens.length === 0 || tokens[tokens.length - 1].type !== TokenType.EOF) {
      const line = tokens.length > 0 ? tokens[tokens.length - 1].line : 1;
      this.tokens = [...tokens, mkToken(TokenType.StatementEnd, '', line), mkToken(TokenType.EOF, '', line)];
    }
  }

  parse(): Stmt[] {
    const statements: Stmt[] = [];
    while (!this.isAtEnd()) {
      if (this.match(TokenType.StatementEnd)) continue;
      statements.push(this.declaration());
    }
    return statements;
  }

  // ---- Declarations ----

  private declaration(): Stmt {
    try {
      if (this.match(TokenType.Offering)) return this.varDeclaration();
      return this.statement();
    } catch (e) {
      if (!(e instanceof RiteParseError)) throw e;
      this.reporter.report(e.line, e.message, 'parse');
      this.synchronize();
      return { kind: 'expression', expression: { kind: 'literal', value: mkNone() } };
    }
  }

  private varDeclaration(): Stmt {
    const name = this.consume(TokenType.Identifier, 'Expected variable name.');
    let initializer: Expr | null = null;
    if (this.match(TokenType.Equal)) initializer = this.expression();
    this.statementEnd('Expected statement end after variable declaration.');
    return { kind: 'var', name, initializer };
  }

  // ---- Statements ----

  private statement(): Stmt {
    if (this.match(TokenType.DollarLess)) return this.printStatement();
    if (this.match(TokenType.BraceOpen)) return this.blockStatement();
    if (this.match(TokenType.If)) return this.ifStatement();
    if (this.match(TokenType.While)) return this.whileStatement();
    return this.expressionStatement();
  }

  private printStatement(): Stmt {
    const expression = this.expression();
    this.statementEnd('Expected statement end after expression.');
    return { kind: 'print', expression };
  }

  private blockStatement(): Stmt {
    const block = this.block();
    this.statementEnd('Expected statement end after block.');
    return block;
  }

  /**
   * Parses declarations up to and including the closing brace.
   * The opening brace has already been consumed.
   */
  private block(): BlockStmt {
    return this.nested<BlockStmt>(() => {
      const statements: Stmt[] = [];
      this.blockDepth++;
      try {
        while (!this.check(TokenType.BraceClose) && !this.isAtEnd()) {
          if (this.match(TokenType.StatementEnd)) continue;
          statements.push(this.declaration());
        }
      } finally {
        this.blockDepth--;
      }
      this.consume(TokenType.BraceClose, "Expected '}' after block.");
      return { kind: 'block', statements };
    });
  }

  private ifStatement(): Stmt {
    const condition = this.expression();
    this.consume(TokenType.BraceOpen, "Expected '{' after if condition.");
    const thenBranch = this.block();

    // `else` may follow on the same line or on the next one.
    const ended = this.match(TokenType.StatementEnd);
    if (!this.match(TokenType.Else)) {
      if (!ended) this.statementEnd('Expected statement end after block.');
      return { kind: 'if', condition, thenBranch, elseBranch: null };
    }

    let elseBranch: BlockStmt;
    if (this.match(TokenType.If)) {
      // `else if` nests the chained statement in its own else block
      elseBranch = { kind: 'block', statements: [this.nested(() => this.ifStatement())] };
    } else {
      this.consume(TokenType.BraceOpen, "Expected '{' after else.");
      elseBranch = this.block();
      this.statementEnd('Expected statement end after block.');
    }
    return { kind: 'if', condition, thenBranch, elseBranch };
  }

  private whileStatement(): Stmt {
    const condition = this.expression();
    this.consume(TokenType.BraceOpen, "Expected '{' after while condition.");
    const body = this.block();
    this.statementEnd('Expected statement end after block.');
    return { kind: 'while', condition, body };
  }

  private expressionStatement(): Stmt {
    const expression = this.expression();
    this.statementEnd('Expected statement end after expression.');
    return { kind: 'expression', expression };
  }

  // ---- Expressions ----

  private expression(): Expr {
    return this.nested(() => this.assignment());
  }

  private assignment(): Expr {
    const expr = this.logical();

    if (this.match(TokenType.Equal, TokenType.PlusEqual, TokenType.MinusEqual)) {
      const operator = this.previous();
      const value = this.nested(() => this.assignment());

      if (expr.kind === 'variable') {
        if (operator.type === TokenType.Equal) {
          return { kind: 'assign', name: expr.name, value };
        }
        const arithmetic = operator.type === TokenType.PlusEqual
          ? mkToken(TokenType.Plus, '+', operator.line)
          : mkToken(TokenType.Minus, '-', operator.line);
        return {
          kind: 'assign',
          name: expr.name,
          value: { kind: 'binary', left: expr, operator: arithmetic, right: value },
        };
      }

      // Reported, not thrown: the statement still parses.
      this.reporter.report(operator.line, 'Invalid assignment target.', 'parse');
    }

    return expr;
  }

  private logical(): Expr {
    let expr = this.equality();
    while (this.match(TokenType.And, TokenType.Or)) {
      const operator = this.previous();
      const right = this.equality();
      expr = { kind: 'logical', left: expr, operator, right };
    }
    return expr;
  }

  private equality(): Expr {
    let expr = this.comparison();
    while (this.match(TokenType.Is, TokenType.Not)) {
      const operator = this.previous();
      const right = this.comparison();
      expr = { kind: 'binary', left: expr, operator, right };
    }
    return expr;
  }

  private comparison(): Expr {
    let expr = this.term();
    while (this.match(TokenType.Greater, TokenType.GreaterEqual, TokenType.Less, TokenType.LessEqual)) {
      const operator = this.previous();
      const right = this.term();
      expr = { kind: 'binary', left: expr, operator, right };
    }
    return expr;
  }

  private term(): Expr {
    let expr = this.factor();
    while (this.match(TokenType.Minus, TokenType.Plus)) {
      const operator = this.previous();
      const right = this.factor();
      expr = { kind: 'binary', left: expr, operator, right };
    }
    return expr;
  }

  private factor(): Expr {
    let expr = this.unary();
    while (this.match(TokenType.Divide, TokenType.Multiply)) {
      const operator = this.previous();
      const right = this.unary();
      expr = { kind: 'binary', left: expr, operator, right };
    }
    return expr;
  }

  private unary(): Expr {
    if (this.match(TokenType.Not, TokenType.Minus)) {
      const operator = this.previous();
      const right = this.nested(() => this.unary());
      return { kind: 'unary', operator, right };
    }
    return this.postfix();
  }

  private postfix(): Expr {
    let expr = this.primary();
    while (this.match(TokenType.PlusPlus, TokenType.MinusMinus)) {
      expr = { kind: 'postfix', target: expr, operator: this.previous() };
    }
    return expr;
  }

  private primary(): Expr {
    if (this.match(TokenType.Identifier)) return { kind: 'variable', name: this.previous() };
    if (this.match(TokenType.False)) return { kind: 'literal', value: mkBool(false) };
    if (this.match(TokenType.True)) return { kind: 'literal', value: mkBool(true) };
    if (this.match(TokenType.None)) return { kind: 'literal', value: mkNone() };
    if (this.match(TokenType.Number, TokenType.String)) {
      return { kind: 'literal', value: this.previous().literal ?? mkNone() };
    }
    if (this.match(TokenType.ParenOpen)) {
      const expression = this.expression();
      this.consume(TokenType.ParenClose, "Expected ')' after expression.");
      return { kind: 'grouping', expression };
    }
    throw new RiteParseError(this.peek(), 'Expected an expression.');
  }

  // ---- Token cursor ----

  /**
   * Returns and advances past the current token if it has type `type`;
   * otherwise throws a parse error at the current token.
   */
  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw new RiteParseError(this.peek(), message);
  }

  /**
   * A StatementEnd token, or nothing when the next token closes a block.
   */
  private statementEnd(message: string): void {
    if (this.check(TokenType.BraceClose)) return;
    this.consume(TokenType.StatementEnd, message);
  }

  /**
   * Skips tokens until just past the next StatementEnd (or to EOF). Inside
   * a block it also stops in front of a `}` so the block can still close.
   */
  private synchronize(): void {
    while (!this.isAtEnd()) {
      if (this.blockDepth > 0 && this.check(TokenType.BraceClose)) return;
      if (this.advance().type === TokenType.StatementEnd) return;
    }
  }

  /**
   * Runs one level of recursive descent, failing with a parse error
   * instead of exhausting the call stack on pathological input.
   */
  private nested<T>(parse: () => T): T {
    if (this.nesting >= MAX_NESTING) {
      throw new RiteParseError(this.peek(), 'Too deeply nested.');
    }
    this.nesting++;
    try {
      return parse();
    } finally {
      this.nesting--;
    }
  }

  private match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }
}

/**
 * Convenience wrapper: parse `tokens` in one call.
 */
export function parse(tokens: Token[], reporter: DiagnosticReporter): Stmt[] {
  return new Parser(tokens, reporter).parse();
}
