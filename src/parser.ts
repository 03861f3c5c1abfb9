import type {
  BinaryOperator,
  Compound,
  Expression,
  If,
  IntegerConstant,
  Loop,
  Program,
  RealConstant,
  Statement,
  StringConstant,
  Test,
  Variable,
  Write,
  Writeln,
} from "./ast.ts";
import { type Diagnostic, ParseError } from "./errors.ts";
import type { Symtab } from "./symtab.ts";
import { type Token, type TokenSource, TokenType } from "./token.ts";
import { err } from "./utils.ts";

type WriteArguments = Pick<Write, "value" | "width" | "decimals">;

const STATEMENT_STARTERS: ReadonlySet<TokenType> = new Set([
  TokenType.BEGIN,
  TokenType.IDENTIFIER,
  TokenType.REPEAT,
  TokenType.WHILE,
  TokenType.IF,
  TokenType.WRITE,
  TokenType.WRITELN,
]);

// Error recovery skips to one of these.
const STATEMENT_FOLLOWERS: ReadonlySet<TokenType> = new Set([
  TokenType.SEMICOLON,
  TokenType.END,
  TokenType.UNTIL,
  TokenType.EOF,
]);

const LIST_ENDS: ReadonlySet<TokenType> = new Set([
  TokenType.END,
  TokenType.UNTIL,
  TokenType.EOF,
]);

const RELATIONAL: ReadonlyMap<TokenType, BinaryOperator> = new Map([
  [TokenType.EQUALS, "Eq"],
  [TokenType.NOT_EQUALS, "Ne"],
  [TokenType.LESS_THAN, "Lt"],
  [TokenType.LESS_EQUALS, "Le"],
  [TokenType.GREATER_THAN, "Gt"],
  [TokenType.GREATER_EQUALS, "Ge"],
]);

const ADDITIVE: ReadonlyMap<TokenType, BinaryOperator> = new Map([
  [TokenType.PLUS, "Add"],
  [TokenType.MINUS, "Subtract"],
  [TokenType.OR, "Or"],
]);

const MULTIPLICATIVE: ReadonlyMap<TokenType, BinaryOperator> = new Map([
  [TokenType.STAR, "Multiply"],
  [TokenType.SLASH, "Divide"],
  [TokenType.DIV, "IntegerDivide"],
  [TokenType.MOD, "Modulus"],
  [TokenType.AND, "And"],
]);

/**Parser
 *
 * Recursive descent with one token of lookahead. Syntax errors are thrown as
 * `ParseError` and caught at the nearest statement boundary, where the
 * diagnostic is recorded and tokens are skipped up to the next `;`, `END`,
 * `UNTIL` or end of input. Check `errorCount()` before executing the result.
 */
export class Parser {
  private tok: Token;
  private errors: Diagnostic[] = [];

  constructor(private lexer: TokenSource, private symtab: Symtab) {
    this.tok = { type: TokenType.EOF, line: 1, text: "" };
  }

  public errorCount = (): number => this.errors.length;

  public diagnostics = (): readonly Diagnostic[] => this.errors;

  public parseProgram = (): Program => {
    this.advance();
    const line = this.tok.line;
    let name = "";

    try {
      this.expect(TokenType.PROGRAM, "Expecting PROGRAM");
      name = this.expect(TokenType.IDENTIFIER, "Expecting program name").text;
      this.symtab.enter(name);
      this.expect(TokenType.SEMICOLON, "Missing ;");
    } catch (e) {
      this.recover(e);
      if (this.at(TokenType.SEMICOLON)) this.advance();
    }

    let body: Compound = { type: "Compound", line: this.tok.line, body: [] };
    try {
      body = this.compoundStatement();
      this.expect(TokenType.PERIOD, "Expecting .");
    } catch (e) {
      this.recover(e);
    }

    return { type: "Program", line, name, body };
  };

  private advance = (): void => {
    this.tok = this.lexer.nextToken();
  };

  private at = (...types: TokenType[]): boolean =>
    types.includes(this.tok.type);

  private error = (message: string): ParseError => {
    // the lexer's message is more useful than ours
    if (this.tok.type === TokenType.ERROR && typeof this.tok.value === "string") {
      return new ParseError(this.tok.value, this.tok);
    }
    return new ParseError(message, this.tok);
  };

  private expect = (type: TokenType, message: string): Token => {
    if (this.tok.type !== type) throw this.error(message);
    const tok = this.tok;
    this.advance();
    return tok;
  };

  private recover = (e: unknown): void => {
    if (!(e instanceof ParseError)) throw e;
    this.errors.push(e.toDiagnostic());
    while (!STATEMENT_FOLLOWERS.has(this.tok.type)) this.advance();
  };

  private semanticError = (message: string): void => {
    this.errors.push({
      kind: "SEMANTIC",
      line: this.tok.line,
      message,
      text: this.tok.text,
    });
  };

  // Stops at END, UNTIL or end of input whatever the enclosing construct
  // expects; the caller reports a mismatch.
  private statementList = (): Statement[] => {
    const statements: Statement[] = [];
    while (!LIST_ENDS.has(this.tok.type)) {
      if (this.at(TokenType.SEMICOLON)) {
        this.advance();
        continue;
      }
      try {
        statements.push(this.statement());
      } catch (e) {
        this.recover(e);
        continue;
      }
      if (this.at(TokenType.SEMICOLON)) this.advance();
      else if (STATEMENT_STARTERS.has(this.tok.type)) {
        this.errors.push(this.error("Missing ;").toDiagnostic());
      }
    }
    return statements;
  };

  private statement = (): Statement => {
    switch (this.tok.type) {
      case TokenType.IDENTIFIER:
        return this.assignment();
      case TokenType.BEGIN:
        return this.compoundStatement();
      case TokenType.REPEAT:
        return this.repeatStatement();
      case TokenType.WHILE:
        return this.whileStatement();
      case TokenType.IF:
        return this.ifStatement();
      case TokenType.WRITE:
        return this.writeStatement();
      case TokenType.WRITELN:
        return this.writelnStatement();
      default:
        throw this.error("Unexpected token");
    }
  };

  private assignment = (): Statement => {
    const ident = this.tok;
    // assignment targets declare themselves, before the right-hand side
    this.symtab.enter(ident.text);
    this.advance();

    const target: Variable = {
      type: "Variable",
      line: ident.line,
      name: ident.text.toLowerCase(),
      text: ident.text,
    };
    this.expect(TokenType.COLON_EQUALS, "Missing :=");
    const value = this.expression();
    return { type: "Assign", line: ident.line, target, value };
  };

  private compoundStatement = (): Compound => {
    const begin = this.expect(TokenType.BEGIN, "Expecting BEGIN");
    const body = this.statementList();
    this.expect(TokenType.END, "Expecting END");
    return { type: "Compound", line: begin.line, body };
  };

  private repeatStatement = (): Loop => {
    const line = this.tok.line;
    this.advance();

    const body: (Statement | Test)[] = this.statementList();
    const until = this.expect(TokenType.UNTIL, "Expecting UNTIL");
    body.push({ type: "Test", line: until.line, cond: this.expression() });
    return { type: "Loop", line, body };
  };

  // WHILE c DO BEGIN s END becomes a Loop [Test(NOT c), s...]: the test comes
  // first, so the body never runs when c is false on entry.
  private whileStatement = (): Loop => {
    const line = this.tok.line;
    this.advance();

    const guardLine = this.tok.line;
    const guard = this.expression();
    this.expect(TokenType.DO, "Expecting DO");
    const test: Test = {
      type: "Test",
      line: guardLine,
      cond: {
        type: "UnaryOp",
        op: "Not",
        text: "not",
        line: guardLine,
        argument: guard,
      },
    };

    const block = this.compoundStatement();
    return { type: "Loop", line, body: [test, ...block.body] };
  };

  private ifStatement = (): If => {
    const line = this.tok.line;
    this.advance();

    const test: Test = { type: "Test", line: this.tok.line, cond: this.expression() };
    this.expect(TokenType.THEN, "Expecting THEN");
    const then = this.statement();

    if (this.at(TokenType.ELSE)) {
      this.advance();
      return { type: "If", line, test, then, else: this.statement() };
    }
    return { type: "If", line, test, then };
  };

  private writeStatement = (): Write => {
    const line = this.tok.line;
    this.advance();
    return { type: "Write", line, ...this.writeArguments() };
  };

  private writelnStatement = (): Writeln => {
    const line = this.tok.line;
    this.advance();
    if (!this.at(TokenType.LPAREN)) return { type: "Writeln", line };
    return { type: "Writeln", line, ...this.writeArguments() };
  };

  private writeArguments = (): WriteArguments => {
    this.expect(TokenType.LPAREN, "Missing left parenthesis");

    let args: WriteArguments;
    if (this.at(TokenType.IDENTIFIER)) args = { value: this.variable() };
    else if (this.at(TokenType.STRING)) args = { value: this.stringConstant() };
    else throw this.error("Invalid WRITE or WRITELN statement");

    if (this.at(TokenType.COLON)) {
      this.advance();
      if (!this.at(TokenType.INTEGER)) throw this.error("Invalid field width");
      args.width = this.integerConstant();

      if (this.at(TokenType.COLON)) {
        this.advance();
        if (!this.at(TokenType.INTEGER)) {
          throw this.error("Invalid count of decimal places");
        }
        args.decimals = this.integerConstant();
      }
    }

    this.expect(TokenType.RPAREN, "Missing right parenthesis");
    return args;
  };

  private expression = (): Expression => {
    const left = this.simpleExpression();
    const op = RELATIONAL.get(this.tok.type);
    if (op === undefined) return left;

    const { text, line } = this.tok;
    this.advance();
    const right = this.simpleExpression();
    return { type: "BinOp", op, text, line, left, right };
  };

  private simpleExpression = (): Expression => {
    let left: Expression;
    if (this.at(TokenType.PLUS, TokenType.MINUS)) {
      const sign = this.tok;
      this.advance();
      left = {
        type: "UnaryOp",
        op: sign.type === TokenType.PLUS ? "Positive" : "Negate",
        text: sign.text,
        line: sign.line,
        argument: this.term(),
      };
    } else left = this.term();

    let op = ADDITIVE.get(this.tok.type);
    while (op !== undefined) {
      const { text, line } = this.tok;
      this.advance();
      const right = this.term();
      left = { type: "BinOp", op, text, line, left, right };
      op = ADDITIVE.get(this.tok.type);
    }
    return left;
  };

  private term = (): Expression => {
    let left = this.factor();

    let op = MULTIPLICATIVE.get(this.tok.type);
    while (op !== undefined) {
      const { text, line } = this.tok;
      this.advance();
      const right = this.factor();
      left = { type: "BinOp", op, text, line, left, right };
      op = MULTIPLICATIVE.get(this.tok.type);
    }
    return left;
  };

  private factor = (): Expression => {
    switch (this.tok.type) {
      case TokenType.IDENTIFIER:
        return this.variable();
      case TokenType.INTEGER:
        return this.integerConstant();
      case TokenType.REAL:
        return this.realConstant();
      case TokenType.LPAREN: {
        this.advance();
        const expr = this.expression();
        this.expect(TokenType.RPAREN, "Expecting )");
        return expr;
      }
      case TokenType.NOT: {
        const { text, line } = this.tok;
        this.advance();
        return {
          type: "UnaryOp",
          op: "Not",
          text,
          line,
          argument: this.expression(),
        };
      }
      default:
        throw this.error("Unexpected token");
    }
  };

  // A read of a name nobody assigned is reported once; the name is then
  // entered so every Variable node resolves.
  private variable = (): Variable => {
    const ident = this.tok;
    if (this.symtab.lookup(ident.text) === undefined) {
      this.semanticError("Undeclared identifier");
      this.symtab.enter(ident.text);
    }
    this.advance();
    return {
      type: "Variable",
      line: ident.line,
      name: ident.text.toLowerCase(),
      text: ident.text,
    };
  };

  private numberValue = (tok: Token): number =>
    typeof tok.value === "number"
      ? tok.value
      : err("Parser", `Number token without a value: '${tok.text}'`);

  private integerConstant = (): IntegerConstant => {
    const tok = this.expect(TokenType.INTEGER, "Expecting integer");
    return {
      type: "IntegerConstant",
      line: tok.line,
      value: this.numberValue(tok),
    };
  };

  private realConstant = (): RealConstant => {
    const tok = this.expect(TokenType.REAL, "Expecting real");
    return { type: "RealConstant", line: tok.line, value: this.numberValue(tok) };
  };

  private stringConstant = (): StringConstant => {
    const tok = this.expect(TokenType.STRING, "Expecting string");
    const value = typeof tok.value === "string"
      ? tok.value
      : err("Parser", `String token without a value: '${tok.text}'`);
    return { type: "StringConstant", line: tok.line, value };
  };
}
