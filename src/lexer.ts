import { KEYWORDS, type Literal, type Token, TokenType } from "./token.ts";
import { isalnum, isalpha, isdigit } from "./utils.ts";

const SINGLES: ReadonlyMap<string, TokenType> = new Map([
  ["+", TokenType.PLUS],
  ["-", TokenType.MINUS],
  ["*", TokenType.STAR],
  ["/", TokenType.SLASH],
  ["=", TokenType.EQUALS],
  [".", TokenType.PERIOD],
  [",", TokenType.COMMA],
  [";", TokenType.SEMICOLON],
  ["(", TokenType.LPAREN],
  [")", TokenType.RPAREN],
]);

/**Lexer
 *
 * Pulls one token per `nextToken()` call. Bad input never throws: it becomes
 * an `ERROR` token carrying the message as its value, and once the source is
 * exhausted every call returns `EOF`.
 */
export class Lexer {
  private pos: number;
  private line: number;
  private tok: Token;

  constructor(private src: string) {
    this.pos = 0;
    this.line = 1;
    this.tok = { type: TokenType.EOF, line: 1, text: "" };
  }

  private atEnd = (): boolean => this.pos >= this.src.length;

  // "" past the end; a NUL in the source is an ordinary character
  private current = (): string =>
    this.pos < this.src.length ? this.src[this.pos] : "";

  private peek = (): string =>
    this.pos + 1 < this.src.length ? this.src[this.pos + 1] : "";

  private bump = (): void => {
    if (this.current() === "\n") this.line++;
    this.pos++;
  };

  private make = (
    type: TokenType,
    line: number,
    text: string,
    value?: Literal,
  ): Token => {
    this.tok = value === undefined
      ? { type, line, text }
      : { type, line, text, value };
    return this.tok;
  };

  // Skips whitespace and comments. Returns an error message if a comment
  // runs off the end of the source.
  private skipSpaces = (): string | undefined => {
    while (true) {
      const ch = this.current();
      if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") {
        this.bump();
      } else if (ch === "{") {
        while (this.current() !== "}") {
          if (this.atEnd()) return "Unterminated comment";
          this.bump();
        }
        this.bump();
      } else if (ch === "(" && this.peek() === "*") {
        this.bump();
        this.bump();
        while (!(this.current() === "*" && this.peek() === ")")) {
          if (this.atEnd()) return "Unterminated comment";
          this.bump();
        }
        this.bump();
        this.bump();
      } else {
        return undefined;
      }
    }
  };

  private parseDigits = (): string => {
    let digits = "";
    while (isdigit(this.current())) {
      digits += this.current();
      this.bump();
    }
    return digits;
  };

  private parseNumber = (line: number): Token => {
    let text = this.parseDigits();
    let real = false;

    // `1.` followed by anything but a digit leaves the period for the parser
    if (this.current() === "." && isdigit(this.peek())) {
      this.bump();
      text += "." + this.parseDigits();
      real = true;
    }

    if (this.current() === "e" || this.current() === "E") {
      const save = { pos: this.pos, line: this.line };
      let exponent = "e";
      this.bump();
      if (this.current() === "+" || this.current() === "-") {
        exponent += this.current();
        this.bump();
      }
      if (isdigit(this.current())) {
        text += exponent + this.parseDigits();
        real = true;
      } else {
        this.pos = save.pos;
        this.line = save.line;
      }
    }

    return real
      ? this.make(TokenType.REAL, line, text, Number(text))
      : this.make(TokenType.INTEGER, line, text, parseInt(text, 10));
  };

  private parseAlpha = (): string => {
    let alpha: string = "";
    while (isalnum(this.current())) {
      alpha += this.current();
      this.bump();
    }
    return alpha;
  };

  private parseString = (line: number): Token => {
    this.bump();
    let s: string = "";
    while (true) {
      if (this.atEnd() || this.current() === "\n") {
        return this.make(
          TokenType.ERROR,
          line,
          `'${s}`,
          "Unterminated string",
        );
      }
      if (this.current() === "'") {
        if (this.peek() !== "'") break;
        this.bump();
      }
      s += this.current();
      this.bump();
    }
    this.bump();
    return this.make(TokenType.STRING, line, s, s);
  };

  public nextToken = (): Token => {
    const problem = this.skipSpaces();
    const line = this.line;
    if (problem !== undefined) {
      return this.make(TokenType.ERROR, line, "", problem);
    }

    const ch = this.current();
    if (this.atEnd()) {
      return this.make(TokenType.EOF, line, "");
    } else if (isdigit(ch)) {
      return this.parseNumber(line);
    } else if (isalpha(ch)) {
      const ident = this.parseAlpha();
      const keyword = KEYWORDS.get(ident.toLowerCase());
      return this.make(keyword ?? TokenType.IDENTIFIER, line, ident);
    } else if (ch === "'") {
      return this.parseString(line);
    } else if (ch === ":") {
      this.bump();
      if (this.current() === "=") {
        this.bump();
        return this.make(TokenType.COLON_EQUALS, line, ":=");
      }
      return this.make(TokenType.COLON, line, ":");
    } else if (ch === "<") {
      this.bump();
      if (this.current() === "=") {
        this.bump();
        return this.make(TokenType.LESS_EQUALS, line, "<=");
      }
      if (this.current() === ">") {
        this.bump();
        return this.make(TokenType.NOT_EQUALS, line, "<>");
      }
      return this.make(TokenType.LESS_THAN, line, "<");
    } else if (ch === ">") {
      this.bump();
      if (this.current() === "=") {
        this.bump();
        return this.make(TokenType.GREATER_EQUALS, line, ">=");
      }
      return this.make(TokenType.GREATER_THAN, line, ">");
    }

    const single = SINGLES.get(ch);
    this.bump();
    if (single !== undefined) return this.make(single, line, ch);
    return this.make(TokenType.ERROR, line, ch, "Invalid character");
  };

  public currentToken = (): Token => {
    return this.tok;
  };
}
