export enum TokenType {
  PROGRAM,
  BEGIN,
  END,
  REPEAT,
  UNTIL,
  WHILE,
  DO,
  IF,
  THEN,
  ELSE,
  WRITE,
  WRITELN,
  DIV,
  MOD,
  AND,
  OR,
  NOT,
  PLUS,
  MINUS,
  STAR,
  SLASH,
  COLON_EQUALS,
  EQUALS,
  NOT_EQUALS,
  LESS_THAN,
  LESS_EQUALS,
  GREATER_THAN,
  GREATER_EQUALS,
  PERIOD,
  COMMA,
  COLON,
  SEMICOLON,
  LPAREN,
  RPAREN,
  INTEGER,
  REAL,
  STRING,
  IDENTIFIER,
  ERROR,
  EOF,
}

export type Literal = string | number;

export type Token = {
  readonly type: TokenType;
  readonly line: number;
  readonly text: string;
  readonly value?: Literal;
};

/** Anything that hands out tokens one at a time, EOF forever at the end */
export interface TokenSource {
  nextToken(): Token;
}

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ["program", TokenType.PROGRAM],
  ["begin", TokenType.BEGIN],
  ["end", TokenType.END],
  ["repeat", TokenType.REPEAT],
  ["until", TokenType.UNTIL],
  ["while", TokenType.WHILE],
  ["do", TokenType.DO],
  ["if", TokenType.IF],
  ["then", TokenType.THEN],
  ["else", TokenType.ELSE],
  ["write", TokenType.WRITE],
  ["writeln", TokenType.WRITELN],
  ["div", TokenType.DIV],
  ["mod", TokenType.MOD],
  ["and", TokenType.AND],
  ["or", TokenType.OR],
  ["not", TokenType.NOT],
]);
