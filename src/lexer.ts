import { CharSource, stringSource } from "./source";
import { Keyword, keywords, Token } from "./types";

/**
 * Pulls one token at a time out of a character stream. The lexer keeps the character that
 * ended the previous token, so it cannot be rewound or shared between streams. Use a fresh
 * lexer per input.
 */
export class Lexer {
  /** The next unconsumed character, undefined once the stream has ended */
  private lastChar: string | undefined = " ";

  constructor(private readonly source: CharSource) {}

  nextToken(): Token {
    while (true) {
      while (this.lastChar !== undefined && isWhitespace(this.lastChar)) {
        this.lastChar = this.source.read();
      }

      // Comments produce no token. Skip the rest of the line and look again.
      if (this.lastChar !== "#") break;
      this.skipComment();
    }

    // Reaching the end of the stream stops all reads. Every later call lands here again.
    if (this.lastChar === undefined) return { type: "eof" };

    const char = this.lastChar;
    if (isAlpha(char)) return this.consumeWord(char);
    if (isDigit(char) || char === ".") return this.consumeNumber(char);

    this.lastChar = this.source.read();
    return { type: "char", value: char };
  }

  private consumeWord(first: string): Token {
    return identifyWord(this.consumeWhile(first, isAlphanumeric));
  }

  private consumeNumber(first: string): Token {
    return { type: "number", value: parseLeadingFloat(this.consumeWhile(first, isNumberChar)) };
  }

  /** Collects characters while they match, leaving the first mismatch as the next char */
  private consumeWhile(first: string, matches: (char: string) => boolean): string {
    const chars = [first];
    let char = this.source.read();

    while (char !== undefined && matches(char)) {
      chars.push(char);
      char = this.source.read();
    }

    this.lastChar = char;
    return chars.join("");
  }

  private skipComment(): void {
    do {
      this.lastChar = this.source.read();
    } while (this.lastChar !== undefined && !isLineBreak(this.lastChar));
  }
}

/** Reads tokens until the end of the stream, the trailing eof token included */
export const readTokens = (lexer: Lexer): Token[] => {
  const tokens: Token[] = [];

  while (true) {
    const token = lexer.nextToken();
    tokens.push(token);
    if (token.type === "eof") return tokens;
  }
};

export const lex = (input: string): Token[] => readTokens(new Lexer(stringSource(input)));

const identifyWord = (word: string): Token => {
  if (isKeyword(word)) return { type: "keyword", value: word };
  return { type: "identifier", value: word };
};

/**
 * Converts the longest prefix of text that forms a decimal number and ignores the rest, so
 * "1.2.3" reads as 1.2 and a lone "." reads as 0.
 */
export const parseLeadingFloat = (text: string): number => {
  const match = /^(\d+\.?\d*|\.\d+)/.exec(text);
  return match ? parseFloat(match[0]) : 0;
};

const isKeyword = (word: string): word is Keyword =>
  (keywords as ReadonlyArray<string>).includes(word);

const isAlpha = (char: string) => /^[a-zA-Z]$/.test(char);

const isDigit = (char: string) => /^[0-9]$/.test(char);

const isAlphanumeric = (char: string) => isAlpha(char) || isDigit(char);

const isNumberChar = (char: string) => isDigit(char) || char === ".";

const isWhitespace = (char: string) => /^[ \t\n\v\f\r]$/.test(char);

const isLineBreak = (char: string) => char === "\n" || char === "\r";
