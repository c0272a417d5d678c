/**
 * Lexer - Tokenizes invariant source text into tokens.
 */

// ============================================================================
// Token Types
// ============================================================================

export type TokenType =
  // Literals
  | "INT"
  | "FLOAT"
  | "STRING"
  | "TRUE"
  | "FALSE"
  | "NONE"
  // Identifiers
  | "IDENT"
  // Keywords
  | "AND"
  | "OR"
  | "NOT"
  | "IN"
  | "IS"
  // Comparators
  | "EQ"
  | "NEQ"
  | "LT"
  | "GT"
  | "LTE"
  | "GTE"
  // Punctuation
  | "LPAREN"
  | "RPAREN"
  | "LBRACKET"
  | "RBRACKET"
  | "COMMA"
  | "DOT"
  // Special
  | "EOF";

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

// ============================================================================
// Keywords
// ============================================================================

const KEYWORDS: Record<string, TokenType> = {
  and: "AND",
  or: "OR",
  not: "NOT",
  in: "IN",
  is: "IS",
  True: "TRUE",
  False: "FALSE",
  None: "NONE",
};

// ============================================================================
// Lexer Class
// ============================================================================

export class Lexer {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      this.skipWhitespaceAndComments();
      if (this.isAtEnd()) break;

      tokens.push(this.nextToken());
    }

    tokens.push(this.makeToken("EOF", ""));
    return tokens;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    return this.source[this.pos] ?? "";
  }

  private peekNext(): string {
    return this.source[this.pos + 1] ?? "";
  }

  private advance(): string {
    const ch = this.source[this.pos];
    this.pos++;
    if (ch === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private makeToken(type: TokenType, value: string): Token {
    return { type, value, line: this.line, column: this.column - value.length };
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const ch = this.peek();

      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.advance();
      } else if (ch === "#") {
        while (!this.isAtEnd() && this.peek() !== "\n") {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private nextToken(): Token {
    const ch = this.peek();

    if (this.isDigit(ch)) {
      return this.readNumber();
    }

    if (ch === '"' || ch === "'") {
      return this.readString(false);
    }

    // r"..." and r'...'
    if (ch === "r" && (this.peekNext() === '"' || this.peekNext() === "'")) {
      this.advance();
      return this.readString(true);
    }

    if (this.isAlpha(ch)) {
      return this.readIdentifier();
    }

    return this.readOperator();
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isAlpha(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private readNumber(): Token {
    const startCol = this.column;
    let value = "";

    while (!this.isAtEnd() && this.isDigit(this.peek())) {
      value += this.advance();
    }

    if (this.peek() === "." && this.isDigit(this.peekNext())) {
      value += this.advance(); // consume '.'
      while (!this.isAtEnd() && this.isDigit(this.peek())) {
        value += this.advance();
      }
      return { type: "FLOAT", value, line: this.line, column: startCol };
    }

    return { type: "INT", value, line: this.line, column: startCol };
  }

  private readString(raw: boolean): Token {
    const startCol = raw ? this.column - 1 : this.column;
    const quote = this.advance();
    let value = "";

    while (!this.isAtEnd() && this.peek() !== quote) {
      if (this.peek() === "\\") {
        this.advance(); // consume backslash
        const escaped = this.advance() ?? "";
        if (raw) {
          value += "\\" + escaped;
          continue;
        }
        switch (escaped) {
          case "n": value += "\n"; break;
          case "t": value += "\t"; break;
          case "r": value += "\r"; break;
          case "\\": value += "\\"; break;
          case '"': value += '"'; break;
          case "'": value += "'"; break;
          default: value += "\\" + escaped;
        }
      } else {
        value += this.advance();
      }
    }

    if (this.isAtEnd()) {
      throw new LexerError(`Unterminated string at line ${this.line}, column ${startCol}`);
    }

    this.advance(); // consume closing quote

    return { type: "STRING", value, line: this.line, column: startCol };
  }

  private readIdentifier(): Token {
    const startCol = this.column;
    let value = "";

    while (!this.isAtEnd() && this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    const type = KEYWORDS[value] ?? "IDENT";
    return { type, value, line: this.line, column: startCol };
  }

  private readOperator(): Token {
    const ch = this.advance();
    const startCol = this.column - 1;

    switch (ch) {
      case "(": return { type: "LPAREN", value: "(", line: this.line, column: startCol };
      case ")": return { type: "RPAREN", value: ")", line: this.line, column: startCol };
      case "[": return { type: "LBRACKET", value: "[", line: this.line, column: startCol };
      case "]": return { type: "RBRACKET", value: "]", line: this.line, column: startCol };
      case ",": return { type: "COMMA", value: ",", line: this.line, column: startCol };
      case ".": return { type: "DOT", value: ".", line: this.line, column: startCol };

      case "=":
        if (this.peek() === "=") {
          this.advance();
          return { type: "EQ", value: "==", line: this.line, column: startCol };
        }
        throw new LexerError(`Unexpected character '=' at line ${this.line}, column ${startCol}. Did you mean '=='?`);

      case "!":
        if (this.peek() === "=") {
          this.advance();
          return { type: "NEQ", value: "!=", line: this.line, column: startCol };
        }
        throw new LexerError(`Unexpected character '!' at line ${this.line}, column ${startCol}. Did you mean 'not'?`);

      case "<":
        if (this.peek() === "=") {
          this.advance();
          return { type: "LTE", value: "<=", line: this.line, column: startCol };
        }
        return { type: "LT", value: "<", line: this.line, column: startCol };

      case ">":
        if (this.peek() === "=") {
          this.advance();
          return { type: "GTE", value: ">=", line: this.line, column: startCol };
        }
        return { type: "GT", value: ">", line: this.line, column: startCol };

      default:
        throw new LexerError(`Unexpected character '${ch}' at line ${this.line}, column ${startCol}`);
    }
  }
}

// ============================================================================
// Errors
// ============================================================================

export class LexerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LexerError";
  }
}

// ============================================================================
// Convenience Function
// ============================================================================

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
