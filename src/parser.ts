/**
 * Parser - Recursive descent parser for invariant bodies.
 *
 * Grammar (in rough precedence order, lowest to highest):
 *
 * expr        = orExpr
 * orExpr      = andExpr ("or" andExpr)*
 * andExpr     = notExpr ("and" notExpr)*
 * notExpr     = "not" notExpr | comparison
 * comparison  = postfix (CMP postfix | "in" postfix | "not" "in" postfix
 *                       | "is" "None" | "is" "not" "None")?
 * postfix     = primary (call | fieldAccess | indexAccess)*
 * call        = "(" args? ")"
 * fieldAccess = "." IDENT
 * indexAccess = "[" expr "]"
 * primary     = INT | FLOAT | STRING | "True" | "False" | "None"
 *             | IDENT | "(" expr ")"
 *
 * `not A or B` with exactly two disjuncts becomes an implication.
 */

import { Token, TokenType, tokenize } from "./lexer";
import {
  Expr,
  Comparator,
  name,
  int,
  float,
  str,
  bool,
  none,
  member,
  index,
  methodCall,
  compare,
  isIn,
  isNone,
  isNotNone,
  not,
  and,
  or,
  implies,
} from "./expr";

const COMPARATORS: Partial<Record<TokenType, Comparator>> = {
  LT: "<",
  LTE: "<=",
  EQ: "==",
  NEQ: "!=",
  GT: ">",
  GTE: ">=",
};

// ============================================================================
// Parser Class
// ============================================================================

export class Parser {
  private tokens: Token[];
  private pos: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): Expr {
    const expr = this.parseExpr();

    if (!this.isAtEnd()) {
      const tok = this.peek();
      throw new ParseError(`Unexpected token '${tok.value}' at line ${tok.line}, column ${tok.column}`);
    }

    return expr;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private isAtEnd(): boolean {
    return this.peek().type === "EOF";
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private peekAt(offset: number): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private previous(): Token {
    return this.tokens[this.pos - 1];
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return this.previous();
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
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

  private expect(type: TokenType, message: string): Token {
    if (this.check(type)) {
      return this.advance();
    }
    const tok = this.peek();
    const got = tok.type === "EOF" ? "end of input" : `'${tok.value}'`;
    throw new ParseError(`${message} at line ${tok.line}, column ${tok.column}. Got ${got}`);
  }

  // ==========================================================================
  // Expression Parsing
  // ==========================================================================

  private parseExpr(): Expr {
    return this.parseOrExpr();
  }

  private parseOrExpr(): Expr {
    const values: Expr[] = [this.parseAndExpr()];
    while (this.match("OR")) {
      values.push(this.parseAndExpr());
    }

    if (values.length === 1) {
      return values[0];
    }

    const [first, second] = values;
    if (values.length === 2 && first.tag === "not") {
      return implies(first.operand, second);
    }

    return or(...values);
  }

  private parseAndExpr(): Expr {
    const values: Expr[] = [this.parseNotExpr()];
    while (this.match("AND")) {
      values.push(this.parseNotExpr());
    }
    return values.length === 1 ? values[0] : and(...values);
  }

  private parseNotExpr(): Expr {
    if (this.match("NOT")) {
      return not(this.parseNotExpr());
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const left = this.parsePostfix();

    const comparator = COMPARATORS[this.peek().type];
    if (comparator !== undefined) {
      this.advance();
      return compare(left, comparator, this.parsePostfix());
    }

    if (this.match("IN")) {
      return isIn(left, this.parsePostfix());
    }

    if (this.check("NOT") && this.peekAt(1).type === "IN") {
      this.advance();
      this.advance();
      return not(isIn(left, this.parsePostfix()));
    }

    if (this.match("IS")) {
      if (this.match("NOT")) {
        this.expect("NONE", "Expected 'None' after 'is not'");
        return isNotNone(left);
      }
      this.expect("NONE", "Expected 'None' after 'is'");
      return isNone(left);
    }

    return left;
  }

  private parsePostfix(): Expr {
    let expr = this.parsePrimary();

    for (;;) {
      if (this.match("LPAREN")) {
        const args = this.parseArgs();
        if (expr.tag === "name") {
          expr = { tag: "functionCall", name: expr, args };
        } else if (expr.tag === "member") {
          expr = methodCall(expr, ...args);
        } else {
          const tok = this.previous();
          throw new ParseError(
            `Only names and members can be called at line ${tok.line}, column ${tok.column}`
          );
        }
      } else if (this.match("DOT")) {
        const field = this.expect("IDENT", "Expected member name after '.'").value;
        expr = member(expr, field);
      } else if (this.match("LBRACKET")) {
        const idx = this.parseExpr();
        this.expect("RBRACKET", "Expected ']' after index");
        expr = index(expr, idx);
      } else {
        return expr;
      }
    }
  }

  private parseArgs(): Expr[] {
    const args: Expr[] = [];
    if (!this.check("RPAREN")) {
      do {
        args.push(this.parseExpr());
      } while (this.match("COMMA"));
    }
    this.expect("RPAREN", "Expected ')' after arguments");
    return args;
  }

  private parsePrimary(): Expr {
    const tok = this.peek();

    switch (tok.type) {
      case "INT": {
        const value = Number(tok.value);
        if (!Number.isSafeInteger(value)) {
          throw new ParseError(
            `The integer ${tok.value} at line ${tok.line}, column ${tok.column} is too large to be represented exactly`
          );
        }
        this.advance();
        return int(value);
      }
      case "FLOAT":
        this.advance();
        return float(parseFloat(tok.value));
      case "STRING":
        this.advance();
        return str(tok.value);
      case "TRUE":
        this.advance();
        return bool(true);
      case "FALSE":
        this.advance();
        return bool(false);
      case "NONE":
        this.advance();
        return none;
      case "IDENT":
        this.advance();
        return name(tok.value);
      case "LPAREN": {
        this.advance();
        const inner = this.parseExpr();
        this.expect("RPAREN", "Expected ')' after expression");
        return inner;
      }
      default: {
        const got = tok.type === "EOF" ? "end of input" : `'${tok.value}'`;
        throw new ParseError(`Expected an expression at line ${tok.line}, column ${tok.column}. Got ${got}`);
      }
    }
  }
}

// ============================================================================
// Errors
// ============================================================================

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Parse an invariant body into an expression.
 */
export function parse(source: string): Expr {
  return new Parser(tokenize(source)).parse();
}
