/**
 * Tests for the invariant lexer and parser.
 */
import { describe, it, expect } from "vitest";

import {
  tokenize,
  parse,
  LexerError,
  ParseError,
  exprToString,
  name,
  selfRef,
  int,
  float,
  str,
  member,
  prop,
  index,
  call,
  methodCall,
  compare,
  isIn,
  isNone,
  isNotNone,
  not,
  and,
  or,
  implies,
} from "../src/index";

describe("Lexer Tests", () => {
  it("tokenizes a length comparison", () => {
    const tokens = tokenize("len(self.x) >= 3");
    expect(tokens.map((t) => t.type)).toEqual([
      "IDENT",
      "LPAREN",
      "IDENT",
      "DOT",
      "IDENT",
      "RPAREN",
      "GTE",
      "INT",
      "EOF",
    ]);
    expect(tokens[7].value).toBe("3");
  });

  it("tokenizes keywords", () => {
    const tokens = tokenize("and or not in is True False None");
    expect(tokens.map((t) => t.type)).toEqual(["AND", "OR", "NOT", "IN", "IS", "TRUE", "FALSE", "NONE", "EOF"]);
  });

  it("tokenizes ints and floats apart", () => {
    const tokens = tokenize("42 2.5");
    expect(tokens[0].type).toBe("INT");
    expect(tokens[1].type).toBe("FLOAT");
    expect(tokens[1].value).toBe("2.5");
  });

  it("tokenizes single, double and raw strings", () => {
    const tokens = tokenize(`'a' "b" r"\\d+" "x\\ny"`);
    expect(tokens.slice(0, 4).map((t) => t.value)).toEqual(["a", "b", "\\d+", "x\ny"]);
  });

  it("tracks line and column", () => {
    const tokens = tokenize("a\n  b");
    expect(tokens[1].line).toBe(2);
    expect(tokens[1].column).toBe(3);
  });

  it("skips comments", () => {
    const tokens = tokenize("x # the rest is ignored");
    expect(tokens.map((t) => t.type)).toEqual(["IDENT", "EOF"]);
  });

  it("rejects a single equals sign", () => {
    expect(() => tokenize("x = 1")).toThrow(LexerError);
    expect(() => tokenize("x = 1")).toThrow("Unexpected character '=' at line 1, column 3. Did you mean '=='?");
  });

  it("rejects unterminated strings", () => {
    expect(() => tokenize('"abc')).toThrow("Unterminated string at line 1, column 1");
  });
});

describe("Parser Tests", () => {
  it("parses a length comparison", () => {
    expect(parse("len(self.x) >= 3")).toEqual(compare(call("len", prop("x")), ">=", int(3)));
  });

  it("parses every comparator", () => {
    for (const op of ["<", "<=", "==", "!=", ">", ">="] as const) {
      expect(parse(`a ${op} 1`)).toEqual(compare(name("a"), op, int(1)));
    }
  });

  it("flattens conjunctions into one node", () => {
    expect(parse("a and b and c")).toEqual(and(name("a"), name("b"), name("c")));
  });

  it("folds a negated first disjunct into an implication", () => {
    expect(parse("not (self.x is not None) or len(self.x) > 2")).toEqual(
      implies(isNotNone(prop("x")), compare(call("len", prop("x")), ">", int(2)))
    );
  });

  it("keeps longer disjunctions as they are", () => {
    expect(parse("not a or b or c")).toEqual(or(not(name("a")), name("b"), name("c")));
  });

  it("parses the is-None guard as a disjunction", () => {
    expect(parse("self.x is None or f(self.x)")).toEqual(or(isNone(prop("x")), call("f", prop("x"))));
  });

  it("parses membership and negated membership", () => {
    expect(parse("self.x in S")).toEqual(isIn(prop("x"), name("S")));
    expect(parse("self.x not in S")).toEqual(not(isIn(prop("x"), name("S"))));
  });

  it("parses members, indices and method calls", () => {
    expect(parse("self.x.y[0]")).toEqual(index(member(prop("x"), "y"), int(0)));
    expect(parse('self.x.startswith("a")')).toEqual(methodCall(member(prop("x"), "startswith"), str("a")));
  });

  it("parses float and string constants", () => {
    expect(parse("1.5")).toEqual(float(1.5));
    expect(parse("r'^[a-z]+$'")).toEqual(str("^[a-z]+$"));
  });

  it("gives parentheses precedence", () => {
    expect(parse("(a or b) and c")).toEqual(and(or(name("a"), name("b")), name("c")));
  });

  it("reports a missing closing parenthesis", () => {
    expect(() => parse("len(self.x")).toThrow(ParseError);
    expect(() => parse("len(self.x")).toThrow("Expected ')' after arguments at line 1, column 11. Got end of input");
  });

  it("reports a missing None after is", () => {
    expect(() => parse("x is 3")).toThrow("Expected 'None' after 'is' at line 1, column 6. Got '3'");
  });

  it("rejects integers beyond the exact range", () => {
    expect(parse("len(self.x) < 9007199254740991")).toEqual(
      compare(call("len", prop("x")), "<", int(9007199254740991))
    );
    expect(() => parse("len(self.x) < 9007199254740993")).toThrow(
      "The integer 9007199254740993 at line 1, column 15 is too large to be represented exactly"
    );
  });

  it("rejects calls on constants", () => {
    expect(() => parse('"a"(1)')).toThrow(ParseError);
  });

  it("rejects trailing tokens", () => {
    expect(() => parse("a b")).toThrow("Unexpected token 'b' at line 1, column 3");
  });
});

describe("exprToString", () => {
  it("renders implications with the guard in parentheses", () => {
    const source = "not (self.x is not None) or len(self.x) >= 2";
    expect(exprToString(parse(source))).toBe(source);
  });

  it("adds parentheses where precedence requires them", () => {
    expect(exprToString(and(or(name("a"), name("b")), name("c")))).toBe("(a or b) and c");
  });

  it("renders constants", () => {
    expect(exprToString(compare(call("len", selfRef), "==", int(3)))).toBe("len(self) == 3");
    expect(exprToString(float(2))).toBe("2.0");
    expect(exprToString(str('a"b'))).toBe('"a\\"b"');
  });
});
