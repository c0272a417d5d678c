/**
 * Tests for the invariant matchers.
 */
import { describe, it, expect } from "vitest";

import {
  parse,
  prop,
  isNone,
  name,
  matchProperty,
  matchConditionalOnProp,
  matchOnProperties,
  matchLenComparison,
  matchLenBoundOnProperty,
  matchLenBoundOnSelf,
  matchPropInNamedContainer,
  matchPatternOnProperty,
  matchPatternOnSelf,
  PatternConstraint,
  PatternVerification,
} from "../src/index";

describe("Basic shapes", () => {
  it("matches self.<property> only", () => {
    expect(matchProperty(parse("self.x"))).toBe("x");
    expect(matchProperty(parse("other.x"))).toBeNull();
    expect(matchProperty(parse("self.x.y"))).toBeNull();
    expect(matchProperty(parse("self"))).toBeNull();
  });
});

describe("Length comparisons", () => {
  it("reads len(X) op C", () => {
    const node = parse("len(self.x) < 5");
    expect(matchLenComparison(node)).toEqual({
      target: { tag: "property", propName: "x" },
      bound: { kind: "max", value: 4, node },
    });
  });

  it("flips C op len(X)", () => {
    const node = parse("5 > len(self.x)");
    expect(matchLenComparison(node)).toEqual({
      target: { tag: "property", propName: "x" },
      bound: { kind: "max", value: 4, node },
    });

    const onSelf = parse("3 <= len(self)");
    expect(matchLenComparison(onSelf)).toEqual({
      target: { tag: "self" },
      bound: { kind: "min", value: 3, node: onSelf },
    });
  });

  it("reads every comparator", () => {
    expect(matchLenBoundOnSelf(parse("len(self) < 10"))?.value).toBe(9);
    expect(matchLenBoundOnSelf(parse("len(self) <= 10"))?.value).toBe(10);
    expect(matchLenBoundOnSelf(parse("len(self) == 10"))?.kind).toBe("exact");
    expect(matchLenBoundOnSelf(parse("len(self) > 10"))?.value).toBe(11);
    expect(matchLenBoundOnSelf(parse("len(self) >= 10"))?.value).toBe(10);
  });

  it("ignores inequality", () => {
    expect(matchLenComparison(parse("len(self.x) != 3"))).toBeNull();
  });

  it("ignores malformed len calls", () => {
    expect(matchLenComparison(parse("len(self.x, 1) > 2"))).toBeNull();
    expect(matchLenComparison(parse("len() > 2"))).toBeNull();
    expect(matchLenComparison(parse("len(other.x) > 2"))).toBeNull();
    expect(matchLenComparison(parse("len(self.x.y) > 2"))).toBeNull();
    expect(matchLenComparison(parse("size(self.x) > 2"))).toBeNull();
  });

  it("ignores non-integer constants", () => {
    expect(matchLenComparison(parse("len(self.x) > 2.0"))).toBeNull();
    expect(matchLenComparison(parse("len(self.x) > len(self.y)"))).toBeNull();
    expect(matchLenComparison(parse("len(self.x) > MAX"))).toBeNull();
  });

  it("separates properties from self", () => {
    expect(matchLenBoundOnProperty(parse("len(self) > 1"))).toBeNull();
    expect(matchLenBoundOnSelf(parse("len(self.x) > 1"))).toBeNull();
    expect(matchLenBoundOnProperty(parse("len(self.x) > 1"))?.propName).toBe("x");
  });
});

describe("Conditional on an optional property", () => {
  it("matches the implication form", () => {
    const consequent = parse("len(self.x) > 2");
    expect(matchConditionalOnProp(parse("not (self.x is not None) or len(self.x) > 2"))).toEqual({
      propName: "x",
      consequent,
    });
  });

  it("matches the is-None form", () => {
    expect(matchConditionalOnProp(parse("self.x is None or self.y is None"))).toEqual({
      propName: "x",
      consequent: isNone(prop("y")),
    });
  });

  it("rejects other guards", () => {
    expect(matchConditionalOnProp(parse("not (self.x is None) or len(self.x) > 2"))).toBeNull();
    expect(matchConditionalOnProp(parse("self.x is None or a or b"))).toBeNull();
    expect(matchConditionalOnProp(parse("a or b"))).toBeNull();
  });

  it("attributes only matches on the guarded property", () => {
    const body = parse("not (self.x is not None) or (len(self.x) > 2 and len(self.y) < 3)");
    const matched = matchOnProperties(body, matchLenBoundOnProperty);
    expect(matched.map((m) => [m.propName, m.bound.kind, m.bound.value])).toEqual([["x", "min", 3]]);
  });

  it("matches every conjunct without a guard", () => {
    const matched = matchOnProperties(parse("len(self.x) > 2 and len(self.y) < 3"), matchLenBoundOnProperty);
    expect(matched.map((m) => [m.propName, m.bound.kind, m.bound.value])).toEqual([
      ["x", "min", 3],
      ["y", "max", 2],
    ]);
  });
});

describe("Membership in a named container", () => {
  it("matches self.<property> in NAME", () => {
    const node = parse("self.x in Allowed");
    expect(matchPropInNamedContainer(node)).toEqual({ propName: "x", containerName: "Allowed", node });
  });

  it("ignores other containers and members", () => {
    expect(matchPropInNamedContainer(parse("self.x in self.y"))).toBeNull();
    expect(matchPropInNamedContainer(parse("other in Allowed"))).toBeNull();
    expect(matchPropInNamedContainer(parse("self.x not in Allowed"))).toBeNull();
  });
});

describe("Pattern verification calls", () => {
  const registry = new Map<string, PatternVerification>([
    ["is_id", { tag: "patternVerification", name: "is_id", pattern: "^[a-z]+$" }],
  ]);

  it("matches calls on a property", () => {
    expect(matchPatternOnProperty(parse("is_id(self.x)"), registry)).toEqual({
      propName: "x",
      constraint: new PatternConstraint("^[a-z]+$"),
    });
  });

  it("matches calls on self", () => {
    expect(matchPatternOnSelf(parse("is_id(self)"), registry)).toEqual(new PatternConstraint("^[a-z]+$"));
    expect(matchPatternOnSelf(parse("is_id(self.x)"), registry)).toBeNull();
  });

  it("ignores unknown functions and wrong arity", () => {
    expect(matchPatternOnProperty(parse("is_other(self.x)"), registry)).toBeNull();
    expect(matchPatternOnProperty(parse("is_id(self.x, 1)"), registry)).toBeNull();
    expect(matchPatternOnProperty(parse("is_id(x)"), registry)).toBeNull();
    expect(matchPatternOnProperty(name("is_id"), registry)).toBeNull();
  });
});
