/**
 * Tests for putting together the constraints of a class, with and without
 * its ancestors.
 */
import { describe, it, expect } from "vitest";

import {
  resolveModel,
  mustFindClass,
  inferConstraintsByClass,
  mergeConstraintsWithAncestors,
  ConstraintsByProperty,
  LenConstraint,
  SymbolTable,
} from "../src/index";

const verifications = [
  { name: "is_something", pattern: "^something$" },
  { name: "is_acme", pattern: "^acme$" },
];

const constants = [
  { kind: "set_of_primitives", name: "Letters", type: "str", literals: ["x", "y", "z"] },
  { kind: "set_of_primitives", name: "MoreLetters", type: "str", literals: ["y", "z", "w"] },
  { kind: "set_of_primitives", name: "OnlyW", type: "str", literals: ["w"] },
];

function modelWith(doc: Record<string, unknown>): SymbolTable {
  return resolveModel({ verifications, constants, ...doc });
}

function inferred(symbolTable: SymbolTable): Map<string, ConstraintsByProperty> {
  const result = inferConstraintsByClass(symbolTable);
  if (!result.success) {
    throw new Error(result.errors.map((e) => e.message).join("\n"));
  }
  return new Map([...result.value].map(([cls, constraints]): [string, ConstraintsByProperty] => [cls.name, constraints]));
}

function merged(symbolTable: SymbolTable): Map<string, ConstraintsByProperty> {
  const own = inferConstraintsByClass(symbolTable);
  if (!own.success) {
    throw new Error(own.errors.map((e) => e.message).join("\n"));
  }
  const result = mergeConstraintsWithAncestors(symbolTable, own.value);
  if (!result.success) {
    throw new Error(result.errors.map((e) => e.message).join("\n"));
  }
  return new Map([...result.value].map(([cls, constraints]): [string, ConstraintsByProperty] => [cls.name, constraints]));
}

function lenOf(constraints: ConstraintsByProperty | undefined, propName: string): LenConstraint | undefined {
  for (const [prop, constraint] of constraints?.lenConstraintsByProperty ?? []) {
    if (prop.name === propName) return constraint;
  }
  return undefined;
}

function patternsOf(constraints: ConstraintsByProperty | undefined, propName: string): string[] {
  for (const [prop, patterns] of constraints?.patternsByProperty ?? []) {
    if (prop.name === propName) return patterns.map((p) => p.pattern);
  }
  return [];
}

function setOf(constraints: ConstraintsByProperty | undefined, propName: string): unknown[] | undefined {
  for (const [prop, constraint] of constraints?.setOfPrimitivesByProperty ?? []) {
    if (prop.name === propName) return constraint.literals.map((l) => l.value);
  }
  return undefined;
}

const identifier = {
  name: "Identifier",
  constrainee: "str",
  invariants: ["len(self) <= 10", "is_something(self)"],
};

describe("Constraints by class", () => {
  it("folds in the constrained primitive of a property", () => {
    const symbolTable = modelWith({
      constrained_primitives: [identifier],
      classes: [
        {
          name: "Something",
          properties: [{ name: "x", type: "Identifier" }],
          invariants: ["len(self.x) >= 2", "is_acme(self.x)"],
        },
      ],
    });
    const constraints = inferred(symbolTable).get("Something");
    expect(lenOf(constraints, "x")).toEqual(new LenConstraint(2, 10));
    expect(patternsOf(constraints, "x")).toEqual(["^something$", "^acme$"]);
  });

  it("folds in optional constrained primitives", () => {
    const symbolTable = modelWith({
      constrained_primitives: [identifier],
      classes: [{ name: "Something", properties: [{ name: "x", type: "Optional[Identifier]" }] }],
    });
    const constraints = inferred(symbolTable).get("Something");
    expect(lenOf(constraints, "x")).toEqual(new LenConstraint(null, 10));
    expect(patternsOf(constraints, "x")).toEqual(["^something$"]);
  });

  it("folds in the constrained primitive only where the property is declared", () => {
    const symbolTable = modelWith({
      constrained_primitives: [identifier],
      classes: [
        { name: "Parent", properties: [{ name: "x", type: "Identifier" }] },
        { name: "Child", inheritances: ["Parent"] },
      ],
    });
    const byClass = inferred(symbolTable);
    expect(lenOf(byClass.get("Parent"), "x")).toEqual(new LenConstraint(null, 10));
    expect(lenOf(byClass.get("Child"), "x")).toBeUndefined();
    expect(patternsOf(byClass.get("Child"), "x")).toEqual([]);
  });

  it("stacks the ancestors of the constrained primitive", () => {
    const symbolTable = modelWith({
      constrained_primitives: [
        { name: "Base", constrainee: "str", invariants: ["len(self) >= 1", "is_acme(self)"] },
        { name: "Derived", constrainee: "str", inheritances: ["Base"], invariants: ["len(self) <= 64"] },
      ],
      classes: [{ name: "Something", properties: [{ name: "x", type: "Derived" }] }],
    });
    const constraints = inferred(symbolTable).get("Something");
    expect(lenOf(constraints, "x")).toEqual(new LenConstraint(1, 64));
    expect(patternsOf(constraints, "x")).toEqual(["^acme$"]);
  });

  it("reports a property contradicting its type", () => {
    const symbolTable = modelWith({
      constrained_primitives: [{ name: "Short", constrainee: "str", invariants: ["len(self) <= 3"] }],
      classes: [{ name: "Something", properties: [{ name: "x", type: "Short" }], invariants: ["len(self.x) >= 5"] }],
    });
    const result = inferConstraintsByClass(symbolTable);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((e) => [e.symbol, e.message])).toEqual([
        [
          "Something",
          "The inferred minimum and maximum value on len(.) of the property x is contradictory: " +
            "LenConstraint(min_value=None, max_value=3) versus LenConstraint(min_value=5, max_value=None); " +
            "please check the invariants and any involved constrained primitives",
        ],
      ]);
    }
  });

  it("collects the errors of all classes", () => {
    const symbolTable = modelWith({
      classes: [
        { name: "First", properties: [{ name: "x", type: "str" }], invariants: ["len(self.y) > 1"] },
        { name: "Second", properties: [{ name: "x", type: "str" }], invariants: ["self.z in Letters"] },
      ],
    });
    const result = inferConstraintsByClass(symbolTable);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((e) => e.symbol)).toEqual(["First", "Second"]);
    }
  });

  it("keeps what it understands next to what it does not", () => {
    const symbolTable = modelWith({
      classes: [
        {
          name: "Something",
          properties: [{ name: "x", type: "str" }],
          invariants: ["some_unknown(self.x)", "len(self.x) != 3", "len(self.x) <= 5", "is_acme(self.x)"],
        },
      ],
    });
    const result = inferConstraintsByClass(symbolTable);
    expect(result.success).toBe(true);
    if (result.success) {
      const constraints = result.value.get(mustFindClass(symbolTable, "Something"));
      expect(lenOf(constraints, "x")).toEqual(new LenConstraint(null, 5));
      expect(patternsOf(constraints, "x")).toEqual(["^acme$"]);
      expect(constraints?.setOfPrimitivesByProperty.size).toBe(0);
    }
  });

  it("gives every class an entry", () => {
    const symbolTable = modelWith({ classes: [{ name: "Empty" }] });
    const constraints = inferred(symbolTable).get("Empty");
    expect(constraints?.lenConstraintsByProperty.size).toBe(0);
    expect(constraints?.patternsByProperty.size).toBe(0);
    expect(constraints?.setOfPrimitivesByProperty.size).toBe(0);
    expect(constraints?.setOfEnumerationLiteralsByProperty.size).toBe(0);
  });
});

function parentAndChild(parentInvariants: string[], childInvariants: string[]): SymbolTable {
  return modelWith({
    classes: [
      { name: "Child", inheritances: ["Parent"], invariants: childInvariants },
      { name: "Parent", properties: [{ name: "x", type: "str" }], invariants: parentInvariants },
    ],
  });
}

describe("Merging with ancestors", () => {
  it("takes the larger minimum", () => {
    const byClass = merged(parentAndChild(["len(self.x) >= 6"], ["len(self.x) >= 4"]));
    expect(lenOf(byClass.get("Child"), "x")).toEqual(new LenConstraint(6, null));
    expect(lenOf(byClass.get("Parent"), "x")).toEqual(new LenConstraint(6, null));
  });

  it("takes the smaller maximum", () => {
    const byClass = merged(parentAndChild(["len(self.x) <= 5"], ["len(self.x) <= 8"]));
    expect(lenOf(byClass.get("Child"), "x")).toEqual(new LenConstraint(null, 5));
  });

  it("inherits constraints the class does not have itself", () => {
    const byClass = merged(parentAndChild(["len(self.x) <= 5", "is_acme(self.x)", "self.x in Letters"], []));
    const child = byClass.get("Child");
    expect(lenOf(child, "x")).toEqual(new LenConstraint(null, 5));
    expect(patternsOf(child, "x")).toEqual(["^acme$"]);
    expect(setOf(child, "x")).toEqual(["x", "y", "z"]);
  });

  it("passes through a grandparent", () => {
    const symbolTable = modelWith({
      classes: [
        { name: "Grandchild", inheritances: ["Child"] },
        { name: "Child", inheritances: ["Parent"], invariants: ["len(self.x) >= 1"] },
        { name: "Parent", properties: [{ name: "x", type: "str" }], invariants: ["len(self.x) <= 5"] },
      ],
    });
    expect(lenOf(merged(symbolTable).get("Grandchild"), "x")).toEqual(new LenConstraint(1, 5));
  });

  it("puts own patterns before the inherited ones", () => {
    const byClass = merged(parentAndChild(["is_something(self.x)"], ["is_acme(self.x)"]));
    expect(patternsOf(byClass.get("Child"), "x")).toEqual(["^acme$", "^something$"]);
  });

  it("keeps a pattern repeated by the ancestors", () => {
    const byClass = merged(parentAndChild(["is_acme(self.x)"], ["is_acme(self.x)"]));
    expect(patternsOf(byClass.get("Child"), "x")).toEqual(["^acme$", "^acme$"]);
  });

  it("intersects the sets", () => {
    const byClass = merged(parentAndChild(["self.x in Letters"], ["self.x in MoreLetters"]));
    expect(setOf(byClass.get("Child"), "x")).toEqual(["y", "z"]);
  });

  it("reports contradicting lengths", () => {
    const symbolTable = parentAndChild(["len(self.x) <= 3"], ["len(self.x) >= 5"]);
    const own = inferConstraintsByClass(symbolTable);
    if (!own.success) throw new Error("Expected the inference to succeed");

    const result = mergeConstraintsWithAncestors(symbolTable, own.value);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((e) => [e.symbol, e.message])).toEqual([
        [
          "Child",
          "We could not stack the length constraints on the property x as they are contradicting: " +
            "LenConstraint(min_value=5, max_value=None) versus LenConstraint(min_value=None, max_value=3). " +
            "Please check the invariants and the invariants of all the ancestors.",
        ],
      ]);
    }
  });

  it("reports an empty set", () => {
    const symbolTable = parentAndChild(["self.x in Letters"], ["self.x in OnlyW"]);
    const own = inferConstraintsByClass(symbolTable);
    if (!own.success) throw new Error("Expected the inference to succeed");

    const result = mergeConstraintsWithAncestors(symbolTable, own.value);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((e) => e.message)).toEqual([
        "The property x of the class Child is constrained to an empty set of primitive literals",
      ]);
    }
  });

  it("requires the constraints of every class", () => {
    const symbolTable = parentAndChild([], []);
    expect(() => mergeConstraintsWithAncestors(symbolTable, new Map())).toThrow(
      `Expected the constraints of the class ${mustFindClass(symbolTable, "Parent").name}`
    );
  });
});
