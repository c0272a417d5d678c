/**
 * Matchers for the invariant idioms the inference understands.
 *
 * Every matcher is total: it returns null (or an empty list) for any shape it
 * does not recognize and never throws.
 */

import { Comparator, Expr, IsInExpr } from "../expr";
import { PatternVerification } from "../model";
import { PatternConstraint } from "./types";

// ============================================================================
// Basic Shapes
// ============================================================================

export function isSelf(node: Expr): boolean {
  return node.tag === "name" && node.identifier === "self";
}

/**
 * Match `self.<property>` and return the property name.
 */
export function matchProperty(node: Expr): string | null {
  if (node.tag === "member" && isSelf(node.instance)) {
    return node.name;
  }
  return null;
}

export function matchIntConstant(node: Expr): number | null {
  if (node.tag === "constant" && node.kind === "int") {
    return node.value;
  }
  return null;
}

// ============================================================================
// Conditional on an Optional Property
// ============================================================================

export interface ConditionalOnProp {
  propName: string;
  consequent: Expr;
}

/**
 * Match `not (self.p is not None) or CONSEQUENT` and `self.p is None or CONSEQUENT`.
 */
export function matchConditionalOnProp(node: Expr): ConditionalOnProp | null {
  if (node.tag === "implication") {
    if (node.antecedent.tag !== "isNotNone") return null;

    const propName = matchProperty(node.antecedent.value);
    if (propName === null) return null;

    return { propName, consequent: node.consequent };
  }

  if (node.tag === "or") {
    if (node.values.length !== 2) return null;

    const [guard, consequent] = node.values;
    if (guard.tag !== "isNone") return null;

    const propName = matchProperty(guard.value);
    if (propName === null) return null;

    return { propName, consequent };
  }

  return null;
}

// ============================================================================
// Conjunctions
// ============================================================================

/**
 * Run the matcher on every conjunct of an `and`, or on the node itself otherwise.
 * Conjuncts that do not match are dropped.
 */
export function matchEachConjunct<T>(node: Expr, matcher: (conjunct: Expr) => T | null): T[] {
  const conjuncts = node.tag === "and" ? node.values : [node];

  const result: T[] = [];
  for (const conjunct of conjuncts) {
    const matched = matcher(conjunct);
    if (matched !== null) {
      result.push(matched);
    }
  }
  return result;
}

/**
 * Match property-level idioms in an invariant body, looking through an optional
 * guard and a conjunction. Under a guard on `self.p`, only matches on `p` count:
 * a constraint on another property would hold only conditionally.
 */
export function matchOnProperties<T extends { propName: string }>(
  body: Expr,
  matcher: (node: Expr) => T | null
): T[] {
  const conditional = matchConditionalOnProp(body);
  if (conditional === null) {
    return matchEachConjunct(body, matcher);
  }

  return matchEachConjunct(conditional.consequent, matcher).filter(
    (matched) => matched.propName === conditional.propName
  );
}

// ============================================================================
// Length
// ============================================================================

/**
 * A single bound on `len(.)` as read directly off one comparison.
 */
export type LenBound =
  | { kind: "min"; value: number; node: Expr }
  | { kind: "max"; value: number; node: Expr }
  | { kind: "exact"; value: number; node: Expr };

export type LenTarget =
  | { tag: "self" }
  | { tag: "property"; propName: string };

export interface LenComparison {
  target: LenTarget;
  bound: LenBound;
}

// `C op len(x)` is the same as `len(x) flipped(op) C`.
const FLIPPED: Record<Comparator, Comparator> = {
  "<": ">",
  "<=": ">=",
  "==": "==",
  "!=": "!=",
  ">": "<",
  ">=": "<=",
};

function matchLenCall(node: Expr): LenTarget | null {
  if (node.tag !== "functionCall" || node.name.identifier !== "len") return null;
  if (node.args.length !== 1) return null;

  const [arg] = node.args;
  if (isSelf(arg)) {
    return { tag: "self" };
  }

  const propName = matchProperty(arg);
  if (propName !== null) {
    return { tag: "property", propName };
  }

  return null;
}

function boundOf(op: Comparator, constant: number, node: Expr): LenBound | null {
  switch (op) {
    case "<":
      return { kind: "max", value: constant - 1, node };
    case "<=":
      return { kind: "max", value: constant, node };
    case "==":
      return { kind: "exact", value: constant, node };
    case ">":
      return { kind: "min", value: constant + 1, node };
    case ">=":
      return { kind: "min", value: constant, node };
    case "!=":
      // Not expressible as an interval.
      return null;
  }
}

/**
 * Match `len(X) op C` and `C op len(X)` where X is `self` or `self.<property>`
 * and C an integer constant.
 */
export function matchLenComparison(node: Expr): LenComparison | null {
  if (node.tag !== "comparison") return null;

  let target = matchLenCall(node.left);
  let constant = matchIntConstant(node.right);
  let op = node.op;

  if (target === null || constant === null) {
    target = matchLenCall(node.right);
    constant = matchIntConstant(node.left);
    op = FLIPPED[node.op];
  }

  if (target === null || constant === null) return null;

  const bound = boundOf(op, constant, node);
  if (bound === null) return null;

  return { target, bound };
}

export interface LenBoundOnProperty {
  propName: string;
  bound: LenBound;
}

export function matchLenBoundOnProperty(node: Expr): LenBoundOnProperty | null {
  const matched = matchLenComparison(node);
  if (matched === null || matched.target.tag !== "property") return null;
  return { propName: matched.target.propName, bound: matched.bound };
}

export function matchLenBoundOnSelf(node: Expr): LenBound | null {
  const matched = matchLenComparison(node);
  if (matched === null || matched.target.tag !== "self") return null;
  return matched.bound;
}

// ============================================================================
// Membership in a Named Container
// ============================================================================

export interface PropInNamedContainer {
  propName: string;
  containerName: string;
  node: IsInExpr;
}

/**
 * Match `self.<property> in NAME`. The name is resolved later.
 */
export function matchPropInNamedContainer(node: Expr): PropInNamedContainer | null {
  if (node.tag !== "isIn") return null;

  const propName = matchProperty(node.member);
  if (propName === null) return null;

  if (node.container.tag !== "name") return null;

  return { propName, containerName: node.container.identifier, node };
}

// ============================================================================
// Pattern Verification Calls
// ============================================================================

export interface PatternOnProperty {
  propName: string;
  constraint: PatternConstraint;
}

function matchPatternCall(
  node: Expr,
  patternVerificationsByName: ReadonlyMap<string, PatternVerification>
): { arg: Expr; constraint: PatternConstraint } | null {
  if (node.tag !== "functionCall" || node.args.length !== 1) return null;

  const verification = patternVerificationsByName.get(node.name.identifier);
  if (verification === undefined) return null;

  return { arg: node.args[0], constraint: new PatternConstraint(verification.pattern) };
}

/**
 * Match `is_something(self.<property>)` for a registered pattern verification.
 */
export function matchPatternOnProperty(
  node: Expr,
  patternVerificationsByName: ReadonlyMap<string, PatternVerification>
): PatternOnProperty | null {
  const matched = matchPatternCall(node, patternVerificationsByName);
  if (matched === null) return null;

  const propName = matchProperty(matched.arg);
  if (propName === null) return null;

  return { propName, constraint: matched.constraint };
}

/**
 * Match `is_something(self)` for a registered pattern verification.
 */
export function matchPatternOnSelf(
  node: Expr,
  patternVerificationsByName: ReadonlyMap<string, PatternVerification>
): PatternConstraint | null {
  const matched = matchPatternCall(node, patternVerificationsByName);
  if (matched === null || !isSelf(matched.arg)) return null;
  return matched.constraint;
}
