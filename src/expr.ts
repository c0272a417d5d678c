/**
 * Expression tree for invariant bodies.
 * Immutable once built; the inference only ever reads it.
 */

// ============================================================================
// Expression Types
// ============================================================================

export type Expr =
  | NameExpr
  | ConstantExpr
  | MemberExpr
  | IndexExpr
  | FunctionCallExpr
  | MethodCallExpr
  | ComparisonExpr
  | IsInExpr
  | IsNoneExpr
  | IsNotNoneExpr
  | NotExpr
  | AndExpr
  | OrExpr
  | ImplicationExpr;

export interface NameExpr {
  tag: "name";
  identifier: string;
}

/**
 * Literal constant. Integers and floats are kept apart since only
 * integer constants bound a length.
 */
export type ConstantExpr =
  | { tag: "constant"; kind: "int"; value: number }
  | { tag: "constant"; kind: "float"; value: number }
  | { tag: "constant"; kind: "str"; value: string }
  | { tag: "constant"; kind: "bool"; value: boolean }
  | { tag: "constant"; kind: "none"; value: null };

export interface MemberExpr {
  tag: "member";
  instance: Expr;
  name: string;
}

export interface IndexExpr {
  tag: "index";
  collection: Expr;
  index: Expr;
}

export interface FunctionCallExpr {
  tag: "functionCall";
  name: NameExpr;
  args: Expr[];
}

export interface MethodCallExpr {
  tag: "methodCall";
  member: MemberExpr;
  args: Expr[];
}

export type Comparator = "<" | "<=" | "==" | "!=" | ">" | ">=";

export interface ComparisonExpr {
  tag: "comparison";
  op: Comparator;
  left: Expr;
  right: Expr;
}

export interface IsInExpr {
  tag: "isIn";
  member: Expr;
  container: Expr;
}

export interface IsNoneExpr {
  tag: "isNone";
  value: Expr;
}

export interface IsNotNoneExpr {
  tag: "isNotNone";
  value: Expr;
}

export interface NotExpr {
  tag: "not";
  operand: Expr;
}

export interface AndExpr {
  tag: "and";
  values: Expr[];
}

export interface OrExpr {
  tag: "or";
  values: Expr[];
}

/**
 * `not A or B`, kept as its own node so that guards read naturally.
 */
export interface ImplicationExpr {
  tag: "implication";
  antecedent: Expr;
  consequent: Expr;
}

// ============================================================================
// Constructors
// ============================================================================

export const name = (identifier: string): NameExpr => ({ tag: "name", identifier });
export const selfRef: NameExpr = name("self");

export const int = (value: number): ConstantExpr => ({ tag: "constant", kind: "int", value });
export const float = (value: number): ConstantExpr => ({ tag: "constant", kind: "float", value });
export const str = (value: string): ConstantExpr => ({ tag: "constant", kind: "str", value });
export const bool = (value: boolean): ConstantExpr => ({ tag: "constant", kind: "bool", value });
export const none: ConstantExpr = { tag: "constant", kind: "none", value: null };

export const member = (instance: Expr, memberName: string): MemberExpr =>
  ({ tag: "member", instance, name: memberName });

/**
 * Shorthand for `self.<prop>`.
 */
export const prop = (propName: string): MemberExpr => member(selfRef, propName);

export const index = (collection: Expr, idx: Expr): IndexExpr =>
  ({ tag: "index", collection, index: idx });

export const call = (funcName: string, ...args: Expr[]): FunctionCallExpr =>
  ({ tag: "functionCall", name: name(funcName), args });

export const methodCall = (target: MemberExpr, ...args: Expr[]): MethodCallExpr =>
  ({ tag: "methodCall", member: target, args });

export const compare = (left: Expr, op: Comparator, right: Expr): ComparisonExpr =>
  ({ tag: "comparison", op, left, right });

export const isIn = (value: Expr, container: Expr): IsInExpr =>
  ({ tag: "isIn", member: value, container });

export const isNone = (value: Expr): IsNoneExpr => ({ tag: "isNone", value });
export const isNotNone = (value: Expr): IsNotNoneExpr => ({ tag: "isNotNone", value });

export const not = (operand: Expr): NotExpr => ({ tag: "not", operand });

export const and = (...values: Expr[]): AndExpr => ({ tag: "and", values });
export const or = (...values: Expr[]): OrExpr => ({ tag: "or", values });

export const implies = (antecedent: Expr, consequent: Expr): ImplicationExpr =>
  ({ tag: "implication", antecedent, consequent });

// ============================================================================
// Pretty Printing
// ============================================================================

// Binding strength, loosest first. Used to decide where parentheses go.
const PRECEDENCE: Record<Expr["tag"], number> = {
  implication: 1,
  or: 1,
  and: 2,
  not: 3,
  comparison: 4,
  isIn: 4,
  isNone: 4,
  isNotNone: 4,
  functionCall: 5,
  methodCall: 5,
  member: 5,
  index: 5,
  name: 6,
  constant: 6,
};

function wrap(expr: Expr, minPrecedence: number): string {
  const text = exprToString(expr);
  return PRECEDENCE[expr.tag] < minPrecedence ? `(${text})` : text;
}

function constantToString(expr: ConstantExpr): string {
  switch (expr.kind) {
    case "int":
      return String(expr.value);
    case "float":
      return Number.isInteger(expr.value) ? `${expr.value}.0` : String(expr.value);
    case "str":
      return JSON.stringify(expr.value);
    case "bool":
      return expr.value ? "True" : "False";
    case "none":
      return "None";
  }
}

/**
 * Render an expression back to invariant source text.
 */
export function exprToString(expr: Expr): string {
  switch (expr.tag) {
    case "name":
      return expr.identifier;
    case "constant":
      return constantToString(expr);
    case "member":
      return `${wrap(expr.instance, 5)}.${expr.name}`;
    case "index":
      return `${wrap(expr.collection, 5)}[${exprToString(expr.index)}]`;
    case "functionCall":
      return `${expr.name.identifier}(${expr.args.map(exprToString).join(", ")})`;
    case "methodCall":
      return `${exprToString(expr.member)}(${expr.args.map(exprToString).join(", ")})`;
    case "comparison":
      return `${wrap(expr.left, 5)} ${expr.op} ${wrap(expr.right, 5)}`;
    case "isIn":
      return `${wrap(expr.member, 5)} in ${wrap(expr.container, 5)}`;
    case "isNone":
      return `${wrap(expr.value, 5)} is None`;
    case "isNotNone":
      return `${wrap(expr.value, 5)} is not None`;
    case "not":
      return `not ${wrap(expr.operand, 3)}`;
    case "and":
      return expr.values.map((v) => wrap(v, 3)).join(" and ");
    case "or":
      return expr.values.map((v) => wrap(v, 2)).join(" or ");
    case "implication":
      return `not (${exprToString(expr.antecedent)}) or ${wrap(expr.consequent, 2)}`;
  }
}
