/**
 * Constraint inference over meta-model invariants.
 */

// Invariant expressions
export {
  name,
  selfRef,
  int,
  float,
  str,
  bool,
  none,
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
  exprToString,
} from "./expr";
export type {
  Expr,
  NameExpr,
  ConstantExpr,
  MemberExpr,
  IndexExpr,
  FunctionCallExpr,
  MethodCallExpr,
  Comparator,
  ComparisonExpr,
  IsInExpr,
  IsNoneExpr,
  IsNotNoneExpr,
  NotExpr,
  AndExpr,
  OrExpr,
  ImplicationExpr,
} from "./expr";

// Lexer and parser
export { Lexer, LexerError, tokenize } from "./lexer";
export type { Token, TokenType } from "./lexer";
export { Parser, ParseError, parse } from "./parser";

// Meta-model
export {
  PRIMITIVE_TYPES,
  LENGTHABLE_PRIMITIVES,
  isPrimitiveType,
  typeAnnotationToString,
  beneathOptional,
  tryPrimitiveType,
  findOurType,
  mustFindClass,
  mustFindConstrainedPrimitive,
} from "./model";
export type {
  PrimitiveType,
  TypeAnnotation,
  PrimitiveTypeAnnotation,
  OurTypeAnnotation,
  ListTypeAnnotation,
  OptionalTypeAnnotation,
  Invariant,
  Property,
  OurType,
  EnumerationLiteral,
  Enumeration,
  ConstrainedPrimitive,
  Class,
  Constant,
  PrimitiveValue,
  ConstantPrimitive,
  PrimitiveSetLiteral,
  ConstantSetOfPrimitives,
  ConstantSetOfEnumerationLiterals,
  Verification,
  PatternVerification,
  ImplementationSpecificVerification,
  SymbolTable,
} from "./model";

// Loading
export {
  ModelError,
  ModelDocumentSchema,
  parseTypeAnnotation,
  matchPatternVerificationBody,
  resolveModel,
  parseModel,
  loadModel,
} from "./loader";
export type { ModelDocument } from "./loader";
export { sortTopologically } from "./hierarchy";
export type { TopologicalOrder } from "./hierarchy";

// Inference
export * from "./infer";

// Textual representation
export { Entity, indent, indentButFirstLine, quote } from "./stringify";
export type { Stringifiable } from "./stringify";

// CLI
export { runCli } from "./cli";
export type { CliIO } from "./cli";
