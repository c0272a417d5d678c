/**
 * Meta-model: the resolved, read-only symbol table the inference works on.
 *
 * Every reference between symbols is a direct object reference. Properties,
 * invariants and enumeration literals are compared by identity.
 */

import { Expr } from "./expr";

// ============================================================================
// Primitive Types
// ============================================================================

export type PrimitiveType = "bool" | "int" | "float" | "str" | "bytearray";

export const PRIMITIVE_TYPES: readonly PrimitiveType[] = ["bool", "int", "float", "str", "bytearray"];

export function isPrimitiveType(text: string): text is PrimitiveType {
  return (PRIMITIVE_TYPES as readonly string[]).includes(text);
}

/**
 * Primitives on which `len(.)` is meaningful.
 */
export const LENGTHABLE_PRIMITIVES: ReadonlySet<PrimitiveType> = new Set<PrimitiveType>(["str", "bytearray"]);

// ============================================================================
// Type Annotations
// ============================================================================

export type TypeAnnotation =
  | PrimitiveTypeAnnotation
  | OurTypeAnnotation
  | ListTypeAnnotation
  | OptionalTypeAnnotation;

export interface PrimitiveTypeAnnotation {
  tag: "primitive";
  aType: PrimitiveType;
}

export interface OurTypeAnnotation {
  tag: "ourType";
  ourType: OurType;
}

export interface ListTypeAnnotation {
  tag: "list";
  items: TypeAnnotation;
}

export interface OptionalTypeAnnotation {
  tag: "optional";
  value: TypeAnnotation;
}

export function typeAnnotationToString(anno: TypeAnnotation): string {
  switch (anno.tag) {
    case "primitive":
      return anno.aType;
    case "ourType":
      return anno.ourType.name;
    case "list":
      return `List[${typeAnnotationToString(anno.items)}]`;
    case "optional":
      return `Optional[${typeAnnotationToString(anno.value)}]`;
  }
}

/**
 * Strip all the `Optional[...]` wrappers.
 */
export function beneathOptional(anno: TypeAnnotation): TypeAnnotation {
  let result = anno;
  while (result.tag === "optional") {
    result = result.value;
  }
  return result;
}

/**
 * The primitive type behind an annotation, looking through constrained primitives.
 */
export function tryPrimitiveType(anno: TypeAnnotation): PrimitiveType | null {
  if (anno.tag === "primitive") {
    return anno.aType;
  }
  if (anno.tag === "ourType" && anno.ourType.tag === "constrainedPrimitive") {
    return anno.ourType.constrainee;
  }
  return null;
}

// ============================================================================
// Invariants and Properties
// ============================================================================

export interface Invariant {
  /** Source text the body was parsed from. */
  text: string;
  body: Expr;
  /** The symbol on which the invariant is textually declared. */
  specifiedFor: Class | ConstrainedPrimitive;
}

export interface Property {
  name: string;
  typeAnnotation: TypeAnnotation;
  /** The class which declares the property. */
  specifiedFor: Class;
}

// ============================================================================
// Our Types
// ============================================================================

export type OurType = Enumeration | ConstrainedPrimitive | Class;

export interface EnumerationLiteral {
  name: string;
  value: string;
  /** Stable handle, unique within a symbol table. */
  id: number;
  enumeration: Enumeration;
}

export interface Enumeration {
  tag: "enumeration";
  name: string;
  literals: EnumerationLiteral[];
  literalsByName: ReadonlyMap<string, EnumerationLiteral>;
}

export interface ConstrainedPrimitive {
  tag: "constrainedPrimitive";
  name: string;
  constrainee: PrimitiveType;
  /** Direct ancestors. */
  inheritances: ConstrainedPrimitive[];
  /** Inherited invariants first, then the own ones. */
  invariants: Invariant[];
}

export interface Class {
  tag: "class";
  name: string;
  isAbstract: boolean;
  /** Direct ancestors. */
  inheritances: Class[];
  /** Inherited properties first, then the own ones. */
  properties: Property[];
  propertiesByName: ReadonlyMap<string, Property>;
  /** Inherited invariants first, then the own ones. */
  invariants: Invariant[];
}

// ============================================================================
// Constants
// ============================================================================

export type Constant = ConstantPrimitive | ConstantSetOfPrimitives | ConstantSetOfEnumerationLiterals;

export type PrimitiveValue = boolean | number | string;

export interface ConstantPrimitive {
  tag: "constantPrimitive";
  name: string;
  aType: PrimitiveType;
  value: PrimitiveValue;
}

export interface PrimitiveSetLiteral {
  value: PrimitiveValue;
  aType: PrimitiveType;
}

export interface ConstantSetOfPrimitives {
  tag: "constantSetOfPrimitives";
  name: string;
  aType: PrimitiveType;
  literals: PrimitiveSetLiteral[];
}

export interface ConstantSetOfEnumerationLiterals {
  tag: "constantSetOfEnumerationLiterals";
  name: string;
  enumeration: Enumeration;
  literals: EnumerationLiteral[];
}

// ============================================================================
// Verification Functions
// ============================================================================

export type Verification = PatternVerification | ImplementationSpecificVerification;

/**
 * A verification function whose body is a single regex match on its argument.
 */
export interface PatternVerification {
  tag: "patternVerification";
  name: string;
  pattern: string;
}

export interface ImplementationSpecificVerification {
  tag: "implementationSpecificVerification";
  name: string;
}

// ============================================================================
// Symbol Table
// ============================================================================

export interface SymbolTable {
  /** All our types in declaration order. */
  ourTypes: OurType[];
  /** Every ancestor precedes all of its descendants. */
  ourTypesTopologicallySorted: OurType[];
  classes: Class[];
  constrainedPrimitives: ConstrainedPrimitive[];
  enumerations: Enumeration[];
  constants: Constant[];
  constantsByName: ReadonlyMap<string, Constant>;
  verificationFunctions: Verification[];
}

export function findOurType(symbolTable: SymbolTable, typeName: string): OurType | undefined {
  return symbolTable.ourTypes.find((ourType) => ourType.name === typeName);
}

/**
 * Like {@link findOurType}, but the symbol must exist and be a class.
 */
export function mustFindClass(symbolTable: SymbolTable, className: string): Class {
  const ourType = findOurType(symbolTable, className);
  if (ourType === undefined || ourType.tag !== "class") {
    throw new Error(`Expected a class ${className} in the symbol table`);
  }
  return ourType;
}

export function mustFindConstrainedPrimitive(symbolTable: SymbolTable, primitiveName: string): ConstrainedPrimitive {
  const ourType = findOurType(symbolTable, primitiveName);
  if (ourType === undefined || ourType.tag !== "constrainedPrimitive") {
    throw new Error(`Expected a constrained primitive ${primitiveName} in the symbol table`);
  }
  return ourType;
}
