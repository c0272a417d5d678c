/**
 * Put together the constraints of a class: its invariants, the constrained
 * primitives its properties are typed with, and optionally its ancestors.
 */

import { Class, ConstrainedPrimitive, Property, SymbolTable, beneathOptional } from "../model";
import { inferLenConstraintsByConstrainedPrimitive, lenConstraintsFromInvariants, narrowLenConstraint } from "./len";
import { inferPatternsByConstrainedPrimitive, mapPatternVerificationsByName, patternsFromInvariants } from "./pattern";
import {
  inferSetConstraintsByPropertyFromInvariants,
  intersectSetOfEnumerationLiteralsConstraints,
  intersectSetOfPrimitivesConstraints,
} from "./set";
import {
  ConstraintsByProperty,
  InferenceError,
  InferResult,
  LenConstraint,
  PatternConstraint,
  SetOfEnumerationLiteralsConstraint,
  SetOfPrimitivesConstraint,
  fail,
  succeed,
} from "./types";

/**
 * The constrained primitive a property is typed with, but only in the class
 * that declares the property. Descendants get it through the merge, if at all.
 */
function constrainedPrimitiveOf(prop: Property, cls: Class): ConstrainedPrimitive | null {
  const typeAnno = beneathOptional(prop.typeAnnotation);
  if (typeAnno.tag === "ourType" && typeAnno.ourType.tag === "constrainedPrimitive" && prop.specifiedFor === cls) {
    return typeAnno.ourType;
  }
  return null;
}

/**
 * Infer the constraints of every class from its own invariants and from the
 * constrained primitives of its own properties.
 *
 * Classes are independent of each other: an error in one class does not stop
 * the others from being inferred, but any error fails the whole result.
 */
export function inferConstraintsByClass(symbolTable: SymbolTable): InferResult<Map<Class, ConstraintsByProperty>> {
  const patternVerificationsByName = mapPatternVerificationsByName(symbolTable.verificationFunctions);

  const lenByPrimitive = inferLenConstraintsByConstrainedPrimitive(symbolTable);
  if (!lenByPrimitive.success) {
    return lenByPrimitive;
  }

  const patternsByPrimitive = inferPatternsByConstrainedPrimitive(symbolTable, patternVerificationsByName);

  const errors: InferenceError[] = [];
  const result = new Map<Class, ConstraintsByProperty>();

  for (const cls of symbolTable.classes) {
    const lenFromInvariants = lenConstraintsFromInvariants(cls);
    if (!lenFromInvariants.success) {
      errors.push(...lenFromInvariants.errors);
      continue;
    }

    const patternsFromInvariantsByProperty = patternsFromInvariants(cls, patternVerificationsByName);

    const setConstraints = inferSetConstraintsByPropertyFromInvariants(cls, symbolTable);
    if (!setConstraints.success) {
      errors.push(...setConstraints.errors);
      continue;
    }

    const lenConstraintsByProperty = new Map<Property, LenConstraint>();
    const patternsByProperty = new Map<Property, PatternConstraint[]>();
    let failed = false;

    for (const prop of cls.properties) {
      const primitive = constrainedPrimitiveOf(prop, cls);

      // Both the type and the invariants need to hold, so take the tighter bounds.
      const fromType = primitive !== null ? lenByPrimitive.value.get(primitive) : undefined;
      const fromInvariants = lenFromInvariants.value.get(prop);

      const sources = [fromType, fromInvariants].filter((c): c is LenConstraint => c !== undefined);
      if (sources.length > 0) {
        const [first, ...rest] = sources;
        const merged = narrowLenConstraint(first, rest);
        if (merged === null) {
          errors.push(
            new InferenceError(
              `The inferred minimum and maximum value on len(.) of the property ${prop.name} ` +
                `is contradictory: ${sources.map((c) => c.toString()).join(" versus ")}; ` +
                `please check the invariants and any involved constrained primitives`,
              cls.name
            )
          );
          failed = true;
        } else if (merged.minValue !== null || merged.maxValue !== null) {
          lenConstraintsByProperty.set(prop, merged);
        }
      }

      const patterns = [
        ...(primitive !== null ? patternsByPrimitive.get(primitive) ?? [] : []),
        ...(patternsFromInvariantsByProperty.get(prop) ?? []),
      ];
      if (patterns.length > 0) {
        patternsByProperty.set(prop, patterns);
      }
    }

    if (failed) continue;

    result.set(
      cls,
      new ConstraintsByProperty(
        lenConstraintsByProperty,
        patternsByProperty,
        setConstraints.value.setOfPrimitivesByProperty,
        setConstraints.value.setOfEnumerationLiteralsByProperty
      )
    );
  }

  return errors.length > 0 ? fail(errors) : succeed(result);
}

/**
 * Stack the constraints of every class with those of all its ancestors.
 *
 * Schemas usually should not do this, since the schema engine inherits the
 * constraints itself and the origin of a constraint stays visible. Consumers
 * which need one self-contained set of constraints per class, such as test
 * data generators, should.
 *
 * Length constraints narrow to the tightest interval. Patterns are concatenated,
 * own ones first. Sets are intersected and must not become empty.
 */
export function mergeConstraintsWithAncestors(
  symbolTable: SymbolTable,
  constraintsByClass: ReadonlyMap<Class, ConstraintsByProperty>
): InferResult<Map<Class, ConstraintsByProperty>> {
  const errors: InferenceError[] = [];
  const merged = new Map<Class, ConstraintsByProperty>();

  for (const ourType of symbolTable.ourTypesTopologicallySorted) {
    if (ourType.tag !== "class") continue;

    const own = constraintsByClass.get(ourType);
    if (own === undefined) {
      throw new Error(`Expected the constraints of the class ${ourType.name}`);
    }

    // Ancestors come first in the topological order and are already merged.
    const parents = ourType.inheritances.map((parent) => {
      const parentConstraints = merged.get(parent);
      if (parentConstraints === undefined) {
        throw new Error(
          `Expected topological order, but ${ourType.name} is processed before its parent ${parent.name}`
        );
      }
      return parentConstraints;
    });
    const sources = [own, ...parents];

    const lenConstraintsByProperty = new Map<Property, LenConstraint>();
    const patternsByProperty = new Map<Property, PatternConstraint[]>();
    const setOfPrimitivesByProperty = new Map<Property, SetOfPrimitivesConstraint>();
    const setOfEnumerationLiteralsByProperty = new Map<Property, SetOfEnumerationLiteralsConstraint>();

    for (const prop of ourType.properties) {
      const lenConstraints = collect(sources, (s) => s.lenConstraintsByProperty.get(prop));
      if (lenConstraints.length > 0) {
        const [first, ...rest] = lenConstraints;
        const narrowed = narrowLenConstraint(first, rest);
        if (narrowed === null) {
          errors.push(
            new InferenceError(
              `We could not stack the length constraints on the property ${prop.name} ` +
                `as they are contradicting: ${lenConstraints.map((c) => c.toString()).join(" versus ")}. ` +
                `Please check the invariants and the invariants of all the ancestors.`,
              ourType.name
            )
          );
        } else {
          lenConstraintsByProperty.set(prop, narrowed);
        }
      }

      const patterns = collect(sources, (s) => s.patternsByProperty.get(prop)).flat();
      if (patterns.length > 0) {
        patternsByProperty.set(prop, patterns);
      }

      const setsOfPrimitives = collect(sources, (s) => s.setOfPrimitivesByProperty.get(prop));
      if (setsOfPrimitives.length > 0) {
        const intersection = intersectSetOfPrimitivesConstraints(setsOfPrimitives);
        if (intersection.literals.length === 0) {
          errors.push(
            new InferenceError(
              `The property ${prop.name} of the class ${ourType.name} ` +
                `is constrained to an empty set of primitive literals`,
              ourType.name
            )
          );
        }
        setOfPrimitivesByProperty.set(prop, intersection);
      }

      const setsOfLiterals = collect(sources, (s) => s.setOfEnumerationLiteralsByProperty.get(prop));
      if (setsOfLiterals.length > 0) {
        const intersection = intersectSetOfEnumerationLiteralsConstraints(setsOfLiterals);
        if (intersection.literals.length === 0) {
          errors.push(
            new InferenceError(
              `The property ${prop.name} of the class ${ourType.name} ` +
                `is constrained to an empty set of enumeration literals`,
              ourType.name
            )
          );
        }
        setOfEnumerationLiteralsByProperty.set(prop, intersection);
      }
    }

    merged.set(
      ourType,
      new ConstraintsByProperty(
        lenConstraintsByProperty,
        patternsByProperty,
        setOfPrimitivesByProperty,
        setOfEnumerationLiteralsByProperty
      )
    );
  }

  return errors.length > 0 ? fail(errors) : succeed(merged);
}

function collect<T>(
  sources: readonly ConstraintsByProperty[],
  pick: (source: ConstraintsByProperty) => T | undefined
): T[] {
  const result: T[] = [];
  for (const source of sources) {
    const picked = pick(source);
    if (picked !== undefined) {
      result.push(picked);
    }
  }
  return result;
}
