/**
 * Infer the constraints on a property based on named constant sets.
 *
 * A property in several sets has to be in all of them, so the sets are intersected.
 */

import {
  Class,
  EnumerationLiteral,
  PrimitiveSetLiteral,
  PrimitiveValue,
  Property,
  SymbolTable,
  beneathOptional,
  tryPrimitiveType,
  typeAnnotationToString,
} from "../model";
import { matchOnProperties, matchPropInNamedContainer } from "./match";
import {
  InferenceError,
  InferResult,
  SetOfEnumerationLiteralsConstraint,
  SetOfPrimitivesConstraint,
  fail,
  succeed,
} from "./types";

export interface SetConstraintsByProperty {
  setOfPrimitivesByProperty: Map<Property, SetOfPrimitivesConstraint>;
  setOfEnumerationLiteralsByProperty: Map<Property, SetOfEnumerationLiteralsConstraint>;
}

// ============================================================================
// Intersection
// ============================================================================

/**
 * Keep the items of the first list which occur in every list, counted by key.
 * Linear in the total number of items.
 */
function intersectByKey<T, K>(lists: readonly (readonly T[])[], keyOf: (item: T) => K): T[] {
  const [first, ...rest] = lists;

  const countByKey = new Map<K, number>();
  for (const item of first) {
    countByKey.set(keyOf(item), 0);
  }

  for (const list of rest) {
    // A list repeating an item still counts once.
    const seen = new Set<K>();
    for (const item of list) {
      const key = keyOf(item);
      const count = countByKey.get(key);
      if (count !== undefined && !seen.has(key)) {
        countByKey.set(key, count + 1);
        seen.add(key);
      }
    }
  }

  return first.filter((item) => countByKey.get(keyOf(item)) === rest.length);
}

/**
 * Intersect the sets of primitives by the literal values.
 */
export function intersectSetOfPrimitivesConstraints(
  constraints: readonly SetOfPrimitivesConstraint[]
): SetOfPrimitivesConstraint {
  if (constraints.length === 0) {
    throw new Error("Expected at least one constraint to intersect");
  }

  const literals = intersectByKey<PrimitiveSetLiteral, PrimitiveValue>(
    constraints.map((constraint) => constraint.literals),
    (literal) => literal.value
  );
  return new SetOfPrimitivesConstraint(constraints[0].aType, literals);
}

/**
 * Intersect the sets of enumeration literals by literal identity. Two literals
 * of different enumerations never coincide, even if their values do.
 */
export function intersectSetOfEnumerationLiteralsConstraints(
  constraints: readonly SetOfEnumerationLiteralsConstraint[]
): SetOfEnumerationLiteralsConstraint {
  if (constraints.length === 0) {
    throw new Error("Expected at least one constraint to intersect");
  }

  const enumeration = constraints[0].enumeration;
  for (const constraint of constraints) {
    if (constraint.enumeration !== enumeration) {
      throw new Error(
        `Expected all the constraints to be on the enumeration ${enumeration.name}, ` +
          `got ${constraint.enumeration.name}`
      );
    }
  }

  const literals = intersectByKey<EnumerationLiteral, number>(
    constraints.map((constraint) => constraint.literals),
    (literal) => literal.id
  );
  return new SetOfEnumerationLiteralsConstraint(enumeration, literals);
}

// ============================================================================
// Inference
// ============================================================================

function appendTo<V>(map: Map<Property, V[]>, prop: Property, value: V): void {
  const values = map.get(prop);
  if (values === undefined) {
    map.set(prop, [value]);
  } else {
    values.push(value);
  }
}

/**
 * Match all the named constant sets that a property of the class needs to belong to.
 *
 * Only the class's own invariants count. Optional properties are constrained as
 * well. Names which are no constants, or only primitive constants, are ignored.
 */
export function inferSetConstraintsByPropertyFromInvariants(
  cls: Class,
  symbolTable: SymbolTable
): InferResult<SetConstraintsByProperty> {
  const errors: InferenceError[] = [];

  const setsOfPrimitives = new Map<Property, SetOfPrimitivesConstraint[]>();
  const setsOfEnumerationLiterals = new Map<Property, SetOfEnumerationLiteralsConstraint[]>();

  for (const invariant of cls.invariants) {
    if (invariant.specifiedFor !== cls) continue;

    for (const matched of matchOnProperties(invariant.body, matchPropInNamedContainer)) {
      const prop = cls.propertiesByName.get(matched.propName);
      if (prop === undefined) {
        errors.push(
          new InferenceError(
            `The property ${matched.propName} does not belong to the class ${cls.name}`,
            cls.name,
            matched.node
          )
        );
        continue;
      }

      const constant = symbolTable.constantsByName.get(matched.containerName);
      if (constant === undefined) continue;

      const typeAnno = beneathOptional(prop.typeAnnotation);

      switch (constant.tag) {
        case "constantPrimitive":
          break;

        case "constantSetOfPrimitives":
          if (tryPrimitiveType(typeAnno) !== constant.aType) {
            errors.push(
              new InferenceError(
                `The container ${constant.name} is a constant set of ${constant.aType}s ` +
                  `while the property ${prop.name} in class ${cls.name} ` +
                  `has type ${typeAnnotationToString(prop.typeAnnotation)}`,
                cls.name,
                matched.node
              )
            );
            break;
          }
          appendTo(setsOfPrimitives, prop, new SetOfPrimitivesConstraint(constant.aType, constant.literals));
          break;

        case "constantSetOfEnumerationLiterals":
          if (typeAnno.tag !== "ourType" || typeAnno.ourType !== constant.enumeration) {
            errors.push(
              new InferenceError(
                `The container ${constant.name} is a constant set of enumeration literals ` +
                  `of ${constant.enumeration.name} while the property ${prop.name} in class ${cls.name} ` +
                  `has type ${typeAnnotationToString(prop.typeAnnotation)}`,
                cls.name,
                matched.node
              )
            );
            break;
          }
          appendTo(
            setsOfEnumerationLiterals,
            prop,
            new SetOfEnumerationLiteralsConstraint(constant.enumeration, constant.literals)
          );
          break;
      }
    }
  }

  if (errors.length > 0) {
    return fail(errors);
  }

  const setOfPrimitivesByProperty = new Map<Property, SetOfPrimitivesConstraint>();
  for (const [prop, constraints] of setsOfPrimitives) {
    setOfPrimitivesByProperty.set(prop, intersectSetOfPrimitivesConstraints(constraints));
  }

  const setOfEnumerationLiteralsByProperty = new Map<Property, SetOfEnumerationLiteralsConstraint>();
  for (const [prop, constraints] of setsOfEnumerationLiterals) {
    setOfEnumerationLiteralsByProperty.set(prop, intersectSetOfEnumerationLiteralsConstraints(constraints));
  }

  return succeed({ setOfPrimitivesByProperty, setOfEnumerationLiteralsByProperty });
}
