/**
 * Represent inferred constraints as text, for debugging and golden tests.
 */

import { Property } from "../model";
import { Entity, Stringifiable, dump as dumpStringifiable, property } from "../stringify";
import {
  ConstraintsByProperty,
  LenConstraint,
  PatternConstraint,
  SetOfEnumerationLiteralsConstraint,
  SetOfPrimitivesConstraint,
} from "./types";

export type Dumpable =
  | LenConstraint
  | PatternConstraint
  | SetOfPrimitivesConstraint
  | SetOfEnumerationLiteralsConstraint
  | ConstraintsByProperty
  | readonly Dumpable[];

function byPropertyName<V>(
  map: ReadonlyMap<Property, V>,
  stringifyValue: (value: V) => Stringifiable
): ReadonlyMap<string, Stringifiable> {
  const result = new Map<string, Stringifiable>();
  for (const [prop, value] of map) {
    result.set(prop.name, stringifyValue(value));
  }
  return result;
}

function stringifyDumpable(that: Dumpable): Stringifiable {
  if (that instanceof LenConstraint) {
    return new Entity("LenConstraint", [
      property("min_value", that.minValue),
      property("max_value", that.maxValue),
    ]);
  }

  if (that instanceof PatternConstraint) {
    return new Entity("PatternConstraint", [property("pattern", that.pattern)]);
  }

  if (that instanceof SetOfPrimitivesConstraint) {
    return new Entity("SetOfPrimitivesConstraint", [
      property("a_type", that.aType),
      property(
        "literals",
        that.literals.map((literal) => literal.value)
      ),
    ]);
  }

  if (that instanceof SetOfEnumerationLiteralsConstraint) {
    return new Entity("SetOfEnumerationLiteralsConstraint", [
      property("enumeration", `Reference to Enumeration ${that.enumeration.name}`),
      property(
        "literals",
        that.literals.map((literal) => `Reference to EnumerationLiteral ${literal.name}`)
      ),
    ]);
  }

  if (that instanceof ConstraintsByProperty) {
    return new Entity("ConstraintsByProperty", [
      property("len_constraints_by_property", byPropertyName(that.lenConstraintsByProperty, stringifyDumpable)),
      property("patterns_by_property", byPropertyName(that.patternsByProperty, stringifyDumpable)),
      property("set_of_primitives_by_property", byPropertyName(that.setOfPrimitivesByProperty, stringifyDumpable)),
      property(
        "set_of_enumeration_literals_by_property",
        byPropertyName(that.setOfEnumerationLiteralsByProperty, stringifyDumpable)
      ),
    ]);
  }

  return that.map(stringifyDumpable);
}

/**
 * Produce the textual representation of an inferred constraint (or of a list of them).
 */
export function dump(that: Dumpable | null): string {
  if (that === null) {
    return "None";
  }
  return dumpStringifiable(stringifyDumpable(that));
}
