/**
 * Infer the pattern constraints based on calls to pattern verification functions.
 *
 * A list of patterns is a conjunction: all of them need to match. The lists keep
 * the order in which the invariants are declared and are not de-duplicated.
 */

import {
  Class,
  ConstrainedPrimitive,
  PatternVerification,
  Property,
  SymbolTable,
  Verification,
} from "../model";
import { matchEachConjunct, matchOnProperties, matchPatternOnProperty, matchPatternOnSelf } from "./match";
import { PatternConstraint } from "./types";

/**
 * Registry of the pattern verification functions, built once per symbol table.
 */
export type PatternVerificationsByName = ReadonlyMap<string, PatternVerification>;

/**
 * Map the pattern verifications by their name. Other verifications are skipped.
 */
export function mapPatternVerificationsByName(verifications: readonly Verification[]): PatternVerificationsByName {
  const result = new Map<string, PatternVerification>();
  for (const verification of verifications) {
    if (verification.tag === "patternVerification") {
      result.set(verification.name, verification);
    }
  }
  return result;
}

/**
 * Infer the pattern constraints for every property of the class from its own
 * invariants. Calls on unknown properties are ignored.
 */
export function patternsFromInvariants(
  cls: Class,
  patternVerificationsByName: PatternVerificationsByName
): Map<Property, PatternConstraint[]> {
  const result = new Map<Property, PatternConstraint[]>();

  for (const invariant of cls.invariants) {
    if (invariant.specifiedFor !== cls) continue;

    const matches = matchOnProperties(invariant.body, (node) =>
      matchPatternOnProperty(node, patternVerificationsByName)
    );

    for (const matched of matches) {
      const prop = cls.propertiesByName.get(matched.propName);
      if (prop === undefined) continue;

      const patterns = result.get(prop);
      if (patterns === undefined) {
        result.set(prop, [matched.constraint]);
      } else {
        patterns.push(matched.constraint);
      }
    }
  }

  return result;
}

/**
 * Infer the pattern constraints on `self` of a constrained string from its own
 * invariants.
 */
export function inferPatternsOnSelf(
  constrainedPrimitive: ConstrainedPrimitive,
  patternVerificationsByName: PatternVerificationsByName
): PatternConstraint[] {
  if (constrainedPrimitive.constrainee !== "str") {
    throw new Error(
      `Patterns are inferred only on constrained strings, ` +
        `but ${constrainedPrimitive.name} constrains ${constrainedPrimitive.constrainee}`
    );
  }

  const result: PatternConstraint[] = [];

  for (const invariant of constrainedPrimitive.invariants) {
    if (invariant.specifiedFor !== constrainedPrimitive) continue;

    result.push(
      ...matchEachConjunct(invariant.body, (node) => matchPatternOnSelf(node, patternVerificationsByName))
    );
  }

  return result;
}

/**
 * Infer the patterns of every constrained string, with the patterns of the
 * ancestors stacked in front of its own ones.
 */
export function inferPatternsByConstrainedPrimitive(
  symbolTable: SymbolTable,
  patternVerificationsByName: PatternVerificationsByName
): Map<ConstrainedPrimitive, PatternConstraint[]> {
  const result = new Map<ConstrainedPrimitive, PatternConstraint[]>();

  for (const ourType of symbolTable.ourTypesTopologicallySorted) {
    if (ourType.tag !== "constrainedPrimitive" || ourType.constrainee !== "str") continue;

    const stacked: PatternConstraint[] = [];
    for (const parent of ourType.inheritances) {
      const inherited = result.get(parent);
      if (inherited === undefined) {
        throw new Error(
          `Expected topological order, but ${ourType.name} is processed before its parent ${parent.name}`
        );
      }
      stacked.push(...inherited);
    }

    stacked.push(...inferPatternsOnSelf(ourType, patternVerificationsByName));
    result.set(ourType, stacked);
  }

  return result;
}
