/**
 * Data structures produced by the constraint inference.
 */

import { Expr } from "../expr";
import {
  Enumeration,
  EnumerationLiteral,
  PrimitiveSetLiteral,
  PrimitiveType,
  Property,
} from "../model";

// ============================================================================
// Constraints
// ============================================================================

/**
 * Inferred constraint on `len(.)` of something. Both bounds are inclusive:
 * `minValue <= len <= maxValue`.
 */
export class LenConstraint {
  readonly minValue: number | null;
  readonly maxValue: number | null;

  constructor(minValue: number | null, maxValue: number | null) {
    if (minValue !== null && minValue < 0) {
      throw new Error(`Expected a non-negative minimum length, got ${minValue}`);
    }
    if (maxValue !== null && maxValue < 0) {
      throw new Error(`Expected a non-negative maximum length, got ${maxValue}`);
    }
    if (minValue !== null && maxValue !== null && minValue > maxValue) {
      throw new Error(`Expected the minimum length ${minValue} to be at most the maximum length ${maxValue}`);
    }
    this.minValue = minValue;
    this.maxValue = maxValue;
  }

  copy(): LenConstraint {
    return new LenConstraint(this.minValue, this.maxValue);
  }

  toString(): string {
    return `LenConstraint(min_value=${this.minValue ?? "None"}, max_value=${this.maxValue ?? "None"})`;
  }
}

/**
 * Constrain a string to match a regular expression.
 */
export class PatternConstraint {
  constructor(readonly pattern: string) {}
}

export class SetOfPrimitivesConstraint {
  constructor(
    readonly aType: PrimitiveType,
    readonly literals: readonly PrimitiveSetLiteral[]
  ) {
    for (const literal of literals) {
      if (literal.aType !== aType) {
        throw new Error(`Expected every literal to be of type ${aType}, got a literal of type ${literal.aType}`);
      }
    }
  }
}

export class SetOfEnumerationLiteralsConstraint {
  constructor(
    readonly enumeration: Enumeration,
    readonly literals: readonly EnumerationLiteral[]
  ) {
    for (const literal of literals) {
      if (literal.enumeration !== enumeration) {
        throw new Error(
          `Expected every literal to belong to the enumeration ${enumeration.name}, ` +
            `got ${literal.name} of ${literal.enumeration.name}`
        );
      }
    }
  }
}

/**
 * All the inferred property constraints of a class.
 *
 * Constraints stemming from constrained primitives are in-lined here as well.
 * Maps are keyed by property identity and iterate in insertion order.
 */
export class ConstraintsByProperty {
  constructor(
    readonly lenConstraintsByProperty: ReadonlyMap<Property, LenConstraint>,
    readonly patternsByProperty: ReadonlyMap<Property, readonly PatternConstraint[]>,
    readonly setOfPrimitivesByProperty: ReadonlyMap<Property, SetOfPrimitivesConstraint>,
    readonly setOfEnumerationLiteralsByProperty: ReadonlyMap<Property, SetOfEnumerationLiteralsConstraint>
  ) {}
}

// ============================================================================
// Results and Errors
// ============================================================================

export class InferenceError extends Error {
  constructor(
    message: string,
    /** Name of the class or constrained primitive the error belongs to. */
    public readonly symbol: string,
    public readonly node?: Expr
  ) {
    super(message);
    this.name = "InferenceError";
  }
}

/**
 * Either the inferred value or every error found on the way. Never both.
 */
export type InferResult<T> = InferSuccess<T> | InferFailure;

export interface InferSuccess<T> {
  success: true;
  value: T;
}

export interface InferFailure {
  success: false;
  errors: InferenceError[];
}

export const succeed = <T>(value: T): InferSuccess<T> => ({ success: true, value });

export const fail = (errors: InferenceError[]): InferFailure => ({ success: false, errors });
