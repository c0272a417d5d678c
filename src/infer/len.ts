/**
 * Infer the constraints on the length of a property value or of a constrained
 * primitive itself.
 *
 * The constraints are not exhaustive. Only invariants comparing `len(.)` against
 * an integer constant are understood; the actual invariants might be tighter.
 */

import { Expr } from "../expr";
import {
  Class,
  ConstrainedPrimitive,
  LENGTHABLE_PRIMITIVES,
  Property,
  SymbolTable,
} from "../model";
import { LenBound, matchEachConjunct, matchLenBoundOnProperty, matchLenBoundOnSelf, matchOnProperties } from "./match";
import { InferenceError, InferResult, LenConstraint, fail, succeed } from "./types";

// ============================================================================
// Helpers
// ============================================================================

/**
 * Minimum of the arguments, ignoring nulls. Null if all are null.
 */
export function minWithNull(...args: (number | null)[]): number | null {
  let minimum: number | null = null;
  for (const arg of args) {
    if (arg !== null && (minimum === null || arg < minimum)) {
      minimum = arg;
    }
  }
  return minimum;
}

/**
 * Maximum of the arguments, ignoring nulls. Null if all are null.
 */
export function maxWithNull(...args: (number | null)[]): number | null {
  let maximum: number | null = null;
  for (const arg of args) {
    if (arg !== null && (maximum === null || arg > maximum)) {
      maximum = arg;
    }
  }
  return maximum;
}

// ============================================================================
// Reduction
// ============================================================================

interface Observed {
  value: number;
  node: Expr;
  order: number;
}

function later(a: Observed, b: Observed): Expr {
  return a.order > b.order ? a.node : b.node;
}

/**
 * A contradiction found while reducing, tied to the comparison that revealed it.
 */
export interface ReductionError {
  message: string;
  node: Expr;
}

/**
 * Reduce the bounds to the interval satisfying all of them.
 * Every contradiction is reported, not only the first one.
 */
export function reduceLenBounds(
  bounds: readonly LenBound[]
): { constraint: LenConstraint; errors: null } | { constraint: null; errors: ReductionError[] } {
  let min: Observed | null = null;
  let max: Observed | null = null;
  let exact: Observed | null = null;

  const errors: ReductionError[] = [];

  for (const [order, bound] of bounds.entries()) {
    const observed: Observed = { value: bound.value, node: bound.node, order };

    switch (bound.kind) {
      case "min":
        if (min === null || bound.value > min.value) min = observed;
        break;
      case "max":
        if (max === null || bound.value < max.value) max = observed;
        break;
      case "exact":
        if (exact !== null && exact.value !== bound.value) {
          errors.push({
            message: `the exact length, ${exact.value}, contradicts another exactly expected length ${bound.value}.`,
            node: bound.node,
          });
        }
        exact = observed;
        break;
    }
  }

  if (exact !== null) {
    if (exact.value < 0) {
      errors.push({
        message: `the exactly expected length ${exact.value} is negative.`,
        node: exact.node,
      });
    }
    if (min !== null && min.value > exact.value) {
      errors.push({
        message: `the minimum length, ${min.value}, contradicts the exactly expected length ${exact.value}.`,
        node: later(min, exact),
      });
    }
    if (max !== null && exact.value > max.value) {
      errors.push({
        message: `the maximum length, ${max.value}, contradicts the exactly expected length ${exact.value}.`,
        node: later(max, exact),
      });
    }
  }

  if (max !== null && max.value < 0) {
    errors.push({
      message: `the maximum length, ${max.value}, is negative.`,
      node: max.node,
    });
  }

  if (min !== null && max !== null && min.value > max.value) {
    errors.push({
      message: `the minimum length, ${min.value}, contradicts the maximum length ${max.value}.`,
      node: later(min, max),
    });
  }

  if (errors.length > 0) {
    return { constraint: null, errors };
  }

  let minValue = exact !== null ? exact.value : min !== null ? min.value : null;
  const maxValue = exact !== null ? exact.value : max !== null ? max.value : null;

  // Every length is at least zero, so a lower bound of zero says nothing.
  if (minValue !== null && minValue <= 0) {
    minValue = null;
  }

  return { constraint: new LenConstraint(minValue, maxValue), errors: null };
}

// ============================================================================
// Properties
// ============================================================================

/**
 * Infer the constraints on `len(.)` for every property of the class.
 *
 * Only the invariants declared on the class itself are considered. Optional
 * properties get a constraint as well; cardinality is left to the caller.
 * Properties whose bounds say nothing are left out.
 */
export function lenConstraintsFromInvariants(cls: Class): InferResult<Map<Property, LenConstraint>> {
  // One pass over the invariants for all properties at once.
  const boundsByProperty = new Map<Property, LenBound[]>();
  const errors: InferenceError[] = [];

  for (const invariant of cls.invariants) {
    if (invariant.specifiedFor !== cls) continue;

    for (const matched of matchOnProperties(invariant.body, matchLenBoundOnProperty)) {
      const prop = cls.propertiesByName.get(matched.propName);
      if (prop === undefined) {
        errors.push(
          new InferenceError(
            `The property ${matched.propName} does not appear in the properties of the class ${cls.name}`,
            cls.name,
            matched.bound.node
          )
        );
        continue;
      }

      const bounds = boundsByProperty.get(prop);
      if (bounds === undefined) {
        boundsByProperty.set(prop, [matched.bound]);
      } else {
        bounds.push(matched.bound);
      }
    }
  }

  if (errors.length > 0) {
    return fail(errors);
  }

  const result = new Map<Property, LenConstraint>();

  for (const [prop, bounds] of boundsByProperty) {
    const reduced = reduceLenBounds(bounds);
    if (reduced.errors !== null) {
      for (const error of reduced.errors) {
        errors.push(
          new InferenceError(
            `The property ${prop.name} has conflicting invariants on the length: ${error.message}`,
            cls.name,
            error.node
          )
        );
      }
      continue;
    }

    if (reduced.constraint.minValue !== null || reduced.constraint.maxValue !== null) {
      result.set(prop, reduced.constraint);
    }
  }

  return errors.length > 0 ? fail(errors) : succeed(result);
}

// ============================================================================
// Constrained Primitives
// ============================================================================

/**
 * Infer the constraint on `len(self)` from the primitive's own invariants.
 * Throws if the constrainee has no length.
 */
export function inferLenConstraintOfSelf(constrainedPrimitive: ConstrainedPrimitive): InferResult<LenConstraint> {
  if (!LENGTHABLE_PRIMITIVES.has(constrainedPrimitive.constrainee)) {
    throw new Error(
      `The length is inferred only for strings and byte arrays, ` +
        `but ${constrainedPrimitive.name} constrains ${constrainedPrimitive.constrainee}`
    );
  }

  const bounds: LenBound[] = [];

  for (const invariant of constrainedPrimitive.invariants) {
    if (invariant.specifiedFor !== constrainedPrimitive) continue;

    bounds.push(...matchEachConjunct(invariant.body, matchLenBoundOnSelf));
  }

  const reduced = reduceLenBounds(bounds);
  if (reduced.errors !== null) {
    return fail(
      reduced.errors.map(
        (error) =>
          new InferenceError(
            `There are conflicting invariants on the length: ${error.message}`,
            constrainedPrimitive.name,
            error.node
          )
      )
    );
  }

  return succeed(reduced.constraint);
}

/**
 * Narrow a constraint by the (already narrowed) constraints of the ancestors.
 * Null if the result is contradictory.
 */
export function narrowLenConstraint(
  own: LenConstraint,
  inherited: readonly LenConstraint[]
): LenConstraint | null {
  const minValue = maxWithNull(own.minValue, ...inherited.map((c) => c.minValue));
  const maxValue = minWithNull(own.maxValue, ...inherited.map((c) => c.maxValue));

  if (minValue !== null && maxValue !== null && minValue > maxValue) {
    return null;
  }
  return new LenConstraint(minValue, maxValue);
}

/**
 * Infer `len(self)` of every string and byte-array constrained primitive, with
 * the constraints of all its ancestors stacked on top.
 *
 * First pass: each primitive's own constraint. Second pass, in topological
 * order: narrow by the ancestors.
 */
export function inferLenConstraintsByConstrainedPrimitive(
  symbolTable: SymbolTable
): InferResult<Map<ConstrainedPrimitive, LenConstraint>> {
  const errors: InferenceError[] = [];

  const firstPass = new Map<ConstrainedPrimitive, LenConstraint>();
  for (const constrainedPrimitive of symbolTable.constrainedPrimitives) {
    if (!LENGTHABLE_PRIMITIVES.has(constrainedPrimitive.constrainee)) continue;

    const inferred = inferLenConstraintOfSelf(constrainedPrimitive);
    if (inferred.success) {
      firstPass.set(constrainedPrimitive, inferred.value);
    } else {
      errors.push(...inferred.errors);
    }
  }

  if (errors.length > 0) {
    return fail(errors);
  }

  const secondPass = new Map<ConstrainedPrimitive, LenConstraint>();
  // Primitives whose own narrowing failed, or that inherit from one that did.
  const contradicted = new Set<ConstrainedPrimitive>();
  for (const ourType of symbolTable.ourTypesTopologicallySorted) {
    if (ourType.tag !== "constrainedPrimitive") continue;

    const own = firstPass.get(ourType);
    if (own === undefined) continue;

    if (ourType.inheritances.some((parent) => contradicted.has(parent))) {
      contradicted.add(ourType);
      continue;
    }

    const inherited = ourType.inheritances.map((parent) => {
      const narrowed = secondPass.get(parent);
      if (narrowed === undefined) {
        throw new Error(
          `Expected topological order, but ${ourType.name} is processed before its parent ${parent.name}`
        );
      }
      return narrowed;
    });

    const narrowed = narrowLenConstraint(own.copy(), inherited);
    if (narrowed === null) {
      errors.push(
        new InferenceError(
          `The length constraint of ${ourType.name} contradicts the length constraints ` +
            `of its ancestors: ${own.toString()} versus ` +
            inherited.map((c) => c.toString()).join(", "),
          ourType.name
        )
      );
      contradicted.add(ourType);
      continue;
    }

    secondPass.set(ourType, narrowed);
  }

  return errors.length > 0 ? fail(errors) : succeed(secondPass);
}
