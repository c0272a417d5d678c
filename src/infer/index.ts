/**
 * Infer schema constraints (length, pattern, set membership) from invariants.
 */

export {
  LenConstraint,
  PatternConstraint,
  SetOfPrimitivesConstraint,
  SetOfEnumerationLiteralsConstraint,
  ConstraintsByProperty,
  InferenceError,
  succeed,
  fail,
} from "./types";
export type { InferResult, InferSuccess, InferFailure } from "./types";

export {
  isSelf,
  matchProperty,
  matchIntConstant,
  matchConditionalOnProp,
  matchEachConjunct,
  matchOnProperties,
  matchLenComparison,
  matchLenBoundOnProperty,
  matchLenBoundOnSelf,
  matchPropInNamedContainer,
  matchPatternOnProperty,
  matchPatternOnSelf,
} from "./match";
export type {
  ConditionalOnProp,
  LenBound,
  LenTarget,
  LenComparison,
  LenBoundOnProperty,
  PropInNamedContainer,
  PatternOnProperty,
} from "./match";

export {
  minWithNull,
  maxWithNull,
  reduceLenBounds,
  lenConstraintsFromInvariants,
  inferLenConstraintOfSelf,
  narrowLenConstraint,
  inferLenConstraintsByConstrainedPrimitive,
} from "./len";
export type { ReductionError } from "./len";

export {
  mapPatternVerificationsByName,
  patternsFromInvariants,
  inferPatternsOnSelf,
  inferPatternsByConstrainedPrimitive,
} from "./pattern";
export type { PatternVerificationsByName } from "./pattern";

export {
  intersectSetOfPrimitivesConstraints,
  intersectSetOfEnumerationLiteralsConstraints,
  inferSetConstraintsByPropertyFromInvariants,
} from "./set";
export type { SetConstraintsByProperty } from "./set";

export { inferConstraintsByClass, mergeConstraintsWithAncestors } from "./inline";

export { dump } from "./stringify";
export type { Dumpable } from "./stringify";
