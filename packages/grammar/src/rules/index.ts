export { mkRule, not, isNotRule, type MatchFn, type NotRule, type Rule } from "./rule.js";
export {
  alwaysMatch,
  neverMatch,
  value,
  pattern,
  lengthBetween,
  minLength,
  maxLength,
  exactLength,
  custom,
  type,
  type ValueRule,
  type PatternRule,
  type LengthRule,
  type CustomRule,
  type TypeRule,
} from "./matchers.js";
export {
  sequence,
  anyOf,
  allOf,
  isAnyOfRule,
  type SequenceRule,
  type AnyOfRule,
  type AllOfRule,
} from "./combinators.js";
export {
  optional,
  repeated,
  atLeast,
  atMost,
  exactly,
  zeroOrMore,
  oneOrMore,
  type OptionalRule,
  type RepeatedRule,
} from "./quantifiers.js";
export {
  lookahead,
  negativeLookahead,
  lookbehind,
  negativeLookbehind,
  startDocument,
  endDocument,
  startLine,
  endLine,
  type LookaroundRule,
  type AnchorRule,
  type AnchorPosition,
  type AnchorScope,
} from "./assertions.js";
export { boundary, group, isGroupRule, type BoundaryRule, type GroupRule } from "./structural.js";
export {
  recursive,
  lazy,
  capture,
  reference,
  type RecursiveRule,
  type LazyRule,
  type CaptureRule,
  type ReferenceRule,
  type ReferenceType,
} from "./references.js";
