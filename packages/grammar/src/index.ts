/**
 * @tokenloom/grammar
 *
 * Token-rule matching and grammar composition: composable rules recognise
 * structure in an already-lexed token list, and actions rewrite each match.
 *
 * Provides:
 * - An immutable token model with positions, classifying definitions,
 *   hierarchical token types and shadow tokens hidden from matching
 * - Matchers, combinators, quantifiers, assertions and recursive references
 * - Actions for grouping, wrapping, filtering and decorating matched tokens
 * - A single-pass rule engine and a builder that seals grammars
 * - A reader that turns text into positioned tokens
 *
 * @module
 */

// Token model
export {
  charDefinition,
  stringDefinition,
  escapedDefinition,
  WORD_DEFINITION,
  definition,
  combineDefinitions,
  isLiteralDefinition,
  type TokenDefinition,
  type CharTokenDefinition,
  type StringTokenDefinition,
  type EscapedTokenDefinition,
  type LiteralTokenDefinition,
} from "./definition.js";
export {
  UNPOSITIONED,
  tokenPosition,
  isPositioned,
  samePosition,
  shiftPosition,
  endPositionOf,
  type TokenPosition,
} from "./position.js";
export {
  simpleToken,
  escapedToken,
  tokenGroup,
  annotatedToken,
  indexedToken,
  isTokenGroup,
  unwrapToken,
  flattenToken,
  shadow,
  unshadow,
  isShadowToken,
  withTypes,
  tokenValues,
  type Token,
  type TokenKind,
  type SimpleToken,
  type EscapedToken,
  type TokenGroup,
  type AnnotatedToken,
  type IndexedToken,
  type ShadowToken,
} from "./tokens.js";
export { tokenType, isTypeOf, typeHierarchy, typePath, type TokenType } from "./token-type.js";

// Matching
export { TokenStream, EndOfTokenStreamError } from "./stream.js";
export { createMatch, emptyMatch, isZeroWidth, type TokenRuleMatch } from "./match.js";
export type { TokenRule, TokenAction, BuiltinRuleKind, BuiltinActionKind } from "./types.js";
export {
  TokenRuleContext,
  type DynamicBinding,
  type DynamicResolver,
} from "./context.js";
export * from "./rules/index.js";

// Rewriting
export {
  identity,
  transform,
  convert,
  filter,
  skip,
  extract,
  grouping,
  isGroupingAction,
  wrap,
  split,
  annotate,
  classify,
  index,
  type Action,
  type TokenTransformer,
  type GroupingMode,
  type GroupingAction,
} from "./actions.js";
export { TokenRuleEngine, type RuleBinding } from "./engine.js";
export { GrammarBuilder, type Grammar } from "./grammar.js";

// Reading
export { TokenReader, TokenReadError, type TokenReaderOptions } from "./reader.js";
