/**
 * Grammar builder
 *
 * Collects named rules (reachable only by name, e.g. from `recursive`) and
 * active rules (applied by the engine in registration order), then seals
 * them into an immutable {@link Grammar}.
 *
 * @example
 * ```typescript
 * const grammar = new GrammarBuilder()
 *   .define("item", anyOf(value("x"), recursive("list")))
 *   .define("list", sequence(value("["), zeroOrMore(recursive("item")), value("]")))
 *   .addRule(recursive("list"), grouping())
 *   .build();
 *
 * grammar.parse(tokens);
 * ```
 */

import { createLogger, ensures, requires } from "@tokenloom/core";
import { identity, isGroupingAction } from "./actions.js";
import { TokenRuleContext, type DynamicResolver } from "./context.js";
import { TokenRuleEngine, type RuleBinding } from "./engine.js";
import { anyOf, isAnyOfRule } from "./rules/combinators.js";
import { group, isGroupRule } from "./rules/structural.js";
import type { Token } from "./tokens.js";
import type { TokenAction, TokenRule } from "./types.js";

const log = createLogger("grammar");

// ---------------------------------------------------------------------------
// Grammar
// ---------------------------------------------------------------------------

/** A sealed grammar. Safe to share; every parse uses its own engine state. */
export interface Grammar {
  /** Active rules, in the order they are tried. */
  readonly rules: readonly RuleBinding[];
  readonly context: TokenRuleContext;
  /** Named rules with the action given to `define`. */
  readonly definitions: ReadonlyMap<string, RuleBinding>;
  /** Rewrite `tokens` with the active rules. */
  parse(tokens: readonly Token[]): readonly Token[];
  /** Rewrite `tokens` with the named rule alone, using its defined action. */
  parseWith(name: string, tokens: readonly Token[]): readonly Token[];
}

// ---------------------------------------------------------------------------
// Auto-wrapping
// ---------------------------------------------------------------------------

/**
 * Whether a rule already has the wrapped shape: an `anyOf` of exactly two
 * alternatives, one of them a `group` rule.
 */
function isWrapped(rule: TokenRule): boolean {
  if (!isAnyOfRule(rule) || rule.alternatives.length !== 2) return false;
  return rule.alternatives.filter(isGroupRule).length === 1;
}

function countGrouped(rule: TokenRule): number {
  return isAnyOfRule(rule) ? rule.alternatives.filter(isGroupRule).length : 0;
}

/**
 * Make `rule` also match a token group holding what it matches, so that
 * tokens grouped by an earlier pass are recognised again.
 */
function wrapRule(rule: TokenRule): TokenRule {
  return anyOf(rule, group(rule));
}

// ---------------------------------------------------------------------------
// Reference checks
// ---------------------------------------------------------------------------

function isTokenRule(value: unknown): value is TokenRule {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "string" &&
    "match" in value &&
    typeof value.match === "function"
  );
}

function childRules(rule: TokenRule): TokenRule[] {
  const children: TokenRule[] = [];
  const values: unknown[] = Object.values(rule);
  for (const value of values) {
    if (isTokenRule(value)) {
      children.push(value);
    } else if (Array.isArray(value)) {
      const items: unknown[] = value;
      children.push(...items.filter(isTokenRule));
    }
  }
  return children;
}

/** The name a rule requires to be bound as a rule, if any. */
function requiredName(rule: TokenRule): string | undefined {
  if (rule.kind === "recursive" && "name" in rule && typeof rule.name === "string") {
    return rule.name;
  }
  if (rule.kind === "reference" && "type" in rule && rule.type === "rule" && "key" in rule) {
    return typeof rule.key === "string" ? rule.key : undefined;
  }
  return undefined;
}

/** Names referenced by `roots` (transitively) that `context` does not bind. */
function unboundNames(roots: readonly TokenRule[], context: TokenRuleContext): string[] {
  const missing = new Set<string>();
  const visited = new Set<TokenRule>();
  const pending = [...roots];

  for (let rule = pending.pop(); rule !== undefined; rule = pending.pop()) {
    if (visited.has(rule)) continue;
    visited.add(rule);

    const name = requiredName(rule);
    if (name !== undefined && !context.hasRule(name)) missing.add(name);
    pending.push(...childRules(rule));
  }
  return [...missing];
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export class GrammarBuilder {
  private readonly context = new TokenRuleContext();
  private readonly active: RuleBinding[] = [];
  private readonly definitions = new Map<string, RuleBinding>();
  private built = false;

  private checkOpen(): void {
    ensures(!this.built, "GrammarBuilder cannot be used after build()");
  }

  /**
   * Register a named rule without activating it. Names must be unique and
   * non-empty.
   */
  define(name: string, rule: TokenRule, action: TokenAction = identity()): this {
    this.checkOpen();
    this.context.defineRule(name, rule);
    this.definitions.set(name, Object.freeze({ rule, action }));
    return this;
  }

  /** Register a binding resolved each time a `"dynamic"` reference to `name` matches. */
  defineDynamic(name: string, resolver: DynamicResolver): this {
    this.checkOpen();
    this.context.defineDynamic(name, resolver);
    return this;
  }

  /**
   * Append an active rule.
   *
   * With `wrap` (by default, whenever `action` is a grouping action) the rule
   * is wrapped as `anyOf(rule, group(rule))`, so its grouping applies the
   * same way whether the span arrives loose or already grouped. A rule that
   * already has that shape is kept as is; an `anyOf` with two or more
   * grouped alternatives is always wrapped.
   */
  addRule(rule: TokenRule, action: TokenAction = identity(), wrap = isGroupingAction(action)): this {
    this.checkOpen();
    let active = rule;
    if (wrap && !isWrapped(rule)) {
      active = wrapRule(rule);
      log.debug(() => `wrapped ${rule.kind} rule (${countGrouped(rule)} grouped alternatives)`);
    } else if (wrap) {
      log.debug(() => `kept ${rule.kind} rule: already wrapped`);
    }
    this.active.push(Object.freeze({ rule: active, action }));
    return this;
  }

  /** Seal the context and return the grammar. The builder cannot be used afterwards. */
  build(): Grammar {
    this.checkOpen();
    this.built = true;

    const context = this.context.seal();
    const rules = Object.freeze([...this.active]);
    const definitions: ReadonlyMap<string, RuleBinding> = new Map(this.definitions);

    const roots = [...rules, ...definitions.values()].map((binding) => binding.rule);
    for (const name of unboundNames(roots, context)) {
      log.warn(`rule "${name}" is referenced but never defined`);
    }
    if (rules.length === 0) {
      log.info("grammar has no active rules; parse() returns its input unchanged");
    }

    return Object.freeze({
      rules,
      context,
      definitions,
      parse(tokens: readonly Token[]): readonly Token[] {
        return new TokenRuleEngine(rules, context).process(tokens);
      },
      parseWith(name: string, tokens: readonly Token[]): readonly Token[] {
        const binding = definitions.get(name);
        requires(binding !== undefined, `Rule "${name}" is not defined in this grammar`);
        return new TokenRuleEngine([binding], context).process(tokens);
      },
    });
  }
}
