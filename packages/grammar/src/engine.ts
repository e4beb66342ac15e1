/**
 * Rule engine: one left-to-right rewriting pass over a token list.
 */

import { config, createLogger } from "@tokenloom/core";
import { identity } from "./actions.js";
import { TokenRuleContext } from "./context.js";
import { isZeroWidth } from "./match.js";
import { TokenStream } from "./stream.js";
import type { Token } from "./tokens.js";
import type { TokenAction, TokenRule } from "./types.js";

const log = createLogger("engine");

/** A rule together with the action applied to its matches. */
export interface RuleBinding {
  readonly rule: TokenRule;
  readonly action: TokenAction;
}

export class TokenRuleEngine {
  private readonly bindings: RuleBinding[];
  private readonly context: TokenRuleContext;

  constructor(rules: readonly RuleBinding[] = [], context: TokenRuleContext = new TokenRuleContext()) {
    this.bindings = [...rules];
    this.context = context;
  }

  addRule(rule: TokenRule, action: TokenAction = identity()): this {
    this.bindings.push(Object.freeze({ rule, action }));
    return this;
  }

  get rules(): readonly RuleBinding[] {
    return Object.freeze([...this.bindings]);
  }

  /**
   * Rewrite `tokens` in a single pass. At each position the rules are tried
   * in order and the first match's action output replaces the matched span;
   * a position no rule matches is copied unchanged.
   *
   * A zero-width match appends its action output, then copies the current
   * token and moves past it, so every step makes progress. Shadow tokens
   * between matches are copied through; rules never see them.
   */
  process(tokens: readonly Token[]): readonly Token[] {
    const stream = TokenStream.of(tokens);
    const context = this.context.fork();
    const trace = config.get<boolean>("engine.trace") === true;
    const result: Token[] = [];

    for (;;) {
      result.push(...stream.skipShadows());
      if (!stream.hasMore()) break;
      let matched = false;

      for (const { rule, action } of this.bindings) {
        const match = rule.match(stream.lookahead(), context);
        if (match === null) continue;

        if (trace) {
          log.debug(
            () => `${rule.kind} matched [${match.startIndex}, ${match.endIndex}) with ${action.kind}`
          );
        }
        result.push(...action.apply(match, context));
        if (isZeroWidth(match)) {
          result.push(stream.read());
        } else {
          stream.advanceTo(match.endIndex);
        }
        matched = true;
        break;
      }

      if (!matched) {
        result.push(stream.read());
      }
    }

    return Object.freeze(result);
  }
}
