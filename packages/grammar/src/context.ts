/**
 * Rule context: named rule bindings plus the token captures of one parse.
 *
 * Rules are stored in an arena indexed by integer id with a name → id map,
 * so recursive grammars refer to each other by name rather than by object
 * cycles. Bindings are append-only and frozen by `seal()`; captures are
 * per-parse state and start empty in every `fork()`.
 */

import { ensures, requires } from "@tokenloom/core";
import type { Token } from "./tokens.js";
import type { TokenRule } from "./types.js";

/** What a dynamic binding resolves to at match time. */
export type DynamicBinding = TokenRule | readonly Token[];

export type DynamicResolver = (context: TokenRuleContext) => DynamicBinding | undefined;

interface Bindings {
  readonly rules: TokenRule[];
  readonly ids: Map<string, number>;
  readonly dynamics: Map<string, DynamicResolver>;
  sealed: boolean;
}

export class TokenRuleContext {
  private bindings: Bindings;
  private readonly captures = new Map<string, readonly Token[]>();

  constructor() {
    this.bindings = { rules: [], ids: new Map(), dynamics: new Map(), sealed: false };
  }

  get sealed(): boolean {
    return this.bindings.sealed;
  }

  // ---------------------------------------------------------------------------
  // Rule bindings
  // ---------------------------------------------------------------------------

  /** Bind `name` to `rule`; returns the rule's id. */
  defineRule(name: string, rule: TokenRule): number {
    this.checkDefinable(name);
    const id = this.bindings.rules.length;
    this.bindings.rules.push(rule);
    this.bindings.ids.set(name, id);
    return id;
  }

  /** Bind `name` to a resolver evaluated each time the name is referenced. */
  defineDynamic(name: string, resolver: DynamicResolver): void {
    this.checkDefinable(name);
    this.bindings.dynamics.set(name, resolver);
  }

  private checkDefinable(name: string): void {
    ensures(!this.bindings.sealed, `Cannot define "${name}": the context is sealed`);
    ensures(name.length > 0, "Rule name must not be empty");
    ensures(
      !this.bindings.ids.has(name) && !this.bindings.dynamics.has(name),
      `Rule "${name}" is already defined`
    );
  }

  resolveRule(name: string): TokenRule | undefined {
    const id = this.bindings.ids.get(name);
    return id === undefined ? undefined : this.bindings.rules[id];
  }

  ruleId(name: string): number | undefined {
    return this.bindings.ids.get(name);
  }

  ruleAt(id: number): TokenRule {
    requires(
      Number.isInteger(id) && id >= 0 && id < this.bindings.rules.length,
      `No rule with id ${id}`
    );
    return this.bindings.rules[id];
  }

  hasRule(name: string): boolean {
    return this.bindings.ids.has(name);
  }

  hasDynamic(name: string): boolean {
    return this.bindings.dynamics.has(name);
  }

  /** Names of the rule bindings, in definition order. */
  ruleNames(): string[] {
    return [...this.bindings.ids.keys()];
  }

  resolveDynamic(name: string): DynamicBinding | undefined {
    const resolver = this.bindings.dynamics.get(name);
    return resolver === undefined ? undefined : resolver(this);
  }

  // ---------------------------------------------------------------------------
  // Captures
  // ---------------------------------------------------------------------------

  /** Store tokens under `key`, replacing any earlier capture. */
  captureTokens(key: string, tokens: readonly Token[]): void {
    requires(key.length > 0, "Capture key must not be empty");
    this.captures.set(key, Object.freeze([...tokens]));
  }

  capturedTokens(key: string): readonly Token[] | undefined {
    return this.captures.get(key);
  }

  hasCapture(key: string): boolean {
    return this.captures.has(key);
  }

  clearCaptures(): void {
    this.captures.clear();
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Freeze the bindings; later definitions throw. */
  seal(): this {
    this.bindings.sealed = true;
    return this;
  }

  /** A context sharing these bindings with an empty capture scope. */
  fork(): TokenRuleContext {
    const context = new TokenRuleContext();
    context.bindings = this.bindings;
    return context;
  }
}
