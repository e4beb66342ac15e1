/**
 * @tokenloom/grammar Showcase
 *
 * Self-documenting examples of token rules, actions and grammars. Text is
 * read into tokens once; rules then recognise structure in the token list
 * and actions rewrite what they match.
 */

import assert from "node:assert/strict";

import {
  // Reading
  TokenReader, charDefinition,

  // Matchers and combinators
  value, pattern, sequence, anyOf, zeroOrMore, optional,

  // Assertions and structure
  lookahead, boundary, recursive, capture, reference,

  // Actions
  grouping, extract, transform, convert, classify,

  // Engine and grammar
  TokenRuleEngine, GrammarBuilder, TokenRuleContext, TokenStream,

  // Token types and shadow tokens
  tokenType, type, shadow,

  // Types
  simpleToken, type Token, tokenValues,
} from "../src/index.js";

// ============================================================================
// 1. READING — Text to Positioned Tokens
// ============================================================================

const reader = new TokenReader({
  definitions: [charDefinition("("), charDefinition(")"), charDefinition(";")],
  allowedChars: /[a-z0-9=+]/,
  separators: " ();",
});

const tokens = reader.read("(add 1 2)");
assert.deepEqual(tokenValues(tokens), ["(", "add", "1", "2", ")"]);
assert.equal(tokens[2].position.absoluteCharacter, 5, "words keep their offset");

// ============================================================================
// 2. RULES — Matching at a Stream Position
// ============================================================================

const number = pattern("\\d+");
const call = sequence(value("("), pattern("[a-z]+"), zeroOrMore(number), value(")"));

const stream = TokenStream.of(tokens);
const match = call.match(stream, new TokenRuleContext());
assert.ok(match !== null && match.endIndex === 5, "a call spans the whole input");
assert.equal(stream.index, 5, "a successful match advances the stream");

// A failed match leaves the stream where it was.
const retry = TokenStream.of(tokens);
assert.equal(sequence(value("("), number).match(retry, new TokenRuleContext()), null);
assert.equal(retry.index, 0);

// Negation is an involution.
assert.equal(number.not().not(), number);

// ============================================================================
// 3. THE ENGINE — One Rewriting Pass
// ============================================================================

const grouped = new TokenRuleEngine().addRule(call, grouping()).process(reader.read("(inc 1) (inc 2)"));
assert.deepEqual(tokenValues(grouped), ["(inc1)", "(inc2)"]);

// Zero-width matches insert output before the current token.
const marked = new TokenRuleEngine()
  .addRule(lookahead(value("(")), transform(() => [simpleToken(charDefinition("^"), "^")]))
  .process(reader.read("(x)"));
assert.deepEqual(tokenValues(marked), ["^", "(", "x", ")"]);

// ============================================================================
// 4. GRAMMARS — Named and Recursive Rules
// ============================================================================

const comments: Token[] = [];

const grammar = new GrammarBuilder()
  .define("atom", anyOf(pattern("[a-z0-9]+"), recursive("list")))
  .define("list", sequence(value("("), zeroOrMore(recursive("atom")), value(")")))
  .addRule(boundary(value("="), value("=")), extract(() => true, (t) => comments.push(t)))
  .addRule(recursive("list"), grouping())
  .build();

const parsed = grammar.parse(reader.read("(a (b c)) = note = d"));
assert.deepEqual(tokenValues(parsed), ["(a(bc))", "d"]);
assert.deepEqual(tokenValues(comments), ["=", "note", "="]);

// Groups produced by one pass are recognised by the next.
assert.deepEqual(tokenValues(grammar.parse(parsed)), ["(a(bc))", "d"]);

// ============================================================================
// 5. CAPTURES — Back-references Within a Pass
// ============================================================================

const fenced = sequence(capture("fence", pattern("=+")), pattern("[a-z]+"), reference("fence", "tokens"));
const fences = new TokenRuleEngine().addRule(fenced, grouping()).process(reader.read("== x == = y =="));
assert.deepEqual(tokenValues(fences), ["==x==", "=", "y", "=="]);

// Optional parts still leave the engine making progress.
const semis = new TokenRuleEngine().addRule(optional(value(";"))).process(reader.read("a;b"));
assert.deepEqual(tokenValues(semis), ["a", ";", "b"]);

// ============================================================================
// 6. TYPES AND SHADOWS — Classify Once, Match by Type
// ============================================================================

const keyword = tokenType("Keyword");

// `let` gets a type; `;` stays in the output but later passes never see it.
const classified = new TokenRuleEngine()
  .addRule(value("let"), classify(() => [keyword]))
  .addRule(value(";"), convert(shadow))
  .process(reader.read("let x; let y"));

const declarations = new TokenRuleEngine()
  .addRule(sequence(type(keyword), pattern("[a-z]+")), grouping())
  .process(classified);
assert.deepEqual(tokenValues(declarations), ["letx", ";", "lety"]);
assert.deepEqual(declarations.map((t) => t.kind), ["group", "shadow", "group"]);

console.log("showcase: all assertions passed");
