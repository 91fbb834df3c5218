import assert from "node:assert/strict";
import { test } from "node:test";
import { toFrequencyMap, tokenize } from "../tokenize.js";

test("tokenize splits words and punctuation", () => {
  assert.deepStrictEqual(tokenize("int x= __NUM__ ;"), ["int", "x", "=", "__NUM__", ";"]);
  assert.deepStrictEqual(tokenize("foo(a,b);"), ["foo", "(", "a", ",", "b", ")", ";"]);
});

test("tokenize keeps multi-character operators together", () => {
  assert.deepStrictEqual(tokenize("a===b && c?.d => e ... f"), [
    "a",
    "===",
    "b",
    "&&",
    "c",
    "?.",
    "d",
    "=>",
    "e",
    "...",
    "f"
  ]);
  assert.deepStrictEqual(tokenize("x>>>=1"), ["x", ">>>=", "1"]);
  assert.deepStrictEqual(tokenize("a->b::c"), ["a", "->", "b", "::", "c"]);
});

test("tokenize never emits whitespace tokens", () => {
  assert.deepStrictEqual(tokenize(""), []);
  assert.deepStrictEqual(tokenize(" \t\n "), []);
});

test("toFrequencyMap counts tokens and skips blank entries", () => {
  assert.deepStrictEqual(
    toFrequencyMap(["a", "(", "a", ")"]),
    new Map([
      ["a", 2],
      ["(", 1],
      [")", 1]
    ])
  );
  assert.deepStrictEqual(toFrequencyMap(["a", "", " "]), new Map([["a", 1]]));
});
