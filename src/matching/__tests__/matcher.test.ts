import assert from "node:assert/strict";
import { test } from "node:test";
import { compare, toSnippetCollection } from "../matcher.js";
import type { ComparisonResult, SnippetCollection } from "../../types.js";
import {
  DuplicateSnippetIdError,
  SnippetCodeInvalidError,
  SnippetIdMismatchError,
  ThresholdInvalidError
} from "../../errors/input.errors.js";
import type { Logger } from "../../logging/logger.js";

const collection = (entries: Record<string, string>): SnippetCollection =>
  toSnippetCollection(Object.entries(entries).map(([id, code]) => ({ id, code })));

const EMPTY = collection({});

const idsOf = (results: ComparisonResult[]) => ({
  old: results.flatMap((r) => (r.oldId === undefined ? [] : [r.oldId])),
  new: results.flatMap((r) => (r.newId === undefined ? [] : [r.newId]))
});

test("compare of a collection with itself reviews everything at 100", () => {
  const snippets = collection({ h2: "foo(x);", h1: "a = b;" });
  assert.deepStrictEqual(compare(snippets, snippets, 100), [
    { oldId: "h1", newId: "h1", score: 100, status: "reviewed" },
    { oldId: "h2", newId: "h2", score: 100, status: "reviewed" }
  ]);
});

test("compare against an empty new scan marks every old finding not found", () => {
  assert.deepStrictEqual(compare(collection({ h1: "a();", h2: "b();" }), EMPTY, 80), [
    { oldId: "h1", status: "not_found" },
    { oldId: "h2", status: "not_found" }
  ]);
});

test("compare from an empty old scan marks every new finding added", () => {
  assert.deepStrictEqual(compare(EMPTY, collection({ h9: "x();" }), 80), [{ newId: "h9", status: "added" }]);
});

test("compare of two empty scans is empty", () => {
  assert.deepStrictEqual(compare(EMPTY, EMPTY, 80), []);
});

test("compare pairs snippets that differ only in comments and spacing", () => {
  assert.deepStrictEqual(compare(collection({ o1: "int x = 5; // init" }), collection({ n1: "int x=5;" }), 80), [
    { oldId: "o1", newId: "n1", score: 100, status: "reviewed" }
  ]);
});

test("compare classifies a changed pair against the threshold", () => {
  const before = collection({ o1: "foo(a,b);" });
  const after = collection({ n1: "bar(a,b);" });
  assert.deepStrictEqual(compare(before, after, 80), [
    { oldId: "o1", newId: "n1", score: 70, status: "needs_review" }
  ]);
  assert.deepStrictEqual(compare(before, after, 30), [
    { oldId: "o1", newId: "n1", score: 70, status: "reviewed" }
  ]);
});

test("compare leaves a finding with no resembling snippet unpaired", () => {
  assert.deepStrictEqual(compare(collection({ h1: "foo(a,b);" }), collection({ n2: "x" }), 80), [
    { oldId: "h1", status: "not_found" },
    { newId: "n2", status: "added" }
  ]);
});

test("compare honors minPairScore", () => {
  assert.deepStrictEqual(
    compare(collection({ o1: "foo(a,b);" }), collection({ n1: "bar(a,b);" }), 80, { minPairScore: 71 }),
    [
      { oldId: "o1", status: "not_found" },
      { newId: "n1", status: "added" }
    ]
  );
});

test("compare pairs one-to-one, best score first", () => {
  const before = collection({ o2: "alpha(beta, gamma);", o1: "alpha(beta);" });
  const after = collection({ n1: "alpha(beta);" });
  assert.deepStrictEqual(compare(before, after, 80), [
    { oldId: "o1", newId: "n1", score: 100, status: "reviewed" },
    { oldId: "o2", status: "not_found" }
  ]);
});

test("compare breaks score ties by id order, whatever the insertion order", () => {
  const after = collection({ c: "x();" });
  const expected = [
    { oldId: "a", newId: "c", score: 100, status: "reviewed" },
    { oldId: "b", status: "not_found" }
  ];
  assert.deepStrictEqual(compare(collection({ a: "x();", b: "x();" }), after, 80), expected);
  assert.deepStrictEqual(compare(collection({ b: "x();", a: "x();" }), after, 80), expected);
});

test("compare breaks new-side score ties by id order", () => {
  assert.deepStrictEqual(compare(collection({ o: "x();" }), collection({ n2: "x();", n1: "x();" }), 80), [
    { oldId: "o", newId: "n1", score: 100, status: "reviewed" },
    { newId: "n2", status: "added" }
  ]);
});

test("compare treats a shared id as unchanged before scoring the rest", () => {
  const before = collection({ h1: "keep();", h2: "foo(a,b);" });
  const after = collection({ h1: "rewritten entirely", h3: "bar(a,b);" });
  assert.deepStrictEqual(compare(before, after, 80), [
    { oldId: "h1", newId: "h1", score: 100, status: "reviewed" },
    { oldId: "h2", newId: "h3", score: 70, status: "needs_review" }
  ]);
});

test("compare accounts for every id exactly once", () => {
  const before = collection({ a: "open(f);", b: "read(f, 10);", c: "close(f);", d: "zzz" });
  const after = collection({ a: "open(f);", e: "read(f, 20);", g: "write(f);", h: "flush(f);", i: "q" });
  const ids = idsOf(compare(before, after, 80));
  assert.deepStrictEqual([...ids.old].sort(), ["a", "b", "c", "d"]);
  assert.deepStrictEqual([...ids.new].sort(), ["a", "e", "g", "h", "i"]);
});

test("compare returns frozen results", () => {
  const [result] = compare(collection({ h1: "a();" }), EMPTY, 80);
  assert.ok(Object.isFrozen(result));
});

test("compare reports its work to the logger", () => {
  const records: Array<{ message: string; meta?: Record<string, unknown> }> = [];
  const logger: Logger = {
    debug: (message, meta) => records.push({ message, meta }),
    info: () => {},
    warn: () => {},
    error: () => {}
  };
  compare(collection({ h1: "a();", h2: "b(1);" }), collection({ h1: "a();", n1: "b(2);" }), 80, { logger });
  assert.deepStrictEqual(records, [
    {
      message: "Snippet comparison complete",
      meta: {
        oldCount: 2,
        newCount: 2,
        unchanged: 1,
        scoredPairs: 1,
        committedPairs: 1,
        threshold: 80,
        minPairScore: 1
      }
    }
  ]);
});

test("compare rejects an out-of-range threshold", () => {
  const snippets = collection({ h1: "a();" });
  assert.throws(() => compare(snippets, snippets, 101), ThresholdInvalidError);
  assert.throws(() => compare(snippets, snippets, 50.5), ThresholdInvalidError);
  assert.throws(() => compare(snippets, snippets, 80, { minPairScore: -1 }), ThresholdInvalidError);
});

test("compare fails fast on malformed snippets", () => {
  const nullCode: SnippetCollection = new Map(JSON.parse('[["h1", { "id": "h1", "code": null }]]'));
  assert.throws(() => compare(nullCode, EMPTY, 80), SnippetCodeInvalidError);

  const mismatched: SnippetCollection = new Map([["k1", { id: "h1", code: "a();" }]]);
  assert.throws(() => compare(mismatched, EMPTY, 80), SnippetIdMismatchError);
});

test("toSnippetCollection rejects duplicate ids", () => {
  assert.throws(
    () =>
      toSnippetCollection([
        { id: "h1", code: "a();" },
        { id: "h1", code: "b();" }
      ]),
    DuplicateSnippetIdError
  );
});
