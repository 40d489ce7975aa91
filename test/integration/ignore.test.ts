import test from "node:test";
import assert from "node:assert/strict";

import { buildIgnoreMatcher } from "../../src/ignore.js";

test("ignore: an empty pattern list ignores nothing", () => {
  const isIgnored = buildIgnoreMatcher(["", "   "]);
  assert.equal(isIgnored("docs/index.md"), false);
});

test("ignore: single star stays within one path segment", () => {
  const isIgnored = buildIgnoreMatcher(["docs/*.md"]);
  assert.equal(isIgnored("docs/index.md"), true);
  assert.equal(isIgnored("docs/guide/intro.md"), false);
});

test("ignore: double star crosses directories", () => {
  const isIgnored = buildIgnoreMatcher(["**/draft-*.md"]);
  assert.equal(isIgnored("draft-one.md"), true);
  assert.equal(isIgnored("docs/draft-one.md"), true);
  assert.equal(isIgnored("docs/guide/draft-two.md"), true);
  assert.equal(isIgnored("docs/guide/final.md"), false);
});

test("ignore: a trailing double star covers the directory itself", () => {
  const isIgnored = buildIgnoreMatcher(["./docs/generated/**"]);
  assert.equal(isIgnored("docs/generated"), true);
  assert.equal(isIgnored("docs/generated/api/index.md"), true);
  assert.equal(isIgnored("docs/generated-notes.md"), false);
});

test("ignore: question mark matches one character", () => {
  const isIgnored = buildIgnoreMatcher(["docs/v?.md"]);
  assert.equal(isIgnored("docs/v1.md"), true);
  assert.equal(isIgnored("docs/v10.md"), false);
});

test("ignore: a later negation re-includes a path", () => {
  const isIgnored = buildIgnoreMatcher([
    "docs/generated/**",
    "!docs/generated/keep.md",
  ]);
  assert.equal(isIgnored("docs/generated/api.md"), true);
  assert.equal(isIgnored("docs/generated/keep.md"), false);

  const reordered = buildIgnoreMatcher([
    "!docs/generated/keep.md",
    "docs/generated/**",
  ]);
  assert.equal(reordered("docs/generated/keep.md"), true);
});

test("ignore: dots in patterns are literal", () => {
  const isIgnored = buildIgnoreMatcher(["docs/a.md"]);
  assert.equal(isIgnored("docs/a.md"), true);
  assert.equal(isIgnored("docs/abmd"), false);
});
