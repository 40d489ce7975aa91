import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";

import {
  CONFIG_FILE,
  LOCAL_CONFIG_FILE,
  loadConfig,
  normalizeScopes,
  type DocLinksConfig,
} from "../../src/config.js";
import { ConfigError } from "../../src/errors.js";
import { makeTempDir, writeFile } from "../helpers/docs.js";

async function writeConfig(
  dir: string,
  file: string,
  config: DocLinksConfig,
): Promise<void> {
  await writeFile(dir, file, `${JSON.stringify(config, null, 2)}\n`);
}

test("config: defaults apply without config files", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);

  const config = await loadConfig(tmp.dir);
  assert.equal(config.cwd, tmp.dir);
  assert.equal(config.docsRoot, "docs");
  assert.deepEqual(config.links, {
    extension: ".md",
    helpers: ["relative_url"],
    denylist: ["SECURITY", "RELEASE", "LICENSE", "NOTICE", "COPYING", "AUTHORS"],
    scopes: [],
  });
  assert.deepEqual(config.ignore, []);
});

test("config: local file overrides the repo file", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);
  await writeConfig(tmp.dir, CONFIG_FILE, {
    docs: { root: "./documentation/" },
    links: { helpers: ["relative_url", "absolute_url"], scopes: ["commands"] },
    ignore: ["documentation/generated/**"],
  });
  await writeConfig(tmp.dir, LOCAL_CONFIG_FILE, {
    links: { scopes: ["/reference/", "reference"] },
  });

  const config = await loadConfig(tmp.dir);
  assert.equal(config.docsRoot, "documentation");
  assert.deepEqual(config.links.helpers, ["relative_url", "absolute_url"]);
  assert.deepEqual(config.links.scopes, ["reference"]);
  assert.deepEqual(config.ignore, ["documentation/generated/**"]);
});

test("config: an absolute docs root inside cwd is made relative", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);
  await writeConfig(tmp.dir, CONFIG_FILE, {
    docs: { root: path.join(tmp.dir, "site", "docs") },
  });

  const config = await loadConfig(tmp.dir);
  assert.equal(config.docsRoot, "site/docs");
});

test("config: an empty file is treated as absent", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);
  await writeFile(tmp.dir, CONFIG_FILE, "  \n");

  const config = await loadConfig(tmp.dir);
  assert.equal(config.docsRoot, "docs");
});

test("config: invalid values are config errors", async (t) => {
  const cases: Array<{ body: string; message: RegExp }> = [
    {
      body: JSON.stringify({ links: { helpers: "relative_url" } }),
      message: /^links\.helpers must be an array of strings$/,
    },
    {
      body: JSON.stringify({ links: { extension: "md" } }),
      message: /^links\.extension must look like "\.md", got: "md"$/,
    },
    {
      body: JSON.stringify({ docs: { root: "../elsewhere" } }),
      message: /^docs\.root must be inside .*: \.\.\/elsewhere$/,
    },
    {
      body: JSON.stringify({ links: { scopes: ["../outside"] } }),
      message: /^links\.scopes must stay inside the docs root: \.\.\/outside$/,
    },
    {
      body: JSON.stringify({ links: [] }),
      message: /^links must be an object$/,
    },
    {
      body: "[]",
      message: /Config must be a JSON object at the top level\.$/,
    },
    {
      body: "{ not json",
      message: /^Failed to read config /,
    },
  ];

  for (const { body, message } of cases) {
    const tmp = await makeTempDir();
    t.after(tmp.cleanup);
    await writeFile(tmp.dir, CONFIG_FILE, body);

    await assert.rejects(
      () => loadConfig(tmp.dir),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.equal(err.kind, "config");
        assert.match(err.message, message);
        return true;
      },
    );
  }
});

test("config: normalizeScopes trims separators and drops duplicates", () => {
  assert.deepEqual(
    normalizeScopes(["./commands/", "commands", "api\\v1", ".", ""]),
    ["commands", "api/v1"],
  );
});
