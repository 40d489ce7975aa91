import test from "node:test";
import assert from "node:assert/strict";

import { runCli } from "../../src/cli/index.js";
import { runFix } from "../../src/cli/fix.js";
import { CONFIG_FILE } from "../../src/config.js";
import {
  makeTempDir,
  readFile,
  takeExitCode,
  withCwd,
  writeFile,
} from "../helpers/docs.js";

test("fix: rewrites links in place with --yes", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);
  await writeFile(
    tmp.dir,
    "docs/index.md",
    "[Guide]({{ '/setup' | relative_url }}) [Repo](https://example.com/repo)\n",
  );
  await writeFile(tmp.dir, "docs/setup.md", "[Home](index.md)\n");

  await withCwd(tmp.dir, async () => {
    await runFix({ dryRun: false, yes: true });
  });

  assert.equal(takeExitCode(), undefined);
  assert.equal(
    await readFile(tmp.dir, "docs/index.md"),
    "[Guide](setup.md) [Repo](https://example.com/repo)\n",
  );
  assert.equal(await readFile(tmp.dir, "docs/setup.md"), "[Home](index.md)\n");
});

test("fix: --dry-run leaves documents untouched", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);
  await writeFile(tmp.dir, "docs/index.md", "[Guide](/setup)\n");

  await withCwd(tmp.dir, async () => {
    await runFix({ dryRun: true, yes: false });
  });

  assert.equal(takeExitCode(), undefined);
  assert.equal(await readFile(tmp.dir, "docs/index.md"), "[Guide](/setup)\n");
});

test("fix: a missing docs root exits with an error", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);

  await withCwd(tmp.dir, async () => {
    await runFix({ dryRun: false, yes: true });
  });

  assert.equal(takeExitCode(), 1);
});

test("fix: an invalid config exits with an error and writes nothing", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);
  await writeFile(tmp.dir, CONFIG_FILE, '{ "links": { "extension": "md" } }\n');
  await writeFile(tmp.dir, "docs/index.md", "[Guide](/setup)\n");

  await withCwd(tmp.dir, async () => {
    await runFix({ dryRun: false, yes: true });
  });

  assert.equal(takeExitCode(), 1);
  assert.equal(await readFile(tmp.dir, "docs/index.md"), "[Guide](/setup)\n");
});

test("cli: defaults to fix and honours --root", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);
  await writeFile(tmp.dir, "documentation/intro.md", "[Next](next#usage)\n");
  await writeFile(tmp.dir, "docs/index.md", "[Guide](/setup)\n");

  await withCwd(tmp.dir, async () => {
    await runCli(["node", "doclinks", "--root", "documentation", "-y"]);
  });

  assert.equal(takeExitCode(), undefined);
  assert.equal(
    await readFile(tmp.dir, "documentation/intro.md"),
    "[Next](next.md#usage)\n",
  );
  assert.equal(await readFile(tmp.dir, "docs/index.md"), "[Guide](/setup)\n");
});

test("cli: --scope makes self-prefixed links same-directory", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);
  await writeFile(
    tmp.dir,
    "docs/commands/run.md",
    "[Build](commands/build) [Deep](commands/admin/reset)\n",
  );
  await writeFile(
    tmp.dir,
    "docs/commands/admin/users.md",
    "[Run](commands/run)\n",
  );

  await withCwd(tmp.dir, async () => {
    await runCli(["node", "doclinks", "fix", "--scope", "commands", "-y"]);
  });

  assert.equal(takeExitCode(), undefined);
  assert.equal(
    await readFile(tmp.dir, "docs/commands/run.md"),
    "[Build](build.md) [Deep](admin/reset.md)\n",
  );
  assert.equal(
    await readFile(tmp.dir, "docs/commands/admin/users.md"),
    "[Run](../run.md)\n",
  );
});

test("cli: scopes from the config file apply without --scope", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);
  await writeFile(
    tmp.dir,
    CONFIG_FILE,
    `${JSON.stringify({ links: { scopes: ["commands"] } })}\n`,
  );
  await writeFile(tmp.dir, "docs/commands/run.md", "[Build](commands/build)\n");

  await withCwd(tmp.dir, async () => {
    await runCli(["node", "doclinks", "-y"]);
  });

  assert.equal(
    await readFile(tmp.dir, "docs/commands/run.md"),
    "[Build](build.md)\n",
  );
});

test("cli: an unknown option sets a failing exit code", async (t) => {
  const tmp = await makeTempDir();
  t.after(tmp.cleanup);
  await writeFile(tmp.dir, "docs/index.md", "[Guide](/setup)\n");

  await withCwd(tmp.dir, async () => {
    await runCli(["node", "doclinks", "fix", "--bogus"]);
  });

  assert.equal(takeExitCode(), 1);
  assert.equal(await readFile(tmp.dir, "docs/index.md"), "[Guide](/setup)\n");
});
