import process from "node:process";
import { cancel } from "@clack/prompts";

import { loadConfig, normalizeScopes } from "../config.js";
import { createLinkRules, type LinkRules } from "../link-classifier.js";
import { normalizeDocsRoot } from "../paths.js";

export type RunSettingsOptions = {
  root?: string;
  scope?: string[];
};

export type RunSettings = {
  cwd: string;
  docsRoot: string;
  rules: LinkRules;
  ignore: string[];
};

export function abort(message = "Aborted."): void {
  cancel(message);
  process.exitCode = 1;
}

export function hasInteractiveTty(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

/** Config file values, with `--root` and `--scope` taking precedence. */
export async function loadRunSettings(
  options: RunSettingsOptions,
): Promise<RunSettings> {
  const cwd = process.cwd();
  const config = await loadConfig(cwd);
  const docsRoot = options.root
    ? normalizeDocsRoot(options.root)
    : config.docsRoot;
  const scopes =
    options.scope && options.scope.length > 0
      ? normalizeScopes(options.scope)
      : config.links.scopes;

  return {
    cwd,
    docsRoot,
    rules: createLinkRules({ ...config.links, scopes }),
    ignore: config.ignore,
  };
}
