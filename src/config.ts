import fs from "node:fs/promises";
import path from "node:path";

import { ConfigError, getErrorMessage } from "./errors.js";
import {
  DEFAULT_LINK_DENYLIST,
  DEFAULT_LINK_EXTENSION,
  DEFAULT_LINK_HELPERS,
} from "./link-classifier.js";
import {
  DEFAULT_DOCS_ROOT,
  normalizeDocsRoot,
  toPosixRelPath,
} from "./paths.js";

type DocsConfig = {
  root?: string;
};

type LinksConfig = {
  extension?: string;
  helpers?: string[];
  denylist?: string[];
  scopes?: string[];
};

export type DocLinksConfig = {
  docs?: DocsConfig;
  links?: LinksConfig;
  ignore?: string[];
};

export type ResolvedDocLinksConfig = {
  cwd: string;
  docsRoot: string;
  links: {
    extension: string;
    helpers: string[];
    denylist: string[];
    scopes: string[];
  };
  ignore: string[];
};

export const CONFIG_FILE = "doclinks.json";
export const LOCAL_CONFIG_FILE = ".doclinks.local.json";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object") return false;
  return Object.getPrototypeOf(value) === Object.prototype;
}

function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = out[key];
    out[key] =
      isPlainObject(existing) && isPlainObject(value)
        ? mergeConfig(existing, value)
        : value;
  }
  return out;
}

async function readConfigFile(
  absPath: string,
): Promise<Record<string, unknown> | null> {
  let raw: string;
  try {
    raw = await fs.readFile(absPath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT")
      return null;
    throw new ConfigError(
      `Failed to read config ${absPath}: ${getErrorMessage(err)}`,
    );
  }

  const trimmed = raw.trim();
  if (trimmed.length === 0) return null;
  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch (err) {
    throw new ConfigError(
      `Failed to read config ${absPath}: ${getErrorMessage(err)}`,
    );
  }
  if (!isPlainObject(data))
    throw new ConfigError(
      `Failed to read config ${absPath}: Config must be a JSON object at the top level.`,
    );
  return data;
}

function normalizeRelPath(
  input: unknown,
  cwd: string,
  fallback: string,
  label: string,
): string {
  if (input === undefined) return fallback;
  if (typeof input !== "string")
    throw new ConfigError(`${label} must be a string`);
  const trimmed = input.trim();
  if (!trimmed) return fallback;

  let relPath = trimmed;
  if (path.isAbsolute(relPath)) {
    const relative = path.relative(cwd, relPath);
    if (!relative || relative.startsWith("..") || path.isAbsolute(relative))
      throw new ConfigError(`${label} must be inside ${cwd}: ${relPath}`);
    relPath = toPosixRelPath(relative);
  }

  relPath = path.posix.normalize(
    relPath.replace(/\\/g, "/").replace(/^\.\//, "").replace(/\/+$/, ""),
  );
  if (relPath === "." || relPath === "") return fallback;
  if (relPath === ".." || relPath.startsWith("../"))
    throw new ConfigError(`${label} must be inside ${cwd}: ${relPath}`);
  return relPath;
}

function normalizeStringList(
  value: unknown,
  label: string,
  fallback: string[],
): string[] {
  if (value === undefined) return [...fallback];
  if (!Array.isArray(value))
    throw new ConfigError(`${label} must be an array of strings`);
  return value
    .map((item: unknown) => {
      if (typeof item !== "string")
        throw new ConfigError(`${label} must be an array of strings`);
      return item.trim();
    })
    .filter((item) => item.length > 0);
}

function normalizeExtension(value: unknown): string {
  if (value === undefined) return DEFAULT_LINK_EXTENSION;
  if (typeof value !== "string")
    throw new ConfigError("links.extension must be a string");
  const trimmed = value.trim();
  if (!/^\.[A-Za-z0-9]+$/.test(trimmed))
    throw new ConfigError(
      `links.extension must look like ".md", got: ${JSON.stringify(value)}`,
    );
  return trimmed;
}

/** Scopes are directories relative to the docs root. */
export function normalizeScopes(scopes: string[]): string[] {
  const out: string[] = [];
  for (const scope of scopes) {
    const normalized = path.posix.normalize(
      scope.replace(/\\/g, "/").replace(/^\.?\/+/, "").replace(/\/+$/, ""),
    );
    if (normalized === "." || normalized === "") continue;
    if (normalized === ".." || normalized.startsWith("../"))
      throw new ConfigError(
        `links.scopes must stay inside the docs root: ${scope}`,
      );
    if (!out.includes(normalized)) out.push(normalized);
  }
  return out;
}

function getSection(
  merged: Record<string, unknown>,
  key: string,
): Record<string, unknown> {
  const value = merged[key];
  if (value === undefined) return {};
  if (!isPlainObject(value)) throw new ConfigError(`${key} must be an object`);
  return value;
}

/**
 * Loads `doclinks.json` from `cwd` and merges `.doclinks.local.json` over
 * it. Both files are optional.
 */
export async function loadConfig(
  cwd: string,
): Promise<ResolvedDocLinksConfig> {
  const repoConfig = (await readConfigFile(path.join(cwd, CONFIG_FILE))) ?? {};
  const localConfig =
    (await readConfigFile(path.join(cwd, LOCAL_CONFIG_FILE))) ?? {};
  const merged = mergeConfig(repoConfig, localConfig);

  const docs = getSection(merged, "docs");
  const links = getSection(merged, "links");

  const docsRoot = normalizeDocsRoot(
    normalizeRelPath(docs.root, cwd, DEFAULT_DOCS_ROOT, "docs.root"),
  );

  return {
    cwd,
    docsRoot,
    links: {
      extension: normalizeExtension(links.extension),
      helpers: normalizeStringList(
        links.helpers,
        "links.helpers",
        DEFAULT_LINK_HELPERS,
      ),
      denylist: normalizeStringList(
        links.denylist,
        "links.denylist",
        DEFAULT_LINK_DENYLIST,
      ),
      scopes: normalizeScopes(
        normalizeStringList(links.scopes, "links.scopes", []),
      ),
    },
    ignore: normalizeStringList(merged.ignore, "ignore", []),
  };
}
