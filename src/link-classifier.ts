import path from "node:path";

import { splitFragment, stripLeadingSeparator } from "./paths.js";

export const DEFAULT_LINK_EXTENSION = ".md";
export const DEFAULT_LINK_HELPERS = ["relative_url"];

// Extensionless files that live outside the docs tree. Case-sensitive.
export const DEFAULT_LINK_DENYLIST = [
  "SECURITY",
  "RELEASE",
  "LICENSE",
  "NOTICE",
  "COPYING",
  "AUTHORS",
];

export type LinkRules = {
  extension: string;
  helpers: ReadonlySet<string>;
  denylist: ReadonlySet<string>;
  scopes: readonly string[];
};

export type LinkRulesOptions = {
  extension?: string;
  helpers?: string[];
  denylist?: string[];
  scopes?: string[];
};

export type ExclusionReason =
  | "external"
  | "mail"
  | "fragment-only"
  | "canonical"
  | "denylisted"
  | "asset"
  | "directory"
  | "unrecognized";

export type TemplateRelativeLink = {
  kind: "template-relative";
  helper: string;
  path: string;
  fragment: string | null;
};

export type BareExtensionlessLink = {
  kind: "bare-extensionless";
  path: string;
  fragment: string | null;
};

export type PathPrefixedLink = {
  kind: "path-prefixed";
  scope: string;
  path: string;
  fragment: string | null;
};

export type ExcludedLink = { kind: "excluded"; reason: ExclusionReason };

export type LinkConvention =
  | TemplateRelativeLink
  | BareExtensionlessLink
  | PathPrefixedLink
  | ExcludedLink;

// {{ '/path' | helper }}#fragment, quotes optional.
const TEMPLATE_RE =
  /^\{\{\s*(?:(['"])(.*?)\1|([^\s'"|}]+))\s*\|\s*([A-Za-z_][\w-]*)\s*\}\}(?:#(.*))?$/;
const SCHEME_RE = /^[A-Za-z][A-Za-z0-9+.-]*:/;
const MAILTO_RE = /^mailto:/i;
const ASSET_EXT_RE = /\.[A-Za-z0-9]{1,8}$/;
const UNRECOGNIZED_PATH_RE = /[\s?<>()]/;

export function createLinkRules(options: LinkRulesOptions = {}): LinkRules {
  return {
    extension: options.extension ?? DEFAULT_LINK_EXTENSION,
    helpers: new Set(options.helpers ?? DEFAULT_LINK_HELPERS),
    denylist: new Set(options.denylist ?? DEFAULT_LINK_DENYLIST),
    scopes: (options.scopes ?? [])
      .map((scope) => scope.replace(/^\/+|\/+$/g, ""))
      .filter(Boolean),
  };
}

function excluded(reason: ExclusionReason): ExcludedLink {
  return { kind: "excluded", reason };
}

function isExternal(target: string): boolean {
  return SCHEME_RE.test(target) || target.startsWith("//");
}

function isDirectoryPath(linkPath: string): boolean {
  if (linkPath === "" || linkPath.endsWith("/")) return true;
  const base = path.posix.basename(linkPath);
  return base === "." || base === "..";
}

function hasCanonicalExtension(linkPath: string, rules: LinkRules): boolean {
  return linkPath.toLowerCase().endsWith(rules.extension.toLowerCase());
}

function isDenylisted(linkPath: string, rules: LinkRules): boolean {
  return rules.denylist.has(path.posix.basename(linkPath));
}

/**
 * Whether the canonical extension should be appended to `linkPath` (a path
 * with its fragment already split off).
 */
export function needsExtension(linkPath: string, rules: LinkRules): boolean {
  if (isDirectoryPath(linkPath)) return false;
  if (linkPath.startsWith("#") || isExternal(linkPath)) return false;
  if (isDenylisted(linkPath, rules)) return false;
  if (hasCanonicalExtension(linkPath, rules)) return false;
  return !ASSET_EXT_RE.test(path.posix.basename(linkPath));
}

function findScope(
  linkPath: string,
  rules: LinkRules,
  docPath: string,
): string | null {
  const docDir = path.posix.dirname(docPath);
  for (const scope of rules.scopes) {
    const insideScope = docDir === scope || docDir.startsWith(`${scope}/`);
    if (insideScope && linkPath.startsWith(`${scope}/`)) return scope;
  }
  return null;
}

function classifyTemplate(
  match: RegExpMatchArray,
  rules: LinkRules,
): LinkConvention {
  const helper = match[4];
  if (!rules.helpers.has(helper)) return excluded("unrecognized");

  const operand = (match[2] ?? match[3] ?? "").trim();
  const [operandPath, operandFragment] = splitFragment(operand);
  const fragment = match[5] ?? operandFragment;
  if (stripLeadingSeparator(operandPath) === "" && fragment === null)
    return excluded("unrecognized");

  return { kind: "template-relative", helper, path: operandPath, fragment };
}

/**
 * Decides which linking convention `target` uses. `docPath` is the
 * referencing document's path relative to the docs root; it only matters
 * for scoped (path-prefixed) links.
 */
export function classifyLink(
  target: string,
  rules: LinkRules,
  docPath: string,
): LinkConvention {
  const raw = target.trim();
  if (!raw) return excluded("unrecognized");

  const template = raw.match(TEMPLATE_RE);
  if (template) return classifyTemplate(template, rules);

  if (raw.startsWith("#")) return excluded("fragment-only");
  if (MAILTO_RE.test(raw)) return excluded("mail");
  if (isExternal(raw)) return excluded("external");

  const [linkPath, fragment] = splitFragment(raw);
  if (UNRECOGNIZED_PATH_RE.test(linkPath)) return excluded("unrecognized");

  const stripped = stripLeadingSeparator(linkPath);
  if (isDirectoryPath(stripped)) return excluded("directory");

  const scope = findScope(stripped, rules, docPath);
  if (scope) return { kind: "path-prefixed", scope, path: stripped, fragment };

  if (isDenylisted(stripped, rules)) return excluded("denylisted");
  if (hasCanonicalExtension(stripped, rules)) return excluded("canonical");
  if (ASSET_EXT_RE.test(path.posix.basename(stripped)))
    return excluded("asset");

  return { kind: "bare-extensionless", path: linkPath, fragment };
}
