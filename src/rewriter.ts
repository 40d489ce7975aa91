import path from "node:path";

import type { LinkConvention, LinkRules } from "./link-classifier.js";
import { needsExtension } from "./link-classifier.js";
import { stripLeadingSeparator } from "./paths.js";
import type { LinkMatch } from "./scanner.js";

export type RewriteResult =
  | { kind: "unchanged" }
  | { kind: "rewritten"; text: string; target: string };

function withExtension(linkPath: string, rules: LinkRules): string {
  return needsExtension(linkPath, rules)
    ? `${linkPath}${rules.extension}`
    : linkPath;
}

function withFragment(linkPath: string, fragment: string | null): string {
  return fragment === null ? linkPath : `${linkPath}#${fragment}`;
}

function rewritten(match: LinkMatch, target: string): RewriteResult {
  if (target === match.target) return { kind: "unchanged" };
  return { kind: "rewritten", text: match.text, target };
}

/**
 * Produces the canonical target for a classified link. Pure: the result
 * depends only on the match, its convention, the rules and `docPath` (the
 * referencing document relative to the docs root).
 */
export function rewriteLink(
  match: LinkMatch,
  convention: LinkConvention,
  rules: LinkRules,
  docPath: string,
): RewriteResult {
  switch (convention.kind) {
    case "excluded":
      return { kind: "unchanged" };
    case "template-relative":
    case "bare-extensionless": {
      const linkPath = withExtension(
        stripLeadingSeparator(convention.path),
        rules,
      );
      return rewritten(match, withFragment(linkPath, convention.fragment));
    }
    case "path-prefixed": {
      const relative = path.posix.relative(
        path.posix.dirname(docPath),
        convention.path,
      );
      return rewritten(
        match,
        withFragment(withExtension(relative, rules), convention.fragment),
      );
    }
    default: {
      const exhaustiveCheck: never = convention;
      throw new Error(`Unknown link convention: ${String(exhaustiveCheck)}`);
    }
  }
}

export function renderLink(match: LinkMatch, result: RewriteResult): string {
  if (result.kind === "unchanged")
    return `[${match.text}](${match.target}${match.title})`;
  return `[${result.text}](${result.target}${match.title})`;
}
