import path from "node:path";

export const DEFAULT_DOCS_ROOT = "docs";

export function normalizeDocsRoot(root?: string): string {
  const normalized = (root ?? DEFAULT_DOCS_ROOT)
    .replace(/\\/g, "/")
    .replace(/^\.\/+/, "")
    .replace(/\/+$/, "");
  if (!normalized || normalized === ".") return DEFAULT_DOCS_ROOT;
  return normalized;
}

export function toPosixRelPath(p: string): string {
  return p.split(path.sep).join(path.posix.sep);
}

/** `docs/commands/build.md` -> `commands/build.md` for docs root `docs`. */
export function docPathWithinRoot(docsRoot: string, relPath: string): string {
  return path.posix.relative(docsRoot, relPath);
}

export function stripLeadingSeparator(linkPath: string): string {
  return linkPath.startsWith("/") ? linkPath.slice(1) : linkPath;
}

export function splitFragment(target: string): [string, string | null] {
  const hash = target.indexOf("#");
  if (hash === -1) return [target, null];
  return [target.slice(0, hash), target.slice(hash + 1)];
}
