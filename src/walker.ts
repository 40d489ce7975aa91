import fs from "node:fs/promises";
import path from "node:path";

import { EnvironmentError } from "./errors.js";

const SKIPPED_DIRS = new Set<string>(["node_modules"]);

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

async function walk(
  dirAbs: string,
  dirRel: string,
  extension: string,
  out: string[],
): Promise<void> {
  const entries = await fs.readdir(dirAbs, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const relPath = path.posix.join(dirRel, entry.name);
    if (entry.isDirectory()) {
      if (entry.name.startsWith(".") || SKIPPED_DIRS.has(entry.name)) continue;
      await walk(path.join(dirAbs, entry.name), relPath, extension, out);
      continue;
    }
    if (entry.isFile() && entry.name.toLowerCase().endsWith(extension))
      out.push(relPath);
  }
}

/**
 * Lists documents with `extension` below `docsRoot`, depth first in name
 * order. Paths are POSIX and relative to `cwd`.
 */
export async function listDocuments(
  cwd: string,
  docsRoot: string,
  extension: string,
): Promise<string[]> {
  const rootAbs = path.join(cwd, ...docsRoot.split("/"));
  let stat: { isDirectory(): boolean };
  try {
    stat = await fs.stat(rootAbs);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT")
      throw new EnvironmentError(`docs directory not found: ${docsRoot}`);
    throw err;
  }
  if (!stat.isDirectory())
    throw new EnvironmentError(`docs root is not a directory: ${docsRoot}`);

  const out: string[] = [];
  await walk(rootAbs, docsRoot, extension.toLowerCase(), out);
  return out;
}
