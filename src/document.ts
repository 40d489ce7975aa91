import fs from "node:fs/promises";
import path from "node:path";

import { DocumentIoError } from "./errors.js";
import { classifyLink, type LinkRules } from "./link-classifier.js";
import { renderLink, rewriteLink, type RewriteResult } from "./rewriter.js";
import { scanLinks, type LinkMatch } from "./scanner.js";

export type Document = {
  /** POSIX path relative to the working directory. */
  path: string;
  content: string;
  changed: boolean;
};

export type DocumentStore = {
  read(relPath: string): Promise<string>;
  write(relPath: string, content: string): Promise<void>;
};

export type LinkRewrite = { from: string; to: string };

export function createFileStore(rootAbs: string): DocumentStore {
  const resolve = (relPath: string): string =>
    path.join(rootAbs, ...relPath.split("/"));
  return {
    read: async (relPath) => await fs.readFile(resolve(relPath), "utf8"),
    write: async (relPath, content) => {
      await fs.writeFile(resolve(relPath), content, "utf8");
    },
  };
}

export async function loadDocument(
  store: DocumentStore,
  relPath: string,
): Promise<Document> {
  try {
    const content = await store.read(relPath);
    return { path: relPath, content, changed: false };
  } catch (err) {
    throw new DocumentIoError(relPath, "read", err);
  }
}

/**
 * Writes the full content of a changed document. Returns false without
 * touching the store when nothing changed.
 */
export async function saveDocument(
  store: DocumentStore,
  doc: Document,
): Promise<boolean> {
  if (!doc.changed) return false;
  try {
    await store.write(doc.path, doc.content);
  } catch (err) {
    throw new DocumentIoError(doc.path, "write", err);
  }
  return true;
}

/**
 * Substitutes each rewritten match, keeping every other span verbatim.
 * `results[i]` belongs to `matches[i]`; matches are in document order.
 */
export function applyLinkRewrites(
  doc: Document,
  matches: LinkMatch[],
  results: RewriteResult[],
): Document {
  let content = "";
  let cursor = 0;
  for (const [idx, match] of matches.entries()) {
    const result = results[idx];
    if (!result || result.kind === "unchanged") continue;
    content += doc.content.slice(cursor, match.start);
    content += renderLink(match, result);
    cursor = match.end;
  }
  content += doc.content.slice(cursor);

  if (content === doc.content) return doc;
  return { path: doc.path, content, changed: true };
}

export function normalizeDocument(
  doc: Document,
  rules: LinkRules,
  docPath: string,
): { document: Document; rewrites: LinkRewrite[] } {
  const matches = [...scanLinks(doc.content)];
  const results = matches.map((match) =>
    rewriteLink(
      match,
      classifyLink(match.target, rules, docPath),
      rules,
      docPath,
    ),
  );

  const rewrites: LinkRewrite[] = [];
  for (const [idx, match] of matches.entries()) {
    const result = results[idx];
    if (result.kind === "unchanged") continue;
    rewrites.push({
      from: doc.content.slice(match.start, match.end),
      to: renderLink(match, result),
    });
  }

  return { document: applyLinkRewrites(doc, matches, results), rewrites };
}
