import process from "node:process";

import {
  createFileStore,
  loadDocument,
  normalizeDocument,
  saveDocument,
  type Document,
  type DocumentStore,
  type LinkRewrite,
} from "./document.js";
import { DocumentIoError } from "./errors.js";
import { buildIgnoreMatcher } from "./ignore.js";
import { createLinkRules, type LinkRules } from "./link-classifier.js";
import { docPathWithinRoot, normalizeDocsRoot } from "./paths.js";
import { listDocuments } from "./walker.js";

export type LinkFixAction = {
  type: "links";
  path: string;
  rewrites: LinkRewrite[];
  content: string;
};

export type LinkFixPlan = {
  cwd: string;
  docsRoot: string;
  /** Every document discovered, after ignore globs. */
  documents: string[];
  actions: LinkFixAction[];
  failures: DocumentIoError[];
};

export type LinkFixReport = {
  discovered: number;
  fixed: string[];
  failures: DocumentIoError[];
};

export type ScanProgress = { phase: "scan"; current: number; total: number };

export type LinkFixPlanOptions = {
  cwd?: string;
  docsRoot?: string;
  rules?: LinkRules;
  ignore?: string[];
  store?: DocumentStore;
  onProgress?: (info: ScanProgress) => void;
};

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function formatActions(actions: LinkFixAction[]): string {
  const lines: string[] = [];
  for (const action of actions) {
    lines.push(`- update links: ${action.path} (${action.rewrites.length})`);
    for (const rewrite of action.rewrites)
      lines.push(`    ${rewrite.from} -> ${rewrite.to}`);
  }
  return lines.join("\n");
}

export function formatFailures(failures: DocumentIoError[]): string {
  return failures.map((failure) => failure.message).join("\n");
}

/** Failures added while writing; read failures were reported with the plan. */
export function formatWriteFailures(report: LinkFixReport): string {
  return formatFailures(
    report.failures.filter((failure) => failure.operation === "write"),
  );
}

export function formatDiscovered(count: number): string {
  return `Found ${plural(count, "markdown file")}`;
}

export function formatFixedSummary(report: LinkFixReport): string {
  return `Fixed ${plural(report.fixed.length, "file")}`;
}

/**
 * Reads and normalizes every document under the docs root without writing
 * anything. Unreadable documents are recorded in `failures`; a missing docs
 * root throws an `EnvironmentError` before any document is read.
 */
export async function planLinkFixes(
  options: LinkFixPlanOptions = {},
): Promise<LinkFixPlan> {
  const cwd = options.cwd ?? process.cwd();
  const docsRoot = normalizeDocsRoot(options.docsRoot);
  const rules = options.rules ?? createLinkRules();
  const store = options.store ?? createFileStore(cwd);
  const isIgnored = buildIgnoreMatcher(options.ignore ?? []);

  const discovered = await listDocuments(cwd, docsRoot, rules.extension);
  const documents = discovered.filter((relPath) => !isIgnored(relPath));

  const actions: LinkFixAction[] = [];
  const failures: DocumentIoError[] = [];
  for (const [idx, relPath] of documents.entries()) {
    options.onProgress?.({
      phase: "scan",
      current: idx + 1,
      total: documents.length,
    });

    let loaded: Document;
    try {
      loaded = await loadDocument(store, relPath);
    } catch (err) {
      if (!(err instanceof DocumentIoError)) throw err;
      failures.push(err);
      continue;
    }

    const { document, rewrites } = normalizeDocument(
      loaded,
      rules,
      docPathWithinRoot(docsRoot, relPath),
    );
    if (!document.changed) continue;
    actions.push({
      type: "links",
      path: relPath,
      rewrites,
      content: document.content,
    });
  }

  return { cwd, docsRoot, documents, actions, failures };
}

/**
 * Writes each planned document in order. A failed write is recorded and
 * the remaining documents are still written.
 */
export async function runLinkFixPlan(
  plan: LinkFixPlan,
  options?: {
    store?: DocumentStore;
    onFixed?: (relPath: string) => void;
    onFailure?: (failure: DocumentIoError) => void;
  },
): Promise<LinkFixReport> {
  const store = options?.store ?? createFileStore(plan.cwd);
  const fixed: string[] = [];
  const failures = [...plan.failures];

  for (const action of plan.actions) {
    try {
      const written = await saveDocument(store, {
        path: action.path,
        content: action.content,
        changed: true,
      });
      if (!written) continue;
      fixed.push(action.path);
      options?.onFixed?.(action.path);
    } catch (err) {
      if (!(err instanceof DocumentIoError)) throw err;
      failures.push(err);
      options?.onFailure?.(err);
    }
  }

  return { discovered: plan.documents.length, fixed, failures };
}
