import process from "node:process";
import { intro, outro, spinner } from "@clack/prompts";

import { EnvironmentError, getErrorMessage } from "../errors.js";
import {
  formatActions,
  formatDiscovered,
  formatFailures,
  formatFixedSummary,
  formatWriteFailures,
  planLinkFixes,
  runLinkFixPlan,
  type LinkFixPlan,
} from "../normalizer.js";
import {
  abort,
  hasInteractiveTty,
  loadRunSettings,
  type RunSettingsOptions,
} from "./flow.js";
import {
  MAX_STEP_FILE_PREVIEW_LINES,
  createScanProgressBarReporter,
  limitLines,
  noteTruncated,
  promptConfirm,
} from "./ui.js";

export type FixOptions = RunSettingsOptions & {
  dryRun: boolean;
  yes: boolean;
};

function printPlannedChanges(plan: LinkFixPlan): void {
  process.stdout.write("\nPlanned changes:\n");
  process.stdout.write(
    `${limitLines(formatActions(plan.actions), MAX_STEP_FILE_PREVIEW_LINES)}\n`,
  );
}

async function applyInteractively(plan: LinkFixPlan): Promise<void> {
  const count = plan.actions.length;
  intro("doclinks fix");
  noteTruncated(
    limitLines(formatActions(plan.actions), MAX_STEP_FILE_PREVIEW_LINES),
    `Proposed: Rewrite links to canonical form (${count})`,
  );

  const apply = await promptConfirm(
    `Rewrite links in ${count} file${count === 1 ? "" : "s"}?`,
    true,
  );
  if (apply === null) return abort("Operation cancelled.");
  if (!apply) return abort();

  const s = spinner();
  s.start("Rewriting links...");
  const report = await runLinkFixPlan(plan);
  s.stop(formatFixedSummary(report));

  for (const relPath of report.fixed)
    process.stdout.write(`  Fixed: ${relPath}\n`);
  const writeFailures = formatWriteFailures(report);
  if (writeFailures) process.stderr.write(`${writeFailures}\n`);
  outro("Review with `git diff` and commit when ready.");
}

export async function runFix(options: FixOptions): Promise<void> {
  try {
    const settings = await loadRunSettings(options);
    const interactive = hasInteractiveTty() && !options.yes && !options.dryRun;

    const plan = await planLinkFixes({
      cwd: settings.cwd,
      docsRoot: settings.docsRoot,
      rules: settings.rules,
      ignore: settings.ignore,
      onProgress: createScanProgressBarReporter(Boolean(process.stderr.isTTY)),
    });

    process.stdout.write(`${formatDiscovered(plan.documents.length)}\n`);
    if (plan.failures.length > 0)
      process.stderr.write(`${formatFailures(plan.failures)}\n`);

    if (plan.actions.length === 0) {
      process.stdout.write("All links already use the canonical form.\n");
      return;
    }

    if (options.dryRun) {
      printPlannedChanges(plan);
      const count = plan.actions.length;
      process.stdout.write(
        `\nWould fix ${count} file${count === 1 ? "" : "s"}\n`,
      );
      return;
    }

    if (interactive) {
      await applyInteractively(plan);
      return;
    }

    process.stdout.write("\nRewriting links...\n");
    const report = await runLinkFixPlan(plan, {
      onFixed: (relPath) => {
        process.stdout.write(`  Fixed: ${relPath}\n`);
      },
      onFailure: (failure) => {
        process.stderr.write(`${failure.message}\n`);
      },
    });
    process.stdout.write(`\n${formatFixedSummary(report)}\n`);
  } catch (err) {
    if (err instanceof EnvironmentError)
      process.stderr.write(`Error: ${err.message}\n`);
    else process.stderr.write(`${getErrorMessage(err)}\n`);
    process.exitCode = 1;
  }
}
