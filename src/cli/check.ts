import process from "node:process";

import { EnvironmentError, getErrorMessage } from "../errors.js";
import {
  formatActions,
  formatFailures,
  planLinkFixes,
} from "../normalizer.js";
import { loadRunSettings, type RunSettingsOptions } from "./flow.js";
import { MAX_STEP_FILE_PREVIEW_LINES, limitLines } from "./ui.js";

export type CheckOptions = RunSettingsOptions;

export async function runCheck(options: CheckOptions = {}): Promise<void> {
  try {
    const settings = await loadRunSettings(options);
    const plan = await planLinkFixes({
      cwd: settings.cwd,
      docsRoot: settings.docsRoot,
      rules: settings.rules,
      ignore: settings.ignore,
    });

    if (plan.actions.length === 0 && plan.failures.length === 0) {
      process.stdout.write("OK: all links use the canonical form.\n");
      return;
    }

    process.stdout.write("doclinks check failed.\n\n");

    const summaryLines: string[] = [];
    const rewriteCount = plan.actions.length;
    if (rewriteCount > 0)
      summaryLines.push(
        `- Rewrite links to canonical form: ${rewriteCount} file${rewriteCount === 1 ? "" : "s"}`,
      );
    const failureCount = plan.failures.length;
    if (failureCount > 0)
      summaryLines.push(
        `- Unreadable documents: ${failureCount} file${failureCount === 1 ? "" : "s"}`,
      );
    process.stdout.write(`${summaryLines.join("\n")}\n\n`);

    if (rewriteCount > 0) {
      const preview = limitLines(
        formatActions(plan.actions),
        MAX_STEP_FILE_PREVIEW_LINES,
      );
      process.stdout.write(`${preview}\n\n`);
    }
    if (failureCount > 0)
      process.stderr.write(`${formatFailures(plan.failures)}\n\n`);

    process.stdout.write("Run `doclinks fix` to fix.\n");
    process.exitCode = 1;
  } catch (err) {
    if (err instanceof EnvironmentError)
      process.stderr.write(`Error: ${err.message}\n`);
    else process.stderr.write(`${getErrorMessage(err)}\n`);
    process.exitCode = 1;
  }
}
