import process from "node:process";
import { Command, CommanderError } from "commander";

import { getErrorMessage } from "../errors.js";
import { runCheck } from "./check.js";
import { runFix } from "./fix.js";

type FixCommandOptions = {
  dryRun: boolean;
  yes: boolean;
  root?: string;
  scope?: string[];
};
type CheckCommandOptions = {
  root?: string;
  scope?: string[];
};

const COMMANDS = new Set(["fix", "check", "help"]);

function shouldDefaultToFix(argvRest: string[]): boolean {
  if (argvRest.length === 0) return true;
  const first = argvRest[0];
  if (COMMANDS.has(first)) return false;
  if (first === "--help" || first === "-h" || first === "--version")
    return false;
  return first.startsWith("-");
}

function withRootAndScope(command: Command): Command {
  return command
    .option("--root <dir>", "Docs root directory (default: docs)")
    .option(
      "--scope <dir...>",
      "Subtrees (relative to the docs root) whose self-prefixed links are made same-directory",
    );
}

export async function runCli(argv: string[]): Promise<void> {
  const program = new Command();
  program
    .name("doclinks")
    .description(
      "Rewrite links in a Markdown docs tree to plain relative paths with explicit extensions.",
    )
    .showHelpAfterError()
    .showSuggestionAfterError();

  program.exitOverride();
  program.usage("[command] [options]");

  withRootAndScope(
    program
      .command("fix")
      .description("Rewrite non-canonical links in place (default command)."),
  )
    .option("--dry-run", "Print planned changes and exit", false)
    .option("-y, --yes", "Apply without prompting", false)
    .action(async (options: FixCommandOptions) => {
      await runFix(options);
    });

  withRootAndScope(
    program
      .command("check")
      .description("Fail if any link would be rewritten (use in CI)."),
  ).action(async (options: CheckCommandOptions) => {
    await runCheck(options);
  });

  const rest = argv.slice(2);
  const argvToParse = shouldDefaultToFix(rest)
    ? [...argv.slice(0, 2), "fix", ...rest]
    : argv;

  try {
    await program.parseAsync(argvToParse);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      if (err.exitCode !== 0) {
        process.stderr.write(`${getErrorMessage(err)}\n`);
      }
      return;
    }
    throw err;
  }
}
