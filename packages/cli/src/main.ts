#!/usr/bin/env -S node --import tsx
/**
 * formlite - symbolic expression REPL
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { runRepl } from "./cmd-repl.js";
import { runRun } from "./cmd-run.js";
import { runConfig } from "./cmd-config.js";
import { runHelp, QUICKREF } from "./cmd-help.js";
import { TOPIC_LIST } from "./help-content.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

interface HostCommandOptions {
  verbose?: boolean;
  timing?: boolean;
  pretty?: boolean;
  json?: boolean;
}

function withHostFlags(command: Command): Command {
  return command
    .option("--verbose", "Trace events to stderr as JSON lines", false)
    .option("--timing", "Elapsed time per statement to stderr", false)
    .option("--pretty", "Diagnostics with location and hint", false)
    .option("--json", "Diagnostics as a JSON array per submission", false);
}

const program = new Command();

program
  .name("formlite")
  .description("formlite: symbolic expressions, rewrite rules and a REPL")
  .version(pkg.version)
  .addHelpText("after", "\n" + QUICKREF);

withHostFlags(
  program
    .command("repl", { isDefault: true })
    .description("Interactive session (default)")
).action(async (opts: HostCommandOptions) => {
  process.exitCode = await runRepl(opts);
});

withHostFlags(
  program
    .command("run")
    .description("Evaluate a statement file in one session")
    .argument("<file>", "Statement file to run (or - for stdin)")
).action(async (file: string, opts: HostCommandOptions) => {
  process.exitCode = await runRun(file, opts);
});

program
  .command("config")
  .description("Display effective configuration and its source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    process.exitCode = await runConfig(opts);
  });

program
  .command("help")
  .description("Language reference; run 'formlite help <topic>' for details")
  .argument("[topic]", `Topic: ${TOPIC_LIST.join(", ")}`)
  .action((topic: string | undefined) => {
    process.exitCode = runHelp(topic);
  });

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
});
