/**
 * @formlite/cli - CLI entry point re-exports
 */
export { runRepl } from "./cmd-repl.js";
export { runRun } from "./cmd-run.js";
export { runConfig } from "./cmd-config.js";
export { runHelp } from "./cmd-help.js";
export { resolveConfig, configSchema, DEFAULT_CONFIG } from "./config.js";
export type { FormliteConfig, ResolvedConfig } from "./config.js";
export { SubmissionBuffer, splitSubmissions } from "./submissions.js";
