/**
 * formlite run - evaluate a statement file in one session
 */
import * as fs from "node:fs";
import { makeDiag, formatDiagnostic } from "@formlite/core";
import { resolveConfig, hostSettings, type HostFlags } from "./config.js";
import { createSession, submit } from "./host.js";
import { splitSubmissions } from "./submissions.js";

export interface RunOptions extends HostFlags {
  cwd?: string;
  homeDir?: string;
}

/**
 * Exit codes: 0 when every submission succeeds, 2 when any failed to parse,
 * otherwise 4 when any failed to evaluate or the file cannot be read.
 */
export async function runRun(file: string, opts: RunOptions = {}): Promise<number> {
  const settings = hostSettings(resolveConfig(opts.cwd, opts.homeDir).config, opts);

  let source: string;
  try {
    source = file === "-" ? fs.readFileSync(0, "utf-8") : fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic(makeDiag("E_IO", `Error reading file: ${msg}`), settings.style));
    return 4;
  }

  const session = createSession(settings);
  const sourceName = file === "-" ? "<stdin>" : file;
  let parseFailed = false;
  let evalFailed = false;

  for (const text of splitSubmissions(source)) {
    const outcome = submit(session, text, settings, sourceName);
    if (outcome === "parse_error") parseFailed = true;
    if (outcome === "eval_error") evalFailed = true;
  }

  if (parseFailed) return 2;
  if (evalFailed) return 4;
  return 0;
}
