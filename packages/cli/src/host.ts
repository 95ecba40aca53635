/**
 * Session hosting shared by `formlite repl` and `formlite run`: builds the
 * session with its trace sink and prints each submission's outcome.
 */
import { Session, parse, makeDiag, formatDiagnostics } from "@formlite/core";
import type { DiagStyle, Diagnostic, EvalResult, ParseResult, TraceEvent } from "@formlite/core";
import type { HostSettings } from "./config.js";

export type SubmitOutcome = "ok" | "parse_error" | "eval_error";

export function createSession(settings: Pick<HostSettings, "verbose">): Session {
  const trace = settings.verbose
    ? (event: TraceEvent) => console.error(JSON.stringify(event))
    : undefined;
  return new Session({ trace });
}

function report(diagnostics: Diagnostic[], style: DiagStyle): void {
  console.error(formatDiagnostics(diagnostics, style));
}

function evaluate(session: Session, text: string, settings: HostSettings, file?: string): SubmitOutcome {
  let parsed: ParseResult;
  let result: EvalResult | undefined;
  // Deep nesting can overflow the stack in the parser or the simplifier
  try {
    parsed = parse(text, file);
    if (parsed.statement) {
      result = session.evaluate(parsed.statement);
    }
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    report([makeDiag("E_RUNTIME", msg)], settings.style);
    return "eval_error";
  }

  if (result === undefined) {
    report(parsed.diagnostics, settings.style);
    return "parse_error";
  }
  if (result.output !== undefined) {
    console.log(`  ${result.output}`);
  }
  if (result.diagnostics.length > 0) {
    report(result.diagnostics, settings.style);
    return "eval_error";
  }
  return "ok";
}

/**
 * Parse and evaluate one submission, printing the result to stdout and any
 * diagnostics to stderr.
 */
export function submit(session: Session, text: string, settings: HostSettings, file?: string): SubmitOutcome {
  const started = performance.now();
  const outcome = evaluate(session, text, settings, file);
  if (settings.timing) {
    console.error(`  (${(performance.now() - started).toFixed(3)} ms)`);
  }
  return outcome;
}
