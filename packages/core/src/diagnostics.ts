/**
 * formlite diagnostic records for parse and evaluation errors.
 */
import type { Span } from "./ast.js";

export type DiagCode =
  | "E_PARSE"
  | "E_DIV_ZERO"
  | "E_UNDEFINED_PRINT"
  | "E_CYCLIC_REF"
  | "E_IO"
  | "E_CONFIG"
  | "E_RUNTIME";

export interface Diagnostic {
  code: DiagCode;
  message: string;
  span?: Span;
  hint?: string;
  /** Structured context, e.g. the offending name */
  details?: Record<string, string>;
}

/**
 * `plain` is what the REPL prints, `pretty` adds location and hint,
 * `json` is one machine-readable object per diagnostic.
 */
export type DiagStyle = "plain" | "pretty" | "json";

const DEFAULT_HINTS: Partial<Record<DiagCode, string>> = {
  E_PARSE: "Check syntax near this location.",
  E_UNDEFINED_PRINT: "Define it first with 'Expression <name> = ...' or 'Local <name> = ...'.",
  E_CYCLIC_REF: "Redefine one of the expressions so it no longer refers to itself.",
};

export function makeDiag(
  code: DiagCode,
  message: string,
  span?: Span,
  hint: string | undefined = DEFAULT_HINTS[code]
): Diagnostic {
  return { code, message, span, hint };
}

export function formatDiagnostic(d: Diagnostic, style: DiagStyle): string {
  switch (style) {
    case "json":
      return JSON.stringify(d);
    case "plain":
      return `Error: ${d.message}`;
    case "pretty": {
      const loc = d.span
        ? `${d.span.file}:${d.span.startLine}:${d.span.startCol}`
        : "<unknown>";
      let out = `error[${d.code}]: ${d.message}\n  --> ${loc}`;
      if (d.hint) {
        out += `\n  hint: ${d.hint}`;
      }
      return out;
    }
  }
}

export function formatDiagnostics(diags: Diagnostic[], style: DiagStyle): string {
  if (style === "json") {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, style)).join(style === "pretty" ? "\n\n" : "\n");
}

// --- Evaluation error ---
export class EvaluationError extends Error {
  code: DiagCode;
  details?: Record<string, string>;

  constructor(code: DiagCode, message: string, details?: Record<string, string>) {
    super(message);
    this.name = "EvaluationError";
    this.code = code;
    this.details = details;
  }

  toDiagnostic(): Diagnostic {
    const diag = makeDiag(this.code, this.message);
    return this.details ? { ...diag, details: this.details } : diag;
  }
}
