/**
 * formlite evaluator: a REPL session owning the symbol, expression and rule
 * tables, evaluating one statement at a time.
 */
import type * as AST from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { EvaluationError } from "./diagnostics.js";
import { formatExpr, formatStatement } from "./formatter.js";
import { parse } from "./parser.js";
import { applyRules, type RewriteEvent, type RewriteRule } from "./rules.js";
import { simplify } from "./simplifier.js";

// --- Trace events ---
export type TraceEventType =
  | "stmt_start"
  | "stmt_end"
  | "rule_applied"
  | "rewrite_cap"
  | "session_clear";

export type TraceData = Record<string, string | number | boolean>;

export interface TraceEvent {
  ts: string;
  event: TraceEventType;
  data?: TraceData;
}

export interface SessionOptions {
  /** Receives a record for every step; verbose hosts print them. */
  trace?: (event: TraceEvent) => void;
}

export interface EvalResult {
  output?: string;
  diagnostics: Diagnostic[];
}

export interface SessionSnapshot {
  symbols: ReadonlyMap<string, AST.Expr>;
  expressions: ReadonlyMap<string, AST.Expr>;
  rules: readonly RewriteRule[];
}

export class Session {
  private symbols = new Map<string, AST.Expr>();
  private expressions = new Map<string, AST.Expr>();
  private rules: RewriteRule[] = [];
  private readonly options: SessionOptions;

  constructor(options: SessionOptions = {}) {
    this.options = options;
  }

  /**
   * Evaluate one statement. Failures come back as diagnostics and leave every
   * table as it was.
   */
  evaluate(stmt: AST.Statement): EvalResult {
    this.emitTrace("stmt_start", { kind: stmt.kind, text: formatStatement(stmt) });
    try {
      const output = this.execute(stmt);
      this.emitTrace("stmt_end", { kind: stmt.kind, ok: true });
      return { output, diagnostics: [] };
    } catch (e) {
      if (e instanceof EvaluationError) {
        this.emitTrace("stmt_end", { kind: stmt.kind, ok: false, code: e.code });
        return { diagnostics: [e.toDiagnostic()] };
      }
      throw e;
    }
  }

  /**
   * Parse and evaluate one submission.
   */
  run(source: string, file?: string): EvalResult {
    const parsed = parse(source, file);
    if (!parsed.statement) {
      return { diagnostics: parsed.diagnostics };
    }
    return this.evaluate(parsed.statement);
  }

  clear(): void {
    this.symbols = new Map();
    this.expressions = new Map();
    this.rules = [];
    this.emitTrace("session_clear");
  }

  snapshot(): SessionSnapshot {
    return {
      symbols: new Map(this.symbols),
      expressions: new Map(this.expressions),
      rules: [...this.rules],
    };
  }

  private execute(stmt: AST.Statement): string {
    switch (stmt.kind) {
      case "SymbolsDecl":
        for (const name of stmt.names) {
          this.symbols.set(name, { kind: "Symbol", name });
        }
        return "Symbols declared";

      // Local behaves exactly like Expression
      case "ExpressionDecl":
      case "LocalDecl": {
        const simplified = simplify(stmt.expr, this.expressions);
        this.expressions.set(stmt.name, simplified);
        return `${stmt.name} = ${formatExpr(simplified)}`;
      }

      case "IdRule":
        this.rules.push({ pattern: stmt.pattern, replacement: stmt.replacement });
        return `Rule added: ${formatExpr(stmt.pattern)} -> ${formatExpr(stmt.replacement)}`;

      case "Print": {
        const expr = this.expressions.get(stmt.name);
        if (expr === undefined) {
          throw new EvaluationError(
            "E_UNDEFINED_PRINT",
            `Expression '${stmt.name}' not found`,
            { name: stmt.name }
          );
        }
        return `${stmt.name} = ${formatExpr(expr)}`;
      }

      case "Sort": {
        // Every entry is rewritten against the old table; commit only if all succeed
        const updated = new Map<string, AST.Expr>();
        for (const [name, expr] of this.expressions) {
          updated.set(name, applyRules(expr, this.rules, this.expressions, (ev) => this.emitRewrite(name, ev)));
        }
        this.expressions = updated;
        return "Sorted and rules applied";
      }

      case "EvalExpr":
        return formatExpr(simplify(stmt.expr, this.expressions));
    }
  }

  private emitRewrite(name: string, ev: RewriteEvent): void {
    if (ev.event === "rule_applied") {
      this.emitTrace("rule_applied", {
        expression: name,
        rule: ev.rule,
        phase: ev.phase,
        result: formatExpr(ev.result),
      });
    } else {
      this.emitTrace("rewrite_cap", {
        expression: name,
        iterations: ev.iterations,
        result: formatExpr(ev.result),
      });
    }
  }

  private emitTrace(event: TraceEventType, data?: TraceData): void {
    if (this.options.trace) {
      this.options.trace({ ts: new Date().toISOString(), event, data });
    }
  }
}
