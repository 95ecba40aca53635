/**
 * formlite rule engine: structural matching, substitution and repeated
 * rewriting of an expression with the session's ordered `id` rules.
 *
 * Matching is by shape and leaf equality only. A pattern symbol matches the
 * same symbol and nothing else, so the binding map is empty in practice.
 */
import * as AST from "./ast.js";
import { simplify, type ExpressionTable } from "./simplifier.js";

export interface RewriteRule {
  readonly pattern: AST.Expr;
  readonly replacement: AST.Expr;
}

export type Bindings = Map<string, AST.Expr>;

/** Top-level rewrites allowed before the engine gives up on a fixed point. */
export const MAX_REWRITE_ITERATIONS = 100;

export const NUMBER_TOLERANCE = 1e-10;

export type RewriteEvent =
  | { event: "rule_applied"; rule: number; phase: "top" | "subterm"; result: AST.Expr }
  | { event: "rewrite_cap"; iterations: number; result: AST.Expr };

export type RewriteListener = (event: RewriteEvent) => void;

function mergeBindings(into: Bindings, from: Bindings): Bindings | null {
  for (const [name, value] of from) {
    const existing = into.get(name);
    if (existing !== undefined && !AST.exprEquals(existing, value)) {
      return null;
    }
    into.set(name, value);
  }
  return into;
}

/**
 * Match `expr` against `pattern`. Returns the bindings on success, null
 * otherwise. UnOp and FunctionCall nodes never match.
 */
export function matchPattern(expr: AST.Expr, pattern: AST.Expr): Bindings | null {
  if (expr.kind === "Symbol" && pattern.kind === "Symbol") {
    return expr.name === pattern.name ? new Map() : null;
  }
  if (expr.kind === "Number" && pattern.kind === "Number") {
    return Math.abs(expr.value - pattern.value) < NUMBER_TOLERANCE ? new Map() : null;
  }
  if (expr.kind === "BinOp" && pattern.kind === "BinOp") {
    if (expr.op !== pattern.op) return null;
    const left = matchPattern(expr.left, pattern.left);
    if (left === null) return null;
    const right = matchPattern(expr.right, pattern.right);
    if (right === null) return null;
    return mergeBindings(left, right);
  }
  return null;
}

/**
 * Replace every bound symbol in `template`.
 */
export function substitute(template: AST.Expr, bindings: Bindings): AST.Expr {
  switch (template.kind) {
    case "Number":
      return template;
    case "Symbol":
      return bindings.get(template.name) ?? template;
    case "BinOp":
      return AST.binOp(
        template.op,
        substitute(template.left, bindings),
        substitute(template.right, bindings)
      );
    case "UnOp":
      return AST.neg(substitute(template.operand, bindings));
    case "FunctionCall":
      return AST.call(template.name, template.args.map((arg) => substitute(arg, bindings)));
  }
}

interface RuleHit {
  index: number;
  result: AST.Expr;
}

// First rule, in declaration order, whose pattern matches the whole expression
function rewriteOnce(expr: AST.Expr, rules: readonly RewriteRule[]): RuleHit | null {
  for (let index = 0; index < rules.length; index++) {
    const bindings = matchPattern(expr, rules[index].pattern);
    if (bindings !== null) {
      return { index, result: substitute(rules[index].replacement, bindings) };
    }
  }
  return null;
}

function mapChildren(expr: AST.Expr, fn: (child: AST.Expr) => AST.Expr): AST.Expr {
  switch (expr.kind) {
    case "BinOp":
      return AST.binOp(expr.op, fn(expr.left), fn(expr.right));
    case "UnOp":
      return AST.neg(fn(expr.operand));
    case "FunctionCall":
      return AST.call(expr.name, expr.args.map((arg) => fn(arg)));
    default:
      return expr;
  }
}

// Children first, then at most one rule at this node
function rewriteBottomUp(expr: AST.Expr, rules: readonly RewriteRule[], emit?: RewriteListener): AST.Expr {
  const rebuilt = mapChildren(expr, (child) => rewriteBottomUp(child, rules, emit));
  const hit = rewriteOnce(rebuilt, rules);
  if (hit === null) return rebuilt;
  emit?.({ event: "rule_applied", rule: hit.index, phase: "subterm", result: hit.result });
  return hit.result;
}

/**
 * Rewrite `expr` with `rules` and simplify the result.
 *
 * The whole expression is rewritten by the first matching rule until none
 * matches, at most MAX_REWRITE_ITERATIONS times. Only once nothing matches
 * at the top are the subterms rewritten bottom-up. When the cap is reached
 * the expression is returned as it stands, subterms untouched.
 */
export function applyRules(
  expr: AST.Expr,
  rules: readonly RewriteRule[],
  expressions: ExpressionTable,
  emit?: RewriteListener
): AST.Expr {
  let result = expr;
  let iterations = 0;
  let settled = false;

  while (!settled && iterations < MAX_REWRITE_ITERATIONS) {
    iterations++;
    const hit = rewriteOnce(result, rules);
    if (hit !== null) {
      result = hit.result;
      emit?.({ event: "rule_applied", rule: hit.index, phase: "top", result });
      continue;
    }
    result = mapChildren(result, (child) => rewriteBottomUp(child, rules, emit));
    settled = true;
  }

  if (!settled) {
    emit?.({ event: "rewrite_cap", iterations, result });
  }

  return simplify(result, expressions);
}
