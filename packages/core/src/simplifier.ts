/**
 * formlite simplifier: constant folding, a fixed set of algebraic identities
 * and transparent substitution of named expressions.
 */
import * as AST from "./ast.js";
import { EvaluationError } from "./diagnostics.js";

export type ExpressionTable = ReadonlyMap<string, AST.Expr>;

const BUILTINS: Record<string, (x: number) => number> = {
  sin: Math.sin,
  cos: Math.cos,
  exp: Math.exp,
  log: Math.log,
};

function isNumber(expr: AST.Expr, value?: number): expr is AST.NumberExpr {
  return expr.kind === "Number" && (value === undefined || expr.value === value);
}

function fold(op: AST.BinOpKind, l: number, r: number): number {
  switch (op) {
    case "Add":
      return l + r;
    case "Sub":
      return l - r;
    case "Mul":
      return l * r;
    case "Div":
      if (r === 0) {
        throw new EvaluationError("E_DIV_ZERO", "Division by zero");
      }
      return l / r;
    case "Pow":
      return Math.pow(l, r);
  }
}

// Identities in priority order; null when none applies
function applyIdentity(op: AST.BinOpKind, left: AST.Expr, right: AST.Expr): AST.Expr | null {
  switch (op) {
    case "Add":
      if (isNumber(right, 0)) return left;
      if (isNumber(left, 0)) return right;
      return null;
    case "Mul":
      if (isNumber(right, 0) || isNumber(left, 0)) return AST.num(0);
      if (isNumber(right, 1)) return left;
      if (isNumber(left, 1)) return right;
      return null;
    case "Pow":
      if (isNumber(right, 0)) return AST.num(1);
      if (isNumber(right, 1)) return left;
      return null;
    default:
      return null;
  }
}

function simplifyIn(expr: AST.Expr, expressions: ExpressionTable, resolving: Set<string>): AST.Expr {
  switch (expr.kind) {
    case "Number":
      return expr;

    case "Symbol": {
      const bound = expressions.get(expr.name);
      if (bound === undefined) return expr;
      if (resolving.has(expr.name)) {
        throw new EvaluationError(
          "E_CYCLIC_REF",
          `Expression '${expr.name}' refers to itself`,
          { name: expr.name }
        );
      }
      resolving.add(expr.name);
      try {
        return simplifyIn(bound, expressions, resolving);
      } finally {
        resolving.delete(expr.name);
      }
    }

    case "BinOp": {
      const left = simplifyIn(expr.left, expressions, resolving);
      const right = simplifyIn(expr.right, expressions, resolving);
      if (isNumber(left) && isNumber(right)) {
        return AST.num(fold(expr.op, left.value, right.value));
      }
      return applyIdentity(expr.op, left, right) ?? AST.binOp(expr.op, left, right);
    }

    case "UnOp": {
      const operand = simplifyIn(expr.operand, expressions, resolving);
      return isNumber(operand) ? AST.num(-operand.value) : AST.neg(operand);
    }

    case "FunctionCall": {
      const args = expr.args.map((arg) => simplifyIn(arg, expressions, resolving));
      const builtin = Object.prototype.hasOwnProperty.call(BUILTINS, expr.name)
        ? BUILTINS[expr.name]
        : undefined;
      if (builtin && args.length === 1 && isNumber(args[0])) {
        return AST.num(builtin(args[0].value));
      }
      return AST.call(expr.name, args);
    }
  }
}

/**
 * Simplify an expression against the current expression table.
 * Throws EvaluationError on division by zero or a self-referential binding.
 */
export function simplify(expr: AST.Expr, expressions: ExpressionTable): AST.Expr {
  return simplifyIn(expr, expressions, new Set());
}
