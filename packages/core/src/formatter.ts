/**
 * formlite display text for expressions and statements.
 *
 * Every binary and unary node is parenthesised, so the text shows the tree
 * shape exactly and needs no precedence table.
 */
import type * as AST from "./ast.js";

const OP_SYMBOL: Record<AST.BinOpKind, string> = {
  Add: "+",
  Sub: "-",
  Mul: "*",
  Div: "/",
  Pow: "^",
};

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

// Rewrites `1.5e-7` as `0.00000015` and `1e21` as `1000000000000000000000`
function expandExponent(text: string): string {
  const match = EXPONENT_FORM.exec(text);
  if (match === null) return text;
  const [, sign, lead, fraction = "", exponent] = match;
  const digits = lead + fraction;
  const point = 1 + Number(exponent);
  if (point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return sign + digits + "0".repeat(point - digits.length);
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Shortest round-trip digits in plain decimal, never exponent notation.
 * Whole numbers have no fractional part (`3`, not `3.0`); non-finite values
 * print as `NaN`, `inf` and `-inf`.
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
  if (Object.is(value, -0)) return "0";
  return expandExponent(String(value));
}

export function formatExpr(expr: AST.Expr): string {
  switch (expr.kind) {
    case "Number":
      return formatNumber(expr.value);
    case "Symbol":
      return expr.name;
    case "BinOp":
      return `(${formatExpr(expr.left)} ${OP_SYMBOL[expr.op]} ${formatExpr(expr.right)})`;
    case "UnOp":
      return `(-${formatExpr(expr.operand)})`;
    case "FunctionCall":
      return `${expr.name}(${expr.args.map(formatExpr).join(", ")})`;
  }
}

export function formatStatement(stmt: AST.Statement): string {
  switch (stmt.kind) {
    case "SymbolsDecl":
      return `Symbols ${stmt.names.join(", ")}`;
    case "ExpressionDecl":
      return `Expression ${stmt.name} = ${formatExpr(stmt.expr)}`;
    case "LocalDecl":
      return `Local ${stmt.name} = ${formatExpr(stmt.expr)}`;
    case "IdRule":
      return `id ${formatExpr(stmt.pattern)} = ${formatExpr(stmt.replacement)}`;
    case "Print":
      return `Print ${stmt.name}`;
    case "Sort":
      return ".sort";
    case "EvalExpr":
      return formatExpr(stmt.expr);
  }
}
