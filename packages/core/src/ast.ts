/**
 * formlite AST node definitions.
 *
 * Expressions are immutable trees: every node owns its children and nothing
 * is shared, so rewriting always builds new nodes.
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

// --- Operators ---
export type BinOpKind = "Add" | "Sub" | "Mul" | "Div" | "Pow";
export type UnOpKind = "Neg";

// --- Expressions ---
export interface NumberExpr {
  readonly kind: "Number";
  readonly value: number;
}

export interface SymbolExpr {
  readonly kind: "Symbol";
  readonly name: string;
}

export interface BinOpExpr {
  readonly kind: "BinOp";
  readonly op: BinOpKind;
  readonly left: Expr;
  readonly right: Expr;
}

export interface UnOpExpr {
  readonly kind: "UnOp";
  readonly op: UnOpKind;
  readonly operand: Expr;
}

export interface FunctionCallExpr {
  readonly kind: "FunctionCall";
  readonly name: string;
  readonly args: readonly Expr[];
}

export type Expr = NumberExpr | SymbolExpr | BinOpExpr | UnOpExpr | FunctionCallExpr;

// --- Statements ---
export interface SymbolsDecl {
  kind: "SymbolsDecl";
  names: string[];
}

export interface ExpressionDecl {
  kind: "ExpressionDecl";
  name: string;
  expr: Expr;
}

export interface LocalDecl {
  kind: "LocalDecl";
  name: string;
  expr: Expr;
}

export interface IdRule {
  kind: "IdRule";
  pattern: Expr;
  replacement: Expr;
}

export interface PrintStmt {
  kind: "Print";
  name: string;
}

export interface SortStmt {
  kind: "Sort";
}

export interface EvalExprStmt {
  kind: "EvalExpr";
  expr: Expr;
}

export type Statement =
  | SymbolsDecl
  | ExpressionDecl
  | LocalDecl
  | IdRule
  | PrintStmt
  | SortStmt
  | EvalExprStmt;

// --- Constructors ---
export function num(value: number): NumberExpr {
  return { kind: "Number", value };
}

export function sym(name: string): SymbolExpr {
  return { kind: "Symbol", name };
}

export function binOp(op: BinOpKind, left: Expr, right: Expr): BinOpExpr {
  return { kind: "BinOp", op, left, right };
}

export function neg(operand: Expr): UnOpExpr {
  return { kind: "UnOp", op: "Neg", operand };
}

export function call(name: string, args: readonly Expr[]): FunctionCallExpr {
  return { kind: "FunctionCall", name, args };
}

/**
 * Exact structural equality. Numbers compare with `===`, so `NaN` never
 * equals itself; the tolerant comparison lives in the rule matcher.
 */
export function exprEquals(a: Expr, b: Expr): boolean {
  switch (a.kind) {
    case "Number":
      return b.kind === "Number" && a.value === b.value;
    case "Symbol":
      return b.kind === "Symbol" && a.name === b.name;
    case "BinOp":
      return (
        b.kind === "BinOp" &&
        a.op === b.op &&
        exprEquals(a.left, b.left) &&
        exprEquals(a.right, b.right)
      );
    case "UnOp":
      return b.kind === "UnOp" && a.op === b.op && exprEquals(a.operand, b.operand);
    case "FunctionCall":
      return (
        b.kind === "FunctionCall" &&
        a.name === b.name &&
        a.args.length === b.args.length &&
        a.args.every((arg, i) => exprEquals(arg, b.args[i]))
      );
  }
}
