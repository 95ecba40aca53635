/**
 * Tests for the formlite simplifier.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { simplify } from "./simplifier.js";
import { EvaluationError } from "./diagnostics.js";
import { binOp, call, neg, num, sym } from "./ast.js";
import type { Expr } from "./ast.js";

const empty = new Map<string, Expr>();

function value(expr: Expr): number {
  const result = simplify(expr, empty);
  assert.equal(result.kind, "Number");
  if (result.kind !== "Number") throw new Error("unreachable");
  return result.value;
}

describe("formlite Simplifier", () => {
  describe("constant folding", () => {
    it("folds arithmetic with IEEE double results", () => {
      assert.equal(value(binOp("Add", num(0.1), num(0.2))), 0.1 + 0.2);
      assert.equal(value(binOp("Sub", num(1), num(0.9))), 1 - 0.9);
      assert.equal(value(binOp("Mul", num(3), num(4))), 12);
      assert.equal(value(binOp("Div", num(1), num(3))), 1 / 3);
    });

    it("folds powers with Math.pow", () => {
      assert.equal(value(binOp("Pow", num(2), num(10))), 1024);
      assert.equal(value(binOp("Pow", num(4), num(0.5))), 2);
    });

    it("propagates NaN from a negative base with a fractional exponent", () => {
      assert.ok(Number.isNaN(value(binOp("Pow", num(-8), num(1 / 3)))));
    });

    it("keeps ECMAScript pow results where C pow returns 1", () => {
      assert.ok(Number.isNaN(value(binOp("Pow", num(1), binOp("Pow", num(-8), num(0.5))))));
      assert.ok(Number.isNaN(value(binOp("Pow", num(-1), num(Infinity)))));
      assert.ok(Number.isNaN(value(binOp("Pow", num(-1), num(-Infinity)))));
    });

    it("raises division by zero", () => {
      assert.throws(
        () => simplify(binOp("Div", num(1), num(0)), empty),
        (err: unknown) => err instanceof EvaluationError && err.code === "E_DIV_ZERO" && err.message === "Division by zero"
      );
    });

    it("raises division by zero once the divisor folds to zero", () => {
      assert.throws(
        () => simplify(binOp("Div", num(5), binOp("Sub", num(2), num(2))), empty),
        (err: unknown) => err instanceof EvaluationError && err.code === "E_DIV_ZERO"
      );
    });

    it("keeps a symbolic quotient over zero unfolded", () => {
      assert.deepEqual(simplify(binOp("Div", sym("x"), num(0)), empty), binOp("Div", sym("x"), num(0)));
    });

    it("folds negation of a literal", () => {
      assert.equal(value(neg(num(5))), -5);
      assert.deepEqual(simplify(neg(sym("x")), empty), neg(sym("x")));
    });

    it("evaluates built-in functions of one literal", () => {
      assert.equal(value(call("sin", [num(0)])), 0);
      assert.equal(value(call("cos", [num(0)])), 1);
      assert.equal(value(call("exp", [num(0)])), 1);
      assert.equal(value(call("log", [num(1)])), 0);
    });

    it("keeps other calls unevaluated with simplified arguments", () => {
      assert.deepEqual(simplify(call("f", [binOp("Add", num(1), num(2))]), empty), call("f", [num(3)]));
      assert.deepEqual(simplify(call("sin", [sym("x")]), empty), call("sin", [sym("x")]));
      assert.deepEqual(simplify(call("log", [num(1), num(2)]), empty), call("log", [num(1), num(2)]));
      assert.deepEqual(simplify(call("toString", [num(1)]), empty), call("toString", [num(1)]));
    });
  });

  describe("identities", () => {
    const x = binOp("Div", sym("a"), sym("b"));

    it("drops additive zero", () => {
      assert.deepEqual(simplify(binOp("Add", x, num(0)), empty), x);
      assert.deepEqual(simplify(binOp("Add", num(0), x), empty), x);
    });

    it("collapses multiplication by zero", () => {
      assert.deepEqual(simplify(binOp("Mul", x, num(0)), empty), num(0));
      assert.deepEqual(simplify(binOp("Mul", num(0), x), empty), num(0));
    });

    it("drops multiplicative one", () => {
      assert.deepEqual(simplify(binOp("Mul", x, num(1)), empty), x);
      assert.deepEqual(simplify(binOp("Mul", num(1), x), empty), x);
    });

    it("simplifies powers of zero and one", () => {
      assert.deepEqual(simplify(binOp("Pow", x, num(0)), empty), num(1));
      assert.deepEqual(simplify(binOp("Pow", x, num(1)), empty), x);
    });

    it("applies identities after simplifying the operands", () => {
      assert.deepEqual(simplify(binOp("Mul", sym("x"), binOp("Sub", num(3), num(2))), empty), sym("x"));
    });

    it("leaves other shapes alone", () => {
      assert.deepEqual(simplify(binOp("Sub", sym("x"), num(0)), empty), binOp("Sub", sym("x"), num(0)));
      assert.deepEqual(simplify(binOp("Pow", num(1), sym("x")), empty), binOp("Pow", num(1), sym("x")));
      assert.deepEqual(simplify(binOp("Div", sym("x"), num(1)), empty), binOp("Div", sym("x"), num(1)));
    });
  });

  describe("expression table", () => {
    it("substitutes named expressions transparently", () => {
      const table = new Map<string, Expr>([["a", binOp("Add", sym("x"), num(2))]]);
      assert.deepEqual(simplify(binOp("Mul", sym("a"), num(1)), table), binOp("Add", sym("x"), num(2)));
    });

    it("resolves chains of names", () => {
      const table = new Map<string, Expr>([
        ["a", sym("b")],
        ["b", num(7)],
      ]);
      assert.deepEqual(simplify(binOp("Add", sym("a"), num(1)), table), num(8));
    });

    it("allows the same name twice in one expression", () => {
      const table = new Map<string, Expr>([["a", num(3)]]);
      assert.deepEqual(simplify(binOp("Mul", sym("a"), sym("a")), table), num(9));
    });

    it("reports a self-referential binding", () => {
      const table = new Map<string, Expr>([["e", binOp("Add", sym("e"), num(1))]]);
      assert.throws(
        () => simplify(sym("e"), table),
        (err: unknown) =>
          err instanceof EvaluationError &&
          err.code === "E_CYCLIC_REF" &&
          err.message === "Expression 'e' refers to itself"
      );
    });

    it("reports a cycle through several names", () => {
      const table = new Map<string, Expr>([
        ["a", sym("b")],
        ["b", sym("a")],
      ]);
      assert.throws(
        () => simplify(sym("a"), table),
        (err: unknown) => err instanceof EvaluationError && err.code === "E_CYCLIC_REF"
      );
    });
  });
});
