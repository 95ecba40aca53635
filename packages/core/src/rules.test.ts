/**
 * Tests for the formlite rule engine.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  applyRules,
  matchPattern,
  substitute,
  MAX_REWRITE_ITERATIONS,
  type RewriteEvent,
  type RewriteRule,
} from "./rules.js";
import { binOp, call, neg, num, sym } from "./ast.js";
import type { Expr } from "./ast.js";

const empty = new Map<string, Expr>();

function rule(pattern: Expr, replacement: Expr): RewriteRule {
  return { pattern, replacement };
}

describe("formlite Rule engine", () => {
  describe("matchPattern", () => {
    it("matches symbols by name only", () => {
      assert.deepEqual(matchPattern(sym("x"), sym("x")), new Map());
      assert.equal(matchPattern(sym("x"), sym("y")), null);
    });

    it("matches numbers within tolerance", () => {
      assert.deepEqual(matchPattern(num(2), num(2 + 1e-12)), new Map());
      assert.equal(matchPattern(num(2), num(2.001)), null);
    });

    it("matches binary nodes by operator and children", () => {
      const expr = binOp("Add", sym("x"), num(1));
      assert.deepEqual(matchPattern(expr, binOp("Add", sym("x"), num(1))), new Map());
      assert.equal(matchPattern(expr, binOp("Sub", sym("x"), num(1))), null);
      assert.equal(matchPattern(expr, binOp("Add", sym("x"), num(2))), null);
    });

    it("never matches negations or calls", () => {
      assert.equal(matchPattern(neg(sym("x")), neg(sym("x"))), null);
      assert.equal(matchPattern(call("f", [sym("x")]), call("f", [sym("x")])), null);
    });

    it("never matches across shapes", () => {
      assert.equal(matchPattern(sym("x"), num(1)), null);
      assert.equal(matchPattern(binOp("Add", sym("x"), num(1)), sym("x")), null);
    });
  });

  describe("substitute", () => {
    it("replaces bound symbols throughout the template", () => {
      const bindings = new Map<string, Expr>([["x", num(3)]]);
      const template = binOp("Add", sym("x"), call("f", [neg(sym("x")), sym("y")]));
      assert.deepEqual(
        substitute(template, bindings),
        binOp("Add", num(3), call("f", [neg(num(3)), sym("y")]))
      );
    });

    it("returns the template unchanged for empty bindings", () => {
      const template = binOp("Mul", sym("a"), num(2));
      assert.deepEqual(substitute(template, new Map()), template);
    });
  });

  describe("applyRules", () => {
    it("rewrites the whole expression", () => {
      assert.deepEqual(applyRules(sym("x"), [rule(sym("x"), num(2))], empty), num(2));
    });

    it("uses the first matching rule", () => {
      const rules = [rule(sym("x"), num(1)), rule(sym("x"), num(2))];
      assert.deepEqual(applyRules(sym("x"), rules, empty), num(1));
    });

    it("keeps rewriting the top level until no rule matches", () => {
      const rules = [rule(sym("a"), sym("b")), rule(sym("b"), sym("c"))];
      assert.deepEqual(applyRules(sym("a"), rules, empty), sym("c"));
    });

    it("rewrites subterms and simplifies the result", () => {
      const expr = binOp("Mul", binOp("Add", sym("x"), num(1)), binOp("Sub", sym("x"), num(1)));
      assert.deepEqual(applyRules(expr, [rule(sym("x"), num(2))], empty), num(3));
    });

    it("rewrites inside negations and call arguments", () => {
      const expr = call("f", [neg(sym("x")), sym("y")]);
      assert.deepEqual(applyRules(expr, [rule(sym("x"), num(4))], empty), call("f", [num(-4), sym("y")]));
    });

    it("matches a compound pattern at a subterm", () => {
      const expr = binOp("Add", binOp("Mul", sym("x"), sym("y")), sym("z"));
      const rules = [rule(binOp("Mul", sym("x"), sym("y")), sym("w"))];
      assert.deepEqual(applyRules(expr, rules, empty), binOp("Add", sym("w"), sym("z")));
    });

    it("applies one rule per subterm without repeating it", () => {
      const expr = binOp("Add", sym("a"), sym("q"));
      const rules = [rule(sym("a"), sym("b")), rule(sym("b"), sym("c"))];
      assert.deepEqual(applyRules(expr, rules, empty), binOp("Add", sym("b"), sym("q")));
    });

    it("rewrites children before their parent", () => {
      const expr = binOp("Add", sym("x"), sym("y"));
      const rules = [rule(sym("x"), sym("y")), rule(binOp("Add", sym("y"), sym("y")), num(7))];
      assert.deepEqual(applyRules(binOp("Mul", expr, sym("k")), rules, empty), binOp("Mul", num(7), sym("k")));
    });

    it("resolves named expressions in the final simplification", () => {
      const table = new Map<string, Expr>([["n", num(5)]]);
      assert.deepEqual(applyRules(binOp("Add", sym("x"), sym("n")), [rule(sym("x"), num(1))], table), num(6));
    });

    it("stops an oscillating rule set at the iteration cap", () => {
      const rules = [rule(sym("a"), sym("b")), rule(sym("b"), sym("c")), rule(sym("c"), sym("a"))];
      const events: RewriteEvent[] = [];
      const result = applyRules(sym("a"), rules, empty, (ev) => events.push(ev));
      // 100 rewrites around a three-cycle end one step past a
      assert.deepEqual(result, sym("b"));
      assert.equal(events.filter((ev) => ev.event === "rule_applied").length, MAX_REWRITE_ITERATIONS);
      const last = events[events.length - 1];
      assert.equal(last.event, "rewrite_cap");
    });

    it("halts a two-rule swap at the cap", () => {
      const rules = [rule(sym("a"), sym("b")), rule(sym("b"), sym("a"))];
      assert.deepEqual(applyRules(sym("a"), rules, empty), sym("a"));
    });

    it("caps at the same count whatever the rule set size", () => {
      const rules = [rule(sym("p"), sym("q")), rule(sym("q"), sym("p"))];
      for (let i = 0; i < 50; i++) {
        rules.push(rule(sym(`unused${i}`), num(i)));
      }
      let count = 0;
      applyRules(sym("p"), rules, empty, (ev) => {
        if (ev.event === "rule_applied") count++;
      });
      assert.equal(count, MAX_REWRITE_ITERATIONS);
    });

    it("skips subterm rewriting once the cap is reached", () => {
      const expr = binOp("Add", sym("x"), num(1));
      const rules = [
        rule(binOp("Add", sym("x"), num(1)), binOp("Add", sym("x"), num(1))),
        rule(sym("x"), num(9)),
      ];
      assert.deepEqual(applyRules(expr, rules, empty), binOp("Add", sym("x"), num(1)));
    });

    it("reports subterm rewrites to the listener", () => {
      const events: RewriteEvent[] = [];
      applyRules(binOp("Add", sym("x"), num(1)), [rule(sym("x"), num(2))], empty, (ev) => events.push(ev));
      assert.deepEqual(events, [{ event: "rule_applied", rule: 0, phase: "subterm", result: num(2) }]);
    });
  });
});
