/**
 * @formlite/core - symbolic expression engine
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export { tokenize, FormLexer } from "./lexer.js";
export { parse } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { formatExpr, formatNumber, formatStatement } from "./formatter.js";
export { simplify } from "./simplifier.js";
export type { ExpressionTable } from "./simplifier.js";
export {
  applyRules,
  matchPattern,
  substitute,
  MAX_REWRITE_ITERATIONS,
  NUMBER_TOLERANCE,
} from "./rules.js";
export type { Bindings, RewriteEvent, RewriteListener, RewriteRule } from "./rules.js";
export { Session } from "./evaluator.js";
export type {
  EvalResult,
  SessionOptions,
  SessionSnapshot,
  TraceData,
  TraceEvent,
  TraceEventType,
} from "./evaluator.js";
