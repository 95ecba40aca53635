/**
 * formlite parser using Chevrotain.
 * Produces one Statement per submission.
 */
import {
  CstParser,
  NotAllInputParsedException,
  type CstElement,
  type CstNode,
  type IToken,
} from "chevrotain";
import {
  allTokens,
  FormLexer,
  numberValue,
  Symbols,
  Expression,
  Local,
  Id,
  Print,
  Sort,
  Ident,
  NumberLit,
  AdditiveOp,
  MultiplicativeOp,
  Minus,
  Slash,
  Caret,
  Equals,
  LParen,
  RParen,
  Comma,
  Semicolon,
  Newline,
} from "./lexer.js";
import * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

class FormCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false });
    this.performSelfAnalysis();
  }

  statement = this.RULE("statement", () => {
    this.MANY(() => {
      this.CONSUME(Newline);
    });
    this.OR([
      { ALT: () => this.SUBRULE(this.symbolsDecl) },
      { ALT: () => this.SUBRULE(this.expressionDecl) },
      { ALT: () => this.SUBRULE(this.localDecl) },
      { ALT: () => this.SUBRULE(this.idRule) },
      { ALT: () => this.SUBRULE(this.printStmt) },
      { ALT: () => this.CONSUME(Sort) },
      { ALT: () => this.SUBRULE(this.expression) },
    ]);
    this.OPTION(() => {
      this.CONSUME(Semicolon);
    });
  });

  symbolsDecl = this.RULE("symbolsDecl", () => {
    this.CONSUME(Symbols);
    this.CONSUME(Ident);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.CONSUME2(Ident);
    });
  });

  expressionDecl = this.RULE("expressionDecl", () => {
    this.CONSUME(Expression);
    this.CONSUME(Ident);
    this.CONSUME(Equals);
    this.SUBRULE(this.expression);
  });

  localDecl = this.RULE("localDecl", () => {
    this.CONSUME(Local);
    this.CONSUME(Ident);
    this.CONSUME(Equals);
    this.SUBRULE(this.expression);
  });

  idRule = this.RULE("idRule", () => {
    this.CONSUME(Id);
    this.SUBRULE(this.expression);
    this.CONSUME(Equals);
    this.SUBRULE2(this.expression);
  });

  printStmt = this.RULE("printStmt", () => {
    this.CONSUME(Print);
    this.CONSUME(Ident);
  });

  // additive: left-associative + and -
  expression = this.RULE("expression", () => {
    this.SUBRULE(this.term);
    this.MANY(() => {
      this.CONSUME(AdditiveOp);
      this.SUBRULE2(this.term);
    });
  });

  // multiplicative: left-associative * and /
  term = this.RULE("term", () => {
    this.SUBRULE(this.power);
    this.MANY(() => {
      this.CONSUME(MultiplicativeOp);
      this.SUBRULE2(this.power);
    });
  });

  // right-associative: the exponent is itself a power
  power = this.RULE("power", () => {
    this.SUBRULE(this.unary);
    this.OPTION(() => {
      this.CONSUME(Caret);
      this.SUBRULE(this.power);
    });
  });

  unary = this.RULE("unary", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Minus);
          this.SUBRULE(this.unary);
        },
      },
      { ALT: () => this.SUBRULE(this.primary) },
    ]);
  });

  primary = this.RULE("primary", () => {
    this.OR([
      { ALT: () => this.CONSUME(NumberLit) },
      { ALT: () => this.SUBRULE(this.symbolOrCall) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.expression);
          this.CONSUME(RParen);
        },
      },
    ]);
  });

  // a name directly followed by "(" is a call
  symbolOrCall = this.RULE("symbolOrCall", () => {
    this.CONSUME(Ident);
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.OPTION2(() => {
        this.SUBRULE(this.expression);
        this.MANY(() => {
          this.CONSUME(Comma);
          this.SUBRULE2(this.expression);
        });
      });
      this.CONSUME(RParen);
    });
  });
}

// Singleton parser instance
const cstParser = new FormCstParser();

// --- CST access ---

function isCstNode(el: CstElement): el is CstNode {
  return "children" in el;
}

function nodes(cst: CstNode, name: string): CstNode[] {
  return (cst.children[name] ?? []).filter(isCstNode);
}

function tokens(cst: CstNode, name: string): IToken[] {
  return (cst.children[name] ?? []).filter((el): el is IToken => !isCstNode(el));
}

function node(cst: CstNode, name: string): CstNode {
  const found = nodes(cst, name)[0];
  if (!found) throw new Error(`Missing '${name}' in ${cst.name}`);
  return found;
}

function image(cst: CstNode, name: string): string {
  const found = tokens(cst, name)[0];
  if (!found) throw new Error(`Missing '${name}' in ${cst.name}`);
  return found.image;
}

// --- CST to AST visitor ---

function visitStatement(cst: CstNode): AST.Statement {
  const children = cst.children;
  if (children["symbolsDecl"]) {
    const decl = node(cst, "symbolsDecl");
    return { kind: "SymbolsDecl", names: tokens(decl, "Ident").map((t) => t.image) };
  }
  if (children["expressionDecl"]) {
    const decl = node(cst, "expressionDecl");
    return {
      kind: "ExpressionDecl",
      name: image(decl, "Ident"),
      expr: visitExpression(node(decl, "expression")),
    };
  }
  if (children["localDecl"]) {
    const decl = node(cst, "localDecl");
    return {
      kind: "LocalDecl",
      name: image(decl, "Ident"),
      expr: visitExpression(node(decl, "expression")),
    };
  }
  if (children["idRule"]) {
    const [pattern, replacement] = nodes(node(cst, "idRule"), "expression");
    return {
      kind: "IdRule",
      pattern: visitExpression(pattern),
      replacement: visitExpression(replacement),
    };
  }
  if (children["printStmt"]) {
    return { kind: "Print", name: image(node(cst, "printStmt"), "Ident") };
  }
  if (children["Sort"]) {
    return { kind: "Sort" };
  }
  return { kind: "EvalExpr", expr: visitExpression(node(cst, "expression")) };
}

function foldLeft(
  operands: AST.Expr[],
  operators: IToken[],
  opFor: (token: IToken) => AST.BinOpKind
): AST.Expr {
  let result = operands[0];
  operators.forEach((operator, i) => {
    result = AST.binOp(opFor(operator), result, operands[i + 1]);
  });
  return result;
}

function visitExpression(cst: CstNode): AST.Expr {
  return foldLeft(
    nodes(cst, "term").map(visitTerm),
    tokens(cst, "AdditiveOp"),
    (t) => (t.tokenType === Minus ? "Sub" : "Add")
  );
}

function visitTerm(cst: CstNode): AST.Expr {
  return foldLeft(
    nodes(cst, "power").map(visitPower),
    tokens(cst, "MultiplicativeOp"),
    (t) => (t.tokenType === Slash ? "Div" : "Mul")
  );
}

function visitPower(cst: CstNode): AST.Expr {
  const base = visitUnary(node(cst, "unary"));
  const exponent = nodes(cst, "power")[0];
  return exponent ? AST.binOp("Pow", base, visitPower(exponent)) : base;
}

function visitUnary(cst: CstNode): AST.Expr {
  const inner = nodes(cst, "unary")[0];
  if (inner) {
    return AST.neg(visitUnary(inner));
  }
  return visitPrimary(node(cst, "primary"));
}

function visitPrimary(cst: CstNode): AST.Expr {
  const children = cst.children;
  if (children["NumberLit"]) {
    return AST.num(numberValue(image(cst, "NumberLit")));
  }
  if (children["symbolOrCall"]) {
    const target = node(cst, "symbolOrCall");
    const name = image(target, "Ident");
    if (target.children["LParen"]) {
      return AST.call(name, nodes(target, "expression").map(visitExpression));
    }
    return AST.sym(name);
  }
  return visitExpression(node(cst, "expression"));
}

// --- Public API ---

export interface ParseResult {
  statement?: AST.Statement;
  diagnostics: Diagnostic[];
}

// Chevrotain's EOF token carries NaN positions
function position(value: number | undefined): number {
  return value === undefined || Number.isNaN(value) ? 1 : value;
}

function tokenSpan(token: IToken, file: string): Span {
  return {
    file,
    startLine: position(token.startLine),
    startCol: position(token.startColumn),
    endLine: position(token.endLine),
    endCol: position(token.endColumn) + 1,
  };
}

/**
 * Parse one submission into a single statement. Tokens left over after the
 * statement are ignored.
 */
export function parse(source: string, file: string = "<stdin>"): ParseResult {
  const lexResult = FormLexer.tokenize(source);

  if (lexResult.tokens.every((t) => t.tokenType === Newline)) {
    return {
      diagnostics: [makeDiag("E_PARSE", "End of input", undefined, "Enter a statement or an expression.")],
    };
  }

  cstParser.input = lexResult.tokens;
  const cst = cstParser.statement();

  const errors = cstParser.errors.filter((err) => !(err instanceof NotAllInputParsedException));
  if (errors.length > 0) {
    const err = errors[0];
    return {
      diagnostics: [makeDiag("E_PARSE", err.message, tokenSpan(err.token, file))],
    };
  }

  return { statement: visitStatement(cst), diagnostics: [] };
}
