/**
 * formlite lexer using Chevrotain.
 *
 * Nothing here ever reports an error: characters no token matches are dropped
 * by the lexer's own recovery and the caller ignores `errors`.
 */
import { createToken, Lexer, type IToken } from "chevrotain";

// Identifiers: any Unicode letter or underscore, then letters, digits or
// underscores (keywords point back here through longer_alt)
export const Ident = createToken({ name: "Ident", pattern: /[\p{L}_][\p{L}\p{N}_]*/u });

// Keywords, matched by exact text
export const Symbols = createToken({ name: "Symbols", pattern: /Symbols/, longer_alt: Ident });
export const Expression = createToken({ name: "Expression", pattern: /Expression/, longer_alt: Ident });
export const Local = createToken({ name: "Local", pattern: /Local/, longer_alt: Ident });
export const Id = createToken({ name: "Id", pattern: /id/, longer_alt: Ident });
export const Print = createToken({ name: "Print", pattern: /Print/, longer_alt: Ident });

// `.word` directives: only `.sort` survives, every other one is skipped
const DOT_WORD = /\.([A-Za-z0-9_]*)/y;

function matchSortDirective(text: string, offset: number): RegExpExecArray | null {
  DOT_WORD.lastIndex = offset;
  const match = DOT_WORD.exec(text);
  return match !== null && match[1] === "sort" ? match : null;
}

export const Sort = createToken({
  name: "Sort",
  pattern: matchSortDirective,
  line_breaks: false,
  start_chars_hint: ["."],
});
export const DotWord = createToken({
  name: "DotWord",
  pattern: /\.[A-Za-z0-9_]*/,
  group: Lexer.SKIPPED,
});

// A leading "* " comments out the first line of a submission, nothing else
const LEADING_COMMENT = /\* [^\n]*/y;

function matchLeadingComment(text: string, offset: number): RegExpExecArray | null {
  if (offset !== 0) return null;
  LEADING_COMMENT.lastIndex = 0;
  return LEADING_COMMENT.exec(text);
}

export const Comment = createToken({
  name: "Comment",
  pattern: matchLeadingComment,
  line_breaks: false,
  start_chars_hint: ["*"],
  group: Lexer.SKIPPED,
});

// Literals: digits and dots, no exponent; see numberValue for bad text
export const NumberLit = createToken({ name: "NumberLit", pattern: /\d[\d.]*/ });

// Operator categories keep the operator order visible in the CST
export const AdditiveOp = createToken({ name: "AdditiveOp", pattern: Lexer.NA });
export const MultiplicativeOp = createToken({ name: "MultiplicativeOp", pattern: Lexer.NA });

export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: AdditiveOp });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: AdditiveOp });
export const Star = createToken({ name: "Star", pattern: /\*/, categories: MultiplicativeOp });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: MultiplicativeOp });
export const Caret = createToken({ name: "Caret", pattern: /\^/ });
export const Equals = createToken({ name: "Equals", pattern: /=/ });

// Delimiters
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ });
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });

// Newline is a real token; other whitespace is skipped
export const Newline = createToken({ name: "Newline", pattern: /\n/ });
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t\r]+/,
  group: Lexer.SKIPPED,
});

// Token order matters: Comment before Star, Sort before DotWord, keywords before Ident
export const allTokens = [
  WhiteSpace,
  Newline,
  Comment,
  Sort,
  DotWord,
  NumberLit,
  Symbols,
  Expression,
  Local,
  Id,
  Print,
  Ident,
  AdditiveOp,
  MultiplicativeOp,
  Plus,
  Minus,
  Star,
  Slash,
  Caret,
  Equals,
  LParen,
  RParen,
  LBracket,
  RBracket,
  Comma,
  Semicolon,
];

export const FormLexer = new Lexer(allTokens);

/**
 * Tokenize one submission. Lexing never fails.
 */
export function tokenize(source: string): IToken[] {
  return FormLexer.tokenize(source).tokens;
}

/**
 * Numeric value of a NumberLit image. Text that is not a number, such as
 * `1.2.3`, reads as 0.
 */
export function numberValue(image: string): number {
  const value = Number(image);
  return Number.isNaN(value) ? 0 : value;
}
