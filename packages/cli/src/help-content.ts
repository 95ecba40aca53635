/**
 * formlite CLI help content.
 * Terse reference pages for terminal output.
 */

export const QUICKREF = `
FORMLITE QUICK REFERENCE
========================

STATEMENTS (one per line)
  Symbols x, y, z               declare symbols
  Expression e = (x + y)^2      store a simplified expression
  Local a = x + 1               same as Expression
  id x = 1                      add a rewrite rule
  Print e                       show a stored expression
  .sort                         apply all rules to every stored expression
  2 + 3 * 4                     evaluate without storing

OPERATORS (loosest first)
  + -     left-assoc
  * /     left-assoc
  ^       right-assoc
  -x      unary minus
  f(a, b) call; sin cos exp log fold on one number

REPL COMMANDS
  quit, exit    leave           help     this page
  clear         forget all symbols, expressions and rules

EXIT CODES (formlite run): 0=ok  2=parse error  4=evaluation or IO error

Topics: formlite help syntax|commands|examples
`.trimStart();

export const TOPICS: Record<string, string> = {

// ─── SYNTAX ─────────────────────────────────────────────────────────────────
syntax: `
FORMLITE SYNTAX
===============

COMMENTS
  * text        a line starting with "* " is ignored

NUMBERS
  42   3.5      digits and dots; no exponent, no sign (use unary -)

IDENTIFIERS
  a letter or _, then letters, digits or _ (any script: café, Ω2)
  keywords are case-sensitive

STATEMENTS
  Symbols a, b               record a and b as symbols
  Expression name = expr     store simplify(expr) under name
  Local name = expr          identical to Expression
  id pattern = replacement   append a rewrite rule
  Print name                 show a stored expression
  .sort                      rewrite every stored expression
  expr                       evaluate and show, store nothing
  A trailing ';' is allowed. Tokens after a complete statement are ignored.

PRECEDENCE
  expression := term (('+' | '-') term)*
  term       := power (('*' | '/') power)*
  power      := unary ('^' power)?
  unary      := '-' unary | primary
  primary    := number | name | name '(' args? ')' | '(' expression ')'

SIMPLIFICATION
  numbers fold:        2 * 3 -> 6     1 / 0 -> error
  identities:          x + 0 -> x     x * 0 -> 0     x * 1 -> x
                       x ^ 0 -> 1     x ^ 1 -> x
  stored names are substituted wherever they appear
`.trimStart(),

// ─── COMMANDS ───────────────────────────────────────────────────────────────
commands: `
FORMLITE COMMANDS
=================

  formlite [repl]            interactive session (default)
  formlite run <file|->      evaluate a file, or stdin with '-'
  formlite help [topic]      this help; topics may be abbreviated
  formlite config [--json]   effective configuration and its source

FLAGS (repl and run)
  --verbose    trace events to stderr as JSON lines
  --timing     elapsed time per statement to stderr
  --pretty     diagnostics with location and hint
  --json       diagnostics as a JSON array (overrides --pretty)

INPUT
  Lines with unclosed '(' continue on the next line.
  Blank and comment-only lines are skipped.

CONFIGURATION (first found wins)
  ./.formliterc.json
  ~/.formlite/config.json
  { "verbose": false, "showTiming": false, "prompt": "formlite> " }
`.trimStart(),

// ─── EXAMPLES ───────────────────────────────────────────────────────────────
examples: `
FORMLITE EXAMPLES
=================

RULES AND SORT
  formlite> Symbols x, y
    Symbols declared
  formlite> Expression e = (x + 1) * (x - 1)
    e = ((x + 1) * (x - 1))
  formlite> id x = 2
    Rule added: x -> 2
  formlite> .sort
    Sorted and rules applied
  formlite> Print e
    e = 3

ARITHMETIC
  formlite> 2 + 3 * 4
    14
  formlite> 2 ^ 3 ^ 2
    512
  formlite> x * 1 + 0
    x
`.trimStart(),

};

export const TOPIC_LIST = Object.keys(TOPICS);
