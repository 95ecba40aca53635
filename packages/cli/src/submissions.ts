/**
 * Line assembly shared by the REPL and the batch runner.
 *
 * One line is one submission, except that a line leaving a '(' open is
 * joined with the following lines (separated by a space) until the
 * parentheses balance.
 */
import { FormLexer } from "@formlite/core";

/**
 * True for text with nothing to evaluate: empty, whitespace or a comment.
 */
export function isBlank(text: string): boolean {
  const result = FormLexer.tokenize(text);
  return result.tokens.length === 0 && result.errors.length === 0;
}

function parenBalance(text: string): number {
  let depth = 0;
  for (const ch of text) {
    if (ch === "(") depth++;
    if (ch === ")") depth--;
  }
  return depth;
}

export class SubmissionBuffer {
  private parts: string[] = [];
  private depth = 0;

  /** True while an unbalanced submission is waiting for more lines. */
  get pending(): boolean {
    return this.parts.length > 0;
  }

  /**
   * Feed one line. Returns the completed submission, or null when the line
   * was blank or parentheses are still open.
   */
  push(line: string): string | null {
    const text = line.trim();
    if (this.pending ? text === "" : isBlank(text)) return null;

    this.parts.push(text);
    this.depth += parenBalance(text);
    return this.depth > 0 ? null : this.take();
  }

  /** Hand back whatever is left at end of input. */
  flush(): string | null {
    return this.pending ? this.take() : null;
  }

  private reset(): void {
    this.parts = [];
    this.depth = 0;
  }

  private take(): string {
    const text = this.parts.join(" ");
    this.reset();
    return text;
  }
}

export function splitSubmissions(source: string): string[] {
  const buffer = new SubmissionBuffer();
  const submissions: string[] = [];
  for (const line of source.split(/\r?\n/)) {
    const text = buffer.push(line);
    if (text !== null) submissions.push(text);
  }
  const rest = buffer.flush();
  if (rest !== null) submissions.push(rest);
  return submissions;
}
