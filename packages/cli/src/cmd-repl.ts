/**
 * formlite repl - interactive line loop
 */
import * as readline from "node:readline";
import { resolveConfig, hostSettings, type HostFlags } from "./config.js";
import { createSession, submit } from "./host.js";
import { SubmissionBuffer } from "./submissions.js";
import { QUICKREF } from "./help-content.js";

export const CONTINUATION_PROMPT = "...> ";

export interface ReplOptions extends HostFlags {
  cwd?: string;
  homeDir?: string;
  /** Line source; defaults to stdin. Prompts are shown only on a terminal. */
  input?: NodeJS.ReadableStream;
}

export async function runRepl(opts: ReplOptions = {}): Promise<number> {
  const settings = hostSettings(resolveConfig(opts.cwd, opts.homeDir).config, opts);
  const interactive = opts.input === undefined && process.stdin.isTTY === true;
  const rl = readline.createInterface({
    input: opts.input ?? process.stdin,
    output: interactive ? process.stdout : undefined,
    terminal: interactive,
  });

  const session = createSession(settings);
  const buffer = new SubmissionBuffer();

  const prompt = (): void => {
    if (!interactive) return;
    rl.setPrompt(buffer.pending ? CONTINUATION_PROMPT : settings.prompt);
    rl.prompt();
  };

  if (interactive) {
    console.log("formlite REPL");
    console.log("Type 'quit' or 'exit' to leave, 'help' for help\n");
  }
  prompt();

  let quit = false;
  try {
    for await (const line of rl) {
      const command = buffer.pending ? "" : line.trim();
      if (command === "quit" || command === "exit") {
        quit = true;
        break;
      }
      if (command === "help") {
        console.log(QUICKREF);
      } else if (command === "clear") {
        session.clear();
        console.log("Environment cleared");
      } else {
        const text = buffer.push(line);
        if (text !== null) submit(session, text, settings);
      }
      prompt();
    }
  } finally {
    rl.close();
  }

  if (!quit) {
    const rest = buffer.flush();
    if (rest !== null) submit(session, rest, settings);
  }
  console.log("Goodbye!");
  return 0;
}
