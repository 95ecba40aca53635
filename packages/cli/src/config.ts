/**
 * formlite configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import type { DiagStyle } from "@formlite/core";

export const configSchema = z
  .object({
    verbose: z.boolean().default(false),
    showTiming: z.boolean().default(false),
    prompt: z.string().default("formlite> "),
  })
  .strict();

export type FormliteConfig = z.infer<typeof configSchema>;

export interface ResolvedConfig {
  config: FormliteConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export const PROJECT_CONFIG_FILE = ".formliterc.json";

export const DEFAULT_CONFIG: FormliteConfig = configSchema.parse({});

/**
 * Resolve the effective configuration.
 * Precedence: ./.formliterc.json > ~/.formlite/config.json > defaults
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".formlite", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function warnInvalid(filePath: string, reason: string): void {
  console.error(`warning[E_CONFIG]: ignoring ${filePath}: ${reason}`);
}

// Missing files are silent; unreadable or invalid ones warn and fall through
function tryLoadConfigFile(filePath: string): FormliteConfig | null {
  if (!fs.existsSync(filePath)) return null;

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    warnInvalid(filePath, e instanceof Error ? e.message : String(e));
    return null;
  }

  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    warnInvalid(filePath, describeIssues(parsed.error));
    return null;
  }
  return parsed.data;
}

export interface HostFlags {
  verbose?: boolean;
  timing?: boolean;
  pretty?: boolean;
  json?: boolean;
}

export interface HostSettings {
  verbose: boolean;
  timing: boolean;
  /** How diagnostics are written to stderr; --json wins over --pretty */
  style: DiagStyle;
  prompt: string;
}

/**
 * Combine config values with command-line flags; a flag can only switch a
 * setting on.
 */
export function hostSettings(config: FormliteConfig, flags: HostFlags): HostSettings {
  return {
    verbose: !!flags.verbose || config.verbose,
    timing: !!flags.timing || config.showTiming,
    style: flags.json ? "json" : flags.pretty ? "pretty" : "plain",
    prompt: config.prompt,
  };
}
