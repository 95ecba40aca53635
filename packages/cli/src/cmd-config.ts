/**
 * formlite config - effective configuration summary command
 */
import { resolveConfig } from "./config.js";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: resolved.config,
        },
        null,
        2
      )
    );
    return 0;
  }

  const { config } = resolved;
  console.log("Effective formlite configuration");
  console.log(`  Source:      ${resolved.source}`);
  console.log(`  Path:        ${resolved.path ?? "(none)"}`);
  console.log(`  Verbose:     ${config.verbose ? "on" : "off"}`);
  console.log(`  Show timing: ${config.showTiming ? "on" : "off"}`);
  console.log(`  Prompt:      ${JSON.stringify(config.prompt)}`);
  return 0;
}
