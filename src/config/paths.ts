import os from "node:os";
import path from "node:path";

const CONFIG_DIRNAME = "tagrename";
const CONFIG_FILENAME = "config.json";

/**
 * Verbose mode: TAGRENAME_VERBOSE=1 turns on diagnostics regardless of config.
 */
export function resolveIsVerboseEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.TAGRENAME_VERBOSE === "1";
}

function resolveUserPath(input: string, homedir: () => string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  if (trimmed === "~" || trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return path.resolve(path.join(homedir(), trimmed.slice(1)));
  }
  return path.resolve(trimmed);
}

/**
 * Config file path (JSON).
 * Can be overridden via TAGRENAME_CONFIG.
 * Default: $XDG_CONFIG_HOME/tagrename/config.json, else ~/.config/tagrename/config.json
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.TAGRENAME_CONFIG?.trim();
  if (override) {
    return resolveUserPath(override, homedir);
  }
  const xdg = env.XDG_CONFIG_HOME?.trim();
  const base = xdg ? resolveUserPath(xdg, homedir) : path.join(homedir(), ".config");
  return path.join(base, CONFIG_DIRNAME, CONFIG_FILENAME);
}
