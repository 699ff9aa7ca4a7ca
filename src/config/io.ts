import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import fs from "node:fs";
import os from "node:os";
import { resolveConfigPath } from "./paths.js";

export const TagRenameConfigSchema = Type.Object(
  {
    template: Type.Optional(
      Type.String({
        minLength: 1,
        description: "Template used when none is given on the command line",
      }),
    ),
    sanitize: Type.Optional(
      Type.Boolean({
        description: "Replace path separators and strip control chars in tag values",
      }),
    ),
    verbose: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

export type TagRenameConfig = Static<typeof TagRenameConfigSchema>;

export class ConfigError extends Error {
  constructor(
    readonly configPath: string,
    message: string,
  ) {
    super(`${configPath}: ${message}`);
    this.name = "ConfigError";
  }
}

export type ConfigIOParams = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  configPath?: string;
};

export type ConfigIO = {
  configPath: string;
  loadConfig: () => TagRenameConfig;
};

/**
 * Read and validate a config file. A missing file is an empty config.
 */
export function readConfigFile(configPath: string): TagRenameConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      return {};
    }
    throw new ConfigError(configPath, err instanceof Error ? err.message : String(err));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(configPath, `invalid JSON (${reason})`);
  }

  if (!Value.Check(TagRenameConfigSchema, parsed)) {
    const first = Value.Errors(TagRenameConfigSchema, parsed).First();
    const where = first?.path || "/";
    throw new ConfigError(configPath, `${where}: ${first?.message ?? "invalid config"}`);
  }
  return parsed;
}

export function createConfigIO(params: ConfigIOParams = {}): ConfigIO {
  const env = params.env ?? process.env;
  const homedir = params.homedir ?? os.homedir;
  const configPath = params.configPath ?? resolveConfigPath(env, homedir);
  return {
    configPath,
    loadConfig: () => readConfigFile(configPath),
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
