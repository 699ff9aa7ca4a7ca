import type { MetadataSource } from "../media/metadata-source.js";
import type { EvaluateOptions } from "../rename/template-evaluate.js";
import { ConfigError, createConfigIO, type TagRenameConfig } from "../config/io.js";
import { resolveIsVerboseEnv } from "../config/paths.js";
import { createAudioTagSource } from "../media/audio-tags.js";
import { createExifTagSource } from "../media/exif-tags.js";
import { createMediaMetadataSource } from "../media/metadata-source.js";
import { planRenames } from "../rename/rename-paths.js";
import { sanitizeFieldValue } from "../rename/sanitize.js";
import { compileTemplate, validateTemplate } from "../rename/template-compile.js";
import { VERSION } from "../version.js";
import { parseCliArgs, type CliArgs } from "./args.js";

export type CliRuntime = {
  log: (message: string) => void;
  error: (message: string) => void;
};

export const defaultRuntime: CliRuntime = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

export type RunCliDeps = {
  runtime?: CliRuntime;
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  source?: MetadataSource;
};

const USAGE = "Usage: tagrename [options] <template> <path...>";

const HELP = `
  tagrename - Rename media files from their tags

  ${USAGE}

  Template fields:
    %album %artist %title %track %year

  Options:
    -t, --template <template>  Template (every positional is then a path)

  A template set in the config file also makes every positional a path,
  except with --check, which checks the first positional when one is given.
    --sanitize                 Replace / and \\ and strip control chars in tag values
    --check                    Validate the template and exit
    --config <path>            Config file (default: ~/.config/tagrename/config.json)
    -v, --verbose              Log each planned rename to stderr
    -h, --help                 Show this help message
    -V, --version              Print the version

  Examples:
    tagrename "%track - %title" music/*.flac
    tagrename --sanitize "%artist - %album - %title" song.mp3
`;

/**
 * Run the CLI and return the process exit code.
 * New paths go to stdout as they are planned; errors go to stderr.
 */
export async function runCli(argv: readonly string[], deps: RunCliDeps = {}): Promise<number> {
  const runtime = deps.runtime ?? defaultRuntime;
  const env = deps.env ?? process.env;

  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    runtime.error(`tagrename: ${parsed.error}`);
    runtime.error(USAGE);
    return 2;
  }
  const args = parsed.args;

  if (args.help) {
    runtime.log(HELP);
    return 0;
  }
  if (args.version) {
    runtime.log(VERSION);
    return 0;
  }

  const io = createConfigIO({
    env,
    homedir: deps.homedir,
    configPath: args.configPath ?? undefined,
  });
  let config: TagRenameConfig;
  try {
    config = io.loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      runtime.error(err.message);
      return 1;
    }
    throw err;
  }

  const verbose = args.verbose || config.verbose === true || resolveIsVerboseEnv(env);
  const debug = (message: string) => {
    if (verbose) {
      runtime.error(`[tagrename] ${message}`);
    }
  };
  debug(`config: ${io.configPath}`);

  const { template, paths } = resolveTemplateAndPaths(args, config);
  if (template === undefined) {
    runtime.error("tagrename: missing template");
    runtime.error(USAGE);
    return 2;
  }

  if (args.check) {
    const errors = validateTemplate(template);
    if (errors.length === 0) {
      runtime.log("ok");
      return 0;
    }
    for (const message of errors) {
      runtime.error(message);
    }
    return 1;
  }

  if (paths.length === 0) {
    runtime.error("tagrename: no input paths");
    runtime.error(USAGE);
    return 2;
  }

  const compiled = compileTemplate(template);
  if (!compiled.ok) {
    runtime.error(compiled.error.message);
    return 1;
  }

  const source =
    deps.source ??
    createMediaMetadataSource({ audio: createAudioTagSource(), image: createExifTagSource() });
  const formatValue: EvaluateOptions["formatValue"] =
    args.sanitize || config.sanitize === true
      ? (_field, value) => sanitizeFieldValue(value)
      : undefined;

  const plan = await planRenames(compiled.value, paths, source, {
    formatValue,
    onProgress: (event) => {
      runtime.log(event.to);
      debug(`${event.index + 1}/${event.total} ${event.from} -> ${event.to}`);
    },
  });
  if (!plan.ok) {
    runtime.error(plan.error.message);
    return 1;
  }
  return 0;
}

function resolveTemplateAndPaths(
  args: CliArgs,
  config: TagRenameConfig,
): { template: string | undefined; paths: string[] } {
  if (args.template !== null) {
    return { template: args.template, paths: args.positionals };
  }
  // --check takes no paths, so a positional is always the template to check.
  const useConfig = args.check ? args.positionals.length === 0 : true;
  if (config.template !== undefined && useConfig) {
    return { template: config.template, paths: args.positionals };
  }
  const [template, ...paths] = args.positionals;
  return { template, paths };
}
