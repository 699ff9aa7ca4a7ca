export type CliArgs = {
  template: string | null;
  positionals: string[];
  configPath: string | null;
  sanitize: boolean;
  check: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
};

export type CliArgsParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

const ALIASES: Readonly<Record<string, string>> = {
  "-t": "--template",
  "-v": "--verbose",
  "-h": "--help",
  "-V": "--version",
};

const VALUE_FLAGS = new Set(["--template", "--config"]);

/**
 * Parse argv (without the node binary and script path).
 * `--flag=value` and `--flag value` are both accepted; `--` ends option parsing.
 */
export function parseCliArgs(argv: readonly string[]): CliArgsParseResult {
  const args: CliArgs = {
    template: null,
    positionals: [],
    configPath: null,
    sanitize: false,
    check: false,
    verbose: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--") {
      args.positionals.push(...argv.slice(i + 1));
      break;
    }
    if (arg === "-" || !arg.startsWith("-")) {
      args.positionals.push(arg);
      continue;
    }

    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const rawName = eq === -1 ? arg : arg.slice(0, eq);
    const name = ALIASES[rawName] ?? rawName;

    if (VALUE_FLAGS.has(name)) {
      let value: string | undefined;
      if (eq !== -1) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i += 1;
      }
      if (value === undefined || value === "") {
        return { ok: false, error: `${name} requires a value` };
      }
      if (name === "--template") {
        args.template = value;
      } else {
        args.configPath = value;
      }
      continue;
    }

    if (eq !== -1) {
      return { ok: false, error: `${name} does not take a value` };
    }
    switch (name) {
      case "--sanitize":
        args.sanitize = true;
        break;
      case "--check":
        args.check = true;
        break;
      case "--verbose":
        args.verbose = true;
        break;
      case "--help":
        args.help = true;
        break;
      case "--version":
        args.version = true;
        break;
      default:
        return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  return { ok: true, args };
}
