export type CliOptions = {
  configPath: string;
  outputFile: string;
  strategy?: string;
  help: boolean;
};

export const USAGE = `Usage: gridroute [config.json] [--strategy <name>] [--output <file>]

Options:
  --strategy <name>  Optimization strategy (overrides the config file)
  --output <file>    HTML file to write (default: output.html)
  -h, --help         Show this message`;

const VALUE_FLAGS = new Set(["--strategy", "--output"]);

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    configPath: "config.json",
    outputFile: "output.html",
    help: false
  };
  const positional: string[] = [];
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      options.help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const [flag, inlineValue] = arg.split(/=(.*)/s, 2);
    if (!VALUE_FLAGS.has(flag)) {
      throw new Error(`Unknown option '${flag}'.`);
    }
    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || value === "") {
      throw new Error(`Option '${flag}' requires a value.`);
    }
    if (inlineValue === undefined) {
      i += 1;
    }
    values.set(flag, value);
  }

  if (positional.length > 1) {
    throw new Error(`Expected at most one config file, got ${positional.length}.`);
  }

  options.configPath = positional[0] ?? options.configPath;
  options.outputFile = values.get("--output") ?? options.outputFile;
  options.strategy = values.get("--strategy");
  return options;
}
