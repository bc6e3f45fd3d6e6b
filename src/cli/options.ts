export interface Options {
  input: string | null;
  output: string | null;
  verbose: boolean;
  cleanup: boolean;
  maxScopeNames: number | undefined;
  help: boolean;
}

export function parseArgs(argv: string[]): Options {
  const opts: Options = {
    input: null,
    output: null,
    verbose: false,
    cleanup: true,
    maxScopeNames: undefined,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-o" || arg === "--output") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -o/--output");
      opts.output = value;
      i += 1;
      continue;
    }
    if (arg === "--max-scope-names") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for --max-scope-names");
      const limit = Number(value);
      if (!Number.isInteger(limit) || limit < 0) {
        throw new Error(`Invalid value for --max-scope-names: ${value}`);
      }
      opts.maxScopeNames = limit;
      i += 1;
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      opts.verbose = true;
      continue;
    }
    if (arg === "--no-cleanup") {
      opts.cleanup = false;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      opts.help = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      if (opts.input !== null) {
        throw new Error(`Unexpected extra input: ${arg}`);
      }
      opts.input = arg;
      continue;
    }
    throw new Error(`Unknown option: ${arg}`);
  }

  return opts;
}

export const HELP_TEXT = `Usage: label-threader <file> [options]

Options:
  -o, --output <file>        Write the optimized module here (default: stdout)
  -v, --verbose              Log per-function results
  --no-cleanup               Keep nops and unused scope names after threading
  --max-scope-names <n>      Scope-name pairs per function (default: 1000)
  -h, --help                 Show this help

Examples:
  label-threader flattened.sir
  label-threader flattened.sir -o threaded.sir -v
`;
