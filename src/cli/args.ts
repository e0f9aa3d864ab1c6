export interface ParsedArgs {
  pdfPath?: string;
  outputDir: string;
  configPath?: string;
  help: boolean;
  unknown: string[];
}

export const DEFAULT_OUTPUT_DIR = "output";

export function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  const result: ParsedArgs = {
    outputDir: DEFAULT_OUTPUT_DIR,
    help: false,
    unknown: [],
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
      continue;
    }

    if ((arg === "--output-dir" || arg === "-o") && i + 1 < argv.length) {
      result.outputDir = argv[i + 1];
      i += 2;
      continue;
    }

    if (arg.startsWith("--output-dir=")) {
      result.outputDir = arg.slice("--output-dir=".length);
      i++;
      continue;
    }

    if ((arg === "--config" || arg === "-c") && i + 1 < argv.length) {
      result.configPath = argv[i + 1];
      i += 2;
      continue;
    }

    if (arg.startsWith("-")) {
      result.unknown.push(arg);
      i++;
      continue;
    }

    if (!result.pdfPath) {
      result.pdfPath = arg;
    } else {
      result.unknown.push(arg);
    }
    i++;
  }

  return result;
}

export function getValidationError(args: ParsedArgs): string | null {
  if (args.unknown.length > 0) {
    return `Unknown argument: ${args.unknown[0]}`;
  }

  if (!args.pdfPath) {
    return "Missing PDF path.";
  }

  if (!args.outputDir.trim()) {
    return "Output directory must not be empty.";
  }

  return null;
}

export function getHelpText(): string {
  return `Split a standards PDF into JSON and Excel clause files.

Usage:
  extract-clauses <pdf> [--output-dir <dir>] [--config <file>]

Options:
  -o, --output-dir <dir>   Directory where outputs will be written (default: ${DEFAULT_OUTPUT_DIR})
  -c, --config <file>      JSON file overriding extraction thresholds and boilerplate patterns
  -h, --help               Show this help
`;
}
