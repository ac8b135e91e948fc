import type { ContextFormat } from "@quarry/types";
import { AppError } from "@quarry/errors";

export const USAGE = `Usage: quarry <file> <query...> [options]

Retrieve the passages of a text file most relevant to a query.

Options:
  --top-k N          number of passages to return
  --chunk-size N     maximum characters per chunk
  --overlap N        characters carried between chunks
  --format FORMAT    plain | markdown | xml
  --json             print the full retrieval result as JSON
  -h, --help         show this help`;

export interface CliArgs {
  file: string;
  query: string;
  topK?: number;
  chunkSize?: number;
  overlap?: number;
  format?: ContextFormat;
  json: boolean;
  help: boolean;
}

export class UsageError extends AppError {
  constructor(message: string) {
    super({ message, statusCode: 400, code: "USAGE_ERROR" });
  }
}

const FORMATS: readonly ContextFormat[] = ["plain", "markdown", "xml"];

function isFormat(value: string): value is ContextFormat {
  return FORMATS.some((format) => format === value);
}

function parseCount(flag: string, value: string, allowZero: boolean): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`${flag} expects a ${allowZero ? "non-negative" : "positive"} integer, got "${value}"`);
  }
  const n = Number(value);
  if (!allowZero && n === 0) {
    throw new UsageError(`${flag} expects a positive integer, got "${value}"`);
  }
  return n;
}

/**
 * Parse `quarry <file> <query...>` arguments. Options may appear anywhere,
 * as `--flag value` or `--flag=value`; `--` ends option parsing.
 *
 * @throws UsageError on unknown options, missing values or missing positionals.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const positionals: string[] = [];
  const args: Omit<CliArgs, "file" | "query"> = { json: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;

    if (arg === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith("-") || arg === "-") {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);
    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined) throw new UsageError(`${flag} requires a value`);
      i++;
      return next;
    };

    switch (flag) {
      case "-h":
      case "--help":
        args.help = true;
        break;
      case "--json":
        args.json = true;
        break;
      case "--top-k":
        args.topK = parseCount(flag, takeValue(), false);
        break;
      case "--chunk-size":
        args.chunkSize = parseCount(flag, takeValue(), false);
        break;
      case "--overlap":
        args.overlap = parseCount(flag, takeValue(), true);
        break;
      case "--format": {
        const value = takeValue();
        if (!isFormat(value)) {
          throw new UsageError(`--format must be one of ${FORMATS.join(", ")}, got "${value}"`);
        }
        args.format = value;
        break;
      }
      default:
        throw new UsageError(`Unknown option: ${flag}`);
    }
  }

  const [file, ...queryWords] = positionals;
  if (args.help) {
    return { ...args, file: file ?? "", query: queryWords.join(" ") };
  }
  if (!file) throw new UsageError("Missing <file>");
  const query = queryWords.join(" ").trim();
  if (!query) throw new UsageError("Missing <query>");

  return { ...args, file, query };
}
