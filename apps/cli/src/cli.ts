import { basename } from "node:path";
import type { AppConfig, EngineConfig } from "@quarry/types";
import { parseEnv } from "@quarry/config";
import { createEngineFromConfig } from "@quarry/core";
import type { RetrievalEngine } from "@quarry/core";
import { AppError, EmptyDocumentError, InvalidConfigurationError } from "@quarry/errors";
import { createLogger } from "@quarry/logger";
import type { Logger } from "@quarry/logger";
import { parseArgs, UsageError, USAGE } from "./args.js";
import type { CliArgs } from "./args.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
  logger?: Logger;
}

function engineOverrides(args: CliArgs): Partial<EngineConfig> {
  const overrides: Partial<EngineConfig> = {};
  if (args.topK !== undefined) overrides.topK = args.topK;
  if (args.chunkSize !== undefined) overrides.chunkSize = args.chunkSize;
  if (args.overlap !== undefined) overrides.overlap = args.overlap;
  if (args.format !== undefined) overrides.contextFormat = args.format;
  return overrides;
}

function describeConfigError(error: InvalidConfigurationError): string {
  const fields = Object.entries(error.fields).map(([field, message]) => `  ${field}: ${message}`);
  return [error.message, ...fields].join("\n");
}

/** Logs go to stderr, quiet below warn unless LOG_LEVEL says otherwise. */
function cliLogger(appConfig: AppConfig, env: CliIO["env"]): Logger {
  return createLogger({
    level: env["LOG_LEVEL"] === undefined ? "warn" : appConfig.logLevel,
    service: "quarry-cli",
    destination: process.stderr,
  });
}

/**
 * Run one ingest-and-retrieve round for a text file. Resolves to the process
 * exit code.
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  let engine: RetrievalEngine;
  try {
    const appConfig = parseEnv(io.env);
    const logger = io.logger ?? cliLogger(appConfig, io.env);
    engine = createEngineFromConfig(appConfig, { logger, config: engineOverrides(args) });
  } catch (error: unknown) {
    if (error instanceof InvalidConfigurationError) {
      io.stderr(describeConfigError(error));
      return EXIT_USAGE;
    }
    throw error;
  }

  let text: string;
  try {
    text = await io.readFile(args.file);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    io.stderr(`Cannot read ${args.file}: ${reason}`);
    return EXIT_FAILURE;
  }

  const filename = basename(args.file);
  try {
    await engine.ingest(filename, text, { filename });
  } catch (error: unknown) {
    if (error instanceof EmptyDocumentError) {
      io.stderr(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const result = await engine.retrieve(filename, args.query, args.topK);

  if (args.json) {
    io.stdout(JSON.stringify(result, null, 2));
  } else {
    io.stdout(result.context);
  }
  return EXIT_OK;
}

export function formatFatal(error: unknown): string {
  if (AppError.isAppError(error)) return `${error.code}: ${error.message}`;
  return error instanceof Error ? (error.stack ?? error.message) : String(error);
}
