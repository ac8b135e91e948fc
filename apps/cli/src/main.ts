#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { config as loadDotenv } from "dotenv";
import { run, formatFatal, EXIT_FAILURE } from "./cli.js";

loadDotenv();

async function main(): Promise<void> {
  const code = await run(process.argv.slice(2), {
    env: process.env,
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    readFile: (path) => readFile(path, "utf8"),
  });
  process.exitCode = code;
}

main().catch((err: unknown) => {
  process.stderr.write(`[quarry] Fatal error: ${formatFatal(err)}\n`);
  process.exitCode = EXIT_FAILURE;
});
