import { describe, it, expect } from "vitest";
import { createLogger } from "@quarry/logger";
import { run, EXIT_FAILURE, EXIT_OK, EXIT_USAGE } from "./cli.js";
import type { CliIO } from "./cli.js";
import { USAGE } from "./args.js";

const REPORT = [
  "Quarterly revenue grew by twelve percent.",
  "Customer churn fell to a record low.",
  "The installation guide covers configuration steps.",
  "Revenue growth was driven by new enterprise contracts.",
].join(" ");

function fakeIO(files: Record<string, string> = {}) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIO = {
    env: {},
    stdout: (text) => void stdout.push(text),
    stderr: (text) => void stderr.push(text),
    readFile: (path) => {
      const content = files[path];
      return content === undefined
        ? Promise.reject(new Error(`ENOENT: no such file, open '${path}'`))
        : Promise.resolve(content);
    },
    logger: createLogger({ level: "silent" }),
  };
  return { io, stdout, stderr };
}

describe("run", () => {
  it("prints the context block for the best passages", async () => {
    const { io, stdout, stderr } = fakeIO({ "docs/report.txt": REPORT });

    const code = await run(
      ["docs/report.txt", "revenue", "growth", "--top-k", "1", "--chunk-size", "60", "--overlap", "0"],
      io,
    );

    expect(code).toBe(EXIT_OK);
    expect(stderr).toEqual([]);
    expect(stdout).toEqual([
      "[1] (Source: report.txt, relevance 0.700)\nRevenue growth was driven by new enterprise contracts.",
    ]);
  });

  it("prints the full result as JSON", async () => {
    const { io, stdout } = fakeIO({ "report.txt": REPORT });

    const code = await run(["report.txt", "churn", "--json", "--chunk-size=60", "--overlap=0", "--top-k=2"], io);

    expect(code).toBe(EXIT_OK);
    const result: unknown = JSON.parse(stdout[0] ?? "null");
    expect(result).toMatchObject({
      documentId: "report.txt",
      query: "churn",
      scoringMethod: "lexical",
      documentType: "business",
      metadata: { totalChunksSearched: 4 },
    });
  });

  it("prints usage and exits 2 on bad arguments", async () => {
    const { io, stderr } = fakeIO();

    const code = await run([], io);

    expect(code).toBe(EXIT_USAGE);
    expect(stderr).toEqual([`Missing <file>\n\n${USAGE}`]);
  });

  it("prints usage for --help", async () => {
    const { io, stdout } = fakeIO();
    await expect(run(["--help"], io)).resolves.toBe(EXIT_OK);
    expect(stdout).toEqual([USAGE]);
  });

  it("exits 2 on invalid engine settings", async () => {
    const { io, stderr } = fakeIO({ "report.txt": REPORT });

    const code = await run(["report.txt", "q", "--chunk-size", "100", "--overlap", "100"], io);

    expect(code).toBe(EXIT_USAGE);
    expect(stderr).toEqual([
      "Invalid engine configuration\n  overlap: overlap must be smaller than chunkSize",
    ]);
  });

  it("checks LOG_LEVEL before building a logger", async () => {
    const { io, stderr } = fakeIO({ "report.txt": REPORT });

    const code = await run(["report.txt", "q"], { ...io, env: { LOG_LEVEL: "verbose" }, logger: undefined });

    expect(code).toBe(EXIT_USAGE);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(/^Invalid environment\n {2}LOG_LEVEL: Invalid enum value/);
  });

  it("exits 1 for an empty document", async () => {
    const { io, stderr } = fakeIO({ "empty.txt": "   \n\n  " });

    const code = await run(["empty.txt", "anything"], io);

    expect(code).toBe(EXIT_FAILURE);
    expect(stderr).toEqual(['Document "empty.txt" has no extractable text']);
  });

  it("exits 1 when the file cannot be read", async () => {
    const { io, stderr } = fakeIO();

    const code = await run(["missing.txt", "anything"], io);

    expect(code).toBe(EXIT_FAILURE);
    expect(stderr).toEqual(["Cannot read missing.txt: ENOENT: no such file, open 'missing.txt'"]);
  });
});
