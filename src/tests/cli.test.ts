import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { main } from "../cli";
import { parseCliArgs } from "../lib/runtime/args";
import { loadConfig } from "../lib/runtime/config";
import { createLogger } from "../lib/runtime/logger";
import { createMemorySink, createStubConverter, createTempDir } from "./helpers";

const scenarioCsv = 'id,pos,name\n1,"33T WN 12345 67890",Alice\n2,not-a-coord,Bob\n';
const scenarioOutput =
  "id,pos,name,Latitude,Longitude\n" +
  "1,33T WN 12345 67890,Alice,47.5,15.25\n" +
  "2,not-a-coord,Bob,,\n";

const createIo = (env: NodeJS.ProcessEnv = {}) => {
  const stdout = createMemorySink();
  const stderr = createMemorySink();
  const { converter } = createStubConverter({
    "33TWN1234567890": { latitude: 47.5, longitude: 15.25 }
  });
  return {
    stdout,
    stderr,
    io: { stdout: stdout.stream, stderr: stderr.stream, env, converter }
  };
};

describe("argument parsing", () => {
  it("reads the input path and the output flag", () => {
    expect(parseCliArgs(["in.csv"])).toEqual({ help: false, input: "in.csv" });
    expect(parseCliArgs(["in.csv", "-o", "out.csv"])).toEqual({
      help: false,
      input: "in.csv",
      output: "out.csv"
    });
    expect(parseCliArgs(["--output", "out.csv", "in.csv"])).toEqual({
      help: false,
      input: "in.csv",
      output: "out.csv"
    });
  });

  it("recognises help", () => {
    expect(parseCliArgs(["--help"])).toEqual({ help: true });
  });

  const invalid: Array<[string[], string]> = [
    [[], "Missing required argument: <INPUT>"],
    [["a.csv", "b.csv"], "Unexpected argument: b.csv"],
    [["a.csv", "--verbose"], "Invalid arguments"],
    [["a.csv", "--output", ""], "Invalid arguments: output path must not be empty"]
  ];

  it.each(invalid)("rejects %j", (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(message);
  });
});

describe("configuration", () => {
  it("uses defaults", () => {
    expect(loadConfig({})).toEqual({ logLevel: "error", sampleRows: 100 });
  });

  it("reads overrides from the environment", () => {
    expect(loadConfig({ MGRS_CSV_LOG_LEVEL: "debug", MGRS_CSV_SAMPLE_ROWS: "25" })).toEqual({
      logLevel: "debug",
      sampleRows: 25
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ MGRS_CSV_SAMPLE_ROWS: "0" })).toThrow(
      /^Invalid configuration: MGRS_CSV_SAMPLE_ROWS: /
    );
    expect(() => loadConfig({ MGRS_CSV_LOG_LEVEL: "loud" })).toThrow(
      /^Invalid configuration: MGRS_CSV_LOG_LEVEL: /
    );
  });
});

describe("logger", () => {
  it("filters by level and tags events", () => {
    const sink = createMemorySink();
    const logger = createLogger("info", sink.stream);

    logger.info("start");
    logger.debug("column-scores");
    logger.error("fail");

    expect(sink.text()).toBe("[mgrs-csv] start\n[mgrs-csv] fail\n");
  });
});

describe("command line", () => {
  const cleanups: Array<() => Promise<void>> = [];

  afterEach(async () => {
    await Promise.all(cleanups.splice(0).map((cleanup) => cleanup()));
  });

  const setup = async (contents: string) => {
    const temp = await createTempDir();
    cleanups.push(temp.cleanup);
    return { temp, inputPath: await temp.file("input.csv", contents) };
  };

  it("streams CSV to stdout and the summary to stderr when no output is given", async () => {
    const { inputPath } = await setup(scenarioCsv);
    const { stdout, stderr, io } = createIo();

    const code = await main([inputPath], io);

    expect(code).toBe(0);
    expect(stdout.text()).toBe(scenarioOutput);
    expect(stderr.text()).toBe("Processed 2 records. MGRS column detected at index 1.\n");
  });

  it("prints the summary to stdout when writing a file", async () => {
    const { temp, inputPath } = await setup(scenarioCsv);
    const outputPath = path.join(temp.dir, "out.csv");
    const { stdout, stderr, io } = createIo();

    const code = await main([inputPath, "--output", outputPath], io);

    expect(code).toBe(0);
    expect(readFileSync(outputPath, "utf8")).toBe(scenarioOutput);
    expect(stdout.text()).toBe("Processed 2 records. MGRS column detected at index 1.\n");
    expect(stderr.text()).toBe("");
  });

  it("exits non-zero without creating output when no column is detected", async () => {
    const { temp, inputPath } = await setup("id,name\n1,Alice\n");
    const outputPath = path.join(temp.dir, "out.csv");
    const { stdout, stderr, io } = createIo();

    const code = await main([inputPath, "-o", outputPath], io);

    expect(code).toBe(1);
    expect(stderr.text()).toBe(
      "[mgrs-csv] fail { code: 'NO_COLUMN' }\n" +
        "Error: No MGRS-like column detected in the CSV file\n"
    );
    expect(stdout.text()).toBe("");
    expect(existsSync(outputPath)).toBe(false);
  });

  it("reports the cause of an unreadable record", async () => {
    const { inputPath } = await setup('id,grid\n1,"open\n');
    const { stderr, io } = createIo();

    const code = await main([inputPath], io);

    expect(code).toBe(1);
    expect(stderr.text()).toBe(
      "[mgrs-csv] fail { code: 'RECORD_READ' }\n" +
        "Error: Failed to read CSV record at line 2\nCaused by: unterminated quoted field\n"
    );
  });

  it("reports a missing input file", async () => {
    const { temp } = await setup("");
    const missing = path.join(temp.dir, "nope.csv");
    const { stderr, io } = createIo();

    const code = await main([missing], io);

    expect(code).toBe(1);
    const [logLine, errorLine] = stderr.text().split("\n");
    expect(logLine).toBe("[mgrs-csv] fail { code: 'INPUT_OPEN' }");
    expect(errorLine).toBe(`Error: Failed to open input file: ${missing}`);
  });

  it("prints usage for argument errors", async () => {
    const { stderr, io } = createIo();

    const code = await main([], io);

    expect(code).toBe(1);
    expect(
      stderr
        .text()
        .startsWith(
          "[mgrs-csv] fail { code: 'INVALID_ARGS' }\nError: Missing required argument: <INPUT>\n\n"
        )
    ).toBe(true);
    expect(stderr.text()).toContain("Usage: mgrs2latlong <INPUT> [-o, --output <OUTPUT>]");
  });

  it("prints help", async () => {
    const { stdout, io } = createIo();

    expect(await main(["-h"], io)).toBe(0);
    expect(stdout.text()).toContain("Usage: mgrs2latlong <INPUT> [-o, --output <OUTPUT>]");
  });

  it("honours the configured sample size", async () => {
    const rows = ["id,grid", "1,plain", "2,33TWN1234567890"].join("\n");
    const { inputPath } = await setup(`${rows}\n`);
    const { stderr, io } = createIo({ MGRS_CSV_SAMPLE_ROWS: "1" });

    expect(await main([inputPath], io)).toBe(1);
    expect(stderr.text().endsWith("Error: No MGRS-like column detected in the CSV file\n")).toBe(
      true
    );
  });
});
