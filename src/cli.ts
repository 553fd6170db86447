import type { Writable } from "node:stream";
import { GridCsvError, describeErrorChain } from "./lib/errors";
import { formatSummary, runConversion } from "./lib/pipeline/runConversion";
import { USAGE, parseCliArgs } from "./lib/runtime/args";
import { loadConfig } from "./lib/runtime/config";
import { createLogger } from "./lib/runtime/logger";
import type { GridConverter } from "./types/geo";

export type CliIo = {
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
  converter?: GridConverter;
};

const formatFatalError = (error: unknown): string => {
  const [message, ...causes] = describeErrorChain(error);
  return [`Error: ${message}`, ...causes.map((cause) => `Caused by: ${cause}`)]
    .map((line) => `${line}\n`)
    .join("");
};

/**
 * Runs the command line and resolves to the process exit code. Fatal errors are
 * reported on stderr; the summary goes to stderr as well when the CSV itself is
 * written to stdout.
 */
export const main = async (
  argv: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr, env: process.env }
): Promise<number> => {
  let logger = createLogger("error", io.stderr);
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      io.stdout.write(USAGE);
      return 0;
    }

    const config = loadConfig(io.env);
    logger = createLogger(config.logLevel, io.stderr);

    const summary = await runConversion({
      inputPath: options.input,
      outputPath: options.output,
      converter: io.converter,
      sampleSize: config.sampleRows,
      stdout: io.stdout,
      logger
    });

    const summaryStream = options.output ? io.stdout : io.stderr;
    summaryStream.write(`${formatSummary(summary)}\n`);
    return 0;
  } catch (error) {
    logger.error("fail", {
      code: error instanceof GridCsvError ? error.code : "UNEXPECTED"
    });
    logger.debug("fail-stack", { stack: error instanceof Error ? error.stack : undefined });
    io.stderr.write(formatFatalError(error));
    if (error instanceof GridCsvError && error.code === "INVALID_ARGS") {
      io.stderr.write(`\n${USAGE}`);
    }
    return 1;
  }
};
