import { parseArgs } from "node:util";
import { z } from "zod";
import { GridCsvError } from "../errors";

export type CliOptions =
  | { help: true }
  | { help: false; input: string; output?: string };

export const USAGE = `Convert MGRS coordinates to latitude/longitude in CSV files

Usage: mgrs2latlong <INPUT> [-o, --output <OUTPUT>]

Arguments:
  <INPUT>                Input CSV file path

Options:
  -o, --output <OUTPUT>  Output CSV file path (defaults to stdout)
  -h, --help             Print help
`;

const argsSchema = z.object({
  input: z.string().min(1, "input path must not be empty"),
  output: z.string().min(1, "output path must not be empty").optional()
});

const readArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      options: {
        output: { type: "string", short: "o" },
        help: { type: "boolean", short: "h" }
      },
      allowPositionals: true,
      strict: true
    });
  } catch (error) {
    throw new GridCsvError("INVALID_ARGS", "Invalid arguments", { cause: error });
  }
};

export const parseCliArgs = (argv: string[]): CliOptions => {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { help: true };
  }
  if (positionals.length === 0) {
    throw new GridCsvError("INVALID_ARGS", "Missing required argument: <INPUT>");
  }
  if (positionals.length > 1) {
    throw new GridCsvError("INVALID_ARGS", `Unexpected argument: ${positionals[1]}`);
  }

  const parsed = argsSchema.safeParse({ input: positionals[0], output: values.output });
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new GridCsvError("INVALID_ARGS", `Invalid arguments: ${reason}`);
  }
  return { help: false, ...parsed.data };
};
