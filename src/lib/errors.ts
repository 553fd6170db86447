export type GridCsvErrorCode =
  | "INVALID_ARGS"
  | "INPUT_OPEN"
  | "HEADER_READ"
  | "RECORD_READ"
  | "NO_COLUMN"
  | "OUTPUT_CREATE"
  | "OUTPUT_WRITE";

export class GridCsvError extends Error {
  readonly code: GridCsvErrorCode;

  constructor(code: GridCsvErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GridCsvError";
    this.code = code;
  }
}

const messageOf = (value: unknown): string =>
  value instanceof Error ? value.message : String(value);

/**
 * Flattens an error and its `cause` chain into display lines, outermost first.
 */
export const describeErrorChain = (error: unknown): string[] => {
  const lines = [messageOf(error)];
  let cause = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined && lines.length < 8) {
    lines.push(messageOf(cause));
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return lines;
};
