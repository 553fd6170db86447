import { createWriteStream } from "node:fs";
import { once } from "node:events";
import { finished } from "node:stream/promises";
import type { Writable } from "node:stream";
import { GridCsvError } from "../errors";
import type { CsvDelimiter } from "../import/types";

export type CsvWriter = {
  writeRecord: (fields: readonly string[]) => Promise<void>;
  finish: () => Promise<void>;
};

const specialCharacters = /["\r\n]/;

export const formatCsvField = (value: string, delimiter: CsvDelimiter): string => {
  if (!value.includes(delimiter) && !specialCharacters.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
};

export const formatCsvRecord = (fields: readonly string[], delimiter: CsvDelimiter): string =>
  `${fields.map((field) => formatCsvField(field, delimiter)).join(delimiter)}\n`;

/**
 * Writes records one at a time, waiting for `drain` whenever the stream buffer
 * is full. With `end: false` the stream is left open (used for stdout).
 */
export const createCsvWriter = (
  stream: Writable,
  delimiter: CsvDelimiter,
  { end }: { end: boolean }
): CsvWriter => {
  let failure: Error | null = null;
  stream.on("error", (error: Error) => {
    failure = error;
  });

  return {
    writeRecord: async (fields) => {
      if (failure) {
        throw failure;
      }
      if (!stream.write(formatCsvRecord(fields, delimiter))) {
        await once(stream, "drain");
      }
    },
    finish: async () => {
      if (failure) {
        throw failure;
      }
      if (end) {
        stream.end();
        await finished(stream);
        return;
      }
      if (stream.writableNeedDrain) {
        await once(stream, "drain");
      }
    }
  };
};

/** Creates (or truncates) the output file and resolves once it is open. */
export const openOutputFile = async (outputPath: string): Promise<Writable> => {
  const stream = createWriteStream(outputPath);
  try {
    await once(stream, "open");
  } catch (error) {
    throw new GridCsvError("OUTPUT_CREATE", `Failed to create output file: ${outputPath}`, {
      cause: error
    });
  }
  return stream;
};
