import type { Writable } from "node:stream";
import type { GridConverter } from "../../types/geo";
import { GridCsvError } from "../errors";
import { createCsvWriter, openOutputFile, type CsvWriter } from "../export/writeCsv";
import { DEFAULT_SAMPLE_ROWS, detectColumn } from "../grid/detectColumn";
import { appendLatLonHeaders, convertRow } from "../grid/convertRow";
import { createMgrsConverter } from "../grid/mgrsConverter";
import { readTableFile } from "../import/parseFile";
import { createLogger, type Logger } from "../runtime/logger";

export type RunConversionOptions = {
  inputPath: string;
  outputPath?: string;
  converter?: GridConverter;
  sampleSize?: number;
  stdout?: Writable;
  logger?: Logger;
};

export type RunSummary = {
  recordCount: number;
  columnIndex: number;
  columnName: string;
  convertedCount: number;
  blankCount: number;
};

export const formatSummary = ({ recordCount, columnIndex }: RunSummary): string =>
  `Processed ${recordCount} records. MGRS column detected at index ${columnIndex}.`;

const columnLabel = (headers: readonly string[], index: number): string => {
  const header = headers[index]?.trim();
  return header ? header : `Column ${index + 1}`;
};

const writeOrFail = async (task: Promise<void>, message: string): Promise<void> => {
  try {
    await task;
  } catch (error) {
    throw new GridCsvError("OUTPUT_WRITE", message, { cause: error });
  }
};

/**
 * Reads the whole input, detects the grid-reference column from a bounded
 * sample, then streams every row with Latitude/Longitude appended. The output
 * file is only created once a column has been found.
 */
export const runConversion = async ({
  inputPath,
  outputPath,
  converter = createMgrsConverter(),
  sampleSize = DEFAULT_SAMPLE_ROWS,
  stdout = process.stdout,
  logger = createLogger("error")
}: RunConversionOptions): Promise<RunSummary> => {
  logger.info("start", { inputPath, outputPath: outputPath ?? "stdout", sampleSize });

  const table = await readTableFile(inputPath);
  logger.info("table-loaded", {
    columns: table.headers.length,
    rows: table.rows.length,
    delimiter: table.delimiter,
    sheetName: table.sheetName ?? null
  });

  const detection = detectColumn(table.rows, { sampleSize });
  if (!detection) {
    throw new GridCsvError("NO_COLUMN", "No MGRS-like column detected in the CSV file");
  }
  const columnName = columnLabel(table.headers, detection.columnIndex);
  logger.info("column-detected", {
    columnIndex: detection.columnIndex,
    columnName,
    score: detection.score,
    sampledRows: detection.sampledRows
  });
  logger.debug("column-scores", { scores: detection.scores });

  const stream = outputPath ? await openOutputFile(outputPath) : stdout;
  const writer: CsvWriter = createCsvWriter(stream, table.delimiter, {
    end: Boolean(outputPath)
  });

  let convertedCount = 0;
  try {
    await writeOrFail(writer.writeRecord(appendLatLonHeaders(table.headers)), "Failed to write headers");

    for (const row of table.rows) {
      const fields = convertRow(row, detection.columnIndex, converter);
      if (fields[fields.length - 1] !== "") {
        convertedCount += 1;
      }
      await writeOrFail(writer.writeRecord(fields), "Failed to write record");
    }

    await writeOrFail(writer.finish(), "Failed to flush output");
  } catch (error) {
    if (outputPath) {
      stream.destroy();
    }
    throw error;
  }

  const summary: RunSummary = {
    recordCount: table.rows.length,
    columnIndex: detection.columnIndex,
    columnName,
    convertedCount,
    blankCount: table.rows.length - convertedCount
  };
  logger.info("success", { ...summary });
  return summary;
};
