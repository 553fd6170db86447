import { readFile } from "node:fs/promises";
import { GridCsvError } from "../errors";
import { parseCsvText } from "./parseCsv";
import { parseXlsxBuffer } from "./parseXlsx";
import type { RawTable } from "./types";

const fileExtension = (name: string): string =>
  name.split(".").pop()?.toLowerCase() ?? "";

const readInput = async (inputPath: string): Promise<Buffer> => {
  try {
    return await readFile(inputPath);
  } catch (error) {
    throw new GridCsvError("INPUT_OPEN", `Failed to open input file: ${inputPath}`, {
      cause: error
    });
  }
};

/**
 * Loads the whole input table into memory. Workbooks are detected by the
 * `.xlsx` extension; everything else is read as delimited UTF-8 text.
 */
export const readTableFile = async (inputPath: string): Promise<RawTable> => {
  const buffer = await readInput(inputPath);

  if (fileExtension(inputPath) === "xlsx") {
    try {
      return parseXlsxBuffer(buffer);
    } catch (error) {
      if (error instanceof GridCsvError) {
        throw error;
      }
      throw new GridCsvError("INPUT_OPEN", `Failed to read workbook: ${inputPath}`, {
        cause: error
      });
    }
  }

  return parseCsvText(buffer.toString("utf8"));
};
