import * as XLSX from "xlsx";
import { GridCsvError } from "../errors";
import type { RawTable } from "./types";

const normalizeCell = (value: unknown): string => {
  if (value === null || value === undefined) {
    return "";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  return String(value);
};

/**
 * Reads the first worksheet as text cells. Output written from a workbook is
 * always comma separated.
 */
export const parseXlsxBuffer = (buffer: Buffer): RawTable => {
  const workbook = XLSX.read(buffer, { type: "buffer" });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (sheetName === undefined || !sheet) {
    throw new GridCsvError("HEADER_READ", "Failed to read headers: workbook has no sheets");
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    defval: "",
    blankrows: false
  });
  const [rawHeaders, ...dataRows] = rows;
  if (!rawHeaders || rawHeaders.length === 0) {
    throw new GridCsvError("HEADER_READ", `Failed to read headers from sheet ${sheetName}`);
  }

  const headers = rawHeaders.map(normalizeCell);
  return {
    sheetName,
    delimiter: ",",
    headers,
    rows: dataRows.map((row) => headers.map((_, index) => normalizeCell(row[index])))
  };
};
