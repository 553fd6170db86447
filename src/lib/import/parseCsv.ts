import { GridCsvError } from "../errors";
import type { CsvDelimiter, RawTable, Row } from "./types";

type ParsedRecord = {
  line: number;
  fields: string[];
};

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

export const detectDelimiter = (headerLine: string): CsvDelimiter => {
  const commaCount = (headerLine.match(/,/g) ?? []).length;
  const semicolonCount = (headerLine.match(/;/g) ?? []).length;
  return semicolonCount > commaCount ? ";" : ",";
};

const recordError = (line: number, reason: string): GridCsvError =>
  new GridCsvError("RECORD_READ", `Failed to read CSV record at line ${line}`, {
    cause: new Error(reason)
  });

/**
 * Splits sanitized text into records. Quoted fields may contain the delimiter,
 * doubled quotes and newlines. Blank lines are skipped.
 */
const splitRecords = (text: string, delimiter: CsvDelimiter): ParsedRecord[] => {
  const records: ParsedRecord[] = [];
  let fields: string[] = [];
  let current = "";
  let inQuotes = false;
  let closedQuote = false;
  let line = 1;
  let recordLine = 1;

  const pushRecord = () => {
    fields.push(current);
    records.push({ line: recordLine, fields });
    fields = [];
    current = "";
    closedQuote = false;
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];

    if (inQuotes) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          current += '"';
          index += 1;
        } else {
          inQuotes = false;
          closedQuote = true;
        }
        continue;
      }
      if (char === "\n") {
        line += 1;
      }
      current += char;
      continue;
    }

    if (char === "\n") {
      const blankLine = fields.length === 0 && current === "" && !closedQuote;
      if (!blankLine) {
        pushRecord();
      }
      line += 1;
      recordLine = line;
      continue;
    }

    if (char === delimiter) {
      fields.push(current);
      current = "";
      closedQuote = false;
      continue;
    }

    if (closedQuote) {
      throw recordError(recordLine, `unexpected character ${JSON.stringify(char)} after closing quote`);
    }

    if (char === '"' && current === "") {
      inQuotes = true;
      continue;
    }

    current += char;
  }

  if (inQuotes) {
    throw recordError(recordLine, "unterminated quoted field");
  }
  if (fields.length > 0 || current !== "" || closedQuote) {
    pushRecord();
  }

  return records;
};

// Short rows are padded to the header width; extra fields are kept as they are.
const fitRow = (record: ParsedRecord, width: number): Row =>
  Array.from(
    { length: Math.max(width, record.fields.length) },
    (_, index) => record.fields[index] ?? ""
  );

export const parseCsvText = (text: string): RawTable => {
  const sanitized = sanitizeText(text);
  const firstLine = sanitized.split("\n").find((line) => line.trim().length > 0);
  if (firstLine === undefined) {
    throw new GridCsvError("HEADER_READ", "Failed to read CSV headers", {
      cause: new Error("input is empty")
    });
  }

  const delimiter = detectDelimiter(firstLine);
  const [headerRecord, ...dataRecords] = splitRecords(sanitized, delimiter);
  if (!headerRecord) {
    throw new GridCsvError("HEADER_READ", "Failed to read CSV headers");
  }

  const headers = headerRecord.fields;
  return {
    delimiter,
    headers,
    rows: dataRecords.map((record) => fitRow(record, headers.length))
  };
};
