export type CsvDelimiter = "," | ";";

export type Row = string[];

export type RawTable = {
  sheetName?: string;
  delimiter: CsvDelimiter;
  headers: string[];
  rows: Row[];
};
