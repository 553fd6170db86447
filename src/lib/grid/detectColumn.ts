import type { Row } from "../import/types";
import { looksLikeCoordinate } from "./classify";

export const DEFAULT_SAMPLE_ROWS = 100;

export type ColumnDetection = {
  columnIndex: number;
  score: number;
  scores: number[];
  sampledRows: number;
};

export type DetectColumnOptions = {
  sampleSize?: number;
};

export const scoreColumns = (rows: readonly Row[]): number[] => {
  const columnCount = rows.reduce((width, row) => Math.max(width, row.length), 0);
  const scores: number[] = Array.from({ length: columnCount }, () => 0);

  rows.forEach((row) => {
    row.forEach((field, columnIndex) => {
      if (looksLikeCoordinate(field.trim())) {
        scores[columnIndex] += 1;
      }
    });
  });

  return scores;
};

/**
 * Picks the column whose sampled values most often look like grid references.
 * Only the first `sampleSize` rows are examined. Ties go to the lowest index;
 * `null` means nothing in the sample looked like a reference.
 */
export const detectColumn = (
  rows: readonly Row[],
  { sampleSize = DEFAULT_SAMPLE_ROWS }: DetectColumnOptions = {}
): ColumnDetection | null => {
  if (rows.length === 0) {
    return null;
  }

  const sample = rows.slice(0, sampleSize);
  const scores = scoreColumns(sample);

  let columnIndex = -1;
  let score = 0;
  scores.forEach((value, index) => {
    if (value > score) {
      score = value;
      columnIndex = index;
    }
  });

  if (columnIndex === -1) {
    return null;
  }

  return { columnIndex, score, scores, sampledRows: sample.length };
};
