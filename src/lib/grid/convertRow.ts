import type { GeoPair, GridConverter } from "../../types/geo";
import type { Row } from "../import/types";
import { looksLikeCoordinate, normalizeGridReference } from "./classify";

export const LAT_LON_HEADERS = ["Latitude", "Longitude"] as const;

export const appendLatLonHeaders = (headers: readonly string[]): string[] => [
  ...headers,
  ...LAT_LON_HEADERS
];

/**
 * Converts one cell. Blank and implausible values are not sent to the
 * converter; converter rejections come back as `null` too.
 */
export const resolveGeoPair = (value: string, converter: GridConverter): GeoPair | null => {
  const trimmed = value.trim();
  if (!trimmed || !looksLikeCoordinate(trimmed)) {
    return null;
  }
  return converter.toLatLon(normalizeGridReference(trimmed));
};

const exponentForm = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Shortest round-trip digits of `value`, always in positional notation
 * (`4.5e-7` becomes `0.00000045`).
 */
export const formatDecimal = (value: number): string => {
  const text = String(value);
  const match = exponentForm.exec(text);
  if (!match) {
    return text;
  }
  const [, sign, lead, fraction = "", exponentText] = match;
  const digits = `${lead}${fraction}`;
  const pointIndex = 1 + Number(exponentText);
  if (pointIndex <= 0) {
    return `${sign}0.${"0".repeat(-pointIndex)}${digits}`;
  }
  if (pointIndex >= digits.length) {
    return `${sign}${digits}${"0".repeat(pointIndex - digits.length)}`;
  }
  return `${sign}${digits.slice(0, pointIndex)}.${digits.slice(pointIndex)}`;
};

export const formatGeoPair = (pair: GeoPair | null): [string, string] =>
  pair ? [formatDecimal(pair.latitude), formatDecimal(pair.longitude)] : ["", ""];

export const convertRow = (
  row: readonly string[],
  columnIndex: number,
  converter: GridConverter
): Row => [...row, ...formatGeoPair(resolveGeoPair(row[columnIndex] ?? "", converter))];
