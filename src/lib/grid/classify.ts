/** Trimmed values shorter than this are never treated as references. */
export const MIN_REFERENCE_LENGTH = 7;

// zone (1-2 digits), latitude band (C..X without I and O), 100km square, easting+northing
const gridReferencePattern = /\b\d{1,2}\s*[C-HJ-NP-X]\s*[A-Z]{2}\s*\d{2,10}\b/i;

/**
 * Cheap plausibility check for an MGRS-like value. It does not validate the
 * reference; the converter has the final word.
 */
export const looksLikeCoordinate = (value: string): boolean => {
  if (value.trim().length < MIN_REFERENCE_LENGTH) {
    return false;
  }
  return gridReferencePattern.test(value);
};

export const normalizeGridReference = (value: string): string => value.replace(/\s+/g, "");
