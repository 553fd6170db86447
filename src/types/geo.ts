export type GeoPair = {
  latitude: number;
  longitude: number;
};

/**
 * Grid-reference math seen from the pipeline: a normalized reference in, a
 * pair out, or `null` when the reference cannot be decoded.
 */
export type GridConverter = {
  toLatLon: (reference: string) => GeoPair | null;
  fromLatLon?: (pair: GeoPair, precision?: number) => string | null;
};
