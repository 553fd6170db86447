import mgrs from "mgrs";
import type { GeoPair, GridConverter } from "../../types/geo";

/** Digits per axis for 1 m references. */
export const DEFAULT_REFERENCE_PRECISION = 5;

const toLatLon = (reference: string): GeoPair | null => {
  if (!reference) {
    return null;
  }
  try {
    const [longitude, latitude] = mgrs.toPoint(reference);
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      return null;
    }
    return { latitude, longitude };
  } catch {
    return null;
  }
};

const fromLatLon = (
  pair: GeoPair,
  precision: number = DEFAULT_REFERENCE_PRECISION
): string | null => {
  try {
    return mgrs.forward([pair.longitude, pair.latitude], precision);
  } catch {
    return null;
  }
};

export const createMgrsConverter = (): GridConverter => ({ toLatLon, fromLatLon });
