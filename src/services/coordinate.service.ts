/**
 * Coordinate Service
 * Converts Swiss LV03 (EPSG:21781) grid coordinates to WGS84 (EPSG:4326)
 *
 * SchweizMobil stores route geometry on the Swiss survey grid:
 * easting/northing in meters with the false origin at Bern
 * (600000, 200000). GPX needs latitude/longitude on WGS84.
 *
 * Conversion runs in two proj4 stages:
 * 1. grid -> CH1903 long/lat (Swiss Oblique Mercator inverse on Bessel 1841)
 * 2. CH1903 -> WGS84 (published three-parameter datum shift)
 *
 * proj4's oblique Mercator inverse stops iterating at 1e-7 rad, about
 * 1.4e-9 degrees of latitude. Stage 1 therefore finishes with Newton steps
 * against proj4's closed-form forward projection, which brings the result
 * to the precision GPX output prints (10 decimals).
 *
 * @example
 * const { lat, lng } = convert(600000, 200000);
 * // lat.toFixed(10) === "46.9510827719", lng.toFixed(10) === "7.4386324209"
 */

import proj4 from "proj4";
import { CRS, ERROR_CODES } from "../config/constants.js";
import type { CoordinateTransformer, GeoPoint } from "../types/track.types.js";

proj4.defs(CRS.GEOGRAPHIC_CODE, CRS.CH1903_PROJ4_DEF);

/**
 * Build a transformer from LV03 to WGS84
 *
 * The returned function is stateless; calling it twice with the same
 * input yields the same output.
 */
export function createLv03ToWgs84Transformer(): CoordinateTransformer {
  const grid = proj4(CRS.GRID_PROJ4_DEF, CRS.BESSEL_PROJ4_DEF);
  const datumShift = proj4(CRS.GEOGRAPHIC_CODE, CRS.TARGET_CODE);

  // proj4 works in x/y order: [easting, northing] <-> [lng, lat]
  const project = (lng: number, lat: number): number[] => grid.inverse([lng, lat]);

  const unproject = (easting: number, northing: number): number[] => {
    let [lng, lat] = grid.forward([easting, northing]);
    const h = CRS.REFINE_STEP_DEG;

    for (let step = 0; step < CRS.REFINE_MAX_STEPS; step++) {
      const [x, y] = project(lng, lat);
      const dx = easting - x;
      const dy = northing - y;
      if (Math.abs(dx) < CRS.REFINE_TOLERANCE_M && Math.abs(dy) < CRS.REFINE_TOLERANCE_M) {
        break;
      }

      // Jacobian of the forward projection by forward differences
      const [xLng, yLng] = project(lng + h, lat);
      const [xLat, yLat] = project(lng, lat + h);
      const a = (xLng - x) / h;
      const b = (xLat - x) / h;
      const c = (yLng - y) / h;
      const d = (yLat - y) / h;
      const det = a * d - b * c;

      lng += (d * dx - b * dy) / det;
      lat += (a * dy - c * dx) / det;
    }

    return [lng, lat];
  };

  return (easting: number, northing: number): GeoPoint => {
    if (!Number.isFinite(easting) || !Number.isFinite(northing)) {
      throw new InvalidCoordinateError(
        `Invalid LV03 coordinate: (${easting}, ${northing})`
      );
    }

    const [lng, lat] = datumShift.forward(unproject(easting, northing));

    if (!Number.isFinite(lat) || !Number.isFinite(lng)) {
      throw new InvalidCoordinateError(
        `LV03 coordinate (${easting}, ${northing}) has no WGS84 equivalent`
      );
    }

    return { lat, lng };
  };
}

/** Default LV03 -> WGS84 transformer */
export const convert: CoordinateTransformer = createLv03ToWgs84Transformer();

// ============================================
// Custom Error Class
// ============================================

/**
 * Thrown for non-finite input (NaN, ±Infinity) or when the projection
 * cannot produce a finite result
 */
export class InvalidCoordinateError extends Error {
  public code = ERROR_CODES.INVALID_COORDINATE;

  constructor(message: string) {
    super(message);
    this.name = "InvalidCoordinateError";
  }
}
