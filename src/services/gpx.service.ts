/**
 * GPX Service
 * Serializes a route and its via-points as a GPX 1.1 document
 *
 * Output structure:
 * <gpx>
 *   <metadata><name>Track Name</name></metadata>
 *   <wpt lat="46.95" lon="7.43">           (one per via-point)
 *     <ele></ele>
 *     <name>Starting point</name>
 *   </wpt>
 *   <trk><name>Track Name</name><trkseg>
 *     <trkpt lat="46.95" lon="7.43"><ele>540.2</ele></trkpt>
 *     ...more points...
 *   </trkseg></trk>
 * </gpx>
 *
 * The document is produced in a single forward pass over the via-points
 * and then the route points. Coordinates are converted from LV03 with
 * the supplied transformer; any transformer error propagates unchanged.
 */

import { GPX } from "../config/constants.js";
import type {
  CoordinateTransformer,
  RoutePoint,
  ViaPoint,
} from "../types/track.types.js";

const GPX_NAMESPACE = "http://www.topografix.com/GPX/1/1";

// ============================================
// Main Serialize Function
// ============================================

/**
 * Render a complete GPX document as a string
 *
 * @param name - Track name, written to <metadata> and <trk>
 * @param points - Route geometry in traversal order
 * @param viaPoints - Start, intermediate stops and destination
 * @param transform - LV03 -> WGS84 conversion
 *
 * @example
 * const xml = writeTrack("Loop", points, viaPoints, convert);
 * await fs.promises.writeFile("Loop.gpx", xml, "utf-8");
 */
export function writeTrack(
  name: string,
  points: RoutePoint[],
  viaPoints: ViaPoint[],
  transform: CoordinateTransformer
): string {
  let document = "";
  for (const chunk of renderGpx(name, points, viaPoints, transform)) {
    document += chunk;
  }
  return document;
}

/**
 * Yield the GPX document line by line, in output order
 *
 * Useful when the caller wants to stream to a sink instead of
 * building the whole string.
 */
export function* renderGpx(
  name: string,
  points: RoutePoint[],
  viaPoints: ViaPoint[],
  transform: CoordinateTransformer
): Generator<string> {
  const safeName = escapeXml(name);

  yield '<?xml version="1.0" encoding="UTF-8"?>\n';
  yield `<gpx version="1.1" creator="${escapeXml(GPX.CREATOR)}" xmlns="${GPX_NAMESPACE}">\n`;
  yield `  <metadata><name>${safeName}</name></metadata>\n`;

  // Via-points become waypoints
  for (let i = 0; i < viaPoints.length; i++) {
    const { easting, northing } = viaPoints[i];
    const { lat, lng } = transform(easting, northing);
    yield `  <wpt lat="${formatCoordinate(lat)}" lon="${formatCoordinate(lng)}">\n`;
    // Elevation of via-points is not known; the element stays empty
    yield "    <ele></ele>\n";
    yield `    <name>${viaPointLabel(i, viaPoints.length)}</name>\n`;
    yield "  </wpt>\n";
  }

  yield `  <trk><name>${safeName}</name><trkseg>\n`;
  for (const point of points) {
    const { lat, lng } = transform(point.easting, point.northing);
    yield `    <trkpt lat="${formatCoordinate(lat)}" lon="${formatCoordinate(lng)}"><ele>${point.elevation.toFixed(GPX.ELEVATION_DECIMALS)}</ele></trkpt>\n`;
  }
  yield "  </trkseg></trk>\n";
  yield "</gpx>\n";
}

// ============================================
// Helpers
// ============================================

/**
 * Waypoint label by position: first is the start, last the destination
 *
 * The first-index check wins, so a lone via-point is a starting point.
 */
export function viaPointLabel(index: number, count: number): string {
  if (index === 0) return GPX.LABELS.START;
  if (index === count - 1) return GPX.LABELS.END;
  return GPX.LABELS.VIA;
}

function formatCoordinate(value: number): string {
  return value.toFixed(GPX.COORDINATE_DECIMALS);
}

/**
 * Escape text for use in XML element content and attribute values
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
