/**
 * Profile Service
 * Decodes the route geometry and via-points of a track detail record
 *
 * The API returns both fields as strings holding a nested list literal,
 * sometimes written with single quotes:
 *
 *   profile:    "[[600000.0, 200000.0, 540.2, 0.0], [600012.5, ...], ...]"
 *   via_points: "[[600000.0, 200000.0], [612000.0, 204000.0]]"
 *
 * Each profile entry is [easting, northing, elevation, distance] in LV03
 * meters; distance is cumulative from the route start.
 */

import { z } from "zod";
import { ERROR_CODES } from "../config/constants.js";
import type { RoutePoint, ViaPoint } from "../types/track.types.js";

const coordinate = z.number().finite();

const ProfileSchema = z.array(
  z.tuple([coordinate, coordinate, coordinate, coordinate])
);

const ViaPointsSchema = z.array(z.tuple([coordinate, coordinate]));

// ============================================
// Quote Normalization
// ============================================

/**
 * Rewrite the upstream list literal into JSON
 *
 * The only difference between the two notations in practice is the quote
 * character. If the upstream encoding changes, this is the one place to
 * adapt.
 */
export function normalizeQuotes(raw: string): string {
  return raw.replace(/'/g, '"');
}

function decodeLiteral(raw: string, field: string): unknown {
  const normalized = normalizeQuotes(raw).trim();
  if (normalized === "") {
    return [];
  }

  try {
    const value: unknown = JSON.parse(normalized);
    return value;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedProfileError(`${field} is not a valid list literal: ${reason}`);
  }
}

// ============================================
// Decoding
// ============================================

/**
 * Decode the `profile` field into route points, in traversal order
 *
 * @throws MalformedProfileError unless the text is a list of
 *         [easting, northing, elevation, distance] number tuples
 *
 * @example
 * parseProfile("[[600000, 200000, 400, 0]]");
 * // [{ easting: 600000, northing: 200000, elevation: 400, distance: 0 }]
 */
export function parseProfile(raw: string): RoutePoint[] {
  const result = ProfileSchema.safeParse(decodeLiteral(raw, "profile"));
  if (!result.success) {
    throw new MalformedProfileError(
      `profile must be a list of [easting, northing, elevation, distance] tuples: ${formatIssue(result.error)}`
    );
  }

  return result.data.map(([easting, northing, elevation, distance]) => ({
    easting,
    northing,
    elevation,
    distance,
  }));
}

/**
 * Decode the `via_points` field; a missing or blank field means no via-points
 */
export function parseViaPoints(raw: string | null | undefined): ViaPoint[] {
  if (raw == null) {
    return [];
  }

  const result = ViaPointsSchema.safeParse(decodeLiteral(raw, "via_points"));
  if (!result.success) {
    throw new MalformedProfileError(
      `via_points must be a list of [easting, northing] pairs: ${formatIssue(result.error)}`
    );
  }

  return result.data.map(([easting, northing]) => ({ easting, northing }));
}

function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid value";
  const where = issue.path.length > 0 ? ` at [${issue.path.join("][")}]` : "";
  return `${issue.message}${where}`;
}

// ============================================
// Custom Error Class
// ============================================

/**
 * Thrown when route geometry or via-points cannot be decoded
 */
export class MalformedProfileError extends Error {
  public code = ERROR_CODES.MALFORMED_PROFILE;

  constructor(message: string) {
    super(message);
    this.name = "MalformedProfileError";
  }
}
