/**
 * Export Service
 * Runs the whole export: list -> select -> decode -> convert -> write
 *
 * Any failure aborts before the output file is touched. The document is
 * rendered in memory, written to a temporary file next to the target and
 * renamed over it, so an existing export is never left half-written.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { GPX } from "../config/constants.js";
import type {
  CoordinateTransformer,
  LogFn,
  Prompt,
  TrackSource,
  TrackSummary,
} from "../types/track.types.js";
import { convert } from "./coordinate.service.js";
import { writeTrack } from "./gpx.service.js";
import { parseProfile, parseViaPoints } from "./profile.service.js";
import { selectTrack } from "./track-matcher.service.js";

export interface ExportTrackOptions {
  /** Logged-in SchweizMobil client, or any other track source */
  source: TrackSource;
  trackName: string;
  /** Used only when several tracks share the name */
  prompt: Prompt;
  /** Directory for the .gpx file (default ".") */
  outputDir?: string;
  transform?: CoordinateTransformer;
  log?: LogFn;
}

export interface ExportResult {
  filePath: string;
  track: TrackSummary;
  trackPoints: number;
  waypoints: number;
}

/**
 * Export one track as `<outputDir>/<track name>.gpx`
 *
 * @throws TrackNotFoundError, TransportError, MalformedProfileError,
 *         InvalidCoordinateError, DetailUnavailableError,
 *         SelectionAbortedError; no file is written in any of these cases
 *
 * @example
 * const client = new SchweizmobilClient();
 * await client.login(credentials);
 * const result = await exportTrack({ source: client, trackName: "Loop", prompt });
 * console.log(result.filePath); // "Loop.gpx"
 */
export async function exportTrack(
  options: ExportTrackOptions
): Promise<ExportResult> {
  const { source, trackName, prompt } = options;
  const log = options.log ?? console.log;
  const transform = options.transform ?? convert;
  const outputDir = options.outputDir ?? ".";

  const tracks = await source.listTracks();

  const { track, detail } = await selectTrack({
    tracks,
    name: trackName,
    fetchDetail: (id) => source.fetchTrackDetail(id),
    prompt,
    log,
  });

  const points = parseProfile(detail.properties.profile);
  const viaPoints = parseViaPoints(detail.properties.via_points);
  const document = writeTrack(trackName, points, viaPoints, transform);

  const filePath = path.join(outputDir, gpxFileName(trackName));
  await writeFileReplacing(filePath, document);

  console.log(
    `[Export] Wrote ${points.length} track points and ${viaPoints.length} waypoints to ${filePath}`
  );

  return {
    filePath,
    track,
    trackPoints: points.length,
    waypoints: viaPoints.length,
  };
}

/**
 * File name for a track: the name plus ".gpx", with characters that are
 * not allowed in file names replaced by "_"
 *
 * @example
 * gpxFileName("Zürich / Uetliberg"); // "Zürich _ Uetliberg.gpx"
 */
export function gpxFileName(trackName: string): string {
  const safe = trackName.replace(/[/\\:*?"<>|\u0000-\u001f]/g, "_");
  return `${safe}${GPX.FILE_EXTENSION}`;
}

async function writeFileReplacing(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;

  try {
    await fs.writeFile(tempPath, content, "utf-8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
