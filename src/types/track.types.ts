/**
 * Track Types
 * Track records from the SchweizMobil API and the values derived from them
 */

// ============================================
// API Records
// ============================================

/** Track identifiers are numeric in practice but treated as opaque */
export type TrackId = string | number;

/**
 * Entry of the track list
 * GET /api/5/tracks
 */
export interface TrackSummary {
  id: TrackId;
  name: string;
}

/** Properties of a track detail record */
export interface TrackDetailProperties {
  profile: string; // Encoded [[easting, northing, elevation, distance], ...]
  via_points?: string | null; // Encoded [[easting, northing], ...]
  filter_name?: string | null;
  created_at?: string | null;
  modified_at?: string | null;
}

/**
 * Full track record
 * GET /api/4/tracks/:id
 */
export interface TrackDetail {
  id?: TrackId;
  properties: TrackDetailProperties;
}

// ============================================
// Geometry
// ============================================

/** Route sample in LV03, in traversal order */
export interface RoutePoint {
  easting: number;
  northing: number;
  elevation: number;
  distance: number; // Cumulative meters from route start
}

/** User-designated stop in LV03; first is the start, last the end */
export interface ViaPoint {
  easting: number;
  northing: number;
}

/** WGS84 position in degrees */
export interface GeoPoint {
  lat: number;
  lng: number;
}

/** Maps an LV03 position to WGS84 */
export type CoordinateTransformer = (easting: number, northing: number) => GeoPoint;

// ============================================
// Disambiguation
// ============================================

/** Detail fetch outcome for one candidate of an ambiguous name */
export type CandidateDetail =
  | { status: "available"; track: TrackSummary; detail: TrackDetail }
  | { status: "unavailable"; track: TrackSummary; error: Error };

/** Source of track records (the SchweizMobil client, or a stand-in) */
export interface TrackSource {
  listTracks(): Promise<TrackSummary[]>;
  fetchTrackDetail(id: TrackId): Promise<TrackDetail>;
}

/** Line-based user input */
export interface Prompt {
  ask(question: string): Promise<string>;
}

export type LogFn = (message: string) => void;
