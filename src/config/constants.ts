/**
 * Application Constants
 * Centralized configuration values
 */

import { z } from "zod";

// ============================================
// SchweizMobil API Constants
// ============================================

export const SCHWEIZMOBIL = {
  BASE_URL: "https://map.schweizmobil.ch",

  // Login lives on API v4, the track list moved to v5
  LOGIN_PATH: "/api/4/login",
  TRACKS_PATH: "/api/5/tracks",
  TRACK_DETAIL_PATH: "/api/4/tracks",

  TIMEOUT_MS: 30000,
} as const;

// ============================================
// Coordinate Reference Systems
// ============================================

// Swiss Oblique Mercator on Bessel 1841 (the projection part of EPSG:21781)
const LV03_GRID =
  "+proj=somerc +lat_0=46.95240555555556 +lon_0=7.439583333333333 +k_0=1 " +
  "+x_0=600000 +y_0=200000 +ellps=bessel +units=m";

export const CRS = {
  GEOGRAPHIC_CODE: "EPSG:4149", // CH1903
  TARGET_CODE: "EPSG:4326", // WGS 84

  // Published EPSG:4149 definition, with the three-parameter shift to WGS 84
  CH1903_PROJ4_DEF:
    "+proj=longlat +ellps=bessel +towgs84=674.374,15.056,405.346,0,0,0,0 +no_defs",

  // Same grid and ellipsoid without a datum, so proj4 projects only
  GRID_PROJ4_DEF: `${LV03_GRID} +no_defs`,
  BESSEL_PROJ4_DEF: "+proj=longlat +ellps=bessel +no_defs",

  // Newton refinement of the grid inverse
  REFINE_MAX_STEPS: 5,
  REFINE_TOLERANCE_M: 1e-8,
  REFINE_STEP_DEG: 1e-6,
} as const;

// ============================================
// GPX Output
// ============================================

export const GPX = {
  CREATOR: "schweizmobil.ch-API converter",
  COORDINATE_DECIMALS: 10,
  ELEVATION_DECIMALS: 1,
  FILE_EXTENSION: ".gpx",

  LABELS: {
    START: "Starting point",
    END: "Destination",
    VIA: "Waypoint",
  },
} as const;

// ============================================
// Interactive Track Selection
// ============================================

export const SELECTION = {
  // Re-prompts allowed before giving up on an ambiguous track name
  MAX_ATTEMPTS: 10,

  // Shown when the detail record lacks a value
  UNKNOWN_TIMESTAMP: "unknown",
  UNKNOWN_FILTER: "N/A",
} as const;

// ============================================
// Credentials
// ============================================

export const CREDENTIALS = {
  DEFAULT_FILE: "credentials.txt",
} as const;

// ============================================
// Error Codes
// ============================================

export const ERROR_CODES = {
  // Core pipeline errors
  INVALID_COORDINATE: "INVALID_COORDINATE",
  MALFORMED_PROFILE: "MALFORMED_PROFILE",
  TRACK_NOT_FOUND: "TRACK_NOT_FOUND",
  DETAIL_UNAVAILABLE: "DETAIL_UNAVAILABLE",
  SELECTION_ABORTED: "SELECTION_ABORTED",

  // Transport errors
  LOGIN_FAILED: "LOGIN_FAILED",
  TRACK_LIST_FAILED: "TRACK_LIST_FAILED",
  TRACK_DETAIL_FAILED: "TRACK_DETAIL_FAILED",
  NETWORK_ERROR: "NETWORK_ERROR",
  INVALID_RESPONSE: "INVALID_RESPONSE",

  // CLI errors
  CREDENTIALS_MISSING: "CREDENTIALS_MISSING",
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  INVALID_CONFIG: "INVALID_CONFIG",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// ============================================
// Environment Configuration
// ============================================

const ConfigSchema = z.object({
  SCHWEIZMOBIL_BASE_URL: z.string().url().default(SCHWEIZMOBIL.BASE_URL),
  SCHWEIZMOBIL_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(SCHWEIZMOBIL.TIMEOUT_MS),
  SCHWEIZMOBIL_USERNAME: z.string().optional(),
  SCHWEIZMOBIL_PASSWORD: z.string().optional(),
  GPX_OUTPUT_DIR: z.string().min(1).default("."),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type ProcessEnv = Record<string, string | undefined>;

/**
 * Read configuration from the environment (after dotenv has loaded .env)
 *
 * Empty variables count as unset, so the blank lines of .env.example
 * fall back to the defaults.
 *
 * @throws ConfigError naming every invalid variable
 */
export function loadConfig(env: ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const result = ConfigSchema.safeParse(present);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }

  return result.data;
}

export class ConfigError extends Error {
  public code = ERROR_CODES.INVALID_CONFIG;

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
