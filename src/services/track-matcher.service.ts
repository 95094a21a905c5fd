/**
 * Track Matcher Service
 * Finds a track by name and resolves duplicates interactively
 *
 * Names are not unique in a SchweizMobil account. Selection runs as:
 * - no match: list every available track, then fail with TrackNotFoundError
 * - one match: fetch its detail record
 * - several matches: fetch every candidate's detail (one at a time, in list
 *   order), show filter name and timestamps, and ask for a 1-based index.
 *   A failed fetch marks that candidate unavailable; the others still load.
 *   The chosen detail is the one already fetched, never fetched again.
 */

import { ERROR_CODES, SELECTION } from "../config/constants.js";
import type {
  CandidateDetail,
  LogFn,
  Prompt,
  TrackDetail,
  TrackId,
  TrackSummary,
} from "../types/track.types.js";

export interface SelectTrackOptions {
  /** Full track list of the account */
  tracks: TrackSummary[];
  /** Requested name (exact, case-sensitive) */
  name: string;
  fetchDetail: (id: TrackId) => Promise<TrackDetail>;
  /** Asked for an index when the name is ambiguous */
  prompt: Prompt;
  log?: LogFn;
  /** Answers accepted before giving up (default SELECTION.MAX_ATTEMPTS) */
  maxAttempts?: number;
}

export interface TrackSelection {
  track: TrackSummary;
  detail: TrackDetail;
}

// ============================================
// Matching
// ============================================

/**
 * All tracks whose name equals `name` exactly, in list order
 */
export function findTracks(list: TrackSummary[], name: string): TrackSummary[] {
  return list.filter((track) => track.name === name);
}

// ============================================
// Selection
// ============================================

/**
 * Resolve a track name to a single detail record
 *
 * @throws TrackNotFoundError when no track has the name
 * @throws DetailUnavailableError when the name is ambiguous and no
 *         candidate's detail could be fetched
 * @throws SelectionAbortedError when no valid index was given in time
 *
 * Fetch errors for a unique match are not caught here.
 */
export async function selectTrack(
  options: SelectTrackOptions
): Promise<TrackSelection> {
  const { tracks, name, fetchDetail, prompt } = options;
  const log = options.log ?? console.log;
  const matches = findTracks(tracks, name);

  if (matches.length === 0) {
    log(`Track '${name}' not found in your schweizmobil.ch account.`);
    log("Available tracks:");
    for (const track of tracks) {
      log(`- ${track.name} (ID: ${track.id})`);
    }
    throw new TrackNotFoundError(name, tracks);
  }

  if (matches.length === 1) {
    const [track] = matches;
    const detail = await fetchDetail(track.id);
    return { track, detail };
  }

  log(`Multiple tracks found with the name '${name}':`);
  const candidates: CandidateDetail[] = [];
  for (const track of matches) {
    const candidate = await fetchCandidate(track, fetchDetail);
    candidates.push(candidate);
    log(describeCandidate(candidate, candidates.length));
  }

  if (candidates.every((c) => c.status === "unavailable")) {
    throw new DetailUnavailableError(
      `Details are unavailable for every track named '${name}'`
    );
  }

  return promptForCandidate(
    candidates,
    prompt,
    log,
    options.maxAttempts ?? SELECTION.MAX_ATTEMPTS
  );
}

async function fetchCandidate(
  track: TrackSummary,
  fetchDetail: (id: TrackId) => Promise<TrackDetail>
): Promise<CandidateDetail> {
  try {
    const detail = await fetchDetail(track.id);
    return { status: "available", track, detail };
  } catch (error) {
    return {
      status: "unavailable",
      track,
      error: new DetailUnavailableError(
        `Details for track ${track.id} could not be fetched`,
        error
      ),
    };
  }
}

/**
 * One line describing a candidate, prefixed with its 1-based index
 *
 * @example
 * "2: Wanderland | ID=1042 | Created: 01.05.2025 09:30 | Modified: 03.05.2025 18:02"
 */
export function describeCandidate(
  candidate: CandidateDetail,
  index: number
): string {
  if (candidate.status === "unavailable") {
    return `${index}: (details unavailable) | ID=${candidate.track.id}`;
  }

  const props = candidate.detail.properties;
  const filterName = props.filter_name ?? SELECTION.UNKNOWN_FILTER;
  const created = formatTimestamp(props.created_at);
  const modified = formatTimestamp(props.modified_at);

  return `${index}: ${filterName} | ID=${candidate.track.id} | Created: ${created} | Modified: ${modified}`;
}

async function promptForCandidate(
  candidates: CandidateDetail[],
  prompt: Prompt,
  log: LogFn,
  maxAttempts: number
): Promise<TrackSelection> {
  const count = candidates.length;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const answer = (await prompt.ask(`Select a track (1-${count}): `)).trim();

    if (!/^[+-]?\d+$/.test(answer)) {
      log("Invalid input. Please enter a number.");
      continue;
    }

    const choice = Number.parseInt(answer, 10);
    if (choice < 1 || choice > count) {
      log("Invalid choice. Please try again.");
      continue;
    }

    const candidate = candidates[choice - 1];
    if (candidate.status === "unavailable") {
      log("Details for this track are unavailable. Please choose another.");
      continue;
    }

    return { track: candidate.track, detail: candidate.detail };
  }

  throw new SelectionAbortedError(
    `No valid track selected after ${maxAttempts} attempts`
  );
}

// ============================================
// Timestamp Formatting
// ============================================

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,]\d+)?)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Format an ISO-8601 timestamp as "DD.MM.YYYY HH:mm"
 *
 * Keeps the wall-clock time written in the string (no time zone
 * conversion). Anything that is not ISO-8601 is returned unchanged;
 * a missing value becomes "unknown".
 *
 * @example
 * formatTimestamp("2025-05-16T14:03:27.512+02:00"); // "16.05.2025 14:03"
 * formatTimestamp("yesterday");                     // "yesterday"
 */
export function formatTimestamp(raw: string | null | undefined): string {
  if (raw == null) {
    return SELECTION.UNKNOWN_TIMESTAMP;
  }

  const match = ISO_8601.exec(raw.trim());
  if (!match) {
    return raw;
  }

  const [, year, month, day, hour = "00", minute = "00", second = "00"] = match;
  if (!isValidDateTime(year, month, day, hour, minute, second)) {
    return raw;
  }

  return `${day}.${month}.${year} ${hour}:${minute}`;
}

function isValidDateTime(
  year: string,
  month: string,
  day: string,
  hour: string,
  minute: string,
  second: string
): boolean {
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  if (m < 1 || m > 12 || d < 1) return false;

  // Day 0 of the next month is the last day of this one
  const daysInMonth = new Date(Date.UTC(y, m, 0)).getUTCDate();
  return (
    d <= daysInMonth &&
    Number(hour) <= 23 &&
    Number(minute) <= 59 &&
    Number(second) <= 59
  );
}

// ============================================
// Custom Error Classes
// ============================================

/**
 * Thrown when no track in the account has the requested name
 *
 * Carries the full list so callers can show what is available.
 */
export class TrackNotFoundError extends Error {
  public code = ERROR_CODES.TRACK_NOT_FOUND;
  public trackName: string;
  public available: TrackSummary[];

  constructor(trackName: string, available: TrackSummary[]) {
    super(`Track '${trackName}' not found`);
    this.name = "TrackNotFoundError";
    this.trackName = trackName;
    this.available = available;
  }
}

/**
 * A candidate's detail record could not be fetched
 *
 * Recorded per candidate during disambiguation; thrown only when no
 * candidate is left to choose from.
 */
export class DetailUnavailableError extends Error {
  public code = ERROR_CODES.DETAIL_UNAVAILABLE;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "DetailUnavailableError";
  }
}

/**
 * Thrown when the selection prompt runs out of attempts
 */
export class SelectionAbortedError extends Error {
  public code = ERROR_CODES.SELECTION_ABORTED;

  constructor(message: string) {
    super(message);
    this.name = "SelectionAbortedError";
  }
}
