/**
 * SchweizMobil Service
 * Handles all SchweizMobil map API interactions
 *
 * The API is session based: POST /api/4/login answers with session
 * cookies, which must accompany every later request. Any status other
 * than 200 is a failure; requests are not retried.
 */

import axios, { AxiosError } from "axios";
import type { AxiosInstance, AxiosRequestConfig } from "axios";
import { z } from "zod";
import {
  ERROR_CODES,
  SCHWEIZMOBIL,
  type ErrorCode,
} from "../config/constants.js";
import type { Credentials } from "../types/auth.types.js";
import type {
  TrackDetail,
  TrackId,
  TrackSource,
  TrackSummary,
} from "../types/track.types.js";

// ============================================
// Response Schemas
// ============================================

const TrackIdSchema = z.union([z.string(), z.number()]);

const TrackListSchema = z.array(
  z.object({
    id: TrackIdSchema,
    name: z.string(),
  })
);

const TrackDetailSchema = z.object({
  id: TrackIdSchema.optional(),
  properties: z.object({
    profile: z.string(),
    via_points: z.string().nullish(),
    filter_name: z.string().nullish(),
    created_at: z.string().nullish(),
    modified_at: z.string().nullish(),
  }),
});

export interface SchweizmobilClientOptions {
  /** API origin (default https://map.schweizmobil.ch) */
  baseUrl?: string;
  /** Applied to every request (default 30s) */
  timeoutMs?: number;
  /** Pre-configured axios instance; baseUrl and timeoutMs are then ignored */
  http?: AxiosInstance;
}

// ============================================
// Client
// ============================================

/**
 * SchweizMobil API client
 *
 * @example
 * const client = new SchweizmobilClient();
 * await client.login({ username: "hiker", password: "secret" });
 * const tracks = await client.listTracks();
 * const detail = await client.fetchTrackDetail(tracks[0].id);
 */
export class SchweizmobilClient implements TrackSource {
  private readonly http: AxiosInstance;
  private readonly cookies = new Map<string, string>();

  constructor(options: SchweizmobilClientOptions = {}) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? SCHWEIZMOBIL.BASE_URL,
        timeout: options.timeoutMs ?? SCHWEIZMOBIL.TIMEOUT_MS,
      });
  }

  /**
   * Authenticate and keep the session cookies
   * @throws TransportError (LOGIN_FAILED) unless the API answers 200
   */
  async login(credentials: Credentials): Promise<void> {
    await this.send(
      {
        method: "POST",
        url: SCHWEIZMOBIL.LOGIN_PATH,
        data: {
          username: credentials.username,
          password: credentials.password,
        },
      },
      ERROR_CODES.LOGIN_FAILED,
      "Login failed"
    );

    console.log(`[SchweizMobil] Logged in as ${credentials.username}`);
  }

  /**
   * List all tracks of the logged-in account
   * @throws TransportError (TRACK_LIST_FAILED) unless the API answers 200
   */
  async listTracks(): Promise<TrackSummary[]> {
    const body = await this.send(
      { method: "GET", url: SCHWEIZMOBIL.TRACKS_PATH },
      ERROR_CODES.TRACK_LIST_FAILED,
      "Failed to fetch tracks"
    );

    const tracks = decode(TrackListSchema, body, "track list");
    console.log(`[SchweizMobil] Found ${tracks.length} tracks`);
    return tracks;
  }

  /**
   * Fetch the full record of one track
   * @throws TransportError (TRACK_DETAIL_FAILED) unless the API answers 200
   */
  async fetchTrackDetail(id: TrackId): Promise<TrackDetail> {
    const body = await this.send(
      {
        method: "GET",
        url: `${SCHWEIZMOBIL.TRACK_DETAIL_PATH}/${encodeURIComponent(String(id))}`,
      },
      ERROR_CODES.TRACK_DETAIL_FAILED,
      `Failed to fetch details for track ${id}`
    );

    return decode(TrackDetailSchema, body, `track ${id}`);
  }

  private async send(
    config: AxiosRequestConfig,
    failureCode: ErrorCode,
    failureMessage: string
  ): Promise<unknown> {
    try {
      const response = await this.http.request<unknown>({
        ...config,
        headers: this.sessionHeaders(),
        // Status is checked below so that every non-200 maps the same way
        validateStatus: () => true,
      });

      this.storeCookies(response.headers["set-cookie"]);

      if (response.status !== 200) {
        throw new TransportError(
          `${failureMessage}: HTTP ${response.status}`,
          failureCode,
          response.status
        );
      }

      return response.data;
    } catch (error) {
      if (error instanceof AxiosError) {
        throw new TransportError(
          `${failureMessage}: ${error.message}`,
          ERROR_CODES.NETWORK_ERROR
        );
      }
      throw error;
    }
  }

  private sessionHeaders(): Record<string, string> {
    if (this.cookies.size === 0) {
      return {};
    }
    const cookie = Array.from(this.cookies, ([key, value]) => `${key}=${value}`).join("; ");
    return { Cookie: cookie };
  }

  private storeCookies(setCookie: string[] | undefined): void {
    if (!setCookie) return;

    for (const header of setCookie) {
      // "sessionid=abc123; Path=/; HttpOnly" -> sessionid, abc123
      const pair = header.split(";")[0];
      const separator = pair.indexOf("=");
      if (separator <= 0) continue;
      this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
    }
  }
}

function decode<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  what: string
): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new TransportError(
      `Unexpected ${what} response: ${result.error.issues[0]?.message ?? "invalid body"}`,
      ERROR_CODES.INVALID_RESPONSE
    );
  }
  return result.data;
}

// ============================================
// Custom Error Class for SchweizMobil API
// ============================================

/**
 * Any failed exchange with the SchweizMobil API
 *
 * `code` tells which request failed; `status` is the HTTP status when
 * the server answered at all.
 */
export class TransportError extends Error {
  public code: ErrorCode;
  public status?: number;

  constructor(message: string, code: ErrorCode, status?: number) {
    super(message);
    this.name = "TransportError";
    this.code = code;
    this.status = status;
  }
}
