/**
 * Track Matcher Service Tests
 * Name matching, the not-found listing and interactive disambiguation
 */

import { describe, it, expect, vi } from "vitest";
import {
  describeCandidate,
  DetailUnavailableError,
  findTracks,
  formatTimestamp,
  SelectionAbortedError,
  selectTrack,
  TrackNotFoundError,
} from "../services/track-matcher.service.js";
import { TransportError } from "../services/schweizmobil.service.js";
import type { TrackDetail, TrackId, TrackSummary } from "../types/track.types.js";

const TRACKS: TrackSummary[] = [
  { id: 1, name: "Loop" },
  { id: 2, name: "Ridge" },
  { id: 3, name: "Loop" },
  { id: 4, name: "loop" },
];

function detailFor(id: TrackId, overrides: Partial<TrackDetail["properties"]> = {}): TrackDetail {
  return {
    id,
    properties: {
      profile: "[]",
      via_points: "[]",
      filter_name: `Filter ${id}`,
      created_at: "2025-05-16T14:03:27",
      modified_at: "2025-05-17T08:15:00",
      ...overrides,
    },
  };
}

/** Prompt that replays the given answers in order */
function scriptedPrompt(...answers: string[]) {
  const queue = [...answers];
  return { ask: vi.fn(async (_question: string) => queue.shift() ?? "") };
}

describe("findTracks", () => {
  it("returns every exact match in list order", () => {
    expect(findTracks(TRACKS, "Loop")).toEqual([
      { id: 1, name: "Loop" },
      { id: 3, name: "Loop" },
    ]);
  });

  it("is case-sensitive", () => {
    expect(findTracks(TRACKS, "loop")).toEqual([{ id: 4, name: "loop" }]);
    expect(findTracks(TRACKS, "LOOP")).toEqual([]);
  });

  it("does not trim or partially match", () => {
    expect(findTracks(TRACKS, "Loop ")).toEqual([]);
    expect(findTracks(TRACKS, "Lo")).toEqual([]);
  });

  it("behaves as a filter by name equality and leaves the input untouched", () => {
    const copy = TRACKS.map((t) => ({ ...t }));
    for (const name of ["Loop", "Ridge", "loop", "none"]) {
      expect(findTracks(TRACKS, name)).toEqual(TRACKS.filter((t) => t.name === name));
    }
    expect(TRACKS).toEqual(copy);
  });
});

describe("selectTrack", () => {
  describe("no match", () => {
    it("lists all available tracks and throws TrackNotFoundError", async () => {
      const log = vi.fn();
      const fetchDetail = vi.fn();
      const prompt = scriptedPrompt();

      const error = await selectTrack({
        tracks: TRACKS,
        name: "Missing",
        fetchDetail,
        prompt,
        log,
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TrackNotFoundError);
      expect(error).toMatchObject({
        code: "TRACK_NOT_FOUND",
        trackName: "Missing",
        available: TRACKS,
      });
      expect(log.mock.calls.map(([line]) => line)).toEqual([
        "Track 'Missing' not found in your schweizmobil.ch account.",
        "Available tracks:",
        "- Loop (ID: 1)",
        "- Ridge (ID: 2)",
        "- Loop (ID: 3)",
        "- loop (ID: 4)",
      ]);
      expect(fetchDetail).not.toHaveBeenCalled();
      expect(prompt.ask).not.toHaveBeenCalled();
    });
  });

  describe("unique match", () => {
    it("fetches the detail once without prompting", async () => {
      const fetchDetail = vi.fn(async (id: TrackId) => detailFor(id));
      const prompt = scriptedPrompt();

      const selection = await selectTrack({
        tracks: TRACKS,
        name: "Ridge",
        fetchDetail,
        prompt,
        log: vi.fn(),
      });

      expect(selection.track).toEqual({ id: 2, name: "Ridge" });
      expect(selection.detail).toEqual(detailFor(2));
      expect(fetchDetail).toHaveBeenCalledTimes(1);
      expect(fetchDetail).toHaveBeenCalledWith(2);
      expect(prompt.ask).not.toHaveBeenCalled();
    });

    it("lets a fetch failure abort the selection", async () => {
      const failure = new TransportError("Failed", "TRACK_DETAIL_FAILED", 500);
      const fetchDetail = vi.fn(async () => {
        throw failure;
      });

      await expect(
        selectTrack({
          tracks: TRACKS,
          name: "Ridge",
          fetchDetail,
          prompt: scriptedPrompt(),
          log: vi.fn(),
        })
      ).rejects.toBe(failure);
    });
  });

  describe("ambiguous match", () => {
    it("lists candidates with metadata and returns the chosen, already-fetched detail", async () => {
      const log = vi.fn();
      const fetchDetail = vi.fn(async (id: TrackId) =>
        id === 3
          ? detailFor(3, {
              filter_name: "E-Bike",
              created_at: "2024-09-02T07:45:10.123+02:00",
              modified_at: "recently",
            })
          : detailFor(id)
      );
      const prompt = scriptedPrompt("2");

      const selection = await selectTrack({
        tracks: TRACKS,
        name: "Loop",
        fetchDetail,
        prompt,
        log,
      });

      expect(log.mock.calls.map(([line]) => line)).toEqual([
        "Multiple tracks found with the name 'Loop':",
        "1: Filter 1 | ID=1 | Created: 16.05.2025 14:03 | Modified: 17.05.2025 08:15",
        "2: E-Bike | ID=3 | Created: 02.09.2024 07:45 | Modified: recently",
      ]);
      expect(prompt.ask).toHaveBeenCalledWith("Select a track (1-2): ");
      expect(selection.track).toEqual({ id: 3, name: "Loop" });
      expect(selection.detail.properties.filter_name).toBe("E-Bike");
      expect(fetchDetail.mock.calls.map(([id]) => id)).toEqual([1, 3]);
    });

    it("re-prompts on non-numeric and out-of-range answers", async () => {
      const log = vi.fn();
      const prompt = scriptedPrompt("abc", "0", "3", " 1 ");

      const selection = await selectTrack({
        tracks: TRACKS,
        name: "Loop",
        fetchDetail: async (id) => detailFor(id),
        prompt,
        log,
      });

      expect(selection.track.id).toBe(1);
      expect(prompt.ask).toHaveBeenCalledTimes(4);
      expect(log.mock.calls.slice(3).map(([line]) => line)).toEqual([
        "Invalid input. Please enter a number.",
        "Invalid choice. Please try again.",
        "Invalid choice. Please try again.",
      ]);
    });

    it("keeps going when one candidate's detail cannot be fetched", async () => {
      const log = vi.fn();
      const fetchDetail = vi.fn(async (id: TrackId) => {
        if (id === 1) throw new TransportError("Failed", "TRACK_DETAIL_FAILED", 500);
        return detailFor(id);
      });
      const prompt = scriptedPrompt("1", "2");

      const selection = await selectTrack({
        tracks: TRACKS,
        name: "Loop",
        fetchDetail,
        prompt,
        log,
      });

      expect(fetchDetail).toHaveBeenCalledTimes(2);
      expect(log.mock.calls.map(([line]) => line)).toEqual([
        "Multiple tracks found with the name 'Loop':",
        "1: (details unavailable) | ID=1",
        "2: Filter 3 | ID=3 | Created: 16.05.2025 14:03 | Modified: 17.05.2025 08:15",
        "Details for this track are unavailable. Please choose another.",
      ]);
      expect(selection.track.id).toBe(3);
    });

    it("fails with DetailUnavailableError when no candidate could be fetched", async () => {
      const prompt = scriptedPrompt("1");

      await expect(
        selectTrack({
          tracks: TRACKS,
          name: "Loop",
          fetchDetail: async () => {
            throw new Error("offline");
          },
          prompt,
          log: vi.fn(),
        })
      ).rejects.toBeInstanceOf(DetailUnavailableError);
      expect(prompt.ask).not.toHaveBeenCalled();
    });

    it("gives up after the allowed number of attempts", async () => {
      const prompt = scriptedPrompt("x", "y", "z");

      await expect(
        selectTrack({
          tracks: TRACKS,
          name: "Loop",
          fetchDetail: async (id) => detailFor(id),
          prompt,
          log: vi.fn(),
          maxAttempts: 3,
        })
      ).rejects.toBeInstanceOf(SelectionAbortedError);
      expect(prompt.ask).toHaveBeenCalledTimes(3);
    });
  });
});

describe("describeCandidate", () => {
  it("falls back to placeholders for missing metadata", () => {
    const line = describeCandidate(
      {
        status: "available",
        track: { id: 7, name: "Loop" },
        detail: { properties: { profile: "[]" } },
      },
      1
    );
    expect(line).toBe("1: N/A | ID=7 | Created: unknown | Modified: unknown");
  });
});

describe("formatTimestamp", () => {
  it("formats ISO-8601 date-times as DD.MM.YYYY HH:mm", () => {
    expect(formatTimestamp("2025-05-16T14:03:27")).toBe("16.05.2025 14:03");
    expect(formatTimestamp("2025-05-16 07:05:00Z")).toBe("16.05.2025 07:05");
    expect(formatTimestamp("2025-05-16T14:03:27.512+02:00")).toBe("16.05.2025 14:03");
  });

  it("treats a bare date as midnight", () => {
    expect(formatTimestamp("2025-05-16")).toBe("16.05.2025 00:00");
  });

  it("returns anything else unchanged", () => {
    expect(formatTimestamp("16.05.2025")).toBe("16.05.2025");
    expect(formatTimestamp("2025-02-30T10:00:00")).toBe("2025-02-30T10:00:00");
    expect(formatTimestamp("2025-05-16T25:00:00")).toBe("2025-05-16T25:00:00");
    expect(formatTimestamp("")).toBe("");
  });

  it("reports missing values as unknown", () => {
    expect(formatTimestamp(undefined)).toBe("unknown");
    expect(formatTimestamp(null)).toBe("unknown");
  });
});
