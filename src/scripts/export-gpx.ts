#!/usr/bin/env node
/**
 * Export a SchweizMobil track as GPX
 *
 * Logs in to map.schweizmobil.ch, finds the track by name (asking which
 * one if several share the name), converts it from LV03 to WGS84 and
 * writes "<track name>.gpx".
 *
 * Usage (from project directory):
 *   npm run export -- --track "Via Alpina Etappe 3"
 *   npm run export -- -u hiker -c credentials.txt -t "Loop" -o exports
 *
 * Credentials: flags, SCHWEIZMOBIL_USERNAME / SCHWEIZMOBIL_PASSWORD in .env,
 * a credentials file, or the interactive prompt.
 */

// Load environment variables FIRST (before any other imports that might need them)
import "dotenv/config";

import { ERROR_CODES, loadConfig } from "../config/constants.js";
import { resolveCredentials } from "../services/credentials.service.js";
import { exportTrack } from "../services/export.service.js";
import {
  SchweizmobilClient,
  TransportError,
} from "../services/schweizmobil.service.js";
import { TrackNotFoundError } from "../services/track-matcher.service.js";
import { parseCliArgs, USAGE } from "../utils/cli-args.js";
import { createConsolePrompt } from "../utils/prompt.js";

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const prompt = createConsolePrompt();

  try {
    const credentials = await resolveCredentials({
      flags: {
        username: args.username,
        password: args.password,
        credentialsFile: args.credentialsFile,
      },
      env: {
        username: config.SCHWEIZMOBIL_USERNAME,
        password: config.SCHWEIZMOBIL_PASSWORD,
      },
      prompt,
    });

    const trackName =
      args.track || (await prompt.ask("Track name (case-sensitive): "));

    const client = new SchweizmobilClient({
      baseUrl: config.SCHWEIZMOBIL_BASE_URL,
      timeoutMs: config.SCHWEIZMOBIL_TIMEOUT_MS,
    });
    await client.login(credentials);

    const result = await exportTrack({
      source: client,
      trackName,
      prompt,
      outputDir: args.outputDir ?? config.GPX_OUTPUT_DIR,
    });

    console.log(`\n✅ GPX written: ${result.filePath}`);
    console.log("Done.");
  } finally {
    prompt.close();
  }
}

/**
 * User-facing explanation of a failure
 */
function describeFailure(error: unknown): string {
  if (error instanceof TrackNotFoundError) {
    // The available tracks were already listed during selection
    return "Track not found. Re-run with one of the names listed above.";
  }
  if (error instanceof TransportError) {
    switch (error.code) {
      case ERROR_CODES.LOGIN_FAILED:
        return "Login failed! Please check your username and password.";
      case ERROR_CODES.TRACK_LIST_FAILED:
        return "Failed to fetch tracks. Please check your connection or credentials.";
      default:
        return error.message;
    }
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

main().catch((error: unknown) => {
  console.error(`❌ ${describeFailure(error)}`);
  process.exit(1);
});
