/**
 * Command-line arguments of the export script
 */

import { ERROR_CODES } from "../config/constants.js";

export interface CliArgs {
  username?: string;
  password?: string;
  track?: string;
  credentialsFile?: string;
  outputDir?: string;
  help: boolean;
}

type ValueFlag = Exclude<keyof CliArgs, "help">;

const VALUE_FLAGS: Record<string, ValueFlag> = {
  "--username": "username",
  "-u": "username",
  "--password": "password",
  "-p": "password",
  "--track": "track",
  "-t": "track",
  "--credentials-file": "credentialsFile",
  "-c": "credentialsFile",
  "--output-dir": "outputDir",
  "-o": "outputDir",
};

export const USAGE = `Download a track from schweizmobil.ch and export it as GPX.

Usage:
  npm run export -- [options]

Options:
  -u, --username <name>          Your schweizmobil.ch username
  -p, --password <password>      Your schweizmobil.ch password
  -t, --track <name>             Name of the track to export (case-sensitive)
  -c, --credentials-file <path>  File with username=... and password=... lines
  -o, --output-dir <dir>         Directory for the .gpx file (default: .)
  -h, --help                     Show this help

Missing values are asked for interactively.`;

/**
 * Parse arguments (without the node and script paths)
 *
 * Accepts "--flag value" and "--flag=value".
 *
 * @example
 * parseCliArgs(["-t", "Via Alpina", "--output-dir=exports"]);
 * // { help: false, track: "Via Alpina", outputDir: "exports" }
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      args.help = true;
      continue;
    }

    const equals = arg.indexOf("=");
    const flag = equals > 0 ? arg.slice(0, equals) : arg;
    const key = Object.hasOwn(VALUE_FLAGS, flag) ? VALUE_FLAGS[flag] : undefined;
    if (!key) {
      throw new CliArgsError(`Unknown argument: ${arg}`);
    }

    if (equals > 0) {
      args[key] = arg.slice(equals + 1);
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined) {
      throw new CliArgsError(`Missing value for ${flag}`);
    }
    args[key] = value;
    i++;
  }

  return args;
}

export class CliArgsError extends Error {
  public code = ERROR_CODES.INVALID_ARGUMENT;

  constructor(message: string) {
    super(message);
    this.name = "CliArgsError";
  }
}
