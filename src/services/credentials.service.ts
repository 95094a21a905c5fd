/**
 * Credentials Service
 * Gathers the SchweizMobil login from file, environment, flags or prompt
 *
 * Precedence (highest first):
 * 1. --username / --password flags
 * 2. SCHWEIZMOBIL_USERNAME / SCHWEIZMOBIL_PASSWORD (environment or .env)
 * 3. --credentials-file, or credentials.txt in the working directory
 * 4. Interactive prompt for whatever is still missing
 *
 * Credentials file format (exactly these two keys):
 *   username=your_username
 *   password=your_password
 */

import fs from "node:fs";
import path from "node:path";
import { CREDENTIALS, ERROR_CODES } from "../config/constants.js";
import type { Credentials, PartialCredentials } from "../types/auth.types.js";
import type { LogFn } from "../types/track.types.js";

export interface CredentialPrompt {
  ask(question: string): Promise<string>;
  /** Like ask, without echoing the answer */
  askHidden(question: string): Promise<string>;
}

export interface ResolveCredentialsOptions {
  /** Values given on the command line */
  flags: PartialCredentials & { credentialsFile?: string };
  /** Values from the environment */
  env: PartialCredentials;
  prompt: CredentialPrompt;
  /** Where credentials.txt is looked up (default process.cwd()) */
  cwd?: string;
  log?: LogFn;
}

// ============================================
// Credentials File
// ============================================

/**
 * Parse credentials file content
 *
 * @returns the credentials, or null unless the content holds exactly the
 *          keys `username` and `password` with non-empty values
 */
export function parseCredentialsFile(content: string): Credentials | null {
  const entries = new Map<string, string>();

  for (const line of content.split(/\r?\n/)) {
    const separator = line.indexOf("=");
    if (separator === -1) continue;
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    entries.set(key, value);
  }

  const username = entries.get("username");
  const password = entries.get("password");
  if (!username || !password || entries.size !== 2) {
    return null;
  }

  return { username, password };
}

/**
 * Load credentials from a file
 *
 * A missing file yields null silently; a malformed one logs the expected
 * format and yields null.
 */
export function loadCredentialsFromFile(
  filePath: string,
  log: LogFn = console.log
): Credentials | null {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    return null;
  }

  const credentials = parseCredentialsFile(fs.readFileSync(filePath, "utf-8"));
  if (!credentials) {
    log(
      `Credentials file '${filePath}' is missing required fields or is malformed.\n` +
        "It should contain exactly two lines:\n" +
        "username=your_username\npassword=your_password"
    );
  }

  return credentials;
}

// ============================================
// Resolution
// ============================================

/**
 * Combine every credential source into a complete login
 *
 * @throws CredentialsError if username or password is still empty after
 *         prompting
 */
export async function resolveCredentials(
  options: ResolveCredentialsOptions
): Promise<Credentials> {
  const { flags, env, prompt } = options;
  const log = options.log ?? console.log;
  const cwd = options.cwd ?? process.cwd();

  let fromFile: Credentials | null = null;
  if (flags.credentialsFile) {
    fromFile = loadCredentialsFromFile(path.resolve(cwd, flags.credentialsFile), log);
  }
  if (!fromFile) {
    fromFile = loadCredentialsFromFile(path.join(cwd, CREDENTIALS.DEFAULT_FILE), log);
  }

  let username = flags.username || env.username || fromFile?.username;
  let password = flags.password || env.password || fromFile?.password;

  if (!username) {
    username = (await prompt.ask("Schweizmobil.ch username: ")).trim();
  }
  if (!password) {
    password = await prompt.askHidden("Schweizmobil.ch password: ");
  }

  if (!username || !password) {
    throw new CredentialsError("Username or password missing.");
  }

  return { username, password };
}

// ============================================
// Custom Error Class
// ============================================

export class CredentialsError extends Error {
  public code = ERROR_CODES.CREDENTIALS_MISSING;

  constructor(message: string) {
    super(message);
    this.name = "CredentialsError";
  }
}
