/**
 * Console prompt on top of node:readline
 * Used for the track name, credentials and the duplicate-name selection.
 */

import readline from "node:readline/promises";
import { Writable } from "node:stream";
import type { CredentialPrompt } from "../services/credentials.service.js";
import type { Prompt } from "../types/track.types.js";

export interface ConsolePrompt extends Prompt, CredentialPrompt {
  close(): void;
}

export function createConsolePrompt(
  input: NodeJS.ReadStream = process.stdin,
  output: NodeJS.WriteStream = process.stdout
): ConsolePrompt {
  let muted = false;

  // readline echoes typed characters through its output; drop them while muted
  const echo = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) output.write(chunk, encoding);
      callback();
    },
  });

  const rl = readline.createInterface({
    input,
    output: echo,
    terminal: Boolean(input.isTTY),
  });

  return {
    ask: (question) => rl.question(question),

    async askHidden(question) {
      output.write(question);
      muted = true;
      try {
        return await rl.question("");
      } finally {
        muted = false;
        output.write("\n");
      }
    },

    close: () => rl.close(),
  };
}
