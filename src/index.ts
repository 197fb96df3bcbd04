#!/usr/bin/env node
import { getRuntimeConfig } from "./config";
import { debugError, setDebugMode } from "./debug";
import { DirectoryAccessError, InputParseError } from "./errors";
import { askForIntegers, printIntro, type PromptInput } from "./prompt";
import { RenameService } from "./rename-service";

/**
 * Runs the renamer against the current directory, reading `a` and `b` from
 * `input`.
 * @returns the process exit code.
 */
async function run(input: PromptInput = process.stdin): Promise<number> {
  const { directory, debug } = getRuntimeConfig();
  setDebugMode(debug);

  printIntro();

  try {
    const { offset, threshold } = await askForIntegers(input);

    new RenameService({ directory, offset, threshold }).execute();
    return 0;
  } catch (error) {
    if (
      error instanceof InputParseError ||
      error instanceof DirectoryAccessError
    ) {
      console.error(error.message);
      debugError("Cause:", error.cause);
      return 1;
    }
    throw error;
  }
}

// Only run if not in a test environment
if (process.env.NODE_ENV !== "test") {
  run()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("shift-rename failed:", error);
      process.exitCode = 1;
    });
}

export { run };
