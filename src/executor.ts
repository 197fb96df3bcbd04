import { lstatSync, renameSync } from "fs";
import { dirname, join } from "path";
import { INT32_MAX } from "./constants";
import { debugError, debugLog } from "./debug";
import { RenameError } from "./errors";
import type { MatchedFile, RenameOptions, RenameOutcome } from "./types";

/**
 * Builds the new file name, or returns null when the shifted number falls
 * outside `0 … INT32_MAX`.
 */
export function targetNameFor(file: MatchedFile, offset: number): string | null {
  const newNumber = file.number + offset;
  if (newNumber < 0 || newNumber > INT32_MAX) {
    return null;
  }
  return `${newNumber}.${file.extension}`;
}

/**
 * Renames `from` to `to`, refusing to replace anything already at `to`.
 * fs.renameSync alone would overwrite an existing target on POSIX.
 */
function renameWithoutOverwrite(from: string, to: string): void {
  if (lstatSync(to, { throwIfNoEntry: false })) {
    throw new RenameError("target already exists", "EEXIST");
  }
  renameSync(from, to);
}

function decide(file: MatchedFile, options: RenameOptions): RenameOutcome {
  const { offset, threshold } = options;

  if (file.number < threshold) {
    console.log(
      `Skipping '${file.fileName}': Original number (${file.number}) is less than 'b' (${threshold}).`,
    );
    return { status: "skipped", file, reason: "below-threshold" };
  }

  const newName = targetNameFor(file, offset);
  if (newName === null) {
    const newNumber = file.number + offset;
    if (newNumber < 0) {
      console.log(
        `Skipping '${file.fileName}': New number (${newNumber}) would be negative. New filenames must be non-negative.`,
      );
      return { status: "skipped", file, reason: "negative-target" };
    }
    // A name the scanner would refuse on the next run
    console.log(
      `Skipping '${file.fileName}': New number (${newNumber}) is out of range (maximum ${INT32_MAX}).`,
    );
    return { status: "skipped", file, reason: "overflow-target" };
  }

  if (newName === file.fileName) {
    console.log(
      `Skipping '${file.fileName}': New filename is identical to original.`,
    );
    return { status: "skipped", file, reason: "unchanged", newName };
  }

  const newPath = join(dirname(file.path), newName);
  try {
    renameWithoutOverwrite(file.path, newPath);
  } catch (error) {
    const renameError = RenameError.from(error);
    console.error(
      `❌ Error renaming '${file.fileName}' to '${newName}': ${renameError.message}`,
    );
    debugError("Rename failure code:", renameError.code);
    return { status: "failed", file, newName, newPath, error: renameError };
  }

  console.log(`✅ Renamed '${file.fileName}' to '${newName}'`);
  return { status: "renamed", file, newName, newPath };
}

/**
 * Applies the renames strictly in the order given, one attempt per file. A
 * failed rename is reported and the batch carries on.
 */
export function executeRenames(
  files: readonly MatchedFile[],
  options: RenameOptions,
): RenameOutcome[] {
  debugLog(
    "Rename order:",
    files.map((file) => file.fileName),
  );
  return files.map((file) => decide(file, options));
}
