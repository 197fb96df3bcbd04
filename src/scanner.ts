import { readdirSync, type Dirent } from "fs";
import { join } from "path";
import { FILENAME_PATTERN, INT32_MAX } from "./constants";
import { debugLog, debugWarn } from "./debug";
import { DirectoryAccessError, NumberOverflowError } from "./errors";
import type {
  MatchedFile,
  ParsedFileName,
  ScanResult,
  ScanWarning,
} from "./types";

/**
 * Splits a `NUMBER.EXTENSION` file name into its parts.
 * @returns null when the name does not match the pattern.
 * @throws NumberOverflowError when the digit run does not fit a 32-bit integer.
 */
export function parseFileName(fileName: string): ParsedFileName | null {
  const match = FILENAME_PATTERN.exec(fileName);
  if (!match) {
    return null;
  }

  const [, digits, extension] = match;
  const number = Number(digits);
  if (number > INT32_MAX) {
    throw new NumberOverflowError(fileName);
  }

  return { number, extension };
}

/**
 * Lists the regular files of `directory` whose names match `NUMBER.EXTENSION`.
 * Directories and symbolic links are never matched, and subdirectories are not
 * descended into.
 */
export function scanDirectory(directory: string): ScanResult {
  let entries: Dirent[];
  try {
    entries = readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    throw new DirectoryAccessError(directory, error);
  }

  const files: MatchedFile[] = [];
  const warnings: ScanWarning[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }

    let parsed: ParsedFileName | null;
    try {
      parsed = parseFileName(entry.name);
    } catch (error) {
      if (!(error instanceof NumberOverflowError)) {
        throw error;
      }
      console.warn(`⚠️  Warning: ${error.message}`);
      debugWarn(`Dropped '${entry.name}' from the batch`);
      warnings.push({ fileName: entry.name, message: error.message });
      continue;
    }

    if (!parsed) {
      continue;
    }

    files.push({
      number: parsed.number,
      extension: parsed.extension,
      fileName: entry.name,
      path: join(directory, entry.name),
    });
  }

  debugLog(
    `Scanned ${entries.length} entries, ${files.length} matched, ${warnings.length} dropped`,
  );

  return { files, warnings };
}
