import { executeRenames } from "./executor";
import { debugLog } from "./debug";
import { planRenameOrder, sortDirectionFor } from "./planner";
import { scanDirectory } from "./scanner";
import type { RenameConfig, RenameOutcome, RenameSummary } from "./types";

/**
 * Service class that runs one batch: scan the directory, order the matches
 * and apply the shifted names.
 */
export class RenameService {
  private config: RenameConfig;

  constructor(config: RenameConfig) {
    this.config = config;
  }

  /**
   * Executes the batch. Throws DirectoryAccessError when the directory cannot
   * be listed; every per-file problem ends up in the summary instead.
   */
  execute(): RenameSummary {
    const { directory, offset, threshold } = this.config;

    console.log(`Searching for files in: ${directory}`);
    const { files, warnings } = scanDirectory(directory);

    if (files.length === 0) {
      console.log(
        "No files matching 'NUMBER.EXTENSION' found in the current directory.",
      );
      return summarize([], warnings);
    }

    const direction = sortDirectionFor(offset);
    console.log(
      direction === "descending"
        ? "Sorting files from highest original number to lowest for renaming..."
        : "Sorting files from lowest original number to highest for renaming...",
    );
    const ordered = planRenameOrder(files, offset);

    console.log("\nAttempting to rename files:");
    const outcomes = executeRenames(ordered, { offset, threshold });
    const summary = summarize(outcomes, warnings);

    console.log("\nRenaming process complete.");
    console.log(
      `📈 Renamed: ${summary.renamed}, skipped: ${summary.skipped}, failed: ${summary.failed}`,
    );
    debugLog("Summary:", {
      matched: summary.matched,
      dropped: summary.warnings.length,
    });

    return summary;
  }
}

function summarize(
  outcomes: RenameOutcome[],
  warnings: RenameSummary["warnings"],
): RenameSummary {
  const count = (status: RenameOutcome["status"]) =>
    outcomes.filter((outcome) => outcome.status === status).length;

  return {
    matched: outcomes.length,
    renamed: count("renamed"),
    skipped: count("skipped"),
    failed: count("failed"),
    outcomes,
    warnings,
  };
}
