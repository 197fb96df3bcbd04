import type { MatchedFile } from "./types";

export type SortDirection = "ascending" | "descending";

/**
 * A non-negative offset moves every file up, so the highest number has to go
 * first; a negative one moves them down, so the lowest goes first.
 */
export function sortDirectionFor(offset: number): SortDirection {
  return offset >= 0 ? "descending" : "ascending";
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareMatchedFiles(
  direction: SortDirection,
): (a: MatchedFile, b: MatchedFile) => number {
  const sign = direction === "ascending" ? 1 : -1;
  // The file name settles `07.txt` against `7.txt`
  return (a, b) =>
    a.number !== b.number
      ? sign * (a.number - b.number)
      : compareStrings(a.extension, b.extension) ||
        compareStrings(a.fileName, b.fileName);
}

/**
 * Orders files so that applying `offset` to each in turn never renames onto
 * the path of a file that is still waiting. Ties on the number fall back to
 * the extension, then the file name, both ascending. Returns a new array.
 */
export function planRenameOrder(
  files: readonly MatchedFile[],
  offset: number,
): MatchedFile[] {
  return [...files].sort(compareMatchedFiles(sortDirectionFor(offset)));
}
