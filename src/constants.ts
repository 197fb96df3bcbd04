/**
 * Shift-rename identifiers and constants
 */
export const PROGRAM_NAME = "shift-rename" as const;

/**
 * Whole-name match for `NUMBER.EXTENSION`. The extension is everything after
 * the first dot, so `5.tar.gz` captures `tar.gz`.
 */
export const FILENAME_PATTERN = /^(\d+)\.(.+)$/;

/**
 * File numbers, offsets and thresholds are signed 32-bit integers.
 */
export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

export const INTRO_LINES = [
  "This program renames files in the current directory.",
  "It targets files named like 'NUMBER.EXTENSION' (e.g., 5.txt, 33.jpg).",
  "It will add your input number 'a' to the numeric part of these filenames.",
  "For example, if 'a' is 2, 5.txt becomes 7.txt.",
  "If 'a' is -2, 5.txt becomes 3.txt (files with new negative numbers will be skipped).",
  "You will also enter a number 'b'. Only files with an original number >= 'b' will be renamed.",
] as const;

export const OFFSET_PROMPT =
  "Enter an integer 'a' (the number to add for renaming):";
export const THRESHOLD_PROMPT =
  "Enter an integer 'b' (the minimum original number to rename):";
