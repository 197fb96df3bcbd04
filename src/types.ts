export interface MatchedFile {
  readonly number: number;
  readonly path: string;
  readonly fileName: string;
  readonly extension: string;
}

export interface ParsedFileName {
  number: number;
  extension: string;
}

export interface RenameOptions {
  offset: number;
  threshold: number;
}

export interface RenameConfig extends RenameOptions {
  directory: string;
}

export interface RuntimeConfig {
  directory: string;
  debug: boolean;
}

export type SkipReason =
  | "below-threshold"
  | "negative-target"
  | "overflow-target"
  | "unchanged";

export type RenameOutcome =
  | {
      status: "renamed";
      file: MatchedFile;
      newName: string;
      newPath: string;
    }
  | {
      status: "skipped";
      file: MatchedFile;
      reason: SkipReason;
      // Absent when the target number was never formed into a name
      newName?: string;
    }
  | {
      status: "failed";
      file: MatchedFile;
      newName: string;
      newPath: string;
      error: Error;
    };

export interface ScanWarning {
  fileName: string;
  message: string;
}

export interface ScanResult {
  files: MatchedFile[];
  warnings: ScanWarning[];
}

export interface RenameSummary {
  matched: number;
  renamed: number;
  skipped: number;
  failed: number;
  outcomes: RenameOutcome[];
  warnings: ScanWarning[];
}
