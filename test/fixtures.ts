import {
  mkdtempSync,
  readFileSync,
  readdirSync,
  rmSync,
  writeFileSync,
} from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { parseFileName } from "../src/scanner";
import type { MatchedFile } from "../src/types";

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "shift-rename-"));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Creates each file with its own name as content, so a test can tell where a
 * file ended up after being renamed.
 */
export function touch(dir: string, ...names: string[]): void {
  for (const name of names) {
    writeFileSync(join(dir, name), name);
  }
}

export function listDir(dir: string): string[] {
  return readdirSync(dir).sort();
}

export function contentOf(dir: string, name: string): string {
  return readFileSync(join(dir, name), "utf8");
}

export function matchedFile(dir: string, fileName: string): MatchedFile {
  const parsed = parseFileName(fileName);
  if (!parsed) {
    throw new Error(`Not a NUMBER.EXTENSION name: ${fileName}`);
  }
  return { ...parsed, fileName, path: join(dir, fileName) };
}
