import { z } from "zod";
import { INT32_MAX, INT32_MIN } from "./constants";
import { InputParseError } from "./errors";
import type { RuntimeConfig } from "./types";

/**
 * An optionally signed run of digits, surrounding whitespace ignored, that
 * fits a signed 32-bit integer.
 */
export const integerInputSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, "Expected an integer")
  // Normalises "-0" to 0
  .transform((value) => Number(value) + 0)
  .pipe(z.number().int().min(INT32_MIN).max(INT32_MAX));

export function parseIntegerInput(
  raw: string | undefined,
  name: string,
): number {
  const result = integerInputSchema.safeParse(raw);
  if (!result.success) {
    throw new InputParseError(name, raw ?? "", { cause: result.error });
  }
  return result.data;
}

function parseBooleanFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ["true", "1"].includes(value.trim().toLowerCase());
}

export function getRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RuntimeConfig {
  return {
    directory: cwd,
    debug: parseBooleanFlag(env.DEBUG),
  };
}
