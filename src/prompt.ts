import inquirer from "inquirer";
import { createInterface } from "readline";
import { integerInputSchema, parseIntegerInput } from "./config";
import { INTRO_LINES, OFFSET_PROMPT, THRESHOLD_PROMPT } from "./constants";
import { debugLog } from "./debug";
import type { RenameOptions } from "./types";

export type PromptInput = NodeJS.ReadableStream & { isTTY?: boolean };

export interface RawAnswers {
  a: string;
  b?: string;
}

export function printIntro(): void {
  for (const line of INTRO_LINES) {
    console.log(line);
  }
  console.log();
}

/**
 * `b` is only worth asking for once `a` parses.
 */
export function shouldAskThreshold(answers: Pick<RawAnswers, "a">): boolean {
  return integerInputSchema.safeParse(answers.a).success;
}

/**
 * Both questions go through one prompt call so that a single readline serves
 * them.
 */
async function promptInteractively(): Promise<RawAnswers> {
  return inquirer.prompt<RawAnswers>([
    { type: "input", name: "a", message: OFFSET_PROMPT },
    {
      type: "input",
      name: "b",
      message: THRESHOLD_PROMPT,
      when: shouldAskThreshold,
    },
  ]);
}

/**
 * Reads one answer per line from a pipe or file. A missing line (end of
 * input) comes back as undefined.
 */
async function readLineAnswer(
  lines: AsyncIterableIterator<string>,
  message: string,
): Promise<string | undefined> {
  console.log(message);
  const result = await lines.next();
  return result.done ? undefined : result.value;
}

/**
 * Asks for the offset `a` and the threshold `b`. inquirer needs a terminal, so
 * piped input is read line by line instead.
 * @throws InputParseError for the first answer that is not an integer,
 * including one that never arrives.
 */
export async function askForIntegers(
  input: PromptInput = process.stdin,
): Promise<RenameOptions> {
  if (input.isTTY) {
    const answers = await promptInteractively();
    return {
      offset: parseIntegerInput(answers.a, "a"),
      threshold: parseIntegerInput(answers.b, "b"),
    };
  }

  debugLog("Standard input is not a terminal, reading answers by line");
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  try {
    const offset = parseIntegerInput(
      await readLineAnswer(lines, OFFSET_PROMPT),
      "a",
    );
    const threshold = parseIntegerInput(
      await readLineAnswer(lines, THRESHOLD_PROMPT),
      "b",
    );
    return { offset, threshold };
  } finally {
    rl.close();
  }
}
