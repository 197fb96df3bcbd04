import { INT32_MAX } from "./constants";

/**
 * Base class for every error the renamer raises itself.
 */
export class ShiftRenameError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ShiftRenameError";
  }
}

/**
 * A prompted value was not an integer in the signed 32-bit range.
 */
export class InputParseError extends ShiftRenameError {
  readonly input: string;

  constructor(name: string, input: string, options?: ErrorOptions) {
    super(`Invalid input for '${name}'. Please enter an integer.`, options);
    this.name = "InputParseError";
    this.input = input;
  }
}

/**
 * The working directory could not be enumerated.
 */
export class DirectoryAccessError extends ShiftRenameError {
  readonly directory: string;

  constructor(directory: string, cause: unknown) {
    super(`Error accessing directory: ${describeError(cause)}`, { cause });
    this.name = "DirectoryAccessError";
    this.directory = directory;
  }
}

export class NumberOverflowError extends ShiftRenameError {
  readonly fileName: string;

  constructor(fileName: string) {
    super(
      `Number part of '${fileName}' is out of range (maximum ${INT32_MAX}).`,
    );
    this.name = "NumberOverflowError";
    this.fileName = fileName;
  }
}

/**
 * A single rename was rejected. Carries the fs error code when there is one.
 */
export class RenameError extends ShiftRenameError {
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RenameError";
    this.code = code;
  }

  static from(error: unknown): RenameError {
    if (error instanceof RenameError) {
      return error;
    }
    return new RenameError(describeError(error), errorCode(error), {
      cause: error,
    });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
