import { mkdirSync, symlinkSync } from "fs";
import { join } from "path";
import { setDebugMode } from "../src/debug";
import { DirectoryAccessError, NumberOverflowError } from "../src/errors";
import { parseFileName, scanDirectory } from "../src/scanner";
import { makeTempDir, removeDir, touch } from "./fixtures";

describe("parseFileName", () => {
  it("should split a simple name", () => {
    expect(parseFileName("5.txt")).toEqual({ number: 5, extension: "txt" });
  });

  it("should keep every dot after the first in the extension", () => {
    expect(parseFileName("5.tar.gz")).toEqual({
      number: 5,
      extension: "tar.gz",
    });
  });

  it("should drop leading zeros from the number", () => {
    expect(parseFileName("007.txt")).toEqual({ number: 7, extension: "txt" });
  });

  it.each(["notes.txt", "12", "7.", ".5.txt", "a1.txt", "1a.txt", "-3.txt", " 4.txt"])(
    "should not match %p",
    (name) => {
      expect(parseFileName(name)).toBeNull();
    },
  );

  it("should accept the largest 32-bit number", () => {
    expect(parseFileName("2147483647.png")).toEqual({
      number: 2147483647,
      extension: "png",
    });
  });

  it("should throw NumberOverflowError past the 32-bit range", () => {
    expect(() => parseFileName("2147483648.png")).toThrow(NumberOverflowError);
    expect(() => parseFileName("2147483648.png")).toThrow(
      "Number part of '2147483648.png' is out of range (maximum 2147483647).",
    );
  });
});

describe("scanDirectory", () => {
  let dir: string;
  let mockConsoleWarn: jest.SpyInstance;

  beforeEach(() => {
    dir = makeTempDir();
    jest.spyOn(console, "log").mockImplementation(() => {});
    mockConsoleWarn = jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    removeDir(dir);
    setDebugMode(false);
    jest.restoreAllMocks();
  });

  it("should select only regular files named NUMBER.EXTENSION", () => {
    touch(dir, "3.txt", "10.jpg", "5.tar.gz", "notes.txt", "12", "a1.txt", "7.");
    mkdirSync(join(dir, "42.dir"));
    symlinkSync(join(dir, "3.txt"), join(dir, "8.txt"));

    const { files, warnings } = scanDirectory(dir);
    const byName = [...files].sort((a, b) =>
      a.fileName < b.fileName ? -1 : 1,
    );

    expect(warnings).toEqual([]);
    expect(byName).toEqual([
      {
        number: 10,
        extension: "jpg",
        fileName: "10.jpg",
        path: join(dir, "10.jpg"),
      },
      {
        number: 3,
        extension: "txt",
        fileName: "3.txt",
        path: join(dir, "3.txt"),
      },
      {
        number: 5,
        extension: "tar.gz",
        fileName: "5.tar.gz",
        path: join(dir, "5.tar.gz"),
      },
    ]);
  });

  it("should not descend into subdirectories", () => {
    mkdirSync(join(dir, "nested"));
    touch(join(dir, "nested"), "1.txt");

    expect(scanDirectory(dir).files).toEqual([]);
  });

  it("should drop an out-of-range number with a warning and keep scanning", () => {
    touch(dir, "99999999999.txt", "1.txt");

    const { files, warnings } = scanDirectory(dir);

    expect(files.map((file) => file.fileName)).toEqual(["1.txt"]);
    expect(warnings).toEqual([
      {
        fileName: "99999999999.txt",
        message:
          "Number part of '99999999999.txt' is out of range (maximum 2147483647).",
      },
    ]);
    expect(mockConsoleWarn).toHaveBeenCalledWith(
      "⚠️  Warning: Number part of '99999999999.txt' is out of range (maximum 2147483647).",
    );
  });

  it("should name the dropped file in debug output", () => {
    setDebugMode(true);
    touch(dir, "99999999999.txt");

    scanDirectory(dir);

    expect(mockConsoleWarn).toHaveBeenCalledWith(
      "[shift-rename]",
      "Dropped '99999999999.txt' from the batch",
    );
  });

  it("should throw DirectoryAccessError when the directory cannot be listed", () => {
    const missing = join(dir, "missing");

    expect(() => scanDirectory(missing)).toThrow(DirectoryAccessError);
    expect(() => scanDirectory(missing)).toThrow(
      /^Error accessing directory: ENOENT/,
    );
  });

  it("should keep the directory and fs error on DirectoryAccessError", () => {
    const missing = join(dir, "missing");

    let caught: unknown;
    try {
      scanDirectory(missing);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DirectoryAccessError);
    if (caught instanceof DirectoryAccessError) {
      expect(caught.directory).toBe(missing);
      expect(caught.cause).toEqual(expect.objectContaining({ code: "ENOENT" }));
    }
  });
});
