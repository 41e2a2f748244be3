import { describe, expect, test } from "@jest/globals";

import { isFileSystemError, isMissing } from "../../src/utils/fs.js";

function errnoError(message: string, code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe("isFileSystemError", () => {
  test("accepts errors carrying a string code", () => {
    expect(isFileSystemError(errnoError("denied", "EACCES"))).toBe(true);
  });

  test("rejects values without a code", () => {
    expect(isFileSystemError(new Error("plain"))).toBe(false);
    expect(isFileSystemError({ code: 2 })).toBe(false);
    expect(isFileSystemError(null)).toBe(false);
  });
});

describe("isMissing", () => {
  test("returns true for ENOENT errors", () => {
    expect(isMissing(errnoError("missing", "ENOENT"))).toBe(true);
  });

  test("returns false for other errors", () => {
    expect(isMissing(errnoError("is a directory", "EISDIR"))).toBe(false);
    expect(isMissing(new Error("generic"))).toBe(false);
  });
});
