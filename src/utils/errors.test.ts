import { describe, expect, it } from "vitest";
import {
  CommandError,
  FatalConfigError,
  describeFileError,
  getErrorMessage,
  isNodeError,
} from "./errors.js";

function nodeError(code: string) {
  return Object.assign(new Error(`${code}: failed`), { code });
}

describe("errors", () => {
  it("recognises errors carrying a code", () => {
    expect(isNodeError(nodeError("ENOENT"))).toBe(true);
    expect(isNodeError(new Error("plain"))).toBe(false);
    expect(isNodeError({ code: "ENOENT" })).toBe(false);
  });

  it("extracts messages from anything thrown", () => {
    expect(getErrorMessage(new CommandError("bad args"))).toBe("bad args");
    expect(getErrorMessage("text")).toBe("text");
    expect(getErrorMessage(42)).toBe("42");
  });

  it("gives config errors their exit code", () => {
    expect(new FatalConfigError("x").exitCode).toBe(52);
  });

  it("describes common file failures", () => {
    expect(describeFileError(nodeError("ENOENT"), "a.txt")).toBe("File not found: a.txt");
    expect(describeFileError(nodeError("EACCES"), "a.txt")).toBe("Permission denied: a.txt");
    expect(describeFileError(nodeError("EISDIR"), "dir")).toBe("Is a directory: dir");
    expect(describeFileError(new Error("disk on fire"), "a.txt")).toBe("a.txt: disk on fire");
  });
});
