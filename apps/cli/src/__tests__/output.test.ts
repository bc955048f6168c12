import { describe, expect, it, vi } from "vitest";
import { printLines, printRendered, stringifyOutput } from "../output.js";

describe("cli output", () => {
  it("indents JSON by two spaces", () => {
    expect(stringifyOutput({ forms: ["a"] })).toBe(
      '{\n  "forms": [\n    "a"\n  ]\n}'
    );
  });

  it("prints one line per entry", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      printLines(["first", "second"]);
      expect(logSpy.mock.calls).toEqual([["first"], ["second"]]);
    } finally {
      logSpy.mockRestore();
    }
  });

  it("writes rendered text without adding a newline", () => {
    const writeSpy = vi
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);
    try {
      printRendered("text");
      expect(writeSpy).toHaveBeenCalledWith("text");
    } finally {
      writeSpy.mockRestore();
    }
  });
});
