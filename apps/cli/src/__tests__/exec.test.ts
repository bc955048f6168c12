import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ParseError } from "@blatte/compiler";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { BlatteCliConfig } from "../config/types.js";
import { readInput, runCli } from "../exec.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const samplePath = resolve(__dirname, "fixtures/sample.blt");
const sample = readFileSync(samplePath, "utf8");

const configFor = (opts: Partial<BlatteCliConfig> = {}): BlatteCliConfig => ({
  file: samplePath,
  emitAst: false,
  emitJs: false,
  color: false,
  ...opts,
});

describe("runCli", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads the configured file", () => {
    expect(readInput(configFor())).toBe(sample);
  });

  it("renders the document to stdout", () => {
    const writeSpy = vi
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);

    runCli(configFor(), sample);

    expect(writeSpy).toHaveBeenCalledTimes(1);
    expect(writeSpy).toHaveBeenCalledWith("\nHello, World!\n");
  });

  it("prints generated JavaScript one form per line", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    runCli(configFor({ emitJs: true }), sample);

    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(logSpy).toHaveBeenLastCalledWith(
      '__rt.wrapws("\\n", __rt.group([__rt.wrapws("", __env.get("greet")), __rt.wrapws(" ", "World")]))'
    );
  });

  it("prints the parsed forms as JSON", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    runCli(configFor({ emitAst: true }), sample);

    const [[output]] = logSpy.mock.calls;
    const parsed: unknown = JSON.parse(String(output));
    expect(parsed).toMatchObject({
      trailing: "\n",
      forms: [
        {
          ws: "\n",
          expr: {
            define: "greet",
            lambda: { lambda: ["\\name"] },
          },
        },
        {
          ws: "\n",
          expr: [
            { ws: "", expr: { variable: "greet" } },
            { ws: " ", expr: "World" },
          ],
        },
      ],
    });
  });

  it("throws parse errors for the caller to report", () => {
    expect(() => runCli(configFor({ file: undefined }), "{a")).toThrow(
      ParseError
    );
  });
});
