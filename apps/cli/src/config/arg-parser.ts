import { Command } from "commander";
import { createRequire } from "node:module";
import type { BlatteCliConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

type CliOptions = {
  emitAst?: boolean;
  emitJs?: boolean;
  color: boolean;
};

export const parseCliArgs = (argv: readonly string[]): BlatteCliConfig => {
  const program = new Command()
    .name("blatte")
    .description("Compile and render Blatte documents")
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("[file]", "Blatte document (default: standard input)")
    .option("--emit-ast", "write the parsed forms to stdout as JSON")
    .option("--emit-js", "write the generated JavaScript to stdout")
    .option("--no-color", "print diagnostics without ANSI colors");

  program.parse(["node", "blatte", ...argv]);
  const opts = program.opts<CliOptions>();
  const [file]: (string | undefined)[] = program.args;

  return {
    file,
    emitAst: opts.emitAst ?? false,
    emitJs: opts.emitJs ?? false,
    color: opts.color,
  };
};

export const getConfigFromCli = (): BlatteCliConfig =>
  parseCliArgs(process.argv.slice(2));
