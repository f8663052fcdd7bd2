import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { CliConfig, OutputFormat } from "./types.js";

const require = createRequire(import.meta.url);

const readVersion = (): string => {
  const manifest: unknown = require("@multireceiver/cli/package.json");
  return typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
    ? manifest.version
    : "0.0.0";
};

const OUTPUT_FORMATS = ["text", "json"] as const;

export const parseOutputFormat = (value: string): OutputFormat => {
  const normalized = value.toLowerCase();
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new InvalidArgumentError(
    `invalid output format "${value}" (allowed: ${OUTPUT_FORMATS.join(", ")})`,
  );
};

type CliOptions = {
  format: OutputFormat;
  trace?: boolean;
  crossCheck?: boolean;
  color: boolean;
};

const createCommand = (): Command =>
  new Command()
    .name("multireceiver")
    .description("Resolve calls against multiple-receiver declarations")
    .version(readVersion(), "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("<scenario>", "scenario JSON file")
    .option(
      "--format <format>",
      `output format (${OUTPUT_FORMATS.join("|")})`,
      parseOutputFormat,
      "text",
    )
    .option("--trace", "print resolution trace lines to stderr")
    .option("--cross-check", "compare ordered bindings with exhaustive search")
    .option("--no-color", "disable ANSI colors in diagnostics");

export const parseArgs = (argv: readonly string[]): CliConfig => {
  const program = createCommand();
  program.parse(["node", "multireceiver", ...argv]);
  const opts = program.opts<CliOptions>();
  const [scenario = ""] = program.args;

  return {
    scenario,
    format: opts.format,
    trace: Boolean(opts.trace),
    crossCheck: Boolean(opts.crossCheck),
    color: opts.color,
  };
};

export const getConfigFromCli = (): CliConfig => parseArgs(process.argv.slice(2));
