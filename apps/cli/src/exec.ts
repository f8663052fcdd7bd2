import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  DiagnosticError,
  type Diagnostic,
  type ResolverOptions,
} from "@multireceiver/resolver";
import { getConfig, type CliConfig } from "./config/index.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { formatDiagnostics, formatJsonReport, formatTextReport } from "./output.js";
import { labelEntries, locateEntries } from "./scenario/entry-spans.js";
import { ScenarioError } from "./scenario/errors.js";
import { runScenario } from "./scenario/run-scenario.js";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => string;
}

const processIo: CliIo = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  readFile: (path) => readFileSync(path, "utf8"),
};

const resolverOptionsFor = (
  config: CliConfig,
  io: CliIo
): Partial<ResolverOptions> => ({
  // Flags only switch features on; MULTIRECEIVER_* variables still apply otherwise.
  ...(config.trace ? { trace: true } : {}),
  ...(config.crossCheck ? { crossCheck: true } : {}),
  traceSink: io.stderr,
});

const readScenarioFile = (io: CliIo, file: string): string => {
  try {
    return io.readFile(file);
  } catch (error) {
    throw new ScenarioError(
      file,
      `cannot read file (${error instanceof Error ? error.message : String(error)})`
    );
  }
};

/** Runs one scenario and returns the process exit code. */
export const runCli = (config: CliConfig, io: CliIo = processIo): number => {
  const file = resolve(config.scenario);
  const source = readScenarioFile(io, file);
  const report = runScenario({
    source,
    file,
    options: resolverOptionsFor(config, io),
  });

  io.stdout(config.format === "json" ? formatJsonReport(report) : formatTextReport(report));
  if (config.format === "text" && report.diagnostics.length > 0) {
    io.stderr(
      formatDiagnostics(report.diagnostics, {
        color: config.color,
        readSource: (path) => (path === file ? source : undefined),
        entryLabel: labelEntries(locateEntries(source, file)),
      })
    );
  }

  return report.diagnostics.some((diagnostic) => diagnostic.severity === "error") ? 1 : 0;
};

export const exec = () => main().catch(errorHandler);

async function main() {
  process.exitCode = runCli(getConfig());
}

function errorHandler(error: unknown) {
  if (error instanceof ScenarioError) {
    console.error(`invalid scenario: ${error.message}`);
    process.exit(2);
  }

  const diagnostic = extractDiagnostic(error);
  if (diagnostic) {
    console.error(formatCliDiagnostic(diagnostic));
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}

const extractDiagnostic = (error: unknown): Diagnostic | undefined =>
  error instanceof DiagnosticError ? error.diagnostic : undefined;
