export type OutputFormat = "text" | "json";

export type CliConfig = {
  /** Path to the scenario JSON file. */
  scenario: string;
  format: OutputFormat;
  /** Print `[resolve]` trace lines to stderr. */
  trace: boolean;
  /** Check every ordered binding against exhaustive search. */
  crossCheck: boolean;
  color: boolean;
};
