import type { TraceSink } from "./trace.js";

export interface ResolverOptions {
  /** Write `[resolve]` lines for every candidate and verdict. */
  trace: boolean;
  traceSink?: TraceSink;
  /**
   * Compare every greedy ordered binding of a non-generic declaration with an
   * exhaustive search. Exponential; meant for debugging the engine.
   */
  crossCheck: boolean;
  /** Cap on the candidate signatures listed in one diagnostic. */
  maxDiagnosticCandidates: number;
}

export const defaultResolverOptions: ResolverOptions = {
  trace: false,
  crossCheck: false,
  maxDiagnosticCandidates: 8,
};

type Env = Readonly<Record<string, string | undefined>>;

const flag = (value: string | undefined): boolean | undefined =>
  value === undefined ? undefined : value !== "" && value !== "0";

export const resolverOptionsFromEnv = (
  env: Env = process.env
): Partial<ResolverOptions> => {
  const options: Partial<ResolverOptions> = {};
  const trace = flag(env.MULTIRECEIVER_TRACE);
  const crossCheck = flag(env.MULTIRECEIVER_CROSS_CHECK);
  if (trace !== undefined) options.trace = trace;
  if (crossCheck !== undefined) options.crossCheck = crossCheck;
  return options;
};

export const resolveOptions = (
  overrides: Partial<ResolverOptions> = {},
  env: Env = process.env
): ResolverOptions => ({
  ...defaultResolverOptions,
  ...resolverOptionsFromEnv(env),
  ...overrides,
});
