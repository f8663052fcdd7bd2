// Opt-in tracing for resolution hot paths.
// Enable with MULTIRECEIVER_TRACE=1, `trace: true`, or the CLI's --trace.

export type TraceSink = (line: string) => void;

export interface ResolutionTracer {
  readonly enabled: boolean;
  push(label?: string): void;
  pop(): void;
  log(message: string): void;
}

// eslint-disable-next-line no-console
const consoleSink: TraceSink = (line) => console.log(line);

export const createTracer = ({
  enabled,
  sink = consoleSink,
}: {
  enabled: boolean;
  sink?: TraceSink;
}): ResolutionTracer => {
  let depth = 0;

  const write = (message: string) => {
    sink(`${" ".repeat(depth * 2)}[resolve] ${message}`);
  };

  return {
    enabled,
    push: (label) => {
      if (enabled && label) write(label);
      depth += 1;
    },
    pop: () => {
      depth = Math.max(0, depth - 1);
    },
    log: (message) => {
      if (enabled) write(message);
    },
  };
};

const ignore = (): void => undefined;

/** Shared by every resolver without tracing, so it keeps no depth. */
export const silentTracer: ResolutionTracer = Object.freeze({
  enabled: false,
  push: ignore,
  pop: ignore,
  log: ignore,
});
