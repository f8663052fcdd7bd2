import type { Diagnostic } from "@multireceiver/resolver";
import { formatCliDiagnostic, type CliDiagnosticOptions } from "./diagnostics.js";
import type { CallReport, ScenarioReport } from "./scenario/run-scenario.js";

const CIRCULAR_REFERENCE = "[Circular]";

const normalizeWithTraversalTracking = ({
  value,
  ancestors,
  normalize,
}: {
  value: object;
  ancestors: WeakSet<object>;
  normalize: () => unknown;
}): unknown => {
  if (ancestors.has(value)) {
    return CIRCULAR_REFERENCE;
  }

  ancestors.add(value);
  try {
    return normalize();
  } finally {
    ancestors.delete(value);
  }
};

const normalizeMapEntries = ({
  value,
  ancestors,
}: {
  value: ReadonlyMap<unknown, unknown>;
  ancestors: WeakSet<object>;
}): Record<string, unknown> =>
  Object.fromEntries(
    Array.from(value.entries()).map(([key, entry]) => [
      String(normalizeOutput({ value: key, ancestors })),
      normalizeOutput({ value: entry, ancestors }),
    ])
  );

const normalizeOutput = ({
  value,
  ancestors = new WeakSet(),
}: {
  value: unknown;
  ancestors?: WeakSet<object>;
}): unknown => {
  if (!value || typeof value !== "object") {
    return value;
  }

  return normalizeWithTraversalTracking({
    value,
    ancestors,
    normalize: () => {
      if (value instanceof Map) {
        return normalizeMapEntries({ value, ancestors });
      }

      if (value instanceof Set) {
        return Array.from(value).map((entry) =>
          normalizeOutput({ value: entry, ancestors })
        );
      }

      if (Array.isArray(value)) {
        return value.map((entry) => normalizeOutput({ value: entry, ancestors }));
      }

      return Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [
          key,
          normalizeOutput({ value: entry, ancestors }),
        ])
      );
    },
  });
};

/** JSON with maps as objects and sets as arrays. */
export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(normalizeOutput({ value }), undefined, 2);

const describeVerdict = (call: CallReport): string => {
  switch (call.verdict) {
    case "resolved":
      return `resolved to ${call.declaration ?? "?"} as ${call.invocation ?? "?"}, this = ${
        call.this ?? "?"
      }`;
    case "not-applicable":
    case "ambiguous":
      return `${call.verdict} (${call.diagnostic ?? "?"})`;
  }
};

export const formatCallReport = (call: CallReport): string[] => [
  `#${call.index} ${call.name}: ${describeVerdict(call)}`,
  ...Array.from(call.qualifiedThis, ([label, argument]) =>
    argument === null
      ? `  this@${label}: no such receiver`
      : `  this@${label} = ${argument}`
  ),
];

export const formatSummary = (report: ScenarioReport): string => {
  const count = (verdict: CallReport["verdict"]) =>
    report.calls.filter((call) => call.verdict === verdict).length;
  const errors = report.diagnostics.filter(
    (diagnostic) => diagnostic.severity === "error"
  ).length;
  return `${report.calls.length} call(s): ${count("resolved")} resolved, ${count(
    "not-applicable"
  )} not applicable, ${count("ambiguous")} ambiguous; ${errors} error(s)`;
};

export const formatTextReport = (report: ScenarioReport): string =>
  [...report.calls.flatMap(formatCallReport), formatSummary(report)].join("\n");

export const formatDiagnostics = (
  diagnostics: readonly Diagnostic[],
  options: CliDiagnosticOptions = {}
): string => diagnostics.map((diagnostic) => formatCliDiagnostic(diagnostic, options)).join("\n");

export const formatJsonReport = (report: ScenarioReport): string =>
  stringifyOutput(report);
